/**
 * Date Format Generator
 * Dates in YYYY-MM-DD (RFC 3339 full-date)
 */

import { ok, type Result } from '../../types/result.js';
import type { GenerationError } from '../../types/errors.js';
import type { FormatGenerator, FormatOptions } from '../../registry/format-registry.js';

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

export function daysInMonth(month: number, year: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

export function randomDateParts(options: FormatOptions): {
  year: number;
  month: number;
  day: number;
} {
  const { rng } = options;
  const year = rng.int(1990, 2030);
  const month = rng.int(1, 12);
  const day = rng.int(1, daysInMonth(month, year));
  return { year, month, day };
}

export const pad2 = (n: number): string => n.toString().padStart(2, '0');

export class DateGenerator implements FormatGenerator {
  readonly name = 'date';

  supports(format: string): boolean {
    return format === 'date';
  }

  generate(options: FormatOptions): Result<string, GenerationError> {
    const { year, month, day } = randomDateParts(options);
    return ok(`${year}-${pad2(month)}-${pad2(day)}`);
  }

  validate(value: string): boolean {
    const m = DATE_RE.exec(value);
    if (!m) return false;
    const year = Number(m[1]);
    const month = Number(m[2]);
    const day = Number(m[3]);
    return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(month, year);
  }

  getExamples(): string[] {
    return ['2023-01-15', '2024-02-29'];
  }
}
