/**
 * Date-Time Format Generator
 * RFC 3339 timestamps in UTC with second precision
 */

import { ok, type Result } from '../../types/result.js';
import type { GenerationError } from '../../types/errors.js';
import type { FormatGenerator, FormatOptions } from '../../registry/format-registry.js';
import { DateGenerator, pad2, randomDateParts } from './date-generator.js';

const DATETIME_RE = /^(\d{4}-\d{2}-\d{2})T([01]\d|2[0-3]):[0-5]\d:[0-5]\d(\.\d+)?(Z|[+-]\d{2}:\d{2})$/i;

export class DateTimeGenerator implements FormatGenerator {
  readonly name = 'date-time';

  private readonly dates = new DateGenerator();

  supports(format: string): boolean {
    return format === 'date-time' || format === 'datetime';
  }

  generate(options: FormatOptions): Result<string, GenerationError> {
    const { year, month, day } = randomDateParts(options);
    const { rng } = options;
    const time = `${pad2(rng.int(0, 23))}:${pad2(rng.int(0, 59))}:${pad2(rng.int(0, 59))}`;
    return ok(`${year}-${pad2(month)}-${pad2(day)}T${time}Z`);
  }

  validate(value: string): boolean {
    const m = DATETIME_RE.exec(value);
    return m !== null && m[1] !== undefined && this.dates.validate(m[1]);
  }

  getExamples(): string[] {
    return ['2023-01-15T10:30:00Z', '2024-06-30T23:59:59+02:00'];
  }
}
