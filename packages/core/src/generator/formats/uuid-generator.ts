/**
 * UUID Format Generator
 * RFC 4122 version 4 layout drawn from the case RNG, so a seed replays exactly.
 */
import { ok, type Result } from '../../types/result.js';
import type { GenerationError } from '../../types/errors.js';
import type { FormatGenerator, FormatOptions } from '../../registry/format-registry.js';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-8][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export class UUIDGenerator implements FormatGenerator {
  readonly name = 'uuid';

  supports(format: string): boolean {
    return format === 'uuid' || format === 'guid';
  }

  generate(options: FormatOptions): Result<string, GenerationError> {
    const { rng } = options;
    const hex = '0123456789abcdef';
    const section = (len: number): string => {
      let s = '';
      for (let i = 0; i < len; i++) s += hex[rng.int(0, 15)];
      return s;
    };
    const variant = rng.pick(['8', '9', 'a', 'b']) ?? '8';
    return ok(`${section(8)}-${section(4)}-4${section(3)}-${variant}${section(3)}-${section(12)}`);
  }

  validate(value: string): boolean {
    return UUID_RE.test(value);
  }

  getExamples(): string[] {
    return ['550e8400-e29b-41d4-a716-446655440000', 'f47ac10b-58cc-4372-a567-0e02b2c3d479'];
  }
}
