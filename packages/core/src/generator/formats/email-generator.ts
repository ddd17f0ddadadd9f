/**
 * Email Format Generator
 * Realistic addresses on reserved example domains.
 */

import { ok, type Result } from '../../types/result.js';
import type { GenerationError } from '../../types/errors.js';
import type { FormatGenerator, FormatOptions } from '../../registry/format-registry.js';

const EMAIL_RE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export class EmailGenerator implements FormatGenerator {
  readonly name = 'email';

  private readonly domains = ['example.com', 'example.org', 'example.net', 'test.example'];

  supports(format: string): boolean {
    return format === 'email' || format === 'idn-email';
  }

  generate(options: FormatOptions): Result<string, GenerationError> {
    const provider = options.rng.pick(this.domains) ?? 'example.com';
    // Special characters would need quoting in some validators
    const email = options.faker.internet.email({ provider, allowSpecialCharacters: false });
    return ok(email.toLowerCase());
  }

  validate(value: string): boolean {
    return EMAIL_RE.test(value);
  }

  getExamples(): string[] {
    return ['john.doe@example.com', 'jane_smith@example.org'];
  }
}
