/**
 * URI and network-address format generators
 */

import { ok, type Result } from '../../types/result.js';
import type { GenerationError } from '../../types/errors.js';
import type { FormatGenerator, FormatOptions } from '../../registry/format-registry.js';

export class UriGenerator implements FormatGenerator {
  readonly name = 'uri';

  supports(format: string): boolean {
    return format === 'uri' || format === 'url' || format === 'iri';
  }

  generate(options: FormatOptions): Result<string, GenerationError> {
    const { faker, rng } = options;
    const word = faker.word.noun().toLowerCase().replace(/[^a-z0-9]/g, '') || 'item';
    return ok(`https://${faker.internet.domainWord()}.example.com/${word}/${rng.int(1, 9999)}`);
  }

  validate(value: string): boolean {
    try {
      return new URL(value).protocol.length > 0;
    } catch {
      return false;
    }
  }

  getExamples(): string[] {
    return ['https://api.example.com/items/42'];
  }
}

export class IPv4Generator implements FormatGenerator {
  readonly name = 'ipv4';

  supports(format: string): boolean {
    return format === 'ipv4';
  }

  generate(options: FormatOptions): Result<string, GenerationError> {
    const { rng } = options;
    // 192.0.2.0/24 is reserved for documentation
    return ok(`192.0.2.${rng.int(1, 254)}`);
  }

  validate(value: string): boolean {
    const parts = value.split('.');
    return (
      parts.length === 4 &&
      parts.every((p) => /^\d{1,3}$/.test(p) && Number(p) <= 255)
    );
  }

  getExamples(): string[] {
    return ['192.0.2.10'];
  }
}
