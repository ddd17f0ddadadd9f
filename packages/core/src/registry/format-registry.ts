/**
 * Format Registry
 * Extensible string-format generation for the case generator
 */

import type { Faker } from '@faker-js/faker';
import { err, type Result } from '../types/result.js';
import { GenerationError } from '../types/errors.js';
import type { XorShift32 } from '../util/rng.js';

/**
 * Randomness handed to format generators; both are seeded per case.
 */
export interface FormatOptions {
  rng: XorShift32;
  faker: Faker;
}

export interface FormatGenerator {
  readonly name: string;

  supports(format: string): boolean;

  generate(options: FormatOptions): Result<string, GenerationError>;

  validate(value: string): boolean;

  getExamples(): string[];
}

const ALIASES: Record<string, string[]> = {
  uuid: ['guid'],
  'date-time': ['datetime', 'dateTime'],
  email: ['e-mail'],
  uri: ['url'],
  ipv4: ['ip'],
};

/**
 * Registry for format generators with lazy initialization
 */
export class FormatRegistry {
  private readonly formats = new Map<string, FormatGenerator>();
  private initializer?: () => void;

  setInitializer(init: () => void): void {
    this.initializer = init;
  }

  private ensureInitialized(): void {
    const init = this.initializer;
    if (init) {
      this.initializer = undefined;
      init();
    }
  }

  register(generator: FormatGenerator): void {
    this.formats.set(generator.name, generator);
    for (const alias of ALIASES[generator.name] ?? []) {
      if (!this.formats.has(alias)) this.formats.set(alias, generator);
    }
  }

  get(format: string): FormatGenerator | undefined {
    this.ensureInitialized();
    const exact = this.formats.get(format);
    if (exact) return exact;
    const lower = format.toLowerCase();
    for (const [key, generator] of this.formats) {
      if (key.toLowerCase() === lower) return generator;
    }
    for (const generator of this.formats.values()) {
      if (generator.supports(format)) return generator;
    }
    return undefined;
  }

  supports(format: string): boolean {
    return this.get(format) !== undefined;
  }

  generate(format: string, options: FormatOptions): Result<string, GenerationError> {
    const generator = this.get(format);
    if (!generator) {
      return err(
        new GenerationError({
          message: `No generator found for format: "${format}"`,
          context: { constraint: 'format', format, available: this.getRegisteredFormats() },
        })
      );
    }
    return generator.generate(options);
  }

  validate(format: string, value: string): boolean {
    const generator = this.get(format);
    return generator ? generator.validate(value) : false;
  }

  getRegisteredFormats(): string[] {
    this.ensureInitialized();
    return Array.from(this.formats.keys()).sort();
  }
}
