import { describe, it, expect } from 'vitest';
import { Faker, en } from '@faker-js/faker';

import { XorShift32 } from '../../../util/rng.js';
import type { FormatGenerator, FormatOptions } from '../../../registry/format-registry.js';
import { DateGenerator, daysInMonth } from '../date-generator.js';
import { DateTimeGenerator } from '../datetime-generator.js';
import { EmailGenerator } from '../email-generator.js';
import { IPv4Generator, UriGenerator } from '../uri-generator.js';
import { UUIDGenerator } from '../uuid-generator.js';

function options(seed: number): FormatOptions {
  const faker = new Faker({ locale: [en] });
  faker.seed(seed);
  return { rng: new XorShift32(seed, 'formats'), faker };
}

function sample(generator: FormatGenerator, seed: number): string {
  const result = generator.generate(options(seed));
  if (result.isErr()) throw result.error;
  return result.value;
}

const generators: FormatGenerator[] = [
  new UUIDGenerator(),
  new EmailGenerator(),
  new DateGenerator(),
  new DateTimeGenerator(),
  new UriGenerator(),
  new IPv4Generator(),
];

describe('built-in format generators', () => {
  it.each(generators.map((g) => [g.name, g] as const))('%s output passes its own validation', (_name, generator) => {
    for (let seed = 1; seed <= 25; seed++) {
      expect(generator.validate(sample(generator, seed))).toBe(true);
    }
  });

  it.each(generators.map((g) => [g.name, g] as const))('%s is reproducible from the seed', (_name, generator) => {
    expect(sample(generator, 42)).toBe(sample(generator, 42));
  });

  it.each(generators.map((g) => [g.name, g] as const))('%s examples are valid', (_name, generator) => {
    for (const example of generator.getExamples()) expect(generator.validate(example)).toBe(true);
  });
});

describe('UUIDGenerator', () => {
  it('produces version 4 identifiers', () => {
    expect(sample(new UUIDGenerator(), 7)).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it('answers to guid', () => {
    expect(new UUIDGenerator().supports('guid')).toBe(true);
    expect(new UUIDGenerator().supports('email')).toBe(false);
  });
});

describe('EmailGenerator', () => {
  it('stays on reserved example domains', () => {
    const domain = sample(new EmailGenerator(), 3).split('@')[1];
    expect(['example.com', 'example.org', 'example.net', 'test.example']).toContain(domain);
  });

  it('rejects addresses without a domain part', () => {
    expect(new EmailGenerator().validate('nobody@')).toBe(false);
  });
});

describe('DateGenerator', () => {
  it('knows leap years', () => {
    expect(daysInMonth(2, 2024)).toBe(29);
    expect(daysInMonth(2, 1900)).toBe(28);
    expect(daysInMonth(2, 2000)).toBe(29);
    expect(daysInMonth(4, 2023)).toBe(30);
  });

  it('rejects impossible calendar dates', () => {
    const dates = new DateGenerator();
    expect(dates.validate('2023-02-29')).toBe(false);
    expect(dates.validate('2023-13-01')).toBe(false);
    expect(dates.validate('2024-02-29')).toBe(true);
  });
});

describe('DateTimeGenerator', () => {
  it('emits UTC timestamps at second precision', () => {
    expect(sample(new DateTimeGenerator(), 11)).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/);
  });

  it('accepts offsets and rejects out-of-range hours', () => {
    const timestamps = new DateTimeGenerator();
    expect(timestamps.validate('2024-06-30T23:59:59+02:00')).toBe(true);
    expect(timestamps.validate('2024-06-30T24:00:00Z')).toBe(false);
  });
});

describe('network formats', () => {
  it('draws IPv4 addresses from the documentation range', () => {
    expect(sample(new IPv4Generator(), 5)).toMatch(/^192\.0\.2\.\d{1,3}$/);
    expect(new IPv4Generator().validate('256.1.1.1')).toBe(false);
  });

  it('produces https URIs under example.com', () => {
    expect(sample(new UriGenerator(), 9)).toMatch(/^https:\/\/[^/]+\.example\.com\/[a-z0-9]+\/\d+$/);
    expect(new UriGenerator().validate('not a uri')).toBe(false);
  });
});
