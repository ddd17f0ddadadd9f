import { describe, it, expect, vi } from 'vitest';
import { Faker, en } from '@faker-js/faker';

import { FormatRegistry, type FormatGenerator } from '../format-registry.js';
import { createFormatRegistry } from '../../generator/formats/index.js';
import { XorShift32 } from '../../util/rng.js';
import { ok } from '../../types/result.js';

const constant = (name: string, value: string): FormatGenerator => ({
  name,
  supports: (format) => format === name,
  generate: () => ok(value),
  validate: (candidate) => candidate === value,
  getExamples: () => [value],
});

const options = { rng: new XorShift32(1, 'registry'), faker: new Faker({ locale: [en] }) };

describe('FormatRegistry', () => {
  it('looks formats up exactly, case-insensitively and through aliases', () => {
    const registry = new FormatRegistry();
    registry.register(constant('uuid', 'fixed'));
    expect(registry.get('uuid')?.name).toBe('uuid');
    expect(registry.get('UUID')?.name).toBe('uuid');
    expect(registry.get('guid')?.name).toBe('uuid');
    expect(registry.supports('email')).toBe(false);
  });

  it('keeps an explicit registration over an alias', () => {
    const registry = new FormatRegistry();
    registry.register(constant('guid', 'explicit'));
    registry.register(constant('uuid', 'aliased'));
    const generated = registry.generate('guid', options);
    expect(generated.isOk() && generated.value).toBe('explicit');
  });

  it('reports an unknown format with the registered ones', () => {
    const registry = new FormatRegistry();
    registry.register(constant('ipv4', '192.0.2.1'));
    const result = registry.generate('hostname', options);
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('No generator found for format: "hostname"');
      expect(result.error.context?.available).toEqual(['ip', 'ipv4']);
    }
  });

  it('runs the initializer once, on first use', () => {
    const registry = new FormatRegistry();
    const init = vi.fn(() => registry.register(constant('date', '2024-01-01')));
    registry.setInitializer(init);
    expect(init).not.toHaveBeenCalled();
    expect(registry.validate('date', '2024-01-01')).toBe(true);
    expect(registry.supports('date')).toBe(true);
    expect(init).toHaveBeenCalledTimes(1);
  });

  it('ships the built-in formats', () => {
    expect(createFormatRegistry().getRegisteredFormats()).toEqual([
      'date',
      'date-time',
      'dateTime',
      'datetime',
      'e-mail',
      'email',
      'guid',
      'ip',
      'ipv4',
      'uri',
      'url',
      'uuid',
    ]);
  });
});
