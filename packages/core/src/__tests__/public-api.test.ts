import { describe, it, expect } from 'vitest';
import {
  CaseGenerator,
  CaseValidator,
  ErrorCode,
  TOOL_VERSION,
  buildSpecModel,
  findOperation,
  getExitCode,
  parsePattern,
  parseRules,
  type ApiSpecModel,
} from '../index.js';

const doc = {
  openapi: '3.0.3',
  info: { title: 'Ping', version: '1' },
  paths: {
    '/ping/{n}': {
      get: {
        operationId: 'ping',
        parameters: [{ name: 'n', in: 'path', schema: { type: 'integer', minimum: 1, maximum: 9 } }],
      },
    },
  },
};

describe('public API surface', () => {
  it('exports usable stage entry points', () => {
    const model: ApiSpecModel = buildSpecModel(doc);
    const ping = findOperation(model, 'ping');
    if (!ping) throw new Error('ping missing');

    const generator = new CaseGenerator(model, { seed: 3 });
    const [request] = generator.generate(ping, 1, 'POSITIVE');
    expect(request?.method).toBe('get');
    expect(request?.pathParameters.n).toMatch(/^[1-9]$/);

    const validator = new CaseValidator(model);
    expect(validator.validateCase(ping, request?.rawParameters ?? {}, undefined, undefined)).toEqual([]);
  });

  it('exposes rules, paths and error codes', () => {
    const rules = parseRules({ defaults: { body: { '$.id': { strategy: 'ignore' } } } });
    expect([...rules.defaults.body.keys()]).toEqual(['$.id']);
    expect(parsePattern('$.a[0]').isOk()).toBe(true);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
    expect(TOOL_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
  });
});
