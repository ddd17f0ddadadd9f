import { describe, it, expect } from 'vitest';

import { Comparator, compare, nativeEqual } from '../comparator.js';
import { effectiveRules, emptyRuleSet, parseRules, type EffectiveRules } from '../rules.js';
import { InProcessEvaluator, binaryStep, failedStep, jsonStep } from '../../test-utils/fixtures.js';
import type { ExpressionEvaluator } from '../../evaluator/bridge.js';
import { EvaluationError } from '../../types/errors.js';
import { err } from '../../types/result.js';

function rulesFor(doc: unknown, operationId = 'getItem'): EffectiveRules {
  return effectiveRules(parseRules(doc), operationId);
}

const exactOnly = effectiveRules(emptyRuleSet(), 'getItem');

describe('Comparator — transport and status', () => {
  it('reports an execution error, not a mismatch, when both targets fail', async () => {
    const result = await compare(failedStep('timeout', 'slow A'), failedStep('connection', 'refused B'), exactOnly);
    expect(result.match).toBe(false);
    expect(result.mismatches).toEqual([]);
    expect(result.executionError).toBe('target A: slow A; target B: refused B');
  });

  it('turns a one-sided transport failure into a status_code mismatch', async () => {
    const result = await compare(jsonStep({ id: 1 }), failedStep('timeout', 'request timed out after 50ms'), exactOnly);
    expect(result.mismatches).toEqual([
      {
        kind: 'status_code',
        path: '',
        jsonPath: 'status_code',
        pattern: 'status_code',
        rule: 'transport:timeout',
        targetA: 200,
        targetB: 'request timed out after 50ms',
      },
    ]);
  });

  it('stops at a status difference without looking at the body', async () => {
    const result = await compare(jsonStep({ id: 1 }, 200), jsonStep({ id: 2 }, 201), exactOnly);
    expect(result.mismatches).toHaveLength(1);
    expect(result.mismatches[0]).toMatchObject({ kind: 'status_code', rule: 'exact', targetA: 200, targetB: 201 });
  });

  it('treats two error responses with an accepted status as a match', async () => {
    const result = await compare(jsonStep({ detail: 'a' }, 404), jsonStep({ detail: 'b' }, 404), exactOnly);
    expect(result).toEqual({ match: true, mismatches: [] });
  });
});

describe('Comparator — body walk', () => {
  it('names the innermost differing path', async () => {
    const result = await compare(jsonStep({ a: { b: 1, c: 2 } }), jsonStep({ a: { b: 1, c: 3 } }), exactOnly);
    expect(result.mismatches).toEqual([
      { kind: 'body', path: '/a/c', jsonPath: '$.a.c', pattern: '$.a.c', rule: 'exact', targetA: 2, targetB: 3 },
    ]);
  });

  it('collapses array indices in the class pattern', async () => {
    const result = await compare(
      jsonStep({ items: [{ id: 1 }, { id: 2 }] }),
      jsonStep({ items: [{ id: 1 }, { id: 3 }] }),
      exactOnly
    );
    expect(result.mismatches.map((m) => [m.path, m.jsonPath, m.pattern])).toEqual([
      ['/items/1/id', '$.items[1].id', '$.items[*].id'],
    ]);
  });

  it('compares arrays of different lengths as a whole', async () => {
    const result = await compare(jsonStep({ items: [1, 2] }), jsonStep({ items: [1] }), exactOnly);
    expect(result.mismatches).toEqual([
      { kind: 'body', path: '/items', jsonPath: '$.items', pattern: '$.items', rule: 'exact', targetA: [1, 2], targetB: [1] },
    ]);
  });

  it('reports a key present on one side only as a parity failure', async () => {
    const result = await compare(jsonStep({ id: 1, extra: true }), jsonStep({ id: 1 }), exactOnly);
    expect(result.mismatches).toEqual([
      { kind: 'body', path: '/extra', jsonPath: '$.extra', pattern: '$.extra', rule: 'presence:parity', targetA: true },
    ]);
  });

  it('ignores object key order', async () => {
    const result = await compare(jsonStep({ a: 1, b: [1, { c: 2, d: 3 }] }), jsonStep({ b: [1, { d: 3, c: 2 }], a: 1 }), exactOnly);
    expect(result.match).toBe(true);
  });

  it('treats arrays that differ only in repetitions as equal sets', async () => {
    const rules = rulesFor({ defaults: { body: { '$.tags': { strategy: 'unordered-set' } } } });
    const result = await compare(jsonStep({ tags: [1, 1, 2] }), jsonStep({ tags: [1, 2, 2] }), rules);
    expect(result.match).toBe(true);
  });

  it('applies numeric tolerance to every element under a wildcard', async () => {
    const rules = rulesFor({ defaults: { body: { '$.prices[*]': { strategy: 'numeric-tolerance', tolerance: 0.01 } } } });
    const ok = await compare(jsonStep({ prices: [1.0, 2.0] }), jsonStep({ prices: [1.005, 2.0] }), rules);
    expect(ok.match).toBe(true);
    const bad = await compare(jsonStep({ prices: [1.0, 2.0] }), jsonStep({ prices: [1.0, 2.5] }), rules);
    expect(bad.mismatches.map((m) => [m.path, m.rule])).toEqual([['/prices/1', 'numeric-tolerance']]);
  });

  it('lets a more specific pattern override an ignored ancestor', async () => {
    const rules = rulesFor({
      defaults: {
        body: {
          '$.meta': { strategy: 'ignore' },
          '$.meta.version': { strategy: 'exact' },
        },
      },
    });
    const result = await compare(
      jsonStep({ meta: { version: 1, requestId: 'x' } }),
      jsonStep({ meta: { version: 2, requestId: 'y' } }),
      rules
    );
    expect(result.mismatches.map((m) => m.jsonPath)).toEqual(['$.meta.version']);
  });

  it('prefers the literal pattern over a wildcard of the same length', async () => {
    const rules = rulesFor({
      defaults: {
        body: {
          '$.*': { strategy: 'ignore' },
          '$.id': { strategy: 'exact' },
        },
      },
    });
    const result = await compare(jsonStep({ id: 1, name: 'a' }), jsonStep({ id: 2, name: 'b' }), rules);
    expect(result.mismatches.map((m) => m.jsonPath)).toEqual(['$.id']);
  });
});

describe('Comparator — presence rules', () => {
  it('flags a required field missing from both sides once', async () => {
    const rules = rulesFor({ defaults: { body: { '$.id': { presence: 'required' } } } });
    const result = await compare(jsonStep({ name: 'a' }), jsonStep({ name: 'a' }), rules);
    expect(result.mismatches).toEqual([
      { kind: 'body', path: '/id', jsonPath: '$.id', pattern: '$.id', rule: 'presence:required' },
    ]);
  });

  it('flags a required field missing from one side', async () => {
    const rules = rulesFor({ defaults: { body: { '$.id': { presence: 'required' } } } });
    const result = await compare(jsonStep({ id: 'x' }), jsonStep({}), rules);
    expect(result.mismatches).toEqual([
      { kind: 'body', path: '/id', jsonPath: '$.id', pattern: '$.id', rule: 'presence:required', targetA: 'x' },
    ]);
  });

  it('flags a forbidden field present on either side', async () => {
    const rules = rulesFor({ defaults: { body: { '$.password': { presence: 'forbidden' } } } });
    const result = await compare(jsonStep({ password: 'test-secret' }), jsonStep({}), rules);
    expect(result.mismatches.map((m) => m.rule)).toEqual(['presence:forbidden']);
  });

  it('accepts an optional field on one side only', async () => {
    const rules = rulesFor({ defaults: { body: { '$.nickname': { presence: 'optional' } } } });
    const result = await compare(jsonStep({ nickname: 'n' }), jsonStep({}), rules);
    expect(result.match).toBe(true);
  });

  it('does not pass an ancestor presence rule down to its children', async () => {
    const rules = rulesFor({ defaults: { body: { '$.profile': { presence: 'required', strategy: 'exact' } } } });
    const result = await compare(jsonStep({ profile: { a: 1 } }), jsonStep({ profile: {} }), rules);
    expect(result.mismatches.map((m) => [m.jsonPath, m.rule])).toEqual([['$.profile.a', 'presence:parity']]);
  });
});

describe('Comparator — headers and binary bodies', () => {
  it('compares only the first value of a configured header', async () => {
    const rules = rulesFor({ defaults: { headers: { 'Content-Type': {} } } });
    const same = await compare(
      jsonStep(null, 200, { 'content-type': ['application/json', 'x'] }),
      jsonStep(null, 200, { 'content-type': ['application/json', 'y'] }),
      rules
    );
    expect(same.match).toBe(true);

    const differs = await compare(
      jsonStep(null, 200, { 'content-type': ['application/json'] }),
      jsonStep(null, 200, { 'content-type': ['text/plain'] }),
      rules
    );
    expect(differs.mismatches).toEqual([
      {
        kind: 'header',
        path: 'content-type',
        jsonPath: 'header.content-type',
        pattern: 'header.content-type',
        rule: 'exact',
        targetA: 'application/json',
        targetB: 'text/plain',
      },
    ]);
  });

  it('leaves unconfigured headers alone', async () => {
    const result = await compare(jsonStep(1, 200, { date: ['Mon'] }), jsonStep(1, 200, { date: ['Tue'] }), exactOnly);
    expect(result.match).toBe(true);
  });

  it('compares binary bodies with the binary rule', async () => {
    const differs = await compare(binaryStep('AAEC'), binaryStep('AAED'), exactOnly);
    expect(differs.mismatches.map((m) => [m.jsonPath, m.rule])).toEqual([['$', 'exact']]);

    const rules = rulesFor({ defaults: { binary: { strategy: 'ignore' } } });
    expect((await compare(binaryStep('AAEC'), binaryStep('AAED'), rules)).match).toBe(true);
  });
});

describe('Comparator — rule scopes', () => {
  const doc = {
    defaults: { body: { '$.updated_at': { strategy: 'ignore' } } },
    operations: { createItem: { body: { '$.updated_at': { strategy: 'exact' } } } },
  };

  it('uses the operation entry in place of the default one', async () => {
    const a = jsonStep({ updated_at: '2024-01-01' });
    const b = jsonStep({ updated_at: '2024-01-02' });
    expect((await compare(a, b, rulesFor(doc, 'getItem'))).match).toBe(true);
    expect((await compare(a, b, rulesFor(doc, 'createItem'))).mismatches.map((m) => m.jsonPath)).toEqual([
      '$.updated_at',
    ]);
  });
});

describe('Comparator — expressions', () => {
  it('evaluates predefined expressions with $a and $b bound', async () => {
    const evaluator = new InProcessEvaluator();
    const rules = rulesFor({ defaults: { body: { '$.email': { predefined: 'case_insensitive' } } } });
    const comparator = new Comparator(evaluator);
    expect((await comparator.compare(jsonStep({ email: 'A@x.io' }), jsonStep({ email: 'a@X.io' }), rules)).match).toBe(true);
    const differs = await comparator.compare(jsonStep({ email: 'a@x.io' }), jsonStep({ email: 'b@x.io' }), rules);
    expect(differs.mismatches.map((m) => m.rule)).toEqual(['case_insensitive']);
    expect(evaluator.calls).toEqual(['$lowercase($a) = $lowercase($b)', '$lowercase($a) = $lowercase($b)']);
  });

  it('accepts status codes of the same class through an expression', async () => {
    const rules = rulesFor({ defaults: { status_code: { predefined: 'same_status_class' } } });
    const result = await new Comparator(new InProcessEvaluator()).compare(jsonStep(null, 200), jsonStep(null, 201), rules);
    expect(result.match).toBe(true);
  });

  it('reports the evaluation error text as the rule', async () => {
    const failing: ExpressionEvaluator = {
      evaluate: async (expression) =>
        err(new EvaluationError({ message: 'evaluation timeout exceeded', context: { expression } })),
      close: async () => {},
    };
    const rules = rulesFor({ defaults: { body: { '$.n': { expr: '$a = $b' } } } });
    const result = await new Comparator(failing).compare(jsonStep({ n: 1 }), jsonStep({ n: 1 }), rules);
    expect(result.mismatches).toEqual([
      { kind: 'body', path: '/n', jsonPath: '$.n', pattern: '$.n', rule: 'evaluation timeout exceeded', targetA: 1, targetB: 1 },
    ]);
  });

  it('reports a missing evaluator instead of throwing', async () => {
    const rules = rulesFor({ defaults: { body: { '$.n': { expr: '$a = $b' } } } });
    const result = await compare(jsonStep({ n: 1 }), jsonStep({ n: 1 }), rules);
    expect(result.mismatches.map((m) => m.rule)).toEqual(['no expression evaluator configured']);
  });

  it('surfaces a malformed expression as a mismatch', async () => {
    const rules = rulesFor({ defaults: { body: { '$.n': { expr: '$a = = $b' } } } });
    const result = await new Comparator(new InProcessEvaluator()).compare(jsonStep({ n: 1 }), jsonStep({ n: 1 }), rules);
    expect(result.mismatches).toHaveLength(1);
    expect(result.mismatches[0]?.rule).not.toBe('custom');
  });
});

describe('nativeEqual', () => {
  it('covers every strategy', () => {
    expect(nativeEqual('ignore', 1, 2)).toBe(true);
    expect(nativeEqual('exact', { a: [1] }, { a: [1] })).toBe(true);
    expect(nativeEqual('numeric-tolerance', 10, 10.4, 0.5)).toBe(true);
    expect(nativeEqual('numeric-tolerance', 'a', 'a', 0.5)).toBe(true);
    expect(nativeEqual('unordered-set', [{ a: 1 }, { b: 2 }], [{ b: 2 }, { a: 1 }])).toBe(true);
    expect(nativeEqual('unordered-set', [1, 2], [1, 3])).toBe(false);
  });
});
