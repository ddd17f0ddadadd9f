import { describe, it, expect } from 'vitest';

import {
  compareSpecificity,
  couldMatchBelow,
  formatPath,
  matchesPath,
  parsePattern,
  readPointer,
  toClassPattern,
  toPointer,
  type PathSegment,
  type PatternSegment,
} from '../json-path.js';

function pattern(text: string): PatternSegment[] {
  const parsed = parsePattern(text);
  if (parsed.isErr()) throw new Error(parsed.error);
  return parsed.value;
}

const itemsIdPath: PathSegment[] = [
  { kind: 'key', key: 'items' },
  { kind: 'index', index: 2 },
  { kind: 'key', key: 'id' },
];

describe('parsePattern', () => {
  it('reads dot members, wildcards, indices and quoted members', () => {
    expect(pattern("$.items[*].id['x.y'][0].*")).toEqual([
      { kind: 'key', key: 'items' },
      { kind: 'wildcard' },
      { kind: 'key', key: 'id' },
      { kind: 'key', key: 'x.y' },
      { kind: 'index', index: 0 },
      { kind: 'wildcard' },
    ]);
    expect(pattern('$')).toEqual([]);
  });

  it.each([
    ['items', "path pattern must start with '$': items"],
    ['$.', 'empty member name at offset 1 in $.'],
    ['$[', "unterminated '[' at offset 1 in $["],
    ['$[foo]', 'invalid selector [foo] in $[foo]'],
    ['$x', "unexpected 'x' at offset 1 in $x"],
  ])('rejects %s', (text, message) => {
    const parsed = parsePattern(text);
    expect(parsed.isErr() && parsed.error).toBe(message);
  });
});

describe('path rendering', () => {
  it('formats display paths, quoting awkward keys', () => {
    expect(formatPath(itemsIdPath)).toBe('$.items[2].id');
    expect(formatPath([{ kind: 'key', key: "it's odd" }])).toBe("$['it\\'s odd']");
  });

  it('collapses indices in class patterns', () => {
    expect(toClassPattern(itemsIdPath)).toBe('$.items[*].id');
  });

  it('escapes JSON pointers', () => {
    expect(toPointer([{ kind: 'key', key: 'a/b' }, { kind: 'key', key: 'c~d' }, { kind: 'index', index: 0 }])).toBe(
      '/a~1b/c~0d/0'
    );
  });
});

describe('matching', () => {
  it('matches whole paths only', () => {
    expect(matchesPath(pattern('$.items[*].id'), itemsIdPath)).toBe(true);
    expect(matchesPath(pattern('$.items[1].id'), itemsIdPath)).toBe(false);
    expect(matchesPath(pattern('$.items[*]'), itemsIdPath)).toBe(false);
  });

  it('knows when a pattern could apply further down', () => {
    expect(couldMatchBelow(pattern('$.items[*].id'), itemsIdPath.slice(0, 1))).toBe(true);
    expect(couldMatchBelow(pattern('$.other.id'), itemsIdPath.slice(0, 1))).toBe(false);
    expect(couldMatchBelow(pattern('$.items'), itemsIdPath.slice(0, 1))).toBe(false);
  });

  it('orders longer, then more literal patterns first', () => {
    expect(compareSpecificity(pattern('$.a.b'), pattern('$.a'))).toBeLessThan(0);
    expect(compareSpecificity(pattern('$.a.b'), pattern('$.*.b'))).toBeLessThan(0);
    expect(compareSpecificity(pattern('$.*'), pattern('$.a'))).toBeGreaterThan(0);
  });
});

describe('readPointer', () => {
  const doc = { a: [{ 'b/c': 1 }], 'm~n': null };

  it('resolves escaped tokens and array indices', () => {
    expect(readPointer(doc, '/a/0/b~1c')).toBe(1);
    expect(readPointer(doc, '/m~0n')).toBeNull();
    expect(readPointer(doc, '')).toEqual(doc);
  });

  it('returns undefined for anything missing', () => {
    expect(readPointer(doc, '/a/01')).toBeUndefined();
    expect(readPointer(doc, '/a/5')).toBeUndefined();
    expect(readPointer(doc, '/missing')).toBeUndefined();
    expect(readPointer(doc, 'a')).toBeUndefined();
    expect(readPointer(doc, '/m~0n/deeper')).toBeUndefined();
  });
});
