/**
 * Minimal JSONPath dialect used by comparison rules and redaction.
 *
 * Grammar: `$` followed by any of `.name`, `['any name']`, `[3]`, `[*]`, `.*`.
 * Patterns match concrete paths of the same length, segment by segment.
 */

import type { JsonValue } from '../types/json.js';
import { ok, err, type Result } from '../types/result.js';

export type PathSegment =
  | { kind: 'key'; key: string }
  | { kind: 'index'; index: number };

export type PatternSegment = PathSegment | { kind: 'wildcard' };

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$-]*$/;
const DOT_NAME = /^[^.[\]\s]+/;

export function parsePattern(pattern: string): Result<PatternSegment[], string> {
  if (!pattern.startsWith('$')) {
    return err(`path pattern must start with '$': ${pattern}`);
  }
  const segments: PatternSegment[] = [];
  let i = 1;
  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '.') {
      const rest = pattern.slice(i + 1);
      if (rest.startsWith('*')) {
        segments.push({ kind: 'wildcard' });
        i += 2;
        continue;
      }
      const m = DOT_NAME.exec(rest);
      if (!m) return err(`empty member name at offset ${i} in ${pattern}`);
      segments.push({ kind: 'key', key: m[0] });
      i += 1 + m[0].length;
      continue;
    }
    if (ch === '[') {
      const close = findBracketEnd(pattern, i);
      if (close < 0) return err(`unterminated '[' at offset ${i} in ${pattern}`);
      const inner = pattern.slice(i + 1, close).trim();
      const seg = parseBracket(inner);
      if (!seg) return err(`invalid selector [${inner}] in ${pattern}`);
      segments.push(seg);
      i = close + 1;
      continue;
    }
    return err(`unexpected '${ch}' at offset ${i} in ${pattern}`);
  }
  return ok(segments);
}

function findBracketEnd(text: string, open: number): number {
  let quote: string | undefined;
  for (let j = open + 1; j < text.length; j++) {
    const c = text[j];
    if (quote) {
      if (c === '\\') {
        j++;
      } else if (c === quote) {
        quote = undefined;
      }
      continue;
    }
    if (c === "'" || c === '"') quote = c;
    else if (c === ']') return j;
  }
  return -1;
}

function parseBracket(inner: string): PatternSegment | undefined {
  if (inner === '*') return { kind: 'wildcard' };
  if (/^\d+$/.test(inner)) return { kind: 'index', index: Number(inner) };
  const q = inner[0];
  if ((q === "'" || q === '"') && inner.length >= 2 && inner.endsWith(q)) {
    const body = inner.slice(1, -1).replace(/\\(.)/g, '$1');
    return { kind: 'key', key: body };
  }
  return undefined;
}

export function formatPath(segments: readonly PatternSegment[]): string {
  let out = '$';
  for (const seg of segments) {
    if (seg.kind === 'wildcard') out += '[*]';
    else if (seg.kind === 'index') out += `[${seg.index}]`;
    else if (IDENTIFIER.test(seg.key)) out += `.${seg.key}`;
    else out += `['${seg.key.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}']`;
  }
  return out;
}

/** RFC 6901 pointer for a concrete path */
export function toPointer(segments: readonly PathSegment[]): string {
  return segments
    .map((seg) =>
      seg.kind === 'index'
        ? `/${seg.index}`
        : `/${seg.key.replace(/~/g, '~0').replace(/\//g, '~1')}`
    )
    .join('');
}

/** Indices collapse to `[*]`: the same field in another array slot is the same failure. */
export function toClassPattern(segments: readonly PathSegment[]): string {
  return formatPath(
    segments.map((seg): PatternSegment =>
      seg.kind === 'index' ? { kind: 'wildcard' } : seg
    )
  );
}

function segmentMatches(pattern: PatternSegment, seg: PathSegment): boolean {
  if (pattern.kind === 'wildcard') return true;
  if (pattern.kind === 'index') return seg.kind === 'index' && seg.index === pattern.index;
  return seg.kind === 'key' && seg.key === pattern.key;
}

export function matchesPath(
  pattern: readonly PatternSegment[],
  path: readonly PathSegment[]
): boolean {
  if (pattern.length !== path.length) return false;
  return pattern.every((p, idx) => {
    const seg = path[idx];
    return seg !== undefined && segmentMatches(p, seg);
  });
}

/**
 * True when some path extending `prefix` could match `pattern`.
 */
export function couldMatchBelow(
  pattern: readonly PatternSegment[],
  prefix: readonly PathSegment[]
): boolean {
  if (pattern.length <= prefix.length) return false;
  return prefix.every((seg, idx) => {
    const p = pattern[idx];
    return p !== undefined && segmentMatches(p, seg);
  });
}

export function literalCount(pattern: readonly PatternSegment[]): number {
  return pattern.filter((seg) => seg.kind !== 'wildcard').length;
}

/** Negative when `a` is more specific than `b`: longer first, then more literal. */
export function compareSpecificity(
  a: readonly PatternSegment[],
  b: readonly PatternSegment[]
): number {
  if (a.length !== b.length) return b.length - a.length;
  return literalCount(b) - literalCount(a);
}

/**
 * Read the value at an RFC 6901 pointer; `''` is the whole document.
 * Returns undefined when any token is missing.
 */
export function readPointer(document: JsonValue | undefined, pointer: string): JsonValue | undefined {
  if (pointer === '') return document;
  if (!pointer.startsWith('/')) return undefined;
  let node: JsonValue | undefined = document;
  for (const raw of pointer.slice(1).split('/')) {
    const token = raw.replace(/~1/g, '/').replace(/~0/g, '~');
    if (Array.isArray(node)) {
      node = /^(0|[1-9]\d*)$/.test(token) ? node[Number(token)] : undefined;
    } else if (node !== null && typeof node === 'object') {
      node = Object.hasOwn(node, token) ? node[token] : undefined;
    } else {
      return undefined;
    }
    if (node === undefined) return undefined;
  }
  return node;
}
