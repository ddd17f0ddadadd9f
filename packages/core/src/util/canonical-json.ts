import { Buffer } from 'node:buffer';
import type { JsonValue } from '../types/json.js';

export interface CanonicalJSONResult {
  text: string;
  buffer: Buffer;
  byteLength: number;
}

function normalizeNumber(value: number): number {
  if (Object.is(value, -0)) return 0;
  return value;
}

/**
 * Sorted-key JSON text. Object key order never matters, array order does.
 * `undefined` members are dropped the way JSON.stringify drops them.
 */
export function canonicalJson(value: JsonValue | undefined): string {
  if (value === undefined || value === null) return 'null';
  if (typeof value === 'number') {
    return Number.isFinite(value) ? JSON.stringify(normalizeNumber(value)) : 'null';
  }
  if (typeof value === 'string') return JSON.stringify(value);
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }
  const entries = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${canonicalJson(value[key])}`);
  return `{${entries.join(',')}}`;
}

export function canonicalizeForHash(value: JsonValue | undefined): CanonicalJSONResult {
  const text = canonicalJson(value);
  const buffer = Buffer.from(text, 'utf8');
  return {
    text,
    buffer,
    byteLength: buffer.byteLength,
  };
}

/** Structural equality after normalizing object key order. */
export function structurallyEqual(
  a: JsonValue | undefined,
  b: JsonValue | undefined
): boolean {
  if (a === b) return true;
  return canonicalJson(a) === canonicalJson(b);
}
