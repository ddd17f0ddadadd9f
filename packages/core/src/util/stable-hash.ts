import { createHash } from 'node:crypto';
import { canonicalizeForHash } from './canonical-json.js';
import type { JsonValue } from '../types/json.js';

export interface StableHashResult {
  digest: string;
  bytes: number;
  canonical: string;
}

export function stableHash(value: JsonValue): StableHashResult {
  const canonical = canonicalizeForHash(value);
  const digest = createHash('sha256').update(canonical.buffer).digest('hex');
  return { digest, bytes: canonical.byteLength, canonical: canonical.text };
}

/** Short identifier derived from the value's canonical form. */
export function shortHash(value: JsonValue, length = 12): string {
  return stableHash(value).digest.slice(0, length);
}
