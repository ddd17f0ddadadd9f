import type { JsonObject, JsonValue } from '../types/json.js';
import type { ComparisonResult, Mismatch, RequestCase, StepResult } from '../types/model.js';
import { ConfigError } from '../types/errors.js';
import { matchesPath, parsePattern, type PathSegment, type PatternSegment } from '../util/json-path.js';

export const REDACTED = '[REDACTED]';

/**
 * Replaces configured fields in stored requests and responses.
 *
 * Patterns apply to request and response bodies. A single-member pattern
 * (`$.authorization`) also covers the header, query parameter and cookie of
 * that name, compared case-insensitively for headers. Mismatch records carry
 * the compared values too, so they go through the same patterns.
 */
export class Redactor {
  private readonly patterns: PatternSegment[][];
  private readonly names: Set<string>;

  constructor(fields: readonly string[] = []) {
    this.patterns = fields.map((field) => {
      const parsed = parsePattern(field);
      if (parsed.isErr()) {
        throw new ConfigError({
          message: `secrets.redact_fields: ${parsed.error}`,
          context: { setting: 'secrets.redact_fields', path: field },
        });
      }
      return parsed.value;
    });
    this.names = new Set();
    for (const pattern of this.patterns) {
      const [only] = pattern;
      if (pattern.length === 1 && only?.kind === 'key') this.names.add(only.key.toLowerCase());
    }
  }

  get enabled(): boolean {
    return this.patterns.length > 0;
  }

  value(value: JsonValue | undefined): JsonValue | undefined {
    if (!this.enabled || value === undefined) return value;
    return this.walk(value, []);
  }

  request(request: RequestCase): RequestCase {
    if (!this.enabled) return request;
    const out: RequestCase = {
      ...request,
      query: this.named(request.query),
      headers: this.named(request.headers),
      cookies: Object.fromEntries(
        Object.entries(request.cookies).map(([name, v]) => [name, this.hit(name) ? REDACTED : v])
      ),
    };
    if (request.body !== undefined) out.body = this.value(request.body);
    if (request.rawParameters) out.rawParameters = this.raw(request.rawParameters);
    return out;
  }

  response(result: StepResult): StepResult {
    if (!this.enabled) return result;
    const out: StepResult = { ...result, headers: this.named(result.headers) };
    if (result.body !== undefined) out.body = this.value(result.body);
    return out;
  }

  comparison(comparison: ComparisonResult): ComparisonResult {
    if (!this.enabled) return comparison;
    return { ...comparison, mismatches: comparison.mismatches.map((m) => this.mismatch(m)) };
  }

  mismatch(mismatch: Mismatch): Mismatch {
    if (!this.enabled || mismatch.kind === 'status_code') return mismatch;
    let redact: (value: JsonValue) => JsonValue;
    if (mismatch.kind === 'header') {
      const hidden = this.hit(mismatch.path);
      redact = (value) => (hidden ? REDACTED : value);
    } else {
      const at = concretePath(mismatch.jsonPath);
      redact = (value) => (at === undefined || this.coversPrefix(at) ? REDACTED : this.walk(value, at));
    }
    const out: Mismatch = { ...mismatch };
    if (mismatch.targetA !== undefined) out.targetA = redact(mismatch.targetA);
    if (mismatch.targetB !== undefined) out.targetB = redact(mismatch.targetB);
    return out;
  }

  private hit(name: string): boolean {
    return this.names.has(name.toLowerCase());
  }

  private named(values: Record<string, string[]>): Record<string, string[]> {
    return Object.fromEntries(
      Object.entries(values).map(([name, list]) => [name, this.hit(name) ? list.map(() => REDACTED) : list])
    );
  }

  /** Typed parameter values keyed `in.name`. */
  private raw(values: JsonObject): JsonObject {
    const out: JsonObject = {};
    for (const [slot, value] of Object.entries(values)) {
      const dot = slot.indexOf('.');
      const where = slot.slice(0, dot);
      const hidden = dot > 0 && where !== 'path' && this.hit(slot.slice(dot + 1));
      out[slot] = hidden ? REDACTED : value;
    }
    return out;
  }

  private coversPrefix(path: PathSegment[]): boolean {
    for (let length = 0; length <= path.length; length++) {
      const prefix = path.slice(0, length);
      if (this.patterns.some((p) => matchesPath(p, prefix))) return true;
    }
    return false;
  }

  private walk(node: JsonValue, path: PathSegment[]): JsonValue {
    if (this.patterns.some((p) => matchesPath(p, path))) return REDACTED;
    if (Array.isArray(node)) {
      return node.map((item, index) => this.walk(item, [...path, { kind: 'index', index }]));
    }
    if (node !== null && typeof node === 'object') {
      const out: Record<string, JsonValue> = {};
      for (const [key, child] of Object.entries(node)) {
        out[key] = this.walk(child, [...path, { kind: 'key', key }]);
      }
      return out;
    }
    return node;
  }
}

/** Parses a mismatch location such as `$.items[0].id`; undefined when it is not a concrete path. */
function concretePath(jsonPath: string): PathSegment[] | undefined {
  const parsed = parsePattern(jsonPath);
  if (parsed.isErr()) return undefined;
  const segments: PathSegment[] = [];
  for (const segment of parsed.value) {
    if (segment.kind === 'wildcard') return undefined;
    segments.push(segment);
  }
  return segments;
}
