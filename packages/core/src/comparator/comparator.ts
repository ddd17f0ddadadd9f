/* eslint-disable complexity */
/* eslint-disable max-lines-per-function */
/**
 * Step comparison: transport outcome, status code, configured headers, body.
 *
 * Body paths are walked over the union of both sides' keys. Each node takes
 * the most specific rule matching itself or an ancestor (longest pattern,
 * then most literal segments); without one it is compared exactly. Exact
 * comparison of two objects (or two same-length arrays) descends so that
 * mismatches name the innermost differing path. Any other strategy applies
 * to the node as a whole unless a deeper pattern forces the walk down.
 */

import type { JsonObject, JsonValue } from '../types/json.js';
import type { ComparisonResult, Mismatch, MismatchKind, StepResult } from '../types/model.js';
import { canonicalJson, structurallyEqual } from '../util/canonical-json.js';
import {
  compareSpecificity,
  couldMatchBelow,
  formatPath,
  literalCount,
  matchesPath,
  toClassPattern,
  toPointer,
  type PathSegment,
  type PatternSegment,
} from '../util/json-path.js';
import type { ExpressionEvaluator } from '../evaluator/bridge.js';
import { EXACT_RULE, type BodyRule, type EffectiveRules, type FieldRule } from './rules.js';

interface Location {
  kind: MismatchKind;
  path: string;
  jsonPath: string;
  pattern: string;
}

const STATUS_LOCATION: Location = {
  kind: 'status_code',
  path: '',
  jsonPath: 'status_code',
  pattern: 'status_code',
};

function headerLocation(name: string): Location {
  return { kind: 'header', path: name, jsonPath: `header.${name}`, pattern: `header.${name}` };
}

function bodyLocation(segments: readonly PathSegment[]): Location {
  return {
    kind: 'body',
    path: toPointer(segments),
    jsonPath: formatPath(segments),
    pattern: toClassPattern(segments),
  };
}

function mismatch(loc: Location, rule: string, a: JsonValue | undefined, b: JsonValue | undefined): Mismatch {
  const out: Mismatch = { ...loc, rule };
  if (a !== undefined) out.targetA = a;
  if (b !== undefined) out.targetB = b;
  return out;
}

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Read a concrete (wildcard-free) pattern from a value. */
function valueAt(value: JsonValue | undefined, segments: readonly PatternSegment[]): JsonValue | undefined {
  let node = value;
  for (const seg of segments) {
    if (seg.kind === 'index' && Array.isArray(node)) node = node[seg.index];
    else if (seg.kind === 'key' && isObject(node)) node = Object.hasOwn(node, seg.key) ? node[seg.key] : undefined;
    else return undefined;
  }
  return node;
}

function toPathSegments(segments: readonly PatternSegment[]): PathSegment[] {
  return segments.filter((seg): seg is PathSegment => seg.kind !== 'wildcard');
}

export class Comparator {
  constructor(private readonly evaluator?: ExpressionEvaluator) {}

  async compare(a: StepResult, b: StepResult, rules: EffectiveRules): Promise<ComparisonResult> {
    // Transport outcome
    if (a.error && b.error) {
      return {
        match: false,
        mismatches: [],
        executionError: `target A: ${a.error.message}; target B: ${b.error.message}`,
      };
    }
    if (a.error || b.error) {
      const kind = a.error?.kind ?? b.error?.kind ?? 'transport';
      return {
        match: false,
        mismatches: [
          mismatch(STATUS_LOCATION, `transport:${kind}`, a.statusCode ?? a.error?.message, b.statusCode ?? b.error?.message),
        ],
      };
    }

    // Status code
    const statusA = a.statusCode ?? 0;
    const statusB = b.statusCode ?? 0;
    const status = await this.applyRule(statusA, statusB, rules.statusCode ?? EXACT_RULE, STATUS_LOCATION);
    if (status) return { match: false, mismatches: [status] };
    if (statusA >= 400 && statusB >= 400) return { match: true, mismatches: [] };

    const mismatches: Mismatch[] = [];

    // Headers named by the rules, first value only
    for (const [name, rule] of rules.headers) {
      const found = await this.applyRule(a.headers[name]?.[0], b.headers[name]?.[0], rule, headerLocation(name));
      if (found) mismatches.push(found);
    }

    // Body
    if (a.bodyKind === 'binary' && b.bodyKind === 'binary') {
      const found = await this.applyRule(a.bodyBase64, b.bodyBase64, rules.binary ?? EXACT_RULE, bodyLocation([]));
      if (found) mismatches.push(found);
    } else {
      const bodyA = a.bodyKind === 'binary' ? a.bodyBase64 : a.body;
      const bodyB = b.bodyKind === 'binary' ? b.bodyBase64 : b.body;
      await this.walk(bodyA, bodyB, [], undefined, rules.body, mismatches);
      this.checkRequiredLiterals(bodyA, bodyB, rules.body, mismatches);
    }

    return { match: mismatches.length === 0, mismatches };
  }

  private async walk(
    a: JsonValue | undefined,
    b: JsonValue | undefined,
    segments: PathSegment[],
    inherited: BodyRule | undefined,
    rules: readonly BodyRule[],
    out: Mismatch[]
  ): Promise<void> {
    const here = rules.filter((r) => matchesPath(r.segments, segments));
    const candidates = inherited ? [...here, inherited] : here;
    const chosen = [...candidates].sort((x, y) => compareSpecificity(x.segments, y.segments))[0];
    // Presence constraints belong to the node a pattern names, not its descendants
    const rule: FieldRule = !chosen
      ? EXACT_RULE
      : here.includes(chosen)
        ? chosen.rule
        : { ...chosen.rule, presence: 'parity' };

    const deeper = rules.some((r) => couldMatchBelow(r.segments, segments));
    const bothObjects = isObject(a) && isObject(b);
    const sameLengthArrays = Array.isArray(a) && Array.isArray(b) && a.length === b.length;
    const exact = rule.comparison.kind === 'native' && rule.comparison.strategy === 'exact';

    if (!(bothObjects || sameLengthArrays) || !(deeper || exact)) {
      const found = await this.applyRule(a, b, rule, bodyLocation(segments));
      if (found) out.push(found);
      return;
    }
    if (rule.presence === 'forbidden') {
      out.push(mismatch(bodyLocation(segments), 'presence:forbidden', a, b));
      return;
    }

    if (Array.isArray(a) && Array.isArray(b)) {
      for (let index = 0; index < a.length; index++) {
        await this.walk(a[index], b[index], [...segments, { kind: 'index', index }], chosen, rules, out);
      }
      return;
    }
    if (isObject(a) && isObject(b)) {
      const keys = [...Object.keys(a), ...Object.keys(b).filter((k) => !Object.hasOwn(a, k))];
      for (const key of keys) {
        await this.walk(
          Object.hasOwn(a, key) ? a[key] : undefined,
          Object.hasOwn(b, key) ? b[key] : undefined,
          [...segments, { kind: 'key', key }],
          chosen,
          rules,
          out
        );
      }
    }
  }

  /** A literal `required` pattern absent on both sides is never visited by the walk. */
  private checkRequiredLiterals(
    a: JsonValue | undefined,
    b: JsonValue | undefined,
    rules: readonly BodyRule[],
    out: Mismatch[]
  ): void {
    for (const bodyRule of rules) {
      if (bodyRule.rule.presence !== 'required') continue;
      if (literalCount(bodyRule.segments) !== bodyRule.segments.length) continue;
      if (valueAt(a, bodyRule.segments) !== undefined || valueAt(b, bodyRule.segments) !== undefined) continue;
      const loc = bodyLocation(toPathSegments(bodyRule.segments));
      if (out.some((m) => m.path === loc.path && m.rule === 'presence:required')) continue;
      out.push(mismatch(loc, 'presence:required', undefined, undefined));
    }
  }

  private async applyRule(
    a: JsonValue | undefined,
    b: JsonValue | undefined,
    rule: FieldRule,
    loc: Location
  ): Promise<Mismatch | undefined> {
    const aPresent = a !== undefined;
    const bPresent = b !== undefined;
    let presenceOk: boolean;
    switch (rule.presence) {
      case 'parity':
        presenceOk = aPresent === bPresent;
        break;
      case 'required':
        presenceOk = aPresent && bPresent;
        break;
      case 'forbidden':
        presenceOk = !aPresent && !bPresent;
        break;
      case 'optional':
        presenceOk = true;
        break;
    }
    if (!presenceOk) return mismatch(loc, `presence:${rule.presence}`, a, b);
    if (a === undefined || b === undefined) return undefined;

    const comparison = rule.comparison;
    switch (comparison.kind) {
      case 'none':
        return undefined;
      case 'native':
        return nativeEqual(comparison.strategy, a, b, comparison.tolerance) ? undefined : mismatch(loc, rule.label, a, b);
      case 'expr': {
        if (!this.evaluator) return mismatch(loc, 'no expression evaluator configured', a, b);
        const result = await this.evaluator.evaluate(comparison.expression, { a, b });
        if (result.isErr()) return mismatch(loc, result.error.message, a, b);
        return result.value === true ? undefined : mismatch(loc, rule.label, a, b);
      }
    }
  }
}

/**
 * `unordered-set` compares the sets of distinct elements, so arrays that
 * differ only in how often an element repeats compare equal.
 */
export function nativeEqual(
  strategy: 'exact' | 'numeric-tolerance' | 'unordered-set' | 'ignore',
  a: JsonValue,
  b: JsonValue,
  tolerance = 0
): boolean {
  switch (strategy) {
    case 'ignore':
      return true;
    case 'exact':
      return structurallyEqual(a, b);
    case 'numeric-tolerance':
      if (typeof a === 'number' && typeof b === 'number') return Math.abs(a - b) <= tolerance;
      return structurallyEqual(a, b);
    case 'unordered-set': {
      if (!Array.isArray(a) || !Array.isArray(b)) return structurallyEqual(a, b);
      const left = new Set(a.map((item) => canonicalJson(item)));
      const right = new Set(b.map((item) => canonicalJson(item)));
      return left.size === right.size && [...left].every((item) => right.has(item));
    }
  }
}

export function compare(
  a: StepResult,
  b: StepResult,
  rules: EffectiveRules,
  evaluator?: ExpressionEvaluator
): Promise<ComparisonResult> {
  return new Comparator(evaluator).compare(a, b, rules);
}
