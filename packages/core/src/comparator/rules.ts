/* eslint-disable complexity */
/**
 * Comparison rules: loading, validation and the two-level lookup.
 *
 * A rules document has a `defaults` scope and per-operation scopes. For one
 * operation the effective rules are the operation scope's entries, plus every
 * default entry whose key (status code, header name, body pattern) the
 * operation scope does not mention. Entries are replaced whole, never merged.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import rulesSchema from '../schemas/rules.schema.json' with { type: 'json' };

import { createDocumentValidator } from '../ajv/factory.js';
import { ErrorCode } from '../errors/codes.js';
import { ConfigError, describeError } from '../types/errors.js';
import { isRecord } from '../types/json.js';
import { parsePattern, type PatternSegment } from '../util/json-path.js';
import { silentLogger, type Logger } from '../util/logger.js';
import {
  checkParams,
  expandTemplate,
  getComparisonLibrary,
  isNativeStrategy,
  type ComparisonLibrary,
  type NativeStrategy,
  type ParamValue,
} from './library.js';

export type PresenceMode = 'parity' | 'required' | 'forbidden' | 'optional';

export type Comparison =
  | { kind: 'native'; strategy: NativeStrategy; tolerance?: number }
  | { kind: 'expr'; expression: string }
  /** presence check only */
  | { kind: 'none' };

export interface FieldRule {
  presence: PresenceMode;
  comparison: Comparison;
  /** Reported as a mismatch's `rule`: strategy or predefined name, or `custom` */
  label: string;
}

export interface BodyRule {
  pattern: string;
  segments: PatternSegment[];
  rule: FieldRule;
}

export interface RuleScope {
  statusCode?: FieldRule;
  headers: ReadonlyMap<string, FieldRule>;
  body: ReadonlyMap<string, BodyRule>;
  binary?: FieldRule;
}

export interface RuleSet {
  defaults: RuleScope;
  operations: ReadonlyMap<string, RuleScope>;
  source?: string;
}

export interface EffectiveRules {
  statusCode?: FieldRule;
  /** lowercase header name -> rule */
  headers: ReadonlyMap<string, FieldRule>;
  body: readonly BodyRule[];
  binary?: FieldRule;
}

export const EXACT_RULE: FieldRule = {
  presence: 'parity',
  comparison: { kind: 'native', strategy: 'exact' },
  label: 'exact',
};

const emptyScope = (): RuleScope => ({ headers: new Map(), body: new Map() });

export function emptyRuleSet(): RuleSet {
  return { defaults: emptyScope(), operations: new Map() };
}

const validateRulesDocument = createDocumentValidator(rulesSchema);

function paramsOf(raw: unknown): Record<string, ParamValue> {
  const out: Record<string, ParamValue> = {};
  if (!isRecord(raw)) return out;
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') out[key] = value;
  }
  return out;
}

function presenceOf(raw: unknown): PresenceMode {
  switch (raw) {
    case 'required':
    case 'forbidden':
    case 'optional':
      return raw;
    default:
      return 'parity';
  }
}

function parseFieldRule(raw: unknown, where: string, library: ComparisonLibrary): FieldRule {
  const fail = (message: string): ConfigError =>
    new ConfigError({
      message: `${where}: ${message}`,
      errorCode: ErrorCode.RULES_INVALID,
      context: { setting: where },
    });
  if (!isRecord(raw)) throw fail('rule must be an object');
  const presence = presenceOf(raw.presence);
  const hasComparison = raw.strategy !== undefined || raw.expr !== undefined || raw.predefined !== undefined;
  if (presence === 'forbidden' && hasComparison) {
    throw fail('a forbidden field has no value to compare; drop strategy/expr/predefined');
  }

  if (typeof raw.expr === 'string') {
    return { presence, comparison: { kind: 'expr', expression: raw.expr }, label: 'custom' };
  }

  if (typeof raw.predefined === 'string') {
    const entry = library.entries.get(raw.predefined);
    if (!entry) {
      const known = [...library.entries.keys()].join(', ');
      throw fail(`unknown predefined comparison '${raw.predefined}' (known: ${known})`);
    }
    const params = paramsOf(raw.params);
    const checked = checkParams(entry, params);
    if (checked.isErr()) throw fail(checked.error);
    if (entry.kind === 'native') {
      if (entry.strategy === 'numeric-tolerance') {
        const tolerance = params.tolerance;
        if (typeof tolerance !== 'number') throw fail(`predefined '${entry.name}' requires parameter 'tolerance'`);
        return { presence, comparison: { kind: 'native', strategy: entry.strategy, tolerance }, label: entry.name };
      }
      return { presence, comparison: { kind: 'native', strategy: entry.strategy }, label: entry.name };
    }
    const expanded = expandTemplate(entry, params);
    if (expanded.isErr()) throw fail(expanded.error);
    return { presence, comparison: { kind: 'expr', expression: expanded.value }, label: entry.name };
  }

  if (isNativeStrategy(raw.strategy)) {
    if (raw.strategy === 'numeric-tolerance') {
      if (typeof raw.tolerance !== 'number') throw fail("strategy 'numeric-tolerance' requires 'tolerance'");
      return {
        presence,
        comparison: { kind: 'native', strategy: raw.strategy, tolerance: raw.tolerance },
        label: raw.strategy,
      };
    }
    return { presence, comparison: { kind: 'native', strategy: raw.strategy }, label: raw.strategy };
  }

  // Presence-only entry
  if (presence === 'parity') return { ...EXACT_RULE };
  return { presence, comparison: { kind: 'none' }, label: `presence:${presence}` };
}

function parseScope(raw: unknown, where: string, library: ComparisonLibrary): RuleScope {
  if (raw === undefined) return emptyScope();
  if (!isRecord(raw)) {
    throw new ConfigError({ message: `${where} must be an object`, errorCode: ErrorCode.RULES_INVALID });
  }
  const headers = new Map<string, FieldRule>();
  if (isRecord(raw.headers)) {
    for (const [name, rule] of Object.entries(raw.headers)) {
      headers.set(name.toLowerCase(), parseFieldRule(rule, `${where}.headers.${name}`, library));
    }
  }
  const body = new Map<string, BodyRule>();
  if (isRecord(raw.body)) {
    for (const [pattern, rule] of Object.entries(raw.body)) {
      const segments = parsePattern(pattern);
      if (segments.isErr()) {
        throw new ConfigError({
          message: `${where}.body: ${segments.error}`,
          errorCode: ErrorCode.RULES_INVALID,
          context: { path: pattern },
        });
      }
      body.set(pattern, { pattern, segments: segments.value, rule: parseFieldRule(rule, `${where}.body['${pattern}']`, library) });
    }
  }
  const scope: RuleScope = { headers, body };
  if (raw.status_code !== undefined) scope.statusCode = parseFieldRule(raw.status_code, `${where}.status_code`, library);
  if (raw.binary !== undefined) scope.binary = parseFieldRule(raw.binary, `${where}.binary`, library);
  return scope;
}

/**
 * Validate and compile a parsed rules document.
 */
export function parseRules(
  doc: unknown,
  source?: string,
  library: ComparisonLibrary = getComparisonLibrary()
): RuleSet {
  if (doc === null || doc === undefined) return { ...emptyRuleSet(), source };
  const problems = validateRulesDocument(doc);
  if (problems.length > 0 || !isRecord(doc)) {
    throw new ConfigError({
      message: `Invalid comparison rules${source ? ` in ${source}` : ''}: ${problems.join('; ')}`,
      errorCode: ErrorCode.RULES_INVALID,
      context: { file: source },
    });
  }
  const operations = new Map<string, RuleScope>();
  if (isRecord(doc.operations)) {
    for (const [operationId, scope] of Object.entries(doc.operations)) {
      operations.set(operationId, parseScope(scope, `operations.${operationId}`, library));
    }
  }
  return { defaults: parseScope(doc.defaults, 'defaults', library), operations, source };
}

export async function loadRules(file: string): Promise<RuleSet> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot read comparison rules: ${describeError(error)}`,
      errorCode: ErrorCode.RULES_INVALID,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }
  let doc: unknown;
  try {
    doc = path.extname(file).toLowerCase() === '.json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new ConfigError({
      message: `Comparison rules are neither valid JSON nor YAML: ${describeError(error)}`,
      errorCode: ErrorCode.RULES_INVALID,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseRules(doc, file);
}

/** Operation scopes naming operations the OpenAPI document does not define. */
export function unknownOperationScopes(rules: RuleSet, known: Iterable<string>): string[] {
  const ids = new Set(known);
  return [...rules.operations.keys()].filter((id) => !ids.has(id));
}

export function warnUnknownOperations(rules: RuleSet, known: Iterable<string>, logger: Logger = silentLogger): void {
  for (const id of unknownOperationScopes(rules, known)) {
    logger.warn(`comparison rules mention unknown operationId '${id}'`, { file: rules.source });
  }
}

/**
 * Two-level lookup: operation scope first, defaults for every key it leaves out.
 */
export function effectiveRules(rules: RuleSet, operationId: string): EffectiveRules {
  const scoped = rules.operations.get(operationId);
  const defaults = rules.defaults;
  if (!scoped) {
    return {
      statusCode: defaults.statusCode,
      headers: defaults.headers,
      body: [...defaults.body.values()],
      binary: defaults.binary,
    };
  }
  const headers = new Map(defaults.headers);
  for (const [name, rule] of scoped.headers) headers.set(name, rule);
  const body = new Map(defaults.body);
  for (const [pattern, rule] of scoped.body) body.set(pattern, rule);
  return {
    statusCode: scoped.statusCode ?? defaults.statusCode,
    headers,
    body: [...body.values()],
    binary: scoped.binary ?? defaults.binary,
  };
}
