/**
 * Predefined comparison library (comparison-library.json).
 */

import rawLibrary from './comparison-library.json' with { type: 'json' };

import { isRecord } from '../types/json.js';
import { ok, err, type Result } from '../types/result.js';

export type NativeStrategy = 'exact' | 'numeric-tolerance' | 'unordered-set' | 'ignore';

export const NATIVE_STRATEGIES: readonly NativeStrategy[] = [
  'exact',
  'numeric-tolerance',
  'unordered-set',
  'ignore',
];

export type ParamValue = string | number | boolean;

export type ParamType = 'number' | 'integer' | 'string' | 'boolean';

const PARAM_TYPES: readonly ParamType[] = ['number', 'integer', 'string', 'boolean'];

export interface ParamSpec {
  name: string;
  type: ParamType;
}

export type LibraryEntry =
  | { name: string; description: string; params: ParamSpec[]; kind: 'native'; strategy: NativeStrategy }
  | { name: string; description: string; params: ParamSpec[]; kind: 'expr'; template: string };

export interface ComparisonLibrary {
  version: string;
  entries: ReadonlyMap<string, LibraryEntry>;
}

export function isNativeStrategy(value: unknown): value is NativeStrategy {
  return NATIVE_STRATEGIES.some((s) => s === value);
}

export function readLibrary(raw: unknown): Result<ComparisonLibrary, string> {
  if (!isRecord(raw) || !isRecord(raw.predefined)) return err('library must have a "predefined" object');
  const entries = new Map<string, LibraryEntry>();
  for (const [name, value] of Object.entries(raw.predefined)) {
    if (!isRecord(value)) return err(`entry ${name} is not an object`);
    const params: ParamSpec[] = [];
    const rawParams = value.params ?? {};
    if (!isRecord(rawParams)) return err(`entry ${name} params must be an object`);
    for (const [param, type] of Object.entries(rawParams)) {
      const known = PARAM_TYPES.find((t) => t === type);
      if (!known) return err(`entry ${name} param ${param} has unknown type ${String(type)}`);
      params.push({ name: param, type: known });
    }
    const description = typeof value.description === 'string' ? value.description : '';
    if (isNativeStrategy(value.strategy)) {
      entries.set(name, { name, description, params, kind: 'native', strategy: value.strategy });
    } else if (typeof value.expr === 'string') {
      entries.set(name, { name, description, params, kind: 'expr', template: value.expr });
    } else {
      return err(`entry ${name} has neither a known strategy nor an expr`);
    }
  }
  return ok({
    version: typeof raw.library_version === 'string' ? raw.library_version : '0',
    entries,
  });
}

let cached: ComparisonLibrary | undefined;

export function getComparisonLibrary(): ComparisonLibrary {
  if (!cached) {
    const parsed = readLibrary(rawLibrary);
    if (parsed.isErr()) throw new Error(`comparison-library.json: ${parsed.error}`);
    cached = parsed.value;
  }
  return cached;
}

/** JSONata literal for a parameter; strings escape backslash and double quote. */
export function toExpressionLiteral(value: ParamValue): string {
  if (typeof value === 'string') {
    return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
  }
  return String(value);
}

function hasType(value: ParamValue, type: ParamType): boolean {
  if (type === 'integer') return Number.isInteger(value);
  return typeof value === type;
}

/** Every declared param must be supplied with its declared type. */
export function checkParams(
  entry: LibraryEntry,
  params: Readonly<Record<string, ParamValue>>
): Result<void, string> {
  for (const { name, type } of entry.params) {
    const value = params[name];
    if (value === undefined) {
      return err(`predefined '${entry.name}' requires parameter '${name}'`);
    }
    if (!hasType(value, type)) {
      const article = type === 'integer' ? 'an' : 'a';
      return err(
        `predefined '${entry.name}' parameter '${name}' must be ${article} ${type}, got ${JSON.stringify(value)}`
      );
    }
  }
  return ok(undefined);
}

/** Substitute `{{param}}` placeholders after checking them. */
export function expandTemplate(
  entry: Extract<LibraryEntry, { kind: 'expr' }>,
  params: Readonly<Record<string, ParamValue>>
): Result<string, string> {
  const checked = checkParams(entry, params);
  if (checked.isErr()) return err(checked.error);
  let expression = entry.template;
  for (const { name } of entry.params) {
    const value = params[name];
    if (value === undefined) continue;
    expression = expression.split(`{{${name}}}`).join(toExpressionLiteral(value));
  }
  return ok(expression);
}
