import { isRecord } from '../types/json.js';
import type { JsonSchema } from '../types/model.js';

export function num(schema: JsonSchema, key: string): number | undefined {
  const v = schema[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

export function str(schema: JsonSchema, key: string): string | undefined {
  const v = schema[key];
  return typeof v === 'string' ? v : undefined;
}

export function list(schema: JsonSchema, key: string): unknown[] | undefined {
  const v = schema[key];
  return Array.isArray(v) ? v : undefined;
}

export function record(schema: JsonSchema, key: string): JsonSchema | undefined {
  const v = schema[key];
  return isRecord(v) ? v : undefined;
}

export function requiredNames(schema: JsonSchema): Set<string> {
  return new Set((list(schema, 'required') ?? []).filter((r): r is string => typeof r === 'string'));
}

/** Declared types as a list; `nullable: true` (OpenAPI 3.0) adds 'null'. */
export function declaredTypes(schema: JsonSchema): string[] {
  const raw = schema.type;
  const types =
    typeof raw === 'string'
      ? [raw]
      : Array.isArray(raw)
        ? raw.filter((t): t is string => typeof t === 'string')
        : [];
  if (schema.nullable === true && !types.includes('null')) types.push('null');
  return types;
}

export function inferType(schema: JsonSchema): string {
  if (isRecord(schema.properties) || isRecord(schema.additionalProperties)) return 'object';
  if (schema.items !== undefined) return 'array';
  if (num(schema, 'minimum') !== undefined || num(schema, 'maximum') !== undefined) return 'number';
  return 'string';
}

/**
 * Resolve a schema node's `$ref` (keeping sibling keywords, which 3.1 allows).
 * Loaded documents are already dereferenced, so only the local refs of
 * circular schemas reach this.
 */
export function resolveSchema(
  root: Record<string, unknown>,
  schema: JsonSchema
): JsonSchema | undefined {
  if (typeof schema.$ref !== 'string') return schema;
  const target = getByPointer(root, schema.$ref);
  if (!isRecord(target)) return undefined;
  const { $ref: _ref, ...siblings } = schema;
  return Object.keys(siblings).length > 0 ? { ...target, ...siblings } : target;
}

/**
 * Shallow allOf merge: properties union, required union, last keyword wins.
 */
export function mergeAllOf(
  root: Record<string, unknown>,
  schema: JsonSchema
): JsonSchema {
  const parts = list(schema, 'allOf');
  if (!parts) return schema;
  const { allOf: _allOf, ...base } = schema;
  let merged: JsonSchema = { ...base };
  const properties: Record<string, unknown> = { ...(record(schema, 'properties') ?? {}) };
  const required = new Set(requiredNames(schema));
  for (const part of parts) {
    if (!isRecord(part)) continue;
    const resolved = resolveSchema(root, part);
    if (!resolved) continue;
    const flat = mergeAllOf(root, resolved);
    Object.assign(properties, record(flat, 'properties') ?? {});
    for (const r of requiredNames(flat)) required.add(r);
    merged = { ...flat, ...merged };
  }
  if (Object.keys(properties).length > 0) merged.properties = properties;
  if (required.size > 0) merged.required = [...required];
  return merged;
}

const MAX_REF_HOPS = 32;

function getByPointer(root: Record<string, unknown>, ref: string): unknown {
  let current: unknown = root;
  let pointer = ref;
  for (let hops = 0; hops < MAX_REF_HOPS; hops++) {
    if (!pointer.startsWith('#')) return undefined;
    current = root;
    const tokens = pointer.length > 1 ? pointer.slice(2).split('/') : [];
    for (const raw of tokens) {
      const token = decodeURIComponent(raw).replace(/~1/g, '/').replace(/~0/g, '~');
      if (Array.isArray(current)) current = /^\d+$/.test(token) ? current[Number(token)] : undefined;
      else if (isRecord(current)) current = current[token];
      else return undefined;
    }
    if (!isRecord(current) || typeof current.$ref !== 'string') return current;
    pointer = current.$ref;
  }
  return undefined;
}
