/**
 * OpenAPI runtime expressions for link parameters.
 *
 * Supported sources: `$statusCode`, `$method`, `$response.body[#/ptr]`,
 * `$response.header.Name[i]`, `$request.path.x`, `$request.query.x`,
 * `$request.header.x`, `$request.body[#/ptr]`. A value that is not an
 * expression is a literal; `{$...}` fragments inside a string are
 * substituted in place.
 */

import { ok, err, type Result } from '../types/result.js';
import type { JsonValue } from '../types/json.js';
import type {
  LinkSpec,
  Operation,
  ParameterLocation,
  ParameterSpec,
  RequestCase,
  StepResult,
} from '../types/model.js';
import { readPointer } from '../util/json-path.js';
import { formatParameterValues } from '../generator/case-generator.js';

export interface LinkContext {
  /** Request sent by the source step */
  request: RequestCase;
  /** Response from the source-of-truth target */
  response: StepResult;
}

const HEADER_EXPR = /^\$response\.header\.([^[\]]+)(?:\[(\d+)\])?$/;
const EMBEDDED = /\{(\$[^{}]+)\}/g;

function bodyAt(body: JsonValue | undefined, rest: string): Result<JsonValue, string> {
  if (body === undefined) return err('no body');
  if (rest === '') return ok(body);
  if (!rest.startsWith('#')) return err(`unsupported body selector '${rest}'`);
  const value = readPointer(body, decodeURIComponent(rest.slice(1)));
  return value === undefined ? err(`body has no value at ${rest.slice(1)}`) : ok(value);
}

export function resolveRuntimeExpression(
  expression: string,
  ctx: LinkContext
): Result<JsonValue, string> {
  const expr = expression.trim();
  if (!expr.startsWith('$')) {
    if (!expr.includes('{$')) return ok(expression);
    const failures: string[] = [];
    const text = expression.replace(EMBEDDED, (_m, inner: string) => {
      const part = resolveRuntimeExpression(inner, ctx);
      if (part.isErr()) {
        failures.push(part.error);
        return '';
      }
      return scalarOf(part.value);
    });
    const failure = failures[0];
    return failure === undefined ? ok(text) : err(failure);
  }

  if (expr === '$statusCode') {
    return ctx.response.statusCode === null ? err('no status code') : ok(ctx.response.statusCode);
  }
  if (expr === '$method') return ok(ctx.request.method.toUpperCase());

  if (expr.startsWith('$response.body')) {
    return bodyAt(ctx.response.body, expr.slice('$response.body'.length));
  }
  if (expr.startsWith('$request.body')) {
    return bodyAt(ctx.request.body, expr.slice('$request.body'.length));
  }

  const header = HEADER_EXPR.exec(expr);
  if (header) {
    const name = (header[1] ?? '').toLowerCase();
    const values = ctx.response.headers[name];
    if (!values || values.length === 0) return err(`response has no '${name}' header`);
    const index = header[2] === undefined ? 0 : Number(header[2]);
    const value = values[index];
    return value === undefined ? err(`header '${name}' has no value at index ${index}`) : ok(value);
  }

  const [head, location, ...nameParts] = expr.split('.');
  const name = nameParts.join('.');
  if (head === '$request' && name) {
    switch (location) {
      case 'path': {
        const value = ctx.request.pathParameters[name];
        return value === undefined ? err(`request has no path parameter '${name}'`) : ok(value);
      }
      case 'query': {
        const value = ctx.request.query[name]?.[0];
        return value === undefined ? err(`request has no query parameter '${name}'`) : ok(value);
      }
      case 'header': {
        const value = ctx.request.headers[name.toLowerCase()]?.[0];
        return value === undefined ? err(`request has no '${name}' header`) : ok(value);
      }
    }
  }
  return err(`unsupported runtime expression '${expression}'`);
}

function scalarOf(value: JsonValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

const LOCATIONS: readonly ParameterLocation[] = ['path', 'query', 'header', 'cookie'];

/**
 * `path.item_id` names a parameter exactly; a bare name prefers path, then
 * query, header and cookie.
 */
export function findLinkedParameter(operation: Operation, key: string): ParameterSpec | undefined {
  const dot = key.indexOf('.');
  if (dot > 0) {
    const location = LOCATIONS.find((loc) => loc === key.slice(0, dot));
    if (location) {
      const name = key.slice(dot + 1);
      return operation.parameters.find((p) => p.in === location && p.name === name);
    }
  }
  for (const location of LOCATIONS) {
    const found = operation.parameters.find((p) => p.in === location && p.name === key);
    if (found) return found;
  }
  return undefined;
}

/** `in.name` keys of the target's parameters a link supplies. */
export function linkSuppliedKeys(link: LinkSpec, target: Operation): Set<string> {
  const keys = new Set<string>();
  for (const key of Object.keys(link.parameters)) {
    const param = findLinkedParameter(target, key);
    if (param) keys.add(`${param.in}.${param.name}`);
  }
  return keys;
}

export interface LinkApplication {
  request: RequestCase;
  /** Required parameters whose expression could not be resolved */
  missingRequired: string[];
  missingOptional: string[];
  resolved: Record<string, JsonValue>;
}

/**
 * Fill a planned request's unresolved parameters from the source step.
 * The planned request is not modified.
 */
export function applyLinkParameters(
  target: Operation,
  planned: RequestCase,
  link: LinkSpec,
  ctx: LinkContext
): LinkApplication {
  const request: RequestCase = {
    ...planned,
    pathParameters: { ...planned.pathParameters },
    query: { ...planned.query },
    headers: { ...planned.headers },
    cookies: { ...planned.cookies },
    rawParameters: { ...(planned.rawParameters ?? {}) },
  };
  const missingRequired: string[] = [];
  const missingOptional: string[] = [];
  const resolved: Record<string, JsonValue> = {};
  const pending = new Set((planned.unresolved ?? []).map((u) => `${u.in}.${u.name}`));

  for (const [key, expression] of Object.entries(link.parameters)) {
    const param = findLinkedParameter(target, key);
    if (!param) continue;
    const slot = `${param.in}.${param.name}`;
    pending.delete(slot);
    const result = resolveRuntimeExpression(expression, ctx);
    // Lists (multi-value headers, arrays) contribute their first element
    const value = result.isOk() ? (Array.isArray(result.value) ? result.value[0] : result.value) : undefined;
    if (value === undefined) {
      (param.required ? missingRequired : missingOptional).push(slot);
      continue;
    }
    resolved[slot] = value;
    if (request.rawParameters) request.rawParameters[slot] = value;
    const wire = formatParameterValues(param, value);
    switch (param.in) {
      case 'path':
        // Location-style values ('/abc') carry the separator
        request.pathParameters[param.name] = (wire[0] ?? '').replace(/^\/+/, '');
        break;
      case 'query':
        request.query[param.name] = wire;
        break;
      case 'header':
        request.headers[param.name.toLowerCase()] = wire;
        break;
      case 'cookie':
        request.cookies[param.name] = wire[0] ?? '';
        break;
    }
  }

  const stillUnresolved = (planned.unresolved ?? []).filter((u) => pending.has(`${u.in}.${u.name}`));
  for (const u of stillUnresolved) {
    if (u.required) missingRequired.push(`${u.in}.${u.name}`);
  }
  if (stillUnresolved.length > 0) request.unresolved = stillUnresolved;
  else delete request.unresolved;
  return { request, missingRequired, missingOptional, resolved };
}
