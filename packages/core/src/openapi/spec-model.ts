/* eslint-disable complexity */
/* eslint-disable max-lines-per-function */

import { dereference } from '@apidevtools/json-schema-ref-parser';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import { ParseError, describeError } from '../types/errors.js';
import { isRecord } from '../types/json.js';
import {
  HTTP_METHODS,
  type ApiSpecModel,
  type HttpMethod,
  type JsonSchema,
  type LinkSpec,
  type Operation,
  type ParameterLocation,
  type ParameterSpec,
  type RequestBodySpec,
} from '../types/model.js';

const PARAMETER_LOCATIONS: readonly ParameterLocation[] = [
  'path',
  'query',
  'header',
  'cookie',
];

function coerceLocation(value: unknown): ParameterLocation | undefined {
  return PARAMETER_LOCATIONS.find((loc) => loc === value);
}

export function coerceHttpMethod(method: unknown): HttpMethod | undefined {
  if (typeof method !== 'string') return undefined;
  const lowered = method.toLowerCase();
  return HTTP_METHODS.find((m) => m === lowered);
}

export function synthesizeOperationId(method: HttpMethod, pathKey: string): string {
  const slug = pathKey
    .replace(/[{}]/g, '')
    .replace(/[^A-Za-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `${method}_${slug || 'root'}`;
}

/**
 * Read an OpenAPI 3.x document from JSON or YAML, resolve its references and
 * build the operation model.
 */
export async function loadSpecFile(file: string): Promise<ApiSpecModel> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new ParseError({
      message: `Cannot read specification: ${describeError(error)}`,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }

  let doc: unknown;
  try {
    doc = path.extname(file).toLowerCase() === '.json' ? JSON.parse(text) : parseYaml(text);
  } catch (error) {
    throw new ParseError({
      message: `Specification is neither valid JSON nor YAML: ${describeError(error)}`,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return buildSpecModel(await resolveSpecDocument(doc, file), file);
}

/**
 * Inline every `$ref`, local or in sibling files (relative to `file`, or the
 * working directory). Circular schema references stay as local `$ref`s.
 */
export async function resolveSpecDocument(doc: unknown, file?: string): Promise<unknown> {
  if (!isRecord(doc)) return doc;
  try {
    return file === undefined
      ? await dereference(doc, { dereference: { circular: 'ignore' } })
      : await dereference(path.resolve(file), doc, { dereference: { circular: 'ignore' } });
  } catch (error) {
    throw new ParseError({
      message: `Cannot resolve $ref: ${describeError(error)}`,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Build the operation model from a document whose references are already
 * resolved (see {@link resolveSpecDocument}).
 */
export function buildSpecModel(doc: unknown, file?: string): ApiSpecModel {
  if (!isRecord(doc)) {
    throw new ParseError({
      message: 'Invalid OpenAPI document: expected an object at the root',
      context: { file },
    });
  }
  const version = doc.openapi;
  if (typeof version !== 'string' || !version.startsWith('3.')) {
    throw new ParseError({
      message: 'Only OpenAPI 3.x documents are supported ("openapi" field missing or not 3.x)',
      context: { file, value: version },
    });
  }
  const paths = doc.paths;
  if (!isRecord(paths)) {
    throw new ParseError({
      message: 'Invalid OpenAPI document: missing or invalid "paths" object',
      context: { file, section: 'paths' },
    });
  }

  const info = isRecord(doc.info) ? doc.info : {};
  const operations: Operation[] = [];
  // operationRef ('#/paths/~1items/get') -> operationId
  const refIndex = new Map<string, string>();
  const seenIds = new Set<string>();
  const pendingLinks = new Map<Operation, RawLink[]>();

  for (const [pathKey, rawItem] of Object.entries(paths)) {
    const pathItem = resolved(rawItem, file);
    if (!pathItem) continue;
    const shared = readParameters(pathItem.parameters, file);

    for (const method of HTTP_METHODS) {
      const op = pathItem[method];
      if (!isRecord(op)) continue;

      const operationId =
        typeof op.operationId === 'string' && op.operationId.length > 0
          ? op.operationId
          : synthesizeOperationId(method, pathKey);
      if (seenIds.has(operationId)) {
        throw new ParseError({
          message: `OperationId "${operationId}" is ambiguous across multiple paths`,
          context: { file, operationId },
        });
      }
      seenIds.add(operationId);

      const own = readParameters(op.parameters, file);
      const merged = new Map<string, ParameterSpec>();
      for (const p of [...shared, ...own]) merged.set(`${p.in}:${p.name}`, p);

      const responses: Record<string, Record<string, JsonSchema>> = {};
      const rawResponses = isRecord(op.responses) ? op.responses : {};
      const rawLinks: RawLink[] = [];
      for (const [status, rawResponse] of Object.entries(rawResponses)) {
        const response = resolved(rawResponse, file);
        if (!response) continue;
        responses[status] = readContent(response.content);
        if (isRecord(response.links)) {
          for (const [name, rawLink] of Object.entries(response.links)) {
            const link = resolved(rawLink, file);
            if (link) rawLinks.push({ status, name, link });
          }
        }
      }

      const operation: Operation = {
        operationId,
        method,
        pathTemplate: pathKey,
        parameters: [...merged.values()],
        requestBody: readRequestBody(op.requestBody, file),
        responses,
        links: [],
      };
      operations.push(operation);
      refIndex.set(`#/paths/${encodePointerToken(pathKey)}/${method}`, operationId);
      pendingLinks.set(operation, rawLinks);
    }
  }

  // Links may point at operations declared later in the document
  for (const operation of operations) {
    const rawLinks = pendingLinks.get(operation) ?? [];
    for (const { status, name, link } of rawLinks) {
      const target = resolveLinkTarget(link, refIndex, seenIds);
      if (!target) continue;
      const parameters: Record<string, string> = {};
      if (isRecord(link.parameters)) {
        for (const [key, expr] of Object.entries(link.parameters)) {
          parameters[key] = typeof expr === 'string' ? expr : JSON.stringify(expr);
        }
      }
      const spec: LinkSpec = {
        name,
        statusCode: status,
        sourceOperationId: operation.operationId,
        targetOperationId: target,
        parameters,
      };
      operation.links.push(spec);
    }
  }
  return {
    title: typeof info.title === 'string' ? info.title : 'untitled',
    version: typeof info.version === 'string' ? info.version : '0.0.0',
    openapi: version,
    operations,
    document: doc,
  };
}

interface RawLink {
  status: string;
  name: string;
  link: Record<string, unknown>;
}

function resolved(node: unknown, file: string | undefined): Record<string, unknown> | undefined {
  if (!isRecord(node)) return undefined;
  if (typeof node.$ref === 'string') {
    throw new ParseError({
      message: `Unresolved $ref "${node.$ref}"`,
      context: { file, ref: node.$ref },
    });
  }
  return node;
}

function encodePointerToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

function resolveLinkTarget(
  link: Record<string, unknown>,
  refIndex: Map<string, string>,
  knownIds: Set<string>
): string | undefined {
  if (typeof link.operationId === 'string') {
    return knownIds.has(link.operationId) ? link.operationId : undefined;
  }
  if (typeof link.operationRef === 'string') {
    const hash = link.operationRef.indexOf('#');
    const local = hash >= 0 ? link.operationRef.slice(hash) : link.operationRef;
    return refIndex.get(decodeURIComponent(local)) ?? refIndex.get(local);
  }
  return undefined;
}

function readParameters(raw: unknown, file: string | undefined): ParameterSpec[] {
  if (!Array.isArray(raw)) return [];
  const out: ParameterSpec[] = [];
  for (const entry of raw) {
    const param = resolved(entry, file);
    if (!param || typeof param.name !== 'string') continue;
    const location = coerceLocation(param.in);
    if (!location) continue;
    let schema: JsonSchema = isRecord(param.schema) ? param.schema : {};
    // Parameters described through `content` carry their schema one level down
    if (!isRecord(param.schema) && isRecord(param.content)) {
      const first = Object.values(readContent(param.content))[0];
      if (first) schema = first;
    }
    out.push({
      name: param.name,
      in: location,
      // Path parameters are always required
      required: location === 'path' || param.required === true,
      schema,
    });
  }
  return out;
}

function readContent(raw: unknown): Record<string, JsonSchema> {
  const out: Record<string, JsonSchema> = {};
  if (!isRecord(raw)) return out;
  for (const [mediaType, media] of Object.entries(raw)) {
    if (!isRecord(media)) continue;
    out[mediaType] = isRecord(media.schema) ? media.schema : {};
  }
  return out;
}

function readRequestBody(raw: unknown, file: string | undefined): RequestBodySpec | undefined {
  const body = resolved(raw, file);
  if (!body) return undefined;
  const content = readContent(body.content);
  if (Object.keys(content).length === 0) return undefined;
  return { required: body.required === true, content };
}

export function findOperation(
  model: ApiSpecModel,
  operationId: string
): Operation | undefined {
  return model.operations.find((op) => op.operationId === operationId);
}

/**
 * Pick the request media type the generator should target: JSON first.
 */
export function selectRequestMediaType(body: RequestBodySpec): string | undefined {
  const types = Object.keys(body.content);
  return (
    types.find((t) => t === 'application/json') ??
    types.find((t) => /[/+]json\b/.test(t)) ??
    types.find((t) => t === 'application/x-www-form-urlencoded') ??
    types.find((t) => t.startsWith('text/')) ??
    types[0]
  );
}
