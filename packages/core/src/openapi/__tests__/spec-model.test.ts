import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, expect, it } from 'vitest';

import { ErrorCode } from '../../errors/codes.js';
import { ParseError } from '../../types/errors.js';
import { ITEMS_API } from '../../test-utils/fixtures.js';
import {
  buildSpecModel,
  coerceHttpMethod,
  findOperation,
  loadSpecFile,
  resolveSpecDocument,
  selectRequestMediaType,
  synthesizeOperationId,
} from '../spec-model.js';
import { resolveSchema } from '../../generator/schema-utils.js';

function catchParseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error('expected a ParseError');
}

describe('loadSpecFile', () => {
  it('lists operations in path then method order', async () => {
    const model = await loadSpecFile(ITEMS_API);
    expect(model.title).toBe('Items');
    expect(model.version).toBe('1.0.0');
    expect(model.openapi).toBe('3.0.3');
    expect(model.operations.map((op) => op.operationId)).toEqual([
      'listItems',
      'createItem',
      'getItem',
      'deleteItem',
    ]);
  });

  it('merges path-level parameters and marks path parameters required', async () => {
    const model = await loadSpecFile(ITEMS_API);
    const getItem = findOperation(model, 'getItem');
    expect(getItem?.pathTemplate).toBe('/items/{item_id}');
    expect(getItem?.parameters).toEqual([
      {
        name: 'item_id',
        in: 'path',
        required: true,
        schema: { type: 'string', minLength: 1, maxLength: 12 },
      },
    ]);
    expect(findOperation(model, 'listItems')?.parameters[0]?.required).toBe(false);
  });

  it('reads request bodies and response schemas', async () => {
    const model = await loadSpecFile(ITEMS_API);
    const createItem = findOperation(model, 'createItem');
    expect(createItem?.requestBody?.required).toBe(true);
    expect(Object.keys(createItem?.requestBody?.content ?? {})).toEqual(['application/json']);
    expect(Object.keys(createItem?.responses ?? {})).toEqual(['201']);
    expect(findOperation(model, 'getItem')?.responses['404']).toEqual({});
  });

  it('collects response links on the source operation', async () => {
    const model = await loadSpecFile(ITEMS_API);
    expect(findOperation(model, 'createItem')?.links).toEqual([
      {
        name: 'GetItem',
        statusCode: '201',
        sourceOperationId: 'createItem',
        targetOperationId: 'getItem',
        parameters: { item_id: '$response.body#/id' },
      },
      {
        name: 'DeleteItem',
        statusCode: '201',
        sourceOperationId: 'createItem',
        targetOperationId: 'deleteItem',
        parameters: { 'path.item_id': '$response.body#/id' },
      },
    ]);
  });

  it('reads JSON documents by extension', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'spec-model-'));
    const file = path.join(dir, 'api.json');
    await writeFile(
      file,
      JSON.stringify({ openapi: '3.1.0', info: { title: 'J', version: '2' }, paths: { '/ping': { get: {} } } })
    );
    const model = await loadSpecFile(file);
    expect(model.operations.map((op) => op.operationId)).toEqual(['get_ping']);
  });

  it('reports unreadable and unparsable files', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'spec-model-'));
    await expect(loadSpecFile(path.join(dir, 'missing.yaml'))).rejects.toThrow(
      /^Cannot read specification: /
    );
    const broken = path.join(dir, 'broken.json');
    await writeFile(broken, '{"openapi":');
    await expect(loadSpecFile(broken)).rejects.toThrow(
      /^Specification is neither valid JSON nor YAML: /
    );
  });
});

describe('references across files', () => {
  const api = (parameterRef: string) => `openapi: 3.0.3
info: { title: Split, version: '1' }
paths:
  /items/{item_id}:
    get:
      operationId: getItem
      parameters:
        - $ref: '${parameterRef}'
      responses:
        '200':
          $ref: './common.yaml#/components/responses/Item'
`;
  const common = `components:
  parameters:
    ItemId: { name: item_id, in: path, schema: { type: string } }
  responses:
    Item:
      description: ok
      content:
        application/json:
          schema: { $ref: '#/components/schemas/Item' }
  schemas:
    Item: { type: object, properties: { id: { type: string } } }
`;

  async function split(parameterRef: string): Promise<string> {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'diffprobe-refs-'));
    await writeFile(path.join(dir, 'common.yaml'), common);
    const file = path.join(dir, 'api.yaml');
    await writeFile(file, api(parameterRef));
    return file;
  }

  it('inlines parameters and responses declared in a sibling file', async () => {
    const model = await loadSpecFile(await split('./common.yaml#/components/parameters/ItemId'));
    const getItem = findOperation(model, 'getItem');
    expect(getItem?.parameters.map((p) => p.name)).toEqual(['item_id']);
    expect(getItem?.parameters[0]?.required).toBe(true);
    expect(getItem?.responses['200']).toEqual({
      'application/json': { type: 'object', properties: { id: { type: 'string' } } },
    });
  });

  it('fails with a ParseError on a ref that cannot be resolved', async () => {
    const file = await split('./common.yaml#/components/parameters/Missing');
    const error = await loadSpecFile(file).then(
      () => undefined,
      (e: unknown) => e
    );
    expect(error).toBeInstanceOf(ParseError);
    expect(error instanceof ParseError && error.message).toMatch(/^Cannot resolve \$ref: /);
  });

  it('rejects a $ref left in a document built without resolving', () => {
    const error = catchParseError(() =>
      buildSpecModel({
        openapi: '3.0.0',
        paths: { '/a': { get: { parameters: [{ $ref: '#/components/parameters/P' }] } } },
      })
    );
    expect(error.message).toBe('Unresolved $ref "#/components/parameters/P"');
  });
});

describe('buildSpecModel', () => {
  it('rejects documents that are not OpenAPI 3.x', () => {
    expect(catchParseError(() => buildSpecModel([])).message).toBe(
      'Invalid OpenAPI document: expected an object at the root'
    );
    const swagger = catchParseError(() => buildSpecModel({ swagger: '2.0', paths: {} }));
    expect(swagger.message).toBe(
      'Only OpenAPI 3.x documents are supported ("openapi" field missing or not 3.x)'
    );
    expect(swagger.errorCode).toBe(ErrorCode.SPEC_PARSE_FAILED);
    expect(swagger.getExitCode()).toBe(51);
    expect(catchParseError(() => buildSpecModel({ openapi: '3.0.0' })).message).toBe(
      'Invalid OpenAPI document: missing or invalid "paths" object'
    );
  });

  it('synthesizes missing operation ids and defaults the info block', () => {
    const model = buildSpecModel({
      openapi: '3.0.0',
      paths: { '/users/{id}/posts': { get: {}, patch: { operationId: '' } } },
    });
    expect(model.title).toBe('untitled');
    expect(model.version).toBe('0.0.0');
    expect(model.operations.map((op) => op.operationId)).toEqual([
      'get_users_id_posts',
      'patch_users_id_posts',
    ]);
  });

  it('fails on an operation id shared by two operations', () => {
    const error = catchParseError(() =>
      buildSpecModel({
        openapi: '3.0.0',
        paths: { '/a': { get: { operationId: 'dup' } }, '/b': { get: { operationId: 'dup' } } },
      })
    );
    expect(error.message).toBe('OperationId "dup" is ambiguous across multiple paths');
  });

  it('resolves operationRef links declared before their target', () => {
    const model = buildSpecModel({
      openapi: '3.0.0',
      paths: {
        '/orders': {
          post: {
            operationId: 'createOrder',
            responses: {
              '201': {
                links: {
                  Fetch: {
                    operationRef: '#/paths/~1orders~1{order_id}/get',
                    parameters: { order_id: '$response.body#/id', limit: 5 },
                  },
                  Dangling: { operationId: 'nowhere' },
                },
              },
            },
          },
        },
        '/orders/{order_id}': { get: { operationId: 'getOrder' } },
      },
    });
    expect(findOperation(model, 'createOrder')?.links).toEqual([
      {
        name: 'Fetch',
        statusCode: '201',
        sourceOperationId: 'createOrder',
        targetOperationId: 'getOrder',
        parameters: { order_id: '$response.body#/id', limit: '5' },
      },
    ]);
  });

  it('follows $ref for parameters and takes content schemas for parameters', async () => {
    const doc = await resolveSpecDocument({
      openapi: '3.0.0',
      paths: {
        '/search': {
          get: {
            operationId: 'search',
            parameters: [
              { $ref: '#/components/parameters/Page' },
              { name: 'filter', in: 'query', content: { 'application/json': { schema: { type: 'object' } } } },
              { name: 'ignored', in: 'body' },
            ],
          },
        },
      },
      components: { parameters: { Page: { name: 'page', in: 'query', required: true, schema: { type: 'integer' } } } },
    });
    const model = buildSpecModel(doc);
    expect(findOperation(model, 'search')?.parameters).toEqual([
      { name: 'page', in: 'query', required: true, schema: { type: 'integer' } },
      { name: 'filter', in: 'query', required: false, schema: { type: 'object' } },
    ]);
  });
});

describe('helpers', () => {
  it('synthesizeOperationId', () => {
    expect(synthesizeOperationId('get', '/')).toBe('get_root');
    expect(synthesizeOperationId('delete', '/v1/items/{item_id}')).toBe('delete_v1_items_item_id');
  });

  it('coerceHttpMethod', () => {
    expect(coerceHttpMethod('PATCH')).toBe('patch');
    expect(coerceHttpMethod('connect')).toBeUndefined();
    expect(coerceHttpMethod(3)).toBeUndefined();
  });

  it('selectRequestMediaType prefers JSON, then form, then text', () => {
    const body = (...types: string[]) => ({
      required: false,
      content: Object.fromEntries(types.map((t) => [t, {}])),
    });
    expect(selectRequestMediaType(body('text/plain', 'application/json'))).toBe('application/json');
    expect(selectRequestMediaType(body('application/xml', 'application/problem+json'))).toBe(
      'application/problem+json'
    );
    expect(selectRequestMediaType(body('text/plain', 'application/x-www-form-urlencoded'))).toBe(
      'application/x-www-form-urlencoded'
    );
    expect(selectRequestMediaType(body('application/octet-stream', 'text/csv'))).toBe('text/csv');
    expect(selectRequestMediaType(body('application/octet-stream'))).toBe('application/octet-stream');
    expect(selectRequestMediaType(body())).toBeUndefined();
  });

  it('resolveSchema follows local refs left by circular schemas', () => {
    const root = {
      components: { schemas: { 'a/b': { type: 'object' }, Alias: { $ref: '#/components/schemas/a~1b' } } },
      loop: { $ref: '#/loop' },
    };
    expect(resolveSchema(root, { $ref: '#/components/schemas/Alias', description: 'd' })).toEqual({
      type: 'object',
      description: 'd',
    });
    expect(resolveSchema(root, { $ref: '#/loop' })).toBeUndefined();
    expect(resolveSchema(root, { $ref: 'other.yaml#/a' })).toBeUndefined();
  });
});
