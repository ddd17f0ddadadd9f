import { describe, it, expect } from 'vitest';

import {
  applyLinkParameters,
  findLinkedParameter,
  linkSuppliedKeys,
  resolveRuntimeExpression,
  type LinkContext,
} from '../link-resolver.js';
import type { LinkSpec, Operation } from '../../types/model.js';
import { jsonStep, requestCase } from '../../test-utils/fixtures.js';

const ctx: LinkContext = {
  request: requestCase({
    method: 'post',
    pathParameters: { owner: 'ann' },
    query: { page: ['2', '3'] },
    headers: { 'x-trace': ['t-1'] },
    body: { name: 'widget', tags: ['a', 'b'] },
  }),
  response: jsonStep({ id: 'abc123', nested: { 'a/b': 7 }, items: [{ id: 'i0' }] }, 201, {
    location: ['/items/abc123'],
    'set-cookie': ['s=1', 't=2'],
  }),
};

function resolved(expression: string): unknown {
  const result = resolveRuntimeExpression(expression, ctx);
  return result.isOk() ? result.value : { error: result.error };
}

describe('resolveRuntimeExpression', () => {
  it.each([
    ['$statusCode', 201],
    ['$method', 'POST'],
    ['$response.body#/id', 'abc123'],
    ['$response.body#/items/0/id', 'i0'],
    ['$response.body#/nested/a~1b', 7],
    ['$response.header.Location', '/items/abc123'],
    ['$response.header.set-cookie[1]', 't=2'],
    ['$request.path.owner', 'ann'],
    ['$request.query.page', '2'],
    ['$request.header.X-Trace', 't-1'],
    ['$request.body#/tags/1', 'b'],
    ['literal', 'literal'],
    ['items/{$response.body#/id}/v{$statusCode}', 'items/abc123/v201'],
  ])('%s', (expression, expected) => {
    expect(resolved(expression)).toEqual(expected);
  });

  it('returns the whole body without a pointer', () => {
    expect(resolved('$response.body')).toEqual({ id: 'abc123', nested: { 'a/b': 7 }, items: [{ id: 'i0' }] });
  });

  it.each([
    ['$response.body#/missing', 'body has no value at /missing'],
    ['$response.header.etag', "response has no 'etag' header"],
    ['$request.path.other', "request has no path parameter 'other'"],
    ['$url', "unsupported runtime expression '$url'"],
    ['id-{$response.body#/nope}', 'body has no value at /nope'],
  ])('%s fails', (expression, message) => {
    expect(resolved(expression)).toEqual({ error: message });
  });
});

const getItem: Operation = {
  operationId: 'getItem',
  method: 'get',
  pathTemplate: '/items/{item_id}',
  parameters: [
    { name: 'item_id', in: 'path', required: true, schema: { type: 'string' } },
    { name: 'item_id', in: 'query', required: false, schema: { type: 'string' } },
    { name: 'X-Version', in: 'header', required: false, schema: { type: 'integer' } },
  ],
  responses: {},
  links: [],
};

function link(parameters: Record<string, string>): LinkSpec {
  return { name: 'GetItem', statusCode: '201', sourceOperationId: 'createItem', targetOperationId: 'getItem', parameters };
}

describe('findLinkedParameter', () => {
  it('prefers the path location for a bare name', () => {
    expect(findLinkedParameter(getItem, 'item_id')?.in).toBe('path');
    expect(findLinkedParameter(getItem, 'query.item_id')?.in).toBe('query');
    expect(findLinkedParameter(getItem, 'cookie.item_id')).toBeUndefined();
  });

  it('lists the slots a link fills', () => {
    expect([...linkSuppliedKeys(link({ item_id: '$response.body#/id', nope: '1' }), getItem)]).toEqual(['path.item_id']);
  });
});

describe('applyLinkParameters', () => {
  const planned = requestCase({
    operationId: 'getItem',
    pathTemplate: '/items/{item_id}',
    unresolved: [{ in: 'path', name: 'item_id', required: true }],
  });

  it('fills the path parameter from the response body', () => {
    const applied = applyLinkParameters(getItem, planned, link({ item_id: '$response.body#/id' }), ctx);
    expect(applied.missingRequired).toEqual([]);
    expect(applied.request.pathParameters).toEqual({ item_id: 'abc123' });
    expect(applied.request.rawParameters).toEqual({ 'path.item_id': 'abc123' });
    expect(applied.request.unresolved).toBeUndefined();
    expect(applied.resolved).toEqual({ 'path.item_id': 'abc123' });
    expect(planned.pathParameters).toEqual({});
  });

  it('strips the leading separator of a location-style value', () => {
    const applied = applyLinkParameters(
      getItem,
      planned,
      link({ item_id: '{$response.header.location}' }),
      { ...ctx, response: jsonStep(null, 201, { location: ['/abc123'] }) }
    );
    expect(applied.request.pathParameters.item_id).toBe('abc123');
  });

  it('formats typed values for their location', () => {
    const applied = applyLinkParameters(
      getItem,
      planned,
      link({ item_id: '$response.body#/id', 'header.X-Version': '$statusCode' }),
      ctx
    );
    expect(applied.request.headers).toEqual({ 'x-version': ['201'] });
  });

  it('reports a required parameter it cannot resolve', () => {
    const applied = applyLinkParameters(getItem, planned, link({ item_id: '$response.body#/missing' }), ctx);
    expect(applied.missingRequired).toEqual(['path.item_id']);
    expect(applied.request.pathParameters).toEqual({});
  });

  it('omits an optional parameter it cannot resolve', () => {
    const applied = applyLinkParameters(
      getItem,
      planned,
      link({ item_id: '$response.body#/id', 'header.X-Version': '$response.header.x-version' }),
      ctx
    );
    expect(applied.missingRequired).toEqual([]);
    expect(applied.missingOptional).toEqual(['header.X-Version']);
    expect(applied.request.headers).toEqual({});
  });

  it('counts a required slot the link never mentions as missing', () => {
    const applied = applyLinkParameters(getItem, planned, link({}), ctx);
    expect(applied.missingRequired).toEqual(['path.item_id']);
    expect(applied.request.unresolved).toEqual([{ in: 'path', name: 'item_id', required: true }]);
  });
});
