/**
 * Shared builders for tests: step results, requests, an in-process
 * expression evaluator and throwaway HTTP servers on 127.0.0.1.
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';
import { fileURLToPath } from 'node:url';

import { EvaluationError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import type { RequestCase, StepResult } from '../types/model.js';
import type { TransportErrorKind } from '../types/errors.js';
import { ok, err, type Result } from '../types/result.js';
import type { ExpressionEvaluator } from '../evaluator/bridge.js';
import type { FetchLike } from '../executor/http-client.js';
import { WORKER_TIMEOUT_MESSAGE } from '../evaluator/protocol.js';
import { createJsonataEvaluator, handleRequest } from '../evaluator/worker.js';

export function jsonStep(
  body: JsonValue | undefined,
  statusCode = 200,
  headers: Record<string, string[]> = {}
): StepResult {
  if (body === undefined) return { statusCode, headers, bodyKind: 'empty', elapsedMs: 1 };
  return { statusCode, headers, bodyKind: 'json', body, elapsedMs: 1 };
}

export function binaryStep(base64: string, statusCode = 200): StepResult {
  return { statusCode, headers: {}, bodyKind: 'binary', bodyBase64: base64, elapsedMs: 1 };
}

export function failedStep(kind: TransportErrorKind, message: string): StepResult {
  return { statusCode: null, headers: {}, bodyKind: 'empty', elapsedMs: 1, error: { kind, message } };
}

export function requestCase(overrides: Partial<RequestCase> = {}): RequestCase {
  return {
    caseId: 'case-1',
    operationId: 'getItem',
    method: 'get',
    pathTemplate: '/items',
    pathParameters: {},
    query: {},
    headers: {},
    cookies: {},
    ...overrides,
  };
}

/**
 * JSONata evaluated in the test process through the worker's own request
 * handler, so results match the real worker without spawning one.
 */
export class InProcessEvaluator implements ExpressionEvaluator {
  readonly calls: string[] = [];
  private readonly evaluateFn = createJsonataEvaluator();
  private nextId = 1;

  constructor(private readonly deadlineMs = 1000) {}

  async evaluate(expression: string, bindings: JsonObject): Promise<Result<JsonValue, EvaluationError>> {
    this.calls.push(expression);
    const reply = await handleRequest(
      { id: this.nextId++, expression, bindings },
      { deadlineMs: this.deadlineMs, evaluate: this.evaluateFn }
    );
    if (reply.ok) return ok(reply.result);
    return err(
      new EvaluationError({
        message: reply.error,
        errorCode: reply.error === WORKER_TIMEOUT_MESSAGE ? ErrorCode.EVALUATION_TIMEOUT : undefined,
        context: { expression },
      })
    );
  }

  async close(): Promise<void> {}
}

export interface TestServer {
  baseUrl: string;
  requests: Array<{ method: string; url: string; headers: IncomingMessage['headers']; body: string }>;
  close(): Promise<void>;
}

export type TestHandler = (
  request: { method: string; url: URL; headers: IncomingMessage['headers']; body: string },
  response: ServerResponse
) => void;

export async function startServer(handler: TestHandler): Promise<TestServer> {
  const requests: TestServer['requests'] = [];
  const server = createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const body = Buffer.concat(chunks).toString('utf8');
      const method = req.method ?? 'GET';
      const raw = req.url ?? '/';
      requests.push({ method, url: raw, headers: req.headers, body });
      handler({ method, url: new URL(raw, 'http://127.0.0.1'), headers: req.headers, body }, res);
    });
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address: AddressInfo | string | null = server.address();
  const port = typeof address === 'object' && address !== null ? address.port : 0;
  return {
    baseUrl: `http://127.0.0.1:${port}`,
    requests,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

export function sendJson(response: ServerResponse, status: number, body: JsonValue, headers: Record<string, string> = {}): void {
  response.writeHead(status, { 'content-type': 'application/json', ...headers });
  response.end(JSON.stringify(body));
}

/** Path of a small items API: create, list, get and delete with links. */
export const ITEMS_API = fileURLToPath(new URL('./items-api.yaml', import.meta.url));

export interface FakeRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: string | undefined;
}

export type FakeRoute = (request: FakeRequest) => Response | Promise<Response>;

export interface FakeFetch {
  fetchImpl: FetchLike;
  /** `HOST METHOD /path?query` per call, in arrival order */
  calls: string[];
}

/**
 * fetch stand-in routing by host; an unknown host fails the way undici does
 * when a connection is refused.
 */
export function fakeFetch(hosts: Record<string, FakeRoute>): FakeFetch {
  const calls: string[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url);
    const method = init?.method ?? 'GET';
    calls.push(`${url.host} ${method} ${url.pathname}${url.search}`);
    const route = hosts[url.host];
    if (!route) {
      throw new TypeError('fetch failed', {
        cause: Object.assign(new Error(`connect ECONNREFUSED ${url.host}`), { code: 'ECONNREFUSED' }),
      });
    }
    return route({
      method,
      url,
      headers: new Headers(init?.headers),
      body: typeof init?.body === 'string' ? init.body : undefined,
    });
  };
  return { fetchImpl, calls };
}

export function jsonResponse(status: number, body: JsonValue, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}
