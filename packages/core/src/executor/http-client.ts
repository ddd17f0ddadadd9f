/* eslint-disable complexity */
/* global fetch, AbortController */
/**
 * One HTTP exchange against one target, normalized into a StepResult.
 * Never throws: transport failures become a terminal StepResult.
 */

import { performance } from 'node:perf_hooks';

import { ErrorCode } from '../errors/codes.js';
import { TransportError, describeError, type TransportErrorKind } from '../types/errors.js';
import { isRecord, toJsonValue, type JsonValue } from '../types/json.js';
import type { RequestCase, StepResult } from '../types/model.js';
import { ok, err, type Result } from '../types/result.js';
import { buildXml, isXmlMediaType, parseXml } from './xml-body.js';

export type FetchLike = typeof fetch;

export interface HttpTarget {
  name: string;
  baseUrl: string;
  /** Sent with every request; case headers win */
  headers?: Record<string, string>;
}

export interface ExecuteOptions {
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

const CONNECTION_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

export function renderPath(template: string, parameters: Record<string, string>): string {
  return template.replace(/\{([^{}]+)\}/g, (whole, name: string) => {
    const value = parameters[name];
    return value === undefined ? whole : encodeURIComponent(value);
  });
}

export function buildUrl(baseUrl: string, request: RequestCase): string {
  const base = baseUrl.replace(/\/+$/, '');
  const path = renderPath(request.pathTemplate, request.pathParameters);
  const search = new URLSearchParams();
  for (const [name, values] of Object.entries(request.query)) {
    for (const value of values) search.append(name, value);
  }
  const qs = search.toString();
  return `${base}${path.startsWith('/') ? path : `/${path}`}${qs ? `?${qs}` : ''}`;
}

function encodeBody(request: RequestCase): { body?: string; contentType?: string } {
  if (request.body === undefined) return {};
  const mediaType = request.mediaType ?? 'application/json';
  if (mediaType === 'application/x-www-form-urlencoded' && isRecord(request.body)) {
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(request.body)) {
      form.append(key, typeof value === 'string' ? value : JSON.stringify(value));
    }
    return { body: form.toString(), contentType: mediaType };
  }
  if (/json/i.test(mediaType)) return { body: JSON.stringify(request.body), contentType: mediaType };
  if (isXmlMediaType(mediaType.split(';')[0]?.trim().toLowerCase() ?? '')) {
    const xml = buildXml(request.body);
    if (xml !== undefined) return { body: xml, contentType: mediaType };
  }
  const text = typeof request.body === 'string' ? request.body : JSON.stringify(request.body);
  return { body: text, contentType: mediaType };
}

export function buildHeaders(target: HttpTarget, request: RequestCase): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(target.headers ?? {})) headers[name.toLowerCase()] = value;
  for (const [name, values] of Object.entries(request.headers)) {
    if (values.length > 0) headers[name.toLowerCase()] = values.join(', ');
  }
  const cookies = Object.entries(request.cookies).map(([k, v]) => `${k}=${v}`);
  if (cookies.length > 0) {
    headers.cookie = headers.cookie ? `${headers.cookie}; ${cookies.join('; ')}` : cookies.join('; ');
  }
  return headers;
}

function classify(error: unknown, aborted: boolean): TransportErrorKind {
  if (aborted) return 'timeout';
  const cause = error instanceof Error ? error.cause : undefined;
  const code = isRecord(cause) && typeof cause.code === 'string' ? cause.code : undefined;
  if (code && CONNECTION_CODES.has(code)) return 'connection';
  if (code === 'UND_ERR_CONNECT_TIMEOUT') return 'timeout';
  return 'transport';
}

function collectHeaders(response: Response): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  response.headers.forEach((value, name) => {
    const key = name.toLowerCase();
    if (key === 'set-cookie') return;
    out[key] = [value];
  });
  const cookies = response.headers.getSetCookie();
  if (cookies.length > 0) out['set-cookie'] = cookies;
  return out;
}

function isTextual(mediaType: string): boolean {
  return (
    mediaType.startsWith('text/') ||
    mediaType === 'application/x-www-form-urlencoded' ||
    mediaType === 'application/javascript'
  );
}

export function decodeBody(
  contentType: string | undefined,
  bytes: Uint8Array
): Pick<StepResult, 'bodyKind' | 'body' | 'bodyBase64'> {
  if (bytes.byteLength === 0) return { bodyKind: 'empty' };
  const mediaType = (contentType ?? '').split(';')[0]?.trim().toLowerCase() ?? '';
  const buffer = Buffer.from(bytes);
  if (mediaType === 'application/json' || mediaType.endsWith('+json')) {
    const text = buffer.toString('utf8');
    try {
      const parsed: unknown = JSON.parse(text);
      const body: JsonValue = toJsonValue(parsed) ?? null;
      return { bodyKind: 'json', body };
    } catch {
      // Declared JSON that does not parse is compared as text
      return { bodyKind: 'text', body: text };
    }
  }
  if (isXmlMediaType(mediaType)) {
    const text = buffer.toString('utf8');
    const body = parseXml(text);
    // Malformed XML is compared as text
    return body === undefined ? { bodyKind: 'text', body: text } : { bodyKind: 'xml', body };
  }
  if (isTextual(mediaType)) return { bodyKind: 'text', body: buffer.toString('utf8') };
  return { bodyKind: 'binary', bodyBase64: buffer.toString('base64') };
}

export async function executeRequest(
  target: HttpTarget,
  request: RequestCase,
  options: ExecuteOptions
): Promise<StepResult> {
  const doFetch = options.fetchImpl ?? fetch;
  const started = performance.now();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), options.timeoutMs);
  const headers = buildHeaders(target, request);
  const { body, contentType } = encodeBody(request);
  if (contentType && !headers['content-type']) headers['content-type'] = contentType;

  try {
    const response = await doFetch(buildUrl(target.baseUrl, request), {
      method: request.method.toUpperCase(),
      headers,
      body,
      redirect: 'manual',
      signal: controller.signal,
    });
    // The deadline covers the body read as well
    const bytes = new Uint8Array(await response.arrayBuffer());
    return {
      statusCode: response.status,
      headers: collectHeaders(response),
      ...decodeBody(response.headers.get('content-type') ?? undefined, bytes),
      elapsedMs: Math.round(performance.now() - started),
    };
  } catch (error) {
    const kind = classify(error, controller.signal.aborted);
    const message =
      kind === 'timeout'
        ? `request timed out after ${options.timeoutMs}ms`
        : describeCause(error);
    return {
      statusCode: null,
      headers: {},
      bodyKind: 'empty',
      elapsedMs: Math.round(performance.now() - started),
      error: { kind, message },
    };
  } finally {
    clearTimeout(timer);
  }
}

function describeCause(error: unknown): string {
  const base = describeError(error);
  const cause = error instanceof Error ? error.cause : undefined;
  return cause instanceof Error ? `${base}: ${cause.message}` : base;
}

/**
 * Startup reachability check: any HTTP status counts as reachable.
 */
export async function preflight(
  target: HttpTarget,
  options: ExecuteOptions
): Promise<Result<number, TransportError>> {
  const probe: RequestCase = {
    caseId: 'preflight',
    operationId: 'preflight',
    method: 'get',
    pathTemplate: '/',
    pathParameters: {},
    query: {},
    headers: {},
    cookies: {},
  };
  const result = await executeRequest(target, probe, options);
  if (result.error || result.statusCode === null) {
    return err(
      new TransportError({
        message: `Target ${target.name} (${target.baseUrl}) is unreachable: ${result.error?.message ?? 'no response'}`,
        errorCode: ErrorCode.TARGET_UNREACHABLE,
        kind: result.error?.kind ?? 'transport',
        target: target.name,
        context: { baseUrl: target.baseUrl },
      })
    );
  }
  return ok(result.statusCode);
}
