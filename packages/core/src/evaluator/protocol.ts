/**
 * Newline-delimited JSON between the bridge and the evaluator worker.
 *
 * The worker announces `{"ready":true}` once, then answers every request
 * with exactly one reply carrying the same `id`. JSON.stringify never emits a
 * raw newline, so one message is always one line.
 */

import { isRecord, toJsonValue, type JsonObject, type JsonValue } from '../types/json.js';

export const WORKER_TIMEOUT_MESSAGE = 'evaluation timeout exceeded';

export interface EvaluateRequest {
  id: number;
  expression: string;
  bindings: JsonObject;
}

export type EvaluateReply =
  | { id: number; ok: true; result: JsonValue }
  | { id: number; ok: false; error: string };

export interface ReadyMessage {
  ready: true;
}

export function encodeMessage(message: EvaluateRequest | EvaluateReply | ReadyMessage): string {
  return `${JSON.stringify(message)}\n`;
}

export function parseRequest(line: string): EvaluateRequest | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(raw) || typeof raw.id !== 'number' || typeof raw.expression !== 'string') {
    return undefined;
  }
  return {
    id: raw.id,
    expression: raw.expression,
    bindings: isRecord(raw.bindings) ? toObject(raw.bindings) : {},
  };
}

function toObject(record: Record<string, unknown>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    const json = toJsonValue(value);
    if (json !== undefined) out[key] = json;
  }
  return out;
}

export function parseReply(line: string): EvaluateReply | ReadyMessage | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return undefined;
  }
  if (!isRecord(raw)) return undefined;
  if (raw.ready === true) return { ready: true };
  if (typeof raw.id !== 'number') return undefined;
  if (raw.ok === true) {
    return { id: raw.id, ok: true, result: toJsonValue(raw.result) ?? null };
  }
  if (raw.ok === false) {
    return { id: raw.id, ok: false, error: typeof raw.error === 'string' ? raw.error : 'unknown evaluation error' };
  }
  return undefined;
}
