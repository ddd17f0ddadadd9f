/**
 * Expression evaluator worker process.
 *
 * Reads one EvaluateRequest per line on stdin and writes one EvaluateReply
 * per line on stdout. Expressions are JSONata; `a` and `b` are available both
 * as input fields and as `$a` / `$b` variables. Each evaluation races a
 * deadline and reports a structured failure instead of crashing.
 */

import { createInterface } from 'node:readline';
import { pathToFileURL } from 'node:url';
import jsonata from 'jsonata';

import { isRecord, toJsonValue, type JsonObject } from '../types/json.js';
import { LRUMap } from '../util/lru.js';
import {
  WORKER_TIMEOUT_MESSAGE,
  encodeMessage,
  parseRequest,
  type EvaluateReply,
  type EvaluateRequest,
} from './protocol.js';

export type EvaluateFn = (expression: string, bindings: JsonObject) => Promise<unknown>;

export interface HandleOptions {
  deadlineMs: number;
  evaluate: EvaluateFn;
}

export const DEFAULT_WORKER_DEADLINE_MS = 5000;

function errorText(error: unknown): string {
  if (error instanceof Error) return error.message;
  // JSONata throws plain objects carrying code/message
  if (isRecord(error) && typeof error.message === 'string') {
    return typeof error.code === 'string' ? `${error.code}: ${error.message}` : error.message;
  }
  return String(error);
}

export function createJsonataEvaluator(cacheSize = 256): EvaluateFn {
  const compiled = new LRUMap<string, jsonata.Expression>(cacheSize);
  return async (expression, bindings) => {
    let expr = compiled.get(expression);
    if (!expr) {
      expr = jsonata(expression);
      compiled.set(expression, expr);
    }
    return expr.evaluate(bindings, bindings);
  };
}

export async function handleRequest(
  request: EvaluateRequest,
  options: HandleOptions
): Promise<EvaluateReply> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<EvaluateReply>((resolve) => {
    timer = setTimeout(
      () => resolve({ id: request.id, ok: false, error: WORKER_TIMEOUT_MESSAGE }),
      options.deadlineMs
    );
  });
  const evaluation = options.evaluate(request.expression, request.bindings).then(
    (value): EvaluateReply => ({ id: request.id, ok: true, result: toJsonValue(value) ?? null }),
    (error: unknown): EvaluateReply => ({ id: request.id, ok: false, error: errorText(error) })
  );
  try {
    return await Promise.race([evaluation, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface WorkerIo {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Serve requests until stdin closes. Resolves when every reply is written.
 */
export async function runWorker(
  io: WorkerIo = { input: process.stdin, output: process.stdout },
  deadlineMs = deadlineFromEnv()
): Promise<void> {
  const evaluate = createJsonataEvaluator();
  const inflight = new Set<Promise<void>>();
  const lines = createInterface({ input: io.input, crlfDelay: Infinity });
  io.output.write(encodeMessage({ ready: true }));

  for await (const line of lines) {
    if (line.trim() === '') continue;
    const request = parseRequest(line);
    if (!request) continue;
    const task = handleRequest(request, { deadlineMs, evaluate }).then(
      (reply) => {
        io.output.write(encodeMessage(reply));
      },
      (error: unknown) => {
        io.output.write(encodeMessage({ id: request.id, ok: false, error: errorText(error) }));
      }
    );
    inflight.add(task);
    void task.finally(() => inflight.delete(task));
  }
  await Promise.all(inflight);
}

function deadlineFromEnv(): number {
  const raw = Number(process.env.DIFFPROBE_EVAL_DEADLINE_MS);
  return Number.isFinite(raw) && raw > 0 ? raw : DEFAULT_WORKER_DEADLINE_MS;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  runWorker().catch((error: unknown) => {
    process.stderr.write(`[diffprobe:worker] ${errorText(error)}\n`);
    process.exitCode = 1;
  });
}
