import { describe, it, expect } from 'vitest';
import { PassThrough } from 'node:stream';

import { createJsonataEvaluator, handleRequest, runWorker } from '../worker.js';
import { WORKER_TIMEOUT_MESSAGE, encodeMessage, parseReply } from '../protocol.js';

const evaluate = createJsonataEvaluator();

describe('handleRequest', () => {
  it('evaluates JSONata with a and b as fields and variables', async () => {
    const reply = await handleRequest(
      { id: 1, expression: '$a.n + b.n', bindings: { a: { n: 1 }, b: { n: 2 } } },
      { deadlineMs: 1000, evaluate }
    );
    expect(reply).toEqual({ id: 1, ok: true, result: 3 });
  });

  it('maps an undefined result to null', async () => {
    const reply = await handleRequest({ id: 2, expression: '$a.missing', bindings: { a: {} } }, { deadlineMs: 1000, evaluate });
    expect(reply).toEqual({ id: 2, ok: true, result: null });
  });

  it('reports expression errors as failed replies', async () => {
    const reply = await handleRequest({ id: 3, expression: '$a +', bindings: {} }, { deadlineMs: 1000, evaluate });
    expect(reply.ok).toBe(false);
    expect(reply.ok === false && reply.error.length > 0).toBe(true);
  });

  it('answers with the timeout message when the deadline passes', async () => {
    const reply = await handleRequest(
      { id: 4, expression: 'slow', bindings: {} },
      { deadlineMs: 20, evaluate: () => new Promise(() => undefined) }
    );
    expect(reply).toEqual({ id: 4, ok: false, error: WORKER_TIMEOUT_MESSAGE });
  });
});

describe('runWorker', () => {
  it('announces readiness and answers each request by id', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));

    const done = runWorker({ input, output }, 1000);
    input.write(encodeMessage({ id: 7, expression: '$a = $b', bindings: { a: 1, b: 1 } }));
    input.write('\n');
    input.write('garbage\n');
    input.write(encodeMessage({ id: 8, expression: '$uppercase($a)', bindings: { a: 'x' } }));
    input.end();
    await done;
    await new Promise((resolve) => setImmediate(resolve));

    const messages = chunks.join('').split('\n').filter(Boolean).map(parseReply);
    expect(messages[0]).toEqual({ ready: true });
    expect(messages.slice(1)).toHaveLength(2);
    expect(messages).toContainEqual({ id: 7, ok: true, result: true });
    expect(messages).toContainEqual({ id: 8, ok: true, result: 'X' });
  });
});
