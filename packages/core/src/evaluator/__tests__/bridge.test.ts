import { afterEach, describe, it, expect } from 'vitest';

import { EvaluatorBridge, type BridgeOptions } from '../bridge.js';
import { WORKER_TIMEOUT_MESSAGE } from '../protocol.js';
import { ErrorCode } from '../../errors/codes.js';
import { BridgeUnavailable } from '../../types/errors.js';

// Stand-in workers speaking the line protocol, run with `node -e`
const READY = `process.stdout.write(JSON.stringify({ ready: true }) + '\\n');`;
const LINES = `const rl = require('node:readline').createInterface({ input: process.stdin });`;

const scripts = {
  echo: `${LINES}
${READY}
rl.on('line', (line) => {
  const req = JSON.parse(line);
  process.stdout.write(JSON.stringify({ id: req.id, ok: true, result: req.bindings }) + '\\n');
});`,
  failing: `${LINES}
${READY}
rl.on('line', (line) => {
  const req = JSON.parse(line);
  process.stdout.write(JSON.stringify({ id: req.id, ok: false, error: 'bad expression' }) + '\\n');
});`,
  crashing: `${LINES}
${READY}
rl.on('line', () => process.exit(3));`,
  hanging: `${READY}
setInterval(() => undefined, 1000);`,
  dead: `process.exit(1);`,
};

const bridges: EvaluatorBridge[] = [];

function bridge(script: keyof typeof scripts, options: BridgeOptions = {}): EvaluatorBridge {
  const created = new EvaluatorBridge({
    command: process.execPath,
    args: ['-e', scripts[script]],
    startTimeoutMs: 5000,
    ...options,
  });
  bridges.push(created);
  return created;
}

afterEach(async () => {
  await Promise.all(bridges.splice(0).map((b) => b.close()));
});

describe('EvaluatorBridge', () => {
  it('matches replies to concurrent callers', async () => {
    const echo = bridge('echo');
    const [one, two] = await Promise.all([echo.evaluate('x', { n: 1 }), echo.evaluate('y', { n: 2 })]);
    expect(one.isOk() && one.value).toEqual({ n: 1 });
    expect(two.isOk() && two.value).toEqual({ n: 2 });
    expect(echo.inflight).toBe(0);
    expect(echo.restarts).toBe(0);
  });

  it('resolves worker-side failures as Err', async () => {
    const result = await bridge('failing').evaluate('$a +', {});
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('bad expression');
      expect(result.error.errorCode).toBe(ErrorCode.EVALUATION_FAILED);
      expect(result.error.context?.expression).toBe('$a +');
    }
  });

  it('settles in-flight calls when the worker dies and restarts it on the next call', async () => {
    const crashing = bridge('crashing');
    const first = await crashing.evaluate('x', {});
    expect(first.isErr() && first.error.message).toBe('evaluator worker exited (code 3)');

    await crashing.evaluate('x', {});
    expect(crashing.restarts).toBe(1);
  });

  it('kills a worker that misses the caller deadline', async () => {
    const hanging = bridge('hanging', { callTimeoutMs: 100 });
    const result = await hanging.evaluate('x', {});
    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(WORKER_TIMEOUT_MESSAGE);
      expect(result.error.errorCode).toBe(ErrorCode.EVALUATION_TIMEOUT);
    }
    expect(hanging.inflight).toBe(0);
  });

  it('gives up once the restart budget is spent', async () => {
    const dead = bridge('dead', { maxRestarts: 1 });
    await expect(dead.evaluate('x', {})).rejects.toThrow('Expression evaluator worker failed 2 times; giving up');
    await expect(dead.evaluate('x', {})).rejects.toBeInstanceOf(BridgeUnavailable);
  });

  it('refuses work after close', async () => {
    const echo = bridge('echo');
    await echo.evaluate('x', {});
    await echo.close();
    await expect(echo.evaluate('x', {})).rejects.toThrow('Expression evaluator has been closed');
  });

  it('runs the bundled JSONata worker', async () => {
    const real = new EvaluatorBridge({ startTimeoutMs: 20000 });
    bridges.push(real);
    const result = await real.evaluate('$lowercase($a) = $lowercase($b)', { a: 'Alpha', b: 'ALPHA' });
    expect(result.isOk() && result.value).toBe(true);
  }, 30000);
});
