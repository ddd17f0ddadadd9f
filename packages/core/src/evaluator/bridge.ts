/* eslint-disable max-lines-per-function */
/**
 * Parent side of the evaluator worker.
 *
 * One long-lived worker is shared by every comparison; replies are matched
 * to callers through the correlation id. Each call carries its own caller
 * deadline. A worker that misses it is treated as hung and killed. A worker
 * that exits is restarted on the next call, up to `maxRestarts` times, after
 * which the bridge refuses further work with BridgeUnavailable.
 */

import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import path from 'node:path';
import { createInterface } from 'node:readline';
import { fileURLToPath } from 'node:url';

import { BridgeUnavailable, EvaluationError, describeError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { JsonObject, JsonValue } from '../types/json.js';
import { ok, err, type Result } from '../types/result.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { WORKER_TIMEOUT_MESSAGE, encodeMessage, parseReply } from './protocol.js';

export interface ExpressionEvaluator {
  evaluate(expression: string, bindings: JsonObject): Promise<Result<JsonValue, EvaluationError>>;
  close(): Promise<void>;
}

export interface BridgeOptions {
  /** Executable and arguments; default runs the bundled worker under node */
  command?: string;
  args?: string[];
  cwd?: string;
  /** Deadline the worker applies per evaluation */
  workerTimeoutMs?: number;
  /** Deadline the caller applies per call; should exceed the worker's */
  callTimeoutMs?: number;
  /** Wait for the worker's ready line */
  startTimeoutMs?: number;
  maxRestarts?: number;
  logger?: Logger;
}

interface PendingCall {
  resolve: (result: Result<JsonValue, EvaluationError>) => void;
  timer: NodeJS.Timeout;
  expression: string;
}

interface WorkerHandle {
  child: ChildProcessWithoutNullStreams;
  exited: boolean;
}

export function defaultWorkerCommand(): { command: string; args: string[]; cwd: string } {
  const here = fileURLToPath(import.meta.url);
  const ext = path.extname(here);
  const worker = path.join(path.dirname(here), `worker${ext}`);
  // Sources run through the tsx loader; built output runs directly
  const args = ext === '.ts' ? ['--import', 'tsx', worker] : [worker];
  return { command: process.execPath, args, cwd: path.dirname(worker) };
}

export class EvaluatorBridge implements ExpressionEvaluator {
  private readonly command: string;
  private readonly args: string[];
  private readonly cwd: string;
  private readonly workerTimeoutMs: number;
  private readonly callTimeoutMs: number;
  private readonly startTimeoutMs: number;
  private readonly maxRestarts: number;
  private readonly logger: Logger;

  private worker?: WorkerHandle;
  private starting?: Promise<WorkerHandle>;
  private readonly pending = new Map<number, PendingCall>();
  private nextId = 1;
  private starts = 0;
  private unavailable?: BridgeUnavailable;
  private closed = false;

  constructor(options: BridgeOptions = {}) {
    const fallback = defaultWorkerCommand();
    this.command = options.command ?? fallback.command;
    this.args = options.args ?? (options.command ? [] : fallback.args);
    this.cwd = options.cwd ?? fallback.cwd;
    this.workerTimeoutMs = options.workerTimeoutMs ?? 5000;
    this.callTimeoutMs = options.callTimeoutMs ?? 10000;
    this.startTimeoutMs = options.startTimeoutMs ?? 10000;
    this.maxRestarts = options.maxRestarts ?? 3;
    this.logger = options.logger ?? silentLogger;
  }

  /** Restarts consumed so far (the first start is not one). */
  get restarts(): number {
    return Math.max(0, this.starts - 1);
  }

  get inflight(): number {
    return this.pending.size;
  }

  /**
   * Evaluate one expression. Expression failures resolve as Err; only an
   * exhausted restart budget rejects (BridgeUnavailable).
   */
  async evaluate(expression: string, bindings: JsonObject): Promise<Result<JsonValue, EvaluationError>> {
    const handle = await this.ensureWorker();
    const id = this.nextId++;

    const reply = new Promise<Result<JsonValue, EvaluationError>>((resolve) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        resolve(err(this.failure(WORKER_TIMEOUT_MESSAGE, expression, ErrorCode.EVALUATION_TIMEOUT)));
        this.logger.warn('evaluator missed the caller deadline; restarting worker', {
          deadlineMs: this.callTimeoutMs,
        });
        this.kill(handle);
      }, this.callTimeoutMs);
      this.pending.set(id, { resolve, timer, expression });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        handle.child.stdin.write(encodeMessage({ id, expression, bindings }), (error) =>
          error ? reject(error) : resolve()
        );
      });
    } catch (error) {
      this.settle(id, err(this.failure(`evaluator write failed: ${describeError(error)}`, expression)));
    }
    return reply;
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const id of [...this.pending.keys()]) {
      const call = this.pending.get(id);
      if (call) this.settle(id, err(this.failure('evaluator closed', call.expression)));
    }
    const handle = this.worker ?? (await this.starting?.catch(() => undefined));
    this.worker = undefined;
    if (!handle || handle.exited) return;
    await new Promise<void>((resolve) => {
      handle.child.once('exit', () => resolve());
      handle.child.stdin.end();
      // A worker that ignores EOF is stopped forcibly
      setTimeout(() => this.kill(handle), 1000).unref();
    });
  }

  private failure(message: string, expression: string, errorCode?: ErrorCode): EvaluationError {
    return new EvaluationError({ message, errorCode, context: { expression } });
  }

  private settle(id: number, result: Result<JsonValue, EvaluationError>): void {
    const call = this.pending.get(id);
    if (!call) return;
    clearTimeout(call.timer);
    this.pending.delete(id);
    call.resolve(result);
  }

  private kill(handle: WorkerHandle): void {
    if (!handle.exited) handle.child.kill('SIGKILL');
  }

  private async ensureWorker(): Promise<WorkerHandle> {
    if (this.unavailable) throw this.unavailable;
    if (this.closed) {
      throw new BridgeUnavailable({ message: 'Expression evaluator has been closed' });
    }
    if (this.worker && !this.worker.exited) return this.worker;
    if (!this.starting) {
      this.starting = this.startWorker().finally(() => {
        this.starting = undefined;
      });
    }
    return this.starting;
  }

  private async startWorker(): Promise<WorkerHandle> {
    for (;;) {
      if (this.starts > this.maxRestarts) {
        this.unavailable = new BridgeUnavailable({
          message: `Expression evaluator worker failed ${this.starts} times; giving up`,
          context: { restarts: this.restarts },
        });
        throw this.unavailable;
      }
      this.starts++;
      if (this.starts > 1) this.logger.warn(`restarting evaluator worker (${this.restarts}/${this.maxRestarts})`);
      try {
        const handle = await this.spawnWorker();
        this.worker = handle;
        return handle;
      } catch (error) {
        this.logger.warn(`evaluator worker failed to start: ${describeError(error)}`);
      }
    }
  }

  private spawnWorker(): Promise<WorkerHandle> {
    const child = spawn(this.command, this.args, {
      cwd: this.cwd,
      env: { ...process.env, DIFFPROBE_EVAL_DEADLINE_MS: String(this.workerTimeoutMs) },
    });
    const handle: WorkerHandle = { child, exited: false };
    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    const stderr = createInterface({ input: child.stderr, crlfDelay: Infinity });
    stderr.on('line', (line) => this.logger.debug(`worker: ${line}`));
    // EPIPE after the worker died; the exit handler settles the calls
    child.stdin.on('error', (error) => this.logger.debug(`worker stdin: ${error.message}`));

    return new Promise<WorkerHandle>((resolve, reject) => {
      let ready = false;
      const startTimer = setTimeout(() => {
        reject(new Error(`no ready signal within ${this.startTimeoutMs}ms`));
        this.kill(handle);
      }, this.startTimeoutMs);

      lines.on('line', (line) => {
        const message = parseReply(line);
        if (!message) return;
        if ('ready' in message) {
          if (!ready) {
            ready = true;
            clearTimeout(startTimer);
            resolve(handle);
          }
          return;
        }
        this.settle(
          message.id,
          message.ok
            ? ok(message.result)
            : err(this.failure(message.error, this.pending.get(message.id)?.expression ?? '', timeoutCode(message.error)))
        );
      });

      child.on('error', (error) => {
        clearTimeout(startTimer);
        reject(error);
      });

      child.on('exit', (code, signal) => {
        handle.exited = true;
        clearTimeout(startTimer);
        if (!ready) reject(new Error(`worker exited before ready (code ${code ?? signal ?? 'unknown'})`));
        if (this.worker === handle) this.worker = undefined;
        // In-flight calls belong to this worker; nobody else will answer them
        for (const [id, call] of [...this.pending]) {
          this.settle(id, err(this.failure(`evaluator worker exited (code ${code ?? signal ?? 'unknown'})`, call.expression)));
        }
      });
    });
  }
}

function timeoutCode(message: string): ErrorCode | undefined {
  return message === WORKER_TIMEOUT_MESSAGE ? ErrorCode.EVALUATION_TIMEOUT : undefined;
}
