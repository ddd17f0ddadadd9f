import type { RequestCase, StepResult } from '../types/model.js';
import { describeError } from '../types/errors.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { executeRequest, type FetchLike, type HttpTarget } from './http-client.js';
import type { RateLimiter } from './rate-limiter.js';

export interface DualExecutorOptions {
  targetA: HttpTarget;
  targetB: HttpTarget;
  /** Default per-request deadline */
  timeoutMs: number;
  /** operationId -> deadline, overriding the default */
  operationTimeouts?: Readonly<Record<string, number>>;
  rateLimiter?: RateLimiter;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export type StepPair = [a: StepResult, b: StepResult];

/**
 * Runs one request against both targets concurrently, each under its own
 * deadline. Always resolves with two results.
 */
export class DualExecutor {
  private readonly logger: Logger;

  constructor(private readonly options: DualExecutorOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  get targetA(): HttpTarget {
    return this.options.targetA;
  }

  get targetB(): HttpTarget {
    return this.options.targetB;
  }

  timeoutFor(operationId: string): number {
    return this.options.operationTimeouts?.[operationId] ?? this.options.timeoutMs;
  }

  async runStep(request: RequestCase): Promise<StepPair> {
    const timeoutMs = this.timeoutFor(request.operationId);
    const [a, b] = await Promise.all([
      this.runOne(this.options.targetA, request, timeoutMs),
      this.runOne(this.options.targetB, request, timeoutMs),
    ]);
    this.logger.debug(`${request.operationId} ${request.caseId}`, {
      a: a.statusCode ?? a.error?.kind,
      b: b.statusCode ?? b.error?.kind,
    });
    return [a, b];
  }

  private async runOne(target: HttpTarget, request: RequestCase, timeoutMs: number): Promise<StepResult> {
    try {
      await this.options.rateLimiter?.acquire();
      return await executeRequest(target, request, { timeoutMs, fetchImpl: this.options.fetchImpl });
    } catch (error) {
      return {
        statusCode: null,
        headers: {},
        bodyKind: 'empty',
        elapsedMs: 0,
        error: { kind: 'transport', message: describeError(error) },
      };
    }
  }
}

/** Single-shot form of DualExecutor.runStep. */
export function runStep(
  request: RequestCase,
  targetA: HttpTarget,
  targetB: HttpTarget,
  timeoutMs: number
): Promise<StepPair> {
  return new DualExecutor({ targetA, targetB, timeoutMs }).runStep(request);
}
