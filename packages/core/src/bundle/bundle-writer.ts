import { mkdir, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ChainRunResult } from '../chain/chain-runner.js';
import type { Mismatch, ReplayClassification } from '../types/model.js';
import { BundleWriteError, describeError } from '../types/errors.js';
import { shortHash } from '../util/stable-hash.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { TOOL_VERSION } from '../version.js';
import {
  CASE_FILE,
  CHAIN_FILE,
  DIFF_FILE,
  METADATA_FILE,
  MISMATCHES_DIR,
  TARGET_A_FILE,
  TARGET_B_FILE,
  type BundleMetadata,
  type BundleType,
  type ChainDescriptor,
  type DiffRecord,
  type TargetInfo,
  type TargetRecord,
} from './format.js';
import { Redactor } from './redact.js';

const MAX_SEGMENT = 50;

/** `[A-Za-z0-9_.-]` only, runs of `_` collapsed, at most 50 characters. */
export function sanitizeSegment(name: string): string {
  const cleaned = name.replace(/[^A-Za-z0-9_.-]/g, '_').replace(/_+/g, '_').slice(0, MAX_SEGMENT);
  return cleaned === '' ? 'unnamed' : cleaned;
}

/** 2026-03-01T12:30:05.123Z -> 20260301T123005 */
export function compactTimestamp(date: Date): string {
  return date.toISOString().replace(/[-:]/g, '').replace(/\.\d+Z$/, '');
}

/**
 * Identifies a failure independently of the values involved: the operation
 * sequence plus the sorted classification patterns that failed.
 */
export function reproductionKey(sequenceKey: string, mismatches: readonly Mismatch[]): string {
  const patterns = [...new Set(mismatches.map((m) => `${m.kind}:${m.pattern}`))].sort();
  return `${sequenceKey}|${patterns.join(',')}`;
}

export interface BundleWriterOptions {
  outDir: string;
  targetA: TargetInfo;
  targetB: TargetInfo;
  seed?: number;
  specPath?: string;
  rulesPath?: string;
  redactFields?: readonly string[];
  now?: () => Date;
  logger?: Logger;
}

export interface WriteOptions {
  type: BundleType;
  replay?: { classification: ReplayClassification; sourceBundle: string };
}

export class BundleWriter {
  readonly mismatchesDir: string;
  private readonly redactor: Redactor;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly options: BundleWriterOptions) {
    this.mismatchesDir = path.join(options.outDir, MISMATCHES_DIR);
    this.redactor = new Redactor(options.redactFields);
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? silentLogger;
  }

  /** Persist one run; returns the bundle directory. */
  async write(run: ChainRunResult, opts: WriteOptions): Promise<string> {
    const executedCount = run.executed.length;
    const halting = run.executed.find((s) => s.stepIndex === run.haltedAt);
    const mismatches = halting?.comparison.mismatches ?? [];
    const key = reproductionKey(run.chain.sequenceKey, mismatches);
    const date = this.now();

    const firstOp = run.chain.steps[0]?.operationId ?? 'unknown';
    const label = opts.type === 'chain' ? `chain__${sanitizeSegment(firstOp)}` : sanitizeSegment(firstOp);
    const dir = await this.createDirectory(`${compactTimestamp(date)}__${label}__${shortHash(key, 8)}`);

    const descriptor: ChainDescriptor = {
      chainId: run.chain.chainId,
      sequenceKey: run.chain.sequenceKey,
      steps: run.chain.steps.slice(0, Math.max(1, executedCount)).map((step) => ({
        ...step,
        request: this.redactor.request(step.request),
      })),
    };
    const recordFor = (side: 0 | 1, target: TargetInfo): TargetRecord => ({
      target,
      steps: run.executed.map((step) => ({
        stepIndex: step.stepIndex,
        operationId: step.operationId,
        request: this.redactor.request(step.request),
        response: this.redactor.response(step.results[side]),
      })),
    });
    const diff: DiffRecord = {
      type: opts.type,
      reproductionKey: key,
      match: run.outcome === 'match',
      outcome: run.outcome,
      totalSteps: run.chain.steps.length,
      mismatches: mismatches.map((m) => this.redactor.mismatch(m)),
      steps: run.executed.map((step) => ({
        stepIndex: step.stepIndex,
        comparison: this.redactor.comparison(step.comparison),
      })),
    };
    if (run.haltedAt !== undefined) diff.haltedAt = run.haltedAt;
    if (opts.replay) diff.replay = opts.replay;

    const metadata: BundleMetadata = {
      toolVersion: TOOL_VERSION,
      timestamp: date.toISOString(),
      targetA: this.options.targetA,
      targetB: this.options.targetB,
    };
    if (this.options.seed !== undefined) metadata.seed = this.options.seed;
    if (this.options.specPath !== undefined) metadata.specPath = this.options.specPath;
    if (this.options.rulesPath !== undefined) metadata.rulesPath = this.options.rulesPath;

    const firstStep = descriptor.steps[0];
    if (opts.type === 'case' && firstStep) await writeJsonAtomic(path.join(dir, CASE_FILE), firstStep.request);
    else await writeJsonAtomic(path.join(dir, CHAIN_FILE), descriptor);
    await writeJsonAtomic(path.join(dir, TARGET_A_FILE), recordFor(0, this.options.targetA));
    await writeJsonAtomic(path.join(dir, TARGET_B_FILE), recordFor(1, this.options.targetB));
    await writeJsonAtomic(path.join(dir, DIFF_FILE), diff);
    await writeJsonAtomic(path.join(dir, METADATA_FILE), metadata);

    this.logger.debug(`bundle written: ${dir}`);
    return dir;
  }

  private async createDirectory(name: string): Promise<string> {
    try {
      await mkdir(this.mismatchesDir, { recursive: true });
    } catch (error) {
      throw writeFailure(this.mismatchesDir, error);
    }
    for (let attempt = 1; ; attempt++) {
      const dir = path.join(this.mismatchesDir, attempt === 1 ? name : `${name}-${attempt}`);
      try {
        await mkdir(dir);
        return dir;
      } catch (error) {
        if (!isExists(error) || attempt >= 100) throw writeFailure(dir, error);
      }
    }
  }
}

function isExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

function writeFailure(directory: string, error: unknown): BundleWriteError {
  return new BundleWriteError({
    message: `Cannot write bundle at ${directory}: ${describeError(error)}`,
    context: { directory },
    cause: error instanceof Error ? error : undefined,
  });
}

/** Write `<file>.tmp`, then rename over the final name. */
export async function writeJsonAtomic(file: string, data: unknown): Promise<void> {
  const tmp = `${file}.tmp`;
  try {
    await writeFile(tmp, `${JSON.stringify(data, null, 2)}\n`, 'utf8');
    await rename(tmp, file);
  } catch (error) {
    throw writeFailure(path.dirname(file), error);
  }
}
