/* eslint-disable max-lines-per-function */
/* eslint-disable complexity */
/**
 * Explore run: preflight both targets, generate single-step cases for every
 * operation and chains over the link graph, execute and compare each, bundle
 * every divergence and write `summary.json`.
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { ApiSpecModel, ChainCase } from '../types/model.js';
import { ConfigError, isDiffProbeError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import { CaseGenerator, type GenerationMode } from '../generator/case-generator.js';
import { ChainExplorer } from '../chain/chain-explorer.js';
import { ChainRunner, type ChainRunResult } from '../chain/chain-runner.js';
import { Comparator } from '../comparator/comparator.js';
import { warnUnknownOperations, type RuleSet } from '../comparator/rules.js';
import { EvaluatorBridge, type ExpressionEvaluator } from '../evaluator/bridge.js';
import { DualExecutor } from '../executor/dual-executor.js';
import { preflight, type FetchLike, type HttpTarget } from '../executor/http-client.js';
import { RateLimiter } from '../executor/rate-limiter.js';
import { BundleWriter, writeJsonAtomic } from '../bundle/bundle-writer.js';
import type { RuntimeConfig, TargetConfig } from '../config/runtime-config.js';
import { runWithConcurrency } from '../util/pool.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { TOOL_VERSION } from '../version.js';

export const SUMMARY_FILE = 'summary.json';

export interface ExploreOptions {
  model: ApiSpecModel;
  specPath?: string;
  config: RuntimeConfig;
  targetA: TargetConfig;
  targetB: TargetConfig;
  rules: RuleSet;
  outDir: string;
  seed?: number;
  /** Single-step cases per operation */
  maxCases?: number;
  maxChains?: number;
  maxDepth?: number;
  perSequence?: number;
  exclude?: readonly string[];
  concurrency?: number;
  mode?: GenerationMode;
  preflight?: boolean;
  /** Defaults to a worker-process bridge configured from `config.evaluator` */
  evaluator?: ExpressionEvaluator;
  fetchImpl?: FetchLike;
  logger?: Logger;
  now?: () => Date;
}

export interface ExploreSummary {
  toolVersion: string;
  seed: number;
  cases: number;
  chains: number;
  matches: number;
  mismatches: number;
  /** Runs where both targets failed at transport level */
  errors: number;
  /** Chains stopped because a link parameter could not be resolved */
  degraded: number;
  /** Chains stopped before their last planned step */
  truncated: number;
  generationFailures: number;
  bundles: string[];
  byOperation: Record<string, { runs: number; mismatches: number }>;
}

export const EXPLORE_DEFAULTS = {
  seed: 1,
  maxCases: 10,
  maxChains: 20,
  maxDepth: 3,
  perSequence: 1,
  concurrency: 4,
} as const;

type Task = { kind: 'case' | 'chain'; chain: ChainCase };

function httpTarget(target: TargetConfig): HttpTarget {
  return { name: target.name, baseUrl: target.baseUrl, headers: target.headers };
}

export async function runExplore(options: ExploreOptions): Promise<ExploreSummary> {
  const logger = options.logger ?? silentLogger;
  const seed = options.seed ?? EXPLORE_DEFAULTS.seed;
  const maxCases = options.maxCases ?? EXPLORE_DEFAULTS.maxCases;
  const maxChains = options.maxChains ?? EXPLORE_DEFAULTS.maxChains;
  const maxDepth = options.maxDepth ?? EXPLORE_DEFAULTS.maxDepth;
  const exclude = new Set(options.exclude ?? []);
  const { config, model } = options;

  for (const id of exclude) {
    if (!model.operations.some((op) => op.operationId === id)) {
      logger.warn(`--exclude names unknown operationId '${id}'`);
    }
  }
  warnUnknownOperations(options.rules, model.operations.map((op) => op.operationId), logger);

  const targetA = httpTarget(options.targetA);
  const targetB = httpTarget(options.targetB);
  if (options.preflight ?? true) {
    for (const target of [targetA, targetB]) {
      const reachable = await preflight(target, { timeoutMs: config.defaultTimeoutMs, fetchImpl: options.fetchImpl });
      if (reachable.isErr()) {
        throw new ConfigError({
          message: reachable.error.message,
          errorCode: ErrorCode.TARGET_UNREACHABLE,
          context: { setting: 'targets', target: target.name },
        });
      }
    }
  }

  const executor = new DualExecutor({
    targetA,
    targetB,
    timeoutMs: config.defaultTimeoutMs,
    operationTimeouts: config.operationTimeoutsMs,
    rateLimiter: config.requestsPerSecond ? new RateLimiter(config.requestsPerSecond) : undefined,
    fetchImpl: options.fetchImpl,
    logger: logger.child('exec'),
  });
  const evaluator =
    options.evaluator ??
    new EvaluatorBridge({
      workerTimeoutMs: config.evaluator.workerTimeoutMs,
      callTimeoutMs: config.evaluator.callTimeoutMs,
      maxRestarts: config.evaluator.maxRestarts,
      logger: logger.child('eval'),
    });
  const runner = new ChainRunner(executor, new Comparator(evaluator), options.rules, {
    operations: model.operations,
    sourceOfTruth: config.sourceOfTruth,
    logger,
  });
  const writer = new BundleWriter({
    outDir: options.outDir,
    targetA: { name: targetA.name, baseUrl: targetA.baseUrl },
    targetB: { name: targetB.name, baseUrl: targetB.baseUrl },
    seed,
    specPath: options.specPath,
    rulesPath: options.rules.source,
    redactFields: config.redactFields,
    now: options.now,
    logger,
  });

  const generator = new CaseGenerator(model, { seed, logger: logger.child('gen') });
  const explorer = new ChainExplorer(model, generator, {
    seed,
    perSequence: options.perSequence ?? EXPLORE_DEFAULTS.perSequence,
    exclude,
    logger,
  });
  const mode = options.mode ?? 'POSITIVE';

  const summary: ExploreSummary = {
    toolVersion: TOOL_VERSION,
    seed,
    cases: 0,
    chains: 0,
    matches: 0,
    mismatches: 0,
    errors: 0,
    degraded: 0,
    truncated: 0,
    generationFailures: 0,
    bundles: [],
    byOperation: {},
  };

  function* tasks(): Generator<Task> {
    for (const operation of model.operations) {
      if (exclude.has(operation.operationId)) continue;
      try {
        for (const request of generator.generate(operation, maxCases, mode)) {
          yield {
            kind: 'case',
            chain: {
              chainId: request.caseId,
              sequenceKey: request.operationId,
              steps: [{ stepIndex: 0, operationId: request.operationId, request }],
            },
          };
        }
      } catch (error) {
        if (!isDiffProbeError(error)) throw error;
        summary.generationFailures++;
        logger.warn(`${operation.operationId}: ${error.message}`);
      }
    }
    for (const chain of explorer.explore(maxDepth, maxChains)) yield { kind: 'chain', chain };
  }

  const record = async (task: Task, run: ChainRunResult): Promise<void> => {
    if (task.kind === 'case') summary.cases++;
    else summary.chains++;
    const lastStep = task.chain.steps.length - 1;
    if (run.haltedAt !== undefined && run.haltedAt < lastStep) summary.truncated++;
    const opId = task.chain.steps[run.haltedAt ?? lastStep]?.operationId ?? task.chain.sequenceKey;
    const stats = (summary.byOperation[opId] ??= { runs: 0, mismatches: 0 });
    stats.runs++;

    switch (run.outcome) {
      case 'match':
        summary.matches++;
        return;
      case 'error':
        summary.errors++;
        return;
      case 'degraded':
        summary.degraded++;
        return;
      case 'mismatch': {
        summary.mismatches++;
        stats.mismatches++;
        const dir = await writer.write(run, { type: task.kind });
        summary.bundles.push(path.relative(options.outDir, dir));
        logger.info(`mismatch in ${task.chain.sequenceKey}`, { bundle: path.basename(dir) });
      }
    }
  };

  await mkdir(options.outDir, { recursive: true });
  try {
    await runWithConcurrency(tasks(), options.concurrency ?? EXPLORE_DEFAULTS.concurrency, async (task) => {
      await record(task, await runner.runChain(task.chain));
    });
  } finally {
    if (!options.evaluator) await evaluator.close();
  }

  summary.bundles.sort();
  await writeJsonAtomic(path.join(options.outDir, SUMMARY_FILE), summary);
  logger.info(
    `explored ${summary.cases} cases and ${summary.chains} chains: ${summary.mismatches} mismatches, ${summary.errors} errors`
  );
  return summary;
}
