import path from 'node:path';
import type { Command } from 'commander';
import {
  BundleWriter,
  ChainRunner,
  Comparator,
  DualExecutor,
  EvaluatorBridge,
  REPLAY_SUMMARY_FILE,
  RateLimiter,
  createLogger,
  levelFromEnv,
  loadBundles,
  replayAll,
  type ReplaySummary,
} from '@diffprobe/core';
import { collect, positiveSeconds, resolveLogLevel, type OutputStreams, type VerbosityFlags } from '../flags.js';
import { renderReplaySummary, shouldUseColors } from '../render.js';
import { loadRunContext, type CommandDeps, type TargetFlags } from './context.js';

export interface ReplayFlags extends TargetFlags, VerbosityFlags {
  in: string;
  out: string;
}

export async function replayCommand(flags: ReplayFlags, deps: CommandDeps = {}): Promise<ReplaySummary> {
  const io: OutputStreams = deps.io ?? process;
  const env = deps.env ?? process.env;
  const logger = createLogger({ level: resolveLogLevel(flags, levelFromEnv(env)), sink: io.stderr });

  const loaded = await loadBundles(flags.in, logger);
  if (loaded.isErr()) throw loaded.error;
  const { bundles, skipped } = loaded.value;
  logger.info(`replaying ${bundles.length} bundles from ${loaded.value.root}`);

  const { config, targetA, targetB, rules } = await loadRunContext(flags, logger, env);
  const executor = new DualExecutor({
    targetA,
    targetB,
    timeoutMs: config.defaultTimeoutMs,
    operationTimeouts: config.operationTimeoutsMs,
    rateLimiter: config.requestsPerSecond ? new RateLimiter(config.requestsPerSecond) : undefined,
    fetchImpl: deps.fetchImpl,
    logger: logger.child('exec'),
  });
  const evaluator =
    deps.evaluator ??
    new EvaluatorBridge({
      workerTimeoutMs: config.evaluator.workerTimeoutMs,
      callTimeoutMs: config.evaluator.callTimeoutMs,
      maxRestarts: config.evaluator.maxRestarts,
      logger: logger.child('eval'),
    });
  const runner = new ChainRunner(executor, new Comparator(evaluator), rules, {
    sourceOfTruth: config.sourceOfTruth,
    logger,
  });
  const writer = new BundleWriter({
    outDir: flags.out,
    targetA: { name: targetA.name, baseUrl: targetA.baseUrl },
    targetB: { name: targetB.name, baseUrl: targetB.baseUrl },
    rulesPath: rules.source,
    redactFields: config.redactFields,
    logger,
  });

  let summary: ReplaySummary;
  try {
    summary = await replayAll(bundles, skipped, flags.out, { runner, writer, logger });
  } finally {
    if (!deps.evaluator) await evaluator.close();
  }

  io.stdout.write(`${renderReplaySummary(summary, deps.io === undefined && shouldUseColors(env))}\n`);
  io.stdout.write(`summary: ${path.join(flags.out, REPLAY_SUMMARY_FILE)}\n`);
  return summary;
}

export function registerReplayCommand(program: Command): void {
  program
    .command('replay')
    .description('Re-run stored bundles and classify each as FIXED, PERSISTENT, DIFFERENT or ERROR')
    .requiredOption('--in <dir>', 'Directory holding bundles (or an explore output directory)')
    .option('--out <dir>', 'Output directory for fresh bundles and replay_summary.json', 'diffprobe-replay')
    .option('--config <file>', 'Runtime configuration (YAML)')
    .option('--target-a <name|url>', 'Target A: configured name or base URL')
    .option('--target-b <name|url>', 'Target B: configured name or base URL')
    .option('--timeout <seconds>', 'Per-request timeout', positiveSeconds)
    .option('--operation-timeout <op:seconds>', 'Per-operation timeout (repeatable)', collect, [])
    .option('-v, --verbose', 'Debug logging on stderr')
    .option('-q, --quiet', 'Errors only on stderr')
    .action(async (opts: ReplayFlags) => {
      await replayCommand(opts);
    });
}
