import path from 'node:path';
import type { Command } from 'commander';
import {
  EXPLORE_DEFAULTS,
  SUMMARY_FILE,
  createLogger,
  levelFromEnv,
  loadSpecFile,
  runExplore,
  type ExploreSummary,
} from '@diffprobe/core';
import {
  collect,
  integerAtLeast,
  positiveSeconds,
  resolveLogLevel,
  type OutputStreams,
  type VerbosityFlags,
} from '../flags.js';
import { renderExploreSummary, shouldUseColors } from '../render.js';
import { loadRunContext, type CommandDeps, type TargetFlags } from './context.js';

export interface ExploreFlags extends TargetFlags, VerbosityFlags {
  spec: string;
  out: string;
  seed: number;
  maxCases: number;
  maxChains: number;
  maxDepth: number;
  perSequence: number;
  exclude: string[];
  concurrency: number;
  preflight: boolean;
}

export async function exploreCommand(flags: ExploreFlags, deps: CommandDeps = {}): Promise<ExploreSummary> {
  const io: OutputStreams = deps.io ?? process;
  const env = deps.env ?? process.env;
  const logger = createLogger({ level: resolveLogLevel(flags, levelFromEnv(env)), sink: io.stderr });

  const context = await loadRunContext(flags, logger, env);
  const specPath = path.resolve(flags.spec);
  const model = await loadSpecFile(specPath);
  logger.info(`loaded ${model.operations.length} operations from ${path.basename(specPath)}`);

  const summary = await runExplore({
    model,
    specPath,
    ...context,
    outDir: flags.out,
    seed: flags.seed,
    maxCases: flags.maxCases,
    maxChains: flags.maxChains,
    maxDepth: flags.maxDepth,
    perSequence: flags.perSequence,
    exclude: flags.exclude,
    concurrency: flags.concurrency,
    preflight: flags.preflight,
    fetchImpl: deps.fetchImpl,
    evaluator: deps.evaluator,
    logger,
  });

  io.stdout.write(`${renderExploreSummary(summary, deps.io === undefined && shouldUseColors(env))}\n`);
  io.stdout.write(`summary: ${path.join(flags.out, SUMMARY_FILE)}\n`);
  return summary;
}

export function registerExploreCommand(program: Command): void {
  program
    .command('explore')
    .description('Generate cases and link chains, run them against both targets and bundle every divergence')
    .requiredOption('--spec <file>', 'OpenAPI 3.x document (YAML or JSON)')
    .option('--config <file>', 'Runtime configuration (YAML)')
    .option('--target-a <name|url>', 'Target A: configured name or base URL')
    .option('--target-b <name|url>', 'Target B: configured name or base URL')
    .option('--out <dir>', 'Output directory', 'diffprobe-out')
    .option('--seed <number>', 'Deterministic seed', integerAtLeast(0), EXPLORE_DEFAULTS.seed)
    .option('--max-cases <number>', 'Single-step cases per operation', integerAtLeast(0), EXPLORE_DEFAULTS.maxCases)
    .option('--max-chains <number>', 'Upper bound on generated chains', integerAtLeast(0), EXPLORE_DEFAULTS.maxChains)
    .option('--max-depth <number>', 'Longest chain, in steps', integerAtLeast(1), EXPLORE_DEFAULTS.maxDepth)
    .option('--per-sequence <number>', 'Chains per operation sequence', integerAtLeast(1), EXPLORE_DEFAULTS.perSequence)
    .option('--exclude <operationId>', 'Skip an operation (repeatable)', collect, [])
    .option('--timeout <seconds>', 'Per-request timeout', positiveSeconds)
    .option('--operation-timeout <op:seconds>', 'Per-operation timeout (repeatable)', collect, [])
    .option('--concurrency <number>', 'Cases and chains run at once', integerAtLeast(1), EXPLORE_DEFAULTS.concurrency)
    .option('--no-preflight', 'Skip the reachability check of both targets')
    .option('-v, --verbose', 'Debug logging on stderr')
    .option('-q, --quiet', 'Errors only on stderr')
    .action(async (opts: ExploreFlags) => {
      await exploreCommand(opts);
    });
}
