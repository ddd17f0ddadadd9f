/**
 * Re-run stored bundles against the current targets and rules.
 *
 * Classification compares failure classes, never values: a class is
 * `stepIndex|kind|pattern` of a mismatch at the halting step.
 *   ERROR       a target failed at transport level, a link could not be
 *               resolved, or the run could not start
 *   FIXED       the fresh run has no mismatch
 *   PERSISTENT  the same classes fail again
 *   DIFFERENT   anything else
 * Every replayed bundle is captured afresh in the output directory.
 */

import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import type { Mismatch, ReplayClassification } from '../types/model.js';
import { BridgeUnavailable, describeError, type BundleCorruption } from '../types/errors.js';
import { hasTransportError, type ChainRunner, type ChainRunResult } from '../chain/chain-runner.js';
import { writeJsonAtomic, type BundleWriter } from '../bundle/bundle-writer.js';
import type { LoadedBundle } from '../bundle/bundle-loader.js';
import { silentLogger, type Logger } from '../util/logger.js';

export const REPLAY_SUMMARY_FILE = 'replay_summary.json';

export function failureClasses(mismatches: readonly Mismatch[], stepIndex: number): Set<string> {
  return new Set(mismatches.map((m) => `${stepIndex}|${m.kind}|${m.pattern}`));
}

function haltingMismatches(run: ChainRunResult): { stepIndex: number; mismatches: Mismatch[] } {
  const step = run.executed.find((s) => s.stepIndex === run.haltedAt);
  return { stepIndex: run.haltedAt ?? 0, mismatches: step?.comparison.mismatches ?? [] };
}

export function classify(bundle: LoadedBundle, run: ChainRunResult): ReplayClassification {
  if (run.outcome === 'error' || run.outcome === 'degraded' || run.executed.some((step) => hasTransportError(step.results))) return 'ERROR';
  const fresh = haltingMismatches(run);
  if (fresh.mismatches.length === 0) return 'FIXED';
  const before = failureClasses(bundle.mismatches, bundle.diff.haltedAt ?? 0);
  const after = failureClasses(fresh.mismatches, fresh.stepIndex);
  const same = before.size === after.size && [...before].every((c) => after.has(c));
  return same ? 'PERSISTENT' : 'DIFFERENT';
}

export interface ReplayOutcome {
  bundle: string;
  classification: ReplayClassification;
  /** Fresh bundle directory */
  output?: string;
  error?: string;
}

export interface ReplaySummary {
  total: number;
  counts: Record<ReplayClassification, number>;
  bundles: Record<ReplayClassification, string[]>;
  skipped: Array<{ directory: string; reason: string }>;
  results: ReplayOutcome[];
}

export interface ReplayOptions {
  runner: ChainRunner;
  writer: BundleWriter;
  logger?: Logger;
}

export async function replayBundle(bundle: LoadedBundle, options: ReplayOptions): Promise<ReplayOutcome> {
  let run: ChainRunResult;
  try {
    run = await options.runner.runChain(bundle.chain);
  } catch (error) {
    if (error instanceof BridgeUnavailable) throw error;
    return { bundle: bundle.name, classification: 'ERROR', error: describeError(error) };
  }
  const classification = classify(bundle, run);
  const output = await options.writer.write(run, {
    type: bundle.type,
    replay: { classification, sourceBundle: bundle.name },
  });
  return { bundle: bundle.name, classification, output };
}

/** Replay bundles one by one, then write `replay_summary.json` to `outDir`. */
export async function replayAll(
  bundles: readonly LoadedBundle[],
  skipped: readonly BundleCorruption[],
  outDir: string,
  options: ReplayOptions
): Promise<ReplaySummary> {
  const logger = options.logger ?? silentLogger;
  const summary: ReplaySummary = {
    total: bundles.length,
    counts: { FIXED: 0, PERSISTENT: 0, DIFFERENT: 0, ERROR: 0 },
    bundles: { FIXED: [], PERSISTENT: [], DIFFERENT: [], ERROR: [] },
    skipped: skipped.map((s) => ({ directory: s.directory ?? '', reason: s.message })),
    results: [],
  };
  for (const bundle of bundles) {
    const outcome = await replayBundle(bundle, options);
    logger.info(`${bundle.name}: ${outcome.classification}`);
    summary.counts[outcome.classification]++;
    summary.bundles[outcome.classification].push(bundle.name);
    summary.results.push(outcome);
  }
  await mkdir(outDir, { recursive: true });
  await writeJsonAtomic(path.join(outDir, REPLAY_SUMMARY_FILE), summary);
  return summary;
}
