import {
  defaultRuntimeConfig,
  emptyRuleSet,
  loadRules,
  loadRuntimeConfig,
  resolveTarget,
  type ExpressionEvaluator,
  type FetchLike,
  type Logger,
  type RuleSet,
  type RuntimeConfig,
  type TargetConfig,
} from '@diffprobe/core';
import { applyTimeoutFlags, type OutputStreams, type TimeoutFlags } from '../flags.js';

export interface TargetFlags extends TimeoutFlags {
  config?: string;
  targetA?: string;
  targetB?: string;
}

/** Seams for tests; each defaults to the real process. */
export interface CommandDeps {
  io?: OutputStreams;
  env?: NodeJS.ProcessEnv;
  fetchImpl?: FetchLike;
  evaluator?: ExpressionEvaluator;
}

export interface RunContext {
  config: RuntimeConfig;
  targetA: TargetConfig;
  targetB: TargetConfig;
  rules: RuleSet;
}

/** Configuration file, command-line overrides, both targets and the rule set. */
export async function loadRunContext(
  flags: TargetFlags,
  logger: Logger,
  env: NodeJS.ProcessEnv = process.env
): Promise<RunContext> {
  const loaded = flags.config ? await loadRuntimeConfig(flags.config, env) : defaultRuntimeConfig();
  const config = applyTimeoutFlags(loaded, flags);
  const targetA = resolveTarget(config, flags.targetA, 'a');
  const targetB = resolveTarget(config, flags.targetB, 'b');
  const rules = config.comparisonRules ? await loadRules(config.comparisonRules) : emptyRuleSet();
  logger.debug(`targets: ${targetA.name}=${targetA.baseUrl} ${targetB.name}=${targetB.baseUrl}`, {
    rules: rules.source ?? 'none',
  });
  return { config, targetA, targetB, rules };
}
