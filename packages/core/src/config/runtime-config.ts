/**
 * Runtime configuration: targets, rules file, timeouts, redaction and
 * evaluator limits, read from YAML (or JSON) and validated with AJV.
 *
 * `${NAME}` inside any string value is replaced from the environment before
 * validation; an unset variable is a configuration error.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';

import configSchema from '../schemas/runtime-config.schema.json' with { type: 'json' };

import { createTypedValidator } from '../ajv/factory.js';
import { ErrorCode } from '../errors/codes.js';
import { ConfigError, describeError } from '../types/errors.js';
import type { SourceOfTruth } from '../chain/chain-runner.js';

interface RawTarget {
  base_url: string;
  headers?: Record<string, string>;
}

interface RawRuntimeConfig {
  targets: Record<string, RawTarget>;
  target_a?: string;
  target_b?: string;
  comparison_rules?: string;
  source_of_truth?: SourceOfTruth;
  rate_limit?: { requests_per_second?: number };
  secrets?: { redact_fields?: string[] };
  timeouts?: { default?: number; operations?: Record<string, number> };
  evaluator?: { worker_timeout_ms?: number; call_timeout_ms?: number; max_restarts?: number };
}

export interface TargetConfig {
  name: string;
  baseUrl: string;
  headers: Record<string, string>;
}

export interface EvaluatorConfig {
  workerTimeoutMs: number;
  callTimeoutMs: number;
  maxRestarts: number;
}

export interface RuntimeConfig {
  /** Absolute path of the file this came from */
  file?: string;
  targets: ReadonlyMap<string, TargetConfig>;
  targetA?: string;
  targetB?: string;
  /** Absolute path of the comparison rules file */
  comparisonRules?: string;
  sourceOfTruth: SourceOfTruth;
  requestsPerSecond?: number;
  redactFields: string[];
  defaultTimeoutMs: number;
  operationTimeoutsMs: Record<string, number>;
  evaluator: EvaluatorConfig;
}

export const DEFAULT_TIMEOUT_SECONDS = 30;

export const DEFAULT_EVALUATOR: EvaluatorConfig = {
  workerTimeoutMs: 5000,
  callTimeoutMs: 10000,
  maxRestarts: 3,
};

const validateConfig = createTypedValidator<RawRuntimeConfig>(configSchema);

const ENV_REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv, where = '$'): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_REFERENCE, (_match, name: string) => {
      const replacement = env[name];
      if (replacement === undefined) {
        throw new ConfigError({
          message: `Environment variable ${name} is not set (referenced at ${where})`,
          context: { setting: where, suggestion: `export ${name}=...` },
        });
      }
      return replacement;
    });
  }
  if (Array.isArray(value)) return value.map((item, i) => substituteEnv(item, env, `${where}[${i}]`));
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, substituteEnv(item, env, `${where}.${key}`)])
    );
  }
  return value;
}

export function defaultRuntimeConfig(): RuntimeConfig {
  return {
    targets: new Map(),
    sourceOfTruth: 'a',
    redactFields: [],
    defaultTimeoutMs: DEFAULT_TIMEOUT_SECONDS * 1000,
    operationTimeoutsMs: {},
    evaluator: { ...DEFAULT_EVALUATOR },
  };
}

export function parseRuntimeConfig(
  doc: unknown,
  file?: string,
  env: NodeJS.ProcessEnv = process.env
): RuntimeConfig {
  const checked = validateConfig(substituteEnv(doc, env));
  if (checked.isErr()) {
    throw new ConfigError({
      message: `Invalid configuration${file ? ` in ${file}` : ''}: ${checked.error.join('; ')}`,
      context: { file },
    });
  }
  const raw = checked.value;
  const baseDir = file ? path.dirname(file) : process.cwd();

  const targets = new Map<string, TargetConfig>();
  for (const [name, target] of Object.entries(raw.targets)) {
    targets.set(name, { name, baseUrl: target.base_url, headers: { ...(target.headers ?? {}) } });
  }
  for (const key of ['target_a', 'target_b'] as const) {
    const name = raw[key];
    if (name !== undefined && !targets.has(name)) {
      throw new ConfigError({
        message: `${key} names unknown target '${name}' (known: ${[...targets.keys()].join(', ')})`,
        context: { setting: key, file },
      });
    }
  }

  const operationTimeoutsMs: Record<string, number> = {};
  for (const [op, seconds] of Object.entries(raw.timeouts?.operations ?? {})) {
    operationTimeoutsMs[op] = seconds * 1000;
  }

  const config: RuntimeConfig = {
    targets,
    sourceOfTruth: raw.source_of_truth ?? 'a',
    redactFields: [...(raw.secrets?.redact_fields ?? [])],
    defaultTimeoutMs: (raw.timeouts?.default ?? DEFAULT_TIMEOUT_SECONDS) * 1000,
    operationTimeoutsMs,
    evaluator: {
      workerTimeoutMs: raw.evaluator?.worker_timeout_ms ?? DEFAULT_EVALUATOR.workerTimeoutMs,
      callTimeoutMs: raw.evaluator?.call_timeout_ms ?? DEFAULT_EVALUATOR.callTimeoutMs,
      maxRestarts: raw.evaluator?.max_restarts ?? DEFAULT_EVALUATOR.maxRestarts,
    },
  };
  if (file) config.file = path.resolve(file);
  if (raw.target_a !== undefined) config.targetA = raw.target_a;
  if (raw.target_b !== undefined) config.targetB = raw.target_b;
  if (raw.comparison_rules !== undefined) config.comparisonRules = path.resolve(baseDir, raw.comparison_rules);
  if (raw.rate_limit?.requests_per_second !== undefined) config.requestsPerSecond = raw.rate_limit.requests_per_second;
  return config;
}

export async function loadRuntimeConfig(file: string, env: NodeJS.ProcessEnv = process.env): Promise<RuntimeConfig> {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot read configuration: ${describeError(error)}`,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (error) {
    throw new ConfigError({
      message: `Configuration is not valid YAML: ${describeError(error)}`,
      errorCode: ErrorCode.CONFIGURATION_ERROR,
      context: { file },
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseRuntimeConfig(doc, file, env);
}

/**
 * A target is either a name from the configuration or a base URL given
 * directly.
 */
export function resolveTarget(config: RuntimeConfig, nameOrUrl: string | undefined, role: 'a' | 'b'): TargetConfig {
  const requested = nameOrUrl ?? (role === 'a' ? config.targetA : config.targetB);
  if (requested === undefined) {
    throw new ConfigError({
      message: `No target ${role.toUpperCase()} given; pass --target-${role} or set target_${role} in the configuration`,
      context: { setting: `target_${role}` },
    });
  }
  const named = config.targets.get(requested);
  if (named) return named;
  if (/^https?:\/\//.test(requested)) return { name: role, baseUrl: requested, headers: {} };
  throw new ConfigError({
    message: `Unknown target '${requested}'; expected a configured target name or an http(s) URL`,
    context: { setting: `target_${role}`, value: requested },
  });
}
