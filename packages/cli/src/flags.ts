import { InvalidArgumentError } from 'commander';
import { ConfigError, type LogLevel, type RuntimeConfig } from '@diffprobe/core';

export interface OutputStreams {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
}

export interface VerbosityFlags {
  verbose?: boolean;
  quiet?: boolean;
}

export interface TimeoutFlags {
  /** seconds */
  timeout?: number;
  /** `OP:SECONDS` entries */
  operationTimeout?: string[];
}

/** Commander parser for integers at or above `min`. */
export function integerAtLeast(min: number): (value: string) => number {
  return (value) => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`expected an integer >= ${min}, got '${value}'`);
    }
    return parsed;
  };
}

export function positiveSeconds(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`expected a positive number of seconds, got '${value}'`);
  }
  return parsed;
}

/** Repeatable option accumulator. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** `createItem:2.5` -> { createItem: 2500 } */
export function parseOperationTimeouts(entries: readonly string[] = []): Record<string, number> {
  const out: Record<string, number> = {};
  for (const entry of entries) {
    const colon = entry.lastIndexOf(':');
    const op = entry.slice(0, colon);
    const seconds = Number(entry.slice(colon + 1));
    if (colon <= 0 || !Number.isFinite(seconds) || seconds <= 0) {
      throw new ConfigError({
        message: `--operation-timeout expects OPERATION_ID:SECONDS, got '${entry}'`,
        context: { setting: 'operation-timeout', value: entry },
      });
    }
    out[op] = seconds * 1000;
  }
  return out;
}

/** Command-line timeouts win over the configuration file. */
export function applyTimeoutFlags(config: RuntimeConfig, flags: TimeoutFlags): RuntimeConfig {
  return {
    ...config,
    defaultTimeoutMs: flags.timeout !== undefined ? flags.timeout * 1000 : config.defaultTimeoutMs,
    operationTimeoutsMs: { ...config.operationTimeoutsMs, ...parseOperationTimeouts(flags.operationTimeout) },
  };
}

export function resolveLogLevel(flags: VerbosityFlags, fallback: LogLevel): LogLevel {
  if (flags.quiet) return 'error';
  if (flags.verbose) return 'debug';
  return fallback;
}
