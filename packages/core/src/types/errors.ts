/**
 * Error hierarchy for diffprobe
 * Structured errors with stable codes, context and exit codes
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  path?: string; // JSON Pointer or JSONPath of the offending value
  operationId?: string;
  target?: string; // Target name ('a' / 'b') for transport failures
  file?: string; // File that failed to load or parse
  value?: unknown; // Problematic value (may contain secrets)
  valueExcerpt?: string;
  suggestion?: string;
  [key: string]: unknown;
}

export interface ErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

/**
 * Base error class for all diffprobe errors
 */
export abstract class DiffProbeError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * A schema could not be satisfied while generating a case
 */
export class GenerationError extends DiffProbeError {
  constructor(params: ErrorParams<ErrorContext & { constraint?: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.SCHEMA_UNSATISFIABLE,
    });
  }

  get constraint(): string | undefined {
    const c = this.context?.constraint;
    return typeof c === 'string' ? c : undefined;
  }
}

export type TransportErrorKind = 'timeout' | 'connection' | 'transport';

/**
 * Connection refused/reset/timeout talking to a target.
 * Captured into a terminal StepResult, never thrown past the executor.
 */
export class TransportError extends DiffProbeError {
  public readonly kind: TransportErrorKind;

  constructor(
    params: ErrorParams & { kind: TransportErrorKind; target?: string }
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.TRANSPORT_FAILURE,
      context: { ...params.context, target: params.target },
    });
    this.kind = params.kind;
  }
}

/**
 * Malformed, failing or timed-out expression
 */
export class EvaluationError extends DiffProbeError {
  constructor(params: ErrorParams<ErrorContext & { expression?: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.EVALUATION_FAILED,
    });
  }
}

/**
 * The evaluator worker exhausted its restart budget. Fatal for the run.
 */
export class BridgeUnavailable extends DiffProbeError {
  constructor(params: ErrorParams<ErrorContext & { restarts?: number }>) {
    super({ ...params, errorCode: ErrorCode.BRIDGE_UNAVAILABLE });
  }
}

/**
 * A bundle directory lacks its descriptor or holds unreadable files
 */
export class BundleCorruption extends DiffProbeError {
  constructor(params: ErrorParams<ErrorContext & { directory: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.BUNDLE_CORRUPT,
      severity: params.severity ?? 'warn',
    });
  }

  get directory(): string | undefined {
    const d = this.context?.directory;
    return typeof d === 'string' ? d : undefined;
  }
}

/**
 * A bundle file could not be written
 */
export class BundleWriteError extends DiffProbeError {
  constructor(params: ErrorParams<ErrorContext & { directory?: string }>) {
    super({ ...params, errorCode: ErrorCode.BUNDLE_WRITE_FAILED });
  }
}

/**
 * Configuration and setup errors
 */
export class ConfigError extends DiffProbeError {
  constructor(params: ErrorParams<ErrorContext & { setting?: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }
}

/**
 * Specification or rules document could not be parsed
 */
export class ParseError extends DiffProbeError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.SPEC_PARSE_FAILED,
    });
  }
}

/**
 * Fallback wrapper for foreign errors reaching the CLI
 */
export class InternalError extends DiffProbeError {
  constructor(params: ErrorParams) {
    super({ ...params, errorCode: ErrorCode.INTERNAL_ERROR });
  }
}

export function isDiffProbeError(error: unknown): error is DiffProbeError {
  return error instanceof DiffProbeError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
