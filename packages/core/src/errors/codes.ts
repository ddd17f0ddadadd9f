/**
 * Error Code Infrastructure
 * Stable error codes and exit codes.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Generation Errors (E100–E199)
  SCHEMA_UNSATISFIABLE = 'E100',

  // Transport Errors (E200–E299)
  TRANSPORT_FAILURE = 'E200',
  TARGET_UNREACHABLE = 'E201',

  // Evaluation Errors (E300–E399)
  EVALUATION_FAILED = 'E300',
  EVALUATION_TIMEOUT = 'E301',
  BRIDGE_UNAVAILABLE = 'E310',

  // Bundle Errors (E400–E499)
  BUNDLE_CORRUPT = 'E400',
  BUNDLE_WRITE_FAILED = 'E401',

  // Configuration / Parse Errors (E500–E599)
  CONFIGURATION_ERROR = 'E500',
  SPEC_PARSE_FAILED = 'E510',
  RULES_INVALID = 'E520',

  // Internal Errors
  INTERNAL_ERROR = 'E900',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.SCHEMA_UNSATISFIABLE]: 10,
  [ErrorCode.TRANSPORT_FAILURE]: 20,
  [ErrorCode.TARGET_UNREACHABLE]: 21,
  [ErrorCode.EVALUATION_FAILED]: 30,
  [ErrorCode.EVALUATION_TIMEOUT]: 31,
  [ErrorCode.BRIDGE_UNAVAILABLE]: 32,
  [ErrorCode.BUNDLE_CORRUPT]: 40,
  [ErrorCode.BUNDLE_WRITE_FAILED]: 41,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.SPEC_PARSE_FAILED]: 51,
  [ErrorCode.RULES_INVALID]: 52,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
