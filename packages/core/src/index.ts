// @diffprobe/core entry point
//
// Pipeline stages, leaf first: evaluator bridge, comparator, case generator,
// chain explorer, dual executor, bundles and replay. `runExplore` wires them
// together; the CLI only parses flags and renders results.

export * from './types/json.js';
export * from './types/model.js';
export * from './types/result.js';
export * from './types/errors.js';
export { TOOL_VERSION } from './version.js';

// Errors
export { ErrorCode, EXIT_CODES, type Severity, getExitCode } from './errors/codes.js';
export { ErrorPresenter, type CLIErrorView, type PresenterOptions } from './errors/presenter.js';

// Specification model
export {
  loadSpecFile,
  resolveSpecDocument,
  buildSpecModel,
  findOperation,
  selectRequestMediaType,
} from './openapi/spec-model.js';

// Generation
export {
  CaseGenerator,
  formatParameterValues,
  sanitizeCookieValue,
  sanitizeHeaderValue,
  type CaseGeneratorOptions,
  type GenerateOptions,
  type GenerationMode,
} from './generator/case-generator.js';
export { CaseValidator, type ValidationFailure } from './validator/case-validator.js';
export { createFormatRegistry } from './generator/formats/index.js';
export { FormatRegistry, type FormatGenerator, type FormatOptions } from './registry/format-registry.js';

// Chains
export { LinkGraph, type LinkEdge } from './chain/link-graph.js';
export {
  applyLinkParameters,
  findLinkedParameter,
  resolveRuntimeExpression,
  type LinkApplication,
  type LinkContext,
} from './chain/link-resolver.js';
export { ChainExplorer, explore, sequenceKeyOf, type ChainExplorerOptions } from './chain/chain-explorer.js';
export {
  ChainRunner,
  hasTransportError,
  type ChainRunResult,
  type ChainRunnerOptions,
  type ExecutedStep,
  type RunOutcome,
  type SourceOfTruth,
} from './chain/chain-runner.js';

// Execution
export {
  buildUrl,
  decodeBody,
  executeRequest,
  preflight,
  renderPath,
  type ExecuteOptions,
  type FetchLike,
  type HttpTarget,
} from './executor/http-client.js';
export { DualExecutor, runStep, type DualExecutorOptions, type StepPair } from './executor/dual-executor.js';
export { RateLimiter } from './executor/rate-limiter.js';

// Evaluation
export { EvaluatorBridge, type BridgeOptions, type ExpressionEvaluator } from './evaluator/bridge.js';
export { WORKER_TIMEOUT_MESSAGE } from './evaluator/protocol.js';

// Comparison
export { Comparator, compare, nativeEqual } from './comparator/comparator.js';
export {
  EXACT_RULE,
  effectiveRules,
  emptyRuleSet,
  loadRules,
  parseRules,
  unknownOperationScopes,
  warnUnknownOperations,
  type BodyRule,
  type Comparison,
  type EffectiveRules,
  type FieldRule,
  type PresenceMode,
  type RuleScope,
  type RuleSet,
} from './comparator/rules.js';
export { getComparisonLibrary, type ComparisonLibrary, type LibraryEntry } from './comparator/library.js';

// Bundles and replay
export * from './bundle/format.js';
export {
  BundleWriter,
  compactTimestamp,
  reproductionKey,
  sanitizeSegment,
  writeJsonAtomic,
  type BundleWriterOptions,
} from './bundle/bundle-writer.js';
export { loadBundle, loadBundles, type LoadedBundle, type LoadedBundles } from './bundle/bundle-loader.js';
export { REDACTED, Redactor } from './bundle/redact.js';
export {
  REPLAY_SUMMARY_FILE,
  classify,
  failureClasses,
  replayAll,
  replayBundle,
  type ReplayOptions,
  type ReplayOutcome,
  type ReplaySummary,
} from './replay/replay.js';

// Configuration and orchestration
export {
  DEFAULT_TIMEOUT_SECONDS,
  defaultRuntimeConfig,
  loadRuntimeConfig,
  parseRuntimeConfig,
  resolveTarget,
  substituteEnv,
  type RuntimeConfig,
  type TargetConfig,
} from './config/runtime-config.js';
export { EXPLORE_DEFAULTS, SUMMARY_FILE, runExplore, type ExploreOptions, type ExploreSummary } from './pipeline/explore.js';

// Utilities
export { createLogger, levelFromEnv, silentLogger, type LogLevel, type Logger } from './util/logger.js';
export { parsePattern, formatPath, toPointer } from './util/json-path.js';
