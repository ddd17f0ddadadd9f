/**
 * Sequential execution of cases and chains against both targets.
 *
 * A chain halts at the first step whose comparison reports mismatches, or at
 * a step where both targets failed at transport level. Before each linked
 * step, the link's runtime expressions are resolved against the previous
 * step's request and the source-of-truth target's response. A required
 * parameter that cannot be resolved ends the chain there as `degraded`;
 * unresolvable optional parameters are simply omitted.
 */

import type {
  ChainCase,
  ChainStep,
  ComparisonResult,
  LinkSpec,
  Operation,
  RequestCase,
  StepResult,
} from '../types/model.js';
import type { Comparator } from '../comparator/comparator.js';
import { effectiveRules, type RuleSet } from '../comparator/rules.js';
import type { DualExecutor, StepPair } from '../executor/dual-executor.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { applyLinkParameters } from './link-resolver.js';

export type SourceOfTruth = 'a' | 'b';

export interface ExecutedStep {
  stepIndex: number;
  operationId: string;
  /** Request as sent, link parameters filled in */
  request: RequestCase;
  results: StepPair;
  comparison: ComparisonResult;
}

export type RunOutcome = 'match' | 'mismatch' | 'error' | 'degraded';

export interface ChainRunResult {
  chain: ChainCase;
  executed: ExecutedStep[];
  outcome: RunOutcome;
  /** Index of the step that stopped the run, if any did */
  haltedAt?: number;
  /** Parameters that could not be resolved when the run degraded */
  unresolved?: string[];
}

export interface ChainRunnerOptions {
  /** Operations of the loaded specification, used to place link parameters */
  operations?: readonly Operation[];
  sourceOfTruth?: SourceOfTruth;
  logger?: Logger;
}

function linkSpecOf(step: ChainStep): LinkSpec | undefined {
  const source = step.linkSource;
  if (!source) return undefined;
  return {
    name: source.linkName,
    statusCode: source.statusCode,
    sourceOperationId: source.sourceOperationId,
    targetOperationId: step.operationId,
    parameters: source.parameters,
  };
}

/**
 * Without the OpenAPI document (replaying a bundle), the parameters a link
 * fills are exactly the ones the planned request left unresolved.
 */
function operationFromRequest(request: RequestCase): Operation {
  return {
    operationId: request.operationId,
    method: request.method,
    pathTemplate: request.pathTemplate,
    parameters: (request.unresolved ?? []).map((u) => ({ name: u.name, in: u.in, required: u.required, schema: {} })),
    responses: {},
    links: [],
  };
}

export function hasTransportError([a, b]: StepPair): boolean {
  return a.error !== undefined || b.error !== undefined;
}

export class ChainRunner {
  private readonly operations = new Map<string, Operation>();
  private readonly sourceOfTruth: SourceOfTruth;
  private readonly logger: Logger;

  constructor(
    private readonly executor: DualExecutor,
    private readonly comparator: Comparator,
    private readonly rules: RuleSet,
    options: ChainRunnerOptions = {}
  ) {
    for (const op of options.operations ?? []) this.operations.set(op.operationId, op);
    this.sourceOfTruth = options.sourceOfTruth ?? 'a';
    this.logger = options.logger ?? silentLogger;
  }

  async runStep(stepIndex: number, request: RequestCase): Promise<ExecutedStep> {
    const results = await this.executor.runStep(request);
    const comparison = await this.comparator.compare(
      results[0],
      results[1],
      effectiveRules(this.rules, request.operationId)
    );
    return { stepIndex, operationId: request.operationId, request, results, comparison };
  }

  /** A single case is run as a one-step chain. */
  runCase(request: RequestCase): Promise<ChainRunResult> {
    return this.runChain({
      chainId: request.caseId,
      sequenceKey: request.operationId,
      steps: [{ stepIndex: 0, operationId: request.operationId, request }],
    });
  }

  async runChain(chain: ChainCase): Promise<ChainRunResult> {
    const executed: ExecutedStep[] = [];
    for (const step of chain.steps) {
      let request = step.request;
      const previous = executed[executed.length - 1];
      const link = linkSpecOf(step);

      if (previous && link) {
        const target = this.operations.get(step.operationId) ?? operationFromRequest(request);
        const application = applyLinkParameters(target, request, link, {
          request: previous.request,
          response: this.truthOf(previous.results),
        });
        if (application.missingOptional.length > 0) {
          this.logger.debug(`${chain.chainId}: omitting unresolved ${application.missingOptional.join(', ')}`);
        }
        if (application.missingRequired.length > 0) {
          this.logger.warn(
            `${chain.sequenceKey}: step ${step.stepIndex} (${step.operationId}) skipped, cannot resolve ${application.missingRequired.join(', ')}`
          );
          return {
            chain,
            executed,
            outcome: 'degraded',
            haltedAt: step.stepIndex,
            unresolved: application.missingRequired,
          };
        }
        request = application.request;
      }

      const result = await this.runStep(step.stepIndex, request);
      executed.push(result);
      if (result.comparison.mismatches.length > 0) {
        return { chain, executed, outcome: 'mismatch', haltedAt: step.stepIndex };
      }
      if (result.comparison.executionError !== undefined) {
        return { chain, executed, outcome: 'error', haltedAt: step.stepIndex };
      }
    }
    return { chain, executed, outcome: 'match' };
  }

  private truthOf([a, b]: StepPair): StepResult {
    return this.sourceOfTruth === 'a' ? a : b;
  }
}
