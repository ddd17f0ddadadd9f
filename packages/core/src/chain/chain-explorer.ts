/**
 * Multi-step chain enumeration over the link graph.
 *
 * Breadth-first over edge paths from every entry operation, so shorter
 * chains come first; among the edges leaving one operation the most recently
 * declared link is followed first. Chains of length 2..maxDepth are emitted,
 * at most `perSequence` per operation sequence and `maxChains` in total.
 */

import type { ApiSpecModel, ChainCase, ChainStep, LinkSource } from '../types/model.js';
import type { CaseGenerator } from '../generator/case-generator.js';
import { isDiffProbeError } from '../types/errors.js';
import { XorShift32 } from '../util/rng.js';
import { shortHash } from '../util/stable-hash.js';
import { silentLogger, type Logger } from '../util/logger.js';
import { LinkGraph, type LinkEdge } from './link-graph.js';

export interface ChainExplorerOptions {
  seed?: number;
  /** Chains kept per identical operation sequence */
  perSequence?: number;
  exclude?: ReadonlySet<string>;
  logger?: Logger;
}

interface PathEntry {
  start: string;
  edges: LinkEdge[];
}

export function sequenceKeyOf(operationIds: readonly string[]): string {
  return operationIds.join(' -> ');
}

export class ChainExplorer {
  readonly graph: LinkGraph;
  private readonly seed: number;
  private readonly perSequence: number;
  private readonly logger: Logger;
  private runs = 0;

  constructor(
    model: ApiSpecModel,
    private readonly generator: CaseGenerator,
    options: ChainExplorerOptions = {}
  ) {
    this.graph = LinkGraph.fromModel(model, options.exclude);
    this.seed = options.seed ?? 1;
    this.perSequence = Math.max(1, options.perSequence ?? 1);
    this.logger = options.logger ?? silentLogger;
  }

  /** Finite, restartable; each iteration draws fresh parameter values. */
  explore(maxDepth: number, maxChains: number): Iterable<ChainCase> {
    const explorer = this;
    return {
      *[Symbol.iterator](): Iterator<ChainCase> {
        yield* explorer.walk(maxDepth, maxChains, explorer.runs++);
      },
    };
  }

  private *walk(maxDepth: number, maxChains: number, run: number): Generator<ChainCase> {
    if (maxDepth < 2 || maxChains <= 0) return;
    const rng = new XorShift32(this.seed, `chains|run:${run}`);
    const perKey = new Map<string, number>();
    let emitted = 0;

    const queue: PathEntry[] = this.graph.entries().map((op) => ({ start: op.operationId, edges: [] }));
    while (queue.length > 0 && emitted < maxChains) {
      const entry = queue.shift();
      if (!entry) break;
      const ids = [entry.start, ...entry.edges.map((e) => e.to)];

      if (ids.length >= 2) {
        const key = sequenceKeyOf(ids);
        let kept = perKey.get(key) ?? 0;
        while (kept < this.perSequence && emitted < maxChains) {
          const chain = this.buildChain(entry, ids, key, rng.fork(`${key}#${kept}`));
          kept++;
          if (!chain) continue;
          emitted++;
          yield chain;
        }
        perKey.set(key, kept);
      }

      if (ids.length < maxDepth) {
        const tail = ids[ids.length - 1] ?? entry.start;
        const next = [...this.graph.outgoing(tail)].reverse();
        for (const edge of next) queue.push({ start: entry.start, edges: [...entry.edges, edge] });
      }
    }
  }

  private buildChain(
    entry: PathEntry,
    ids: readonly string[],
    sequenceKey: string,
    rng: XorShift32
  ): ChainCase | undefined {
    const steps: ChainStep[] = [];
    try {
      for (let stepIndex = 0; stepIndex < ids.length; stepIndex++) {
        const operationId = ids[stepIndex] ?? '';
        const operation = this.graph.operation(operationId);
        if (!operation) return undefined;
        const edge = stepIndex === 0 ? undefined : entry.edges[stepIndex - 1];
        const request = this.generator.generateOne(operation, 'POSITIVE', rng.fork(`step:${stepIndex}`), {
          leaveUnresolved: edge?.supplies,
        });
        const step: ChainStep = { stepIndex, operationId, request };
        if (edge) step.linkSource = linkSourceOf(edge);
        steps.push(step);
      }
    } catch (error) {
      if (!isDiffProbeError(error)) throw error;
      this.logger.warn(`skipping chain ${sequenceKey}: ${error.message}`);
      return undefined;
    }
    const chainId = `chain-${shortHash({
      sequenceKey,
      cases: steps.map((s) => s.request.caseId),
    })}`;
    return { chainId, sequenceKey, steps };
  }
}

function linkSourceOf(edge: LinkEdge): LinkSource {
  return {
    linkName: edge.link.name,
    sourceOperationId: edge.from,
    statusCode: edge.link.statusCode,
    parameters: { ...edge.link.parameters },
  };
}

/** Convenience wrapper over ChainExplorer. */
export function explore(
  model: ApiSpecModel,
  generator: CaseGenerator,
  maxDepth: number,
  maxChains: number,
  options: ChainExplorerOptions = {}
): Iterable<ChainCase> {
  return new ChainExplorer(model, generator, options).explore(maxDepth, maxChains);
}
