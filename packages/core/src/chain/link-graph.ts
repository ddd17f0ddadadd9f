import type { ApiSpecModel, LinkSpec, Operation } from '../types/model.js';
import { linkSuppliedKeys } from './link-resolver.js';

export interface LinkEdge {
  from: string;
  to: string;
  link: LinkSpec;
  /** `in.name` keys of the target's parameters this link fills */
  supplies: ReadonlySet<string>;
}

/**
 * Directed response-to-request graph, built once from the model.
 * Links whose target does not exist or is excluded are dropped.
 */
export class LinkGraph {
  private readonly byId = new Map<string, Operation>();
  private readonly out = new Map<string, LinkEdge[]>();
  private readonly into = new Map<string, LinkEdge[]>();
  readonly edges: readonly LinkEdge[];

  constructor(operations: readonly Operation[]) {
    for (const op of operations) {
      this.byId.set(op.operationId, op);
      this.out.set(op.operationId, []);
      this.into.set(op.operationId, []);
    }
    const edges: LinkEdge[] = [];
    for (const op of operations) {
      for (const link of op.links) {
        const target = this.byId.get(link.targetOperationId);
        if (!target) continue;
        const edge: LinkEdge = {
          from: op.operationId,
          to: target.operationId,
          link,
          supplies: linkSuppliedKeys(link, target),
        };
        edges.push(edge);
        this.out.get(edge.from)?.push(edge);
        this.into.get(edge.to)?.push(edge);
      }
    }
    this.edges = edges;
  }

  static fromModel(model: ApiSpecModel, exclude: ReadonlySet<string> = new Set()): LinkGraph {
    return new LinkGraph(model.operations.filter((op) => !exclude.has(op.operationId)));
  }

  operation(operationId: string): Operation | undefined {
    return this.byId.get(operationId);
  }

  outgoing(operationId: string): readonly LinkEdge[] {
    return this.out.get(operationId) ?? [];
  }

  incoming(operationId: string): readonly LinkEdge[] {
    return this.into.get(operationId) ?? [];
  }

  /**
   * Operations a chain may start from: none of their required parameters is
   * only obtainable through an incoming link.
   */
  entries(): Operation[] {
    return [...this.byId.values()].filter((op) => {
      const supplied = new Set<string>();
      for (const edge of this.incoming(op.operationId)) {
        for (const key of edge.supplies) supplied.add(key);
      }
      return !op.parameters.some((p) => p.required && supplied.has(`${p.in}.${p.name}`));
    });
  }
}
