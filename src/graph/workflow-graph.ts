// =============================================================================
// WorkflowGraph — Static node/edge definition with builder API
// =============================================================================

import { NODE_LABELS } from "../domain/graph.schema.js";
import type { GraphEdge, NodeId } from "../domain/graph.schema.js";
import type { GraphDescriptor } from "../ports/graph-visualization.port.js";
import { GraphDefinitionError } from "../errors.js";
import { AbstractBuilder } from "../utils/abstract-builder.js";

/**
 * Immutable directed acyclic graph of workflow nodes. One instance is built at
 * startup and shared by every run; nothing on it changes after `build()`.
 */
export class WorkflowGraph {
  readonly nodeIds: readonly NodeId[];
  readonly edges: readonly GraphEdge[];
  private readonly deps: ReadonlyMap<NodeId, readonly NodeId[]>;

  constructor(nodeIds: readonly NodeId[], edges: readonly GraphEdge[]) {
    this.nodeIds = Object.freeze([...nodeIds]);
    this.edges = Object.freeze(edges.map((e) => Object.freeze({ from: e.from, to: e.to })));

    const deps = new Map<NodeId, NodeId[]>();
    for (const { from, to } of this.edges) {
      const list = deps.get(to) ?? [];
      list.push(from);
      deps.set(to, list);
    }
    this.deps = deps;
  }

  static create(): WorkflowGraphBuilder {
    return new WorkflowGraphBuilder();
  }

  /** nodeId → ids of the nodes it depends on */
  dependencies(): ReadonlyMap<NodeId, readonly NodeId[]> {
    return this.deps;
  }

  predecessors(nodeId: NodeId): readonly NodeId[] {
    return this.deps.get(nodeId) ?? [];
  }

  successors(nodeId: NodeId): NodeId[] {
    return this.edges.filter((e) => e.from === nodeId).map((e) => e.to);
  }

  /** Kahn order; among simultaneously ready nodes, declaration order wins. */
  topologicalOrder(): NodeId[] {
    const inDegree = new Map(this.nodeIds.map((id) => [id, this.predecessors(id).length]));
    const order: NodeId[] = [];
    const queue = this.nodeIds.filter((id) => inDegree.get(id) === 0);
    for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
      order.push(id);
      for (const next of this.successors(id)) {
        const deg = (inDegree.get(next) ?? 1) - 1;
        inDegree.set(next, deg);
        if (deg === 0) queue.push(next);
      }
    }
    return order;
  }

  describe(): GraphDescriptor {
    return {
      nodes: this.nodeIds.map((id) => ({ id, label: NODE_LABELS[id] })),
      edges: this.edges.map((e) => ({ from: e.from, to: e.to })),
    };
  }
}

export class WorkflowGraphBuilder extends AbstractBuilder<WorkflowGraph> {
  private readonly nodeList: NodeId[] = [];
  private readonly edgeList: GraphEdge[] = [];

  node(id: NodeId): this {
    if (this.nodeList.includes(id)) {
      throw new GraphDefinitionError(`Node "${id}" already exists`);
    }
    this.nodeList.push(id);
    return this;
  }

  edge(from: NodeId, to: NodeId): this {
    if (this.edgeList.some((e) => e.from === from && e.to === to)) {
      throw new GraphDefinitionError(`Edge "${from}" → "${to}" already exists`);
    }
    this.edgeList.push({ from, to });
    return this;
  }

  /** Adds every node in order, linked one after another. */
  chain(...ids: NodeId[]): this {
    ids.forEach((id, i) => {
      this.node(id);
      if (i > 0) this.edge(ids[i - 1], id);
    });
    return this;
  }

  protected validate(): void {
    if (this.nodeList.length === 0) {
      throw new GraphDefinitionError("Graph must contain at least one node");
    }
    this.validateEdges();
    this.validateNoCycles();
  }

  protected construct(): WorkflowGraph {
    return new WorkflowGraph(this.nodeList, this.edgeList);
  }

  private validateEdges(): void {
    for (const { from, to } of this.edgeList) {
      if (!this.nodeList.includes(from)) {
        throw new GraphDefinitionError(`Edge source "${from}" does not exist`);
      }
      if (!this.nodeList.includes(to)) {
        throw new GraphDefinitionError(`Edge target "${to}" does not exist`);
      }
      if (from === to) {
        throw new GraphDefinitionError(`Cycle detected involving node "${from}"`);
      }
    }
  }

  private validateNoCycles(): void {
    const visited = new Set<NodeId>();
    const stack = new Set<NodeId>();

    const visit = (nodeId: NodeId): void => {
      if (stack.has(nodeId)) {
        throw new GraphDefinitionError(`Cycle detected involving node "${nodeId}"`);
      }
      if (visited.has(nodeId)) return;
      stack.add(nodeId);
      for (const { from } of this.edgeList.filter((e) => e.to === nodeId)) {
        visit(from);
      }
      stack.delete(nodeId);
      visited.add(nodeId);
    };

    for (const nodeId of this.nodeList) {
      visit(nodeId);
    }
  }
}

/** The recommendation pipeline: parse → generate → rank → format. */
export function createRecommendationGraph(): WorkflowGraph {
  return WorkflowGraph.create()
    .chain("parse_preferences", "generate_candidates", "rank_candidates", "format_response")
    .build();
}
