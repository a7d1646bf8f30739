// =============================================================================
// Node contract — Handler signature and the handler lookup table
// =============================================================================

import type {
  NodeId,
  NodeOutput,
  RunStateView,
  WorkflowConfig,
} from "../domain/graph.schema.js";
import type { ModelPort } from "../ports/model.port.js";

export interface NodeContext {
  readonly runId: string;
  readonly model: ModelPort;
  readonly config: WorkflowConfig;
  /** Aborted when the run is cancelled */
  readonly signal?: AbortSignal;
}

/**
 * A node reads the whole state and returns only the fields it owns.
 * It never mutates the view it is given.
 */
export type NodeHandler<K extends NodeId> = (
  state: RunStateView,
  ctx: NodeContext,
) => Promise<NodeOutput<K>>;

/** One handler per node id; a missing entry is a compile error. */
export type NodeHandlers = { readonly [K in NodeId]: NodeHandler<K> };
