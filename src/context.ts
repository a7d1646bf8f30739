// =============================================================================
// RecommenderContext — Process-wide collaborators, constructed once at startup
// =============================================================================

import { WorkflowConfigSchema } from "./domain/graph.schema.js";
import type { WorkflowConfig } from "./domain/graph.schema.js";
import type { ModelPort } from "./ports/model.port.js";
import { EventBus } from "./graph/event-bus.js";
import { GraphExecutor } from "./graph/graph-executor.js";
import type { NodeHandlers } from "./graph/node.js";
import { RunRegistry } from "./graph/run-registry.js";
import type { RunRegistryOptions } from "./graph/run-registry.js";
import { StateInspector } from "./graph/state-inspector.js";
import { TopologyRenderer } from "./graph/topology-renderer.js";
import { WorkflowGraph, createRecommendationGraph } from "./graph/workflow-graph.js";
import { defaultNodeHandlers } from "./nodes/index.js";

export interface RecommenderContextOptions {
  model: ModelPort;
  graph?: WorkflowGraph;
  handlers?: NodeHandlers;
  config?: Partial<WorkflowConfig>;
  events?: EventBus;
  registry?: RunRegistryOptions;
  now?: () => number;
}

export interface RecommenderContext {
  readonly graph: WorkflowGraph;
  readonly registry: RunRegistry;
  readonly executor: GraphExecutor;
  readonly inspector: StateInspector;
  readonly topology: TopologyRenderer;
  readonly events: EventBus;
  readonly model: ModelPort;
  readonly config: WorkflowConfig;
  /** Stops the registry sweep timer and drops every retained run. */
  dispose(): void;
}

export function createRecommenderContext(options: RecommenderContextOptions): RecommenderContext {
  const graph = options.graph ?? createRecommendationGraph();
  const events = options.events ?? new EventBus();
  const config = WorkflowConfigSchema.parse(options.config ?? {});
  const registry = new RunRegistry({
    now: options.now,
    ...options.registry,
    onEvict: (runId, reason) => {
      options.registry?.onEvict?.(runId, reason);
      events.emit({ type: "run:evicted", runId, reason });
    },
  });

  const executor = new GraphExecutor({
    graph,
    handlers: options.handlers ?? defaultNodeHandlers,
    registry,
    model: options.model,
    config,
    events,
    now: options.now,
  });

  return {
    graph,
    registry,
    executor,
    inspector: new StateInspector(registry),
    topology: new TopologyRenderer(graph),
    events,
    model: options.model,
    config,
    dispose: () => registry.dispose(),
  };
}
