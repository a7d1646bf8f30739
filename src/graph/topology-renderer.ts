// =============================================================================
// TopologyRenderer — Static graph description as JSON, ASCII or Mermaid
// =============================================================================

import type {
  GraphDescriptor,
  GraphVisualizationPort,
} from "../ports/graph-visualization.port.js";
import { AsciiGraphAdapter } from "../adapters/graph-visualization/ascii-graph.adapter.js";
import { MermaidGraphAdapter } from "../adapters/graph-visualization/mermaid-graph.adapter.js";
import type { WorkflowGraph } from "./workflow-graph.js";

export const TOPOLOGY_FORMATS = ["json", "ascii", "mermaid"] as const;

export type TopologyFormat = (typeof TOPOLOGY_FORMATS)[number];

export function isTopologyFormat(value: string): value is TopologyFormat {
  return (TOPOLOGY_FORMATS as readonly string[]).includes(value);
}

export interface TopologyRendererOptions {
  ascii?: GraphVisualizationPort;
  mermaid?: GraphVisualizationPort;
}

/**
 * Renders the process-wide graph. Output depends only on the graph, which is
 * immutable, so every rendering is computed once and reused.
 */
export class TopologyRenderer {
  private readonly descriptor: GraphDescriptor;
  private readonly diagrams = new Map<Exclude<TopologyFormat, "json">, string>();
  private readonly adapters: Record<Exclude<TopologyFormat, "json">, GraphVisualizationPort>;

  constructor(graph: WorkflowGraph, options: TopologyRendererOptions = {}) {
    const described = graph.describe();
    this.descriptor = Object.freeze({
      nodes: Object.freeze(described.nodes.map((n) => Object.freeze(n))),
      edges: Object.freeze(described.edges.map((e) => Object.freeze(e))),
    });
    this.adapters = {
      ascii: options.ascii ?? new AsciiGraphAdapter(),
      mermaid: options.mermaid ?? new MermaidGraphAdapter(),
    };
  }

  render(): GraphDescriptor;
  render(format: "json"): GraphDescriptor;
  render(format: "ascii" | "mermaid"): string;
  render(format?: TopologyFormat): GraphDescriptor | string;
  render(format: TopologyFormat = "json"): GraphDescriptor | string {
    if (format === "json") return this.descriptor;

    let diagram = this.diagrams.get(format);
    if (diagram === undefined) {
      diagram = this.adapters[format].render(this.descriptor);
      this.diagrams.set(format, diagram);
    }
    return diagram;
  }
}
