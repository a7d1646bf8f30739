// =============================================================================
// MermaidGraphAdapter — Renders a GraphDescriptor as Mermaid flowchart syntax
// =============================================================================

import type {
  GraphVisualizationPort,
  GraphDescriptor,
} from "../../ports/graph-visualization.port.js";

export class MermaidGraphAdapter implements GraphVisualizationPort {
  render(graph: GraphDescriptor): string {
    const lines: string[] = ["graph LR"];
    const sanitize = (id: string) => id.replace(/[^A-Za-z0-9_]/g, "_");

    for (const node of graph.nodes) {
      const label = (node.label ?? node.id).replace(/"/g, "'");
      lines.push(`  ${sanitize(node.id)}["${label}"]`);
    }

    for (const edge of graph.edges) {
      lines.push(`  ${sanitize(edge.from)} --> ${sanitize(edge.to)}`);
    }

    return lines.join("\n");
  }
}
