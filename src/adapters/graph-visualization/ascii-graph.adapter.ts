// =============================================================================
// AsciiGraphAdapter — Renders a GraphDescriptor as ASCII box art
// =============================================================================

import type {
  GraphVisualizationPort,
  GraphDescriptor,
} from "../../ports/graph-visualization.port.js";

export class AsciiGraphAdapter implements GraphVisualizationPort {
  render(graph: GraphDescriptor): string {
    if (graph.nodes.length === 0) return "(empty graph)";

    const ordered = this.topologicalSort(graph);
    const labels = new Map(graph.nodes.map((n) => [n.id, n.label ?? n.id]));

    const chain = this.isChain(graph, ordered);
    const boxes = ordered.map((id) => this.renderBox(labels.get(id) ?? id, id));
    const lines = [
      boxes.map((b) => b[0]).join("     "),
      boxes.map((b) => b[1]).join(chain ? " ──→ " : "     "),
      boxes.map((b) => b[2]).join("     "),
      boxes.map((b) => b[3]).join("     "),
    ];

    // Anything that is not a straight left-to-right chain gets an explicit edge list
    if (!chain) {
      lines.push("");
      for (const edge of graph.edges) {
        lines.push(`${edge.from} ──→ ${edge.to}`);
      }
    }

    return lines.join("\n");
  }

  private renderBox(label: string, id: string): [string, string, string, string] {
    const inner = Math.max(label.length, id.length + 2);
    const pad = (s: string) => s.padEnd(inner);
    return [
      `┌${"─".repeat(inner + 2)}┐`,
      `│ ${pad(label)} │`,
      `│ ${pad(`(${id})`)} │`,
      `└${"─".repeat(inner + 2)}┘`,
    ];
  }

  private isChain(graph: GraphDescriptor, ordered: string[]): boolean {
    if (graph.edges.length !== ordered.length - 1) return false;
    return graph.edges.every((e) => ordered.indexOf(e.to) === ordered.indexOf(e.from) + 1);
  }

  private topologicalSort(graph: GraphDescriptor): string[] {
    const adjacency = new Map<string, string[]>();
    const inDegree = new Map<string, number>();
    for (const n of graph.nodes) {
      adjacency.set(n.id, []);
      inDegree.set(n.id, 0);
    }
    for (const e of graph.edges) {
      adjacency.get(e.from)?.push(e.to);
      inDegree.set(e.to, (inDegree.get(e.to) ?? 0) + 1);
    }
    const queue = graph.nodes.filter((n) => (inDegree.get(n.id) ?? 0) === 0).map((n) => n.id);
    const result: string[] = [];
    for (let id = queue.shift(); id !== undefined; id = queue.shift()) {
      result.push(id);
      for (const next of adjacency.get(id) ?? []) {
        const deg = (inDegree.get(next) ?? 1) - 1;
        inDegree.set(next, deg);
        if (deg === 0) queue.push(next);
      }
    }
    return result;
  }
}
