// =============================================================================
// GraphVisualizationPort — Contract for graph rendering
// =============================================================================

export interface GraphDescriptor {
  readonly nodes: readonly { readonly id: string; readonly label?: string }[];
  readonly edges: readonly { readonly from: string; readonly to: string }[];
}

export interface GraphVisualizationPort {
  render(graph: GraphDescriptor): string;
}
