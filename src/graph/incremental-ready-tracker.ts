// =============================================================================
// IncrementalReadyTracker — Incremental Kahn's algorithm
// =============================================================================

export class IncrementalReadyTracker<Id extends string = string> {
  /** nodeId → number of pending (uncompleted) dependencies */
  private readonly pendingDeps = new Map<Id, number>();
  /** nodeId → list of successor nodeIds (reverse edges) */
  private readonly successors = new Map<Id, Id[]>();
  private readonly completed = new Set<Id>();

  constructor(
    dependencies: ReadonlyMap<Id, readonly Id[]>,
    allNodeIds: Iterable<Id>,
    private readonly onReady: (nodeId: Id) => void,
  ) {
    for (const nodeId of allNodeIds) {
      const deps = dependencies.get(nodeId) ?? [];
      this.pendingDeps.set(nodeId, deps.length);

      for (const dep of deps) {
        let succ = this.successors.get(dep);
        if (!succ) {
          succ = [];
          this.successors.set(dep, succ);
        }
        succ.push(nodeId);
      }
    }
  }

  /** Emit all nodes with zero dependencies, in declaration order */
  seedInitialReady(): void {
    for (const [nodeId, count] of this.pendingDeps) {
      if (count === 0) this.onReady(nodeId);
    }
  }

  /** Mark a node as completed; returns list of newly-ready successors */
  markCompleted(nodeId: Id): Id[] {
    if (this.completed.has(nodeId)) return [];
    this.completed.add(nodeId);

    const newlyReady: Id[] = [];
    for (const succ of this.successors.get(nodeId) ?? []) {
      const remaining = (this.pendingDeps.get(succ) ?? 1) - 1;
      this.pendingDeps.set(succ, remaining);

      if (remaining === 0) {
        newlyReady.push(succ);
        this.onReady(succ);
      }
    }
    return newlyReady;
  }

  /** Nodes not yet completed */
  remaining(): Id[] {
    return [...this.pendingDeps.keys()].filter((id) => !this.completed.has(id));
  }
}
