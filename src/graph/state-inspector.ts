// =============================================================================
// StateInspector — Read-only access to a run's snapshot history
// =============================================================================

import type { RunInspection, Snapshot } from "../domain/graph.schema.js";
import type { RunRegistry } from "./run-registry.js";

export class StateInspector {
  constructor(private readonly registry: RunRegistry) {}

  /** Snapshots in node-completion order. Throws NotFoundError for unknown or evicted runs. */
  getStates(runId: string): readonly Snapshot[] {
    return [...this.registry.get(runId).history];
  }

  /** Snapshots plus status and failure/outcome metadata. */
  inspect(runId: string): RunInspection {
    const run = this.registry.get(runId);
    const inspection: RunInspection = {
      runId: run.runId,
      status: run.status,
      snapshots: [...run.history],
    };
    if (run.failure) inspection.failure = { ...run.failure };
    if (run.outcome) inspection.outcome = { ...run.outcome };
    return inspection;
  }
}
