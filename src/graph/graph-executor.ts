// =============================================================================
// GraphExecutor — Runs the workflow graph over one run-local state object
// Ready nodes are discovered from the edge list (IncrementalReadyTracker) and
// each wave of ready nodes runs concurrently; every completed node appends one
// frozen snapshot, in completion order.
// =============================================================================

import { FIELD_OWNERSHIP } from "../domain/graph.schema.js";
import type {
  NodeId,
  RunFailure,
  RunState,
  RunStateFields,
  RunStateView,
  Snapshot,
  SnapshotState,
  StateField,
  WorkflowConfig,
} from "../domain/graph.schema.js";
import type { ModelPort } from "../ports/model.port.js";
import {
  CancelledError,
  OutcomeError,
  OwnershipViolationError,
  RecommenderError,
  ValidationError,
  toErrorPayload,
} from "../errors.js";
import type { EventBus } from "./event-bus.js";
import { IncrementalReadyTracker } from "./incremental-ready-tracker.js";
import type { NodeContext, NodeHandlers } from "./node.js";
import type { RunRegistry } from "./run-registry.js";
import type { WorkflowGraph } from "./workflow-graph.js";
import { raceAbort } from "../utils/abort.js";

export interface ExecuteOptions {
  /** Aborting cancels the run; snapshots taken so far are kept. */
  signal?: AbortSignal;
}

export interface GraphExecutorDeps {
  graph: WorkflowGraph;
  handlers: NodeHandlers;
  registry: RunRegistry;
  model: ModelPort;
  config: WorkflowConfig;
  events?: EventBus;
  now?: () => number;
}

type NodeAttempt =
  | { nodeId: NodeId; ok: true }
  | { nodeId: NodeId; ok: false; error: unknown };

export class GraphExecutor {
  private readonly now: () => number;

  constructor(private readonly deps: GraphExecutorDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Executes one run to a terminal state. Node failures never reject: they end
   * the run as `failed`. Only invalid input rejects, before any run exists.
   */
  async execute(rawText: string, options: ExecuteOptions = {}): Promise<Readonly<RunState>> {
    this.validateInput(rawText);
    const run = this.deps.registry.create(rawText);
    await this.runToCompletion(run, options.signal);
    return run;
  }

  /** Whitespace-only text counts as empty; the text itself is kept as given. */
  private validateInput(rawText: unknown): asserts rawText is string {
    if (typeof rawText !== "string" || rawText.trim().length === 0) {
      throw new ValidationError("Preferences text must not be empty", "preferences");
    }
    if (rawText.length > this.deps.config.maxInputLength) {
      throw new ValidationError(
        `Preferences text must be at most ${this.deps.config.maxInputLength} characters`,
        "preferences",
      );
    }
  }

  private async runToCompletion(run: RunState, signal: AbortSignal | undefined): Promise<void> {
    const { graph, events } = this.deps;
    const start = this.now();
    run.status = "running";
    events?.emit({ type: "run:start", runId: run.runId, inputLength: run.rawText.length });

    const ready: NodeId[] = [];
    const tracker = new IncrementalReadyTracker(graph.dependencies(), graph.nodeIds, (id) => {
      ready.push(id);
    });
    tracker.seedInitialReady();

    while (ready.length > 0) {
      const wave = ready.splice(0, ready.length);
      const attempts = await Promise.all(
        wave.map((nodeId) => this.runNode(run, nodeId, tracker, signal)),
      );

      const failed = attempts.find((a): a is Extract<NodeAttempt, { ok: false }> => !a.ok);
      if (failed) {
        this.finishWithError(run, failed.nodeId, failed.error, start);
        return;
      }
    }

    const unreached = tracker.remaining();
    if (unreached.length > 0) {
      this.fail(run, start, {
        kind: "internal",
        message: `Nodes never became ready: ${unreached.join(", ")}`,
      });
      return;
    }

    this.complete(run, start);
  }

  private async runNode(
    run: RunState,
    nodeId: NodeId,
    tracker: IncrementalReadyTracker<NodeId>,
    signal: AbortSignal | undefined,
  ): Promise<NodeAttempt> {
    const { events } = this.deps;
    const nodeStart = this.now();
    try {
      if (signal?.aborted) throw new CancelledError();
      events?.emit({ type: "node:start", runId: run.runId, nodeId });

      const ctx: NodeContext = {
        runId: run.runId,
        model: this.deps.model,
        config: this.deps.config,
        signal,
      };
      const output = await raceAbort(this.invoke(nodeId, this.viewOf(run), ctx), signal);
      if (signal?.aborted) throw new CancelledError();

      this.commit(run, nodeId, output);
      const snapshot = this.appendSnapshot(run, nodeId);
      events?.emit({
        type: "node:complete",
        runId: run.runId,
        nodeId,
        sequence: snapshot.sequence,
        durationMs: this.now() - nodeStart,
      });
      tracker.markCompleted(nodeId);
      return { nodeId, ok: true };
    } catch (err) {
      const error = signal?.aborted && !(err instanceof OutcomeError) ? new CancelledError() : err;
      events?.emit({ type: "node:error", runId: run.runId, nodeId, error: toErrorPayload(error) });
      return { nodeId, ok: false, error };
    }
  }

  /** Exhaustive dispatch from node id to handler. */
  private invoke(
    nodeId: NodeId,
    view: RunStateView,
    ctx: NodeContext,
  ): Promise<Partial<RunStateFields>> {
    const { handlers } = this.deps;
    switch (nodeId) {
      case "parse_preferences":
        return handlers.parse_preferences(view, ctx);
      case "generate_candidates":
        return handlers.generate_candidates(view, ctx);
      case "rank_candidates":
        return handlers.rank_candidates(view, ctx);
      case "format_response":
        return handlers.format_response(view, ctx);
      default: {
        const unknownNode: never = nodeId;
        throw new RecommenderError("internal", `No handler for node "${String(unknownNode)}"`);
      }
    }
  }

  /** Writes a node's output after checking it only touches the fields the node owns. */
  private commit(run: RunState, nodeId: NodeId, output: Partial<RunStateFields>): void {
    const owned: readonly StateField[] = FIELD_OWNERSHIP[nodeId];
    for (const key of Object.keys(output)) {
      if (!owned.some((field) => field === key)) {
        throw new OwnershipViolationError(nodeId, key);
      }
    }
    for (const field of owned) {
      if (output[field] === undefined) {
        throw new RecommenderError("internal", `Node "${nodeId}" did not produce "${field}"`);
      }
      if (run[field] !== undefined) {
        throw new OwnershipViolationError(nodeId, field);
      }
    }
    Object.assign(run, deepFreeze(output));
  }

  private appendSnapshot(run: RunState, nodeId: NodeId): Snapshot {
    const { rawText, preferences, candidates, degradedContentTypes, ranked, response } = run;
    const state: SnapshotState = structuredClone({
      rawText,
      preferences,
      candidates,
      degradedContentTypes,
      ranked,
      response,
    });
    const snapshot: Snapshot = deepFreeze({
      nodeId,
      sequence: run.history.length + 1,
      timestamp: new Date(this.now()).toISOString(),
      state,
    });
    run.history.push(snapshot);
    return snapshot;
  }

  private viewOf(run: RunState): RunStateView {
    const { runId, rawText, preferences, candidates, degradedContentTypes, ranked, response } = run;
    return { runId, rawText, preferences, candidates, degradedContentTypes, ranked, response };
  }

  private finishWithError(run: RunState, nodeId: NodeId, error: unknown, start: number): void {
    if (error instanceof OutcomeError) {
      run.outcome = { kind: error.outcome, nodeId, message: error.message };
      this.complete(run, start);
      return;
    }
    this.fail(run, start, { nodeId, ...toErrorPayload(error) });
  }

  private complete(run: RunState, start: number): void {
    run.status = "completed";
    run.finishedAt = new Date(this.now()).toISOString();
    this.deps.registry.markFinished(run.runId);
    this.deps.events?.emit({
      type: "run:complete",
      runId: run.runId,
      durationMs: this.now() - start,
      outcome: run.outcome?.kind,
    });
  }

  private fail(run: RunState, start: number, failure: RunFailure): void {
    run.status = "failed";
    run.failure = failure;
    run.finishedAt = new Date(this.now()).toISOString();
    this.deps.registry.markFinished(run.runId);
    this.deps.events?.emit({
      type: "run:failed",
      runId: run.runId,
      durationMs: this.now() - start,
      failure,
    });
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const inner of Object.values(value)) deepFreeze(inner);
    Object.freeze(value);
  }
  return value;
}
