// =============================================================================
// RunRegistry — run_id → RunState with retention-based eviction
// =============================================================================

import { randomUUID } from "node:crypto";
import type { RunState } from "../domain/graph.schema.js";
import { NotFoundError } from "../errors.js";

export type EvictionReason = "expired" | "capacity";

export interface RunRegistryOptions {
  /** How long a finished run stays queryable, in ms. Default: 15 minutes */
  retentionMs?: number;
  /** Maximum number of retained runs; the oldest finished run goes first. Default: 1000 */
  maxRuns?: number;
  /** Background sweep period in ms; 0 disables the timer. Default: 60_000 */
  sweepIntervalMs?: number;
  now?: () => number;
  generateId?: () => string;
  onEvict?: (runId: string, reason: EvictionReason) => void;
}

/**
 * Owns every RunState of the process. All mutations of the map are synchronous,
 * so no insert or eviction can interleave with another on the event loop.
 */
export class RunRegistry {
  private readonly runs = new Map<string, RunState>();
  /** runId → epoch ms after which a finished run is dropped */
  private readonly expiries = new Map<string, number>();
  private readonly retentionMs: number;
  private readonly maxRuns: number;
  private readonly now: () => number;
  private readonly generateId: () => string;
  private readonly timer: ReturnType<typeof setInterval> | undefined;

  constructor(private readonly options: RunRegistryOptions = {}) {
    this.retentionMs = options.retentionMs ?? 15 * 60_000;
    this.maxRuns = Math.max(1, options.maxRuns ?? 1000);
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;

    const interval = options.sweepIntervalMs ?? 60_000;
    if (interval > 0) {
      this.timer = setInterval(() => this.sweep(), interval);
      this.timer.unref();
    }
  }

  create(rawText: string): RunState {
    this.sweep();
    this.enforceCapacity();

    const runId = this.generateId();
    if (this.runs.has(runId)) {
      throw new Error(`RunRegistry: duplicate run id "${runId}"`);
    }
    const run: RunState = {
      runId,
      rawText,
      status: "pending",
      history: [],
      createdAt: new Date(this.now()).toISOString(),
    };
    this.runs.set(runId, run);
    return run;
  }

  /** Starts the retention clock of a run that reached a terminal state. */
  markFinished(runId: string): void {
    if (this.runs.has(runId)) {
      this.expiries.set(runId, this.now() + this.retentionMs);
    }
  }

  get(runId: string): RunState {
    this.sweep();
    const run = this.runs.get(runId);
    if (!run) throw new NotFoundError("Run", runId);
    return run;
  }

  has(runId: string): boolean {
    this.sweep();
    return this.runs.has(runId);
  }

  get size(): number {
    return this.runs.size;
  }

  /** Drops expired runs; returns how many were dropped. */
  sweep(): number {
    const now = this.now();
    let dropped = 0;
    for (const [runId, expiresAt] of this.expiries) {
      if (expiresAt <= now) {
        this.evict(runId, "expired");
        dropped++;
      }
    }
    return dropped;
  }

  dispose(): void {
    if (this.timer) clearInterval(this.timer);
    this.runs.clear();
    this.expiries.clear();
  }

  private enforceCapacity(): void {
    // Map iteration order is insertion order, so the first finished run is the oldest
    for (const [runId] of this.expiries) {
      if (this.runs.size < this.maxRuns) return;
      this.evict(runId, "capacity");
    }
  }

  private evict(runId: string, reason: EvictionReason): void {
    this.runs.delete(runId);
    this.expiries.delete(runId);
    this.options.onEvict?.(runId, reason);
  }
}
