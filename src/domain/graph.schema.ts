// =============================================================================
// Graph Schema — Node identifiers, field ownership, run state & events
// =============================================================================

import { z } from "zod";
import type { ErrorKind, ErrorPayload } from "../errors.js";
import type {
  Candidate,
  ContentType,
  FormattedResponse,
  PreferenceRecord,
  RankedCandidate,
} from "./recommendation.schema.js";

export const NODE_IDS = [
  "parse_preferences",
  "generate_candidates",
  "rank_candidates",
  "format_response",
] as const;

export const NodeIdSchema = z.enum(NODE_IDS);

export type NodeId = z.infer<typeof NodeIdSchema>;

export const NODE_LABELS: Readonly<Record<NodeId, string>> = {
  parse_preferences: "Preference Parser",
  generate_candidates: "Candidate Generator",
  rank_candidates: "Ranker",
  format_response: "Response Formatter",
};

export const WorkflowConfigSchema = z.object({
  maxInputLength: z.number().int().positive().default(2000),
  candidatesPerType: z.number().int().min(1).max(20).default(5),
  topK: z.number().int().min(1).max(50).default(10),
});

export type WorkflowConfig = z.infer<typeof WorkflowConfigSchema>;

// ---------------------------------------------------------------------------
// Run state
// ---------------------------------------------------------------------------

/** Fields written by nodes. Each one has exactly one owner (see FIELD_OWNERSHIP). */
export interface RunStateFields {
  preferences?: PreferenceRecord;
  candidates?: Candidate[];
  degradedContentTypes?: ContentType[];
  ranked?: RankedCandidate[];
  response?: FormattedResponse;
}

export type StateField = keyof RunStateFields;

export const FIELD_OWNERSHIP = {
  parse_preferences: ["preferences"],
  generate_candidates: ["candidates", "degradedContentTypes"],
  rank_candidates: ["ranked"],
  format_response: ["response"],
} as const satisfies Record<NodeId, readonly StateField[]>;

export type OwnedField<K extends NodeId> = (typeof FIELD_OWNERSHIP)[K][number];

/** What a node handler must return: every field it owns, and nothing else. */
export type NodeOutput<K extends NodeId> = {
  [F in OwnedField<K>]-?: NonNullable<RunStateFields[F]>;
};

export type RunStatus = "pending" | "running" | "completed" | "failed";

export interface RunFailure {
  nodeId?: NodeId;
  kind: ErrorKind;
  message: string;
}

export interface RunOutcome {
  kind: "no_preferences" | "no_results";
  nodeId: NodeId;
  message: string;
}

export type SnapshotState = { readonly rawText: string } & Readonly<RunStateFields>;

export interface Snapshot {
  readonly nodeId: NodeId;
  readonly sequence: number;
  readonly timestamp: string;
  readonly state: SnapshotState;
}

export interface RunState extends RunStateFields {
  readonly runId: string;
  readonly rawText: string;
  status: RunStatus;
  history: Snapshot[];
  failure?: RunFailure;
  outcome?: RunOutcome;
  readonly createdAt: string;
  finishedAt?: string;
}

/** Read-only view handed to node handlers. */
export type RunStateView = Readonly<Pick<RunState, "runId" | "rawText">> &
  Readonly<RunStateFields>;

export interface RunInspection {
  runId: string;
  status: RunStatus;
  snapshots: readonly Snapshot[];
  failure?: RunFailure;
  outcome?: RunOutcome;
}

// ---------------------------------------------------------------------------
// Topology
// ---------------------------------------------------------------------------

export interface GraphEdge {
  readonly from: NodeId;
  readonly to: NodeId;
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type WorkflowEvent =
  | { type: "run:start"; runId: string; inputLength: number }
  | { type: "node:start"; runId: string; nodeId: NodeId }
  | { type: "node:complete"; runId: string; nodeId: NodeId; sequence: number; durationMs: number }
  | { type: "node:error"; runId: string; nodeId: NodeId; error: ErrorPayload }
  | { type: "run:complete"; runId: string; durationMs: number; outcome?: RunOutcome["kind"] }
  | { type: "run:failed"; runId: string; durationMs: number; failure: RunFailure }
  | { type: "run:evicted"; runId: string; reason: "expired" | "capacity" };

export type WorkflowEventType = WorkflowEvent["type"];
