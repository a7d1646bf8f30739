// =============================================================================
// recommender-graph — Public API
// =============================================================================

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────

export {
  RecommenderError,
  ValidationError,
  UpstreamServiceError,
  OutcomeError,
  EmptyPreferenceError,
  EmptyResultError,
  NotFoundError,
  AuthError,
  CancelledError,
  OwnershipViolationError,
  GraphDefinitionError,
  toErrorPayload,
  errorMessage,
  type ErrorKind,
  type ErrorPayload,
  type UpstreamCause,
} from "./errors.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ports (contracts for hexagonal architecture)
// ─────────────────────────────────────────────────────────────────────────────

export type { ModelPort, CompletionRequest, ModelHealth } from "./ports/model.port.js";
export type { AuthPort, AuthUser, Credentials, IssuedToken } from "./ports/auth.port.js";
export type { UserStorePort, UserRecord } from "./ports/user-store.port.js";
export type {
  GraphDescriptor,
  GraphVisualizationPort,
} from "./ports/graph-visualization.port.js";

// ─────────────────────────────────────────────────────────────────────────────
// Domain Schemas
// ─────────────────────────────────────────────────────────────────────────────

export {
  CONTENT_TYPES,
  ContentTypeSchema,
  PreferenceRecordSchema,
  CandidateSchema,
  RankedCandidateSchema,
  RecommendationItemSchema,
  FormattedResponseSchema,
  type ContentType,
  type PreferenceRecord,
  type Candidate,
  type RankedCandidate,
  type RecommendationItem,
  type FormattedResponse,
} from "./domain/recommendation.schema.js";

export {
  NODE_IDS,
  NODE_LABELS,
  NodeIdSchema,
  FIELD_OWNERSHIP,
  WorkflowConfigSchema,
  type NodeId,
  type NodeOutput,
  type OwnedField,
  type StateField,
  type WorkflowConfig,
  type RunState,
  type RunStateFields,
  type RunStateView,
  type RunStatus,
  type RunFailure,
  type RunOutcome,
  type RunInspection,
  type Snapshot,
  type SnapshotState,
  type GraphEdge,
  type WorkflowEvent,
  type WorkflowEventType,
} from "./domain/graph.schema.js";

// ─────────────────────────────────────────────────────────────────────────────
// Workflow engine
// ─────────────────────────────────────────────────────────────────────────────

export {
  WorkflowGraph,
  WorkflowGraphBuilder,
  createRecommendationGraph,
} from "./graph/workflow-graph.js";
export { GraphExecutor, type ExecuteOptions, type GraphExecutorDeps } from "./graph/graph-executor.js";
export { RunRegistry, type RunRegistryOptions, type EvictionReason } from "./graph/run-registry.js";
export { StateInspector } from "./graph/state-inspector.js";
export {
  TopologyRenderer,
  TOPOLOGY_FORMATS,
  isTopologyFormat,
  type TopologyFormat,
} from "./graph/topology-renderer.js";
export { EventBus, type WorkflowEventHandler, type WorkflowEventOf } from "./graph/event-bus.js";
export type { NodeContext, NodeHandler, NodeHandlers } from "./graph/node.js";
export { createRecommenderContext } from "./context.js";
export type { RecommenderContext, RecommenderContextOptions } from "./context.js";

// ─────────────────────────────────────────────────────────────────────────────
// Nodes
// ─────────────────────────────────────────────────────────────────────────────

export {
  defaultNodeHandlers,
  parsePreferences,
  generateCandidates,
  rankCandidates,
  formatResponse,
  responseFor,
  type GenerationResult,
  type FormatOptions,
} from "./nodes/index.js";

// ─────────────────────────────────────────────────────────────────────────────
// Adapters
// ─────────────────────────────────────────────────────────────────────────────

export { AiSdkModelAdapter, type AiSdkModelAdapterOptions } from "./adapters/model/ai-sdk.adapter.js";
export {
  ResilientModelAdapter,
  type ResilienceOptions,
} from "./adapters/model/resilient-model.adapter.js";
export { SupabaseAuthAdapter } from "./adapters/auth/supabase/supabase-auth.adapter.js";
export { SupabaseUserStoreAdapter } from "./adapters/user-store/supabase-user-store.adapter.js";
export type {
  SupabaseAuthApi,
  SupabaseAdapterOptions,
  SupabaseConnectionConfig,
} from "./adapters/auth/supabase/supabase-client.js";
export { AsciiGraphAdapter } from "./adapters/graph-visualization/ascii-graph.adapter.js";
export { MermaidGraphAdapter } from "./adapters/graph-visualization/mermaid-graph.adapter.js";
export { groq, DEFAULT_GROQ_MODEL, type GroqProviderOptions } from "./providers/groq.js";

// ─────────────────────────────────────────────────────────────────────────────
// Ambient
// ─────────────────────────────────────────────────────────────────────────────

export { AppConfigSchema, loadConfig, toWorkflowConfig, type AppConfig } from "./config.js";
export {
  LOG_LEVELS,
  createConsoleLogger,
  attachWorkflowLogging,
  formatLogEntry,
  type LogEntry,
  type LogLevel,
  type Logger,
  type ConsoleLoggerOptions,
} from "./middleware/logging.js";
export { RecommenderServer, type RecommenderServerDeps } from "./rest/server.js";
export type { ServerOptions } from "./rest/types.js";
