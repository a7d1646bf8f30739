// =============================================================================
// ModelPort — Text-completion abstraction contract
// =============================================================================

export interface CompletionRequest {
  /** The user-facing prompt text */
  prompt: string;
  /** Optional system instructions sent ahead of the prompt */
  system?: string;
  temperature?: number;
  maxTokens?: number;
  /** Aborts the in-flight call (run cancellation or per-call timeout) */
  signal?: AbortSignal;
}

export interface ModelHealth {
  healthy: boolean;
  latencyMs?: number;
  error?: string;
}

export interface ModelPort {
  /** Get the model identifier */
  getModelId(): string;

  /** Complete a prompt. Implementations throw UpstreamServiceError on failure. */
  complete(request: CompletionRequest): Promise<string>;

  /** Cheap reachability probe used by the health endpoint. Aborting ends it unhealthy. */
  healthCheck(signal?: AbortSignal): Promise<ModelHealth>;
}
