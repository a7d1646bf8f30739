// =============================================================================
// REST API — Type Definitions
// =============================================================================

import { z } from "zod";
import type { FormattedResponse } from "../domain/recommendation.schema.js";
import type { NodeId, RunStatus } from "../domain/graph.schema.js";
import type { ErrorPayload } from "../errors.js";

export interface ServerOptions {
  /** Port to listen on. Default: 8000 */
  port?: number;
  /** Host to bind. Default: all interfaces */
  host?: string;
  /** Enable CORS headers. Default: true */
  cors?: boolean;
  /** Reported by `GET /`. Default: "0.1.0" */
  version?: string;
}

export const CredentialsBodySchema = z.object({
  email: z.string().trim().email(),
  password: z.string().min(6),
});

export const RecommendBodySchema = z.object({
  user_input: z.string(),
});

export const GetStateBodySchema = z.union([
  z.object({ run_id: z.string().min(1) }),
  z.object({ user_input: z.string() }),
]);

export interface HealthResponse {
  status: "ok" | "degraded";
  graphLoaded: boolean;
  modelReachable: boolean;
  version: string;
}

export interface RecommendResponse {
  runId: string;
  status: RunStatus;
  response: FormattedResponse | null;
}

export interface RunFailedResponse {
  error: ErrorPayload;
  runId: string;
  failedNode: NodeId | null;
}

export interface ErrorResponse {
  error: ErrorPayload;
}
