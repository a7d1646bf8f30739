// =============================================================================
// recommender-graph/rest — REST API Server
// =============================================================================

export { RecommenderServer } from "./server.js";
export type { RecommenderServerDeps } from "./server.js";
export { Router, parseBody, readJson, sendJson, sendError, statusForKind } from "./router.js";
export type { RequestContext, RouteHandler, RouteOptions } from "./router.js";
export type { HandlerDeps } from "./handlers.js";
export type {
  ServerOptions,
  ErrorResponse,
  HealthResponse,
  RecommendResponse,
  RunFailedResponse,
} from "./types.js";
