// =============================================================================
// REST API — Request Handlers
// =============================================================================

import type { IncomingMessage, ServerResponse } from "node:http";
import type { RecommenderContext } from "../context.js";
import type { RunState } from "../domain/graph.schema.js";
import type { AuthPort } from "../ports/auth.port.js";
import type { UserStorePort } from "../ports/user-store.port.js";
import { ValidationError } from "../errors.js";
import { isTopologyFormat, TOPOLOGY_FORMATS } from "../graph/topology-renderer.js";
import { responseFor } from "../nodes/response-formatter.js";
import { readJson, sendJson, statusForKind } from "./router.js";
import type { RequestContext, RouteHandler } from "./router.js";
import {
  CredentialsBodySchema,
  GetStateBodySchema,
  RecommendBodySchema,
} from "./types.js";
import type { HealthResponse, RecommendResponse, RunFailedResponse } from "./types.js";

export interface HandlerDeps {
  context: RecommenderContext;
  auth: AuthPort;
  users: UserStorePort;
  version: string;
}

// ---------------------------------------------------------------------------
// GET / (Health)
// ---------------------------------------------------------------------------

export function handleHealth(deps: HandlerDeps): RouteHandler {
  return async (_req, res) => {
    const graphLoaded = deps.context.graph.nodeIds.length > 0;
    const modelReachable = await deps.context.model
      .healthCheck()
      .then((h) => h.healthy, () => false);

    const body: HealthResponse = {
      status: graphLoaded && modelReachable ? "ok" : "degraded",
      graphLoaded,
      modelReachable,
      version: deps.version,
    };
    sendJson(res, body.status === "ok" ? 200 : 503, body);
  };
}

// ---------------------------------------------------------------------------
// POST /register, POST /login
// ---------------------------------------------------------------------------

export function handleRegister(deps: HandlerDeps): RouteHandler {
  return async (req, res) => {
    const credentials = await readJson(req, CredentialsBodySchema);
    const user = await deps.users.createUser(credentials);
    sendJson(res, 201, {
      message: "User registered. Check your email to confirm the address.",
      user,
    });
  };
}

export function handleLogin(deps: HandlerDeps): RouteHandler {
  return async (req, res) => {
    const credentials = await readJson(req, CredentialsBodySchema);
    const token = await deps.auth.issueToken(credentials);
    sendJson(res, 200, { access_token: token.accessToken, user: token.user });
  };
}

// ---------------------------------------------------------------------------
// POST /recommend
// ---------------------------------------------------------------------------

export function handleRecommend(deps: HandlerDeps): RouteHandler {
  return async (req, res, ctx) => {
    const body = await readJson(req, RecommendBodySchema);
    const run = await deps.context.executor.execute(body.user_input, { signal: ctx.signal });
    if (ctx.signal.aborted) return;

    if (run.status === "failed") {
      return sendRunFailure(res, run);
    }
    const payload: RecommendResponse = {
      runId: run.runId,
      status: run.status,
      response: responseFor(run) ?? null,
    };
    sendJson(res, 200, payload);
  };
}

function sendRunFailure(res: ServerResponse, run: Readonly<RunState>): void {
  const failure = run.failure ?? { kind: "internal" as const, message: "Run failed" };
  const body: RunFailedResponse = {
    error: { kind: failure.kind, message: failure.message },
    runId: run.runId,
    failedNode: failure.nodeId ?? null,
  };
  sendJson(res, statusForKind(failure.kind), body);
}

// ---------------------------------------------------------------------------
// POST /get_state
// ---------------------------------------------------------------------------

/** Inspects `run_id`, or executes `user_input` first and inspects the new run. */
export function handleGetState(deps: HandlerDeps): RouteHandler {
  return async (req, res, ctx) => {
    const body = await readJson(req, GetStateBodySchema);
    const runId =
      "run_id" in body
        ? body.run_id
        : (await deps.context.executor.execute(body.user_input, { signal: ctx.signal })).runId;
    sendJson(res, 200, deps.context.inspector.inspect(runId));
  };
}

// ---------------------------------------------------------------------------
// GET /visualize_workflow
// ---------------------------------------------------------------------------

export function handleVisualize(deps: HandlerDeps): RouteHandler {
  return (_req: IncomingMessage, res: ServerResponse, ctx: RequestContext) => {
    const format = ctx.url.searchParams.get("format") ?? "json";
    if (!isTopologyFormat(format)) {
      throw new ValidationError(`must be one of ${TOPOLOGY_FORMATS.join(", ")}`, "format");
    }
    if (format === "json") {
      sendJson(res, 200, deps.context.topology.render("json"));
      return;
    }
    sendJson(res, 200, { format, diagram: deps.context.topology.render(format) });
  };
}
