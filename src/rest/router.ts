// =============================================================================
// REST API — Simple path-based router (zero dependencies)
// =============================================================================

import type { IncomingMessage, ServerResponse } from "node:http";
import type { z } from "zod";
import type { AuthUser } from "../ports/auth.port.js";
import type { ErrorKind } from "../errors.js";
import { RecommenderError, ValidationError, toErrorPayload } from "../errors.js";

export interface RequestContext {
  params: Record<string, string>;
  url: URL;
  /** Aborted when the client goes away before the response is sent */
  signal: AbortSignal;
  /** Set on routes registered with `auth: true` */
  user?: AuthUser;
}

export type RouteHandler = (
  req: IncomingMessage,
  res: ServerResponse,
  ctx: RequestContext,
) => void | Promise<void>;

export interface RouteOptions {
  /** Require a valid Bearer token. Default: false */
  auth?: boolean;
}

interface Route {
  method: string;
  path: string;
  handler: RouteHandler;
  auth: boolean;
}

export interface RouteMatch {
  handler: RouteHandler;
  params: Record<string, string>;
  auth: boolean;
}

export class Router {
  private readonly routes: Route[] = [];

  get(path: string, handler: RouteHandler, options?: RouteOptions): void {
    this.add("GET", path, handler, options);
  }

  post(path: string, handler: RouteHandler, options?: RouteOptions): void {
    this.add("POST", path, handler, options);
  }

  options(path: string, handler: RouteHandler): void {
    this.add("OPTIONS", path, handler);
  }

  /** Every distinct path with at least one route. */
  paths(): string[] {
    return [...new Set(this.routes.map((r) => r.path))];
  }

  /** Whether some route exists for the path under another method. */
  hasPath(pathname: string): boolean {
    return this.routes.some((r) => matchPath(r.path, pathname) !== null);
  }

  resolve(method: string, pathname: string): RouteMatch | null {
    for (const route of this.routes) {
      if (route.method !== method) continue;
      const params = matchPath(route.path, pathname);
      if (params !== null) {
        return { handler: route.handler, params, auth: route.auth };
      }
    }
    return null;
  }

  private add(method: string, path: string, handler: RouteHandler, options?: RouteOptions): void {
    this.routes.push({ method, path, handler, auth: options?.auth ?? false });
  }
}

/** Simple path matcher supporting exact matches and `:param` segments. */
function matchPath(
  pattern: string,
  pathname: string,
): Record<string, string> | null {
  if (pattern === pathname) return {};

  const patternParts = pattern.split("/");
  const pathParts = pathname.split("/");
  if (patternParts.length !== pathParts.length) return null;

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i++) {
    const pp = patternParts[i];
    if (pp.startsWith(":")) {
      params[pp.slice(1)] = pathParts[i];
    } else if (pp !== pathParts[i]) {
      return null;
    }
  }
  return params;
}

// ---------------------------------------------------------------------------
// HTTP helpers
// ---------------------------------------------------------------------------

const MAX_BODY_BYTES = 1_048_576; // 1 MB

export function parseBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        req.destroy();
        reject(new ValidationError("Request body too large (max 1MB)"));
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}

/** Reads the body as JSON and validates it. Throws ValidationError. */
export async function readJson<S extends z.ZodTypeAny>(
  req: IncomingMessage,
  schema: S,
): Promise<z.output<S>> {
  const raw = await parseBody(req);
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new ValidationError("Invalid JSON body");
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".");
    throw new ValidationError(issue?.message ?? "Invalid request body", field || undefined);
  }
  return parsed.data;
}

export function sendJson(
  res: ServerResponse,
  status: number,
  data: unknown,
): void {
  const body = JSON.stringify(data);
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(body);
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  validation: 400,
  auth: 401,
  not_found: 404,
  cancelled: 499,
  ownership_violation: 500,
  graph_definition: 500,
  internal: 500,
  upstream: 502,
  empty_preferences: 200,
  empty_result: 200,
};

export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/** Writes `{ error: { kind, message } }`. Unknown errors never leak their message. */
export function sendError(res: ServerResponse, err: unknown, status?: number): void {
  const payload =
    err instanceof RecommenderError
      ? toErrorPayload(err)
      : { kind: "internal" as const, message: "Internal server error" };
  sendJson(res, status ?? statusForKind(payload.kind), { error: payload });
}
