// =============================================================================
// REST API — RecommenderServer (zero-dependency HTTP server using node:http)
// =============================================================================

import { createServer, type Server, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import type { ServerOptions } from "./types.js";
import { Router, sendError } from "./router.js";
import type { RequestContext } from "./router.js";
import {
  handleGetState,
  handleHealth,
  handleLogin,
  handleRecommend,
  handleRegister,
  handleVisualize,
} from "./handlers.js";
import type { HandlerDeps } from "./handlers.js";
import type { RecommenderContext } from "../context.js";
import type { AuthPort, AuthUser } from "../ports/auth.port.js";
import type { UserStorePort } from "../ports/user-store.port.js";
import type { Logger } from "../middleware/logging.js";
import { AuthError, RecommenderError, errorMessage } from "../errors.js";

export interface RecommenderServerDeps {
  context: RecommenderContext;
  auth: AuthPort;
  users: UserStorePort;
  logger?: Logger;
}

export class RecommenderServer {
  private readonly options: Required<Omit<ServerOptions, "host">> & Pick<ServerOptions, "host">;
  private readonly router: Router;
  private server: Server | null = null;

  constructor(
    private readonly deps: RecommenderServerDeps,
    options?: ServerOptions,
  ) {
    this.options = {
      port: options?.port ?? 8000,
      host: options?.host,
      cors: options?.cors ?? true,
      version: options?.version ?? "0.1.0",
    };

    this.router = new Router();
    this.registerRoutes();
  }

  private registerRoutes(): void {
    const handlerDeps: HandlerDeps = {
      context: this.deps.context,
      auth: this.deps.auth,
      users: this.deps.users,
      version: this.options.version,
    };

    // Public endpoints
    this.router.get("/", handleHealth(handlerDeps));
    this.router.post("/register", handleRegister(handlerDeps));
    this.router.post("/login", handleLogin(handlerDeps));
    this.router.get("/visualize_workflow", handleVisualize(handlerDeps));

    // Protected endpoints
    this.router.post("/recommend", handleRecommend(handlerDeps), { auth: true });
    this.router.post("/get_state", handleGetState(handlerDeps), { auth: true });

    // CORS preflight for every route
    if (this.options.cors) {
      const corsHandler = (_req: IncomingMessage, res: ServerResponse) => {
        res.writeHead(204);
        res.end();
      };
      for (const path of this.router.paths()) {
        this.router.options(path, corsHandler);
      }
    }
  }

  private addCorsHeaders(res: ServerResponse): void {
    if (!this.options.cors) return;
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization");
  }

  private async authenticate(req: IncomingMessage): Promise<AuthUser> {
    const authHeader = req.headers.authorization;
    if (!authHeader) throw new AuthError("Missing bearer token");

    const [scheme, token] = authHeader.split(" ");
    if (scheme !== "Bearer" || !token) {
      throw new AuthError("Authorization header must be 'Bearer <token>'");
    }
    return this.deps.auth.validateToken(token);
  }

  private handleRequest = async (
    req: IncomingMessage,
    res: ServerResponse,
  ): Promise<void> => {
    this.addCorsHeaders(res);

    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method?.toUpperCase() ?? "GET";
    const pathname = url.pathname;

    // The run belonging to this request is cancelled if the client hangs up early
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) controller.abort();
    });

    try {
      const match = this.router.resolve(method, pathname);
      if (!match) {
        const status = this.router.hasPath(pathname) ? 405 : 404;
        const message = status === 405 ? `Method not allowed: ${method} ${pathname}` : `Not found: ${method} ${pathname}`;
        return sendError(res, new RecommenderError("not_found", message), status);
      }

      const ctx: RequestContext = { params: match.params, url, signal: controller.signal };
      if (match.auth) {
        ctx.user = await this.authenticate(req);
      }
      await match.handler(req, res, ctx);
    } catch (err) {
      if (!(err instanceof RecommenderError)) {
        this.deps.logger?.({
          timestamp: Date.now(),
          level: "error",
          event: "http:error",
          data: { method, path: pathname, error: errorMessage(err) },
        });
      }
      if (!res.headersSent && !controller.signal.aborted) {
        sendError(res, err);
      }
    }
  };

  /** Starts listening; resolves with the bound port (useful with port 0). */
  async listen(port?: number): Promise<number> {
    const p = port ?? this.options.port;
    const server = createServer(this.handleRequest);
    this.server = server;
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(p, this.options.host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    return this.port(server);
  }

  async close(): Promise<void> {
    const server = this.server;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      if (!server) return resolve();
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private port(server: Server): number {
    const address: AddressInfo | string | null = server.address();
    return typeof address === "object" && address ? address.port : this.options.port;
  }
}
