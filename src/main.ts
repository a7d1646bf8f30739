#!/usr/bin/env node
// =============================================================================
// recommender-graph — HTTP entry point
// =============================================================================

import "dotenv/config";

import { loadConfig, toWorkflowConfig } from "./config.js";
import { createRecommenderContext } from "./context.js";
import { EventBus } from "./graph/event-bus.js";
import { AiSdkModelAdapter } from "./adapters/model/ai-sdk.adapter.js";
import { ResilientModelAdapter } from "./adapters/model/resilient-model.adapter.js";
import { SupabaseAuthAdapter } from "./adapters/auth/supabase/supabase-auth.adapter.js";
import { SupabaseUserStoreAdapter } from "./adapters/user-store/supabase-user-store.adapter.js";
import { attachWorkflowLogging, createConsoleLogger } from "./middleware/logging.js";
import { groq } from "./providers/groq.js";
import { RecommenderServer } from "./rest/server.js";
import { errorMessage } from "./errors.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createConsoleLogger({ level: config.LOG_LEVEL });

  const model = new ResilientModelAdapter(
    new AiSdkModelAdapter({
      model: groq(config.MODEL_NAME, { apiKey: config.GROQ_API_KEY }),
      modelId: config.MODEL_NAME,
    }),
    {
      timeoutMs: config.MODEL_TIMEOUT_MS,
      maxRetries: config.MODEL_MAX_RETRIES,
      onRetry: (attempt, error) =>
        logger({
          timestamp: Date.now(),
          level: "warn",
          event: "model:retry",
          data: { attempt, reason: error.reason, message: error.message },
        }),
    },
  );

  const events = new EventBus({
    onListenerError: (err, event) =>
      logger({
        timestamp: Date.now(),
        level: "error",
        event: "event:listener_failed",
        runId: event.runId,
        data: { type: event.type, message: errorMessage(err) },
      }),
  });
  const context = createRecommenderContext({
    model,
    events,
    config: toWorkflowConfig(config),
    registry: { retentionMs: config.RUN_RETENTION_MS, maxRuns: config.MAX_RETAINED_RUNS },
  });
  attachWorkflowLogging(context.events, logger);

  const supabase = { config: { url: config.SUPABASE_URL, key: config.SUPABASE_KEY } };
  const server = new RecommenderServer(
    {
      context,
      auth: new SupabaseAuthAdapter(supabase),
      users: new SupabaseUserStoreAdapter(supabase),
      logger,
    },
    { port: config.PORT, cors: config.CORS },
  );

  const port = await server.listen();
  logger({ timestamp: Date.now(), level: "info", event: "server:listening", data: { port } });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger({ timestamp: Date.now(), level: "info", event: "server:shutdown", data: { signal } });
    server
      .close()
      .then(() => context.dispose())
      .then(
        () => process.exit(0),
        (err: unknown) => {
          logger({
            timestamp: Date.now(),
            level: "error",
            event: "server:shutdown_failed",
            data: { error: errorMessage(err) },
          });
          process.exit(1);
        },
      );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error(`recommender-graph failed to start: ${errorMessage(err)}`);
  process.exit(1);
});
