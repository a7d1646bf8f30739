// =============================================================================
// AppConfig — Environment-driven configuration
// =============================================================================

import { z } from "zod";
import type { WorkflowConfig } from "./domain/graph.schema.js";
import { LOG_LEVELS } from "./middleware/logging.js";
import { DEFAULT_GROQ_MODEL } from "./providers/groq.js";
import { ValidationError } from "./errors.js";

const requiredString = z.string().trim().min(1, "is required");

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

export const AppConfigSchema = z.object({
  GROQ_API_KEY: requiredString,
  MODEL_NAME: z.string().trim().min(1).default(DEFAULT_GROQ_MODEL),
  SUPABASE_URL: requiredString.url(),
  SUPABASE_KEY: requiredString,
  PORT: z.coerce.number().int().min(0).max(65_535).default(8000),
  TOP_K: z.coerce.number().int().min(1).max(50).default(10),
  CANDIDATES_PER_TYPE: z.coerce.number().int().min(1).max(20).default(5),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MODEL_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
  RUN_RETENTION_MS: z.coerce.number().int().positive().default(900_000),
  MAX_RETAINED_RUNS: z.coerce.number().int().positive().default(1000),
  MAX_INPUT_LENGTH: z.coerce.number().int().positive().default(2000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  CORS: booleanFlag.default("true"),
});

export type AppConfig = z.output<typeof AppConfigSchema>;

/**
 * Reads configuration from the environment. Empty variables count as unset.
 * Throws ValidationError naming the first offending variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value;
  }

  const parsed = AppConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join(".") || "environment";
    const message = issue?.code === "invalid_type" && issue.received === "undefined"
      ? "is required"
      : (issue?.message ?? "is invalid");
    throw new ValidationError(message, field);
  }
  return parsed.data;
}

export function toWorkflowConfig(config: AppConfig): WorkflowConfig {
  return {
    maxInputLength: config.MAX_INPUT_LENGTH,
    candidatesPerType: config.CANDIDATES_PER_TYPE,
    topK: config.TOP_K,
  };
}
