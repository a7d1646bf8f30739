// =============================================================================
// providers/groq — Groq-hosted language model via the AI SDK
// =============================================================================

import { createGroq } from "@ai-sdk/groq";
import type { GroqProviderSettings } from "@ai-sdk/groq";
import type { LanguageModel } from "ai";

export type GroqProviderOptions = GroqProviderSettings;

export const DEFAULT_GROQ_MODEL = "llama-3.3-70b-versatile";

/**
 * Create a Groq language model.
 *
 * @example
 * ```ts
 * const model = groq("llama-3.3-70b-versatile", { apiKey: process.env.GROQ_API_KEY });
 * const port = new AiSdkModelAdapter({ model, modelId: "llama-3.3-70b-versatile" });
 * ```
 */
export function groq(modelId: string = DEFAULT_GROQ_MODEL, options?: GroqProviderOptions): LanguageModel {
  const provider = createGroq(options);
  return provider(modelId);
}
