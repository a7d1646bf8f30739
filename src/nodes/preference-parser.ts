// =============================================================================
// Preference Parser — raw text → PreferenceRecord (one model call)
// =============================================================================

import { ParsedPreferencesOutputSchema } from "../domain/recommendation.schema.js";
import type { ContentType, PreferenceRecord } from "../domain/recommendation.schema.js";
import type { NodeContext, NodeHandler } from "../graph/node.js";
import { EmptyPreferenceError, UpstreamServiceError } from "../errors.js";
import { normalizeContentType } from "./content-type.js";
import { extractJson } from "./json-output.js";
import { PREFERENCE_SYSTEM_PROMPT, buildPreferencePrompt } from "./prompts.js";

export async function parsePreferences(
  rawText: string,
  ctx: Pick<NodeContext, "model" | "signal">,
): Promise<PreferenceRecord> {
  const completion = await ctx.model.complete({
    system: PREFERENCE_SYSTEM_PROMPT,
    prompt: buildPreferencePrompt(rawText),
    temperature: 0,
    signal: ctx.signal,
  });

  const parsed = ParsedPreferencesOutputSchema.safeParse(extractJson(completion));
  if (!parsed.success) {
    throw new UpstreamServiceError(
      "malformed",
      `Preference extraction returned an unexpected shape: ${parsed.error.issues[0]?.message ?? "invalid"}`,
    );
  }

  const contentTypes: ContentType[] = [];
  for (const raw of parsed.data.content_types) {
    const type = normalizeContentType(raw);
    if (type && !contentTypes.includes(type)) contentTypes.push(type);
  }
  if (contentTypes.length === 0) {
    throw new EmptyPreferenceError();
  }

  return { contentTypes, themes: normalizeThemes(parsed.data.themes), rawText };
}

/** Trim, lower-case and de-duplicate, keeping first-mention order. */
export function normalizeThemes(themes: readonly string[]): string[] {
  const seen = new Set<string>();
  for (const theme of themes) {
    const normalized = theme.trim().toLowerCase().replace(/\s+/g, " ");
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

export const parsePreferencesNode: NodeHandler<"parse_preferences"> = async (state, ctx) => ({
  preferences: await parsePreferences(state.rawText, ctx),
});
