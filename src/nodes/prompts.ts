// =============================================================================
// Prompt templates — fixed instruction text for every model call
// =============================================================================

import type { ContentType } from "../domain/recommendation.schema.js";

export const PREFERENCE_SYSTEM_PROMPT = [
  "You extract reading and viewing preferences from a user's message.",
  "Decide which content types the user wants: \"book\", \"movie\", or both.",
  "Extract short theme keywords (genres, topics, moods) in the order the user mentions them.",
  "Do not recommend anything.",
  "Answer with JSON only, exactly in this shape:",
  '{"content_types": ["book" | "movie", ...], "themes": ["keyword", ...]}',
].join("\n");

export function buildPreferencePrompt(rawText: string): string {
  return `User message:\n"""\n${rawText}\n"""`;
}

export const CANDIDATE_SYSTEM_PROMPT = [
  "You are a knowledgeable librarian and film curator.",
  "Suggest real, existing titles only.",
  "Answer with a JSON array only, each element in this shape:",
  '{"title": "...", "content_type": "book" | "movie", "creator": "author of a book or director of a movie", "description": "one or two sentences"}',
  'Leave "creator" out when you are not sure who it is.',
].join("\n");

export function buildCandidatePrompt(
  contentType: ContentType,
  themes: readonly string[],
  rawText: string,
  count: number,
): string {
  const themeLine = themes.length > 0 ? themes.join(", ") : "(no specific themes)";
  return [
    `Suggest ${count} ${contentType}s for this reader/viewer.`,
    `Themes: ${themeLine}`,
    `Original request: "${rawText}"`,
    `Every element must have "content_type": "${contentType}".`,
  ].join("\n");
}
