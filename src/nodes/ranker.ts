// =============================================================================
// Ranker/Filter — pure dedupe, scope filter, theme scoring and stable sort
// =============================================================================

import type {
  Candidate,
  PreferenceRecord,
  RankedCandidate,
} from "../domain/recommendation.schema.js";
import type { NodeHandler } from "../graph/node.js";
import { RecommenderError } from "../errors.js";

const TOKEN = /[\p{L}\p{N}]+(?:['-][\p{L}\p{N}]+)*/gu;

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(TOKEN) ?? [];
}

export function normalizeTitle(title: string): string {
  return title.trim().toLowerCase().replace(/\s+/g, " ");
}

function containsSequence(haystack: readonly string[], needle: readonly string[]): boolean {
  if (needle.length === 0 || needle.length > haystack.length) return false;
  outer: for (let i = 0; i <= haystack.length - needle.length; i++) {
    for (let j = 0; j < needle.length; j++) {
      if (haystack[i + j] !== needle[j]) continue outer;
    }
    return true;
  }
  return false;
}

/** Themes whose token sequence occurs in the candidate's title or description. */
export function matchThemes(candidate: Candidate, themes: readonly string[]): string[] {
  const tokens = tokenize(`${candidate.title} ${candidate.description}`);
  return themes.filter((theme) => containsSequence(tokens, tokenize(theme)));
}

/**
 * Deduplicates by (normalized title, content type), first seen wins; drops blank
 * titles and content types nobody asked for; scores by theme overlap; sorts by
 * score descending with generation order as the tie-breaker.
 */
export function rankCandidates(
  candidates: readonly Candidate[],
  preferences: PreferenceRecord,
): RankedCandidate[] {
  const seen = new Set<string>();
  const kept: { candidate: RankedCandidate; order: number }[] = [];

  candidates.forEach((candidate, order) => {
    const title = normalizeTitle(candidate.title);
    if (!title || !preferences.contentTypes.includes(candidate.contentType)) return;

    const key = `${candidate.contentType}\u0000${title}`;
    if (seen.has(key)) return;
    seen.add(key);

    const matchedThemes = matchThemes(candidate, preferences.themes);
    kept.push({
      candidate: { ...candidate, score: matchedThemes.length, matchedThemes },
      order,
    });
  });

  return kept
    .sort((a, b) => b.candidate.score - a.candidate.score || a.order - b.order)
    .map((entry) => entry.candidate);
}

export const rankCandidatesNode: NodeHandler<"rank_candidates"> = async (state) => {
  if (!state.candidates || !state.preferences) {
    throw new RecommenderError("internal", "rank_candidates requires candidates and preferences");
  }
  return { ranked: rankCandidates(state.candidates, state.preferences) };
};
