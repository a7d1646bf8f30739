// =============================================================================
// Response Formatter — ranked candidates → user-facing recommendation payload
// =============================================================================

import { CONTENT_TYPES } from "../domain/recommendation.schema.js";
import type {
  ContentType,
  FormattedResponse,
  RankedCandidate,
  RecommendationItem,
} from "../domain/recommendation.schema.js";
import type { RunState } from "../domain/graph.schema.js";
import type { NodeHandler } from "../graph/node.js";
import { EmptyResultError, RecommenderError } from "../errors.js";

export const DEFAULT_TOP_K = 10;

export interface FormatOptions {
  topK?: number;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

/** ["a"] → "a", ["a", "b"] → "a and b", ["a", "b", "c"] → "a, b and c" */
export function joinList(values: readonly string[]): string {
  if (values.length <= 1) return values.join("");
  return `${values.slice(0, -1).join(", ")} and ${values[values.length - 1]}`;
}

const CREATOR_ROLE: Readonly<Record<ContentType, string>> = {
  book: "Written by",
  movie: "Directed by",
};

export function buildRationale(candidate: RankedCandidate): string {
  const parts: string[] = [];
  if (candidate.matchedThemes.length > 0) {
    parts.push(`Matches your interest in ${joinList(candidate.matchedThemes)}.`);
  }
  if (candidate.creator) parts.push(`${CREATOR_ROLE[candidate.contentType]} ${candidate.creator}.`);
  const description = candidate.description.trim();
  if (description) parts.push(description);
  return parts.join(" ") || `A ${candidate.contentType} pick related to your request.`;
}

export function buildSummary(items: readonly RecommendationItem[]): string {
  const counts = CONTENT_TYPES.map(
    (type): [ContentType, number] => [type, items.filter((i) => i.contentType === type).length],
  )
    .filter(([, count]) => count > 0)
    .map(([type, count]) => plural(count, type));
  return `Found ${plural(items.length, "recommendation")}: ${counts.join(", ")}.`;
}

export function formatResponse(
  ranked: readonly RankedCandidate[],
  options: FormatOptions = {},
): FormattedResponse {
  if (ranked.length === 0) throw new EmptyResultError();

  const topK = Math.max(1, Math.floor(options.topK ?? DEFAULT_TOP_K));
  const items = ranked.slice(0, topK).map(
    (candidate): RecommendationItem => ({
      title: candidate.title,
      contentType: candidate.contentType,
      ...(candidate.creator ? { creator: candidate.creator } : {}),
      rationale: buildRationale(candidate),
    }),
  );

  return { status: "ok", summary: buildSummary(items), items };
}

/**
 * The payload for a finished run: its formatted response, or an explanatory
 * empty response when the run completed without recommendations.
 */
export function responseFor(run: Pick<RunState, "response" | "outcome">): FormattedResponse | undefined {
  if (run.response) return run.response;
  if (run.outcome) {
    return { status: run.outcome.kind, summary: run.outcome.message, items: [] };
  }
  return undefined;
}

export const formatResponseNode: NodeHandler<"format_response"> = async (state, ctx) => {
  if (!state.ranked) {
    throw new RecommenderError("internal", "format_response requires ranked candidates");
  }
  return { response: formatResponse(state.ranked, { topK: ctx.config.topK }) };
};
