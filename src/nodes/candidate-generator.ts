// =============================================================================
// Candidate Generator — one model call per requested content type
// =============================================================================

import { GeneratedItemsOutputSchema } from "../domain/recommendation.schema.js";
import type {
  Candidate,
  ContentType,
  GeneratedItemOutput,
  PreferenceRecord,
} from "../domain/recommendation.schema.js";
import type { NodeContext, NodeHandler } from "../graph/node.js";
import { CancelledError, RecommenderError, UpstreamServiceError, errorMessage } from "../errors.js";
import { normalizeContentType } from "./content-type.js";
import { extractJson } from "./json-output.js";
import { CANDIDATE_SYSTEM_PROMPT, buildCandidatePrompt } from "./prompts.js";

export interface GenerationResult {
  candidates: Candidate[];
  /** Content types whose request failed; the rest of the run continues without them */
  failedContentTypes: ContentType[];
}

type GenerationContext = Pick<NodeContext, "model" | "signal"> & { candidatesPerType: number };

export async function generateCandidates(
  preferences: PreferenceRecord,
  ctx: GenerationContext,
): Promise<GenerationResult> {
  const settled = await Promise.allSettled(
    preferences.contentTypes.map((type) => requestCandidates(type, preferences, ctx)),
  );

  const candidates: Candidate[] = [];
  const failedContentTypes: ContentType[] = [];
  const errors: unknown[] = [];

  settled.forEach((result, i) => {
    if (result.status === "fulfilled") {
      candidates.push(...result.value);
    } else {
      failedContentTypes.push(preferences.contentTypes[i]);
      errors.push(result.reason);
    }
  });

  // Cancellation is never a partial failure
  const cancelled = errors.find((e) => e instanceof CancelledError);
  if (cancelled || ctx.signal?.aborted) throw cancelled ?? new CancelledError();

  if (failedContentTypes.length > 0 && failedContentTypes.length === preferences.contentTypes.length) {
    const first = errors[0];
    throw new UpstreamServiceError(
      first instanceof UpstreamServiceError ? first.reason : "unreachable",
      `Candidate generation failed for every content type: ${errors.map(errorMessage).join("; ")}`,
      { cause: first },
    );
  }

  return { candidates, failedContentTypes };
}

async function requestCandidates(
  contentType: ContentType,
  preferences: PreferenceRecord,
  ctx: GenerationContext,
): Promise<Candidate[]> {
  const completion = await ctx.model.complete({
    system: CANDIDATE_SYSTEM_PROMPT,
    prompt: buildCandidatePrompt(
      contentType,
      preferences.themes,
      preferences.rawText,
      ctx.candidatesPerType,
    ),
    signal: ctx.signal,
  });

  const parsed = GeneratedItemsOutputSchema.safeParse(unwrapList(extractJson(completion)));
  if (!parsed.success) {
    throw new UpstreamServiceError(
      "malformed",
      `Candidate list for "${contentType}" has an unexpected shape`,
    );
  }

  return parsed.data.flatMap((item) => {
    const candidate = toCandidate(item);
    return candidate ? [candidate] : [];
  });
}

/** Accepts either a bare array or an object wrapping one under `items` / `candidates`. */
function unwrapList(value: unknown): unknown {
  if (value !== null && typeof value === "object" && !Array.isArray(value)) {
    if ("items" in value) return value.items;
    if ("candidates" in value) return value.candidates;
  }
  return value;
}

/** Items without a title or a recognizable content type are dropped here. */
function toCandidate(item: GeneratedItemOutput): Candidate | undefined {
  const title = item.title?.trim();
  const contentType = normalizeContentType(item.content_type);
  if (!title || !contentType) return undefined;
  const creator = (item.creator ?? (contentType === "book" ? item.author : item.director))?.trim();
  return {
    title,
    contentType,
    ...(creator ? { creator } : {}),
    description: item.description?.trim() ?? "",
    score: 0,
  };
}

export const generateCandidatesNode: NodeHandler<"generate_candidates"> = async (state, ctx) => {
  if (!state.preferences) {
    throw new RecommenderError("internal", "generate_candidates requires parsed preferences");
  }
  const result = await generateCandidates(state.preferences, {
    model: ctx.model,
    signal: ctx.signal,
    candidatesPerType: ctx.config.candidatesPerType,
  });
  return {
    candidates: result.candidates,
    degradedContentTypes: result.failedContentTypes,
  };
};
