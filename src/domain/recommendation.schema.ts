// =============================================================================
// Recommendation Schema — Preferences, candidates & formatted responses
// =============================================================================

import { z } from "zod";

export const CONTENT_TYPES = ["book", "movie"] as const;

export const ContentTypeSchema = z.enum(CONTENT_TYPES);

export type ContentType = z.infer<typeof ContentTypeSchema>;

export const PreferenceRecordSchema = z.object({
  contentTypes: z.array(ContentTypeSchema),
  themes: z.array(z.string()),
  rawText: z.string(),
});

export type PreferenceRecord = z.infer<typeof PreferenceRecordSchema>;

export const CandidateSchema = z.object({
  title: z.string(),
  contentType: ContentTypeSchema,
  /** Author of a book or director of a movie, when the model knows it */
  creator: z.string().optional(),
  description: z.string(),
  score: z.number(),
});

export type Candidate = z.infer<typeof CandidateSchema>;

export const RankedCandidateSchema = CandidateSchema.extend({
  matchedThemes: z.array(z.string()),
});

export type RankedCandidate = z.infer<typeof RankedCandidateSchema>;

export const RecommendationItemSchema = z.object({
  title: z.string(),
  contentType: ContentTypeSchema,
  creator: z.string().optional(),
  rationale: z.string(),
});

export type RecommendationItem = z.infer<typeof RecommendationItemSchema>;

export const FormattedResponseSchema = z.object({
  status: z.enum(["ok", "no_results", "no_preferences"]),
  summary: z.string(),
  items: z.array(RecommendationItemSchema),
});

export type FormattedResponse = z.infer<typeof FormattedResponseSchema>;

// ---------------------------------------------------------------------------
// Model output contracts (what the LLM is asked to return)
// ---------------------------------------------------------------------------

export const ParsedPreferencesOutputSchema = z.object({
  content_types: z.array(z.string()).default([]),
  themes: z.array(z.string()).default([]),
});

export const GeneratedItemOutputSchema = z.object({
  title: z.string().optional().nullable(),
  content_type: z.string().optional().nullable(),
  creator: z.string().optional().nullable(),
  // Models sometimes answer with the specific role instead of "creator"
  author: z.string().optional().nullable(),
  director: z.string().optional().nullable(),
  description: z.string().optional().nullable(),
});

export const GeneratedItemsOutputSchema = z.array(GeneratedItemOutputSchema);

export type GeneratedItemOutput = z.infer<typeof GeneratedItemOutputSchema>;
