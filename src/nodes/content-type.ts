import type { ContentType } from "../domain/recommendation.schema.js";

const ALIASES: ReadonlyMap<string, ContentType> = new Map<string, ContentType>([
  ["book", "book"],
  ["books", "book"],
  ["novel", "book"],
  ["novels", "book"],
  ["movie", "movie"],
  ["movies", "movie"],
  ["film", "movie"],
  ["films", "movie"],
]);

/** Maps model spellings ("Films", " novels ") onto a ContentType. */
export function normalizeContentType(value: string | null | undefined): ContentType | undefined {
  if (!value) return undefined;
  return ALIASES.get(value.trim().toLowerCase());
}
