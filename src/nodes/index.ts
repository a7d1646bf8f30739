import type { NodeHandlers } from "../graph/node.js";
import { parsePreferencesNode } from "./preference-parser.js";
import { generateCandidatesNode } from "./candidate-generator.js";
import { rankCandidatesNode } from "./ranker.js";
import { formatResponseNode } from "./response-formatter.js";

export const defaultNodeHandlers: NodeHandlers = {
  parse_preferences: parsePreferencesNode,
  generate_candidates: generateCandidatesNode,
  rank_candidates: rankCandidatesNode,
  format_response: formatResponseNode,
};

export { parsePreferences, normalizeThemes } from "./preference-parser.js";
export { generateCandidates } from "./candidate-generator.js";
export type { GenerationResult } from "./candidate-generator.js";
export { rankCandidates, matchThemes, tokenize, normalizeTitle } from "./ranker.js";
export {
  formatResponse,
  responseFor,
  buildRationale,
  buildSummary,
  joinList,
  DEFAULT_TOP_K,
} from "./response-formatter.js";
export type { FormatOptions } from "./response-formatter.js";
export { extractJson } from "./json-output.js";
export { normalizeContentType } from "./content-type.js";
