// =============================================================================
// recommender-graph/testing — Barrel Export
// =============================================================================

export { createStubModel, hangingResponder } from "./stub-model.js";
export type { StubModel, StubModelOptions, StubResponder } from "./stub-model.js";
export { createScriptedModel, promptKind } from "./scripted-model.js";
export type { RecommendationScript, ScriptedAnswer } from "./scripted-model.js";
