/**
 * Structured error hierarchy for the recommender.
 *
 * Every error raised by the workflow extends {@link RecommenderError}, which
 * carries a stable `kind` used both for `instanceof`-free matching and for the
 * HTTP error payload:
 *
 * ```ts
 * try {
 *   await executor.execute(text);
 * } catch (e) {
 *   if (e instanceof ValidationError) { ... }
 * }
 * ```
 *
 * @module errors
 */

export type ErrorKind =
  | "validation"
  | "upstream"
  | "empty_preferences"
  | "empty_result"
  | "not_found"
  | "auth"
  | "cancelled"
  | "ownership_violation"
  | "graph_definition"
  | "internal";

/** Base error for all recommender errors. */
export class RecommenderError extends Error {
  readonly kind: ErrorKind;
  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RecommenderError";
    this.kind = kind;
  }
}

/** Bad or empty input. Reported to the caller; no run is created. */
export class ValidationError extends RecommenderError {
  readonly field?: string;
  constructor(message: string, field?: string) {
    super("validation", field ? `Invalid "${field}": ${message}` : message);
    this.name = "ValidationError";
    this.field = field;
  }
}

export type UpstreamCause = "unreachable" | "timeout" | "malformed";

/** The language-model service was unreachable, timed out or answered garbage. */
export class UpstreamServiceError extends RecommenderError {
  readonly reason: UpstreamCause;
  constructor(reason: UpstreamCause, message: string, options?: { cause?: unknown }) {
    super("upstream", message, options);
    this.name = "UpstreamServiceError";
    this.reason = reason;
  }
}

/**
 * Raised by a node when the run should end without recommendations.
 * The engine completes the run with an explanatory outcome instead of failing it.
 */
export abstract class OutcomeError extends RecommenderError {
  abstract readonly outcome: "no_preferences" | "no_results";
}

export class EmptyPreferenceError extends OutcomeError {
  readonly outcome = "no_preferences" as const;
  constructor(message = "Could not tell whether you are looking for books or movies.") {
    super("empty_preferences", message);
    this.name = "EmptyPreferenceError";
  }
}

export class EmptyResultError extends OutcomeError {
  readonly outcome = "no_results" as const;
  constructor(message = "No recommendations matched your preferences.") {
    super("empty_result", message);
    this.name = "EmptyResultError";
  }
}

export class NotFoundError extends RecommenderError {
  readonly resourceType: string;
  readonly resourceId: string;
  constructor(resourceType: string, resourceId: string) {
    super("not_found", `${resourceType} "${resourceId}" not found`);
    this.name = "NotFoundError";
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/** Raised by auth collaborators; the workflow itself never creates one. */
export class AuthError extends RecommenderError {
  constructor(message: string) {
    super("auth", message);
    this.name = "AuthError";
  }
}

export class CancelledError extends RecommenderError {
  constructor(message = "Run was cancelled") {
    super("cancelled", message);
    this.name = "CancelledError";
  }
}

/** A node returned a state field it does not own. */
export class OwnershipViolationError extends RecommenderError {
  readonly nodeId: string;
  readonly field: string;
  constructor(nodeId: string, field: string) {
    super("ownership_violation", `Node "${nodeId}" may not write state field "${field}"`);
    this.name = "OwnershipViolationError";
    this.nodeId = nodeId;
    this.field = field;
  }
}

export class GraphDefinitionError extends RecommenderError {
  constructor(message: string) {
    super("graph_definition", message);
    this.name = "GraphDefinitionError";
  }
}

export interface ErrorPayload {
  kind: ErrorKind;
  message: string;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof RecommenderError) {
    return { kind: err.kind, message: err.message };
  }
  return { kind: "internal", message: errorMessage(err) };
}
