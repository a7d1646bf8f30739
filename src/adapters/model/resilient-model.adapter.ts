// =============================================================================
// ResilientModelAdapter — Per-call timeout + bounded retries around a ModelPort
// =============================================================================

import type { CompletionRequest, ModelHealth, ModelPort } from "../../ports/model.port.js";
import { CancelledError, UpstreamServiceError, errorMessage } from "../../errors.js";

export interface ResilienceOptions {
  /** Upper bound for a single call, in ms. Default: 30_000 */
  timeoutMs?: number;
  /** Extra attempts after the first failed one. Default: 1 */
  maxRetries?: number;
  /** Invoked before each retry (for logging) */
  onRetry?: (attempt: number, error: UpstreamServiceError) => void;
}

const TIMEOUT = Symbol("timeout");

export class ResilientModelAdapter implements ModelPort {
  private readonly timeoutMs: number;
  private readonly maxRetries: number;

  constructor(
    private readonly inner: ModelPort,
    private readonly options: ResilienceOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxRetries = Math.max(0, options.maxRetries ?? 1);
  }

  getModelId(): string {
    return this.inner.getModelId();
  }

  async complete(request: CompletionRequest): Promise<string> {
    let lastError: UpstreamServiceError | undefined;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (request.signal?.aborted) throw new CancelledError();
      if (lastError) this.options.onRetry?.(attempt, lastError);

      try {
        return await this.attempt(request);
      } catch (err) {
        if (!(err instanceof UpstreamServiceError) || err.reason === "malformed") throw err;
        lastError = err;
      }
    }

    throw lastError ?? new UpstreamServiceError("unreachable", "Model call failed");
  }

  /** Bounded by the same per-call timeout as completions. */
  async healthCheck(signal?: AbortSignal): Promise<ModelHealth> {
    const start = Date.now();
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener("abort", onParentAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<ModelHealth>((resolve) => {
      timer = setTimeout(() => {
        controller.abort(TIMEOUT);
        resolve({
          healthy: false,
          latencyMs: Date.now() - start,
          error: `Model "${this.getModelId()}" health check did not answer within ${this.timeoutMs}ms`,
        });
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.inner.healthCheck(controller.signal).catch(
          (err: unknown): ModelHealth => ({
            healthy: false,
            latencyMs: Date.now() - start,
            error: errorMessage(err),
          }),
        ),
        timedOut,
      ]);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onParentAbort);
    }
  }

  private async attempt(request: CompletionRequest): Promise<string> {
    const controller = new AbortController();
    const parent = request.signal;
    const onParentAbort = () => controller.abort(parent?.reason);
    parent?.addEventListener("abort", onParentAbort, { once: true });
    const timer = setTimeout(() => controller.abort(TIMEOUT), this.timeoutMs);

    // Settles on abort even when the inner port ignores its signal
    let removeAbortListener = () => {};
    const aborted = new Promise<never>((_, reject) => {
      const onAbort = () => reject(controller.signal.reason);
      controller.signal.addEventListener("abort", onAbort, { once: true });
      removeAbortListener = () => controller.signal.removeEventListener("abort", onAbort);
    });

    try {
      return await Promise.race([
        this.inner.complete({ ...request, signal: controller.signal }),
        aborted,
      ]);
    } catch (err) {
      if (parent?.aborted) throw new CancelledError();
      if (controller.signal.reason === TIMEOUT) {
        throw new UpstreamServiceError(
          "timeout",
          `Model "${this.getModelId()}" did not answer within ${this.timeoutMs}ms`,
        );
      }
      if (err instanceof UpstreamServiceError || err instanceof CancelledError) throw err;
      throw new UpstreamServiceError("unreachable", errorMessage(err), { cause: err });
    } finally {
      clearTimeout(timer);
      removeAbortListener();
      parent?.removeEventListener("abort", onParentAbort);
    }
  }
}
