// =============================================================================
// AiSdkModelAdapter — Wraps a Vercel AI SDK LanguageModel into ModelPort
// =============================================================================

import { generateText } from "ai";
import type { LanguageModel } from "ai";

import type { CompletionRequest, ModelHealth, ModelPort } from "../../ports/model.port.js";
import { UpstreamServiceError, errorMessage } from "../../errors.js";

export interface AiSdkModelAdapterOptions {
  model: LanguageModel;
  modelId?: string;
  /** Temperature used when a request does not set one. Default: 0 */
  defaultTemperature?: number;
}

export class AiSdkModelAdapter implements ModelPort {
  private readonly model: LanguageModel;
  private readonly _modelId: string;
  private readonly defaultTemperature: number;

  constructor(options: AiSdkModelAdapterOptions) {
    this.model = options.model;
    this._modelId =
      options.modelId ?? (typeof options.model === "string" ? options.model : options.model.modelId);
    this.defaultTemperature = options.defaultTemperature ?? 0;
  }

  getModelId(): string {
    return this._modelId;
  }

  async complete(request: CompletionRequest): Promise<string> {
    let text: string;
    try {
      const result = await generateText({
        model: this.model,
        system: request.system,
        prompt: request.prompt,
        temperature: request.temperature ?? this.defaultTemperature,
        maxOutputTokens: request.maxTokens,
        abortSignal: request.signal,
      });
      text = result.text;
    } catch (err) {
      // Aborts are classified by whoever owns the signal
      if (request.signal?.aborted) throw err;
      throw new UpstreamServiceError(
        "unreachable",
        `Model "${this._modelId}" request failed: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    if (!text.trim()) {
      throw new UpstreamServiceError("malformed", `Model "${this._modelId}" returned an empty completion`);
    }
    return text;
  }

  async healthCheck(signal?: AbortSignal): Promise<ModelHealth> {
    const start = Date.now();
    try {
      await this.complete({ prompt: "Reply with OK.", maxTokens: 2, signal });
      return { healthy: true, latencyMs: Date.now() - start };
    } catch (err) {
      return { healthy: false, latencyMs: Date.now() - start, error: errorMessage(err) };
    }
  }
}
