import { describe, it, expect, vi, beforeEach } from "vitest";

const generateText = vi.hoisted(() => vi.fn());
vi.mock("ai", () => ({ generateText }));

import { AiSdkModelAdapter } from "../ai-sdk.adapter.js";
import { ResilientModelAdapter } from "../resilient-model.adapter.js";
import { UpstreamServiceError } from "../../../errors.js";

describe("AiSdkModelAdapter", () => {
  let adapter: AiSdkModelAdapter;

  beforeEach(() => {
    vi.clearAllMocks();
    generateText.mockResolvedValue({ text: '{"ok": true}', finishReason: "stop" });
    adapter = new AiSdkModelAdapter({ model: "test-model" });
  });

  it("takes its id from a string model", () => {
    expect(adapter.getModelId()).toBe("test-model");
    expect(new AiSdkModelAdapter({ model: "test-model", modelId: "alias" }).getModelId()).toBe("alias");
  });

  it("forwards the request to generateText", async () => {
    const controller = new AbortController();
    const text = await adapter.complete({
      system: "be brief",
      prompt: "hi",
      maxTokens: 50,
      signal: controller.signal,
    });

    expect(text).toBe('{"ok": true}');
    expect(generateText).toHaveBeenCalledWith({
      model: "test-model",
      system: "be brief",
      prompt: "hi",
      temperature: 0,
      maxOutputTokens: 50,
      abortSignal: controller.signal,
    });
  });

  it("wraps SDK failures as unreachable upstream errors", async () => {
    generateText.mockRejectedValue(new Error("ECONNRESET"));

    const error = await adapter.complete({ prompt: "hi" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UpstreamServiceError);
    expect(error).toMatchObject({
      reason: "unreachable",
      message: 'Model "test-model" request failed: ECONNRESET',
    });
  });

  it("rethrows the SDK error untouched when the caller aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const abortError = new Error("This operation was aborted");
    generateText.mockRejectedValue(abortError);

    await expect(adapter.complete({ prompt: "hi", signal: controller.signal })).rejects.toBe(abortError);
  });

  it("treats an empty completion as malformed", async () => {
    generateText.mockResolvedValue({ text: "  " });
    await expect(adapter.complete({ prompt: "hi" })).rejects.toMatchObject({ reason: "malformed" });
  });

  it("healthCheck() reports reachability", async () => {
    expect(await adapter.healthCheck()).toMatchObject({ healthy: true });

    generateText.mockRejectedValue(new Error("401 Unauthorized"));
    expect(await adapter.healthCheck()).toMatchObject({
      healthy: false,
      error: 'Model "test-model" request failed: 401 Unauthorized',
    });
  });

  it("healthCheck() through the resilient wrapper gives up on a model that never answers", async () => {
    generateText.mockImplementation(() => new Promise(() => {}));
    const model = new ResilientModelAdapter(adapter, { timeoutMs: 20 });

    const health = await model.healthCheck();

    expect(health).toMatchObject({
      healthy: false,
      error: 'Model "test-model" health check did not answer within 20ms',
    });
    expect(generateText).toHaveBeenCalledTimes(1);
    expect(generateText.mock.calls[0][0].abortSignal.aborted).toBe(true);
  });
});
