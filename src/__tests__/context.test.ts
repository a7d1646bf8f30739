import { describe, it, expect, vi } from "vitest";
import { createRecommenderContext } from "../context.js";
import { NotFoundError } from "../errors.js";
import { createScriptedModel } from "../testing/index.js";

const model = () =>
  createScriptedModel({
    preferences: { content_types: ["book"], themes: ["sea"] },
    candidates: { book: [{ title: "Moby-Dick", content_type: "book", description: "A whale hunt at sea." }] },
  });

describe("createRecommenderContext", () => {
  it("fills in workflow defaults", () => {
    const ctx = createRecommenderContext({ model: model(), registry: { sweepIntervalMs: 0 } });
    expect(ctx.config).toEqual({ maxInputLength: 2000, candidatesPerType: 5, topK: 10 });
    expect(ctx.graph.nodeIds).toHaveLength(4);
    ctx.dispose();
  });

  it("announces evicted runs on the event bus", async () => {
    const onEvict = vi.fn();
    const ctx = createRecommenderContext({
      model: model(),
      registry: { maxRuns: 1, sweepIntervalMs: 0, onEvict },
    });
    const evicted: string[] = [];
    ctx.events.on("run:evicted", (e) => evicted.push(`${e.runId}:${e.reason}`));

    const first = await ctx.executor.execute("sea stories");
    const second = await ctx.executor.execute("more sea stories");

    expect(evicted).toEqual([`${first.runId}:capacity`]);
    expect(onEvict).toHaveBeenCalledWith(first.runId, "capacity");
    expect(() => ctx.inspector.inspect(first.runId)).toThrow(NotFoundError);
    expect(ctx.inspector.inspect(second.runId).status).toBe("completed");
    ctx.dispose();
  });

  it("rejects an invalid workflow configuration", () => {
    expect(() => createRecommenderContext({ model: model(), config: { topK: 0 } })).toThrow();
  });
});
