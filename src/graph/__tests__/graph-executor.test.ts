import { describe, it, expect, afterEach, vi } from "vitest";
import { createRecommenderContext } from "../../context.js";
import type { RecommenderContext, RecommenderContextOptions } from "../../context.js";
import type { WorkflowEvent } from "../../domain/graph.schema.js";
import { NotFoundError, ValidationError } from "../../errors.js";
import { ResilientModelAdapter } from "../../adapters/model/resilient-model.adapter.js";
import { defaultNodeHandlers } from "../../nodes/index.js";
import { responseFor } from "../../nodes/response-formatter.js";
import { createScriptedModel, createStubModel, hangingResponder, promptKind } from "../../testing/index.js";
import { EventBus } from "../event-bus.js";
import { WorkflowGraph } from "../workflow-graph.js";
import type { NodeHandlers } from "../node.js";

// =============================================================================
// Helpers
// =============================================================================

const SCI_FI_BOOKS = [
  { title: "Pride and Prejudice", content_type: "book", description: "A romance of manners in Regency England." },
  { title: "Rendezvous with Rama", content_type: "book", description: "Classic science fiction about a space probe." },
  { title: "The Left Hand of Darkness", content_type: "book", description: "Science fiction on an icy world." },
];

let ctx: RecommenderContext | undefined;

function setup(options: RecommenderContextOptions): RecommenderContext {
  ctx = createRecommenderContext({ ...options, registry: { sweepIntervalMs: 0, ...options.registry } });
  return ctx;
}

function recordEvents(context: RecommenderContext): WorkflowEvent[] {
  const events: WorkflowEvent[] = [];
  context.events.onAny((e) => events.push(e));
  return events;
}

afterEach(() => {
  ctx?.dispose();
  ctx = undefined;
});

// =============================================================================
// Tests
// =============================================================================

describe("GraphExecutor", () => {
  it("ranks sci-fi books above unrelated ones", async () => {
    const model = createScriptedModel({
      preferences: { content_types: ["book"], themes: ["Science Fiction", "space"] },
      candidates: { book: SCI_FI_BOOKS },
    });
    const { executor } = setup({ model });

    const run = await executor.execute("I want sci-fi books about space exploration");

    expect(run.status).toBe("completed");
    expect(run.response).toEqual({
      status: "ok",
      summary: "Found 3 recommendations: 3 books.",
      items: [
        {
          title: "Rendezvous with Rama",
          contentType: "book",
          rationale:
            "Matches your interest in science fiction and space. Classic science fiction about a space probe.",
        },
        {
          title: "The Left Hand of Darkness",
          contentType: "book",
          rationale: "Matches your interest in science fiction. Science fiction on an icy world.",
        },
        {
          title: "Pride and Prejudice",
          contentType: "book",
          rationale: "A romance of manners in Regency England.",
        },
      ],
    });
    expect(run.history.map((s) => s.nodeId)).toEqual([
      "parse_preferences",
      "generate_candidates",
      "rank_candidates",
      "format_response",
    ]);
    expect(run.history.map((s) => s.sequence)).toEqual([1, 2, 3, 4]);
    expect(model.calls).toHaveLength(2);
  });

  it("puts the sci-fi movie ahead of the other one", async () => {
    const model = createScriptedModel({
      preferences: { content_types: ["movie"], themes: ["sci-fi"] },
      candidates: {
        movie: [
          { title: "Heat", content_type: "movie", description: "A crime drama about a heist crew." },
          { title: "Arrival", content_type: "movie", description: "A sci-fi story about first contact." },
        ],
      },
    });
    const { executor } = setup({ model });

    const run = await executor.execute("I like sci-fi movies");

    expect(run.status).toBe("completed");
    expect(run.ranked?.map((c) => [c.title, c.score])).toEqual([
      ["Arrival", 1],
      ["Heat", 0],
    ]);
    expect(run.response).toEqual({
      status: "ok",
      summary: "Found 2 recommendations: 2 movies.",
      items: [
        {
          title: "Arrival",
          contentType: "movie",
          rationale: "Matches your interest in sci-fi. A sci-fi story about first contact.",
        },
        { title: "Heat", contentType: "movie", rationale: "A crime drama about a heist crew." },
      ],
    });
  });

  it("snapshots are frozen copies of the state at that point", async () => {
    const model = createScriptedModel({
      preferences: { content_types: ["book"], themes: ["space"] },
      candidates: { book: SCI_FI_BOOKS },
    });
    const { executor } = setup({ model });

    const run = await executor.execute("space books");
    const [afterParse, afterGenerate] = run.history;

    expect(afterParse.state.preferences).toEqual({
      contentTypes: ["book"],
      themes: ["space"],
      rawText: "space books",
    });
    expect(afterParse.state.candidates).toBeUndefined();
    expect(afterParse.state.preferences).not.toBe(run.preferences);
    expect(afterGenerate.state.candidates).toHaveLength(3);
    expect(afterGenerate.state.degradedContentTypes).toEqual([]);
    expect(Object.isFrozen(afterParse)).toBe(true);
    expect(Object.isFrozen(afterGenerate.state.candidates)).toBe(true);
    expect(Object.isFrozen(afterGenerate.state.candidates?.[0])).toBe(true);
  });

  it("rejects empty input before creating a run", async () => {
    const model = createStubModel(["{}"]);
    const { executor, registry, inspector } = setup({ model });

    await expect(executor.execute("   ")).rejects.toThrow(ValidationError);
    expect(registry.size).toBe(0);
    expect(model.calls).toHaveLength(0);
    expect(() => inspector.inspect("no-such-run")).toThrow(NotFoundError);
  });

  it("keeps the raw input text untouched", async () => {
    const model = createScriptedModel({
      preferences: { content_types: ["book"], themes: ["space"] },
      candidates: { book: SCI_FI_BOOKS },
    });
    const { executor } = setup({ model });

    const run = await executor.execute("  space books\n");

    expect(run.rawText).toBe("  space books\n");
    expect(run.preferences?.rawText).toBe("  space books\n");
    expect(run.history[0].state.rawText).toBe("  space books\n");
  });

  it("rejects input longer than the configured limit", async () => {
    const { executor } = setup({ model: createStubModel(["{}"]), config: { maxInputLength: 10 } });

    await expect(executor.execute("books about the sea")).rejects.toThrow(
      'Invalid "preferences": Preferences text must be at most 10 characters',
    );
  });

  it("fails the run at the generator when the model times out", async () => {
    const scripted = createScriptedModel({
      preferences: { content_types: ["book"], themes: ["mystery"] },
      candidates: { book: "hang" },
    });
    const model = new ResilientModelAdapter(scripted, { timeoutMs: 20, maxRetries: 0 });
    const { executor, inspector } = setup({ model });

    const run = await executor.execute("a good mystery novel");

    expect(run.status).toBe("failed");
    expect(run.failure).toEqual({
      nodeId: "generate_candidates",
      kind: "upstream",
      message:
        'Candidate generation failed for every content type: Model "stub-model" did not answer within 20ms',
    });
    const inspection = inspector.inspect(run.runId);
    expect(inspection.snapshots).toHaveLength(1);
    expect(inspection.snapshots[0].nodeId).toBe("parse_preferences");
  });

  it("continues without a content type whose generation failed", async () => {
    const model = createScriptedModel({
      preferences: { content_types: ["book", "movie"], themes: ["space"] },
      candidates: { book: SCI_FI_BOOKS, movie: new Error("connection reset") },
    });
    const { executor } = setup({ model });

    const run = await executor.execute("space books and movies");

    expect(run.status).toBe("completed");
    expect(run.degradedContentTypes).toEqual(["movie"]);
    expect(run.response?.summary).toBe("Found 3 recommendations: 3 books.");
  });

  it("halts after the first failing node", async () => {
    const model = createScriptedModel({ preferences: "I am not JSON" });
    const context = setup({ model });
    const events = recordEvents(context);

    const run = await context.executor.execute("anything");

    expect(run.status).toBe("failed");
    expect(run.failure).toEqual({
      nodeId: "parse_preferences",
      kind: "upstream",
      message: "Model output contains no JSON",
    });
    expect(run.history).toEqual([]);
    expect(model.calls).toHaveLength(1);
    expect(events.map((e) => e.type)).toEqual(["run:start", "node:start", "node:error", "run:failed"]);
  });

  it("finishes a failing run even when event listeners throw", async () => {
    const onListenerError = vi.fn();
    const events = new EventBus({ onListenerError });
    events.on("node:error", () => {
      throw new Error("listener bug");
    });
    events.on("run:failed", () => {
      throw new Error("listener bug");
    });
    const model = createScriptedModel({ preferences: "I am not JSON" });
    const { executor, registry } = setup({ model, events, registry: { retentionMs: 0 } });

    const run = await executor.execute("anything");

    expect(run.status).toBe("failed");
    expect(run.failure).toEqual({
      nodeId: "parse_preferences",
      kind: "upstream",
      message: "Model output contains no JSON",
    });
    expect(onListenerError.mock.calls.map(([, event]) => event.type)).toEqual(["node:error", "run:failed"]);
    // Retention started, so a zero-length window drops it on the next lookup
    expect(registry.has(run.runId)).toBe(false);
  });

  it("completes with a no_preferences outcome when no content type is recognized", async () => {
    const model = createScriptedModel({ preferences: { content_types: ["podcast"], themes: [] } });
    const { executor } = setup({ model });

    const run = await executor.execute("something fun");

    expect(run.status).toBe("completed");
    expect(run.outcome).toEqual({
      kind: "no_preferences",
      nodeId: "parse_preferences",
      message: "Could not tell whether you are looking for books or movies.",
    });
    expect(run.history).toHaveLength(0);
    expect(responseFor(run)).toEqual({
      status: "no_preferences",
      summary: "Could not tell whether you are looking for books or movies.",
      items: [],
    });
  });

  it("completes with a no_results outcome when nothing survives ranking", async () => {
    const model = createScriptedModel({
      preferences: { content_types: ["movie"], themes: ["heist"] },
      candidates: { movie: [] },
    });
    const { executor } = setup({ model });

    const run = await executor.execute("heist movies");

    expect(run.status).toBe("completed");
    expect(run.outcome?.kind).toBe("no_results");
    expect(run.outcome?.nodeId).toBe("format_response");
    expect(run.history.map((s) => s.nodeId)).toEqual([
      "parse_preferences",
      "generate_candidates",
      "rank_candidates",
    ]);
    expect(run.response).toBeUndefined();
  });

  it("cancels the run when the signal aborts mid-node", async () => {
    const controller = new AbortController();
    const model = createStubModel((request) => {
      if (promptKind(request) === "preferences") {
        return JSON.stringify({ content_types: ["book"], themes: [] });
      }
      controller.abort();
      return hangingResponder();
    });
    const { executor } = setup({ model });

    const run = await executor.execute("books", { signal: controller.signal });

    expect(run.status).toBe("failed");
    expect(run.failure).toEqual({
      nodeId: "generate_candidates",
      kind: "cancelled",
      message: "Run was cancelled",
    });
    expect(run.history.map((s) => s.nodeId)).toEqual(["parse_preferences"]);
  });

  it("fails a node that writes a field it does not own", async () => {
    const handlers: NodeHandlers = {
      ...defaultNodeHandlers,
      rank_candidates: async () => {
        const output = {
          ranked: [],
          response: { status: "ok" as const, summary: "sneaky", items: [] },
        };
        return output;
      },
    };
    const model = createScriptedModel({
      preferences: { content_types: ["book"], themes: [] },
      candidates: { book: SCI_FI_BOOKS },
    });
    const { executor } = setup({ model, handlers });

    const run = await executor.execute("books");

    expect(run.status).toBe("failed");
    expect(run.failure).toEqual({
      nodeId: "rank_candidates",
      kind: "ownership_violation",
      message: 'Node "rank_candidates" may not write state field "response"',
    });
    expect(run.response).toBeUndefined();
    expect(run.ranked).toBeUndefined();
    expect(run.history).toHaveLength(2);
  });

  it("keeps concurrent runs isolated", async () => {
    const model = createStubModel((request) => {
      const kind = promptKind(request);
      if (kind === "preferences") {
        const dragons = request.prompt.includes("dragons");
        return JSON.stringify({
          content_types: [dragons ? "book" : "movie"],
          themes: [dragons ? "dragons" : "heist"],
        });
      }
      return JSON.stringify([
        { title: kind === "book" ? "Dragon Book" : "Heist Movie", content_type: kind, description: "" },
      ]);
    });
    const { executor, inspector } = setup({ model });

    const [books, movies] = await Promise.all([
      executor.execute("books about dragons"),
      executor.execute("movies about a heist"),
    ]);

    expect(books.runId).not.toBe(movies.runId);
    expect(books.response?.items.map((i) => i.title)).toEqual(["Dragon Book"]);
    expect(movies.response?.items.map((i) => i.title)).toEqual(["Heist Movie"]);
    expect(inspector.getStates(books.runId)[0].state.rawText).toBe("books about dragons");
    expect(inspector.getStates(movies.runId)[0].state.rawText).toBe("movies about a heist");
  });

  it("runs independent nodes of a wave concurrently, snapshotting in completion order", async () => {
    const graph = WorkflowGraph.create()
      .node("parse_preferences")
      .node("generate_candidates")
      .node("rank_candidates")
      .node("format_response")
      .edge("parse_preferences", "generate_candidates")
      .edge("parse_preferences", "rank_candidates")
      .edge("generate_candidates", "format_response")
      .edge("rank_candidates", "format_response")
      .build();
    const handlers: NodeHandlers = {
      parse_preferences: async (state) => ({
        preferences: { contentTypes: ["book"], themes: [], rawText: state.rawText },
      }),
      generate_candidates: async () => {
        await new Promise((resolve) => setTimeout(resolve, 10));
        return { candidates: [], degradedContentTypes: [] };
      },
      rank_candidates: async () => ({ ranked: [] }),
      format_response: async () => ({ response: { status: "ok", summary: "done", items: [] } }),
    };
    const context = setup({ model: createStubModel(["unused"]), graph, handlers });
    const events = recordEvents(context);

    const run = await context.executor.execute("wave test");

    expect(run.status).toBe("completed");
    expect(run.history.map((s) => s.nodeId)).toEqual([
      "parse_preferences",
      "rank_candidates",
      "generate_candidates",
      "format_response",
    ]);
    const order = events
      .filter((e) => e.type === "node:start" || e.type === "node:complete")
      .map((e) => ("nodeId" in e ? `${e.type} ${e.nodeId}` : e.type));
    expect(order.slice(2, 4)).toEqual(["node:start generate_candidates", "node:start rank_candidates"]);
  });

  it("emits lifecycle events in order", async () => {
    const model = createScriptedModel({
      preferences: { content_types: ["book"], themes: ["space"] },
      candidates: { book: SCI_FI_BOOKS },
    });
    const context = setup({ model });
    const events = recordEvents(context);

    const run = await context.executor.execute("space books");

    expect(events.map((e) => e.type)).toEqual([
      "run:start",
      "node:start",
      "node:complete",
      "node:start",
      "node:complete",
      "node:start",
      "node:complete",
      "node:start",
      "node:complete",
      "run:complete",
    ]);
    expect(events.every((e) => e.runId === run.runId)).toBe(true);
  });
});
