import { describe, it, expect } from "vitest";
import { IncrementalReadyTracker } from "../incremental-ready-tracker.js";

function track(deps: Record<string, string[]>) {
  const ready: string[] = [];
  const tracker = new IncrementalReadyTracker(
    new Map(Object.entries(deps)),
    Object.keys(deps),
    (id) => ready.push(id),
  );
  return { tracker, ready };
}

describe("IncrementalReadyTracker", () => {
  it("seeds nodes without dependencies in declaration order", () => {
    const { tracker, ready } = track({ a: [], b: ["a"], c: [] });
    tracker.seedInitialReady();
    expect(ready).toEqual(["a", "c"]);
  });

  it("releases a node once all of its dependencies complete", () => {
    const { tracker, ready } = track({ a: [], b: [], c: ["a", "b"] });
    tracker.seedInitialReady();

    expect(tracker.markCompleted("a")).toEqual([]);
    expect(tracker.markCompleted("b")).toEqual(["c"]);
    expect(ready).toEqual(["a", "b", "c"]);
  });

  it("ignores a second completion of the same node", () => {
    const { tracker } = track({ a: [], b: ["a"] });
    expect(tracker.markCompleted("a")).toEqual(["b"]);
    expect(tracker.markCompleted("a")).toEqual([]);
  });

  it("remaining() lists nodes not yet completed", () => {
    const { tracker } = track({ a: [], b: ["a"], c: ["b"] });
    tracker.markCompleted("a");
    expect(tracker.remaining()).toEqual(["b", "c"]);
  });
});
