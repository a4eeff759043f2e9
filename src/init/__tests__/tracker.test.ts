import { describe, it, expect, vi } from "vitest";
import { StepTracker, isTerminal } from "../tracker.js";

function clock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++));
}

describe("StepTracker", () => {
  it("keeps steps in insertion order and ignores duplicate keys", () => {
    const tracker = new StepTracker("Init");
    tracker.add("a", "First");
    tracker.add("b", "Second");
    tracker.add("a", "Again");

    expect(tracker.getSteps().map((s) => [s.key, s.label, s.status])).toEqual([
      ["a", "First", "pending"],
      ["b", "Second", "pending"],
    ]);
  });

  it("moves forward through running to a terminal status", () => {
    const tracker = new StepTracker("Init", { now: clock() });
    tracker.add("a", "First");

    expect(tracker.start("a")).toBe(true);
    expect(tracker.start("a", "still going")).toBe(true);
    expect(tracker.complete("a", "ok")).toBe(true);

    const step = tracker.get("a");
    expect(step?.status).toBe("done");
    expect(step?.detail).toBe("ok");
    expect(step?.startedAt?.toISOString()).toBe("2026-01-01T00:00:00.000Z");
    expect(step?.endedAt?.toISOString()).toBe("2026-01-01T00:00:01.000Z");
  });

  it("rejects transitions out of a terminal status", () => {
    const tracker = new StepTracker("Init");
    tracker.add("a", "First");
    tracker.start("a");
    tracker.fail("a", "boom");

    expect(tracker.complete("a", "later")).toBe(false);
    expect(tracker.start("a")).toBe(false);
    expect(tracker.get("a")?.status).toBe("failed");
    expect(tracker.get("a")?.detail).toBe("boom");
  });

  it("lets a pending step be skipped but not completed or failed directly", () => {
    const tracker = new StepTracker("Init");
    tracker.add("a", "First");
    tracker.add("b", "Second");

    expect(tracker.complete("a")).toBe(false);
    expect(tracker.fail("a")).toBe(false);
    expect(tracker.skip("b", "not needed")).toBe(true);
    expect(tracker.get("a")?.status).toBe("pending");
    expect(tracker.get("b")?.status).toBe("skipped");
    expect(tracker.get("b")?.startedAt).toBeUndefined();
    expect(tracker.get("b")?.endedAt).toBeInstanceOf(Date);
  });

  it("throws for an unknown step", () => {
    const tracker = new StepTracker("Init");
    expect(() => tracker.start("missing")).toThrow("Unknown progress step: missing");
  });

  it("returns copies that callers cannot use to mutate state", () => {
    const tracker = new StepTracker("Init");
    tracker.add("a", "First");

    const steps = tracker.getSteps();
    const first = steps[0];
    if (first) first.status = "done";

    expect(tracker.get("a")?.status).toBe("pending");
  });

  it("calls the refresh callback after each mutation", () => {
    const tracker = new StepTracker("Init");
    const seen: string[] = [];
    tracker.attachRefresh((steps) => seen.push(steps.map((s) => s.status).join(",")));

    tracker.add("a", "First");
    tracker.start("a");
    tracker.complete("a");
    tracker.complete("a");

    expect(seen).toEqual(["pending", "running", "done"]);
  });

  it("records refresh failures without undoing the mutation", () => {
    const onRefreshError = vi.fn();
    const tracker = new StepTracker("Init", { onRefreshError });
    tracker.add("a", "First");
    tracker.attachRefresh(() => {
      throw new Error("render failed");
    });

    expect(tracker.start("a")).toBe(true);

    expect(tracker.get("a")?.status).toBe("running");
    expect(tracker.getRefreshErrors()).toHaveLength(1);
    expect(onRefreshError).toHaveBeenCalledTimes(1);
  });
});

describe("isTerminal", () => {
  it("classifies statuses", () => {
    expect(isTerminal("done")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("skipped")).toBe(true);
    expect(isTerminal("running")).toBe(false);
    expect(isTerminal("pending")).toBe(false);
  });
});
