import { EchoTracker } from "../src/local-echo/echo-tracker.js";
import { describe, it, expect } from "vitest";

describe("EchoTracker", () => {
  it("consumes characters in the order they were recorded", () => {
    const tracker = new EchoTracker();
    tracker.recordEcho("a");
    tracker.recordEcho("b");
    expect(tracker.size).toBe(2);
    expect(tracker.consumeFront()).toBe("a");
    expect(tracker.consumeFront()).toBe("b");
    expect(tracker.isEmpty()).toBe(true);
  });

  it("returns undefined when empty", () => {
    expect(new EchoTracker().consumeFront()).toBeUndefined();
  });

  it("clear() drops everything", () => {
    const tracker = new EchoTracker();
    tracker.recordEcho("a");
    tracker.clear();
    expect(tracker.isEmpty()).toBe(true);
    expect(tracker.snapshot()).toEqual([]);
  });

  it("snapshot() is a copy", () => {
    const tracker = new EchoTracker();
    tracker.recordEcho("a");
    const snapshot = tracker.snapshot();
    snapshot.push("z");
    expect(tracker.snapshot()).toEqual(["a"]);
  });
});
