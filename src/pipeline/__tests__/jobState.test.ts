import { describe, it, expect } from "vitest";
import { JobStateTracker, canTransition, isTerminal } from "../jobState.js";

describe("canTransition", () => {
  it("allows forward moves and skipped stages", () => {
    expect(canTransition("pending", "processing")).toBe(true);
    expect(canTransition("transcribing", "formatting")).toBe(true);
    expect(canTransition("transcribing", "transcribing")).toBe(true);
  });

  it("refuses regressions", () => {
    expect(canTransition("transcribing", "diarizing")).toBe(false);
    expect(canTransition("formatting", "pending")).toBe(false);
  });

  it("allows failing from any non-terminal state", () => {
    expect(canTransition("pending", "failed")).toBe(true);
    expect(canTransition("llm_analysis", "failed")).toBe(true);
  });

  it("never leaves a terminal state", () => {
    expect(canTransition("completed", "failed")).toBe(false);
    expect(canTransition("failed", "completed")).toBe(false);
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("formatting")).toBe(false);
  });
});

describe("JobStateTracker", () => {
  it("returns the update to persist", () => {
    const tracker = new JobStateTracker();

    expect(tracker.advance("processing", "Initializing", 5)).toEqual({
      status: "processing",
      progress: "Initializing",
      progressPercent: 5,
    });
    expect(tracker.status).toBe("processing");
  });

  it("omits fields that were not given", () => {
    const tracker = new JobStateTracker("transcribing");

    expect(tracker.advance("failed")).toEqual({ status: "failed" });
  });

  it("never lets the percent go down", () => {
    const tracker = new JobStateTracker();
    tracker.advance("processing", "a", 40);

    expect(tracker.advance("preprocessing", "b", 10).progressPercent).toBe(40);
    expect(tracker.advance("diarizing", "c", 45.6).progressPercent).toBe(46);
    expect(tracker.progressPercent).toBe(46);
  });

  it("throws on an illegal transition", () => {
    const tracker = new JobStateTracker("formatting");

    expect(() => tracker.advance("diarizing")).toThrow("Illegal job status transition formatting -> diarizing");
  });
});
