import { describe, expect, it } from "vitest";
import { RelayError } from "../src/relay/errors.js";
import { assertStepTransition, assertTaskTransition, canTransition } from "../src/relay/tasks/stateMachine.js";

describe("task transitions", () => {
  it("allows the normal lifecycle", () => {
    expect(canTransition("pending", "running")).toBe(true);
    expect(canTransition("running", "awaiting_delegate")).toBe(true);
    expect(canTransition("awaiting_delegate", "running")).toBe(true);
    expect(canTransition("running", "completed")).toBe(true);
  });

  it("lets any non-terminal state fail", () => {
    expect(canTransition("pending", "failed")).toBe(true);
    expect(canTransition("running", "failed")).toBe(true);
    expect(canTransition("awaiting_delegate", "failed")).toBe(true);
  });

  it("never leaves a terminal state", () => {
    expect(canTransition("completed", "running")).toBe(false);
    expect(canTransition("completed", "failed")).toBe(false);
    expect(canTransition("failed", "running")).toBe(false);
    expect(canTransition("failed", "completed")).toBe(false);
  });

  it("rejects skipping straight to completion", () => {
    expect(canTransition("pending", "completed")).toBe(false);
    expect(canTransition("awaiting_delegate", "completed")).toBe(false);
  });

  it("assertTaskTransition throws INVALID_TRANSITION with details", () => {
    try {
      assertTaskTransition("t-1", "completed", "running");
      expect.unreachable("should have thrown");
    } catch (err) {
      expect(err).toBeInstanceOf(RelayError);
      if (err instanceof RelayError) {
        expect(err.code).toBe("INVALID_TRANSITION");
        expect(err.message).toBe("Task t-1 cannot move from completed to running");
        expect(err.details).toEqual({ taskId: "t-1", from: "completed", to: "running" });
      }
    }
  });
});

describe("step transitions", () => {
  it("allows start, delegate and settle", () => {
    expect(() => assertStepTransition("t-1", "translate", "not_started", "in_progress")).not.toThrow();
    expect(() => assertStepTransition("t-1", "text2speech", "in_progress", "delegated")).not.toThrow();
    expect(() => assertStepTransition("t-1", "text2speech", "delegated", "done")).not.toThrow();
    expect(() => assertStepTransition("t-1", "text2speech", "delegated", "failed")).not.toThrow();
  });

  it("allows re-entering in_progress for a recovered step", () => {
    expect(() => assertStepTransition("t-1", "translate", "in_progress", "in_progress")).not.toThrow();
  });

  it("rejects moving a settled step", () => {
    expect(() => assertStepTransition("t-1", "translate", "done", "in_progress")).toThrow(
      "Step translate of task t-1 cannot move from done to in_progress"
    );
    expect(() => assertStepTransition("t-1", "translate", "failed", "done")).toThrow(RelayError);
  });

  it("rejects delegating a step that never started", () => {
    expect(() => assertStepTransition("t-1", "text2speech", "not_started", "delegated")).toThrow(RelayError);
  });
});
