import { describe, expect, it, beforeEach } from "vitest";
import { RelayError } from "../src/relay/errors.js";
import { createLogger } from "../src/relay/log.js";
import { TaskLedger, type LedgerSink } from "../src/relay/tasks/ledger.js";
import type { LedgerEvent, Task } from "../src/relay/tasks/types.js";

const quiet = createLogger("silent");

describe("TaskLedger", () => {
  let ledger: TaskLedger;

  beforeEach(() => {
    ledger = new TaskLedger({ logger: quiet });
  });

  function startedTask(): string {
    const task = ledger.create({ text: "hello" }, ["translate", "text2speech-delegated"]);
    ledger.beginRun(task.id);
    ledger.recordPlan(task.id, [
      { name: "translate", mode: "local" },
      { name: "text2speech", mode: "delegated" }
    ]);
    return task.id;
  }

  describe("create", () => {
    it("creates a pending task with no steps", () => {
      const task = ledger.create({ text: "hello", targetLang: "fr" }, ["translate"]);

      expect(task.state).toBe("pending");
      expect(task.steps).toEqual([]);
      expect(task.artifacts).toEqual({});
      expect(task.input).toEqual({ text: "hello", targetLang: "fr" });
      expect(task.intent).toEqual(["translate"]);
    });

    it("returns snapshots that do not alias ledger state", () => {
      const task = ledger.create({ text: "hello" }, ["translate"]);
      task.state = "completed";
      task.artifacts.audio = "memory://x";

      const stored = ledger.require(task.id);
      expect(stored.state).toBe("pending");
      expect(stored.artifacts).toEqual({});
    });

    it("throws NOT_FOUND for unknown ids", () => {
      expect(ledger.get("missing")).toBeUndefined();
      expect(() => ledger.require("missing")).toThrow(RelayError);
      expect(() => ledger.status("missing")).toThrow("Task missing not found");
    });
  });

  describe("recordPlan", () => {
    it("records steps as not_started", () => {
      const id = startedTask();
      const steps = ledger.require(id).steps;

      expect(steps.map((s) => [s.name, s.mode, s.status])).toEqual([
        ["translate", "local", "not_started"],
        ["text2speech", "delegated", "not_started"]
      ]);
    });

    it("refuses a second plan", () => {
      const id = startedTask();
      expect(() => ledger.recordPlan(id, [{ name: "translate", mode: "local" }])).toThrow(
        `Task ${id} already has a resolved plan`
      );
    });

    it("refuses a plan before the task runs", () => {
      const task = ledger.create({ text: "hello" }, []);
      expect(() => ledger.recordPlan(task.id, [])).toThrow(`Task ${task.id} must be running to record a plan`);
    });
  });

  describe("applyStepOutcome", () => {
    it("marks a step done and keeps the task running", () => {
      const id = startedTask();
      ledger.startStep(id, "translate", { text: "hello" });

      const result = ledger.applyStepOutcome(id, "translate", { kind: "success", output: { text: "bonjour" } });

      expect(result).toEqual({ applied: true });
      const task = ledger.require(id);
      expect(task.state).toBe("running");
      expect(task.steps[0]?.status).toBe("done");
      expect(task.steps[0]?.output).toEqual({ text: "bonjour" });
    });

    it("is idempotent for a step that already settled", () => {
      const id = startedTask();
      ledger.startStep(id, "translate", { text: "hello" });
      ledger.applyStepOutcome(id, "translate", { kind: "success", output: "first" });
      const before = ledger.history(id).length;

      const result = ledger.applyStepOutcome(id, "translate", { kind: "success", output: "second" });

      expect(result).toEqual({ applied: false, reason: "idempotent" });
      expect(ledger.require(id).steps[0]?.output).toBe("first");
      expect(ledger.history(id)).toHaveLength(before);
    });

    it("ignores outcomes for steps that never started", () => {
      const id = startedTask();
      expect(ledger.applyStepOutcome(id, "text2speech", { kind: "success", output: null })).toEqual({
        applied: false,
        reason: "not_pending"
      });
    });

    it("returns the task to running when a delegated step succeeds", () => {
      const id = startedTask();
      ledger.startStep(id, "translate", {});
      ledger.applyStepOutcome(id, "translate", { kind: "success", output: "bonjour" });
      ledger.startStep(id, "text2speech", "bonjour");
      ledger.markDelegated(id, "text2speech", { remoteId: "r-1", counterparty: "speech-agent", deadline: 1 });
      expect(ledger.require(id).state).toBe("awaiting_delegate");
      expect(ledger.require(id).steps[1]?.delegateRef?.remoteId).toBe("r-1");

      ledger.applyStepOutcome(id, "text2speech", {
        kind: "success",
        output: null,
        artifacts: { audio: "memory://audio-1" }
      });

      const task = ledger.require(id);
      expect(task.state).toBe("running");
      expect(task.steps[1]?.status).toBe("done");
      expect(task.steps[1]?.delegateRef).toBeUndefined();
      expect(task.artifacts).toEqual({ audio: "memory://audio-1" });
    });

    it("fails the task on a failure outcome", () => {
      const id = startedTask();
      ledger.startStep(id, "translate", {});

      ledger.applyStepOutcome(id, "translate", {
        kind: "failure",
        code: "HANDLER_FAILURE",
        reason: "provider down",
        details: { status: 503 }
      });

      const task = ledger.require(id);
      expect(task.state).toBe("failed");
      expect(task.failure).toEqual({
        code: "HANDLER_FAILURE",
        reason: "provider down",
        step: "translate",
        details: { status: 503 }
      });
      expect(task.steps[0]?.error).toEqual({ code: "HANDLER_FAILURE", reason: "provider down", details: { status: 503 } });
    });
  });

  describe("complete", () => {
    it("refuses while a step is unfinished", () => {
      const id = startedTask();
      expect(() => ledger.complete(id)).toThrow(`Task ${id} has unfinished steps`);
    });

    it("completes a task with no steps", () => {
      const task = ledger.create({ text: "hello" }, []);
      ledger.beginRun(task.id);
      ledger.recordPlan(task.id, []);
      ledger.complete(task.id);

      expect(ledger.require(task.id).state).toBe("completed");
    });
  });

  describe("fail", () => {
    it("fails in-flight steps with the task", () => {
      const id = startedTask();
      ledger.startStep(id, "translate", {});

      expect(ledger.fail(id, "CANCELLED", "Task cancelled", { step: "translate" })).toBe(true);

      const task = ledger.require(id);
      expect(task.state).toBe("failed");
      expect(task.failure).toEqual({ code: "CANCELLED", reason: "Task cancelled", step: "translate" });
      expect(task.steps[0]?.status).toBe("failed");
      expect(task.steps[1]?.status).toBe("not_started");
    });

    it("returns false for a terminal task", () => {
      const id = startedTask();
      ledger.fail(id, "INTERNAL", "boom");
      expect(ledger.fail(id, "CANCELLED", "again")).toBe(false);
      expect(ledger.require(id).failure?.reason).toBe("boom");
    });

    it("can fail a pending task", () => {
      const task = ledger.create({ text: "hello" }, []);
      expect(ledger.fail(task.id, "UNKNOWN_STEP", "no handler")).toBe(true);
      expect(ledger.require(task.id).state).toBe("failed");
    });
  });

  describe("artifacts", () => {
    it("keeps the first locator recorded under a name", () => {
      const task = ledger.create({ text: "hello" }, []);

      expect(ledger.appendArtifact(task.id, "audio", "memory://a")).toBe(true);
      expect(ledger.appendArtifact(task.id, "audio", "memory://a")).toBe(false);
      expect(ledger.appendArtifact(task.id, "audio", "memory://b")).toBe(false);

      expect(ledger.require(task.id).artifacts).toEqual({ audio: "memory://a" });
      const conflict = ledger.history(task.id).find((e) => e.type === "artifact_conflict");
      expect(conflict?.payload).toEqual({ name: "audio", kept: "memory://a", ignored: "memory://b" });
    });

    it("accepts artifacts after the task is terminal", () => {
      const task = ledger.create({ text: "hello" }, []);
      ledger.fail(task.id, "INTERNAL", "boom");

      expect(ledger.appendArtifact(task.id, "audio", "memory://late")).toBe(true);
      expect(ledger.require(task.id).artifacts.audio).toBe("memory://late");
    });
  });

  describe("history and listeners", () => {
    it("records one event per mutation with increasing seq", () => {
      const id = startedTask();
      const events = ledger.history(id);

      expect(events.map((e) => e.type)).toEqual(["task_created", "state_changed", "steps_resolved"]);
      expect(events.map((e) => e.seq)).toEqual([1, 2, 3]);
      expect(events[1]?.payload).toEqual({ from: "pending", to: "running" });
    });

    it("notifies subscribers until they unsubscribe", () => {
      const seen: string[] = [];
      const unsubscribe = ledger.subscribe((event) => seen.push(event.type));

      const task = ledger.create({ text: "hello" }, []);
      unsubscribe();
      ledger.beginRun(task.id);

      expect(seen).toEqual(["task_created"]);
    });

    it("keeps going when a listener throws", () => {
      ledger.subscribe(() => {
        throw new Error("listener broke");
      });
      const task = ledger.create({ text: "hello" }, []);
      expect(ledger.require(task.id).state).toBe("pending");
    });

    it("writes every event to the sink", () => {
      const persisted: Array<[string, LedgerEvent["type"]]> = [];
      const sink: LedgerSink = {
        persist: (task: Task, event: LedgerEvent) => persisted.push([task.state, event.type]),
        forget: () => undefined
      };
      const withSink = new TaskLedger({ sink, logger: quiet });

      const task = withSink.create({ text: "hello" }, []);
      withSink.beginRun(task.id);

      expect(persisted).toEqual([
        ["pending", "task_created"],
        ["running", "state_changed"]
      ]);
    });

    it("continues seq after hydrate", () => {
      const source = new TaskLedger({ logger: quiet });
      const task = source.create({ text: "hello" }, []);

      const restored = new TaskLedger({ logger: quiet });
      restored.hydrate([source.require(task.id)], 41);
      restored.beginRun(task.id);

      expect(restored.history(task.id).map((e) => e.seq)).toEqual([42]);
    });
  });

  describe("capacity", () => {
    it("evicts the oldest terminal task", () => {
      const small = new TaskLedger({ maxTasks: 2, logger: quiet });
      const first = small.create({ text: "one" }, []);
      const second = small.create({ text: "two" }, []);
      small.fail(second.id, "INTERNAL", "done");

      const third = small.create({ text: "three" }, []);

      expect(small.get(second.id)).toBeUndefined();
      expect(small.get(first.id)?.state).toBe("pending");
      expect(small.get(third.id)?.state).toBe("pending");
    });

    it("forgets evicted tasks in the sink", () => {
      const forgotten: string[] = [];
      const sink: LedgerSink = {
        persist: () => undefined,
        forget: (taskId: string) => forgotten.push(taskId)
      };
      const small = new TaskLedger({ maxTasks: 1, sink, logger: quiet });
      const first = small.create({ text: "one" }, []);
      small.fail(first.id, "INTERNAL", "done");

      small.create({ text: "two" }, []);

      expect(forgotten).toEqual([first.id]);
    });

    it("evicts the oldest terminal tasks when hydrated past the limit", () => {
      const source = new TaskLedger({ logger: quiet });
      const tasks = ["one", "two", "three"].map((text, i) => {
        const task = source.create({ text }, []);
        source.fail(task.id, "INTERNAL", "done");
        return { ...source.require(task.id), createdAt: `2026-01-0${i + 1}T00:00:00.000Z` };
      });
      const pending = { ...source.create({ text: "four" }, []), createdAt: "2025-12-31T00:00:00.000Z" };

      const small = new TaskLedger({ maxTasks: 2, logger: quiet });
      small.hydrate([...tasks, pending]);

      expect(small.list().map((t) => t.input.text).sort()).toEqual(["four", "three"]);
    });

    it("keeps non-terminal tasks when nothing can be evicted", () => {
      const small = new TaskLedger({ maxTasks: 1, logger: quiet });
      small.create({ text: "one" }, []);
      small.create({ text: "two" }, []);

      expect(small.stats().total).toBe(2);
      expect(small.stats().byState.pending).toBe(2);
    });
  });

  describe("origin", () => {
    it("records who asked for a hosted subtask", () => {
      const task = ledger.create({ text: "hi" }, ["text2speech-local"], {
        caller: "peer",
        callbackUrl: "http://caller.test/a2a/subtasks/result"
      });

      expect(task.origin).toEqual({ caller: "peer", callbackUrl: "http://caller.test/a2a/subtasks/result" });
      expect(ledger.history(task.id)[0]?.payload.origin).toEqual(task.origin);
    });

    it("closes an origin once", () => {
      const task = ledger.create({ text: "hi" }, [], { caller: "peer" });

      expect(ledger.closeOrigin(task.id, "reported")).toBe(true);
      expect(ledger.closeOrigin(task.id, "abandoned")).toBe(false);
      expect(ledger.require(task.id).origin?.closedAt).toEqual(expect.any(String));
      expect(ledger.history(task.id).map((e) => e.type)).toEqual(["task_created", "subtask_closed"]);
    });

    it("refuses to close tasks without an origin or unknown ids", () => {
      const task = ledger.create({ text: "hi" }, []);

      expect(ledger.closeOrigin(task.id, "reported")).toBe(false);
      expect(ledger.closeOrigin("missing", "reported")).toBe(false);
    });
  });

  it("lists tasks by state", () => {
    const a = ledger.create({ text: "a" }, []);
    ledger.create({ text: "b" }, []);
    ledger.fail(a.id, "INTERNAL", "boom");

    expect(ledger.list("failed").map((t) => t.id)).toEqual([a.id]);
    expect(ledger.list()).toHaveLength(2);
  });
});
