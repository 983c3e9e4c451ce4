/**
 * Task Ledger - the single owner of task state.
 * Every mutation goes through here, passes the state-machine guard and
 * leaves one audit event behind.
 */

import crypto from "node:crypto";
import { RelayError, type RelayErrorCode } from "../errors.js";
import { logger as rootLogger, type Logger } from "../log.js";
import { assertStepTransition, assertTaskTransition } from "./stateMachine.js";
import {
  isTerminal,
  type ApplyOutcomeResult,
  type DelegateRef,
  type IntentFlag,
  type LedgerEvent,
  type LedgerEventType,
  type ResolvedStep,
  type StepName,
  type StepOutcome,
  type StepRecord,
  type SubtaskOrigin,
  type Task,
  type TaskInput,
  type TaskStateName,
  type TaskStatus
} from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

function generateTaskId(): string {
  return crypto.randomUUID();
}

/**
 * Durable destination for ledger mutations.
 */
export interface LedgerSink {
  persist(task: Task, event: LedgerEvent): void;
  /** Drop a task and its audit trail */
  forget(taskId: string): void;
}

export type LedgerListener = (event: LedgerEvent, task: Task) => void;

export type TaskLedgerOptions = {
  /** Maximum tasks retained; the oldest terminal task is evicted first */
  maxTasks?: number;
  sink?: LedgerSink;
  logger?: Logger;
};

export class TaskLedger {
  private readonly tasks = new Map<string, Task>();
  private readonly events = new Map<string, LedgerEvent[]>();
  private readonly planned = new Set<string>();
  private readonly listeners = new Set<LedgerListener>();
  private readonly maxTasks: number;
  private readonly sink: LedgerSink | undefined;
  private readonly log: Logger;
  private seq = 0;

  constructor(options: TaskLedgerOptions = {}) {
    this.maxTasks = options.maxTasks ?? 1000;
    this.sink = options.sink;
    this.log = (options.logger ?? rootLogger).child({ component: "ledger" });
  }

  /**
   * Restore tasks loaded from a durable store. New audit events continue
   * after `lastSeq`. Terminal tasks beyond `maxTasks` are evicted, oldest
   * first.
   */
  hydrate(tasks: readonly Task[], lastSeq = 0): void {
    this.seq = Math.max(this.seq, lastSeq);
    for (const task of tasks) {
      this.tasks.set(task.id, structuredClone(task));
      // beginRun and recordPlan happen in the same turn, so a started task is planned
      if (task.state !== "pending") {
        this.planned.add(task.id);
      }
    }
    while (this.tasks.size > this.maxTasks) {
      if (!this.evictOldestTerminal()) break;
    }
  }

  subscribe(listener: LedgerListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  create(input: TaskInput, intent: readonly IntentFlag[], origin?: Omit<SubtaskOrigin, "closedAt">): Task {
    if (this.tasks.size >= this.maxTasks) {
      this.evictOldestTerminal();
    }

    const now = isoNow();
    const task: Task = {
      id: generateTaskId(),
      createdAt: now,
      updatedAt: now,
      state: "pending",
      input: { ...input },
      intent: [...intent],
      steps: [],
      artifacts: {}
    };
    if (origin) {
      task.origin = { ...origin };
    }
    this.tasks.set(task.id, task);
    this.record(task, "task_created", {
      input: task.input,
      intent: task.intent,
      ...(task.origin && { origin: task.origin })
    });
    return structuredClone(task);
  }

  /**
   * Get a snapshot of a task. Mutating the snapshot has no effect on the ledger.
   */
  get(id: string): Task | undefined {
    const task = this.tasks.get(id);
    return task ? structuredClone(task) : undefined;
  }

  require(id: string): Task {
    return structuredClone(this.mustGet(id));
  }

  status(id: string): TaskStatus {
    const task = this.mustGet(id);
    const status: TaskStatus = {
      id: task.id,
      state: task.state,
      steps: structuredClone(task.steps),
      artifacts: { ...task.artifacts },
      updatedAt: task.updatedAt
    };
    if (task.failure) {
      status.failure = structuredClone(task.failure);
    }
    return status;
  }

  beginRun(id: string): void {
    const task = this.mustGet(id);
    this.transition(task, "running");
  }

  /**
   * Record the resolved plan. Allowed exactly once per task, while running.
   */
  recordPlan(id: string, steps: readonly ResolvedStep[]): void {
    const task = this.mustGet(id);
    if (this.planned.has(id)) {
      throw new RelayError("INVALID_TRANSITION", `Task ${id} already has a resolved plan`, { taskId: id });
    }
    if (task.state !== "running") {
      throw new RelayError("INVALID_TRANSITION", `Task ${id} must be running to record a plan`, {
        taskId: id,
        state: task.state
      });
    }
    task.steps = steps.map((s) => ({ name: s.name, mode: s.mode, status: "not_started" }));
    this.planned.add(id);
    this.record(task, "steps_resolved", { steps: steps.map((s) => `${s.name}:${s.mode}`) });
  }

  startStep(id: string, name: StepName, input: unknown): void {
    const task = this.mustGet(id);
    if (task.state !== "running") {
      throw new RelayError("INVALID_TRANSITION", `Task ${id} is ${task.state}, cannot start step ${name}`, {
        taskId: id,
        state: task.state
      });
    }
    const step = this.mustGetStep(task, name);
    assertStepTransition(id, name, step.status, "in_progress");
    step.status = "in_progress";
    step.input = input;
    step.startedAt = isoNow();
    this.record(task, "step_started", { step: name, mode: step.mode });
  }

  markDelegated(id: string, name: StepName, ref: DelegateRef): void {
    const task = this.mustGet(id);
    const step = this.mustGetStep(task, name);
    assertStepTransition(id, name, step.status, "delegated");
    assertTaskTransition(id, task.state, "awaiting_delegate");
    step.status = "delegated";
    step.delegateRef = { ...ref };
    this.record(task, "step_delegated", {
      step: name,
      remoteId: ref.remoteId,
      counterparty: ref.counterparty,
      deadline: ref.deadline
    });
    this.transition(task, "awaiting_delegate");
  }

  /**
   * Apply a step outcome. Idempotent per (task, step): re-applying an outcome
   * to a step that already settled leaves the task unchanged.
   */
  applyStepOutcome(id: string, name: StepName, outcome: StepOutcome): ApplyOutcomeResult {
    const task = this.mustGet(id);
    const step = this.mustGetStep(task, name);

    if (step.status === "done" || step.status === "failed") {
      return { applied: false, reason: "idempotent" };
    }
    if (isTerminal(task.state)) {
      return { applied: false, reason: "terminal" };
    }
    if (step.status === "not_started") {
      return { applied: false, reason: "not_pending" };
    }

    if (outcome.kind === "success") {
      step.status = "done";
      step.output = outcome.output;
      step.finishedAt = isoNow();
      delete step.delegateRef;
      this.record(task, "step_outcome", { step: name, kind: "success" });
      for (const [artifactName, locator] of Object.entries(outcome.artifacts ?? {})) {
        this.putArtifact(task, artifactName, locator);
      }
      if (task.state === "awaiting_delegate") {
        this.transition(task, "running");
      }
      return { applied: true };
    }

    step.status = "failed";
    step.error = withDetails({ code: outcome.code, reason: outcome.reason }, outcome.details);
    step.finishedAt = isoNow();
    delete step.delegateRef;
    this.record(task, "step_outcome", { step: name, kind: "failure", code: outcome.code, reason: outcome.reason });
    task.failure = withDetails({ code: outcome.code, reason: outcome.reason, step: name }, outcome.details);
    this.transition(task, "failed");
    return { applied: true };
  }

  /**
   * Append an artifact locator. Allowed in every state, including terminal
   * ones. The first locator recorded under a name wins.
   */
  appendArtifact(id: string, name: string, locator: string): boolean {
    const task = this.mustGet(id);
    return this.putArtifact(task, name, locator);
  }

  complete(id: string): void {
    const task = this.mustGet(id);
    const unfinished = task.steps.filter((s) => s.status !== "done");
    if (unfinished.length > 0) {
      throw new RelayError("INVALID_TRANSITION", `Task ${id} has unfinished steps`, {
        taskId: id,
        steps: unfinished.map((s) => `${s.name}:${s.status}`)
      });
    }
    this.transition(task, "completed");
  }

  /**
   * Fail a task. Any step still in flight is failed with the same reason.
   * Returns false when the task was already terminal.
   */
  fail(
    id: string,
    code: RelayErrorCode,
    reason: string,
    options: { step?: StepName; details?: unknown } = {}
  ): boolean {
    const task = this.mustGet(id);
    if (isTerminal(task.state)) return false;

    for (const step of task.steps) {
      if (step.status === "in_progress" || step.status === "delegated") {
        step.status = "failed";
        step.error = withDetails({ code, reason }, options.details);
        step.finishedAt = isoNow();
        delete step.delegateRef;
      }
    }
    const failure = withDetails({ code, reason }, options.details);
    task.failure = options.step !== undefined ? { ...failure, step: options.step } : failure;
    this.transition(task, "failed");
    return true;
  }

  /**
   * Mark a hosted subtask's outcome as handed over, or the subtask as
   * abandoned. Returns false for an unknown task, a task with no origin or
   * one already closed.
   */
  closeOrigin(id: string, reason: "reported" | "abandoned"): boolean {
    const task = this.tasks.get(id);
    if (!task?.origin || task.origin.closedAt !== undefined) return false;
    task.origin.closedAt = isoNow();
    this.record(task, "subtask_closed", { caller: task.origin.caller, reason });
    return true;
  }

  list(state?: TaskStateName): Task[] {
    const all = Array.from(this.tasks.values());
    const filtered = state ? all.filter((t) => t.state === state) : all;
    return filtered.map((t) => structuredClone(t));
  }

  history(id: string): LedgerEvent[] {
    return (this.events.get(id) ?? []).map((e) => structuredClone(e));
  }

  /**
   * Remove a task from memory and from the sink.
   */
  delete(id: string): boolean {
    this.events.delete(id);
    this.planned.delete(id);
    if (!this.tasks.delete(id)) return false;
    if (this.sink) {
      try {
        this.sink.forget(id);
      } catch (err) {
        this.log.error(
          { taskId: id, err: err instanceof Error ? err.message : String(err) },
          "Failed to forget task"
        );
      }
    }
    return true;
  }

  stats(): { total: number; byState: Record<TaskStateName, number> } {
    const byState: Record<TaskStateName, number> = {
      pending: 0,
      running: 0,
      awaiting_delegate: 0,
      completed: 0,
      failed: 0
    };
    for (const task of this.tasks.values()) {
      byState[task.state]++;
    }
    return { total: this.tasks.size, byState };
  }

  private mustGet(id: string): Task {
    const task = this.tasks.get(id);
    if (!task) {
      throw new RelayError("NOT_FOUND", `Task ${id} not found`, { taskId: id });
    }
    return task;
  }

  private mustGetStep(task: Task, name: StepName): StepRecord {
    const step = task.steps.find((s) => s.name === name);
    if (!step) {
      throw new RelayError("NOT_FOUND", `Task ${task.id} has no step ${name}`, { taskId: task.id, step: name });
    }
    return step;
  }

  private putArtifact(task: Task, name: string, locator: string): boolean {
    const existing = task.artifacts[name];
    if (existing === locator) return false;
    if (existing !== undefined) {
      this.record(task, "artifact_conflict", { name, kept: existing, ignored: locator });
      return false;
    }
    task.artifacts[name] = locator;
    this.record(task, "artifact_appended", { name, locator });
    return true;
  }

  private transition(task: Task, to: TaskStateName): void {
    const from = task.state;
    assertTaskTransition(task.id, from, to);
    task.state = to;
    this.record(task, "state_changed", { from, to });
  }

  private record(task: Task, type: LedgerEventType, payload: Record<string, unknown>): void {
    task.updatedAt = isoNow();
    const event: LedgerEvent = { seq: ++this.seq, taskId: task.id, time: task.updatedAt, type, payload };
    const trail = this.events.get(task.id);
    if (trail) {
      trail.push(event);
    } else {
      this.events.set(task.id, [event]);
    }

    const snapshot = structuredClone(task);
    if (this.sink) {
      try {
        this.sink.persist(snapshot, event);
      } catch (err) {
        this.log.error(
          {
            taskId: task.id,
            type,
            err: err instanceof Error ? err.message : String(err)
          },
          "Failed to persist ledger event"
        );
      }
    }

    for (const listener of this.listeners) {
      try {
        listener(event, snapshot);
      } catch (err) {
        this.log.error(
          {
            taskId: task.id,
            type,
            err: err instanceof Error ? err.message : String(err)
          },
          "Ledger listener threw"
        );
      }
    }
  }

  private evictOldestTerminal(): boolean {
    let oldest: Task | undefined;
    for (const task of this.tasks.values()) {
      if (!isTerminal(task.state)) continue;
      if (!oldest || task.createdAt < oldest.createdAt) {
        oldest = task;
      }
    }
    if (oldest) {
      return this.delete(oldest.id);
    }
    this.log.warn({ maxTasks: this.maxTasks }, "Ledger at capacity with no terminal task to evict");
    return false;
  }
}

function withDetails<T extends object>(base: T, details: unknown): T & { details?: unknown } {
  return details === undefined ? base : { ...base, details };
}
