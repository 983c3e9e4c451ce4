/**
 * Steprelay Orchestrator - drives tasks through their resolved steps.
 *
 * Local steps run against a Capability Provider and their byte artifacts are
 * published before the outcome is applied. Delegated steps are handed to the
 * Delegation Channel and the task parks in `awaiting_delegate` until the
 * channel reports back; nothing blocks while it waits.
 *
 * All work on one task runs through a per-task serializer, so a delegate
 * result can never overtake the drive that created the subtask.
 */

import { RelayError, toRelayError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../log.js";
import type { ArtifactPublisher } from "../artifacts/publisher.js";
import { providerFailure, textOf, type ArtifactPayload, type CapabilityResult } from "../capabilities/types.js";
import type { DelegationChannel } from "../delegation/channel.js";
import type { SubtaskOutcome, SubtaskResultEvent } from "../delegation/types.js";
import type { StepRegistry } from "../registry/stepRegistry.js";
import type { TaskLedger } from "../tasks/ledger.js";
import {
  isTerminal,
  type IntentFlag,
  type LedgerEvent,
  type ResolvedStep,
  type StepName,
  type StepOutcome,
  type SubtaskOrigin,
  type Task,
  type TaskInput,
  type TaskStateName,
  type TaskStatus
} from "../tasks/types.js";
import { KeyedSerializer } from "../utils/concurrencyLimiter.js";
import { isSettled, type RelayEvent, type RelayEventHandler } from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

export type OrchestratorOptions = {
  ledger: TaskLedger;
  registry: StepRegistry;
  channel: DelegationChannel;
  publisher: ArtifactPublisher;
  onEvent?: RelayEventHandler;
  logger?: Logger;
};

type Waiter = {
  until: (state: TaskStateName) => boolean;
  resolve: (status: TaskStatus) => void;
};

export type RecoveryReport = {
  /** pending/running tasks re-driven */
  resumed: number;
  /** awaiting_delegate tasks whose correlation entry was re-registered */
  restored: number;
};

export class Orchestrator {
  readonly ledger: TaskLedger;
  readonly registry: StepRegistry;
  private readonly channel: DelegationChannel;
  private readonly publisher: ArtifactPublisher;
  private readonly onEvent: RelayEventHandler | undefined;
  private readonly log: Logger;
  private readonly serializer = new KeyedSerializer();
  private readonly inflight = new Map<string, AbortController>();
  private readonly waiters = new Map<string, Waiter[]>();

  constructor(options: OrchestratorOptions) {
    this.ledger = options.ledger;
    this.registry = options.registry;
    this.channel = options.channel;
    this.publisher = options.publisher;
    this.onEvent = options.onEvent;
    this.log = (options.logger ?? rootLogger).child({ component: "orchestrator" });

    this.channel.onResult((event) => this.handleSubtaskResult(event));
    this.ledger.subscribe((event, task) => this.onLedgerEvent(event, task));
  }

  /**
   * Accept a task and start driving it in the background. `origin` marks a
   * task run as a subtask for another agent.
   */
  submit(input: TaskInput, intent: readonly IntentFlag[], origin?: Omit<SubtaskOrigin, "closedAt">): string {
    const task = this.ledger.create(input, intent, origin);
    this.log.info({ taskId: task.id, intent: task.intent }, "Task accepted");
    this.launch(task.id);
    return task.id;
  }

  /**
   * Submit and wait until the task is terminal or suspended on a delegate.
   */
  async run(input: TaskInput, intent: readonly IntentFlag[]): Promise<Task> {
    const taskId = this.submit(input, intent);
    await this.waitForSettled(taskId);
    return this.ledger.require(taskId);
  }

  getStatus(taskId: string): TaskStatus {
    return this.ledger.status(taskId);
  }

  list(state?: TaskStateName): Task[] {
    return this.ledger.list(state);
  }

  /**
   * Resolves once the task is terminal or parked on a delegate.
   * @throws RelayError NOT_FOUND for an unknown task.
   */
  waitForSettled(taskId: string): Promise<TaskStatus> {
    return this.waitFor(taskId, isSettled);
  }

  /**
   * Resolves once the task is completed or failed.
   * @throws RelayError NOT_FOUND for an unknown task.
   */
  waitForTerminal(taskId: string): Promise<TaskStatus> {
    return this.waitFor(taskId, isTerminal);
  }

  /**
   * Fail a task with CANCELLED. A suspended task's subtask is abandoned, a
   * running local step is aborted. Returns false when the task was already
   * terminal.
   *
   * @throws RelayError NOT_FOUND for an unknown task.
   */
  async cancel(taskId: string): Promise<boolean> {
    this.ledger.require(taskId);
    // Abort first so a slow provider call releases the task lock promptly
    this.inflight.get(taskId)?.abort();
    return this.serializer.run(taskId, async () => {
      const task = this.ledger.require(taskId);
      if (isTerminal(task.state)) return false;

      const delegated = task.steps.find((s) => s.status === "delegated");
      if (delegated?.delegateRef) {
        this.channel.abandon(delegated.delegateRef.remoteId);
      }
      const active = task.steps.find((s) => s.status === "in_progress" || s.status === "delegated");
      this.ledger.fail(taskId, "CANCELLED", "Task cancelled", active ? { step: active.name } : {});
      this.log.info({ taskId }, "Task cancelled");
      return true;
    });
  }

  /**
   * Pick up where a previous process left off. Suspended tasks get their
   * correlation entry back with the original deadline; pending and running
   * tasks are re-driven from their first step that is not done.
   */
  recover(): RecoveryReport {
    const report: RecoveryReport = { resumed: 0, restored: 0 };
    for (const task of this.ledger.list()) {
      if (task.state === "awaiting_delegate") {
        const step = task.steps.find((s) => s.status === "delegated");
        if (step?.delegateRef) {
          this.channel.restore(task.id, step.name, step.delegateRef);
          report.restored++;
        } else {
          this.ledger.fail(task.id, "INTERNAL", "Suspended task has no delegated step");
        }
      } else if (task.state === "pending" || task.state === "running") {
        this.launch(task.id);
        report.resumed++;
      }
    }
    if (report.resumed > 0 || report.restored > 0) {
      this.log.info(report, "Recovered tasks");
    }
    return report;
  }

  private launch(taskId: string): void {
    this.serializer.run(taskId, () => this.drive(taskId)).catch((err: unknown) => {
      this.log.error({ taskId, err: toRelayError(err).message }, "Task drive failed");
    });
  }

  /**
   * Move a task forward until it completes, fails or suspends. Must run
   * under the task's lock.
   */
  private async drive(taskId: string): Promise<void> {
    const task = this.ledger.get(taskId);
    if (!task || task.state === "awaiting_delegate" || isTerminal(task.state)) return;

    try {
      if (task.state === "pending") {
        this.ledger.beginRun(taskId);
        let plan: readonly ResolvedStep[];
        try {
          plan = this.registry.resolve(task.intent);
        } catch (err) {
          const relayErr = toRelayError(err);
          this.ledger.fail(taskId, relayErr.code, relayErr.message, { details: relayErr.details });
          return;
        }
        this.ledger.recordPlan(taskId, plan);
      }
      await this.advance(taskId);
    } catch (err) {
      const relayErr = toRelayError(err);
      this.log.error({ taskId, code: relayErr.code, err: relayErr.message }, "Unexpected error while driving task");
      this.ledger.fail(taskId, relayErr.code, relayErr.message, { details: relayErr.details });
    }
  }

  private async advance(taskId: string): Promise<void> {
    for (;;) {
      const task = this.ledger.require(taskId);
      if (task.state !== "running") return;

      const index = task.steps.findIndex((s) => s.status !== "done");
      const step = task.steps[index];
      if (!step) {
        this.ledger.complete(taskId);
        return;
      }

      const input = stepInput(task, index);
      if (step.mode === "delegated") {
        await this.delegateStep(taskId, step.name, input);
        return;
      }
      const succeeded = await this.runLocalStep(task, step.name, input);
      if (!succeeded) return;
    }
  }

  private async runLocalStep(task: Task, name: StepName, input: unknown): Promise<boolean> {
    const binding = this.registry.lookup(name, "local");
    if (binding.mode !== "local") {
      throw new RelayError("INTERNAL", `Step '${name}' resolved to a non-local handler`);
    }

    this.ledger.startStep(task.id, name, input);
    const controller = new AbortController();
    this.inflight.set(task.id, controller);

    let result: CapabilityResult;
    try {
      result = await binding.provider.invoke(name, {
        taskId: task.id,
        input,
        task: task.input,
        abortSignal: controller.signal
      });
    } catch (err) {
      result = providerFailure(err);
    } finally {
      this.inflight.delete(task.id);
    }

    // cancel() owns the task from here
    if (controller.signal.aborted) return false;

    if (result.kind === "failure") {
      this.ledger.applyStepOutcome(task.id, name, {
        kind: "failure",
        code: "HANDLER_FAILURE",
        reason: result.reason,
        details: result.details
      });
      return false;
    }

    let artifacts: Record<string, string>;
    try {
      artifacts = await this.publishAll(result.artifacts ?? []);
    } catch (err) {
      const publishErr = toRelayError(err);
      this.ledger.applyStepOutcome(task.id, name, {
        kind: "failure",
        code: "HANDLER_FAILURE",
        reason: `Publishing artifacts of ${name} failed: ${publishErr.message}`,
        details: publishErr.toJSON()
      });
      return false;
    }

    const applied = this.ledger.applyStepOutcome(task.id, name, { kind: "success", output: result.output, artifacts });
    return applied.applied;
  }

  private async publishAll(payloads: readonly ArtifactPayload[]): Promise<Record<string, string>> {
    const locators: Record<string, string> = {};
    for (const payload of payloads) {
      locators[payload.name] = await this.publisher.publish(payload.bytes, payload.contentType);
    }
    return locators;
  }

  private async delegateStep(taskId: string, name: StepName, input: unknown): Promise<void> {
    const binding = this.registry.lookup(name, "delegated");
    if (binding.mode !== "delegated") {
      throw new RelayError("INTERNAL", `Step '${name}' resolved to a non-delegated handler`);
    }

    this.ledger.startStep(taskId, name, input);
    try {
      const ref = await this.channel.delegate(taskId, name, input, binding.counterparty);
      this.ledger.markDelegated(taskId, name, ref);
    } catch (err) {
      const relayErr = toRelayError(err);
      this.ledger.applyStepOutcome(taskId, name, {
        kind: "failure",
        code: relayErr.code,
        reason: relayErr.message,
        details: relayErr.details
      });
    }
  }

  private handleSubtaskResult(event: SubtaskResultEvent): Promise<void> {
    return this.serializer.run(event.taskId, async () => {
      const outcome = toStepOutcome(event.stepName, event.outcome);
      const result = this.ledger.applyStepOutcome(event.taskId, event.stepName, outcome);
      if (!result.applied) {
        this.log.debug({ taskId: event.taskId, reason: result.reason }, "Subtask result had no effect");
        return;
      }
      if (outcome.kind === "success") {
        await this.drive(event.taskId);
      }
    });
  }

  private waitFor(taskId: string, until: (state: TaskStateName) => boolean): Promise<TaskStatus> {
    const status = this.ledger.status(taskId);
    if (until(status.state)) return Promise.resolve(status);
    return new Promise((resolve) => {
      const waiter: Waiter = { until, resolve };
      const list = this.waiters.get(taskId);
      if (list) {
        list.push(waiter);
      } else {
        this.waiters.set(taskId, [waiter]);
      }
    });
  }

  private onLedgerEvent(event: LedgerEvent, task: Task): void {
    const relayEvent = toRelayEvent(event, task);
    if (relayEvent) this.emit(relayEvent);

    if (event.type !== "state_changed") return;
    const list = this.waiters.get(task.id);
    if (!list) return;
    const ready = list.filter((w) => w.until(task.state));
    if (ready.length === 0) return;
    const remaining = list.filter((w) => !w.until(task.state));
    if (remaining.length > 0) {
      this.waiters.set(task.id, remaining);
    } else {
      this.waiters.delete(task.id);
    }
    const status = this.ledger.status(task.id);
    for (const waiter of ready) waiter.resolve(status);
  }

  /**
   * Fire-and-forget with microtask isolation. Handler errors are logged.
   */
  private emit(event: RelayEvent): void {
    const handler = this.onEvent;
    if (!handler) return;
    queueMicrotask(() => {
      try {
        const result = handler(event);
        if (result) {
          result.catch((err: unknown) => this.logHandlerError(event, err));
        }
      } catch (err) {
        this.logHandlerError(event, err);
      }
    });
  }

  private logHandlerError(event: RelayEvent, err: unknown): void {
    this.log.warn(
      {
        type: event.type,
        taskId: event.taskId,
        err: err instanceof Error ? err.message : String(err)
      },
      "Event handler failed"
    );
  }
}

/**
 * The first step gets the task input; later steps get the previous step's
 * text, falling back to the task input when that output carries none.
 */
export function stepInput(task: Task, index: number): unknown {
  const previous = index > 0 ? task.steps[index - 1] : undefined;
  const text = previous ? textOf(previous.output) : undefined;
  return text !== undefined ? { text } : task.input;
}

function toStepOutcome(stepName: StepName, outcome: SubtaskOutcome): StepOutcome {
  switch (outcome.kind) {
    case "success": {
      const result: StepOutcome = { kind: "success", output: outcome.output };
      if (outcome.artifacts) result.artifacts = outcome.artifacts;
      return result;
    }
    case "failure":
      return { kind: "failure", code: "HANDLER_FAILURE", reason: outcome.reason };
    case "timed_out":
      return { kind: "failure", code: "TIMED_OUT", reason: `Delegated step ${stepName} timed out` };
  }
}

function toRelayEvent(event: LedgerEvent, task: Task): RelayEvent | undefined {
  const base = { timestamp: isoNow(), taskId: task.id };
  const step = task.steps.find((s) => s.name === event.payload.step);

  switch (event.type) {
    case "steps_resolved":
      return { ...base, type: "task_started", steps: task.steps.map((s) => ({ name: s.name, mode: s.mode })) };
    case "step_started":
      return step ? { ...base, type: "step_started", step: step.name, mode: step.mode } : undefined;
    case "step_outcome":
      if (!step) return undefined;
      if (step.status === "failed") {
        return step.error
          ? { ...base, type: "step_completed", step: step.name, status: "failed", error: step.error }
          : { ...base, type: "step_completed", step: step.name, status: "failed" };
      }
      return { ...base, type: "step_completed", step: step.name, status: "done" };
    case "state_changed":
      return stateEvent(base, event, task);
    default:
      return undefined;
  }
}

function stateEvent(base: { timestamp: string; taskId: string }, event: LedgerEvent, task: Task): RelayEvent | undefined {
  switch (task.state) {
    case "awaiting_delegate": {
      const delegated = task.steps.find((s) => s.status === "delegated");
      if (!delegated?.delegateRef) return undefined;
      return {
        ...base,
        type: "task_suspended",
        step: delegated.name,
        remoteId: delegated.delegateRef.remoteId,
        counterparty: delegated.delegateRef.counterparty,
        deadline: delegated.delegateRef.deadline
      };
    }
    case "running":
      return event.payload.from === "awaiting_delegate" ? { ...base, type: "task_resumed" } : undefined;
    case "completed":
      return { ...base, type: "task_completed", artifacts: { ...task.artifacts } };
    case "failed":
      return {
        ...base,
        type: "task_failed",
        failure: task.failure ?? { code: "INTERNAL", reason: "Task failed" }
      };
    default:
      return undefined;
  }
}
