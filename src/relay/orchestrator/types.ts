/**
 * Orchestrator lifecycle events.
 * Every event is derived from a ledger mutation, so each one corresponds to a
 * recorded state change.
 */

import type {
  ExecutionMode,
  ResolvedStep,
  StepFailure,
  StepName,
  TaskFailure,
  TaskStateName
} from "../tasks/types.js";

type BaseEvent = {
  timestamp: string;
  taskId: string;
};

/**
 * Emitted once the plan is resolved and recorded.
 */
export type TaskStartedEvent = BaseEvent & {
  type: "task_started";
  steps: ResolvedStep[];
};

export type StepStartedEvent = BaseEvent & {
  type: "step_started";
  step: StepName;
  mode: ExecutionMode;
};

export type StepCompletedEvent = BaseEvent & {
  type: "step_completed";
  step: StepName;
  status: "done" | "failed";
  error?: StepFailure;
};

/**
 * Emitted when the task parks on a delegated step.
 */
export type TaskSuspendedEvent = BaseEvent & {
  type: "task_suspended";
  step: StepName;
  remoteId: string;
  counterparty: string;
  deadline: number;
};

export type TaskResumedEvent = BaseEvent & {
  type: "task_resumed";
};

export type TaskCompletedEvent = BaseEvent & {
  type: "task_completed";
  artifacts: Record<string, string>;
};

export type TaskFailedEvent = BaseEvent & {
  type: "task_failed";
  failure: TaskFailure;
};

export type RelayEvent =
  | TaskStartedEvent
  | StepStartedEvent
  | StepCompletedEvent
  | TaskSuspendedEvent
  | TaskResumedEvent
  | TaskCompletedEvent
  | TaskFailedEvent;

export type RelayEventType = RelayEvent["type"];

/**
 * Observer for lifecycle events. Called on a microtask; a throwing or
 * rejecting handler is logged and otherwise ignored.
 */
export type RelayEventHandler = (event: RelayEvent) => void | Promise<void>;

/**
 * A task counts as settled when nothing more will happen to it without an
 * outside event: it is terminal, or parked on a delegate.
 */
export function isSettled(state: TaskStateName): boolean {
  return state === "completed" || state === "failed" || state === "awaiting_delegate";
}
