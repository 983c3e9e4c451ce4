/**
 * Task ledger types.
 * A task owns an ordered, append-only list of step records and a map of
 * published artifacts.
 */

import type { RelayErrorCode } from "../errors.js";

/**
 * Names of the steps the pipeline knows about, in pipeline order.
 */
export const STEP_NAMES = ["translate", "text2speech"] as const;

export type StepName = (typeof STEP_NAMES)[number];

/**
 * Declared intent flags accepted at submission.
 */
export const INTENT_FLAGS = ["translate", "text2speech-local", "text2speech-delegated"] as const;

export type IntentFlag = (typeof INTENT_FLAGS)[number];

export type ExecutionMode = "local" | "delegated";

export type TaskStateName = "pending" | "running" | "awaiting_delegate" | "completed" | "failed";

export type StepStatus = "not_started" | "in_progress" | "delegated" | "done" | "failed";

/**
 * Original request payload.
 */
export type TaskInput = {
  text: string;
  sourceLang?: string;
  targetLang?: string;
};

/**
 * Identifies a delegated subtask on the counterparty side.
 */
export type DelegateRef = {
  remoteId: string;
  counterparty: string;
  /** Epoch ms after which the delegation times out */
  deadline: number;
};

export type StepFailure = {
  code: RelayErrorCode;
  reason: string;
  details?: unknown;
};

export type StepRecord = {
  name: StepName;
  mode: ExecutionMode;
  status: StepStatus;
  input?: unknown;
  output?: unknown;
  delegateRef?: DelegateRef;
  error?: StepFailure;
  startedAt?: string;
  finishedAt?: string;
};

export type TaskFailure = StepFailure & {
  step?: StepName;
};

/**
 * Caller of a task this agent runs as a subtask for another agent.
 */
export type SubtaskOrigin = {
  caller: string;
  /** Where the outcome is posted; absent when the caller lives in this process */
  callbackUrl?: string;
  /** Set once the outcome was handed over or the caller abandoned the subtask */
  closedAt?: string;
};

export type Task = {
  id: string;
  createdAt: string;
  updatedAt: string;
  state: TaskStateName;
  input: TaskInput;
  intent: IntentFlag[];
  steps: StepRecord[];
  artifacts: Record<string, string>;
  failure?: TaskFailure;
  origin?: SubtaskOrigin;
};

/**
 * A step chosen by resolution, before it becomes a record.
 */
export type ResolvedStep = {
  name: StepName;
  mode: ExecutionMode;
};

/**
 * Outcome applied to a step, either from a local handler or a delegate.
 */
export type StepOutcome =
  | { kind: "success"; output: unknown; artifacts?: Record<string, string> }
  | { kind: "failure"; code: RelayErrorCode; reason: string; details?: unknown };

/**
 * Result of applyStepOutcome.
 */
export type ApplyOutcomeResult =
  | { applied: true }
  | { applied: false; reason: "idempotent" | "terminal" | "not_pending" };

/**
 * Public projection returned by status queries.
 */
export type TaskStatus = {
  id: string;
  state: TaskStateName;
  steps: StepRecord[];
  artifacts: Record<string, string>;
  failure?: TaskFailure;
  updatedAt: string;
};

export const LEDGER_EVENT_TYPES = [
  "task_created",
  "state_changed",
  "steps_resolved",
  "step_started",
  "step_delegated",
  "step_outcome",
  "artifact_appended",
  "artifact_conflict",
  "subtask_closed"
] as const;

export type LedgerEventType = (typeof LEDGER_EVENT_TYPES)[number];

/**
 * Audit trail entry. Every ledger mutation produces exactly one.
 */
export type LedgerEvent = {
  seq: number;
  taskId: string;
  time: string;
  type: LedgerEventType;
  payload: Record<string, unknown>;
};

export function isTerminal(state: TaskStateName): boolean {
  return state === "completed" || state === "failed";
}

export function isStepName(value: string): value is StepName {
  return STEP_NAMES.some((name) => name === value);
}
