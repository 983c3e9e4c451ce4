/**
 * Delegation protocol types.
 */

import type { StepName } from "../tasks/types.js";

/**
 * Result reported for a subtask. `timed_out` is never sent by a counterparty;
 * the channel synthesizes it when a deadline passes.
 */
export type SubtaskOutcome =
  | { kind: "success"; output: unknown; artifacts?: Record<string, string> }
  | { kind: "failure"; reason: string }
  | { kind: "timed_out" };

/**
 * Hands a hosted subtask's outcome back to the agent that asked for it.
 * A rejection means the caller did not get the outcome.
 */
export type SubtaskReporter = (remoteId: string, outcome: SubtaskOutcome) => void | Promise<void>;

/**
 * Outbound side of the counterparty protocol.
 */
export interface CounterpartyClient {
  readonly name: string;

  /**
   * Ask the counterparty to run a step. Resolves with the counterparty's
   * identifier for the subtask once the handoff is acknowledged.
   */
  createSubtask(stepName: StepName, input: unknown, callerIdentity: string): Promise<string>;

  /**
   * Ask the counterparty to stop working on a subtask.
   */
  abandonSubtask(remoteId: string): Promise<void>;
}

/**
 * Correlation entry for one in-flight subtask.
 */
export type CorrelationEntry = {
  remoteId: string;
  taskId: string;
  stepName: StepName;
  counterparty: string;
  status: "pending";
  createdAt: number;
  deadline: number;
};

export type SubtaskResultEvent = {
  remoteId: string;
  taskId: string;
  stepName: StepName;
  outcome: SubtaskOutcome;
};

export type SubtaskResultListener = (event: SubtaskResultEvent) => void | Promise<void>;
