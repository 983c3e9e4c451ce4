/**
 * Steprelay Orchestrator module.
 *
 * Exports:
 * - Orchestrator: drives tasks through local and delegated steps
 * - SubtaskHost: runs subtasks requested by other agents
 * - Event types
 */

export { Orchestrator, stepInput } from "./orchestrator.js";
export type { OrchestratorOptions, RecoveryReport } from "./orchestrator.js";

export { SubtaskHost, SubtaskInputSchema, outcomeOf } from "./subtaskHost.js";
export type { SubtaskReporter } from "./subtaskHost.js";

export { isSettled } from "./types.js";
export type {
  RelayEvent,
  RelayEventType,
  RelayEventHandler,
  TaskStartedEvent,
  StepStartedEvent,
  StepCompletedEvent,
  TaskSuspendedEvent,
  TaskResumedEvent,
  TaskCompletedEvent,
  TaskFailedEvent
} from "./types.js";
