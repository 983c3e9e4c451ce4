import { RelayError } from "../errors.js";
import type { StepStatus, TaskStateName } from "./types.js";

const TASK_TRANSITIONS: Record<TaskStateName, readonly TaskStateName[]> = {
  pending: ["running", "failed"],
  running: ["running", "awaiting_delegate", "completed", "failed"],
  awaiting_delegate: ["running", "failed"],
  completed: [],
  failed: []
};

const STEP_TRANSITIONS: Record<StepStatus, readonly StepStatus[]> = {
  not_started: ["in_progress", "failed"],
  // in_progress -> in_progress: an interrupted step re-executed after recovery
  in_progress: ["in_progress", "delegated", "done", "failed"],
  delegated: ["done", "failed"],
  done: [],
  failed: []
};

export function canTransition(from: TaskStateName, to: TaskStateName): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function assertTaskTransition(taskId: string, from: TaskStateName, to: TaskStateName): void {
  if (!canTransition(from, to)) {
    throw new RelayError("INVALID_TRANSITION", `Task ${taskId} cannot move from ${from} to ${to}`, {
      taskId,
      from,
      to
    });
  }
}

export function assertStepTransition(
  taskId: string,
  stepName: string,
  from: StepStatus,
  to: StepStatus
): void {
  if (!STEP_TRANSITIONS[from].includes(to)) {
    throw new RelayError(
      "INVALID_TRANSITION",
      `Step ${stepName} of task ${taskId} cannot move from ${from} to ${to}`,
      { taskId, stepName, from, to }
    );
  }
}
