/**
 * Counterparty side of delegation: runs a subtask requested by another
 * agent as a local task whose only step is the one asked for, then reports
 * the outcome back.
 *
 * The caller and its callback URL are stored with the task, so reporting
 * survives a restart: `recover` re-attaches every subtask whose outcome was
 * never handed over.
 */

import { z } from "zod";
import { RelayError, toRelayError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../log.js";
import type { SubtaskOutcome, SubtaskReporter } from "../delegation/types.js";
import { isTerminal, type StepName, type SubtaskOrigin, type TaskInput, type TaskStatus } from "../tasks/types.js";
import type { Orchestrator } from "./orchestrator.js";

export type { SubtaskReporter };

export const SubtaskInputSchema = z.object({
  text: z.string(),
  sourceLang: z.string().optional(),
  targetLang: z.string().optional()
});

/** Who asked for a subtask, as given when it is accepted */
export type SubtaskCaller = Omit<SubtaskOrigin, "closedAt">;

/** Picks the reporter for a stored origin; undefined when it cannot be reached */
export type ReporterResolver = (origin: SubtaskOrigin) => SubtaskReporter | undefined;

export class SubtaskHost {
  private readonly orchestrator: Orchestrator;
  private readonly log: Logger;
  private readonly watching = new Set<string>();

  constructor(orchestrator: Orchestrator, logger?: Logger) {
    this.orchestrator = orchestrator;
    this.log = (logger ?? rootLogger).child({ component: "subtasks" });
  }

  /**
   * Start a subtask and return its id, which the caller uses as remoteId.
   * `report` is called once the subtask is terminal, unless it was abandoned.
   *
   * @throws RelayError UNKNOWN_STEP when this agent cannot run the step locally,
   * BAD_REQUEST when the input carries no text.
   */
  accept(stepName: StepName, input: unknown, caller: SubtaskCaller, report: SubtaskReporter): string {
    const flag = this.orchestrator.registry.flagFor(stepName, "local");
    if (!flag) {
      throw new RelayError("UNKNOWN_STEP", `This agent cannot run '${stepName}' locally`, { step: stepName });
    }
    const parsed = SubtaskInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new RelayError("BAD_REQUEST", "Subtask input must carry a text field", { issues: parsed.error.issues });
    }

    const taskInput: TaskInput = { text: parsed.data.text };
    if (parsed.data.sourceLang !== undefined) taskInput.sourceLang = parsed.data.sourceLang;
    if (parsed.data.targetLang !== undefined) taskInput.targetLang = parsed.data.targetLang;

    const taskId = this.orchestrator.submit(taskInput, [flag], caller);
    this.watch(taskId, report);
    return taskId;
  }

  /**
   * Re-attach reporting to hosted subtasks whose outcome was never handed
   * over. Returns how many were re-attached.
   */
  recover(reporterFor: ReporterResolver): number {
    let attached = 0;
    for (const task of this.orchestrator.ledger.list()) {
      if (!task.origin || task.origin.closedAt !== undefined || this.watching.has(task.id)) continue;
      const report = reporterFor(task.origin);
      if (!report) {
        this.log.warn({ taskId: task.id, caller: task.origin.caller }, "No reporter for hosted subtask");
        continue;
      }
      this.watch(task.id, report);
      attached++;
    }
    if (attached > 0) {
      this.log.info({ attached }, "Re-attached hosted subtasks");
    }
    return attached;
  }

  /**
   * Stop a subtask. Its outcome is never reported. Returns false for an
   * unknown or already finished subtask.
   */
  async abandon(remoteId: string): Promise<boolean> {
    const task = this.orchestrator.ledger.get(remoteId);
    if (!task || isTerminal(task.state)) return false;
    // Closed before cancelling: the cancel itself makes the subtask terminal
    this.orchestrator.ledger.closeOrigin(remoteId, "abandoned");
    return this.orchestrator.cancel(remoteId);
  }

  private watch(taskId: string, report: SubtaskReporter): void {
    this.watching.add(taskId);
    this.orchestrator
      .waitForTerminal(taskId)
      .then((status) => this.finish(taskId, status, report))
      .catch((err: unknown) => {
        this.watching.delete(taskId);
        this.log.error({ taskId, err: toRelayError(err).message }, "Subtask could not be reported");
      });
  }

  private async finish(taskId: string, status: TaskStatus, report: SubtaskReporter): Promise<void> {
    this.watching.delete(taskId);
    if (this.orchestrator.ledger.get(taskId)?.origin?.closedAt !== undefined) {
      this.log.debug({ taskId }, "Subtask abandoned, not reporting");
      return;
    }
    await report(taskId, outcomeOf(status));
    this.orchestrator.ledger.closeOrigin(taskId, "reported");
  }
}

/**
 * Subtask outcome for a terminal task: the last step's output plus the
 * task's artifacts, or the failure reason.
 */
export function outcomeOf(status: TaskStatus): SubtaskOutcome {
  if (status.state === "completed") {
    const last = status.steps[status.steps.length - 1];
    return { kind: "success", output: last?.output ?? null, artifacts: { ...status.artifacts } };
  }
  return { kind: "failure", reason: status.failure?.reason ?? `Subtask ended in state ${status.state}` };
}
