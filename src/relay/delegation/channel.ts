/**
 * Delegation Channel - turns "run this step remotely" into a subtask handoff
 * and turns the counterparty's result back into a step outcome event.
 *
 * The channel owns the correlation entries. It never touches task state; the
 * listener (the orchestrator) applies the outcomes it forwards.
 */

import { RelayError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../log.js";
import type { DelegateRef, StepName } from "../tasks/types.js";
import type {
  CorrelationEntry,
  CounterpartyClient,
  SubtaskOutcome,
  SubtaskResultListener
} from "./types.js";

export type DelegationChannelOptions = {
  counterparties: readonly CounterpartyClient[];
  /** Identity forwarded to counterparties with every subtask */
  callerIdentity: string;
  /** Time allowed for a subtask before it is failed with TIMED_OUT */
  timeoutMs?: number;
  /** Interval of the deadline sweep started by start() */
  sweepIntervalMs?: number;
  now?: () => number;
  logger?: Logger;
};

export const DEFAULT_DELEGATION_TIMEOUT_MS = 300_000;
export const DEFAULT_SWEEP_INTERVAL_MS = 1_000;

export class DelegationChannel {
  private readonly counterparties: ReadonlyMap<string, CounterpartyClient>;
  private readonly entries = new Map<string, CorrelationEntry>();
  private readonly callerIdentity: string;
  private readonly timeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private readonly log: Logger;
  private listener: SubtaskResultListener | undefined;
  private sweepTimer: ReturnType<typeof setInterval> | undefined;

  constructor(options: DelegationChannelOptions) {
    this.counterparties = new Map(options.counterparties.map((c) => [c.name, c]));
    this.callerIdentity = options.callerIdentity;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DELEGATION_TIMEOUT_MS;
    this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ component: "delegation" });
  }

  /**
   * Set the receiver of subtask outcomes. There is one receiver; setting a
   * new one replaces the previous.
   */
  onResult(listener: SubtaskResultListener): void {
    this.listener = listener;
  }

  hasCounterparty(name: string): boolean {
    return this.counterparties.has(name);
  }

  /**
   * Hand a step to a counterparty. Returns as soon as the counterparty has
   * acknowledged the subtask; the result arrives later via onSubtaskResult.
   *
   * @throws RelayError COUNTERPARTY_UNREACHABLE if the handoff fails.
   */
  async delegate(taskId: string, stepName: StepName, input: unknown, counterparty: string): Promise<DelegateRef> {
    const client = this.counterparties.get(counterparty);
    if (!client) {
      throw new RelayError("COUNTERPARTY_UNREACHABLE", `Unknown counterparty '${counterparty}'`, { counterparty });
    }

    let remoteId: string;
    try {
      remoteId = await client.createSubtask(stepName, input, this.callerIdentity);
    } catch (err) {
      throw new RelayError(
        "COUNTERPARTY_UNREACHABLE",
        `Could not create subtask on '${counterparty}': ${err instanceof Error ? err.message : String(err)}`,
        { counterparty, taskId, stepName }
      );
    }

    const createdAt = this.now();
    const entry: CorrelationEntry = {
      remoteId,
      taskId,
      stepName,
      counterparty,
      status: "pending",
      createdAt,
      deadline: createdAt + this.timeoutMs
    };
    this.entries.set(remoteId, entry);
    this.log.debug({ taskId, stepName, counterparty, remoteId }, "Subtask created");
    return { remoteId, counterparty, deadline: entry.deadline };
  }

  /**
   * Inbound result. Returns false, with no other effect, when the remote id
   * has no correlation entry (a duplicate, or a result after timeout or
   * cancellation).
   */
  onSubtaskResult(remoteId: string, outcome: SubtaskOutcome): boolean {
    const entry = this.entries.get(remoteId);
    if (!entry) {
      this.log.debug({ remoteId, kind: outcome.kind }, "Discarding result for unknown subtask");
      return false;
    }
    this.entries.delete(remoteId);
    this.forward(entry, outcome);
    return true;
  }

  /**
   * Deliver a synthetic timed_out outcome for every entry past its deadline.
   * Returns the number of entries that expired.
   */
  sweep(now: number = this.now()): number {
    const expired = Array.from(this.entries.values()).filter((e) => e.deadline <= now);
    for (const entry of expired) {
      this.log.warn(
        {
          taskId: entry.taskId,
          stepName: entry.stepName,
          remoteId: entry.remoteId
        },
        "Subtask deadline elapsed"
      );
      this.onSubtaskResult(entry.remoteId, { kind: "timed_out" });
    }
    return expired.length;
  }

  /**
   * Drop the correlation entry and ask the counterparty to stop. The
   * notification is best effort; a failure is logged.
   */
  abandon(remoteId: string): boolean {
    const entry = this.entries.get(remoteId);
    if (!entry) return false;
    this.entries.delete(remoteId);
    const client = this.counterparties.get(entry.counterparty);
    if (client) {
      client.abandonSubtask(remoteId).catch((err: unknown) => {
        this.log.warn(
          {
            remoteId,
            counterparty: entry.counterparty,
            err: err instanceof Error ? err.message : String(err)
          },
          "Counterparty did not acknowledge abandon"
        );
      });
    }
    return true;
  }

  /**
   * Re-register an entry recovered from the ledger after a restart.
   */
  restore(taskId: string, stepName: StepName, ref: DelegateRef): void {
    this.entries.set(ref.remoteId, {
      remoteId: ref.remoteId,
      taskId,
      stepName,
      counterparty: ref.counterparty,
      status: "pending",
      createdAt: this.now(),
      deadline: ref.deadline
    });
  }

  pending(): CorrelationEntry[] {
    return Array.from(this.entries.values()).map((e) => ({ ...e }));
  }

  start(): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private forward(entry: CorrelationEntry, outcome: SubtaskOutcome): void {
    const listener = this.listener;
    if (!listener) {
      this.log.warn({ remoteId: entry.remoteId, taskId: entry.taskId }, "Subtask result with no listener");
      return;
    }
    const event = { remoteId: entry.remoteId, taskId: entry.taskId, stepName: entry.stepName, outcome };
    try {
      const result = listener(event);
      if (result) {
        result.catch((err: unknown) => this.logListenerError(entry, err));
      }
    } catch (err) {
      this.logListenerError(entry, err);
    }
  }

  private logListenerError(entry: CorrelationEntry, err: unknown): void {
    this.log.error(
      {
        taskId: entry.taskId,
        remoteId: entry.remoteId,
        err: err instanceof Error ? err.message : String(err)
      },
      "Subtask result listener failed"
    );
  }
}
