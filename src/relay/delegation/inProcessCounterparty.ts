import { logger as rootLogger, type Logger } from "../log.js";
import type { SubtaskHost } from "../orchestrator/subtaskHost.js";
import type { StepName } from "../tasks/types.js";
import type { CounterpartyClient, SubtaskOutcome, SubtaskReporter } from "./types.js";

/**
 * Where an in-process counterparty delivers results; normally the caller's
 * DelegationChannel.
 */
export interface SubtaskResultReceiver {
  onSubtaskResult(remoteId: string, outcome: SubtaskOutcome): boolean;
}

/**
 * Counterparty living in the same process, backed by a SubtaskHost.
 * Results are delivered on a later macrotask, so the caller always has the
 * correlation entry registered before the result shows up.
 *
 * The host and receiver are bound after construction because the caller's
 * channel needs the counterparty before either of them exists.
 */
export class InProcessCounterparty implements CounterpartyClient {
  readonly name: string;
  private readonly log: Logger;
  private host: SubtaskHost | undefined;
  private receiver: SubtaskResultReceiver | undefined;

  constructor(name: string, logger?: Logger) {
    this.name = name;
    this.log = (logger ?? rootLogger).child({ component: "in-process-counterparty", counterparty: name });
  }

  bind(host: SubtaskHost, receiver: SubtaskResultReceiver): void {
    this.host = host;
    this.receiver = receiver;
  }

  createSubtask(stepName: StepName, input: unknown, callerIdentity: string): Promise<string> {
    const host = this.host;
    if (!host) {
      return Promise.reject(new Error(`Counterparty '${this.name}' is not bound to a host`));
    }
    try {
      return Promise.resolve(host.accept(stepName, input, { caller: callerIdentity }, this.reporter()));
    } catch (err) {
      return Promise.reject(err);
    }
  }

  async abandonSubtask(remoteId: string): Promise<void> {
    await this.host?.abandon(remoteId);
  }

  /**
   * Reporter handing outcomes to the bound receiver. Also used to re-attach
   * subtasks recovered after a restart.
   */
  reporter(): SubtaskReporter {
    return (remoteId, outcome) => {
      setImmediate(() => {
        const receiver = this.receiver;
        if (!receiver) {
          this.log.warn({ remoteId, kind: outcome.kind }, "Subtask result with no receiver");
          return;
        }
        receiver.onSubtaskResult(remoteId, outcome);
      });
    };
  }
}
