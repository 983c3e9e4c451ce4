import { StubCapabilityProvider, type CapabilityProvider, type CapabilityResult, type StepInvocation } from "../src/relay/capabilities/types.js";
import type { CounterpartyClient } from "../src/relay/delegation/types.js";
import { createLogger } from "../src/relay/log.js";
import type { StepName } from "../src/relay/tasks/types.js";

export const quiet = createLogger("silent");

type StepScript = (invocation: StepInvocation) => Promise<CapabilityResult>;

/**
 * Provider that falls back to the stub for steps without a script.
 */
export class ScriptedProvider implements CapabilityProvider {
  readonly name = "scripted";
  readonly calls: Array<{ step: StepName; input: unknown }> = [];
  private readonly stub = new StubCapabilityProvider();

  constructor(private readonly script: Partial<Record<StepName, StepScript>> = {}) {}

  invoke(stepName: StepName, invocation: StepInvocation): Promise<CapabilityResult> {
    this.calls.push({ step: stepName, input: invocation.input });
    const handler = this.script[stepName];
    return handler ? handler(invocation) : this.stub.invoke(stepName, invocation);
  }
}

/** Never settles until the invocation is aborted. */
export function untilAborted(invocation: StepInvocation): Promise<CapabilityResult> {
  return new Promise((resolve) => {
    invocation.abortSignal?.addEventListener("abort", () => resolve({ kind: "failure", reason: "aborted" }));
  });
}

export class FakeCounterparty implements CounterpartyClient {
  readonly created: Array<{ stepName: StepName; input: unknown; caller: string }> = [];
  readonly abandoned: string[] = [];
  failNext = false;
  private counter = 0;

  constructor(readonly name: string = "speech-agent") {}

  async createSubtask(stepName: StepName, input: unknown, callerIdentity: string): Promise<string> {
    if (this.failNext) {
      this.failNext = false;
      throw new Error("connection refused");
    }
    this.created.push({ stepName, input, caller: callerIdentity });
    this.counter++;
    return `remote-${this.counter}`;
  }

  async abandonSubtask(remoteId: string): Promise<void> {
    this.abandoned.push(remoteId);
  }
}

/** Let queued microtasks and one macrotask run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
