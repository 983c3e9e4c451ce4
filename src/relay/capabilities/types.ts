/**
 * Capability Provider types.
 *
 * A provider performs the content transformation behind a local step
 * (text -> text, text -> audio). It reports failures as values; the
 * orchestrator turns them into HANDLER_FAILURE.
 */

import type { StepName, TaskInput } from "../tasks/types.js";

/**
 * Error types from providers, normalized for logging and failure details.
 */
export type ProviderErrorType =
  | "rate_limited"
  | "timeout"
  | "auth_error"
  | "invalid_request"
  | "provider_error"
  | "unsupported_step"
  | "unknown";

export class ProviderError extends Error {
  readonly type: ProviderErrorType;
  readonly retryable: boolean;
  readonly statusCode?: number;

  constructor(type: ProviderErrorType, message: string, options?: { statusCode?: number; cause?: Error }) {
    super(message, { cause: options?.cause });
    this.name = "ProviderError";
    this.type = type;
    this.retryable = type === "rate_limited" || type === "timeout" || type === "provider_error";
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      type: this.type,
      message: this.message,
      retryable: this.retryable,
      ...(this.statusCode !== undefined && { statusCode: this.statusCode })
    };
  }
}

/**
 * Bytes a step produced that should be published as a named artifact.
 */
export type ArtifactPayload = {
  name: string;
  bytes: Uint8Array;
  contentType: string;
};

export type StepInvocation = {
  taskId: string;
  /** Input of this step: the task input for the first step, else the previous step's text */
  input: unknown;
  /** Original task input, for parameters such as languages */
  task: TaskInput;
  abortSignal?: AbortSignal;
};

export type CapabilityResult =
  | { kind: "ok"; output: unknown; artifacts?: ArtifactPayload[] }
  | { kind: "failure"; reason: string; details?: unknown };

export interface CapabilityProvider {
  readonly name: string;

  invoke(stepName: StepName, invocation: StepInvocation): Promise<CapabilityResult>;
}

/**
 * Pull the `text` field out of a step payload, if it has one.
 */
export function textOf(payload: unknown): string | undefined {
  if (typeof payload === "string") return payload;
  if (payload && typeof payload === "object" && "text" in payload && typeof payload.text === "string") {
    return payload.text;
  }
  return undefined;
}

export function providerFailure(err: unknown): CapabilityResult {
  if (err instanceof ProviderError) {
    return { kind: "failure", reason: err.message, details: err.toJSON() };
  }
  return { kind: "failure", reason: err instanceof Error ? err.message : String(err) };
}

/**
 * Provider used when no model keys are configured. Translation echoes the
 * text with a language tag; speech returns the UTF-8 text as the "audio".
 */
export class StubCapabilityProvider implements CapabilityProvider {
  readonly name = "stub";

  invoke(stepName: StepName, invocation: StepInvocation): Promise<CapabilityResult> {
    const text = textOf(invocation.input) ?? "";
    switch (stepName) {
      case "translate": {
        const target = invocation.task.targetLang ?? "English";
        return Promise.resolve({ kind: "ok", output: { text: `[${target}] ${text}` } });
      }
      case "text2speech":
        return Promise.resolve({
          kind: "ok",
          output: { text, contentType: "text/plain" },
          artifacts: [{ name: "audio", bytes: new TextEncoder().encode(text), contentType: "text/plain" }]
        });
    }
  }
}
