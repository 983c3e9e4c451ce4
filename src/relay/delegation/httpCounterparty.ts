import { z } from "zod";
import type { StepName } from "../tasks/types.js";
import type { CounterpartyClient } from "./types.js";

const CreateSubtaskResponseSchema = z.object({
  remoteId: z.string().min(1)
});

export type HttpCounterpartyConfig = {
  name: string;
  /** Base URL of the counterparty agent, e.g. http://tts-agent:8765 */
  baseUrl: string;
  /** Where the counterparty should POST the result (our /a2a/subtasks/result) */
  callbackUrl: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
};

/**
 * Counterparty reached over the steprelay HTTP protocol:
 * - POST {baseUrl}/a2a/subtasks         -> { remoteId }
 * - POST {baseUrl}/a2a/subtasks/abandon
 * Results come back on the callback URL.
 */
export class HttpCounterpartyClient implements CounterpartyClient {
  readonly name: string;
  private readonly baseUrl: string;
  private readonly callbackUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(config: HttpCounterpartyConfig) {
    this.name = config.name;
    this.baseUrl = config.baseUrl.replace(/\/+$/, "");
    this.callbackUrl = config.callbackUrl;
    this.timeoutMs = config.timeoutMs ?? 10_000;
    this.headers = config.headers ?? {};
  }

  async createSubtask(stepName: StepName, input: unknown, callerIdentity: string): Promise<string> {
    const response = await this.post("/a2a/subtasks", {
      stepName,
      input,
      caller: callerIdentity,
      callbackUrl: this.callbackUrl
    });
    if (response.status !== 201 && response.status !== 200) {
      throw new Error(`Counterparty responded with HTTP ${response.status}: ${await response.text()}`);
    }
    const body: unknown = await response.json();
    return CreateSubtaskResponseSchema.parse(body).remoteId;
  }

  async abandonSubtask(remoteId: string): Promise<void> {
    const response = await this.post("/a2a/subtasks/abandon", { remoteId });
    if (!response.ok) {
      throw new Error(`Counterparty responded with HTTP ${response.status}`);
    }
  }

  private post(pathname: string, body: unknown): Promise<Response> {
    return fetch(`${this.baseUrl}${pathname}`, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...this.headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(this.timeoutMs)
    });
  }
}
