/**
 * OpenAI-compatible capability provider.
 *
 * - translate: chat completions
 * - text2speech: audio speech endpoint, returned as an `audio` artifact
 */

import type { StepName } from "../tasks/types.js";
import {
  ProviderError,
  providerFailure,
  textOf,
  type CapabilityProvider,
  type CapabilityResult,
  type ProviderErrorType,
  type StepInvocation
} from "./types.js";

type OpenAIChatResponse = {
  choices?: Array<{
    message?: { content?: string | null };
  }>;
  model?: string;
};

export type OpenAIProviderConfig = {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  ttsModel?: string;
  ttsVoice?: string;
  timeoutMs?: number;
  defaultSourceLang?: string;
  defaultTargetLang?: string;
};

export class OpenAICapabilityProvider implements CapabilityProvider {
  readonly name = "openai";

  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly ttsModel: string;
  private readonly ttsVoice: string;
  private readonly timeoutMs: number;
  private readonly defaultSourceLang: string;
  private readonly defaultTargetLang: string;

  constructor(config: OpenAIProviderConfig) {
    if (!config.apiKey) {
      throw new Error("OpenAI provider requires apiKey");
    }
    this.apiKey = config.apiKey;
    this.baseUrl = (config.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.model = config.model ?? "gpt-4";
    this.ttsModel = config.ttsModel ?? "tts-1";
    this.ttsVoice = config.ttsVoice ?? "alloy";
    this.timeoutMs = config.timeoutMs ?? 60_000;
    this.defaultSourceLang = config.defaultSourceLang ?? "Spanish";
    this.defaultTargetLang = config.defaultTargetLang ?? "English";
  }

  async invoke(stepName: StepName, invocation: StepInvocation): Promise<CapabilityResult> {
    const text = textOf(invocation.input);
    if (text === undefined) {
      return { kind: "failure", reason: `Step ${stepName} needs a text input` };
    }
    try {
      switch (stepName) {
        case "translate":
          return { kind: "ok", output: { text: await this.translate(text, invocation) } };
        case "text2speech": {
          const bytes = await this.speak(text, invocation.abortSignal);
          return {
            kind: "ok",
            output: { text, contentType: "audio/mpeg", bytes: bytes.byteLength },
            artifacts: [{ name: "audio", bytes, contentType: "audio/mpeg" }]
          };
        }
      }
    } catch (err) {
      return providerFailure(err);
    }
  }

  private async translate(text: string, invocation: StepInvocation): Promise<string> {
    const source = invocation.task.sourceLang ?? this.defaultSourceLang;
    const target = invocation.task.targetLang ?? this.defaultTargetLang;
    const response = await this.post(
      "/chat/completions",
      {
        model: this.model,
        messages: [
          { role: "system", content: `You are a translator that translates ${source} to ${target}.` },
          {
            role: "user",
            content: `Translate the following text: '${text}'. Do not generate any additional text beyond the translation.`
          }
        ]
      },
      invocation.abortSignal
    );
    const data = (await response.json()) as OpenAIChatResponse;
    const content = data.choices?.[0]?.message?.content;
    if (typeof content !== "string") {
      throw new ProviderError("provider_error", "Translation response had no content");
    }
    return content;
  }

  private async speak(text: string, abortSignal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.post(
      "/audio/speech",
      { model: this.ttsModel, voice: this.ttsVoice, input: text },
      abortSignal
    );
    return new Uint8Array(await response.arrayBuffer());
  }

  private async post(pathname: string, body: unknown, abortSignal?: AbortSignal): Promise<Response> {
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    abortSignal?.addEventListener("abort", onAbort);
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}${pathname}`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`
        },
        body: JSON.stringify(body),
        signal: controller.signal
      });
      if (!response.ok) {
        throw await this.handleErrorResponse(response);
      }
      return response;
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      if (err instanceof Error && err.name === "AbortError") {
        throw new ProviderError("timeout", `Request timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw new ProviderError("unknown", err instanceof Error ? err.message : String(err), {
        ...(err instanceof Error && { cause: err })
      });
    } finally {
      clearTimeout(timeoutId);
      abortSignal?.removeEventListener("abort", onAbort);
    }
  }

  private async handleErrorResponse(response: Response): Promise<ProviderError> {
    const status = response.status;
    let message = `HTTP ${status}`;

    try {
      const errorData: unknown = await response.json();
      if (
        errorData &&
        typeof errorData === "object" &&
        "error" in errorData &&
        errorData.error &&
        typeof errorData.error === "object" &&
        "message" in errorData.error &&
        typeof errorData.error.message === "string"
      ) {
        message = errorData.error.message;
      }
    } catch {
      // Body was not JSON; keep the status line
    }

    let type: ProviderErrorType;
    switch (status) {
      case 401:
      case 403:
        type = "auth_error";
        break;
      case 429:
        type = "rate_limited";
        break;
      case 400:
        type = "invalid_request";
        break;
      default:
        type = status >= 500 ? "provider_error" : "unknown";
    }
    return new ProviderError(type, message, { statusCode: status });
  }
}
