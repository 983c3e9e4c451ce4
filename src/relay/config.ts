/**
 * Runtime configuration, read from the environment and validated with Zod.
 */

import { z } from "zod";
import { RelayError } from "./errors.js";
import type { LogLevel } from "./log.js";
import { DEFAULT_PINATA_GATEWAY } from "./artifacts/pinata.js";
import { DEFAULT_DELEGATION_TIMEOUT_MS, DEFAULT_SWEEP_INTERVAL_MS } from "./delegation/channel.js";
import { IN_MEMORY } from "./tasks/ledgerStore.js";

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === "" ? undefined : value.trim()));

const EnvSchema = z.object({
  STEPRELAY_PORT: intFromEnv(8765),
  STEPRELAY_AGENT_ID: z.string().min(1).default("steprelay"),
  STEPRELAY_PUBLIC_URL: optionalString.pipe(z.string().url().optional()),
  STEPRELAY_LEDGER_PATH: z.string().min(1).default(IN_MEMORY),
  STEPRELAY_DELEGATION_TIMEOUT_MS: intFromEnv(DEFAULT_DELEGATION_TIMEOUT_MS),
  STEPRELAY_SWEEP_INTERVAL_MS: intFromEnv(DEFAULT_SWEEP_INTERVAL_MS),
  STEPRELAY_MAX_CONCURRENT: intFromEnv(5),
  STEPRELAY_QUEUE_TIMEOUT_MS: z.coerce.number().int().nonnegative().default(30_000),
  STEPRELAY_MAX_TASKS: intFromEnv(1000),
  STEPRELAY_COUNTERPARTY_URL: optionalString.pipe(z.string().url().optional()),
  STEPRELAY_CALLBACK_HOSTS: optionalString,
  STEPRELAY_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
  OPENAI_MODEL: z.string().min(1).default("gpt-4"),
  OPENAI_TTS_MODEL: z.string().min(1).default("tts-1"),
  OPENAI_TTS_VOICE: z.string().min(1).default("alloy"),
  PINATA_JWT: optionalString,
  PINATA_GATEWAY_URL: z.string().min(1).default(DEFAULT_PINATA_GATEWAY)
});

export type RelayConfig = {
  port: number;
  agentId: string;
  /** Base URL other agents use to reach this one; callbacks are built from it */
  publicUrl: string;
  ledgerPath: string;
  delegationTimeoutMs: number;
  sweepIntervalMs: number;
  maxConcurrent: number;
  queueTimeoutMs: number;
  maxTasks: number;
  /** Remote agent that runs delegated steps; unset means self-delegation */
  counterpartyUrl?: string;
  /**
   * Hosts (`name` or `name:port`) that inbound subtasks may name in their
   * callbackUrl. Unset accepts any host.
   */
  callbackHosts?: string[];
  logLevel: LogLevel;
  openai?: {
    apiKey: string;
    baseUrl?: string;
    model: string;
    ttsModel: string;
    ttsVoice: string;
  };
  pinata?: {
    jwt: string;
    gatewayUrl: string;
  };
};

/**
 * Parse configuration from an environment map.
 * @throws RelayError BAD_REQUEST with the Zod issues when a value is invalid.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new RelayError("BAD_REQUEST", "Invalid configuration", { issues: parsed.error.issues });
  }
  const e = parsed.data;

  const config: RelayConfig = {
    port: e.STEPRELAY_PORT,
    agentId: e.STEPRELAY_AGENT_ID,
    publicUrl: e.STEPRELAY_PUBLIC_URL ?? `http://localhost:${e.STEPRELAY_PORT}`,
    ledgerPath: e.STEPRELAY_LEDGER_PATH,
    delegationTimeoutMs: e.STEPRELAY_DELEGATION_TIMEOUT_MS,
    sweepIntervalMs: e.STEPRELAY_SWEEP_INTERVAL_MS,
    maxConcurrent: e.STEPRELAY_MAX_CONCURRENT,
    queueTimeoutMs: e.STEPRELAY_QUEUE_TIMEOUT_MS,
    maxTasks: e.STEPRELAY_MAX_TASKS,
    logLevel: e.STEPRELAY_LOG_LEVEL
  };
  if (e.STEPRELAY_COUNTERPARTY_URL) {
    config.counterpartyUrl = e.STEPRELAY_COUNTERPARTY_URL;
  }
  if (e.STEPRELAY_CALLBACK_HOSTS) {
    config.callbackHosts = e.STEPRELAY_CALLBACK_HOSTS.split(",")
      .map((host) => host.trim().toLowerCase())
      .filter((host) => host.length > 0);
  }
  if (e.OPENAI_API_KEY) {
    config.openai = {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      ttsModel: e.OPENAI_TTS_MODEL,
      ttsVoice: e.OPENAI_TTS_VOICE
    };
    if (e.OPENAI_BASE_URL) config.openai.baseUrl = e.OPENAI_BASE_URL;
  }
  if (e.PINATA_JWT) {
    config.pinata = { jwt: e.PINATA_JWT, gatewayUrl: e.PINATA_GATEWAY_URL };
  }
  return config;
}
