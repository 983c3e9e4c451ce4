/**
 * Runtime assembly: builds the registry, ledger, channel and orchestrator
 * from configuration and hands them to the HTTP, MCP and CLI surfaces.
 */

import { MemoryPublisher, type ArtifactPublisher } from "./artifacts/publisher.js";
import { PinataPublisher } from "./artifacts/pinata.js";
import { createCapabilityProvider, type CapabilityProvider } from "./capabilities/index.js";
import type { RelayConfig } from "./config.js";
import { callbackReporter } from "./delegation/callbackReporter.js";
import { DelegationChannel } from "./delegation/channel.js";
import { HttpCounterpartyClient } from "./delegation/httpCounterparty.js";
import { InProcessCounterparty } from "./delegation/inProcessCounterparty.js";
import type { CounterpartyClient } from "./delegation/types.js";
import { logger as rootLogger, type Logger } from "./log.js";
import { Orchestrator, type RecoveryReport } from "./orchestrator/orchestrator.js";
import { SubtaskHost, type ReporterResolver } from "./orchestrator/subtaskHost.js";
import type { RelayEventHandler } from "./orchestrator/types.js";
import { StepRegistry } from "./registry/stepRegistry.js";
import { TaskLedger } from "./tasks/ledger.js";
import { IN_MEMORY, SqliteLedgerStore } from "./tasks/ledgerStore.js";
import { ConcurrencyLimiter } from "./utils/concurrencyLimiter.js";

/** Name under which the delegated text2speech counterparty is registered */
export const SPEECH_COUNTERPARTY = "speech-agent";

export type RuntimeOverrides = {
  provider?: CapabilityProvider;
  publisher?: ArtifactPublisher;
  /** Replaces the counterparty derived from `counterpartyUrl` */
  counterparty?: CounterpartyClient;
  onEvent?: RelayEventHandler;
  logger?: Logger;
};

export type LedgerHealth =
  | { status: "memory" }
  | { status: "ok"; path: string }
  | { status: "degraded"; reason: string };

export type RuntimeRecovery = RecoveryReport & {
  /** Hosted subtasks whose reporting was re-attached */
  hosted: number;
};

export type RelayRuntime = {
  config: RelayConfig;
  logger: Logger;
  ledger: TaskLedger;
  store?: SqliteLedgerStore;
  registry: StepRegistry;
  channel: DelegationChannel;
  orchestrator: Orchestrator;
  subtasks: SubtaskHost;
  publisher: ArtifactPublisher;
  /** Ingress limiter shared by the HTTP and MCP task entry points */
  limiter: ConcurrencyLimiter;
  ledgerHealth(): LedgerHealth;
  /** Start the deadline sweep and recover persisted tasks and hosted subtasks */
  start(): RuntimeRecovery;
  close(): void;
};

export async function createRuntime(config: RelayConfig, overrides: RuntimeOverrides = {}): Promise<RelayRuntime> {
  const logger = overrides.logger ?? rootLogger;
  logger.level = config.logLevel;

  let store: SqliteLedgerStore | undefined;
  if (config.ledgerPath !== IN_MEMORY) {
    store = new SqliteLedgerStore(config.ledgerPath, logger);
    await store.init();
  }

  const ledger = new TaskLedger({ maxTasks: config.maxTasks, sink: store, logger });
  if (store && !store.isDegraded) {
    ledger.hydrate(store.load(), store.lastSeq());
  }

  const provider = overrides.provider ?? createCapabilityProvider(config);
  const publisher =
    overrides.publisher ??
    (config.pinata ? new PinataPublisher({ jwt: config.pinata.jwt, gatewayUrl: config.pinata.gatewayUrl }) : new MemoryPublisher());

  let selfCounterparty: InProcessCounterparty | undefined;
  let counterparty: CounterpartyClient;
  if (overrides.counterparty) {
    counterparty = overrides.counterparty;
  } else if (config.counterpartyUrl) {
    counterparty = new HttpCounterpartyClient({
      name: SPEECH_COUNTERPARTY,
      baseUrl: config.counterpartyUrl,
      callbackUrl: `${config.publicUrl.replace(/\/+$/, "")}/a2a/subtasks/result`
    });
  } else {
    selfCounterparty = new InProcessCounterparty(SPEECH_COUNTERPARTY, logger);
    counterparty = selfCounterparty;
  }

  const registry = new StepRegistry([
    { name: "translate", local: provider },
    { name: "text2speech", local: provider, delegated: { counterparty: counterparty.name } }
  ]);

  const channel = new DelegationChannel({
    counterparties: [counterparty],
    callerIdentity: config.agentId,
    timeoutMs: config.delegationTimeoutMs,
    sweepIntervalMs: config.sweepIntervalMs,
    logger
  });

  const orchestrator = new Orchestrator({
    ledger,
    registry,
    channel,
    publisher,
    logger,
    ...(overrides.onEvent && { onEvent: overrides.onEvent })
  });
  const subtasks = new SubtaskHost(orchestrator, logger);
  selfCounterparty?.bind(subtasks, channel);

  // Subtasks from this process report through the in-process counterparty, the rest to their callback URL
  const reporterFor: ReporterResolver = (origin) =>
    origin.callbackUrl !== undefined ? callbackReporter(origin.callbackUrl, { logger }) : selfCounterparty?.reporter();

  const limiter = new ConcurrencyLimiter({
    maxConcurrent: config.maxConcurrent,
    queueTimeoutMs: config.queueTimeoutMs
  });

  return {
    config,
    logger,
    ledger,
    ...(store && { store }),
    registry,
    channel,
    orchestrator,
    subtasks,
    publisher,
    limiter,
    ledgerHealth(): LedgerHealth {
      if (!store) return { status: "memory" };
      if (store.isDegraded) return { status: "degraded", reason: store.degradedReason ?? "unknown" };
      return { status: "ok", path: config.ledgerPath };
    },
    start(): RuntimeRecovery {
      channel.start();
      const report = orchestrator.recover();
      return { ...report, hosted: subtasks.recover(reporterFor) };
    },
    close(): void {
      channel.stop();
      store?.close();
    }
  };
}
