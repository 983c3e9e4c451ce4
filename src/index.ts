export { RelayError, toRelayError, httpStatusFor, RELAY_ERROR_CODES, type RelayErrorCode } from "./relay/errors.js";
export { createLogger, logger, type Logger, type LogLevel } from "./relay/log.js";
export { loadConfig, type RelayConfig } from "./relay/config.js";
export { createRuntime, SPEECH_COUNTERPARTY, type RelayRuntime, type RuntimeOverrides, type RuntimeRecovery } from "./relay/runtime.js";

export * from "./relay/tasks/types.js";
export { TaskLedger, type LedgerSink, type LedgerListener } from "./relay/tasks/ledger.js";
export { SqliteLedgerStore, IN_MEMORY } from "./relay/tasks/ledgerStore.js";

export { StepRegistry, DEFAULT_INTENT_RULES, type StepBinding, type StepDefinition, type IntentRule } from "./relay/registry/stepRegistry.js";
export * from "./relay/capabilities/index.js";
export { MemoryPublisher, type ArtifactPublisher } from "./relay/artifacts/publisher.js";
export { PinataPublisher, DEFAULT_PINATA_GATEWAY } from "./relay/artifacts/pinata.js";

export { DelegationChannel } from "./relay/delegation/channel.js";
export { HttpCounterpartyClient } from "./relay/delegation/httpCounterparty.js";
export { InProcessCounterparty } from "./relay/delegation/inProcessCounterparty.js";
export type { CounterpartyClient, SubtaskOutcome, CorrelationEntry } from "./relay/delegation/types.js";

export * from "./relay/orchestrator/index.js";
export { createHttpApp, startHttpServer } from "./server/http.js";
export { createMcpServer } from "./mcp/server.js";
