#!/usr/bin/env node
import process from "node:process";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./relay/config.js";
import { logger } from "./relay/log.js";
import { createRuntime } from "./relay/runtime.js";
import { createMcpServer } from "./mcp/server.js";

// Keep the server alive on stray errors; stdout carries JSON-RPC so nothing else may write there
process.on("uncaughtException", (err) => {
  logger.error({ stack: err.stack }, `Uncaught exception (server continues): ${err.message}`);
});

process.on("unhandledRejection", (reason) => {
  const msg = reason instanceof Error ? reason.message : String(reason);
  logger.error(`Unhandled rejection (server continues): ${msg}`);
});

async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = await createRuntime(config);
  const recovered = runtime.start();
  logger.info({ ledger: runtime.ledgerHealth(), ...recovered }, "Runtime ready");

  const server = createMcpServer(runtime);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Transport connected, server running");

  // StdioServerTransport stays open until stdin closes
  await new Promise<void>((resolve) => {
    process.stdin.on("close", () => {
      logger.info("stdin closed, shutting down");
      resolve();
    });
    process.stdin.on("end", () => {
      logger.info("stdin ended, shutting down");
      resolve();
    });
  });
  runtime.close();
}

main().catch((err: unknown) => {
  logger.error(`Fatal startup error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
