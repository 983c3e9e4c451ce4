#!/usr/bin/env node
import { Command, Option } from "commander";
import process from "node:process";
import chalk from "chalk";
import { loadConfig, type RelayConfig } from "./relay/config.js";
import { toRelayError } from "./relay/errors.js";
import { createRuntime } from "./relay/runtime.js";
import type { IntentFlag, TaskInput, TaskStatus } from "./relay/tasks/types.js";
import { startHttpServer } from "./server/http.js";

/**
 * Exit codes for CLI commands.
 */
const EXIT_CODES = {
  OK: 0,           // Task completed
  SUSPENDED: 20,   // Task parked on a delegate
  ERROR: 30,       // Task failed, or the command itself failed
  CANCELLED: 40    // Cancelled by user (SIGINT/SIGTERM)
} as const;

type CommonOptions = {
  ledger?: string;
  counterparty?: string;
  logLevel?: RelayConfig["logLevel"];
};

function withOverrides(config: RelayConfig, opts: CommonOptions & { port?: string; publicUrl?: string }): RelayConfig {
  const next: RelayConfig = { ...config };
  if (opts.ledger) next.ledgerPath = opts.ledger;
  if (opts.counterparty) next.counterpartyUrl = opts.counterparty;
  if (opts.logLevel) next.logLevel = opts.logLevel;
  if (opts.port) {
    next.port = Number(opts.port);
    if (!opts.publicUrl && !process.env.STEPRELAY_PUBLIC_URL) next.publicUrl = `http://localhost:${next.port}`;
  }
  if (opts.publicUrl) next.publicUrl = opts.publicUrl;
  return next;
}

/**
 * Intent flags for `run`: translation unless --no-translate, plus speech in
 * the requested mode.
 */
function intentFromOptions(opts: { translate: boolean; speech?: "local" | "delegated" }): IntentFlag[] {
  const intent: IntentFlag[] = [];
  if (opts.translate) intent.push("translate");
  if (opts.speech === "local") intent.push("text2speech-local");
  if (opts.speech === "delegated") intent.push("text2speech-delegated");
  return intent;
}

function statusToExitCode(status: TaskStatus, cancelled: boolean): number {
  if (cancelled) return EXIT_CODES.CANCELLED;
  switch (status.state) {
    case "completed":
      return EXIT_CODES.OK;
    case "awaiting_delegate":
      return EXIT_CODES.SUSPENDED;
    default:
      return EXIT_CODES.ERROR;
  }
}

const logLevelOption = new Option("--log-level <level>", "Log level").choices(["debug", "info", "warn", "error", "silent"]);

const program = new Command();

program.name("steprelay").description("Step relay: local and delegated task pipelines").version("0.1.0");

program
  .command("serve")
  .description("Run the HTTP server (task and subtask endpoints)")
  .option("--port <port>", "Port (defaults to STEPRELAY_PORT or 8765)")
  .option("--public-url <url>", "Base URL counterparties use for callbacks")
  .option("--ledger <path>", "SQLite ledger path (:memory: keeps nothing)")
  .option("--counterparty <url>", "Remote agent for delegated steps (defaults to this process)")
  .addOption(logLevelOption)
  .action(async (opts: CommonOptions & { port?: string; publicUrl?: string }) => {
    const config = withOverrides(loadConfig(), opts);
    const runtime = await createRuntime(config);
    const recovered = runtime.start();
    if (recovered.resumed > 0 || recovered.restored > 0 || recovered.hosted > 0) {
      process.stderr.write(
        chalk.dim(
          `Recovered ${recovered.resumed} running and ${recovered.restored} suspended task(s), ${recovered.hosted} hosted subtask(s)\n`
        )
      );
    }
    startHttpServer(runtime, { port: config.port });

    const shutdown = (signal: string) => {
      process.stderr.write(chalk.yellow(`\nReceived ${signal}, shutting down\n`));
      runtime.close();
      process.exit(EXIT_CODES.OK);
    };
    process.on("SIGINT", () => shutdown("SIGINT"));
    process.on("SIGTERM", () => shutdown("SIGTERM"));
  });

program
  .command("run")
  .description("Run one task and print its final status")
  .argument("<text>", "Text to process")
  .option("--no-translate", "Skip the translate step")
  .addOption(new Option("--speech <mode>", "Add text2speech, run locally or delegated").choices(["local", "delegated"]))
  .option("--source <lang>", "Source language")
  .option("--target <lang>", "Target language")
  .option("--wait", "Wait for delegated steps instead of exiting suspended", false)
  .option("--ledger <path>", "SQLite ledger path (:memory: keeps nothing)")
  .option("--json", "Output the full JSON status", false)
  .addOption(logLevelOption)
  .action(
    async (
      text: string,
      opts: CommonOptions & {
        translate: boolean;
        speech?: "local" | "delegated";
        source?: string;
        target?: string;
        wait: boolean;
        json: boolean;
      }
    ) => {
      let cancelled = false;
      try {
        // run has no callback endpoint, so delegated steps stay in process
        const config: RelayConfig = {
          ...withOverrides(loadConfig(), { ...opts, logLevel: opts.logLevel ?? "warn" }),
          counterpartyUrl: undefined
        };
        const runtime = await createRuntime(config);
        runtime.start();

        const input: TaskInput = { text };
        if (opts.source) input.sourceLang = opts.source;
        if (opts.target) input.targetLang = opts.target;
        const intent = intentFromOptions(opts);

        process.stderr.write(chalk.blue(`Running task: ${intent.length > 0 ? intent.join(", ") : "(no steps)"}\n`));
        const taskId = runtime.orchestrator.submit(input, intent);

        const handleSignal = (signal: string) => {
          if (cancelled) {
            process.stderr.write(chalk.red(`\nForced exit on second ${signal}\n`));
            process.exit(EXIT_CODES.CANCELLED);
          }
          cancelled = true;
          process.stderr.write(chalk.yellow(`\nReceived ${signal}, cancelling...\n`));
          runtime.orchestrator.cancel(taskId).catch((err: unknown) => {
            process.stderr.write(chalk.red(`Cancel failed: ${toRelayError(err).message}\n`));
          });
        };
        process.on("SIGINT", () => handleSignal("SIGINT"));
        process.on("SIGTERM", () => handleSignal("SIGTERM"));

        const status = opts.wait
          ? await runtime.orchestrator.waitForTerminal(taskId)
          : await runtime.orchestrator.waitForSettled(taskId);
        runtime.close();

        if (opts.json) {
          process.stdout.write(JSON.stringify(status, null, 2) + "\n");
        } else {
          outputStatusHuman(status);
        }
        process.exit(statusToExitCode(status, cancelled));
      } catch (err) {
        process.stderr.write(chalk.red(`Error: ${toRelayError(err).message}\n`));
        process.exit(EXIT_CODES.ERROR);
      }
    }
  );

/**
 * Output a task status in human-readable format.
 */
function outputStatusHuman(status: TaskStatus): void {
  const done = status.steps.filter((s) => s.status === "done").length;
  const stepCount = status.steps.length;

  switch (status.state) {
    case "completed":
      process.stderr.write(chalk.green("✓ Task completed\n"));
      break;
    case "awaiting_delegate": {
      const delegated = status.steps.find((s) => s.status === "delegated");
      process.stderr.write(chalk.magenta("⏸ Task suspended on a delegate\n"));
      if (delegated?.delegateRef) {
        process.stderr.write(chalk.dim(`  Step: ${delegated.name} -> ${delegated.delegateRef.counterparty} (${delegated.delegateRef.remoteId})\n`));
      }
      break;
    }
    default:
      process.stderr.write(
        chalk.red(`✗ Task failed: [${status.failure?.code ?? "INTERNAL"}] ${status.failure?.reason ?? "unknown reason"}\n`)
      );
  }
  process.stderr.write(chalk.dim(`  Steps: ${done}/${stepCount} done\n`));

  const last = [...status.steps].reverse().find((s) => s.status === "done");
  if (last?.output !== undefined) {
    process.stdout.write(`${JSON.stringify(last.output)}\n`);
  }
  for (const [name, locator] of Object.entries(status.artifacts)) {
    process.stdout.write(`${name}: ${locator}\n`);
  }
}

await program.parseAsync(process.argv);
