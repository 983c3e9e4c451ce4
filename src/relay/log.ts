import pino from "pino";

/**
 * pino logger on fd 2. Stdout stays free for MCP stdio framing and CLI results.
 */
export type Logger = pino.Logger;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export function createLogger(level: LogLevel = "info"): Logger {
  if (level === "silent") {
    return pino({ level: "silent" });
  }
  return pino({ name: "steprelay", level }, pino.destination(2));
}

export const logger = createLogger();
