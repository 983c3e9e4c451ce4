export const RELAY_ERROR_CODES = [
  "UNKNOWN_STEP",
  "HANDLER_FAILURE",
  "COUNTERPARTY_UNREACHABLE",
  "TIMED_OUT",
  "PUBLISH_ERROR",
  "CANCELLED",
  "NOT_FOUND",
  "INVALID_TRANSITION",
  "BAD_REQUEST",
  "LEDGER_INIT_FAILED",
  "IO_ERROR",
  "INTERNAL"
] as const;

export type RelayErrorCode = (typeof RELAY_ERROR_CODES)[number];

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  readonly details?: unknown;

  constructor(code: RelayErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = "RelayError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: RelayErrorCode; message: string; details?: unknown } {
    return {
      code: this.code,
      message: this.message,
      ...(this.details !== undefined && { details: this.details })
    };
  }
}

export function toRelayError(err: unknown): RelayError {
  if (err instanceof RelayError) return err;
  if (err instanceof Error) {
    // Check for Zod validation errors
    if (err.name === "ZodError") {
      const issues = "issues" in err ? err.issues : undefined;
      return new RelayError("BAD_REQUEST", "Validation error", { issues });
    }
    return new RelayError("INTERNAL", err.message, { name: err.name, stack: err.stack });
  }
  return new RelayError("INTERNAL", "Unknown error", { err });
}

/**
 * Status code for an error surfaced over HTTP.
 */
export function httpStatusFor(code: RelayErrorCode): 400 | 404 | 409 | 500 | 502 {
  switch (code) {
    case "BAD_REQUEST":
    case "UNKNOWN_STEP":
      return 400;
    case "NOT_FOUND":
      return 404;
    case "INVALID_TRANSITION":
      return 409;
    case "COUNTERPARTY_UNREACHABLE":
    case "PUBLISH_ERROR":
      return 502;
    default:
      return 500;
  }
}
