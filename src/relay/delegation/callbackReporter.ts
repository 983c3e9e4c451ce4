import { z } from "zod";
import { RelayError } from "../errors.js";
import { logger as rootLogger, type Logger } from "../log.js";
import type { SubtaskOutcome, SubtaskReporter } from "./types.js";

const ReportResponseSchema = z.object({ accepted: z.boolean() }).passthrough();

export type CallbackReporterOptions = {
  /** Tries per report, including the first */
  attempts?: number;
  /** Base delay between tries; the n-th retry waits n * retryDelayMs */
  retryDelayMs?: number;
  timeoutMs?: number;
  logger?: Logger;
};

/**
 * POSTs a subtask outcome to the caller's callback URL.
 *
 * A result can reach the caller before the caller has registered the
 * subtask, in which case it answers `accepted: false`. Such answers, and
 * transport errors, are retried. Returns whether the caller took the result.
 */
export async function reportSubtaskResult(
  callbackUrl: string,
  remoteId: string,
  outcome: SubtaskOutcome,
  options: CallbackReporterOptions = {}
): Promise<boolean> {
  const attempts = options.attempts ?? 3;
  const retryDelayMs = options.retryDelayMs ?? 250;
  const timeoutMs = options.timeoutMs ?? 10_000;
  const log = (options.logger ?? rootLogger).child({ component: "callback" });

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const response = await fetch(callbackUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ remoteId, outcome }),
        signal: AbortSignal.timeout(timeoutMs)
      });
      if (response.ok) {
        const body = ReportResponseSchema.safeParse(await response.json().catch(() => null));
        if (body.success && body.data.accepted) return true;
        log.debug({ remoteId, attempt }, "Caller did not accept subtask result");
      } else {
        log.warn({ remoteId, attempt, status: response.status }, "Caller rejected subtask result");
      }
    } catch (err) {
      log.warn(
        {
          remoteId,
          attempt,
          err: err instanceof Error ? err.message : String(err)
        },
        "Could not deliver subtask result"
      );
    }
    if (attempt < attempts) {
      await new Promise<void>((resolve) => setTimeout(resolve, attempt * retryDelayMs));
    }
  }
  return false;
}

/**
 * Reporter for a subtask that arrived over HTTP. Rejects with
 * COUNTERPARTY_UNREACHABLE when every try failed, which leaves the subtask
 * open so the next start reports it again.
 *
 * `callbackUrl` is taken as given by the caller; nothing restricts which
 * hosts it may point at. Deployments expose /a2a/subtasks only to agents
 * they trust.
 */
export function callbackReporter(callbackUrl: string, options: CallbackReporterOptions = {}): SubtaskReporter {
  return async (remoteId, outcome) => {
    const delivered = await reportSubtaskResult(callbackUrl, remoteId, outcome, options);
    if (!delivered) {
      throw new RelayError("COUNTERPARTY_UNREACHABLE", `Subtask result for ${remoteId} was not delivered`, {
        callbackUrl
      });
    }
  };
}
