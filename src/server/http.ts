import { Hono, type Context } from "hono";
import { serve, type ServerType } from "@hono/node-server";
import { z } from "zod";
import { RelayError, httpStatusFor, toRelayError } from "../relay/errors.js";
import { callbackReporter } from "../relay/delegation/callbackReporter.js";
import type { RelayRuntime } from "../relay/runtime.js";
import { INTENT_FLAGS, STEP_NAMES, type TaskInput } from "../relay/tasks/types.js";
import { CapacityExceededError } from "../relay/utils/concurrencyLimiter.js";

const TaskSendSchema = z.object({
  text: z.string().min(1),
  sourceLang: z.string().optional(),
  targetLang: z.string().optional(),
  intent: z.array(z.enum(INTENT_FLAGS)),
  /** Wait until the task is terminal or suspended (default) or return once accepted */
  wait: z.boolean().optional()
});

const TaskIdSchema = z.object({
  taskId: z.string()
});

const ListQuerySchema = z.object({
  state: z.enum(["pending", "running", "awaiting_delegate", "completed", "failed"]).optional()
});

const SubtaskOutcomeSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("success"),
    output: z.unknown(),
    artifacts: z.record(z.string()).optional()
  }),
  z.object({
    kind: z.literal("failure"),
    reason: z.string()
  })
]);

const SubtaskResultSchema = z.object({
  remoteId: z.string(),
  outcome: SubtaskOutcomeSchema
});

const SubtaskCreateSchema = z.object({
  stepName: z.enum(STEP_NAMES),
  input: z.unknown(),
  caller: z.string(),
  callbackUrl: z.string().url()
});

const RemoteIdSchema = z.object({
  remoteId: z.string()
});

type ParseResult<T> = { ok: true; data: T } | { ok: false; response: Response };

async function parseBody<T>(c: Context, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ParseResult<T>> {
  let json: unknown;
  try {
    json = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ code: "BAD_REQUEST", message: "Invalid JSON body" }, 400) };
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, response: c.json(toRelayError(parsed.error).toJSON(), 400) };
  }
  return { ok: true, data: parsed.data };
}

function isAllowedCallback(callbackUrl: string, hosts: readonly string[]): boolean {
  const url = new URL(callbackUrl);
  return hosts.includes(url.host.toLowerCase()) || hosts.includes(url.hostname.toLowerCase());
}

/**
 * Build the HTTP app. Kept separate from startHttpServer so tests can drive
 * it through app.request without opening a socket.
 */
export function createHttpApp(runtime: RelayRuntime): Hono {
  const app = new Hono();
  const { orchestrator, channel, subtasks, limiter, ledger } = runtime;
  const log = runtime.logger.child({ component: "http" });

  app.onError((err, c) => {
    // Capacity errors get the A2A retry hint
    if (err instanceof CapacityExceededError) {
      return c.json(
        {
          kind: "error",
          errorType: "capacity_exceeded",
          message: err.message,
          retryAfterMs: err.retryAfterMs
        },
        503
      );
    }
    const relayErr = toRelayError(err);
    const status = httpStatusFor(relayErr.code);
    if (status === 500) {
      log.error({ path: c.req.path, err: relayErr.message }, "Request failed");
    }
    return c.json(relayErr.toJSON(), status);
  });

  app.get("/health", (c) => {
    return c.json({
      ok: true,
      agentId: runtime.config.agentId,
      ledger: runtime.ledgerHealth(),
      tasks: ledger.stats(),
      delegations: { pending: channel.pending().length },
      limiter: {
        running: limiter.running,
        queued: limiter.queued,
        atCapacity: limiter.atCapacity
      }
    });
  });

  // Task entry point, the only route behind the ingress limiter
  app.post("/a2a/tasks/send", async (c) => {
    const body = await parseBody(c, TaskSendSchema);
    if (!body.ok) return body.response;
    const { intent, wait, text, sourceLang, targetLang } = body.data;

    const input: TaskInput = { text };
    if (sourceLang !== undefined) input.sourceLang = sourceLang;
    if (targetLang !== undefined) input.targetLang = targetLang;

    if (wait === false) {
      const taskId = await limiter.run(async () => orchestrator.submit(input, intent));
      return c.json({ taskId, status: orchestrator.getStatus(taskId) }, 202);
    }
    const task = await limiter.run(() => orchestrator.run(input, intent));
    return c.json({ taskId: task.id, status: orchestrator.getStatus(task.id) });
  });

  app.post("/a2a/tasks/get", async (c) => {
    const body = await parseBody(c, TaskIdSchema);
    if (!body.ok) return body.response;
    const task = ledger.get(body.data.taskId);
    if (!task) {
      return c.json({ code: "NOT_FOUND", message: `Task ${body.data.taskId} not found` }, 404);
    }
    return c.json(orchestrator.getStatus(task.id));
  });

  app.post("/a2a/tasks/cancel", async (c) => {
    const body = await parseBody(c, TaskIdSchema);
    if (!body.ok) return body.response;
    const cancelled = await orchestrator.cancel(body.data.taskId);
    if (!cancelled) {
      throw new RelayError("INVALID_TRANSITION", `Task ${body.data.taskId} already finished`, {
        taskId: body.data.taskId
      });
    }
    return c.json({ cancelled: true, taskId: body.data.taskId });
  });

  app.get("/a2a/tasks/list", (c) => {
    const query = ListQuerySchema.safeParse({ state: c.req.query("state") });
    if (!query.success) {
      return c.json(toRelayError(query.error).toJSON(), 400);
    }
    const tasks = orchestrator.list(query.data.state).map((t) => orchestrator.getStatus(t.id));
    return c.json({ tasks, stats: ledger.stats() });
  });

  // Inbound reportResult from a counterparty we delegated to
  app.post("/a2a/subtasks/result", async (c) => {
    const body = await parseBody(c, SubtaskResultSchema);
    if (!body.ok) return body.response;
    const { remoteId, outcome } = body.data;
    const accepted = channel.onSubtaskResult(
      remoteId,
      outcome.kind === "success"
        ? { kind: "success", output: outcome.output, ...(outcome.artifacts && { artifacts: outcome.artifacts }) }
        : outcome
    );
    return c.json({ accepted, remoteId });
  });

  /**
   * This agent acting as a counterparty. The outcome is POSTed to the
   * callbackUrl the caller supplies. Callers are not authenticated: with
   * `callbackHosts` unset any host is accepted, so the route must only be
   * reachable by trusted agents.
   */
  app.post("/a2a/subtasks", async (c) => {
    const body = await parseBody(c, SubtaskCreateSchema);
    if (!body.ok) return body.response;
    const { stepName, input, caller, callbackUrl } = body.data;

    const allowed = runtime.config.callbackHosts;
    if (allowed && !isAllowedCallback(callbackUrl, allowed)) {
      throw new RelayError("BAD_REQUEST", "callbackUrl host is not allowed", { callbackUrl });
    }

    const remoteId = subtasks.accept(
      stepName,
      input,
      { caller, callbackUrl },
      callbackReporter(callbackUrl, { logger: runtime.logger })
    );
    log.info({ remoteId, stepName, caller }, "Accepted subtask");
    return c.json({ remoteId }, 201);
  });

  app.post("/a2a/subtasks/abandon", async (c) => {
    const body = await parseBody(c, RemoteIdSchema);
    if (!body.ok) return body.response;
    const abandoned = await subtasks.abandon(body.data.remoteId);
    return c.json({ abandoned, remoteId: body.data.remoteId });
  });

  return app;
}

export type HttpServerOptions = {
  port: number;
};

export function startHttpServer(runtime: RelayRuntime, options: HttpServerOptions): ServerType {
  const app = createHttpApp(runtime);
  const server = serve({ fetch: app.fetch, port: options.port });
  runtime.logger.info(`HTTP server listening on http://localhost:${options.port}`);
  return server;
}
