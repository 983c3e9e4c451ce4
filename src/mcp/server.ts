import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { toRelayError, type RelayError } from "../relay/errors.js";
import type { RelayRuntime } from "../relay/runtime.js";
import { INTENT_FLAGS } from "../relay/tasks/types.js";
import { CapacityExceededError } from "../relay/utils/concurrencyLimiter.js";

const SubmitSchema = z.object({
  text: z.string().min(1),
  sourceLang: z.string().optional(),
  targetLang: z.string().optional(),
  intent: z.array(z.enum(INTENT_FLAGS)),
  wait: z.boolean().optional()
});

const TaskIdSchema = z.object({
  taskId: z.string()
});

const ListSchema = z.object({
  state: z.enum(["pending", "running", "awaiting_delegate", "completed", "failed"]).optional()
});

type ToolResult = { isError?: boolean; content: Array<{ type: "text"; text: string }> };

function toText(payload: unknown): ToolResult {
  return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
}

/**
 * Format a RelayError into MCP tool error response.
 */
function toErrorResponse(err: RelayError): ToolResult {
  return {
    isError: true,
    content: [{ type: "text", text: JSON.stringify(err.toJSON(), null, 2) }]
  };
}

export const TOOL_NAMES = [
  "steprelay.submit_task",
  "steprelay.get_status",
  "steprelay.cancel_task",
  "steprelay.list_tasks"
] as const;

/**
 * MCP server exposing the task submission surface as tools.
 * Transport is up to the caller (stdio in production, in-memory in tests).
 */
export function createMcpServer(runtime: RelayRuntime, version = "0.1.0"): Server {
  const { orchestrator, limiter } = runtime;
  const log = runtime.logger.child({ component: "mcp" });

  const server = new Server({ name: "steprelay", version }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        {
          name: "steprelay.submit_task",
          description:
            "Submit text with intent flags (translate, text2speech-local, text2speech-delegated). " +
            "Waits until the task completes, fails or suspends on a delegate unless wait is false.",
          inputSchema: {
            type: "object",
            properties: {
              text: { type: "string" },
              sourceLang: { type: "string" },
              targetLang: { type: "string" },
              intent: { type: "array", items: { type: "string", enum: [...INTENT_FLAGS] } },
              wait: { type: "boolean" }
            },
            required: ["text", "intent"],
            additionalProperties: false
          }
        },
        {
          name: "steprelay.get_status",
          description: "Get a task's state, step records, artifacts and failure",
          inputSchema: {
            type: "object",
            properties: { taskId: { type: "string" } },
            required: ["taskId"],
            additionalProperties: false
          }
        },
        {
          name: "steprelay.cancel_task",
          description: "Cancel a task; a suspended task's subtask is abandoned",
          inputSchema: {
            type: "object",
            properties: { taskId: { type: "string" } },
            required: ["taskId"],
            additionalProperties: false
          }
        },
        {
          name: "steprelay.list_tasks",
          description: "List tasks, optionally filtered by state",
          inputSchema: {
            type: "object",
            properties: {
              state: { type: "string", enum: ["pending", "running", "awaiting_delegate", "completed", "failed"] }
            },
            additionalProperties: false
          }
        }
      ]
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<ToolResult> => {
    const { name, arguments: args } = req.params;

    try {
      if (name === "steprelay.submit_task") {
        const parsed = SubmitSchema.safeParse(args ?? {});
        if (!parsed.success) return toErrorResponse(toRelayError(parsed.error));
        const { text, sourceLang, targetLang, intent, wait } = parsed.data;
        const input = { text, ...(sourceLang !== undefined && { sourceLang }), ...(targetLang !== undefined && { targetLang }) };

        try {
          if (wait === false) {
            const taskId = await limiter.run(async () => orchestrator.submit(input, intent));
            return toText({ taskId, status: orchestrator.getStatus(taskId) });
          }
          const task = await limiter.run(() => orchestrator.run(input, intent));
          return toText({ taskId: task.id, status: orchestrator.getStatus(task.id) });
        } catch (limiterErr) {
          if (limiterErr instanceof CapacityExceededError) {
            return {
              isError: true,
              content: [
                {
                  type: "text",
                  text: JSON.stringify(
                    {
                      kind: "error",
                      errorType: "capacity_exceeded",
                      message: limiterErr.message,
                      retryAfterMs: limiterErr.retryAfterMs
                    },
                    null,
                    2
                  )
                }
              ]
            };
          }
          throw limiterErr;
        }
      }

      if (name === "steprelay.get_status") {
        const parsed = TaskIdSchema.safeParse(args ?? {});
        if (!parsed.success) return toErrorResponse(toRelayError(parsed.error));
        return toText(orchestrator.getStatus(parsed.data.taskId));
      }

      if (name === "steprelay.cancel_task") {
        const parsed = TaskIdSchema.safeParse(args ?? {});
        if (!parsed.success) return toErrorResponse(toRelayError(parsed.error));
        const cancelled = await orchestrator.cancel(parsed.data.taskId);
        return toText({ cancelled, taskId: parsed.data.taskId });
      }

      if (name === "steprelay.list_tasks") {
        const parsed = ListSchema.safeParse(args ?? {});
        if (!parsed.success) return toErrorResponse(toRelayError(parsed.error));
        const tasks = orchestrator.list(parsed.data.state).map((t) => orchestrator.getStatus(t.id));
        return toText({ tasks, stats: runtime.ledger.stats() });
      }

      return { content: [{ type: "text", text: `Unknown tool: ${name}` }], isError: true };
    } catch (err) {
      // Catch-all: any unhandled error in handlers becomes a clean error response
      const relayErr = toRelayError(err);
      log.error(`Handler error for ${name}: ${relayErr.message}`);
      return toErrorResponse(relayErr);
    }
  });

  return server;
}
