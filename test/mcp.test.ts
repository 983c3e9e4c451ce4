import { describe, expect, it, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { TOOL_NAMES, createMcpServer } from "../src/mcp/server.js";
import { loadConfig } from "../src/relay/config.js";
import { createRuntime, type RelayRuntime } from "../src/relay/runtime.js";
import type { TaskStatus } from "../src/relay/tasks/types.js";
import { FakeCounterparty, quiet } from "./fakes.js";

type ToolResult = Awaited<ReturnType<Client["callTool"]>>;

function firstText(result: ToolResult): string {
  const content = result.content;
  if (!Array.isArray(content)) throw new Error("Tool result has no content");
  const first: unknown = content[0];
  if (first && typeof first === "object" && "text" in first && typeof first.text === "string") {
    return first.text;
  }
  throw new Error("Tool result has no text");
}

describe("MCP server", () => {
  let runtime: RelayRuntime | undefined;
  let client: Client | undefined;

  afterEach(async () => {
    await client?.close();
    runtime?.close();
    client = undefined;
    runtime = undefined;
  });

  async function connect(): Promise<{ client: Client; runtime: RelayRuntime; counterparty: FakeCounterparty }> {
    const counterparty = new FakeCounterparty();
    runtime = await createRuntime(loadConfig({ STEPRELAY_LOG_LEVEL: "silent" }), { logger: quiet, counterparty });
    const server = createMcpServer(runtime);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "test-client", version: "0.0.1" }, { capabilities: {} });
    await client.connect(clientTransport);
    return { client, runtime, counterparty };
  }

  it("lists the task tools", async () => {
    const ctx = await connect();
    const { tools } = await ctx.client.listTools();
    expect(tools.map((t) => t.name)).toEqual([...TOOL_NAMES]);
  });

  it("submits a task and returns its settled status", async () => {
    const ctx = await connect();

    const result = await ctx.client.callTool({
      name: "steprelay.submit_task",
      arguments: { text: "hello", intent: ["translate"] }
    });

    expect(result.isError).toBeFalsy();
    const payload: { taskId: string; status: TaskStatus } = JSON.parse(firstText(result));
    expect(payload.status.state).toBe("completed");
    expect(payload.status.steps[0]?.output).toEqual({ text: "[English] hello" });
  });

  it("reports invalid arguments as BAD_REQUEST", async () => {
    const ctx = await connect();

    const result = await ctx.client.callTool({ name: "steprelay.submit_task", arguments: { text: "hello" } });

    expect(result.isError).toBe(true);
    expect(JSON.parse(firstText(result))).toMatchObject({ code: "BAD_REQUEST" });
  });

  it("reports unknown tasks as NOT_FOUND", async () => {
    const ctx = await connect();

    const result = await ctx.client.callTool({ name: "steprelay.get_status", arguments: { taskId: "missing" } });

    expect(result.isError).toBe(true);
    expect(JSON.parse(firstText(result))).toMatchObject({ code: "NOT_FOUND", message: "Task missing not found" });
  });

  it("cancels a suspended task", async () => {
    const ctx = await connect();
    const task = await ctx.runtime.orchestrator.run({ text: "hello" }, ["text2speech-delegated"]);

    const result = await ctx.client.callTool({ name: "steprelay.cancel_task", arguments: { taskId: task.id } });

    expect(JSON.parse(firstText(result))).toEqual({ cancelled: true, taskId: task.id });
    expect(ctx.counterparty.abandoned).toEqual(["remote-1"]);
    expect(ctx.runtime.orchestrator.getStatus(task.id).failure?.code).toBe("CANCELLED");
  });

  it("lists tasks with stats", async () => {
    const ctx = await connect();
    await ctx.runtime.orchestrator.run({ text: "hello" }, ["translate"]);

    const result = await ctx.client.callTool({ name: "steprelay.list_tasks", arguments: { state: "completed" } });
    const payload: { tasks: TaskStatus[]; stats: { total: number } } = JSON.parse(firstText(result));

    expect(payload.tasks).toHaveLength(1);
    expect(payload.stats.total).toBe(1);
  });

  it("answers unknown tools with an error", async () => {
    const ctx = await connect();

    const result = await ctx.client.callTool({ name: "steprelay.nope", arguments: {} });

    expect(result.isError).toBe(true);
    expect(firstText(result)).toBe("Unknown tool: steprelay.nope");
  });
});
