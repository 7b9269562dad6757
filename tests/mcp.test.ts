import { afterEach, describe, expect, it } from "vitest";
import { loadConfig } from "../src/config.js";
import {
  CHAT_TOOL,
  handleMcpCallToolRequest,
  handleMcpListToolsRequest,
  type McpCallToolResponse,
  type StartMcpServerOptions,
} from "../src/mcp/server.js";
import type { QueueWorker } from "../src/queue/worker.js";
import { buildHarness, type Harness } from "./helpers.js";

const running: QueueWorker[] = [];

afterEach(async () => {
  await Promise.all(running.splice(0).map((worker) => worker.stop()));
});

function buildOptions(harness: Harness, start = true): StartMcpServerOptions {
  if (start) {
    running.push(harness.worker);
    harness.worker.start();
  }
  return {
    config: loadConfig({ RELAY_MODE: "mcp", SUPPORTED_MODELS: "model-a,model-b" }),
    logger: harness.logger,
    queue: harness.queue,
    state: harness.state,
  };
}

function textOf(response: McpCallToolResponse): string {
  const first = response.content[0];
  return first?.type === "text" ? first.text : "";
}

describe("MCP chat tool", () => {
  it("lists the chat tool", async () => {
    const options = buildOptions(buildHarness(), false);

    const payload = await handleMcpListToolsRequest(options, "mcp_list_1");

    expect(payload.tools).toEqual([CHAT_TOOL]);
    expect(payload.tools[0]?.name).toBe("chat");
  });

  it("answers a prompt through the shared queue", async () => {
    const harness = buildHarness();
    harness.controller.contents.push({ content: "mcp reply", reasoning: "" });
    const options = buildOptions(harness);

    const response = await handleMcpCallToolRequest(
      options,
      { name: "chat", arguments: { prompt: "hello world", system: "be brief" } },
      "mcp_chat_1",
    );

    expect(response.isError).toBe(false);
    expect(textOf(response)).toBe("mcp reply");
    expect(harness.controller.submittedPrompts).toEqual([
      "System instructions:\nbe brief\n\n---\n\nUser:\nhello world",
    ]);
  });

  it("switches model when one is requested", async () => {
    const harness = buildHarness();
    harness.controller.contents.push({ content: "from b", reasoning: "" });
    const options = buildOptions(harness);

    const response = await handleMcpCallToolRequest(
      options,
      { name: "chat", arguments: { prompt: "hi", model: "model-b" } },
      "mcp_chat_2",
    );

    expect(textOf(response)).toBe("from b");
    expect(harness.controller.calls[0]).toBe("switchModel:model-b");
    expect(harness.state.currentModelId).toBe("model-b");
  });

  it("flags unknown tools as errors", async () => {
    const options = buildOptions(buildHarness(), false);

    const response = await handleMcpCallToolRequest(options, { name: "unknown_tool", arguments: {} }, "mcp_unknown_1");

    expect(response.isError).toBe(true);
    expect(textOf(response)).toBe("Unknown tool: unknown_tool");
  });

  it("rejects arguments without a prompt", async () => {
    const options = buildOptions(buildHarness(), false);

    const response = await handleMcpCallToolRequest(options, { name: "chat", arguments: { model: "model-a" } });

    expect(response.isError).toBe(true);
    expect(textOf(response)).toBe("Error: invalid_request: Invalid arguments for chat tool");
  });

  it("reports a session that is not ready", async () => {
    const harness = buildHarness();
    harness.state.ready = false;
    const options = buildOptions(harness, false);

    const response = await handleMcpCallToolRequest(options, { name: "chat", arguments: { prompt: "hi" } });

    expect(response.isError).toBe(true);
    expect(textOf(response)).toBe("Error: session_not_ready: Browser session is not ready");
    expect(harness.queue.size).toBe(0);
  });

  it("surfaces upstream failures as tool errors", async () => {
    const harness = buildHarness({ options: { maxAttempts: 1 } });
    harness.controller.contents.push({ content: "", reasoning: "" });
    const options = buildOptions(harness);

    const response = await handleMcpCallToolRequest(options, { name: "chat", arguments: { prompt: "hi" } });

    expect(response.isError).toBe(true);
    expect(textOf(response)).toBe("Error: empty_upstream_response: Settled response element is empty");
  });
});
