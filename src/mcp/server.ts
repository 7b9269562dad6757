import { type Logger } from "pino";
import { nanoid } from "nanoid";
import { z } from "zod";
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type ListToolsResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { handlerDeadlineMs, type RelayConfig } from "../config.js";
import { RelayError, toRelayError } from "../errors.js";
import { createRequestLogger } from "../logger.js";
import type { ChatCompletionPayload } from "../http/sse.js";
import { chatCompletionRequestSchema } from "../pipeline/request.js";
import type { RequestQueue } from "../queue/requestQueue.js";
import { ResultPromise } from "../queue/resultPromise.js";
import type { ClientHandle, CompletionResult, QueueItem } from "../queue/types.js";
import type { SessionState } from "../session/state.js";
import { withTimeout } from "../utils/time.js";

export const CHAT_TOOL: Tool = {
  name: "chat",
  description: "Send a prompt to the browser chat session and return the reply",
  inputSchema: {
    type: "object",
    properties: {
      prompt: {
        type: "string",
        description: "The prompt to send",
      },
      model: {
        type: "string",
        description: "Optional model id; the session's current model is used when omitted",
      },
      system: {
        type: "string",
        description: "Optional system instructions placed ahead of the prompt",
      },
    },
    required: ["prompt"],
  },
};

export interface StartMcpServerOptions {
  config: RelayConfig;
  logger: Logger;
  queue: RequestQueue;
  state: SessionState;
}

export interface McpCallToolRequestParams {
  name: string;
  arguments?: unknown;
}

export type McpCallToolResponse = CallToolResult;

const chatToolArgsSchema = z.object({
  prompt: z.string().min(1),
  model: z.string().min(1).optional(),
  system: z.string().optional(),
});

/** Stdio callers cannot be checked; they stay connected for the life of the process. */
const stdioClient: ClientHandle = {
  isConnected: async () => true,
};

function buildMcpTextPayload(text: string, isError: boolean): McpCallToolResponse {
  return {
    content: [{ type: "text", text }],
    isError,
  };
}

function replyText(payload: ChatCompletionPayload): string {
  const message = payload.choices[0]?.message;
  if (!message) {
    return "";
  }
  if (message.tool_calls && message.tool_calls.length > 0) {
    return JSON.stringify(message.tool_calls, null, 2);
  }
  return message.content ?? "";
}

export async function handleMcpListToolsRequest(
  options: StartMcpServerOptions,
  rid: string = `mcp_${nanoid()}`,
): Promise<ListToolsResult> {
  options.logger.debug({ rid, event: "mcp_list_tools" }, "mcp_list_tools");
  return { tools: [CHAT_TOOL] };
}

export async function handleMcpCallToolRequest(
  options: StartMcpServerOptions,
  params: McpCallToolRequestParams,
  rid: string = `mcp_${nanoid()}`,
): Promise<McpCallToolResponse> {
  const startedAt = Date.now();
  const logger = createRequestLogger(options.logger, rid, { tool: params.name });
  logger.info({ event: "mcp_call_tool", queueDepth: options.queue.size }, "mcp_call_tool");

  try {
    if (params.name !== CHAT_TOOL.name) {
      return buildMcpTextPayload(`Unknown tool: ${params.name}`, true);
    }

    const parsedArgs = chatToolArgsSchema.safeParse(params.arguments);
    if (!parsedArgs.success) {
      throw new RelayError("invalid_request", "Invalid arguments for chat tool", {
        issues: parsedArgs.error.issues.map((issue) => issue.message),
      });
    }
    if (!options.state.ready) {
      throw new RelayError("session_not_ready", "Browser session is not ready", undefined, 30);
    }

    const args = parsedArgs.data;
    const messages = args.system
      ? [{ role: "system", content: args.system }, { role: "user", content: args.prompt }]
      : [{ role: "user", content: args.prompt }];
    const payload = chatCompletionRequestSchema.parse({ model: args.model, messages, stream: false });

    const result = new ResultPromise<CompletionResult>();
    const item: QueueItem = {
      reqId: rid,
      payload,
      clientHandle: stdioClient,
      result,
      enqueuedAt: Date.now(),
      cancelled: false,
    };
    options.queue.enqueue(item);

    const outcome = await withTimeout(
      result.promise,
      handlerDeadlineMs(options.config),
      () => new RelayError("timeout", "Timed out waiting for the response", { reqId: rid }),
    ).catch(async (error: unknown) => {
      const relayError = toRelayError(error);
      if (relayError.code === "timeout" && result.reject(relayError)) {
        item.cancelled = true;
      }
      throw relayError;
    });

    if (outcome.kind !== "json") {
      outcome.handle.cancel(new RelayError("cancelled", "Streaming is not available over MCP"));
      throw new RelayError("unknown", "Unexpected streaming result for MCP request");
    }

    logger.info({ event: "mcp_call_tool_completed", durationMs: Date.now() - startedAt }, "mcp_call_tool_completed");
    return buildMcpTextPayload(replyText(outcome.payload) || "No response received.", false);
  } catch (error) {
    const relayError = toRelayError(error);
    logger.error(
      {
        event: "mcp_error",
        errorCode: relayError.code,
        details: relayError.details,
      },
      relayError.message,
    );
    return buildMcpTextPayload(`Error: ${relayError.code}: ${relayError.message}`, true);
  }
}

export async function startMcpServer(options: StartMcpServerOptions): Promise<Server> {
  const server = new Server(
    {
      name: "webchat-relay",
      version: options.config.version,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => handleMcpListToolsRequest(options));

  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    handleMcpCallToolRequest(
      options,
      {
        name: request.params.name,
        arguments: request.params.arguments,
      },
    ));

  const transport = new StdioServerTransport();
  await server.connect(transport);
  options.logger.info({ event: "mcp_server_started", mode: "mcp" }, "mcp_server_started");
  return server;
}
