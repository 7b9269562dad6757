import type { Response } from "express";
import { nanoid } from "nanoid";

export type FinishReason = "stop" | "tool_calls";

export interface UsageStats {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export interface FunctionCall {
  name: string;
  params: Record<string, unknown>;
}

export interface ToolCall {
  id: string;
  index: number;
  type: "function";
  function: {
    name: string;
    arguments: string;
  };
}

export interface ChunkDelta {
  role?: "assistant";
  content?: string | null;
  reasoning_content?: string;
  tool_calls?: ToolCall[];
}

export interface ChatCompletionChunk {
  id: string;
  object: "chat.completion.chunk";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    delta: ChunkDelta;
    finish_reason: FinishReason | null;
    native_finish_reason: FinishReason | null;
  }>;
  usage?: UsageStats;
}

export interface ChatCompletionMessage {
  role: "assistant";
  content: string | null;
  reasoning_content?: string;
  tool_calls?: ToolCall[];
}

export interface ChatCompletionPayload {
  id: string;
  object: "chat.completion";
  created: number;
  model: string;
  choices: Array<{
    index: number;
    message: ChatCompletionMessage;
    finish_reason: FinishReason;
    native_finish_reason: FinishReason;
  }>;
  usage: UsageStats;
  system_fingerprint: string;
}

export interface ErrorChunk {
  error: {
    message: string;
    type: string;
    param: null;
    code: string;
  };
}

export const SYSTEM_FINGERPRINT = "webchat-relay";

/** Identity shared by every chunk of one completion. */
export interface CompletionIdentity {
  id: string;
  created: number;
  model: string;
}

export function createCompletionIdentity(reqId: string, model: string, now = Date.now()): CompletionIdentity {
  const created = Math.floor(now / 1000);
  return { id: `chatcmpl-${reqId}-${created}`, created, model };
}

export function buildToolCalls(functions: FunctionCall[]): ToolCall[] {
  return functions.map((call, index) => ({
    id: `call_${nanoid(24)}`,
    index,
    type: "function",
    function: {
      name: call.name,
      arguments: JSON.stringify(call.params),
    },
  }));
}

export function buildDeltaChunk(
  identity: CompletionIdentity,
  delta: { content?: string; reasoning?: string },
): ChatCompletionChunk {
  const chunkDelta: ChunkDelta = { role: "assistant" };
  if (delta.reasoning !== undefined) {
    chunkDelta.content = null;
    chunkDelta.reasoning_content = delta.reasoning;
  }
  if (delta.content !== undefined) {
    chunkDelta.content = delta.content;
  }

  return {
    id: identity.id,
    object: "chat.completion.chunk",
    created: identity.created,
    model: identity.model,
    choices: [{ index: 0, delta: chunkDelta, finish_reason: null, native_finish_reason: null }],
  };
}

/**
 * Terminal chunk. Any function call forces `tool_calls` as finish reason.
 */
export function buildFinalChunk(
  identity: CompletionIdentity,
  usage: UsageStats,
  functions: FunctionCall[] = [],
): ChatCompletionChunk {
  const finishReason: FinishReason = functions.length > 0 ? "tool_calls" : "stop";
  const delta: ChunkDelta = functions.length > 0
    ? { role: "assistant", content: null, tool_calls: buildToolCalls(functions) }
    : {};

  return {
    id: identity.id,
    object: "chat.completion.chunk",
    created: identity.created,
    model: identity.model,
    choices: [{ index: 0, delta, finish_reason: finishReason, native_finish_reason: finishReason }],
    usage,
  };
}

export function buildErrorChunk(message: string, code: string, type = "server_error"): ErrorChunk {
  return {
    error: {
      message,
      type,
      param: null,
      code,
    },
  };
}

export function buildChatCompletion(params: {
  identity: CompletionIdentity;
  content: string;
  reasoning?: string;
  functions?: FunctionCall[];
  usage: UsageStats;
}): ChatCompletionPayload {
  const functions = params.functions ?? [];
  const finishReason: FinishReason = functions.length > 0 ? "tool_calls" : "stop";
  const message: ChatCompletionMessage = {
    role: "assistant",
    content: functions.length > 0 ? null : params.content,
  };
  if (params.reasoning) {
    message.reasoning_content = params.reasoning;
  }
  if (functions.length > 0) {
    message.tool_calls = buildToolCalls(functions);
  }

  return {
    id: params.identity.id,
    object: "chat.completion",
    created: params.identity.created,
    model: params.identity.model,
    choices: [{ index: 0, message, finish_reason: finishReason, native_finish_reason: finishReason }],
    usage: params.usage,
    system_fingerprint: SYSTEM_FINGERPRINT,
  };
}

export function encodeSseData(payload: ChatCompletionChunk | ErrorChunk | "[DONE]"): string {
  if (payload === "[DONE]") {
    return "data: [DONE]\n\n";
  }

  return `data: ${JSON.stringify(payload)}\n\n`;
}

export function setupSseHeaders(res: Response): void {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no");
}
