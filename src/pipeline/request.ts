import { z } from "zod";

const contentPartSchema = z
  .object({
    type: z.string(),
    text: z.string().optional(),
  })
  .passthrough();

export const chatMessageSchema = z
  .object({
    role: z.enum(["system", "user", "assistant", "tool", "developer"]),
    content: z.union([z.string(), z.array(contentPartSchema), z.null()]).optional(),
    name: z.string().optional(),
    tool_call_id: z.string().optional(),
  })
  .passthrough();

const toolSchema = z
  .object({
    type: z.string().optional(),
    function: z
      .object({
        name: z.string(),
        description: z.string().optional(),
        parameters: z.record(z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const chatCompletionRequestSchema = z
  .object({
    model: z.string().optional(),
    messages: z.array(chatMessageSchema).min(1),
    stream: z.boolean().optional().default(false),
    temperature: z.number().min(0).max(2).optional(),
    max_output_tokens: z.number().int().positive().optional(),
    max_tokens: z.number().int().positive().optional(),
    stop: z.union([z.string(), z.array(z.string())]).optional(),
    top_p: z.number().min(0).max(1).optional(),
    reasoning_effort: z.union([z.string(), z.number()]).optional(),
    tools: z.array(toolSchema).optional(),
    tool_choice: z.union([z.string(), z.record(z.unknown())]).optional(),
    seed: z.number().int().optional(),
    response_format: z.record(z.unknown()).optional(),
    attachments: z.array(z.string()).optional(),
  })
  .passthrough();

export type ChatMessage = z.infer<typeof chatMessageSchema>;
export type ChatTool = z.infer<typeof toolSchema>;
export type ChatRequest = z.infer<typeof chatCompletionRequestSchema>;

/** Sampling parameters applied to the session before submission. */
export interface SamplingParameters {
  temperature?: number;
  maxOutputTokens?: number;
  stop?: string[];
  topP?: number;
  reasoningEffort?: string | number;
}

export function messageText(message: ChatMessage): string {
  const content = message.content;
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((part) => (part.type === "text" && typeof part.text === "string" ? part.text : ""))
      .filter((text) => text.length > 0)
      .join("\n");
  }
  return "";
}

export function samplingParameters(request: ChatRequest): SamplingParameters {
  const stop = request.stop === undefined
    ? undefined
    : typeof request.stop === "string"
      ? [request.stop]
      : request.stop;

  return {
    temperature: request.temperature,
    maxOutputTokens: request.max_output_tokens ?? request.max_tokens,
    stop,
    topP: request.top_p,
    reasoningEffort: request.reasoning_effort,
  };
}
