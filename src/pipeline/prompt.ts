import { RelayError } from "../errors.js";
import type { UsageMessage } from "../utils/tokens.js";
import { messageText, type ChatMessage, type ChatTool } from "./request.js";

export function validateMessages(messages: ChatMessage[], reqId: string): void {
  if (messages.length === 0) {
    throw new RelayError("invalid_request", "'messages' must not be empty", { reqId });
  }
  if (messages.every((message) => message.role === "system")) {
    throw new RelayError(
      "invalid_request",
      "All messages are system messages; at least one user or assistant message is required",
      { reqId },
    );
  }
}

export function usageMessages(messages: ChatMessage[]): UsageMessage[] {
  return messages.map((message) => ({ role: message.role, text: messageText(message) }));
}

const ROLE_LABELS: Record<ChatMessage["role"], string> = {
  system: "System",
  developer: "System",
  user: "User",
  assistant: "Assistant",
  tool: "Tool",
};

function renderToolCatalog(tools: ChatTool[]): string {
  const lines = ["Available tools:"];
  for (const tool of tools) {
    const name = tool.function?.name;
    if (!name) continue;
    lines.push(`- ${name}`);
    if (tool.function?.parameters) {
      lines.push(`  parameters: ${JSON.stringify(tool.function.parameters)}`);
    }
  }
  return lines.length > 1 ? lines.join("\n") : "";
}

/**
 * Flattens the conversation into the single text the session input accepts:
 * system instructions first, then the turns in order, each under its role.
 */
export function renderPrompt(messages: ChatMessage[], tools: ChatTool[] = []): string {
  const system = messages
    .filter((message) => message.role === "system" || message.role === "developer")
    .map((message) => messageText(message).trim())
    .filter((text) => text.length > 0);

  const turns = messages
    .filter((message) => message.role !== "system" && message.role !== "developer")
    .map((message) => {
      const text = messageText(message).replace(/\r\n/g, "\n").trim();
      return text.length > 0 ? `${ROLE_LABELS[message.role]}:\n${text}` : "";
    })
    .filter((block) => block.length > 0);

  const sections: string[] = [];
  if (system.length > 0) {
    sections.push(`System instructions:\n${system.join("\n\n")}`);
  }
  const catalog = renderToolCatalog(tools);
  if (catalog) {
    sections.push(catalog);
  }
  sections.push(...turns);

  return sections.join("\n\n---\n\n");
}
