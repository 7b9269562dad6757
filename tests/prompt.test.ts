import { describe, expect, it } from "vitest";
import { renderPrompt, usageMessages, validateMessages } from "../src/pipeline/prompt.js";
import { chatCompletionRequestSchema, messageText, samplingParameters, type ChatMessage } from "../src/pipeline/request.js";

describe("renderPrompt", () => {
  it("puts system instructions first and labels each turn", () => {
    const messages: ChatMessage[] = [
      { role: "user", content: "hi" },
      { role: "system", content: "be brief" },
      { role: "assistant", content: "hello" },
      { role: "developer", content: "use tools" },
      { role: "user", content: "  again\r\nnow " },
    ];

    expect(renderPrompt(messages)).toBe(
      "System instructions:\nbe brief\n\nuse tools\n\n---\n\nUser:\nhi\n\n---\n\nAssistant:\nhello\n\n---\n\nUser:\nagain\nnow",
    );
  });

  it("lists declared tools after the instructions", () => {
    const messages: ChatMessage[] = [{ role: "user", content: "find it" }];
    const tools = [{ type: "function", function: { name: "lookup", parameters: { type: "object" } } }];

    expect(renderPrompt(messages, tools)).toBe(
      "Available tools:\n- lookup\n  parameters: {\"type\":\"object\"}\n\n---\n\nUser:\nfind it",
    );
  });

  it("drops empty turns", () => {
    const messages: ChatMessage[] = [
      { role: "assistant", content: null },
      { role: "user", content: "   " },
      { role: "user", content: "real" },
    ];

    expect(renderPrompt(messages)).toBe("User:\nreal");
  });
});

describe("message helpers", () => {
  it("joins the text parts of structured content", () => {
    const message: ChatMessage = {
      role: "user",
      content: [{ type: "text", text: "a" }, { type: "image_url" }, { type: "text", text: "b" }],
    };

    expect(messageText(message)).toBe("a\nb");
    expect(usageMessages([message])).toEqual([{ role: "user", text: "a\nb" }]);
  });

  it("requires at least one non-system message", () => {
    expect(() => validateMessages([{ role: "system", content: "x" }], "r1")).toThrowError(
      "All messages are system messages; at least one user or assistant message is required",
    );
    expect(() => validateMessages([], "r1")).toThrowError("'messages' must not be empty");
    expect(() => validateMessages([{ role: "user", content: "x" }], "r1")).not.toThrow();
  });

  it("normalises sampling parameters", () => {
    const request = chatCompletionRequestSchema.parse({
      messages: [{ role: "user", content: "x" }],
      stop: "END",
      max_tokens: 10,
      max_output_tokens: 20,
      top_p: 0.5,
    });

    expect(samplingParameters(request)).toEqual({
      temperature: undefined,
      maxOutputTokens: 20,
      stop: ["END"],
      topP: 0.5,
      reasoningEffort: undefined,
    });
    expect(request.stream).toBe(false);
  });
});
