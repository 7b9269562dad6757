import type { UsageStats } from "../http/sse.js";

// CJK ideographs, CJK punctuation, full-width forms.
const CJK_PATTERN = /[\u4e00-\u9fff\u3000-\u303f\uff00-\uffef]/;

/**
 * Character-class weighted estimate: CJK characters count 1/1.5 of a token,
 * everything else 1/4. Only used for `usage` reporting.
 */
export function estimateTokens(text: string): number {
  if (!text) {
    return 0;
  }

  let cjk = 0;
  let other = 0;
  for (const char of text) {
    if (CJK_PATTERN.test(char)) {
      cjk += 1;
    } else {
      other += 1;
    }
  }

  return Math.max(1, Math.floor(cjk / 1.5 + other / 4));
}

export interface UsageMessage {
  role: string;
  text: string;
}

export function calculateUsage(messages: UsageMessage[], content: string, reasoning = ""): UsageStats {
  const promptText = messages.map((message) => `${message.role}: ${message.text}\n`).join("");
  const promptTokens = estimateTokens(promptText);
  const completionTokens = estimateTokens(content + reasoning);

  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
  };
}
