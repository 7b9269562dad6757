import type { Logger } from "pino";
import type { ChatCompletionPayload } from "../http/sse.js";
import type { UsageMessage } from "../utils/tokens.js";
import type { StreamHandle } from "./streamHandle.js";

export interface BridgeRequest {
  reqId: string;
  /** Model id reported back to the caller. */
  model: string;
  /** Flattened message list, used for usage accounting. */
  messages: UsageMessage[];
  logger: Logger;
  signal: AbortSignal;
}

export type BridgeKind = "capture" | "scrape";

/**
 * Turns one submitted prompt into either a lazily consumed SSE stream or a
 * single `chat.completion` payload.
 */
export interface ResponseBridge {
  readonly kind: BridgeKind;
  openStream(request: BridgeRequest): StreamHandle;
  complete(request: BridgeRequest): Promise<ChatCompletionPayload>;
  /** Drops residual upstream output between requests. */
  reset(logger: Logger): void;
}
