import type { Logger } from "pino";
import { RelayError } from "../errors.js";
import {
  buildChatCompletion,
  buildDeltaChunk,
  buildFinalChunk,
  createCompletionIdentity,
  encodeSseData,
  type ChatCompletionPayload,
} from "../http/sse.js";
import type { SessionController } from "../session/controller.js";
import { sleep } from "../utils/time.js";
import { calculateUsage } from "../utils/tokens.js";
import { StreamHandle } from "./streamHandle.js";
import type { BridgeRequest, ResponseBridge } from "./types.js";

export interface ScrapeBridgeOptions {
  controller: SessionController;
  chunkSize: number;
  chunkDelayMs: number;
  newlineDelayMs: number;
}

/**
 * Splits settled text into paced pieces: each line in `chunkSize` slices,
 * followed by its newline as a piece of its own.
 */
export function sliceForStreaming(text: string, chunkSize: number): Array<{ text: string; newline: boolean }> {
  const pieces: Array<{ text: string; newline: boolean }> = [];
  const lines = text.split("\n");

  lines.forEach((line, lineIndex) => {
    for (let offset = 0; offset < line.length; offset += chunkSize) {
      pieces.push({ text: line.slice(offset, offset + chunkSize), newline: false });
    }
    if (lineIndex < lines.length - 1) {
      pieces.push({ text: "\n", newline: true });
    }
  });

  return pieces;
}

/**
 * Reads the settled response from the page. It never sees real deltas, so
 * streaming replays the final text in small paced pieces.
 */
export class ScrapeBridge implements ResponseBridge {
  public readonly kind = "scrape";
  private readonly options: ScrapeBridgeOptions;

  public constructor(options: ScrapeBridgeOptions) {
    this.options = options;
  }

  public reset(_logger: Logger): void {
    // Nothing is buffered between requests.
  }

  public openStream(request: BridgeRequest): StreamHandle {
    return new StreamHandle((signal) => this.streamFrames(request, signal), request.logger);
  }

  public async complete(request: BridgeRequest): Promise<ChatCompletionPayload> {
    const { content, reasoning } = await this.readSettled(request.signal);
    request.logger.info({ event: "scrape_completed", contentChars: content.length }, "scrape_completed");

    return buildChatCompletion({
      identity: createCompletionIdentity(request.reqId, request.model),
      content,
      reasoning,
      usage: calculateUsage(request.messages, content, reasoning),
    });
  }

  private async readSettled(signal: AbortSignal): Promise<{ content: string; reasoning: string }> {
    const result = await this.options.controller.awaitFinalContent(signal);
    if (!result.content) {
      throw new RelayError("empty_upstream_response", "Settled response element is empty");
    }
    return result;
  }

  private async *streamFrames(request: BridgeRequest, signal: AbortSignal): AsyncGenerator<string> {
    const identity = createCompletionIdentity(request.reqId, request.model);
    const { content, reasoning } = await this.readSettled(signal);

    if (reasoning) {
      yield encodeSseData(buildDeltaChunk(identity, { reasoning }));
    }

    for (const piece of sliceForStreaming(content, this.options.chunkSize)) {
      yield encodeSseData(buildDeltaChunk(identity, { content: piece.text }));
      await sleep(piece.newline ? this.options.newlineDelayMs : this.options.chunkDelayMs, signal);
    }

    yield encodeSseData(buildFinalChunk(identity, calculateUsage(request.messages, content, reasoning)));
    yield encodeSseData("[DONE]");
  }
}
