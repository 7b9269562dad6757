import type { Logger } from "pino";
import { RelayError } from "../errors.js";
import {
  buildChatCompletion,
  buildDeltaChunk,
  buildFinalChunk,
  createCompletionIdentity,
  encodeSseData,
  type ChatCompletionPayload,
  type FunctionCall,
} from "../http/sse.js";
import { calculateUsage } from "../utils/tokens.js";
import type { CaptureChannel } from "./captureChannel.js";
import { INTERNAL_TIMEOUT_REASON, readCaptureRecords } from "./captureStream.js";
import type { CaptureRecord } from "./records.js";
import { StreamHandle } from "./streamHandle.js";
import type { BridgeRequest, ResponseBridge } from "./types.js";

export interface CaptureBridgeOptions {
  channel: CaptureChannel;
  idleTimeoutMs: number;
  pollMs: number;
}

function toFunctionCalls(record: CaptureRecord): FunctionCall[] {
  return record.function.map((call) => ({ name: call.name, params: call.params }));
}

/**
 * Reads the records an out-of-process agent captures from the session's own
 * traffic. The agent resends cumulative text, so streaming diffs against the
 * last seen length.
 */
export class CaptureChannelBridge implements ResponseBridge {
  public readonly kind = "capture";
  private readonly options: CaptureBridgeOptions;

  public constructor(options: CaptureBridgeOptions) {
    this.options = options;
  }

  public reset(logger: Logger): void {
    const dropped = this.options.channel.drain();
    if (dropped > 0) {
      logger.debug({ event: "capture_channel_drained", dropped }, "capture_channel_drained");
    }
  }

  public openStream(request: BridgeRequest): StreamHandle {
    return new StreamHandle((signal) => this.streamFrames(request, signal), request.logger);
  }

  public async complete(request: BridgeRequest): Promise<ChatCompletionPayload> {
    let body = "";
    let reason = "";
    let functions: FunctionCall[] = [];
    let completed = false;

    for await (const record of this.records(request, request.signal)) {
      if (record.done && record.reason === INTERNAL_TIMEOUT_REASON) {
        throw new RelayError("internal_timeout", "Capture channel produced no completion in time");
      }
      if (record.body) body = record.body;
      if (record.reason) reason = record.reason;
      if (record.done) {
        functions = toFunctionCalls(record);
        completed = true;
      }
    }

    if (!completed) {
      throw new RelayError("empty_upstream_response", "Capture channel ended without a completion record");
    }
    if (!body && functions.length === 0) {
      throw new RelayError("empty_upstream_response", "Upstream finished without content or function calls", {
        reasoningChars: reason.length,
      });
    }

    request.logger.info(
      { event: "capture_completed", contentChars: body.length, reasoningChars: reason.length, functions: functions.length },
      "capture_completed",
    );
    return buildChatCompletion({
      identity: createCompletionIdentity(request.reqId, request.model),
      content: body,
      reasoning: reason,
      functions,
      usage: calculateUsage(request.messages, body, reason),
    });
  }

  private records(request: BridgeRequest, signal: AbortSignal): AsyncGenerator<CaptureRecord> {
    return readCaptureRecords(this.options.channel, {
      idleTimeoutMs: this.options.idleTimeoutMs,
      pollMs: this.options.pollMs,
      signal,
      logger: request.logger,
    });
  }

  private async *streamFrames(request: BridgeRequest, signal: AbortSignal): AsyncGenerator<string> {
    const identity = createCompletionIdentity(request.reqId, request.model);
    let lastBodyPos = 0;
    let lastReasonPos = 0;
    let body = "";
    let reason = "";

    for await (const record of this.records(request, signal)) {
      if (record.done && record.reason === INTERNAL_TIMEOUT_REASON) {
        throw new RelayError("internal_timeout", "Capture channel produced no completion in time");
      }

      if (record.reason) reason = record.reason;
      if (record.body) body = record.body;

      if (record.reason.length > lastReasonPos) {
        yield encodeSseData(buildDeltaChunk(identity, { reasoning: record.reason.slice(lastReasonPos) }));
        lastReasonPos = record.reason.length;
      }
      if (record.body.length > lastBodyPos) {
        yield encodeSseData(buildDeltaChunk(identity, { content: record.body.slice(lastBodyPos) }));
        lastBodyPos = record.body.length;
      }

      if (record.done) {
        const functions = toFunctionCalls(record);
        if (!body && functions.length === 0) {
          throw new RelayError("empty_upstream_response", "Upstream finished without content or function calls");
        }
        yield encodeSseData(buildFinalChunk(identity, calculateUsage(request.messages, body, reason), functions));
        yield encodeSseData("[DONE]");
        request.logger.info(
          { event: "capture_stream_completed", contentChars: body.length, reasoningChars: reason.length },
          "capture_stream_completed",
        );
        return;
      }
    }
  }
}
