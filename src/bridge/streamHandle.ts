import type { Logger } from "pino";
import { RelayError, toRelayError } from "../errors.js";
import { buildErrorChunk, encodeSseData } from "../http/sse.js";
import { CompletionSignal } from "../queue/completionSignal.js";

export type FrameSource = (signal: AbortSignal) => AsyncGenerator<string>;

/**
 * A response stream handed to the admitting handler. Frames are produced only
 * while the handler iterates them; `completion` fires exactly once when the
 * stream ends for any reason, or on `cancel` before iteration began.
 */
export class StreamHandle {
  public readonly completion = new CompletionSignal();
  private readonly controller = new AbortController();
  private readonly source: FrameSource;
  private readonly logger: Logger;
  private started = false;
  private failureValue: RelayError | undefined;

  public constructor(source: FrameSource, logger: Logger) {
    this.source = source;
    this.logger = logger;
  }

  public get failure(): RelayError | undefined {
    return this.failureValue;
  }

  public get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  public cancel(reason: RelayError): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
    if (!this.started) {
      this.failureValue ??= reason;
      this.completion.set();
    }
  }

  public frames(): AsyncGenerator<string> {
    if (this.started || this.completion.isSet()) {
      throw new RelayError("unknown", "Stream frames can only be consumed once");
    }
    this.started = true;
    return this.run();
  }

  private async *run(): AsyncGenerator<string> {
    const signal = this.controller.signal;
    try {
      yield* this.source(signal);
    } catch (error) {
      const relayError = signal.aborted ? toRelayError(signal.reason) : toRelayError(error);
      this.failureValue = relayError;
      this.logger.warn(
        { event: "stream_aborted", errorCode: relayError.code, message: relayError.message },
        "stream_aborted",
      );

      // Nobody is reading once the client is gone.
      if (relayError.code !== "client_gone") {
        yield encodeSseData(buildErrorChunk(relayError.message, relayError.code));
        yield encodeSseData("[DONE]");
      }
    } finally {
      this.completion.set();
    }
  }
}
