import type { Logger } from "pino";
import { RelayError } from "../errors.js";
import { sleep } from "../utils/time.js";
import type { ClientHandle } from "./types.js";

/**
 * A check that throws or outlives `timeoutMs` counts as gone.
 */
export async function checkClient(handle: ClientHandle, timeoutMs: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), timeoutMs);
  });

  try {
    return await Promise.race([handle.isConnected().catch(() => false), timedOut]);
  } finally {
    if (timer) {
      clearTimeout(timer);
    }
  }
}

export interface DisconnectWatcherOptions {
  handle: ClientHandle;
  intervalMs: number;
  checkTimeoutMs: number;
  logger: Logger;
  onDisconnect: () => void;
}

/**
 * Polls a client's liveness until stopped; calls `onDisconnect` at most once
 * and then exits. `stop()` resolves only after the polling loop has ended.
 */
export class DisconnectWatcher {
  private readonly options: DisconnectWatcherOptions;
  private readonly controller = new AbortController();
  private loop: Promise<void> | null = null;
  private fired = false;

  public constructor(options: DisconnectWatcherOptions) {
    this.options = options;
  }

  public get disconnected(): boolean {
    return this.fired;
  }

  public start(): this {
    if (!this.loop) {
      this.loop = this.run();
    }
    return this;
  }

  public async stop(): Promise<void> {
    this.controller.abort();
    await this.loop;
  }

  private async run(): Promise<void> {
    const signal = this.controller.signal;
    while (!signal.aborted) {
      try {
        await sleep(this.options.intervalMs, signal);
      } catch {
        return;
      }

      const connected = await checkClient(this.options.handle, this.options.checkTimeoutMs);
      if (signal.aborted) {
        return;
      }
      if (!connected) {
        this.fired = true;
        this.options.logger.info({ event: "client_disconnected" }, "client_disconnected");
        try {
          this.options.onDisconnect();
        } catch (error) {
          this.options.logger.error(
            { event: "disconnect_handler_failed", message: error instanceof Error ? error.message : String(error) },
            "disconnect_handler_failed",
          );
        }
        return;
      }
    }
  }
}

export function clientGoneError(reqId: string): RelayError {
  return new RelayError("client_gone", "Client disconnected", { reqId });
}

/**
 * Watches while a non-streaming request is being processed: settles the
 * result with `client_gone` and aborts the in-flight work.
 */
export function watchWhileProcessing(params: {
  reqId: string;
  handle: ClientHandle;
  intervalMs: number;
  checkTimeoutMs: number;
  logger: Logger;
  reject: (error: RelayError) => void;
  abort: AbortController;
}): DisconnectWatcher {
  return new DisconnectWatcher({
    handle: params.handle,
    intervalMs: params.intervalMs,
    checkTimeoutMs: params.checkTimeoutMs,
    logger: params.logger,
    onDisconnect: () => {
      const error = clientGoneError(params.reqId);
      params.reject(error);
      params.abort.abort(error);
    },
  }).start();
}

/**
 * Watches while a response streams: cancels the stream, which fires its
 * completion signal.
 */
export function watchWhileStreaming(params: {
  reqId: string;
  handle: ClientHandle;
  intervalMs: number;
  checkTimeoutMs: number;
  logger: Logger;
  cancel: (error: RelayError) => void;
}): DisconnectWatcher {
  return new DisconnectWatcher({
    handle: params.handle,
    intervalMs: params.intervalMs,
    checkTimeoutMs: params.checkTimeoutMs,
    logger: params.logger,
    onDisconnect: () => params.cancel(clientGoneError(params.reqId)),
  }).start();
}
