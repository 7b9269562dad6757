import type { Logger } from "pino";
import type { StreamHandle } from "../bridge/streamHandle.js";
import type { ResponseBridge } from "../bridge/types.js";
import {
  RelayError,
  isClientAbort,
  isQuotaFailure,
  isTerminalError,
  toRelayError,
} from "../errors.js";
import { createRequestLogger } from "../logger.js";
import type { RequestProcessor } from "../pipeline/processor.js";
import type { SessionController } from "../session/controller.js";
import type { SessionState } from "../session/state.js";
import { sleep, withTimeout } from "../utils/time.js";
import { clientGoneError, checkClient, watchWhileProcessing, watchWhileStreaming } from "./disconnectWatcher.js";
import type { SessionRecovery } from "./recovery.js";
import type { RequestQueue } from "./requestQueue.js";
import type { QueueItem } from "./types.js";

export interface WorkerOptions {
  dequeueTimeoutMs: number;
  disconnectSweepLimit: number;
  disconnectPollMs: number;
  livenessCheckTimeoutMs: number;
  streamPacingMs: number;
  streamPacingMinMs: number;
  maxAttempts: number;
  /** Ceiling on one attempt and on waiting for a started stream to finish. */
  deadlineMs: number;
  clearHistoryAfterRequest: boolean;
}

export interface QueueWorkerDeps {
  queue: RequestQueue;
  state: SessionState;
  processor: RequestProcessor;
  recovery: SessionRecovery;
  bridge: ResponseBridge;
  controller: SessionController;
  logger: Logger;
  options: WorkerOptions;
}

interface ItemRun {
  item: QueueItem;
  logger: Logger;
  submitted: boolean;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Sole consumer of the request queue. Holds the session mutex for the whole
 * of one request, retries included, so no two requests ever interleave on
 * the session.
 */
export class QueueWorker {
  private readonly deps: QueueWorkerDeps;
  private readonly shutdown = new AbortController();
  private loop: Promise<void> | null = null;
  private running = false;
  private lastWasStreaming = false;
  private lastCompletedAt: number | null = null;

  public constructor(deps: QueueWorkerDeps) {
    this.deps = deps;
  }

  public isAlive(): boolean {
    return this.running;
  }

  public start(): void {
    if (this.loop) {
      return;
    }
    this.running = true;
    this.loop = this.run();
  }

  public async stop(): Promise<void> {
    if (!this.shutdown.signal.aborted) {
      this.shutdown.abort(new RelayError("shutdown", "Relay is shutting down"));
    }
    await this.loop;
  }

  private async run(): Promise<void> {
    const { queue, logger, options } = this.deps;
    const signal = this.shutdown.signal;
    logger.info({ event: "worker_started" }, "worker_started");

    try {
      while (!signal.aborted) {
        await this.sweepDisconnected();

        let item: QueueItem | null;
        try {
          item = await queue.dequeue(options.dequeueTimeoutMs, signal);
        } catch (error) {
          if (signal.aborted) {
            break;
          }
          throw error;
        }
        if (!item) {
          continue;
        }

        try {
          await this.processItem(item);
        } catch (error) {
          const relayError = toRelayError(error);
          item.result.reject(relayError);
          logger.error(
            { rid: item.reqId, event: "worker_item_failed", errorCode: relayError.code, message: relayError.message },
            "worker_item_failed",
          );
        }
      }
    } catch (error) {
      logger.error({ event: "worker_crashed", message: errorMessage(error) }, "worker_crashed");
    } finally {
      this.running = false;
      logger.info({ event: "worker_stopped", shutdown: signal.aborted }, "worker_stopped");
    }
  }

  /** Cancels queued requests whose callers already left. */
  private async sweepDisconnected(): Promise<void> {
    const { queue, options, logger } = this.deps;
    if (queue.size === 0) {
      return;
    }

    const gone = await queue.scanAndMark(
      async (item) => !item.cancelled && !(await checkClient(item.clientHandle, options.livenessCheckTimeoutMs)),
      (item) => {
        item.cancelled = true;
        item.result.reject(clientGoneError(item.reqId));
      },
      options.disconnectSweepLimit,
    );

    if (gone.length > 0) {
      logger.info(
        { event: "queue_disconnect_sweep", cancelled: gone.map((item) => item.reqId) },
        "queue_disconnect_sweep",
      );
    }
  }

  private async processItem(item: QueueItem): Promise<void> {
    const { queue, state, options } = this.deps;
    const logger = createRequestLogger(this.deps.logger, item.reqId);
    const waitedMs = Date.now() - item.enqueuedAt;

    try {
      if (item.cancelled) {
        item.result.reject(new RelayError("cancelled", "Request was cancelled", { reqId: item.reqId }));
        logger.info({ event: "request_skipped_cancelled", waitedMs }, "request_skipped_cancelled");
        return;
      }
      if (!(await checkClient(item.clientHandle, options.livenessCheckTimeoutMs))) {
        item.result.reject(clientGoneError(item.reqId));
        logger.info({ event: "request_skipped_client_gone", waitedMs }, "request_skipped_client_gone");
        return;
      }

      await this.pace(item.payload.stream, logger);

      const release = await state.sessionMutex.acquire();
      const run: ItemRun = { item, logger, submitted: false };
      try {
        logger.info({ event: "request_processing_started", waitedMs, stream: item.payload.stream }, "request_processing_started");
        if (!(await checkClient(item.clientHandle, options.livenessCheckTimeoutMs))) {
          item.result.reject(clientGoneError(item.reqId));
          logger.info({ event: "request_client_gone_after_lock" }, "request_client_gone_after_lock");
          return;
        }
        await this.runAttempts(run);
      } finally {
        await this.postProcess(run);
        release();
        this.lastWasStreaming = item.payload.stream;
        this.lastCompletedAt = Date.now();
      }
    } finally {
      queue.markDone();
    }
  }

  /**
   * Back-to-back streaming requests are spaced out so the session's own
   * rendering settles between them.
   */
  private async pace(isStreaming: boolean, logger: Logger): Promise<void> {
    const { streamPacingMs, streamPacingMinMs } = this.deps.options;
    if (!isStreaming || !this.lastWasStreaming || this.lastCompletedAt === null) {
      return;
    }

    const elapsed = Date.now() - this.lastCompletedAt;
    if (elapsed >= streamPacingMs) {
      return;
    }

    const delayMs = Math.max(streamPacingMinMs, streamPacingMs - elapsed);
    logger.debug({ event: "stream_pacing_delay", delayMs }, "stream_pacing_delay");
    await sleep(delayMs, this.shutdown.signal);
  }

  private async runAttempts(run: ItemRun): Promise<void> {
    const { processor, options } = this.deps;
    const { item, logger } = run;
    const attemptAbort = new AbortController();
    const onShutdown = () => attemptAbort.abort(this.shutdown.signal.reason);
    this.shutdown.signal.addEventListener("abort", onShutdown, { once: true });

    const watcher = watchWhileProcessing({
      reqId: item.reqId,
      handle: item.clientHandle,
      intervalMs: options.disconnectPollMs,
      checkTimeoutMs: options.livenessCheckTimeoutMs,
      logger,
      reject: (error) => item.result.reject(error),
      abort: attemptAbort,
    });

    try {
      for (let attempt = 1; attempt <= options.maxAttempts; attempt += 1) {
        const attemptRun = processor.runAttempt(item, {
          logger,
          signal: attemptAbort.signal,
          onSubmitted: () => {
            run.submitted = true;
          },
        });
        try {
          const outcome = await withTimeout(
            attemptRun,
            options.deadlineMs,
            () => new RelayError("timeout", "Request processing timed out", { deadlineMs: options.deadlineMs }),
          );

          logger.info({ event: "attempt_succeeded", attempt, outcome: outcome.kind }, "attempt_succeeded");
          if (outcome.kind === "stream_started") {
            await watcher.stop();
            await this.awaitStream(run, outcome.handle, attempt);
          }
          return;
        } catch (error) {
          const relayError = attemptAbort.signal.aborted ? toRelayError(attemptAbort.signal.reason) : toRelayError(error);
          if (relayError.code === "timeout" && !attemptAbort.signal.aborted) {
            attemptAbort.abort(relayError);
          }

          logger.warn(
            { event: "attempt_failed", attempt, errorCode: relayError.code, message: relayError.message },
            "attempt_failed",
          );

          const terminal = isTerminalError(relayError) || item.result.isSettled();
          if (terminal) {
            item.result.reject(relayError);
          }
          // Session calls that ignore the signal must finish before anything
          // else touches the session.
          await attemptRun.catch(() => undefined);
          if (terminal) {
            return;
          }

          await this.recover(relayError, attempt, logger);
          if (attempt >= options.maxAttempts) {
            item.result.reject(relayError);
            return;
          }
        }
      }
    } catch (error) {
      // Recovery itself failed terminally.
      const relayError = toRelayError(error);
      logger.error({ event: "recovery_failed", errorCode: relayError.code, message: relayError.message }, "recovery_failed");
      item.result.reject(relayError);
    } finally {
      this.shutdown.signal.removeEventListener("abort", onShutdown);
      await watcher.stop();
    }
  }

  /**
   * Quota failures go straight to a profile switch on any attempt. Other
   * failures escalate with the attempt number; the final attempt only
   * recovers on quota so the next request meets a fresh profile.
   */
  private async recover(error: RelayError, attempt: number, logger: Logger): Promise<void> {
    const { recovery, options } = this.deps;
    if (isQuotaFailure(error)) {
      logger.warn({ event: "quota_fast_path", attempt }, "quota_fast_path");
      await recovery.switchAuthProfile(logger);
      return;
    }
    if (attempt >= options.maxAttempts) {
      return;
    }
    if (attempt === 1) {
      await recovery.refreshPage(logger);
      return;
    }
    await recovery.switchAuthProfile(logger);
  }

  private async awaitStream(run: ItemRun, handle: StreamHandle, attempt: number): Promise<void> {
    const { options } = this.deps;
    const { item, logger } = run;
    const watcher = watchWhileStreaming({
      reqId: item.reqId,
      handle: item.clientHandle,
      intervalMs: options.disconnectPollMs,
      checkTimeoutMs: options.livenessCheckTimeoutMs,
      logger,
      cancel: (error) => handle.cancel(error),
    });

    try {
      await withTimeout(
        handle.completion.wait(this.shutdown.signal),
        options.deadlineMs,
        () => new RelayError("timeout", "Stream did not complete in time", { deadlineMs: options.deadlineMs }),
      );
    } catch (error) {
      const relayError = toRelayError(error);
      logger.warn({ event: "stream_wait_aborted", errorCode: relayError.code }, "stream_wait_aborted");
      handle.cancel(relayError);
    } finally {
      await watcher.stop();
    }

    const failure = handle.failure;
    if (!failure || isClientAbort(failure) || isTerminalError(failure)) {
      logger.info({ event: "stream_finished", errorCode: failure?.code }, "stream_finished");
      return;
    }

    // The caller already holds the stream, so there is no retry; recover so
    // the next request finds a usable session.
    logger.warn({ event: "stream_failed_after_start", errorCode: failure.code }, "stream_failed_after_start");
    try {
      await this.recover(failure, attempt, logger);
    } catch (error) {
      logger.error({ event: "recovery_failed", message: errorMessage(error) }, "recovery_failed");
    }
  }

  /** Failures here are logged and never touch the settled result. */
  private async postProcess(run: ItemRun): Promise<void> {
    const { bridge, controller, options } = this.deps;
    try {
      bridge.reset(run.logger);
    } catch (error) {
      run.logger.warn({ event: "bridge_reset_failed", message: errorMessage(error) }, "bridge_reset_failed");
    }

    if (run.submitted && options.clearHistoryAfterRequest) {
      try {
        await controller.clearHistory();
      } catch (error) {
        run.logger.warn({ event: "clear_history_failed", message: errorMessage(error) }, "clear_history_failed");
      }
    }
  }
}
