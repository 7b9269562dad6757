import type { Logger } from "pino";
import type { CaptureChannel } from "./captureChannel.js";
import { captureRecordError, isEmptyRecord, parseCaptureItem, type CaptureRecord } from "./records.js";

export interface CaptureReadOptions {
  /** Gap without any record after which a synthetic `internal_timeout` is yielded. */
  idleTimeoutMs: number;
  pollMs: number;
  signal: AbortSignal;
  logger: Logger;
}

export const INTERNAL_TIMEOUT_REASON = "internal_timeout";

/**
 * Yields capture records up to and including the first real `done` record.
 *
 * - An `error: true` record throws immediately.
 * - A `done` record with no content arriving as the very first record is a
 *   leftover from a previous exchange and is skipped once.
 */
export async function* readCaptureRecords(
  channel: CaptureChannel,
  options: CaptureReadOptions,
): AsyncGenerator<CaptureRecord> {
  let received = 0;
  let staleDoneIgnored = false;
  let lastActivityAt = Date.now();

  while (true) {
    const raw = await channel.read(options.pollMs, options.signal);

    if (raw === undefined) {
      if (Date.now() - lastActivityAt >= options.idleTimeoutMs) {
        options.logger.warn(
          { event: "capture_idle_timeout", received, idleTimeoutMs: options.idleTimeoutMs },
          "capture_idle_timeout",
        );
        yield { done: true, body: "", reason: INTERNAL_TIMEOUT_REASON, function: [] };
        return;
      }
      continue;
    }

    lastActivityAt = Date.now();
    const item = parseCaptureItem(raw);
    if (item.kind === "ready") {
      continue;
    }
    if (item.kind === "invalid") {
      options.logger.warn({ event: "capture_record_invalid", reason: item.reason }, "capture_record_invalid");
      continue;
    }

    const record = item.record;
    if (record.error === true) {
      throw captureRecordError(record);
    }

    received += 1;
    if (!record.done) {
      staleDoneIgnored = false;
      yield record;
      continue;
    }

    if (received === 1 && isEmptyRecord(record) && !staleDoneIgnored) {
      staleDoneIgnored = true;
      options.logger.warn({ event: "capture_stale_done_ignored" }, "capture_stale_done_ignored");
      continue;
    }

    yield record;
    return;
  }
}
