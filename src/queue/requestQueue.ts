import { RelayError } from "../errors.js";
import { AsyncFifo } from "../utils/asyncFifo.js";
import { Mutex } from "../utils/mutex.js";
import type { QueueItem, QueueItemStatus } from "./types.js";

export interface RequestQueueOptions {
  maxSize: number;
  retryAfterSec?: number;
}

/**
 * Bounded FIFO of admitted requests. The worker is its only consumer.
 */
export class RequestQueue {
  private readonly fifo = new AsyncFifo<QueueItem>();
  private readonly scanMutex = new Mutex();
  private readonly maxSize: number;
  private readonly retryAfterSec: number;
  private unfinishedCount = 0;
  private heldByScan = 0;

  public constructor(options: RequestQueueOptions) {
    this.maxSize = options.maxSize;
    this.retryAfterSec = options.retryAfterSec ?? 10;
  }

  public get size(): number {
    return this.fifo.size + this.heldByScan;
  }

  /** Items enqueued and not yet marked done, including the one in flight. */
  public get unfinished(): number {
    return this.unfinishedCount;
  }

  public enqueue(item: QueueItem): void {
    if (this.size >= this.maxSize) {
      throw new RelayError("queue_full", "Queue is full", { maxSize: this.maxSize }, this.retryAfterSec);
    }
    this.unfinishedCount += 1;
    this.fifo.push(item);
  }

  /** Head item, or `null` once `timeoutMs` passes with nothing queued. */
  public async dequeue(timeoutMs: number, signal?: AbortSignal): Promise<QueueItem | null> {
    const item = await this.fifo.shift(timeoutMs, signal);
    return item ?? null;
  }

  public markDone(): void {
    if (this.unfinishedCount > 0) {
      this.unfinishedCount -= 1;
    }
  }

  /**
   * Drains the queue, applies `mutate` to the items among the first `limit`
   * that match, and puts everything back in the original order even if
   * `predicate` or `mutate` throws. Scans run one at a time, so a scan never
   * sees the queue emptied by another one.
   */
  public async scanAndMark(
    predicate: (item: QueueItem) => boolean | Promise<boolean>,
    mutate: (item: QueueItem) => void | Promise<void>,
    limit = Number.POSITIVE_INFINITY,
  ): Promise<QueueItem[]> {
    return this.scanMutex.runExclusive(() => this.scanLocked(predicate, mutate, limit));
  }

  private async scanLocked(
    predicate: (item: QueueItem) => boolean | Promise<boolean>,
    mutate: (item: QueueItem) => void | Promise<void>,
    limit: number,
  ): Promise<QueueItem[]> {
    const buffer = this.fifo.drain();
    const matched: QueueItem[] = [];
    this.heldByScan += buffer.length;

    try {
      for (let index = 0; index < buffer.length && index < limit; index += 1) {
        const item = buffer[index];
        if (item && (await predicate(item))) {
          await mutate(item);
          matched.push(item);
        }
      }
    } finally {
      this.heldByScan -= buffer.length;
      this.requeueAhead(buffer);
    }

    return matched;
  }

  /** Status rows in queue order; nothing is reordered. */
  public async snapshot(now = Date.now()): Promise<QueueItemStatus[]> {
    const rows: QueueItemStatus[] = [];
    await this.scanAndMark(
      () => true,
      (item) => {
        rows.push({
          req_id: item.reqId,
          enqueue_time: item.enqueuedAt / 1000,
          wait_time_seconds: Math.round((now - item.enqueuedAt) / 10) / 100,
          is_streaming: item.payload.stream,
          cancelled: item.cancelled,
        });
      },
    );
    return rows;
  }

  /**
   * Items enqueued while the buffer was out (during an awaited predicate) land
   * behind the buffered ones.
   */
  private requeueAhead(buffer: QueueItem[]): void {
    const arrivedMeanwhile = this.fifo.drain();
    for (const item of buffer) {
      this.fifo.push(item);
    }
    for (const item of arrivedMeanwhile) {
      this.fifo.push(item);
    }
  }
}
