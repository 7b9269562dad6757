import { describe, expect, it } from "vitest";
import { RequestQueue } from "../src/queue/requestQueue.js";
import { makeItem, sleep } from "./helpers.js";

describe("RequestQueue", () => {
  it("rejects admission past its bound with queue_full", () => {
    const queue = new RequestQueue({ maxSize: 2, retryAfterSec: 7 });
    queue.enqueue(makeItem("r1"));
    queue.enqueue(makeItem("r2"));

    expect(() => queue.enqueue(makeItem("r3"))).toThrowError(
      expect.objectContaining({ code: "queue_full", retryAfterSec: 7 }),
    );
    expect(queue.size).toBe(2);
  });

  it("dequeues in FIFO order and returns null on timeout", async () => {
    const queue = new RequestQueue({ maxSize: 5 });
    queue.enqueue(makeItem("r1"));
    queue.enqueue(makeItem("r2"));

    expect((await queue.dequeue(10))?.reqId).toBe("r1");
    expect((await queue.dequeue(10))?.reqId).toBe("r2");
    await expect(queue.dequeue(10)).resolves.toBeNull();
  });

  it("counts unfinished items until marked done", async () => {
    const queue = new RequestQueue({ maxSize: 5 });
    queue.enqueue(makeItem("r1"));
    await queue.dequeue(10);

    expect(queue.size).toBe(0);
    expect(queue.unfinished).toBe(1);
    queue.markDone();
    expect(queue.unfinished).toBe(0);
  });

  it("marks matching items and preserves order", async () => {
    const queue = new RequestQueue({ maxSize: 5 });
    for (const id of ["r1", "r2", "r3"]) {
      queue.enqueue(makeItem(id));
    }

    const matched = await queue.scanAndMark(
      (item) => item.reqId === "r2",
      (item) => {
        item.cancelled = true;
      },
    );

    expect(matched.map((item) => item.reqId)).toEqual(["r2"]);
    const rows = await queue.snapshot();
    expect(rows.map((row) => [row.req_id, row.cancelled])).toEqual([
      ["r1", false],
      ["r2", true],
      ["r3", false],
    ]);
  });

  it("only inspects the first `limit` items", async () => {
    const queue = new RequestQueue({ maxSize: 5 });
    for (const id of ["r1", "r2", "r3"]) {
      queue.enqueue(makeItem(id));
    }

    const matched = await queue.scanAndMark(() => true, () => undefined, 2);

    expect(matched.map((item) => item.reqId)).toEqual(["r1", "r2"]);
    expect(queue.size).toBe(3);
  });

  it("puts items back even when the predicate throws", async () => {
    const queue = new RequestQueue({ maxSize: 5 });
    queue.enqueue(makeItem("r1"));
    queue.enqueue(makeItem("r2"));

    await expect(
      queue.scanAndMark(
        () => {
          throw new Error("predicate broke");
        },
        () => undefined,
      ),
    ).rejects.toThrow("predicate broke");

    expect((await queue.dequeue(10))?.reqId).toBe("r1");
    expect((await queue.dequeue(10))?.reqId).toBe("r2");
  });

  it("keeps items admitted during an async scan behind the scanned ones", async () => {
    const queue = new RequestQueue({ maxSize: 3 });
    queue.enqueue(makeItem("r1"));
    queue.enqueue(makeItem("r2"));

    const scanning = queue.scanAndMark(
      async () => {
        await sleep(5);
        return false;
      },
      () => undefined,
    );
    await sleep(1);
    queue.enqueue(makeItem("r3"));
    expect(() => queue.enqueue(makeItem("r4"))).toThrowError(expect.objectContaining({ code: "queue_full" }));
    await scanning;

    const order: string[] = [];
    for (let index = 0; index < 3; index += 1) {
      const item = await queue.dequeue(10);
      order.push(item?.reqId ?? "none");
    }
    expect(order).toEqual(["r1", "r2", "r3"]);
  });

  it("runs a scan issued during another one against the full queue", async () => {
    const queue = new RequestQueue({ maxSize: 5 });
    const target = makeItem("target");
    queue.enqueue(makeItem("slow"));
    queue.enqueue(target);

    const sweep = queue.scanAndMark(
      async () => {
        await sleep(30);
        return false;
      },
      () => undefined,
    );
    await sleep(5);
    const cancel = queue.scanAndMark(
      (item) => item.reqId === "target",
      (item) => {
        item.cancelled = true;
      },
    );
    const listing = queue.snapshot();

    await expect(sweep).resolves.toEqual([]);
    await expect(cancel).resolves.toEqual([target]);
    expect((await listing).map((row) => [row.req_id, row.cancelled])).toEqual([
      ["slow", false],
      ["target", true],
    ]);
    expect(queue.size).toBe(2);
  });

  it("reports waiting time in the snapshot", async () => {
    const queue = new RequestQueue({ maxSize: 5 });
    const item = makeItem("r1", { stream: true });
    item.enqueuedAt = 1_000;
    queue.enqueue(item);

    const [row] = await queue.snapshot(3_456);

    expect(row).toEqual({
      req_id: "r1",
      enqueue_time: 1,
      wait_time_seconds: 2.46,
      is_streaming: true,
      cancelled: false,
    });
  });
});
