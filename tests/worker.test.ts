import { afterEach, describe, expect, it } from "vitest";
import { RelayError } from "../src/errors.js";
import type { QueueWorker } from "../src/queue/worker.js";
import { TestClient, buildHarness, collect, makeItem, parseFrames } from "./helpers.js";

const running: QueueWorker[] = [];

function startWorker(worker: QueueWorker): void {
  running.push(worker);
  worker.start();
}

afterEach(async () => {
  await Promise.all(running.splice(0).map((worker) => worker.stop()));
});

describe("QueueWorker", () => {
  it("answers a non-streaming request and clears history afterwards", async () => {
    const harness = buildHarness();
    harness.controller.contents.push({ content: "hi there", reasoning: "" });
    const item = makeItem("req-json");
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    const outcome = await item.result.promise;
    if (outcome.kind !== "json") {
      throw new Error("expected a json result");
    }
    expect(outcome.payload.choices[0]?.message.content).toBe("hi there");
    expect(outcome.payload.id.startsWith("chatcmpl-req-json-")).toBe(true);

    await harness.worker.stop();
    expect(harness.controller.calls).toEqual(["adjustParameters", "submit", "awaitFinalContent", "clearHistory"]);
    expect(harness.queue.unfinished).toBe(0);
  });

  it("never interleaves two requests on the session", async () => {
    const harness = buildHarness();
    harness.controller.contentDelayMs = 30;
    harness.controller.contents.push({ content: "first", reasoning: "" }, { content: "second", reasoning: "" });
    const first = makeItem("req-1");
    const second = makeItem("req-2");
    harness.queue.enqueue(first);
    harness.queue.enqueue(second);
    startWorker(harness.worker);

    const [firstOutcome, secondOutcome] = await Promise.all([first.result.promise, second.result.promise]);
    expect(firstOutcome.kind === "json" && firstOutcome.payload.choices[0]?.message.content).toBe("first");
    expect(secondOutcome.kind === "json" && secondOutcome.payload.choices[0]?.message.content).toBe("second");

    await harness.worker.stop();
    expect(harness.controller.calls).toEqual([
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "clearHistory",
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "clearHistory",
    ]);
  });

  it("skips a request cancelled while queued without touching the session", async () => {
    const harness = buildHarness();
    const item = makeItem("req-cancelled", { cancelled: true });
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    await expect(item.result.promise).rejects.toMatchObject({ code: "cancelled" });
    await harness.worker.stop();
    expect(harness.controller.calls).toEqual([]);
  });

  it("rejects queued requests whose client already left", async () => {
    const harness = buildHarness();
    const client = new TestClient();
    client.connected = false;
    const item = makeItem("req-gone", { client });
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    await expect(item.result.promise).rejects.toMatchObject({ code: "client_gone" });
    await harness.worker.stop();
    expect(harness.controller.calls).toEqual([]);
  });

  it("aborts in-flight work when the client disconnects during processing", async () => {
    const harness = buildHarness();
    const client = new TestClient();
    harness.controller.onSubmit = () => {
      client.connected = false;
    };
    harness.controller.contents.push("hang");
    const item = makeItem("req-drop", { client });
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    await expect(item.result.promise).rejects.toMatchObject({ code: "client_gone" });
    await harness.worker.stop();
    expect(harness.controller.calls).toEqual(["adjustParameters", "submit", "awaitFinalContent", "clearHistory"]);
  });

  it("switches the auth profile straight away on quota exhaustion", async () => {
    const harness = buildHarness();
    harness.controller.contents.push(
      new RelayError("quota_exceeded", "Upstream quota exceeded: daily limit"),
      { content: "after rotation", reasoning: "" },
    );
    const item = makeItem("req-quota");
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    const outcome = await item.result.promise;
    expect(outcome.kind === "json" && outcome.payload.choices[0]?.message.content).toBe("after rotation");

    await harness.worker.stop();
    expect(harness.controller.calls).toEqual([
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "close",
      "reconnect:b.json",
      "switchModel:model-a",
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "clearHistory",
    ]);
    expect(harness.profiles.failedProfiles).toEqual(["a.json"]);
    expect(harness.state.currentModelId).toBe("model-a");
  });

  it("escalates from page refresh to profile switch on repeated empty responses", async () => {
    const harness = buildHarness();
    harness.controller.contents.push(
      { content: "", reasoning: "" },
      { content: "", reasoning: "" },
      { content: "", reasoning: "" },
    );
    const item = makeItem("req-empty");
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    await expect(item.result.promise).rejects.toMatchObject({ code: "empty_upstream_response" });
    await harness.worker.stop();
    expect(harness.controller.calls).toEqual([
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "reloadPage",
      "waitForInput",
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "close",
      "reconnect:b.json",
      "switchModel:model-a",
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "clearHistory",
    ]);
  });

  it("fails with recovery_exhausted when no other profile is left", async () => {
    const harness = buildHarness({ profiles: ["a.json"] });
    harness.controller.contents.push(new RelayError("quota_exceeded", "Upstream quota exceeded: daily limit"));
    const item = makeItem("req-exhausted");
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    await expect(item.result.promise).rejects.toMatchObject({
      code: "recovery_exhausted",
      message: "All authentication profiles exhausted. Failed: 1, Total: 1",
    });
  });

  it("reports a failed model switch without submitting", async () => {
    const harness = buildHarness();
    harness.controller.switchResults.set("model-b", false);
    const item = makeItem("req-model", { model: "vendor/model-b" });
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    await expect(item.result.promise).rejects.toMatchObject({ code: "model_switch_failed" });
    await harness.worker.stop();
    expect(harness.controller.calls).toEqual(["switchModel:model-b"]);
    expect(harness.state.currentModelId).toBe("model-a");
  });

  it("times out an attempt that outlives the deadline", async () => {
    const harness = buildHarness({ options: { deadlineMs: 100 } });
    harness.controller.contents.push("hang");
    const item = makeItem("req-slow");
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    await expect(item.result.promise).rejects.toMatchObject({ code: "timeout" });
  });

  it("keeps the session until a timed-out attempt has actually returned", async () => {
    const harness = buildHarness({ options: { deadlineMs: 100 } });
    harness.controller.contentDelayMs = 300;
    harness.controller.contents.push({ content: "late one", reasoning: "" }, { content: "late two", reasoning: "" });
    const first = makeItem("req-late-1");
    const second = makeItem("req-late-2");
    harness.queue.enqueue(first);
    harness.queue.enqueue(second);
    startWorker(harness.worker);

    await expect(first.result.promise).rejects.toMatchObject({ code: "timeout" });
    await expect(second.result.promise).rejects.toMatchObject({ code: "timeout" });
    await harness.worker.stop();

    const [firstSettled] = harness.controller.settledAt;
    const secondSubmitted = harness.controller.submittedAt[1];
    expect(firstSettled).toBeDefined();
    expect(secondSubmitted).toBeDefined();
    expect(secondSubmitted ?? 0).toBeGreaterThanOrEqual(firstSettled ?? Number.POSITIVE_INFINITY);
    expect(harness.controller.calls).toEqual([
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "clearHistory",
      "adjustParameters",
      "submit",
      "awaitFinalContent",
      "clearHistory",
    ]);
  });

  it("hands a stream to the caller and waits for it before the next request", async () => {
    const harness = buildHarness();
    harness.controller.contents.push({ content: "streamed text", reasoning: "" });
    const item = makeItem("req-stream", { stream: true });
    harness.queue.enqueue(item);
    startWorker(harness.worker);

    const outcome = await item.result.promise;
    if (outcome.kind !== "stream") {
      throw new Error("expected a stream result");
    }
    const frames = await collect(outcome.handle.frames());
    expect(frames).toHaveLength(3);
    expect(frames[2]).toBe("data: [DONE]\n\n");
    expect(parseFrames(frames)[0]).toMatchObject({
      object: "chat.completion.chunk",
      choices: [{ delta: { role: "assistant", content: "streamed text" }, finish_reason: null }],
    });

    await harness.worker.stop();
    expect(harness.controller.calls).toEqual(["adjustParameters", "submit", "awaitFinalContent", "clearHistory"]);
  });

  it("spaces back-to-back streaming requests", async () => {
    const harness = buildHarness({ options: { streamPacingMs: 200, streamPacingMinMs: 100 } });
    harness.controller.contents.push({ content: "one", reasoning: "" }, { content: "two", reasoning: "" });
    const first = makeItem("req-s1", { stream: true });
    const second = makeItem("req-s2", { stream: true });
    harness.queue.enqueue(first);
    harness.queue.enqueue(second);
    startWorker(harness.worker);

    for (const item of [first, second]) {
      const outcome = await item.result.promise;
      if (outcome.kind !== "stream") {
        throw new Error("expected a stream result");
      }
      await collect(outcome.handle.frames());
    }
    await harness.worker.stop();

    const [firstCleared] = harness.controller.clearedAt;
    const secondSubmitted = harness.controller.submittedAt[1];
    expect(firstCleared).toBeDefined();
    expect(secondSubmitted).toBeDefined();
    expect((secondSubmitted ?? 0) - (firstCleared ?? 0)).toBeGreaterThanOrEqual(95);
  });

  it("reports itself alive only while running", async () => {
    const harness = buildHarness();
    expect(harness.worker.isAlive()).toBe(false);
    startWorker(harness.worker);
    expect(harness.worker.isAlive()).toBe(true);
    await harness.worker.stop();
    expect(harness.worker.isAlive()).toBe(false);
  });
});
