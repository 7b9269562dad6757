import { describe, expect, it } from "vitest";
import { ScrapeBridge, sliceForStreaming } from "../src/bridge/scrapeBridge.js";
import type { BridgeRequest } from "../src/bridge/types.js";
import { FakeSessionController, collect, parseFrames, testLogger } from "./helpers.js";

function setup(chunkSize = 2) {
  const controller = new FakeSessionController();
  const bridge = new ScrapeBridge({ controller, chunkSize, chunkDelayMs: 0, newlineDelayMs: 0 });
  const request: BridgeRequest = {
    reqId: "scr-1",
    model: "model-b",
    messages: [{ role: "user", text: "hi" }],
    logger: testLogger(),
    signal: new AbortController().signal,
  };
  return { controller, bridge, request };
}

describe("sliceForStreaming", () => {
  it("slices each line and emits newlines on their own", () => {
    expect(sliceForStreaming("abcde\nfg", 2)).toEqual([
      { text: "ab", newline: false },
      { text: "cd", newline: false },
      { text: "e", newline: false },
      { text: "\n", newline: true },
      { text: "fg", newline: false },
    ]);
  });

  it("keeps a trailing newline and yields nothing for empty text", () => {
    expect(sliceForStreaming("a\n", 5)).toEqual([
      { text: "a", newline: false },
      { text: "\n", newline: true },
    ]);
    expect(sliceForStreaming("", 5)).toEqual([]);
  });
});

describe("ScrapeBridge", () => {
  it("builds a completion from the settled text", async () => {
    const { controller, bridge, request } = setup();
    controller.contents.push({ content: "hello", reasoning: "pondering" });

    const payload = await bridge.complete(request);

    expect(payload.model).toBe("model-b");
    expect(payload.choices[0]?.message).toEqual({
      role: "assistant",
      content: "hello",
      reasoning_content: "pondering",
    });
    expect(payload.choices[0]?.finish_reason).toBe("stop");
  });

  it("replays the settled text as paced pieces", async () => {
    const { controller, bridge, request } = setup();
    controller.contents.push({ content: "abc", reasoning: "" });

    const frames = await collect(bridge.openStream(request).frames());

    expect(frames).toHaveLength(4);
    const chunks = parseFrames(frames);
    expect(chunks[0]).toMatchObject({ choices: [{ delta: { content: "ab" } }] });
    expect(chunks[1]).toMatchObject({ choices: [{ delta: { content: "c" } }] });
    expect(chunks[2]).toMatchObject({ choices: [{ finish_reason: "stop" }] });
    expect(frames[3]).toBe("data: [DONE]\n\n");
  });

  it("rejects an empty settled response", async () => {
    const { controller, bridge, request } = setup();
    controller.contents.push({ content: "", reasoning: "only thoughts" });

    await expect(bridge.complete(request)).rejects.toMatchObject({
      code: "empty_upstream_response",
      message: "Settled response element is empty",
    });
  });
});
