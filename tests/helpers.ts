import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import type { Logger } from "pino";
import { ScrapeBridge } from "../src/bridge/scrapeBridge.js";
import type { ResponseBridge } from "../src/bridge/types.js";
import { createLogger } from "../src/logger.js";
import { RequestProcessor } from "../src/pipeline/processor.js";
import { chatCompletionRequestSchema, type SamplingParameters } from "../src/pipeline/request.js";
import { SessionRecovery } from "../src/queue/recovery.js";
import { RequestQueue } from "../src/queue/requestQueue.js";
import { ResultPromise } from "../src/queue/resultPromise.js";
import type { ClientHandle, CompletionResult, QueueItem } from "../src/queue/types.js";
import { QueueWorker, type WorkerOptions } from "../src/queue/worker.js";
import { AuthProfileRotation } from "../src/session/authProfiles.js";
import type { FinalContent, ParamsCache, SessionController } from "../src/session/controller.js";
import { SessionState } from "../src/session/state.js";
import type { Mutex } from "../src/utils/mutex.js";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function testLogger(): Logger {
  return createLogger({ level: "error", format: "json" });
}

export class TestClient implements ClientHandle {
  public connected = true;

  public async isConnected(): Promise<boolean> {
    return this.connected;
  }
}

/** Pends until aborted, then rejects with the signal's reason. */
function untilAborted(signal?: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

export type ScriptedContent = FinalContent | Error | "hang";

export class FakeSessionController implements SessionController {
  public readonly calls: string[] = [];
  public readonly submittedPrompts: string[] = [];
  public readonly submittedAt: number[] = [];
  public readonly clearedAt: number[] = [];
  public readonly settledAt: number[] = [];
  public readonly appliedParameters: SamplingParameters[] = [];
  public readonly contents: ScriptedContent[] = [];
  public readonly switchResults = new Map<string, boolean>();
  public ready = true;
  public contentDelayMs = 0;
  public failReload = false;
  public onSubmit: (() => void) | null = null;

  public async isReady(): Promise<boolean> {
    return this.ready;
  }

  public async submit(prompt: string): Promise<void> {
    this.calls.push("submit");
    this.submittedPrompts.push(prompt);
    this.submittedAt.push(Date.now());
    this.onSubmit?.();
  }

  public async switchModel(modelId: string): Promise<boolean> {
    this.calls.push(`switchModel:${modelId}`);
    return this.switchResults.get(modelId) ?? true;
  }

  public async adjustParameters(
    params: SamplingParameters,
    _cache: ParamsCache,
    _cacheMutex: Mutex,
  ): Promise<void> {
    this.calls.push("adjustParameters");
    this.appliedParameters.push(params);
  }

  public async awaitFinalContent(signal?: AbortSignal): Promise<FinalContent> {
    this.calls.push("awaitFinalContent");
    const next = this.contents.shift() ?? { content: "", reasoning: "" };
    if (next === "hang") {
      return untilAborted(signal);
    }
    if (this.contentDelayMs > 0) {
      // Deliberately deaf to the signal, like a driver call mid-flight.
      await sleep(this.contentDelayMs);
    }
    this.settledAt.push(Date.now());
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }

  public async clearHistory(): Promise<void> {
    this.calls.push("clearHistory");
    this.clearedAt.push(Date.now());
  }

  public async reloadPage(): Promise<void> {
    this.calls.push("reloadPage");
    if (this.failReload) {
      throw new Error("reload failed");
    }
  }

  public async waitForInput(): Promise<void> {
    this.calls.push("waitForInput");
  }

  public async reconnect(profilePath: string): Promise<void> {
    this.calls.push(`reconnect:${basename(profilePath)}`);
  }

  public async close(): Promise<void> {
    this.calls.push("close");
  }
}

export function createProfilesDir(names: string[]): string {
  const directory = mkdtempSync(join(tmpdir(), "relay-profiles-"));
  for (const name of names) {
    writeFileSync(join(directory, name), JSON.stringify({ cookies: [], origins: [] }), "utf8");
  }
  return directory;
}

export function makeItem(
  reqId: string,
  options: { stream?: boolean; model?: string; client?: ClientHandle; cancelled?: boolean } = {},
): QueueItem {
  return {
    reqId,
    payload: chatCompletionRequestSchema.parse({
      model: options.model,
      messages: [{ role: "user", content: "hello" }],
      stream: options.stream ?? false,
    }),
    clientHandle: options.client ?? new TestClient(),
    result: new ResultPromise<CompletionResult>(),
    enqueuedAt: Date.now(),
    cancelled: options.cancelled ?? false,
  };
}

export interface Harness {
  logger: Logger;
  state: SessionState;
  controller: FakeSessionController;
  bridge: ResponseBridge;
  profiles: AuthProfileRotation;
  queue: RequestQueue;
  worker: QueueWorker;
}

export function buildHarness(overrides: {
  profiles?: string[];
  options?: Partial<WorkerOptions>;
  maxQueueSize?: number;
  bridge?: (controller: FakeSessionController) => ResponseBridge;
} = {}): Harness {
  const logger = testLogger();
  const state = new SessionState({
    supportedModels: ["model-a", "model-b"],
    initialModelId: "model-a",
    ready: true,
  });
  const controller = new FakeSessionController();
  const bridge = overrides.bridge?.(controller)
    ?? new ScrapeBridge({ controller, chunkSize: 1000, chunkDelayMs: 0, newlineDelayMs: 0 });
  const directory = createProfilesDir(overrides.profiles ?? ["a.json", "b.json"]);
  const profiles = new AuthProfileRotation({ directory, logger, initialProfile: join(directory, "a.json") });
  const queue = new RequestQueue({ maxSize: overrides.maxQueueSize ?? 10 });
  const processor = new RequestProcessor({ state, controller, bridge, proxyModelName: "relay-proxy" });
  const recovery = new SessionRecovery({
    controller,
    state,
    profiles,
    pageReloadTimeoutMs: 100,
    inputWaitTimeoutMs: 100,
    baselineModel: "model-a",
  });
  const worker = new QueueWorker({
    queue,
    state,
    processor,
    recovery,
    bridge,
    controller,
    logger,
    options: {
      dequeueTimeoutMs: 20,
      disconnectSweepLimit: 10,
      disconnectPollMs: 20,
      livenessCheckTimeoutMs: 50,
      streamPacingMs: 0,
      streamPacingMinMs: 0,
      maxAttempts: 3,
      deadlineMs: 2_000,
      clearHistoryAfterRequest: true,
      ...overrides.options,
    },
  });

  return { logger, state, controller, bridge, profiles, queue, worker };
}

export async function collect(frames: AsyncIterable<string>): Promise<string[]> {
  const collected: string[] = [];
  for await (const frame of frames) {
    collected.push(frame);
  }
  return collected;
}

/** Parses `data: {...}` frames, skipping the terminator. */
export function parseFrames(frames: string[]): unknown[] {
  return frames
    .filter((frame) => frame !== "data: [DONE]\n\n")
    .map((frame): unknown => JSON.parse(frame.slice("data: ".length)));
}
