import type { Logger } from "pino";
import type { StreamHandle } from "../bridge/streamHandle.js";
import type { ResponseBridge } from "../bridge/types.js";
import { RelayError } from "../errors.js";
import type { QueueItem } from "../queue/types.js";
import type { SessionController } from "../session/controller.js";
import type { SessionState } from "../session/state.js";
import { initRequestContext } from "./context.js";
import { switchModelIfNeeded, syncParamsCache } from "./modelSwitching.js";
import { renderPrompt, usageMessages, validateMessages } from "./prompt.js";
import { samplingParameters } from "./request.js";

export type AttemptOutcome =
  | { kind: "stream_started"; handle: StreamHandle }
  | { kind: "completed" };

export interface AttemptOptions {
  logger: Logger;
  signal: AbortSignal;
  /** Called once the prompt has reached the session. */
  onSubmitted: () => void;
}

export interface RequestProcessorDeps {
  state: SessionState;
  controller: SessionController;
  bridge: ResponseBridge;
  proxyModelName: string;
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw signal.reason;
  }
}

/**
 * One attempt at one request: model switch, parameter sync, submit, then hand
 * the bridge's result to the waiting caller. Runs under the session mutex.
 */
export class RequestProcessor {
  private readonly deps: RequestProcessorDeps;

  public constructor(deps: RequestProcessorDeps) {
    this.deps = deps;
  }

  public async runAttempt(item: QueueItem, options: AttemptOptions): Promise<AttemptOutcome> {
    const { state, controller, bridge } = this.deps;
    const { logger, signal } = options;

    const context = initRequestContext({
      reqId: item.reqId,
      logger,
      payload: item.payload,
      state,
      proxyModelName: this.deps.proxyModelName,
    });

    if (!context.sessionSnapshot.isReady) {
      throw new RelayError("session_not_ready", "Browser session is not ready", { reqId: item.reqId }, 30);
    }
    validateMessages(item.payload.messages, item.reqId);

    await switchModelIfNeeded(context, state, controller, signal);
    await syncParamsCache(context, state);
    throwIfAborted(signal);

    await controller.adjustParameters(samplingParameters(item.payload), state.paramsCache, state.paramsCacheMutex, signal);
    throwIfAborted(signal);

    const prompt = renderPrompt(item.payload.messages, item.payload.tools);
    await controller.submit(prompt, item.payload.attachments ?? [], signal);
    options.onSubmitted();
    logger.info(
      { event: "prompt_submitted", promptChars: prompt.length, stream: context.isStreaming, bridge: bridge.kind },
      "prompt_submitted",
    );

    const bridgeRequest = {
      reqId: item.reqId,
      model: context.responseModel,
      messages: usageMessages(item.payload.messages),
      logger,
      signal,
    };

    if (context.isStreaming) {
      throwIfAborted(signal);
      const handle = bridge.openStream(bridgeRequest);
      if (!item.result.resolve({ kind: "stream", handle })) {
        // The caller already has its outcome (gone, cancelled or timed out).
        handle.cancel(new RelayError("cancelled", "Request settled before the stream started"));
      }
      return { kind: "stream_started", handle };
    }

    const payload = await bridge.complete(bridgeRequest);
    throwIfAborted(signal);
    if (!item.result.resolve({ kind: "json", payload })) {
      logger.warn({ event: "result_already_settled" }, "result_already_settled");
    }
    return { kind: "completed" };
  }
}
