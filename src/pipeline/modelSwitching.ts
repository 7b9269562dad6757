import { RelayError } from "../errors.js";
import type { SessionController } from "../session/controller.js";
import type { SessionState } from "../session/state.js";
import type { RequestContext } from "./context.js";

/**
 * Switches the session model when the request needs a different one. The
 * shared model id is only read and written under the model-switch mutex.
 */
export async function switchModelIfNeeded(
  context: RequestContext,
  state: SessionState,
  controller: SessionController,
  signal?: AbortSignal,
): Promise<void> {
  const target = context.modelIdToUse;
  if (!context.modelSwitchNeeded || !target) {
    return;
  }

  await state.modelSwitchMutex.runExclusive(async () => {
    const before = state.currentModelId;
    if (before === target) {
      return;
    }

    const switched = await controller.switchModel(target, signal);
    if (!switched) {
      state.currentModelId = before;
      context.logger.warn({ event: "model_switch_failed", from: before, to: target }, "model_switch_failed");
      throw new RelayError("model_switch_failed", `Failed to switch to model '${target}'`, {
        reqId: context.reqId,
        model: target,
      });
    }

    state.currentModelId = target;
    context.modelSwitchedThisRequest = true;
    context.sessionSnapshot = state.snapshot();
    context.logger.info({ event: "model_switched", from: before, to: target }, "model_switched");
  });
}

/**
 * Invalidates cached parameter values when they were applied under another
 * model.
 */
export async function syncParamsCache(context: RequestContext, state: SessionState): Promise<void> {
  await state.paramsCacheMutex.runExclusive(async () => {
    const currentModel = state.currentModelId;
    if (context.modelSwitchedThisRequest || state.paramsCache.lastKnownModelId !== currentModel) {
      state.clearParamsCache();
      state.paramsCache.lastKnownModelId = currentModel;
      context.logger.debug({ event: "params_cache_cleared", model: currentModel }, "params_cache_cleared");
    }
  });
}
