import type { Logger } from "pino";
import { RelayError } from "../errors.js";
import type { SessionSnapshot, SessionState } from "../session/state.js";
import type { ChatRequest } from "./request.js";

export interface RequestContext {
  reqId: string;
  logger: Logger;
  isStreaming: boolean;
  sessionSnapshot: SessionSnapshot;
  requestedModel: string | null;
  /** Model reported back to the caller. */
  responseModel: string;
  modelIdToUse: string | null;
  modelSwitchNeeded: boolean;
  modelSwitchedThisRequest: boolean;
}

export interface ModelPolicy {
  proxyModelName: string;
  supportedModels: readonly string[];
}

/**
 * Resolves which model the request needs. `provider/model` ids are reduced to
 * their last segment; the proxy's own name means "whatever is loaded".
 */
export function analyzeModelRequest(
  requestedModel: string | undefined,
  currentModelId: string | null,
  policy: ModelPolicy,
  reqId: string,
): Pick<RequestContext, "requestedModel" | "modelIdToUse" | "modelSwitchNeeded" | "responseModel"> {
  if (!requestedModel || requestedModel === policy.proxyModelName) {
    return {
      requestedModel: requestedModel ?? null,
      modelIdToUse: null,
      modelSwitchNeeded: false,
      responseModel: currentModelId ?? policy.proxyModelName,
    };
  }

  const modelId = requestedModel.split("/").pop() ?? requestedModel;
  if (policy.supportedModels.length > 0 && !policy.supportedModels.includes(modelId)) {
    throw new RelayError(
      "invalid_request",
      `Invalid model '${modelId}'. Available models: ${policy.supportedModels.join(", ")}`,
      { reqId, requestedModel },
    );
  }

  return {
    requestedModel,
    modelIdToUse: modelId,
    modelSwitchNeeded: currentModelId !== modelId,
    responseModel: modelId,
  };
}

export function initRequestContext(params: {
  reqId: string;
  logger: Logger;
  payload: ChatRequest;
  state: SessionState;
  proxyModelName: string;
}): RequestContext {
  const snapshot = params.state.snapshot();
  const model = analyzeModelRequest(
    params.payload.model,
    snapshot.modelId,
    { proxyModelName: params.proxyModelName, supportedModels: params.state.supportedModels },
    params.reqId,
  );

  params.logger.debug(
    { event: "request_context_initialized", model: params.payload.model, stream: params.payload.stream },
    "request_context_initialized",
  );

  return {
    reqId: params.reqId,
    logger: params.logger,
    isStreaming: params.payload.stream,
    sessionSnapshot: snapshot,
    ...model,
    modelSwitchedThisRequest: false,
  };
}
