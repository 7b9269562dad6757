import { type Request, type Response, Router } from "express";
import { nanoid } from "nanoid";
import type { Logger } from "pino";
import { handlerDeadlineMs, type RelayConfig } from "../config.js";
import { RelayError, httpStatusForError, isClientAbort, toRelayError } from "../errors.js";
import { createRequestLogger } from "../logger.js";
import { chatCompletionRequestSchema } from "../pipeline/request.js";
import { clientGoneError } from "../queue/disconnectWatcher.js";
import type { RequestQueue } from "../queue/requestQueue.js";
import { ResultPromise } from "../queue/resultPromise.js";
import type { CompletionResult, QueueItem } from "../queue/types.js";
import type { SessionState } from "../session/state.js";
import type { StreamHandle } from "../bridge/streamHandle.js";
import { withTimeout } from "../utils/time.js";
import { HttpClientHandle } from "./clientHandle.js";
import { setupSseHeaders } from "./sse.js";

export interface WorkerStatus {
  isAlive(): boolean;
}

export interface OpenAiRouteDependencies {
  config: RelayConfig;
  logger: Logger;
  queue: RequestQueue;
  state: SessionState;
  worker: WorkerStatus;
}

interface ErrorResponseShape {
  message: string;
  code: string;
  status: number;
  retryAfterSec?: number;
}

export interface OpenAiErrorPayload {
  error: {
    message: string;
    type: "relay_error";
    code: string;
    param: null;
  };
}

const SESSION_RETRY_AFTER_SEC = 30;

export function getRequestId(req: Request, res: Response): string {
  const existing: unknown = res.locals.rid;
  if (typeof existing === "string" && existing.length > 0) {
    return existing;
  }

  const headerRequestId = req.header("x-request-id");
  const rid =
    typeof headerRequestId === "string" && headerRequestId.trim().length > 0
      ? headerRequestId.trim()
      : nanoid();
  res.locals.rid = rid;
  return rid;
}

export function setRelayHeaders(
  deps: Pick<OpenAiRouteDependencies, "config" | "queue">,
  req: Request,
  res: Response,
): void {
  res.setHeader("x-relay-version", deps.config.version);
  res.setHeader("x-relay-request-id", getRequestId(req, res));
  res.setHeader("x-relay-queue-depth", String(deps.queue.size));
}

export function buildOpenAiErrorPayload(error: Pick<ErrorResponseShape, "message" | "code">): OpenAiErrorPayload {
  return {
    error: {
      message: error.message,
      type: "relay_error",
      code: error.code,
      param: null,
    },
  };
}

function sendOpenAiError(
  deps: OpenAiRouteDependencies,
  req: Request,
  res: Response,
  error: ErrorResponseShape,
): void {
  if (res.headersSent || res.writableEnded) {
    return;
  }
  setRelayHeaders(deps, req, res);
  if (error.retryAfterSec !== undefined) {
    res.setHeader("Retry-After", String(error.retryAfterSec));
  }
  res.status(error.status).json(buildOpenAiErrorPayload(error));
}

export function mapRelayError(error: RelayError): ErrorResponseShape {
  const status = httpStatusForError(error);
  switch (error.code) {
    case "queue_full":
      return { status, code: error.code, message: error.message, retryAfterSec: error.retryAfterSec ?? 10 };
    case "session_not_ready":
    case "shutdown":
      return {
        status,
        code: error.code,
        message: error.message,
        retryAfterSec: error.retryAfterSec ?? SESSION_RETRY_AFTER_SEC,
      };
    default:
      return { status, code: error.code, message: error.message };
  }
}

function requireAuth(deps: OpenAiRouteDependencies, req: Request, res: Response): boolean {
  const expectedToken = deps.config.apiToken;
  if (!expectedToken) {
    return true;
  }

  const header = req.header("authorization");
  const match = header?.match(/^Bearer\s+(.+)$/i);
  const token = match?.[1]?.trim();
  if (token === expectedToken) {
    return true;
  }

  sendOpenAiError(deps, req, res, {
    status: 401,
    code: "unauthorized",
    message: "Missing or invalid Authorization header",
  });
  return false;
}

async function pipeStream(res: Response, handle: StreamHandle, rid: string, logger: Logger): Promise<number> {
  setupSseHeaders(res);
  res.status(200);
  res.flushHeaders();

  const onClose = () => {
    if (!res.writableFinished) {
      handle.cancel(clientGoneError(rid));
    }
  };
  res.on("close", onClose);

  let frames = 0;
  try {
    for await (const frame of handle.frames()) {
      if (res.writableEnded || res.destroyed) {
        break;
      }
      res.write(frame);
      frames += 1;
    }
  } finally {
    res.off("close", onClose);
    if (!res.writableEnded) {
      res.end();
    }
  }

  logger.info({ event: "http_stream_closed", frames }, "http_stream_closed");
  return frames;
}

export function createOpenAiRouter(deps: OpenAiRouteDependencies): Router {
  const router = Router();

  router.get("/v1/models", (req, res) => {
    if (!requireAuth(deps, req, res)) {
      return;
    }

    setRelayHeaders(deps, req, res);
    const created = Math.floor(Date.now() / 1000);
    const ids = [deps.config.proxyModelName, ...deps.state.supportedModels];
    res.json({
      object: "list",
      data: ids.map((id) => ({ id, object: "model", created, owned_by: "webchat-relay" })),
    });
  });

  router.get("/v1/queue", async (req, res) => {
    if (!requireAuth(deps, req, res)) {
      return;
    }

    const items = await deps.queue.snapshot();
    setRelayHeaders(deps, req, res);
    res.json({
      queue_length: items.length,
      is_processing_locked: deps.state.sessionMutex.isLocked(),
      items,
    });
  });

  router.post("/v1/cancel/:reqId", async (req, res) => {
    const rid = getRequestId(req, res);
    if (!requireAuth(deps, req, res)) {
      return;
    }

    const target = req.params.reqId;
    const matched = await deps.queue.scanAndMark(
      (item) => item.reqId === target && !item.cancelled,
      (item) => {
        item.cancelled = true;
        item.result.reject(new RelayError("cancelled", "Request cancelled by user", { reqId: item.reqId }));
      },
    );

    setRelayHeaders(deps, req, res);
    if (matched.length === 0) {
      deps.logger.info({ rid, event: "cancel_not_found", target }, "cancel_not_found");
      res.status(404).json({
        success: false,
        message: `Request ${target} not found in queue or already processing`,
      });
      return;
    }

    deps.logger.info({ rid, event: "cancel_marked", target }, "cancel_marked");
    res.json({ success: true, message: `Request ${target} marked as cancelled` });
  });

  router.post("/v1/chat/completions", async (req, res) => {
    const rid = getRequestId(req, res);
    const logger = createRequestLogger(deps.logger, rid);
    const requestStartedAt = Date.now();

    logger.info(
      { event: "http_request", method: req.method, path: req.path, queueDepth: deps.queue.size },
      "http_request",
    );

    if (!requireAuth(deps, req, res)) {
      return;
    }

    const parsed = chatCompletionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue?.path.join(".") || "body";
      sendOpenAiError(deps, req, res, {
        status: 400,
        code: "invalid_request",
        message: `Invalid request body for /v1/chat/completions: ${where}: ${issue?.message ?? "invalid"}`,
      });
      return;
    }

    if (!deps.worker.isAlive() || !deps.state.ready) {
      logger.warn(
        { event: "admission_rejected", workerAlive: deps.worker.isAlive(), sessionReady: deps.state.ready },
        "admission_rejected",
      );
      sendOpenAiError(deps, req, res, {
        status: 503,
        code: "session_not_ready",
        message: deps.worker.isAlive() ? "Browser session is not ready" : "Request worker is not running",
        retryAfterSec: SESSION_RETRY_AFTER_SEC,
      });
      return;
    }

    const result = new ResultPromise<CompletionResult>();
    const item: QueueItem = {
      reqId: rid,
      payload: parsed.data,
      clientHandle: new HttpClientHandle(req, res),
      result,
      enqueuedAt: Date.now(),
      cancelled: false,
    };

    try {
      deps.queue.enqueue(item);
    } catch (error) {
      const relayError = toRelayError(error);
      logger.warn({ event: "admission_rejected", errorCode: relayError.code }, "admission_rejected");
      sendOpenAiError(deps, req, res, mapRelayError(relayError));
      return;
    }
    logger.info({ event: "request_enqueued", queueDepth: deps.queue.size, stream: item.payload.stream }, "request_enqueued");

    let outcome: CompletionResult;
    try {
      outcome = await withTimeout(
        result.promise,
        handlerDeadlineMs(deps.config),
        () => new RelayError("timeout", "Timed out waiting for the response", { reqId: rid }),
      );
    } catch (error) {
      const relayError = toRelayError(error);
      if (relayError.code === "timeout" && result.reject(relayError)) {
        await deps.queue.scanAndMark(
          (queued) => queued.reqId === rid,
          (queued) => {
            queued.cancelled = true;
          },
        );
      }

      const mapped = mapRelayError(relayError);
      const level = isClientAbort(relayError) ? "info" : "warn";
      logger[level](
        {
          event: "http_response_error",
          status: mapped.status,
          errorCode: relayError.code,
          durationMs: Date.now() - requestStartedAt,
        },
        "http_response_error",
      );
      sendOpenAiError(deps, req, res, mapped);
      return;
    }

    if (outcome.kind === "json") {
      setRelayHeaders(deps, req, res);
      res.json(outcome.payload);
      logger.info(
        { event: "http_response", status: 200, durationMs: Date.now() - requestStartedAt },
        "http_response",
      );
      return;
    }

    setRelayHeaders(deps, req, res);
    await pipeStream(res, outcome.handle, rid, logger);
  });

  return router;
}
