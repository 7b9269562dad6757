import type { Server } from "node:http";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type { Logger } from "pino";
import type { RelayConfig } from "../config.js";
import type { RequestQueue } from "../queue/requestQueue.js";
import type { SessionState } from "../session/state.js";
import {
  buildOpenAiErrorPayload,
  createOpenAiRouter,
  getRequestId,
  setRelayHeaders,
  type WorkerStatus,
} from "./openaiRoutes.js";

export interface HttpServerDependencies {
  config: RelayConfig;
  logger: Logger;
  queue: RequestQueue;
  state: SessionState;
  worker: WorkerStatus;
}

function bodyErrorType(error: unknown): string | undefined {
  if (typeof error !== "object" || error === null || !("type" in error)) {
    return undefined;
  }
  return typeof error.type === "string" ? error.type : undefined;
}

export function createHttpApp(deps: HttpServerDependencies): Express {
  const app = express();

  app.disable("x-powered-by");

  app.use((req, res, next) => {
    getRequestId(req, res);
    setRelayHeaders(deps, req, res);
    next();
  });

  app.use(express.json({ limit: deps.config.httpBodyLimit }));

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    const type = bodyErrorType(error);
    if (type === "entity.too.large") {
      res.status(413).json(buildOpenAiErrorPayload({ message: "Request body is too large", code: "invalid_request" }));
      return;
    }
    if (type === "entity.parse.failed") {
      deps.logger.info({ rid: getRequestId(req, res), event: "http_invalid_json" }, "http_invalid_json");
      res.status(400).json(buildOpenAiErrorPayload({ message: "Invalid JSON body", code: "invalid_request" }));
      return;
    }
    next(error);
  });

  app.get("/health", (req, res) => {
    const workerAlive = deps.worker.isAlive();
    const sessionReady = deps.state.ready;
    const ok = workerAlive && sessionReady;

    setRelayHeaders(deps, req, res);
    res.status(ok ? 200 : 503).json({
      status: ok ? "OK" : "Error",
      workerAlive,
      sessionReady,
      processingLocked: deps.state.sessionMutex.isLocked(),
      queueLength: deps.queue.size,
      model: deps.state.currentModelId,
      version: deps.config.version,
    });
  });

  app.use(createOpenAiRouter(deps));

  app.use((req, res) => {
    setRelayHeaders(deps, req, res);
    res.status(404).json(buildOpenAiErrorPayload({ message: "Route not found", code: "not_found" }));
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    const message = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error ? error.stack : undefined;
    deps.logger.error(
      { rid: getRequestId(req, res), event: "http_unhandled_error", message, stack },
      "http_unhandled_error",
    );
    if (res.headersSent) {
      res.end();
      return;
    }
    setRelayHeaders(deps, req, res);
    res.status(500).json(buildOpenAiErrorPayload({ message: "Unhandled HTTP error", code: "unknown" }));
  });

  return app;
}

export async function startHttpServer(deps: HttpServerDependencies): Promise<Server> {
  const app = createHttpApp(deps);
  const requestTimeoutMs = deps.config.responseCompletionTimeoutMs + deps.config.handlerSlackMs + 5_000;

  return await new Promise<Server>((resolve, reject) => {
    const server = app.listen(deps.config.httpPort, deps.config.httpHost, () => {
      server.requestTimeout = requestTimeoutMs;
      server.timeout = requestTimeoutMs;
      server.headersTimeout = Math.max(server.headersTimeout, requestTimeoutMs + 1_000);

      deps.logger.info(
        {
          event: "http_server_started",
          mode: "http",
          host: deps.config.httpHost,
          port: deps.config.httpPort,
          requestTimeoutMs,
        },
        "http_server_started",
      );
      resolve(server);
    });
    server.once("error", reject);
  });
}

export async function closeHttpServer(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}
