#!/usr/bin/env node

import type { Server } from "node:http";
import { AgentCaptureChannel } from "./src/bridge/captureChannel.js";
import { CaptureChannelBridge } from "./src/bridge/captureBridge.js";
import { ScrapeBridge } from "./src/bridge/scrapeBridge.js";
import type { ResponseBridge } from "./src/bridge/types.js";
import { loadConfig, validateConfig, workerDeadlineMs } from "./src/config.js";
import { toRelayError } from "./src/errors.js";
import { closeHttpServer, startHttpServer } from "./src/http/server.js";
import { createLogger } from "./src/logger.js";
import { startMcpServer } from "./src/mcp/server.js";
import { RequestProcessor } from "./src/pipeline/processor.js";
import { SessionRecovery } from "./src/queue/recovery.js";
import { RequestQueue } from "./src/queue/requestQueue.js";
import { QueueWorker } from "./src/queue/worker.js";
import { AuthProfileRotation } from "./src/session/authProfiles.js";
import { BrowserSessionController } from "./src/session/browserController.js";
import { SessionState } from "./src/session/state.js";

const config = loadConfig(process.env);
const logger = createLogger({ level: config.logLevel, format: config.logFormat });
validateConfig(config);

const state = new SessionState({ supportedModels: config.supportedModels });
const profiles = new AuthProfileRotation({
  directory: config.authProfilesDir,
  logger,
  initialProfile: config.activeAuthProfile,
});
const controller = new BrowserSessionController({
  wsEndpoint: config.browserWsEndpoint,
  targetUrl: config.targetPageUrl,
  selectors: config.selectors,
  modelPreferenceKey: config.modelPreferenceKey,
  navigationTimeoutMs: config.pageReloadTimeoutMs,
  responseTimeoutMs: config.responseCompletionTimeoutMs,
  responsePollMs: config.responsePollMs,
  responseStableChecks: config.responseStableChecks,
  logger,
});

const captureChannel = config.captureAgentCommand
  ? new AgentCaptureChannel({ command: config.captureAgentCommand, logger })
  : null;
const bridge: ResponseBridge = captureChannel
  ? new CaptureChannelBridge({
      channel: captureChannel,
      idleTimeoutMs: config.captureIdleTimeoutMs,
      pollMs: config.capturePollMs,
    })
  : new ScrapeBridge({
      controller,
      chunkSize: config.scrapeChunkSize,
      chunkDelayMs: config.scrapeChunkDelayMs,
      newlineDelayMs: config.scrapeNewlineDelayMs,
    });
logger.info({ event: "response_bridge_selected", bridge: bridge.kind }, "response_bridge_selected");

const queue = new RequestQueue({ maxSize: config.maxQueueSize });
const processor = new RequestProcessor({
  state,
  controller,
  bridge,
  proxyModelName: config.proxyModelName,
});
const recovery = new SessionRecovery({
  controller,
  state,
  profiles,
  pageReloadTimeoutMs: config.pageReloadTimeoutMs,
  inputWaitTimeoutMs: config.inputWaitTimeoutMs,
  baselineModel: config.defaultModel,
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
    dequeueTimeoutMs: config.dequeueTimeoutMs,
    disconnectSweepLimit: config.disconnectSweepLimit,
    disconnectPollMs: config.disconnectPollMs,
    livenessCheckTimeoutMs: config.livenessCheckTimeoutMs,
    streamPacingMs: config.streamPacingMs,
    streamPacingMinMs: config.streamPacingMinMs,
    maxAttempts: config.maxAttempts,
    deadlineMs: workerDeadlineMs(config),
    clearHistoryAfterRequest: config.clearHistoryAfterRequest,
  },
});

process.on("unhandledRejection", (reason) => {
  logger.error({ event: "unhandled_rejection", reason }, "unhandled_rejection");
});

process.on("uncaughtException", (error) => {
  logger.error({ event: "uncaught_exception", error }, "uncaught_exception");
});

async function initializeSession(): Promise<void> {
  try {
    const profile = profiles.currentProfile ?? (await profiles.next());
    await controller.connect(profile);
    if (await controller.switchModel(config.defaultModel)) {
      state.currentModelId = config.defaultModel;
    }
    state.ready = await controller.isReady();
  } catch (error) {
    const relayError = toRelayError(error);
    state.ready = false;
    logger.error(
      { event: "session_init_failed", errorCode: relayError.code, message: relayError.message },
      "session_init_failed",
    );
  }
  logger.info({ event: "session_initialized", ready: state.ready, model: state.currentModelId }, "session_initialized");
}

await initializeSession();
worker.start();

let httpServer: Server | null = null;
if (config.relayMode === "http") {
  httpServer = await startHttpServer({ config, logger, queue, state, worker });
} else {
  await startMcpServer({ config, logger, queue, state });
}

let shuttingDown = false;
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ event: "shutdown_started", signal }, "shutdown_started");

  await worker.stop();
  if (httpServer) {
    await closeHttpServer(httpServer);
  }
  await captureChannel?.close();
  await controller.close();

  logger.info({ event: "shutdown_completed" }, "shutdown_completed");
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ event: "shutdown_failed", message: toRelayError(error).message }, "shutdown_failed");
      process.exit(1);
    });
  });
}
