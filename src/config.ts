import { homedir } from "node:os";
import { resolve } from "node:path";
import type { LogLevel } from "./logger.js";

export type RelayMode = "mcp" | "http";

export interface SessionSelectors {
  input: string;
  submit: string;
  response: string;
  thinking: string;
  clearChat: string;
  clearChatConfirm: string;
  attach: string;
  temperature: string;
  maxOutputTokens: string;
  topP: string;
}

export interface RelayConfig {
  version: string;
  relayMode: RelayMode;
  httpHost: string;
  httpPort: number;
  apiToken: string;
  httpBodyLimit: string;

  maxQueueSize: number;
  responseCompletionTimeoutMs: number;
  workerSlackMs: number;
  handlerSlackMs: number;
  dequeueTimeoutMs: number;
  disconnectPollMs: number;
  livenessCheckTimeoutMs: number;
  disconnectSweepLimit: number;
  streamPacingMs: number;
  streamPacingMinMs: number;
  maxAttempts: number;
  pageReloadTimeoutMs: number;
  inputWaitTimeoutMs: number;

  captureAgentCommand: string;
  captureIdleTimeoutMs: number;
  capturePollMs: number;
  scrapeChunkSize: number;
  scrapeChunkDelayMs: number;
  scrapeNewlineDelayMs: number;

  proxyModelName: string;
  supportedModels: string[];
  defaultModel: string;

  authProfilesDir: string;
  activeAuthProfile: string;
  browserWsEndpoint: string;
  targetPageUrl: string;
  selectors: SessionSelectors;
  clearHistoryAfterRequest: boolean;
  modelPreferenceKey: string;
  responsePollMs: number;
  responseStableChecks: number;

  logLevel: LogLevel;
  logFormat: "json" | "pretty";
}

const DEFAULT_SUPPORTED_MODELS = ["gemini-2.5-pro", "gemini-2.5-flash"];

const DEFAULT_SELECTORS: SessionSelectors = {
  input: "ms-prompt-input-wrapper textarea",
  submit: "button[aria-label=\"Run\"]",
  response: "ms-chat-turn ms-text-chunk",
  thinking: "ms-chat-turn:last-of-type ms-thought-chunk",
  clearChat: "button[aria-label=\"New chat\"]",
  clearChatConfirm: "button.ms-button-primary::-p-text(Continue)",
  attach: "button[aria-label=\"Insert assets such as images, videos, files, or audio\"]",
  temperature: "ms-prompt-run-settings input[type=number][max=\"2\"]",
  maxOutputTokens: "ms-prompt-run-settings input[name=\"maxOutputTokens\"]",
  topP: "ms-prompt-run-settings input[type=number][max=\"1\"]",
};

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const lowered = value.trim().toLowerCase();
  if (["1", "true", "yes", "y", "on"].includes(lowered)) return true;
  if (["0", "false", "no", "n", "off"].includes(lowered)) return false;
  return fallback;
}

function parseNumber(value: string | undefined, fallback: number, min = 0): number {
  if (value === undefined) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || Number.isNaN(parsed)) return fallback;
  return Math.max(parsed, min);
}

function parseLogLevel(value: string | undefined): RelayConfig["logLevel"] {
  if (value === "debug" || value === "info" || value === "warn" || value === "error") {
    return value;
  }
  return "info";
}

function parseLogFormat(value: string | undefined): RelayConfig["logFormat"] {
  if (value === "pretty" || value === "json") {
    return value;
  }
  return "json";
}

function parseRelayMode(value: string | undefined): RelayMode {
  if (value === "http" || value === "mcp") {
    return value;
  }
  return "http";
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) {
    return fallback;
  }

  const entries = value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return entries.length > 0 ? entries : fallback;
}

function expandHomePath(pathValue: string): string {
  if (pathValue === "~") {
    return homedir();
  }
  if (pathValue.startsWith("~/")) {
    return resolve(homedir(), pathValue.slice(2));
  }
  return pathValue;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const supportedModels = parseList(env.SUPPORTED_MODELS, DEFAULT_SUPPORTED_MODELS);
  const defaultModel = env.DEFAULT_MODEL?.trim() || supportedModels[0] || "";
  const activeAuthProfile = env.ACTIVE_AUTH_PROFILE?.trim() ?? "";

  return {
    version: env.RELAY_VERSION || "0.1.0",
    relayMode: parseRelayMode(env.RELAY_MODE),
    httpHost: env.HTTP_HOST || "127.0.0.1",
    httpPort: parseNumber(env.HTTP_PORT, 2048, 1),
    apiToken: env.RELAY_API_TOKEN || "",
    httpBodyLimit: env.HTTP_BODY_LIMIT || "10mb",

    maxQueueSize: parseNumber(env.MAX_QUEUE_SIZE, 50, 1),
    responseCompletionTimeoutMs: parseNumber(env.RESPONSE_COMPLETION_TIMEOUT_MS, 300_000, 1_000),
    workerSlackMs: 60_000,
    handlerSlackMs: 120_000,
    dequeueTimeoutMs: parseNumber(env.DEQUEUE_TIMEOUT_MS, 5_000, 10),
    disconnectPollMs: parseNumber(env.DISCONNECT_POLL_MS, 300, 10),
    livenessCheckTimeoutMs: parseNumber(env.LIVENESS_CHECK_TIMEOUT_MS, 500, 10),
    disconnectSweepLimit: parseNumber(env.DISCONNECT_SWEEP_LIMIT, 10, 1),
    streamPacingMs: parseNumber(env.STREAM_PACING_MS, 1_000, 0),
    streamPacingMinMs: parseNumber(env.STREAM_PACING_MIN_MS, 500, 0),
    maxAttempts: parseNumber(env.MAX_ATTEMPTS, 3, 1),
    pageReloadTimeoutMs: parseNumber(env.PAGE_RELOAD_TIMEOUT_MS, 10_000, 100),
    inputWaitTimeoutMs: parseNumber(env.INPUT_WAIT_TIMEOUT_MS, 5_000, 100),

    captureAgentCommand: env.CAPTURE_AGENT_COMMAND?.trim() ?? "",
    captureIdleTimeoutMs: parseNumber(env.CAPTURE_IDLE_TIMEOUT_MS, 30_000, 100),
    capturePollMs: parseNumber(env.CAPTURE_POLL_MS, 100, 1),
    scrapeChunkSize: parseNumber(env.SCRAPE_CHUNK_SIZE, 5, 1),
    scrapeChunkDelayMs: parseNumber(env.SCRAPE_CHUNK_DELAY_MS, 30, 0),
    scrapeNewlineDelayMs: parseNumber(env.SCRAPE_NEWLINE_DELAY_MS, 10, 0),

    proxyModelName: env.PROXY_MODEL_NAME?.trim() || "webchat-relay",
    supportedModels,
    defaultModel,

    authProfilesDir: expandHomePath(env.AUTH_PROFILES_DIR || "~/.webchat-relay/auth"),
    activeAuthProfile: activeAuthProfile ? expandHomePath(activeAuthProfile) : "",
    browserWsEndpoint: env.BROWSER_WS_ENDPOINT?.trim() ?? "",
    targetPageUrl: env.TARGET_PAGE_URL || "https://aistudio.google.com/prompts/new_chat",
    selectors: {
      input: env.SELECTOR_INPUT || DEFAULT_SELECTORS.input,
      submit: env.SELECTOR_SUBMIT || DEFAULT_SELECTORS.submit,
      response: env.SELECTOR_RESPONSE || DEFAULT_SELECTORS.response,
      thinking: env.SELECTOR_THINKING || DEFAULT_SELECTORS.thinking,
      clearChat: env.SELECTOR_CLEAR_CHAT || DEFAULT_SELECTORS.clearChat,
      clearChatConfirm: env.SELECTOR_CLEAR_CHAT_CONFIRM || DEFAULT_SELECTORS.clearChatConfirm,
      attach: env.SELECTOR_ATTACH || DEFAULT_SELECTORS.attach,
      temperature: env.SELECTOR_TEMPERATURE || DEFAULT_SELECTORS.temperature,
      maxOutputTokens: env.SELECTOR_MAX_OUTPUT_TOKENS || DEFAULT_SELECTORS.maxOutputTokens,
      topP: env.SELECTOR_TOP_P || DEFAULT_SELECTORS.topP,
    },
    clearHistoryAfterRequest: parseBoolean(env.CLEAR_HISTORY_AFTER_REQUEST, true),
    modelPreferenceKey: env.MODEL_PREFERENCE_KEY || "aiStudioUserPreference",
    responsePollMs: parseNumber(env.RESPONSE_POLL_MS, 500, 50),
    responseStableChecks: parseNumber(env.RESPONSE_STABLE_CHECKS, 3, 1),

    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFormat: parseLogFormat(env.LOG_FORMAT),
  };
}

export function validateConfig(config: RelayConfig): void {
  if (config.supportedModels.length === 0) {
    throw new Error("SUPPORTED_MODELS must list at least one model");
  }
  if (!config.supportedModels.includes(config.defaultModel)) {
    throw new Error(`DEFAULT_MODEL ${config.defaultModel} is not in SUPPORTED_MODELS`);
  }
  if (config.streamPacingMinMs > config.streamPacingMs) {
    throw new Error("STREAM_PACING_MIN_MS must not exceed STREAM_PACING_MS");
  }
}

/** Ceiling the worker applies to one request's response wait. */
export function workerDeadlineMs(config: RelayConfig): number {
  return config.responseCompletionTimeoutMs + config.workerSlackMs;
}

/** Ceiling the HTTP handler applies while awaiting a queued result. */
export function handlerDeadlineMs(config: RelayConfig): number {
  return config.responseCompletionTimeoutMs + config.handlerSlackMs;
}
