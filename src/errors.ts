export type RelayErrorCode =
  | "client_gone"
  | "cancelled"
  | "quota_exceeded"
  | "upstream_error"
  | "session_not_ready"
  | "empty_upstream_response"
  | "internal_timeout"
  | "timeout"
  | "recovery_exhausted"
  | "queue_full"
  | "invalid_request"
  | "model_switch_failed"
  | "unauthorized"
  | "not_found"
  | "shutdown"
  | "unknown";

export class RelayError extends Error {
  public code: RelayErrorCode;
  public details?: Record<string, unknown>;
  public retryAfterSec?: number;

  public constructor(
    code: RelayErrorCode,
    message: string,
    details?: Record<string, unknown>,
    retryAfterSec?: number,
  ) {
    super(message);
    this.name = "RelayError";
    this.code = code;
    this.details = details;
    this.retryAfterSec = retryAfterSec;
  }
}

export function isRelayError(value: unknown): value is RelayError {
  return value instanceof RelayError;
}

export function toRelayError(value: unknown, fallbackMessage = "Unknown relay error"): RelayError {
  if (isRelayError(value)) {
    return value;
  }

  if (value instanceof Error) {
    return new RelayError("unknown", value.message || fallbackMessage);
  }

  return new RelayError("unknown", fallbackMessage, {
    value: typeof value === "string" ? value : JSON.stringify(value),
  });
}

const TERMINAL_CODES: ReadonlySet<RelayErrorCode> = new Set<RelayErrorCode>([
  "client_gone",
  "cancelled",
  "session_not_ready",
  "timeout",
  "recovery_exhausted",
  "invalid_request",
  "model_switch_failed",
  "shutdown",
]);

/**
 * Terminal errors short-circuit the attempt loop. Everything else is
 * recoverable and goes through tiered recovery.
 */
export function isTerminalError(error: RelayError): boolean {
  return TERMINAL_CODES.has(error.code);
}

export function isClientAbort(error: RelayError): boolean {
  return error.code === "client_gone" || error.code === "cancelled";
}

const QUOTA_KEYWORDS = ["quota", "429", "rate limit", "exceeded", "too many requests"];

/**
 * The only place that inspects error text for quota exhaustion.
 */
export function isQuotaFailure(error: RelayError): boolean {
  if (error.code === "quota_exceeded") {
    return true;
  }
  if (isTerminalError(error)) {
    return false;
  }
  const message = error.message.toLowerCase();
  return QUOTA_KEYWORDS.some((keyword) => message.includes(keyword));
}

export function httpStatusForError(error: RelayError): number {
  switch (error.code) {
    case "client_gone":
    case "cancelled":
      return 499;
    case "quota_exceeded":
    case "upstream_error":
      return 502;
    case "session_not_ready":
    case "shutdown":
      return 503;
    case "timeout":
      return 504;
    case "queue_full":
      return 429;
    case "invalid_request":
      return 400;
    case "unauthorized":
      return 401;
    case "not_found":
      return 404;
    case "model_switch_failed":
      return 422;
    case "empty_upstream_response":
    case "internal_timeout":
    case "recovery_exhausted":
    case "unknown":
    default:
      return 500;
  }
}
