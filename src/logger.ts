import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerConfig {
  level: LogLevel;
  format: "json" | "pretty";
  /** JSON output only; defaults to stderr. */
  destination?: DestinationStream;
}

// Bearer tokens and auth-profile cookies.
const REDACTED_PATHS = ["authorization", "headers.authorization", "cookies", "*.cookies", "apiToken"];

function baseOptions(level: LogLevel): LoggerOptions {
  return {
    level,
    base: undefined,
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  };
}

/**
 * Everything goes to stderr: in MCP mode stdout belongs to the stdio
 * transport.
 */
export function createLogger(config: LoggerConfig): Logger {
  if (config.format === "pretty") {
    return pino({
      ...baseOptions(config.level),
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "SYS:HH:MM:ss.l",
          // The message already is the event name.
          ignore: "event",
        },
      },
    });
  }

  return pino(baseOptions(config.level), config.destination ?? pino.destination({ dest: 2, sync: false }));
}

/** Child logger for one admitted request; every line carries `rid`. */
export function createRequestLogger(logger: Logger, reqId: string, bindings: Record<string, unknown> = {}): Logger {
  return logger.child({ rid: reqId, ...bindings });
}
