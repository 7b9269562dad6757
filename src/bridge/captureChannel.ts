import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import readline from "node:readline";
import type { Logger } from "pino";
import { AsyncFifo } from "../utils/asyncFifo.js";

/**
 * Cross-process feed of capture records. Items are raw: NDJSON lines from an
 * agent process, or already-decoded objects when fed in process.
 */
export interface CaptureChannel {
  read(timeoutMs: number, signal?: AbortSignal): Promise<unknown>;
  /** Discards residual items and returns how many were dropped. */
  drain(): number;
  close(): Promise<void>;
}

export class MemoryCaptureChannel implements CaptureChannel {
  private readonly fifo = new AsyncFifo<unknown>();
  private closed = false;

  public push(item: string | object): void {
    if (this.closed) {
      return;
    }
    this.fifo.push(item);
  }

  public get pending(): number {
    return this.fifo.size;
  }

  public read(timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
    return this.fifo.shift(timeoutMs, signal);
  }

  public drain(): number {
    return this.fifo.drain().length;
  }

  public async close(): Promise<void> {
    this.closed = true;
    this.fifo.drain();
  }
}

export interface AgentCaptureChannelOptions {
  command: string;
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

function waitForExit(child: ChildProcessWithoutNullStreams, timeoutMs: number): Promise<boolean> {
  if (child.exitCode !== null || child.signalCode !== null) {
    return Promise.resolve(true);
  }

  return new Promise((resolve) => {
    const onExit = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      child.off("exit", onExit);
      resolve(false);
    }, timeoutMs);
    child.once("exit", onExit);
  });
}

/**
 * Runs the capture agent as a child process. Each stdout line is one record;
 * stderr is forwarded to the debug log.
 */
export class AgentCaptureChannel implements CaptureChannel {
  private readonly fifo = new AsyncFifo<unknown>();
  private readonly child: ChildProcessWithoutNullStreams;
  private readonly logger: Logger;
  private readonly lines: readline.Interface;

  public constructor(options: AgentCaptureChannelOptions) {
    this.logger = options.logger;
    this.child = spawn(options.command, {
      shell: true,
      env: options.env ?? process.env,
      cwd: options.cwd,
      stdio: ["pipe", "pipe", "pipe"],
    });

    this.lines = readline.createInterface({ input: this.child.stdout });
    this.lines.on("line", (line) => {
      const trimmed = line.trim();
      if (trimmed.length > 0) {
        this.fifo.push(trimmed);
      }
    });

    const stderr = readline.createInterface({ input: this.child.stderr });
    stderr.on("line", (line) => {
      this.logger.debug({ event: "capture_agent_stderr", line }, "capture_agent_stderr");
    });

    this.child.on("error", (error) => {
      this.logger.error({ event: "capture_agent_error", message: error.message }, "capture_agent_error");
    });
    this.child.once("exit", (code, signal) => {
      this.logger.warn({ event: "capture_agent_exited", code, signal }, "capture_agent_exited");
    });

    this.logger.info({ event: "capture_agent_started", pid: this.child.pid }, "capture_agent_started");
  }

  public read(timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
    return this.fifo.shift(timeoutMs, signal);
  }

  public drain(): number {
    return this.fifo.drain().length;
  }

  public async close(): Promise<void> {
    this.lines.close();
    if (this.child.exitCode !== null || this.child.signalCode !== null) {
      return;
    }

    this.child.kill("SIGTERM");
    if (await waitForExit(this.child, 3_000)) {
      return;
    }
    this.child.kill("SIGKILL");
    await waitForExit(this.child, 1_000);
  }
}
