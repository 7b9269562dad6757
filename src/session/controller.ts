import type { SamplingParameters } from "../pipeline/request.js";
import type { Mutex } from "../utils/mutex.js";

export interface ParamsCache {
  lastKnownModelId: string | null;
  values: Partial<Record<keyof SamplingParameters, unknown>>;
}

export interface FinalContent {
  content: string;
  reasoning: string;
}

/**
 * The remote chat session. Implementations are not reentrant; callers hold
 * the session mutex for every call except `isReady`.
 */
export interface SessionController {
  isReady(): Promise<boolean>;
  submit(prompt: string, attachments: string[], signal?: AbortSignal): Promise<void>;
  switchModel(modelId: string, signal?: AbortSignal): Promise<boolean>;
  /**
   * Applies only the values that differ from `cache`, updating it under
   * `cacheMutex`.
   */
  adjustParameters(
    params: SamplingParameters,
    cache: ParamsCache,
    cacheMutex: Mutex,
    signal?: AbortSignal,
  ): Promise<void>;
  /** Waits until the response element settles and returns its text. */
  awaitFinalContent(signal?: AbortSignal): Promise<FinalContent>;
  clearHistory(): Promise<void>;
  reloadPage(timeoutMs: number): Promise<void>;
  waitForInput(timeoutMs: number): Promise<void>;
  reconnect(profilePath: string): Promise<void>;
  close(): Promise<void>;
}
