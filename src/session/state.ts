import { Mutex } from "../utils/mutex.js";
import type { ParamsCache } from "./controller.js";

export interface SessionStateOptions {
  supportedModels: string[];
  initialModelId?: string | null;
  ready?: boolean;
}

export interface SessionSnapshot {
  modelId: string | null;
  isReady: boolean;
}

/**
 * Process-wide session bookkeeping, created once at startup and passed to
 * whoever needs it. Lock order: session, then model switch, then params cache.
 */
export class SessionState {
  public readonly sessionMutex = new Mutex();
  public readonly modelSwitchMutex = new Mutex();
  public readonly paramsCacheMutex = new Mutex();
  public readonly supportedModels: readonly string[];
  public readonly paramsCache: ParamsCache = { lastKnownModelId: null, values: {} };
  public currentModelId: string | null;
  public ready: boolean;

  public constructor(options: SessionStateOptions) {
    this.supportedModels = [...options.supportedModels];
    this.currentModelId = options.initialModelId ?? null;
    this.ready = options.ready ?? false;
  }

  public snapshot(): SessionSnapshot {
    return { modelId: this.currentModelId, isReady: this.ready };
  }

  /** Callers hold `paramsCacheMutex`. */
  public clearParamsCache(): void {
    this.paramsCache.lastKnownModelId = null;
    this.paramsCache.values = {};
  }
}
