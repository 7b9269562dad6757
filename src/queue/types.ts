import type { StreamHandle } from "../bridge/streamHandle.js";
import type { ChatCompletionPayload } from "../http/sse.js";
import type { ChatRequest } from "../pipeline/request.js";
import type { ResultPromise } from "./resultPromise.js";

/** Answers whether the caller behind a request is still there. */
export interface ClientHandle {
  isConnected(): Promise<boolean>;
}

export type CompletionResult =
  | { kind: "stream"; handle: StreamHandle }
  | { kind: "json"; payload: ChatCompletionPayload };

export interface QueueItem {
  reqId: string;
  payload: ChatRequest;
  clientHandle: ClientHandle;
  result: ResultPromise<CompletionResult>;
  enqueuedAt: number;
  cancelled: boolean;
}

export interface QueueItemStatus {
  req_id: string;
  enqueue_time: number;
  wait_time_seconds: number;
  is_streaming: boolean;
  cancelled: boolean;
}
