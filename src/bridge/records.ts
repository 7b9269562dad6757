import { z } from "zod";
import { RelayError } from "../errors.js";

const functionCallSchema = z
  .object({
    name: z.string().default(""),
    params: z.record(z.unknown()).default({}),
  })
  .passthrough();

export const captureRecordSchema = z
  .object({
    done: z.boolean().default(false),
    body: z.string().default(""),
    reason: z.string().default(""),
    function: z.array(functionCallSchema).default([]),
    error: z.boolean().optional(),
    status: z.number().int().optional(),
    message: z.string().optional(),
  })
  .passthrough();

export type CaptureRecord = z.infer<typeof captureRecordSchema>;

export type ParsedCaptureItem =
  | { kind: "record"; record: CaptureRecord }
  | { kind: "ready" }
  | { kind: "invalid"; reason: string };

export const READY_MARKER = "READY";

export function parseCaptureItem(raw: unknown): ParsedCaptureItem {
  let value: unknown = raw;

  if (typeof raw === "string") {
    const trimmed = raw.trim();
    if (trimmed === READY_MARKER) {
      return { kind: "ready" };
    }
    try {
      value = JSON.parse(trimmed);
    } catch {
      return { kind: "invalid", reason: "not_json" };
    }
  }

  const parsed = captureRecordSchema.safeParse(value);
  if (!parsed.success) {
    return { kind: "invalid", reason: parsed.error.issues[0]?.message ?? "schema_mismatch" };
  }
  return { kind: "record", record: parsed.data };
}

/**
 * Translates an `error: true` record into the typed failure the worker
 * recovers from.
 */
export function captureRecordError(record: CaptureRecord): RelayError {
  const status = record.status ?? 500;
  const message = record.message ?? "Unknown upstream error";

  if (status === 429 || message.toLowerCase().includes("quota")) {
    return new RelayError("quota_exceeded", `Upstream quota exceeded: ${message}`, { status });
  }
  return new RelayError("upstream_error", `Upstream error: ${message}`, { status });
}

export function isEmptyRecord(record: CaptureRecord): boolean {
  return record.body.length === 0 && record.reason.length === 0 && record.function.length === 0;
}
