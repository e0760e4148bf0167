// src/store/walrus/walrus.metrics.ts

import type { FastifyBaseLogger } from "fastify";

export type WalrusUploadOutcome =
  | "success"
  | "auth_failed"
  | "rate_limited"
  | "network_error"
  | "timeout"
  | "client_error"
  | "server_error"
  | "invalid_response"
  | "unknown_error";

export interface WalrusUploadMetric {
  uploadId: string;
  sizeBytes: number;
  epochs: number;
  attempt: number;
  durationMs: number;
  outcome: WalrusUploadOutcome;
  error?: string;
  httpStatus?: number;
  timestamp: number;
}

/**
 * Publisher failures carry the HTTP status so callers can classify them
 * without parsing messages.
 */
export class WalrusHttpError extends Error {
  constructor(readonly status: number, body: string) {
    super(`WALRUS_UPLOAD_FAILED:${status}:${body}`);
    this.name = "WalrusHttpError";
  }
}

export class WalrusResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WalrusResponseError";
  }
}

const NETWORK_MARKERS = ["ECONN", "ENOTFOUND", "EAI_AGAIN", "ETIMEDOUT", "FETCH FAILED"];

function causeMessage(err: Error): string {
  return err.cause instanceof Error ? err.cause.message : "";
}

export function classifyWalrusError(err: unknown): WalrusUploadOutcome {
  if (!(err instanceof Error)) return "unknown_error";
  if (err.name === "AbortError" || err.name === "TimeoutError") return "timeout";

  if (err instanceof WalrusHttpError) {
    if (err.status === 401 || err.status === 403) return "auth_failed";
    if (err.status === 429) return "rate_limited";
    if (err.status >= 500) return "server_error";
    return "client_error";
  }

  if (err instanceof WalrusResponseError) return "invalid_response";

  const msg = `${err.message} ${causeMessage(err)}`.toUpperCase();
  if (NETWORK_MARKERS.some((m) => msg.includes(m))) return "network_error";

  return "unknown_error";
}

/** Outcomes worth another attempt against the same publisher. */
export function isRetryableOutcome(outcome: WalrusUploadOutcome): boolean {
  return (
    outcome === "rate_limited" ||
    outcome === "server_error" ||
    outcome === "network_error" ||
    outcome === "timeout"
  );
}

export function recordWalrusUploadMetric(
  log: FastifyBaseLogger,
  metric: WalrusUploadMetric
) {
  if (metric.outcome === "success") {
    log.info({ walrus: metric }, "walrus upload");
  } else {
    log.warn({ walrus: metric }, "walrus upload failed");
  }
}
