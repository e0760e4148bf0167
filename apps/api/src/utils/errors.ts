// src/utils/errors.ts

import type { UploadStatus } from "../types/upload.js";

/**
 * How the pipeline reacts to a failure:
 * - transient: retry with backoff, fail the session once attempts run out
 * - terminal: business/data failure, never retried
 * - degradable: the stage proceeds with an annotation instead of failing
 */
export type ErrorDisposition = "transient" | "terminal" | "degradable";

export class PipelineError extends Error {
  readonly code: string;
  readonly disposition: ErrorDisposition;

  constructor(
    code: string,
    message: string,
    disposition: ErrorDisposition,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.disposition = disposition;
  }
}

export class StorageError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORAGE_ERROR", message, "transient", options);
  }
}

export class ChunkNotFoundError extends PipelineError {
  constructor(readonly storageKey: string) {
    super("CHUNK_NOT_FOUND", `Chunk not found: ${storageKey}`, "terminal");
  }
}

export class ChecksumMismatchError extends PipelineError {
  constructor(expected: string, actual: string) {
    super(
      "CHECKSUM_MISMATCH",
      `Checksum mismatch. Expected: ${expected}, Got: ${actual}`,
      "terminal"
    );
  }
}

export class ChunkTooLargeError extends PipelineError {
  constructor(limit: number) {
    super("CHUNK_TOO_LARGE", `Chunk exceeds ${limit} bytes`, "terminal");
  }
}

export class ChunkSizeMismatchError extends PipelineError {
  constructor(expected: number, actual: number) {
    super(
      "CHUNK_SIZE_MISMATCH",
      `Chunk size mismatch. Expected: ${expected}, Got: ${actual}`,
      "terminal"
    );
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(readonly from: UploadStatus, readonly to: UploadStatus) {
    super("INVALID_TRANSITION", `Invalid transition from ${from} to ${to}`, "terminal");
  }
}

export class SessionNotFoundError extends PipelineError {
  constructor(uploadId: string) {
    super("UPLOAD_NOT_FOUND", `Upload session not found: ${uploadId}`, "terminal");
  }
}

export class SessionValidationError extends PipelineError {
  constructor(readonly field: string, message: string) {
    super("INVALID_UPLOAD_REQUEST", message, "terminal");
  }
}

export class SessionConflictError extends PipelineError {
  constructor(readonly holderId: string, filename: string) {
    super(
      "UPLOAD_CONFLICT",
      `${filename} is already being uploaded to this location`,
      "terminal"
    );
  }
}

export class SessionStateError extends PipelineError {
  constructor(readonly status: UploadStatus, message: string) {
    super("INVALID_UPLOAD_STATE", message, "terminal");
  }
}

export class RateLimitedError extends PipelineError {
  constructor(
    readonly limit: string,
    readonly max: number,
    readonly retryAfterSeconds: number | null
  ) {
    super("RATE_LIMITED", `Rate limit exceeded: ${limit} (max ${max})`, "transient");
  }
}

export class UploadIncompleteError extends PipelineError {
  constructor(readonly missingChunks: number[]) {
    super(
      "UPLOAD_INCOMPLETE",
      `Missing chunks: ${missingChunks.slice(0, 20).join(", ")}${
        missingChunks.length > 20 ? ", ..." : ""
      }`,
      "terminal"
    );
  }
}

export class AssemblyError extends PipelineError {
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(code, message, "terminal", options);
  }
}

export class ScanFileNotFoundError extends PipelineError {
  constructor(filePath: string) {
    super("SCAN_FILE_NOT_FOUND", `File not found: ${filePath}`, "terminal");
  }
}

export class ScanTimeoutError extends PipelineError {
  constructor(timeoutMs: number) {
    super("SCAN_TIMEOUT", `Virus scan timed out after ${timeoutMs}ms`, "transient");
  }
}

export class ScannerUnavailableError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SCANNER_UNAVAILABLE", message, "degradable", options);
  }
}

export class ScanFailedError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SCAN_FAILED", message, "transient", options);
  }
}

export class FinalizationError extends PipelineError {
  constructor(
    code: string,
    message: string,
    disposition: "terminal" | "transient" = "terminal",
    options?: { cause?: unknown }
  ) {
    super(code, message, disposition, options);
  }
}

export class AssetNotFoundError extends PipelineError {
  constructor(assetId: string) {
    super("ASSET_NOT_FOUND", `Asset not found: ${assetId}`, "terminal");
  }
}

export function dispositionOf(err: unknown): ErrorDisposition {
  return err instanceof PipelineError ? err.disposition : "transient";
}

export function errorCodeOf(err: unknown): string {
  return err instanceof PipelineError ? err.code : "UNEXPECTED_ERROR";
}

export function errorMessageOf(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
