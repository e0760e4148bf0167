// src/services/upload/upload.state.ts

import type {
  ChunkRecord,
  SessionEvent,
  UploadStatus,
} from "../../types/upload.js";
import { InvalidTransitionError } from "../../utils/errors.js";

const TRANSITIONS: Record<UploadStatus, readonly UploadStatus[]> = {
  pending: ["uploading", "assembling", "failed", "cancelled"],
  uploading: ["assembling", "failed", "cancelled"],
  assembling: ["virus_scanning", "failed", "cancelled"],
  virus_scanning: ["finalizing", "virus_scan_failed", "cancelled"],
  finalizing: ["completed", "finalization_failed"],
  completed: [],
  failed: [],
  virus_scan_failed: [],
  finalization_failed: [],
  cancelled: [],
};

/**
 * Statuses that hold the (workspace, container, filename) slot.
 * The slot is released only when the session reaches a terminal state.
 */
export const ACTIVE_STATUSES: readonly UploadStatus[] = [
  "pending",
  "uploading",
  "assembling",
  "virus_scanning",
  "finalizing",
];

export const ACCEPTING_CHUNKS: readonly UploadStatus[] = ["pending", "uploading"];

export const CANCELLABLE: readonly UploadStatus[] = [
  "pending",
  "uploading",
  "assembling",
  "virus_scanning",
];

export const FAILURE_STATUSES: readonly UploadStatus[] = [
  "failed",
  "virus_scan_failed",
  "finalization_failed",
];

export function canTransition(from: UploadStatus, to: UploadStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(from: UploadStatus, to: UploadStatus) {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/**
 * Every status in `from` must be able to reach `to`; used to validate
 * compare-and-swap requests before they hit the store.
 */
export function assertTransitionSet(
  from: readonly UploadStatus[],
  to: UploadStatus
) {
  for (const s of from) assertTransition(s, to);
}

export function isActive(status: UploadStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

export function isTerminal(status: UploadStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/**
 * Chunk numbers in 1..chunksCount without a completed record.
 */
export function missingChunkNumbers(
  chunksCount: number,
  chunks: readonly ChunkRecord[]
): number[] {
  const done = new Set(
    chunks.filter((c) => c.status === "completed").map((c) => c.chunkNumber)
  );

  const missing: number[] = [];
  for (let n = 1; n <= chunksCount; n++) {
    if (!done.has(n)) missing.push(n);
  }
  return missing;
}

/**
 * Exactly chunksCount completed chunks numbered 1..chunksCount, no gaps,
 * duplicates or extras.
 */
export function isChunkSetComplete(
  chunksCount: number,
  chunks: readonly ChunkRecord[]
): boolean {
  if (chunks.length !== chunksCount) return false;

  const seen = new Set<number>();
  for (const c of chunks) {
    if (c.status !== "completed") return false;
    if (!Number.isInteger(c.chunkNumber)) return false;
    if (c.chunkNumber < 1 || c.chunkNumber > chunksCount) return false;
    if (seen.has(c.chunkNumber)) return false;
    seen.add(c.chunkNumber);
  }
  return seen.size === chunksCount;
}

const iso = (ms: number) => new Date(ms).toISOString();

/** Metadata keys written only by the pipeline. */
export const RESERVED_METADATA_KEYS = [
  "assembly",
  "virus_scan",
  "finalization",
  "last_error",
] as const;

function assignClientMetadata(target: Record<string, unknown>, metadata: Record<string, unknown>) {
  for (const [key, value] of Object.entries(metadata)) {
    if (!RESERVED_METADATA_KEYS.some((k) => k === key)) target[key] = value;
  }
}

/**
 * Reconstructs the metadata view of a session from its event log.
 * Later events overwrite only the keys they carry; client events never set
 * a reserved key.
 */
export function foldSessionMetadata(
  events: readonly SessionEvent[]
): Record<string, unknown> {
  const view: Record<string, unknown> = {};
  let virusScan: Record<string, unknown> | null = null;

  for (const ev of events) {
    switch (ev.type) {
      case "created":
      case "metadata":
        assignClientMetadata(view, ev.metadata);
        break;

      case "assembly":
        view.assembly = {
          assembled_at: iso(ev.at),
          file_size: ev.sizeBytes,
          chunks: ev.chunks,
        };
        break;

      case "virus_scan": {
        const next: Record<string, unknown> = {
          ...(virusScan ?? {}),
          status: ev.status,
        };
        if (ev.scanner) next.scanner = ev.scanner;
        if (ev.status === "scanning") {
          next.queued_at = iso(ev.at);
        } else if (ev.status === "skipped") {
          next.skipped_at = iso(ev.at);
        } else {
          next.completed_at = iso(ev.at);
        }
        if (ev.virusName) next.virus_name = ev.virusName;
        if (ev.error) next.error = ev.error;
        if (ev.reason) next.reason = ev.reason;
        virusScan = next;
        view.virus_scan = next;
        break;
      }

      case "finalization":
        view.finalization =
          ev.status === "finalized"
            ? {
                asset_id: ev.assetId,
                asset_filename: ev.assetFilename,
                finalized_at: iso(ev.at),
                file_size: ev.fileSize,
              }
            : {
                status: "failed",
                error: ev.error,
                failed_at: iso(ev.at),
              };
        break;

      case "stage_error":
        view.last_error = {
          stage: ev.stage,
          attempt: ev.attempt,
          code: ev.code,
          message: ev.message,
          at: iso(ev.at),
        };
        break;

      case "status":
        break;
    }
  }

  return view;
}

/**
 * Only what clients wrote at creation or through annotate.
 */
export function clientMetadataOf(
  events: readonly SessionEvent[]
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const ev of events) {
    if (ev.type === "created" || ev.type === "metadata") {
      assignClientMetadata(out, ev.metadata);
    }
  }
  return out;
}

/**
 * Latest human-readable failure reason for a session, if any.
 */
export function latestFailureMessage(
  events: readonly SessionEvent[]
): string | null {
  for (let i = events.length - 1; i >= 0; i--) {
    const ev = events[i];
    if (ev.type === "status" && ev.reason && !isActive(ev.to)) return ev.reason;
    if (ev.type === "virus_scan" && ev.error) return ev.error;
    if (ev.type === "finalization" && ev.error) return ev.error;
    if (ev.type === "stage_error") return ev.message;
  }
  return null;
}
