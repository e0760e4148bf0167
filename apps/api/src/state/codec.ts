// src/state/codec.ts
//
// String <-> record conversion for the Redis backend. Every value read back
// is checked; a record that does not parse is reported as corrupt rather than
// trusted.

import type { Asset, StorageReference } from "../types/asset.js";
import {
  UPLOAD_STATUSES,
  type ChunkRecord,
  type SessionEvent,
  type UploadSession,
  type UploadStatus,
} from "../types/upload.js";

const EVENT_TYPES = new Set<string>([
  "created",
  "status",
  "assembly",
  "virus_scan",
  "finalization",
  "stage_error",
  "metadata",
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

export function isUploadStatus(value: unknown): value is UploadStatus {
  return UPLOAD_STATUSES.some((s) => s === value);
}

function optionalNumber(raw: string | undefined): number | null {
  if (raw === undefined || raw === "") return null;
  const n = Number(raw);
  return Number.isFinite(n) ? n : null;
}

export function encodeSession(session: UploadSession): Record<string, string> {
  return {
    uploadId: session.uploadId,
    workspaceId: session.workspaceId,
    containerId: session.containerId ?? "",
    userId: session.userId,
    filename: session.filename,
    totalSize: String(session.totalSize),
    chunksCount: String(session.chunksCount),
    status: session.status,
    assembledFilePath: session.assembledFilePath ?? "",
    virusScanQueuedAt: session.virusScanQueuedAt === null ? "" : String(session.virusScanQueuedAt),
    virusScanCompletedAt:
      session.virusScanCompletedAt === null ? "" : String(session.virusScanCompletedAt),
    createdAt: String(session.createdAt),
    updatedAt: String(session.updatedAt),
  };
}

export function decodeSession(
  uploadId: string,
  data: Record<string, string>
): UploadSession {
  const totalSize = Number(data.totalSize);
  const chunksCount = Number(data.chunksCount);
  const createdAt = Number(data.createdAt);
  const updatedAt = Number(data.updatedAt);
  const status = data.status;

  if (
    !Number.isFinite(totalSize) ||
    !Number.isInteger(chunksCount) ||
    !Number.isFinite(createdAt) ||
    !Number.isFinite(updatedAt) ||
    !isUploadStatus(status) ||
    !data.filename ||
    !data.workspaceId ||
    !data.userId
  ) {
    throw new Error("CORRUPT_UPLOAD_SESSION");
  }

  return {
    uploadId,
    workspaceId: data.workspaceId,
    containerId: data.containerId || null,
    userId: data.userId,
    filename: data.filename,
    totalSize,
    chunksCount,
    status,
    assembledFilePath: data.assembledFilePath || null,
    virusScanQueuedAt: optionalNumber(data.virusScanQueuedAt),
    virusScanCompletedAt: optionalNumber(data.virusScanCompletedAt),
    createdAt,
    updatedAt,
  };
}

export function decodeChunk(raw: string): ChunkRecord {
  const v = parseJson(raw);
  if (
    !isRecord(v) ||
    typeof v.chunkNumber !== "number" ||
    typeof v.size !== "number" ||
    typeof v.checksum !== "string" ||
    typeof v.sha256 !== "string" ||
    typeof v.storageKey !== "string" ||
    typeof v.updatedAt !== "number" ||
    (v.status !== "pending" && v.status !== "completed" && v.status !== "failed")
  ) {
    throw new Error("CORRUPT_CHUNK_RECORD");
  }

  return {
    chunkNumber: v.chunkNumber,
    size: v.size,
    checksum: v.checksum,
    sha256: v.sha256,
    status: v.status,
    storageKey: v.storageKey,
    updatedAt: v.updatedAt,
  };
}

function isSessionEvent(v: unknown): v is SessionEvent {
  return (
    isRecord(v) &&
    typeof v.type === "string" &&
    EVENT_TYPES.has(v.type) &&
    typeof v.at === "number"
  );
}

export function decodeEvent(raw: string): SessionEvent {
  const v = parseJson(raw);
  if (!isSessionEvent(v)) {
    throw new Error("CORRUPT_SESSION_EVENT");
  }
  return v;
}

function isStorageReference(v: unknown): v is StorageReference {
  return (
    isRecord(v) &&
    (v.backend === "disk" || v.backend === "walrus") &&
    typeof v.key === "string"
  );
}

export function decodeAsset(raw: string): Asset {
  const v = parseJson(raw);
  if (
    !isRecord(v) ||
    typeof v.assetId !== "string" ||
    typeof v.workspaceId !== "string" ||
    !(typeof v.containerId === "string" || v.containerId === null) ||
    typeof v.userId !== "string" ||
    typeof v.filename !== "string" ||
    typeof v.fileSize !== "number" ||
    typeof v.contentType !== "string" ||
    !isStorageReference(v.storage) ||
    !isRecord(v.metadata) ||
    typeof v.createdAt !== "number"
  ) {
    throw new Error("CORRUPT_ASSET_RECORD");
  }

  return {
    assetId: v.assetId,
    workspaceId: v.workspaceId,
    containerId: v.containerId,
    userId: v.userId,
    filename: v.filename,
    fileSize: v.fileSize,
    contentType: v.contentType,
    storage: v.storage,
    metadata: v.metadata,
    createdAt: v.createdAt,
  };
}
