// src/types/upload.ts

export const UPLOAD_STATUSES = [
  "pending",
  "uploading",
  "assembling",
  "virus_scanning",
  "finalizing",
  "completed",
  "failed",
  "virus_scan_failed",
  "finalization_failed",
  "cancelled",
] as const;

export type UploadStatus = (typeof UPLOAD_STATUSES)[number];

export type ChunkStatus = "pending" | "completed" | "failed";

export interface UploadSession {
  uploadId: string;
  workspaceId: string;
  containerId: string | null;
  userId: string;
  filename: string;
  totalSize: number;
  chunksCount: number;
  status: UploadStatus;
  assembledFilePath: string | null;
  virusScanQueuedAt: number | null;
  virusScanCompletedAt: number | null;
  createdAt: number;
  /** Last status change or chunk write. */
  updatedAt: number;
}

/**
 * Fields a status transition may set alongside the status itself.
 */
export type SessionPatch = Partial<
  Pick<
    UploadSession,
    "assembledFilePath" | "virusScanQueuedAt" | "virusScanCompletedAt"
  >
>;

export interface ChunkRecord {
  chunkNumber: number;
  size: number;
  checksum: string;
  sha256: string;
  status: ChunkStatus;
  storageKey: string;
  updatedAt: number;
}

export type VirusScanStatus =
  | "scanning"
  | "clean"
  | "infected"
  | "skipped"
  | "failed";

/**
 * Append-only log entries. The metadata view of a session is a fold over these.
 */
export type SessionEvent =
  | {
      type: "created";
      at: number;
      metadata: Record<string, unknown>;
    }
  | {
      type: "status";
      at: number;
      from: UploadStatus;
      to: UploadStatus;
      reason?: string;
    }
  | {
      type: "assembly";
      at: number;
      path: string;
      sizeBytes: number;
      chunks: number;
    }
  | {
      type: "virus_scan";
      at: number;
      status: VirusScanStatus;
      scanner?: string;
      virusName?: string;
      error?: string;
      reason?: string;
    }
  | {
      type: "finalization";
      at: number;
      status: "finalized" | "failed";
      assetId?: string;
      assetFilename?: string;
      fileSize?: number;
      error?: string;
    }
  | {
      type: "stage_error";
      at: number;
      stage: PipelineStage;
      attempt: number;
      code: string;
      message: string;
    }
  | {
      type: "metadata";
      at: number;
      metadata: Record<string, unknown>;
    };

export type PipelineStage = "assembly" | "scan" | "finalize";

export interface CreateSessionInput {
  workspaceId: string;
  containerId?: string | null;
  userId: string;
  filename: string;
  totalSize: number;
  chunksCount: number;
  metadata?: Record<string, unknown>;
}

export interface SessionStatusView {
  uploadId: string;
  filename: string;
  status: UploadStatus;
  totalSize: number;
  chunksCount: number;
  completedChunks: number;
  missingChunks: number[];
  uploadedBytes: number;
  progressPercentage: number;
  error: string | null;
  metadata: Record<string, unknown>;
  createdAt: number;
  updatedAt: number;
}
