// src/services/upload/upload.session.ts

import fsp from "fs/promises";
import crypto from "crypto";
import type { Readable } from "stream";
import type { FastifyBaseLogger } from "fastify";

import type {
  ChunkRecord,
  CreateSessionInput,
  SessionStatusView,
  UploadSession,
  UploadStatus,
} from "../../types/upload.js";
import type { UploadStateStore } from "../../state/upload.state.store.js";
import type { ChunkStore, StoredChunk } from "../../store/chunk.store.js";
import {
  RateLimitedError,
  SessionConflictError,
  SessionNotFoundError,
  SessionStateError,
  SessionValidationError,
  UploadIncompleteError,
} from "../../utils/errors.js";
import {
  ACCEPTING_CHUNKS,
  CANCELLABLE,
  RESERVED_METADATA_KEYS,
  foldSessionMetadata,
  isChunkSetComplete,
  isTerminal,
  latestFailureMessage,
  missingChunkNumbers,
} from "./upload.state.js";
import type { StageDispatcher } from "./upload.pipeline.js";
import type { UploadRateLimiter } from "./upload.limiter.js";

const MiB = 1024 * 1024;
const GiB = 1024 * MiB;

const RESERVED_NAMES = new Set([
  "CON", "PRN", "AUX", "NUL",
  "COM1", "COM2", "COM3", "COM4", "COM5", "COM6", "COM7", "COM8", "COM9",
  "LPT1", "LPT2", "LPT3", "LPT4", "LPT5", "LPT6", "LPT7", "LPT8", "LPT9",
]);

const FORBIDDEN_CHARS = /[<>:"|*?]/;

const POST_ASSEMBLY: readonly UploadStatus[] = [
  "virus_scanning",
  "finalizing",
  "completed",
  "virus_scan_failed",
  "finalization_failed",
];

export interface UploadLimits {
  maxFileSizeBytes: number;
  maxTotalChunks: number;
  maxFilenameLength: number;
  maxChunkBytes: number;
}

export interface UploadServiceDeps {
  state: UploadStateStore;
  chunks: ChunkStore;
  dispatcher: StageDispatcher;
  log: FastifyBaseLogger;
  limits: UploadLimits;
  rateLimiter?: UploadRateLimiter;
}

export interface CreatedSession {
  session: UploadSession;
  recommendedChunkSize: number;
}

export interface ChunkUploadResult {
  chunk: ChunkRecord;
  completedChunks: number;
  progressPercentage: number;
  readyForAssembly: boolean;
}

export function recommendedChunkSize(totalSize: number): number {
  if (totalSize <= 10 * MiB) return 1 * MiB;
  if (totalSize < GiB) return 5 * MiB;
  if (totalSize <= 5 * GiB) return 10 * MiB;
  return 25 * MiB;
}

/**
 * Returns the reason a filename is rejected, or null when it is usable.
 */
export function filenameProblem(filename: string, maxLength: number): string | null {
  const trimmed = filename.trim();

  if (!trimmed) return "Filename is required";
  if (filename.length > maxLength) return `Filename exceeds ${maxLength} characters`;
  if (filename.includes("..")) return "Filename must not contain '..'";
  if (filename.includes("/") || filename.includes("\\")) {
    return "Filename must not contain path separators";
  }
  if (FORBIDDEN_CHARS.test(filename)) return "Filename contains forbidden characters";
  if (/^\.+$/.test(trimmed)) return "Filename must not consist only of dots";

  const stem = trimmed.split(".")[0].toUpperCase();
  if (RESERVED_NAMES.has(stem)) return `Filename uses reserved name ${stem}`;

  return null;
}

function progressOf(chunksCount: number, completed: number): number {
  if (chunksCount <= 0) return 0;
  return Math.round((completed / chunksCount) * 10_000) / 100;
}

function checkMetadata(metadata: Record<string, unknown>) {
  for (const key of RESERVED_METADATA_KEYS) {
    if (Object.hasOwn(metadata, key)) {
      throw new SessionValidationError("metadata", `metadata.${key} is reserved`);
    }
  }
}

function requireId(field: string, value: string | null | undefined): string {
  if (typeof value !== "string" || !value.trim()) {
    throw new SessionValidationError(field, `${field} is required`);
  }
  return value.trim();
}

export class UploadService {
  constructor(private readonly deps: UploadServiceDeps) {}

  private async require(uploadId: string): Promise<UploadSession> {
    const session = await this.deps.state.getSession(uploadId);
    if (!session) throw new SessionNotFoundError(uploadId);
    return session;
  }

  private refused(uploadId: string, status: UploadStatus | null): Error {
    if (!status) return new SessionNotFoundError(uploadId);
    return new SessionStateError(status, `Upload is ${status}; chunks are no longer accepted`);
  }

  async createSession(input: CreateSessionInput): Promise<CreatedSession> {
    const { limits, state, log, rateLimiter } = this.deps;

    const workspaceId = requireId("workspaceId", input.workspaceId);
    const userId = requireId("userId", input.userId);
    const containerId = input.containerId?.trim() || null;

    const problem = filenameProblem(input.filename, limits.maxFilenameLength);
    if (problem) throw new SessionValidationError("filename", problem);

    const { totalSize, chunksCount } = input;

    if (!Number.isInteger(totalSize) || totalSize < 1 || totalSize > limits.maxFileSizeBytes) {
      throw new SessionValidationError(
        "totalSize",
        `totalSize must be an integer between 1 and ${limits.maxFileSizeBytes}`
      );
    }
    if (
      !Number.isInteger(chunksCount) ||
      chunksCount < 1 ||
      chunksCount > limits.maxTotalChunks
    ) {
      throw new SessionValidationError(
        "chunksCount",
        `chunksCount must be an integer between 1 and ${limits.maxTotalChunks}`
      );
    }
    if (chunksCount > totalSize) {
      throw new SessionValidationError("chunksCount", "chunksCount cannot exceed totalSize");
    }
    if (Math.ceil(totalSize / chunksCount) > limits.maxChunkBytes) {
      throw new SessionValidationError(
        "chunksCount",
        `Chunks would exceed ${limits.maxChunkBytes} bytes; use more chunks`
      );
    }

    const metadata = input.metadata ?? {};
    checkMetadata(metadata);

    await rateLimiter?.admitSession(userId);

    const now = Date.now();
    const session: UploadSession = {
      uploadId: crypto.randomUUID(),
      workspaceId,
      containerId,
      userId,
      filename: input.filename.trim(),
      totalSize,
      chunksCount,
      status: "pending",
      assembledFilePath: null,
      virusScanQueuedAt: null,
      virusScanCompletedAt: null,
      createdAt: now,
      updatedAt: now,
    };

    const maxActive = rateLimiter?.limits.maxActivePerUser;
    const res = await state.createSession(
      session,
      { type: "created", at: now, metadata },
      { maxActivePerUser: maxActive }
    );

    if (!res.ok) {
      if (res.reason === "slot_held") {
        throw new SessionConflictError(res.holderId, session.filename);
      }
      throw new RateLimitedError("active_sessions_per_user", maxActive ?? res.active, null);
    }

    log.info(
      { uploadId: session.uploadId, filename: session.filename, totalSize, chunksCount },
      "Upload session created"
    );

    return { session: res.session, recommendedChunkSize: recommendedChunkSize(totalSize) };
  }

  /**
   * Streams one chunk to its own storage key, then swaps the chunk record to
   * point at it. A retry that loses to a status change deletes only its own
   * file; the record and file the assembler reads stay untouched.
   */
  async uploadChunk(
    uploadId: string,
    chunkNumber: number,
    stream: Readable,
    options: { checksum?: string; size?: number } = {}
  ): Promise<ChunkUploadResult> {
    const { state, chunks, limits, log, rateLimiter } = this.deps;

    const session = await this.require(uploadId);
    if (!ACCEPTING_CHUNKS.includes(session.status)) {
      stream.resume();
      throw this.refused(uploadId, session.status);
    }

    if (!Number.isInteger(chunkNumber) || chunkNumber < 1 || chunkNumber > session.chunksCount) {
      stream.resume();
      throw new SessionValidationError(
        "chunkNumber",
        `chunkNumber must be between 1 and ${session.chunksCount}`
      );
    }

    if (options.size !== undefined && (!Number.isInteger(options.size) || options.size < 1)) {
      stream.resume();
      throw new SessionValidationError("size", "Chunk size must be a positive integer");
    }

    try {
      await rateLimiter?.admitChunk(session.userId);
    } catch (err) {
      stream.resume();
      throw err;
    }

    const checksum = options.checksum?.trim().toLowerCase() ?? "";
    const placeholder: Omit<ChunkRecord, "status" | "updatedAt"> = {
      chunkNumber,
      size: options.size ?? 0,
      checksum,
      sha256: "",
      storageKey: "",
    };

    const opened = await state.putChunk(uploadId, {
      ...placeholder,
      status: "pending",
      updatedAt: Date.now(),
    });
    if (!opened.ok) {
      stream.resume();
      throw this.refused(uploadId, opened.status);
    }

    let stored: StoredChunk;
    try {
      stored = await chunks.store(uploadId, chunkNumber, stream, {
        maxBytes: limits.maxChunkBytes,
        expectedSize: options.size,
        checksum: options.checksum,
      });
    } catch (err) {
      await this.markChunkFailed(uploadId, placeholder);
      throw err;
    }

    const record: ChunkRecord = {
      chunkNumber,
      size: stored.size,
      checksum: checksum || stored.sha256,
      sha256: stored.sha256,
      status: "completed",
      storageKey: stored.storageKey,
      updatedAt: Date.now(),
    };

    const res = await state.putChunk(uploadId, record);
    if (!res.ok) {
      await chunks.delete(stored.storageKey);
      throw this.refused(uploadId, res.status);
    }

    if (res.replaced && res.replaced.storageKey !== record.storageKey) {
      await this.discardChunkFile(uploadId, res.replaced.storageKey);
    }

    if (session.status === "pending") {
      await state.transition(uploadId, { from: ["pending"], to: "uploading" });
    }

    const list = await state.listChunks(uploadId);
    const completed = list.filter((c) => c.status === "completed").length;

    log.debug({ uploadId, chunkNumber, size: stored.size }, "Chunk stored");

    return {
      chunk: record,
      completedChunks: completed,
      progressPercentage: progressOf(session.chunksCount, completed),
      readyForAssembly: isChunkSetComplete(session.chunksCount, list),
    };
  }

  private async markChunkFailed(
    uploadId: string,
    placeholder: Omit<ChunkRecord, "status" | "updatedAt">
  ) {
    try {
      await this.deps.state.putChunk(uploadId, {
        ...placeholder,
        status: "failed",
        updatedAt: Date.now(),
      });
    } catch (err) {
      this.deps.log.warn(
        { err, uploadId, chunkNumber: placeholder.chunkNumber },
        "Failed to record chunk failure"
      );
    }
  }

  // The record no longer points here; the sweeper removes it with the session if this fails.
  private async discardChunkFile(uploadId: string, storageKey: string) {
    try {
      await this.deps.chunks.delete(storageKey);
    } catch (err) {
      this.deps.log.warn({ err, uploadId, storageKey }, "Failed to delete superseded chunk");
    }
  }

  async getStatus(uploadId: string): Promise<SessionStatusView> {
    const { state } = this.deps;

    const session = await this.require(uploadId);
    const [list, events] = await Promise.all([
      state.listChunks(uploadId),
      state.listEvents(uploadId),
    ]);

    const done = list.filter((c) => c.status === "completed");

    // Chunk records are dropped once assembly succeeds; every chunk counts from then on.
    const assembled = POST_ASSEMBLY.includes(session.status);
    const completedChunks = assembled ? session.chunksCount : done.length;
    const uploadedBytes = assembled
      ? session.totalSize
      : done.reduce((sum, c) => sum + c.size, 0);

    const failed = isTerminal(session.status) && session.status !== "completed";

    return {
      uploadId,
      filename: session.filename,
      status: session.status,
      totalSize: session.totalSize,
      chunksCount: session.chunksCount,
      completedChunks,
      missingChunks: assembled ? [] : missingChunkNumbers(session.chunksCount, list),
      uploadedBytes,
      progressPercentage: progressOf(session.chunksCount, completedChunks),
      error: failed ? latestFailureMessage(events) : null,
      metadata: foldSessionMetadata(events),
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
    };
  }

  /**
   * Hands a fully uploaded session to the pipeline. Calling it again once the
   * session has moved on just reports the current status.
   */
  async completeUpload(uploadId: string): Promise<SessionStatusView> {
    const { state, dispatcher, log } = this.deps;

    const session = await this.require(uploadId);

    if (!ACCEPTING_CHUNKS.includes(session.status)) {
      if (isTerminal(session.status) && session.status !== "completed") {
        throw new SessionStateError(session.status, `Upload is ${session.status}`);
      }
      return this.getStatus(uploadId);
    }

    const list = await state.listChunks(uploadId);
    if (!isChunkSetComplete(session.chunksCount, list)) {
      throw new UploadIncompleteError(missingChunkNumbers(session.chunksCount, list));
    }

    const moved = await state.transition(uploadId, {
      from: ACCEPTING_CHUNKS,
      to: "assembling",
    });

    if (moved) {
      log.info({ uploadId }, "Upload complete; assembly queued");
      dispatcher.dispatch("assembly", uploadId);
    }

    return this.getStatus(uploadId);
  }

  async cancelSession(uploadId: string): Promise<SessionStatusView> {
    const { state, chunks, log } = this.deps;

    const session = await this.require(uploadId);
    if (session.status === "cancelled") return this.getStatus(uploadId);

    const cancelled = await state.transition(uploadId, {
      from: CANCELLABLE,
      to: "cancelled",
      reason: "Cancelled by user",
    });

    if (!cancelled) {
      const current = await this.require(uploadId);
      if (current.status === "cancelled") return this.getStatus(uploadId);
      throw new SessionStateError(current.status, `Cannot cancel an upload that is ${current.status}`);
    }

    try {
      await chunks.deleteSession(uploadId);
      await state.deleteChunks(uploadId);
      if (session.assembledFilePath) {
        await fsp.rm(session.assembledFilePath, { force: true });
      }
    } catch (err) {
      // The sweeper retries when the session is destroyed.
      log.warn({ err, uploadId }, "Cleanup after cancel failed");
    }

    log.info({ uploadId }, "Upload cancelled");
    return this.getStatus(uploadId);
  }

  async annotate(
    uploadId: string,
    metadata: Record<string, unknown>
  ): Promise<Record<string, unknown>> {
    const { state } = this.deps;

    checkMetadata(metadata);
    await this.require(uploadId);
    await state.appendEvent(uploadId, { type: "metadata", at: Date.now(), metadata });

    return foldSessionMetadata(await state.listEvents(uploadId));
  }
}
