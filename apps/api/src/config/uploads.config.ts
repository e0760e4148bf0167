// src/config/uploads.config.ts
import path from "path";

import { parseChoiceEnv, parsePositiveIntEnv } from "./env.js";

if (!process.env.UPLOAD_TMP_DIR) {
  throw new Error("Missing required env: UPLOAD_TMP_DIR");
}

const MB = 1024 * 1024;
const HOUR = 60 * 60 * 1000;

export const UploadConfig = {
  tmpDir: path.resolve(process.env.UPLOAD_TMP_DIR),

  maxFileSizeBytes: parsePositiveIntEnv("UPLOAD_MAX_FILE_BYTES", 5 * 1024 * MB), // 5 GB
  maxTotalChunks: parsePositiveIntEnv("UPLOAD_MAX_CHUNKS", 10_000),
  maxFilenameLength: 255,

  stateBackend: parseChoiceEnv("UPLOAD_STATE_BACKEND", ["redis", "memory"] as const, "redis"),
};

export const ChunkConfig = {
  maxBytes: parsePositiveIntEnv("UPLOAD_CHUNK_MAX_BYTES", 25 * MB),
};

/**
 * How long a session may sit in each phase before the sweeper acts on it.
 */
export const SessionPolicy = {
  // Bounds how long a crashed assembly can hold the filename slot.
  assemblyStaleMs: parsePositiveIntEnv("UPLOAD_ASSEMBLY_STALE_MS", HOUR),
  pendingTtlMs: parsePositiveIntEnv("UPLOAD_PENDING_TTL_MS", HOUR),
  idleTtlMs: parsePositiveIntEnv("UPLOAD_IDLE_TTL_MS", 6 * HOUR),
  terminalRetentionMs: parsePositiveIntEnv("UPLOAD_TERMINAL_RETENTION_MS", 24 * HOUR),
  historyRetentionMs: parsePositiveIntEnv("UPLOAD_HISTORY_RETENTION_MS", 7 * 24 * HOUR),
};

export const GcConfig = {
  gcInterval: parsePositiveIntEnv("UPLOAD_GC_INTERVAL_MS", 5 * 60 * 1000), // 5 minutes
  batchSize: parsePositiveIntEnv("UPLOAD_GC_BATCH_SIZE", 50),
};

export const PipelineConfig = {
  maxAttempts: parsePositiveIntEnv("PIPELINE_MAX_ATTEMPTS", 3),
  baseRetryDelayMs: parsePositiveIntEnv("PIPELINE_RETRY_BASE_MS", 2000, 0),
  concurrency: parsePositiveIntEnv("PIPELINE_CONCURRENCY", 2),
};

export const RateLimitConfig = {
  maxActivePerUser: parsePositiveIntEnv("UPLOAD_MAX_ACTIVE_PER_USER", 3),
  sessionsPerHour: parsePositiveIntEnv("UPLOAD_SESSIONS_PER_HOUR", 15),
  chunksPerMinute: parsePositiveIntEnv("UPLOAD_CHUNKS_PER_MINUTE", 200),
};
