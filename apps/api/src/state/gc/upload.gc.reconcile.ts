// src/state/gc/upload.gc.reconcile.ts

import fs from "fs/promises";
import path from "path";
import type { FastifyBaseLogger } from "fastify";

import type { PipelineStage, UploadStatus } from "../../types/upload.js";
import type { UploadStateStore } from "../upload.state.store.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import type { StageDispatcher } from "../../services/upload/upload.pipeline.js";
import { isErrnoCode } from "../../utils/errors.js";

export interface ReconcileDeps {
  state: UploadStateStore;
  chunks: ChunkStore;
  dispatcher: StageDispatcher;
  log: FastifyBaseLogger;
  assemblyDir: string;
}

export interface ReconcileResult {
  redispatched: number;
  orphanChunkDirs: number;
  orphanAssembledFiles: number;
}

const IN_FLIGHT: ReadonlyArray<[UploadStatus, PipelineStage]> = [
  ["assembling", "assembly"],
  ["virus_scanning", "scan"],
  ["finalizing", "finalize"],
];

const ASSEMBLED_FILE = /^assembled_(.+)_[0-9a-f]{16}(\.[a-z0-9]+)?$/;

// Generous ceiling; a restart with more in-flight sessions than this picks
// up the rest on the next restart.
const RECONCILE_LIMIT = 10_000;

async function removeOrphanAssembledFiles(deps: ReconcileDeps): Promise<number> {
  let names: string[];
  try {
    names = await fs.readdir(deps.assemblyDir);
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return 0;
    throw err;
  }

  let removed = 0;
  for (const name of names) {
    const m = ASSEMBLED_FILE.exec(name);
    if (!m) continue;

    const full = path.join(deps.assemblyDir, name);
    const session = await deps.state.getSession(m[1]);
    if (session?.assembledFilePath === full) continue;

    deps.log.warn({ uploadId: m[1], file: name }, "Removing orphan assembled file");
    await fs.rm(full, { force: true });
    removed++;
  }
  return removed;
}

/**
 * Startup pass: drops disk artifacts no session owns, then re-queues
 * sessions a previous process left mid-pipeline.
 *
 * Must run before the pipeline accepts new work, or a fresh assembly's
 * file could be mistaken for an orphan.
 */
export async function reconcileUploads(deps: ReconcileDeps): Promise<ReconcileResult> {
  const { state, chunks, dispatcher, log } = deps;
  const result: ReconcileResult = {
    redispatched: 0,
    orphanChunkDirs: 0,
    orphanAssembledFiles: 0,
  };

  for (const uploadId of await chunks.listSessions()) {
    if (await state.getSession(uploadId)) continue;

    log.warn({ uploadId }, "Removing orphan chunk directory");
    await chunks.deleteSession(uploadId);
    result.orphanChunkDirs++;
  }

  result.orphanAssembledFiles = await removeOrphanAssembledFiles(deps);

  for (const [status, stage] of IN_FLIGHT) {
    const ids = await state.listByStatus(status, Number.MAX_SAFE_INTEGER, RECONCILE_LIMIT);
    for (const uploadId of ids) {
      dispatcher.dispatch(stage, uploadId);
      result.redispatched++;
    }
  }

  log.info({ ...result }, "Upload reconcile finished");
  return result;
}
