// src/state/gc/upload.gc.worker.ts

import fs from "fs/promises";
import type { FastifyBaseLogger } from "fastify";

import type { UploadStatus } from "../../types/upload.js";
import type { UploadStateStore } from "../upload.state.store.js";
import type { ChunkStore } from "../../store/chunk.store.js";

export interface GcPolicy {
  assemblyStaleMs: number;
  pendingTtlMs: number;
  idleTtlMs: number;
  terminalRetentionMs: number;
  historyRetentionMs: number;
}

export interface UploadGcDeps {
  state: UploadStateStore;
  chunks: ChunkStore;
  log: FastifyBaseLogger;
  policy: GcPolicy;
  batchSize: number;
  now?: () => number;
}

export interface UploadGcResult {
  stuckFailed: number;
  expired: number;
  destroyed: number;
  errors: number;
}

const TERMINAL_FAILURES: readonly UploadStatus[] = [
  "cancelled",
  "failed",
  "virus_scan_failed",
  "finalization_failed",
];

/**
 * Yield to the event loop between batches when the backlog is large.
 */
const yieldToLoop = () => new Promise<void>((r) => setImmediate(r));

/**
 * Removes every artifact of a session: chunk files, the assembled file, and
 * the state record with its chunks, events, index entries and slot claim.
 */
export async function destroySession(
  deps: Pick<UploadGcDeps, "state" | "chunks">,
  uploadId: string
) {
  const session = await deps.state.getSession(uploadId);

  await deps.chunks.deleteSession(uploadId);
  if (session?.assembledFilePath) {
    await fs.rm(session.assembledFilePath, { force: true });
  }
  await deps.state.deleteSession(uploadId);
}

export async function runUploadGc(deps: UploadGcDeps): Promise<UploadGcResult> {
  const { state, log, policy, batchSize } = deps;
  const now = (deps.now ?? Date.now)();
  const result: UploadGcResult = { stuckFailed: 0, expired: 0, destroyed: 0, errors: 0 };

  /**
   * Applies `action` to every session in `status` idle since `cutoff`, a
   * batch at a time. Sessions the action leaves in place would be listed
   * again, so a batch that changes nothing ends the pass.
   */
  const sweep = async (
    status: UploadStatus,
    cutoff: number,
    action: (uploadId: string) => Promise<boolean>
  ) => {
    const skipped = new Set<string>();

    for (;;) {
      const ids = (await state.listByStatus(status, cutoff, batchSize + skipped.size)).filter(
        (id) => !skipped.has(id)
      );
      if (ids.length === 0) return;

      for (const uploadId of ids) {
        try {
          if (!(await action(uploadId))) skipped.add(uploadId);
        } catch (err) {
          result.errors++;
          skipped.add(uploadId);
          log.error({ err, uploadId, status }, "Upload GC failed for session");
        }
      }

      await yieldToLoop();
    }
  };

  // Stuck assemblies give their filename slot back.
  await sweep("assembling", now - policy.assemblyStaleMs, async (uploadId) => {
    const moved = await state.transition(uploadId, {
      from: ["assembling"],
      to: "failed",
      at: now,
      reason: "ASSEMBLY_STALE",
    });
    if (!moved) return false;

    result.stuckFailed++;
    log.warn({ uploadId }, "Stuck assembly marked failed");
    return true;
  });

  const expire = async (uploadId: string, from: UploadStatus) => {
    const moved = await state.transition(uploadId, {
      from: [from],
      to: "cancelled",
      at: now,
      reason: "EXPIRED",
    });
    if (!moved) return false;

    result.expired++;
    await destroySession(deps, uploadId);
    result.destroyed++;
    log.info({ uploadId, from }, "Expired upload destroyed");
    return true;
  };

  await sweep("pending", now - policy.pendingTtlMs, (id) => expire(id, "pending"));
  await sweep("uploading", now - policy.idleTtlMs, (id) => expire(id, "uploading"));

  const destroy = async (uploadId: string) => {
    await destroySession(deps, uploadId);
    result.destroyed++;
    return true;
  };

  for (const status of TERMINAL_FAILURES) {
    await sweep(status, now - policy.terminalRetentionMs, destroy);
  }
  await sweep("completed", now - policy.historyRetentionMs, destroy);

  if (result.stuckFailed || result.expired || result.destroyed || result.errors) {
    log.info({ ...result }, "Upload GC run finished");
  }

  return result;
}
