// src/services/upload/upload.finalize.ts

import fsp from "fs/promises";
import crypto from "crypto";
import type { FastifyBaseLogger } from "fastify";

import type { Asset, StorageReference } from "../../types/asset.js";
import type { UploadSession } from "../../types/upload.js";
import type { UploadStateStore } from "../../state/upload.state.store.js";
import type { AssetStorage } from "../../store/asset.storage.js";
import {
  FinalizationError,
  SessionNotFoundError,
  errorMessageOf,
  isErrnoCode,
} from "../../utils/errors.js";
import { contentTypeFor } from "./content.types.js";
import { clientMetadataOf, foldSessionMetadata } from "./upload.state.js";
import type { StageHandler } from "./upload.pipeline.js";

export interface FinalizerDeps {
  state: UploadStateStore;
  assets: AssetStorage;
  log: FastifyBaseLogger;
}

export class Finalizer implements StageHandler {
  constructor(private readonly deps: FinalizerDeps) {}

  run(uploadId: string): Promise<Asset> {
    return this.finalize(uploadId);
  }

  /**
   * Turns a `finalizing` session into exactly one Asset. Safe to call more
   * than once; later calls return the Asset the first one created.
   */
  async finalize(uploadId: string): Promise<Asset> {
    const { state, assets, log } = this.deps;

    const existing = await state.getAssetBySession(uploadId);
    if (existing) {
      const session = await state.getSession(uploadId);
      if (session?.status === "finalizing") {
        await this.complete(session, existing);
      }
      return existing;
    }

    const session = await state.getSession(uploadId);
    if (!session) throw new SessionNotFoundError(uploadId);

    if (session.status !== "finalizing") {
      throw new FinalizationError(
        "SESSION_NOT_FINALIZING",
        `Session is ${session.status}, not finalizing`
      );
    }

    const filePath = session.assembledFilePath;
    if (!filePath) {
      throw new FinalizationError("ASSEMBLED_FILE_MISSING", "Session has no assembled file");
    }

    let fileSize: number;
    try {
      fileSize = (await fsp.stat(filePath)).size;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        const winner = await state.getAssetBySession(uploadId);
        if (winner) return winner;
        throw new FinalizationError(
          "ASSEMBLED_FILE_MISSING",
          `Assembled file not found: ${filePath}`
        );
      }
      throw new FinalizationError("ASSEMBLED_FILE_UNREADABLE", errorMessageOf(err), "transient", {
        cause: err,
      });
    }

    const contentType = contentTypeFor(session.filename);
    let storage: StorageReference;
    try {
      storage = await assets.attach({
        filePath,
        filename: session.filename,
        contentType,
        sizeBytes: fileSize,
        uploadId,
      });
    } catch (err) {
      // A concurrent attempt may have finished and removed the file under us.
      const winner = await state.getAssetBySession(uploadId);
      if (winner) return winner;
      throw err;
    }

    const events = await state.listEvents(uploadId);
    const view = foldSessionMetadata(events);
    const now = Date.now();

    const candidate: Asset = {
      assetId: crypto.randomUUID(),
      workspaceId: session.workspaceId,
      containerId: session.containerId,
      userId: session.userId,
      filename: session.filename,
      fileSize,
      contentType,
      storage,
      metadata: {
        ...clientMetadataOf(events),
        upload_session_id: uploadId,
        chunks_count: session.chunksCount,
        upload_duration: Math.round((now - session.createdAt) / 1000),
        virus_scan: view.virus_scan ?? null,
      },
      createdAt: now,
    };

    const { created, asset } = await state.createAsset(uploadId, candidate);
    if (!created) {
      log.info({ uploadId, assetId: asset.assetId }, "Asset already created by another attempt");
      await assets.remove(storage).catch((err: unknown) => {
        log.warn({ err, uploadId, storage }, "Failed to remove duplicate attachment");
      });
    }

    await this.complete(session, asset);
    return asset;
  }

  private async complete(session: UploadSession, asset: Asset) {
    const { state, log } = this.deps;
    const now = Date.now();

    const done = await state.transition(session.uploadId, {
      from: ["finalizing"],
      to: "completed",
      at: now,
      patch: { assembledFilePath: null },
      events: [
        {
          type: "finalization",
          at: now,
          status: "finalized",
          assetId: asset.assetId,
          assetFilename: asset.filename,
          fileSize: asset.fileSize,
        },
      ],
    });

    if (done) {
      log.info({ uploadId: session.uploadId, assetId: asset.assetId }, "Upload completed");
    }

    if (session.assembledFilePath) {
      try {
        await fsp.rm(session.assembledFilePath, { force: true });
      } catch (err) {
        log.warn(
          { err, uploadId: session.uploadId, path: session.assembledFilePath },
          "Failed to remove assembled file"
        );
      }
    }
  }

  async onExhausted(uploadId: string, err: unknown): Promise<void> {
    const now = Date.now();
    const error = errorMessageOf(err);

    await this.deps.state.transition(uploadId, {
      from: ["finalizing"],
      to: "finalization_failed",
      at: now,
      reason: error,
      events: [{ type: "finalization", at: now, status: "failed", error }],
    });
  }
}
