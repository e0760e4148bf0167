// src/services/upload/upload.assemble.ts

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import crypto from "crypto";
import { pipeline } from "stream/promises";
import type { FastifyBaseLogger } from "fastify";

import type { ChunkRecord, UploadSession } from "../../types/upload.js";
import type { UploadStateStore } from "../../state/upload.state.store.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import {
  AssemblyError,
  PipelineError,
  SessionNotFoundError,
  StorageError,
  errorMessageOf,
  isErrnoCode,
} from "../../utils/errors.js";
import { isChunkSetComplete, missingChunkNumbers } from "./upload.state.js";
import type { StageDispatcher, StageHandler } from "./upload.pipeline.js";

export interface AssembledFile {
  path: string;
  sizeBytes: number;
  chunks: number;
}

export interface AssemblerDeps {
  state: UploadStateStore;
  chunks: ChunkStore;
  log: FastifyBaseLogger;
  dispatcher: StageDispatcher;
  /** Directory that receives assembled files. */
  assemblyDir: string;
  /** Recorded on the queued virus_scan event. */
  scannerName: string;
}

const SAFE_EXT = /^\.[a-z0-9]{1,10}$/;

export function assembledFileName(uploadId: string, filename: string): string {
  const ext = path.extname(filename).toLowerCase();
  const suffix = crypto.randomBytes(8).toString("hex");
  return `assembled_${uploadId}_${suffix}${SAFE_EXT.test(ext) ? ext : ""}`;
}

export class Assembler implements StageHandler {
  constructor(private readonly deps: AssemblerDeps) {}

  async canAssemble(session: UploadSession, chunks?: ChunkRecord[]): Promise<boolean> {
    if (session.status !== "assembling") return false;
    const list = chunks ?? (await this.deps.state.listChunks(session.uploadId));
    return isChunkSetComplete(session.chunksCount, list);
  }

  async run(uploadId: string): Promise<AssembledFile> {
    const assembled = await this.assemble(uploadId);
    this.deps.dispatcher.dispatch("scan", uploadId);
    return assembled;
  }

  async assemble(uploadId: string): Promise<AssembledFile> {
    const { state, chunks, log } = this.deps;

    const session = await state.getSession(uploadId);
    if (!session) throw new SessionNotFoundError(uploadId);

    if (session.status !== "assembling") {
      throw new AssemblyError(
        "ASSEMBLY_SUPERSEDED",
        `Session is ${session.status}, not assembling`
      );
    }

    const records = await state.listChunks(uploadId);
    if (!isChunkSetComplete(session.chunksCount, records)) {
      const missing = missingChunkNumbers(session.chunksCount, records);
      return this.fail(
        session,
        null,
        "INCOMPLETE_CHUNKS",
        `Missing chunks: ${missing.join(", ")}`
      );
    }

    for (const c of records) {
      if (!(await chunks.exists(c.storageKey, c.size))) {
        return this.fail(
          session,
          null,
          "CHUNK_FILE_MISSING",
          `Chunk ${c.chunkNumber} is missing or has the wrong size`
        );
      }
    }

    await fsp.mkdir(this.deps.assemblyDir, { recursive: true });
    const outPath = path.join(
      this.deps.assemblyDir,
      assembledFileName(uploadId, session.filename)
    );

    log.info({ uploadId, chunks: records.length, outPath }, "Assembling upload");

    try {
      await pipeline(
        async function* () {
          for (const c of records) {
            yield* await chunks.read(c.storageKey);
          }
        },
        fs.createWriteStream(outPath, { flags: "wx" })
      );
    } catch (err) {
      await fsp.rm(outPath, { force: true }).catch(() => undefined);

      if (err instanceof PipelineError && err.disposition === "terminal") {
        return this.fail(session, null, err.code, err.message);
      }
      throw new StorageError(`Failed to assemble ${uploadId}: ${errorMessageOf(err)}`, {
        cause: err,
      });
    }

    const sizeBytes = (await fsp.stat(outPath)).size;
    if (sizeBytes !== session.totalSize) {
      return this.fail(
        session,
        outPath,
        "ASSEMBLY_SIZE_MISMATCH",
        `Assembled ${sizeBytes} bytes, expected ${session.totalSize}`
      );
    }

    const now = Date.now();
    const advanced = await state.transition(uploadId, {
      from: ["assembling"],
      to: "virus_scanning",
      at: now,
      patch: { assembledFilePath: outPath, virusScanQueuedAt: now },
      events: [
        { type: "assembly", at: now, path: outPath, sizeBytes, chunks: records.length },
        { type: "virus_scan", at: now, status: "scanning", scanner: this.deps.scannerName },
      ],
    });

    if (!advanced) {
      await fsp.rm(outPath, { force: true });
      throw new AssemblyError(
        "ASSEMBLY_SUPERSEDED",
        "Session changed while assembling; result discarded"
      );
    }

    try {
      await chunks.deleteSession(uploadId);
      await state.deleteChunks(uploadId);
    } catch (err) {
      // Leftover chunks go when the session is destroyed.
      log.warn({ err, uploadId }, "Failed to remove chunks after assembly");
    }

    log.info({ uploadId, sizeBytes }, "Upload assembled");
    return { path: outPath, sizeBytes, chunks: records.length };
  }

  async onExhausted(uploadId: string, err: unknown): Promise<void> {
    await this.deps.state.transition(uploadId, {
      from: ["assembling"],
      to: "failed",
      reason: errorMessageOf(err),
    });
  }

  private async fail(
    session: UploadSession,
    partialPath: string | null,
    code: string,
    message: string
  ): Promise<never> {
    if (partialPath) {
      await fsp.rm(partialPath, { force: true }).catch((err: unknown) => {
        if (!isErrnoCode(err, "ENOENT")) {
          this.deps.log.warn({ err, partialPath }, "Failed to remove partial assembly");
        }
      });
    }

    await this.deps.state.transition(session.uploadId, {
      from: ["assembling"],
      to: "failed",
      reason: message,
    });

    this.deps.log.warn({ uploadId: session.uploadId, code, message }, "Assembly failed");
    throw new AssemblyError(code, message);
  }
}
