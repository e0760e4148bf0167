// src/store/disk.chunk.store.ts

import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import crypto from "crypto";
import { pipeline } from "stream/promises";
import { Transform } from "stream";
import type { Readable } from "stream";

import {
  ChecksumMismatchError,
  ChunkNotFoundError,
  ChunkSizeMismatchError,
  ChunkTooLargeError,
  PipelineError,
  StorageError,
  isErrnoCode,
} from "../utils/errors.js";
import type { ChunkStore, StoreChunkOptions, StoredChunk } from "./chunk.store.js";

const SESSION_DIR_PREFIX = "session_";

function createValidationStream(
  maxBytes: number,
  hashes: crypto.Hash[]
) {
  let written = 0;

  return new Transform({
    transform(chunk: Buffer, _enc, cb) {
      written += chunk.length;

      if (written > maxBytes) {
        cb(new ChunkTooLargeError(maxBytes));
        return;
      }

      for (const h of hashes) h.update(chunk);
      cb(null, chunk);
    },
  });
}

function verifyChecksum(expected: string, sha256: string, md5: string) {
  const normalized = expected.trim().toLowerCase();
  const actual = normalized.length === 32 ? md5 : sha256;
  if (normalized !== actual) {
    throw new ChecksumMismatchError(normalized, actual);
  }
}

function toStorageError(err: unknown, action: string): PipelineError {
  if (err instanceof PipelineError) return err;
  if (isErrnoCode(err, "ENOSPC")) {
    return new StorageError(`No space left on device while ${action}`, { cause: err });
  }
  if (isErrnoCode(err, "EACCES")) {
    return new StorageError(`Permission denied while ${action}`, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new StorageError(`Failed ${action}: ${message}`, { cause: err });
}

/**
 * Chunks live at <baseDir>/session_<uploadId>/chunk_<n>.<attempt>. Every
 * write gets its own key and is renamed into place from a temp file, so a
 * reader never sees a partial chunk and a retry never touches the bytes an
 * earlier attempt left behind. Which attempt counts is decided by the chunk
 * record, not by the file system.
 */
export class DiskChunkStore implements ChunkStore {
  constructor(private readonly baseDir: string) {}

  private sessionDirName(uploadId: string) {
    return `${SESSION_DIR_PREFIX}${uploadId}`;
  }

  private keyFor(uploadId: string, chunkNumber: number) {
    return `${this.sessionDirName(uploadId)}/chunk_${chunkNumber}.${crypto.randomUUID()}`;
  }

  private resolveKey(storageKey: string): string {
    const full = path.resolve(this.baseDir, storageKey);
    const rel = path.relative(this.baseDir, full);
    if (!storageKey || rel.startsWith("..") || path.isAbsolute(rel)) {
      throw new ChunkNotFoundError(storageKey);
    }
    return full;
  }

  async store(
    uploadId: string,
    chunkNumber: number,
    stream: Readable,
    options: StoreChunkOptions
  ): Promise<StoredChunk> {
    if (!Number.isInteger(chunkNumber) || chunkNumber < 1) {
      throw new StorageError(`Chunk number must be positive, got ${chunkNumber}`);
    }

    const storageKey = this.keyFor(uploadId, chunkNumber);
    const finalPath = this.resolveKey(storageKey);
    const tempPath = `${finalPath}.tmp`;

    const sha256 = crypto.createHash("sha256");
    const md5 = crypto.createHash("md5");

    try {
      await fsp.mkdir(path.dirname(finalPath), { recursive: true });

      await pipeline(
        stream,
        createValidationStream(options.maxBytes, [sha256, md5]),
        fs.createWriteStream(tempPath, { flags: "wx" })
      );

      const size = (await fsp.stat(tempPath)).size;
      if (options.expectedSize !== undefined && size !== options.expectedSize) {
        throw new ChunkSizeMismatchError(options.expectedSize, size);
      }

      const digests = { sha256: sha256.digest("hex"), md5: md5.digest("hex") };
      if (options.checksum) {
        verifyChecksum(options.checksum, digests.sha256, digests.md5);
      }

      await fsp.rename(tempPath, finalPath);

      return { storageKey, size, ...digests };
    } catch (err) {
      await fsp.rm(tempPath, { force: true }).catch(() => undefined);
      stream.destroy();
      throw toStorageError(err, `storing chunk ${chunkNumber} of ${uploadId}`);
    }
  }

  async exists(storageKey: string, expectedSize?: number): Promise<boolean> {
    let full: string;
    try {
      full = this.resolveKey(storageKey);
    } catch {
      return false;
    }

    try {
      const st = await fsp.stat(full);
      if (!st.isFile()) return false;
      return expectedSize === undefined || st.size === expectedSize;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return false;
      throw toStorageError(err, `checking ${storageKey}`);
    }
  }

  async read(storageKey: string): Promise<Readable> {
    const full = this.resolveKey(storageKey);

    if (!(await this.exists(storageKey))) {
      throw new ChunkNotFoundError(storageKey);
    }

    return fs.createReadStream(full);
  }

  async delete(storageKey: string): Promise<boolean> {
    const full = this.resolveKey(storageKey);
    try {
      await fsp.unlink(full);
      return true;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return false;
      throw toStorageError(err, `deleting ${storageKey}`);
    }
  }

  async deleteSession(uploadId: string): Promise<void> {
    const dir = path.join(this.baseDir, this.sessionDirName(uploadId));
    try {
      await fsp.rm(dir, { recursive: true, force: true });
    } catch (err) {
      throw toStorageError(err, `removing chunks of ${uploadId}`);
    }
  }

  async listSessions(): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fsp.readdir(this.baseDir, { withFileTypes: true });
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw toStorageError(err, "listing chunk directories");
    }

    return entries
      .filter((e) => e.isDirectory() && e.name.startsWith(SESSION_DIR_PREFIX))
      .map((e) => e.name.slice(SESSION_DIR_PREFIX.length));
  }
}
