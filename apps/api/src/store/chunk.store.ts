// src/store/chunk.store.ts

import type { Readable } from "stream";

export interface StoreChunkOptions {
  /** Hard cap on bytes accepted for one chunk. */
  maxBytes: number;
  /** Declared size; the write fails if the stream differs. */
  expectedSize?: number;
  /** Hex digest; 64 chars is SHA-256, 32 chars is MD5. */
  checksum?: string;
}

export interface StoredChunk {
  storageKey: string;
  size: number;
  sha256: string;
  md5: string;
}

export interface ChunkStore {
  store(
    uploadId: string,
    chunkNumber: number,
    stream: Readable,
    options: StoreChunkOptions
  ): Promise<StoredChunk>;

  exists(storageKey: string, expectedSize?: number): Promise<boolean>;

  read(storageKey: string): Promise<Readable>;

  delete(storageKey: string): Promise<boolean>;

  deleteSession(uploadId: string): Promise<void>;

  /** Upload ids that have a chunk directory on the store. */
  listSessions(): Promise<string[]>;
}
