// src/store/asset.storage.ts

import type { Readable } from "stream";

import type { AssetStorageBackend, StorageReference } from "../types/asset.js";

export interface AttachInput {
  /** Local file whose bytes become the asset. Left in place. */
  filePath: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  /** Upload that produced the bytes; used for logging only. */
  uploadId: string;
}

/**
 * Durable home of finalized bytes. A reference returned by `attach` must be
 * enough to open the bytes again later.
 */
export interface AssetStorage {
  readonly backend: AssetStorageBackend;

  attach(input: AttachInput): Promise<StorageReference>;

  open(ref: StorageReference): Promise<Readable>;

  remove(ref: StorageReference): Promise<void>;
}
