// src/store/index.ts

import path from "path";
import type { FastifyBaseLogger } from "fastify";

import { UploadConfig } from "../config/uploads.config.js";
import { AssetStorageConfig, loadWalrusEnv } from "../config/storage.config.js";
import { DiskChunkStore } from "./disk.chunk.store.js";
import { DiskAssetStorage } from "./disk.asset.storage.js";
import { WalrusAssetStorage } from "./walrus.asset.storage.js";
import type { AssetStorage } from "./asset.storage.js";

export function createChunkStore(): DiskChunkStore {
  return new DiskChunkStore(path.join(UploadConfig.tmpDir, "chunks"));
}

export function createAssetStorage(log: FastifyBaseLogger): AssetStorage {
  if (AssetStorageConfig.backend === "walrus") {
    return new WalrusAssetStorage(loadWalrusEnv(), log);
  }
  return new DiskAssetStorage(AssetStorageConfig.diskDir);
}

export * from "./chunk.store.js";
export * from "./asset.storage.js";
export { DiskChunkStore } from "./disk.chunk.store.js";
export { DiskAssetStorage } from "./disk.asset.storage.js";
export { WalrusAssetStorage } from "./walrus.asset.storage.js";
