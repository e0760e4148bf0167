// src/state/index.ts

import { UploadConfig } from "../config/uploads.config.js";
import { initRedis } from "./client.js";
import { MemoryUploadStateStore } from "./memory.state.store.js";
import { RedisUploadStateStore } from "./redis.state.store.js";
import type { UploadStateStore } from "./upload.state.store.js";

export async function createStateStore(): Promise<UploadStateStore> {
  if (UploadConfig.stateBackend === "memory") {
    return new MemoryUploadStateStore();
  }
  return new RedisUploadStateStore(await initRedis());
}

export type { UploadStateStore } from "./upload.state.store.js";
export { MemoryUploadStateStore } from "./memory.state.store.js";
export { RedisUploadStateStore } from "./redis.state.store.js";
