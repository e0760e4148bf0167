// src/server.ts

import fs from "fs/promises";
import os from "os";
import path from "path";

import { createApp, registerRoutes } from "./app.js";
import { createStateStore, type UploadStateStore } from "./state/index.js";
import { createAssetStorage, createChunkStore } from "./store/index.js";
import { createScanner } from "./services/scan/index.js";
import { createUploadModule } from "./services/upload/index.js";
import { startUploadGc, stopUploadGc } from "./state/gc/upload.gc.scheduler.js";
import { reconcileUploads } from "./state/gc/upload.gc.reconcile.js";
import {
  ChunkConfig,
  GcConfig,
  PipelineConfig,
  RateLimitConfig,
  SessionPolicy,
  UploadConfig,
} from "./config/uploads.config.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

const app = await createApp({
  logger: {
    level: process.env.NODE_ENV === "production" ? "info" : "debug",
    redact: {
      paths: ["req.headers.authorization"],
      remove: true,
    },
  },
  maxChunkBytes: ChunkConfig.maxBytes,
});

async function validateUploadTmpDir() {
  const dir = UploadConfig.tmpDir;
  const home = os.homedir();

  if (!path.isAbsolute(dir)) {
    throw new Error("UPLOAD_TMP_DIR must be an absolute path");
  }
  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`UPLOAD_TMP_DIR is unsafe: ${dir}`);
  }

  await fs.mkdir(dir, { recursive: true });

  // Fail at boot rather than on the first chunk write.
  const testFile = path.join(dir, `.write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(testFile, "ok");
  await fs.unlink(testFile);
}

const assemblyDir = path.join(UploadConfig.tmpDir, "assembly");

async function initStateStore(): Promise<UploadStateStore> {
  try {
    await validateUploadTmpDir();
    const store = await createStateStore();
    app.log.info({ backend: UploadConfig.stateBackend }, "State store initialized");
    return store;
  } catch (err) {
    app.log.error(err, "Failed to initialize state store");
    process.exit(1);
  }
}

const state = await initStateStore();

const chunks = createChunkStore();
const storage = createAssetStorage(app.log);
const scanner = createScanner();

const { uploads, pipeline } = createUploadModule({
  state,
  chunks,
  assets: storage,
  scanner,
  log: app.log,
  assemblyDir,
  limits: {
    maxFileSizeBytes: UploadConfig.maxFileSizeBytes,
    maxTotalChunks: UploadConfig.maxTotalChunks,
    maxFilenameLength: UploadConfig.maxFilenameLength,
    maxChunkBytes: ChunkConfig.maxBytes,
  },
  rateLimits: RateLimitConfig,
  pipeline: PipelineConfig,
});

// Runs before the routes accept work so fresh assemblies are never taken for orphans.
await reconcileUploads({ state, chunks, dispatcher: pipeline, log: app.log, assemblyDir });

startUploadGc(
  {
    state,
    chunks,
    log: app.log,
    policy: SessionPolicy,
    batchSize: GcConfig.batchSize,
  },
  GcConfig.gcInterval
);

await registerRoutes(app, { uploads, state, storage, scanner });

const PORT = Number(process.env.PORT ?? 3000);

try {
  await app.listen({
    port: PORT,
    host: "0.0.0.0",
  });

  app.log.info(
    {
      port: PORT,
      env: process.env.NODE_ENV ?? "development",
      storage: storage.backend,
      scanner: scanner.name,
    },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await stopUploadGc();
    await app.close();
    await pipeline.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
