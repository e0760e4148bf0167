// src/app.ts

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import multipart from "@fastify/multipart";

import uploadRoutes from "./routes/uploads.routes.js";
import assetRoutes from "./routes/assets.routes.js";
import healthRoute from "./routes/health.js";
import type { UploadService } from "./services/upload/upload.session.js";
import type { UploadStateStore } from "./state/upload.state.store.js";
import type { AssetStorage } from "./store/asset.storage.js";
import type { VirusScanner } from "./services/scan/scanner.js";

export interface AppServices {
  uploads: UploadService;
  state: UploadStateStore;
  storage: AssetStorage;
  scanner: VirusScanner;
}

export interface CreateAppOptions {
  logger: FastifyServerOptions["logger"];
  /** Largest accepted chunk body. */
  maxChunkBytes: number;
}

function statusCodeOf(err: unknown): number {
  if (typeof err === "object" && err !== null && "statusCode" in err) {
    const code = err.statusCode;
    if (typeof code === "number" && Number.isInteger(code) && code >= 400 && code <= 599) {
      return code;
    }
  }
  return 500;
}

export async function createApp(opts: CreateAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger,
    // Requests should be chunk-sized (multipart) or small JSON.
    bodyLimit: opts.maxChunkBytes + 1024 * 1024,
  });

  await app.register(multipart, {
    attachFieldsToBody: false,
    // Oversized chunks are truncated and rejected by the chunk store.
    throwFileSizeLimit: false,
    limits: {
      // One chunk per request; one extra byte lets the store see the overflow.
      fileSize: opts.maxChunkBytes + 1,
      files: 1,
    },
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode = statusCodeOf(err);

    req.log.error(
      { err, url: req.url, method: req.method, requestId: req.id },
      "Request error"
    );

    return reply.code(statusCode).send({
      error: {
        code: statusCode < 500 ? "REQUEST_ERROR" : "INTERNAL_ERROR",
        message:
          statusCode < 500 && err instanceof Error
            ? err.message
            : "Unexpected server error",
        retryable: false,
      },
    });
  });

  return app;
}

export async function registerRoutes(app: FastifyInstance, services: AppServices) {
  await app.register(uploadRoutes, { uploads: services.uploads });
  await app.register(assetRoutes, { state: services.state, storage: services.storage });
  await app.register(healthRoute, { state: services.state, scanner: services.scanner });
}
