// src/routes/assets.routes.ts

import type { FastifyInstance } from "fastify";

import type { UploadStateStore } from "../state/upload.state.store.js";
import type { AssetStorage } from "../store/asset.storage.js";
import { AssetNotFoundError } from "../utils/errors.js";
import { sendApiError, sendServiceError } from "../utils/apiError.js";
import { isUuid } from "./uploads.routes.js";

export interface AssetRoutesOptions {
  state: UploadStateStore;
  storage: AssetStorage;
}

type AssetParams = { assetId: string };

/**
 * Builds a Content-Disposition value that survives non-ASCII filenames:
 * an ASCII fallback plus the RFC 5987 encoded form.
 */
export function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, "_").replace(/["\\]/g, "_");
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

export default async function assetRoutes(app: FastifyInstance, opts: AssetRoutesOptions) {
  const { state, storage } = opts;

  app.get<{ Params: AssetParams }>("/v1/assets/:assetId", async (req, reply) => {
    const { assetId } = req.params;
    if (!isUuid(assetId)) {
      return sendApiError(reply, 400, "INVALID_ASSET_ID", "assetId must be a UUID");
    }

    try {
      const asset = await state.getAsset(assetId);
      if (!asset) throw new AssetNotFoundError(assetId);
      return asset;
    } catch (err) {
      return sendServiceError(reply, req.log, err);
    }
  });

  app.route<{ Params: AssetParams }>({
    method: ["GET", "HEAD"],
    url: "/v1/assets/:assetId/content",
    exposeHeadRoute: false,
    handler: async (req, reply) => {
      const { assetId } = req.params;
      if (!isUuid(assetId)) {
        return sendApiError(reply, 400, "INVALID_ASSET_ID", "assetId must be a UUID");
      }

      try {
        const asset = await state.getAsset(assetId);
        if (!asset) throw new AssetNotFoundError(assetId);

        reply.header("Content-Type", asset.contentType);
        reply.header("Content-Length", String(asset.fileSize));
        reply.header("Content-Disposition", contentDisposition(asset.filename));
        reply.header("Cache-Control", "private, max-age=0, must-revalidate");

        // HEAD requests can be satisfied from the record.
        if (req.method === "HEAD") {
          return reply.status(200).send();
        }

        const body = await storage.open(asset.storage);

        req.raw.on("close", () => {
          if (!body.destroyed) body.destroy();
        });

        return reply.status(200).send(body);
      } catch (err) {
        return sendServiceError(reply, req.log, err);
      }
    },
  });
}
