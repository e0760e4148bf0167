// src/routes/uploads.routes.ts

import type { FastifyInstance } from "fastify";
import type { MultipartFile } from "@fastify/multipart";

import { sendApiError, sendServiceError } from "../utils/apiError.js";
import type { UploadService } from "../services/upload/upload.session.js";
import type { CreateSessionInput } from "../types/upload.js";

export interface UploadRoutesOptions {
  uploads: UploadService;
}

type UploadParams = { uploadId: string };
type ChunkParams = { uploadId: string; chunkNumber: string };

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

export function isUuid(value: unknown): value is string {
  return typeof value === "string" && UUID.test(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function headerValue(raw: string | string[] | undefined): string | undefined {
  const v = Array.isArray(raw) ? raw[0] : raw;
  return v?.trim() || undefined;
}

/**
 * Reads the create body without trusting its shape. Returns the reason it is
 * unusable as a string.
 */
function parseCreateBody(body: unknown): CreateSessionInput | string {
  if (!isRecord(body)) return "Request body must be a JSON object";

  const { workspaceId, containerId, userId, filename, totalSize, chunksCount, metadata } = body;

  if (typeof workspaceId !== "string") return "workspaceId must be a string";
  if (typeof userId !== "string") return "userId must be a string";
  if (typeof filename !== "string") return "filename must be a string";
  if (containerId !== undefined && containerId !== null && typeof containerId !== "string") {
    return "containerId must be a string or null";
  }
  if (typeof totalSize !== "number") return "totalSize must be a number";
  if (typeof chunksCount !== "number") return "chunksCount must be a number";
  if (metadata !== undefined && !isRecord(metadata)) return "metadata must be an object";

  return {
    workspaceId,
    containerId: containerId ?? null,
    userId,
    filename,
    totalSize,
    chunksCount,
    metadata,
  };
}

export default async function uploadRoutes(app: FastifyInstance, opts: UploadRoutesOptions) {
  const { uploads } = opts;

  app.post<{ Body: unknown }>("/v1/uploads", async (req, reply) => {
    const input = parseCreateBody(req.body);
    if (typeof input === "string") {
      return sendApiError(reply, 400, "INVALID_REQUEST_BODY", input);
    }

    try {
      const { session, recommendedChunkSize } = await uploads.createSession(input);

      return reply.code(201).send({
        uploadId: session.uploadId,
        filename: session.filename,
        status: session.status,
        totalSize: session.totalSize,
        chunksCount: session.chunksCount,
        recommendedChunkSize,
        createdAt: session.createdAt,
      });
    } catch (err) {
      return sendServiceError(reply, req.log, err);
    }
  });

  app.put<{ Params: ChunkParams }>(
    "/v1/uploads/:uploadId/chunks/:chunkNumber",
    async (req, reply) => {
      const { uploadId, chunkNumber } = req.params;

      if (!isUuid(uploadId)) {
        return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
      }

      const n = Number(chunkNumber);
      if (!Number.isInteger(n) || n < 1) {
        return sendApiError(reply, 400, "INVALID_CHUNK", "chunkNumber must be a positive integer");
      }

      const checksum = headerValue(req.headers["x-chunk-checksum"]);
      if (checksum !== undefined && !/^([0-9a-f]{32}|[0-9a-f]{64})$/i.test(checksum)) {
        return sendApiError(
          reply,
          400,
          "INVALID_CHUNK",
          "x-chunk-checksum must be a hex MD5 or SHA-256 digest"
        );
      }

      const sizeHeader = headerValue(req.headers["x-chunk-size"]);
      const size = sizeHeader === undefined ? undefined : Number(sizeHeader);
      if (size !== undefined && (!Number.isInteger(size) || size < 1)) {
        return sendApiError(reply, 400, "INVALID_CHUNK", "x-chunk-size must be a positive integer");
      }

      let part: MultipartFile | undefined;
      try {
        part = await req.file();
      } catch (err) {
        req.log.warn({ err, uploadId }, "Failed to read multipart body");
        return sendApiError(reply, 400, "CHUNK_STREAM_ERROR", "Failed to read chunk stream", {
          retryable: true,
        });
      }

      if (!part || part.type !== "file") {
        return sendApiError(reply, 400, "INVALID_CHUNK", "Multipart file field required");
      }

      try {
        const result = await uploads.uploadChunk(uploadId, n, part.file, { checksum, size });

        return reply.code(201).send({
          uploadId,
          chunkNumber: result.chunk.chunkNumber,
          size: result.chunk.size,
          checksum: result.chunk.checksum,
          completedChunks: result.completedChunks,
          progressPercentage: result.progressPercentage,
          readyForAssembly: result.readyForAssembly,
        });
      } catch (err) {
        // Drain whatever the service did not read so the request can finish.
        part.file.resume();
        return sendServiceError(reply, req.log, err);
      }
    }
  );

  app.get<{ Params: UploadParams }>("/v1/uploads/:uploadId", async (req, reply) => {
    const { uploadId } = req.params;
    if (!isUuid(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    try {
      return await uploads.getStatus(uploadId);
    } catch (err) {
      return sendServiceError(reply, req.log, err);
    }
  });

  app.post<{ Params: UploadParams }>("/v1/uploads/:uploadId/complete", async (req, reply) => {
    const { uploadId } = req.params;
    if (!isUuid(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    try {
      const status = await uploads.completeUpload(uploadId);
      return reply.code(202).send(status);
    } catch (err) {
      return sendServiceError(reply, req.log, err);
    }
  });

  app.patch<{ Params: UploadParams; Body: unknown }>(
    "/v1/uploads/:uploadId/metadata",
    async (req, reply) => {
      const { uploadId } = req.params;
      if (!isUuid(uploadId)) {
        return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
      }

      const body = req.body;
      if (!isRecord(body) || !isRecord(body.metadata)) {
        return sendApiError(
          reply,
          400,
          "INVALID_REQUEST_BODY",
          "Body must be { metadata: object }"
        );
      }

      try {
        const metadata = await uploads.annotate(uploadId, body.metadata);
        return { uploadId, metadata };
      } catch (err) {
        return sendServiceError(reply, req.log, err);
      }
    }
  );

  // Idempotent: cancelling an already-cancelled upload returns its status.
  app.delete<{ Params: UploadParams }>("/v1/uploads/:uploadId", async (req, reply) => {
    const { uploadId } = req.params;
    if (!isUuid(uploadId)) {
      return sendApiError(reply, 400, "INVALID_UPLOAD_ID", "uploadId must be a UUID");
    }

    try {
      return await uploads.cancelSession(uploadId);
    } catch (err) {
      return sendServiceError(reply, req.log, err);
    }
  });
}
