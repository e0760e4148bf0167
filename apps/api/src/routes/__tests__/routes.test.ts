// src/routes/__tests__/routes.test.ts

import type { FastifyInstance } from "fastify";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createApp, registerRoutes } from "../../app.js";
import { contentDisposition } from "../assets.routes.js";
import { DisabledScanner } from "../../services/scan/disabled.scanner.js";
import type { VirusScanner } from "../../services/scan/scanner.js";
import type { UploadRateLimits } from "../../services/upload/upload.limiter.js";
import { createHarness, type Harness } from "../../__tests__/testkit.js";

const BOUNDARY = "----tapeloopboundary";
const UNKNOWN_ID = "6f1c2a3b-4d5e-4f60-8a7b-9c0d1e2f3a4b";

function chunkRequest(data: Buffer | string, headers: Record<string, string> = {}) {
  const payload = Buffer.concat([
    Buffer.from(
      `--${BOUNDARY}\r\n` +
        `Content-Disposition: form-data; name="file"; filename="chunk"\r\n` +
        `Content-Type: application/octet-stream\r\n\r\n`
    ),
    Buffer.from(data),
    Buffer.from(`\r\n--${BOUNDARY}--\r\n`),
  ]);

  return {
    payload,
    headers: { "content-type": `multipart/form-data; boundary=${BOUNDARY}`, ...headers },
  };
}

describe("contentDisposition", () => {
  it("adds an ASCII fallback and an encoded filename", () => {
    expect(contentDisposition("naïve.txt")).toBe(
      `attachment; filename="na_ve.txt"; filename*=UTF-8''na%C3%AFve.txt`
    );
    expect(contentDisposition('say "hi".txt')).toBe(
      `attachment; filename="say _hi_.txt"; filename*=UTF-8''say%20%22hi%22.txt`
    );
  });
});

describe("HTTP routes", () => {
  let h: Harness;
  let app: FastifyInstance;

  async function boot(opts: { scanner?: VirusScanner; rateLimits?: UploadRateLimits } = {}) {
    h = await createHarness(opts);
    app = await createApp({ logger: false, maxChunkBytes: 1024 * 1024 });
    await registerRoutes(app, {
      uploads: h.uploads,
      state: h.state,
      storage: h.assets,
      scanner: h.scanner,
    });
    await app.ready();
  }

  afterEach(async () => {
    await app.close();
    await h.cleanup();
  });

  async function create(body: Record<string, unknown> = {}) {
    return app.inject({
      method: "POST",
      url: "/v1/uploads",
      payload: {
        workspaceId: "ws-1",
        containerId: "project-1",
        userId: "user-1",
        filename: "track.wav",
        totalSize: 12,
        chunksCount: 2,
        ...body,
      },
    });
  }

  function putChunk(uploadId: string, n: number, data: string, headers?: Record<string, string>) {
    return app.inject({
      method: "PUT",
      url: `/v1/uploads/${uploadId}/chunks/${n}`,
      ...chunkRequest(data, headers),
    });
  }

  describe("with a live scanner", () => {
    beforeEach(async () => {
      await boot();
    });

    it("creates a session", async () => {
      const res = await create();

      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({
        filename: "track.wav",
        status: "pending",
        totalSize: 12,
        chunksCount: 2,
        recommendedChunkSize: 1024 * 1024,
      });
      expect(res.json().uploadId).toMatch(/^[0-9a-f-]{36}$/);
    });

    it("rejects a second session for a filename in use", async () => {
      const first = (await create()).json();

      const res = await create();

      expect(res.statusCode).toBe(409);
      expect(res.json().error).toMatchObject({
        code: "UPLOAD_CONFLICT",
        retryable: false,
        details: { holderId: first.uploadId },
      });
    });

    it("rejects a malformed create body", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/v1/uploads",
        payload: { filename: "track.wav" },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: {
          code: "INVALID_REQUEST_BODY",
          message: "workspaceId must be a string",
          retryable: false,
        },
      });
    });

    it("reports validation failures with the offending field", async () => {
      const res = await create({ filename: "../etc/passwd" });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toMatchObject({
        code: "INVALID_UPLOAD_REQUEST",
        details: { field: "filename" },
      });
    });

    it("stores a chunk and reports progress", async () => {
      const { uploadId } = (await create()).json();

      const res = await putChunk(uploadId, 1, "hello ", {
        "x-chunk-size": "6",
      });

      expect(res.statusCode).toBe(201);
      expect(res.json()).toMatchObject({
        uploadId,
        chunkNumber: 1,
        size: 6,
        completedChunks: 1,
        progressPercentage: 50,
        readyForAssembly: false,
      });
    });

    it("rejects a chunk whose checksum does not match", async () => {
      const { uploadId } = (await create()).json();

      const res = await putChunk(uploadId, 1, "hello ", {
        "x-chunk-checksum": "0".repeat(32),
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error.code).toBe("CHECKSUM_MISMATCH");
      expect(await h.state.listChunks(uploadId)).toMatchObject([
        { chunkNumber: 1, status: "failed", storageKey: "" },
      ]);

      const status = await app.inject({ method: "GET", url: `/v1/uploads/${uploadId}` });
      expect(status.json()).toMatchObject({ completedChunks: 0, missingChunks: [1, 2] });
    });

    it("validates chunk parameters before reading the body", async () => {
      const { uploadId } = (await create()).json();

      expect((await putChunk("not-a-uuid", 1, "x")).json().error.code).toBe("INVALID_UPLOAD_ID");
      expect((await putChunk(uploadId, 0, "x")).json().error.code).toBe("INVALID_CHUNK");
      expect(
        (await putChunk(uploadId, 1, "x", { "x-chunk-checksum": "xyz" })).json().error.code
      ).toBe("INVALID_CHUNK");
      expect(
        (await putChunk(uploadId, 1, "x", { "x-chunk-size": "-1" })).json().error.code
      ).toBe("INVALID_CHUNK");
    });

    it("refuses to complete with chunks missing", async () => {
      const { uploadId } = (await create()).json();
      await putChunk(uploadId, 1, "hello ");

      const res = await app.inject({ method: "POST", url: `/v1/uploads/${uploadId}/complete` });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: {
          code: "UPLOAD_INCOMPLETE",
          message: "Missing chunks: 2",
          retryable: true,
          details: { missingChunks: [2] },
        },
      });
    });

    it("takes an upload through to a downloadable asset", async () => {
      const { uploadId } = (await create()).json();
      expect((await putChunk(uploadId, 2, "world!")).statusCode).toBe(201);
      expect((await putChunk(uploadId, 1, "hello ")).json().readyForAssembly).toBe(true);

      const completed = await app.inject({
        method: "POST",
        url: `/v1/uploads/${uploadId}/complete`,
      });
      expect(completed.statusCode).toBe(202);

      await h.pipeline.onIdle();

      const status = await app.inject({ method: "GET", url: `/v1/uploads/${uploadId}` });
      expect(status.json()).toMatchObject({
        status: "completed",
        completedChunks: 2,
        missingChunks: [],
        uploadedBytes: 12,
        progressPercentage: 100,
        error: null,
      });

      const asset = await h.state.getAssetBySession(uploadId);
      if (!asset) throw new Error("asset was not created");

      const record = await app.inject({ method: "GET", url: `/v1/assets/${asset.assetId}` });
      expect(record.statusCode).toBe(200);
      expect(record.json()).toMatchObject({
        assetId: asset.assetId,
        filename: "track.wav",
        fileSize: 12,
        contentType: "audio/wav",
      });

      const content = await app.inject({
        method: "GET",
        url: `/v1/assets/${asset.assetId}/content`,
      });
      expect(content.statusCode).toBe(200);
      expect(content.body).toBe("hello world!");
      expect(content.headers["content-type"]).toBe("audio/wav");
      expect(content.headers["content-length"]).toBe("12");
      expect(content.headers["content-disposition"]).toBe(
        `attachment; filename="track.wav"; filename*=UTF-8''track.wav`
      );
      expect(content.headers["cache-control"]).toBe("private, max-age=0, must-revalidate");

      const head = await app.inject({
        method: "HEAD",
        url: `/v1/assets/${asset.assetId}/content`,
      });
      expect(head.statusCode).toBe(200);
      expect(head.body).toBe("");
    });

    it("rejects malformed ids and reports unknown ones", async () => {
      const bad = await app.inject({ method: "GET", url: "/v1/uploads/nope" });
      expect(bad.statusCode).toBe(400);
      expect(bad.json().error.code).toBe("INVALID_UPLOAD_ID");

      const missing = await app.inject({ method: "GET", url: `/v1/uploads/${UNKNOWN_ID}` });
      expect(missing.statusCode).toBe(404);
      expect(missing.json().error.code).toBe("UPLOAD_NOT_FOUND");

      const asset = await app.inject({ method: "GET", url: `/v1/assets/${UNKNOWN_ID}` });
      expect(asset.statusCode).toBe(404);
      expect(asset.json().error.code).toBe("ASSET_NOT_FOUND");

      const badAsset = await app.inject({ method: "GET", url: "/v1/assets/nope/content" });
      expect(badAsset.json().error.code).toBe("INVALID_ASSET_ID");
    });

    it("merges client metadata", async () => {
      const { uploadId } = (await create({ metadata: { title: "Demo" } })).json();

      const res = await app.inject({
        method: "PATCH",
        url: `/v1/uploads/${uploadId}/metadata`,
        payload: { metadata: { bpm: 120 } },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ uploadId, metadata: { title: "Demo", bpm: 120 } });

      const invalid = await app.inject({
        method: "PATCH",
        url: `/v1/uploads/${uploadId}/metadata`,
        payload: { metadata: "loud" },
      });
      expect(invalid.statusCode).toBe(400);
    });

    it("refuses client metadata under a pipeline key", async () => {
      const { uploadId } = (await create()).json();

      const res = await app.inject({
        method: "PATCH",
        url: `/v1/uploads/${uploadId}/metadata`,
        payload: { metadata: { virus_scan: { status: "clean" } } },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().error).toEqual({
        code: "INVALID_UPLOAD_REQUEST",
        message: "metadata.virus_scan is reserved",
        retryable: false,
        details: { field: "metadata" },
      });
    });

    it("cancels an upload and frees its filename", async () => {
      const { uploadId } = (await create()).json();

      const res = await app.inject({ method: "DELETE", url: `/v1/uploads/${uploadId}` });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: "cancelled", error: "Cancelled by user" });
      expect((await create()).statusCode).toBe(201);
    });

    it("reports UP when every dependency answers", async () => {
      const res = await app.inject({ method: "GET", url: "/health" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        status: "UP",
        ready: true,
        checks: { state: { ok: true }, scanner: { ok: true, name: "fake" } },
      });
    });
  });

  describe("with rate limits", () => {
    // 30 seconds into a minute window.
    const NOW = Date.UTC(2026, 0, 5, 12, 0, 30);

    beforeEach(async () => {
      vi.spyOn(Date, "now").mockReturnValue(NOW);
      await boot({ rateLimits: { maxActivePerUser: 1, sessionsPerHour: 100, chunksPerMinute: 1 } });
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it("refuses a session over the active cap without a retry time", async () => {
      expect((await create()).statusCode).toBe(201);

      const res = await create({ filename: "other.wav" });

      expect(res.statusCode).toBe(429);
      expect(res.headers["retry-after"]).toBeUndefined();
      expect(res.json()).toEqual({
        error: {
          code: "RATE_LIMITED",
          message: "Rate limit exceeded: active_sessions_per_user (max 1)",
          retryable: true,
          details: { limit: "active_sessions_per_user", max: 1, retryAfterSeconds: null },
        },
      });
    });

    it("refuses chunks over the per-minute rate with Retry-After", async () => {
      const { uploadId } = (await create()).json();
      expect((await putChunk(uploadId, 1, "hello ")).statusCode).toBe(201);

      const res = await putChunk(uploadId, 2, "world!");

      expect(res.statusCode).toBe(429);
      expect(res.headers["retry-after"]).toBe("30");
      expect(res.json().error).toMatchObject({
        code: "RATE_LIMITED",
        retryable: true,
        details: { limit: "chunks_per_minute", max: 1, retryAfterSeconds: 30 },
      });
    });
  });

  describe("without a scanner", () => {
    beforeEach(async () => {
      await boot({ scanner: new DisabledScanner() });
    });

    it("reports DEGRADED but stays ready", async () => {
      const res = await app.inject({ method: "GET", url: "/health" });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({
        status: "DEGRADED",
        ready: true,
        checks: { scanner: { ok: false, name: "disabled" } },
      });
    });
  });
});
