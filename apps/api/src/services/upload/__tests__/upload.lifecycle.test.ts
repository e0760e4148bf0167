// src/services/upload/__tests__/upload.lifecycle.test.ts

import fsp from "fs/promises";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";

import {
  AssemblyError,
  ScanFailedError,
  ScanTimeoutError,
  ScannerUnavailableError,
} from "../../../utils/errors.js";
import { DisabledScanner } from "../../scan/disabled.scanner.js";
import {
  FakeScanner,
  bodyOf,
  cleanResult,
  createHarness,
  listFiles,
  listFilesDeep,
  patternBytes,
  readAll,
  uploadFile,
  type Harness,
} from "../../../__tests__/testkit.js";

describe("upload lifecycle", () => {
  let h: Harness;

  afterEach(async () => {
    await h.cleanup();
  });

  it("turns track.wav uploaded out of order into a byte-exact asset", async () => {
    const scanner = new FakeScanner();
    h = await createHarness({ scanner });
    const data = patternBytes(2044);

    const { uploadId } = await uploadFile(h, "track.wav", data, 1022, [2, 1]);

    const accepted = await h.uploads.completeUpload(uploadId);
    expect(["assembling", "virus_scanning", "finalizing", "completed"]).toContain(accepted.status);

    await h.pipeline.onIdle();

    const status = await h.uploads.getStatus(uploadId);
    expect(status.status).toBe("completed");
    expect(status.completedChunks).toBe(2);
    expect(status.uploadedBytes).toBe(2044);
    expect(status.error).toBeNull();
    expect(status.metadata.virus_scan).toMatchObject({ status: "clean", scanner: "fake" });
    expect(status.metadata.finalization).toMatchObject({
      asset_filename: "track.wav",
      file_size: 2044,
    });

    const asset = await h.state.getAssetBySession(uploadId);
    expect(asset).not.toBeNull();
    if (!asset) return;

    expect(asset.filename).toBe("track.wav");
    expect(asset.fileSize).toBe(2044);
    expect(asset.contentType).toBe("audio/wav");
    expect(asset.containerId).toBe("project-1");
    expect(asset.metadata).toMatchObject({
      upload_session_id: uploadId,
      chunks_count: 2,
      virus_scan: { status: "clean", scanner: "fake" },
    });

    const bytes = await readAll(await h.assets.open(asset.storage));
    expect(bytes.equals(data)).toBe(true);

    expect(scanner.scanned).toHaveLength(1);
    expect(await listFiles(h.assemblyDir)).toEqual([]);
    expect(await h.chunks.listSessions()).toEqual([]);
    expect(await h.state.listChunks(uploadId)).toEqual([]);
  });

  it("completes with a skipped scan when the scanner is unavailable", async () => {
    h = await createHarness({ scanner: new DisabledScanner() });

    const { uploadId } = await uploadFile(h, "mix.wav", patternBytes(300), 100);
    await h.uploads.completeUpload(uploadId);
    await h.pipeline.onIdle();

    const status = await h.uploads.getStatus(uploadId);
    expect(status.status).toBe("completed");
    expect(status.metadata.virus_scan).toMatchObject({
      status: "skipped",
      scanner: "disabled",
      reason: "Virus scanning is disabled",
    });

    const asset = await h.state.getAssetBySession(uploadId);
    expect(asset?.metadata.virus_scan).toMatchObject({ status: "skipped" });
  });

  it("fails an infected upload and deletes the file", async () => {
    const scanner = new FakeScanner(async () => ({
      ...cleanResult("fake"),
      clean: false,
      virusName: "Test-Signature",
    }));
    h = await createHarness({ scanner });

    const { uploadId } = await uploadFile(h, "bad.zip", patternBytes(10), 5);
    await h.uploads.completeUpload(uploadId);
    await h.pipeline.onIdle();

    const status = await h.uploads.getStatus(uploadId);
    expect(status.status).toBe("virus_scan_failed");
    expect(status.error).toBe("Virus detected: Test-Signature");
    expect(status.metadata.virus_scan).toMatchObject({
      status: "infected",
      virus_name: "Test-Signature",
    });

    expect(await h.state.getAssetBySession(uploadId)).toBeNull();
    expect(await listFiles(h.assemblyDir)).toEqual([]);
    expect((await h.state.getSession(uploadId))?.assembledFilePath).toBeNull();
  });

  it("retries a transient scan failure and records each attempt", async () => {
    const scanner = new FakeScanner(async (_file, call) => {
      if (call < 3) throw new ScanTimeoutError(50);
      return cleanResult("fake");
    });
    h = await createHarness({ scanner });

    const { uploadId } = await uploadFile(h, "slow.wav", patternBytes(20), 10);
    await h.uploads.completeUpload(uploadId);
    await h.pipeline.onIdle();

    expect((await h.state.getSession(uploadId))?.status).toBe("completed");
    expect(scanner.scanned).toHaveLength(3);

    const errors = (await h.state.listEvents(uploadId)).filter((e) => e.type === "stage_error");
    expect(errors).toMatchObject([
      { stage: "scan", attempt: 1, code: "SCAN_TIMEOUT" },
      { stage: "scan", attempt: 2, code: "SCAN_TIMEOUT" },
    ]);
  });

  it("fails the scan once retries run out", async () => {
    const scanner = new FakeScanner(async () => {
      throw new ScanFailedError("clamd error: boom");
    });
    h = await createHarness({ scanner, maxAttempts: 2 });

    const { uploadId } = await uploadFile(h, "flaky.wav", patternBytes(20), 10);
    await h.uploads.completeUpload(uploadId);
    await h.pipeline.onIdle();

    const status = await h.uploads.getStatus(uploadId);
    expect(status.status).toBe("virus_scan_failed");
    expect(status.error).toBe("clamd error: boom");
    expect(scanner.scanned).toHaveLength(2);
  });

  it("treats ScannerUnavailableError from a live scanner as a skip", async () => {
    const scanner = new FakeScanner(async () => {
      throw new ScannerUnavailableError("clamd not reachable at 127.0.0.1:3310");
    });
    h = await createHarness({ scanner });

    const { uploadId } = await uploadFile(h, "a.wav", patternBytes(4), 4);
    await h.uploads.completeUpload(uploadId);
    await h.pipeline.onIdle();

    const status = await h.uploads.getStatus(uploadId);
    expect(status.status).toBe("completed");
    expect(status.metadata.virus_scan).toMatchObject({
      status: "skipped",
      reason: "clamd not reachable at 127.0.0.1:3310",
    });
  });
});

describe("Assembler", () => {
  let h: Harness;

  afterEach(async () => {
    await h.cleanup();
  });

  async function startAssembling(chunks: number[], chunksCount: number) {
    const { session } = await h.uploads.createSession({
      workspaceId: "ws-1",
      userId: "user-1",
      filename: "stems.zip",
      totalSize: chunksCount * 4,
      chunksCount,
    });
    for (const n of chunks) {
      await h.uploads.uploadChunk(session.uploadId, n, bodyOf(`c${n}__`));
    }
    await h.state.transition(session.uploadId, {
      from: ["pending", "uploading"],
      to: "assembling",
    });
    return session.uploadId;
  }

  it("fails with the missing chunks and writes no file", async () => {
    h = await createHarness();
    const uploadId = await startAssembling([2], 3);

    const err = await h.assembler.assemble(uploadId).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AssemblyError);
    expect(err).toMatchObject({ code: "INCOMPLETE_CHUNKS" });

    const status = await h.uploads.getStatus(uploadId);
    expect(status.status).toBe("failed");
    expect(status.error).toBe("Missing chunks: 1, 3");
    expect(await listFiles(h.assemblyDir)).toEqual([]);
  });

  it("fails when a recorded chunk file is gone", async () => {
    h = await createHarness();
    const uploadId = await startAssembling([1, 2], 2);
    const second = (await h.state.listChunks(uploadId)).find((c) => c.chunkNumber === 2);
    if (!second) throw new Error("chunk 2 was not recorded");
    await fsp.rm(path.join(h.chunkDir, second.storageKey));

    await expect(h.assembler.assemble(uploadId)).rejects.toMatchObject({
      code: "CHUNK_FILE_MISSING",
    });
    expect((await h.state.getSession(uploadId))?.status).toBe("failed");
  });

  it("assembles chunks in number order and hands over to the scan", async () => {
    h = await createHarness();
    const uploadId = await startAssembling([2, 1], 2);
    expect(await h.assembler.canAssemble((await h.state.getSession(uploadId)) ?? fail())).toBe(
      true
    );

    const assembled = await h.assembler.assemble(uploadId);

    expect(assembled.sizeBytes).toBe(8);
    expect(assembled.chunks).toBe(2);
    expect((await fsp.readFile(assembled.path)).toString()).toBe("c1__c2__");
    expect(path.basename(assembled.path)).toMatch(
      new RegExp(`^assembled_${uploadId}_[0-9a-f]{16}\\.zip$`)
    );

    const session = await h.state.getSession(uploadId);
    expect(session?.status).toBe("virus_scanning");
    expect(session?.assembledFilePath).toBe(assembled.path);
    expect(await h.state.listChunks(uploadId)).toEqual([]);
  });

  it("discards its result when the session was cancelled meanwhile", async () => {
    h = await createHarness();
    const uploadId = await startAssembling([1], 1);
    await h.uploads.cancelSession(uploadId);

    await expect(h.assembler.assemble(uploadId)).rejects.toMatchObject({
      code: "ASSEMBLY_SUPERSEDED",
    });
    expect(await listFiles(h.assemblyDir)).toEqual([]);
    expect((await h.state.getSession(uploadId))?.status).toBe("cancelled");
  });
});

describe("Finalizer", () => {
  let h: Harness;

  afterEach(async () => {
    await h.cleanup();
  });

  it("creates exactly one asset when two attempts race", async () => {
    h = await createHarness();
    const data = patternBytes(64);
    const { uploadId } = await uploadFile(h, "loop.wav", data, 32);

    await h.state.transition(uploadId, { from: ["uploading"], to: "assembling" });
    await h.assembler.assemble(uploadId);
    await h.state.transition(uploadId, { from: ["virus_scanning"], to: "finalizing" });

    const [a, b] = await Promise.all([
      h.finalizer.finalize(uploadId),
      h.finalizer.finalize(uploadId),
    ]);

    expect(a.assetId).toBe(b.assetId);
    expect((await h.state.getSession(uploadId))?.status).toBe("completed");
    expect(await listFilesDeep(h.assetDir)).toHaveLength(1);
    expect(await listFiles(h.assemblyDir)).toEqual([]);

    const again = await h.finalizer.finalize(uploadId);
    expect(again.assetId).toBe(a.assetId);
  });

  it("refuses a session that is not finalizing", async () => {
    h = await createHarness();
    const { uploadId } = await uploadFile(h, "early.wav", patternBytes(8), 8);

    await expect(h.finalizer.finalize(uploadId)).rejects.toMatchObject({
      code: "SESSION_NOT_FINALIZING",
    });
  });
});

function fail(): never {
  throw new Error("session missing");
}
