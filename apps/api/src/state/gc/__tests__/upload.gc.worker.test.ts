// src/state/gc/__tests__/upload.gc.worker.test.ts

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { runUploadGc, type GcPolicy, type UploadGcDeps } from "../upload.gc.worker.js";
import {
  bodyOf,
  createHarness,
  listFiles,
  patternBytes,
  silentLog,
  uploadFile,
  type Harness,
} from "../../../__tests__/testkit.js";

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

const policy: GcPolicy = {
  assemblyStaleMs: HOUR,
  pendingTtlMs: HOUR,
  idleTtlMs: 6 * HOUR,
  terminalRetentionMs: DAY,
  historyRetentionMs: 7 * DAY,
};

describe("runUploadGc", () => {
  let h: Harness;
  let deps: UploadGcDeps;

  beforeEach(async () => {
    h = await createHarness();
    deps = { state: h.state, chunks: h.chunks, log: silentLog, policy, batchSize: 2 };
  });

  afterEach(async () => {
    await h.cleanup();
  });

  async function create(filename: string) {
    const { session } = await h.uploads.createSession({
      workspaceId: "ws-1",
      containerId: "project-1",
      userId: "user-1",
      filename,
      totalSize: 8,
      chunksCount: 2,
    });
    return session.uploadId;
  }

  it("fails a stuck assembly and frees its filename", async () => {
    const { uploadId } = await uploadFile(h, "stuck.wav", patternBytes(8), 4);
    await h.state.transition(uploadId, { from: ["uploading"], to: "assembling" });
    h.state.backdate(uploadId, Date.now() - 2 * HOUR);

    const result = await runUploadGc(deps);

    expect(result).toMatchObject({ stuckFailed: 1, errors: 0 });
    const status = await h.uploads.getStatus(uploadId);
    expect(status.status).toBe("failed");
    expect(status.error).toBe("ASSEMBLY_STALE");

    await expect(create("stuck.wav")).resolves.toEqual(expect.any(String));
  });

  it("leaves a recent assembly alone", async () => {
    const { uploadId } = await uploadFile(h, "busy.wav", patternBytes(8), 4);
    await h.state.transition(uploadId, { from: ["uploading"], to: "assembling" });
    h.state.backdate(uploadId, Date.now() - 10 * MINUTE);

    const result = await runUploadGc(deps);

    expect(result.stuckFailed).toBe(0);
    expect((await h.state.getSession(uploadId))?.status).toBe("assembling");
  });

  it("expires idle sessions and destroys their chunks", async () => {
    const pending = await create("never-started.wav");
    const idle = await create("abandoned.wav");
    await h.uploads.uploadChunk(idle, 1, bodyOf("1234"));
    const active = await create("active.wav");
    await h.uploads.uploadChunk(active, 1, bodyOf("1234"));

    h.state.backdate(pending, Date.now() - 2 * HOUR);
    h.state.backdate(idle, Date.now() - 7 * HOUR);
    h.state.backdate(active, Date.now() - 2 * HOUR);

    const result = await runUploadGc(deps);

    expect(result).toMatchObject({ expired: 2, destroyed: 2, errors: 0 });
    expect(await h.state.getSession(pending)).toBeNull();
    expect(await h.state.getSession(idle)).toBeNull();
    expect((await h.state.getSession(active))?.status).toBe("uploading");
    expect(await h.chunks.listSessions()).toEqual([active]);
  });

  it("pages through more expired sessions than one batch", async () => {
    const ids: string[] = [];
    for (let i = 0; i < 5; i++) {
      const id = await create(`old-${i}.wav`);
      h.state.backdate(id, Date.now() - 2 * HOUR);
      ids.push(id);
    }

    const result = await runUploadGc(deps);

    expect(result.expired).toBe(5);
    for (const id of ids) expect(await h.state.getSession(id)).toBeNull();
  });

  it("destroys failed sessions after retention and completed ones after history retention", async () => {
    const cancelled = await create("cancelled.wav");
    await h.uploads.cancelSession(cancelled);
    h.state.backdate(cancelled, Date.now() - 2 * DAY);

    const recent = await create("recent.wav");
    await h.uploads.cancelSession(recent);

    const { uploadId: done } = await uploadFile(h, "done.wav", patternBytes(8), 4);
    await h.uploads.completeUpload(done);
    await h.pipeline.onIdle();
    expect((await h.state.getSession(done))?.status).toBe("completed");

    h.state.backdate(done, Date.now() - 2 * DAY);
    await runUploadGc(deps);
    expect((await h.state.getSession(done))?.status).toBe("completed");

    h.state.backdate(done, Date.now() - 8 * DAY);
    const result = await runUploadGc(deps);

    expect(result.destroyed).toBe(1);
    expect(await h.state.getSession(cancelled)).toBeNull();
    expect(await h.state.getSession(done)).toBeNull();
    expect((await h.state.getSession(recent))?.status).toBe("cancelled");
    expect(await h.state.getAssetBySession(done)).not.toBeNull();
    expect(await listFiles(h.assemblyDir)).toEqual([]);
  });
});
