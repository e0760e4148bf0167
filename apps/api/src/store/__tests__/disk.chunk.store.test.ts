// src/store/__tests__/disk.chunk.store.test.ts

import crypto from "crypto";
import fsp from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  ChecksumMismatchError,
  ChunkNotFoundError,
  ChunkSizeMismatchError,
  ChunkTooLargeError,
} from "../../utils/errors.js";
import { DiskChunkStore } from "../disk.chunk.store.js";
import { bodyOf, listFiles, makeTempDir, readAll } from "../../__tests__/testkit.js";

const sha256 = (data: string) => crypto.createHash("sha256").update(data).digest("hex");
const md5 = (data: string) => crypto.createHash("md5").update(data).digest("hex");

describe("DiskChunkStore", () => {
  let dir: string;
  let store: DiskChunkStore;

  beforeEach(async () => {
    dir = await makeTempDir("chunks");
    store = new DiskChunkStore(dir);
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it("stores a chunk and reports its size and digests", async () => {
    const stored = await store.store("u1", 2, bodyOf("hello world"), { maxBytes: 100 });

    expect(stored).toEqual({
      storageKey: expect.stringMatching(/^session_u1\/chunk_2\.[0-9a-f-]{36}$/),
      size: 11,
      sha256: sha256("hello world"),
      md5: md5("hello world"),
    });
    expect((await readAll(await store.read(stored.storageKey))).toString()).toBe("hello world");
    expect(await store.exists(stored.storageKey, 11)).toBe(true);
    expect(await store.exists(stored.storageKey, 12)).toBe(false);
  });

  it("accepts a matching MD5 or SHA-256 checksum in any case", async () => {
    await expect(
      store.store("u1", 1, bodyOf("abc"), { maxBytes: 100, checksum: md5("abc").toUpperCase() })
    ).resolves.toMatchObject({ size: 3 });
    await expect(
      store.store("u1", 2, bodyOf("abc"), { maxBytes: 100, checksum: sha256("abc") })
    ).resolves.toMatchObject({ size: 3 });
  });

  it("rejects a checksum mismatch and leaves nothing behind", async () => {
    await expect(
      store.store("u1", 1, bodyOf("abc"), { maxBytes: 100, checksum: md5("abd") })
    ).rejects.toBeInstanceOf(ChecksumMismatchError);

    expect(await listFiles(path.join(dir, "session_u1"))).toEqual([]);
  });

  it("rejects a body over the byte limit", async () => {
    await expect(
      store.store("u1", 1, bodyOf("0123456789"), { maxBytes: 5 })
    ).rejects.toBeInstanceOf(ChunkTooLargeError);

    expect(await listFiles(path.join(dir, "session_u1"))).toEqual([]);
  });

  it("rejects a body whose size differs from the declared one", async () => {
    await expect(
      store.store("u1", 1, bodyOf("abc"), { maxBytes: 100, expectedSize: 4 })
    ).rejects.toBeInstanceOf(ChunkSizeMismatchError);
  });

  it("gives every write of a chunk its own key", async () => {
    const first = await store.store("u1", 1, bodyOf("first"), { maxBytes: 100 });
    const second = await store.store("u1", 1, bodyOf("second"), { maxBytes: 100 });

    expect(second.storageKey).not.toBe(first.storageKey);
    expect((await readAll(await store.read(first.storageKey))).toString()).toBe("first");
    expect((await readAll(await store.read(second.storageKey))).toString()).toBe("second");
    expect(await listFiles(path.join(dir, "session_u1"))).toEqual(
      [first.storageKey, second.storageKey].map((k) => path.basename(k)).sort()
    );
  });

  it("never resolves keys outside its directory", async () => {
    await expect(store.read("../outside")).rejects.toBeInstanceOf(ChunkNotFoundError);
    expect(await store.exists("../../etc/passwd")).toBe(false);
    await expect(
      store.store("x/../../outside", 1, bodyOf("x"), { maxBytes: 10 })
    ).rejects.toBeInstanceOf(ChunkNotFoundError);
  });

  it("reports a missing chunk", async () => {
    await expect(store.read("session_u1/chunk_9")).rejects.toBeInstanceOf(ChunkNotFoundError);
  });

  it("deletes chunks and whole sessions", async () => {
    const a = await store.store("u1", 1, bodyOf("a"), { maxBytes: 10 });
    await store.store("u2", 1, bodyOf("b"), { maxBytes: 10 });

    expect(await store.delete(a.storageKey)).toBe(true);
    expect(await store.delete(a.storageKey)).toBe(false);

    expect((await store.listSessions()).sort()).toEqual(["u1", "u2"]);
    await store.deleteSession("u2");
    expect(await store.listSessions()).toEqual(["u1"]);
  });
});
