// src/services/upload/__tests__/upload.limiter.test.ts

import { describe, expect, it } from "vitest";

import { RateLimitedError } from "../../../utils/errors.js";
import { MemoryUploadStateStore } from "../../../state/memory.state.store.js";
import { UploadRateLimiter } from "../upload.limiter.js";

const limits = { maxActivePerUser: 3, sessionsPerHour: 2, chunksPerMinute: 3 };

function limiterAt(clock: { now: number }) {
  return new UploadRateLimiter(new MemoryUploadStateStore(), limits, () => clock.now);
}

describe("UploadRateLimiter", () => {
  it("admits chunks up to the per-minute limit and reports when the window resets", async () => {
    // 45 seconds into a minute.
    const clock = { now: Date.UTC(2026, 0, 5, 12, 0, 45) };
    const limiter = limiterAt(clock);

    for (let i = 0; i < 3; i++) await limiter.admitChunk("user-1");
    const err = await limiter.admitChunk("user-1").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err).toMatchObject({
      code: "RATE_LIMITED",
      disposition: "transient",
      limit: "chunks_per_minute",
      max: 3,
      retryAfterSeconds: 15,
    });
  });

  it("counts users separately", async () => {
    const clock = { now: Date.UTC(2026, 0, 5, 12, 0, 0) };
    const limiter = limiterAt(clock);

    await limiter.admitSession("user-1");
    await limiter.admitSession("user-1");

    await expect(limiter.admitSession("user-2")).resolves.toBeUndefined();
    await expect(limiter.admitSession("user-1")).rejects.toMatchObject({
      limit: "sessions_per_hour",
      retryAfterSeconds: 3600,
    });
  });

  it("starts a fresh count in the next window", async () => {
    const clock = { now: Date.UTC(2026, 0, 5, 12, 0, 59) };
    const limiter = limiterAt(clock);

    for (let i = 0; i < 3; i++) await limiter.admitChunk("user-1");
    await expect(limiter.admitChunk("user-1")).rejects.toBeInstanceOf(RateLimitedError);

    clock.now = Date.UTC(2026, 0, 5, 12, 1, 0);
    await expect(limiter.admitChunk("user-1")).resolves.toBeUndefined();
  });
});
