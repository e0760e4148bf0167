// src/services/upload/upload.limiter.ts

import type { UploadStateStore } from "../../state/upload.state.store.js";
import { RateLimitedError } from "../../utils/errors.js";

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

export interface UploadRateLimits {
  /** Sessions one user may hold in an active status at once. */
  maxActivePerUser: number;
  sessionsPerHour: number;
  chunksPerMinute: number;
}

/**
 * Per-user fixed-window limits, counted in the state store so every instance
 * sees the same totals. An attempt is counted before it is checked, so a
 * refused attempt still uses up its window.
 */
export class UploadRateLimiter {
  constructor(
    private readonly state: UploadStateStore,
    readonly limits: UploadRateLimits,
    private readonly now: () => number = () => Date.now()
  ) {}

  admitSession(userId: string): Promise<void> {
    return this.hit("sessions_per_hour", userId, HOUR, this.limits.sessionsPerHour);
  }

  admitChunk(userId: string): Promise<void> {
    return this.hit("chunks_per_minute", userId, MINUTE, this.limits.chunksPerMinute);
  }

  private async hit(limit: string, userId: string, windowMs: number, max: number) {
    const at = this.now();
    const windowStart = Math.floor(at / windowMs) * windowMs;
    const resetIn = windowStart + windowMs - at;

    const count = await this.state.incrementCounter(`${limit}:${userId}:${windowStart}`, resetIn);
    if (count > max) {
      throw new RateLimitedError(limit, max, Math.ceil(resetIn / 1000));
    }
  }
}
