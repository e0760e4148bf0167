// src/config/storage.config.ts

import path from "path";

import { UploadConfig } from "./uploads.config.js";
import { assertHttpUrl, parseChoiceEnv, parsePositiveIntEnv } from "./env.js";

export const AssetStorageConfig = {
  backend: parseChoiceEnv("ASSET_STORAGE_BACKEND", ["disk", "walrus"] as const, "disk"),

  diskDir: path.resolve(
    process.env.ASSET_STORAGE_DIR || path.join(UploadConfig.tmpDir, "assets")
  ),
};

function parseUrlList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export const WalrusEpochLimits = {
  min: 1,
  max: 90,
  default: 3,
} as const;

/**
 * Walrus settings are only validated when the walrus backend is selected.
 */
export function loadWalrusEnv() {
  const publisherUrl = process.env.WALRUS_PUBLISHER_URL;
  const primaryAggregator = process.env.WALRUS_AGGREGATOR_URL;

  if (!publisherUrl) {
    throw new Error("Missing required env: WALRUS_PUBLISHER_URL");
  }
  if (!primaryAggregator) {
    throw new Error("Missing required env: WALRUS_AGGREGATOR_URL");
  }

  const fallbackAggregators = parseUrlList(process.env.WALRUS_AGGREGATOR_FALLBACK_URLS);

  assertHttpUrl("WALRUS_PUBLISHER_URL", publisherUrl);
  assertHttpUrl("WALRUS_AGGREGATOR_URL", primaryAggregator);
  for (const u of fallbackAggregators) assertHttpUrl("WALRUS_AGGREGATOR_FALLBACK_URLS", u);

  const epochs = parsePositiveIntEnv("WALRUS_EPOCHS", WalrusEpochLimits.default);
  if (epochs > WalrusEpochLimits.max) {
    throw new Error(`WALRUS_EPOCHS must be <= ${WalrusEpochLimits.max}`);
  }

  return {
    publisherUrl: publisherUrl.replace(/\/$/, ""),

    // Ordered list. Reads try the primary first, then fallbacks.
    aggregatorUrls: [primaryAggregator, ...fallbackAggregators].map((u) =>
      u.replace(/\/$/, "")
    ),

    epochs,
  };
}

export type WalrusEnv = ReturnType<typeof loadWalrusEnv>;

export const WalrusReadLimits = {
  timeoutMs: parsePositiveIntEnv("WALRUS_READ_TIMEOUT_MS", 10 * 60_000),

  // Retry budget per aggregator (network errors, 5xx, 429).
  maxRetries: parsePositiveIntEnv("WALRUS_READ_MAX_RETRIES", 2, 0),
  baseRetryDelayMs: parsePositiveIntEnv("WALRUS_READ_RETRY_DELAY_MS", 250, 0),
};

export const WalrusUploadLimits = {
  maxRetries: 3,
  baseRetryDelayMs: 2000,
  timeoutMs: 5 * 60 * 1000,
};

export const WalrusQueueLimits = {
  /**
   * Max concurrent Walrus publish requests.
   */
  concurrency: 3,

  /**
   * Max jobs per interval window.
   */
  intervalCap: 1,

  /**
   * Interval window in ms.
   */
  intervalMs: 1500,
};
