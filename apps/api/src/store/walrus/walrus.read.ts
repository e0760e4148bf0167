// src/store/walrus/walrus.read.ts

export interface WalrusReadOptions {
  aggregatorUrls: readonly string[];
  timeoutMs: number;
  maxRetries: number;
  baseRetryDelayMs: number;
}

function isRetryableNetworkError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const causeMsg = err.cause instanceof Error ? err.cause.message : "";

  return (
    err.message.includes("fetch failed") ||
    causeMsg.includes("ENOTFOUND") ||
    causeMsg.includes("EAI_AGAIN") ||
    causeMsg.includes("ECONNRESET") ||
    causeMsg.includes("ECONNREFUSED") ||
    causeMsg.includes("ETIMEDOUT")
  );
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

const sleep = (ms: number) =>
  ms > 0 ? new Promise<void>((r) => setTimeout(r, ms)) : Promise.resolve();

/**
 * Reader state shared across requests: the aggregator that last answered is
 * tried first next time.
 */
export class WalrusBlobReader {
  private lastGoodIdx = 0;

  constructor(private readonly options: WalrusReadOptions) {
    if (options.aggregatorUrls.length === 0) {
      throw new Error("At least one Walrus aggregator URL is required");
    }
  }

  private async fetchWithTimeout(url: string): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);
    try {
      return await fetch(url, { method: "GET", signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * Returns the first non-retryable response. A 404 is returned, not thrown,
   * so the caller decides what a missing blob means.
   */
  async fetchBlob(blobId: string): Promise<{ res: Response; aggregatorUrl: string }> {
    const urls = this.options.aggregatorUrls;
    const startIdx = this.lastGoodIdx < urls.length ? this.lastGoodIdx : 0;

    let lastErr: unknown = null;
    let lastStatus: number | null = null;

    for (let aggAttempt = 0; aggAttempt < urls.length; aggAttempt++) {
      const idx = (startIdx + aggAttempt) % urls.length;
      const base = urls[idx];
      const url = `${base}/v1/blobs/${encodeURIComponent(blobId)}`;

      for (let attempt = 0; attempt <= this.options.maxRetries; attempt++) {
        try {
          const res = await this.fetchWithTimeout(url);

          if (isRetryableStatus(res.status)) {
            lastStatus = res.status;
            await res.body?.cancel();
            await sleep(this.options.baseRetryDelayMs * (attempt + 1));
            continue;
          }

          this.lastGoodIdx = idx;
          return { res, aggregatorUrl: base };
        } catch (err) {
          if (!isRetryableNetworkError(err)) throw err;
          lastErr = err;
          await sleep(this.options.baseRetryDelayMs * (attempt + 1));
        }
      }
      // Per-aggregator budget spent; move to the next one.
    }

    if (lastErr) throw lastErr;
    throw new Error(`WALRUS_FETCH_FAILED status=${lastStatus ?? "unknown"}`);
  }
}
