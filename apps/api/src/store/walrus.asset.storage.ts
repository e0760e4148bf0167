// src/store/walrus.asset.storage.ts

import fs from "fs";
import fsp from "fs/promises";
import { Readable } from "stream";
import PQueue from "p-queue";
import type { FastifyBaseLogger } from "fastify";

import type { StorageReference } from "../types/asset.js";
import {
  WalrusQueueLimits,
  WalrusReadLimits,
  WalrusUploadLimits,
  type WalrusEnv,
} from "../config/storage.config.js";
import {
  AssetNotFoundError,
  FinalizationError,
  StorageError,
  errorMessageOf,
  isErrnoCode,
} from "../utils/errors.js";
import type { AssetStorage, AttachInput } from "./asset.storage.js";
import { uploadToWalrusOnce } from "./walrus/walrus.upload.js";
import { WalrusBlobReader } from "./walrus/walrus.read.js";
import {
  WalrusHttpError,
  classifyWalrusError,
  isRetryableOutcome,
  recordWalrusUploadMetric,
} from "./walrus/walrus.metrics.js";

const sleep = (ms: number) =>
  ms > 0 ? new Promise<void>((r) => setTimeout(r, ms)) : Promise.resolve();

export interface WalrusStorageOptions {
  upload?: Partial<typeof WalrusUploadLimits>;
  read?: Partial<typeof WalrusReadLimits>;
  queue?: PQueue;
}

/**
 * Publishes assets as Walrus blobs. Blobs live for the configured number of
 * epochs; the publisher API has no delete, so `remove` only logs.
 */
export class WalrusAssetStorage implements AssetStorage {
  readonly backend = "walrus";

  private readonly uploadLimits: typeof WalrusUploadLimits;
  private readonly queue: PQueue;
  private readonly reader: WalrusBlobReader;

  constructor(
    private readonly env: WalrusEnv,
    private readonly log: FastifyBaseLogger,
    options: WalrusStorageOptions = {}
  ) {
    this.uploadLimits = { ...WalrusUploadLimits, ...options.upload };

    this.queue =
      options.queue ??
      new PQueue({
        concurrency: WalrusQueueLimits.concurrency,
        intervalCap: WalrusQueueLimits.intervalCap,
        interval: WalrusQueueLimits.intervalMs,
        carryoverConcurrencyCount: true,
      });

    this.reader = new WalrusBlobReader({
      aggregatorUrls: env.aggregatorUrls,
      ...WalrusReadLimits,
      ...options.read,
    });
  }

  async attach(input: AttachInput): Promise<StorageReference> {
    try {
      await fsp.access(input.filePath);
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        throw new FinalizationError(
          "ASSEMBLED_FILE_MISSING",
          `Assembled file not found: ${input.filePath}`
        );
      }
      throw new StorageError(`Cannot read ${input.filePath}`, { cause: err });
    }

    const blobId = await this.queue.add(
      () => this.publishWithRetry(input),
      { throwOnTimeout: true }
    );

    return { backend: this.backend, key: blobId };
  }

  private async publishWithRetry(input: AttachInput): Promise<string> {
    const start = Date.now();
    const { maxRetries, baseRetryDelayMs, timeoutMs } = this.uploadLimits;

    for (let attempt = 1; ; attempt++) {
      try {
        const res = await uploadToWalrusOnce({
          publisherUrl: this.env.publisherUrl,
          epochs: this.env.epochs,
          timeoutMs,
          streamFactory: () => fs.createReadStream(input.filePath),
        });

        recordWalrusUploadMetric(this.log, {
          uploadId: input.uploadId,
          sizeBytes: input.sizeBytes,
          epochs: this.env.epochs,
          attempt,
          durationMs: Date.now() - start,
          outcome: "success",
          timestamp: Date.now(),
        });

        return res.blobId;
      } catch (err) {
        const outcome = classifyWalrusError(err);
        const retryable = isRetryableOutcome(outcome);

        recordWalrusUploadMetric(this.log, {
          uploadId: input.uploadId,
          sizeBytes: input.sizeBytes,
          epochs: this.env.epochs,
          attempt,
          durationMs: Date.now() - start,
          outcome,
          error: errorMessageOf(err),
          httpStatus: err instanceof WalrusHttpError ? err.status : undefined,
          timestamp: Date.now(),
        });

        if (!retryable) {
          throw new FinalizationError(
            "ASSET_STORAGE_REJECTED",
            `Walrus rejected the upload (${outcome})`,
            "terminal",
            { cause: err }
          );
        }

        if (attempt >= maxRetries) {
          throw new StorageError(`Walrus upload failed after ${attempt} attempts`, {
            cause: err,
          });
        }

        await sleep(baseRetryDelayMs * attempt);
      }
    }
  }

  async open(ref: StorageReference): Promise<Readable> {
    let res: Response;
    try {
      ({ res } = await this.reader.fetchBlob(ref.key));
    } catch (err) {
      throw new StorageError(`Walrus read failed for ${ref.key}`, { cause: err });
    }

    if (res.status === 404) {
      await res.body?.cancel();
      throw new AssetNotFoundError(ref.key);
    }
    if (!res.ok || !res.body) {
      await res.body?.cancel();
      throw new StorageError(`Walrus read failed for ${ref.key} (status ${res.status})`);
    }

    return Readable.fromWeb(res.body);
  }

  async remove(ref: StorageReference): Promise<void> {
    this.log.info(
      { blobId: ref.key, epochs: this.env.epochs },
      "Walrus blob left to expire"
    );
  }
}
