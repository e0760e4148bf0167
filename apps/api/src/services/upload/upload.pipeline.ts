// src/services/upload/upload.pipeline.ts

import PQueue from "p-queue";
import type { FastifyBaseLogger } from "fastify";

import type { PipelineStage } from "../../types/upload.js";
import type { UploadStateStore } from "../../state/upload.state.store.js";
import {
  SessionNotFoundError,
  dispositionOf,
  errorCodeOf,
  errorMessageOf,
} from "../../utils/errors.js";

export interface StageHandler {
  run(uploadId: string): Promise<unknown>;

  /**
   * Called once the stage gives up: a terminal error, or the last transient
   * attempt failed. Must only move the session out of the stage's own status.
   */
  onExhausted(uploadId: string, err: unknown): Promise<void>;
}

export interface StageDispatcher {
  dispatch(stage: PipelineStage, uploadId: string): void;
}

export interface PipelineOptions {
  maxAttempts: number;
  baseRetryDelayMs: number;
  concurrency: number;
}

const STAGES: readonly PipelineStage[] = ["assembly", "scan", "finalize"];

// Work made pointless by a concurrent change; dropped without a trace.
const STALE_CODES = new Set(["ASSEMBLY_SUPERSEDED"]);

export function retryDelayMs(baseMs: number, attempt: number, random = Math.random): number {
  const exp = baseMs * 2 ** (attempt - 1);
  return Math.round(exp + exp * 0.1 * random());
}

function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const t = setTimeout(done, ms);
    function done() {
      clearTimeout(t);
      signal.removeEventListener("abort", done);
      resolve();
    }
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Runs assembly, scan and finalize as queued jobs, one bounded queue per
 * stage. A job retries transient failures in place with backoff; the
 * session's status is the real gate, so a duplicate job is harmless.
 */
export class UploadPipeline implements StageDispatcher {
  private readonly queues: Record<PipelineStage, PQueue>;
  private readonly handlers = new Map<PipelineStage, StageHandler>();
  private readonly closing = new AbortController();

  constructor(
    private readonly state: UploadStateStore,
    private readonly log: FastifyBaseLogger,
    private readonly options: PipelineOptions
  ) {
    this.queues = {
      assembly: new PQueue({ concurrency: options.concurrency }),
      scan: new PQueue({ concurrency: options.concurrency }),
      finalize: new PQueue({ concurrency: options.concurrency }),
    };
  }

  register(stage: PipelineStage, handler: StageHandler) {
    this.handlers.set(stage, handler);
  }

  dispatch(stage: PipelineStage, uploadId: string): void {
    if (this.closing.signal.aborted) {
      this.log.warn({ stage, uploadId }, "Pipeline closed; dispatch dropped");
      return;
    }

    const handler = this.handlers.get(stage);
    if (!handler) {
      throw new Error(`No handler registered for stage ${stage}`);
    }

    this.queues[stage]
      .add(() => this.execute(stage, uploadId, handler))
      .catch((err: unknown) => {
        this.log.error({ err, stage, uploadId }, "Pipeline job crashed");
      });
  }

  private async execute(stage: PipelineStage, uploadId: string, handler: StageHandler) {
    const { maxAttempts, baseRetryDelayMs } = this.options;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        await handler.run(uploadId);
        return;
      } catch (err) {
        if (err instanceof SessionNotFoundError || STALE_CODES.has(errorCodeOf(err))) {
          this.log.debug({ stage, uploadId, code: errorCodeOf(err) }, "Stale pipeline job dropped");
          return;
        }

        const disposition = dispositionOf(err);
        const giveUp = disposition !== "transient" || attempt === maxAttempts;

        this.log.warn(
          { err, stage, uploadId, attempt, disposition, giveUp },
          "Pipeline stage failed"
        );

        await this.recordFailure(stage, uploadId, attempt, err);

        if (giveUp) {
          try {
            await handler.onExhausted(uploadId, err);
          } catch (failErr) {
            this.log.error({ err: failErr, stage, uploadId }, "Failed to record stage failure");
          }
          return;
        }

        await sleep(retryDelayMs(baseRetryDelayMs, attempt), this.closing.signal);
        if (this.closing.signal.aborted) {
          // Left in its status; startup reconcile picks it up again.
          this.log.info({ stage, uploadId }, "Pipeline closed during retry backoff");
          return;
        }
      }
    }
  }

  private async recordFailure(
    stage: PipelineStage,
    uploadId: string,
    attempt: number,
    err: unknown
  ) {
    try {
      await this.state.appendEvent(uploadId, {
        type: "stage_error",
        at: Date.now(),
        stage,
        attempt,
        code: errorCodeOf(err),
        message: errorMessageOf(err),
      });
    } catch (appendErr) {
      this.log.error({ err: appendErr, stage, uploadId }, "Failed to append stage_error event");
    }
  }

  /** Resolves once every queue is empty, including work queued by other stages. */
  async onIdle(): Promise<void> {
    for (;;) {
      await Promise.all(STAGES.map((s) => this.queues[s].onIdle()));
      const busy = STAGES.some((s) => this.queues[s].size + this.queues[s].pending > 0);
      if (!busy) return;
    }
  }

  /** Stops accepting work and cuts retry backoffs short. */
  async close(): Promise<void> {
    this.closing.abort();
    for (const s of STAGES) this.queues[s].clear();
    await Promise.all(STAGES.map((s) => this.queues[s].onIdle()));
  }
}
