// src/services/upload/index.ts

import type { FastifyBaseLogger } from "fastify";

import type { UploadStateStore } from "../../state/upload.state.store.js";
import type { ChunkStore } from "../../store/chunk.store.js";
import type { AssetStorage } from "../../store/asset.storage.js";
import type { VirusScanner } from "../scan/scanner.js";
import { Assembler } from "./upload.assemble.js";
import { Finalizer } from "./upload.finalize.js";
import { ScanStage } from "./upload.scan.js";
import { UploadPipeline, type PipelineOptions } from "./upload.pipeline.js";
import { UploadService, type UploadLimits } from "./upload.session.js";
import { UploadRateLimiter, type UploadRateLimits } from "./upload.limiter.js";

export interface UploadModuleDeps {
  state: UploadStateStore;
  chunks: ChunkStore;
  assets: AssetStorage;
  scanner: VirusScanner;
  log: FastifyBaseLogger;
  assemblyDir: string;
  limits: UploadLimits;
  /** Per-user limits; omitted means unlimited. */
  rateLimits?: UploadRateLimits;
  pipeline: PipelineOptions;
}

export interface UploadModule {
  uploads: UploadService;
  pipeline: UploadPipeline;
  assembler: Assembler;
  scan: ScanStage;
  finalizer: Finalizer;
}

/**
 * Builds the upload services around one pipeline instance.
 */
export function createUploadModule(deps: UploadModuleDeps): UploadModule {
  const { state, chunks, assets, scanner, log } = deps;

  const pipeline = new UploadPipeline(state, log, deps.pipeline);

  const assembler = new Assembler({
    state,
    chunks,
    log,
    dispatcher: pipeline,
    assemblyDir: deps.assemblyDir,
    scannerName: scanner.name,
  });
  const scan = new ScanStage({ state, scanner, log, dispatcher: pipeline });
  const finalizer = new Finalizer({ state, assets, log });

  pipeline.register("assembly", assembler);
  pipeline.register("scan", scan);
  pipeline.register("finalize", finalizer);

  const uploads = new UploadService({
    state,
    chunks,
    dispatcher: pipeline,
    log,
    limits: deps.limits,
    rateLimiter: deps.rateLimits && new UploadRateLimiter(state, deps.rateLimits),
  });

  return { uploads, pipeline, assembler, scan, finalizer };
}

export { UploadService, recommendedChunkSize, filenameProblem } from "./upload.session.js";
export { UploadPipeline, retryDelayMs } from "./upload.pipeline.js";
export { UploadRateLimiter } from "./upload.limiter.js";
export type { UploadRateLimits } from "./upload.limiter.js";
export type { StageDispatcher, StageHandler, PipelineOptions } from "./upload.pipeline.js";
