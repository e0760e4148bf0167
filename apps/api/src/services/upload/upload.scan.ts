// src/services/upload/upload.scan.ts

import fsp from "fs/promises";
import type { FastifyBaseLogger } from "fastify";

import type { ScanResult } from "../../types/scan.js";
import type { SessionEvent, UploadSession } from "../../types/upload.js";
import type { UploadStateStore } from "../../state/upload.state.store.js";
import type { VirusScanner } from "../scan/scanner.js";
import {
  ScanFileNotFoundError,
  ScannerUnavailableError,
  SessionNotFoundError,
  errorMessageOf,
} from "../../utils/errors.js";
import type { StageDispatcher, StageHandler } from "./upload.pipeline.js";

export interface ScanStageDeps {
  state: UploadStateStore;
  scanner: VirusScanner;
  log: FastifyBaseLogger;
  dispatcher: StageDispatcher;
}

export type ScanOutcome = "clean" | "infected" | "skipped" | "failed" | "ignored";

export class ScanStage implements StageHandler {
  constructor(private readonly deps: ScanStageDeps) {}

  run(uploadId: string): Promise<ScanOutcome> {
    return this.runScan(uploadId);
  }

  /**
   * Scans the assembled file of a session in `virus_scanning`. Errors the
   * scanner cannot recover from are settled here; transient ones propagate
   * so the pipeline retries them.
   */
  async runScan(uploadId: string): Promise<ScanOutcome> {
    const { state, scanner, log } = this.deps;

    const session = await state.getSession(uploadId);
    if (!session) throw new SessionNotFoundError(uploadId);

    if (session.status !== "virus_scanning") {
      log.debug({ uploadId, status: session.status }, "Scan skipped; session not scanning");
      return "ignored";
    }

    if (!session.assembledFilePath) {
      await this.failScan(session, "Assembled file path missing");
      return "failed";
    }

    let result: ScanResult;
    try {
      result = await scanner.scan(session.assembledFilePath);
    } catch (err) {
      if (err instanceof ScanFileNotFoundError) {
        await this.failScan(session, err.message);
        return "failed";
      }

      if (err instanceof ScannerUnavailableError) {
        const now = Date.now();
        log.warn({ uploadId, err }, "Scanner unavailable; completing without scan");

        const moved = await state.transition(uploadId, {
          from: ["virus_scanning"],
          to: "finalizing",
          at: now,
          patch: { virusScanCompletedAt: now },
          events: [
            {
              type: "virus_scan",
              at: now,
              status: "skipped",
              scanner: scanner.name,
              reason: err.message,
            },
          ],
        });
        if (moved) this.deps.dispatcher.dispatch("finalize", uploadId);
        return moved ? "skipped" : "ignored";
      }

      throw err;
    }

    const now = Date.now();

    if (result.clean) {
      const moved = await state.transition(uploadId, {
        from: ["virus_scanning"],
        to: "finalizing",
        at: now,
        patch: { virusScanCompletedAt: now },
        events: [{ type: "virus_scan", at: now, status: "clean", scanner: result.scanner }],
      });

      if (!moved) return "ignored";

      log.info({ uploadId, durationMs: result.durationMs }, "Virus scan clean");
      this.deps.dispatcher.dispatch("finalize", uploadId);
      return "clean";
    }

    const infected: SessionEvent = {
      type: "virus_scan",
      at: now,
      status: "infected",
      scanner: result.scanner,
      ...(result.virusName ? { virusName: result.virusName } : {}),
    };

    const moved = await state.transition(uploadId, {
      from: ["virus_scanning"],
      to: "virus_scan_failed",
      at: now,
      reason: `Virus detected: ${result.virusName ?? "unknown"}`,
      patch: { virusScanCompletedAt: now, assembledFilePath: null },
      events: [infected],
    });

    if (!moved) return "ignored";

    log.warn({ uploadId, virusName: result.virusName }, "Virus detected; file removed");
    await this.removeFile(uploadId, session.assembledFilePath);
    return "infected";
  }

  async onExhausted(uploadId: string, err: unknown): Promise<void> {
    const session = await this.deps.state.getSession(uploadId);
    if (!session) return;
    await this.failScan(session, errorMessageOf(err));
  }

  private async failScan(session: UploadSession, error: string) {
    const now = Date.now();
    await this.deps.state.transition(session.uploadId, {
      from: ["virus_scanning"],
      to: "virus_scan_failed",
      at: now,
      reason: error,
      events: [
        { type: "virus_scan", at: now, status: "failed", scanner: this.deps.scanner.name, error },
      ],
    });
  }

  private async removeFile(uploadId: string, filePath: string) {
    try {
      await fsp.rm(filePath, { force: true });
    } catch (err) {
      this.deps.log.error({ err, uploadId, filePath }, "Failed to remove infected file");
    }
  }
}
