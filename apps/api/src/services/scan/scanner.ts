// src/services/scan/scanner.ts

import type { ScanResult } from "../../types/scan.js";

/**
 * Malware scanner boundary.
 *
 * `scan` resolves for both clean and infected files and rejects with a
 * PipelineError for everything else: ScanFileNotFoundError,
 * ScannerUnavailableError, ScanTimeoutError or ScanFailedError.
 */
export interface VirusScanner {
  readonly name: string;

  scan(filePath: string): Promise<ScanResult>;

  /** True when the scanner is reachable and answering. */
  ping(): Promise<boolean>;
}
