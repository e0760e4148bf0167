// src/services/scan/index.ts

import { ScannerConfig } from "../../config/scanner.config.js";
import { ClamdScanner } from "./clamd.scanner.js";
import { DisabledScanner } from "./disabled.scanner.js";
import type { VirusScanner } from "./scanner.js";

export function createScanner(): VirusScanner {
  if (ScannerConfig.kind === "disabled") {
    return new DisabledScanner();
  }
  return new ClamdScanner(ScannerConfig);
}

export type { VirusScanner } from "./scanner.js";
export { ClamdScanner } from "./clamd.scanner.js";
export { DisabledScanner } from "./disabled.scanner.js";
