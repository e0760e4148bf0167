// src/services/scan/disabled.scanner.ts

import type { ScanResult } from "../../types/scan.js";
import { ScannerUnavailableError } from "../../utils/errors.js";
import type { VirusScanner } from "./scanner.js";

export class DisabledScanner implements VirusScanner {
  readonly name = "disabled";

  async scan(_filePath: string): Promise<ScanResult> {
    throw new ScannerUnavailableError("Virus scanning is disabled");
  }

  async ping(): Promise<boolean> {
    return false;
  }
}
