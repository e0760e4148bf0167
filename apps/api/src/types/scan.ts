// src/types/scan.ts

export interface ScanResult {
  clean: boolean;
  scanner: string;
  virusName: string | null;
  durationMs: number;
  fileSize: number;
  scannedAt: number;
}
