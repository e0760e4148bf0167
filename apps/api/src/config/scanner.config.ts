// src/config/scanner.config.ts

import { parseChoiceEnv, parsePositiveIntEnv } from "./env.js";

export const ScannerConfig = {
  kind: parseChoiceEnv("SCANNER", ["clamd", "disabled"] as const, "clamd"),

  host: process.env.CLAMD_HOST?.trim() || "127.0.0.1",
  port: parsePositiveIntEnv("CLAMD_PORT", 3310),
  timeoutMs: parsePositiveIntEnv("CLAMD_TIMEOUT_MS", 30_000),

  // clamd's default StreamMaxLength is 25M; larger files are refused by the daemon.
  streamChunkBytes: 64 * 1024,
};
