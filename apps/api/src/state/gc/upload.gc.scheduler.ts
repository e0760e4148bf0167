// src/state/gc/upload.gc.scheduler.ts

import { runUploadGc, type UploadGcDeps } from "./upload.gc.worker.js";

let timer: NodeJS.Timeout | null = null;
let running: Promise<void> | null = null;

export function startUploadGc(deps: UploadGcDeps, intervalMs: number) {
  if (timer) return;

  deps.log.info({ intervalMs }, "Upload GC started");

  timer = setInterval(() => {
    if (running) return; // prevent overlap

    running = runUploadGc(deps)
      .then(() => undefined)
      .catch((err: unknown) => {
        deps.log.error({ err }, "Upload GC failed");
      })
      .finally(() => {
        running = null;
      });
  }, intervalMs);

  timer.unref();
}

export async function stopUploadGc(): Promise<void> {
  if (timer) {
    clearInterval(timer);
    timer = null;
  }

  if (running) {
    await running;
    running = null;
  }
}
