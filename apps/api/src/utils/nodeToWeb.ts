// src/utils/nodeToWeb.ts

import type { Readable } from "stream";
import { ReadableStream } from "stream/web";

/**
 * Wraps a Node stream for `fetch` bodies. The source is paused while the
 * consumer's queue is full.
 */
export function nodeToWeb(stream: Readable): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      stream.on("data", (chunk: Buffer) => {
        controller.enqueue(new Uint8Array(chunk));
        if ((controller.desiredSize ?? 0) <= 0) stream.pause();
      });
      stream.on("end", () => controller.close());
      stream.on("error", (err) => controller.error(err));
    },
    pull() {
      stream.resume();
    },
    cancel(reason) {
      stream.destroy(reason instanceof Error ? reason : undefined);
    },
  });
}
