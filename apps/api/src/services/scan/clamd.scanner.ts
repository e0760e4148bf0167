// src/services/scan/clamd.scanner.ts

import net from "net";
import fsp from "fs/promises";
import { once } from "events";

import type { ScanResult } from "../../types/scan.js";
import {
  PipelineError,
  ScanFailedError,
  ScanFileNotFoundError,
  ScanTimeoutError,
  ScannerUnavailableError,
  errorMessageOf,
  isErrnoCode,
} from "../../utils/errors.js";
import type { VirusScanner } from "./scanner.js";

export interface ClamdOptions {
  host: string;
  port: number;
  timeoutMs: number;
  streamChunkBytes: number;
}

const UNREACHABLE = ["ECONNREFUSED", "EHOSTUNREACH", "ENOTFOUND", "EAI_AGAIN", "ENETUNREACH"];

const FOUND = /^stream: (.+) FOUND$/;

/**
 * clamd replies are NUL-terminated with the z-prefixed commands.
 */
export function parseClamdReply(raw: string): { clean: boolean; virusName: string | null } {
  const reply = raw.replace(/\0/g, "").trim();

  if (reply === "stream: OK") return { clean: true, virusName: null };

  const found = FOUND.exec(reply);
  if (found) return { clean: false, virusName: found[1] };

  if (reply.endsWith("ERROR")) {
    throw new ScanFailedError(`clamd error: ${reply}`);
  }
  throw new ScanFailedError(`Unexpected clamd reply: ${reply || "<empty>"}`);
}

export class ClamdScanner implements VirusScanner {
  readonly name = "clamav";

  constructor(private readonly options: ClamdOptions) {}

  async scan(filePath: string): Promise<ScanResult> {
    const started = Date.now();

    let fileSize: number;
    try {
      fileSize = (await fsp.stat(filePath)).size;
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) throw new ScanFileNotFoundError(filePath);
      throw new ScanFailedError(`Cannot stat ${filePath}`, { cause: err });
    }

    const reply = await this.exchange((socket, signal) =>
      this.streamFile(socket, filePath, signal)
    );
    const { clean, virusName } = parseClamdReply(reply);

    return {
      clean,
      scanner: this.name,
      virusName,
      durationMs: Date.now() - started,
      fileSize,
      scannedAt: Date.now(),
    };
  }

  async ping(): Promise<boolean> {
    try {
      const reply = await this.exchange(async (socket) => {
        socket.write("zPING\0");
      });
      return reply.replace(/\0/g, "").trim() === "PONG";
    } catch {
      return false;
    }
  }

  /**
   * Opens one connection, lets `send` write the request, and resolves with
   * everything clamd sent back up to the first NUL or the end of the stream.
   */
  private exchange(
    send: (socket: net.Socket, signal: AbortSignal) => Promise<void>
  ): Promise<string> {
    const { host, port, timeoutMs } = this.options;

    return new Promise<string>((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      const abort = new AbortController();
      const received: Buffer[] = [];
      let connected = false;
      let settled = false;

      const finish = (err: PipelineError | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        abort.abort();
        socket.destroy();

        if (err) {
          reject(err);
        } else {
          resolve(Buffer.concat(received).toString("utf8"));
        }
      };

      const timer = setTimeout(() => finish(new ScanTimeoutError(timeoutMs)), timeoutMs);

      socket.on("error", (err) => {
        if (!connected || UNREACHABLE.some((code) => isErrnoCode(err, code))) {
          finish(
            new ScannerUnavailableError(`clamd not reachable at ${host}:${port}`, {
              cause: err,
            })
          );
          return;
        }
        finish(new ScanFailedError(`clamd connection failed: ${err.message}`, { cause: err }));
      });

      socket.on("data", (chunk: Buffer) => {
        received.push(chunk);
        if (chunk.includes(0)) finish(null);
      });

      socket.on("end", () => finish(null));

      socket.once("connect", () => {
        connected = true;
        send(socket, abort.signal).catch((err: unknown) => {
          if (settled) return;
          finish(
            err instanceof PipelineError
              ? err
              : new ScanFailedError(`Failed to stream to clamd: ${errorMessageOf(err)}`, {
                  cause: err,
                })
          );
        });
      });
    });
  }

  private async streamFile(socket: net.Socket, filePath: string, signal: AbortSignal) {
    const size = this.options.streamChunkBytes;
    const buf = Buffer.alloc(size);

    socket.write("zINSTREAM\0");

    const fh = await fsp.open(filePath, "r");
    try {
      for (;;) {
        if (signal.aborted) return;

        const { bytesRead } = await fh.read(buf, 0, size, null);
        if (bytesRead === 0) break;

        const frame = Buffer.alloc(4 + bytesRead);
        frame.writeUInt32BE(bytesRead, 0);
        buf.copy(frame, 4, 0, bytesRead);

        if (!socket.write(frame)) {
          await once(socket, "drain", { signal });
        }
      }
    } finally {
      await fh.close();
    }

    // Zero-length frame ends the stream.
    socket.write(Buffer.alloc(4));
  }
}
