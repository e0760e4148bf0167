// src/store/walrus/walrus.upload.ts

import type { Readable } from "stream";

import { nodeToWeb } from "../../utils/nodeToWeb.js";
import { WalrusHttpError, WalrusResponseError } from "./walrus.metrics.js";

export interface WalrusPublishResult {
  blobId: string;
  objectId?: string;
  endEpoch?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function pick(value: unknown, ...path: string[]): unknown {
  let cur = value;
  for (const key of path) {
    if (!isRecord(cur)) return undefined;
    cur = cur[key];
  }
  return cur;
}

const asString = (v: unknown) => (typeof v === "string" ? v : undefined);
const asNumber = (v: unknown) => (typeof v === "number" ? v : undefined);

/**
 * The publisher answers with either `newlyCreated` or `alreadyCertified`
 * depending on whether the same bytes were stored before.
 */
export function parsePublishResponse(json: unknown): WalrusPublishResult {
  const blobId =
    asString(pick(json, "newlyCreated", "blobObject", "blobId")) ??
    asString(pick(json, "alreadyCertified", "blobId")) ??
    asString(pick(json, "blobObject", "blobId"));

  if (!blobId) throw new WalrusResponseError("WALRUS_MISSING_BLOB_ID");

  return {
    blobId,
    objectId: asString(pick(json, "newlyCreated", "blobObject", "id")),
    endEpoch:
      asNumber(pick(json, "newlyCreated", "blobObject", "storage", "endEpoch")) ??
      asNumber(pick(json, "alreadyCertified", "endEpoch")),
  };
}

async function safeReadText(res: Response): Promise<string> {
  try {
    return await res.text();
  } catch {
    return "";
  }
}

export async function uploadToWalrusOnce(params: {
  publisherUrl: string;
  epochs: number;
  timeoutMs: number;
  streamFactory: () => Readable;
}): Promise<WalrusPublishResult> {
  if (!Number.isInteger(params.epochs) || params.epochs <= 0) {
    throw new WalrusResponseError("INVALID_EPOCHS");
  }

  const query = new URLSearchParams({ epochs: String(params.epochs) });

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), params.timeoutMs);

  try {
    const res = await fetch(`${params.publisherUrl}/v1/blobs?${query.toString()}`, {
      method: "PUT",
      headers: { "Content-Type": "application/octet-stream" },
      body: nodeToWeb(params.streamFactory()),
      duplex: "half",
      signal: controller.signal,
    });

    if (!res.ok) {
      throw new WalrusHttpError(res.status, await safeReadText(res));
    }

    return parsePublishResponse(await res.json());
  } finally {
    clearTimeout(timeout);
  }
}
