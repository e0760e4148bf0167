// src/state/keys.ts

import crypto from "crypto";

import type { UploadStatus } from "../types/upload.js";

const PREFIX = "tapeloop:v1";

const key = (suffix: string) => `${PREFIX}:${suffix}`;

/**
 * Slot identity for the one-active-upload-per-location rule. The filename is
 * hashed so arbitrary user input never ends up in a key.
 */
export function slotId(
  workspaceId: string,
  containerId: string | null,
  filename: string
): string {
  const digest = crypto.createHash("sha256").update(filename).digest("hex");
  return `${workspaceId}:${containerId ?? "root"}:${digest}`;
}

export const uploadKeys = {
  session: (uploadId: string) => key(`upload:${uploadId}:session`),

  chunks: (uploadId: string) => key(`upload:${uploadId}:chunks`),

  events: (uploadId: string) => key(`upload:${uploadId}:events`),

  slot: (slot: string) => key(`upload:slot:${slot}`),

  // Scored by last activity; drives the sweeper and startup reconcile.
  statusIndex: (status: UploadStatus) => key(`upload:status:${status}`),

  statusIndexPrefix: () => key("upload:status:"),
};

export const userKeys = {
  // Ids of the user's sessions that may still be active; pruned on create.
  active: (userId: string) => key(`user:${userId}:active`),
};

export const rateKeys = {
  counter: (name: string) => key(`rate:${name}`),
};

export const assetKeys = {
  asset: (assetId: string) => key(`asset:${assetId}`),

  bySession: (uploadId: string) => key(`asset:session:${uploadId}`),
};
