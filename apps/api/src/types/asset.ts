// src/types/asset.ts

export type AssetStorageBackend = "disk" | "walrus";

/**
 * Stable pointer into durable storage. Enough to re-open the bytes or
 * regenerate a download URL later.
 */
export interface StorageReference {
  backend: AssetStorageBackend;
  key: string;
}

export interface Asset {
  assetId: string;
  workspaceId: string;
  containerId: string | null;
  userId: string;
  filename: string;
  fileSize: number;
  contentType: string;
  storage: StorageReference;
  metadata: Record<string, unknown>;
  createdAt: number;
}
