// src/state/upload.state.store.ts

import type { Asset } from "../types/asset.js";
import type {
  ChunkRecord,
  SessionEvent,
  SessionPatch,
  UploadSession,
  UploadStatus,
} from "../types/upload.js";

export interface TransitionRequest {
  /** Statuses the session must currently be in for the update to apply. */
  from: readonly UploadStatus[];
  to: UploadStatus;
  patch?: SessionPatch;
  /** Extra events appended after the status event, in order. */
  events?: SessionEvent[];
  reason?: string;
  at?: number;
}

export type CreateSessionResult =
  | { ok: true; session: UploadSession }
  | { ok: false; reason: "slot_held"; holderId: string }
  | { ok: false; reason: "user_limit"; active: number };

export interface CreateSessionOptions {
  /** Refuse the session when the user already has this many active ones. */
  maxActivePerUser?: number;
}

/**
 * Outcome of a chunk write. `current` is the record on file afterwards;
 * `replaced` is the completed record it superseded, whose file is now
 * unreferenced. `status` on refusal is null when the session is gone.
 */
export type PutChunkResult =
  | { ok: true; current: ChunkRecord; replaced: ChunkRecord | null }
  | { ok: false; status: UploadStatus | null };

export type CreateAssetResult =
  | { created: true; asset: Asset }
  | { created: false; asset: Asset };

/**
 * Authoritative upload state. Every method that changes a session's status
 * is a single atomic update; implementations must not interleave a read and
 * a write of the same session across an await.
 */
export interface UploadStateStore {
  /**
   * Claims the (workspace, container, filename) slot and persists the session
   * in one step. Fails when an active session already holds the slot or the
   * user is at their active-session cap.
   */
  createSession(
    session: UploadSession,
    created: SessionEvent,
    opts?: CreateSessionOptions
  ): Promise<CreateSessionResult>;

  getSession(uploadId: string): Promise<UploadSession | null>;

  /**
   * Compare-and-swap status change. Returns the updated session, or null when
   * the session is missing or not in one of `from`.
   */
  transition(uploadId: string, req: TransitionRequest): Promise<UploadSession | null>;

  appendEvent(uploadId: string, event: SessionEvent): Promise<void>;
  listEvents(uploadId: string): Promise<SessionEvent[]>;

  /**
   * Writes a chunk record while the session still accepts chunks. A record
   * that is not completed never replaces a completed one.
   */
  putChunk(uploadId: string, chunk: ChunkRecord): Promise<PutChunkResult>;
  listChunks(uploadId: string): Promise<ChunkRecord[]>;
  deleteChunks(uploadId: string): Promise<void>;

  /**
   * Oldest-first ids of sessions in `status` whose last activity is at or
   * before `idleSince`.
   */
  listByStatus(
    status: UploadStatus,
    idleSince: number,
    limit: number
  ): Promise<string[]>;

  /** Removes the session, its chunks, events, index entries and slot claim. */
  deleteSession(uploadId: string): Promise<void>;

  /**
   * Persists an asset unless one already exists for `uploadId`; the existing
   * one is returned in that case.
   */
  createAsset(uploadId: string, asset: Asset): Promise<CreateAssetResult>;
  getAsset(assetId: string): Promise<Asset | null>;
  getAssetBySession(uploadId: string): Promise<Asset | null>;

  /**
   * Increments a counter that disappears `ttlMs` after its first hit and
   * returns the new count.
   */
  incrementCounter(key: string, ttlMs: number): Promise<number>;

  ping(): Promise<void>;
}
