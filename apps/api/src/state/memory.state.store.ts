// src/state/memory.state.store.ts

import type { Asset } from "../types/asset.js";
import type {
  ChunkRecord,
  SessionEvent,
  UploadSession,
  UploadStatus,
} from "../types/upload.js";
import {
  ACCEPTING_CHUNKS,
  assertTransitionSet,
  isActive,
} from "../services/upload/upload.state.js";
import { slotId } from "./keys.js";
import type {
  CreateAssetResult,
  CreateSessionOptions,
  CreateSessionResult,
  PutChunkResult,
  TransitionRequest,
  UploadStateStore,
} from "./upload.state.store.js";

/**
 * Single-process state store. Each method does its read-check-write without
 * yielding, which gives the same atomicity the Redis scripts provide.
 */
export class MemoryUploadStateStore implements UploadStateStore {
  private sessions = new Map<string, UploadSession>();
  private chunks = new Map<string, Map<number, ChunkRecord>>();
  private events = new Map<string, SessionEvent[]>();
  private slots = new Map<string, string>();
  private assets = new Map<string, Asset>();
  private assetBySession = new Map<string, string>();
  private counters = new Map<string, { count: number; expiresAt: number }>();

  async createSession(
    session: UploadSession,
    created: SessionEvent,
    opts: CreateSessionOptions = {}
  ): Promise<CreateSessionResult> {
    const slot = slotId(session.workspaceId, session.containerId, session.filename);
    const holderId = this.slots.get(slot);

    if (holderId) {
      const holder = this.sessions.get(holderId);
      if (holder && isActive(holder.status)) {
        return { ok: false, reason: "slot_held", holderId };
      }
    }

    if (opts.maxActivePerUser !== undefined) {
      let active = 0;
      for (const s of this.sessions.values()) {
        if (s.userId === session.userId && isActive(s.status)) active++;
      }
      if (active >= opts.maxActivePerUser) {
        return { ok: false, reason: "user_limit", active };
      }
    }

    this.slots.set(slot, session.uploadId);
    this.sessions.set(session.uploadId, { ...session });
    this.events.set(session.uploadId, [created]);
    return { ok: true, session: { ...session } };
  }

  async getSession(uploadId: string): Promise<UploadSession | null> {
    const s = this.sessions.get(uploadId);
    return s ? { ...s } : null;
  }

  async transition(
    uploadId: string,
    req: TransitionRequest
  ): Promise<UploadSession | null> {
    assertTransitionSet(req.from, req.to);

    const current = this.sessions.get(uploadId);
    if (!current || !req.from.includes(current.status)) return null;

    const at = req.at ?? Date.now();
    const next: UploadSession = {
      ...current,
      ...req.patch,
      status: req.to,
      updatedAt: at,
    };
    this.sessions.set(uploadId, next);

    const log = this.events.get(uploadId) ?? [];
    log.push({
      type: "status",
      at,
      from: current.status,
      to: req.to,
      ...(req.reason ? { reason: req.reason } : {}),
    });
    log.push(...(req.events ?? []));
    this.events.set(uploadId, log);

    if (!isActive(req.to)) {
      this.releaseSlot(next);
    }

    return { ...next };
  }

  async appendEvent(uploadId: string, event: SessionEvent): Promise<void> {
    const log = this.events.get(uploadId);
    if (!log) return;
    log.push(event);
  }

  async listEvents(uploadId: string): Promise<SessionEvent[]> {
    return [...(this.events.get(uploadId) ?? [])];
  }

  async putChunk(uploadId: string, chunk: ChunkRecord): Promise<PutChunkResult> {
    const session = this.sessions.get(uploadId);
    if (!session) return { ok: false, status: null };
    if (!ACCEPTING_CHUNKS.includes(session.status)) {
      return { ok: false, status: session.status };
    }

    let byNumber = this.chunks.get(uploadId);
    if (!byNumber) {
      byNumber = new Map();
      this.chunks.set(uploadId, byNumber);
    }

    const prev = byNumber.get(chunk.chunkNumber);
    if (prev?.status === "completed" && chunk.status !== "completed") {
      return { ok: true, current: { ...prev }, replaced: null };
    }

    byNumber.set(chunk.chunkNumber, { ...chunk });
    session.updatedAt = Math.max(session.updatedAt, chunk.updatedAt);
    return {
      ok: true,
      current: { ...chunk },
      replaced: prev?.status === "completed" ? { ...prev } : null,
    };
  }

  async listChunks(uploadId: string): Promise<ChunkRecord[]> {
    const byNumber = this.chunks.get(uploadId);
    if (!byNumber) return [];
    return [...byNumber.values()]
      .map((c) => ({ ...c }))
      .sort((a, b) => a.chunkNumber - b.chunkNumber);
  }

  async deleteChunks(uploadId: string): Promise<void> {
    this.chunks.delete(uploadId);
  }

  async listByStatus(
    status: UploadStatus,
    idleSince: number,
    limit: number
  ): Promise<string[]> {
    return [...this.sessions.values()]
      .filter((s) => s.status === status && s.updatedAt <= idleSince)
      .sort((a, b) => a.updatedAt - b.updatedAt)
      .slice(0, limit)
      .map((s) => s.uploadId);
  }

  async deleteSession(uploadId: string): Promise<void> {
    const session = this.sessions.get(uploadId);
    if (session) this.releaseSlot(session);

    this.sessions.delete(uploadId);
    this.chunks.delete(uploadId);
    this.events.delete(uploadId);
  }

  async createAsset(uploadId: string, asset: Asset): Promise<CreateAssetResult> {
    const existingId = this.assetBySession.get(uploadId);
    const existing = existingId ? this.assets.get(existingId) : undefined;
    if (existing) {
      return { created: false, asset: { ...existing } };
    }

    this.assets.set(asset.assetId, { ...asset });
    this.assetBySession.set(uploadId, asset.assetId);
    return { created: true, asset: { ...asset } };
  }

  async getAsset(assetId: string): Promise<Asset | null> {
    const a = this.assets.get(assetId);
    return a ? { ...a } : null;
  }

  async getAssetBySession(uploadId: string): Promise<Asset | null> {
    const id = this.assetBySession.get(uploadId);
    return id ? this.getAsset(id) : null;
  }

  async incrementCounter(key: string, ttlMs: number): Promise<number> {
    const now = Date.now();
    const entry = this.counters.get(key);
    if (!entry || entry.expiresAt <= now) {
      for (const [k, c] of this.counters) {
        if (c.expiresAt <= now) this.counters.delete(k);
      }
      this.counters.set(key, { count: 1, expiresAt: now + ttlMs });
      return 1;
    }
    entry.count++;
    return entry.count;
  }

  async ping(): Promise<void> {}

  /**
   * Test hook: rewrites the last-activity time, as if the session had been
   * sitting in its status since `at`.
   */
  backdate(uploadId: string, at: number) {
    const s = this.sessions.get(uploadId);
    if (!s) return;
    s.updatedAt = at;
  }

  private releaseSlot(session: UploadSession) {
    const slot = slotId(session.workspaceId, session.containerId, session.filename);
    if (this.slots.get(slot) === session.uploadId) {
      this.slots.delete(slot);
    }
  }
}
