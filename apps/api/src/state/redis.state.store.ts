// src/state/redis.state.store.ts

import type { Redis } from "@upstash/redis";

import type { Asset } from "../types/asset.js";
import type {
  ChunkRecord,
  SessionEvent,
  SessionPatch,
  UploadSession,
  UploadStatus,
} from "../types/upload.js";
import {
  ACCEPTING_CHUNKS,
  ACTIVE_STATUSES,
  assertTransitionSet,
  isActive,
} from "../services/upload/upload.state.js";
import { assetKeys, rateKeys, slotId, uploadKeys, userKeys } from "./keys.js";
import {
  decodeAsset,
  decodeChunk,
  decodeEvent,
  decodeSession,
  encodeSession,
  isUploadStatus,
} from "./codec.js";
import type {
  CreateAssetResult,
  CreateSessionOptions,
  CreateSessionResult,
  PutChunkResult,
  TransitionRequest,
  UploadStateStore,
} from "./upload.state.store.js";

// Index and slot keys are derived inside the scripts from prefixes passed as
// arguments; the deployment is a single Redis instance, not a cluster.
// A user's active set is pruned only by the create script and on delete, so
// it may hold ids that have already gone terminal.

const CREATE_SESSION_LUA = `
local function active(id)
  local status = redis.call("HGET", ARGV[4] .. id .. ARGV[5], "status")
  return status and string.find("," .. ARGV[6] .. ",", "," .. status .. ",", 1, true)
end
local holder = redis.call("GET", KEYS[1])
if holder and holder ~= ARGV[1] and active(holder) then
  return "HELD:" .. holder
end
if ARGV[7] ~= "" then
  local n = 0
  for _, id in ipairs(redis.call("SMEMBERS", KEYS[5])) do
    if active(id) then n = n + 1 else redis.call("SREM", KEYS[5], id) end
  end
  if n >= tonumber(ARGV[7]) then return "LIMIT:" .. n end
end
redis.call("SET", KEYS[1], ARGV[1])
local fields = {}
for i = 8, #ARGV do fields[#fields + 1] = ARGV[i] end
redis.call("HSET", KEYS[2], unpack(fields))
redis.call("RPUSH", KEYS[3], ARGV[3])
redis.call("ZADD", KEYS[4], ARGV[2], ARGV[1])
redis.call("SADD", KEYS[5], ARGV[1])
return "OK"
`;

const TRANSITION_LUA = `
local cur = redis.call("HGET", KEYS[1], "status")
if not cur then return "MISSING" end
if not string.find("," .. ARGV[2] .. ",", "," .. cur .. ",", 1, true) then
  return "CONFLICT:" .. cur
end
local at = ARGV[4]
redis.call("HSET", KEYS[1], "status", ARGV[3], "updatedAt", at)
redis.call("RPUSH", KEYS[2],
  '{"type":"status","at":' .. at .. ',"from":"' .. cur .. '","to":"' .. ARGV[3] .. '"' .. ARGV[8] .. '}')
local n = tonumber(ARGV[9])
for i = 1, n do redis.call("RPUSH", KEYS[2], ARGV[9 + i]) end
local i = 10 + n
while i < #ARGV do
  if ARGV[i + 1] == "" then
    redis.call("HDEL", KEYS[1], ARGV[i])
  else
    redis.call("HSET", KEYS[1], ARGV[i], ARGV[i + 1])
  end
  i = i + 2
end
redis.call("ZREM", ARGV[5] .. cur, ARGV[1])
redis.call("ZADD", ARGV[5] .. ARGV[3], at, ARGV[1])
if ARGV[6] == "1" then
  local slot = redis.call("HGET", KEYS[1], "slot")
  if slot and redis.call("GET", ARGV[7] .. slot) == ARGV[1] then
    redis.call("DEL", ARGV[7] .. slot)
  end
end
return "OK"
`;

const PUT_CHUNK_LUA = `
local status = redis.call("HGET", KEYS[1], "status")
if not status then return "MISSING" end
if not string.find("," .. ARGV[6] .. ",", "," .. status .. ",", 1, true) then
  return "STATUS:" .. status
end
local prev = redis.call("HGET", KEYS[2], ARGV[2])
local prevDone = prev and cjson.decode(prev).status == "completed"
if prevDone and ARGV[7] ~= "completed" then return "KEPT:" .. prev end
redis.call("HSET", KEYS[2], ARGV[2], ARGV[3])
redis.call("HSET", KEYS[1], "updatedAt", ARGV[4])
redis.call("ZADD", ARGV[5] .. status, ARGV[4], ARGV[1])
if prevDone then return "REPLACED:" .. prev end
return "OK"
`;

const DELETE_SESSION_LUA = `
local status = redis.call("HGET", KEYS[1], "status")
local slot = redis.call("HGET", KEYS[1], "slot")
local user = redis.call("HGET", KEYS[1], "userId")
if status then redis.call("ZREM", ARGV[2] .. status, ARGV[1]) end
if user then redis.call("SREM", ARGV[4] .. user .. ARGV[5], ARGV[1]) end
if slot and redis.call("GET", ARGV[3] .. slot) == ARGV[1] then
  redis.call("DEL", ARGV[3] .. slot)
end
redis.call("DEL", KEYS[1], KEYS[2], KEYS[3])
return "OK"
`;

const INCREMENT_COUNTER_LUA = `
local n = redis.call("INCR", KEYS[1])
if n == 1 then redis.call("PEXPIRE", KEYS[1], ARGV[1]) end
return n
`;

const CREATE_ASSET_LUA = `
local existing = redis.call("GET", KEYS[1])
if existing then return "EXISTS:" .. existing end
redis.call("SET", KEYS[2], ARGV[2])
redis.call("SET", KEYS[1], ARGV[1])
return "OK"
`;

const SESSION_KEY_SUFFIX = ":session";
const USER_ACTIVE_SUFFIX = ":active";

function sessionKeyPrefix(): string {
  const sample = uploadKeys.session("");
  return sample.slice(0, sample.length - SESSION_KEY_SUFFIX.length);
}

function slotKeyPrefix(): string {
  return uploadKeys.slot("");
}

function userActivePrefix(): string {
  const sample = userKeys.active("");
  return sample.slice(0, sample.length - USER_ACTIVE_SUFFIX.length);
}

function decodeChunkReply(res: string, tag: string): ChunkRecord {
  return decodeChunk(res.slice(tag.length));
}

function patchArgs(patch: SessionPatch | undefined): string[] {
  if (!patch) return [];
  const out: string[] = [];
  for (const [field, value] of Object.entries(patch)) {
    if (value === undefined) continue;
    out.push(field, value === null ? "" : String(value));
  }
  return out;
}

function expectString(res: unknown, op: string): string {
  if (typeof res !== "string") {
    throw new Error(`REDIS_${op}_UNEXPECTED_REPLY`);
  }
  return res;
}

export class RedisUploadStateStore implements UploadStateStore {
  constructor(private readonly redis: Redis) {}

  async createSession(
    session: UploadSession,
    created: SessionEvent,
    opts: CreateSessionOptions = {}
  ): Promise<CreateSessionResult> {
    const slot = slotId(session.workspaceId, session.containerId, session.filename);
    const fields = { ...encodeSession(session), slot };

    const res = expectString(
      await this.redis.eval(
        CREATE_SESSION_LUA,
        [
          uploadKeys.slot(slot),
          uploadKeys.session(session.uploadId),
          uploadKeys.events(session.uploadId),
          uploadKeys.statusIndex(session.status),
          userKeys.active(session.userId),
        ],
        [
          session.uploadId,
          String(session.updatedAt),
          JSON.stringify(created),
          sessionKeyPrefix(),
          SESSION_KEY_SUFFIX,
          ACTIVE_STATUSES.join(","),
          opts.maxActivePerUser === undefined ? "" : String(opts.maxActivePerUser),
          ...Object.entries(fields).flat(),
        ]
      ),
      "CREATE_SESSION"
    );

    if (res.startsWith("HELD:")) {
      return { ok: false, reason: "slot_held", holderId: res.slice("HELD:".length) };
    }
    if (res.startsWith("LIMIT:")) {
      return { ok: false, reason: "user_limit", active: Number(res.slice("LIMIT:".length)) };
    }
    return { ok: true, session };
  }

  async getSession(uploadId: string): Promise<UploadSession | null> {
    const data = await this.redis.hgetall<Record<string, string>>(
      uploadKeys.session(uploadId)
    );

    if (!data || Object.keys(data).length === 0) {
      return null;
    }
    return decodeSession(uploadId, data);
  }

  async transition(
    uploadId: string,
    req: TransitionRequest
  ): Promise<UploadSession | null> {
    assertTransitionSet(req.from, req.to);

    const at = req.at ?? Date.now();
    const extra = (req.events ?? []).map((e) => JSON.stringify(e));

    const res = expectString(
      await this.redis.eval(
        TRANSITION_LUA,
        [uploadKeys.session(uploadId), uploadKeys.events(uploadId)],
        [
          uploadId,
          req.from.join(","),
          req.to,
          String(at),
          uploadKeys.statusIndexPrefix(),
          isActive(req.to) ? "0" : "1",
          slotKeyPrefix(),
          req.reason ? `,"reason":${JSON.stringify(req.reason)}` : "",
          String(extra.length),
          ...extra,
          ...patchArgs(req.patch),
        ]
      ),
      "TRANSITION"
    );

    if (res !== "OK") return null;
    return this.getSession(uploadId);
  }

  async appendEvent(uploadId: string, event: SessionEvent): Promise<void> {
    await this.redis.rpush(uploadKeys.events(uploadId), JSON.stringify(event));
  }

  async listEvents(uploadId: string): Promise<SessionEvent[]> {
    const raw = await this.redis.lrange<string>(uploadKeys.events(uploadId), 0, -1);
    return raw.map(decodeEvent);
  }

  async putChunk(uploadId: string, chunk: ChunkRecord): Promise<PutChunkResult> {
    const res = expectString(
      await this.redis.eval(
        PUT_CHUNK_LUA,
        [uploadKeys.session(uploadId), uploadKeys.chunks(uploadId)],
        [
          uploadId,
          String(chunk.chunkNumber),
          JSON.stringify(chunk),
          String(chunk.updatedAt),
          uploadKeys.statusIndexPrefix(),
          ACCEPTING_CHUNKS.join(","),
          chunk.status,
        ]
      ),
      "PUT_CHUNK"
    );

    if (res === "MISSING") return { ok: false, status: null };
    if (res.startsWith("STATUS:")) {
      const status = res.slice("STATUS:".length);
      if (!isUploadStatus(status)) throw new Error("CORRUPT_SESSION_STATUS");
      return { ok: false, status };
    }
    if (res.startsWith("KEPT:")) {
      return { ok: true, current: decodeChunkReply(res, "KEPT:"), replaced: null };
    }
    if (res.startsWith("REPLACED:")) {
      return { ok: true, current: chunk, replaced: decodeChunkReply(res, "REPLACED:") };
    }
    return { ok: true, current: chunk, replaced: null };
  }

  async listChunks(uploadId: string): Promise<ChunkRecord[]> {
    const data = await this.redis.hgetall<Record<string, string>>(
      uploadKeys.chunks(uploadId)
    );
    if (!data) return [];

    return Object.values(data)
      .map(decodeChunk)
      .sort((a, b) => a.chunkNumber - b.chunkNumber);
  }

  async deleteChunks(uploadId: string): Promise<void> {
    await this.redis.del(uploadKeys.chunks(uploadId));
  }

  async listByStatus(
    status: UploadStatus,
    idleSince: number,
    limit: number
  ): Promise<string[]> {
    return this.redis.zrange<string[]>(uploadKeys.statusIndex(status), 0, idleSince, {
      byScore: true,
      offset: 0,
      count: limit,
    });
  }

  async deleteSession(uploadId: string): Promise<void> {
    await this.redis.eval(
      DELETE_SESSION_LUA,
      [
        uploadKeys.session(uploadId),
        uploadKeys.chunks(uploadId),
        uploadKeys.events(uploadId),
      ],
      [
        uploadId,
        uploadKeys.statusIndexPrefix(),
        slotKeyPrefix(),
        userActivePrefix(),
        USER_ACTIVE_SUFFIX,
      ]
    );
  }

  async createAsset(uploadId: string, asset: Asset): Promise<CreateAssetResult> {
    const res = expectString(
      await this.redis.eval(
        CREATE_ASSET_LUA,
        [assetKeys.bySession(uploadId), assetKeys.asset(asset.assetId)],
        [asset.assetId, JSON.stringify(asset)]
      ),
      "CREATE_ASSET"
    );

    if (res === "OK") {
      return { created: true, asset };
    }

    const existing = await this.getAsset(res.slice("EXISTS:".length));
    if (!existing) {
      throw new Error("CORRUPT_ASSET_INDEX");
    }
    return { created: false, asset: existing };
  }

  async getAsset(assetId: string): Promise<Asset | null> {
    const raw = await this.redis.get<string>(assetKeys.asset(assetId));
    return raw ? decodeAsset(raw) : null;
  }

  async getAssetBySession(uploadId: string): Promise<Asset | null> {
    const assetId = await this.redis.get<string>(assetKeys.bySession(uploadId));
    return assetId ? this.getAsset(assetId) : null;
  }

  async incrementCounter(key: string, ttlMs: number): Promise<number> {
    const res = await this.redis.eval(
      INCREMENT_COUNTER_LUA,
      [rateKeys.counter(key)],
      [String(ttlMs)]
    );
    if (typeof res !== "number") {
      throw new Error("REDIS_INCREMENT_COUNTER_UNEXPECTED_REPLY");
    }
    return res;
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }
}
