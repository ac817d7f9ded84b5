/**
 * Working Memory Store
 *
 * Recent transcript per npc+player pair, stored as one JSON list.
 * Redis is used when available; otherwise an in-process map with expiry
 * keeps the service usable (degraded: not shared across processes).
 *
 * Key pattern: {REDIS_NAMESPACE}:short_term_memory:{npc}:{player}
 */

import { z } from "zod";
import { getRedis, isRedisAvailable } from "../platform/redis.js";
import { log } from "../utils/telemetry.js";
import { describeError } from "../utils/errors.js";
import type { ChatRole, ChatTurn, ShortTermStore } from "./types.js";

const KEY_PREFIX = "short_term_memory:";

const MAX_MEMORY_ENTRIES = 1000;

const StoredTranscript = z.array(
  z.object({
    role: z.enum(["human", "ai"]),
    content: z.string(),
  }),
);

export interface ShortTermStoreOptions {
  maxHistory: number;
  ttlSeconds: number;
}

interface MemoryEntry {
  turns: ChatTurn[];
  expires: number;
}

export function buildShortTermKey(npcId: string, playerId: string): string {
  return `${KEY_PREFIX}${npcId}:${playerId}`;
}

function parseTranscript(raw: string | null, key: string): ChatTurn[] {
  if (!raw) {
    return [];
  }
  try {
    const parsed = StoredTranscript.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data;
    }
    log.warn({ key, issues: parsed.error.issues.length }, "Discarding malformed working memory");
  } catch (error) {
    log.warn({ key, error: describeError(error) }, "Discarding unparseable working memory");
  }
  return [];
}

export class RedisShortTermStore implements ShortTermStore {
  private readonly memory = new Map<string, MemoryEntry>();

  constructor(private readonly options: ShortTermStoreOptions) {}

  async getHistory(npcId: string, playerId: string): Promise<ChatTurn[]> {
    const key = buildShortTermKey(npcId, playerId);
    const redis = await getRedis();

    if (redis && isRedisAvailable()) {
      return this.cap(parseTranscript(await redis.get(key), key));
    }

    const entry = this.readMemory(key);
    return entry ? [...entry.turns] : [];
  }

  async append(npcId: string, playerId: string, role: ChatRole, content: string): Promise<void> {
    const key = buildShortTermKey(npcId, playerId);
    const turn: ChatTurn = { role, content: content.trim() };
    const redis = await getRedis();

    if (redis && isRedisAvailable()) {
      const turns = this.cap([...parseTranscript(await redis.get(key), key), turn]);
      await redis.set(key, JSON.stringify(turns), "EX", this.options.ttlSeconds);
      log.debug({ key, turns: turns.length }, "Working memory saved to Redis");
      return;
    }

    const existing = this.readMemory(key);
    this.writeMemory(key, this.cap([...(existing?.turns ?? []), turn]));
  }

  async extendExpiry(npcId: string, playerId: string): Promise<void> {
    const key = buildShortTermKey(npcId, playerId);
    const redis = await getRedis();

    if (redis && isRedisAvailable()) {
      await redis.expire(key, this.options.ttlSeconds);
      return;
    }

    const entry = this.readMemory(key);
    if (entry) {
      entry.expires = Date.now() + this.options.ttlSeconds * 1000;
    }
  }

  async clear(npcId: string, playerId: string): Promise<void> {
    const key = buildShortTermKey(npcId, playerId);
    const redis = await getRedis();

    if (redis && isRedisAvailable()) {
      await redis.del(key);
    }
    this.memory.delete(key);
  }

  /** Test helper: number of live in-memory transcripts. */
  memorySize(): number {
    this.evictExpired();
    return this.memory.size;
  }

  private cap(turns: ChatTurn[]): ChatTurn[] {
    const max = this.options.maxHistory;
    return turns.length > max ? turns.slice(-max) : turns;
  }

  private readMemory(key: string): MemoryEntry | undefined {
    const entry = this.memory.get(key);
    if (entry && entry.expires < Date.now()) {
      this.memory.delete(key);
      return undefined;
    }
    return entry;
  }

  private writeMemory(key: string, turns: ChatTurn[]): void {
    if (!this.memory.has(key) && this.memory.size >= MAX_MEMORY_ENTRIES) {
      this.evictExpired();
      if (this.memory.size >= MAX_MEMORY_ENTRIES) {
        // Map iteration order = insertion order
        const oldest = this.memory.keys().next();
        if (!oldest.done) {
          this.memory.delete(oldest.value);
        }
      }
    }
    this.memory.set(key, {
      turns,
      expires: Date.now() + this.options.ttlSeconds * 1000,
    });
  }

  private evictExpired(): void {
    const now = Date.now();
    for (const [key, entry] of this.memory) {
      if (entry.expires < now) {
        this.memory.delete(key);
      }
    }
  }
}
