/**
 * Affinity score storage.
 *
 * One Redis hash per player, field per NPC:
 *   {REDIS_NAMESPACE}:affinity:{player} → { [npc]: score }
 * Falls back to an in-process map when Redis is unavailable, bounded to
 * MAX_MEMORY_PLAYERS players. Scores do not expire.
 */

import { getRedis, isRedisAvailable } from "../platform/redis.js";
import { log } from "../utils/telemetry.js";

const KEY_PREFIX = "affinity:";

/** Players held by the in-memory fallback before the oldest is evicted. */
export const MAX_MEMORY_PLAYERS = 1000;

export interface AffinityStore {
  /** `undefined` when this pair has never been scored. */
  get(npcId: string, playerId: string): Promise<number | undefined>;
  set(npcId: string, playerId: string, score: number): Promise<void>;
  /** Every scored NPC for one player. */
  list(playerId: string): Promise<Record<string, number>>;
}

export function buildAffinityKey(playerId: string): string {
  return `${KEY_PREFIX}${playerId}`;
}

function parseScore(raw: string | null | undefined): number | undefined {
  if (raw === null || raw === undefined) {
    return undefined;
  }
  const score = Number(raw);
  return Number.isFinite(score) ? score : undefined;
}

export class RedisAffinityStore implements AffinityStore {
  private readonly memory = new Map<string, Map<string, number>>();

  async get(npcId: string, playerId: string): Promise<number | undefined> {
    const redis = await getRedis();
    if (redis && isRedisAvailable()) {
      return parseScore(await redis.hget(buildAffinityKey(playerId), npcId));
    }
    return this.memory.get(playerId)?.get(npcId);
  }

  async set(npcId: string, playerId: string, score: number): Promise<void> {
    const redis = await getRedis();
    if (redis && isRedisAvailable()) {
      await redis.hset(buildAffinityKey(playerId), npcId, String(score));
      log.debug({ npc: npcId, player_id: playerId, score }, "Affinity saved to Redis");
      return;
    }

    let scores = this.memory.get(playerId);
    if (!scores) {
      if (this.memory.size >= MAX_MEMORY_PLAYERS) {
        // Map iteration order = insertion order
        const oldest = this.memory.keys().next();
        if (!oldest.done) {
          this.memory.delete(oldest.value);
        }
      }
      scores = new Map();
      this.memory.set(playerId, scores);
    }
    scores.set(npcId, score);
  }

  async list(playerId: string): Promise<Record<string, number>> {
    const result: Record<string, number> = {};
    const redis = await getRedis();

    if (redis && isRedisAvailable()) {
      const raw = await redis.hgetall(buildAffinityKey(playerId));
      for (const [npcId, value] of Object.entries(raw)) {
        const score = parseScore(value);
        if (score !== undefined) {
          result[npcId] = score;
        }
      }
      return result;
    }

    for (const [npcId, score] of this.memory.get(playerId) ?? []) {
      result[npcId] = score;
    }
    return result;
  }
}
