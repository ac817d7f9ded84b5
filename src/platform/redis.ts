/**
 * Redis Client Platform Layer
 *
 * Lazy singleton shared by the working-memory and affinity stores.
 * When REDIS_URL is unset or the first connection fails, callers get `null`
 * and fall back to their in-process maps.
 *
 * - REDIS_URL: redis://host:port or rediss://host:port for TLS
 * - REDIS_NAMESPACE: key prefix (default: "npc")
 */

import { Redis, type RedisOptions } from "ioredis";
import { log } from "../utils/telemetry.js";
import { config, isProduction } from "../config/index.js";
import { describeError } from "../utils/errors.js";

let redisClient: Redis | null = null;
let initialization: Promise<Redis | null> | null = null;

const RECONNECT_LOG_INTERVAL_MS = 30_000;
let lastReconnectLogTime = 0;

function getRedisOptions(url: string): RedisOptions {
  const enableTLS = config.redis.tls || url.startsWith("rediss://");

  return {
    connectTimeout: config.redis.connectTimeout,
    commandTimeout: config.redis.commandTimeout,
    lazyConnect: true,
    keyPrefix: `${config.redis.namespace}:`,
    retryStrategy(times: number) {
      // Jittered backoff capped at 30s
      const delay = Math.min(times * 100, 30_000) + Math.random() * 1000;

      const now = Date.now();
      if (times === 1 || now - lastReconnectLogTime >= RECONNECT_LOG_INTERVAL_MS) {
        log.warn({ attempt: times, delay_ms: Math.round(delay) }, "Redis reconnecting");
        lastReconnectLogTime = now;
      }
      return delay;
    },
    ...(enableTLS && {
      tls: { rejectUnauthorized: isProduction() },
    }),
  };
}

async function initializeRedis(): Promise<Redis | null> {
  const url = config.redis.url;

  if (!url) {
    log.info("Redis not configured (REDIS_URL not set), using in-memory fallback");
    return null;
  }

  const options = getRedisOptions(url);
  const client = new Redis(url, options);

  client.on("error", (error: Error) => {
    log.error({ error: error.message }, "Redis error");
  });
  client.on("ready", () => {
    log.info({ namespace: options.keyPrefix }, "Redis ready");
  });
  client.on("close", () => {
    log.warn("Redis connection closed");
  });

  try {
    await client.connect();
    await client.ping();
    redisClient = client;
    log.info(
      { namespace: options.keyPrefix, tls: Boolean(options.tls) },
      "Redis initialized successfully",
    );
    return client;
  } catch (error) {
    log.error(
      { error: describeError(error) },
      "Redis initialization failed, falling back to in-memory storage",
    );
    client.disconnect();
    return null;
  }
}

/**
 * Get Redis client instance (lazy initialization)
 * Returns null if Redis is not configured or failed to connect
 */
export async function getRedis(): Promise<Redis | null> {
  if (!initialization) {
    initialization = initializeRedis();
  }
  return initialization;
}

export function isRedisAvailable(): boolean {
  return redisClient !== null && redisClient.status === "ready";
}

/**
 * Health probe: true if Redis is configured and answers PING.
 */
export async function redisHealthProbe(): Promise<boolean> {
  try {
    const client = await getRedis();
    if (!client) {
      return false;
    }
    await client.ping();
    return true;
  } catch {
    return false;
  }
}

/**
 * Gracefully close the Redis connection.
 */
export async function closeRedis(): Promise<void> {
  const client = redisClient;
  redisClient = null;
  initialization = null;
  if (!client) {
    return;
  }
  try {
    await client.quit();
    log.info("Redis connection closed gracefully");
  } catch (error) {
    log.error({ error: describeError(error) }, "Error closing Redis connection");
  }
}
