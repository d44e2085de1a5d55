/**
 * Redis-backed CacheStore.
 *
 * Expiry is delegated to Redis (`PX`). The client is created with the offline
 * queue disabled so that a missing or restarting server fails commands fast;
 * the Cache Layer turns those failures into misses.
 */
import Redis from "ioredis";

import type { AppConfig } from "@config/index";
import type { CacheStore } from "@domain/cache/ports";
import type { LoggerPort } from "@infrastructure/logging/Logger";

/** The subset of the ioredis client the store relies on. */
export interface RedisClientLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

export function createRedisClient(config: AppConfig, logger: LoggerPort): Redis {
  const url = config.cache.redisUrl ?? "redis://localhost:6379";

  const client = new Redis(url, {
    lazyConnect: false,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    commandTimeout: config.resilience.timeouts.cacheMs,
    connectTimeout: config.resilience.timeouts.cacheMs,
  });

  client.on("error", (err: Error) => {
    logger.log("warn", "REDIS_CONNECTION_ERROR", { message: err.message });
  });

  return client;
}

export class RedisCacheStore implements CacheStore {
  readonly name = "redis";

  constructor(private readonly client: RedisClientLike) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    if (ttlMs !== undefined && ttlMs > 0) {
      await this.client.set(key, value, "PX", Math.ceil(ttlMs));
      return;
    }
    await this.client.set(key, value);
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
