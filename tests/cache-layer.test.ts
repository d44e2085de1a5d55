import { describe, it, expect } from "vitest";
import { z } from "zod";

import { CacheLayer } from "@domain/cache/cacheLayer";
import { NoopCacheStore } from "@infrastructure/cache/NoopCacheStore";
import { RedisCacheStore } from "@infrastructure/cache/RedisCacheStore";
import { InMemoryCacheStore } from "@infrastructure/memory/InMemoryCacheStore";

import { createRecordingLogger } from "./helpers/fakes";

import type { CacheStore } from "@domain/cache/ports";
import type { RedisClientLike } from "@infrastructure/cache/RedisCacheStore";

/** Keeps everything forever and records the ttl it was given. */
class RecordingStore implements CacheStore {
  readonly name = "recording";
  readonly entries = new Map<string, string>();
  readonly ttls: Array<number | undefined> = [];

  async get(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.entries.set(key, value);
    this.ttls.push(ttlMs);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }
}

class BrokenStore implements CacheStore {
  readonly name = "broken";

  async get(): Promise<string | null> {
    throw new Error("connection refused");
  }

  async set(): Promise<void> {
    throw new Error("connection refused");
  }

  async delete(): Promise<void> {
    throw new Error("connection refused");
  }
}

const Numbers = z.array(z.number());

describe("CacheLayer.key", () => {
  it("hashes normalized input with purpose and model", () => {
    const key = CacheLayer.key("Hello   world", "embedding", "nomic-embed-text:query");

    expect(key).toMatch(/^javis:embedding:[0-9a-f]{64}$/);
    expect(key).toBe(CacheLayer.key(" Hello world\n", "embedding", "nomic-embed-text:query"));
    expect(key).not.toBe(CacheLayer.key("Hello world", "generation", "nomic-embed-text:query"));
    expect(key).not.toBe(CacheLayer.key("Hello world", "embedding", "other-model:query"));
  });
});

describe("CacheLayer", () => {
  it("round-trips values and counts hits and misses", async () => {
    const { logger } = createRecordingLogger();
    const cache = new CacheLayer(new InMemoryCacheStore(), { defaultTtlSeconds: 60, logger });

    expect(await cache.get("k", Numbers)).toBeUndefined();
    await cache.set("k", [1, 2, 3]);

    expect(await cache.get("k", Numbers)).toEqual([1, 2, 3]);
    expect(cache.snapshot()).toEqual({ hits: 1, misses: 1, writes: 1, failures: 0 });
  });

  it("passes the ttl to the store in milliseconds", async () => {
    const { logger } = createRecordingLogger();
    const store = new RecordingStore();
    const cache = new CacheLayer(store, { defaultTtlSeconds: 60, logger });

    await cache.set("a", [1]);
    await cache.set("b", [1], 5);
    await cache.set("c", [1], 0);

    expect(store.ttls).toEqual([60000, 5000, undefined]);
  });

  it("reads an entry past its expiry as absent even if the store kept it", async () => {
    const { logger } = createRecordingLogger();
    let now = 1000;
    const cache = new CacheLayer(new RecordingStore(), {
      defaultTtlSeconds: 10,
      logger,
      now: () => now,
    });

    await cache.set("k", [7]);
    now = 10999;
    expect(await cache.get("k", Numbers)).toEqual([7]);
    now = 11000;
    expect(await cache.get("k", Numbers)).toBeUndefined();
  });

  it("keeps entries without ttl indefinitely", async () => {
    const { logger } = createRecordingLogger();
    let now = 0;
    const cache = new CacheLayer(new RecordingStore(), {
      defaultTtlSeconds: 0,
      logger,
      now: () => now,
    });

    await cache.set("k", [1]);
    now = Number.MAX_SAFE_INTEGER;
    expect(await cache.get("k", Numbers)).toEqual([1]);
  });

  it("treats malformed entries as misses", async () => {
    const { logger } = createRecordingLogger();
    const store = new RecordingStore();
    const cache = new CacheLayer(store, { defaultTtlSeconds: 60, logger });

    await store.set("garbage", "not json");
    await store.set("bare", JSON.stringify([1, 2]));
    await cache.set("wrong-shape", "a string");

    expect(await cache.get("garbage", Numbers)).toBeUndefined();
    expect(await cache.get("bare", Numbers)).toBeUndefined();
    expect(await cache.get("wrong-shape", Numbers)).toBeUndefined();
    expect(cache.snapshot().misses).toBe(3);
  });

  it("bypasses a failing store and logs CACHE_UNAVAILABLE", async () => {
    const { logger, logs } = createRecordingLogger();
    const cache = new CacheLayer(new BrokenStore(), { defaultTtlSeconds: 60, logger });

    expect(await cache.get("k", Numbers)).toBeUndefined();
    await expect(cache.set("k", [1])).resolves.toBeUndefined();
    await expect(cache.delete("k")).resolves.toBeUndefined();

    expect(cache.snapshot()).toEqual({ hits: 0, misses: 0, writes: 0, failures: 3 });
    expect(logs.map((l) => [l.level, l.message, l.meta?.code, l.meta?.operation])).toEqual([
      ["warn", "CACHE_UNAVAILABLE", "CacheUnavailable", "get"],
      ["warn", "CACHE_UNAVAILABLE", "CacheUnavailable", "set"],
      ["warn", "CACHE_UNAVAILABLE", "CacheUnavailable", "delete"],
    ]);
  });
});

describe("InMemoryCacheStore", () => {
  it("drops expired keys lazily", async () => {
    let now = 0;
    const store = new InMemoryCacheStore(() => now);

    await store.set("k", "v", 100);
    expect(store.size).toBe(1);
    now = 100;
    expect(await store.get("k")).toBeNull();
    expect(store.size).toBe(0);
  });
});

class FakeRedis implements RedisClientLike {
  readonly commands: unknown[][] = [];
  private readonly data = new Map<string, string>();

  async get(key: string): Promise<string | null> {
    this.commands.push(["get", key]);
    return this.data.get(key) ?? null;
  }

  set(key: string, value: string): Promise<unknown>;
  set(key: string, value: string, mode: "PX", ttlMs: number): Promise<unknown>;
  async set(key: string, value: string, mode?: "PX", ttlMs?: number): Promise<unknown> {
    this.commands.push(mode ? ["set", key, value, mode, ttlMs] : ["set", key, value]);
    this.data.set(key, value);
    return "OK";
  }

  async del(key: string): Promise<number> {
    this.commands.push(["del", key]);
    return this.data.delete(key) ? 1 : 0;
  }

  async quit(): Promise<unknown> {
    this.commands.push(["quit"]);
    return "OK";
  }
}

describe("RedisCacheStore", () => {
  it("delegates expiry to redis in whole milliseconds", async () => {
    const redis = new FakeRedis();
    const store = new RedisCacheStore(redis);

    await store.set("a", "1", 1500.4);
    await store.set("b", "2");
    expect(await store.get("a")).toBe("1");
    await store.delete("a");
    await store.close();

    expect(redis.commands).toEqual([
      ["set", "a", "1", "PX", 1501],
      ["set", "b", "2"],
      ["get", "a"],
      ["del", "a"],
      ["quit"],
    ]);
  });
});

describe("NoopCacheStore", () => {
  it("always misses", async () => {
    const { logger } = createRecordingLogger();
    const cache = new CacheLayer(new NoopCacheStore(), { defaultTtlSeconds: 60, logger });

    await cache.set("k", [1]);

    expect(await cache.get("k", Numbers)).toBeUndefined();
    expect(cache.storeName).toBe("noop");
  });
});
