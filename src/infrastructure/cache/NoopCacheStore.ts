import type { CacheStore } from "@domain/cache/ports";

/** Used when caching is disabled: every lookup misses. */
export class NoopCacheStore implements CacheStore {
  readonly name = "noop";

  async get(): Promise<string | null> {
    return null;
  }

  async set(): Promise<void> {
    return;
  }

  async delete(): Promise<void> {
    return;
  }
}
