import type { CacheStore } from "@domain/cache/ports";

interface StoredValue {
  value: string;
  expiresAt: number | null;
}

/**
 * Process-local CacheStore with lazy expiry: an expired key is dropped when
 * it is next read.
 */
export class InMemoryCacheStore implements CacheStore {
  readonly name = "memory";
  private readonly entries = new Map<string, StoredValue>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlMs?: number): Promise<void> {
    this.entries.set(key, {
      value,
      expiresAt: ttlMs !== undefined && ttlMs > 0 ? this.now() + ttlMs : null,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}
