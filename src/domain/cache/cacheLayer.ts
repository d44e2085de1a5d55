/**
 * Memoization of embeddings and generation results by content hash.
 *
 * The layer is an optimization only: every store failure is converted to
 * CacheUnavailable, logged and bypassed, so callers see a miss (get) or a
 * no-op (set). Entries carry their own expiry so a value past its ttl reads
 * as absent even when the store has not evicted it yet.
 */
import { CacheUnavailable, errorMessage } from "@typesLocal/AppError";
import { normalizeText, sha256 } from "@utils/text";
import { z } from "zod";

import type { CacheStore } from "@domain/cache/ports";
import type { LoggerPort } from "@infrastructure/logging/Logger";

export type CachePurpose = "embedding" | "generation";

export interface CacheEntry<T> {
  value: T;
  createdAt: number;
  expiresAt: number | null;
}

const EnvelopeSchema = z.object({
  value: z.unknown(),
  createdAt: z.number(),
  expiresAt: z.number().nullable(),
});

export interface CacheLayerOptions {
  /** Default ttl in seconds; 0 keeps entries until the store drops them. */
  defaultTtlSeconds: number;
  logger: LoggerPort;
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  writes: number;
  failures: number;
}

export class CacheLayer {
  private readonly now: () => number;
  private readonly stats: CacheStats = { hits: 0, misses: 0, writes: 0, failures: 0 };

  constructor(
    private readonly store: CacheStore,
    private readonly options: CacheLayerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Stable key over (normalized input, purpose tag, model/version tag).
   */
  static key(input: string, purpose: CachePurpose, modelTag: string): string {
    const digest = sha256(
      JSON.stringify([normalizeText(input), purpose, modelTag])
    );
    return `javis:${purpose}:${digest}`;
  }

  get storeName(): string {
    return this.store.name;
  }

  snapshot(): CacheStats {
    return { ...this.stats };
  }

  async get<T>(key: string, schema: z.ZodType<T>): Promise<T | undefined> {
    let raw: string | null;
    try {
      raw = await this.store.get(key);
    } catch (error: unknown) {
      this.bypass("get", key, error);
      return undefined;
    }

    if (raw === null) {
      this.stats.misses += 1;
      return undefined;
    }

    const entry = this.decode(raw, schema);
    if (!entry || (entry.expiresAt !== null && entry.expiresAt <= this.now())) {
      this.stats.misses += 1;
      return undefined;
    }

    this.stats.hits += 1;
    return entry.value;
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const ttl = ttlSeconds ?? this.options.defaultTtlSeconds;
    const createdAt = this.now();
    const entry: CacheEntry<T> = {
      value,
      createdAt,
      expiresAt: ttl > 0 ? createdAt + ttl * 1000 : null,
    };

    try {
      await this.store.set(key, JSON.stringify(entry), ttl > 0 ? ttl * 1000 : undefined);
      this.stats.writes += 1;
    } catch (error: unknown) {
      this.bypass("set", key, error);
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.store.delete(key);
    } catch (error: unknown) {
      this.bypass("delete", key, error);
    }
  }

  private decode<T>(raw: string, schema: z.ZodType<T>): CacheEntry<T> | null {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }

    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      return null;
    }

    const value = schema.safeParse(envelope.data.value);
    if (!value.success) {
      return null;
    }

    return {
      value: value.data,
      createdAt: envelope.data.createdAt,
      expiresAt: envelope.data.expiresAt,
    };
  }

  private bypass(operation: string, key: string, error: unknown): void {
    this.stats.failures += 1;
    const failure = new CacheUnavailable(
      `Cache ${operation} failed on ${this.store.name}`,
      error
    );
    this.options.logger.log("warn", "CACHE_UNAVAILABLE", {
      operation,
      key,
      store: this.store.name,
      code: failure.type,
      error: errorMessage(error),
    });
  }
}
