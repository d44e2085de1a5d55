/**
 * Key-value store behind the Cache Layer. Values are opaque strings; ttl is
 * in milliseconds. Implementations throw on transport failure and the Cache
 * Layer decides what that means.
 */
export interface CacheStore {
  readonly name: string;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  delete(key: string): Promise<void>;
  close?(): Promise<void>;
}
