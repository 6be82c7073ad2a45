/**
 * Backing key/value store for the cache layer. Implementations may reject on
 * any call when the underlying store is unreachable; `CacheService` absorbs
 * those failures.
 */
export abstract class CacheStore {
  abstract get(key: string): Promise<string | null>;
  abstract set(key: string, value: string, ttlSeconds: number): Promise<void>;
  abstract delete(key: string): Promise<boolean>;
  /** Remaining lifetime in seconds: -1 for no expiry, -2 when the key is missing. */
  abstract ttl(key: string): Promise<number>;
  abstract keys(prefix: string): Promise<string[]>;
  /** Rejects when the store cannot be reached. */
  abstract ping(): Promise<void>;
}
