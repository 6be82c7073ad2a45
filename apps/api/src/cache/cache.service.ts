import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheStore } from './cache.store';

export const CacheNamespace = {
  MARKET_DATA: 'market_data',
  TECHNICAL: 'technical',
  ASSETS: 'assets',
} as const;

/**
 * Namespaced JSON cache. The cache is an optimization only: every store
 * failure is logged and reported as a miss (reads) or `false` (writes), so
 * callers fall back to fetching fresh data.
 */
@Injectable()
export class CacheService {
  private readonly logger = new Logger(CacheService.name);
  private readonly keyPrefix: string;
  private readonly defaultTtlSeconds: number;

  constructor(
    private readonly store: CacheStore,
    private readonly configService: ConfigService,
  ) {
    this.keyPrefix = this.configService.get<string>('CACHE_KEY_PREFIX', 'marketsignals:');
    this.defaultTtlSeconds = this.configService.get<number>('CACHE_TTL_SECONDS', 300);
  }

  async get<T>(namespace: string, key: string): Promise<T | undefined> {
    try {
      const raw = await this.store.get(this.fullKey(namespace, key));
      if (raw === null) {
        return undefined;
      }
      const value: T = JSON.parse(raw);
      return value;
    } catch (error) {
      this.logger.error(`Cache get error for ${namespace}:${key}: ${(error as Error).message}`);
      return undefined;
    }
  }

  async set<T>(namespace: string, key: string, value: T, ttlSeconds?: number): Promise<boolean> {
    try {
      await this.store.set(
        this.fullKey(namespace, key),
        JSON.stringify(value),
        ttlSeconds ?? this.defaultTtlSeconds,
      );
      return true;
    } catch (error) {
      this.logger.error(`Cache set error for ${namespace}:${key}: ${(error as Error).message}`);
      return false;
    }
  }

  /**
   * Cached value, or the factory's result stored under the key. Factory errors
   * are logged and rethrown; nothing is cached for them.
   */
  async getOrSet<T>(
    namespace: string,
    key: string,
    factory: () => Promise<T> | T,
    ttlSeconds?: number,
  ): Promise<T> {
    const cached = await this.get<T>(namespace, key);
    if (cached !== undefined) {
      return cached;
    }

    try {
      const value = await factory();
      await this.set(namespace, key, value, ttlSeconds);
      return value;
    } catch (error) {
      this.logger.error(`Cache getOrSet error for ${namespace}:${key}: ${(error as Error).message}`);
      throw error;
    }
  }

  async delete(namespace: string, key: string): Promise<boolean> {
    try {
      return await this.store.delete(this.fullKey(namespace, key));
    } catch (error) {
      this.logger.error(`Cache delete error for ${namespace}:${key}: ${(error as Error).message}`);
      return false;
    }
  }

  async exists(namespace: string, key: string): Promise<boolean> {
    try {
      return (await this.store.ttl(this.fullKey(namespace, key))) !== -2;
    } catch (error) {
      this.logger.error(`Cache exists error for ${namespace}:${key}: ${(error as Error).message}`);
      return false;
    }
  }

  async ttl(namespace: string, key: string): Promise<number> {
    try {
      return await this.store.ttl(this.fullKey(namespace, key));
    } catch (error) {
      this.logger.error(`Cache TTL error for ${namespace}:${key}: ${(error as Error).message}`);
      return -2;
    }
  }

  async clearNamespace(namespace: string): Promise<number> {
    try {
      const keys = await this.store.keys(`${this.keyPrefix}${namespace}:`);
      const deleted = await Promise.all(keys.map((key) => this.store.delete(key)));
      return deleted.filter(Boolean).length;
    } catch (error) {
      this.logger.error(`Cache clear error for namespace ${namespace}: ${(error as Error).message}`);
      return 0;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.store.ping();
      return true;
    } catch (error) {
      this.logger.error(`Cache health check failed: ${(error as Error).message}`);
      return false;
    }
  }

  private fullKey(namespace: string, key: string): string {
    return `${this.keyPrefix}${namespace}:${key}`;
  }
}
