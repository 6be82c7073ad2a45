import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { CacheNamespace, CacheService } from './cache.service';
import { CacheStore } from './cache.store';
import { InMemoryCacheStore } from './in-memory-cache.store';

class UnreachableStore extends CacheStore {
  private fail(): Promise<never> {
    return Promise.reject(new Error('connection refused'));
  }

  get(): Promise<string | null> {
    return this.fail();
  }

  set(): Promise<void> {
    return this.fail();
  }

  delete(): Promise<boolean> {
    return this.fail();
  }

  ttl(): Promise<number> {
    return this.fail();
  }

  keys(): Promise<string[]> {
    return this.fail();
  }

  ping(): Promise<void> {
    return this.fail();
  }
}

async function createService(store: CacheStore): Promise<CacheService> {
  const moduleRef = await Test.createTestingModule({
    providers: [
      CacheService,
      { provide: CacheStore, useValue: store },
      { provide: ConfigService, useValue: new ConfigService({ CACHE_KEY_PREFIX: 'test:' }) },
    ],
  }).compile();

  return moduleRef.get(CacheService);
}

describe('CacheService', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('with a working store', () => {
    let store: InMemoryCacheStore;
    let service: CacheService;

    beforeEach(async () => {
      store = new InMemoryCacheStore();
      service = await createService(store);
    });

    it('round-trips JSON values under a prefixed, namespaced key', async () => {
      const value = { symbol: 'AAPL', prices: [1, 2.5, 3], note: null };

      expect(await service.set(CacheNamespace.MARKET_DATA, 'price:AAPL_1mo', value, 60)).toBe(true);
      expect(await service.get(CacheNamespace.MARKET_DATA, 'price:AAPL_1mo')).toEqual(value);
      expect(await store.keys('test:')).toEqual(['test:market_data:price:AAPL_1mo']);
    });

    it('returns undefined on a miss', async () => {
      expect(await service.get(CacheNamespace.TECHNICAL, 'missing')).toBeUndefined();
    });

    it('applies the default TTL when none is given', async () => {
      await service.set(CacheNamespace.TECHNICAL, 'k', 1);

      expect(await service.ttl(CacheNamespace.TECHNICAL, 'k')).toBe(300);
    });

    it('reports existence and deletes', async () => {
      await service.set(CacheNamespace.TECHNICAL, 'k', 1);

      expect(await service.exists(CacheNamespace.TECHNICAL, 'k')).toBe(true);
      expect(await service.delete(CacheNamespace.TECHNICAL, 'k')).toBe(true);
      expect(await service.exists(CacheNamespace.TECHNICAL, 'k')).toBe(false);
      expect(await service.ttl(CacheNamespace.TECHNICAL, 'k')).toBe(-2);
    });

    it('clears one namespace only', async () => {
      await service.set(CacheNamespace.MARKET_DATA, 'a', 1);
      await service.set(CacheNamespace.MARKET_DATA, 'b', 2);
      await service.set(CacheNamespace.TECHNICAL, 'c', 3);

      expect(await service.clearNamespace(CacheNamespace.MARKET_DATA)).toBe(2);
      expect(await service.exists(CacheNamespace.MARKET_DATA, 'a')).toBe(false);
      expect(await service.exists(CacheNamespace.TECHNICAL, 'c')).toBe(true);
    });

    it('computes and stores a missing value once', async () => {
      const factory = jest.fn().mockResolvedValue({ name: 'Apple Inc.' });

      const first = await service.getOrSet(CacheNamespace.ASSETS, 'asset_metadata:AAPL', factory, 86_400);
      const second = await service.getOrSet(CacheNamespace.ASSETS, 'asset_metadata:AAPL', factory, 86_400);

      expect(first).toEqual({ name: 'Apple Inc.' });
      expect(second).toEqual(first);
      expect(factory).toHaveBeenCalledTimes(1);
      expect(await service.ttl(CacheNamespace.ASSETS, 'asset_metadata:AAPL')).toBe(86_400);
    });

    it('accepts a synchronous factory', async () => {
      expect(await service.getOrSet(CacheNamespace.TECHNICAL, 'k', () => 42)).toBe(42);
      expect(await service.get(CacheNamespace.TECHNICAL, 'k')).toBe(42);
    });

    it('rethrows a factory error without caching', async () => {
      jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      const factory = jest.fn().mockRejectedValue(new Error('upstream down'));

      await expect(service.getOrSet(CacheNamespace.TECHNICAL, 'k', factory)).rejects.toThrow('upstream down');
      expect(await service.exists(CacheNamespace.TECHNICAL, 'k')).toBe(false);
    });

    it('reports a reachable store as healthy', async () => {
      expect(await service.healthCheck()).toBe(true);
    });

    it('treats an unparseable entry as a miss', async () => {
      jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      await store.set('test:technical:broken', '{not json', 60);

      expect(await service.get(CacheNamespace.TECHNICAL, 'broken')).toBeUndefined();
    });
  });

  describe('with an unreachable store', () => {
    let service: CacheService;

    beforeEach(async () => {
      jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
      service = await createService(new UnreachableStore());
    });

    it('degrades every operation to a miss', async () => {
      expect(await service.get(CacheNamespace.TECHNICAL, 'k')).toBeUndefined();
      expect(await service.set(CacheNamespace.TECHNICAL, 'k', 1)).toBe(false);
      expect(await service.delete(CacheNamespace.TECHNICAL, 'k')).toBe(false);
      expect(await service.exists(CacheNamespace.TECHNICAL, 'k')).toBe(false);
      expect(await service.ttl(CacheNamespace.TECHNICAL, 'k')).toBe(-2);
      expect(await service.clearNamespace(CacheNamespace.TECHNICAL)).toBe(0);
      expect(await service.healthCheck()).toBe(false);
    });

    it('still runs the factory when the store is down', async () => {
      expect(await service.getOrSet(CacheNamespace.TECHNICAL, 'k', () => 'fresh')).toBe('fresh');
    });

    it('logs each failure', async () => {
      await service.get(CacheNamespace.TECHNICAL, 'k');

      expect(Logger.prototype.error).toHaveBeenCalledWith(
        'Cache get error for technical:k: connection refused',
      );
    });
  });
});
