import { Module } from '@nestjs/common';
import { CacheService } from './cache.service';
import { CacheStore } from './cache.store';
import { InMemoryCacheStore } from './in-memory-cache.store';

@Module({
  providers: [{ provide: CacheStore, useClass: InMemoryCacheStore }, CacheService],
  exports: [CacheService],
})
export class CacheModule {}
