import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Bottleneck from 'bottleneck';
import { DataSource } from './data.types';

/**
 * Per-source request throttle. Each provider gets its own Bottleneck with a
 * single concurrent slot, so callers racing on the same source are queued and
 * the spacing between their starts is at least `minIntervalMs`.
 */
@Injectable()
export class RateLimiterService implements OnModuleDestroy {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly limiters = new Map<DataSource, Bottleneck>();
  private readonly minIntervalMs: number;

  constructor(private readonly configService: ConfigService) {
    this.minIntervalMs = this.configService.get<number>('RATE_LIMIT_MIN_INTERVAL_MS', 1000);
  }

  async acquire(source: DataSource): Promise<void> {
    await this.getLimiter(source).schedule(() => Promise.resolve());
  }

  private getLimiter(source: DataSource): Bottleneck {
    const existing = this.limiters.get(source);
    if (existing) {
      return existing;
    }

    const limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: this.minIntervalMs,
    });
    limiter.on('error', (error: Error) => {
      this.logger.error(`Rate limiter error for ${source}: ${error.message}`);
    });

    this.limiters.set(source, limiter);
    return limiter;
  }

  async onModuleDestroy(): Promise<void> {
    await Promise.all([...this.limiters.values()].map((limiter) => limiter.disconnect()));
    this.limiters.clear();
  }
}
