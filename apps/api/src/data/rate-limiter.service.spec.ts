import { ConfigService } from '@nestjs/config';
import { RateLimiterService } from './rate-limiter.service';
import { DataSource } from './data.types';

const MIN_INTERVAL_MS = 100;
// timers may fire a millisecond or two early against Date.now
const TIMER_SLACK_MS = 5;

function createLimiter(minIntervalMs: number): RateLimiterService {
  return new RateLimiterService(new ConfigService({ RATE_LIMIT_MIN_INTERVAL_MS: minIntervalMs }));
}

describe('RateLimiterService', () => {
  let limiter: RateLimiterService;

  beforeEach(() => {
    limiter = createLimiter(MIN_INTERVAL_MS);
  });

  afterEach(async () => {
    await limiter.onModuleDestroy();
  });

  it('spaces consecutive calls to the same source', async () => {
    const started = Date.now();
    await limiter.acquire(DataSource.YAHOO_FINANCE);
    await limiter.acquire(DataSource.YAHOO_FINANCE);
    await limiter.acquire(DataSource.YAHOO_FINANCE);

    // the third slot opens two intervals after the first, which opened no earlier than `started`
    expect(Date.now() - started).toBeGreaterThanOrEqual(2 * MIN_INTERVAL_MS - TIMER_SLACK_MS);
  });

  it('serializes concurrent callers on one source', async () => {
    const started = Date.now();
    await Promise.all([
      limiter.acquire(DataSource.COINGECKO),
      limiter.acquire(DataSource.COINGECKO),
    ]);

    expect(Date.now() - started).toBeGreaterThanOrEqual(MIN_INTERVAL_MS - TIMER_SLACK_MS);
  });

  it('does not make different sources wait for each other', async () => {
    const slowLimiter = createLimiter(1_000);
    const started = Date.now();
    try {
      await Promise.all([
        slowLimiter.acquire(DataSource.ALPHA_VANTAGE),
        slowLimiter.acquire(DataSource.YAHOO_FINANCE),
        slowLimiter.acquire(DataSource.COINGECKO),
      ]);
    } finally {
      await slowLimiter.onModuleDestroy();
    }

    // a shared queue would hold the later two for a full second each
    expect(Date.now() - started).toBeLessThan(500);
  });
});
