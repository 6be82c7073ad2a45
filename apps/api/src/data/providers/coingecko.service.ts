import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, PriceRecord, QuoteSource } from '../data.types';
import { RateLimiterService } from '../rate-limiter.service';
import { COINGECKO_IDS } from '../market-universe';
import { fetchJson, parseNumber } from '../http';

interface SimplePrice {
  usd?: number;
  usd_24h_change?: number;
  usd_24h_vol?: number;
  last_updated_at?: number;
}

type SimplePriceResponse = Record<string, SimplePrice | undefined>;

@Injectable()
export class CoinGeckoService implements QuoteSource {
  readonly source = DataSource.COINGECKO;
  private readonly logger = new Logger(CoinGeckoService.name);
  private readonly enabled: boolean;
  private readonly baseUrl = 'https://api.coingecko.com/api/v3';
  private readonly timeoutMs = 10_000;

  constructor(
    private readonly configService: ConfigService,
    private readonly rateLimiter: RateLimiterService,
  ) {
    this.enabled = this.configService.get<boolean>('COINGECKO_ENABLED', true);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  async fetchQuote(symbol: string): Promise<PriceRecord | null> {
    const coinId = COINGECKO_IDS[symbol.toUpperCase()];
    if (!coinId) {
      return null;
    }

    try {
      await this.rateLimiter.acquire(this.source);

      const data = await fetchJson<SimplePriceResponse>(
        `${this.baseUrl}/simple/price`,
        {
          ids: coinId,
          vs_currencies: 'usd',
          include_24hr_change: 'true',
          include_24hr_vol: 'true',
          include_last_updated_at: 'true',
        },
        this.timeoutMs,
      );

      const coin = data[coinId];
      const price = parseNumber(coin?.usd);
      if (!coin || price === null || price <= 0) {
        this.logger.warn(`No CoinGecko price data for ${symbol}`);
        return null;
      }

      const changePercent = parseNumber(coin.usd_24h_change) ?? 0;
      const change = price * (changePercent / 100);

      // The simple price endpoint has no OHLC; the day range is approximated
      return {
        symbol: symbol.toUpperCase(),
        currentPrice: price,
        change,
        changePercent,
        volume: parseNumber(coin.usd_24h_vol) ?? 0,
        high: price * 1.05,
        low: price * 0.95,
        open: price - change,
        previousClose: price - change,
        source: this.source,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.warn(`CoinGecko quote failed for ${symbol}: ${(error as Error).message}`);
      return null;
    }
  }
}
