import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource, PriceRecord, QuoteSource } from '../data.types';
import { RateLimiterService } from '../rate-limiter.service';
import { fetchJson, parseNumber } from '../http';

interface ChartMeta {
  regularMarketPrice?: number;
  previousClose?: number;
  regularMarketVolume?: number;
  regularMarketDayHigh?: number;
  regularMarketDayLow?: number;
  regularMarketOpen?: number;
}

interface ChartResponse {
  chart?: {
    result?: Array<{ meta?: ChartMeta }> | null;
  };
}

@Injectable()
export class YahooFinanceService implements QuoteSource {
  readonly source = DataSource.YAHOO_FINANCE;
  private readonly logger = new Logger(YahooFinanceService.name);
  private readonly enabled: boolean;
  private readonly baseUrl = 'https://query1.finance.yahoo.com/v8/finance/chart';
  private readonly timeoutMs = 10_000;

  constructor(
    private readonly configService: ConfigService,
    private readonly rateLimiter: RateLimiterService,
  ) {
    this.enabled = this.configService.get<boolean>('YAHOO_FINANCE_ENABLED', true);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  async fetchQuote(symbol: string): Promise<PriceRecord | null> {
    try {
      await this.rateLimiter.acquire(this.source);

      const data = await fetchJson<ChartResponse>(
        `${this.baseUrl}/${encodeURIComponent(symbol)}`,
        { range: '1d', interval: '1m', includePrePost: 'true' },
        this.timeoutMs,
      );

      const meta = data.chart?.result?.[0]?.meta;
      const price = parseNumber(meta?.regularMarketPrice);
      if (!meta || price === null || price <= 0) {
        this.logger.warn(`No Yahoo Finance price data for ${symbol}`);
        return null;
      }

      const previousClose = parseNumber(meta.previousClose) ?? price;
      const change = price - previousClose;

      return {
        symbol: symbol.toUpperCase(),
        currentPrice: price,
        change,
        changePercent: previousClose ? (change / previousClose) * 100 : 0,
        volume: parseNumber(meta.regularMarketVolume) ?? 0,
        high: parseNumber(meta.regularMarketDayHigh) ?? price,
        low: parseNumber(meta.regularMarketDayLow) ?? price,
        open: parseNumber(meta.regularMarketOpen) ?? price,
        previousClose,
        source: this.source,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.warn(`Yahoo Finance quote failed for ${symbol}: ${(error as Error).message}`);
      return null;
    }
  }
}
