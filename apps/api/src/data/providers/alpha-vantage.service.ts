import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CompanyOverview,
  DataSource,
  HISTORY_LIMIT,
  HistorySource,
  PLACEHOLDER_API_KEY,
  PriceBar,
  PriceRecord,
} from '../data.types';
import { RateLimiterService } from '../rate-limiter.service';
import { fetchJson, parseNumber } from '../http';

interface AlphaVantageStatus {
  'Error Message'?: string;
  Note?: string;
  Information?: string;
}

interface GlobalQuoteResponse extends AlphaVantageStatus {
  'Global Quote'?: Record<string, string | undefined>;
}

type TimeSeriesResponse = AlphaVantageStatus & Record<string, unknown>;

type OverviewResponse = AlphaVantageStatus & Record<string, string | undefined>;

const PERIOD_FUNCTIONS: Record<string, string> = {
  '1d': 'TIME_SERIES_INTRADAY',
  '1wk': 'TIME_SERIES_WEEKLY',
  '1mo': 'TIME_SERIES_MONTHLY',
  '3mo': 'TIME_SERIES_MONTHLY',
  '6mo': 'TIME_SERIES_MONTHLY',
  '1y': 'TIME_SERIES_MONTHLY',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class AlphaVantageService implements HistorySource {
  readonly source = DataSource.ALPHA_VANTAGE;
  private readonly logger = new Logger(AlphaVantageService.name);
  private readonly apiKey: string;
  private readonly baseUrl = 'https://www.alphavantage.co/query';
  private readonly timeoutMs = 15_000;

  constructor(
    private readonly configService: ConfigService,
    private readonly rateLimiter: RateLimiterService,
  ) {
    this.apiKey = this.configService.get<string>('ALPHA_VANTAGE_API_KEY', PLACEHOLDER_API_KEY);
    if (!this.isEnabled()) {
      this.logger.warn('ALPHA_VANTAGE_API_KEY not configured, Alpha Vantage disabled');
    }
  }

  isEnabled(): boolean {
    return this.apiKey !== '' && this.apiKey !== PLACEHOLDER_API_KEY;
  }

  async fetchQuote(symbol: string): Promise<PriceRecord | null> {
    try {
      await this.rateLimiter.acquire(this.source);

      const data = await fetchJson<GlobalQuoteResponse>(
        this.baseUrl,
        { function: 'GLOBAL_QUOTE', symbol, apikey: this.apiKey },
        this.timeoutMs,
      );

      if (this.reportsProblem(data, symbol)) {
        return null;
      }

      const quote = data['Global Quote'];
      const price = parseNumber(quote?.['05. price']);
      if (!quote || price === null || price <= 0) {
        this.logger.warn(`No Alpha Vantage price data for ${symbol}`);
        return null;
      }

      return {
        symbol: symbol.toUpperCase(),
        currentPrice: price,
        change: parseNumber(quote['09. change']) ?? 0,
        changePercent: parseNumber(quote['10. change percent']) ?? 0,
        volume: parseNumber(quote['06. volume']) ?? 0,
        high: parseNumber(quote['03. high']) ?? price,
        low: parseNumber(quote['04. low']) ?? price,
        open: parseNumber(quote['02. open']) ?? price,
        previousClose: parseNumber(quote['08. previous close']) ?? price,
        source: this.source,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.warn(`Alpha Vantage quote failed for ${symbol}: ${(error as Error).message}`);
      return null;
    }
  }

  async fetchHistory(symbol: string, period: string): Promise<PriceBar[] | null> {
    const fn = PERIOD_FUNCTIONS[period] ?? 'TIME_SERIES_MONTHLY';
    const params: Record<string, string> = { function: fn, symbol, apikey: this.apiKey };
    if (fn === 'TIME_SERIES_INTRADAY') {
      params.interval = '5min';
    }

    try {
      await this.rateLimiter.acquire(this.source);

      const data = await fetchJson<TimeSeriesResponse>(this.baseUrl, params, this.timeoutMs);
      if (this.reportsProblem(data, symbol)) {
        return null;
      }

      const seriesKey = Object.keys(data).find((key) => key.includes('Time Series'));
      const series = seriesKey ? data[seriesKey] : undefined;
      if (!isRecord(series)) {
        return null;
      }

      const bars: PriceBar[] = [];
      for (const [date, values] of Object.entries(series)) {
        const bar = this.toBar(date, values);
        if (!bar) {
          this.logger.warn(`Malformed Alpha Vantage bar for ${symbol} at ${date}`);
          return null;
        }
        bars.push(bar);
      }

      bars.sort((a, b) => a.date.localeCompare(b.date));
      return bars.slice(-HISTORY_LIMIT);
    } catch (error) {
      this.logger.warn(`Alpha Vantage history failed for ${symbol}: ${(error as Error).message}`);
      return null;
    }
  }

  /** Company profile and fundamentals; null for unknown symbols (the endpoint answers `{}`). */
  async fetchOverview(symbol: string): Promise<CompanyOverview | null> {
    try {
      await this.rateLimiter.acquire(this.source);

      const data = await fetchJson<OverviewResponse>(
        this.baseUrl,
        { function: 'OVERVIEW', symbol, apikey: this.apiKey },
        this.timeoutMs,
      );

      if (this.reportsProblem(data, symbol) || !data.Symbol) {
        return null;
      }

      const text = (value: string | undefined): string | null =>
        value && value !== 'None' ? value : null;

      this.logger.log(`Fetched Alpha Vantage overview for ${symbol}`);
      return {
        symbol: data.Symbol,
        name: text(data.Name),
        exchange: text(data.Exchange),
        currency: text(data.Currency),
        sector: text(data.Sector),
        industry: text(data.Industry),
        peRatio: parseNumber(data.PERatio),
        pbRatio: parseNumber(data.PriceToBookRatio),
        dividendYield: parseNumber(data.DividendYield),
        marketCap: parseNumber(data.MarketCapitalization),
        beta: parseNumber(data.Beta),
        week52High: parseNumber(data['52WeekHigh']),
        week52Low: parseNumber(data['52WeekLow']),
        eps: parseNumber(data.EPS),
        revenue: parseNumber(data.RevenueTTM),
        profitMargin: parseNumber(data.ProfitMargin),
      };
    } catch (error) {
      this.logger.warn(`Alpha Vantage overview failed for ${symbol}: ${(error as Error).message}`);
      return null;
    }
  }

  private toBar(date: string, values: unknown): PriceBar | null {
    if (!isRecord(values)) {
      return null;
    }

    const open = parseNumber(values['1. open']);
    const high = parseNumber(values['2. high']);
    const low = parseNumber(values['3. low']);
    const close = parseNumber(values['4. close']);
    const volume = parseNumber(values['5. volume']);
    if (open === null || high === null || low === null || close === null || volume === null) {
      return null;
    }

    return { date, open, high, low, close, volume };
  }

  private reportsProblem(data: AlphaVantageStatus, symbol: string): boolean {
    if (data['Error Message']) {
      this.logger.warn(`Alpha Vantage error for ${symbol}: ${data['Error Message']}`);
      return true;
    }
    // Quota messages arrive with HTTP 200 under Note or Information
    const quotaMessage = data.Note ?? data.Information;
    if (quotaMessage) {
      this.logger.warn(`Alpha Vantage rate limit: ${quotaMessage}`);
      return true;
    }
    return false;
  }
}
