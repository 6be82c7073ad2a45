import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheNamespace, CacheService } from '../cache/cache.service';
import {
  AssetType,
  DataSource,
  MarketMover,
  MarketStatus,
  MarketSummary,
  PriceBar,
  PriceMap,
  PriceRecord,
  PriceWithHistory,
  QuoteSource,
  SymbolInfo,
  SymbolValidation,
  providesHistory,
} from './data.types';
import {
  MARKET_INDICES,
  SUMMARY_UNIVERSE,
  SYMBOL_CATALOG,
  detectAssetType,
  normalizeSymbol,
} from './market-universe';
import { AlphaVantageService } from './providers/alpha-vantage.service';
import { YahooFinanceService } from './providers/yahoo-finance.service';
import { CoinGeckoService } from './providers/coingecko.service';

const SUMMARY_LIST_SIZE = 10;

export function getMarketStatus(now: Date = new Date()): MarketStatus {
  const weekday = now.getUTCDay() >= 1 && now.getUTCDay() <= 5;
  const tradingHours = now.getUTCHours() >= 9 && now.getUTCHours() < 16;
  return weekday && tradingHours ? 'open' : 'closed';
}

@Injectable()
export class MarketDataService {
  private readonly logger = new Logger(MarketDataService.name);
  private readonly priceTtlSeconds: number;

  constructor(
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
    private readonly alphaVantage: AlphaVantageService,
    private readonly yahooFinance: YahooFinanceService,
    private readonly coinGecko: CoinGeckoService,
  ) {
    this.priceTtlSeconds = this.configService.get<number>('PRICE_CACHE_TTL_SECONDS', 300);
  }

  /**
   * Current quote plus recent history for a symbol. Sources are tried one at a
   * time in a fixed, asset-type dependent order; the first usable quote wins.
   * Returns null when every source comes back empty.
   */
  async getPriceWithHistory(symbol: string, period: string = '1mo'): Promise<PriceWithHistory | null> {
    const upperSymbol = normalizeSymbol(symbol);
    const cacheKey = `price:${upperSymbol}_${period}`;

    const cached = await this.cacheService.get<PriceWithHistory>(CacheNamespace.MARKET_DATA, cacheKey);
    if (cached) {
      this.logger.debug(`Returning cached data for ${upperSymbol}`);
      return cached;
    }

    this.logger.log(`Fetching fresh data for ${upperSymbol}`);
    const assetType = detectAssetType(upperSymbol);

    for (const source of this.sourcesFor(assetType)) {
      const quote = await source.fetchQuote(upperSymbol);
      if (!quote) {
        continue;
      }

      this.logger.log(`Got data from ${source.source} for ${upperSymbol}`);
      const history = providesHistory(source)
        ? await source.fetchHistory(upperSymbol, period)
        : null;

      const result = this.withHistory(quote, history ?? [], assetType, period);
      await this.cacheService.set(CacheNamespace.MARKET_DATA, cacheKey, result, this.priceTtlSeconds);
      return result;
    }

    this.logger.warn(`No price data available for ${upperSymbol}`);
    return null;
  }

  /**
   * Fetches every symbol concurrently. A symbol whose acquisition fails or
   * throws maps to null without affecting the others.
   */
  async getMultiplePrices(symbols: string[]): Promise<PriceMap> {
    const results = await Promise.allSettled(
      symbols.map((symbol) => this.getPriceWithHistory(symbol)),
    );

    const prices: PriceMap = {};
    results.forEach((result, index) => {
      const symbol = symbols[index];
      if (result.status === 'fulfilled') {
        prices[symbol] = result.value;
      } else {
        this.logger.warn(`Price fetch failed for ${symbol}: ${(result.reason as Error).message}`);
        prices[symbol] = null;
      }
    });

    return prices;
  }

  searchSymbols(query: string, limit: number = 10): SymbolInfo[] {
    const upperQuery = query.trim().toUpperCase();

    return SYMBOL_CATALOG.filter(
      (info) => info.symbol.includes(upperQuery) || info.name.toUpperCase().includes(upperQuery),
    ).slice(0, limit);
  }

  async validateSymbol(symbol: string): Promise<SymbolValidation> {
    const upperSymbol = normalizeSymbol(symbol);
    const data = await this.getPriceWithHistory(upperSymbol, '1d');

    if (!data) {
      return { valid: false, symbol: upperSymbol, error: 'Symbol not found or data unavailable' };
    }
    return { valid: true, symbol: upperSymbol, assetType: data.assetType };
  }

  async getMarketSummary(now: Date = new Date()): Promise<MarketSummary> {
    const [indexPrices, universePrices] = await Promise.all([
      this.getMultiplePrices(MARKET_INDICES),
      this.getMultiplePrices(SUMMARY_UNIVERSE),
    ]);

    const movers: MarketMover[] = [];
    for (const [symbol, data] of Object.entries(universePrices)) {
      if (!data) continue;
      movers.push({
        symbol,
        price: data.currentPrice,
        change: data.change,
        changePercent: data.changePercent,
        volume: data.volume,
      });
    }

    const indices: MarketSummary['indices'] = {};
    for (const [symbol, data] of Object.entries(indexPrices)) {
      if (!data) continue;
      indices[symbol] = {
        price: data.currentPrice,
        change: data.change,
        changePercent: data.changePercent,
      };
    }

    return {
      timestamp: now.toISOString(),
      marketStatus: getMarketStatus(now),
      indices,
      topGainers: movers
        .filter((m) => m.changePercent > 0)
        .sort((a, b) => b.changePercent - a.changePercent)
        .slice(0, SUMMARY_LIST_SIZE),
      topLosers: movers
        .filter((m) => m.changePercent < 0)
        .sort((a, b) => a.changePercent - b.changePercent)
        .slice(0, SUMMARY_LIST_SIZE),
      mostActive: [...movers].sort((a, b) => b.volume - a.volume).slice(0, SUMMARY_LIST_SIZE),
    };
  }

  getEnabledSources(): DataSource[] {
    return [this.alphaVantage, this.yahooFinance, this.coinGecko]
      .filter((source) => source.isEnabled())
      .map((source) => source.source);
  }

  private sourcesFor(assetType: AssetType): QuoteSource[] {
    const ordered: QuoteSource[] =
      assetType === AssetType.CRYPTO
        ? [this.coinGecko, this.alphaVantage, this.yahooFinance]
        : [this.alphaVantage, this.yahooFinance];

    return ordered.filter((source) => source.isEnabled());
  }

  private withHistory(
    quote: PriceRecord,
    history: PriceBar[],
    assetType: AssetType,
    period: string,
  ): PriceWithHistory {
    return { ...quote, history, assetType, period };
  }
}
