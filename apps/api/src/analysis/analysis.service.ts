import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheNamespace, CacheService } from '../cache/cache.service';
import { MarketDataService } from '../data/market-data.service';
import { normalizeSymbol } from '../data/market-universe';
import { computeIndicatorSet } from './indicators';
import { generateSignals } from './signal-fusion';
import {
  ANALYSIS_WINDOW,
  BatchSignals,
  IndicatorSnapshot,
  MAX_BATCH_SYMBOLS,
  MIN_HISTORY_POINTS,
  MarketOverview,
  RiskLevel,
  Signal,
  SignalBundle,
  SignalStrength,
  StrengthLevels,
  StrongSignal,
  TrendDirection,
} from './analysis.types';

const SYNTHETIC_HISTORY_NOTE = 'Indicators derived from synthetic price history (no market history available)';

/**
 * Linear stand-in series centred on the current price, used when a source
 * returned a quote without history.
 */
export function syntheticSeries(currentPrice: number, length: number = ANALYSIS_WINDOW): number[] {
  const midpoint = Math.floor(length / 2);
  return Array.from({ length }, (_, i) => currentPrice * (1 + (i - midpoint) * 0.01));
}

function summarizeSignals(bundles: Array<[string, SignalBundle]>): {
  signalsSummary: Record<Signal, number>;
  strongSignals: StrongSignal[];
} {
  const signalsSummary = { [Signal.BUY]: 0, [Signal.SELL]: 0, [Signal.HOLD]: 0 };
  const strongSignals: StrongSignal[] = [];

  for (const [symbol, bundle] of bundles) {
    signalsSummary[bundle.signal]++;
    if (bundle.strength >= SignalStrength.STRONG) {
      strongSignals.push({ symbol, signal: bundle.signal, confidence: bundle.confidence });
    }
  }
  return { signalsSummary, strongSignals };
}

@Injectable()
export class AnalysisService {
  private readonly logger = new Logger(AnalysisService.name);
  private readonly signalTtlSeconds: number;

  constructor(
    private readonly marketDataService: MarketDataService,
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
  ) {
    this.signalTtlSeconds = this.configService.get<number>('SIGNAL_CACHE_TTL_SECONDS', 600);
  }

  async computeSignalBundle(symbol: string, period: string = '1mo'): Promise<SignalBundle | null> {
    const upperSymbol = normalizeSymbol(symbol);
    const cacheKey = `signal:${upperSymbol}_${period}`;

    try {
      this.logger.log(`Computing signals for ${upperSymbol}`);

      const cached = await this.cacheService.get<SignalBundle>(CacheNamespace.TECHNICAL, cacheKey);
      if (cached) {
        this.logger.debug(`Returning cached signals for ${upperSymbol}`);
        return cached;
      }

      const priceData = await this.marketDataService.getPriceWithHistory(upperSymbol, period);
      if (!priceData) {
        this.logger.warn(`No price data available for ${upperSymbol}`);
        return null;
      }

      const { currentPrice } = priceData;
      const syntheticHistory = priceData.history.length === 0;
      let prices: number[];
      if (syntheticHistory) {
        this.logger.warn(`No history data for ${upperSymbol}, generating synthetic data`);
        prices = syntheticSeries(currentPrice);
      } else {
        prices = priceData.history.slice(-ANALYSIS_WINDOW).map((bar) => bar.close);
      }

      if (prices.length < MIN_HISTORY_POINTS) {
        this.logger.warn(`Insufficient data for ${upperSymbol}: ${prices.length} points`);
        return null;
      }

      const indicators = computeIndicatorSet(prices);
      const fusion = generateSignals({
        currentPrice,
        rsi: indicators.rsi,
        macd: indicators.macd,
        bollingerBands: indicators.bollingerBands,
        stochastic: indicators.stochastic,
        williamsR: indicators.williamsR,
        ema20: indicators.ema20,
        ema50: indicators.ema50,
      });

      const bundle: SignalBundle = {
        symbol: upperSymbol,
        currentPrice,
        timestamp: new Date().toISOString(),
        period,
        ...fusion,
        reasoning: syntheticHistory ? [...fusion.reasoning, SYNTHETIC_HISTORY_NOTE] : fusion.reasoning,
        indicators,
        syntheticHistory,
      };

      await this.cacheService.set(CacheNamespace.TECHNICAL, cacheKey, bundle, this.signalTtlSeconds);

      this.logger.log(
        `Generated ${bundle.signal} signal for ${upperSymbol} with ${bundle.confidence.toFixed(1)}% confidence`,
      );
      return bundle;
    } catch (error) {
      this.logger.error(`Error computing signals for ${upperSymbol}: ${(error as Error).message}`);
      return null;
    }
  }

  async getIndicators(symbol: string, period: string = '1mo'): Promise<IndicatorSnapshot | null> {
    const bundle = await this.computeSignalBundle(symbol, period);
    if (!bundle) {
      return null;
    }

    return {
      symbol: bundle.symbol,
      timestamp: bundle.timestamp,
      period: bundle.period,
      currentPrice: bundle.currentPrice,
      indicators: bundle.indicators,
    };
  }

  async getMarketOverview(symbols: string[], now: Date = new Date()): Promise<MarketOverview> {
    this.logger.log(`Generating market overview for ${symbols.length} symbols`);

    const results = await Promise.allSettled(
      symbols.map((symbol) => this.computeSignalBundle(symbol)),
    );

    const analysed: Array<[string, SignalBundle]> = [];
    const entries: MarketOverview['symbols'] = {};

    results.forEach((result, index) => {
      const symbol = symbols[index];

      if (result.status === 'rejected') {
        const message = (result.reason as Error).message;
        this.logger.warn(`Failed to analyze ${symbol}: ${message}`);
        entries[symbol] = { error: message };
        return;
      }

      const bundle = result.value;
      if (!bundle) {
        entries[symbol] = { error: 'No data available' };
        return;
      }

      analysed.push([symbol, bundle]);
      entries[symbol] = {
        signal: bundle.signal,
        confidence: bundle.confidence,
        trend: bundle.trend,
        risk: bundle.risk,
        price: bundle.currentPrice,
      };
    });

    return {
      timestamp: now.toISOString(),
      totalSymbols: symbols.length,
      successfulAnalyses: analysed.length,
      ...summarizeSignals(analysed),
      symbols: entries,
    };
  }

  /**
   * Full bundles for up to 20 symbols at one period. A symbol that cannot be
   * analysed maps to null with its reason under `errors`.
   */
  async getBatchSignals(
    symbols: string[],
    period: string = '1mo',
    now: Date = new Date(),
  ): Promise<BatchSignals> {
    if (symbols.length === 0 || symbols.length > MAX_BATCH_SYMBOLS) {
      throw new BadRequestException(`Between 1 and ${MAX_BATCH_SYMBOLS} symbols are required`);
    }
    const invalid = symbols.find((symbol) => symbol.trim() === '' || symbol.trim().length > 10);
    if (invalid !== undefined) {
      throw new BadRequestException(`Invalid symbol: "${invalid}"`);
    }

    this.logger.log(`Computing signals for ${symbols.length} symbols`);

    const results = await Promise.allSettled(
      symbols.map((symbol) => this.computeSignalBundle(symbol, period)),
    );

    const analysed: Array<[string, SignalBundle]> = [];
    const signals: Record<string, SignalBundle | null> = {};
    const errors: Record<string, string> = {};

    results.forEach((result, index) => {
      const symbol = symbols[index];
      if (result.status === 'fulfilled' && result.value) {
        analysed.push([symbol, result.value]);
        signals[symbol] = result.value;
        return;
      }

      signals[symbol] = null;
      errors[symbol] =
        result.status === 'rejected' ? (result.reason as Error).message : 'Analysis failed';
    });

    return {
      timestamp: now.toISOString(),
      period,
      totalSymbols: symbols.length,
      successfulAnalyses: analysed.length,
      failedAnalyses: symbols.length - analysed.length,
      ...summarizeSignals(analysed),
      signals,
      errors,
    };
  }

  getStrengthLevels(): StrengthLevels {
    return {
      levels: {
        [SignalStrength.VERY_WEAK]: { name: 'Very Weak', description: 'Minimal signal strength' },
        [SignalStrength.WEAK]: { name: 'Weak', description: 'Low signal strength' },
        [SignalStrength.MODERATE]: { name: 'Moderate', description: 'Medium signal strength' },
        [SignalStrength.STRONG]: { name: 'Strong', description: 'High signal strength' },
        [SignalStrength.VERY_STRONG]: { name: 'Very Strong', description: 'Maximum signal strength' },
      },
      trendDirections: {
        [TrendDirection.BULLISH]: 'Upward price trend',
        [TrendDirection.BEARISH]: 'Downward price trend',
        [TrendDirection.SIDEWAYS]: 'Horizontal price movement',
      },
      riskLevels: {
        [RiskLevel.LOW]: 'Low risk trade',
        [RiskLevel.MEDIUM]: 'Medium risk trade',
        [RiskLevel.HIGH]: 'High risk trade',
      },
    };
  }
}
