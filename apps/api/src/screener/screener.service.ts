import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { AnalysisService } from '../analysis/analysis.service';
import { MarketOverview, Signal } from '../analysis/analysis.types';
import { AssetMetadataService } from '../data/asset-metadata.service';
import { MarketDataService } from '../data/market-data.service';
import {
  SCREENER_UNIVERSE,
  SECTOR_REPRESENTATIVES,
  SUMMARY_UNIVERSE,
} from '../data/market-universe';
import { ScreeningRequestDto } from './dto/screening-request.dto';
import { SCREENING_STRATEGIES, calculateScreeningScore } from './screening-score';
import {
  MarketBreadth,
  MarketSentiment,
  PerformanceSummary,
  ScreenedAsset,
  ScreeningResult,
  SectorAnalysis,
  SectorPerformance,
  StrategyCatalog,
} from './screener.types';

const ROTATION_SECTOR_COUNT = 2;

function countSignals(overview: MarketOverview, signal: Signal): number {
  return Object.values(overview.symbols).filter((entry) => 'signal' in entry && entry.signal === signal)
    .length;
}

export function sentimentFor(breadthIndicator: number): MarketSentiment {
  if (breadthIndicator > 0.3) return 'Very Bullish';
  if (breadthIndicator > 0.1) return 'Bullish';
  if (breadthIndicator > -0.1) return 'Neutral';
  if (breadthIndicator > -0.3) return 'Bearish';
  return 'Very Bearish';
}

@Injectable()
export class ScreenerService {
  private readonly logger = new Logger(ScreenerService.name);

  constructor(
    private readonly marketDataService: MarketDataService,
    private readonly analysisService: AnalysisService,
    private readonly assetMetadataService: AssetMetadataService,
  ) {}

  getStrategies(): StrategyCatalog {
    return {
      strategies: SCREENING_STRATEGIES,
      totalStrategies: Object.keys(SCREENING_STRATEGIES).length,
      customFiltersAvailable: true,
    };
  }

  /**
   * Ranks the screener universe by strategy score after applying the price,
   * volume, market cap and sector filters. Ranks are assigned before `limit`
   * cuts the list.
   */
  async screenAssets(input: Partial<ScreeningRequestDto> = {}, now: Date = new Date()): Promise<ScreeningResult> {
    const request = this.validateRequest(input);
    const limit = request.limit ?? 50;
    this.logger.log(`Screening assets with strategy: ${request.strategy ?? 'custom'}`);

    const prices = await this.marketDataService.getMultiplePrices(SCREENER_UNIVERSE);
    const sectors = request.sectors?.map((sector) => sector.toLowerCase());
    const screened: ScreenedAsset[] = [];

    for (const symbol of SCREENER_UNIVERSE) {
      const data = prices[symbol];
      if (!data) continue;

      if (request.priceMin !== undefined && data.currentPrice < request.priceMin) continue;
      if (request.priceMax !== undefined && data.currentPrice > request.priceMax) continue;
      if (request.volumeMin !== undefined && data.volume < request.volumeMin) continue;

      const metadata = await this.assetMetadataService.getAssetMetadata(symbol);
      if (sectors && sectors.length > 0 && !sectors.includes(metadata.sector.toLowerCase())) continue;
      if (request.marketCapMin !== undefined && (metadata.marketCap ?? -1) < request.marketCapMin) continue;
      if (
        request.marketCapMax !== undefined &&
        (metadata.marketCap === null || metadata.marketCap > request.marketCapMax)
      ) {
        continue;
      }

      const bundle = await this.analysisService.computeSignalBundle(symbol);

      screened.push({
        symbol,
        name: metadata.name,
        sector: metadata.sector,
        industry: metadata.industry,
        price: data.currentPrice,
        change: data.change,
        changePercent: data.changePercent,
        volume: data.volume,
        marketCap: metadata.marketCap,
        peRatio: metadata.peRatio,
        pbRatio: metadata.pbRatio,
        dividendYield: metadata.dividendYield,
        beta: metadata.beta,
        score: calculateScreeningScore(data.changePercent, bundle, request.strategy),
        rank: 0,
        signal: bundle?.signal ?? Signal.HOLD,
        confidence: bundle?.confidence ?? 50,
      });
    }

    screened.sort((a, b) => b.score - a.score);
    screened.forEach((asset, index) => {
      asset.rank = index + 1;
    });
    const assets = screened.slice(0, limit);

    const sectorBreakdown: Record<string, number> = {};
    for (const asset of assets) {
      sectorBreakdown[asset.sector] = (sectorBreakdown[asset.sector] ?? 0) + 1;
    }

    this.logger.log(`Screened ${assets.length} assets from a universe of ${SCREENER_UNIVERSE.length}`);
    return {
      strategy: request.strategy ?? 'custom',
      timestamp: now.toISOString(),
      totalAssetsScreened: SCREENER_UNIVERSE.length,
      totalResults: assets.length,
      filtersApplied: this.describeFilters(request),
      assets,
      sectorBreakdown,
      performanceSummary: this.summarize(assets),
    };
  }

  async getSectorAnalysis(now: Date = new Date()): Promise<SectorAnalysis> {
    this.logger.log('Computing sector analysis');
    const sectors: SectorPerformance[] = [];

    for (const [sector, symbols] of Object.entries(SECTOR_REPRESENTATIVES)) {
      const prices = await this.marketDataService.getMultiplePrices(symbols);
      const overview = await this.analysisService.getMarketOverview(symbols, now);

      const validPrices = Object.values(prices).flatMap((data) => (data ? [data.currentPrice] : []));
      const averagePrice =
        validPrices.length > 0 ? validPrices.reduce((sum, price) => sum + price, 0) / validPrices.length : 0;
      const buySignals = countSignals(overview, Signal.BUY);
      const totalSignals = Object.keys(overview.symbols).length;

      sectors.push({
        sector,
        averagePrice,
        buySignals,
        totalSignals,
        signalRatio: totalSignals > 0 ? buySignals / totalSignals : 0,
        trend: buySignals > totalSignals / 2 ? 'bullish' : 'bearish',
      });
    }

    sectors.sort((a, b) => b.signalRatio - a.signalRatio);
    const top = sectors.slice(0, ROTATION_SECTOR_COUNT).map((s) => s.sector);
    const bottom = sectors.slice(-ROTATION_SECTOR_COUNT).map((s) => s.sector);

    return {
      timestamp: now.toISOString(),
      sectors,
      rotationSignals: {
        inFavor: top,
        outOfFavor: bottom,
        rotationSignal: top.includes('Technology') ? 'Technology to Healthcare' : 'No clear rotation',
      },
      topPerformingSectors: top,
      bottomPerformingSectors: bottom,
    };
  }

  /** BUY counts as advancing, SELL as declining and HOLD as unchanged. */
  async getMarketBreadth(now: Date = new Date()): Promise<MarketBreadth> {
    this.logger.log('Computing market breadth');
    const overview = await this.analysisService.getMarketOverview(SUMMARY_UNIVERSE, now);

    const advancing = countSignals(overview, Signal.BUY);
    const declining = countSignals(overview, Signal.SELL);
    const unchanged = countSignals(overview, Signal.HOLD);
    const total = advancing + declining + unchanged;
    const breadthIndicator = total > 0 ? (advancing - declining) / total : 0;
    const marketSentiment = sentimentFor(breadthIndicator);

    this.logger.log(`Market breadth: ${marketSentiment}`);
    return {
      timestamp: now.toISOString(),
      advancingStocks: advancing,
      decliningStocks: declining,
      unchangedStocks: unchanged,
      advanceDeclineRatio: declining > 0 ? advancing / declining : null,
      breadthIndicator,
      marketSentiment,
    };
  }

  private validateRequest(input: Partial<ScreeningRequestDto>): ScreeningRequestDto {
    const request = plainToInstance(ScreeningRequestDto, input);
    const errors = validateSync(request);
    if (errors.length > 0) {
      throw new BadRequestException(
        errors.flatMap((error) => Object.values(error.constraints ?? {})).join('; '),
      );
    }
    return request;
  }

  private describeFilters(request: ScreeningRequestDto): string[] {
    const filters: string[] = [];
    if (request.priceMin !== undefined) filters.push(`price >= ${request.priceMin}`);
    if (request.priceMax !== undefined) filters.push(`price <= ${request.priceMax}`);
    if (request.volumeMin !== undefined) filters.push(`volume >= ${request.volumeMin}`);
    if (request.marketCapMin !== undefined) filters.push(`market cap >= ${request.marketCapMin}`);
    if (request.marketCapMax !== undefined) filters.push(`market cap <= ${request.marketCapMax}`);
    if (request.sectors && request.sectors.length > 0) filters.push(`sector in ${request.sectors.join(', ')}`);
    return filters;
  }

  private summarize(assets: ScreenedAsset[]): PerformanceSummary {
    const mean = (values: number[]): number =>
      values.length > 0 ? values.reduce((sum, value) => sum + value, 0) / values.length : 0;

    return {
      averageScore: mean(assets.map((asset) => asset.score)),
      averageChange: mean(assets.map((asset) => asset.changePercent)),
      buySignals: assets.filter((asset) => asset.signal === Signal.BUY).length,
      sellSignals: assets.filter((asset) => asset.signal === Signal.SELL).length,
      holdSignals: assets.filter((asset) => asset.signal === Signal.HOLD).length,
    };
  }
}
