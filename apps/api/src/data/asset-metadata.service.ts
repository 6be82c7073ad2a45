import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CacheNamespace, CacheService } from '../cache/cache.service';
import { AssetMetadata, AssetType, CompanyOverview, Fundamentals } from './data.types';
import { SYMBOL_PROFILES, detectAssetType, normalizeSymbol } from './market-universe';
import { AlphaVantageService } from './providers/alpha-vantage.service';

/**
 * Name, sector, industry and fundamentals per symbol. The overview endpoint
 * only covers listed equities; everything it leaves blank falls back to the
 * built-in profile table and then to generic defaults.
 */
@Injectable()
export class AssetMetadataService {
  private readonly logger = new Logger(AssetMetadataService.name);
  private readonly ttlSeconds: number;

  constructor(
    private readonly cacheService: CacheService,
    private readonly configService: ConfigService,
    private readonly alphaVantage: AlphaVantageService,
  ) {
    this.ttlSeconds = this.configService.get<number>('ASSET_METADATA_TTL_SECONDS', 86_400);
  }

  async getAssetMetadata(symbol: string): Promise<AssetMetadata> {
    const upperSymbol = normalizeSymbol(symbol);

    return this.cacheService.getOrSet(
      CacheNamespace.ASSETS,
      `asset_metadata:${upperSymbol}`,
      async () => this.withDefaults(upperSymbol, await this.fetchOverview(upperSymbol)),
      this.ttlSeconds,
    );
  }

  async getFundamentals(symbol: string): Promise<Fundamentals> {
    const metadata = await this.getAssetMetadata(symbol);
    return {
      peRatio: metadata.peRatio,
      pbRatio: metadata.pbRatio,
      dividendYield: metadata.dividendYield,
      marketCap: metadata.marketCap,
      beta: metadata.beta,
      eps: metadata.eps,
      revenue: metadata.revenue,
      profitMargin: metadata.profitMargin,
    };
  }

  async getSector(symbol: string): Promise<string> {
    return (await this.getAssetMetadata(symbol)).sector;
  }

  // Sequential on purpose: each miss spends an Alpha Vantage request
  async batchGetMetadata(symbols: string[]): Promise<Record<string, AssetMetadata>> {
    const results: Record<string, AssetMetadata> = {};
    for (const symbol of symbols) {
      results[symbol] = await this.getAssetMetadata(symbol);
    }
    return results;
  }

  private async fetchOverview(symbol: string): Promise<CompanyOverview | null> {
    if (!this.alphaVantage.isEnabled() || detectAssetType(symbol) !== AssetType.STOCK) {
      this.logger.debug(`Skipping overview lookup for ${symbol}`);
      return null;
    }
    return this.alphaVantage.fetchOverview(symbol);
  }

  private withDefaults(symbol: string, overview: CompanyOverview | null): AssetMetadata {
    const profile = SYMBOL_PROFILES[symbol];

    return {
      symbol,
      name: overview?.name ?? profile?.name ?? `${symbol} Corporation`,
      type: profile?.type ?? detectAssetType(symbol),
      exchange: overview?.exchange ?? profile?.exchange ?? 'NASDAQ',
      currency: overview?.currency ?? 'USD',
      sector: overview?.sector ?? profile?.sector ?? 'Other',
      industry: overview?.industry ?? profile?.industry ?? 'General',
      peRatio: overview?.peRatio ?? null,
      pbRatio: overview?.pbRatio ?? null,
      dividendYield: overview?.dividendYield ?? null,
      marketCap: overview?.marketCap ?? null,
      beta: overview?.beta || 1.0,
      week52High: overview?.week52High ?? null,
      week52Low: overview?.week52Low ?? null,
      eps: overview?.eps ?? null,
      revenue: overview?.revenue ?? null,
      profitMargin: overview?.profitMargin ?? null,
    };
  }
}
