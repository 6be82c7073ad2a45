import { Module } from '@nestjs/common';
import { CacheModule } from '../cache/cache.module';
import { RateLimiterService } from './rate-limiter.service';
import { AlphaVantageService } from './providers/alpha-vantage.service';
import { YahooFinanceService } from './providers/yahoo-finance.service';
import { CoinGeckoService } from './providers/coingecko.service';
import { MarketDataService } from './market-data.service';
import { AssetMetadataService } from './asset-metadata.service';

@Module({
  imports: [CacheModule],
  providers: [
    RateLimiterService,
    AlphaVantageService,
    YahooFinanceService,
    CoinGeckoService,
    MarketDataService,
    AssetMetadataService,
  ],
  exports: [MarketDataService, AssetMetadataService],
})
export class DataModule {}
