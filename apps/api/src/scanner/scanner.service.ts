import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Cron } from '@nestjs/schedule';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AnalysisService } from '../analysis/analysis.service';
import { normalizeSymbol } from '../data/market-universe';
import { STRONG_SIGNAL_EVENT, ScanResult, StrongSignalEvent } from './scanner.types';

const DEFAULT_WATCHLIST = 'AAPL,MSFT,BTC,ETH';

@Injectable()
export class ScannerService {
  private readonly logger = new Logger(ScannerService.name);
  private readonly watchlist: string[];
  private isScanning = false;
  private scanStartTime: number | null = null;
  private readonly SCAN_TIMEOUT_MS = 5 * 60 * 1000; // 5 minutes max

  constructor(
    private readonly analysisService: AnalysisService,
    private readonly configService: ConfigService,
    private readonly eventEmitter: EventEmitter2,
  ) {
    this.watchlist = this.configService
      .get<string>('WATCHLIST_SYMBOLS', DEFAULT_WATCHLIST)
      .split(',')
      .map(normalizeSymbol)
      .filter((symbol) => symbol.length > 0);
  }

  getWatchlist(): string[] {
    return [...this.watchlist];
  }

  // Every 15 minutes; a run still in flight makes the next tick a no-op
  @Cron('*/15 * * * *')
  async scheduledScan(): Promise<void> {
    await this.scanWatchlist();
  }

  async scanWatchlist(): Promise<ScanResult | null> {
    // Check if previous scan is stuck (timed out)
    if (this.isScanning && this.scanStartTime) {
      const elapsed = Date.now() - this.scanStartTime;
      if (elapsed > this.SCAN_TIMEOUT_MS) {
        this.logger.warn(`Previous scan timed out after ${Math.round(elapsed / 1000)}s, resetting flag`);
        this.isScanning = false;
        this.scanStartTime = null;
      }
    }

    if (this.isScanning) {
      this.logger.warn('Scan already in progress, skipping');
      return null;
    }

    if (this.watchlist.length === 0) {
      this.logger.log('No symbols in watchlist');
      return null;
    }

    this.isScanning = true;
    this.scanStartTime = Date.now();
    this.logger.log(`Scanning ${this.watchlist.length} symbols`);

    try {
      const overview = await this.analysisService.getMarketOverview(this.watchlist);

      const strongSignals: StrongSignalEvent[] = overview.strongSignals.map((strong) => ({
        ...strong,
        detectedAt: overview.timestamp,
      }));
      for (const event of strongSignals) {
        this.eventEmitter.emit(STRONG_SIGNAL_EVENT, event);
      }

      const { BUY, SELL, HOLD } = overview.signalsSummary;
      this.logger.log(
        `Scan complete: ${overview.successfulAnalyses}/${overview.totalSymbols} analyzed ` +
          `(BUY ${BUY}, SELL ${SELL}, HOLD ${HOLD}), ${strongSignals.length} strong`,
      );

      return {
        scannedAt: overview.timestamp,
        symbols: this.getWatchlist(),
        successfulAnalyses: overview.successfulAnalyses,
        strongSignals,
      };
    } catch (error) {
      this.logger.error(`Watchlist scan failed: ${(error as Error).message}`);
      return null;
    } finally {
      this.isScanning = false;
      this.scanStartTime = null;
    }
  }
}
