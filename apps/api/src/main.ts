import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { logLevelsFrom } from './config/log-levels';
import { MarketDataService } from './data/market-data.service';
import { ScannerService } from './scanner/scanner.service';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  // Logs wait for useLogger, which needs LOG_LEVEL from the loaded .env
  const app = await NestFactory.createApplicationContext(AppModule, { bufferLogs: true });
  app.useLogger(logLevelsFrom(app.get(ConfigService).get<string>('LOG_LEVEL')));
  app.flushLogs();
  app.enableShutdownHooks();

  const sources = app.get(MarketDataService).getEnabledSources();
  logger.log(`Enabled data sources: ${sources.length > 0 ? sources.join(', ') : 'none'}`);

  const scanner = app.get(ScannerService);
  logger.log(`Market signals worker started, watching ${scanner.getWatchlist().join(', ')}`);

  // First pass now rather than at the first cron tick
  await scanner.scanWatchlist();
}

bootstrap().catch((error: Error) => {
  new Logger('Bootstrap').error(`Failed to start: ${error.message}`, error.stack);
  process.exit(1);
});
