import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { validate } from './config/env.validation';
import { CacheModule } from './cache/cache.module';
import { DataModule } from './data/data.module';
import { AnalysisModule } from './analysis/analysis.module';
import { ScannerModule } from './scanner/scanner.module';
import { ScreenerModule } from './screener/screener.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['../../.env', '.env'],
      validate,
    }),
    EventEmitterModule.forRoot(),
    ScheduleModule.forRoot(),
    CacheModule,
    DataModule,
    AnalysisModule,
    ScannerModule,
    ScreenerModule,
  ],
})
export class AppModule {}
