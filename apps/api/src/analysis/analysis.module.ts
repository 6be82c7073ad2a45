import { Module } from '@nestjs/common';
import { CacheModule } from '../cache/cache.module';
import { DataModule } from '../data/data.module';
import { AnalysisService } from './analysis.service';

@Module({
  imports: [CacheModule, DataModule],
  providers: [AnalysisService],
  exports: [AnalysisService],
})
export class AnalysisModule {}
