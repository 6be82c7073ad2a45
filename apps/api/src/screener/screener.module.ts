import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { DataModule } from '../data/data.module';
import { ScreenerService } from './screener.service';

@Module({
  imports: [DataModule, AnalysisModule],
  providers: [ScreenerService],
  exports: [ScreenerService],
})
export class ScreenerModule {}
