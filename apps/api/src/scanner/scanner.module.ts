import { Module } from '@nestjs/common';
import { AnalysisModule } from '../analysis/analysis.module';
import { ScannerService } from './scanner.service';
import { SignalAlertService } from './signal-alert.service';

@Module({
  imports: [AnalysisModule],
  providers: [ScannerService, SignalAlertService],
  exports: [ScannerService, SignalAlertService],
})
export class ScannerModule {}
