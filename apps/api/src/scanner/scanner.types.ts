import { Signal } from '../analysis/analysis.types';

export const STRONG_SIGNAL_EVENT = 'signal.strong';

export interface StrongSignalEvent {
  symbol: string;
  signal: Signal;
  confidence: number;
  detectedAt: string;
}

export interface ScanResult {
  scannedAt: string;
  symbols: string[];
  successfulAnalyses: number;
  strongSignals: StrongSignalEvent[];
}
