// apps/api/src/screener/screener.types.ts

import { Signal } from '../analysis/analysis.types';

export enum ScreeningStrategy {
  MOMENTUM = 'momentum',
  VALUE = 'value',
  GROWTH = 'growth',
  QUALITY = 'quality',
  DIVIDEND = 'dividend',
  LOW_VOLATILITY = 'low_volatility',
  HIGH_BETA = 'high_beta',
  TECHNICAL = 'technical',
  SECTOR_ROTATION = 'sector_rotation',
}

export interface StrategyCriteria {
  changePercentMin?: number;
  changePercentMax?: number;
  volumeMin?: number;
  priceMin?: number;
  marketCapMin?: number;
  rsiMin?: number;
  rsiMax?: number;
  peRatioMin?: number;
  peRatioMax?: number;
  pbRatioMax?: number;
  dividendYieldMin?: number;
  betaMin?: number;
  betaMax?: number;
  signal?: Signal;
  confidenceMin?: number;
}

export interface StrategyDefinition {
  name: string;
  description: string;
  criteria: StrategyCriteria;
}

export interface StrategyCatalog {
  strategies: Partial<Record<ScreeningStrategy, StrategyDefinition>>;
  totalStrategies: number;
  customFiltersAvailable: boolean;
}

export interface ScreenedAsset {
  symbol: string;
  name: string;
  sector: string;
  industry: string;
  price: number;
  change: number;
  changePercent: number;
  volume: number;
  marketCap: number | null;
  peRatio: number | null;
  pbRatio: number | null;
  dividendYield: number | null;
  beta: number;
  score: number;
  rank: number;
  signal: Signal;
  confidence: number;
}

export interface PerformanceSummary {
  averageScore: number;
  averageChange: number;
  buySignals: number;
  sellSignals: number;
  holdSignals: number;
}

export interface ScreeningResult {
  strategy: ScreeningStrategy | 'custom';
  timestamp: string;
  totalAssetsScreened: number;
  totalResults: number;
  filtersApplied: string[];
  assets: ScreenedAsset[];
  sectorBreakdown: Record<string, number>;
  performanceSummary: PerformanceSummary;
}

export interface SectorPerformance {
  sector: string;
  averagePrice: number;
  buySignals: number;
  totalSignals: number;
  signalRatio: number;
  trend: 'bullish' | 'bearish';
}

export interface SectorAnalysis {
  timestamp: string;
  sectors: SectorPerformance[];
  rotationSignals: {
    inFavor: string[];
    outOfFavor: string[];
    rotationSignal: string;
  };
  topPerformingSectors: string[];
  bottomPerformingSectors: string[];
}

export type MarketSentiment = 'Very Bullish' | 'Bullish' | 'Neutral' | 'Bearish' | 'Very Bearish';

export interface MarketBreadth {
  timestamp: string;
  advancingStocks: number;
  decliningStocks: number;
  unchangedStocks: number;
  advanceDeclineRatio: number | null; // null when nothing declined
  breadthIndicator: number;
  marketSentiment: MarketSentiment;
}
