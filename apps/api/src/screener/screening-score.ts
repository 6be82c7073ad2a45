// apps/api/src/screener/screening-score.ts

import { Signal } from '../analysis/analysis.types';
import { ScreeningStrategy, StrategyDefinition } from './screener.types';

const BASE_SCORE = 50;

export const SCREENING_STRATEGIES: Partial<Record<ScreeningStrategy, StrategyDefinition>> = {
  [ScreeningStrategy.MOMENTUM]: {
    name: 'Momentum Strategy',
    description: 'Stocks with strong price momentum and volume',
    criteria: { changePercentMin: 5, volumeMin: 1_000_000, rsiMin: 30, rsiMax: 70 },
  },
  [ScreeningStrategy.VALUE]: {
    name: 'Value Strategy',
    description: 'Undervalued stocks with strong fundamentals',
    criteria: { peRatioMax: 15, pbRatioMax: 2, dividendYieldMin: 2, priceMin: 5 },
  },
  [ScreeningStrategy.GROWTH]: {
    name: 'Growth Strategy',
    description: 'High-growth stocks with strong earnings',
    criteria: { changePercentMin: 10, volumeMin: 500_000, marketCapMin: 1_000_000_000, priceMin: 10 },
  },
  [ScreeningStrategy.QUALITY]: {
    name: 'Quality Strategy',
    description: 'High-quality stocks with strong balance sheets',
    criteria: { peRatioMin: 10, peRatioMax: 25, dividendYieldMin: 1, betaMax: 1.2 },
  },
  [ScreeningStrategy.DIVIDEND]: {
    name: 'Dividend Strategy',
    description: 'High dividend yield stocks',
    criteria: { dividendYieldMin: 3, peRatioMax: 20, priceMin: 5, volumeMin: 100_000 },
  },
  [ScreeningStrategy.LOW_VOLATILITY]: {
    name: 'Low Volatility Strategy',
    description: 'Stable, low-risk stocks',
    criteria: { betaMax: 0.8, changePercentMax: 3, priceMin: 10, marketCapMin: 500_000_000 },
  },
  [ScreeningStrategy.HIGH_BETA]: {
    name: 'High Beta Strategy',
    description: 'High-beta stocks for aggressive growth',
    criteria: { betaMin: 1.5, changePercentMin: 2, volumeMin: 500_000, priceMin: 5 },
  },
  [ScreeningStrategy.TECHNICAL]: {
    name: 'Technical Strategy',
    description: 'Stocks with strong technical signals',
    criteria: { rsiMin: 40, rsiMax: 60, signal: Signal.BUY, confidenceMin: 70 },
  },
};

export interface ScoringSignal {
  signal: Signal;
  confidence: number;
}

/**
 * 0..100 ranking score. Starts at 50; strategies without a scoring rule
 * (and assets without a signal) keep the base score.
 */
export function calculateScreeningScore(
  changePercent: number,
  bundle: ScoringSignal | null,
  strategy?: ScreeningStrategy,
): number {
  let score = BASE_SCORE;
  if (!bundle) {
    return score;
  }

  switch (strategy) {
    case ScreeningStrategy.MOMENTUM:
      score += changePercent * 2;
      score += Math.min(bundle.confidence, 100) * 0.3;
      if (bundle.signal === Signal.BUY) score += 20;
      break;
    case ScreeningStrategy.VALUE:
      // no fundamentals in the ranking yet; flat names score higher
      score += changePercent < 5 ? 30 : 10;
      break;
    case ScreeningStrategy.GROWTH:
      score += changePercent * 1.5;
      score += bundle.confidence * 0.2;
      break;
    case ScreeningStrategy.TECHNICAL:
      score += bundle.confidence * 0.5;
      if (bundle.signal === Signal.BUY) score += 30;
      else if (bundle.signal === Signal.SELL) score -= 20;
      break;
    default:
      break;
  }

  return Math.max(0, Math.min(100, score));
}
