// apps/api/src/analysis/indicators.ts
//
// Indicator math over a close-price series ordered oldest first. Every
// function returns null when the series is too short for its period.

import {
  BollingerBandsResult,
  IndicatorSet,
  MacdResult,
  StochasticResult,
} from './analysis.types';

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function sma(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;
  return mean(values.slice(-period));
}

/** Seeded with the first value of the series, not an SMA. */
export function ema(values: number[], period: number): number | null {
  if (period <= 0 || values.length < period) return null;

  const multiplier = 2 / (period + 1);
  let result = values[0];
  for (let i = 1; i < values.length; i++) {
    result = values[i] * multiplier + result * (1 - multiplier);
  }
  return result;
}

export function rsi(values: number[], period: number = 14): number | null {
  if (period <= 0 || values.length < period + 1) return null;

  let gains = 0;
  let losses = 0;
  for (let i = values.length - period; i < values.length; i++) {
    const change = values[i] - values[i - 1];
    if (change > 0) {
      gains += change;
    } else {
      losses -= change;
    }
  }

  const avgGain = gains / period;
  const avgLoss = losses / period;
  if (avgLoss === 0) return 100;

  const rs = avgGain / avgLoss;
  return 100 - 100 / (1 + rs);
}

export function macd(
  values: number[],
  fastPeriod: number = 12,
  slowPeriod: number = 26,
  signalPeriod: number = 9,
): MacdResult | null {
  if (values.length < slowPeriod + signalPeriod) return null;

  const fast = ema(values, fastPeriod);
  const slow = ema(values, slowPeriod);
  if (fast === null || slow === null) return null;

  // MACD line replayed over each prefix from the slow period onwards
  const macdLine: number[] = [];
  for (let i = slowPeriod; i < values.length; i++) {
    const prefix = values.slice(0, i + 1);
    const prefixFast = ema(prefix, fastPeriod);
    const prefixSlow = ema(prefix, slowPeriod);
    if (prefixFast !== null && prefixSlow !== null) {
      macdLine.push(prefixFast - prefixSlow);
    }
  }

  const signal = ema(macdLine, signalPeriod);
  if (signal === null) return null;

  const line = fast - slow;
  return { macd: line, signal, histogram: line - signal };
}

export function bollingerBands(
  values: number[],
  period: number = 20,
  stdDevMultiplier: number = 2,
): BollingerBandsResult | null {
  const middle = sma(values, period);
  if (middle === null) return null;

  const window = values.slice(-period);
  const variance = window.reduce((sum, value) => sum + (value - middle) ** 2, 0) / period;
  const stdDev = Math.sqrt(variance);

  const upper = middle + stdDevMultiplier * stdDev;
  const lower = middle - stdDevMultiplier * stdDev;
  const last = values[values.length - 1];

  return {
    upper,
    middle,
    lower,
    width: upper - lower,
    percentB: upper !== lower ? ((last - lower) / (upper - lower)) * 100 : 50,
  };
}

export function stochastic(
  values: number[],
  period: number = 14,
  smoothing: number = 3,
): StochasticResult | null {
  if (period <= 0 || smoothing <= 0 || values.length < period) return null;

  const kValues: number[] = [];
  for (let i = period - 1; i < values.length; i++) {
    const window = values.slice(i - period + 1, i + 1);
    const highest = Math.max(...window);
    const lowest = Math.min(...window);
    kValues.push(highest === lowest ? 50 : ((values[i] - lowest) / (highest - lowest)) * 100);
  }

  const d = sma(kValues, smoothing);
  if (d === null) return null;

  return { k: kValues[kValues.length - 1], d };
}

export function williamsR(values: number[], period: number = 14): number | null {
  if (period <= 0 || values.length < period) return null;

  const window = values.slice(-period);
  const highest = Math.max(...window);
  const lowest = Math.min(...window);
  if (highest === lowest) return -50;

  // + 0 folds -0 (close at the high) into 0 so the value survives a JSON round trip
  return ((highest - values[values.length - 1]) / (highest - lowest)) * -100 + 0;
}

/**
 * Close-only approximation: with no separate high/low the true range reduces
 * to |close - previous close|.
 */
export function atr(values: number[], period: number = 14): number | null {
  if (period <= 0 || values.length < period + 1) return null;

  const trueRanges: number[] = [];
  for (let i = 1; i < values.length; i++) {
    trueRanges.push(Math.abs(values[i] - values[i - 1]));
  }
  return sma(trueRanges, period);
}

export function computeIndicatorSet(prices: number[]): IndicatorSet {
  return {
    rsi: rsi(prices, 14),
    ema20: ema(prices, 20),
    ema50: ema(prices, 50),
    sma20: sma(prices, 20),
    atr: atr(prices, 14),
    williamsR: williamsR(prices, 14),
    macd: macd(prices, 12, 26, 9),
    bollingerBands: bollingerBands(prices, 20, 2),
    stochastic: stochastic(prices, 14, 3),
  };
}
