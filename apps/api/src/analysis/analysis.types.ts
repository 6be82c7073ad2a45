// apps/api/src/analysis/analysis.types.ts

export enum Signal {
  BUY = 'BUY',
  SELL = 'SELL',
  HOLD = 'HOLD',
}

export enum SignalStrength {
  VERY_WEAK = 1,
  WEAK = 2,
  MODERATE = 3,
  STRONG = 4,
  VERY_STRONG = 5,
}

export enum TrendDirection {
  BULLISH = 'bullish',
  BEARISH = 'bearish',
  SIDEWAYS = 'sideways',
}

export enum RiskLevel {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
}

export enum Vote {
  STRONG_BUY = 'STRONG_BUY',
  BUY = 'BUY',
  NEUTRAL = 'NEUTRAL',
  SELL = 'SELL',
  STRONG_SELL = 'STRONG_SELL',
}

export type VotingIndicator = 'rsi' | 'macd' | 'bollinger' | 'stochastic' | 'williamsR' | 'emaTrend';

export interface MacdResult {
  macd: number;
  signal: number;
  histogram: number;
}

export interface BollingerBandsResult {
  upper: number;
  middle: number;
  lower: number;
  width: number;
  percentB: number;
}

export interface StochasticResult {
  k: number;
  d: number;
}

// null = not enough history for that indicator
export interface IndicatorSet {
  rsi: number | null;
  ema20: number | null;
  ema50: number | null;
  sma20: number | null;
  atr: number | null;
  williamsR: number | null;
  macd: MacdResult | null;
  bollingerBands: BollingerBandsResult | null;
  stochastic: StochasticResult | null;
}

export interface FusionInput {
  currentPrice: number;
  rsi: number | null;
  macd: MacdResult | null;
  bollingerBands: BollingerBandsResult | null;
  stochastic: StochasticResult | null;
  williamsR: number | null;
  ema20: number | null;
  ema50: number | null;
}

export interface FusionResult {
  signal: Signal;
  strength: SignalStrength;
  confidence: number;
  trend: TrendDirection;
  risk: RiskLevel;
  reasoning: string[];
  votes: Partial<Record<VotingIndicator, Vote>>;
}

export interface SignalBundle extends FusionResult {
  symbol: string;
  currentPrice: number;
  timestamp: string;
  period: string;
  indicators: IndicatorSet;
  syntheticHistory: boolean;
}

export interface IndicatorSnapshot {
  symbol: string;
  timestamp: string;
  period: string;
  currentPrice: number;
  indicators: IndicatorSet;
}

export interface OverviewEntry {
  signal: Signal;
  confidence: number;
  trend: TrendDirection;
  risk: RiskLevel;
  price: number;
}

export interface StrongSignal {
  symbol: string;
  signal: Signal;
  confidence: number;
}

export interface MarketOverview {
  timestamp: string;
  totalSymbols: number;
  successfulAnalyses: number;
  signalsSummary: Record<Signal, number>;
  strongSignals: StrongSignal[];
  symbols: Record<string, OverviewEntry | { error: string }>;
}

export interface BatchSignals {
  timestamp: string;
  period: string;
  totalSymbols: number;
  successfulAnalyses: number;
  failedAnalyses: number;
  signalsSummary: Record<Signal, number>;
  strongSignals: StrongSignal[];
  signals: Record<string, SignalBundle | null>;
  errors: Record<string, string>;
}

export interface StrengthLevels {
  levels: Record<SignalStrength, { name: string; description: string }>;
  trendDirections: Record<TrendDirection, string>;
  riskLevels: Record<RiskLevel, string>;
}

// MACD needs the slow EMA period before any signal can be derived
export const MIN_HISTORY_POINTS = 26;
export const ANALYSIS_WINDOW = 50;
export const MAX_BATCH_SYMBOLS = 20;
