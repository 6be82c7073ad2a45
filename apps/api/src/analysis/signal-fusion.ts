// apps/api/src/analysis/signal-fusion.ts

import {
  FusionInput,
  FusionResult,
  RiskLevel,
  Signal,
  SignalStrength,
  TrendDirection,
  Vote,
  VotingIndicator,
} from './analysis.types';

const DECISION_THRESHOLD = 0.6;
const STRONG_THRESHOLD = 0.8;

interface Ballot {
  indicator: VotingIndicator;
  vote: Vote;
  weight: number; // 1 for a strong reading, 0.5 for a weak one
  reason?: string;
}

function rsiBallot(value: number): Ballot {
  const indicator = 'rsi';
  if (value < 30) return { indicator, vote: Vote.STRONG_BUY, weight: 1, reason: `RSI oversold at ${value.toFixed(1)}` };
  if (value < 40) return { indicator, vote: Vote.BUY, weight: 0.5, reason: `RSI approaching oversold at ${value.toFixed(1)}` };
  if (value > 70) return { indicator, vote: Vote.STRONG_SELL, weight: 1, reason: `RSI overbought at ${value.toFixed(1)}` };
  if (value > 60) return { indicator, vote: Vote.SELL, weight: 0.5, reason: `RSI approaching overbought at ${value.toFixed(1)}` };
  return { indicator, vote: Vote.NEUTRAL, weight: 0 };
}

function macdBallot(macd: NonNullable<FusionInput['macd']>): Ballot {
  const indicator = 'macd';
  if (macd.macd > macd.signal && macd.histogram > 0) {
    return { indicator, vote: Vote.BUY, weight: 1, reason: 'MACD bullish crossover' };
  }
  if (macd.macd < macd.signal && macd.histogram < 0) {
    return { indicator, vote: Vote.SELL, weight: 1, reason: 'MACD bearish crossover' };
  }
  return { indicator, vote: Vote.NEUTRAL, weight: 0 };
}

function bollingerBallot(price: number, bands: NonNullable<FusionInput['bollingerBands']>): Ballot {
  const indicator = 'bollinger';
  const percentB = bands.percentB.toFixed(1);
  if (price <= bands.lower) {
    return { indicator, vote: Vote.STRONG_BUY, weight: 1, reason: `Price at lower Bollinger Band (${percentB}%)` };
  }
  if (price >= bands.upper) {
    return { indicator, vote: Vote.STRONG_SELL, weight: 1, reason: `Price at upper Bollinger Band (${percentB}%)` };
  }
  if (price < bands.middle) return { indicator, vote: Vote.BUY, weight: 0.5 };
  if (price > bands.middle) return { indicator, vote: Vote.SELL, weight: 0.5 };
  return { indicator, vote: Vote.NEUTRAL, weight: 0 };
}

function stochasticBallot(k: number): Ballot {
  const indicator = 'stochastic';
  if (k < 20) return { indicator, vote: Vote.BUY, weight: 0.5, reason: `Stochastic oversold at ${k.toFixed(1)}%` };
  if (k > 80) return { indicator, vote: Vote.SELL, weight: 0.5, reason: `Stochastic overbought at ${k.toFixed(1)}%` };
  return { indicator, vote: Vote.NEUTRAL, weight: 0 };
}

function williamsRBallot(value: number): Ballot {
  const indicator = 'williamsR';
  if (value < -80) return { indicator, vote: Vote.BUY, weight: 0.5, reason: `Williams %R oversold at ${value.toFixed(1)}` };
  if (value > -20) return { indicator, vote: Vote.SELL, weight: 0.5, reason: `Williams %R overbought at ${value.toFixed(1)}` };
  return { indicator, vote: Vote.NEUTRAL, weight: 0 };
}

function trendOf(price: number, ema20: number, ema50: number): TrendDirection {
  if (ema20 > ema50 && price > ema20) return TrendDirection.BULLISH;
  if (ema20 < ema50 && price < ema20) return TrendDirection.BEARISH;
  return TrendDirection.SIDEWAYS;
}

function emaTrendBallot(trend: TrendDirection): Ballot {
  const indicator = 'emaTrend';
  switch (trend) {
    case TrendDirection.BULLISH:
      return { indicator, vote: Vote.BUY, weight: 1, reason: 'Price above rising EMAs (bullish trend)' };
    case TrendDirection.BEARISH:
      return { indicator, vote: Vote.SELL, weight: 1, reason: 'Price below falling EMAs (bearish trend)' };
    case TrendDirection.SIDEWAYS:
      return { indicator, vote: Vote.NEUTRAL, weight: 0 };
  }
}

function isBuy(vote: Vote): boolean {
  return vote === Vote.BUY || vote === Vote.STRONG_BUY;
}

function isSell(vote: Vote): boolean {
  return vote === Vote.SELL || vote === Vote.STRONG_SELL;
}

function riskFor(confidence: number): RiskLevel {
  if (confidence > 80) return RiskLevel.LOW;
  if (confidence > 60) return RiskLevel.MEDIUM;
  return RiskLevel.HIGH;
}

function strengthFor(signal: Signal, winningRatio: number): SignalStrength {
  switch (signal) {
    case Signal.BUY:
    case Signal.SELL:
      return winningRatio > STRONG_THRESHOLD ? SignalStrength.STRONG : SignalStrength.MODERATE;
    case Signal.HOLD:
      return SignalStrength.WEAK;
  }
}

/**
 * Fuses the available indicators into one decision. Each present indicator
 * counts once in the denominator; strong readings add a full vote to their
 * side and weak readings half a vote.
 */
export function generateSignals(input: FusionInput): FusionResult {
  const { currentPrice } = input;
  const ballots: Ballot[] = [];
  let trend = TrendDirection.SIDEWAYS;

  if (input.rsi !== null) ballots.push(rsiBallot(input.rsi));
  if (input.macd !== null) ballots.push(macdBallot(input.macd));
  if (input.bollingerBands !== null) ballots.push(bollingerBallot(currentPrice, input.bollingerBands));
  if (input.stochastic !== null) ballots.push(stochasticBallot(input.stochastic.k));
  if (input.williamsR !== null) ballots.push(williamsRBallot(input.williamsR));
  if (input.ema20 !== null && input.ema50 !== null) {
    trend = trendOf(currentPrice, input.ema20, input.ema50);
    ballots.push(emaTrendBallot(trend));
  }

  let buyVotes = 0;
  let sellVotes = 0;
  const votes: FusionResult['votes'] = {};
  const reasoning: string[] = [];

  for (const ballot of ballots) {
    votes[ballot.indicator] = ballot.vote;
    if (isBuy(ballot.vote)) buyVotes += ballot.weight;
    if (isSell(ballot.vote)) sellVotes += ballot.weight;
    if (ballot.reason) reasoning.push(ballot.reason);
  }

  const total = ballots.length;
  const buyRatio = total > 0 ? buyVotes / total : 0;
  const sellRatio = total > 0 ? sellVotes / total : 0;

  let signal = Signal.HOLD;
  if (buyRatio > DECISION_THRESHOLD) {
    signal = Signal.BUY;
  } else if (sellRatio > DECISION_THRESHOLD) {
    signal = Signal.SELL;
  }

  const confidence = Math.max(buyRatio, sellRatio) * 100;

  return {
    signal,
    strength: strengthFor(signal, signal === Signal.SELL ? sellRatio : buyRatio),
    confidence,
    trend,
    risk: riskFor(confidence),
    reasoning,
    votes,
  };
}
