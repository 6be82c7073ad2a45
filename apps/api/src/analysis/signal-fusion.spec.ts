import { generateSignals } from './signal-fusion';
import { FusionInput, RiskLevel, Signal, SignalStrength, TrendDirection, Vote } from './analysis.types';

const emptyInput = (currentPrice: number): FusionInput => ({
  currentPrice,
  rsi: null,
  macd: null,
  bollingerBands: null,
  stochastic: null,
  williamsR: null,
  ema20: null,
  ema50: null,
});

const bands = { upper: 110, middle: 100, lower: 90, width: 20 };

describe('generateSignals', () => {
  it('returns BUY when buy votes pass the threshold', () => {
    const result = generateSignals({
      currentPrice: 89,
      rsi: 25,
      macd: { macd: 1, signal: 0.5, histogram: 0.5 },
      bollingerBands: { ...bands, percentB: -5 },
      stochastic: { k: 10, d: 15 },
      williamsR: -90,
      ema20: 95,
      ema50: 100,
    });

    // buy 1 + 1 + 1 + 0.5 + 0.5 = 4 of 6; the EMA trend votes sell
    expect(result.signal).toBe(Signal.BUY);
    expect(result.confidence).toBeCloseTo(66.667, 3);
    expect(result.strength).toBe(SignalStrength.MODERATE);
    expect(result.risk).toBe(RiskLevel.MEDIUM);
    expect(result.trend).toBe(TrendDirection.BEARISH);
    expect(result.reasoning).toEqual([
      'RSI oversold at 25.0',
      'MACD bullish crossover',
      'Price at lower Bollinger Band (-5.0%)',
      'Stochastic oversold at 10.0%',
      'Williams %R oversold at -90.0',
      'Price below falling EMAs (bearish trend)',
    ]);
    expect(result.votes).toEqual({
      rsi: Vote.STRONG_BUY,
      macd: Vote.BUY,
      bollinger: Vote.STRONG_BUY,
      stochastic: Vote.BUY,
      williamsR: Vote.BUY,
      emaTrend: Vote.SELL,
    });
  });

  it('returns a strong bullish BUY when every indicator agrees', () => {
    const result = generateSignals({
      currentPrice: 89,
      rsi: 25,
      macd: { macd: 1, signal: 0.5, histogram: 0.5 },
      bollingerBands: { ...bands, percentB: -5 },
      stochastic: { k: 10, d: 15 },
      williamsR: -90,
      ema20: 85,
      ema50: 80,
    });

    // 5 of 6
    expect(result.signal).toBe(Signal.BUY);
    expect(result.strength).toBe(SignalStrength.STRONG);
    expect(result.confidence).toBeCloseTo(83.333, 3);
    expect(result.trend).toBe(TrendDirection.BULLISH);
    expect(result.risk).toBe(RiskLevel.LOW);
    expect(result.reasoning[5]).toBe('Price above rising EMAs (bullish trend)');
  });

  it('mirrors into a strong bearish SELL', () => {
    const result = generateSignals({
      currentPrice: 111,
      rsi: 75,
      macd: { macd: -1, signal: -0.5, histogram: -0.5 },
      bollingerBands: { ...bands, percentB: 105 },
      stochastic: { k: 85, d: 80 },
      williamsR: -10,
      ema20: 115,
      ema50: 120,
    });

    expect(result.signal).toBe(Signal.SELL);
    expect(result.strength).toBe(SignalStrength.STRONG);
    expect(result.confidence).toBeCloseTo(83.333, 3);
    expect(result.trend).toBe(TrendDirection.BEARISH);
    expect(result.votes).toEqual({
      rsi: Vote.STRONG_SELL,
      macd: Vote.SELL,
      bollinger: Vote.STRONG_SELL,
      stochastic: Vote.SELL,
      williamsR: Vote.SELL,
      emaTrend: Vote.SELL,
    });
  });

  it('returns a strong SELL on a unanimous vote', () => {
    const result = generateSignals({
      ...emptyInput(111),
      rsi: 80,
      macd: { macd: -1, signal: -0.5, histogram: -0.5 },
      bollingerBands: { ...bands, percentB: 105 },
    });

    expect(result.signal).toBe(Signal.SELL);
    expect(result.strength).toBe(SignalStrength.STRONG);
    expect(result.confidence).toBe(100);
    expect(result.risk).toBe(RiskLevel.LOW);
    expect(result.trend).toBe(TrendDirection.SIDEWAYS);
    expect(result.reasoning).toEqual([
      'RSI overbought at 80.0',
      'MACD bearish crossover',
      'Price at upper Bollinger Band (105.0%)',
    ]);
  });

  it('holds when every indicator is neutral', () => {
    const result = generateSignals({
      currentPrice: 100,
      rsi: 50,
      macd: { macd: 1, signal: 1, histogram: 0 },
      bollingerBands: { ...bands, percentB: 50 },
      stochastic: { k: 50, d: 50 },
      williamsR: -50,
      ema20: 100,
      ema50: 100,
    });

    expect(result.signal).toBe(Signal.HOLD);
    expect(result.strength).toBe(SignalStrength.WEAK);
    expect(result.confidence).toBe(0);
    expect(result.risk).toBe(RiskLevel.HIGH);
    expect(result.reasoning).toEqual([]);
    expect(Object.values(result.votes).every((vote) => vote === Vote.NEUTRAL)).toBe(true);
  });

  it('holds with zero confidence when no indicator is available', () => {
    const result = generateSignals(emptyInput(100));

    expect(result.signal).toBe(Signal.HOLD);
    expect(result.confidence).toBe(0);
    expect(result.risk).toBe(RiskLevel.HIGH);
    expect(result.votes).toEqual({});
  });

  it('counts a weak Bollinger vote without a reason', () => {
    const result = generateSignals({ ...emptyInput(95), bollingerBands: { ...bands, percentB: 25 } });

    expect(result.votes).toEqual({ bollinger: Vote.BUY });
    expect(result.confidence).toBe(50);
    expect(result.signal).toBe(Signal.HOLD);
    expect(result.reasoning).toEqual([]);
  });

  it('treats RSI on the boundaries as a weak vote', () => {
    expect(generateSignals({ ...emptyInput(100), rsi: 30 }).reasoning).toEqual([
      'RSI approaching oversold at 30.0',
    ]);
    expect(generateSignals({ ...emptyInput(100), rsi: 70 }).reasoning).toEqual([
      'RSI approaching overbought at 70.0',
    ]);
  });

  it('does not reach a decision at exactly the threshold', () => {
    // 3 of 5 = 0.6, which must exceed rather than equal the threshold
    const result = generateSignals({
      ...emptyInput(89),
      rsi: 25,
      macd: { macd: 1, signal: 0.5, histogram: 0.5 },
      bollingerBands: { ...bands, percentB: -5 },
      stochastic: { k: 50, d: 50 },
      williamsR: -50,
    });

    expect(result.confidence).toBeCloseTo(60, 10);
    expect(result.signal).toBe(Signal.HOLD);
    expect(result.strength).toBe(SignalStrength.WEAK);
    expect(result.risk).toBe(RiskLevel.HIGH);
  });
});
