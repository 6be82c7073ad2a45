import {
  SCREENER_UNIVERSE,
  SECTOR_REPRESENTATIVES,
  SYMBOL_PROFILES,
  detectAssetType,
  normalizeSymbol,
} from './market-universe';
import { AssetType } from './data.types';
import { parseNumber } from './http';

describe('detectAssetType', () => {
  it.each([
    ['BTC', AssetType.CRYPTO],
    ['ethusd', AssetType.CRYPTO],
    ['EURUSD', AssetType.FOREX],
    ['GBPJPY', AssetType.FOREX],
    ['AAPL', AssetType.STOCK],
    ['USDX', AssetType.STOCK],
  ])('classifies %s as %s', (symbol, expected) => {
    expect(detectAssetType(symbol)).toBe(expected);
  });
});

describe('universes', () => {
  it('lists each screener symbol once', () => {
    expect(new Set(SCREENER_UNIVERSE).size).toBe(SCREENER_UNIVERSE.length);
    expect(SCREENER_UNIVERSE).toHaveLength(40);
  });

  it('gives every sector five equities', () => {
    for (const symbols of Object.values(SECTOR_REPRESENTATIVES)) {
      expect(symbols).toHaveLength(5);
      expect(symbols.every((symbol) => detectAssetType(symbol) === AssetType.STOCK)).toBe(true);
    }
  });

  it('marks only the crypto profiles as crypto', () => {
    const crypto = Object.entries(SYMBOL_PROFILES)
      .filter(([, profile]) => profile.type === AssetType.CRYPTO)
      .map(([symbol]) => symbol);

    expect(crypto).toEqual(['BTC', 'ETH', 'ADA']);
  });
});

describe('normalizeSymbol', () => {
  it('trims and uppercases', () => {
    expect(normalizeSymbol('  msft ')).toBe('MSFT');
  });
});

describe('parseNumber', () => {
  it('reads numbers and numeric strings', () => {
    expect(parseNumber(12.5)).toBe(12.5);
    expect(parseNumber(' 154.00 ')).toBe(154);
    expect(parseNumber('-0.4512%')).toBe(-0.4512);
  });

  it('rejects anything else', () => {
    expect(parseNumber('n/a')).toBeNull();
    expect(parseNumber('')).toBeNull();
    expect(parseNumber(undefined)).toBeNull();
    expect(parseNumber(Number.NaN)).toBeNull();
  });
});
