// apps/api/src/data/market-universe.ts

import { AssetType, SymbolInfo, SymbolProfile } from './data.types';

// Substrings that mark a ticker as crypto (BTCUSD, ETHEUR, ...)
export const CRYPTO_PATTERNS: string[] = [
  'BTC', 'ETH', 'ADA', 'DOT', 'LINK', 'UNI', 'AAVE', 'SOL', 'MATIC', 'AVAX',
];

export const FOREX_CURRENCIES: string[] = ['USD', 'EUR', 'GBP', 'JPY', 'AUD', 'CAD', 'CHF', 'NZD'];

// Tickers CoinGecko can price, keyed to its coin ids
export const COINGECKO_IDS: Record<string, string> = {
  BTC: 'bitcoin',
  ETH: 'ethereum',
  ADA: 'cardano',
  DOT: 'polkadot',
  LINK: 'chainlink',
  UNI: 'uniswap',
  AAVE: 'aave',
  SOL: 'solana',
  MATIC: 'matic-network',
  AVAX: 'avalanche-2',
};

// S&P 500, Nasdaq 100, Russell 2000, Dow Jones trackers
export const MARKET_INDICES: string[] = ['SPY', 'QQQ', 'IWM', 'DIA'];

// Large caps used for market breadth in the summary
export const SUMMARY_UNIVERSE: string[] = [
  'AAPL', 'GOOGL', 'MSFT', 'AMZN', 'TSLA', 'NVDA', 'META', 'NFLX',
  'JPM', 'BAC', 'WFC', 'GS', 'MS', 'C', 'AXP', 'V', 'MA',
  'JNJ', 'PFE', 'UNH', 'ABBV', 'MRK', 'TMO', 'ABT', 'DHR',
  'KO', 'PEP', 'WMT', 'PG', 'HD', 'DIS', 'NKE', 'BA', 'CAT',
];

// Liquid US large caps the screener ranks
export const SCREENER_UNIVERSE: string[] = [
  'AAPL', 'GOOGL', 'MSFT', 'AMZN', 'TSLA', 'NVDA', 'META', 'NFLX',
  'ADBE', 'CRM', 'ORCL', 'INTC', 'AMD', 'QCOM', 'AVGO', 'TXN',
  'JPM', 'BAC', 'WFC', 'GS', 'MS', 'C', 'AXP', 'V', 'MA',
  'JNJ', 'PFE', 'UNH', 'ABBV', 'MRK', 'TMO', 'ABT', 'DHR',
  'KO', 'PEP', 'WMT', 'PG', 'HD', 'DIS', 'NKE',
];

// Five bellwethers per sector for rotation analysis
export const SECTOR_REPRESENTATIVES: Record<string, string[]> = {
  Technology: ['AAPL', 'GOOGL', 'MSFT', 'NVDA', 'META'],
  Healthcare: ['JNJ', 'PFE', 'UNH', 'ABBV', 'MRK'],
  Financial: ['JPM', 'BAC', 'WFC', 'GS', 'MS'],
  Consumer: ['KO', 'PEP', 'WMT', 'PG', 'HD'],
  Industrial: ['BA', 'CAT', 'GE', 'MMM', 'HON'],
  Energy: ['XOM', 'CVX', 'COP', 'EOG', 'SLB'],
};

export const SYMBOL_CATALOG: SymbolInfo[] = [
  { symbol: 'AAPL', name: 'Apple Inc.', type: AssetType.STOCK },
  { symbol: 'GOOGL', name: 'Alphabet Inc.', type: AssetType.STOCK },
  { symbol: 'MSFT', name: 'Microsoft Corporation', type: AssetType.STOCK },
  { symbol: 'TSLA', name: 'Tesla Inc.', type: AssetType.STOCK },
  { symbol: 'AMZN', name: 'Amazon.com Inc.', type: AssetType.STOCK },
  { symbol: 'BTC', name: 'Bitcoin', type: AssetType.CRYPTO },
  { symbol: 'ETH', name: 'Ethereum', type: AssetType.CRYPTO },
  { symbol: 'ADA', name: 'Cardano', type: AssetType.CRYPTO },
];

// Fallback profiles for well-known tickers when the overview endpoint has nothing
export const SYMBOL_PROFILES: Record<string, SymbolProfile> = {
  AAPL: { name: 'Apple Inc.', sector: 'Technology', industry: 'Consumer Electronics', exchange: 'NASDAQ' },
  GOOGL: { name: 'Alphabet Inc.', sector: 'Technology', industry: 'Internet Services', exchange: 'NASDAQ' },
  MSFT: { name: 'Microsoft Corporation', sector: 'Technology', industry: 'Software', exchange: 'NASDAQ' },
  AMZN: { name: 'Amazon.com Inc.', sector: 'Consumer', industry: 'E-commerce', exchange: 'NASDAQ' },
  TSLA: { name: 'Tesla Inc.', sector: 'Consumer', industry: 'Automotive', exchange: 'NASDAQ' },
  NVDA: { name: 'NVIDIA Corporation', sector: 'Technology', industry: 'Semiconductors', exchange: 'NASDAQ' },
  META: { name: 'Meta Platforms Inc.', sector: 'Technology', industry: 'Social Media', exchange: 'NASDAQ' },
  JPM: { name: 'JPMorgan Chase & Co.', sector: 'Financial', industry: 'Banking', exchange: 'NYSE' },
  BAC: { name: 'Bank of America Corp.', sector: 'Financial', industry: 'Banking', exchange: 'NYSE' },
  WFC: { name: 'Wells Fargo & Company', sector: 'Financial', industry: 'Banking', exchange: 'NYSE' },
  JNJ: { name: 'Johnson & Johnson', sector: 'Healthcare', industry: 'Pharmaceuticals', exchange: 'NYSE' },
  PFE: { name: 'Pfizer Inc.', sector: 'Healthcare', industry: 'Pharmaceuticals', exchange: 'NYSE' },
  KO: { name: 'The Coca-Cola Company', sector: 'Consumer', industry: 'Beverages', exchange: 'NYSE' },
  PEP: { name: 'PepsiCo Inc.', sector: 'Consumer', industry: 'Beverages', exchange: 'NASDAQ' },
  BTC: { name: 'Bitcoin', type: AssetType.CRYPTO, sector: 'Cryptocurrency', industry: 'Digital Currency', exchange: 'Crypto' },
  ETH: { name: 'Ethereum', type: AssetType.CRYPTO, sector: 'Cryptocurrency', industry: 'Digital Currency', exchange: 'Crypto' },
  ADA: { name: 'Cardano', type: AssetType.CRYPTO, sector: 'Cryptocurrency', industry: 'Digital Currency', exchange: 'Crypto' },
};

export function detectAssetType(symbol: string): AssetType {
  const upperSymbol = symbol.toUpperCase();

  if (CRYPTO_PATTERNS.some((pattern) => upperSymbol.includes(pattern))) {
    return AssetType.CRYPTO;
  }

  if (upperSymbol.length === 6 && FOREX_CURRENCIES.some((ccy) => upperSymbol.includes(ccy))) {
    return AssetType.FOREX;
  }

  return AssetType.STOCK;
}

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}
