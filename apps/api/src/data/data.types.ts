export enum AssetType {
  STOCK = 'stock',
  CRYPTO = 'crypto',
  FOREX = 'forex',
}

export enum DataSource {
  ALPHA_VANTAGE = 'alpha_vantage',
  YAHOO_FINANCE = 'yahoo_finance',
  COINGECKO = 'coingecko',
}

export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface PriceRecord {
  symbol: string;
  currentPrice: number;
  change: number;
  changePercent: number;
  volume: number;
  high: number;
  low: number;
  open: number;
  previousClose: number;
  source: DataSource;
  timestamp: string; // UTC ISO 8601
}

export interface PriceWithHistory extends PriceRecord {
  history: PriceBar[]; // ascending by date
  assetType: AssetType;
  period: string;
}

export type PriceMap = Record<string, PriceWithHistory | null>;

export interface QuoteSource {
  readonly source: DataSource;
  isEnabled(): boolean;
  fetchQuote(symbol: string): Promise<PriceRecord | null>;
}

export interface HistorySource extends QuoteSource {
  fetchHistory(symbol: string, period: string): Promise<PriceBar[] | null>;
}

export function providesHistory(source: QuoteSource): source is HistorySource {
  return 'fetchHistory' in source && typeof source.fetchHistory === 'function';
}

export interface Fundamentals {
  peRatio: number | null;
  pbRatio: number | null;
  dividendYield: number | null;
  marketCap: number | null;
  beta: number | null;
  eps: number | null;
  revenue: number | null;
  profitMargin: number | null;
}

export interface CompanyOverview extends Fundamentals {
  symbol: string;
  name: string | null;
  exchange: string | null;
  currency: string | null;
  sector: string | null;
  industry: string | null;
  week52High: number | null;
  week52Low: number | null;
}

export interface AssetMetadata extends Fundamentals {
  symbol: string;
  name: string;
  type: AssetType;
  exchange: string;
  currency: string;
  sector: string;
  industry: string;
  beta: number; // 1.0 when unknown
  week52High: number | null;
  week52Low: number | null;
}

export interface SymbolProfile {
  name: string;
  sector: string;
  industry: string;
  exchange: string;
  type?: AssetType;
}

export interface SymbolInfo {
  symbol: string;
  name: string;
  type: AssetType;
}

export type MarketStatus = 'open' | 'closed';

export interface MarketMover {
  symbol: string;
  price: number;
  change: number;
  changePercent: number;
  volume: number;
}

export interface IndexQuote {
  price: number;
  change: number;
  changePercent: number;
}

export interface MarketSummary {
  timestamp: string;
  marketStatus: MarketStatus;
  indices: Record<string, IndexQuote>;
  topGainers: MarketMover[];
  topLosers: MarketMover[];
  mostActive: MarketMover[];
}

export type SymbolValidation =
  | { valid: true; symbol: string; assetType: AssetType }
  | { valid: false; symbol: string; error: string };

// Sentinel key meaning "no key configured"
export const PLACEHOLDER_API_KEY = 'demo';

export const HISTORY_LIMIT = 50;
