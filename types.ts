export type Side = 'BUY' | 'SELL';

export type RoundingMode = 'half-up' | 'half-even';

export interface AssetRule {
  symbol: string;
  stepSize: number;
  quantityPrecision: number;
  rounding?: RoundingMode;
}

export interface PricePoint {
  timestamp: number;
  price: number;
}

export interface MomentumSignal {
  symbol: string;
  returnFraction: number;
}

export interface TradeIntent {
  symbol: string;
  side: Side;
  deltaUsd: number;
  rawQuantity: number;
  price: number;
}

export interface NormalizedOrder {
  symbol: string;
  side: Side;
  quantity: number;
  notionalUsd: number;
}

export interface PortfolioState {
  peakEquity: number;
  dailyPnl: number;
  initialCash: number;
  dayStartEquity?: number;
}

export type RiskRule = 'INVALID_EQUITY' | 'MAX_DRAWDOWN' | 'ASSET_EXPOSURE' | 'DAILY_LOSS';

export interface RiskBreach {
  rule: RiskRule;
  value: number;
  limit: number;
  symbol?: string;
}

export interface RiskVerdict {
  passed: boolean;
  breach?: RiskBreach;
  breaches: RiskBreach[];
}

export interface AccountSnapshot {
  balances: Record<string, number>;
  positionsUsd: Record<string, number>;
  totalEquityUsd: number;
  availableCashUsd: number;
  /** Held symbols that could not be valued; left out of `positionsUsd`. */
  unpricedSymbols?: string[];
}

export interface Trade {
  symbol: string;
  side: Side;
  quantity: number;
  price: number;
  timestamp: number;
}

export interface BacktestResult {
  trades: Trade[];
  equityCurve: number[];
  finalEquity: number;
  totalReturn: number;
  sharpeRatio: number;
  maxDrawdown: number;
  suspendedCycles: number;
}

export interface PriceFeed {
  getRecentPrices(symbol: string, n: number): Promise<PricePoint[]>;
}

export interface AccountQuery {
  getBalances(): Promise<Record<string, number>>;
  getPositionsUsd(): Promise<Record<string, number>>;
  getTotalEquityUsd(): Promise<number>;
  getAvailableCashUsd(): Promise<number>;
  /** Balances, positions, equity and cash from one venue read. */
  snapshot(): Promise<AccountSnapshot>;
}

export interface OrderSubmission {
  submit(order: NormalizedOrder): Promise<void>;
}

export interface RuleRegistry {
  getRule(symbol: string): AssetRule;
}

/** "BTC/USD" -> "BTC" */
export function baseAsset(symbol: string): string {
  return symbol.split('/')[0];
}
