import { z } from 'zod';

export type SellFloorBasis = 'position' | 'cash';

export interface RiskLimits {
  maxDrawdown: number;
  maxAssetExposure: number;
  dailyLossLimit: number;
}

export interface RebalanceConfig {
  symbols: string[];
  quoteAsset: string;
  /** USD of target exposure per 1.0 of fractional return. */
  notionalPerUnitReturn: number;
  sellFloorFraction: number;
  sellFloorBasis: SellFloorBasis;
  cashBufferFraction: number;
  minTradeUsd: number;
  capOrdersAtExposureLimit: boolean;
  historyLength: number;
  intervalMs: number;
  dryRun: boolean;
  risk: RiskLimits;
}

export interface VenueConfig {
  exchangeBaseUrl: string;
  exchangeApiKey: string;
  exchangeApiSecret: string;
  marketDataBaseUrl: string;
  marketDataApiKey: string;
  marketDataInterval: string;
}

export const DEFAULT_RISK_LIMITS: RiskLimits = {
  maxDrawdown: 0.10,
  maxAssetExposure: 0.35,
  dailyLossLimit: 0.04,
};

export const DEFAULT_CONFIG: RebalanceConfig = {
  symbols: [
    'BTC/USD', 'ETH/USD', 'XRP/USD', 'BNB/USD', 'SOL/USD',
    'DOGE/USD', 'ADA/USD', 'LINK/USD', 'AVAX/USD', 'LTC/USD',
  ],
  quoteAsset: 'USD',
  notionalPerUnitReturn: 2000,
  sellFloorFraction: 0.5,
  sellFloorBasis: 'position',
  cashBufferFraction: 0.995,
  minTradeUsd: 50,
  capOrdersAtExposureLimit: true,
  historyLength: 2,
  intervalMs: 60 * 60 * 1000,
  dryRun: false,
  risk: DEFAULT_RISK_LIMITS,
};

const flag = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(['1', '0', 'true', 'false', 'yes', 'no']))
  .transform((value) => value === '1' || value === 'true' || value === 'yes');

const fraction = z.coerce.number().gt(0).lte(1);

const EnvSchema = z.object({
  SYMBOLS: z.string().optional(),
  QUOTE_ASSET: z.string().min(1).optional(),
  DRY_RUN: flag.optional(),
  REBALANCE_NOTIONAL_PER_UNIT_RETURN: z.coerce.number().positive().optional(),
  REBALANCE_SELL_FLOOR_FRACTION: fraction.optional(),
  REBALANCE_SELL_FLOOR_BASIS: z.enum(['position', 'cash']).optional(),
  REBALANCE_CASH_BUFFER_FRACTION: fraction.optional(),
  REBALANCE_MIN_TRADE_USD: z.coerce.number().nonnegative().optional(),
  REBALANCE_CAP_ORDERS_AT_EXPOSURE_LIMIT: flag.optional(),
  REBALANCE_HISTORY_LENGTH: z.coerce.number().int().min(2).optional(),
  REBALANCE_INTERVAL_MS: z.coerce.number().int().positive().optional(),
  RISK_MAX_DRAWDOWN: fraction.optional(),
  RISK_MAX_ASSET_EXPOSURE: fraction.optional(),
  RISK_DAILY_LOSS_LIMIT: fraction.optional(),
});

const VenueSchema = z.object({
  EXCHANGE_BASE_URL: z.string().url().default('https://mock-api.roostoo.com'),
  EXCHANGE_API_KEY: z.string().min(1),
  EXCHANGE_API_SECRET: z.string().min(1),
  MARKET_DATA_BASE_URL: z.string().url().default('https://api-horus.com'),
  MARKET_DATA_API_KEY: z.string().min(1),
  MARKET_DATA_INTERVAL: z.enum(['15m', '1h', '1d']).default('1h'),
});

export function parseSymbols(raw: string): string[] {
  return raw
    .split(',')
    .map((symbol) => symbol.trim().toUpperCase())
    .filter((symbol) => symbol.length > 0);
}

/**
 * Builds the rebalancing configuration from environment variables layered
 * over {@link DEFAULT_CONFIG}. Throws a ZodError on malformed values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RebalanceConfig {
  const parsed = EnvSchema.parse(env);
  const symbols = parsed.SYMBOLS ? parseSymbols(parsed.SYMBOLS) : DEFAULT_CONFIG.symbols;

  return {
    symbols: symbols.length > 0 ? symbols : DEFAULT_CONFIG.symbols,
    quoteAsset: parsed.QUOTE_ASSET ?? DEFAULT_CONFIG.quoteAsset,
    notionalPerUnitReturn:
      parsed.REBALANCE_NOTIONAL_PER_UNIT_RETURN ?? DEFAULT_CONFIG.notionalPerUnitReturn,
    sellFloorFraction: parsed.REBALANCE_SELL_FLOOR_FRACTION ?? DEFAULT_CONFIG.sellFloorFraction,
    sellFloorBasis: parsed.REBALANCE_SELL_FLOOR_BASIS ?? DEFAULT_CONFIG.sellFloorBasis,
    cashBufferFraction: parsed.REBALANCE_CASH_BUFFER_FRACTION ?? DEFAULT_CONFIG.cashBufferFraction,
    minTradeUsd: parsed.REBALANCE_MIN_TRADE_USD ?? DEFAULT_CONFIG.minTradeUsd,
    capOrdersAtExposureLimit:
      parsed.REBALANCE_CAP_ORDERS_AT_EXPOSURE_LIMIT ?? DEFAULT_CONFIG.capOrdersAtExposureLimit,
    historyLength: parsed.REBALANCE_HISTORY_LENGTH ?? DEFAULT_CONFIG.historyLength,
    intervalMs: parsed.REBALANCE_INTERVAL_MS ?? DEFAULT_CONFIG.intervalMs,
    dryRun: parsed.DRY_RUN ?? DEFAULT_CONFIG.dryRun,
    risk: {
      maxDrawdown: parsed.RISK_MAX_DRAWDOWN ?? DEFAULT_RISK_LIMITS.maxDrawdown,
      maxAssetExposure: parsed.RISK_MAX_ASSET_EXPOSURE ?? DEFAULT_RISK_LIMITS.maxAssetExposure,
      dailyLossLimit: parsed.RISK_DAILY_LOSS_LIMIT ?? DEFAULT_RISK_LIMITS.dailyLossLimit,
    },
  };
}

export function loadVenueConfig(env: NodeJS.ProcessEnv = process.env): VenueConfig {
  const parsed = VenueSchema.parse(env);
  return {
    exchangeBaseUrl: parsed.EXCHANGE_BASE_URL,
    exchangeApiKey: parsed.EXCHANGE_API_KEY,
    exchangeApiSecret: parsed.EXCHANGE_API_SECRET,
    marketDataBaseUrl: parsed.MARKET_DATA_BASE_URL,
    marketDataApiKey: parsed.MARKET_DATA_API_KEY,
    marketDataInterval: parsed.MARKET_DATA_INTERVAL,
  };
}
