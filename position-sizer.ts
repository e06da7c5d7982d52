import type { RebalanceConfig } from './config';
import { ArithmeticFaultError } from './errors';
import type { TradeIntent } from './types';

export type SizingConfig = Pick<
  RebalanceConfig,
  | 'notionalPerUnitReturn'
  | 'sellFloorFraction'
  | 'sellFloorBasis'
  | 'cashBufferFraction'
  | 'capOrdersAtExposureLimit'
> & { maxAssetExposure: number };

export interface SizingInput {
  symbol: string;
  returnFraction: number;
  price: number;
  /** Notional already held in this symbol. */
  currentUsd: number;
  /** Units of the base asset already held. */
  currentAmount: number;
  availableCashUsd: number;
  totalEquityUsd: number;
}

export function sizingConfigFrom(config: RebalanceConfig): SizingConfig {
  return {
    notionalPerUnitReturn: config.notionalPerUnitReturn,
    sellFloorFraction: config.sellFloorFraction,
    sellFloorBasis: config.sellFloorBasis,
    cashBufferFraction: config.cashBufferFraction,
    capOrdersAtExposureLimit: config.capOrdersAtExposureLimit,
    maxAssetExposure: config.risk.maxAssetExposure,
  };
}

export function targetExposureUsd(
  returnFraction: number,
  currentUsd: number,
  availableCashUsd: number,
  config: SizingConfig
): number {
  const target = returnFraction * config.notionalPerUnitReturn;
  const basis = config.sellFloorBasis === 'cash' ? availableCashUsd : currentUsd;
  return Math.max(target, -basis * config.sellFloorFraction);
}

/**
 * Turns a momentum reading into the trade that moves the position toward its
 * target. Buys never spend more than the cash buffer allows; sells never
 * exceed the units on hand.
 */
export function sizeTrade(input: SizingInput, config: SizingConfig): TradeIntent {
  const { symbol, price } = input;
  if (!Number.isFinite(price) || price <= 0) {
    throw new ArithmeticFaultError(symbol, `Cannot size ${symbol} at price ${price}`);
  }

  const currentUsd = input.currentUsd || 0;
  const currentAmount = Math.max(input.currentAmount || 0, 0);
  const cash = Math.max(input.availableCashUsd || 0, 0);

  const targetUsd = targetExposureUsd(input.returnFraction, currentUsd, cash, config);
  let diffUsd = targetUsd - currentUsd;

  if (config.capOrdersAtExposureLimit) {
    const maxForAsset = input.totalEquityUsd * config.maxAssetExposure;
    if (currentUsd + diffUsd > maxForAsset) {
      diffUsd = maxForAsset - currentUsd;
    }
  }

  if (diffUsd > 0) {
    const maxBuyable = cash * config.cashBufferFraction;
    if (diffUsd > maxBuyable) {
      diffUsd = maxBuyable;
    }
    return { symbol, side: 'BUY', deltaUsd: diffUsd, rawQuantity: diffUsd / price, price };
  }

  const quantity = Math.min(Math.abs(diffUsd) / price, currentAmount);
  return { symbol, side: 'SELL', deltaUsd: diffUsd, rawQuantity: quantity, price };
}
