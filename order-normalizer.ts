import Decimal from 'decimal.js';
import { ArithmeticFaultError } from './errors';
import type { AssetRule, NormalizedOrder, RoundingMode, TradeIntent } from './types';

// Venue convention when a rule does not say otherwise.
export const DEFAULT_ROUNDING: RoundingMode = 'half-up';

const ROUNDING: Record<RoundingMode, Decimal.Rounding> = {
  'half-up': Decimal.ROUND_HALF_UP,
  'half-even': Decimal.ROUND_HALF_EVEN,
};

function assertRule(rule: AssetRule): void {
  if (!Number.isFinite(rule.stepSize) || rule.stepSize <= 0) {
    throw new ArithmeticFaultError(rule.symbol, `Invalid step size ${rule.stepSize} for ${rule.symbol}`);
  }
  if (!Number.isInteger(rule.quantityPrecision) || rule.quantityPrecision < 0) {
    throw new ArithmeticFaultError(
      rule.symbol,
      `Invalid quantity precision ${rule.quantityPrecision} for ${rule.symbol}`
    );
  }
}

function quantize(quantity: number, rule: AssetRule): Decimal {
  const step = new Decimal(rule.stepSize);
  return new Decimal(Math.abs(quantity))
    .div(step)
    .toDecimalPlaces(0, Decimal.ROUND_DOWN)
    .times(step);
}

/**
 * Floors a quantity magnitude to the rule's step size, then rounds it to the
 * rule's precision. Idempotent on its own output.
 */
export function normalizeQuantity(quantity: number, rule: AssetRule): number {
  assertRule(rule);
  return quantize(quantity, rule)
    .toDecimalPlaces(rule.quantityPrecision, ROUNDING[rule.rounding ?? DEFAULT_ROUNDING])
    .toNumber();
}

export function normalizeOrder(
  intent: TradeIntent,
  rule: AssetRule,
  minTradeUsd: number
): NormalizedOrder | null {
  if (Math.abs(intent.deltaUsd) <= minTradeUsd) {
    return null;
  }

  let quantity = normalizeQuantity(intent.rawQuantity, rule);

  // Rounding up must not sell more than is held.
  if (intent.side === 'SELL' && quantity > intent.rawQuantity) {
    quantity = quantize(intent.rawQuantity, rule)
      .toDecimalPlaces(rule.quantityPrecision, Decimal.ROUND_DOWN)
      .toNumber();
  }

  if (quantity <= 0) {
    return null;
  }

  return {
    symbol: intent.symbol,
    side: intent.side,
    quantity,
    notionalUsd: quantity * intent.price,
  };
}
