import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG } from './config';
import { ArithmeticFaultError } from './errors';
import { sizeTrade, sizingConfigFrom, targetExposureUsd } from './position-sizer';
import type { SizingInput } from './position-sizer';

const config = sizingConfigFrom(DEFAULT_CONFIG);

const input = (overrides: Partial<SizingInput>): SizingInput => ({
  symbol: 'BTC/USD',
  returnFraction: 0,
  price: 100,
  currentUsd: 0,
  currentAmount: 0,
  availableCashUsd: 10000,
  totalEquityUsd: 10000,
  ...overrides,
});

describe('targetExposureUsd', () => {
  it('scales the return by the notional constant', () => {
    expect(targetExposureUsd(0.05, 0, 10000, config)).toBeCloseTo(100, 9);
  });

  it('floors the target at half of the current position', () => {
    expect(targetExposureUsd(-0.5, 600, 10000, config)).toBe(-300);
  });

  it('floors at half of available cash when configured that way', () => {
    const cashBasis = { ...config, sellFloorBasis: 'cash' as const };
    expect(targetExposureUsd(-0.5, 600, 1000, cashBasis)).toBe(-500);
  });

  it('never returns less than minus half the position', () => {
    for (const returnFraction of [-5, -1, -0.3, -0.01, 0, 0.2]) {
      for (const currentUsd of [0, 10, 250, 9000]) {
        const target = targetExposureUsd(returnFraction, currentUsd, 10000, config);
        expect(target).toBeGreaterThanOrEqual(-currentUsd * 0.5);
      }
    }
  });
});

describe('sizeTrade', () => {
  it('buys the gap to a positive target', () => {
    const intent = sizeTrade(input({ returnFraction: 0.05, price: 50000 }), config);

    expect(intent.side).toBe('BUY');
    expect(intent.deltaUsd).toBeCloseTo(100, 9);
    expect(intent.rawQuantity).toBeCloseTo(0.002, 12);
  });

  it('keeps half a percent of cash in reserve', () => {
    const intent = sizeTrade(
      input({ returnFraction: 1, availableCashUsd: 1000, totalEquityUsd: 100000 }),
      config
    );

    expect(intent.deltaUsd).toBeCloseTo(995, 9);
    expect(intent.rawQuantity).toBeCloseTo(9.95, 9);
  });

  it('caps a buy at the single-asset exposure limit', () => {
    const capped = sizeTrade(
      input({ returnFraction: 1, availableCashUsd: 4000, totalEquityUsd: 4000 }),
      config
    );
    expect(capped.deltaUsd).toBeCloseTo(1400, 9);

    const uncapped = sizeTrade(
      input({ returnFraction: 1, availableCashUsd: 4000, totalEquityUsd: 4000 }),
      { ...config, capOrdersAtExposureLimit: false }
    );
    expect(uncapped.deltaUsd).toBeCloseTo(2000, 9);
  });

  it('never sells more than is held', () => {
    const intent = sizeTrade(
      input({ returnFraction: -0.01, currentUsd: 1000, currentAmount: 4 }),
      config
    );

    expect(intent.side).toBe('SELL');
    expect(intent.deltaUsd).toBeCloseTo(-1020, 9);
    expect(intent.rawQuantity).toBe(4);
  });

  it('sells nothing when nothing is held', () => {
    const intent = sizeTrade(input({ returnFraction: -0.01, currentUsd: 1000 }), config);
    expect(intent.rawQuantity).toBe(0);
  });

  it('rejects a non-positive price', () => {
    expect(() => sizeTrade(input({ returnFraction: 0.05, price: 0 }), config)).toThrow(
      ArithmeticFaultError
    );
  });
});
