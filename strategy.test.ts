import { describe, expect, it } from 'vitest';
import { ArithmeticFaultError, DataUnavailableError } from './errors';
import { silentLogger } from './logger';
import { StaticRuleRegistry } from './rule-registry';
import { MomentumStrategy, momentumFromHistory } from './strategy';
import type { PricePoint } from './types';

const points = (...prices: number[]): PricePoint[] =>
  prices.map((price, index) => ({ timestamp: index, price }));

describe('momentumFromHistory', () => {
  it('returns the ratio of the last two prices minus one', () => {
    expect(momentumFromHistory('BTC/USD', points(100, 105))).toBeCloseTo(0.05, 12);
  });

  it('ignores everything before the last two points', () => {
    expect(momentumFromHistory('BTC/USD', points(50, 100, 110))).toBeCloseTo(0.1, 12);
  });

  it('rejects a history shorter than two points', () => {
    expect(() => momentumFromHistory('BTC/USD', points(100))).toThrow(DataUnavailableError);
  });

  it('rejects zero and non-finite prices', () => {
    expect(() => momentumFromHistory('BTC/USD', points(0, 10))).toThrow(ArithmeticFaultError);
    expect(() => momentumFromHistory('BTC/USD', points(10, 0))).toThrow(ArithmeticFaultError);
    expect(() => momentumFromHistory('BTC/USD', points(10, Number.NaN))).toThrow(
      ArithmeticFaultError
    );
  });
});

describe('MomentumStrategy', () => {
  const rules = new StaticRuleRegistry([
    { symbol: 'BTC/USD', stepSize: 0.0001, quantityPrecision: 4 },
    { symbol: 'ETH/USD', stepSize: 0.001, quantityPrecision: 3 },
    { symbol: 'SOL/USD', stepSize: 0.01, quantityPrecision: 2 },
  ]);
  const strategy = new MomentumStrategy(rules, silentLogger);
  const symbols = ['BTC/USD', 'ETH/USD', 'SOL/USD', 'DOGE/USD'];
  const histories = {
    'BTC/USD': points(100, 102),
    'ETH/USD': points(2000),
    'SOL/USD': points(0, 10),
    'DOGE/USD': points(1, 2),
  };

  it('isolates faults per symbol and keeps the healthy ones', () => {
    const report = strategy.computeSignals(symbols, histories);

    expect(report.momentum['BTC/USD']).toBeCloseTo(0.02, 12);
    expect(report.momentum['ETH/USD']).toBe(0);
    expect(report.momentum['SOL/USD']).toBe(0);
    expect('DOGE/USD' in report.momentum).toBe(false);
    expect(report.faults.map((fault) => [fault.symbol, fault.kind])).toEqual([
      ['ETH/USD', 'DataUnavailable'],
      ['SOL/USD', 'ArithmeticFault'],
      ['DOGE/USD', 'UnknownSymbol'],
    ]);
    expect(report.results.filter((result) => result.ok).map((result) => result.symbol)).toEqual([
      'BTC/USD',
    ]);
  });

  it('treats a symbol with no history at all as data-insufficient', () => {
    const report = strategy.computeSignals(['BTC/USD'], {});
    expect(report.momentum).toEqual({ 'BTC/USD': 0 });
    expect(report.faults[0].kind).toBe('DataUnavailable');
  });

  it('is pure and independent of symbol order', () => {
    const first = strategy.computeSignals(symbols, histories);
    const again = strategy.computeSignals(symbols, histories);
    const reversed = strategy.computeSignals([...symbols].reverse(), histories);

    expect(again.momentum).toEqual(first.momentum);
    expect(reversed.momentum).toEqual(first.momentum);
  });
});
