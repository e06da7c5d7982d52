import type { MomentumSignal, PricePoint, RuleRegistry } from './types';
import { ArithmeticFaultError, DataUnavailableError, toFault } from './errors';
import type { SymbolFault, SymbolResult } from './errors';
import { Logger, logger as defaultLogger } from './logger';

export interface SignalReport {
  /** Every symbol with a trading rule; faulted symbols read 0. */
  momentum: Record<string, number>;
  results: SymbolResult<MomentumSignal>[];
  faults: SymbolFault[];
}

/**
 * Fractional change between the last two observations.
 * Throws when there are fewer than two points or a price is unusable.
 */
export function momentumFromHistory(symbol: string, history: PricePoint[]): number {
  if (history.length < 2) {
    throw new DataUnavailableError(
      symbol,
      `Need 2 price points for ${symbol}, got ${history.length}`
    );
  }

  const previous = history[history.length - 2].price;
  const latest = history[history.length - 1].price;

  if (!Number.isFinite(previous) || previous <= 0) {
    throw new ArithmeticFaultError(symbol, `Invalid previous price ${previous} for ${symbol}`);
  }
  if (!Number.isFinite(latest) || latest <= 0) {
    throw new ArithmeticFaultError(symbol, `Invalid latest price ${latest} for ${symbol}`);
  }

  return latest / previous - 1;
}

export class MomentumStrategy {
  constructor(
    private readonly rules: RuleRegistry,
    private readonly logger: Logger = defaultLogger
  ) {}

  computeSignals(
    symbols: string[],
    histories: Record<string, PricePoint[] | undefined>
  ): SignalReport {
    const momentum: Record<string, number> = {};
    const results: SymbolResult<MomentumSignal>[] = [];
    const faults: SymbolFault[] = [];

    for (const symbol of symbols) {
      try {
        this.rules.getRule(symbol);
      } catch (error) {
        const fault = toFault(symbol, error, 'UnknownSymbol');
        this.logger.error(`${symbol} skipped: ${fault.message}`);
        results.push({ ok: false, symbol, fault });
        faults.push(fault);
        continue;
      }

      try {
        const returnFraction = momentumFromHistory(symbol, histories[symbol] ?? []);
        momentum[symbol] = returnFraction;
        results.push({ ok: true, symbol, value: { symbol, returnFraction } });
        this.logger.debug(`${symbol} return ${(returnFraction * 100).toFixed(4)}%`);
      } catch (error) {
        const fault = toFault(symbol, error, 'ArithmeticFault');
        momentum[symbol] = 0;
        results.push({ ok: false, symbol, fault });
        faults.push(fault);
        if (fault.kind === 'DataUnavailable') {
          this.logger.warn(`${symbol}: ${fault.message}`);
        } else {
          this.logger.error(`${symbol} momentum error: ${fault.message}`);
        }
      }
    }

    return { momentum, results, faults };
  }
}
