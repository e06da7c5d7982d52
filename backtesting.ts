import type { RebalanceConfig } from './config';
import { Logger, logger as defaultLogger } from './logger';
import { PaperExchange } from './paper-exchange';
import { TradingBot } from './trading-bot';
import type { BacktestResult, PricePoint, RuleRegistry } from './types';

export interface BacktestOptions {
  cash: number;
  holdings?: Record<string, number>;
  feeRate?: number;
  /** Used to annualise the Sharpe ratio; hourly bars by default. */
  periodsPerYear?: number;
}

/**
 * Replays aligned price series bar by bar through the same TradingBot used
 * live, against a PaperExchange.
 */
export class BacktestingEngine {
  constructor(
    private readonly config: RebalanceConfig,
    private readonly rules: RuleRegistry,
    private readonly options: BacktestOptions,
    private readonly logger: Logger = defaultLogger
  ) {}

  async run(series: Record<string, PricePoint[]>): Promise<BacktestResult> {
    const exchange = new PaperExchange(series, {
      cash: this.options.cash,
      holdings: this.options.holdings,
      quoteAsset: this.config.quoteAsset,
      feeRate: this.options.feeRate,
      start: this.config.historyLength - 1,
    });

    const clockSymbol = Object.keys(series)[0];
    const clock = () => new Date(exchange.currentPoint(clockSymbol)?.timestamp ?? 0);
    const bot = new TradingBot(
      { priceFeed: exchange, account: exchange, orders: exchange, rules: this.rules },
      { ...this.config, dryRun: false },
      this.logger,
      clock
    );

    const initialEquity = exchange.equity();
    const equityCurve: number[] = [initialEquity];
    let suspendedCycles = 0;

    await bot.initialize();
    do {
      const outcome = await bot.step();
      if (!outcome.report.verdict.passed) suspendedCycles++;
      equityCurve.push(exchange.equity());
    } while (exchange.advance());

    const finalEquity = equityCurve[equityCurve.length - 1];
    const totalReturn = initialEquity > 0 ? ((finalEquity - initialEquity) / initialEquity) * 100 : 0;

    return {
      trades: exchange.trades,
      equityCurve,
      finalEquity,
      totalReturn,
      sharpeRatio: sharpeRatio(equityCurve, this.options.periodsPerYear ?? 24 * 365),
      maxDrawdown: maxDrawdown(equityCurve),
      suspendedCycles,
    };
  }
}

export function periodReturns(equityCurve: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < equityCurve.length; i++) {
    const previous = equityCurve[i - 1];
    if (previous !== 0) {
      returns.push((equityCurve[i] - previous) / previous);
    }
  }
  return returns;
}

export function sharpeRatio(equityCurve: number[], periodsPerYear: number): number {
  const returns = periodReturns(equityCurve);
  if (returns.length < 2) return 0;
  const avgReturn = returns.reduce((a, b) => a + b, 0) / returns.length;
  const stdDev = Math.sqrt(
    returns.reduce((sum, r) => sum + Math.pow(r - avgReturn, 2), 0) / returns.length
  );
  return stdDev !== 0 ? (avgReturn / stdDev) * Math.sqrt(periodsPerYear) : 0;
}

/** Largest peak-to-trough decline, in percent. */
export function maxDrawdown(equityCurve: number[]): number {
  let worst = 0;
  let peak = equityCurve[0] ?? 0;
  for (const value of equityCurve) {
    if (value > peak) peak = value;
    if (peak <= 0) continue;
    const drawdown = ((peak - value) / peak) * 100;
    if (drawdown > worst) worst = drawdown;
  }
  return worst;
}
