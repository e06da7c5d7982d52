import type { RebalanceConfig } from './config';
import { toFault } from './errors';
import type { SymbolFault } from './errors';
import { Logger, logger as defaultLogger } from './logger';
import { normalizeOrder } from './order-normalizer';
import { sizeTrade, sizingConfigFrom } from './position-sizer';
import type { SizingConfig } from './position-sizer';
import { RiskGovernor } from './risk-governor';
import { MomentumStrategy } from './strategy';
import { baseAsset } from './types';
import type {
  AccountSnapshot,
  NormalizedOrder,
  PortfolioState,
  PricePoint,
  RiskVerdict,
  RuleRegistry,
  TradeIntent,
} from './types';

export interface CycleInput {
  histories: Record<string, PricePoint[] | undefined>;
  account: AccountSnapshot;
}

export interface CycleReport {
  verdict: RiskVerdict;
  orders: NormalizedOrder[];
  intents: TradeIntent[];
  momentum: Record<string, number>;
  /** Symbols whose trade fell under the noise threshold or rounded to zero. */
  suppressed: string[];
  faults: SymbolFault[];
}

/**
 * One rebalancing decision: risk gates first, then signal, sizing and
 * normalization per symbol. Synchronous and free of I/O; the only mutation
 * is to the PortfolioState passed in.
 */
export class Rebalancer {
  private readonly strategy: MomentumStrategy;
  private readonly governor: RiskGovernor;
  private readonly sizing: SizingConfig;

  constructor(
    private readonly config: RebalanceConfig,
    private readonly rules: RuleRegistry,
    private readonly logger: Logger = defaultLogger
  ) {
    this.strategy = new MomentumStrategy(rules, logger);
    this.governor = new RiskGovernor(config.risk, logger);
    this.sizing = sizingConfigFrom(config);
  }

  runCycle(input: CycleInput, state: PortfolioState): CycleReport {
    const { account } = input;
    const verdict = this.governor.evaluate(state, account);

    if (!verdict.passed) {
      this.logger.warn(`Trading suspended this cycle (${verdict.breach?.rule ?? 'unknown'})`);
      return { verdict, orders: [], intents: [], momentum: {}, suppressed: [], faults: [] };
    }

    const signals = this.strategy.computeSignals(this.config.symbols, input.histories);
    const faults = [...signals.faults];
    const intents: TradeIntent[] = [];
    const orders: NormalizedOrder[] = [];
    const suppressed: string[] = [];
    const unpriced = new Set(account.unpricedSymbols ?? []);
    // Buys draw down one shared cash balance; sale proceeds are not counted until filled.
    let remainingCashUsd = account.availableCashUsd;

    for (const result of signals.results) {
      if (!result.ok) continue;
      const { symbol } = result;

      if (unpriced.has(symbol)) {
        const fault: SymbolFault = {
          symbol,
          kind: 'DataUnavailable',
          message: `Holdings of ${symbol} could not be valued`,
        };
        faults.push(fault);
        this.logger.warn(`${symbol} skipped: ${fault.message}`);
        continue;
      }

      try {
        const history = input.histories[symbol] ?? [];
        const intent = sizeTrade(
          {
            symbol,
            returnFraction: result.value.returnFraction,
            price: history[history.length - 1].price,
            currentUsd: account.positionsUsd[symbol] ?? 0,
            currentAmount: account.balances[baseAsset(symbol)] ?? 0,
            availableCashUsd: remainingCashUsd,
            totalEquityUsd: account.totalEquityUsd,
          },
          this.sizing
        );
        intents.push(intent);

        const order = normalizeOrder(intent, this.rules.getRule(symbol), this.config.minTradeUsd);
        if (order) {
          orders.push(order);
          if (order.side === 'BUY') remainingCashUsd -= order.notionalUsd;
        } else {
          suppressed.push(symbol);
          this.logger.debug(`${symbol} below trade threshold ($${intent.deltaUsd.toFixed(2)})`);
        }
      } catch (error) {
        const fault = toFault(symbol, error, 'ArithmeticFault');
        faults.push(fault);
        this.logger.error(`${symbol} sizing error: ${fault.message}`);
      }
    }

    return { verdict, orders, intents, momentum: signals.momentum, suppressed, faults };
  }
}
