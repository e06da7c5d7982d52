import type { RiskLimits } from './config';
import { Logger, logger as defaultLogger } from './logger';
import type { AccountSnapshot, PortfolioState, RiskBreach, RiskVerdict } from './types';

export type RiskSnapshot = Pick<AccountSnapshot, 'totalEquityUsd' | 'positionsUsd'>;

/**
 * Portfolio-level circuit breakers. The governor owns no state itself: the
 * caller keeps one {@link PortfolioState} per trading session and passes it
 * in on every cycle.
 */
export class RiskGovernor {
  constructor(
    private readonly limits: RiskLimits,
    private readonly logger: Logger = defaultLogger
  ) {}

  static createState(initialCash: number): PortfolioState {
    const cash = Number.isFinite(initialCash) ? initialCash : 0;
    return { peakEquity: cash, dailyPnl: 0, initialCash: cash };
  }

  /** Re-anchors the peak, e.g. at startup when equity is known. */
  static calibratePeak(state: PortfolioState, equity: number): void {
    state.peakEquity = equity;
  }

  /** Starts a new trading day: P&L is measured from `equity`, the peak is kept. */
  static startDay(state: PortfolioState, equity: number): void {
    state.dayStartEquity = equity;
    state.dailyPnl = 0;
  }

  /**
   * Updates the peak and daily P&L, then runs every gate. All gates are
   * evaluated; `breach` is the first one in chain order. A non-finite equity
   * fails the verdict and leaves `state` untouched.
   */
  evaluate(state: PortfolioState, snapshot: RiskSnapshot): RiskVerdict {
    const equity = snapshot.totalEquityUsd;

    if (!Number.isFinite(equity)) {
      const breach: RiskBreach = { rule: 'INVALID_EQUITY', value: equity, limit: 0 };
      this.logger.warn(`Risk breach INVALID_EQUITY: equity is ${equity}`);
      return { passed: false, breach, breaches: [breach] };
    }

    state.peakEquity = Math.max(state.peakEquity, equity);
    if (state.dayStartEquity !== undefined) {
      state.dailyPnl = equity - state.dayStartEquity;
    }

    const breaches: RiskBreach[] = [
      ...this.checkDrawdown(state, equity),
      ...this.checkExposure(snapshot),
      ...this.checkDailyLoss(state),
    ];

    for (const breach of breaches) {
      const subject = breach.symbol ? ` (${breach.symbol})` : '';
      this.logger.warn(
        `Risk breach ${breach.rule}${subject}: ${(breach.value * 100).toFixed(2)}% vs limit ${(breach.limit * 100).toFixed(2)}%`
      );
    }

    return { passed: breaches.length === 0, breach: breaches[0], breaches };
  }

  private checkDrawdown(state: PortfolioState, equity: number): RiskBreach[] {
    if (state.peakEquity <= 0) return [];
    const drawdown = (state.peakEquity - equity) / state.peakEquity;
    return drawdown > this.limits.maxDrawdown
      ? [{ rule: 'MAX_DRAWDOWN', value: drawdown, limit: this.limits.maxDrawdown }]
      : [];
  }

  private checkExposure(snapshot: RiskSnapshot): RiskBreach[] {
    const breaches: RiskBreach[] = [];
    for (const [symbol, value] of Object.entries(snapshot.positionsUsd)) {
      if (value <= 0) continue;
      const share =
        snapshot.totalEquityUsd > 0 ? value / snapshot.totalEquityUsd : Number.POSITIVE_INFINITY;
      if (share > this.limits.maxAssetExposure) {
        breaches.push({
          rule: 'ASSET_EXPOSURE',
          value: share,
          limit: this.limits.maxAssetExposure,
          symbol,
        });
      }
    }
    return breaches;
  }

  private checkDailyLoss(state: PortfolioState): RiskBreach[] {
    if (state.dailyPnl < -this.limits.dailyLossLimit * state.initialCash) {
      const loss = state.initialCash > 0 ? -state.dailyPnl / state.initialCash : Number.POSITIVE_INFINITY;
      return [{ rule: 'DAILY_LOSS', value: loss, limit: this.limits.dailyLossLimit }];
    }
    return [];
  }
}
