import type { RebalanceConfig } from './config';
import { DataUnavailableError, toFault } from './errors';
import type { SymbolFault } from './errors';
import { Logger, logger as defaultLogger } from './logger';
import { Rebalancer } from './rebalancer';
import type { CycleInput, CycleReport } from './rebalancer';
import { RiskGovernor } from './risk-governor';
import type {
  AccountQuery,
  NormalizedOrder,
  OrderSubmission,
  PortfolioState,
  PriceFeed,
  PricePoint,
  RuleRegistry,
} from './types';

export interface TradingBotDeps {
  priceFeed: PriceFeed;
  account: AccountQuery;
  orders: OrderSubmission;
  rules: RuleRegistry;
}

export interface FailedOrder {
  order: NormalizedOrder;
  fault: SymbolFault;
}

export interface CycleOutcome {
  report: CycleReport;
  submitted: NormalizedOrder[];
  failed: FailedOrder[];
}

function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export class TradingBot {
  private readonly rebalancer: Rebalancer;
  private state: PortfolioState | null = null;
  private currentDay: string | null = null;
  private isRunning: boolean = false;
  private inFlight: boolean = false;
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly deps: TradingBotDeps,
    private readonly config: RebalanceConfig,
    private readonly logger: Logger = defaultLogger,
    private readonly clock: () => Date = () => new Date()
  ) {
    this.rebalancer = new Rebalancer(config, deps.rules, logger);
  }

  async initialize(): Promise<PortfolioState> {
    const { availableCashUsd: cash, totalEquityUsd: equity } = await this.deps.account.snapshot();

    const state = RiskGovernor.createState(cash);
    RiskGovernor.calibratePeak(state, equity);
    RiskGovernor.startDay(state, equity);
    this.state = state;
    this.currentDay = utcDay(this.clock());

    this.logger.info(
      `Portfolio initialized: equity $${equity.toFixed(2)}, cash $${cash.toFixed(2)}${this.config.dryRun ? ' [DRY RUN]' : ''}`
    );
    return state;
  }

  /** Runs one full cycle: snapshot, decision, submission. */
  async step(): Promise<CycleOutcome> {
    const state = this.state ?? (await this.initialize());
    const input = await this.gatherInput();

    const today = utcDay(this.clock());
    if (today !== this.currentDay) {
      RiskGovernor.startDay(state, input.account.totalEquityUsd);
      this.currentDay = today;
      this.logger.info(`New trading day ${today}, daily P&L reset`);
    }

    this.logger.info(
      `Equity $${input.account.totalEquityUsd.toFixed(2)} | cash $${input.account.availableCashUsd.toFixed(2)}`
    );

    const report = this.rebalancer.runCycle(input, state);
    const { submitted, failed } = await this.submitOrders(report.orders);
    return { report, submitted, failed };
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      this.logger.warn('Bot is already running');
      return;
    }

    this.isRunning = true;
    this.logger.info(
      `Starting bot for ${this.config.symbols.join(', ')} every ${Math.round(this.config.intervalMs / 60000)} min`
    );

    await this.tick();
    this.timer = setInterval(() => void this.tick(), this.config.intervalMs);
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.logger.info('Bot stopped');
  }

  getState(): PortfolioState | null {
    return this.state ? { ...this.state } : null;
  }

  private async tick(): Promise<void> {
    if (this.inFlight) {
      this.logger.warn('Previous cycle still running, skipping');
      return;
    }
    this.inFlight = true;
    try {
      await this.step();
    } catch (error) {
      this.logger.error('Cycle failed:', error);
    } finally {
      this.inFlight = false;
    }
  }

  private async gatherInput(): Promise<CycleInput> {
    const { account, priceFeed } = this.deps;
    const snapshot = await account.snapshot();

    const histories: Record<string, PricePoint[]> = {};
    for (const symbol of this.config.symbols) {
      try {
        histories[symbol] = await priceFeed.getRecentPrices(symbol, this.config.historyLength);
      } catch (error) {
        histories[symbol] = [];
        if (!(error instanceof DataUnavailableError)) {
          this.logger.error(`Price fetch failed for ${symbol}:`, error);
        }
      }
    }

    return {
      histories,
      account: snapshot,
    };
  }

  private async submitOrders(
    orders: NormalizedOrder[]
  ): Promise<{ submitted: NormalizedOrder[]; failed: FailedOrder[] }> {
    const submitted: NormalizedOrder[] = [];
    const failed: FailedOrder[] = [];

    for (const order of orders) {
      const label = `${order.side} ${order.quantity} ${order.symbol} ($${order.notionalUsd.toFixed(2)})`;

      if (this.config.dryRun) {
        this.logger.info(`[DRY] ${label}`);
        submitted.push(order);
        continue;
      }

      try {
        await this.deps.orders.submit(order);
        submitted.push(order);
        this.logger.success(`→ ${label}`);
      } catch (error) {
        const fault = toFault(order.symbol, error, 'ExecutionError');
        failed.push({ order, fault });
        this.logger.error(`Order failed ${label}: ${fault.message}`);
      }
    }

    return { submitted, failed };
  }
}
