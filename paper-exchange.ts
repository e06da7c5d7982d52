import { DataUnavailableError, ExecutionError } from './errors';
import { baseAsset } from './types';
import type {
  AccountQuery,
  AccountSnapshot,
  NormalizedOrder,
  OrderSubmission,
  PriceFeed,
  PricePoint,
  Trade,
} from './types';

export interface PaperExchangeOptions {
  cash: number;
  /** Units held per base asset, e.g. `{ BTC: 0.5 }`. */
  holdings?: Record<string, number>;
  quoteAsset?: string;
  feeRate?: number;
  /** Replay index to start from. */
  start?: number;
}

/**
 * In-memory venue replaying aligned price series. Every series shares one
 * cursor; orders fill at the price under the cursor.
 */
export class PaperExchange implements PriceFeed, AccountQuery, OrderSubmission {
  readonly trades: Trade[] = [];
  private cash: number;
  private holdings: Map<string, number>;
  private cursor: number;
  private readonly quoteAsset: string;
  private readonly feeRate: number;

  constructor(
    private readonly series: Record<string, PricePoint[]>,
    options: PaperExchangeOptions
  ) {
    this.cash = options.cash;
    this.holdings = new Map(Object.entries(options.holdings ?? {}));
    this.quoteAsset = options.quoteAsset ?? 'USD';
    this.feeRate = options.feeRate ?? 0;
    this.cursor = options.start ?? 0;
  }

  get length(): number {
    return Math.max(0, ...Object.values(this.series).map((points) => points.length));
  }

  get position(): number {
    return this.cursor;
  }

  /** Moves to the next bar; false once the replay is exhausted. */
  advance(): boolean {
    if (this.cursor + 1 >= this.length) return false;
    this.cursor += 1;
    return true;
  }

  currentPoint(symbol: string): PricePoint | undefined {
    const points = this.series[symbol] ?? [];
    return points[Math.min(this.cursor, points.length - 1)];
  }

  async getRecentPrices(symbol: string, n: number): Promise<PricePoint[]> {
    const visible = (this.series[symbol] ?? []).slice(0, this.cursor + 1);
    if (visible.length < n) {
      throw new DataUnavailableError(
        symbol,
        `Only ${visible.length} of ${n} price points available for ${symbol}`
      );
    }
    return visible.slice(-n);
  }

  async getBalances(): Promise<Record<string, number>> {
    return { [this.quoteAsset]: this.cash, ...Object.fromEntries(this.holdings) };
  }

  async getPositionsUsd(): Promise<Record<string, number>> {
    return this.positionsUsd();
  }

  async getTotalEquityUsd(): Promise<number> {
    return this.equity();
  }

  async getAvailableCashUsd(): Promise<number> {
    return this.cash;
  }

  async snapshot(): Promise<AccountSnapshot> {
    return {
      balances: await this.getBalances(),
      positionsUsd: this.positionsUsd(),
      totalEquityUsd: this.equity(),
      availableCashUsd: this.cash,
    };
  }

  async submit(order: NormalizedOrder): Promise<void> {
    const point = this.currentPoint(order.symbol);
    if (!point || point.price <= 0) {
      throw new ExecutionError(order.symbol, `No market for ${order.symbol}`);
    }

    const asset = baseAsset(order.symbol);
    const held = this.holdings.get(asset) ?? 0;
    const gross = order.quantity * point.price;

    if (order.side === 'BUY') {
      const cost = gross * (1 + this.feeRate);
      if (cost > this.cash) {
        throw new ExecutionError(
          order.symbol,
          `Insufficient ${this.quoteAsset}: need ${cost.toFixed(2)}, have ${this.cash.toFixed(2)}`
        );
      }
      this.cash -= cost;
      this.holdings.set(asset, held + order.quantity);
    } else {
      if (order.quantity > held) {
        throw new ExecutionError(
          order.symbol,
          `Insufficient ${asset}: need ${order.quantity}, have ${held}`
        );
      }
      this.cash += gross * (1 - this.feeRate);
      this.holdings.set(asset, held - order.quantity);
    }

    this.trades.push({
      symbol: order.symbol,
      side: order.side,
      quantity: order.quantity,
      price: point.price,
      timestamp: point.timestamp,
    });
  }

  positionsUsd(): Record<string, number> {
    const positions: Record<string, number> = {};
    for (const symbol of Object.keys(this.series)) {
      const amount = this.holdings.get(baseAsset(symbol)) ?? 0;
      positions[symbol] = amount * (this.currentPoint(symbol)?.price ?? 0);
    }
    return positions;
  }

  equity(): number {
    return this.cash + Object.values(this.positionsUsd()).reduce((sum, value) => sum + value, 0);
  }
}
