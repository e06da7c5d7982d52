import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { createHmac } from 'crypto';
import { z } from 'zod';
import { DataUnavailableError, ExecutionError, toFault } from './errors';
import { Logger, logger as defaultLogger } from './logger';
import { baseAsset } from './types';
import type {
  AccountQuery,
  AccountSnapshot,
  AssetRule,
  NormalizedOrder,
  OrderSubmission,
  PriceFeed,
} from './types';

const StatusSchema = z.object({
  Success: z.boolean(),
  ErrMsg: z.string().optional(),
});

const BalanceSchema = StatusSchema.extend({
  SpotWallet: z
    .record(z.string(), z.object({ Free: z.coerce.number(), Lock: z.coerce.number().optional() }))
    .optional(),
});

const ExchangeInfoSchema = z.object({
  TradePairs: z.record(
    z.string(),
    z.object({
      AmountPrecision: z.number().int().nonnegative().default(0),
      PricePrecision: z.number().int().nonnegative().optional(),
      CanTrade: z.boolean().optional(),
    })
  ),
});

export type ExchangeInfo = z.infer<typeof ExchangeInfoSchema>;

type Params = Record<string, string>;

export interface ExchangeClientOptions {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  adapter?: AxiosAdapter;
  now?: () => number;
}

export class ExchangeClient implements OrderSubmission {
  private client: AxiosInstance;
  private apiSecret: string;
  private now: () => number;

  constructor(options: ExchangeClientOptions) {
    this.apiSecret = options.apiSecret;
    this.now = options.now ?? Date.now;
    this.client = axios.create({
      baseURL: options.baseUrl,
      headers: { 'RST-API-KEY': options.apiKey },
      adapter: options.adapter,
    });
  }

  async getExchangeInfo(): Promise<ExchangeInfo> {
    const response = await this.client.get('/v3/exchangeInfo');
    return ExchangeInfoSchema.parse(response.data);
  }

  /** Trading rules for every tradable pair; quantity step is 10^-AmountPrecision. */
  async loadRules(): Promise<AssetRule[]> {
    const info = await this.getExchangeInfo();
    return Object.entries(info.TradePairs)
      .filter(([, pair]) => pair.CanTrade !== false)
      .map(([symbol, pair]) => ({
        symbol,
        stepSize: Number(`1e-${pair.AmountPrecision}`),
        quantityPrecision: pair.AmountPrecision,
      }));
  }

  /** Free balance per asset. */
  async getBalances(): Promise<Record<string, number>> {
    const data = await this.signed('GET', '/v3/balance', {}, BalanceSchema);
    if (!data.Success) {
      throw new Error(`Balance query rejected: ${data.ErrMsg ?? 'unknown error'}`);
    }
    const balances: Record<string, number> = {};
    for (const [asset, wallet] of Object.entries(data.SpotWallet ?? {})) {
      balances[asset] = wallet.Free;
    }
    return balances;
  }

  async submit(order: NormalizedOrder): Promise<void> {
    let data: z.infer<typeof StatusSchema>;
    try {
      data = await this.signed(
        'POST',
        '/v3/place_order',
        {
          pair: order.symbol,
          side: order.side,
          quantity: String(order.quantity),
          type: 'MARKET',
        },
        StatusSchema
      );
    } catch (error) {
      const message = axios.isAxiosError(error)
        ? `${error.message}${error.response ? `: ${JSON.stringify(error.response.data)}` : ''}`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new ExecutionError(order.symbol, `Order request failed: ${message}`);
    }

    if (!data.Success) {
      throw new ExecutionError(order.symbol, `Order rejected: ${data.ErrMsg ?? 'unknown error'}`);
    }
  }

  sign(params: Params): string {
    const queryString = Object.keys(params)
      .sort()
      .map((key) => `${key}=${params[key]}`)
      .join('&');
    return createHmac('sha256', this.apiSecret).update(queryString).digest('hex');
  }

  private async signed<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    endpoint: string,
    params: Params,
    schema: S
  ): Promise<z.infer<S>> {
    const all: Params = { ...params, timestamp: String(this.now()) };
    const headers = { 'MSG-SIGNATURE': this.sign(all) };

    const response =
      method === 'GET'
        ? await this.client.get(endpoint, { params: all, headers })
        : await this.client.post(endpoint, new URLSearchParams(all).toString(), {
            headers: { ...headers, 'Content-Type': 'application/x-www-form-urlencoded' },
          });
    return schema.parse(response.data);
  }
}

/**
 * Account view over the venue's balances, valued at the feed's latest price.
 * The quote asset counts as cash. A held symbol whose price cannot be fetched
 * is reported in `unpricedSymbols` instead of failing the whole snapshot.
 */
export class ExchangeAccount implements AccountQuery {
  constructor(
    private readonly client: Pick<ExchangeClient, 'getBalances'>,
    private readonly prices: PriceFeed,
    private readonly symbols: string[],
    private readonly quoteAsset: string = 'USD',
    private readonly logger: Logger = defaultLogger
  ) {}

  async snapshot(): Promise<AccountSnapshot> {
    const balances = await this.client.getBalances();
    const positionsUsd: Record<string, number> = {};
    const unpricedSymbols: string[] = [];

    for (const symbol of this.symbols) {
      const amount = balances[baseAsset(symbol)] ?? 0;
      if (amount === 0) {
        positionsUsd[symbol] = 0;
        continue;
      }
      try {
        positionsUsd[symbol] = amount * (await this.latestPrice(symbol));
      } catch (error) {
        const fault = toFault(symbol, error, 'DataUnavailable');
        unpricedSymbols.push(symbol);
        this.logger.warn(`Cannot value ${symbol} holdings: ${fault.message}`);
      }
    }

    const availableCashUsd = balances[this.quoteAsset] ?? 0;
    const totalEquityUsd =
      availableCashUsd + Object.values(positionsUsd).reduce((sum, value) => sum + value, 0);
    return { balances, positionsUsd, totalEquityUsd, availableCashUsd, unpricedSymbols };
  }

  getBalances(): Promise<Record<string, number>> {
    return this.client.getBalances();
  }

  async getPositionsUsd(): Promise<Record<string, number>> {
    return (await this.snapshot()).positionsUsd;
  }

  async getTotalEquityUsd(): Promise<number> {
    return (await this.snapshot()).totalEquityUsd;
  }

  async getAvailableCashUsd(): Promise<number> {
    const balances = await this.client.getBalances();
    return balances[this.quoteAsset] ?? 0;
  }

  private async latestPrice(symbol: string): Promise<number> {
    const [latest] = await this.prices.getRecentPrices(symbol, 1);
    if (!latest || !Number.isFinite(latest.price) || latest.price <= 0) {
      throw new DataUnavailableError(symbol, `No usable price for ${symbol}`);
    }
    return latest.price;
  }
}
