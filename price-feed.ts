import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { z } from 'zod';
import { DataUnavailableError } from './errors';
import { baseAsset } from './types';
import type { PriceFeed, PricePoint } from './types';

const PointSchema = z.object({
  timestamp: z.coerce.number(),
  price: z.coerce.number(),
});

const PriceResponseSchema = z.union([
  z.array(PointSchema),
  z.object({ data: z.array(PointSchema) }).transform((body) => body.data),
]);

export interface MarketDataClientOptions {
  baseUrl: string;
  apiKey: string;
  interval?: string;
  adapter?: AxiosAdapter;
}

export class MarketDataClient implements PriceFeed {
  private client: AxiosInstance;
  private interval: string;

  constructor(options: MarketDataClientOptions) {
    this.interval = options.interval ?? '1h';
    this.client = axios.create({
      baseURL: options.baseUrl,
      headers: { 'X-API-Key': options.apiKey, 'Content-Type': 'application/json' },
      adapter: options.adapter,
    });
  }

  /** Price history for one asset, oldest first. */
  async getMarketPrice(asset: string, interval: string = this.interval): Promise<PricePoint[]> {
    const response = await this.client.get('/market/price', {
      params: { asset, interval, format: 'json' },
    });
    const points = PriceResponseSchema.parse(response.data);
    return [...points].sort((a, b) => a.timestamp - b.timestamp);
  }

  async getRecentPrices(symbol: string, n: number): Promise<PricePoint[]> {
    let points: PricePoint[];
    try {
      points = await this.getMarketPrice(baseAsset(symbol));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new DataUnavailableError(symbol, `Price history for ${symbol} unavailable: ${reason}`);
    }

    if (points.length < n) {
      throw new DataUnavailableError(
        symbol,
        `Only ${points.length} of ${n} price points available for ${symbol}`
      );
    }
    return points.slice(-n);
  }
}
