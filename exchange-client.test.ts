import type { AxiosAdapter, InternalAxiosRequestConfig } from 'axios';
import { createHmac } from 'crypto';
import { describe, expect, it, vi } from 'vitest';
import { DataUnavailableError, ExecutionError } from './errors';
import { ExchangeAccount, ExchangeClient } from './exchange-client';
import { silentLogger } from './logger';
import type { NormalizedOrder } from './types';

function fakeVenue(respond: (config: InternalAxiosRequestConfig) => unknown) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    return { data: respond(config), status: 200, statusText: 'OK', headers: {}, config };
  };
  return { adapter, calls };
}

function client(adapter: AxiosAdapter) {
  return new ExchangeClient({
    baseUrl: 'https://venue.test',
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    adapter,
    now: () => 1700000000000,
  });
}

const order: NormalizedOrder = { symbol: 'BTC/USD', side: 'BUY', quantity: 0.5, notionalUsd: 100 };

describe('ExchangeClient', () => {
  it('signs the sorted parameters with HMAC-SHA256', () => {
    const expected = createHmac('sha256', 'test-secret').update('a=1&b=2&c=3').digest('hex');
    expect(client(fakeVenue(() => ({})).adapter).sign({ c: '3', a: '1', b: '2' })).toBe(expected);
  });

  it('places a signed form-encoded market order', async () => {
    const venue = fakeVenue(() => ({ Success: true }));
    await client(venue.adapter).submit(order);

    const [call] = venue.calls;
    const expectedSignature = createHmac('sha256', 'test-secret')
      .update('pair=BTC/USD&quantity=0.5&side=BUY&timestamp=1700000000000&type=MARKET')
      .digest('hex');

    expect(call.method).toBe('post');
    expect(call.url).toBe('/v3/place_order');
    expect(call.data).toBe(
      'pair=BTC%2FUSD&side=BUY&quantity=0.5&type=MARKET&timestamp=1700000000000'
    );
    expect(call.headers.get('MSG-SIGNATURE')).toBe(expectedSignature);
    expect(call.headers.get('RST-API-KEY')).toBe('test-key');
  });

  it('turns a rejected order into an ExecutionError', async () => {
    const venue = fakeVenue(() => ({ Success: false, ErrMsg: 'insufficient balance' }));
    const submission = client(venue.adapter).submit(order);

    await expect(submission).rejects.toBeInstanceOf(ExecutionError);
    await expect(submission).rejects.toThrow('Order rejected: insufficient balance');
  });

  it('turns a transport failure into an ExecutionError', async () => {
    const adapter: AxiosAdapter = async () => {
      throw new Error('socket hang up');
    };

    await expect(client(adapter).submit(order)).rejects.toThrow(
      'Order request failed: socket hang up'
    );
  });

  it('reads free balances from the spot wallet', async () => {
    const venue = fakeVenue(() => ({
      Success: true,
      SpotWallet: { USD: { Free: 5000, Lock: 0 }, BTC: { Free: 0.5, Lock: 0.1 } },
    }));

    await expect(client(venue.adapter).getBalances()).resolves.toEqual({ USD: 5000, BTC: 0.5 });
    expect(venue.calls[0].params).toEqual({ timestamp: '1700000000000' });
  });

  it('derives step size and precision from exchange info', async () => {
    const venue = fakeVenue(() => ({
      TradePairs: {
        'BTC/USD': { AmountPrecision: 4, PricePrecision: 2, CanTrade: true },
        'ETH/USD': { AmountPrecision: 0 },
        'OLD/USD': { AmountPrecision: 2, CanTrade: false },
      },
    }));

    await expect(client(venue.adapter).loadRules()).resolves.toEqual([
      { symbol: 'BTC/USD', stepSize: 0.0001, quantityPrecision: 4 },
      { symbol: 'ETH/USD', stepSize: 1, quantityPrecision: 0 },
    ]);
  });
});

describe('ExchangeAccount', () => {
  it('values balances at the latest feed price', async () => {
    const getRecentPrices = vi.fn(async (symbol: string) => [
      { timestamp: 1, price: symbol === 'BTC/USD' ? 40000 : 2000 },
    ]);
    const account = new ExchangeAccount(
      { getBalances: async () => ({ USD: 1000, BTC: 0.5, ETH: 0 }) },
      { getRecentPrices },
      ['BTC/USD', 'ETH/USD']
    );

    await expect(account.getPositionsUsd()).resolves.toEqual({ 'BTC/USD': 20000, 'ETH/USD': 0 });
    expect(getRecentPrices).toHaveBeenCalledTimes(1);
    await expect(account.getAvailableCashUsd()).resolves.toBe(1000);
    await expect(account.getTotalEquityUsd()).resolves.toBe(21000);
  });

  it('builds one consistent snapshot when a held symbol cannot be priced', async () => {
    const getBalances = vi.fn(async () => ({ USD: 1000, BTC: 0.5, ETH: 2 }));
    const getRecentPrices = vi.fn(async (symbol: string) => {
      if (symbol === 'ETH/USD') throw new DataUnavailableError(symbol, 'feed down for ETH');
      return [{ timestamp: 1, price: 40000 }];
    });
    const account = new ExchangeAccount(
      { getBalances },
      { getRecentPrices },
      ['BTC/USD', 'ETH/USD'],
      'USD',
      silentLogger
    );

    await expect(account.snapshot()).resolves.toEqual({
      balances: { USD: 1000, BTC: 0.5, ETH: 2 },
      positionsUsd: { 'BTC/USD': 20000 },
      totalEquityUsd: 21000,
      availableCashUsd: 1000,
      unpricedSymbols: ['ETH/USD'],
    });
    expect(getBalances).toHaveBeenCalledTimes(1);
    expect(getRecentPrices).toHaveBeenCalledTimes(2);
  });
});
