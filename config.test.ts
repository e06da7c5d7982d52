import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, loadVenueConfig, parseSymbols } from './config';

describe('loadConfig', () => {
  it('falls back to the defaults', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      SYMBOLS: 'btc/usd, eth/usd',
      DRY_RUN: 'TRUE',
      REBALANCE_SELL_FLOOR_BASIS: 'cash',
      REBALANCE_MIN_TRADE_USD: '25',
      RISK_MAX_DRAWDOWN: '0.2',
    });

    expect(config.symbols).toEqual(['BTC/USD', 'ETH/USD']);
    expect(config.dryRun).toBe(true);
    expect(config.sellFloorBasis).toBe('cash');
    expect(config.minTradeUsd).toBe(25);
    expect(config.risk).toEqual({ maxDrawdown: 0.2, maxAssetExposure: 0.35, dailyLossLimit: 0.04 });
  });

  it('rejects out-of-range thresholds and unknown flags', () => {
    expect(() => loadConfig({ RISK_MAX_ASSET_EXPOSURE: '1.5' })).toThrow();
    expect(() => loadConfig({ DRY_RUN: 'maybe' })).toThrow();
    expect(() => loadConfig({ REBALANCE_HISTORY_LENGTH: '1' })).toThrow();
  });
});

describe('parseSymbols', () => {
  it('drops empty entries', () => {
    expect(parseSymbols('sol/usd,, ,ada/usd')).toEqual(['SOL/USD', 'ADA/USD']);
  });
});

describe('loadVenueConfig', () => {
  it('requires credentials', () => {
    expect(() => loadVenueConfig({})).toThrow();
  });

  it('fills in default endpoints', () => {
    expect(
      loadVenueConfig({
        EXCHANGE_API_KEY: 'test-key',
        EXCHANGE_API_SECRET: 'test-secret',
        MARKET_DATA_API_KEY: 'test-market-key',
      })
    ).toEqual({
      exchangeBaseUrl: 'https://mock-api.roostoo.com',
      exchangeApiKey: 'test-key',
      exchangeApiSecret: 'test-secret',
      marketDataBaseUrl: 'https://api-horus.com',
      marketDataApiKey: 'test-market-key',
      marketDataInterval: '1h',
    });
  });
});
