import * as dotenv from 'dotenv';
import { BacktestingEngine } from './backtesting';
import { loadConfig, loadVenueConfig } from './config';
import type { RebalanceConfig } from './config';
import { ExchangeAccount, ExchangeClient } from './exchange-client';
import { logger } from './logger';
import { MarketDataClient } from './price-feed';
import { StaticRuleRegistry } from './rule-registry';
import { TradingBot } from './trading-bot';
import type { PricePoint } from './types';

dotenv.config();

const START_PRICES: Record<string, number> = {
  'BTC/USD': 68000,
  'ETH/USD': 3500,
  'SOL/USD': 180,
};

function generatePriceData(symbols: string[], bars: number): Record<string, PricePoint[]> {
  const hour = 60 * 60 * 1000;
  const start = Date.now() - bars * hour;
  const series: Record<string, PricePoint[]> = {};

  for (const symbol of symbols) {
    let price = START_PRICES[symbol] ?? 100;
    series[symbol] = [];
    for (let bar = 0; bar < bars; bar++) {
      const change = (Math.random() - 0.5) * 0.04;
      price = price * (1 + change);
      series[symbol].push({ timestamp: start + bar * hour, price });
    }
  }

  return series;
}

async function runBacktest(config: RebalanceConfig) {
  logger.header('Running backtest');

  const symbols = config.symbols.slice(0, 3);
  const rules = new StaticRuleRegistry(
    symbols.map((symbol) => ({ symbol, stepSize: 0.0001, quantityPrecision: 4 }))
  );
  const engine = new BacktestingEngine({ ...config, symbols }, rules, { cash: 50000, feeRate: 0.001 });
  const result = await engine.run(generatePriceData(symbols, 24 * 14));

  logger.header('BACKTEST RESULTS');
  logger.info(`Total Trades: ${result.trades.length}`);
  logger.info(`Total Return: ${result.totalReturn.toFixed(2)}%`);
  logger.info(`Sharpe Ratio: ${result.sharpeRatio.toFixed(2)}`);
  logger.info(`Max Drawdown: ${result.maxDrawdown.toFixed(2)}%`);
  logger.info(`Suspended Cycles: ${result.suspendedCycles}`);
  logger.info(`Final Equity: $${result.finalEquity.toFixed(2)}`);

  logger.header('Last 10 Trades');
  for (const trade of result.trades.slice(-10)) {
    logger.info(`${trade.side} ${trade.quantity.toFixed(4)} ${trade.symbol} @ $${trade.price.toFixed(2)}`);
  }
}

async function createLiveBot(config: RebalanceConfig): Promise<TradingBot> {
  const venue = loadVenueConfig();

  const priceFeed = new MarketDataClient({
    baseUrl: venue.marketDataBaseUrl,
    apiKey: venue.marketDataApiKey,
    interval: venue.marketDataInterval,
  });
  const client = new ExchangeClient({
    baseUrl: venue.exchangeBaseUrl,
    apiKey: venue.exchangeApiKey,
    apiSecret: venue.exchangeApiSecret,
  });

  const rules = new StaticRuleRegistry(await client.loadRules());
  logger.info(`Loaded ${rules.symbols().length} trading rules`);

  const account = new ExchangeAccount(client, priceFeed, config.symbols, config.quoteAsset);
  return new TradingBot({ priceFeed, account, orders: client, rules }, config);
}

async function runLiveBot(config: RebalanceConfig) {
  logger.info('Starting live bot...');
  const bot = await createLiveBot(config);
  await bot.initialize();
  await bot.start();

  process.on('SIGINT', () => {
    logger.info('Stopping bot...');
    bot
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Failed to stop cleanly:', error);
        process.exit(1);
      });
  });
}

async function runOnce(config: RebalanceConfig) {
  const bot = await createLiveBot(config);
  const outcome = await bot.step();
  logger.info(
    `Cycle done: ${outcome.submitted.length} submitted, ${outcome.failed.length} failed, ` +
      `${outcome.report.faults.length} skipped symbols`
  );
}

const mode = process.argv[2];
const config = loadConfig();
logger.setVerbose(process.argv.includes('--verbose'));

if (mode === 'backtest') {
  runBacktest(config).catch((error: unknown) => logger.error('Backtest failed:', error));
} else if (mode === 'live') {
  runLiveBot(config).catch((error: unknown) => logger.error('Live bot failed:', error));
} else if (mode === 'once') {
  runOnce(config).catch((error: unknown) => logger.error('Cycle failed:', error));
} else {
  console.log('Usage: npm start [backtest|live|once] [--verbose]');
  console.log('  backtest - Replay synthetic prices through the rebalancer');
  console.log('  live     - Rebalance every REBALANCE_INTERVAL_MS (requires exchange and market data keys)');
  console.log('  once     - Run a single rebalancing cycle against the live venue');
}
