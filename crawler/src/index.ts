import { loadConfig } from '../config/default.js';
import { BinanceAdapter } from './adapters/binance/index.js';
import { BybitAdapter } from './adapters/bybit/index.js';
import { NbaAdapter } from './adapters/nba/index.js';
import { OkxAdapter } from './adapters/okx/index.js';
import { Crawler } from './core/crawler.js';
import { EventUpserter } from './core/event-upserter.js';
import { resolveDefaultLanguage, resolveFeedContext } from './core/feed-refs.js';
import { PgStore } from './db/pg-store.js';
import { StatusReporter } from './status/reporter.js';
import { SupabaseStatusSink } from './status/supabase-sink.js';
import { createLogger, setLogLevel } from './util/logger.js';
import { ExponentialStrategy, retry } from './util/retry.js';

const log = createLogger('main');

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  log.info('Feed crawler starting...');
  const { binance, bybit, okx, nba } = config.adapters;
  log.info(`Adapters: Binance=${binance.enabled}, Bybit=${bybit.enabled}, OKX=${okx.enabled}, NBA=${nba.enabled}`);

  const store = new PgStore({ connectionString: config.database.url, maxConnections: config.database.maxConnections });
  await retry(() => store.ping(), {
    attempts: 5,
    strategy: new ExponentialStrategy({ minMs: 1_000, maxMs: 10_000, maxJitterMs: 500 }),
    onRetry: (err, failed, delayMs) => log.warn(`Database not reachable (attempt ${failed}), retrying in ${delayMs}ms`, err),
  });
  log.info('Database connected');

  const languageGuid = await resolveDefaultLanguage(store.catalog, config.defaultLanguageGuid);
  const upserter = new EventUpserter(store, { timeoutMs: config.upsertTimeoutMs });
  const reporter = config.supabase ? new StatusReporter(new SupabaseStatusSink(config.supabase)) : null;
  const crawler = new Crawler({ statusIntervalMs: config.statusIntervalMs, reporter });

  if (binance.enabled) {
    const ctx = await resolveFeedContext(store.catalog, binance.refs, languageGuid);
    crawler.registerAdapter(new BinanceAdapter(binance, ctx, upserter));
  }
  if (bybit.enabled) {
    const ctx = await resolveFeedContext(store.catalog, bybit.refs, languageGuid);
    crawler.registerAdapter(new BybitAdapter(bybit, ctx, upserter));
  }
  if (okx.enabled) {
    const ctx = await resolveFeedContext(store.catalog, okx.refs, languageGuid);
    crawler.registerAdapter(new OkxAdapter(okx, ctx, upserter));
  }
  if (nba.enabled) {
    const ctx = await resolveFeedContext(store.catalog, nba.refs, languageGuid);
    crawler.registerAdapter(new NbaAdapter(nba, ctx, upserter));
  }

  // Graceful shutdown
  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down...`);
    crawler.stop().catch((err: unknown) => log.error('Shutdown failed', err));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('uncaughtException', (err) => crawler.reportCritical(err));
  process.on('unhandledRejection', (err) => log.error('Unhandled rejection', err));

  const failed = await crawler.start();
  if (crawler.adapterCount === 0 || failed.length === crawler.adapterCount) {
    crawler.reportCritical(new Error('No adapter is running'));
  } else {
    log.info('Feed crawler running. Press Ctrl+C to stop.');
  }

  const critical = await crawler.done;
  await store.close();
  log.info('Shutdown complete');
  process.exit(critical === null ? 0 : 1);
}

main().catch((err: unknown) => {
  log.error('Fatal error', err);
  process.exit(1);
});
