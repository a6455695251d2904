import 'dotenv/config';
import type { Config, ExchangeAdapterConfig, FeedRefsConfig, RetryPolicy } from '../src/types/config.js';
import { DEFAULT_RECONNECT_BACKOFF } from '../src/core/backoff.js';
import { isLogLevel } from '../src/util/logger.js';

type Env = Record<string, string | undefined>;

/** Upper bound for the NBA startup range. */
export const MAX_NBA_RANGE_DAYS = 14;

const DEFAULT_SYMBOLS = ['BTCUSDT', 'ETHUSDT', 'SOLUSDT'];

const STREAM_DEFAULTS = {
  handshakeTimeoutMs: 30_000,
  subscribeAckTimeoutMs: 10_000,
  heartbeatIntervalMs: 20_000,
  idleTimeoutMs: 60_000,
  reconnect: DEFAULT_RECONNECT_BACKOFF,
};

const BINANCE_REST_RETRY: RetryPolicy = { attempts: 3, minMs: 3_000, maxMs: 30_000, maxJitterMs: 2_000 };
const SPORTRADAR_RETRY: RetryPolicy = { attempts: 3, minMs: 1_000, maxMs: 10_000, maxJitterMs: 500 };

function env(vars: Env, key: string): string {
  const v = vars[key];
  if (!v) throw new Error(`Missing env: ${key}`);
  return v;
}

function optEnv(vars: Env, key: string): string | undefined {
  return vars[key] || undefined;
}

function boolEnv(vars: Env, key: string, fallback: boolean): boolean {
  const v = optEnv(vars, key);
  if (v === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.toLowerCase());
}

function intEnv(vars: Env, key: string, fallback: number, min = 0): number {
  const v = optEnv(vars, key);
  if (v === undefined) return fallback;
  const n = Number(v);
  if (!Number.isInteger(n) || n < min) throw new Error(`Invalid env: ${key} must be an integer >= ${min}, got "${v}"`);
  return n;
}

function listEnv(vars: Env, key: string, fallback: string[]): string[] {
  const v = optEnv(vars, key);
  if (v === undefined) return fallback;
  return v.split(',').map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0);
}

function refs(vars: Env, prefix: string, categoryCode: string, ecosystemCode: string): FeedRefsConfig {
  return {
    categoryCode,
    ecosystemCode,
    categoryGuid: optEnv(vars, `${prefix}_CATEGORY_GUID`),
    ecosystemGuid: optEnv(vars, `${prefix}_ECOSYSTEM_GUID`),
  };
}

function exchange(vars: Env, prefix: string, wsUrl: string): ExchangeAdapterConfig {
  return {
    ...STREAM_DEFAULTS,
    enabled: boolEnv(vars, `${prefix}_ENABLED`, true),
    wsUrl: optEnv(vars, `${prefix}_WS_URL`) ?? wsUrl,
    symbols: listEnv(vars, `${prefix}_SYMBOLS`, DEFAULT_SYMBOLS),
    refs: refs(vars, prefix, 'CRYPTO', prefix),
  };
}

export function loadConfig(vars: Env = process.env): Config {
  const logLevel = optEnv(vars, 'LOG_LEVEL') ?? 'info';
  if (!isLogLevel(logLevel)) throw new Error(`Invalid env: LOG_LEVEL "${logLevel}"`);

  const supabaseUrl = optEnv(vars, 'SUPABASE_URL');
  const supabaseKey = optEnv(vars, 'SUPABASE_SERVICE_KEY');

  return {
    database: {
      url: env(vars, 'DATABASE_URL'),
      maxConnections: intEnv(vars, 'DATABASE_MAX_CONNECTIONS', 10, 1),
    },
    adapters: {
      binance: {
        ...exchange(vars, 'BINANCE', 'wss://stream.binance.com:9443/stream'),
        apiUrl: optEnv(vars, 'BINANCE_API_URL') ?? 'https://api.binance.com/api/v3',
        restPollIntervalMs: 30_000,
        restRequestTimeoutMs: 10_000,
        restRetry: BINANCE_REST_RETRY,
      },
      bybit: exchange(vars, 'BYBIT', 'wss://stream.bybit.com/v5/public/spot'),
      okx: exchange(vars, 'OKX', 'wss://ws.okx.com:8443/ws/v5/public'),
      nba: {
        enabled: boolEnv(vars, 'NBA_ENABLED', optEnv(vars, 'SPORTRADAR_API_KEY') !== undefined),
        apiKey: optEnv(vars, 'SPORTRADAR_API_KEY') ?? '',
        accessLevel: optEnv(vars, 'SPORTRADAR_ACCESS_LEVEL') ?? 'trial',
        baseUrl: optEnv(vars, 'SPORTRADAR_API_URL') ?? 'https://api.sportradar.com',
        languageCode: optEnv(vars, 'SPORTRADAR_LANGUAGE') ?? 'en',
        pollIntervalMs: 5 * 60 * 1000, // 5 min
        rangeDays: Math.min(intEnv(vars, 'NBA_RANGE_DAYS', 0), MAX_NBA_RANGE_DAYS),
        requestTimeoutMs: 30_000,
        retry: SPORTRADAR_RETRY,
        refs: refs(vars, 'NBA', 'SPORT', 'NBA'),
      },
    },
    defaultLanguageGuid: optEnv(vars, 'DEFAULT_LANGUAGE_GUID'),
    upsertTimeoutMs: intEnv(vars, 'UPSERT_TIMEOUT_MS', 15_000, 1),
    statusIntervalMs: 60_000,
    supabase: supabaseUrl && supabaseKey
      ? { url: supabaseUrl, serviceKey: supabaseKey, table: 'crawler_status' }
      : null,
    logLevel,
  };
}
