import type { ReconnectBackoffOptions } from '../core/backoff.js';
import type { LogLevel } from '../util/logger.js';

export interface RetryPolicy {
  attempts: number;
  minMs: number;
  maxMs: number;
  maxJitterMs: number;
}

/** Codes used to look up a feed's category/ecosystem rows; explicit GUIDs skip the lookup. */
export interface FeedRefsConfig {
  categoryCode: string;
  ecosystemCode: string;
  categoryGuid?: string;
  ecosystemGuid?: string;
}

export interface ExchangeStreamConfig {
  wsUrl: string;
  symbols: string[];
  handshakeTimeoutMs: number;
  subscribeAckTimeoutMs: number;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  reconnect: ReconnectBackoffOptions;
}

export interface ExchangeAdapterConfig extends ExchangeStreamConfig {
  enabled: boolean;
  refs: FeedRefsConfig;
}

export interface BinanceAdapterConfig extends ExchangeAdapterConfig {
  apiUrl: string;
  restPollIntervalMs: number;
  restRequestTimeoutMs: number;
  restRetry: RetryPolicy;
}

export interface NbaAdapterConfig {
  enabled: boolean;
  apiKey: string;
  accessLevel: string;
  baseUrl: string;
  languageCode: string;
  pollIntervalMs: number;
  /** Extra days after today synced once at startup. */
  rangeDays: number;
  requestTimeoutMs: number;
  retry: RetryPolicy;
  refs: FeedRefsConfig;
}

export interface DatabaseConfig {
  url: string;
  maxConnections: number;
}

export interface SupabaseConfig {
  url: string;
  serviceKey: string;
  table: string;
}

export interface Config {
  database: DatabaseConfig;
  adapters: {
    binance: BinanceAdapterConfig;
    bybit: ExchangeAdapterConfig;
    okx: ExchangeAdapterConfig;
    nba: NbaAdapterConfig;
  };
  /** Overrides the default-language lookup in the `languages` table. */
  defaultLanguageGuid?: string;
  upsertTimeoutMs: number;
  statusIntervalMs: number;
  supabase: SupabaseConfig | null;
  logLevel: LogLevel;
}
