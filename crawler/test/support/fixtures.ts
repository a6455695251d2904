import type { ExchangeStreamConfig, RetryPolicy } from '../../src/types/config.js';
import type { FeedContext } from '../../src/types/feed.js';

export const CRYPTO_CONTEXT: FeedContext = {
  categoryGuid: 'cat-crypto',
  ecosystemGuid: 'eco-binance',
  languageGuid: 'lang-en',
};

export const NBA_CONTEXT: FeedContext = {
  categoryGuid: 'cat-sport',
  ecosystemGuid: 'eco-nba',
  languageGuid: 'lang-en',
};

export const FAST_RETRY: RetryPolicy = { attempts: 3, minMs: 1, maxMs: 5, maxJitterMs: 0 };

export function streamConfig(wsUrl: string, overrides: Partial<ExchangeStreamConfig> = {}): ExchangeStreamConfig {
  return {
    wsUrl,
    symbols: ['BTCUSDT'],
    handshakeTimeoutMs: 2_000,
    subscribeAckTimeoutMs: 500,
    heartbeatIntervalMs: 1_000,
    idleTimeoutMs: 5_000,
    reconnect: { initialMs: 20, maxMs: 100, factor: 1.5 },
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}
