import type { EventUpsert } from '../core/event-upserter.js';
import { LiveState } from '../db/store.js';
import type { DecodedFrame, FeedContext, PriceTick } from '../types/feed.js';
import { utcDay } from '../util/timing.js';

export type Exchange = 'BINANCE' | 'BYBIT' | 'OKX';

const EXCHANGE_NAMES: Record<Exchange, string> = {
  BINANCE: 'Binance',
  BYBIT: 'Bybit',
  OKX: 'OKX',
};

export function priceExternalId(exchange: Exchange, symbol: string): string {
  return `${exchange}_${symbol}`;
}

/** Crypto events roll over to a new period every UTC day. */
export function pricePeriodCode(exchange: Exchange, day: string): string {
  return `CRYPTO_${exchange}__${day}`;
}

/** Map a price tick onto the event it keeps current. */
export function priceEvent(exchange: Exchange, tick: PriceTick, context: FeedContext, now: Date = new Date()): EventUpsert {
  const externalId = priceExternalId(exchange, tick.symbol);
  const day = utcDay(now);
  return {
    externalId,
    context,
    period: {
      code: pricePeriodCode(exchange, day),
      scheduled: day,
      remark: `Crypto price date: ${day}`,
    },
    state: {
      mainScore: tick.price,
      clusterScore: '0',
      price: tick.price,
      isLive: LiveState.IN_PROGRESS,
      stage: 'LIVE',
      info: {
        external_id: externalId,
        symbol: tick.symbol,
        price: tick.price,
        timestamp: Math.floor(now.getTime() / 1000),
      },
    },
    isSports: false,
    title: `${tick.symbol} Price`,
    rules: `Real-time price tracking for ${tick.symbol} on ${EXCHANGE_NAMES[exchange]}`,
  };
}

/** Wrap decoded ticks as a frame, dropping entries without a price. */
export function tickFrame(ticks: PriceTick[]): DecodedFrame {
  const priced = ticks.filter((t) => t.symbol !== '' && t.price !== '');
  return priced.length > 0 ? { kind: 'ticks', ticks: priced } : { kind: 'ignored' };
}
