import { z } from 'zod';
import { tickFrame } from '../price-events.js';
import type { DecodedFrame } from '../../types/feed.js';

const TOPIC_PREFIX = 'tickers.';

const opSchema = z.object({
  op: z.string(),
  success: z.boolean().optional(),
  ret_msg: z.string().optional(),
});

const tickerSchema = z.object({
  topic: z.string().startsWith(TOPIC_PREFIX),
  data: z.object({
    symbol: z.string().optional(),
    lastPrice: z.string().optional(),
    last_price: z.string().optional(),
  }),
});

export function bybitSubscribeMessage(symbols: string[]): string {
  return JSON.stringify({ op: 'subscribe', args: symbols.map((s) => `${TOPIC_PREFIX}${s}`) });
}

export const BYBIT_PING = JSON.stringify({ op: 'ping' });

export function decodeBybitFrame(text: string): DecodedFrame {
  const json: unknown = JSON.parse(text);

  const op = opSchema.safeParse(json);
  if (op.success) {
    if (op.data.op !== 'subscribe') return { kind: 'ignored' }; // pong
    return op.data.success === false
      ? { kind: 'rejected', reason: op.data.ret_msg ?? 'subscribe failed' }
      : { kind: 'ack' };
  }

  const ticker = tickerSchema.safeParse(json);
  if (!ticker.success) return { kind: 'ignored' };

  const { topic, data } = ticker.data;
  return tickFrame([{
    symbol: data.symbol || topic.slice(TOPIC_PREFIX.length),
    price: data.lastPrice || data.last_price || '',
  }]);
}
