import { z } from 'zod';
import { tickFrame } from '../price-events.js';
import type { DecodedFrame } from '../../types/feed.js';

const ackSchema = z.object({ result: z.null(), id: z.number() });

const errorSchema = z.object({
  error: z.object({ code: z.number(), msg: z.string() }),
});

const envelopeSchema = z.object({ stream: z.string(), data: z.unknown() });

// 24hr ticker: s = symbol, c = last price
const tickerSchema = z.object({
  e: z.literal('24hrTicker'),
  s: z.string(),
  c: z.string(),
});

export function binanceStreamName(symbol: string): string {
  return `${symbol.toLowerCase()}@ticker`;
}

export function binanceSubscribeMessage(symbols: string[]): string {
  return JSON.stringify({ method: 'SUBSCRIBE', params: symbols.map(binanceStreamName), id: 1 });
}

/** Accepts the combined-stream envelope (`/stream`) and the raw payload (`/ws`). */
export function decodeBinanceFrame(text: string): DecodedFrame {
  const json: unknown = JSON.parse(text);

  if (ackSchema.safeParse(json).success) return { kind: 'ack' };

  const error = errorSchema.safeParse(json);
  if (error.success) return { kind: 'rejected', reason: `${error.data.error.code} ${error.data.error.msg}` };

  const envelope = envelopeSchema.safeParse(json);
  const ticker = tickerSchema.safeParse(envelope.success ? envelope.data.data : json);
  if (!ticker.success) return { kind: 'ignored' };

  return tickFrame([{ symbol: ticker.data.s, price: ticker.data.c }]);
}
