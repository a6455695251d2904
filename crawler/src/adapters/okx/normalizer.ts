import { z } from 'zod';
import { tickFrame } from '../price-events.js';
import type { DecodedFrame } from '../../types/feed.js';

/** Checked in order, so USDT and USDC win over USD. */
const QUOTE_CURRENCIES = ['USDT', 'USDC', 'BTC', 'ETH', 'BNB', 'USD'];

const eventSchema = z.object({
  event: z.string(),
  code: z.string().optional(),
  msg: z.string().optional(),
});

const tickerSchema = z.object({
  arg: z.object({ channel: z.literal('tickers'), instId: z.string() }),
  data: z.array(z.object({ instId: z.string(), last: z.string() })),
});

/** `BTCUSDT` -> `BTC-USDT`. Symbols with no known quote pass through unchanged. */
export function toOkxInstId(symbol: string): string {
  for (const quote of QUOTE_CURRENCIES) {
    if (symbol.length > quote.length && symbol.endsWith(quote)) {
      return `${symbol.slice(0, -quote.length)}-${quote}`;
    }
  }
  return symbol;
}

export function fromOkxInstId(instId: string): string {
  return instId.replace(/-/g, '');
}

export function okxSubscribeMessage(symbols: string[]): string {
  return JSON.stringify({
    op: 'subscribe',
    args: symbols.map((s) => ({ channel: 'tickers', instId: toOkxInstId(s) })),
  });
}

export function decodeOkxFrame(text: string): DecodedFrame {
  if (text === 'pong') return { kind: 'ignored' };
  const json: unknown = JSON.parse(text);

  const event = eventSchema.safeParse(json);
  if (event.success) {
    if (event.data.event === 'subscribe') return { kind: 'ack' };
    if (event.data.event === 'error') {
      return { kind: 'rejected', reason: `${event.data.code ?? '?'} ${event.data.msg ?? ''}`.trim() };
    }
    return { kind: 'ignored' };
  }

  const ticker = tickerSchema.safeParse(json);
  if (!ticker.success) return { kind: 'ignored' };

  return tickFrame(ticker.data.data.map((d) => ({ symbol: fromOkxInstId(d.instId), price: d.last })));
}
