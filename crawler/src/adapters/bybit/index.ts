import type WebSocket from 'ws';
import { ExchangeStream } from '../exchange-stream.js';
import type { Exchange } from '../price-events.js';
import { BYBIT_PING, bybitSubscribeMessage, decodeBybitFrame } from './normalizer.js';
import type { DecodedFrame } from '../../types/feed.js';

/** Bybit v5 public spot tickers. */
export class BybitAdapter extends ExchangeStream {
  readonly sourceId = 'bybit';
  protected readonly exchange: Exchange = 'BYBIT';

  protected subscribeMessage(symbols: string[]): string {
    return bybitSubscribeMessage(symbols);
  }

  protected decode(text: string): DecodedFrame {
    return decodeBybitFrame(text);
  }

  protected sendHeartbeat(ws: WebSocket, done: (err?: Error) => void): void {
    ws.send(BYBIT_PING, done);
  }
}
