import type WebSocket from 'ws';
import { ExchangeStream } from '../exchange-stream.js';
import type { Exchange } from '../price-events.js';
import { decodeOkxFrame, okxSubscribeMessage } from './normalizer.js';
import type { DecodedFrame } from '../../types/feed.js';

/** OKX v5 public tickers. Keep-alive is a plain-text `ping`, answered with `pong`. */
export class OkxAdapter extends ExchangeStream {
  readonly sourceId = 'okx';
  protected readonly exchange: Exchange = 'OKX';

  protected subscribeMessage(symbols: string[]): string {
    return okxSubscribeMessage(symbols);
  }

  protected decode(text: string): DecodedFrame {
    return decodeOkxFrame(text);
  }

  protected sendHeartbeat(ws: WebSocket, done: (err?: Error) => void): void {
    ws.send('ping', done);
  }
}
