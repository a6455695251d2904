import type WebSocket from 'ws';
import { ExchangeStream } from '../exchange-stream.js';
import type { Exchange } from '../price-events.js';
import { BinanceRestPoller } from './rest-poller.js';
import { binanceSubscribeMessage, decodeBinanceFrame } from './normalizer.js';
import type { EventSink } from '../../core/event-upserter.js';
import type { BinanceAdapterConfig } from '../../types/config.js';
import type { DecodedFrame, FeedContext } from '../../types/feed.js';
import { StreamAlreadyRunningError, TerminalError } from '../../util/errors.js';

/**
 * Binance spot tickers over the combined stream endpoint. When the stream cannot
 * be started the adapter polls the REST ticker endpoint instead.
 */
export class BinanceAdapter extends ExchangeStream {
  readonly sourceId = 'binance';
  protected readonly exchange: Exchange = 'BINANCE';
  private readonly binance: BinanceAdapterConfig;
  private poller: BinanceRestPoller | null = null;

  constructor(config: BinanceAdapterConfig, context: FeedContext, sink: EventSink) {
    super(config, context, sink);
    this.binance = config;
  }

  override async start(signal: AbortSignal): Promise<void> {
    if (this.binance.symbols.length === 0) {
      throw new TerminalError(`${this.sourceId}: no symbols configured`);
    }
    try {
      await this.startWebSocketStream(signal);
    } catch (err) {
      if (err instanceof StreamAlreadyRunningError || signal.aborted) throw err;
      this.log.warn('WebSocket stream failed to start, falling back to REST polling', err);
      this.startPolling(signal);
    }
  }

  override async stop(): Promise<void> {
    await this.stopWebSocketStream();
    if (this.poller) {
      await this.poller.stop();
      this.poller = null;
      this.status = 'stopped';
    }
  }

  get polling(): boolean {
    return this.poller?.running ?? false;
  }

  private startPolling(signal: AbortSignal): void {
    this.poller = new BinanceRestPoller(
      {
        apiUrl: this.binance.apiUrl,
        symbols: this.binance.symbols,
        intervalMs: this.binance.restPollIntervalMs,
        requestTimeoutMs: this.binance.restRequestTimeoutMs,
        retry: this.binance.restRetry,
      },
      (tick) => this.processTick(tick),
    );
    this.status = 'polling';
    this.poller.start(signal);
  }

  protected subscribeMessage(symbols: string[]): string {
    return binanceSubscribeMessage(symbols);
  }

  protected decode(text: string): DecodedFrame {
    return decodeBinanceFrame(text);
  }

  // Binance answers server pings itself; an unsolicited pong keeps our side alive.
  protected sendHeartbeat(ws: WebSocket, done: (err?: Error) => void): void {
    ws.pong(undefined, undefined, done);
  }
}
