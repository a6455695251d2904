import WebSocket from 'ws';
import type { IAdapter, AdapterStatus, AdapterStats } from './adapter.interface.js';
import { emptyStats } from './adapter.interface.js';
import { priceEvent, type Exchange } from './price-events.js';
import { ReconnectBackoff } from '../core/backoff.js';
import type { EventSink } from '../core/event-upserter.js';
import type { ExchangeStreamConfig } from '../types/config.js';
import type { DecodedFrame, FeedContext, PriceTick } from '../types/feed.js';
import { StreamAlreadyRunningError, SubscribeError, TerminalError, errorMessage } from '../util/errors.js';
import { createLogger, type Logger } from '../util/logger.js';
import { sleep } from '../util/timing.js';

/** Hooks the frame handler uses to drive the connection it belongs to. */
interface Session {
  markSubscribed(how: string): void;
  fail(err: Error): void;
}

export function frameText(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * One exchange ticker stream: dial, subscribe, decode frames in order and upsert
 * each price, reconnecting with backoff until stopped. Subclasses supply the
 * exchange's wire format.
 */
export abstract class ExchangeStream implements IAdapter {
  abstract readonly sourceId: string;
  protected abstract readonly exchange: Exchange;

  protected readonly config: ExchangeStreamConfig;
  protected readonly context: FeedContext;
  protected readonly sink: EventSink;
  protected status: AdapterStatus = 'idle';
  protected readonly stats: AdapterStats = emptyStats();
  private readonly backoff: ReconnectBackoff;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private logger: Logger | null = null;

  constructor(config: ExchangeStreamConfig, context: FeedContext, sink: EventSink) {
    this.config = config;
    this.context = context;
    this.sink = sink;
    this.backoff = new ReconnectBackoff(config.reconnect);
  }

  /** JSON (or text) sent right after the socket opens. */
  protected abstract subscribeMessage(symbols: string[]): string;

  /** Classify one text frame. May throw on malformed input; the frame is then dropped. */
  protected abstract decode(text: string): DecodedFrame;

  /** Keep-alive sent on every heartbeat tick. `done` receives the write error, if any. */
  protected abstract sendHeartbeat(ws: WebSocket, done: (err?: Error) => void): void;

  protected get log(): Logger {
    this.logger ??= createLogger(this.sourceId);
    return this.logger;
  }

  start(signal: AbortSignal): Promise<void> {
    return this.startWebSocketStream(signal);
  }

  stop(): Promise<void> {
    return this.stopWebSocketStream();
  }

  getStatus(): AdapterStatus {
    return this.status;
  }

  getStats(): AdapterStats {
    return { ...this.stats };
  }

  get running(): boolean {
    return this.controller !== null;
  }

  get reconnectDelayMs(): number {
    return this.backoff.currentDelayMs;
  }

  /**
   * Launch the connection loop and return once it is running. The loop lives
   * until `stopWebSocketStream` or until `signal` aborts.
   */
  async startWebSocketStream(signal: AbortSignal): Promise<void> {
    if (this.controller) throw new StreamAlreadyRunningError(this.sourceId);
    if (this.config.symbols.length === 0) {
      throw new TerminalError(`${this.sourceId}: no symbols configured`);
    }
    if (!/^wss?:\/\//.test(this.config.wsUrl)) {
      throw new TerminalError(`${this.sourceId}: invalid WebSocket URL "${this.config.wsUrl}"`);
    }
    signal.throwIfAborted();

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', onParentAbort, { once: true });
    this.controller = controller;
    this.backoff.reset();

    this.log.info(`Starting stream for ${this.config.symbols.length} symbol(s): ${this.config.symbols.join(', ')}`);
    this.loop = this.run(controller.signal).finally(() => {
      signal.removeEventListener('abort', onParentAbort);
      this.controller = null;
      this.loop = null;
      this.status = 'stopped';
      this.log.info('Stream stopped');
    });
  }

  /** Abort the loop and close the live socket. Does nothing when not running. */
  async stopWebSocketStream(): Promise<void> {
    if (!this.controller) return;
    const loop = this.loop;
    this.controller.abort();
    await loop;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.connect(signal);
      } catch (err) {
        if (signal.aborted) break;
        this.stats.lastError = errorMessage(err);
        this.log.warn('Connection lost', err);
      }
      if (signal.aborted) break;

      const delay = this.backoff.next();
      this.status = 'reconnecting';
      this.stats.reconnects++;
      this.log.info(`Reconnecting in ${delay}ms (attempt ${this.backoff.consecutiveFailures})`);
      try {
        await sleep(delay, signal);
      } catch (err) {
        if (signal.aborted) break;
        this.status = 'error';
        this.log.error('Reconnect wait failed', err);
        return;
      }
    }
  }

  /** One connection from dial to close. Resolves when stopped, rejects when the connection fails. */
  private connect(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const cfg = this.config;
      this.status = 'connecting';
      this.log.info(`Connecting to ${cfg.wsUrl}`);

      const ws = new WebSocket(cfg.wsUrl, { handshakeTimeout: cfg.handshakeTimeoutMs });

      const queue: string[] = [];
      let draining = false;
      let subscribed = false;
      let settled = false;
      let heartbeat: ReturnType<typeof setInterval> | null = null;
      let idleTimer: ReturnType<typeof setTimeout> | null = null;
      let ackTimer: ReturnType<typeof setTimeout> | null = null;

      const finish = (err?: Error) => {
        if (settled) return;
        settled = true;
        if (heartbeat) clearInterval(heartbeat);
        if (idleTimer) clearTimeout(idleTimer);
        if (ackTimer) clearTimeout(ackTimer);
        signal.removeEventListener('abort', onAbort);
        ws.removeAllListeners();
        // Terminating a socket that is still connecting emits one last error.
        ws.on('error', (e) => this.log.debug('Socket error after close', e));
        if (err) ws.terminate();
        else ws.close(1000);
        if (err) reject(err);
        else resolve();
      };
      const onAbort = () => finish();
      signal.addEventListener('abort', onAbort, { once: true });

      const session: Session = {
        markSubscribed: (how) => {
          if (subscribed || settled) return;
          subscribed = true;
          if (ackTimer) clearTimeout(ackTimer);
          this.backoff.reset();
          this.status = 'subscribed';
          this.log.info(`Subscribed (${how})`);
        },
        fail: (err) => finish(err),
      };

      // The idle clock stops while frames are being written; the socket is paused then.
      const touch = () => {
        if (idleTimer) clearTimeout(idleTimer);
        idleTimer = null;
        if (draining || settled) return;
        idleTimer = setTimeout(
          () => finish(new Error(`no data received for ${cfg.idleTimeoutMs}ms`)),
          cfg.idleTimeoutMs,
        );
      };

      const drain = async () => {
        if (draining) return;
        draining = true;
        touch();
        // Hold further frames in the socket while this one is being written.
        ws.pause();
        try {
          let text = queue.shift();
          while (text !== undefined && !settled) {
            await this.handleFrame(text, session);
            text = queue.shift();
          }
        } finally {
          draining = false;
          if (!settled) {
            ws.resume();
            touch();
          }
        }
      };

      ws.on('open', () => {
        this.log.info('Connected');
        touch();
        ws.send(this.subscribeMessage(cfg.symbols), (err) => {
          if (err) finish(new SubscribeError(`failed to send subscription: ${err.message}`));
        });
        ackTimer = setTimeout(() => session.markSubscribed('no acknowledgement'), cfg.subscribeAckTimeoutMs);
        const heartbeatFailed = (err: unknown) => finish(new Error(`heartbeat failed: ${errorMessage(err)}`));
        heartbeat = setInterval(() => {
          try {
            this.sendHeartbeat(ws, (err) => {
              if (err) heartbeatFailed(err);
            });
          } catch (err) {
            heartbeatFailed(err);
          }
        }, cfg.heartbeatIntervalMs);
      });

      ws.on('message', (data) => {
        touch();
        queue.push(frameText(data));
        drain().catch((err: unknown) => finish(err instanceof Error ? err : new Error(String(err))));
      });

      ws.on('ping', touch);
      ws.on('pong', touch);

      ws.on('close', (code) => finish(new Error(`connection closed (code=${code})`)));
      ws.on('error', (err) => finish(err));
    });
  }

  private async handleFrame(text: string, session: Session): Promise<void> {
    let frame: DecodedFrame;
    try {
      frame = this.decode(text);
    } catch (err) {
      this.log.debug(`Dropped undecodable frame: ${text.slice(0, 120)}`, err);
      return;
    }

    switch (frame.kind) {
      case 'ack':
        session.markSubscribed('acknowledged');
        return;
      case 'rejected':
        session.fail(new SubscribeError(`subscription rejected: ${frame.reason}`));
        return;
      case 'ignored':
        return;
      case 'ticks':
        session.markSubscribed('first tick');
        for (const tick of frame.ticks) {
          await this.processTick(tick);
        }
        return;
    }
  }

  protected async processTick(tick: PriceTick): Promise<void> {
    this.stats.received++;
    this.stats.lastRecordAt = new Date();
    const input = priceEvent(this.exchange, tick, this.context);
    try {
      await this.sink.upsertEvent(input);
      this.stats.upserted++;
    } catch (err) {
      this.stats.failed++;
      this.stats.lastError = errorMessage(err);
      this.log.error(`Failed to upsert ${input.externalId}`, err);
    }
  }
}
