import { z } from 'zod';
import type { RetryPolicy } from '../../types/config.js';
import type { PriceTick } from '../../types/feed.js';
import { HttpError, RetryError } from '../../util/errors.js';
import { fetchJson } from '../../util/http.js';
import { createLogger } from '../../util/logger.js';
import { ExponentialStrategy, retry } from '../../util/retry.js';
import { sleep } from '../../util/timing.js';

const log = createLogger('binance-rest');

const tickerPriceSchema = z.object({ symbol: z.string(), price: z.string() });

export interface RestPollerOptions {
  apiUrl: string;
  symbols: string[];
  intervalMs: number;
  requestTimeoutMs: number;
  retry: RetryPolicy;
}

/** Polls `/ticker/price` for every symbol: once immediately, then on a fixed interval. */
export class BinanceRestPoller {
  private readonly opts: RestPollerOptions;
  private readonly onTick: (tick: PriceTick) => Promise<void>;
  private readonly strategy: ExponentialStrategy;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(opts: RestPollerOptions, onTick: (tick: PriceTick) => Promise<void>) {
    this.opts = opts;
    this.onTick = onTick;
    this.strategy = new ExponentialStrategy({
      minMs: opts.retry.minMs,
      maxMs: opts.retry.maxMs,
      maxJitterMs: opts.retry.maxJitterMs,
    });
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(signal: AbortSignal): void {
    if (this.controller) return;
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', onParentAbort, { once: true });
    this.controller = controller;

    log.info(`Polling ${this.opts.symbols.length} symbol(s) every ${this.opts.intervalMs / 1000}s`);
    this.loop = this.run(controller.signal).finally(() => {
      signal.removeEventListener('abort', onParentAbort);
      this.controller = null;
      this.loop = null;
    });
  }

  async stop(): Promise<void> {
    if (!this.controller) return;
    const loop = this.loop;
    this.controller.abort();
    await loop;
    log.info('REST polling stopped');
  }

  /** One pass over all symbols. A symbol that fails is skipped until the next pass. */
  async pollOnce(signal: AbortSignal): Promise<number> {
    let processed = 0;
    for (const symbol of this.opts.symbols) {
      if (signal.aborted) break;
      try {
        const tick = await this.fetchPrice(symbol, signal);
        log.clearOnce(`client-error:${symbol}`);
        await this.onTick(tick);
        processed++;
      } catch (err) {
        if (signal.aborted) break;
        if (err instanceof RetryError && err.cause instanceof HttpError && err.cause.isClientError) {
          log.warnOnce(`client-error:${symbol}`, `Skipping ${symbol}: request rejected`, err.cause);
        } else {
          log.error(`Failed to fetch price for ${symbol}`, err);
        }
      }
    }
    log.debug(`Poll finished: ${processed}/${this.opts.symbols.length} symbols`);
    return processed;
  }

  async fetchPrice(symbol: string, signal?: AbortSignal): Promise<PriceTick> {
    const url = `${this.opts.apiUrl}/ticker/price?symbol=${encodeURIComponent(symbol)}`;
    const body = await retry(
      () => fetchJson(url, tickerPriceSchema, { timeoutMs: this.opts.requestTimeoutMs, signal }),
      {
        attempts: this.opts.retry.attempts,
        strategy: this.strategy,
        signal,
        onRetry: (err, failed, delayMs) =>
          log.warn(`${symbol}: attempt ${failed} failed, retrying in ${delayMs}ms`, err),
      },
    );
    // The requested symbol stands in when the response leaves it blank.
    return { symbol: body.symbol || symbol, price: body.price };
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.pollOnce(signal);
      try {
        await sleep(this.opts.intervalMs, signal);
      } catch (err) {
        if (signal.aborted) return;
        log.error('Poll wait failed', err);
        return;
      }
    }
  }
}
