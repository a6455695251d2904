import type { IAdapter } from '../adapters/adapter.interface.js';
import { AdapterRegistry } from '../adapters/adapter-registry.js';
import { formatStatusLine, type StatusReporter } from '../status/reporter.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('crawler');

export interface CrawlerOptions {
  statusIntervalMs: number;
  reporter?: StatusReporter | null;
}

/**
 * Owns the adapters and their shared cancellation signal. Adapters handle their
 * own failures; only errors passed to `reportCritical` stop the crawler.
 */
export class Crawler {
  private readonly registry = new AdapterRegistry();
  private readonly controller = new AbortController();
  private readonly opts: CrawlerOptions;
  private statusTimer: ReturnType<typeof setInterval> | null = null;
  private stopping: Promise<void> | null = null;
  private criticalError: unknown = null;
  private markDone: (reason: unknown) => void = () => undefined;

  /** Settles once the crawler has fully stopped, with the critical error that caused it (or null). */
  readonly done: Promise<unknown>;

  constructor(opts: CrawlerOptions) {
    this.opts = opts;
    this.done = new Promise((resolve) => {
      this.markDone = resolve;
    });
  }

  registerAdapter(adapter: IAdapter): void {
    this.registry.register(adapter);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get adapterCount(): number {
    return this.registry.size;
  }

  /** Start every adapter. Resolves with the ids of those that failed to start. */
  async start(): Promise<string[]> {
    log.info(`Starting crawler with ${this.registry.size} adapter(s)...`);
    const failed = await this.registry.startAll(this.controller.signal);
    if (failed.length > 0) log.warn(`Adapters not running: ${failed.join(', ')}`);

    this.statusTimer = setInterval(() => {
      this.reportStatus().catch((err: unknown) => log.error('Status report failed', err));
    }, this.opts.statusIntervalMs);
    log.info('Crawler started');
    return failed;
  }

  /** Escalate an unrecoverable error: the crawler stops and `done` settles with `err`. */
  reportCritical(err: unknown): void {
    if (this.stopping) return;
    this.criticalError = err;
    log.error('Critical error, shutting down', err);
    this.stop().catch((stopErr: unknown) => log.error('Shutdown after critical error failed', stopErr));
  }

  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  async reportStatus(): Promise<void> {
    const statuses = this.registry.getStatuses();
    log.info(formatStatusLine(statuses));
    await this.opts.reporter?.report(statuses, this.registry.getStats());
  }

  private async shutdown(): Promise<void> {
    log.info('Stopping crawler...');
    if (this.statusTimer) {
      clearInterval(this.statusTimer);
      this.statusTimer = null;
    }
    this.controller.abort();
    try {
      await this.registry.stopAll();
      await this.reportStatus();
      log.info('Crawler stopped');
    } finally {
      this.markDone(this.criticalError);
    }
  }
}
