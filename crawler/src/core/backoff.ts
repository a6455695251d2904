export interface ReconnectBackoffOptions {
  initialMs: number;
  maxMs: number;
  factor: number;
}

export const DEFAULT_RECONNECT_BACKOFF: ReconnectBackoffOptions = {
  initialMs: 5_000,
  maxMs: 60_000,
  factor: 1.5,
};

/**
 * Delay between WebSocket reconnect attempts. Grows by `factor` after every
 * consecutive failure, never beyond `maxMs`, and drops back to `initialMs` once a
 * subscription succeeds.
 */
export class ReconnectBackoff {
  private readonly opts: ReconnectBackoffOptions;
  private delay: number;
  private failures = 0;

  constructor(opts: ReconnectBackoffOptions = DEFAULT_RECONNECT_BACKOFF) {
    this.opts = opts;
    this.delay = Math.min(opts.initialMs, opts.maxMs);
  }

  /** Delay to wait now; advances the sequence for the next failure. */
  next(): number {
    const current = this.delay;
    this.failures++;
    this.delay = Math.min(this.delay * this.opts.factor, this.opts.maxMs);
    return current;
  }

  reset(): void {
    this.delay = Math.min(this.opts.initialMs, this.opts.maxMs);
    this.failures = 0;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get currentDelayMs(): number {
    return this.delay;
  }
}
