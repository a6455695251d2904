import { RetryError, isTerminal } from './errors.js';
import { sleep } from './timing.js';

export interface BackoffStrategy {
  /** Wait before the next try, given how many attempts have failed so far (1-based). */
  delayMs(failedAttempts: number): number;
}

export interface ExponentialStrategyOptions {
  minMs: number;
  maxMs: number;
  maxJitterMs: number;
}

export class ExponentialStrategy implements BackoffStrategy {
  private readonly opts: ExponentialStrategyOptions;
  private readonly random: () => number;

  constructor(opts: ExponentialStrategyOptions, random: () => number = Math.random) {
    this.opts = opts;
    this.random = random;
  }

  delayMs(failedAttempts: number): number {
    const base = this.opts.minMs * 2 ** Math.max(0, failedAttempts - 1);
    const jitter = Math.floor(this.random() * this.opts.maxJitterMs);
    return Math.min(this.opts.maxMs, base + jitter);
  }
}

export interface RetryOptions {
  attempts: number;
  strategy: BackoffStrategy;
  signal?: AbortSignal;
  onRetry?: (err: unknown, failedAttempts: number, delayMs: number) => void;
}

/**
 * Call `fn` until it succeeds or `attempts` calls have failed. Terminal errors
 * (see `isTerminal`) end the loop at once. Failures surface as a `RetryError`
 * whose `cause` is the last error; an aborted signal surfaces as-is.
 */
export async function retry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const attempts = Math.max(1, opts.attempts);
  let lastErr: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    opts.signal?.throwIfAborted();
    try {
      return await fn(attempt);
    } catch (err) {
      if (opts.signal?.aborted) throw err;
      lastErr = err;
      if (isTerminal(err)) throw new RetryError(attempt, err);
      if (attempt === attempts) break;

      const wait = opts.strategy.delayMs(attempt);
      opts.onRetry?.(err, attempt, wait);
      await sleep(wait, opts.signal);
    }
  }

  throw new RetryError(attempts, lastErr);
}
