import { describe, it, expect, vi } from 'vitest';
import { ExponentialStrategy, retry, type BackoffStrategy } from '../src/util/retry.js';
import { HttpError, RetryError, TerminalError } from '../src/util/errors.js';

const noWait: BackoffStrategy = { delayMs: () => 0 };

describe('ExponentialStrategy', () => {
  it('doubles from min and caps at max', () => {
    const s = new ExponentialStrategy({ minMs: 1_000, maxMs: 5_000, maxJitterMs: 0 });
    expect([1, 2, 3, 4, 5].map((n) => s.delayMs(n))).toEqual([1_000, 2_000, 4_000, 5_000, 5_000]);
  });

  it('adds jitter below maxJitterMs', () => {
    const s = new ExponentialStrategy({ minMs: 1_000, maxMs: 30_000, maxJitterMs: 500 }, () => 0.5);
    expect(s.delayMs(1)).toBe(1_250);
    expect(s.delayMs(2)).toBe(2_250);
  });

  it('never exceeds max even with jitter', () => {
    const s = new ExponentialStrategy({ minMs: 3_000, maxMs: 30_000, maxJitterMs: 2_000 }, () => 0.99);
    expect(s.delayMs(4)).toBe(25_980);
    expect(s.delayMs(5)).toBe(30_000);
  });
});

describe('retry', () => {
  it('returns the first success', async () => {
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error(`fail ${attempt}`);
      return 'ok';
    });
    const onRetry = vi.fn();

    await expect(retry(fn, { attempts: 3, strategy: noWait, onRetry })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls[1]?.[1]).toBe(2);
  });

  it('wraps the last error once attempts run out', async () => {
    const fn = vi.fn(async (attempt: number): Promise<string> => {
      throw new Error(`fail ${attempt}`);
    });

    const err = await retry(fn, { attempts: 3, strategy: noWait }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryError);
    if (!(err instanceof RetryError)) return;
    expect(err.attempts).toBe(3);
    expect(err.message).toBe('failed after 3 attempt(s): fail 3');
    expect(err.cause).toBeInstanceOf(Error);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('stops at once on a terminal error', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new TerminalError('bad input');
    });

    const err = await retry(fn, { attempts: 5, strategy: noWait }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryError);
    if (!(err instanceof RetryError)) return;
    expect(err.attempts).toBe(1);
    expect(err.cause).toBeInstanceOf(TerminalError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('treats HTTP 4xx as terminal and 5xx as retryable', async () => {
    const clientErr = vi.fn(async (): Promise<string> => {
      throw new HttpError(404, 'not found', 'http://api.test/x');
    });
    await expect(retry(clientErr, { attempts: 3, strategy: noWait })).rejects.toBeInstanceOf(RetryError);
    expect(clientErr).toHaveBeenCalledTimes(1);

    const serverErr = vi.fn(async (): Promise<string> => {
      throw new HttpError(503, 'unavailable', 'http://api.test/x');
    });
    await expect(retry(serverErr, { attempts: 3, strategy: noWait })).rejects.toBeInstanceOf(RetryError);
    expect(serverErr).toHaveBeenCalledTimes(3);
  });

  it('aborts a pending wait when the signal fires', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async (): Promise<string> => {
      throw new Error('down');
    });
    const slow: BackoffStrategy = { delayMs: () => 60_000 };

    const pending = retry(fn, { attempts: 3, strategy: slow, signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    const err = await pending.catch((e: unknown) => e);
    expect(err).toBeInstanceOf(Error);
    expect(err).not.toBeInstanceOf(RetryError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not call fn when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const fn = vi.fn(async () => 'ok');

    await expect(retry(fn, { attempts: 3, strategy: noWait, signal: controller.signal })).rejects.toThrow();
    expect(fn).not.toHaveBeenCalled();
  });
});
