import { setTimeout as delay } from 'node:timers/promises';

// High-resolution timing for performance measurement
export function hrtimeMs(): number {
  const [sec, nsec] = process.hrtime();
  return sec * 1000 + nsec / 1_000_000;
}

export function measureMs(startMs: number): number {
  return Math.round((hrtimeMs() - startMs) * 1000) / 1000; // microsecond precision
}

/** Resolves after `ms`; rejects with an AbortError as soon as `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return delay(ms, undefined, { signal });
}

/**
 * Race `work` against a timer. The work itself is not cancelled; the caller only
 * stops waiting for it.
 */
export async function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/** `YYYY-MM-DD` of the UTC calendar day containing `date`. */
export function utcDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** `YYYY-MM-DD HH:mm:ss` in UTC. */
export function utcDateTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}
