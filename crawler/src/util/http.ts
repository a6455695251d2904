import type { z } from 'zod';
import { HttpError } from './errors.js';

export interface FetchJsonOptions {
  headers?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Abort when `parent` aborts or after `timeoutMs`, whichever comes first. */
function requestSignal(timeoutMs: number, parent?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`request timed out after ${timeoutMs}ms`)), timeoutMs);
  const onAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener('abort', onAbort, { once: true });
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * GET `url` and validate the JSON body against `schema`. Non-2xx responses throw
 * `HttpError`; unparseable or unexpected bodies throw a plain (retryable) Error.
 */
export async function fetchJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, opts: FetchJsonOptions): Promise<T> {
  const { signal, dispose } = requestSignal(opts.timeoutMs, opts.signal);
  try {
    const res = await fetch(url, {
      headers: { accept: 'application/json', ...opts.headers },
      signal,
    });
    const body = await res.text();
    if (!res.ok) throw new HttpError(res.status, body, url);

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (err) {
      throw new Error(`failed to decode API response from ${url}`, { cause: err });
    }

    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      throw new Error(`unexpected response shape from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    return parsed.data;
  } finally {
    dispose();
  }
}
