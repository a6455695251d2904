/** An error that retrying cannot fix. The retry helper gives up on it immediately. */
export class TerminalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalError';
  }
}

/** Non-2xx HTTP response. Client errors (4xx) are terminal, everything else retryable. */
export class HttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string, url: string) {
    const kind = status >= 400 && status < 500 ? 'client' : 'server';
    super(`API returned ${kind} error ${status} for ${url}: ${body.slice(0, 200)}`);
    this.name = 'HttpError';
    this.status = status;
    this.body = body;
  }

  get isClientError(): boolean {
    return this.status >= 400 && this.status < 500;
  }
}

export class RetryError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed after ${attempts} attempt(s): ${reason}`, { cause });
    this.name = 'RetryError';
    this.attempts = attempts;
  }
}

/** Raised by a store when an insert hits a unique constraint. */
export class DuplicateKeyError extends Error {
  readonly entity: string;
  readonly key: string;

  constructor(entity: string, key: string, options?: { cause?: unknown }) {
    super(`duplicate ${entity} for key ${key}`, options);
    this.name = 'DuplicateKeyError';
    this.entity = entity;
    this.key = key;
  }
}

export class UpsertTimeoutError extends Error {
  readonly externalId: string;
  readonly timeoutMs: number;

  constructor(externalId: string, timeoutMs: number) {
    super(`upsert of ${externalId} did not finish within ${timeoutMs}ms, store appears stuck`);
    this.name = 'UpsertTimeoutError';
    this.externalId = externalId;
    this.timeoutMs = timeoutMs;
  }
}

export class SubscribeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SubscribeError';
  }
}

export class StreamAlreadyRunningError extends Error {
  constructor(sourceId: string) {
    super(`${sourceId}: WebSocket stream is already running`);
    this.name = 'StreamAlreadyRunningError';
  }
}

export function isTerminal(err: unknown): boolean {
  if (err instanceof TerminalError) return true;
  if (err instanceof HttpError) return err.isClientError;
  return false;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
