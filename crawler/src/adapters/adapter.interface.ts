export type AdapterStatus = 'idle' | 'connecting' | 'subscribed' | 'reconnecting' | 'polling' | 'error' | 'stopped';

export interface AdapterStats {
  /** Records decoded from the feed (price ticks or games). */
  received: number;
  upserted: number;
  /** Records dropped because the upsert failed. */
  failed: number;
  reconnects: number;
  lastRecordAt: Date | null;
  lastError: string | null;
}

export interface IAdapter {
  readonly sourceId: string;
  /** Begin feeding; work continues in the background until `stop` or `signal` aborts. */
  start(signal: AbortSignal): Promise<void>;
  stop(): Promise<void>;
  getStatus(): AdapterStatus;
  getStats(): AdapterStats;
}

export function emptyStats(): AdapterStats {
  return { received: 0, upserted: 0, failed: 0, reconnects: 0, lastRecordAt: null, lastError: null };
}
