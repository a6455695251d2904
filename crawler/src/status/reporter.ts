import type { AdapterStats, AdapterStatus } from '../adapters/adapter.interface.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('status');

export interface CrawlerStatusRow {
  source_id: string;
  status: AdapterStatus;
  ticks: number;
  failures: number;
  last_tick_at: string | null;
  last_error: string | null;
  updated_at: string;
}

/** Destination for per-adapter health rows. */
export interface StatusSink {
  write(rows: CrawlerStatusRow[]): Promise<void>;
}

export function toStatusRow(sourceId: string, status: AdapterStatus, stats: AdapterStats, now: Date): CrawlerStatusRow {
  return {
    source_id: sourceId,
    status,
    ticks: stats.received,
    failures: stats.failed,
    last_tick_at: stats.lastRecordAt ? stats.lastRecordAt.toISOString() : null,
    last_error: stats.lastError,
    updated_at: now.toISOString(),
  };
}

/** `Status: binance=subscribed, nba=polling` */
export function formatStatusLine(statuses: Map<string, AdapterStatus>): string {
  const statusStr = Array.from(statuses.entries())
    .map(([id, s]) => `${id}=${s}`)
    .join(', ');
  return `Status: ${statusStr}`;
}

export class StatusReporter {
  private readonly sink: StatusSink;
  private failing = false;

  constructor(sink: StatusSink) {
    this.sink = sink;
  }

  /** Push one snapshot. Sink failures are logged once per outage and never thrown. */
  async report(statuses: Map<string, AdapterStatus>, stats: Map<string, AdapterStats>, now: Date = new Date()): Promise<boolean> {
    const rows: CrawlerStatusRow[] = [];
    for (const [id, status] of statuses) {
      const s = stats.get(id);
      if (s) rows.push(toStatusRow(id, status, s, now));
    }
    if (rows.length === 0) return true;

    try {
      await this.sink.write(rows);
      if (this.failing) log.info('Status reporting recovered');
      this.failing = false;
      log.clearOnce('status-sink');
      return true;
    } catch (err) {
      this.failing = true;
      log.warnOnce('status-sink', 'Status reporting failed', err);
      return false;
    }
  }
}
