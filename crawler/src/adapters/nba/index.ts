/**
 * NBA schedule adapter. Pulls the Sportradar daily schedule on an interval and
 * writes each game as an event with its home and away teams.
 */
import type { IAdapter, AdapterStatus, AdapterStats } from '../adapter.interface.js';
import { emptyStats } from '../adapter.interface.js';
import { SportradarClient } from './client.js';
import { gameEvent, parseSchedule } from './normalizer.js';
import type { EventSink } from '../../core/event-upserter.js';
import type { NbaAdapterConfig } from '../../types/config.js';
import type { FeedContext, GameUpdate } from '../../types/feed.js';
import { TerminalError, errorMessage } from '../../util/errors.js';
import { createLogger } from '../../util/logger.js';
import { sleep, utcDay } from '../../util/timing.js';

const log = createLogger('nba');

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DaySyncResult {
  date: string;
  games: number;
  upserted: number;
  invalid: number;
}

function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

export class NbaAdapter implements IAdapter {
  readonly sourceId = 'nba';
  private readonly config: NbaAdapterConfig;
  private readonly context: FeedContext;
  private readonly sink: EventSink;
  private readonly client: SportradarClient;
  private status: AdapterStatus = 'idle';
  private readonly stats: AdapterStats = emptyStats();
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(config: NbaAdapterConfig, context: FeedContext, sink: EventSink, client?: SportradarClient) {
    this.config = config;
    this.context = context;
    this.sink = sink;
    this.client = client ?? new SportradarClient(config);
  }

  getStatus(): AdapterStatus {
    return this.status;
  }

  getStats(): AdapterStats {
    return { ...this.stats };
  }

  async start(signal: AbortSignal): Promise<void> {
    if (this.controller) throw new Error(`${this.sourceId}: poller is already running`);
    if (!this.config.apiKey) throw new TerminalError(`${this.sourceId}: SPORTRADAR_API_KEY is not set`);
    signal.throwIfAborted();

    const controller = new AbortController();
    const onParentAbort = () => controller.abort(signal.reason);
    signal.addEventListener('abort', onParentAbort, { once: true });
    this.controller = controller;
    this.status = 'polling';

    log.info(`Polling NBA schedule every ${this.config.pollIntervalMs / 1000}s (startup range: ${this.config.rangeDays} extra day(s))`);
    this.loop = this.run(controller.signal).finally(() => {
      signal.removeEventListener('abort', onParentAbort);
      this.controller = null;
      this.loop = null;
      this.status = 'stopped';
    });
  }

  async stop(): Promise<void> {
    if (!this.controller) return;
    const loop = this.loop;
    this.controller.abort();
    await loop;
    log.info('NBA adapter stopped');
  }

  syncToday(signal?: AbortSignal): Promise<DaySyncResult> {
    return this.syncDate(new Date(), signal);
  }

  /** Sync every UTC day from `start` to `end` inclusive. A failing day is logged and skipped. */
  async syncDateRange(start: Date, end: Date, signal?: AbortSignal): Promise<DaySyncResult[]> {
    const results: DaySyncResult[] = [];
    const last = startOfUtcDay(end).getTime();
    for (let day = startOfUtcDay(start).getTime(); day <= last; day += DAY_MS) {
      if (signal?.aborted) break;
      const date = new Date(day);
      try {
        results.push(await this.syncDate(date, signal));
      } catch (err) {
        if (signal?.aborted) break;
        this.stats.lastError = errorMessage(err);
        log.error(`Schedule sync for ${utcDay(date)} failed`, err);
      }
    }
    return results;
  }

  async syncDate(date: Date, signal?: AbortSignal): Promise<DaySyncResult> {
    const day = utcDay(date);
    log.info(`Starting NBA schedule sync for ${day}`);
    const schedule = await this.client.getDailySchedule(date, signal);
    const { games, invalid } = parseSchedule(schedule);
    for (const reason of invalid) {
      log.warn(`Skipping malformed game in ${day} schedule: ${reason}`);
    }

    let upserted = 0;
    for (const game of games) {
      if (signal?.aborted) break;
      if (await this.processGame(game)) upserted++;
    }
    log.info(`NBA schedule sync for ${day} completed: ${upserted}/${games.length} game(s)`);
    return { date: day, games: games.length, upserted, invalid: invalid.length };
  }

  /** Upsert one game; failures are logged and the game dropped. */
  async processGame(game: GameUpdate): Promise<boolean> {
    this.stats.received++;
    this.stats.lastRecordAt = new Date();
    try {
      const { created, eventGuid } = await this.sink.upsertEvent(gameEvent(game, this.context));
      this.stats.upserted++;
      log.debug(`${created ? 'Created' : 'Updated'} NBA event ${game.externalGameId} (${eventGuid})`);
      return true;
    } catch (err) {
      this.stats.failed++;
      this.stats.lastError = errorMessage(err);
      log.error(`Failed to upsert NBA game ${game.externalGameId}`, err);
      return false;
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    const today = new Date();
    await this.syncDateRange(today, new Date(today.getTime() + this.config.rangeDays * DAY_MS), signal);

    while (!signal.aborted) {
      try {
        await sleep(this.config.pollIntervalMs, signal);
      } catch (err) {
        if (signal.aborted) return;
        log.error('Poll wait failed', err);
        return;
      }
      try {
        await this.syncToday(signal);
      } catch (err) {
        if (signal.aborted) return;
        this.stats.lastError = errorMessage(err);
        log.error('NBA schedule sync failed', err);
      }
    }
  }
}
