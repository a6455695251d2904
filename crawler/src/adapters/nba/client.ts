import { z } from 'zod';
import type { NbaAdapterConfig } from '../../types/config.js';
import { fetchJson } from '../../util/http.js';
import { createLogger } from '../../util/logger.js';
import { ExponentialStrategy, retry } from '../../util/retry.js';
import { utcDay } from '../../util/timing.js';

const log = createLogger('sportradar');

const seasonSchema = z.object({ id: z.string(), year: z.number().int(), type: z.string() });

export const teamSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  alias: z.string().default(''),
  sr_id: z.string().optional(),
  reference: z.string().optional(),
});

export const gameSchema = z.object({
  id: z.string().min(1),
  status: z.string(),
  scheduled: z.string().default(''),
  home_points: z.number().int().nullish(),
  away_points: z.number().int().nullish(),
  coverage: z.string().default(''),
  track_on_court: z.boolean().default(false),
  sr_id: z.string().default(''),
  reference: z.string().default(''),
  time_zones: z
    .object({ venue: z.string().default(''), home: z.string().default(''), away: z.string().default('') })
    .default({}),
  season: seasonSchema.optional(),
  home: teamSchema,
  away: teamSchema,
});
export type SportradarGame = z.infer<typeof gameSchema>;

export const leagueSchema = z.object({
  id: z.string().default(''),
  name: z.string().default(''),
  alias: z.string().default(''),
  season: seasonSchema.optional(),
});
export type SportradarLeague = z.infer<typeof leagueSchema>;

// Games stay unvalidated here so that one bad entry does not sink the whole day.
const scheduleSchema = z.object({
  date: z.string().optional(),
  league: leagueSchema.default({}),
  games: z.array(z.unknown()).default([]),
});
export type DailySchedule = z.infer<typeof scheduleSchema>;

export type SportradarOptions = Pick<NbaAdapterConfig, 'apiKey' | 'accessLevel' | 'baseUrl' | 'languageCode' | 'requestTimeoutMs' | 'retry'>;

/** Sportradar NBA v8 daily schedule client. */
export class SportradarClient {
  private readonly opts: SportradarOptions;
  private readonly strategy: ExponentialStrategy;

  constructor(opts: SportradarOptions) {
    this.opts = opts;
    this.strategy = new ExponentialStrategy({
      minMs: opts.retry.minMs,
      maxMs: opts.retry.maxMs,
      maxJitterMs: opts.retry.maxJitterMs,
    });
  }

  scheduleUrl(date: Date): string {
    const yyyy = date.getUTCFullYear();
    const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
    const dd = String(date.getUTCDate()).padStart(2, '0');
    const { baseUrl, accessLevel, languageCode } = this.opts;
    return `${baseUrl}/nba/${accessLevel}/v8/${languageCode}/games/${yyyy}/${mm}/${dd}/schedule.json`;
  }

  async getDailySchedule(date: Date, signal?: AbortSignal): Promise<DailySchedule> {
    const url = this.scheduleUrl(date);
    const schedule = await retry(
      () => fetchJson(url, scheduleSchema, {
        headers: { 'x-api-key': this.opts.apiKey },
        timeoutMs: this.opts.requestTimeoutMs,
        signal,
      }),
      {
        attempts: this.opts.retry.attempts,
        strategy: this.strategy,
        signal,
        onRetry: (err, failed, delayMs) =>
          log.warn(`Schedule request failed (attempt ${failed}), retrying in ${delayMs}ms`, err),
      },
    );
    log.info(`Retrieved ${schedule.games.length} game(s) for ${utcDay(date)}`);
    return schedule;
  }
}
