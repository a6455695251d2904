import { gameSchema, type DailySchedule, type SportradarGame, type SportradarLeague } from './client.js';
import type { EventUpsert } from '../../core/event-upserter.js';
import { LiveState } from '../../db/store.js';
import type { FeedContext, GameStatus, GameUpdate, SeasonInfo } from '../../types/feed.js';
import { utcDateTime } from '../../util/timing.js';

const FALLBACK_SEASON: SeasonInfo = { id: '', year: 0, type: 'REG' };

const STATUS_MAP: Record<GameStatus, { isLive: LiveState; stage: string }> = {
  scheduled: { isLive: LiveState.SCHEDULED, stage: 'Q1' },
  inprogress: { isLive: LiveState.IN_PROGRESS, stage: 'Q1' },
  closed: { isLive: LiveState.FINISHED, stage: 'FT' },
};

function isGameStatus(status: string): status is GameStatus {
  return Object.hasOwn(STATUS_MAP, status);
}

/** Provider status to live state; anything unrecognized counts as scheduled. */
export function mapGameStatus(status: string): { isLive: LiveState; stage: string } {
  return isGameStatus(status) ? STATUS_MAP[status] : STATUS_MAP.scheduled;
}

function parseScheduled(value: string): Date | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : new Date(ms);
}

export function toGameUpdate(game: SportradarGame, league: SportradarLeague): GameUpdate {
  return {
    externalGameId: game.id,
    status: game.status,
    scheduledTime: parseScheduled(game.scheduled),
    homeTeam: { id: game.home.id, name: game.home.name, alias: game.home.alias },
    awayTeam: { id: game.away.id, name: game.away.name, alias: game.away.alias },
    homeScore: game.home_points ?? undefined,
    awayScore: game.away_points ?? undefined,
    seasonInfo: game.season ?? league.season ?? FALLBACK_SEASON,
    rawPayload: {
      external_id: game.id,
      game_id: game.id,
      sr_id: game.sr_id,
      reference: game.reference,
      coverage: game.coverage,
      track_on_court: game.track_on_court,
      league_id: league.id,
      league_name: league.name,
      scheduled: game.scheduled,
      time_zones: game.time_zones,
      status: game.status,
    },
  };
}

/** Validate every game of a day; entries that fail are reported back, not thrown. */
export function parseSchedule(schedule: DailySchedule): { games: GameUpdate[]; invalid: string[] } {
  const games: GameUpdate[] = [];
  const invalid: string[] = [];
  schedule.games.forEach((raw, index) => {
    const parsed = gameSchema.safeParse(raw);
    if (parsed.success) {
      games.push(toGameUpdate(parsed.data, schedule.league));
    } else {
      invalid.push(`#${index}: ${parsed.error.issues[0]?.path.join('.') ?? ''} ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
  });
  return { games, invalid };
}

function seasonLabel(type: string): string {
  return type.trim() || 'REG';
}

export function gameEvent(game: GameUpdate, context: FeedContext): EventUpsert {
  const { isLive, stage } = mapGameStatus(game.status);
  const scheduled = game.scheduledTime ? utcDateTime(game.scheduledTime) : '';
  const home = game.homeTeam.name;
  const away = game.awayTeam.name;

  return {
    externalId: game.externalGameId,
    context,
    period: {
      code: game.externalGameId,
      scheduled,
      remark: `NBA game date: ${scheduled}`,
    },
    teams: {
      main: { externalId: game.homeTeam.id, name: home, alias: game.homeTeam.alias },
      cluster: { externalId: game.awayTeam.id, name: away, alias: game.awayTeam.alias },
    },
    state: {
      mainScore: String(game.homeScore ?? 0),
      clusterScore: String(game.awayScore ?? 0),
      isLive,
      stage,
      // Finished games become visible with their result.
      isOnline: game.status === 'closed' ? true : undefined,
      info: {
        ...game.rawPayload,
        season_id: game.seasonInfo.id,
        season_year: game.seasonInfo.year,
        season_type: game.seasonInfo.type,
        open_time: scheduled,
      },
    },
    isSports: true,
    title: `${home} vs ${away}`,
    rules: `NBA ${seasonLabel(game.seasonInfo.type)} season game. Home: ${home}, Away: ${away}.`,
  };
}
