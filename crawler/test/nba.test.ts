import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NbaAdapter } from '../src/adapters/nba/index.js';
import { SportradarClient, type DailySchedule } from '../src/adapters/nba/client.js';
import { gameEvent, mapGameStatus, parseSchedule } from '../src/adapters/nba/normalizer.js';
import { EventUpserter } from '../src/core/event-upserter.js';
import type { NbaAdapterConfig } from '../src/types/config.js';
import type { GameUpdate } from '../src/types/feed.js';
import { RetryError, TerminalError } from '../src/util/errors.js';
import { MemoryStore } from './support/memory-store.js';
import { FAST_RETRY, NBA_CONTEXT, jsonResponse } from './support/fixtures.js';

const CONFIG: NbaAdapterConfig = {
  enabled: true,
  apiKey: 'test-secret',
  accessLevel: 'trial',
  baseUrl: 'https://api.sportradar.test',
  languageCode: 'en',
  pollIntervalMs: 60_000,
  rangeDays: 0,
  requestTimeoutMs: 1_000,
  retry: FAST_RETRY,
  refs: { categoryCode: 'SPORT', ecosystemCode: 'NBA' },
};

function game(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'game123',
    status: 'scheduled',
    scheduled: '2026-01-15T00:30:00+00:00',
    coverage: 'full',
    track_on_court: true,
    sr_id: 'sr:match:1',
    reference: '0022500001',
    time_zones: { venue: 'US/Pacific', home: 'US/Pacific', away: 'US/Eastern' },
    season: { id: 'season-1', year: 2025, type: 'REG' },
    home: { id: 'team-lal', name: 'Lakers', alias: 'LAL' },
    away: { id: 'team-bos', name: 'Celtics', alias: 'BOS' },
    ...overrides,
  };
}

function schedule(games: unknown[]): DailySchedule {
  return { date: '2026-01-15', league: { id: 'league-nba', name: 'NBA', alias: 'NBA' }, games };
}

function update(overrides: Record<string, unknown> = {}): GameUpdate {
  const [parsed] = parseSchedule(schedule([game(overrides)])).games;
  if (!parsed) throw new Error('fixture game failed validation');
  return parsed;
}

describe('mapGameStatus', () => {
  it.each([
    { status: 'scheduled', isLive: 1, stage: 'Q1' },
    { status: 'inprogress', isLive: 0, stage: 'Q1' },
    { status: 'closed', isLive: 2, stage: 'FT' },
    { status: 'postponed', isLive: 1, stage: 'Q1' },
    { status: 'toString', isLive: 1, stage: 'Q1' },
  ])('$status -> isLive=$isLive stage=$stage', ({ status, isLive, stage }) => {
    expect(mapGameStatus(status)).toEqual({ isLive, stage });
  });
});

describe('parseSchedule', () => {
  it('skips games that fail validation', () => {
    const { games, invalid } = parseSchedule(schedule([game(), { id: 'broken', status: 'scheduled' }]));
    expect(games.map((g) => g.externalGameId)).toEqual(['game123']);
    expect(invalid).toHaveLength(1);
    expect(invalid[0]).toMatch(/^#1: home /);
  });

  it('keeps the audit fields of the upstream game', () => {
    const g = update({ home_points: 10, away_points: 12 });
    expect(g.scheduledTime?.toISOString()).toBe('2026-01-15T00:30:00.000Z');
    expect(g.homeScore).toBe(10);
    expect(g.awayScore).toBe(12);
    expect(g.seasonInfo).toEqual({ id: 'season-1', year: 2025, type: 'REG' });
    expect(g.rawPayload).toMatchObject({
      sr_id: 'sr:match:1',
      league_id: 'league-nba',
      league_name: 'NBA',
      track_on_court: true,
      time_zones: { venue: 'US/Pacific', home: 'US/Pacific', away: 'US/Eastern' },
    });
  });
});

describe('gameEvent', () => {
  it('builds the sports event input', () => {
    const input = gameEvent(update(), NBA_CONTEXT);

    expect(input.externalId).toBe('game123');
    expect(input.period).toEqual({
      code: 'game123',
      scheduled: '2026-01-15 00:30:00',
      remark: 'NBA game date: 2026-01-15 00:30:00',
    });
    expect(input.teams).toEqual({
      main: { externalId: 'team-lal', name: 'Lakers', alias: 'LAL' },
      cluster: { externalId: 'team-bos', name: 'Celtics', alias: 'BOS' },
    });
    expect(input.title).toBe('Lakers vs Celtics');
    expect(input.rules).toBe('NBA REG season game. Home: Lakers, Away: Celtics.');
    expect(input.isSports).toBe(true);
    expect(input.state).toMatchObject({ mainScore: '0', clusterScore: '0', isLive: 1, stage: 'Q1' });
    expect(input.state.isOnline).toBeUndefined();
    expect(input.state.info).toMatchObject({ open_time: '2026-01-15 00:30:00', season_year: 2025 });
  });

  it('marks closed games online', () => {
    const input = gameEvent(update({ status: 'closed', home_points: 102, away_points: 98 }), NBA_CONTEXT);
    expect(input.state).toMatchObject({ mainScore: '102', clusterScore: '98', isLive: 2, stage: 'FT', isOnline: true });
  });
});

describe('NbaAdapter', () => {
  let store: MemoryStore;
  let client: SportradarClient;
  let adapter: NbaAdapter;

  beforeEach(() => {
    store = new MemoryStore();
    client = new SportradarClient(CONFIG);
    adapter = new NbaAdapter(CONFIG, NBA_CONTEXT, new EventUpserter(store, { timeoutMs: 1_000 }), client);
  });

  afterEach(async () => {
    await adapter.stop();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it('moves a game from scheduled to closed on one event row', async () => {
    expect(await adapter.processGame(update())).toBe(true);

    let event = store.eventByExternalId('game123');
    expect(event).toMatchObject({ isLive: 1, stage: 'Q1', mainScore: '0', clusterScore: '0', isOnline: false, isSports: true });
    expect(store.tables.teams).toHaveLength(2);
    expect(store.tables.teamLanguages.map((t) => `${t.name}/${t.alias}`).sort()).toEqual(['Celtics/BOS', 'Lakers/LAL']);
    const home = store.tables.teams.find((t) => t.externalId === 'team-lal');
    expect(event?.mainTeamGroupGuid).toBe(home?.guid);

    expect(await adapter.processGame(update({ status: 'closed', home_points: 102, away_points: 98 }))).toBe(true);

    event = store.eventByExternalId('game123');
    expect(store.tables.events).toHaveLength(1);
    expect(event).toMatchObject({ isLive: 2, stage: 'FT', mainScore: '102', clusterScore: '98', isOnline: true });
    expect(store.tables.teams).toHaveLength(2);
    expect(store.tables.teamLanguages).toHaveLength(2);
    expect(store.tables.periods.map((p) => p.code)).toEqual(['game123']);
  });

  it('closes a game that was in progress', async () => {
    await adapter.processGame(update({ status: 'inprogress', home_points: 50, away_points: 48 }));
    expect(store.eventByExternalId('game123')).toMatchObject({ isLive: 0, isOnline: false });

    await adapter.processGame(update({ status: 'closed', home_points: 101, away_points: 99 }));
    expect(store.eventByExternalId('game123')).toMatchObject({ isLive: 2, isOnline: true, mainScore: '101' });
  });

  it('counts a failed upsert and drops the game', async () => {
    vi.spyOn(store.events, 'create').mockRejectedValueOnce(new Error('constraint'));

    expect(await adapter.processGame(update())).toBe(false);
    expect(adapter.getStats()).toMatchObject({ received: 1, upserted: 0, failed: 1, lastError: 'constraint' });
    expect(store.tables.teams).toHaveLength(0);
  });

  it('fetches the daily schedule with the API key', async () => {
    const fetchMock = vi.fn(async (_url: string | URL | Request, _init?: RequestInit) =>
      jsonResponse(schedule([game(), { id: 'broken' }])));
    vi.stubGlobal('fetch', fetchMock);

    const result = await adapter.syncDate(new Date('2026-01-15T18:00:00Z'));

    expect(result).toEqual({ date: '2026-01-15', games: 1, upserted: 1, invalid: 1 });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://api.sportradar.test/nba/trial/v8/en/games/2026/01/15/schedule.json');
    expect(init?.headers).toEqual({ accept: 'application/json', 'x-api-key': 'test-secret' });
  });

  it('does not retry a rejected API key', async () => {
    const fetchMock = vi.fn(async () => new Response('{"message":"Unauthorized"}', { status: 401 }));
    vi.stubGlobal('fetch', fetchMock);

    const err = await adapter.syncDate(new Date('2026-01-15T00:00:00Z')).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(RetryError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('retries server errors', async () => {
    const fetchMock = vi.fn(async () => new Response('busy', { status: 503 }));
    fetchMock.mockImplementationOnce(async () => new Response('busy', { status: 503 }));
    fetchMock.mockImplementationOnce(async () => new Response('busy', { status: 502 }));
    fetchMock.mockImplementationOnce(async () => jsonResponse(schedule([game()])));
    vi.stubGlobal('fetch', fetchMock);

    const result = await adapter.syncDate(new Date('2026-01-15T00:00:00Z'));
    expect(result.upserted).toBe(1);
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('keeps walking the date range past a failing day', async () => {
    const getSchedule = vi.spyOn(client, 'getDailySchedule')
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(schedule([game({ id: 'game456' })]));

    const results = await adapter.syncDateRange(new Date('2026-01-15T10:00:00Z'), new Date('2026-01-16T10:00:00Z'));

    expect(getSchedule).toHaveBeenCalledTimes(2);
    expect(getSchedule.mock.calls.map(([d]) => d.toISOString())).toEqual([
      '2026-01-15T00:00:00.000Z',
      '2026-01-16T00:00:00.000Z',
    ]);
    expect(results).toEqual([{ date: '2026-01-16', games: 1, upserted: 1, invalid: 0 }]);
    expect(store.eventByExternalId('game456')).toBeDefined();
  });

  it('syncs immediately on start and stops cleanly', async () => {
    vi.spyOn(client, 'getDailySchedule').mockResolvedValue(schedule([game()]));
    const controller = new AbortController();

    await adapter.start(controller.signal);
    expect(adapter.getStatus()).toBe('polling');
    await vi.waitFor(() => expect(store.eventByExternalId('game123')).toBeDefined());

    await adapter.stop();
    expect(adapter.getStatus()).toBe('stopped');
  });

  it('refuses to start without an API key', async () => {
    const keyless = new NbaAdapter({ ...CONFIG, apiKey: '' }, NBA_CONTEXT, new EventUpserter(store, { timeoutMs: 1_000 }));
    await expect(keyless.start(new AbortController().signal)).rejects.toBeInstanceOf(TerminalError);
  });
});
