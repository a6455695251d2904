import { NO_TEAM, type EventPatch, type LiveState, type Store, type StoreScope } from '../db/store.js';
import type { FeedContext } from '../types/feed.js';
import { DuplicateKeyError, UpsertTimeoutError } from '../util/errors.js';
import { createLogger } from '../util/logger.js';
import { hrtimeMs, measureMs, withTimeout } from '../util/timing.js';

const log = createLogger('upsert');

export interface PeriodInput {
  code: string;
  scheduled: string;
  remark: string;
}

export interface TeamInput {
  externalId: string;
  name: string;
  alias: string;
}

export interface EventState {
  isLive: LiveState;
  stage: string;
  info: Record<string, unknown>;
  mainScore?: string;
  clusterScore?: string;
  price?: string;
  /** Left untouched on update when absent; `false` on create. */
  isOnline?: boolean;
}

export interface EventUpsert {
  externalId: string;
  context: FeedContext;
  period: PeriodInput;
  /** Home/away sides for team events; crypto events have none. */
  teams?: { main: TeamInput; cluster: TeamInput };
  state: EventState;
  isSports: boolean;
  title: string;
  /** Written only when the event language row is first created. */
  rules: string;
}

export interface UpsertResult {
  eventGuid: string;
  created: boolean;
}

/** Where adapters hand their records. */
export interface EventSink {
  upsertEvent(input: EventUpsert): Promise<UpsertResult>;
}

export interface EventUpserterOptions {
  timeoutMs: number;
}

/**
 * Writes one feed record as an event: period and team references are
 * get-or-created, the event row is inserted or partially updated, and the
 * localized title follows. Everything runs in a single transaction.
 */
export class EventUpserter implements EventSink {
  private readonly store: Store;
  private readonly timeoutMs: number;

  constructor(store: Store, opts: EventUpserterOptions) {
    this.store = store;
    this.timeoutMs = opts.timeoutMs;
  }

  async upsertEvent(input: EventUpsert): Promise<UpsertResult> {
    const start = hrtimeMs();
    const result = await withTimeout(
      this.store.transaction((tx) => this.apply(tx, input)),
      this.timeoutMs,
      () => new UpsertTimeoutError(input.externalId, this.timeoutMs),
    );
    log.debug(`${result.created ? 'Created' : 'Updated'} ${input.externalId} in ${measureMs(start)}ms`);
    return result;
  }

  private async apply(tx: StoreScope, input: EventUpsert): Promise<UpsertResult> {
    const { context, state } = input;
    const periodGuid = await resolvePeriod(tx, input.period);

    let mainTeam = NO_TEAM;
    let clusterTeam = NO_TEAM;
    if (input.teams) {
      mainTeam = await resolveTeam(tx, input.teams.main, context);
      clusterTeam = await resolveTeam(tx, input.teams.cluster, context);
    }

    const existing = await tx.events.getByExternalId(input.externalId);
    if (existing) {
      const patch: EventPatch = {
        eventPeriodGuid: periodGuid,
        isLive: state.isLive,
        stage: state.stage,
        info: state.info,
        updatedAt: new Date(),
      };
      if (state.mainScore !== undefined) patch.mainScore = state.mainScore;
      if (state.clusterScore !== undefined) patch.clusterScore = state.clusterScore;
      if (state.price !== undefined) patch.price = state.price;
      if (state.isOnline !== undefined) patch.isOnline = state.isOnline;
      if (input.teams) {
        patch.mainTeamGroupGuid = mainTeam;
        patch.clusterTeamGroupGuid = clusterTeam;
      }
      await tx.events.updateFields(existing.guid, patch);

      const lang = await tx.events.getLanguage(existing.guid, context.languageGuid);
      if (!lang) {
        await tx.events.createLanguage({
          eventGuid: existing.guid,
          languageGuid: context.languageGuid,
          title: input.title,
          rules: '',
        });
      } else if (lang.title !== input.title) {
        await tx.events.updateLanguageTitle(lang.guid, input.title);
      }
      return { eventGuid: existing.guid, created: false };
    }

    await tx.events.create({
      categoryGuid: context.categoryGuid,
      ecosystemGuid: context.ecosystemGuid,
      eventPeriodGuid: periodGuid,
      mainTeamGroupGuid: mainTeam,
      clusterTeamGroupGuid: clusterTeam,
      externalId: input.externalId,
      mainScore: state.mainScore ?? '0',
      clusterScore: state.clusterScore ?? '0',
      price: state.price ?? '0',
      info: state.info,
      isOnline: state.isOnline ?? false,
      isLive: state.isLive,
      isSports: input.isSports,
      stage: state.stage,
    });

    // The guid is generated by the database.
    const created = await tx.events.getByExternalId(input.externalId);
    if (!created) throw new Error(`event ${input.externalId} missing right after insert`);

    await tx.events.createLanguage({
      eventGuid: created.guid,
      languageGuid: context.languageGuid,
      title: input.title,
      rules: input.rules,
    });
    return { eventGuid: created.guid, created: true };
  }
}

async function resolvePeriod(tx: StoreScope, period: PeriodInput): Promise<string> {
  const found = await tx.periods.getByCode(period.code);
  if (found) return found.guid;

  await ignoreDuplicate(() => tx.periods.create(period));
  const row = await tx.periods.getByCode(period.code);
  if (!row) throw new Error(`event period ${period.code} missing after create`);
  return row.guid;
}

async function resolveTeam(tx: StoreScope, team: TeamInput, context: FeedContext): Promise<string> {
  const found = await tx.teams.getByExternalId(team.externalId, context.ecosystemGuid);
  if (found) return found.guid;

  const inserted = await ignoreDuplicate(() =>
    tx.teams.create({ ecosystemGuid: context.ecosystemGuid, externalId: team.externalId, logo: '' }));
  const row = await tx.teams.getByExternalId(team.externalId, context.ecosystemGuid);
  if (!row) throw new Error(`team ${team.externalId} missing after create`);

  // Whoever inserted the team also writes its name.
  if (inserted) {
    await tx.teams.createLanguage({
      teamGroupGuid: row.guid,
      languageGuid: context.languageGuid,
      name: team.name,
      alias: team.alias,
    });
  }
  return row.guid;
}

/** Runs a get-or-create insert; losing the race to another writer resolves `false`. */
async function ignoreDuplicate(create: () => Promise<boolean>): Promise<boolean> {
  try {
    return await create();
  } catch (err) {
    if (err instanceof DuplicateKeyError) {
      log.debug(`Lost create race, re-reading: ${err.message}`);
      return false;
    }
    throw err;
  }
}
