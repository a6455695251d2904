import pg from 'pg';
import { drizzle, type NodePgQueryResultHKT } from 'drizzle-orm/node-postgres';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { and, eq } from 'drizzle-orm';
import {
  category,
  ecosystem,
  event,
  eventLanguage,
  eventPeriod,
  languages,
  teamGroup,
  teamGroupLanguage,
} from './schema.js';
import type {
  CatalogRepository,
  CodedRecord,
  EventLanguageRecord,
  EventPatch,
  EventPeriodRecord,
  EventPeriodRepository,
  EventRecord,
  EventRepository,
  LanguageRecord,
  NewEvent,
  NewEventLanguage,
  NewEventPeriod,
  NewTeamGroup,
  NewTeamGroupLanguage,
  Store,
  StoreScope,
  TeamGroupRecord,
  TeamGroupRepository,
} from './store.js';
import { DuplicateKeyError } from '../util/errors.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('db');

/** A pooled connection or an open transaction; both expose the same query builder. */
type Executor = PgDatabase<NodePgQueryResultHKT>;

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('code' in err && err.code === UNIQUE_VIOLATION) return true;
  return 'cause' in err && isUniqueViolation(err.cause);
}

async function insertOrDuplicate(entity: string, key: string, insert: () => Promise<unknown>): Promise<void> {
  try {
    await insert();
  } catch (err) {
    if (isUniqueViolation(err)) throw new DuplicateKeyError(entity, key, { cause: err });
    throw err;
  }
}

class PgEventRepository implements EventRepository {
  constructor(private readonly db: Executor) {}

  async getByExternalId(externalId: string): Promise<EventRecord | null> {
    const rows = await this.db.select().from(event).where(eq(event.externalId, externalId)).limit(1);
    return rows[0] ?? null;
  }

  async create(row: NewEvent): Promise<void> {
    await insertOrDuplicate('event', row.externalId, () => this.db.insert(event).values(row));
  }

  async updateFields(guid: string, patch: EventPatch): Promise<void> {
    await this.db.update(event).set(patch).where(eq(event.guid, guid));
  }

  async getLanguage(eventGuid: string, languageGuid: string): Promise<EventLanguageRecord | null> {
    const rows = await this.db
      .select()
      .from(eventLanguage)
      .where(and(eq(eventLanguage.eventGuid, eventGuid), eq(eventLanguage.languageGuid, languageGuid)))
      .limit(1);
    return rows[0] ?? null;
  }

  async createLanguage(row: NewEventLanguage): Promise<void> {
    await insertOrDuplicate('event_language', `${row.eventGuid}/${row.languageGuid}`, () =>
      this.db.insert(eventLanguage).values(row));
  }

  async updateLanguageTitle(guid: string, title: string): Promise<void> {
    await this.db.update(eventLanguage).set({ title, updatedAt: new Date() }).where(eq(eventLanguage.guid, guid));
  }
}

class PgEventPeriodRepository implements EventPeriodRepository {
  constructor(private readonly db: Executor) {}

  async getByCode(code: string): Promise<EventPeriodRecord | null> {
    const rows = await this.db
      .select({
        guid: eventPeriod.guid,
        code: eventPeriod.code,
        isActive: eventPeriod.isActive,
        scheduled: eventPeriod.scheduled,
        remark: eventPeriod.remark,
      })
      .from(eventPeriod)
      .where(eq(eventPeriod.code, code))
      .limit(1);
    return rows[0] ?? null;
  }

  // ON CONFLICT waits for a concurrent inserter of the same code to commit, then skips.
  async create(row: NewEventPeriod): Promise<boolean> {
    const inserted = await this.db
      .insert(eventPeriod)
      .values({ ...row, isActive: true, extra: {} })
      .onConflictDoNothing({ target: eventPeriod.code })
      .returning({ guid: eventPeriod.guid });
    return inserted.length > 0;
  }
}

class PgTeamGroupRepository implements TeamGroupRepository {
  constructor(private readonly db: Executor) {}

  async getByExternalId(externalId: string, ecosystemGuid: string): Promise<TeamGroupRecord | null> {
    const rows = await this.db
      .select({
        guid: teamGroup.guid,
        ecosystemGuid: teamGroup.ecosystemGuid,
        externalId: teamGroup.externalId,
        logo: teamGroup.logo,
      })
      .from(teamGroup)
      .where(and(eq(teamGroup.externalId, externalId), eq(teamGroup.ecosystemGuid, ecosystemGuid)))
      .limit(1);
    return rows[0] ?? null;
  }

  async create(row: NewTeamGroup): Promise<boolean> {
    const inserted = await this.db
      .insert(teamGroup)
      .values(row)
      .onConflictDoNothing({ target: [teamGroup.externalId, teamGroup.ecosystemGuid] })
      .returning({ guid: teamGroup.guid });
    return inserted.length > 0;
  }

  async createLanguage(row: NewTeamGroupLanguage): Promise<void> {
    await insertOrDuplicate('team_group_language', `${row.teamGroupGuid}/${row.languageGuid}`, () =>
      this.db.insert(teamGroupLanguage).values(row));
  }
}

class PgCatalogRepository implements CatalogRepository {
  constructor(private readonly db: Executor) {}

  async getCategoryByCode(code: string): Promise<CodedRecord | null> {
    const rows = await this.db
      .select({ guid: category.guid, code: category.code })
      .from(category)
      .where(eq(category.code, code))
      .limit(1);
    return rows[0] ?? null;
  }

  async getEcosystemByCode(code: string): Promise<CodedRecord | null> {
    const rows = await this.db
      .select({ guid: ecosystem.guid, code: ecosystem.code })
      .from(ecosystem)
      .where(eq(ecosystem.code, code))
      .limit(1);
    return rows[0] ?? null;
  }

  async listLanguages(): Promise<LanguageRecord[]> {
    return this.db
      .select({ guid: languages.guid, languageName: languages.languageName, isDefault: languages.isDefault })
      .from(languages)
      .where(eq(languages.isActive, true));
  }
}

function scope(db: Executor): StoreScope {
  return {
    events: new PgEventRepository(db),
    periods: new PgEventPeriodRepository(db),
    teams: new PgTeamGroupRepository(db),
    catalog: new PgCatalogRepository(db),
  };
}

export interface PgStoreOptions {
  connectionString: string;
  maxConnections: number;
}

export class PgStore implements Store {
  readonly events: EventRepository;
  readonly periods: EventPeriodRepository;
  readonly teams: TeamGroupRepository;
  readonly catalog: CatalogRepository;
  private readonly pool: pg.Pool;
  private readonly db: Executor;

  constructor(opts: PgStoreOptions) {
    this.pool = new pg.Pool({ connectionString: opts.connectionString, max: opts.maxConnections });
    // Idle clients can fail (server restart); without a listener the pool would crash the process.
    this.pool.on('error', (err) => log.error('Idle database client error', err));
    this.db = drizzle(this.pool);
    const root = scope(this.db);
    this.events = root.events;
    this.periods = root.periods;
    this.teams = root.teams;
    this.catalog = root.catalog;
  }

  transaction<T>(fn: (tx: StoreScope) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) => fn(scope(tx)));
  }

  async ping(): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query('SELECT 1');
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    log.info('Database pool closed');
  }
}
