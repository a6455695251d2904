/**
 * Data-access surface the crawler needs from the relational store. Lookups
 * resolve to `null` when the row is absent; only real failures reject.
 */

/** `event.is_live` values. */
export const LiveState = {
  IN_PROGRESS: 0,
  SCHEDULED: 1,
  FINISHED: 2,
} as const;
export type LiveState = (typeof LiveState)[keyof typeof LiveState];

/** Team reference used by events that have no sides (crypto prices). */
export const NO_TEAM = '0';

export interface EventRecord {
  guid: string;
  categoryGuid: string;
  ecosystemGuid: string;
  eventPeriodGuid: string;
  mainTeamGroupGuid: string;
  clusterTeamGroupGuid: string;
  externalId: string;
  mainScore: string;
  clusterScore: string;
  price: string;
  info: Record<string, unknown>;
  isOnline: boolean;
  isLive: number;
  isSports: boolean;
  stage: string;
  createdAt: Date | null;
  updatedAt: Date | null;
}

export type NewEvent = Omit<EventRecord, 'guid' | 'createdAt' | 'updatedAt'>;

export type EventPatch = Partial<Pick<EventRecord,
  | 'eventPeriodGuid'
  | 'mainTeamGroupGuid'
  | 'clusterTeamGroupGuid'
  | 'mainScore'
  | 'clusterScore'
  | 'price'
  | 'info'
  | 'isOnline'
  | 'isLive'
  | 'stage'
  | 'updatedAt'
>>;

export interface EventLanguageRecord {
  guid: string;
  eventGuid: string;
  languageGuid: string;
  title: string;
  rules: string;
}

export type NewEventLanguage = Omit<EventLanguageRecord, 'guid'>;

export interface EventPeriodRecord {
  guid: string;
  code: string;
  isActive: boolean;
  scheduled: string | null;
  remark: string | null;
}

export interface NewEventPeriod {
  code: string;
  scheduled: string;
  remark: string;
}

export interface TeamGroupRecord {
  guid: string;
  ecosystemGuid: string;
  externalId: string;
  logo: string;
}

export type NewTeamGroup = Omit<TeamGroupRecord, 'guid'>;

export interface NewTeamGroupLanguage {
  teamGroupGuid: string;
  languageGuid: string;
  name: string;
  alias: string;
}

export interface CodedRecord {
  guid: string;
  code: string;
}

export interface LanguageRecord {
  guid: string;
  languageName: string;
  isDefault: boolean;
}

export interface EventRepository {
  getByExternalId(externalId: string): Promise<EventRecord | null>;
  create(row: NewEvent): Promise<void>;
  updateFields(guid: string, patch: EventPatch): Promise<void>;
  getLanguage(eventGuid: string, languageGuid: string): Promise<EventLanguageRecord | null>;
  createLanguage(row: NewEventLanguage): Promise<void>;
  updateLanguageTitle(guid: string, title: string): Promise<void>;
}

export interface EventPeriodRepository {
  getByCode(code: string): Promise<EventPeriodRecord | null>;
  /**
   * Resolves `true` when a row was inserted. Creating a code that already exists
   * either resolves `false` or rejects with `DuplicateKeyError`; callers re-read
   * by code afterwards.
   */
  create(row: NewEventPeriod): Promise<boolean>;
}

export interface TeamGroupRepository {
  getByExternalId(externalId: string, ecosystemGuid: string): Promise<TeamGroupRecord | null>;
  /** Same conflict contract as `EventPeriodRepository.create`, keyed by (externalId, ecosystemGuid). */
  create(row: NewTeamGroup): Promise<boolean>;
  createLanguage(row: NewTeamGroupLanguage): Promise<void>;
}

export interface CatalogRepository {
  getCategoryByCode(code: string): Promise<CodedRecord | null>;
  getEcosystemByCode(code: string): Promise<CodedRecord | null>;
  listLanguages(): Promise<LanguageRecord[]>;
}

/** Repositories bound to one connection or one open transaction. */
export interface StoreScope {
  events: EventRepository;
  periods: EventPeriodRepository;
  teams: TeamGroupRepository;
  catalog: CatalogRepository;
}

export interface Store extends StoreScope {
  /** Run `fn` in one transaction: commit when it resolves, roll back when it rejects. */
  transaction<T>(fn: (tx: StoreScope) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
