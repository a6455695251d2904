/**
 * Drizzle table definitions for the shared event schema.
 * GUID defaults and unique indexes live in sql/schema.sql; the crawler only reads
 * the generated values back.
 */
import {
  pgTable,
  text,
  varchar,
  boolean,
  smallint,
  jsonb,
  numeric,
  timestamp,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

const guid = () => text('guid').primaryKey().default(sql`replace(uuid_generate_v4()::text, '-', '')`);
const createdAt = () => timestamp('created_at', { precision: 0 }).defaultNow();
const updatedAt = () => timestamp('updated_at', { precision: 0 }).defaultNow();

export const languages = pgTable('languages', {
  guid: guid(),
  languageName: varchar('language_name', { length: 20 }).notNull(),
  languageLabel: varchar('language_label', { length: 50 }),
  isDefault: boolean('is_default').notNull().default(false),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const category = pgTable('category', {
  guid: guid(),
  code: varchar('code', { length: 64 }).notNull(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const ecosystem = pgTable('ecosystem', {
  guid: guid(),
  categoryGuid: varchar('category_guid', { length: 500 }),
  code: varchar('code', { length: 64 }).notNull(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const eventPeriod = pgTable('event_period', {
  guid: guid(),
  code: varchar('code', { length: 64 }).notNull(),
  isActive: boolean('is_active').notNull().default(true),
  scheduled: varchar('scheduled', { length: 64 }),
  remark: varchar('remark', { length: 200 }),
  extra: jsonb('extra').$type<Record<string, unknown>>(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const teamGroup = pgTable('team_group', {
  guid: guid(),
  ecosystemGuid: varchar('ecosystem_guid', { length: 255 }).notNull(),
  externalId: varchar('external_id', { length: 255 }).notNull(),
  logo: varchar('logo', { length: 255 }).notNull().default(''),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const teamGroupLanguage = pgTable('team_group_language', {
  guid: guid(),
  languageGuid: varchar('language_guid', { length: 255 }).notNull(),
  teamGroupGuid: varchar('team_group_guid', { length: 255 }).notNull(),
  name: varchar('name', { length: 255 }).notNull(),
  alias: varchar('alias', { length: 255 }).notNull(),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const event = pgTable('event', {
  guid: guid(),
  categoryGuid: varchar('category_guid', { length: 500 }).notNull(),
  ecosystemGuid: varchar('ecosystem_guid', { length: 500 }).notNull(),
  eventPeriodGuid: varchar('event_period_guid', { length: 500 }).notNull(),
  mainTeamGroupGuid: varchar('main_team_group_guid', { length: 255 }).notNull().default('0'),
  clusterTeamGroupGuid: varchar('cluster_team_group_guid', { length: 255 }).notNull().default('0'),
  externalId: varchar('external_id', { length: 255 }).notNull(),
  mainScore: numeric('main_score').notNull().default('0'),
  clusterScore: numeric('cluster_score').notNull().default('0'),
  price: varchar('price', { length: 255 }).notNull().default('0'),
  logo: varchar('logo', { length: 500 }).notNull().default(''),
  eventType: smallint('event_type').notNull().default(0),
  experimentResult: text('experiment_result').notNull().default(''),
  info: jsonb('info').$type<Record<string, unknown>>().notNull().default({}),
  isOnline: boolean('is_online').notNull().default(false),
  isLive: smallint('is_live').notNull().default(0),
  isSports: boolean('is_sports').notNull().default(true),
  stage: varchar('stage', { length: 20 }).notNull().default('Q1'),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

export const eventLanguage = pgTable('event_language', {
  guid: guid(),
  eventGuid: varchar('event_guid', { length: 500 }).notNull(),
  languageGuid: varchar('language_guid', { length: 500 }).notNull(),
  title: varchar('title', { length: 200 }).notNull(),
  rules: text('rules').notNull().default(''),
  createdAt: createdAt(),
  updatedAt: updatedAt(),
});

