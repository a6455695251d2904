import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { CrawlerStatusRow, StatusSink } from './reporter.js';
import type { SupabaseConfig } from '../types/config.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('supabase');

/** Upserts adapter health rows keyed by `source_id`. */
export class SupabaseStatusSink implements StatusSink {
  private readonly client: SupabaseClient;
  private readonly table: string;

  constructor(config: SupabaseConfig, client?: SupabaseClient) {
    this.client = client ?? createClient(config.url, config.serviceKey, { auth: { persistSession: false } });
    this.table = config.table;
    log.info('Supabase client initialized');
  }

  async write(rows: CrawlerStatusRow[]): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert(rows, { onConflict: 'source_id' });
    if (error) throw new Error(`upsert ${this.table} failed: ${error.message}`);
  }
}
