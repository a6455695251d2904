import type { CatalogRepository } from '../db/store.js';
import type { FeedRefsConfig } from '../types/config.js';
import type { FeedContext } from '../types/feed.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('feed-refs');

const FALLBACK_LANGUAGE = 'en';

/** The `is_default` active language, else English. */
export async function resolveDefaultLanguage(catalog: CatalogRepository, override?: string): Promise<string> {
  if (override) return override;
  const languages = await catalog.listLanguages();
  const lang = languages.find((l) => l.isDefault) ?? languages.find((l) => l.languageName === FALLBACK_LANGUAGE);
  if (!lang) throw new Error('No default language found (set DEFAULT_LANGUAGE_GUID or mark one language as default)');
  log.info(`Default language: ${lang.languageName} (${lang.guid})`);
  return lang.guid;
}

/** Look up category and ecosystem GUIDs by code unless configured explicitly. */
export async function resolveFeedContext(
  catalog: CatalogRepository,
  refs: FeedRefsConfig,
  languageGuid: string,
): Promise<FeedContext> {
  let categoryGuid = refs.categoryGuid;
  if (!categoryGuid) {
    const row = await catalog.getCategoryByCode(refs.categoryCode);
    if (!row) throw new Error(`Category "${refs.categoryCode}" not found`);
    categoryGuid = row.guid;
  }

  let ecosystemGuid = refs.ecosystemGuid;
  if (!ecosystemGuid) {
    const row = await catalog.getEcosystemByCode(refs.ecosystemCode);
    if (!row) throw new Error(`Ecosystem "${refs.ecosystemCode}" not found`);
    ecosystemGuid = row.guid;
  }

  log.debug(`${refs.categoryCode}/${refs.ecosystemCode} -> ${categoryGuid}/${ecosystemGuid}`);
  return { categoryGuid, ecosystemGuid, languageGuid };
}
