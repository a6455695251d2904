import { describe, it, expect, beforeEach, vi } from 'vitest';
import { resolveDefaultLanguage, resolveFeedContext } from '../src/core/feed-refs.js';
import { MemoryStore } from './support/memory-store.js';

describe('feed references', () => {
  let store: MemoryStore;

  beforeEach(() => {
    store = new MemoryStore();
  });

  describe('resolveDefaultLanguage', () => {
    it('prefers the language marked default', async () => {
      store.seedCatalog({
        languages: [
          { guid: 'lang-en', languageName: 'en', isDefault: false },
          { guid: 'lang-zh', languageName: 'zh', isDefault: true },
        ],
      });
      expect(await resolveDefaultLanguage(store.catalog)).toBe('lang-zh');
    });

    it('falls back to English', async () => {
      store.seedCatalog({
        languages: [
          { guid: 'lang-ko', languageName: 'ko', isDefault: false },
          { guid: 'lang-en', languageName: 'en', isDefault: false },
        ],
      });
      expect(await resolveDefaultLanguage(store.catalog)).toBe('lang-en');
    });

    it('uses the configured language without a lookup', async () => {
      const list = vi.spyOn(store.catalog, 'listLanguages');
      expect(await resolveDefaultLanguage(store.catalog, 'lang-configured')).toBe('lang-configured');
      expect(list).not.toHaveBeenCalled();
    });

    it('fails when no language qualifies', async () => {
      store.seedCatalog({ languages: [{ guid: 'lang-ko', languageName: 'ko', isDefault: false }] });
      await expect(resolveDefaultLanguage(store.catalog)).rejects.toThrow(/^No default language found/);
    });
  });

  describe('resolveFeedContext', () => {
    beforeEach(() => {
      store.seedCatalog({
        categories: [{ guid: 'cat-crypto', code: 'CRYPTO' }],
        ecosystems: [{ guid: 'eco-okx', code: 'OKX' }],
      });
    });

    it('looks up category and ecosystem by code', async () => {
      const context = await resolveFeedContext(store.catalog, { categoryCode: 'CRYPTO', ecosystemCode: 'OKX' }, 'lang-en');
      expect(context).toEqual({ categoryGuid: 'cat-crypto', ecosystemGuid: 'eco-okx', languageGuid: 'lang-en' });
    });

    it('keeps configured guids', async () => {
      const context = await resolveFeedContext(
        store.catalog,
        { categoryCode: 'UNKNOWN', ecosystemCode: 'OKX', categoryGuid: 'cat-override' },
        'lang-en',
      );
      expect(context.categoryGuid).toBe('cat-override');
      expect(context.ecosystemGuid).toBe('eco-okx');
    });

    it('names the missing reference', async () => {
      await expect(resolveFeedContext(store.catalog, { categoryCode: 'SPORT', ecosystemCode: 'NBA' }, 'lang-en'))
        .rejects.toThrow('Category "SPORT" not found');
      await expect(resolveFeedContext(store.catalog, { categoryCode: 'CRYPTO', ecosystemCode: 'NBA' }, 'lang-en'))
        .rejects.toThrow('Ecosystem "NBA" not found');
    });
  });
});
