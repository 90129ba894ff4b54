import type { Language, LocalizationProvider, TextParams } from '../../shared/types';
import en from './locales/en.json';
import ar from './locales/ar.json';

export type StringTable = Readonly<Record<string, string>>;

/**
 * Looks a key up in the requested language, then the default language, then
 * returns the key itself. `{name}` placeholders are filled from params;
 * unknown placeholders are left as written.
 */
export class TableLocalizationProvider implements LocalizationProvider {
  constructor(
    private tables: Partial<Record<Language, StringTable>>,
    private defaultLanguage: Language = 'en'
  ) {}

  getText(language: Language, key: string, params: TextParams = {}): string {
    const template =
      this.tables[language]?.[key] ??
      this.tables[this.defaultLanguage]?.[key] ??
      key;

    return template.replace(/\{(\w+)\}/g, (placeholder: string, name: string) => {
      const value = params[name];
      return value === undefined ? placeholder : String(value);
    });
  }

  has(language: Language, key: string): boolean {
    return this.tables[language]?.[key] !== undefined;
  }
}

export const BUNDLED_TABLES: Record<Language, StringTable> = { en, ar };

export function createLocalization(defaultLanguage: Language = 'en'): TableLocalizationProvider {
  return new TableLocalizationProvider(BUNDLED_TABLES, defaultLanguage);
}
