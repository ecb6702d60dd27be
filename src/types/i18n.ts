/**
 * Translation type definitions
 */

export type TranslateParams = Record<string, string | number>;

/**
 * Resolves a dotted key ("warnings.dates") to display text.
 */
export type Translate = (key: string, params?: TranslateParams) => string;

/**
 * Nested locale table as stored in data/locales/<tag>.json.
 */
export type LocaleTable = {
  [key: string]: string | LocaleTable;
};
