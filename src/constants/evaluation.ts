/**
 * Evaluation defaults and environment variable names
 */

/**
 * Longest password evaluated unless the caller configures otherwise.
 */
export const DEFAULT_MAX_LENGTH = 72;

export const DEFAULT_LANGUAGE = "en";

/**
 * Sub-directory of DATA_DIR holding one `<tag>.json` table per locale.
 */
export const LOCALE_DIR = "locales";

/**
 * Languages that fall back to Simplified Chinese before the default.
 */
export const CHINESE_FALLBACK_LANGUAGE = "zh_CN";

export const MAX_LENGTH_ENV = "PASSWORD_MAX_LENGTH";
export const LANGUAGE_ENV = "PASSWORD_LANGUAGE";
export const DATA_DIR_ENV = "CRACKSCORE_DATA_DIR";
