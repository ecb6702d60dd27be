/**
 * Translation provider
 *
 * Locale tables are nested JSON objects under data/locales/<tag>.json.
 * Keys are looked up through a fallback chain of tags, ending with the
 * default language; a key found nowhere is returned as-is.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  CrackTimeDisplay,
  LocaleTable,
  Translate,
  TranslateParams,
} from "@/types";
import {
  CHINESE_FALLBACK_LANGUAGE,
  DATA_DIR,
  DEFAULT_LANGUAGE,
  LOCALE_DIR,
} from "@/constants";
import * as logger from "@/logger";

const PLACEHOLDER = /\{(\w+)\}/g;

function isLocaleTable(value: unknown): value is LocaleTable {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(
    (entry) => typeof entry === "string" || isLocaleTable(entry),
  );
}

/**
 * Normalises a language tag: "-" becomes "_", surrounding space dropped.
 */
export function normalizeLanguageTag(tag: string): string {
  return tag.trim().replace(/-/g, "_");
}

/**
 * Lists the locale tags tried for a requested language, most specific first.
 *
 * @example
 * resolveLanguageChain("de-AT")    // ["de_AT", "de", "en"]
 * resolveLanguageChain("zh_TW")    // ["zh_TW", "zh", "zh_CN", "en"]
 */
export function resolveLanguageChain(tag: string): string[] {
  const normalized = normalizeLanguageTag(tag);
  const chain: string[] = [];
  if (normalized.length > 0) {
    chain.push(normalized);
    const [base] = normalized.split("_");
    if (base) {
      chain.push(base);
      if (base.toLowerCase() === "zh") {
        chain.push(CHINESE_FALLBACK_LANGUAGE);
      }
    }
  }
  chain.push(DEFAULT_LANGUAGE);
  return [...new Set(chain)];
}

/**
 * Reads one locale table.
 *
 * @returns The table, or null when no file exists for the tag
 * @throws {Error} If the file exists but is not a nested string table
 */
export function loadLocale(tag: string, dataDir?: string): LocaleTable | null {
  const root = path.resolve(process.cwd(), dataDir ?? DATA_DIR);
  const filePath = path.join(root, LOCALE_DIR, `${tag}.json`);
  if (!fs.existsSync(filePath)) {
    return null;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  if (!isLocaleTable(raw)) {
    throw new Error(`Locale table must map keys to strings: ${filePath}`);
  }
  return raw;
}

function lookup(table: LocaleTable, key: string): string | undefined {
  let node: string | LocaleTable | undefined = table;
  for (const part of key.split(".")) {
    if (node === undefined || typeof node === "string") {
      return undefined;
    }
    node = node[part];
  }
  return typeof node === "string" ? node : undefined;
}

function interpolate(text: string, params?: TranslateParams): string {
  if (!params) {
    return text;
  }
  return text.replace(PLACEHOLDER, (placeholder, name: string) =>
    Object.hasOwn(params, name) ? String(params[name]) : placeholder,
  );
}

/**
 * Builds a Translate function for a language tag.
 *
 * Tables for the whole fallback chain are read once, up front.
 *
 * @example
 * const t = createTranslator("en");
 * t("warnings.dates")                          // "Dates are often easy to guess."
 * t("timeEstimation.hours", { count: 3 })      // "3 hours"
 * t("no.such.key")                             // "no.such.key"
 */
export function createTranslator(tag: string, dataDir?: string): Translate {
  const chain = resolveLanguageChain(tag);
  const tables: LocaleTable[] = [];
  for (const candidate of chain) {
    const table = loadLocale(candidate, dataDir);
    if (table) {
      tables.push(table);
    }
  }

  logger.debug("Translator created", { requested: tag, chain });

  return (key, params) => {
    for (const table of tables) {
      const text = lookup(table, key);
      if (text !== undefined) {
        return interpolate(text, params);
      }
    }
    return key;
  };
}

/**
 * Renders a crack time bucket as text.
 *
 * Counted buckets use the singular key (e.g. `timeEstimation.hour`) for a
 * count of 1 and the plural key otherwise.
 *
 * @example
 * formatCrackTime({ bucket: "hours", count: 2 }, t)     // "2 hours"
 * formatCrackTime({ bucket: "hours", count: 1 }, t)     // "1 hour"
 * formatCrackTime({ bucket: "ltSecond", count: null }, t) // "less than a second"
 */
export function formatCrackTime(
  display: CrackTimeDisplay,
  translate: Translate,
): string {
  const { bucket, count } = display;
  if (count === null) {
    return translate(`timeEstimation.${bucket}`);
  }
  const key = count === 1 ? bucket.replace(/s$/, "") : bucket;
  return translate(`timeEstimation.${key}`, { count });
}
