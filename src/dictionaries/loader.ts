/**
 * Frequency list loading and ranking
 *
 * Loads the frequency list JSON files, validates them, and compiles them
 * into ranked lookup maps for the dictionary matchers.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  FrequencyListName,
  FrequencyLists,
  RankedDictionary,
  UserInput,
} from "@/types";
import { validateFrequencyList } from "@/utils/dictionaryValidation";
import {
  DATA_DIR,
  FREQUENCY_LIST_DIR,
  FREQUENCY_LIST_NAMES,
} from "@/constants";
import * as logger from "@/logger";

/**
 * Builds a ranked dictionary from an ordered word list.
 *
 * Words are lower-cased; rank is the 1-based position of the first
 * occurrence, so duplicates never improve a word's rank.
 *
 * @example
 * buildRankedDictionary(["Password", "dragon", "password"])
 * // Map { "password" => 1, "dragon" => 2 }
 */
export function buildRankedDictionary(
  words: readonly string[],
): RankedDictionary {
  const ranked = new Map<string, number>();
  words.forEach((word) => {
    const normalized = word.toLowerCase();
    if (!ranked.has(normalized)) {
      ranked.set(normalized, ranked.size + 1);
    }
  });
  return ranked;
}

/**
 * Coerces caller-supplied inputs to lower-cased strings.
 *
 * Non-string values are converted with String() rather than rejected.
 */
export function sanitizeUserInputs(inputs: readonly UserInput[]): string[] {
  return inputs.map((input) =>
    (typeof input === "string" ? input : String(input)).toLowerCase(),
  );
}

/**
 * Builds the `user_inputs` dictionary, optionally extending an existing one.
 *
 * Existing entries keep their rank; new words are ranked after them.
 */
export function buildUserInputsDictionary(
  inputs: readonly UserInput[],
  existing?: RankedDictionary,
): RankedDictionary {
  const ranked = new Map<string, number>(existing ?? []);
  for (const word of sanitizeUserInputs(inputs)) {
    if (word.length > 0 && !ranked.has(word)) {
      ranked.set(word, ranked.size + 1);
    }
  }
  return ranked;
}

/**
 * Reads and validates one frequency list file.
 *
 * @throws {Error} If the file cannot be read
 * @throws {SyntaxError} If JSON is malformed
 * @throws {DictionaryValidationError} If the list is not an array of words
 */
function readFrequencyList(
  listDir: string,
  name: FrequencyListName,
): string[] {
  const filePath = path.join(listDir, `${name}.json`);
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return validateFrequencyList(raw, name);
}

/**
 * Loads every frequency list from the data directory.
 *
 * The function is fail-fast: a missing or malformed list throws.
 *
 * @param dataDir - Data root (defaults to DATA_DIR under the working directory)
 * @returns Word lists keyed by name, most frequent first
 *
 * @example
 * const lists = loadFrequencyLists();
 * console.log(`Loaded ${lists.passwords.length} passwords`);
 */
export function loadFrequencyLists(dataDir?: string): FrequencyLists {
  const root = path.resolve(process.cwd(), dataDir ?? DATA_DIR);
  const listDir = path.join(root, FREQUENCY_LIST_DIR);

  const entries = FREQUENCY_LIST_NAMES.map(
    (name) => [name, readFrequencyList(listDir, name)] as const,
  );
  const lists: Record<FrequencyListName, string[]> = {
    passwords: [],
    english_wikipedia: [],
    female_names: [],
    surnames: [],
    us_tv_and_film: [],
    male_names: [],
  };
  for (const [name, words] of entries) {
    lists[name] = words;
  }

  logger.debug("Frequency lists loaded", {
    dir: listDir,
    sizes: Object.fromEntries(entries.map(([name, w]) => [name, w.length])),
  });

  return lists;
}
