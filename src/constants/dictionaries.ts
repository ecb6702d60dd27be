/**
 * Dictionary configuration constants
 */

import type { DictionaryName, FrequencyListName } from "@/types";

/**
 * Root of the static data tables, relative to the project root.
 *
 * Overridable at runtime through CRACKSCORE_DATA_DIR (see @/config).
 */
export const DATA_DIR = "data";

/**
 * Sub-directory of DATA_DIR holding one `<name>.json` array per list.
 */
export const FREQUENCY_LIST_DIR = "frequency_lists";

/**
 * Frequency lists loaded into every snapshot, in probe order.
 */
export const FREQUENCY_LIST_NAMES: readonly FrequencyListName[] = [
  "passwords",
  "english_wikipedia",
  "female_names",
  "surnames",
  "us_tv_and_film",
  "male_names",
];

/**
 * Every dictionary a snapshot may hold; caller words are probed last.
 */
export const DICTIONARY_NAMES: readonly DictionaryName[] = [
  ...FREQUENCY_LIST_NAMES,
  "user_inputs",
];
