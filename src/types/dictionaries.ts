/**
 * Dictionary type definitions
 *
 * Two forms exist:
 * - FrequencyLists: ordered word arrays as stored in data/frequency_lists
 * - RankedDictionaries: word → rank lookup maps used by the matchers
 */

/**
 * Names of the frequency lists shipped in data/frequency_lists.
 */
export type FrequencyListName =
  | "passwords"
  | "english_wikipedia"
  | "female_names"
  | "surnames"
  | "us_tv_and_film"
  | "male_names";

/**
 * Dictionary names a match can report. `user_inputs` holds caller-supplied words.
 */
export type DictionaryName = FrequencyListName | "user_inputs";

/**
 * Ordered word lists, most frequent first.
 */
export type FrequencyLists = Readonly<
  Record<FrequencyListName, readonly string[]>
>;

/**
 * Lower-cased word → 1-based rank (1 = most common).
 */
export type RankedDictionary = ReadonlyMap<string, number>;

/**
 * All ranked dictionaries probed during one evaluation.
 *
 * `user_inputs` is absent when the caller supplied no words.
 */
export type RankedDictionaries = Readonly<
  Partial<Record<DictionaryName, RankedDictionary>>
>;
