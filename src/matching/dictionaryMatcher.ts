/**
 * Dictionary matchers
 *
 * Detects every substring of the password that is a word in one of the
 * ranked dictionaries, read forwards or backwards.
 */

import type { DictionaryMatchFields, RankedDictionaries } from "@/types";
import { DICTIONARY_NAMES } from "@/constants";
import { lowerPreservingLength, reverseText } from "@/utils/text/caseFolding";

/**
 * Matches every substring [i..j] of the password, lower-cased, against every
 * ranked dictionary.
 *
 * All hits are kept, including overlapping ones and the same word found in
 * several dictionaries; the optimizer picks between them.
 *
 * @param password - Password to scan
 * @param dictionaries - Ranked dictionaries from the snapshot
 * @returns Dictionary matches sorted by (i, j)
 *
 * @example
 * // dictionaries.english_wikipedia has "pass" and "word"
 * dictionaryMatch("Password", dictionaries)
 * // [{ i: 0, j: 3, token: "Pass", ... }, { i: 4, j: 7, token: "word", ... }]
 */
export function dictionaryMatch(
  password: string,
  dictionaries: RankedDictionaries,
): DictionaryMatchFields[] {
  const matches: DictionaryMatchFields[] = [];
  const length = password.length;
  const passwordLower = lowerPreservingLength(password);

  for (const dictionaryName of DICTIONARY_NAMES) {
    const ranked = dictionaries[dictionaryName];
    if (!ranked) {
      continue;
    }
    for (let i = 0; i < length; i++) {
      for (let j = i; j < length; j++) {
        const word = passwordLower.slice(i, j + 1);
        const rank = ranked.get(word);
        if (rank === undefined) {
          continue;
        }
        matches.push({
          pattern: "dictionary",
          i,
          j,
          token: password.slice(i, j + 1),
          matchedWord: word,
          rank,
          dictionaryName,
          reversed: false,
          l33t: false,
        });
      }
    }
  }

  return matches.sort((a, b) => a.i - b.i || a.j - b.j);
}

/**
 * Dictionary matching over the reversed password.
 *
 * Spans and tokens are mapped back to the original orientation and the
 * match is flagged `reversed`.
 *
 * @example
 * reverseDictionaryMatch("drowssap", dictionaries)
 * // [{ i: 0, j: 7, token: "drowssap", matchedWord: "password", reversed: true, ... }]
 */
export function reverseDictionaryMatch(
  password: string,
  dictionaries: RankedDictionaries,
): DictionaryMatchFields[] {
  const reversedPassword = reverseText(password);
  const last = password.length - 1;

  return dictionaryMatch(reversedPassword, dictionaries)
    .map((match) => ({
      ...match,
      token: reverseText(match.token),
      reversed: true,
      i: last - match.j,
      j: last - match.i,
    }))
    .sort((a, b) => a.i - b.i || a.j - b.j);
}
