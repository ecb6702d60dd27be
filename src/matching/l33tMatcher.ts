/**
 * Leet-speak matcher
 *
 * Undoes common character substitutions ("p4ssw0rd" → "password") and
 * looks up each substituted variant in the ranked dictionaries.
 */

import type { DictionaryMatchFields, RankedDictionaries } from "@/types";
import { DICTIONARY_NAMES, L33T_TABLE } from "@/constants";
import { lowerPreservingLength } from "@/utils/text/caseFolding";

type L33tTable = Readonly<Record<string, readonly string[]>>;

/**
 * Leet character → the letter it stands for in one variant.
 */
type L33tSub = Record<string, string>;

/**
 * Restricts the substitution table to leet characters present in the password.
 *
 * @example
 * relevantL33tSubtable("p4$$", L33T_TABLE) // { a: ["4"], s: ["$"] }
 */
export function relevantL33tSubtable(
  password: string,
  table: L33tTable,
): L33tTable {
  const present = new Set(password);
  const subtable: Record<string, readonly string[]> = {};
  for (const [letter, subs] of Object.entries(table)) {
    const relevant = subs.filter((sub) => present.has(sub));
    if (relevant.length > 0) {
      subtable[letter] = relevant;
    }
  }
  return subtable;
}

/**
 * Enumerates every consistent substitution map for a (sub)table.
 *
 * A leet character stands for one letter per variant, so "1" in a table
 * with i → 1 and l → 1 yields one variant reading it as "i" and one as "l".
 *
 * @example
 * enumerateL33tSubs({ a: ["4"], i: ["1"], l: ["1"] })
 * // [{ "4": "a", "1": "i" }, { "4": "a", "1": "l" }]
 */
export function enumerateL33tSubs(table: L33tTable): L33tSub[] {
  let subs: [string, string][][] = [[]];

  for (const [letter, l33tChars] of Object.entries(table)) {
    const next: [string, string][][] = [];
    for (const l33tChar of l33tChars) {
      for (const sub of subs) {
        const duplicate = sub.findIndex(([char]) => char === l33tChar);
        if (duplicate === -1) {
          next.push([...sub, [l33tChar, letter]]);
        } else {
          const alternative = sub.filter((_, index) => index !== duplicate);
          alternative.push([l33tChar, letter]);
          next.push(sub, alternative);
        }
      }
    }
    subs = dedupSubs(next);
  }

  return subs.map((sub) => Object.fromEntries(sub));
}

function dedupSubs(subs: [string, string][][]): [string, string][][] {
  const seen = new Set<string>();
  const unique: [string, string][][] = [];
  for (const sub of subs) {
    const label = sub
      .map(([l33tChar, letter]) => `${letter},${l33tChar}`)
      .sort()
      .join("-");
    if (!seen.has(label)) {
      seen.add(label);
      unique.push(sub);
    }
  }
  return unique;
}

function translate(text: string, sub: L33tSub): string {
  let result = "";
  for (let k = 0; k < text.length; k++) {
    result += sub[text[k]] ?? text[k];
  }
  return result;
}

function longestWordLength(dictionaries: RankedDictionaries): number {
  let longest = 0;
  for (const dictionaryName of DICTIONARY_NAMES) {
    for (const word of dictionaries[dictionaryName]?.keys() ?? []) {
      longest = Math.max(longest, word.length);
    }
  }
  return longest;
}

/**
 * Finds dictionary words disguised with leet substitutions.
 *
 * Rules:
 * - Only substitutions whose leet character occurs in the password are tried
 * - A hit is kept only when the token actually differs from the word
 *   (plain hits belong to the dictionary matcher)
 * - Single-character tokens are dropped ("4" is not the word "a")
 * - The same span/word found through several variants is reported once
 *
 * Spans are bounded by the longest dictionary word, and a translated span
 * already looked up under an earlier variant is not looked up again.
 *
 * @param password - Password to scan
 * @param dictionaries - Ranked dictionaries from the snapshot
 * @returns Leet dictionary matches sorted by (i, j)
 */
export function l33tMatch(
  password: string,
  dictionaries: RankedDictionaries,
): DictionaryMatchFields[] {
  const matches: DictionaryMatchFields[] = [];
  const length = password.length;
  const maxSpan = longestWordLength(dictionaries);
  const passwordLower = lowerPreservingLength(password);
  const lookedUp = new Set<string>();

  for (const sub of enumerateL33tSubs(
    relevantL33tSubtable(password, L33T_TABLE),
  )) {
    if (Object.keys(sub).length === 0) {
      break;
    }

    const subbedLower = lowerPreservingLength(translate(password, sub));
    for (let i = 0; i < length; i++) {
      const lastEnd = Math.min(length, i + maxSpan) - 1;
      for (let j = i + 1; j <= lastEnd; j++) {
        const word = subbedLower.slice(i, j + 1);
        if (word === passwordLower.slice(i, j + 1)) {
          continue;
        }
        const spanKey = `${i}:${word}`;
        if (lookedUp.has(spanKey)) {
          continue;
        }
        lookedUp.add(spanKey);

        const token = password.slice(i, j + 1);
        for (const dictionaryName of DICTIONARY_NAMES) {
          const rank = dictionaries[dictionaryName]?.get(word);
          if (rank === undefined) {
            continue;
          }

          const matchSub: L33tSub = {};
          for (const [l33tChar, letter] of Object.entries(sub)) {
            if (token.includes(l33tChar)) {
              matchSub[l33tChar] = letter;
            }
          }

          matches.push({
            pattern: "dictionary",
            i,
            j,
            token,
            matchedWord: word,
            rank,
            dictionaryName,
            reversed: false,
            l33t: true,
            sub: matchSub,
            subDisplay: Object.entries(matchSub)
              .map(([l33tChar, letter]) => `${l33tChar} -> ${letter}`)
              .join(", "),
          });
        }
      }
    }
  }

  return matches.sort((a, b) => a.i - b.i || a.j - b.j);
}
