/**
 * Repeat matcher
 *
 * Detects a base token typed two or more times in a row ("aaaa",
 * "abcabcabc"). The base token is itself analysed by the full matcher
 * suite so "passwordpassword" costs about as much as "password".
 */

import type { OptimalSequence, RepeatMatchFields } from "@/types";

/**
 * Runs the matcher suite and optimizer over a base token.
 *
 * Injected by the caller so this module does not depend on the suite
 * it is part of.
 */
export type AnalyzeToken = (token: string) => OptimalSequence;

/**
 * Finds consecutive repeats, scanning left to right without overlap.
 *
 * At each position both a greedy and a lazy repeat are tried; the longer
 * one wins ("aabaab" is "aab" twice, not "a" twice). When the greedy form
 * wins, the shortest repeating unit of its text becomes the base token.
 *
 * @param password - Password to scan
 * @param analyze - Scores a base token in isolation
 * @returns Repeat matches in order of position
 *
 * @example
 * repeatMatch("aaaaaaaa", analyze)
 * // [{ i: 0, j: 7, token: "aaaaaaaa", baseToken: "a", repeatCount: 8, ... }]
 */
export function repeatMatch(
  password: string,
  analyze: AnalyzeToken,
): RepeatMatchFields[] {
  const matches: RepeatMatchFields[] = [];
  // [\s\S] so line terminators repeat like any other character
  const greedy = /([\s\S]+)\1+/g;
  const lazy = /([\s\S]+?)\1+/g;
  const lazyAnchored = /^([\s\S]+?)\1+$/;
  let lastIndex = 0;

  while (lastIndex < password.length) {
    greedy.lastIndex = lastIndex;
    lazy.lastIndex = lastIndex;
    const greedyMatch = greedy.exec(password);
    const lazyMatch = lazy.exec(password);
    if (!greedyMatch || !lazyMatch) {
      break;
    }

    let match: RegExpExecArray;
    let baseToken: string;
    if (greedyMatch[0].length > lazyMatch[0].length) {
      match = greedyMatch;
      baseToken = lazyAnchored.exec(match[0])?.[1] ?? match[1];
    } else {
      match = lazyMatch;
      baseToken = match[1];
    }

    const i = match.index;
    const j = i + match[0].length - 1;
    const baseAnalysis = analyze(baseToken);

    matches.push({
      pattern: "repeat",
      i,
      j,
      token: match[0],
      baseToken,
      baseGuesses: baseAnalysis.guesses,
      baseMatches: baseAnalysis.sequence,
      repeatCount: match[0].length / baseToken.length,
    });
    lastIndex = j + 1;
  }

  return matches;
}
