/**
 * Matcher suite
 *
 * Runs every matcher over the password against one snapshot and scores
 * each hit. Overlapping and duplicate explanations are all kept; the
 * sequence optimizer decides between them.
 */

import type { Match, RawMatch, Snapshot } from "@/types";
import { estimateGuesses } from "@/scoring/guessEstimators";
import { mostGuessableMatchSequence } from "@/scoring/optimizer";
import { dictionaryMatch, reverseDictionaryMatch } from "./dictionaryMatcher";
import { l33tMatch } from "./l33tMatcher";
import { spatialMatch } from "./spatialMatcher";
import { repeatMatch } from "./repeatMatcher";
import { sequenceMatch } from "./sequenceMatcher";
import { regexMatch } from "./regexMatcher";
import { dateMatch } from "./dateMatcher";

/**
 * Finds and scores all candidate matches in a password.
 *
 * @param password - Password to scan
 * @param snapshot - Dictionaries and keyboard graphs (read only)
 * @returns Scored matches sorted by (i, j)
 */
export function omnimatch(password: string, snapshot: Snapshot): Match[] {
  const { dictionaries, graphs } = snapshot;

  const raw: RawMatch[] = [
    ...dictionaryMatch(password, dictionaries),
    ...reverseDictionaryMatch(password, dictionaries),
    ...l33tMatch(password, dictionaries),
    ...spatialMatch(password, graphs),
    ...repeatMatch(password, (baseToken) =>
      mostGuessableMatchSequence(baseToken, omnimatch(baseToken, snapshot)),
    ),
    ...sequenceMatch(password),
    ...regexMatch(password),
    ...dateMatch(password),
  ];

  return raw
    .map((match) => estimateGuesses(match, password))
    .sort((a, b) => a.i - b.i || a.j - b.j);
}
