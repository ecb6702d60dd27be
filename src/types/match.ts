/**
 * Match type definitions
 *
 * A match is a recognized pattern over the inclusive span [i, j] of the
 * password. Matchers produce RawMatch values; the guess estimators turn
 * them into Match values carrying `guesses`.
 */

import type { DictionaryName } from "./dictionaries";
import type { GraphName } from "./keyboards";

export type Pattern =
  | "dictionary"
  | "spatial"
  | "repeat"
  | "sequence"
  | "regex"
  | "date"
  | "bruteforce";

type MatchSpan = {
  /** Start index (inclusive) */
  i: number;
  /** End index (inclusive) */
  j: number;
  /** Exact substring password[i..j] */
  token: string;
};

export type DictionaryMatchFields = MatchSpan & {
  pattern: "dictionary";
  /** Lower-cased dictionary entry the token resolved to */
  matchedWord: string;
  rank: number;
  dictionaryName: DictionaryName;
  /** Found by scanning the reversed password */
  reversed: boolean;
  /** Found after undoing leet substitutions */
  l33t: boolean;
  /** Leet character → letter substitutions present in the token */
  sub?: Readonly<Record<string, string>>;
  /** "4 -> a, 3 -> e" */
  subDisplay?: string;
};

export type SpatialMatchFields = MatchSpan & {
  pattern: "spatial";
  graph: GraphName;
  /** Direction changes along the run */
  turns: number;
  shiftedCount: number;
  startingPositions: number;
  averageDegree: number;
};

export type RepeatMatchFields = MatchSpan & {
  pattern: "repeat";
  baseToken: string;
  baseGuesses: number;
  baseMatches: readonly Match[];
  repeatCount: number;
};

export type SequenceName = "lower" | "upper" | "digits" | "unicode";

export type SequenceMatchFields = MatchSpan & {
  pattern: "sequence";
  sequenceName: SequenceName;
  sequenceSpace: number;
  ascending: boolean;
  /** Constant step between neighbouring characters (+1 or -1) */
  delta: number;
};

export type RegexName = "recent_year";

export type RegexMatchFields = MatchSpan & {
  pattern: "regex";
  regexName: RegexName;
};

export type DateMatchFields = MatchSpan & {
  pattern: "date";
  /** Separator character, "" when the date has none */
  separator: string;
  year: number;
  month: number;
  day: number;
};

export type BruteforceMatchFields = MatchSpan & {
  pattern: "bruteforce";
  /** Alphabet size inferred from the character classes in the token */
  cardinality: number;
};

export type RawMatch =
  | DictionaryMatchFields
  | SpatialMatchFields
  | RepeatMatchFields
  | SequenceMatchFields
  | RegexMatchFields
  | DateMatchFields
  | BruteforceMatchFields;

/**
 * Estimate attached to every scored match.
 */
export type GuessEstimate = {
  guesses: number;
  guessesLog10: number;
};

export type DictionaryMatch = DictionaryMatchFields &
  GuessEstimate & {
    baseGuesses: number;
    uppercaseVariations: number;
    l33tVariations: number;
  };
export type SpatialMatch = SpatialMatchFields & GuessEstimate;
export type RepeatMatch = RepeatMatchFields & GuessEstimate;
export type SequenceMatch = SequenceMatchFields & GuessEstimate;
export type RegexMatch = RegexMatchFields & GuessEstimate;
export type DateMatch = DateMatchFields & GuessEstimate;
export type BruteforceMatch = BruteforceMatchFields & GuessEstimate;

export type Match =
  | DictionaryMatch
  | SpatialMatch
  | RepeatMatch
  | SequenceMatch
  | RegexMatch
  | DateMatch
  | BruteforceMatch;

/**
 * Winning partition of a password produced by the sequence optimizer.
 */
export type OptimalSequence = {
  password: string;
  /** Product of per-match guesses scaled by tie factors */
  guesses: number;
  guessesLog10: number;
  /** Ordered, non-overlapping matches covering [0, password.length) */
  sequence: Match[];
};
