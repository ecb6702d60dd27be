/**
 * Scoring configuration constants
 *
 * Guess-model parameters and score thresholds. Kept here so the
 * estimators and the optimizer stay free of magic numbers.
 */

import type { Score } from "@/types";

/**
 * Alphabet sizes added per character class present in a bruteforce token.
 */
export const BRUTEFORCE_CARDINALITIES = {
  lower: 26,
  upper: 26,
  digits: 10,
  symbols: 33,
  unicode: 100,
} as const;

/**
 * Lower bounds for a match that covers only part of the password.
 */
export const MIN_SUBMATCH_GUESSES_SINGLE_CHAR = 10;
export const MIN_SUBMATCH_GUESSES_MULTI_CHAR = 50;

/**
 * Year used as "now" by the date and recent-year models.
 */
export const REFERENCE_YEAR = new Date().getFullYear();

/**
 * Smallest year distance the date and recent-year models assume.
 */
export const MIN_YEAR_SPACE = 20;

export const DAYS_PER_YEAR = 365;

/**
 * Multiplier for dates typed with a separator ("/", "-", ...).
 */
export const DATE_SEPARATOR_MULTIPLIER = 4;

/**
 * Cap on the uppercase multiplier for all-uppercase tokens.
 */
export const ALL_UPPER_VARIATIONS_CAP = 2;

/**
 * Sequence model bases.
 *
 * Runs starting at an obvious character ("a", "1", "z", ...) take the
 * smallest base.
 */
export const SEQUENCE_OBVIOUS_STARTS: readonly string[] = [
  "a",
  "A",
  "z",
  "Z",
  "0",
  "1",
  "9",
];
export const SEQUENCE_OBVIOUS_START_BASE = 4;
export const SEQUENCE_DIGIT_BASE = 10;
export const SEQUENCE_DEFAULT_BASE = 26;

/**
 * Upper bounds (exclusive) on total guesses for scores 0-3; anything at
 * or above the last bound scores 4.
 */
export const SCORE_THRESHOLDS: readonly { score: Score; below: number }[] = [
  { score: 0, below: 1e3 },
  { score: 1, below: 1e6 },
  { score: 2, below: 1e8 },
  { score: 3, below: 1e10 },
];

/**
 * Tolerance used when comparing log10 guess counts for ties.
 */
export const LOG10_TIE_EPSILON = 1e-9;
