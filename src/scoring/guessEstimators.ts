/**
 * Guess estimators
 *
 * Converts a raw match into an estimated number of guesses. Every formula
 * reads only the match's own fields; the password is consulted for its
 * length alone, to apply the submatch floor.
 */

import type {
  DateMatchFields,
  DictionaryMatch,
  DictionaryMatchFields,
  Match,
  RawMatch,
  RegexMatchFields,
  RepeatMatchFields,
  SequenceMatchFields,
  SpatialMatchFields,
} from "@/types";
import {
  ALL_UPPER_VARIATIONS_CAP,
  BRUTEFORCE_CARDINALITIES,
  DATE_SEPARATOR_MULTIPLIER,
  DAYS_PER_YEAR,
  MIN_SUBMATCH_GUESSES_MULTI_CHAR,
  MIN_SUBMATCH_GUESSES_SINGLE_CHAR,
  MIN_YEAR_SPACE,
  REFERENCE_YEAR,
  SEQUENCE_DEFAULT_BASE,
  SEQUENCE_DIGIT_BASE,
  SEQUENCE_OBVIOUS_START_BASE,
  SEQUENCE_OBVIOUS_STARTS,
} from "@/constants";
import { fromLog10, nCk, sumOfBinomials } from "@/utils/math";

const START_UPPER = /^[A-Z][^A-Z]+$/;
const END_UPPER = /^[^A-Z]+[A-Z]$/;
const ALL_UPPER = /^[^a-z]+$/;
const ALL_LOWER = /^[^A-Z]+$/;

/**
 * Multiplier for the capitalization pattern of a dictionary token.
 *
 * - all lowercase: 1
 * - only the first or only the last letter uppercase: 2
 * - all uppercase: min(length, ALL_UPPER_VARIATIONS_CAP)
 * - mixed: number of ways to place up to min(U, L) uppercase letters
 *
 * @example
 * uppercaseVariations("password") // 1
 * uppercaseVariations("Password") // 2
 * uppercaseVariations("PaSsword") // C(8,1) + C(8,2) = 36
 */
export function uppercaseVariations(token: string): number {
  if (ALL_LOWER.test(token) || token.toLowerCase() === token) {
    return 1;
  }
  if (START_UPPER.test(token) || END_UPPER.test(token)) {
    return 2;
  }
  if (ALL_UPPER.test(token)) {
    return Math.max(1, Math.min(token.length, ALL_UPPER_VARIATIONS_CAP));
  }

  let upper = 0;
  let lower = 0;
  for (const char of token) {
    if (/[A-Z]/.test(char)) upper += 1;
    else if (/[a-z]/.test(char)) lower += 1;
  }
  return sumOfBinomials(upper, lower);
}

/**
 * Multiplier for the leet substitutions used in a dictionary token.
 *
 * For each substitution with S substituted and U plain occurrences of the
 * letter: 2 when either count is zero, otherwise the number of ways to
 * substitute up to min(S, U) of the S+U positions.
 *
 * @example
 * l33tVariations({ token: "p4ssword", l33t: true, sub: { "4": "a" } }) // 2
 * l33tVariations({ token: "4aa4", l33t: true, sub: { "4": "a" } })     // C(4,1) + C(4,2) = 10
 */
export function l33tVariations(
  match: Pick<DictionaryMatchFields, "token" | "l33t" | "sub">,
): number {
  if (!match.l33t || !match.sub) {
    return 1;
  }

  let variations = 1;
  const chars = match.token.toLowerCase().split("");
  for (const [subbed, unsubbed] of Object.entries(match.sub)) {
    const s = chars.filter((c) => c === subbed).length;
    const u = chars.filter((c) => c === unsubbed).length;
    variations *= s === 0 || u === 0 ? 2 : sumOfBinomials(u, s);
  }
  return variations;
}

export function dictionaryGuesses(match: DictionaryMatchFields): {
  guesses: number;
  baseGuesses: number;
  uppercaseVariations: number;
  l33tVariations: number;
} {
  const upper = uppercaseVariations(match.token);
  const l33t = l33tVariations(match);
  const reversedVariations = match.reversed ? 2 : 1;
  return {
    guesses: match.rank * upper * l33t * reversedVariations,
    baseGuesses: match.rank,
    uppercaseVariations: upper,
    l33tVariations: l33t,
  };
}

/**
 * Keyboard run guesses.
 *
 * Counts every run of length 2..L with up to `turns` turns from any
 * starting key, then multiplies by the ways to distribute the shifted
 * characters.
 */
export function spatialGuesses(match: SpatialMatchFields): number {
  const s = match.startingPositions;
  const d = match.averageDegree;
  const length = match.token.length;
  const t = match.turns;

  let guesses = 0;
  for (let i = 2; i <= length; i++) {
    const possibleTurns = Math.min(t, i - 1);
    for (let j = 1; j <= possibleTurns; j++) {
      guesses += nCk(i - 1, j - 1) * s * Math.pow(d, j);
    }
  }

  if (match.shiftedCount > 0) {
    const shifted = match.shiftedCount;
    const unshifted = length - shifted;
    guesses *=
      shifted === 0 || unshifted === 0
        ? 2
        : sumOfBinomials(shifted, unshifted);
  }
  return guesses;
}

export function repeatGuesses(match: RepeatMatchFields): number {
  return match.baseGuesses * match.repeatCount;
}

/**
 * Sequence guesses: a small base for obvious starts ("abc", "123",
 * "987"), doubled for descending runs, times the run length.
 */
export function sequenceGuesses(match: SequenceMatchFields): number {
  const first = match.token.charAt(0);
  let base: number;
  if (SEQUENCE_OBVIOUS_STARTS.includes(first)) {
    base = SEQUENCE_OBVIOUS_START_BASE;
  } else if (/\d/.test(first)) {
    base = SEQUENCE_DIGIT_BASE;
  } else {
    base = SEQUENCE_DEFAULT_BASE;
  }
  if (!match.ascending) {
    base *= 2;
  }
  return base * match.token.length;
}

function yearSpace(year: number): number {
  return Math.max(Math.abs(year - REFERENCE_YEAR), MIN_YEAR_SPACE);
}

/**
 * Named pattern guesses: the size of the value range the pattern implies.
 */
export function regexGuesses(match: RegexMatchFields): number {
  switch (match.regexName) {
    case "recent_year":
      return yearSpace(parseInt(match.token, 10));
  }
}

export function dateGuesses(match: DateMatchFields): number {
  const guesses = yearSpace(match.year) * DAYS_PER_YEAR;
  return match.separator ? guesses * DATE_SEPARATOR_MULTIPLIER : guesses;
}

export type CharClass = keyof typeof BRUTEFORCE_CARDINALITIES;

/**
 * Character class of one UTF-16 code unit for bruteforce purposes.
 */
export function charClassOf(code: number): CharClass {
  if (code >= 97 && code <= 122) return "lower";
  if (code >= 65 && code <= 90) return "upper";
  if (code >= 48 && code <= 57) return "digits";
  if (code >= 32 && code <= 126) return "symbols";
  return "unicode";
}

/**
 * Alphabet size of a set of character classes (at least 1).
 */
export function cardinalityOfClasses(classes: ReadonlySet<CharClass>): number {
  let cardinality = 0;
  for (const cls of classes) {
    cardinality += BRUTEFORCE_CARDINALITIES[cls];
  }
  return Math.max(cardinality, 1);
}

/**
 * Alphabet size implied by the character classes present in a token.
 *
 * @example
 * bruteforceCardinality("abc")  // 26
 * bruteforceCardinality("aB3!") // 26 + 26 + 10 + 33 = 95
 */
export function bruteforceCardinality(token: string): number {
  const classes = new Set<CharClass>();
  for (let k = 0; k < token.length; k++) {
    classes.add(charClassOf(token.charCodeAt(k)));
  }
  return cardinalityOfClasses(classes);
}

/**
 * Bruteforce guesses in log10: cardinality ^ length, never below the floor.
 */
export function bruteforceGuessesLog10(
  tokenLength: number,
  cardinality: number,
  floor: number,
): number {
  return Math.max(tokenLength * Math.log10(cardinality), Math.log10(floor));
}

/**
 * Smallest estimate allowed for a match within a password of the given
 * length. Whole-password matches may go down to 1.
 */
export function minimumGuesses(
  tokenLength: number,
  passwordLength: number,
): number {
  if (tokenLength >= passwordLength) {
    return 1;
  }
  return tokenLength === 1
    ? MIN_SUBMATCH_GUESSES_SINGLE_CHAR
    : MIN_SUBMATCH_GUESSES_MULTI_CHAR;
}

/**
 * Attaches a guess estimate to a raw match.
 *
 * Dispatches on the pattern, then applies the submatch floor. Estimates
 * are held both as a number and in log10 so that very long bruteforce
 * spans stay comparable after the number saturates.
 *
 * @param match - Match produced by a matcher
 * @param password - Password the match was found in
 */
export function estimateGuesses(match: RawMatch, password: string): Match {
  const floor = minimumGuesses(match.token.length, password.length);
  const withFloor = (guesses: number) => {
    const bounded = Math.max(guesses, floor);
    return { guesses: bounded, guessesLog10: Math.log10(bounded) };
  };

  switch (match.pattern) {
    case "dictionary": {
      const { guesses, ...factors } = dictionaryGuesses(match);
      const dictionaryMatch: DictionaryMatch = {
        ...match,
        ...factors,
        ...withFloor(guesses),
      };
      return dictionaryMatch;
    }
    case "spatial":
      return { ...match, ...withFloor(spatialGuesses(match)) };
    case "repeat":
      return { ...match, ...withFloor(repeatGuesses(match)) };
    case "sequence":
      return { ...match, ...withFloor(sequenceGuesses(match)) };
    case "regex":
      return { ...match, ...withFloor(regexGuesses(match)) };
    case "date":
      return { ...match, ...withFloor(dateGuesses(match)) };
    case "bruteforce": {
      const guessesLog10 = bruteforceGuessesLog10(
        match.token.length,
        match.cardinality,
        floor,
      );
      return { ...match, guesses: fromLog10(guessesLog10), guessesLog10 };
    }
  }
}
