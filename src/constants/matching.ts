/**
 * Matcher configuration constants
 */

import type { RegexName } from "@/types";

/**
 * Letter → characters commonly typed in its place.
 */
export const L33T_TABLE: Readonly<Record<string, readonly string[]>> = {
  a: ["4", "@"],
  b: ["8"],
  c: ["(", "{", "[", "<"],
  e: ["3"],
  g: ["6", "9"],
  i: ["1", "!", "|"],
  l: ["1", "|", "7"],
  o: ["0"],
  s: ["$", "5"],
  t: ["+", "7"],
  x: ["%"],
  z: ["2"],
};

/**
 * Named patterns recognised by the regex matcher.
 */
export const REGEXEN: Readonly<Record<RegexName, RegExp>> = {
  recent_year: /19\d\d|20\d\d/g,
};

export const REGEX_NAMES: readonly RegexName[] = ["recent_year"];

/**
 * Minimum run length for keyboard and sequence patterns.
 */
export const MIN_SPATIAL_LENGTH = 3;
export const MIN_SEQUENCE_LENGTH = 3;

/**
 * Plausible year range for date candidates (inclusive).
 */
export const DATE_MIN_YEAR = 1000;
export const DATE_MAX_YEAR = 2050;

/**
 * Ways to cut a separator-less digit run into three date parts, keyed by
 * run length. Each pair [k, l] splits the token into
 * token[0:k], token[k:l], token[l:].
 */
export const DATE_SPLITS: Readonly<Record<number, readonly [number, number][]>> =
  {
    4: [
      [1, 2], // 1 1 91
      [2, 3], // 91 1 1
    ],
    5: [
      [1, 3], // 1 11 91
      [2, 3], // 11 1 91
    ],
    6: [
      [1, 2], // 1 1 1991
      [2, 4], // 11 11 91
      [4, 5], // 1991 1 1
    ],
    7: [
      [1, 3], // 1 11 1991
      [2, 3], // 11 1 1991
      [4, 5], // 1991 1 11
      [4, 6], // 1991 11 1
    ],
    8: [
      [2, 4], // 11 11 1991
      [4, 6], // 1991 11 11
    ],
  };

export const DATE_NO_SEPARATOR_PATTERN = /^\d{4,8}$/;

/**
 * d{1,4} sep d{1,2} sep d{1,4}, the second separator repeating the first.
 */
export const DATE_WITH_SEPARATOR_PATTERN =
  /^(\d{1,4})([\s/\\_.-])(\d{1,2})\2(\d{1,4})$/;
