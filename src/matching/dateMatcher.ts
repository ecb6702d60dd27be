/**
 * Date matcher
 *
 * Detects day/month/year combinations typed with or without separators
 * ("13/5/1991", "130591", "1991-05-13").
 */

import type { DateMatchFields } from "@/types";
import {
  DATE_MAX_YEAR,
  DATE_MIN_YEAR,
  DATE_NO_SEPARATOR_PATTERN,
  DATE_SPLITS,
  DATE_WITH_SEPARATOR_PATTERN,
  REFERENCE_YEAR,
} from "@/constants";

type DayMonth = { day: number; month: number };
type DayMonthYear = DayMonth & { year: number };

/**
 * Reads two integers as day/month in either order.
 */
function mapIntsToDm([a, b]: readonly [number, number]): DayMonth | null {
  for (const [day, month] of [
    [a, b],
    [b, a],
  ]) {
    if (day >= 1 && day <= 31 && month >= 1 && month <= 12) {
      return { day, month };
    }
  }
  return null;
}

/**
 * Expands a two-digit year: 51-99 → 19xx, 0-50 → 20xx.
 */
export function twoToFourDigitYear(year: number): number {
  if (year > 99) {
    return year;
  }
  if (year > 50) {
    return year + 1900;
  }
  return year + 2000;
}

/**
 * Interprets three integers as a date.
 *
 * The year is either the first or the last integer. A four-digit year in
 * range wins outright; otherwise a two-digit year is expanded. The middle
 * integer is never the year.
 *
 * @returns The date, or null when no reading fits the calendar bounds
 *
 * @example
 * mapIntsToDmy([1991, 5, 13]) // { year: 1991, month: 5, day: 13 }
 * mapIntsToDmy([13, 5, 91])   // { year: 1991, month: 5, day: 13 }
 * mapIntsToDmy([32, 32, 91])  // null
 */
export function mapIntsToDmy(
  ints: readonly [number, number, number],
): DayMonthYear | null {
  if (ints[1] > 31 || ints[1] <= 0) {
    return null;
  }

  let over12 = 0;
  let over31 = 0;
  let under1 = 0;
  for (const value of ints) {
    if ((value > 99 && value < DATE_MIN_YEAR) || value > DATE_MAX_YEAR) {
      return null;
    }
    if (value > 31) over31 += 1;
    if (value > 12) over12 += 1;
    if (value <= 0) under1 += 1;
  }
  if (over31 >= 2 || over12 === 3 || under1 >= 2) {
    return null;
  }

  const yearSplits: [number, [number, number]][] = [
    [ints[2], [ints[0], ints[1]]],
    [ints[0], [ints[1], ints[2]]],
  ];

  for (const [year, rest] of yearSplits) {
    if (year >= DATE_MIN_YEAR && year <= DATE_MAX_YEAR) {
      const dm = mapIntsToDm(rest);
      // a four-digit year fixes the reading; no fallback to the other split
      return dm ? { year, ...dm } : null;
    }
  }

  for (const [year, rest] of yearSplits) {
    const dm = mapIntsToDm(rest);
    if (dm) {
      return { year: twoToFourDigitYear(year), ...dm };
    }
  }

  return null;
}

function distanceFromReferenceYear(candidate: DayMonthYear): number {
  return Math.abs(candidate.year - REFERENCE_YEAR);
}

/**
 * Dates without separators: digit runs of length 4 ("1191") to 8
 * ("11111991"). Every split from DATE_SPLITS is tried and the reading
 * closest to the reference year is kept.
 */
function matchWithoutSeparator(password: string): DateMatchFields[] {
  const matches: DateMatchFields[] = [];

  for (let i = 0; i <= password.length - 4; i++) {
    for (let j = i + 3; j <= i + 7 && j < password.length; j++) {
      const token = password.slice(i, j + 1);
      if (!DATE_NO_SEPARATOR_PATTERN.test(token)) {
        continue;
      }

      const candidates: DayMonthYear[] = [];
      for (const [k, l] of DATE_SPLITS[token.length] ?? []) {
        const dmy = mapIntsToDmy([
          parseInt(token.slice(0, k), 10),
          parseInt(token.slice(k, l), 10),
          parseInt(token.slice(l), 10),
        ]);
        if (dmy) {
          candidates.push(dmy);
        }
      }
      if (candidates.length === 0) {
        continue;
      }

      let best = candidates[0];
      for (const candidate of candidates.slice(1)) {
        if (
          distanceFromReferenceYear(candidate) <
          distanceFromReferenceYear(best)
        ) {
          best = candidate;
        }
      }

      matches.push({
        pattern: "date",
        i,
        j,
        token,
        separator: "",
        year: best.year,
        month: best.month,
        day: best.day,
      });
    }
  }

  return matches;
}

/**
 * Dates with separators: length 6 ("1/1/91") to 10 ("11/11/1991"), both
 * separators identical.
 */
function matchWithSeparator(password: string): DateMatchFields[] {
  const matches: DateMatchFields[] = [];

  for (let i = 0; i <= password.length - 6; i++) {
    for (let j = i + 5; j <= i + 9 && j < password.length; j++) {
      const token = password.slice(i, j + 1);
      const found = DATE_WITH_SEPARATOR_PATTERN.exec(token);
      if (!found) {
        continue;
      }
      const dmy = mapIntsToDmy([
        parseInt(found[1], 10),
        parseInt(found[3], 10),
        parseInt(found[4], 10),
      ]);
      if (!dmy) {
        continue;
      }
      matches.push({
        pattern: "date",
        i,
        j,
        token,
        separator: found[2],
        year: dmy.year,
        month: dmy.month,
        day: dmy.day,
      });
    }
  }

  return matches;
}

/**
 * Finds calendar dates, dropping any date that lies inside a longer one
 * ("1991" inside "13/5/1991").
 *
 * @param password - Password to scan
 * @returns Date matches sorted by (i, j)
 */
export function dateMatch(password: string): DateMatchFields[] {
  const matches = [
    ...matchWithoutSeparator(password),
    ...matchWithSeparator(password),
  ];

  const filtered = matches.filter(
    (match) =>
      !matches.some(
        (other) =>
          other !== match && other.i <= match.i && other.j >= match.j,
      ),
  );

  return filtered.sort((a, b) => a.i - b.i || a.j - b.j);
}
