/**
 * Named pattern matcher
 */

import type { RegexMatchFields, RegexName } from "@/types";
import { REGEX_NAMES, REGEXEN } from "@/constants";

/**
 * Finds every occurrence of each named pattern (currently recent years).
 *
 * @example
 * regexMatch("born1987")
 * // [{ i: 4, j: 7, token: "1987", regexName: "recent_year", ... }]
 */
export function regexMatch(
  password: string,
  regexen: Readonly<Record<RegexName, RegExp>> = REGEXEN,
): RegexMatchFields[] {
  const matches: RegexMatchFields[] = [];
  for (const regexName of REGEX_NAMES) {
    const regex = regexen[regexName];
    // matchAll works on a copy, so the shared pattern's lastIndex is never touched
    for (const found of password.matchAll(regex)) {
      const i = found.index ?? 0;
      matches.push({
        pattern: "regex",
        i,
        j: i + found[0].length - 1,
        token: found[0],
        regexName,
      });
    }
  }
  return matches.sort((a, b) => a.i - b.i || a.j - b.j);
}
