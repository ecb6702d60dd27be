/**
 * Unit tests for guess estimators
 *
 * Each estimator is a pure function of the match fields.
 */

import { describe, it, expect } from "vitest";
import type { DictionaryMatchFields, RawMatch } from "@/types";
import {
  bruteforceCardinality,
  bruteforceGuessesLog10,
  dateGuesses,
  dictionaryGuesses,
  estimateGuesses,
  l33tVariations,
  minimumGuesses,
  regexGuesses,
  repeatGuesses,
  sequenceGuesses,
  spatialGuesses,
  uppercaseVariations,
} from "@/scoring/guessEstimators";
import { REFERENCE_YEAR } from "@/constants";

function createDictionaryMatch(
  overrides: Partial<DictionaryMatchFields> = {},
): DictionaryMatchFields {
  return {
    pattern: "dictionary",
    i: 0,
    j: 7,
    token: "password",
    matchedWord: "password",
    rank: 10,
    dictionaryName: "passwords",
    reversed: false,
    l33t: false,
    ...overrides,
  };
}

describe("uppercaseVariations", () => {
  it("should return 1 for lowercase and caseless tokens", () => {
    expect(uppercaseVariations("password")).toBe(1);
    expect(uppercaseVariations("1234")).toBe(1);
  });

  it("should return 2 when only the first or last letter is uppercase", () => {
    expect(uppercaseVariations("Password")).toBe(2);
    expect(uppercaseVariations("passworD")).toBe(2);
  });

  it("should cap all-uppercase tokens", () => {
    expect(uppercaseVariations("PASSWORD")).toBe(2);
  });

  it("should count placements for mixed case", () => {
    // 2 upper, 6 lower: C(8,1) + C(8,2)
    expect(uppercaseVariations("PaSsword")).toBe(36);
  });
});

describe("l33tVariations", () => {
  it("should return 1 for plain matches", () => {
    expect(l33tVariations(createDictionaryMatch())).toBe(1);
  });

  it("should return 2 when every occurrence is substituted", () => {
    expect(
      l33tVariations(
        createDictionaryMatch({ token: "p4ssword", l33t: true, sub: { "4": "a" } }),
      ),
    ).toBe(2);
  });

  it("should count placements when substituted and plain letters mix", () => {
    expect(
      l33tVariations(
        createDictionaryMatch({ token: "4aa4", l33t: true, sub: { "4": "a" } }),
      ),
    ).toBe(10);
  });
});

describe("dictionaryGuesses", () => {
  it("should multiply rank by capitalization and reversal factors", () => {
    const result = dictionaryGuesses(
      createDictionaryMatch({ token: "Password", reversed: true }),
    );

    expect(result).toEqual({
      guesses: 40,
      baseGuesses: 10,
      uppercaseVariations: 2,
      l33tVariations: 1,
    });
  });
});

describe("spatialGuesses", () => {
  const base = {
    pattern: "spatial" as const,
    i: 0,
    j: 2,
    token: "qwe",
    graph: "qwerty" as const,
    turns: 1,
    shiftedCount: 0,
    startingPositions: 10,
    averageDegree: 2,
  };

  it("should count runs up to the token length", () => {
    // lengths 2 and 3, one turn each: 10 * 2 + 10 * 2
    expect(spatialGuesses(base)).toBe(40);
  });

  it("should multiply by shifted placements", () => {
    expect(spatialGuesses({ ...base, token: "qWe", shiftedCount: 1 })).toBe(120);
    expect(spatialGuesses({ ...base, token: "QWE", shiftedCount: 3 })).toBe(80);
  });
});

describe("repeatGuesses", () => {
  it("should multiply base guesses by the repeat count", () => {
    expect(
      repeatGuesses({
        pattern: "repeat",
        i: 0,
        j: 7,
        token: "aaaaaaaa",
        baseToken: "a",
        baseGuesses: 26,
        baseMatches: [],
        repeatCount: 8,
      }),
    ).toBe(208);
  });
});

describe("sequenceGuesses", () => {
  const sequence = (token: string, ascending: boolean) => ({
    pattern: "sequence" as const,
    i: 0,
    j: token.length - 1,
    token,
    sequenceName: "lower" as const,
    sequenceSpace: 26,
    ascending,
    delta: ascending ? 1 : -1,
  });

  it("should use a small base for obvious starts", () => {
    expect(sequenceGuesses(sequence("abc", true))).toBe(12);
  });

  it("should use the digit base for other digit runs", () => {
    expect(sequenceGuesses(sequence("456", true))).toBe(30);
  });

  it("should double descending runs", () => {
    expect(sequenceGuesses(sequence("jkl", true))).toBe(78);
    expect(sequenceGuesses(sequence("cba", false))).toBe(156);
  });
});

describe("regexGuesses", () => {
  it("should use the distance to the reference year", () => {
    expect(
      regexGuesses({ pattern: "regex", i: 0, j: 3, token: "1950", regexName: "recent_year" }),
    ).toBe(Math.max(Math.abs(1950 - REFERENCE_YEAR), 20));
  });

  it("should never go below the minimum year space", () => {
    const token = String(REFERENCE_YEAR);
    expect(
      regexGuesses({ pattern: "regex", i: 0, j: 3, token, regexName: "recent_year" }),
    ).toBe(20);
  });
});

describe("dateGuesses", () => {
  const date = { pattern: "date" as const, i: 0, j: 7, token: "", month: 1, day: 1 };

  it("should use year space times days per year", () => {
    expect(dateGuesses({ ...date, year: REFERENCE_YEAR, separator: "" })).toBe(7300);
  });

  it("should multiply dates with separators", () => {
    expect(dateGuesses({ ...date, year: REFERENCE_YEAR, separator: "/" })).toBe(29200);
  });
});

describe("bruteforceCardinality", () => {
  it("should add the sizes of the classes present", () => {
    expect(bruteforceCardinality("abc")).toBe(26);
    expect(bruteforceCardinality("aB3!")).toBe(95);
    expect(bruteforceCardinality("é")).toBe(100);
  });

  it("should never return less than 1", () => {
    expect(bruteforceCardinality("")).toBe(1);
  });
});

describe("bruteforceGuessesLog10", () => {
  it("should return length times log10 of the cardinality above the floor", () => {
    expect(bruteforceGuessesLog10(2, 10, 50)).toBe(2);
  });

  it("should return the floor when the estimate is below it", () => {
    expect(bruteforceGuessesLog10(1, 26, 50)).toBe(Math.log10(50));
  });
});

describe("minimumGuesses", () => {
  it("should allow whole-password matches down to 1", () => {
    expect(minimumGuesses(5, 5)).toBe(1);
  });

  it("should floor single-character and longer submatches", () => {
    expect(minimumGuesses(1, 5)).toBe(10);
    expect(minimumGuesses(2, 5)).toBe(50);
  });
});

describe("estimateGuesses", () => {
  it("should apply the submatch floor", () => {
    const match: RawMatch = createDictionaryMatch({
      i: 0,
      j: 1,
      token: "ab",
      matchedWord: "ab",
      rank: 3,
    });

    const scored = estimateGuesses(match, "abcd");

    expect(scored.guesses).toBe(50);
    expect(scored.guessesLog10).toBe(Math.log10(50));
  });

  it("should keep the raw estimate for a whole-password match", () => {
    const match: RawMatch = createDictionaryMatch({
      i: 0,
      j: 1,
      token: "ab",
      matchedWord: "ab",
      rank: 3,
    });

    const scored = estimateGuesses(match, "ab");

    expect(scored.guesses).toBe(3);
    expect(scored).toMatchObject({ baseGuesses: 3, uppercaseVariations: 1 });
  });

  it("should estimate bruteforce spans from their cardinality", () => {
    const scored = estimateGuesses(
      { pattern: "bruteforce", i: 0, j: 2, token: "xyz", cardinality: 26 },
      "xyz",
    );

    expect(scored.guessesLog10).toBeCloseTo(3 * Math.log10(26), 10);
  });
});
