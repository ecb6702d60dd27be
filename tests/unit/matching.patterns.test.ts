/**
 * Unit tests for the spatial, repeat, sequence, regex and date matchers
 */

import { describe, it, expect } from "vitest";
import type { OptimalSequence } from "@/types";
import { ADJACENCY_GRAPHS } from "@/keyboards/adjacencyGraphs";
import { spatialMatch } from "@/matching/spatialMatcher";
import { repeatMatch } from "@/matching/repeatMatcher";
import { sequenceMatch, stepBetween } from "@/matching/sequenceMatcher";
import { regexMatch } from "@/matching/regexMatcher";
import {
  dateMatch,
  mapIntsToDmy,
  twoToFourDigitYear,
} from "@/matching/dateMatcher";

function analyzeStub(token: string): OptimalSequence {
  return { password: token, guesses: 10, guessesLog10: 1, sequence: [] };
}

describe("spatialMatch", () => {
  it("should find a straight qwerty row", () => {
    const matches = spatialMatch("qwerty", ADJACENCY_GRAPHS).filter(
      (m) => m.graph === "qwerty",
    );

    expect(matches).toHaveLength(1);
    expect(matches[0]).toMatchObject({
      i: 0,
      j: 5,
      token: "qwerty",
      turns: 1,
      shiftedCount: 0,
    });
  });

  it("should count turns and shifted keys", () => {
    const [turned] = spatialMatch("qwerf", ADJACENCY_GRAPHS).filter(
      (m) => m.graph === "qwerty",
    );
    const [shifted] = spatialMatch("QWErty", ADJACENCY_GRAPHS).filter(
      (m) => m.graph === "qwerty",
    );

    expect(turned).toMatchObject({ token: "qwerf", turns: 2 });
    expect(shifted).toMatchObject({ token: "QWErty", turns: 1, shiftedCount: 3 });
  });

  it("should search every graph", () => {
    const graphs = spatialMatch("789", ADJACENCY_GRAPHS)
      .map((m) => m.graph)
      .sort();

    expect(graphs).toEqual(["dvorak", "keypad", "mac_keypad", "qwerty"]);
  });

  it("should ignore runs shorter than three keys", () => {
    expect(spatialMatch("qw", ADJACENCY_GRAPHS)).toEqual([]);
  });
});

describe("repeatMatch", () => {
  it("should find a single-character repeat", () => {
    expect(repeatMatch("aaaaaaaa", analyzeStub)).toEqual([
      {
        pattern: "repeat",
        i: 0,
        j: 7,
        token: "aaaaaaaa",
        baseToken: "a",
        baseGuesses: 10,
        baseMatches: [],
        repeatCount: 8,
      },
    ]);
  });

  it("should find the shortest repeated unit", () => {
    const [match] = repeatMatch("abcabcabc", analyzeStub);

    expect(match).toMatchObject({ baseToken: "abc", repeatCount: 3 });
  });

  it("should prefer the longer greedy repeat", () => {
    const [match] = repeatMatch("aabaab", analyzeStub);

    expect(match).toMatchObject({
      i: 0,
      j: 5,
      baseToken: "aab",
      repeatCount: 2,
    });
  });

  it("should find several repeats in one password", () => {
    const matches = repeatMatch("aaxbb", analyzeStub);

    expect(matches.map(({ i, j, token }) => [i, j, token])).toEqual([
      [0, 1, "aa"],
      [3, 4, "bb"],
    ]);
  });

  it("should repeat line terminators like other characters", () => {
    expect(repeatMatch("\n\n\n\n", analyzeStub)).toMatchObject([
      { i: 0, j: 3, baseToken: "\n", repeatCount: 4 },
    ]);
    expect(repeatMatch("a\na\n", analyzeStub)).toMatchObject([
      { i: 0, j: 3, baseToken: "a\n", repeatCount: 2 },
    ]);
  });

  it("should find nothing without repetition", () => {
    expect(repeatMatch("xyz", analyzeStub)).toEqual([]);
  });
});

describe("stepBetween", () => {
  it("should wrap around within letters and digits", () => {
    expect(stepBetween("z", "a")).toBe(1);
    expect(stepBetween("0", "9")).toBe(-1);
    expect(stepBetween("b", "a")).toBe(-1);
  });

  it("should use the raw code difference across classes", () => {
    expect(stepBetween("a", "1")).toBe(49 - 97);
  });
});

describe("sequenceMatch", () => {
  it("should find an ascending run", () => {
    expect(sequenceMatch("abcdef")).toEqual([
      {
        pattern: "sequence",
        i: 0,
        j: 5,
        token: "abcdef",
        sequenceName: "lower",
        sequenceSpace: 26,
        ascending: true,
        delta: 1,
      },
    ]);
  });

  it("should split runs that change direction, sharing the turning character", () => {
    const matches = sequenceMatch("abcba");

    expect(matches.map(({ token, ascending }) => [token, ascending])).toEqual([
      ["abc", true],
      ["cba", false],
    ]);
  });

  it("should follow a run through the end of the alphabet", () => {
    const [match] = sequenceMatch("xyzab");

    expect(match).toMatchObject({ i: 0, j: 4, delta: 1 });
  });

  it("should name digit runs", () => {
    const [match] = sequenceMatch("9876");

    expect(match).toMatchObject({
      sequenceName: "digits",
      sequenceSpace: 10,
      ascending: false,
    });
  });

  it("should ignore short and non-unit runs", () => {
    expect(sequenceMatch("ab")).toEqual([]);
    expect(sequenceMatch("aceg")).toEqual([]);
  });
});

describe("regexMatch", () => {
  it("should find every recent year", () => {
    const matches = regexMatch("born1987and2024");

    expect(matches.map(({ i, j, token, regexName }) => ({ i, j, token, regexName }))).toEqual([
      { i: 4, j: 7, token: "1987", regexName: "recent_year" },
      { i: 11, j: 14, token: "2024", regexName: "recent_year" },
    ]);
  });

  it("should be repeatable with the shared pattern", () => {
    expect(regexMatch("1999")).toHaveLength(1);
    expect(regexMatch("1999")).toHaveLength(1);
  });
});

describe("twoToFourDigitYear", () => {
  it("should map two-digit years into 1951-2050", () => {
    expect(twoToFourDigitYear(99)).toBe(1999);
    expect(twoToFourDigitYear(50)).toBe(2050);
    expect(twoToFourDigitYear(10)).toBe(2010);
    expect(twoToFourDigitYear(1987)).toBe(1987);
  });
});

describe("mapIntsToDmy", () => {
  it("should read a four-digit year at either end", () => {
    expect(mapIntsToDmy([1, 1, 1991])).toEqual({ year: 1991, month: 1, day: 1 });
    expect(mapIntsToDmy([2020, 1, 1])).toEqual({ year: 2020, month: 1, day: 1 });
  });

  it("should read two-digit years and swap day and month when needed", () => {
    expect(mapIntsToDmy([31, 12, 99])).toEqual({ year: 1999, month: 12, day: 31 });
  });

  it("should reject impossible combinations", () => {
    expect(mapIntsToDmy([0, 0, 2000])).toBeNull();
    expect(mapIntsToDmy([1991, 13, 13])).toBeNull();
    expect(mapIntsToDmy([1, 40, 1991])).toBeNull();
  });
});

describe("dateMatch", () => {
  it("should find a separated date and drop the parts it contains", () => {
    expect(dateMatch("2020-01-01")).toEqual([
      {
        pattern: "date",
        i: 0,
        j: 9,
        token: "2020-01-01",
        separator: "-",
        year: 2020,
        month: 1,
        day: 1,
      },
    ]);
  });

  it("should find a date without separators", () => {
    expect(dateMatch("13051990")).toEqual([
      {
        pattern: "date",
        i: 0,
        j: 7,
        token: "13051990",
        separator: "",
        year: 1990,
        month: 5,
        day: 13,
      },
    ]);
  });

  it("should pick the reading closest to the reference year", () => {
    const [match] = dateMatch("111997");

    expect(match).toMatchObject({ year: 1997, month: 1, day: 1 });
  });

  it("should find nothing in text", () => {
    expect(dateMatch("password")).toEqual([]);
  });
});
