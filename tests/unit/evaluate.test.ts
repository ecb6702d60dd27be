/**
 * Unit tests for the evaluation entry point
 */

import { describe, it, expect } from "vitest";
import type { RankedDictionaries, Snapshot } from "@/types";
import { evaluate } from "@/evaluate";
import { LengthExceededError } from "@/estimator/errors";
import { ADJACENCY_GRAPHS } from "@/keyboards/adjacencyGraphs";
import { createSnapshot } from "../helpers/snapshot";

describe("evaluate", () => {
  const snapshot = createSnapshot({ passwords: ["dragon"] });

  it("should return a well-formed result for the empty password", () => {
    const result = evaluate("", snapshot);

    expect(result).toMatchObject({
      password: "",
      guesses: 1,
      guessesLog10: 0,
      sequence: [],
      score: 0,
      feedback: { warning: null, suggestions: ["useWords", "noNeed"] },
    });
    expect(result.feedbackText).toBeUndefined();
    expect(result.calcTime).toBeGreaterThanOrEqual(0);
  });

  it("should score a common password", () => {
    const result = evaluate("dragon", snapshot);

    expect(result.score).toBe(0);
    expect(result.sequence).toHaveLength(1);
    expect(result.sequence[0]).toMatchObject({
      pattern: "dictionary",
      dictionaryName: "passwords",
      rank: 1,
    });
    expect(result.feedback.warning).toBe("topTen");
    expect(result.crackTimesDisplay.offlineFastHashing1e10PerSecond).toEqual({
      bucket: "ltSecond",
      count: null,
    });
  });

  it("should reject a password longer than the maximum", () => {
    expect(() => evaluate("x".repeat(73), snapshot)).toThrow(LengthExceededError);
    expect(() => evaluate("x".repeat(72), snapshot)).not.toThrow();
  });

  it("should report lengths on the error", () => {
    try {
      evaluate("abcdef", snapshot, { maxLength: 4 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LengthExceededError);
      expect(error).toMatchObject({ length: 6, maxLength: 4 });
    }
  });

  it("should count characters outside the BMP once", () => {
    expect(() => evaluate("😀".repeat(72), snapshot)).not.toThrow();
    expect(() => evaluate("😀".repeat(73), snapshot)).toThrow(
      "Password length exceeded: 73 characters, maximum is 72",
    );
  });

  it("should check the length before matching starts", () => {
    const trap: Snapshot = {
      get dictionaries(): RankedDictionaries {
        throw new Error("matching started");
      },
      graphs: ADJACENCY_GRAPHS,
    };

    expect(() => evaluate("abcdef", trap, { maxLength: 4 })).toThrow(
      LengthExceededError,
    );
    expect(() => evaluate("abc", trap)).toThrow("matching started");
  });

  it("should merge per-call user inputs without touching the snapshot", () => {
    const result = evaluate("alice", snapshot, { userInputs: ["Alice"] });

    expect(result.sequence[0]).toMatchObject({
      dictionaryName: "user_inputs",
      rank: 1,
    });
    expect(snapshot.dictionaries.user_inputs).toBeUndefined();
  });

  it("should render feedback text when given a translate function", () => {
    const result = evaluate("dragon", snapshot, {
      translate: (key) => `[${key}]`,
    });

    expect(result.feedbackText).toEqual({
      warning: "[warnings.topTen]",
      suggestions: ["[suggestions.anotherWord]"],
    });
  });
});
