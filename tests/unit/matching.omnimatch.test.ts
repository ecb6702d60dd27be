/**
 * Unit tests for omnimatch
 */

import { describe, it, expect } from "vitest";
import { omnimatch } from "@/matching";
import { createSnapshot } from "../helpers/snapshot";

describe("omnimatch", () => {
  const snapshot = createSnapshot({ passwords: ["password"] });

  it("should collect scored matches from every matcher, ordered by span", () => {
    const matches = omnimatch("password123", snapshot);

    expect(matches[0]).toMatchObject({
      pattern: "dictionary",
      i: 0,
      j: 7,
      guesses: 50,
    });
    // obvious start "1": 4 * 3, raised to the submatch floor
    expect(matches.find((m) => m.pattern === "sequence")).toMatchObject({
      i: 8,
      j: 10,
      guesses: 50,
    });
    expect(
      matches.flatMap((m) => (m.pattern === "spatial" ? [m.graph] : [])),
    ).toEqual(["qwerty", "dvorak", "keypad", "mac_keypad"]);

    for (let k = 1; k < matches.length; k++) {
      const previous = matches[k - 1];
      const current = matches[k];
      expect(
        previous.i < current.i ||
          (previous.i === current.i && previous.j <= current.j),
      ).toBe(true);
    }
  });

  it("should analyze repeated units recursively", () => {
    const [repeat] = omnimatch("passwordpassword", snapshot).filter(
      (match) => match.pattern === "repeat",
    );

    expect(repeat).toMatchObject({
      baseToken: "password",
      baseGuesses: 1,
      repeatCount: 2,
      guesses: 2,
    });
  });

  it("should return nothing for the empty password", () => {
    expect(omnimatch("", snapshot)).toEqual([]);
  });
});
