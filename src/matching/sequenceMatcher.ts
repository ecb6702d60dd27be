/**
 * Sequence matcher
 *
 * Detects runs of characters with a constant step of +1 or -1 ("abcd",
 * "4321", "xyzab"). Steps wrap around within letters and digits.
 */

import type { SequenceMatchFields, SequenceName } from "@/types";
import { MIN_SEQUENCE_LENGTH } from "@/constants";

type CharClass = { first: number; size: number };

const LOWER: CharClass = { first: 97, size: 26 };
const UPPER: CharClass = { first: 65, size: 26 };
const DIGITS: CharClass = { first: 48, size: 10 };

function charClassOf(code: number): CharClass | null {
  for (const cls of [LOWER, UPPER, DIGITS]) {
    if (code >= cls.first && code < cls.first + cls.size) {
      return cls;
    }
  }
  return null;
}

/**
 * Step from one character to the next.
 *
 * Within a class the step is taken modulo the class size and mapped to
 * the range (-size/2, size/2], so "z" → "a" is +1 and "0" → "9" is -1.
 * Across classes it is the raw code point difference.
 */
export function stepBetween(previous: string, current: string): number {
  const a = previous.charCodeAt(0);
  const b = current.charCodeAt(0);
  const cls = charClassOf(a);
  if (cls === null || cls !== charClassOf(b)) {
    return b - a;
  }
  const step = (((b - a) % cls.size) + cls.size) % cls.size;
  return step > cls.size / 2 ? step - cls.size : step;
}

function sequenceNameOf(token: string): {
  sequenceName: SequenceName;
  sequenceSpace: number;
} {
  if (/^[a-z]+$/.test(token)) {
    return { sequenceName: "lower", sequenceSpace: 26 };
  }
  if (/^[A-Z]+$/.test(token)) {
    return { sequenceName: "upper", sequenceSpace: 26 };
  }
  if (/^\d+$/.test(token)) {
    return { sequenceName: "digits", sequenceSpace: 10 };
  }
  return { sequenceName: "unicode", sequenceSpace: 26 };
}

/**
 * Finds maximal constant-step runs of length >= 3.
 *
 * Neighbouring runs share their boundary character: "abcba" yields
 * "abc" and "cba".
 *
 * @param password - Password to scan
 * @returns Sequence matches in order of position
 */
export function sequenceMatch(password: string): SequenceMatchFields[] {
  const result: SequenceMatchFields[] = [];
  if (password.length < MIN_SEQUENCE_LENGTH) {
    return result;
  }

  const update = (i: number, j: number, delta: number): void => {
    if (j - i + 1 < MIN_SEQUENCE_LENGTH || Math.abs(delta) !== 1) {
      return;
    }
    const token = password.slice(i, j + 1);
    result.push({
      pattern: "sequence",
      i,
      j,
      token,
      ...sequenceNameOf(token),
      ascending: delta > 0,
      delta,
    });
  };

  let i = 0;
  let lastDelta: number | null = null;
  for (let k = 1; k < password.length; k++) {
    const delta = stepBetween(password[k - 1], password[k]);
    if (lastDelta === null) {
      lastDelta = delta;
    }
    if (delta === lastDelta) {
      continue;
    }
    const j = k - 1;
    update(i, j, lastDelta);
    i = j;
    lastDelta = delta;
  }
  if (lastDelta !== null) {
    update(i, password.length - 1, lastDelta);
  }

  return result;
}
