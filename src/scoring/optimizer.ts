/**
 * Sequence optimizer
 *
 * Picks the cheapest way to explain the whole password as a chain of
 * non-overlapping matches, filling any span no matcher explains with a
 * bruteforce match.
 *
 * Costs are products of guesses, so the dynamic program adds log10
 * values: optimal[k] is the log10 of the fewest guesses needed for
 * password[0:k], with optimal[0] = 0 (one guess for the empty prefix).
 *
 * For every end position k the candidates are grouped by span. Within a
 * span, the candidates with the fewest guesses tie, and the span costs
 * their guesses times the number of tied explanations (the tie factor).
 * Across spans the lowest cost wins; equal costs are broken by fewer
 * tied explanations, then earlier start, then pattern name, so the
 * reconstructed sequence is reproducible.
 *
 * Runs in O(n^2 + m) for n characters and m candidate matches.
 */

import type { CharClass } from "./guessEstimators";
import type { Match, OptimalSequence, Pattern } from "@/types";
import {
  bruteforceGuessesLog10,
  cardinalityOfClasses,
  charClassOf,
  estimateGuesses,
  minimumGuesses,
} from "./guessEstimators";
import { LOG10_TIE_EPSILON } from "@/constants";
import { fromLog10 } from "@/utils/math";

/**
 * A possible explanation of one span, materialized only if it wins.
 */
type Candidate = {
  pattern: Pattern;
  guessesLog10: number;
  toMatch: () => Match;
};

type Step = {
  /** Start of the chosen span; the previous step ends at start */
  start: number;
  winner: Candidate;
  /** Number of equally cheap explanations of the span (tie factor) */
  alternatives: number;
  costLog10: number;
};

function comparePatterns(a: Pattern, b: Pattern): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Resolves the candidates for one span to its cheapest explanation and
 * the number of explanations tied with it.
 */
function resolveSpan(candidates: readonly Candidate[]): {
  winner: Candidate;
  alternatives: number;
} {
  const cheapest = Math.min(...candidates.map((c) => c.guessesLog10));
  const tied = candidates
    .filter((c) => c.guessesLog10 - cheapest <= LOG10_TIE_EPSILON)
    .sort((a, b) => comparePatterns(a.pattern, b.pattern));
  return { winner: tied[0], alternatives: tied.length };
}

function isBetterStep(a: Step, b: Step): boolean {
  if (Math.abs(a.costLog10 - b.costLog10) > LOG10_TIE_EPSILON) {
    return a.costLog10 < b.costLog10;
  }
  if (a.alternatives !== b.alternatives) {
    return a.alternatives < b.alternatives;
  }
  if (a.start !== b.start) {
    return a.start < b.start;
  }
  return comparePatterns(a.winner.pattern, b.winner.pattern) < 0;
}

/**
 * Finds the minimum-guess, non-overlapping match sequence covering the
 * whole password.
 *
 * @param password - Password being scored
 * @param matches - Scored candidate matches for this password
 * @returns Winning sequence and its total guesses (1 for the empty password)
 *
 * @example
 * const result = mostGuessableMatchSequence("musculature", omnimatch("musculature", snapshot));
 * result.sequence.map((m) => m.pattern) // ["dictionary"]
 */
export function mostGuessableMatchSequence(
  password: string,
  matches: readonly Match[],
): OptimalSequence {
  const n = password.length;
  if (n === 0) {
    return { password, guesses: 1, guessesLog10: 0, sequence: [] };
  }

  const matchesByEnd: Match[][] = Array.from({ length: n }, () => []);
  for (const match of matches) {
    matchesByEnd[match.j].push(match);
  }

  const optimal: number[] = [0];
  const steps: Step[] = [];

  for (let k = 1; k <= n; k++) {
    const end = k - 1;
    const bySpanStart = new Map<number, Candidate[]>();
    const addCandidate = (start: number, candidate: Candidate): void => {
      const group = bySpanStart.get(start);
      if (group) {
        group.push(candidate);
      } else {
        bySpanStart.set(start, [candidate]);
      }
    };

    for (const match of matchesByEnd[end]) {
      addCandidate(match.i, {
        pattern: match.pattern,
        guessesLog10: match.guessesLog10,
        toMatch: () => match,
      });
    }

    // A bruteforce explanation for every span ending here; character
    // classes are accumulated while the start moves left.
    const classes = new Set<CharClass>();
    for (let start = end; start >= 0; start--) {
      classes.add(charClassOf(password.charCodeAt(start)));
      const cardinality = cardinalityOfClasses(classes);
      const length = end - start + 1;
      const floor = minimumGuesses(length, n);
      addCandidate(start, {
        pattern: "bruteforce",
        guessesLog10: bruteforceGuessesLog10(length, cardinality, floor),
        toMatch: () =>
          estimateGuesses(
            {
              pattern: "bruteforce",
              i: start,
              j: end,
              token: password.slice(start, end + 1),
              cardinality,
            },
            password,
          ),
      });
    }

    let best: Step | null = null;
    for (const [start, candidates] of bySpanStart) {
      const { winner, alternatives } = resolveSpan(candidates);
      const step: Step = {
        start,
        winner,
        alternatives,
        costLog10:
          optimal[start] + winner.guessesLog10 + Math.log10(alternatives),
      };
      if (best === null || isBetterStep(step, best)) {
        best = step;
      }
    }
    if (best === null) {
      throw new Error(`No candidate explains position ${end}`);
    }

    optimal[k] = best.costLog10;
    steps[k] = best;
  }

  const sequence: Match[] = [];
  for (let k = n; k > 0; k = steps[k].start) {
    sequence.push(steps[k].winner.toMatch());
  }
  sequence.reverse();

  return {
    password,
    guesses: fromLog10(optimal[n]),
    guessesLog10: optimal[n],
    sequence,
  };
}
