/**
 * Score classifier
 */

import type { Score } from "@/types";
import { SCORE_THRESHOLDS } from "@/constants";

/**
 * Maps total guesses to a 0-4 strength score.
 *
 * @example
 * scoreFromGuesses(999)  // 0
 * scoreFromGuesses(1e6)  // 2
 * scoreFromGuesses(1e12) // 4
 */
export function scoreFromGuesses(guesses: number): Score {
  for (const { score, below } of SCORE_THRESHOLDS) {
    if (guesses < below) {
      return score;
    }
  }
  return 4;
}
