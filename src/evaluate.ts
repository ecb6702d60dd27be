/**
 * Password evaluation entry point
 *
 * Length guard, pattern matching, sequence optimization, scoring, crack
 * times, feedback. Pure apart from the clock read for `calcTime`.
 */

import type {
  EvaluateOptions,
  EvaluationResult,
  Snapshot,
} from "@/types";
import { DEFAULT_MAX_LENGTH } from "@/constants";
import { LengthExceededError } from "@/estimator/errors";
import { getFeedback, renderFeedback } from "@/feedback";
import { omnimatch } from "@/matching";
import {
  estimateAttackTimes,
  mostGuessableMatchSequence,
  scoreFromGuesses,
} from "@/scoring";
import { withUserInputs } from "@/snapshot/snapshot";

/**
 * Throws if the password has more than `maxLength` characters, counted as
 * code points ("😀" is one character).
 *
 * @throws {LengthExceededError}
 */
export function assertWithinLength(password: string, maxLength: number): void {
  const length = [...password].length;
  if (length > maxLength) {
    throw new LengthExceededError(length, maxLength);
  }
}

/**
 * Estimates the strength of one password against a dictionary snapshot.
 *
 * Per-call user inputs are merged into a copy of the snapshot; the
 * snapshot itself is never modified, so concurrent calls may share it.
 *
 * @throws {LengthExceededError} If the password is longer than `options.maxLength` (default 72)
 *
 * @example
 * const result = evaluate("correcthorse", snapshot, { userInputs: ["horse"] });
 * console.log(result.score, result.feedback.warning);
 */
export function evaluate(
  password: string,
  snapshot: Snapshot,
  options: EvaluateOptions = {},
): EvaluationResult {
  const start = performance.now();
  assertWithinLength(password, options.maxLength ?? DEFAULT_MAX_LENGTH);

  const effective = withUserInputs(snapshot, options.userInputs ?? []);
  const matches = omnimatch(password, effective);
  const { guesses, guessesLog10, sequence } = mostGuessableMatchSequence(
    password,
    matches,
  );
  const score = scoreFromGuesses(guesses);
  const { crackTimesSeconds, crackTimesDisplay } = estimateAttackTimes(guesses);
  const feedback = getFeedback(score, sequence);

  const result: EvaluationResult = {
    password,
    guesses,
    guessesLog10,
    sequence,
    score,
    crackTimesSeconds,
    crackTimesDisplay,
    feedback,
    calcTime: 0,
  };
  if (options.translate) {
    result.feedbackText = renderFeedback(feedback, options.translate);
  }
  result.calcTime = performance.now() - start;
  return result;
}
