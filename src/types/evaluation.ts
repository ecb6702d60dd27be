/**
 * Evaluation type definitions
 */

import type { Match } from "./match";
import type { CrackTimesDisplay, CrackTimesSeconds } from "./timeEstimates";
import type { Feedback, RenderedFeedback } from "./feedback";
import type { Translate } from "./i18n";

export type Score = 0 | 1 | 2 | 3 | 4;

/**
 * Caller-supplied word list entry. Non-string values are coerced with String().
 */
export type UserInput = unknown;

export type EvaluateOptions = {
  /** Extra words merged as the lowest-priority `user_inputs` dictionary */
  userInputs?: readonly UserInput[];
  /** Maximum accepted password length (defaults to 72) */
  maxLength?: number;
  /** When given, feedback is also rendered to text */
  translate?: Translate;
};

export type EvaluationResult = {
  password: string;
  guesses: number;
  guessesLog10: number;
  sequence: Match[];
  score: Score;
  crackTimesSeconds: CrackTimesSeconds;
  crackTimesDisplay: CrackTimesDisplay;
  feedback: Feedback;
  /** Present only when a translate function was supplied */
  feedbackText?: RenderedFeedback;
  /** Wall-clock duration of the call in milliseconds (diagnostic only) */
  calcTime: number;
};

/**
 * Runtime configuration of a PasswordEstimator. Omitted fields take the
 * environment defaults from src/config.ts.
 */
export type EstimatorOptions = {
  language?: string;
  userInputs?: readonly UserInput[];
  maxLength?: number;
  /** Root holding frequency_lists/ and locales/ */
  dataDir?: string;
};

/**
 * Fully resolved estimator configuration.
 */
export type EstimatorConfig = {
  language: string;
  maxLength: number;
  dataDir: string;
};
