/**
 * CLI report shaping
 */

import type {
  AttackScenario,
  EvaluationResult,
  Pattern,
  RenderedFeedback,
  Score,
  Translate,
} from "@/types";
import { renderFeedback } from "@/feedback";
import { formatCrackTime } from "@/i18n";

export type ReportMatch = {
  pattern: Pattern;
  i: number;
  j: number;
  token: string;
  guessesLog10: number;
};

/**
 * JSON printed by the CLI. The password itself is left out.
 */
export type EvaluationReport = {
  score: Score;
  guesses: number;
  guessesLog10: number;
  crackTimesSeconds: Record<AttackScenario, number>;
  crackTimesDisplay: Record<AttackScenario, string>;
  feedback: RenderedFeedback;
  sequence: ReportMatch[];
  calcTimeMs: number;
};

/**
 * Turns an evaluation result into the CLI's report, with every
 * human-facing string rendered through `translate`.
 */
export function buildReport(
  result: EvaluationResult,
  translate: Translate,
): EvaluationReport {
  const display = result.crackTimesDisplay;
  return {
    score: result.score,
    guesses: result.guesses,
    guessesLog10: result.guessesLog10,
    crackTimesSeconds: result.crackTimesSeconds,
    crackTimesDisplay: {
      onlineThrottling100PerHour: formatCrackTime(
        display.onlineThrottling100PerHour,
        translate,
      ),
      onlineNoThrottling10PerSecond: formatCrackTime(
        display.onlineNoThrottling10PerSecond,
        translate,
      ),
      offlineSlowHashing1e4PerSecond: formatCrackTime(
        display.offlineSlowHashing1e4PerSecond,
        translate,
      ),
      offlineFastHashing1e10PerSecond: formatCrackTime(
        display.offlineFastHashing1e10PerSecond,
        translate,
      ),
    },
    feedback: result.feedbackText ?? renderFeedback(result.feedback, translate),
    sequence: result.sequence.map(({ pattern, i, j, token, guessesLog10 }) => ({
      pattern,
      i,
      j,
      token,
      guessesLog10,
    })),
    calcTimeMs: result.calcTime,
  };
}
