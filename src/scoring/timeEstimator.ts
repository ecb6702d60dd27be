/**
 * Crack time estimator
 *
 * Converts total guesses into the time each attacker profile needs,
 * and sorts each time into a human bucket.
 */

import type {
  AttackScenario,
  AttackTimes,
  CrackTimeDisplay,
  CrackTimesDisplay,
  CrackTimesSeconds,
} from "@/types";
import { ATTACK_RATES, TIME_BUCKETS } from "@/constants";

function forEachScenario<T>(
  compute: (scenario: AttackScenario) => T,
): Record<AttackScenario, T> {
  return {
    onlineThrottling100PerHour: compute("onlineThrottling100PerHour"),
    onlineNoThrottling10PerSecond: compute("onlineNoThrottling10PerSecond"),
    offlineSlowHashing1e4PerSecond: compute("offlineSlowHashing1e4PerSecond"),
    offlineFastHashing1e10PerSecond: compute("offlineFastHashing1e10PerSecond"),
  };
}

/**
 * Sorts a duration into its display bucket.
 *
 * @example
 * displayTime(0.5)     // { bucket: "ltSecond", count: null }
 * displayTime(7200)    // { bucket: "hours", count: 2 }
 * displayTime(1e12)    // { bucket: "centuries", count: null }
 */
export function displayTime(seconds: number): CrackTimeDisplay {
  for (const { bucket, below, unit } of TIME_BUCKETS) {
    if (seconds < below) {
      return { bucket, count: unit === null ? null : Math.round(seconds / unit) };
    }
  }
  return { bucket: "centuries", count: null };
}

/**
 * Estimates crack times for every attacker profile.
 *
 * @param guesses - Total guesses for the password
 */
export function estimateAttackTimes(guesses: number): AttackTimes {
  const crackTimesSeconds: CrackTimesSeconds = forEachScenario(
    (scenario) => guesses / ATTACK_RATES[scenario],
  );
  const crackTimesDisplay: CrackTimesDisplay = forEachScenario((scenario) =>
    displayTime(crackTimesSeconds[scenario]),
  );

  return { crackTimesSeconds, crackTimesDisplay };
}
