/**
 * Crack time estimation type definitions
 */

export type AttackScenario =
  | "onlineThrottling100PerHour"
  | "onlineNoThrottling10PerSecond"
  | "offlineSlowHashing1e4PerSecond"
  | "offlineFastHashing1e10PerSecond";

export type TimeBucket =
  | "ltSecond"
  | "seconds"
  | "minutes"
  | "hours"
  | "days"
  | "months"
  | "years"
  | "centuries";

/**
 * Human bucket for one crack time.
 *
 * `count` is the rounded number of bucket units, null for the open-ended
 * buckets (less than a second, centuries).
 */
export type CrackTimeDisplay = {
  bucket: TimeBucket;
  count: number | null;
};

export type CrackTimesSeconds = Record<AttackScenario, number>;
export type CrackTimesDisplay = Record<AttackScenario, CrackTimeDisplay>;

export type AttackTimes = {
  crackTimesSeconds: CrackTimesSeconds;
  crackTimesDisplay: CrackTimesDisplay;
};
