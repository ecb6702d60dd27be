/**
 * Attacker throughput profiles and display buckets
 *
 * Rates are guesses per second and are a stable policy choice:
 * changing them changes every crack time reported.
 */

import type { AttackScenario, TimeBucket } from "@/types";

export const ATTACK_RATES: Readonly<Record<AttackScenario, number>> = {
  onlineThrottling100PerHour: 100 / 3600,
  onlineNoThrottling10PerSecond: 10,
  offlineSlowHashing1e4PerSecond: 1e4,
  offlineFastHashing1e10PerSecond: 1e10,
};

const MINUTE = 60;
const HOUR = MINUTE * 60;
const DAY = HOUR * 24;
const MONTH = DAY * 31;
const YEAR = MONTH * 12;
const CENTURY = YEAR * 100;

/**
 * Buckets checked in order; a duration falls into the first bucket whose
 * `below` bound it does not reach. `unit` is the seconds per counted unit.
 */
export const TIME_BUCKETS: readonly {
  bucket: TimeBucket;
  below: number;
  unit: number | null;
}[] = [
  { bucket: "ltSecond", below: 1, unit: null },
  { bucket: "seconds", below: MINUTE, unit: 1 },
  { bucket: "minutes", below: HOUR, unit: MINUTE },
  { bucket: "hours", below: DAY, unit: HOUR },
  { bucket: "days", below: MONTH, unit: DAY },
  { bucket: "months", below: YEAR, unit: MONTH },
  { bucket: "years", below: CENTURY, unit: YEAR },
];
