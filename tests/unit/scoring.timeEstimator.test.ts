/**
 * Unit tests for crack time estimation
 */

import { describe, it, expect } from "vitest";
import { displayTime, estimateAttackTimes } from "@/scoring/timeEstimator";

const DAY = 86_400;
const MONTH = DAY * 31;
const YEAR = MONTH * 12;

describe("displayTime", () => {
  it.each([
    [0.5, { bucket: "ltSecond", count: null }],
    [1, { bucket: "seconds", count: 1 }],
    [59, { bucket: "seconds", count: 59 }],
    [60, { bucket: "minutes", count: 1 }],
    [7200, { bucket: "hours", count: 2 }],
    [DAY, { bucket: "days", count: 1 }],
    [MONTH, { bucket: "months", count: 1 }],
    [YEAR, { bucket: "years", count: 1 }],
    [YEAR * 100, { bucket: "centuries", count: null }],
  ])("should display %d seconds as %o", (seconds, expected) => {
    expect(displayTime(seconds)).toEqual(expected);
  });
});

describe("estimateAttackTimes", () => {
  it("should divide guesses by each attacker rate", () => {
    const { crackTimesSeconds } = estimateAttackTimes(1e4);

    expect(crackTimesSeconds.onlineThrottling100PerHour).toBeCloseTo(360_000, 6);
    expect(crackTimesSeconds.onlineNoThrottling10PerSecond).toBe(1000);
    expect(crackTimesSeconds.offlineSlowHashing1e4PerSecond).toBe(1);
    expect(crackTimesSeconds.offlineFastHashing1e10PerSecond).toBe(1e-6);
  });

  it("should bucket every scenario", () => {
    const { crackTimesDisplay } = estimateAttackTimes(1e4);

    expect(crackTimesDisplay).toEqual({
      onlineThrottling100PerHour: { bucket: "days", count: 4 },
      onlineNoThrottling10PerSecond: { bucket: "minutes", count: 17 },
      offlineSlowHashing1e4PerSecond: { bucket: "seconds", count: 1 },
      offlineFastHashing1e10PerSecond: { bucket: "ltSecond", count: null },
    });
  });
});
