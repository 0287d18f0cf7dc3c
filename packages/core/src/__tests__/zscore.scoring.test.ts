import { describe, expect, it } from "vitest";
import type { KeystrokeFeatures } from "../contracts/keystroke";
import {
  computeFeatureStatistics,
  distanceToSimilarity,
  resolveZScoreThreshold,
  scoreAgainstSamples,
} from "../biometrics/zscoreScoring";

const BASE: KeystrokeFeatures = {
  keystrokeCount: 20,
  digraphCount: 19,
  durationMs: 4000,
  holdMeanMs: 100,
  holdStdMs: 12,
  flightMeanMs: 60,
  flightStdMs: 15,
  ddMeanMs: 160,
  ddStdMs: 20,
  udMeanMs: 60,
  udStdMs: 15,
  uuMeanMs: 160,
  uuStdMs: 20,
  typingSpeedCharsPerSec: 5,
  errorRate: 0.02,
  backspaceRate: 0.01,
};

// only hold deviates (z = 2); total weight of scored features is 6
const EXPECTED_DISTANCE = Math.sqrt((1.2 * 4) / 6);

describe("z-score similarity", () => {
  it("scores an identical vector as a perfect match", () => {
    const result = scoreAgainstSamples(BASE, [BASE, BASE]);

    expect(result.distance).toBe(0);
    expect(result.similarity).toBe(1);
    expect(result.featuresUsed).toBe(8);
  });

  it("floors the spread at the feature minimum when samples agree", () => {
    const result = scoreAgainstSamples({ ...BASE, holdMeanMs: 116 }, [BASE, BASE]);

    expect(result.zScores.holdMeanMs).toBe(2);
    expect(result.zScores.flightMeanMs).toBe(0);
    expect(result.distance).toBeCloseTo(EXPECTED_DISTANCE, 9);
    expect(result.similarity).toBeCloseTo(Math.exp(-0.35 * EXPECTED_DISTANCE), 9);
  });

  it("uses the observed spread when it exceeds the minimum", () => {
    const result = scoreAgainstSamples({ ...BASE, holdMeanMs: 120 }, [
      { ...BASE, holdMeanMs: 90 },
      { ...BASE, holdMeanMs: 110 },
    ]);

    expect(result.zScores.holdMeanMs).toBe(2);
    expect(result.distance).toBeCloseTo(EXPECTED_DISTANCE, 9);
  });

  it("reports population statistics per scored feature", () => {
    const stats = computeFeatureStatistics([
      { ...BASE, holdMeanMs: 90 },
      { ...BASE, holdMeanMs: 110 },
    ]);

    expect(stats.find((entry) => entry.key === "holdMeanMs")).toEqual({
      key: "holdMeanMs",
      mean: 100,
      std: 10,
    });
    expect(computeFeatureStatistics([])).toEqual([]);
  });

  it("returns no similarity without stored samples", () => {
    const result = scoreAgainstSamples(BASE, []);

    expect(result.featuresUsed).toBe(0);
    expect(result.similarity).toBe(0);
    expect(result.distance).toBe(10);
  });

  it("maps invalid distances to zero similarity", () => {
    expect(distanceToSimilarity(-1)).toBe(0);
    expect(distanceToSimilarity(Number.NaN)).toBe(0);
    expect(distanceToSimilarity(0)).toBe(1);
  });

  it("clamps the acceptance threshold", () => {
    expect(resolveZScoreThreshold()).toBe(0.5);
    expect(resolveZScoreThreshold(0.7)).toBe(0.7);
    expect(resolveZScoreThreshold(5)).toBe(0.99);
    expect(resolveZScoreThreshold(0)).toBe(0.01);
  });
});
