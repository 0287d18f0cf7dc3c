import type { KeystrokeFeatureKey, KeystrokeFeatures } from "../contracts/keystroke";
import { clamp, isFiniteNumber, toRounded } from "./numeric";

type ScoredFeature = {
  key: KeystrokeFeatureKey;
  minStd: number;
  weight: number;
};

export type FeatureStatistics = {
  key: KeystrokeFeatureKey;
  mean: number;
  std: number;
};

export type ZScoreResult = {
  distance: number;
  similarity: number;
  featuresUsed: number;
  zScores: Partial<Record<KeystrokeFeatureKey, number>>;
};

export const DEFAULT_ZSCORE_THRESHOLD = 0.5;

/** Decay applied to the weighted RMS z-score when turning it into a similarity. */
export const SIMILARITY_DECAY = 0.35;

export const HIGH_DISTANCE_LIMIT = 2.2;

const NO_DATA_DISTANCE = 10;

export const SCORED_FEATURES: readonly ScoredFeature[] = [
  { key: "holdMeanMs", minStd: 8, weight: 1.2 },
  { key: "flightMeanMs", minStd: 8, weight: 1 },
  { key: "ddMeanMs", minStd: 8, weight: 0.8 },
  { key: "udMeanMs", minStd: 8, weight: 1 },
  { key: "uuMeanMs", minStd: 8, weight: 0.6 },
  { key: "typingSpeedCharsPerSec", minStd: 0.3, weight: 0.5 },
  { key: "errorRate", minStd: 0.05, weight: 0.5 },
  { key: "backspaceRate", minStd: 0.05, weight: 0.4 },
];

export function resolveZScoreThreshold(value?: number): number {
  return clamp(isFiniteNumber(value) ? value : DEFAULT_ZSCORE_THRESHOLD, 0.01, 0.99);
}

export function computeFeatureStatistics(samples: KeystrokeFeatures[]): FeatureStatistics[] {
  if (samples.length === 0) return [];

  return SCORED_FEATURES.map(({ key }) => {
    const values = samples.map((sample) => sample[key]).filter(isFiniteNumber);
    if (values.length === 0) return { key, mean: Number.NaN, std: 0 };

    const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
    const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
    return { key, mean, std: Math.sqrt(variance) };
  });
}

export function distanceToSimilarity(distance: number): number {
  if (!Number.isFinite(distance) || distance < 0) return 0;
  return clamp(Math.exp(-SIMILARITY_DECAY * distance), 0, 1);
}

/**
 * Weighted RMS of per-feature z-scores of `features` against the stored
 * samples. Each feature's spread is floored at its `minStd`, so a single
 * stored sample (zero spread) still yields finite scores.
 */
export function scoreAgainstSamples(
  features: KeystrokeFeatures,
  samples: KeystrokeFeatures[]
): ZScoreResult {
  const statistics = computeFeatureStatistics(samples);
  const zScores: Partial<Record<KeystrokeFeatureKey, number>> = {};

  let weightedSquares = 0;
  let totalWeight = 0;
  let featuresUsed = 0;

  for (const feature of SCORED_FEATURES) {
    const stats = statistics.find((entry) => entry.key === feature.key);
    const value = features[feature.key];
    if (!stats || !isFiniteNumber(stats.mean) || !isFiniteNumber(value)) continue;

    const std = Math.max(feature.minStd, stats.std);
    const z = (value - stats.mean) / std;

    zScores[feature.key] = toRounded(z);
    weightedSquares += feature.weight * z * z;
    totalWeight += feature.weight;
    featuresUsed += 1;
  }

  if (featuresUsed === 0 || totalWeight <= 0) {
    return { distance: NO_DATA_DISTANCE, similarity: 0, featuresUsed: 0, zScores };
  }

  const distance = Math.sqrt(weightedSquares / totalWeight);
  return {
    distance,
    similarity: distanceToSimilarity(distance),
    featuresUsed,
    zScores,
  };
}
