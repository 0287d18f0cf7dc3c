import type { HybridDecision, HybridPolicy, ModelPrediction } from "../contracts/auth";
import type { KeystrokeFeatures } from "../contracts/keystroke";
import type { KeystrokeClassifier } from "../biometrics/classifier";
import { clamp, isFiniteNumber, toRounded } from "../biometrics/numeric";
import {
  HIGH_DISTANCE_LIMIT,
  resolveZScoreThreshold,
  scoreAgainstSamples,
} from "../biometrics/zscoreScoring";

export const DEFAULT_MODEL_MIN_CONFIDENCE = 0.5;

export type HybridDecisionInput = {
  username: string;
  features: KeystrokeFeatures;
  storedSamples: KeystrokeFeatures[];
  modelUsers: ReadonlySet<string>;
  classifier?: KeystrokeClassifier | null;
  policy?: HybridPolicy;
  /** Extraction reasons carried into the decision (e.g. OUTLIER_TRIMMED). */
  reasons?: string[];
  onModelError?: (error: unknown) => void;
};

function uniq(values: string[]): string[] {
  return Array.from(new Set(values));
}

export function resolveModelMinConfidence(
  policy: HybridPolicy | undefined,
  classifier: KeystrokeClassifier
): number {
  const fromPolicy = policy?.modelMinConfidence;
  const configured = isFiniteNumber(fromPolicy) ? fromPolicy : classifier.minConfidence;
  return clamp(isFiniteNumber(configured) ? configured : DEFAULT_MODEL_MIN_CONFIDENCE, 0, 1);
}

function roundPrediction(prediction: ModelPrediction): ModelPrediction {
  return {
    label: prediction.label,
    confidence: toRounded(prediction.confidence),
    probabilities: Object.fromEntries(
      Object.entries(prediction.probabilities).map(([label, value]) => [label, toRounded(value)])
    ),
  };
}

/** Compares raw probabilities; only the returned values are rounded. */
function decideByModel(args: {
  username: string;
  prediction: ModelPrediction;
  threshold: number;
  reasons: string[];
}): HybridDecision {
  const reasons = [...args.reasons];
  const labelMatches = args.prediction.label === args.username;
  const confident = args.prediction.confidence >= args.threshold;

  if (!labelMatches) reasons.push("MODEL_LABEL_MISMATCH");
  else if (!confident) reasons.push("LOW_MODEL_CONFIDENCE");

  return {
    granted: labelMatches && confident,
    method: "model",
    score: toRounded(args.prediction.probabilities[args.username] ?? 0),
    threshold: args.threshold,
    reasons: uniq(reasons),
    prediction: roundPrediction(args.prediction),
  };
}

function decideByZScore(args: {
  features: KeystrokeFeatures;
  storedSamples: KeystrokeFeatures[];
  threshold: number;
  reasons: string[];
}): HybridDecision {
  const reasons = [...args.reasons];

  if (args.storedSamples.length === 0) {
    reasons.push("PROFILE_MISSING");
    return {
      granted: false,
      method: "zscore",
      score: 0,
      threshold: args.threshold,
      reasons: uniq(reasons),
    };
  }

  const scored = scoreAgainstSamples(args.features, args.storedSamples);
  const granted = scored.similarity >= args.threshold;

  if (scored.distance > HIGH_DISTANCE_LIMIT) reasons.push("HIGH_DISTANCE");
  if (!granted) reasons.push("LOW_SIMILARITY");

  return {
    granted,
    method: "zscore",
    score: toRounded(scored.similarity),
    threshold: args.threshold,
    distance: toRounded(scored.distance),
    reasons: uniq(reasons),
  };
}

/**
 * Allow-listed users are judged by the classifier; everyone else, and
 * allow-listed users while the classifier is unavailable, by the z-score
 * similarity against their stored samples.
 */
export async function decideHybrid(input: HybridDecisionInput): Promise<HybridDecision> {
  const reasons = [...(input.reasons ?? [])];
  const zscoreThreshold = resolveZScoreThreshold(input.policy?.zscoreThreshold);

  if (input.modelUsers.has(input.username)) {
    const classifier = input.classifier ?? null;
    if (classifier) {
      try {
        const prediction = await classifier.predict(input.features);
        return decideByModel({
          username: input.username,
          prediction,
          threshold: resolveModelMinConfidence(input.policy, classifier),
          reasons,
        });
      } catch (error) {
        input.onModelError?.(error);
      }
    }
    reasons.push("MODEL_UNAVAILABLE");
  }

  return decideByZScore({
    features: input.features,
    storedSamples: input.storedSamples,
    threshold: zscoreThreshold,
    reasons,
  });
}
