import type { ModelPrediction } from "../contracts/auth";
import type { KeystrokeFeatureKey, KeystrokeFeatures } from "../contracts/keystroke";
import { KEYSTROKE_FEATURE_KEYS } from "../contracts/keystroke";
import { isFiniteNumber, isRecord } from "./numeric";

/**
 * A softmax-regression model exported from training as plain JSON.
 *
 * Inputs are standardised with the stored scaler before the linear layer:
 * `x' = (x - mean) / std`, `logits = W x' + b`, `p = softmax(logits)`.
 */
export type SoftmaxModelArtifact = {
  version: 1;
  kind: "softmax_regression";
  features: KeystrokeFeatureKey[];
  scaler: {
    mean: number[];
    std: number[];
  };
  classes: string[];
  weights: number[][];
  bias: number[];
  minConfidence?: number;
};

export interface KeystrokeClassifier {
  readonly classes: readonly string[];
  readonly minConfidence?: number;
  predict(features: KeystrokeFeatures): Promise<ModelPrediction>;
}

export class ModelArtifactError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ModelArtifactError";
  }
}

function isFeatureKey(value: unknown): value is KeystrokeFeatureKey {
  return KEYSTROKE_FEATURE_KEYS.some((key) => key === value);
}

function readNumbers(value: unknown, length: number, label: string): number[] {
  if (!Array.isArray(value) || value.length !== length || !value.every(isFiniteNumber)) {
    throw new ModelArtifactError(`${label} must be an array of ${length} finite numbers.`);
  }
  return [...value];
}

export function parseModelArtifact(value: unknown): SoftmaxModelArtifact {
  if (!isRecord(value)) {
    throw new ModelArtifactError("Model artifact must be a JSON object.");
  }
  if (value.version !== 1 || value.kind !== "softmax_regression") {
    throw new ModelArtifactError("Unsupported model artifact version or kind.");
  }

  const features = value.features;
  if (!Array.isArray(features) || features.length === 0) {
    throw new ModelArtifactError("features must be a non-empty array.");
  }
  const featureKeys: KeystrokeFeatureKey[] = [];
  for (const feature of features) {
    if (!isFeatureKey(feature)) {
      throw new ModelArtifactError(`Unknown feature: ${String(feature)}`);
    }
    featureKeys.push(feature);
  }

  const classes = value.classes;
  if (
    !Array.isArray(classes) ||
    classes.length < 2 ||
    !classes.every((label): label is string => typeof label === "string" && label.length > 0)
  ) {
    throw new ModelArtifactError("classes must list at least two labels.");
  }

  if (!isRecord(value.scaler)) {
    throw new ModelArtifactError("scaler must be an object.");
  }
  const mean = readNumbers(value.scaler.mean, featureKeys.length, "scaler.mean");
  const std = readNumbers(value.scaler.std, featureKeys.length, "scaler.std");

  if (!Array.isArray(value.weights) || value.weights.length !== classes.length) {
    throw new ModelArtifactError("weights must hold one row per class.");
  }
  const weights = value.weights.map((row, index) =>
    readNumbers(row, featureKeys.length, `weights[${index}]`)
  );
  const bias = readNumbers(value.bias, classes.length, "bias");

  let minConfidence: number | undefined;
  if (value.minConfidence !== undefined) {
    if (!isFiniteNumber(value.minConfidence) || value.minConfidence < 0 || value.minConfidence > 1) {
      throw new ModelArtifactError("minConfidence must be within [0, 1].");
    }
    minConfidence = value.minConfidence;
  }

  return {
    version: 1,
    kind: "softmax_regression",
    features: featureKeys,
    scaler: { mean, std },
    classes: [...classes],
    weights,
    bias,
    ...(minConfidence !== undefined ? { minConfidence } : {}),
  };
}

function softmax(logits: number[]): number[] {
  const max = Math.max(...logits);
  const exps = logits.map((logit) => Math.exp(logit - max));
  const total = exps.reduce((sum, value) => sum + value, 0);
  return exps.map((value) => value / total);
}

export function createSoftmaxClassifier(artifact: SoftmaxModelArtifact): KeystrokeClassifier {
  const { features, scaler, classes, weights, bias } = artifact;

  return {
    classes,
    minConfidence: artifact.minConfidence,
    async predict(input: KeystrokeFeatures): Promise<ModelPrediction> {
      const scaled = features.map((key, index) => {
        const std = scaler.std[index] !== 0 ? scaler.std[index] : 1;
        return (input[key] - scaler.mean[index]) / std;
      });

      const logits = weights.map(
        (row, classIndex) =>
          row.reduce((sum, weight, index) => sum + weight * scaled[index], 0) + bias[classIndex]
      );
      const probabilities = softmax(logits);

      let best = 0;
      for (let index = 1; index < probabilities.length; index += 1) {
        if (probabilities[index] > probabilities[best]) best = index;
      }

      return {
        label: classes[best],
        confidence: probabilities[best],
        probabilities: Object.fromEntries(classes.map((label, index) => [label, probabilities[index]])),
      };
    },
  };
}
