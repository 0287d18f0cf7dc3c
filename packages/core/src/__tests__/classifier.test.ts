import { describe, expect, it } from "vitest";
import type { KeystrokeFeatures } from "../contracts/keystroke";
import {
  createSoftmaxClassifier,
  ModelArtifactError,
  parseModelArtifact,
} from "../biometrics/classifier";

const BASE: KeystrokeFeatures = {
  keystrokeCount: 20,
  digraphCount: 19,
  durationMs: 4000,
  holdMeanMs: 0,
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

const ARTIFACT = {
  version: 1,
  kind: "softmax_regression",
  features: ["holdMeanMs"],
  scaler: { mean: [0], std: [1] },
  classes: ["alice", "bob"],
  weights: [[1], [-1]],
  bias: [0, 0],
  minConfidence: 0.7,
};

describe("softmax classifier", () => {
  it("parses a well-formed artifact", () => {
    const artifact = parseModelArtifact(ARTIFACT);

    expect(artifact.features).toEqual(["holdMeanMs"]);
    expect(artifact.classes).toEqual(["alice", "bob"]);
    expect(artifact.minConfidence).toBe(0.7);
  });

  it("predicts the most probable class", async () => {
    const classifier = createSoftmaxClassifier(parseModelArtifact(ARTIFACT));

    // logits ±ln(3)/2 give probabilities 3/4 and 1/4
    const prediction = await classifier.predict({ ...BASE, holdMeanMs: Math.log(3) / 2 });

    expect(prediction.label).toBe("alice");
    expect(prediction.confidence).toBeCloseTo(0.75, 10);
    expect(prediction.probabilities.alice).toBeCloseTo(0.75, 10);
    expect(prediction.probabilities.bob).toBeCloseTo(0.25, 10);
    expect(classifier.minConfidence).toBe(0.7);
  });

  it("standardises inputs with the stored scaler", async () => {
    const classifier = createSoftmaxClassifier(
      parseModelArtifact({ ...ARTIFACT, scaler: { mean: [100], std: [10] } })
    );

    const prediction = await classifier.predict({ ...BASE, holdMeanMs: 100 - 10 * (Math.log(3) / 2) });

    expect(prediction.label).toBe("bob");
    expect(prediction.confidence).toBeCloseTo(0.75, 10);
  });

  it("keeps the first class on a tie", async () => {
    const classifier = createSoftmaxClassifier(parseModelArtifact(ARTIFACT));
    const prediction = await classifier.predict(BASE);

    expect(prediction.label).toBe("alice");
    expect(prediction.probabilities).toEqual({ alice: 0.5, bob: 0.5 });
  });

  it("rejects malformed artifacts", () => {
    expect(() => parseModelArtifact(null)).toThrow(ModelArtifactError);
    expect(() => parseModelArtifact({ ...ARTIFACT, version: 2 })).toThrow(/Unsupported/);
    expect(() => parseModelArtifact({ ...ARTIFACT, features: ["shoeSize"] })).toThrow(
      "Unknown feature: shoeSize"
    );
    expect(() => parseModelArtifact({ ...ARTIFACT, weights: [[1]] })).toThrow(
      "weights must hold one row per class."
    );
    expect(() => parseModelArtifact({ ...ARTIFACT, bias: [0] })).toThrow(
      "bias must be an array of 2 finite numbers."
    );
    expect(() => parseModelArtifact({ ...ARTIFACT, minConfidence: 2 })).toThrow(
      "minConfidence must be within [0, 1]."
    );
  });
});
