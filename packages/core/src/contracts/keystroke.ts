export type KeystrokeEvent = {
  key?: string;
  code?: string;
  type: "down" | "up";
  t: number;
  isRepeat?: boolean;
  location?: number;
  expectedIndex?: number;
};

export type KeystrokeSample = {
  events: KeystrokeEvent[];
  expectedText?: string;
  typedLength?: number;
  errorCount?: number;
  backspaceCount?: number;
  ignoredEventCount?: number;
  imeCompositionUsed?: boolean;
  source?: "collector_v1" | "manual";
};

export const KEYSTROKE_FEATURE_KEYS = [
  "keystrokeCount",
  "digraphCount",
  "durationMs",
  "holdMeanMs",
  "holdStdMs",
  "flightMeanMs",
  "flightStdMs",
  "ddMeanMs",
  "ddStdMs",
  "udMeanMs",
  "udStdMs",
  "uuMeanMs",
  "uuStdMs",
  "typingSpeedCharsPerSec",
  "errorRate",
  "backspaceRate",
] as const;

export type KeystrokeFeatureKey = (typeof KEYSTROKE_FEATURE_KEYS)[number];

/** Numeric summary of one typing sample; what `biometric_profile` stores per row. */
export type KeystrokeFeatures = Record<KeystrokeFeatureKey, number>;

/** What a client may submit wherever a typing sample is expected. */
export type KeystrokeInput = KeystrokeFeatures | KeystrokeSample;

export type KeystrokeSampleRecord = {
  id: number;
  userId: number;
  features: KeystrokeFeatures;
  createdAt: string;
};
