import type { KeystrokeFeatures, KeystrokeInput } from "./keystroke";

export type LoginStatus = "granted" | "denied";

export type LoginMethod = "password" | "zscore" | "model";

export type BiometricMethod = Exclude<LoginMethod, "password">;

export type UserRecord = {
  id: number;
  name: string;
  createdAt: string;
};

export type LoginSessionRecord = {
  id: number;
  userId: number;
  timestamp: string;
  status: LoginStatus;
  method: LoginMethod;
};

export type ModelPrediction = {
  label: string;
  confidence: number;
  probabilities: Record<string, number>;
};

export type HybridPolicy = {
  zscoreThreshold?: number;
  modelMinConfidence?: number;
};

export type HybridDecision = {
  granted: boolean;
  method: BiometricMethod;
  score: number;
  threshold: number;
  reasons: string[];
  distance?: number;
  prediction?: ModelPrediction;
};

export type RegisterRequest = {
  username: string;
  password: string;
  keystrokeSamples: KeystrokeInput[];
};

export type RegisterResponse = {
  ok: true;
  userId: number;
  username: string;
  sampleCount: number;
  createdAt: string;
};

export type LoginRequest = {
  username: string;
  password: string;
  keystroke: KeystrokeInput;
};

export type LoginResponse = {
  ok: true;
  userId: number;
  username: string;
  method: BiometricMethod;
  score: number;
  threshold: number;
  reasons: string[];
  sessionId: number;
  sampleAppended: boolean;
};

export type BiometricRejectionDetails = {
  method: BiometricMethod;
  score: number;
  threshold: number;
  reasons: string[];
};

export type ResolvedKeystroke = {
  features: KeystrokeFeatures;
  reasons: string[];
};
