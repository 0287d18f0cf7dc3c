export * from "./contracts/auth";
export * from "./contracts/dashboard";
export * from "./contracts/errors";
export * from "./contracts/keystroke";
export * from "./biometrics/keystrokeFeatures";
export * from "./biometrics/zscoreScoring";
export * from "./biometrics/classifier";
export * from "./auth/hybridDecision";
export { clamp, isFiniteNumber, isRecord, toRounded } from "./biometrics/numeric";
