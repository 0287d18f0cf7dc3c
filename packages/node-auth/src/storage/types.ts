import type { KeystrokeFeatures, LoginMethod, LoginStatus } from "@keyprint/core";

export type NewRegistration = {
  name: string;
  passwordHash: string;
  samples: KeystrokeFeatures[];
  createdAt: string;
};

export type NewLoginSession = {
  userId: number;
  timestamp: string;
  status: LoginStatus;
  method: LoginMethod;
};

export function emptyMethodCounts(): Record<LoginMethod, number> {
  return { password: 0, zscore: 0, model: 0 };
}

export function successRate(granted: number, total: number): number {
  if (total <= 0) return 0;
  return Math.round((granted / total) * 1000) / 1000;
}
