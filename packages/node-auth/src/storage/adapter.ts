import type {
  KeystrokeFeatures,
  KeystrokeSampleRecord,
  LoginSessionRecord,
  OverviewStats,
  UserDashboardStats,
  UserRecord,
} from "@keyprint/core";
import type { NewLoginSession, NewRegistration } from "./types";

export interface StorageAdapter {
  /** Writes the user, its password hash and its enrolment samples together. Throws UsernameTakenError. */
  registerUser(registration: NewRegistration): Promise<UserRecord>;
  findUserByName(name: string): Promise<UserRecord | null>;
  getPasswordHash(userId: number): Promise<string | null>;
  /** Most recent first, at most `limit` rows. */
  listKeystrokeSamples(userId: number, limit: number): Promise<KeystrokeSampleRecord[]>;
  appendKeystrokeSample(userId: number, features: KeystrokeFeatures, createdAt: string): Promise<KeystrokeSampleRecord>;
  recordLoginSession(session: NewLoginSession): Promise<LoginSessionRecord>;
  getOverviewStats(): Promise<OverviewStats>;
  getUserDashboard(userId: number, recentLimit: number): Promise<UserDashboardStats | null>;
  deleteUser(userId: number): Promise<boolean>;
  purgeLoginSessionsBefore(timestamp: string): Promise<number>;
  ping(): Promise<boolean>;
}
