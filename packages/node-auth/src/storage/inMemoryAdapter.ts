import type {
  KeystrokeFeatures,
  KeystrokeSampleRecord,
  LoginSessionRecord,
  OverviewStats,
  UserDashboardStats,
  UserRecord,
} from "@keyprint/core";
import { UsernameTakenError } from "../errors";
import type { StorageAdapter } from "./adapter";
import {
  emptyMethodCounts,
  successRate,
  type NewLoginSession,
  type NewRegistration,
} from "./types";

function cloneUser(user: UserRecord): UserRecord {
  return { ...user };
}

function cloneSample(sample: KeystrokeSampleRecord): KeystrokeSampleRecord {
  return { ...sample, features: { ...sample.features } };
}

function cloneSession(session: LoginSessionRecord): LoginSessionRecord {
  return { ...session };
}

/** Same contract as the SQLite adapter, kept in process for tests and local runs. */
export class InMemoryAdapter implements StorageAdapter {
  private readonly users = new Map<number, UserRecord>();
  private readonly passwordHashes = new Map<number, string>();
  private samples: KeystrokeSampleRecord[] = [];
  private sessions: LoginSessionRecord[] = [];
  private nextUserId = 1;
  private nextSampleId = 1;
  private nextSessionId = 1;

  async registerUser(registration: NewRegistration): Promise<UserRecord> {
    if (this.findByName(registration.name)) {
      throw new UsernameTakenError(registration.name);
    }

    const user: UserRecord = {
      id: this.nextUserId,
      name: registration.name,
      createdAt: registration.createdAt,
    };
    this.nextUserId += 1;

    this.users.set(user.id, user);
    this.passwordHashes.set(user.id, registration.passwordHash);
    for (const features of registration.samples) {
      this.insertSample(user.id, features, registration.createdAt);
    }

    return cloneUser(user);
  }

  async findUserByName(name: string): Promise<UserRecord | null> {
    const user = this.findByName(name);
    return user ? cloneUser(user) : null;
  }

  async getPasswordHash(userId: number): Promise<string | null> {
    return this.passwordHashes.get(userId) ?? null;
  }

  async listKeystrokeSamples(userId: number, limit: number): Promise<KeystrokeSampleRecord[]> {
    return this.samples
      .filter((sample) => sample.userId === userId)
      .sort((left, right) => right.id - left.id)
      .slice(0, limit)
      .map(cloneSample);
  }

  async appendKeystrokeSample(
    userId: number,
    features: KeystrokeFeatures,
    createdAt: string
  ): Promise<KeystrokeSampleRecord> {
    return cloneSample(this.insertSample(userId, features, createdAt));
  }

  async recordLoginSession(session: NewLoginSession): Promise<LoginSessionRecord> {
    const record: LoginSessionRecord = { id: this.nextSessionId, ...session };
    this.nextSessionId += 1;
    this.sessions.push(record);
    return cloneSession(record);
  }

  async getOverviewStats(): Promise<OverviewStats> {
    const sessionsByMethod = emptyMethodCounts();
    let granted = 0;

    for (const session of this.sessions) {
      sessionsByMethod[session.method] += 1;
      if (session.status === "granted") granted += 1;
    }

    return {
      userCount: this.users.size,
      sampleCount: this.samples.length,
      sessionCount: this.sessions.length,
      sessionsByStatus: {
        granted,
        denied: this.sessions.length - granted,
      },
      sessionsByMethod,
      successRate: successRate(granted, this.sessions.length),
    };
  }

  async getUserDashboard(userId: number, recentLimit: number): Promise<UserDashboardStats | null> {
    const user = this.users.get(userId);
    if (!user) return null;

    const sessions = this.sessions.filter((session) => session.userId === userId);
    const sessionsByMethod = emptyMethodCounts();
    let granted = 0;
    let lastGrantedAt: string | null = null;

    for (const session of sessions) {
      sessionsByMethod[session.method] += 1;
      if (session.status !== "granted") continue;

      granted += 1;
      if (lastGrantedAt === null || session.timestamp > lastGrantedAt) {
        lastGrantedAt = session.timestamp;
      }
    }

    return {
      user: cloneUser(user),
      sampleCount: this.samples.filter((sample) => sample.userId === userId).length,
      attempts: {
        total: sessions.length,
        granted,
        denied: sessions.length - granted,
      },
      sessionsByMethod,
      lastGrantedAt,
      recentSessions: [...sessions]
        .sort((left, right) => right.id - left.id)
        .slice(0, recentLimit)
        .map(cloneSession),
    };
  }

  async deleteUser(userId: number): Promise<boolean> {
    if (!this.users.delete(userId)) return false;

    this.passwordHashes.delete(userId);
    this.samples = this.samples.filter((sample) => sample.userId !== userId);
    this.sessions = this.sessions.filter((session) => session.userId !== userId);
    return true;
  }

  async purgeLoginSessionsBefore(timestamp: string): Promise<number> {
    const before = this.sessions.length;
    this.sessions = this.sessions.filter((session) => session.timestamp >= timestamp);
    return before - this.sessions.length;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  private findByName(name: string): UserRecord | undefined {
    for (const user of this.users.values()) {
      if (user.name === name) return user;
    }
    return undefined;
  }

  private insertSample(userId: number, features: KeystrokeFeatures, createdAt: string): KeystrokeSampleRecord {
    const record: KeystrokeSampleRecord = {
      id: this.nextSampleId,
      userId,
      features: { ...features },
      createdAt,
    };
    this.nextSampleId += 1;
    this.samples.push(record);
    return record;
  }
}
