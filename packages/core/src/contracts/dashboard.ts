import type { LoginMethod, LoginSessionRecord, LoginStatus, UserRecord } from "./auth";

export type OverviewStats = {
  userCount: number;
  sampleCount: number;
  sessionCount: number;
  sessionsByStatus: Record<LoginStatus, number>;
  sessionsByMethod: Record<LoginMethod, number>;
  successRate: number;
};

export type UserDashboardStats = {
  user: UserRecord;
  sampleCount: number;
  attempts: {
    total: number;
    granted: number;
    denied: number;
  };
  sessionsByMethod: Record<LoginMethod, number>;
  lastGrantedAt: string | null;
  recentSessions: LoginSessionRecord[];
};

export type OverviewDashboardResponse = {
  ok: true;
  overview: OverviewStats;
};

export type UserDashboardResponse = {
  ok: true;
  dashboard: UserDashboardStats;
};

export type HealthResponse = {
  ok: boolean;
  status: "up" | "degraded";
  database: "up" | "down";
};
