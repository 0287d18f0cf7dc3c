import {
  isRecord,
  type ApiError,
  type HealthResponse,
  type LoginRequest,
  type LoginResponse,
  type OverviewDashboardResponse,
  type RegisterRequest,
  type RegisterResponse,
  type UserDashboardResponse,
} from "@keyprint/core";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface KeyprintClientOptions {
  baseUrl: string; // e.g. "http://localhost:3001"
  fetchImpl?: FetchLike;
}

export class KeyprintApiError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = "KeyprintApiError";
  }
}

function readApiError(payload: unknown): ApiError | null {
  if (!isRecord(payload) || !isRecord(payload.error)) return null;

  const { code, message, details } = payload.error;
  if (typeof code !== "string" || typeof message !== "string") return null;
  return details === undefined ? { code, message } : { code, message, details };
}

async function readJson(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

export class KeyprintClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: KeyprintClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /** Resolves for a degraded server too (503 carries the same body). */
  async health(): Promise<HealthResponse> {
    return this.request<HealthResponse>("GET", "/health", undefined, [503]);
  }

  async register(body: RegisterRequest): Promise<RegisterResponse> {
    return this.request<RegisterResponse>("POST", "/register", body);
  }

  async login(body: LoginRequest): Promise<LoginResponse> {
    return this.request<LoginResponse>("POST", "/login", body);
  }

  async getOverviewDashboard(): Promise<OverviewDashboardResponse> {
    return this.request<OverviewDashboardResponse>("GET", "/dashboard/overview");
  }

  async getUserDashboard(username: string): Promise<UserDashboardResponse> {
    return this.request<UserDashboardResponse>("GET", `/dashboard/users/${encodeURIComponent(username)}`);
  }

  private async request<T>(
    method: "GET" | "POST",
    path: string,
    body?: unknown,
    acceptedStatuses: number[] = []
  ): Promise<T> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      ...(body === undefined
        ? {}
        : { headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) }),
    });

    if (res.ok || acceptedStatuses.includes(res.status)) {
      return res.json();
    }

    const apiError = readApiError(await readJson(res));
    throw new KeyprintApiError(
      res.status,
      apiError?.code ?? "HTTP_ERROR",
      apiError?.message ?? `HTTP ${res.status}`,
      apiError?.details
    );
  }
}
