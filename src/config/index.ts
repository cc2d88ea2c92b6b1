const requiredEnv = (key: string): string => {
  const value = process.env[key];
  if (value === undefined || value === "") {
    throw new Error(`Missing required env: ${key}`);
  }
  return value;
};

const optionalEnv = (key: string, fallback: string): string => {
  return process.env[key] ?? fallback;
};

const csvEnv = (key: string): string[] => {
  const raw = process.env[key]?.trim();
  if (!raw) return [];
  return raw.split(",").map((s) => s.trim()).filter(Boolean);
};

export interface LegislatorSeed {
  address: string;
  weight: bigint;
}

function makeConfig() {
  return {
    get port(): number {
      return Number(optionalEnv("PORT", "3000"));
    },
    get nodeEnv(): string {
      return optionalEnv("NODE_ENV", "development");
    },
    get appName(): string {
      return optionalEnv("APP_NAME", "resolution-court");
    },
    /** When unset, protocol events are not broadcast. */
    get redisUrl(): string | undefined {
      return process.env.REDIS_URL?.trim() || undefined;
    },
    get jwtSecret(): string {
      return requiredEnv("JWT_SECRET");
    },
    get authCookieName(): string {
      return optionalEnv("AUTH_COOKIE_NAME", AUTH_COOKIE_NAME);
    },
    /** Operator key for /api/internal/* and fee withdrawal (x-api-key). */
    get apiKey(): string | undefined {
      return process.env.API_KEY ?? undefined;
    },
    /** Comma-separated origins (e.g. "http://localhost:3000,http://localhost:3001"). "*" or "true" = allow all. */
    get corsOrigin(): string | string[] | true {
      const o = process.env.CORS_ORIGIN?.trim();
      if (o === "true" || o === "*") return true;
      const raw = o ?? "http://localhost:3000";
      const list = raw.split(",").map((s) => s.trim()).filter(Boolean);
      return list.length > 1 ? list : list[0] ?? raw;
    },
    /** Accounts allowed to withdraw protocol fees and adjudicate evidence challenges. */
    get oracleManagerAddresses(): string[] {
      return csvEnv("ORACLE_MANAGER_ADDRESSES");
    },
    /** Identity the server acts as for operator calls (keeper finalization, fee withdrawal). */
    get operatorAddress(): string | undefined {
      return process.env.OPERATOR_ADDRESS?.trim() || undefined;
    },
    get finalizationKeeperEnabled(): boolean {
      return process.env.FINALIZATION_KEEPER_ENABLED === "true" || process.env.FINALIZATION_KEEPER_ENABLED === "1";
    },
    /** Sweep interval in ms (default 60s, minimum 10s). */
    get finalizationKeeperIntervalMs(): number {
      return Math.max(10_000, Number(process.env.FINALIZATION_KEEPER_INTERVAL_MS) || 60_000);
    },
    /** Seed for the in-memory roster: "0xabc...:3,0xdef...:1". Weight defaults to 1. */
    get legislators(): LegislatorSeed[] {
      return csvEnv("LEGISLATORS").map((entry) => {
        const [address = "", weight] = entry.split(":").map((s) => s.trim());
        return { address, weight: weight ? BigInt(weight) : 1n };
      });
    },
  };
}

export const AUTH_COOKIE_NAME = "resolution-auth-jwt";

export const config = makeConfig();

export const REDIS_CHANNELS = {
  RESOLUTION_EVENTS: "resolution_events",
} as const;
