import path from "node:path";
import type { ReratingPolicy } from "@/lib/rating/types";

export type RatingConfig = {
  dataDir: string;
  usersFile: string;
  assignmentsFile: string;
  logsDir: string;
  reratingPolicy: ReratingPolicy;
  blindSalt: string;
  lockTimeoutMs: number;
  lockStaleMs: number;
  sessionSecret: string;
};

type Env = Record<string, string | undefined>;

function resolvePathOr(v: unknown, fallback: string) {
  const raw = String(v || "").trim();
  const p = raw || fallback;
  return path.isAbsolute(p) ? p : path.join(process.cwd(), p);
}

function normalizePolicy(v: unknown): ReratingPolicy {
  const x = String(v || "").trim().toLowerCase();
  if (x === "update" || x === "overwrite") return "update";
  return "strict";
}

function normalizeSmallInt(v: unknown, fallback: number, min: number, max: number): number {
  const raw = String(v ?? "").trim();
  if (!raw) return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) return fallback;
  return Math.max(min, Math.min(max, Math.round(n)));
}

function resolveSessionSecret(env: Env) {
  const secret = String(env.RATING_SESSION_SECRET || "").trim();
  if (secret) return secret;
  if (env.NODE_ENV === "production") {
    throw new Error("RATING_SESSION_SECRET must be set in production.");
  }
  return "dev-session-secret";
}

export function readRatingConfig(env: Env = process.env): RatingConfig {
  return {
    dataDir: resolvePathOr(env.RATING_DATA_DIR, "data"),
    usersFile: resolvePathOr(env.RATING_USERS_FILE, "users.xlsx"),
    assignmentsFile: resolvePathOr(env.RATING_ASSIGNMENTS_FILE, "user_report_mapping.json"),
    logsDir: resolvePathOr(env.RATING_LOGS_DIR, "logs"),
    reratingPolicy: normalizePolicy(env.RATING_RERATING_POLICY),
    blindSalt: String(env.RATING_BLIND_SALT || "").trim() || "blind-rating",
    lockTimeoutMs: normalizeSmallInt(env.RATING_LOCK_TIMEOUT_MS, 5000, 100, 60_000),
    lockStaleMs: normalizeSmallInt(env.RATING_LOCK_STALE_MS, 30_000, 1000, 600_000),
    sessionSecret: resolveSessionSecret(env),
  };
}
