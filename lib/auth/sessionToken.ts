import { createHmac, timingSafeEqual } from "node:crypto";
import { isPlainObject } from "@/lib/rating/guards";

export const SESSION_COOKIE = "rater_session";
export const SESSION_MAX_AGE_S = 60 * 60 * 12;

export type SessionClaims = {
  username: string;
  isAdmin: boolean;
  exp: number;
};

function sign(payload: string, secret: string) {
  return createHmac("sha256", secret).update(payload, "utf8").digest("base64url");
}

export function issueSessionToken(
  claims: Omit<SessionClaims, "exp">,
  secret: string,
  nowMs = Date.now()
): string {
  const full: SessionClaims = { ...claims, exp: Math.floor(nowMs / 1000) + SESSION_MAX_AGE_S };
  const payload = Buffer.from(JSON.stringify(full), "utf8").toString("base64url");
  return `${payload}.${sign(payload, secret)}`;
}

export function readSessionToken(token: string | null | undefined, secret: string, nowMs = Date.now()): SessionClaims | null {
  const raw = String(token || "");
  const dot = raw.lastIndexOf(".");
  if (dot <= 0) return null;
  const payload = raw.slice(0, dot);
  const given = Buffer.from(raw.slice(dot + 1), "utf8");
  const expected = Buffer.from(sign(payload, secret), "utf8");
  if (given.length !== expected.length || !timingSafeEqual(given, expected)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
  } catch {
    return null;
  }
  if (!isPlainObject(parsed)) return null;
  const p = parsed;
  if (typeof p.username !== "string" || !p.username) return null;
  if (typeof p.exp !== "number" || p.exp * 1000 <= nowMs) return null;
  return { username: p.username, isAdmin: p.isAdmin === true, exp: p.exp };
}
