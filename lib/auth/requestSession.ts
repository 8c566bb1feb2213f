import type { NextRequest } from "next/server";
import { ForbiddenError, UnauthorizedError } from "@/lib/rating/errors";
import type { RatingContext } from "@/lib/rating/context";
import type { RaterUser } from "@/lib/auth/userTable";
import { readSessionToken, SESSION_COOKIE } from "@/lib/auth/sessionToken";

/** The signed cookie names the user; the user table decides whether they still exist and are admin. */
export function requireRater(req: NextRequest, ctx: RatingContext): RaterUser {
  const claims = readSessionToken(req.cookies.get(SESSION_COOKIE)?.value, ctx.config.sessionSecret);
  if (!claims) throw new UnauthorizedError();
  const user = ctx.users.find(claims.username);
  if (!user) throw new UnauthorizedError("Your session is no longer valid. Sign in again.");
  return user;
}

export function requireAdmin(req: NextRequest, ctx: RatingContext): RaterUser {
  const user = requireRater(req, ctx);
  if (!user.isAdmin) throw new ForbiddenError();
  return user;
}
