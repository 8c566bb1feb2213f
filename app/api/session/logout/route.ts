import { NextResponse, type NextRequest } from "next/server";
import { ratingApiError } from "@/lib/api/errors";
import { requireRater } from "@/lib/auth/requestSession";
import { SESSION_COOKIE } from "@/lib/auth/sessionToken";
import { getRatingContext } from "@/lib/rating/context";

export async function POST(req: NextRequest) {
  try {
    const ctx = getRatingContext();
    const user = requireRater(req, ctx);
    await ctx.log.append(user.username, "LOGOUT");
    const res = NextResponse.json({ ok: true });
    res.cookies.delete(SESSION_COOKIE);
    return res;
  } catch (e) {
    return ratingApiError("/api/session/logout", e);
  }
}
