import { NextResponse, type NextRequest } from "next/server";
import { readJsonBody } from "@/lib/api/body";
import { ratingApiError } from "@/lib/api/errors";
import { issueSessionToken, SESSION_COOKIE, SESSION_MAX_AGE_S } from "@/lib/auth/sessionToken";
import { getRatingContext } from "@/lib/rating/context";
import { appendOpsEvent } from "@/lib/ops/eventLog";

const ROUTE = "/api/session/login";

export async function POST(req: NextRequest) {
  try {
    const ctx = getRatingContext();
    const body = await readJsonBody(req);
    const username = String(body.username ?? "").trim();
    const password = String(body.password ?? "");

    if (!username || !password) {
      return NextResponse.json({ error: "Username and password are required." }, { status: 400 });
    }

    const user = ctx.users.verify(username, password);
    if (!user) {
      if (ctx.users.find(username)) {
        await ctx.log.append(username, "LOGIN_FAIL");
      } else {
        await appendOpsEvent({ type: "LOGIN_FAIL_UNKNOWN_USER", actor: username, route: ROUTE, status: 401 });
      }
      return NextResponse.json({ error: "Invalid username or password.", code: "INVALID_CREDENTIALS" }, { status: 401 });
    }

    await ctx.log.append(user.username, "LOGIN_SUCCESS");
    const res = NextResponse.json({ ok: true, user });
    res.cookies.set(SESSION_COOKIE, issueSessionToken(user, ctx.config.sessionSecret), {
      httpOnly: true,
      sameSite: "lax",
      secure: process.env.NODE_ENV === "production",
      path: "/",
      maxAge: SESSION_MAX_AGE_S,
    });
    return res;
  } catch (e) {
    return ratingApiError(ROUTE, e);
  }
}
