import { NextResponse, type NextRequest } from "next/server";
import { listLoggedUsers, listUsers } from "@/lib/admin/ratingLogs";
import { ratingApiError } from "@/lib/api/errors";
import { requireAdmin } from "@/lib/auth/requestSession";
import { getRatingContext } from "@/lib/rating/context";

export async function GET(req: NextRequest) {
  try {
    const ctx = getRatingContext();
    requireAdmin(req, ctx);
    const users = ctx.users.list().map((u) => ({
      ...u,
      provisioned: ctx.assignments.has(u.username),
    }));
    return NextResponse.json({
      ok: true,
      usernames: listUsers(ctx),
      users,
      loggedUsers: await listLoggedUsers(ctx),
    });
  } catch (e) {
    return ratingApiError("/api/admin/users", e);
  }
}
