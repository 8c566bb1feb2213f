import { NextResponse, type NextRequest } from "next/server";
import { ratingApiError } from "@/lib/api/errors";
import { requireAdmin } from "@/lib/auth/requestSession";
import { getRatingContext, reloadRatingContext } from "@/lib/rating/context";
import { appendOpsEvent } from "@/lib/ops/eventLog";

export async function POST(req: NextRequest) {
  try {
    const admin = requireAdmin(req, getRatingContext());
    const ctx = reloadRatingContext();
    await appendOpsEvent({ type: "CONTEXT_RELOADED", actor: admin.username, route: "/api/admin/reload", status: 200 });
    return NextResponse.json({ ok: true, users: ctx.users.list().length, assigned: ctx.assignments.usernames().length });
  } catch (e) {
    return ratingApiError("/api/admin/reload", e);
  }
}
