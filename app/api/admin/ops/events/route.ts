import { NextResponse, type NextRequest } from "next/server";
import { ratingApiError } from "@/lib/api/errors";
import { requireAdmin } from "@/lib/auth/requestSession";
import { readOpsEvents } from "@/lib/ops/eventLog";
import { getRatingContext } from "@/lib/rating/context";

export async function GET(req: NextRequest) {
  try {
    requireAdmin(req, getRatingContext());
    const limit = Math.max(10, Math.min(500, Number(req.nextUrl.searchParams.get("limit") || 100)));
    const maxBytes = Math.max(8_192, Math.min(4_000_000, Number(process.env.OPS_EVENTS_MAX_READ_BYTES || 1_000_000)));
    const events = await readOpsEvents(limit, maxBytes);
    return NextResponse.json({ ok: true, events });
  } catch (e) {
    return ratingApiError("/api/admin/ops/events", e);
  }
}
