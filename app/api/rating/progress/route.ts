import { NextResponse, type NextRequest } from "next/server";
import { ratingApiError } from "@/lib/api/errors";
import { openRequestSession } from "@/lib/api/ratingSession";

const ROUTE = "/api/rating/progress";

export async function GET(req: NextRequest) {
  try {
    const { user, session } = await openRequestSession(req, ROUTE);
    const progress = await session.progress();
    return NextResponse.json({ ok: true, user, progress });
  } catch (e) {
    return ratingApiError(ROUTE, e);
  }
}
