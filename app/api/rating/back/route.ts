import { NextResponse, type NextRequest } from "next/server";
import { ratingApiError } from "@/lib/api/errors";
import { openRequestSession } from "@/lib/api/ratingSession";

const ROUTE = "/api/rating/back";

export async function POST(req: NextRequest) {
  try {
    const { session } = await openRequestSession(req, ROUTE);
    await session.next();
    await session.backToProgress();
    return NextResponse.json({ ok: true, progress: await session.progress() });
  } catch (e) {
    return ratingApiError(ROUTE, e);
  }
}
