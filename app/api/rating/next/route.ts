import { NextResponse, type NextRequest } from "next/server";
import { ratingApiError } from "@/lib/api/errors";
import { openRequestSession } from "@/lib/api/ratingSession";

const ROUTE = "/api/rating/next";

export async function GET(req: NextRequest) {
  try {
    const { session } = await openRequestSession(req, ROUTE);
    const item = await session.next();
    const progress = await session.progress();
    return NextResponse.json({ ok: true, item, progress, done: item === null });
  } catch (e) {
    return ratingApiError(ROUTE, e);
  }
}
