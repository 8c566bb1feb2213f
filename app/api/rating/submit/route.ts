import { NextResponse, type NextRequest } from "next/server";
import { readJsonBody } from "@/lib/api/body";
import { ratingApiError } from "@/lib/api/errors";
import { openRequestSession } from "@/lib/api/ratingSession";

const ROUTE = "/api/rating/submit";

export async function POST(req: NextRequest) {
  try {
    const body = await readJsonBody(req);
    const caseId = String(body.caseId ?? "").trim();
    if (!caseId) {
      return NextResponse.json({ error: "caseId is required.", code: "MISSING_CASE_ID" }, { status: 400 });
    }

    const { session } = await openRequestSession(req, ROUTE);
    // Re-present the current case so the hidden flag comes from the server, never the client.
    await session.next();
    const { next } = await session.submit({
      caseId,
      verdict: body.verdict,
      comments: typeof body.comments === "string" ? body.comments : "",
    });
    const progress = await session.progress();
    return NextResponse.json({ ok: true, item: next, progress, done: next === null });
  } catch (e) {
    return ratingApiError(ROUTE, e);
  }
}
