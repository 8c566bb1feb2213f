import type { NextRequest } from "next/server";
import { requireRater } from "@/lib/auth/requestSession";
import { getRatingContext, openRatingSession } from "@/lib/rating/context";
import { RatingError } from "@/lib/rating/errors";
import { appendOpsEvent } from "@/lib/ops/eventLog";

const INTEGRITY_CODES = new Set(["MISSING_CASE", "CATALOG_FORMAT", "ASSIGNMENT_FORMAT"]);

/**
 * Signs the caller in from the cookie and opens their rating session.
 * Data integrity failures are also written to the ops log, since they
 * need an administrator rather than the rater.
 */
export async function openRequestSession(req: NextRequest, route: string) {
  const ctx = getRatingContext();
  const user = requireRater(req, ctx);
  try {
    const session = await openRatingSession(user.username, ctx);
    return { ctx, user, session };
  } catch (e) {
    if (e instanceof RatingError && INTEGRITY_CODES.has(e.code)) {
      await appendOpsEvent({
        type: e.code,
        actor: user.username,
        route,
        status: e.status,
        details: { message: e.message },
      });
    }
    throw e;
  }
}
