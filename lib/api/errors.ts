import { randomUUID } from "crypto";
import { NextResponse } from "next/server";
import { RatingError, toErrorMessage } from "@/lib/rating/errors";

type ApiErrorInput = {
  status?: number;
  code: string;
  userMessage: string;
  requestId?: string;
  route: string;
  details?: unknown;
  cause?: unknown;
};

export function makeRequestId() {
  return randomUUID();
}

export function apiError(input: ApiErrorInput) {
  const status = input.status ?? 500;
  const requestId = input.requestId || makeRequestId();
  const isDev = process.env.NODE_ENV !== "production";

  // Always log rich details server-side with request id for traceability.
  console.error(
    JSON.stringify({
      level: status >= 500 ? "error" : "warn",
      route: input.route,
      requestId,
      code: input.code,
      status,
      userMessage: input.userMessage,
      details: input.details ?? null,
      cause: toErrorMessage(input.cause),
    })
  );

  const body: Record<string, unknown> = {
    error: input.userMessage,
    code: input.code,
    requestId,
  };
  if (isDev && input.details !== undefined) {
    body.details = input.details;
  }

  return NextResponse.json(body, {
    status,
    headers: {
      "x-request-id": requestId,
    },
  });
}

/** Maps a thrown value to the JSON error shape; unknown errors become a 500. */
export function ratingApiError(route: string, e: unknown) {
  if (e instanceof RatingError) {
    return apiError({
      status: e.status,
      code: e.code,
      userMessage: e.userMessage,
      route,
      cause: e,
    });
  }
  return apiError({
    status: 500,
    code: "INTERNAL",
    userMessage: "Something went wrong. Try again.",
    route,
    cause: e,
  });
}
