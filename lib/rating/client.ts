import { jsonFetch } from "@/lib/http";
import type { PresentedItem, ProgressSnapshot, Verdict } from "@/lib/rating/types";
import type { RaterUser } from "@/lib/auth/userTable";

export type ProgressResponse = { ok: true; user: RaterUser; progress: ProgressSnapshot };
export type NextItemResponse = { ok: true; item: PresentedItem | null; progress: ProgressSnapshot; done: boolean };

export function fetchProgress() {
  return jsonFetch<ProgressResponse>("/api/rating/progress", { cache: "no-store" });
}

export function fetchNextItem() {
  return jsonFetch<NextItemResponse>("/api/rating/next", { cache: "no-store" });
}

export function submitRating(caseId: string, verdict: Verdict, comments: string) {
  return jsonFetch<NextItemResponse>("/api/rating/submit", {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ caseId, verdict, comments }),
  });
}

export function backToProgress() {
  return jsonFetch<{ ok: true }>("/api/rating/back", { method: "POST" });
}

export function logout() {
  return jsonFetch<{ ok: true }>("/api/session/logout", { method: "POST" });
}

export function progressRatio(p: ProgressSnapshot) {
  return p.total > 0 ? p.rated / p.total : 0;
}

export type RateView = "item" | "error" | "loading" | "empty";

/** A failed load with nothing on screen shows the error card, never a blank page. */
export function rateView(state: { item: PresentedItem | null; loading: boolean; error: string }): RateView {
  if (state.item) return "item";
  if (state.error) return "error";
  return state.loading ? "loading" : "empty";
}
