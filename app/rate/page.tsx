"use client";

import { useCallback, useEffect, useState } from "react";
import Link from "next/link";
import { useRouter } from "next/navigation";
import { ui } from "@/components/ui/uiClasses";
import { ApiRequestError } from "@/lib/http";
import { backToProgress, fetchNextItem, rateView, submitRating } from "@/lib/rating/client";
import { VERDICT_OPTIONS } from "@/lib/rating/verdicts";
import type { PresentedItem, Verdict } from "@/lib/rating/types";
import { notifyToast } from "@/lib/ui/toast";

export default function RatePage() {
  const router = useRouter();
  const [item, setItem] = useState<PresentedItem | null>(null);
  const [loading, setLoading] = useState(true);
  const [verdict, setVerdict] = useState<Verdict>("no_error");
  const [comments, setComments] = useState("");
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState("");

  const show = useCallback(
    (next: PresentedItem | null) => {
      setVerdict("no_error");
      setComments("");
      if (!next) {
        router.push("/progress");
        return;
      }
      setItem(next);
    },
    [router]
  );

  const load = useCallback(async () => {
    setLoading(true);
    setError("");
    try {
      const res = await fetchNextItem();
      show(res.item);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      setItem(null);
      setError(message);
      notifyToast("error", message);
    } finally {
      setLoading(false);
    }
  }, [show]);

  useEffect(() => {
    void load();
  }, [load]);

  async function onSubmit() {
    if (!item) return;
    setBusy(true);
    try {
      const res = await submitRating(item.caseId, verdict, comments);
      notifyToast("success", "Rating submitted!");
      show(res.item);
    } catch (e) {
      // A failed write keeps the case on screen for an identical retry; anything else re-syncs.
      if (!(e instanceof ApiRequestError && e.code === "LOG_WRITE_FAILED")) await load();
    } finally {
      setBusy(false);
    }
  }

  async function onBack() {
    await backToProgress().catch(() => null);
    router.push("/progress");
  }

  const view = rateView({ item, loading, error });
  if (view === "error") {
    return (
      <div className={ui.card}>
        <p className="text-sm text-rose-700">{error}</p>
        <div className="mt-3 flex gap-2">
          <Link href="/progress" className={ui.btnSecondary}>
            Back to Progress
          </Link>
          <button className={ui.btnSecondary} onClick={() => void load()}>
            Try again
          </button>
        </div>
      </div>
    );
  }
  if (view === "loading") return <p className="text-sm text-zinc-500">Loading…</p>;
  if (!item) return null;

  return (
    <div className="grid gap-4">
      <div className="flex items-center justify-between">
        <h1 className="text-2xl font-semibold tracking-tight">Rating Report: {item.caseId}</h1>
        <button className={ui.btnSecondary} onClick={onBack}>
          Back to Progress
        </button>
      </div>
      <p className="text-xs text-zinc-500">
        Report {item.position} of {item.total}
      </p>

      <section className={ui.card}>
        <h2 className="mb-2 text-sm font-semibold">Report to Rate</h2>
        <pre className="whitespace-pre-wrap font-sans text-sm leading-6">{item.text}</pre>
      </section>

      <section className={ui.card + " grid gap-3"}>
        <h2 className="text-sm font-semibold">Rate the error in the report:</h2>
        <div className="grid gap-2">
          {VERDICT_OPTIONS.map((o) => (
            <label key={o.key} className="flex items-start gap-2 text-sm" title={o.meaning}>
              <input type="radio" name="verdict" checked={verdict === o.key} onChange={() => setVerdict(o.key)} />
              {o.label}
            </label>
          ))}
        </div>
        <label className="grid gap-1 text-sm font-medium">
          Comments:
          <textarea className={ui.input} rows={3} value={comments} onChange={(e) => setComments(e.target.value)} />
        </label>
        <button className={ui.btnPrimary + " justify-self-start"} onClick={onSubmit} disabled={busy}>
          Submit Rating
        </button>
      </section>
    </div>
  );
}
