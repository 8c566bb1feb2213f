"use client";

import { useEffect, useState } from "react";
import Link from "next/link";
import { useRouter } from "next/navigation";
import { ui } from "@/components/ui/uiClasses";
import { fetchProgress, logout, progressRatio, type ProgressResponse } from "@/lib/rating/client";

export default function ProgressPage() {
  const router = useRouter();
  const [data, setData] = useState<ProgressResponse | null>(null);
  const [error, setError] = useState("");

  useEffect(() => {
    fetchProgress()
      .then(setData)
      .catch((e: unknown) => setError(e instanceof Error ? e.message : String(e)));
  }, []);

  async function onLogout() {
    await logout().catch(() => null);
    router.push("/");
  }

  if (error) {
    return (
      <div className={ui.card}>
        <p className="text-sm text-rose-700">{error}</p>
        <Link href="/" className={ui.btnSecondary + " mt-3"}>
          Back to login
        </Link>
      </div>
    );
  }
  if (!data) return <p className="text-sm text-zinc-500">Loading…</p>;

  const { progress, user } = data;
  const done = progress.rated >= progress.total;
  const pct = Math.round(progressRatio(progress) * 100);

  return (
    <div className="grid gap-4">
      <div className="flex items-center justify-between">
        <h1 className="text-2xl font-semibold tracking-tight">Your Progress</h1>
        <div className="flex gap-2">
          {user.isAdmin ? (
            <Link href="/admin" className={ui.btnSecondary}>
              Admin
            </Link>
          ) : null}
          <button className={ui.btnSecondary} onClick={onLogout}>
            Logout
          </button>
        </div>
      </div>

      <div className={ui.card + " grid gap-3"}>
        <div className="h-3 w-full overflow-hidden rounded-full bg-zinc-100">
          <div className="h-full bg-emerald-500" style={{ width: `${pct}%` }} />
        </div>
        <p className="text-sm">
          You have rated <b>{progress.rated}</b> out of <b>{progress.total}</b> reports.
        </p>
        {done ? (
          <p className="text-sm font-semibold text-emerald-700">You have rated all available reports!</p>
        ) : (
          <button className={ui.btnPrimary + " justify-self-start"} onClick={() => router.push("/rate")}>
            {progress.rated === 0 ? "Start Rating" : "Continue Rating"}
          </button>
        )}
      </div>
    </div>
  );
}
