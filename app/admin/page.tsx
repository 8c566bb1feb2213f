"use client";

import { useEffect, useState } from "react";
import { ui } from "@/components/ui/uiClasses";
import { jsonFetch } from "@/lib/http";
import type { LogSummary } from "@/lib/admin/ratingLogs";
import type { LogEntry } from "@/lib/rating/types";
import { verdictLabel } from "@/lib/rating/verdicts";

type UsersResponse = {
  ok: true;
  usernames: string[];
  users: { username: string; isAdmin: boolean; provisioned: boolean }[];
  loggedUsers: string[];
};

type LogResponse = { ok: true; username: string; entries: LogEntry[]; summary: LogSummary };

function pct(n: number | null) {
  return n === null ? "n/a" : `${Math.round(n * 100)}%`;
}

export default function AdminPage() {
  const [users, setUsers] = useState<UsersResponse | null>(null);
  const [selected, setSelected] = useState("");
  const [log, setLog] = useState<LogResponse | null>(null);
  const [error, setError] = useState("");

  useEffect(() => {
    jsonFetch<UsersResponse>("/api/admin/users", { cache: "no-store" })
      .then((res) => {
        setUsers(res);
        setSelected((prev) => prev || res.loggedUsers[0] || "");
      })
      .catch((e: unknown) => setError(e instanceof Error ? e.message : String(e)));
  }, []);

  useEffect(() => {
    if (!selected) return;
    jsonFetch<LogResponse>(`/api/admin/logs/${encodeURIComponent(selected)}`, { cache: "no-store" })
      .then(setLog)
      .catch((e: unknown) => setError(e instanceof Error ? e.message : String(e)));
  }, [selected]);

  if (error) return <p className="text-sm text-rose-700">{error}</p>;
  if (!users) return <p className="text-sm text-zinc-500">Loading…</p>;

  return (
    <div className="grid gap-4">
      <h1 className="text-2xl font-semibold tracking-tight">Admin Page</h1>

      <section className={ui.card + " grid gap-3"}>
        <h2 className="text-sm font-semibold">Action Logs</h2>
        {users.loggedUsers.length === 0 ? (
          <p className="text-sm text-amber-700">No log files found.</p>
        ) : (
          <div className="flex items-center gap-3">
            <select className={ui.input + " max-w-xs"} value={selected} onChange={(e) => setSelected(e.target.value)}>
              {users.loggedUsers.map((u) => (
                <option key={u} value={u}>
                  {u}
                </option>
              ))}
            </select>
            {selected ? (
              <a className={ui.btnSecondary} href={`/api/admin/logs/${encodeURIComponent(selected)}?format=xlsx`}>
                Download .xlsx
              </a>
            ) : null}
          </div>
        )}

        {log ? (
          <>
            <p className="text-sm">
              Rated <b>{log.summary.rated}</b> · modified shown <b>{log.summary.shownModified}</b> · errors caught{" "}
              <b>{log.summary.errorsCaught}</b> · missed <b>{log.summary.errorsMissed}</b> · false alarms{" "}
              <b>{log.summary.falseAlarms}</b> · agreement <b>{pct(log.summary.agreement)}</b>
            </p>
            <div className="overflow-x-auto">
              <table className="w-full text-left text-xs">
                <thead className="text-zinc-500">
                  <tr>
                    <th className="py-1 pr-3">Timestamp</th>
                    <th className="py-1 pr-3">Action</th>
                    <th className="py-1 pr-3">Report ID</th>
                    <th className="py-1 pr-3">Rating</th>
                    <th className="py-1 pr-3">Shown</th>
                    <th className="py-1 pr-3">Comments</th>
                  </tr>
                </thead>
                <tbody>
                  {log.entries.map((e) => (
                    <tr key={e.id} className="border-t border-zinc-100">
                      <td className="py-1 pr-3">{e.ts}</td>
                      <td className="py-1 pr-3">{e.action}</td>
                      <td className="py-1 pr-3">{e.caseId ?? ""}</td>
                      <td className="py-1 pr-3">{e.action === "SUBMIT_RATING" ? verdictLabel(e.verdict) : ""}</td>
                      <td className="py-1 pr-3">{e.action === "SUBMIT_RATING" ? (e.shownModified ? "modified" : "original") : ""}</td>
                      <td className="py-1 pr-3">{e.action === "SUBMIT_RATING" ? e.comments : ""}</td>
                    </tr>
                  ))}
                </tbody>
              </table>
            </div>
          </>
        ) : null}
      </section>

      <section className={ui.card + " grid gap-2"}>
        <h2 className="text-sm font-semibold">User List</h2>
        <ul className="grid gap-1 text-sm">
          {users.users.map((u) => (
            <li key={u.username} className="flex gap-2">
              <span className="font-medium">{u.username}</span>
              {u.isAdmin ? <span className="text-xs text-sky-700">admin</span> : null}
              {!u.provisioned ? <span className="text-xs text-amber-700">no assignment</span> : null}
            </li>
          ))}
        </ul>
      </section>
    </div>
  );
}
