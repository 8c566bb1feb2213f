"use client";

import { useState, type FormEvent } from "react";
import { useRouter } from "next/navigation";
import { ui } from "@/components/ui/uiClasses";
import { jsonFetch } from "@/lib/http";

export default function LoginPage() {
  const router = useRouter();
  const [username, setUsername] = useState("");
  const [password, setPassword] = useState("");
  const [busy, setBusy] = useState(false);
  const [error, setError] = useState("");

  async function onSubmit(e: FormEvent) {
    e.preventDefault();
    setBusy(true);
    setError("");
    try {
      await jsonFetch("/api/session/login", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ username, password }),
        suppressErrorToast: true,
      });
      router.push("/progress");
    } catch {
      setError("Invalid username or password.");
    } finally {
      setBusy(false);
    }
  }

  return (
    <div className="mx-auto mt-16 max-w-sm">
      <h1 className="mb-6 text-center text-2xl font-semibold tracking-tight">Blind Rating Desk</h1>
      <form onSubmit={onSubmit} className={ui.card + " grid gap-3"}>
        <label className="grid gap-1 text-sm font-medium">
          Username
          <input className={ui.input} value={username} onChange={(e) => setUsername(e.target.value)} autoComplete="username" />
        </label>
        <label className="grid gap-1 text-sm font-medium">
          Password
          <input
            className={ui.input}
            type="password"
            value={password}
            onChange={(e) => setPassword(e.target.value)}
            autoComplete="current-password"
          />
        </label>
        {error ? <p className="text-sm text-rose-700">{error}</p> : null}
        <button className={ui.btnPrimary} type="submit" disabled={busy || !username || !password}>
          {busy ? "Signing in…" : "Login"}
        </button>
      </form>
    </div>
  );
}
