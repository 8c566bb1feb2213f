"use client";

import { useEffect, useState } from "react";
import type { ToastDetail, ToastTone } from "@/lib/ui/toast";
import { toastEventName, toastLifetimeMs } from "@/lib/ui/toast";

type ToastMessage = ToastDetail & {
  id: number;
};

function toneClass(tone: ToastTone) {
  if (tone === "success") return "border-emerald-200 bg-emerald-50 text-emerald-900";
  if (tone === "warn") return "border-amber-200 bg-amber-50 text-amber-900";
  return "border-rose-200 bg-rose-50 text-rose-900";
}

function isToastEvent(event: Event): event is CustomEvent<ToastDetail> {
  return event instanceof CustomEvent && typeof event.detail?.text === "string";
}

export default function ToastHost() {
  const [toasts, setToasts] = useState<ToastMessage[]>([]);

  useEffect(() => {
    let seq = 0;
    function handler(event: Event) {
      if (!isToastEvent(event) || !event.detail.text) return;
      const id = ++seq;
      const detail = event.detail;
      setToasts((prev) => [...prev, { id, ...detail }]);
      window.setTimeout(() => {
        setToasts((prev) => prev.filter((t) => t.id !== id));
      }, toastLifetimeMs(detail.tone));
    }

    const eventName = toastEventName();
    window.addEventListener(eventName, handler);
    return () => window.removeEventListener(eventName, handler);
  }, []);

  if (!toasts.length) return null;

  return (
    <div className="pointer-events-none fixed right-4 top-4 z-50 grid gap-2">
      {toasts.map((toast) => (
        <button
          key={toast.id}
          type="button"
          onClick={() => setToasts((prev) => prev.filter((t) => t.id !== toast.id))}
          className={"pointer-events-auto rounded-xl border px-3 py-2 text-left text-sm shadow-sm " + toneClass(toast.tone)}
        >
          {toast.text}
        </button>
      ))}
    </div>
  );
}
