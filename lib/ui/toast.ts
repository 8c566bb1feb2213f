export type ToastTone = "success" | "error" | "warn";

export type ToastDetail = {
  tone: ToastTone;
  text: string;
};

const EVENT_NAME = "blindrating:toast";
const LIFETIME_MS: Record<ToastTone, number> = { success: 2500, warn: 5000, error: 8000 };

export function notifyToast(tone: ToastTone, text: string) {
  if (typeof window === "undefined") return;
  const detail: ToastDetail = { tone, text };
  window.dispatchEvent(new CustomEvent(EVENT_NAME, { detail }));
}

export function toastEventName() {
  return EVENT_NAME;
}

/** Errors stay up longest: a failed submission asks the rater to act. */
export function toastLifetimeMs(tone: ToastTone) {
  return LIFETIME_MS[tone];
}
