import { isPlainObject } from "@/lib/rating/guards";
import { notifyToast, type ToastTone } from "@/lib/ui/toast";

const inflightJsonGets = new Map<string, Promise<unknown>>();

/** A non-2xx response, carrying the server's error code and request id when it sent them. */
export class ApiRequestError extends Error {
  readonly status: number;
  readonly code: string;
  readonly requestId: string;

  constructor(message: string, status: number, code: string, requestId: string) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
    this.code = code;
    this.requestId = requestId;
  }
}

// Conflicts are no-ops the rater can simply move past.
const WARN_CODES = new Set(["DUPLICATE_RATING", "STALE_SUBMISSION"]);

function isMutation(method?: string) {
  const verb = (method || "GET").toUpperCase();
  return verb !== "GET" && verb !== "HEAD";
}

function safeSnippet(text: string, limit = 400) {
  const trimmed = text.trim();
  if (trimmed.length <= limit) return trimmed;
  return `${trimmed.slice(0, limit)}…`;
}

type JsonFetchInit = RequestInit & { suppressErrorToast?: boolean };

function dedupeKey(url: string, opts?: JsonFetchInit) {
  if (isMutation(opts?.method) || opts?.signal) return null;
  return `${(opts?.method || "GET").toUpperCase()} ${url}`;
}

function toRequestError(url: string, status: number, data: unknown, rawText: string) {
  if (isPlainObject(data)) {
    const userError = String(data.error || data.message || "").trim();
    const code = String(data.code || "").trim();
    const requestId = String(data.requestId || "").trim();
    return new ApiRequestError(userError || `Request to ${url} failed (${status}).`, status, code, requestId);
  }
  const detail = safeSnippet(rawText);
  return new ApiRequestError(detail || `Request to ${url} failed (${status}).`, status, "", "");
}

async function run(url: string, opts?: JsonFetchInit): Promise<unknown> {
  const res = await fetch(url, opts);
  const rawText = await res.text();
  const isJson = (res.headers.get("content-type") || "").includes("application/json");

  let data: unknown = rawText;
  if (isJson) {
    try {
      data = rawText ? JSON.parse(rawText) : {};
    } catch {
      data = rawText;
    }
  }

  if (!res.ok) {
    const err = toRequestError(url, res.status, data, rawText);
    if (isMutation(opts?.method) && !opts?.suppressErrorToast) {
      const tone: ToastTone = WARN_CODES.has(err.code) ? "warn" : "error";
      notifyToast(tone, err.requestId ? `${err.message} (ref: ${err.requestId})` : err.message);
    }
    throw err;
  }
  return data;
}

export async function jsonFetch<T>(url: string, opts?: JsonFetchInit): Promise<T> {
  const key = dedupeKey(url, opts);
  if (!key) return (await run(url, opts)) as T;

  const pending = inflightJsonGets.get(key);
  if (pending) return (await pending) as T;

  const p = run(url, opts);
  inflightJsonGets.set(key, p);
  try {
    return (await p) as T;
  } finally {
    inflightJsonGets.delete(key);
  }
}
