import { promises as fs, type Stats } from "node:fs";
import path from "node:path";
import { toErrorMessage } from "@/lib/rating/errors";
import { errorCode } from "@/lib/rating/guards";

export type OpsEvent = {
  ts?: string;
  type: string;
  actor?: string | null;
  route?: string;
  status?: number | null;
  details?: Record<string, unknown>;
};

export function resolveOpsLogPath() {
  const configured = String(process.env.OPS_EVENTS_FILE || "").trim();
  if (configured) return path.isAbsolute(configured) ? configured : path.join(process.cwd(), configured);
  return path.join(process.cwd(), ".ops-events.jsonl");
}

/** Telemetry only: a failed write is reported on stderr and never fails the request. */
export async function appendOpsEvent(event: OpsEvent) {
  const payload = {
    ts: event.ts || new Date().toISOString(),
    type: String(event.type || "UNKNOWN"),
    actor: event.actor || null,
    route: event.route || null,
    status: Number.isFinite(Number(event.status)) ? Number(event.status) : null,
    details: event.details || {},
  };
  try {
    await fs.appendFile(resolveOpsLogPath(), `${JSON.stringify(payload)}\n`, "utf8");
  } catch (e) {
    console.error(JSON.stringify({ level: "error", event: "ops-event-write-failed", type: payload.type, cause: toErrorMessage(e) }));
  }
  return payload;
}

export async function readOpsEvents(limit: number, maxBytes: number): Promise<unknown[]> {
  const p = resolveOpsLogPath();
  let raw = "";
  let stat: Stats;
  try {
    stat = await fs.stat(p);
  } catch (e) {
    if (errorCode(e) === "ENOENT") return [];
    throw e;
  }
  if (!stat.isFile()) return [];
  const bytes = Math.min(stat.size, maxBytes);
  if (bytes <= 0) return [];
  const start = Math.max(0, stat.size - bytes);
  const fh = await fs.open(p, "r");
  try {
    const buf = Buffer.alloc(bytes);
    const read = await fh.read(buf, 0, bytes, start);
    raw = buf.subarray(0, read.bytesRead).toString("utf8");
  } finally {
    await fh.close();
  }
  // Drop a potentially partial leading line when we read from the middle.
  if (start > 0) {
    const nl = raw.indexOf("\n");
    raw = nl >= 0 ? raw.slice(nl + 1) : "";
  }
  const lines = raw.split("\n").map((s) => s.trim()).filter(Boolean);
  return lines
    .slice(Math.max(0, lines.length - limit))
    .map((line): unknown => {
      try {
        return JSON.parse(line);
      } catch {
        return null;
      }
    })
    .filter((e) => e !== null);
}
