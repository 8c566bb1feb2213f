import { promises as fs } from "node:fs";
import * as XLSX from "xlsx";
import { effectiveRatings, usernameFromLogFile } from "@/lib/rating/actionLog";
import type { RatingContext } from "@/lib/rating/context";
import { errorCode } from "@/lib/rating/guards";
import { verdictLabel } from "@/lib/rating/verdicts";
import type { LogEntry } from "@/lib/rating/types";

export type LogSummary = {
  username: string;
  rated: number;
  shownModified: number;
  errorsCaught: number;
  errorsMissed: number;
  falseAlarms: number;
  correctPasses: number;
  agreement: number | null;
};

export function listUsers(ctx: RatingContext): string[] {
  return ctx.users.list().map((u) => u.username);
}

export async function listLoggedUsers(ctx: RatingContext): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(ctx.config.logsDir);
  } catch (e) {
    if (errorCode(e) === "ENOENT") return [];
    throw e;
  }
  return names
    .map(usernameFromLogFile)
    .filter((u): u is string => !!u)
    .sort((a, b) => a.localeCompare(b));
}

export function readLog(ctx: RatingContext, username: string): Promise<LogEntry[]> {
  return ctx.log.entriesFor(username);
}

/** Scores each effective rating against the variant that was actually shown. */
export function summarizeLog(username: string, entries: readonly LogEntry[]): LogSummary {
  const ratings = effectiveRatings(entries);
  let errorsCaught = 0;
  let errorsMissed = 0;
  let falseAlarms = 0;
  let correctPasses = 0;
  for (const r of ratings) {
    const flagged = r.verdict !== "no_error";
    if (r.shownModified) {
      if (flagged) errorsCaught++;
      else errorsMissed++;
    } else if (flagged) {
      falseAlarms++;
    } else {
      correctPasses++;
    }
  }
  return {
    username,
    rated: ratings.length,
    shownModified: ratings.filter((r) => r.shownModified).length,
    errorsCaught,
    errorsMissed,
    falseAlarms,
    correctPasses,
    agreement: ratings.length ? (errorsCaught + correctPasses) / ratings.length : null,
  };
}

export const LOG_EXPORT_COLUMNS = [
  "Timestamp",
  "Username",
  "Action",
  "Report ID",
  "Rating",
  "Comments",
  "Shown Variant",
  "Error Type",
] as const;

export function logRows(entries: readonly LogEntry[]): string[][] {
  return entries.map((e) => {
    if (e.action !== "SUBMIT_RATING") {
      return [e.ts, e.username, e.action, e.caseId ?? "", "", "", "", ""];
    }
    return [
      e.ts,
      e.username,
      e.action,
      e.caseId,
      verdictLabel(e.verdict),
      e.comments,
      e.shownModified ? "modified" : "original",
      e.errorType,
    ];
  });
}

export function exportLogWorkbook(entries: readonly LogEntry[]): Buffer {
  const ws = XLSX.utils.aoa_to_sheet([[...LOG_EXPORT_COLUMNS], ...logRows(entries)]);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, "Action log");
  const out: unknown = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(out)) throw new Error("Workbook export did not produce a buffer.");
  return out;
}
