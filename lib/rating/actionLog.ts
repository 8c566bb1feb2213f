import { promises as fs } from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { DuplicateRatingError, InvalidUsernameError, LogWriteError, RatingError, toErrorMessage } from "@/lib/rating/errors";
import { errorCode, isPlainObject } from "@/lib/rating/guards";
import { withFileLock, type FileLockOptions } from "@/lib/rating/fileLock";
import { isVerdict } from "@/lib/rating/verdicts";
import type { ActionEvent, LogEntry, RatingEvent, RatingInput, ReratingPolicy } from "@/lib/rating/types";

const LOG_SUFFIX = "_action_log.jsonl";
const USERNAME_PATTERN = /^[A-Za-z0-9_@-][A-Za-z0-9._@-]*$/;
const NON_RATING_ACTIONS: ReadonlyArray<ActionEvent["action"]> = ["LOGIN_SUCCESS", "LOGIN_FAIL", "LOGOUT", "BACK_TO_PROGRESS"];

export type ActionLogOptions = {
  logsDir: string;
  policy: ReratingPolicy;
  lock: FileLockOptions;
  now?: () => Date;
};

export function isValidUsername(username: string) {
  return USERNAME_PATTERN.test(username);
}

/** Usernames go into the path as-is, so anything outside `[A-Za-z0-9._@-]` or a leading dot is refused. */
export function logFileName(username: string) {
  if (!isValidUsername(username)) throw new InvalidUsernameError(username);
  return `${username}${LOG_SUFFIX}`;
}

export function usernameFromLogFile(fileName: string): string | null {
  if (!fileName.endsWith(LOG_SUFFIX)) return null;
  const name = fileName.slice(0, -LOG_SUFFIX.length);
  return isValidUsername(name) ? name : null;
}

function str(v: unknown) {
  return typeof v === "string" ? v : "";
}

export function normalizeLogEntry(value: unknown): LogEntry | null {
  if (!isPlainObject(value)) return null;
  const v = value;
  const base = { id: str(v.id), ts: str(v.ts), username: str(v.username) };
  if (!base.id || !base.ts || !base.username) return null;

  if (v.action === "SUBMIT_RATING") {
    const caseId = str(v.caseId);
    if (!caseId || !isVerdict(v.verdict) || typeof v.shownModified !== "boolean") return null;
    return {
      ...base,
      action: "SUBMIT_RATING",
      caseId,
      verdict: v.verdict,
      comments: str(v.comments),
      shownModified: v.shownModified,
      errorType: str(v.errorType) || "none",
    };
  }

  const action = NON_RATING_ACTIONS.find((a) => a === v.action);
  if (!action) return null;
  return { ...base, action, caseId: str(v.caseId) || null };
}

export function parseLogText(raw: string, source: string): LogEntry[] {
  const lines = raw.split("\n");
  const entries: LogEntry[] = [];
  lines.forEach((line, i) => {
    const text = line.trim();
    if (!text) return;
    let entry: LogEntry | null = null;
    try {
      entry = normalizeLogEntry(JSON.parse(text));
    } catch (e) {
      // A torn final line is what a crash mid-append leaves behind.
      if (i === lines.length - 1) return;
      console.warn(JSON.stringify({ level: "warn", event: "log-line-unreadable", source, line: i + 1, cause: toErrorMessage(e) }));
      return;
    }
    if (!entry) {
      console.warn(JSON.stringify({ level: "warn", event: "log-line-invalid", source, line: i + 1 }));
      return;
    }
    entries.push(entry);
  });
  return entries;
}

/** Latest rating per case wins; order follows each case's first rating. */
export function effectiveRatings(entries: readonly LogEntry[]): RatingEvent[] {
  const byCase = new Map<string, RatingEvent>();
  for (const e of entries) {
    if (e.action === "SUBMIT_RATING") byCase.set(e.caseId, e);
  }
  return Array.from(byCase.values());
}

/**
 * Append-only per-user log of rater actions, one JSONL file per user.
 * Each write holds the user's lock and is fsynced before it resolves.
 */
export class ActionLog {
  readonly policy: ReratingPolicy;
  private readonly now: () => Date;

  constructor(private readonly opts: ActionLogOptions) {
    this.policy = opts.policy;
    this.now = opts.now ?? (() => new Date());
  }

  logPath(username: string) {
    return path.join(this.opts.logsDir, logFileName(username));
  }

  async entriesFor(username: string): Promise<LogEntry[]> {
    const file = this.logPath(username);
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (e) {
      if (errorCode(e) === "ENOENT") return [];
      throw e;
    }
    return parseLogText(raw, file);
  }

  async eventsFor(username: string): Promise<RatingEvent[]> {
    return effectiveRatings(await this.entriesFor(username));
  }

  async ratedCaseIds(username: string): Promise<Set<string>> {
    const events = await this.eventsFor(username);
    return new Set(events.map((e) => e.caseId));
  }

  async hasRated(username: string, caseId: string): Promise<boolean> {
    return (await this.ratedCaseIds(username)).has(caseId);
  }

  async record(username: string, input: RatingInput): Promise<RatingEvent> {
    const event: RatingEvent = {
      id: uuidv4(),
      ts: input.ts || this.now().toISOString(),
      username,
      action: "SUBMIT_RATING",
      caseId: input.caseId,
      verdict: input.verdict,
      comments: input.comments,
      shownModified: input.shownModified,
      errorType: input.errorType,
    };
    await this.write(username, event, async () => {
      if (this.policy === "strict" && (await this.hasRated(username, input.caseId))) {
        throw new DuplicateRatingError(username, input.caseId);
      }
    });
    return event;
  }

  async append(username: string, action: ActionEvent["action"], caseId: string | null = null): Promise<ActionEvent> {
    const event: ActionEvent = {
      id: uuidv4(),
      ts: this.now().toISOString(),
      username,
      action,
      caseId,
    };
    await this.write(username, event);
    return event;
  }

  private async write(username: string, entry: LogEntry, check?: () => Promise<void>) {
    try {
      const file = this.logPath(username);
      await fs.mkdir(this.opts.logsDir, { recursive: true });
      await withFileLock(file, this.opts.lock, async () => {
        if (check) await check();
        await appendLineDurably(file, JSON.stringify(entry));
      });
    } catch (e) {
      if (e instanceof RatingError) throw e;
      throw new LogWriteError(`Could not write ${entry.action} for "${username}": ${toErrorMessage(e)}`, e);
    }
  }
}

async function syncDir(dir: string) {
  const dh = await fs.open(dir, "r");
  try {
    await dh.sync();
  } finally {
    await dh.close();
  }
}

async function appendLineDurably(file: string, line: string) {
  const fh = await fs.open(file, "a+");
  let created = false;
  try {
    const { size } = await fh.stat();
    created = size === 0;
    let prefix = "";
    if (size > 0) {
      const last = Buffer.alloc(1);
      await fh.read(last, 0, 1, size - 1);
      if (last.toString("utf8") !== "\n") prefix = "\n";
    }
    await fh.appendFile(`${prefix}${line}\n`, "utf8");
    await fh.sync();
  } finally {
    await fh.close();
  }
  // A new file's directory entry is only durable once the directory itself is synced.
  if (created) await syncDir(path.dirname(file));
}

