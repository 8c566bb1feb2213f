import { ActionLog } from "@/lib/rating/actionLog";
import { AssignmentStore } from "@/lib/rating/assignments";
import { BlindLabeler } from "@/lib/rating/blindLabeler";
import { ReportCatalog } from "@/lib/rating/catalog";
import { readRatingConfig, type RatingConfig } from "@/lib/rating/config";
import { RatingSession } from "@/lib/rating/session";
import { UserTable } from "@/lib/auth/userTable";

export type RatingContext = {
  config: RatingConfig;
  users: UserTable;
  catalog: ReportCatalog;
  assignments: AssignmentStore;
  labeler: BlindLabeler;
  log: ActionLog;
};

let cached: RatingContext | null = null;

export function buildRatingContext(config: RatingConfig): RatingContext {
  const catalog = new ReportCatalog(config.dataDir);
  return {
    config,
    users: UserTable.fromFile(config.usersFile),
    catalog,
    assignments: AssignmentStore.fromFile(config.assignmentsFile, catalog),
    labeler: new BlindLabeler({ salt: config.blindSalt }),
    log: new ActionLog({
      logsDir: config.logsDir,
      policy: config.reratingPolicy,
      lock: { timeoutMs: config.lockTimeoutMs, staleMs: config.lockStaleMs },
    }),
  };
}

/** Loaded once per process; source files are static until `reloadRatingContext()`. */
export function getRatingContext(): RatingContext {
  if (!cached) cached = buildRatingContext(readRatingConfig());
  return cached;
}

export function reloadRatingContext(): RatingContext {
  cached = null;
  return getRatingContext();
}

export function openRatingSession(username: string, ctx: RatingContext = getRatingContext()) {
  return RatingSession.open(ctx, username);
}
