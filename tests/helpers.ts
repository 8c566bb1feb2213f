import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as XLSX from "xlsx";
import { ActionLog } from "@/lib/rating/actionLog";
import { AssignmentStore } from "@/lib/rating/assignments";
import { BlindLabeler, type VariantChooser } from "@/lib/rating/blindLabeler";
import { ReportCatalog } from "@/lib/rating/catalog";
import type { SessionDeps } from "@/lib/rating/session";
import type { ReratingPolicy } from "@/lib/rating/types";

export type ReportRow = Record<string, string | number | null>;

export function makeTempDir(prefix = "rating-") {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string) {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeCollection(dataDir: string, name: string, rows: ReportRow[]) {
  fs.mkdirSync(dataDir, { recursive: true });
  const file = path.join(dataDir, name.endsWith(".jsonl") ? name : `${name}.jsonl`);
  fs.writeFileSync(file, rows.map((r) => JSON.stringify(r)).join("\n") + "\n", "utf8");
  return file;
}

export function writeUsersWorkbook(file: string, rows: Record<string, string | number | boolean>[]) {
  const ws = XLSX.utils.json_to_sheet(rows);
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, "users");
  const buf: unknown = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  if (!Buffer.isBuffer(buf)) throw new Error("expected a buffer");
  fs.writeFileSync(file, buf);
}

/** Three cases; only c2 carries an injected error. */
export const SCENARIO_ROWS: ReportRow[] = [
  { case_id: "c1", original: "No acute findings.", error_type: "none" },
  {
    case_id: "c2",
    original: "Opacity in the left lower lobe.",
    modified: "Opacity in the right lower lobe.",
    error_type: "laterality",
  },
  { case_id: "c3", original: "Heart size is normal.", modified: "", error_type: "none" },
];

export function makeDeps(opts: {
  root: string;
  mapping: unknown;
  collections?: Record<string, ReportRow[]>;
  policy?: ReratingPolicy;
  chooser?: VariantChooser;
}): SessionDeps {
  const dataDir = path.join(opts.root, "data");
  for (const [name, rows] of Object.entries(opts.collections ?? { reports: SCENARIO_ROWS })) {
    writeCollection(dataDir, name, rows);
  }
  const catalog = new ReportCatalog(dataDir);
  return {
    catalog,
    assignments: AssignmentStore.fromMapping(opts.mapping, catalog),
    labeler: new BlindLabeler({ salt: "test-salt", chooser: opts.chooser }),
    log: new ActionLog({
      logsDir: path.join(opts.root, "logs"),
      policy: opts.policy ?? "strict",
      lock: { timeoutMs: 2000, staleMs: 30_000 },
    }),
  };
}
