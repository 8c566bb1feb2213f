import fs from "node:fs";
import path from "node:path";
import { CatalogFormatError, MissingCaseError } from "@/lib/rating/errors";
import { isPlainObject } from "@/lib/rating/guards";
import type { ReportRecord } from "@/lib/rating/types";

export type CollectionIndex = {
  collection: string;
  file: string;
  caseIds: readonly string[];
  records: ReadonlyMap<string, ReportRecord>;
};

const CASE_ID_KEYS = ["case_id", "caseId", "rating_id", "id"];
const ORIGINAL_KEYS = ["original", "original_text", "original_report", "report"];
const MODIFIED_KEYS = ["modified", "modified_text", "modified_report", "report_to_rate"];
const ERROR_TYPE_KEYS = ["error_type", "errorType"];

function pick(row: Record<string, unknown>, candidates: string[]): string | null {
  for (const key of candidates) {
    const v = row[key];
    if (v === null || v === undefined) continue;
    if (typeof v !== "string" && typeof v !== "number") continue;
    return String(v);
  }
  return null;
}

export function collectionFileName(collection: string) {
  const name = String(collection || "").trim();
  if (!name || name.includes("/") || name.includes("\\") || name.includes("..")) {
    throw new CatalogFormatError(`Invalid collection name: "${collection}".`);
  }
  return name.endsWith(".jsonl") ? name : `${name}.jsonl`;
}

export function parseReportLine(collection: string, line: string, where: string): ReportRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (e) {
    throw new CatalogFormatError(`${where}: invalid JSON.`, e);
  }
  if (!isPlainObject(parsed)) {
    throw new CatalogFormatError(`${where}: expected a JSON object.`);
  }

  const caseId = (pick(parsed, CASE_ID_KEYS) || "").trim();
  if (!caseId) throw new CatalogFormatError(`${where}: missing case id.`);

  const original = pick(parsed, ORIGINAL_KEYS);
  if (original === null || !original.trim()) {
    throw new CatalogFormatError(`${where}: case "${caseId}" has no original text.`);
  }

  const modified = pick(parsed, MODIFIED_KEYS);
  const errorType = (pick(parsed, ERROR_TYPE_KEYS) || "").trim() || "none";

  if (modified === null || !modified.trim() || modified === original) {
    return { kind: "single", caseId, collection, text: original, errorType };
  }
  return { kind: "pair", caseId, collection, original, modified, errorType };
}

export function parseCollection(collection: string, file: string, raw: string): CollectionIndex {
  const records = new Map<string, ReportRecord>();
  const caseIds: string[] = [];
  const lines = raw.split(/\r?\n/);

  lines.forEach((line, i) => {
    if (!line.trim()) return;
    const where = `${path.basename(file)}:${i + 1}`;
    const record = parseReportLine(collection, line, where);
    if (records.has(record.caseId)) {
      throw new CatalogFormatError(`${where}: duplicate case id "${record.caseId}".`);
    }
    records.set(record.caseId, record);
    caseIds.push(record.caseId);
  });

  return { collection, file, caseIds: Object.freeze(caseIds), records };
}

/**
 * Report collections indexed by case id. Indexes are cached per collection
 * until `reload()`; a reload re-reads files on the next access.
 */
export class ReportCatalog {
  private readonly cache = new Map<string, CollectionIndex>();

  constructor(private readonly dataDir: string) {}

  load(collection: string): CollectionIndex {
    const hit = this.cache.get(collection);
    if (hit) return hit;

    const file = path.join(this.dataDir, collectionFileName(collection));
    let raw: string;
    try {
      raw = fs.readFileSync(file, "utf8");
    } catch (e) {
      throw new CatalogFormatError(`Report collection "${collection}" could not be read from ${file}.`, e);
    }
    const index = parseCollection(collection, file, raw);
    this.cache.set(collection, index);
    return index;
  }

  get(collection: string, caseId: string): ReportRecord {
    const record = this.load(collection).records.get(caseId);
    if (!record) throw new MissingCaseError(collection, caseId);
    return record;
  }

  reload() {
    this.cache.clear();
  }
}
