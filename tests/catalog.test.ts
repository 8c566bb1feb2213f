import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { collectionFileName, parseReportLine, ReportCatalog } from "@/lib/rating/catalog";
import { CatalogFormatError, MissingCaseError } from "@/lib/rating/errors";
import { makeTempDir, removeDir, SCENARIO_ROWS, writeCollection } from "./helpers";

describe("ReportCatalog", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(() => removeDir(root));

  it("indexes records by case id in file order", () => {
    writeCollection(root, "reports", SCENARIO_ROWS);
    const index = new ReportCatalog(root).load("reports");
    expect(index.caseIds).toEqual(["c1", "c2", "c3"]);
    expect(index.records.get("c2")).toEqual({
      kind: "pair",
      caseId: "c2",
      collection: "reports",
      original: "Opacity in the left lower lobe.",
      modified: "Opacity in the right lower lobe.",
      errorType: "laterality",
    });
    expect(index.records.get("c3")?.kind).toBe("single");
  });

  it("yields identical records when a collection is loaded again", () => {
    writeCollection(root, "reports", SCENARIO_ROWS);
    const catalog = new ReportCatalog(root);
    const first = catalog.load("reports");
    catalog.reload();
    const second = catalog.load("reports");
    expect(second).not.toBe(first);
    for (const caseId of first.caseIds) {
      expect(catalog.get("reports", caseId)).toEqual(first.records.get(caseId));
    }
    expect(second.caseIds).toEqual(first.caseIds);
  });

  it("serves the cached index until reload", () => {
    writeCollection(root, "reports", SCENARIO_ROWS);
    const catalog = new ReportCatalog(root);
    const first = catalog.load("reports");
    expect(catalog.load("reports")).toBe(first);
  });

  it("raises MissingCaseError for an unknown case", () => {
    writeCollection(root, "reports", SCENARIO_ROWS);
    expect(() => new ReportCatalog(root).get("reports", "c9")).toThrow(MissingCaseError);
  });

  it("accepts the .jsonl suffix in the collection name", () => {
    writeCollection(root, "rating_reports", SCENARIO_ROWS);
    expect(new ReportCatalog(root).load("rating_reports.jsonl").caseIds).toHaveLength(3);
  });

  it("reports a missing collection file", () => {
    expect(() => new ReportCatalog(root).load("absent")).toThrow(CatalogFormatError);
  });

  it("names the file and line of a malformed record", () => {
    fs.writeFileSync(path.join(root, "bad.jsonl"), `${JSON.stringify({ case_id: "a", original: "x" })}\n{nope\n`);
    expect(() => new ReportCatalog(root).load("bad")).toThrow("bad.jsonl:2: invalid JSON.");
  });

  it("rejects duplicate case ids", () => {
    writeCollection(root, "dupes", [
      { case_id: "a", original: "x" },
      { case_id: "a", original: "y" },
    ]);
    expect(() => new ReportCatalog(root).load("dupes")).toThrow('dupes.jsonl:2: duplicate case id "a".');
  });

  it("skips blank lines", () => {
    fs.writeFileSync(path.join(root, "gaps.jsonl"), `\n${JSON.stringify({ id: 7, report: "x" })}\n\n`);
    expect(new ReportCatalog(root).load("gaps").caseIds).toEqual(["7"]);
  });
});

describe("parseReportLine", () => {
  it("reads the rating_id / report_to_rate field names", () => {
    const r = parseReportLine("c", JSON.stringify({ rating_id: 12, report: "orig", report_to_rate: "changed" }), "l1");
    expect(r).toEqual({ kind: "pair", caseId: "12", collection: "c", original: "orig", modified: "changed", errorType: "none" });
  });

  it("treats a modified text equal to the original as a single", () => {
    const r = parseReportLine("c", JSON.stringify({ case_id: "a", original: "same", modified: "same" }), "l1");
    expect(r).toEqual({ kind: "single", caseId: "a", collection: "c", text: "same", errorType: "none" });
  });

  it("requires an original text", () => {
    expect(() => parseReportLine("c", JSON.stringify({ case_id: "a", modified: "m" }), "l1")).toThrow(
      'l1: case "a" has no original text.'
    );
  });

  it("requires an object", () => {
    expect(() => parseReportLine("c", "[1,2]", "l1")).toThrow("l1: expected a JSON object.");
  });
});

describe("collectionFileName", () => {
  it("rejects names that leave the data directory", () => {
    expect(() => collectionFileName("../secrets")).toThrow(CatalogFormatError);
    expect(() => collectionFileName("a/b")).toThrow(CatalogFormatError);
    expect(collectionFileName("reports")).toBe("reports.jsonl");
  });
});
