import { describe, expect, it } from "vitest";
import { BlindLabeler, hashChooser } from "@/lib/rating/blindLabeler";
import type { ReportRecord } from "@/lib/rating/types";

type PairRecord = Extract<ReportRecord, { kind: "pair" }>;

const pair = (caseId: string): PairRecord => ({
  kind: "pair",
  caseId,
  collection: "reports",
  original: `original ${caseId}`,
  modified: `modified ${caseId}`,
  errorType: "negation",
});

describe("BlindLabeler", () => {
  it("shows the original of a single record unflagged", () => {
    const labeler = new BlindLabeler({ salt: "s", chooser: () => true });
    const single: ReportRecord = { kind: "single", caseId: "c1", collection: "r", text: "only text", errorType: "none" };
    expect(labeler.present("u1", single, 1, 3)).toEqual({
      item: { caseId: "c1", text: "only text", position: 1, total: 3 },
      shownModified: false,
    });
  });

  it("shows the variant the chooser picks", () => {
    const modified = new BlindLabeler({ salt: "s", chooser: () => true }).present("u1", pair("c2"), 2, 3);
    expect(modified.item.text).toBe("modified c2");
    expect(modified.shownModified).toBe(true);

    const original = new BlindLabeler({ salt: "s", chooser: () => false }).present("u1", pair("c2"), 2, 3);
    expect(original.item.text).toBe("original c2");
    expect(original.shownModified).toBe(false);
  });

  it("gives the same presentation on repeated views and after a restart", () => {
    const before = new BlindLabeler({ salt: "test-salt" });
    const after = new BlindLabeler({ salt: "test-salt" });
    for (let i = 0; i < 20; i++) {
      const record = pair(`case-${i}`);
      const a = before.present("u1", record, 1, 1);
      expect(before.present("u1", record, 1, 1)).toEqual(a);
      expect(after.present("u1", record, 1, 1)).toEqual(a);
      expect(a.item.text).toBe(a.shownModified ? record.modified : record.original);
    }
  });

  it("shows both variants across a set of cases", () => {
    const choose = hashChooser("test-salt");
    const picks = new Set(Array.from({ length: 64 }, (_, i) => choose("u1", `case-${i}`)));
    expect(picks).toEqual(new Set([true, false]));
  });

  it("does not tie the choice to the case alone", () => {
    const choose = hashChooser("test-salt");
    const differs = Array.from({ length: 64 }, (_, i) => `case-${i}`).some((c) => choose("u1", c) !== choose("u2", c));
    expect(differs).toBe(true);
  });
});
