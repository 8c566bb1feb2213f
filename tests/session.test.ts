import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ActionLog } from "@/lib/rating/actionLog";
import {
  DuplicateRatingError,
  InvalidSessionStateError,
  InvalidVerdictError,
  LogWriteError,
  MissingCaseError,
  StaleSubmissionError,
  UnknownUserError,
} from "@/lib/rating/errors";
import { RatingSession, type SessionDeps } from "@/lib/rating/session";
import type { RatingEvent, RatingInput } from "@/lib/rating/types";
import { makeDeps, makeTempDir, removeDir } from "./helpers";

const MAPPING = { reports: { u1: ["c1", "c2", "c3"] } };

class FlakyLog extends ActionLog {
  failures = 0;

  async record(username: string, input: RatingInput): Promise<RatingEvent> {
    if (this.failures > 0) {
      this.failures--;
      throw new LogWriteError("disk full");
    }
    return super.record(username, input);
  }
}

describe("RatingSession", () => {
  let root: string;
  let deps: SessionDeps;

  beforeEach(() => {
    root = makeTempDir();
    deps = makeDeps({ root, mapping: MAPPING, chooser: () => true });
  });

  afterEach(() => removeDir(root));

  it("walks u1 through c1, c2 and c3 and keeps the hidden flag of c2", async () => {
    const session = await RatingSession.open(deps, "u1");
    expect(session.state).toBe("READY");
    expect(await session.progress()).toEqual({ username: "u1", rated: 0, total: 3 });

    const first = await session.next();
    expect(first).toEqual({ caseId: "c1", text: "No acute findings.", position: 1, total: 3 });
    expect(session.state).toBe("AWAITING_SUBMIT");

    const afterC1 = await session.submit({ caseId: "c1", verdict: "no_error" });
    expect(afterC1.receipt.caseId).toBe("c1");
    expect(afterC1.next?.caseId).toBe("c2");
    expect(afterC1.next?.text).toBe("Opacity in the right lower lobe.");
    expect(await session.progress()).toEqual({ username: "u1", rated: 1, total: 3 });

    const afterC2 = await session.submit({ caseId: "c2", verdict: "no_error" });
    expect(afterC2.receipt.verdict).toBe("no_error");
    expect(afterC2.next?.caseId).toBe("c3");

    const afterC3 = await session.submit({ caseId: "c3", verdict: "Other error", comments: "  odd wording " });
    expect(afterC3.next).toBeNull();
    expect(afterC3.receipt.verdict).toBe("other_error");
    expect(afterC3.receipt.comments).toBe("odd wording");
    expect(session.state).toBe("ALL_DONE");
    expect(await session.progress()).toEqual({ username: "u1", rated: 3, total: 3 });

    const stored = await deps.log.eventsFor("u1");
    expect(stored.map((e) => [e.caseId, e.shownModified, e.errorType])).toEqual([
      ["c1", false, "none"],
      ["c2", true, "laterality"],
      ["c3", false, "none"],
    ]);
  });

  it("keeps the hidden flag and answer key out of the submit result", async () => {
    const session = await RatingSession.open(deps, "u1");
    await session.next();
    await session.submit({ caseId: "c1", verdict: "no_error" });
    const result = await session.submit({ caseId: "c2", verdict: "no_error" });
    expect(Object.keys(result.receipt).sort()).toEqual(["action", "caseId", "comments", "id", "ts", "username", "verdict"]);
    expect((await deps.log.eventsFor("u1")).find((e) => e.caseId === "c2")?.shownModified).toBe(true);
  });

  it("never exposes the hidden flag on the presented item", async () => {
    const session = await RatingSession.open(deps, "u1");
    const item = await session.next();
    expect(Object.keys(item ?? {}).sort()).toEqual(["caseId", "position", "text", "total"]);
  });

  it("fails setup before presenting anything when a case is missing", async () => {
    const broken = makeDeps({ root, mapping: { reports: { u1: ["c1", "c9"] } } });
    const session = new RatingSession(broken, "u1");
    await expect(session.load()).rejects.toBeInstanceOf(MissingCaseError);
    expect(session.state).toBe("FAILED");
    expect(session.error).toBeInstanceOf(MissingCaseError);
    expect(session.currentItem).toBeNull();
    await expect(session.next()).rejects.toBeInstanceOf(InvalidSessionStateError);
  });

  it("rejects users with no assignment", async () => {
    await expect(RatingSession.open(deps, "nobody")).rejects.toBeInstanceOf(UnknownUserError);
  });

  it("skips cases already rated elsewhere", async () => {
    await deps.log.record("u1", { caseId: "c1", verdict: "no_error", comments: "", shownModified: false, errorType: "none" });
    const session = await RatingSession.open(deps, "u1");
    expect((await session.next())?.caseId).toBe("c2");
  });

  it("returns the same item when next is called twice", async () => {
    const session = await RatingSession.open(deps, "u1");
    const a = await session.next();
    const b = await session.next();
    expect(b).toEqual(a);
  });

  it("ignores stray log entries for cases outside the assignment", async () => {
    await deps.log.record("u1", { caseId: "zz", verdict: "no_error", comments: "", shownModified: false, errorType: "none" });
    await deps.log.record("u1", { caseId: "c3", verdict: "no_error", comments: "", shownModified: false, errorType: "none" });
    const session = await RatingSession.open(deps, "u1");
    expect(await session.progress()).toEqual({ username: "u1", rated: 1, total: 3 });
  });

  it("refuses a submission for a case other than the current one", async () => {
    const session = await RatingSession.open(deps, "u1");
    await session.next();
    await expect(session.submit({ caseId: "c2", verdict: "no_error" })).rejects.toBeInstanceOf(StaleSubmissionError);
    expect(session.currentItem?.caseId).toBe("c1");
  });

  it("refuses unknown verdicts without writing", async () => {
    const session = await RatingSession.open(deps, "u1");
    await session.next();
    await expect(session.submit({ verdict: "maybe" })).rejects.toBeInstanceOf(InvalidVerdictError);
    expect(await deps.log.entriesFor("u1")).toEqual([]);
  });

  it("refuses a submission when nothing is shown", async () => {
    const session = await RatingSession.open(deps, "u1");
    await expect(session.submit({ verdict: "no_error" })).rejects.toBeInstanceOf(InvalidSessionStateError);
  });

  it("keeps the current item after a failed write so the same submission can be retried", async () => {
    const flaky = new FlakyLog({ logsDir: `${root}/logs`, policy: "strict", lock: { timeoutMs: 2000, staleMs: 30_000 } });
    flaky.failures = 1;
    const session = await RatingSession.open({ ...deps, log: flaky }, "u1");
    await session.next();

    await expect(session.submit({ caseId: "c1", verdict: "no_error" })).rejects.toBeInstanceOf(LogWriteError);
    expect(session.state).toBe("AWAITING_SUBMIT");
    expect(session.currentItem?.caseId).toBe("c1");
    expect(await session.progress()).toEqual({ username: "u1", rated: 0, total: 3 });

    const retry = await session.submit({ caseId: "c1", verdict: "no_error" });
    expect(retry.next?.caseId).toBe("c2");
  });

  it("treats a rating made in another tab as a duplicate and moves on", async () => {
    const tabA = await RatingSession.open(deps, "u1");
    const tabB = await RatingSession.open(deps, "u1");
    await tabA.next();
    await tabB.next();

    await tabA.submit({ caseId: "c1", verdict: "no_error" });
    await expect(tabB.submit({ caseId: "c1", verdict: "negation_error" })).rejects.toBeInstanceOf(DuplicateRatingError);
    expect(tabB.state).toBe("READY");
    expect((await tabB.next())?.caseId).toBe("c2");

    const events = await deps.log.eventsFor("u1");
    expect(events.map((e) => [e.caseId, e.verdict])).toEqual([["c1", "no_error"]]);
  });

  it("logs going back to progress and re-offers the same case afterwards", async () => {
    const session = await RatingSession.open(deps, "u1");
    await session.next();
    await session.backToProgress();
    expect(session.state).toBe("READY");

    const entries = await deps.log.entriesFor("u1");
    expect(entries.map((e) => [e.action, e.caseId])).toEqual([["BACK_TO_PROGRESS", "c1"]]);
    expect((await session.next())?.caseId).toBe("c1");
  });

  it("never lets progress exceed the assignment length", async () => {
    const session = await RatingSession.open(deps, "u1");
    for (let item = await session.next(); item; item = (await session.submit({ verdict: "no_error" })).next) {
      const p = await session.progress();
      expect(p.rated).toBeLessThanOrEqual(p.total);
    }
    const done = await session.progress();
    expect(done.rated).toBe(done.total);
  });
});
