import type { ActionLog } from "@/lib/rating/actionLog";
import type { AssignmentStore } from "@/lib/rating/assignments";
import type { BlindLabeler } from "@/lib/rating/blindLabeler";
import type { ReportCatalog } from "@/lib/rating/catalog";
import {
  DuplicateRatingError,
  InvalidSessionStateError,
  InvalidVerdictError,
  StaleSubmissionError,
} from "@/lib/rating/errors";
import { normalizeVerdict } from "@/lib/rating/verdicts";
import type {
  Assignment,
  PresentedItem,
  Presentation,
  ProgressSnapshot,
  RatingEvent,
  ReportRecord,
  SessionState,
} from "@/lib/rating/types";

export type SessionDeps = {
  assignments: AssignmentStore;
  catalog: ReportCatalog;
  labeler: BlindLabeler;
  log: ActionLog;
};

export type Submission = {
  caseId?: string;
  verdict: unknown;
  comments?: string;
};

/** What the rater side learns about a stored rating: no hidden flag, no answer key. */
export type SubmitReceipt = Omit<RatingEvent, "shownModified" | "errorType">;

export type SubmitResult = {
  receipt: SubmitReceipt;
  next: PresentedItem | null;
};

/**
 * One rater's pass through their assignment:
 * LOADING -> READY -> AWAITING_SUBMIT -> READY | ALL_DONE, or FAILED from LOADING.
 * The action log is re-read on every step, so several sessions for the same
 * user (tabs, requests) converge on the same next case.
 */
export class RatingSession {
  private _state: SessionState = "LOADING";
  private _error: unknown = null;
  private assignment: Assignment | null = null;
  private records: ReportRecord[] = [];
  private current: Presentation | null = null;

  constructor(
    private readonly deps: SessionDeps,
    readonly username: string
  ) {}

  static async open(deps: SessionDeps, username: string) {
    const session = new RatingSession(deps, username);
    await session.load();
    return session;
  }

  get state() {
    return this._state;
  }

  get error() {
    return this._error;
  }

  get currentItem(): PresentedItem | null {
    return this.current?.item ?? null;
  }

  async load() {
    if (this._state !== "LOADING") {
      throw new InvalidSessionStateError(`Session for "${this.username}" is already ${this._state}.`);
    }
    try {
      const assignment = this.deps.assignments.assignmentFor(this.username);
      // Resolve every record before anything is shown: a missing case must fail setup.
      this.records = assignment.entries.map((e) => this.deps.catalog.get(e.collection, e.caseId));
      this.assignment = assignment;
      this._state = "READY";
    } catch (e) {
      this._state = "FAILED";
      this._error = e;
      this.records = [];
      throw e;
    }
  }

  async next(): Promise<PresentedItem | null> {
    switch (this._state) {
      case "AWAITING_SUBMIT":
        return this.current?.item ?? null;
      case "ALL_DONE":
        return null;
      case "READY":
        break;
      default:
        throw new InvalidSessionStateError(`Cannot fetch the next case while ${this._state}.`);
    }

    const rated = await this.deps.log.ratedCaseIds(this.username);
    const index = this.records.findIndex((r) => !rated.has(r.caseId));
    if (index < 0) {
      this._state = "ALL_DONE";
      this.current = null;
      return null;
    }

    this.current = this.deps.labeler.present(this.username, this.records[index], index + 1, this.records.length);
    this._state = "AWAITING_SUBMIT";
    return this.current.item;
  }

  async submit(submission: Submission): Promise<SubmitResult> {
    const current = this.current;
    if (this._state !== "AWAITING_SUBMIT" || !current) {
      throw new InvalidSessionStateError(`Nothing to submit while ${this._state}.`);
    }
    if (submission.caseId !== undefined && submission.caseId !== current.item.caseId) {
      throw new StaleSubmissionError(current.item.caseId, submission.caseId);
    }
    const verdict = normalizeVerdict(submission.verdict);
    if (!verdict) throw new InvalidVerdictError(submission.verdict);

    const record = this.records[current.item.position - 1];
    let event: RatingEvent;
    try {
      event = await this.deps.log.record(this.username, {
        caseId: current.item.caseId,
        verdict,
        comments: String(submission.comments || "").trim(),
        shownModified: current.shownModified,
        errorType: record.errorType,
      });
    } catch (e) {
      if (e instanceof DuplicateRatingError) {
        this.current = null;
        this._state = "READY";
      }
      // Any other failure keeps the item in place for an identical retry.
      throw e;
    }

    this.current = null;
    this._state = "READY";
    const receipt: SubmitReceipt = {
      id: event.id,
      ts: event.ts,
      username: event.username,
      action: event.action,
      caseId: event.caseId,
      verdict: event.verdict,
      comments: event.comments,
    };
    return { receipt, next: await this.next() };
  }

  async backToProgress() {
    if (this._state !== "AWAITING_SUBMIT" || !this.current) return;
    await this.deps.log.append(this.username, "BACK_TO_PROGRESS", this.current.item.caseId);
    this.current = null;
    this._state = "READY";
  }

  async progress(): Promise<ProgressSnapshot> {
    if (!this.assignment) {
      throw new InvalidSessionStateError(`Progress is unavailable while ${this._state}.`);
    }
    const rated = await this.deps.log.ratedCaseIds(this.username);
    const count = this.records.filter((r) => rated.has(r.caseId)).length;
    return { username: this.username, rated: count, total: this.records.length };
  }
}
