export type Verdict = "no_error" | "laterality_error" | "negation_error" | "other_error";

export type ReratingPolicy = "strict" | "update";

export type ReportRecord =
  | {
      kind: "single";
      caseId: string;
      collection: string;
      text: string;
      errorType: string;
    }
  | {
      kind: "pair";
      caseId: string;
      collection: string;
      original: string;
      modified: string;
      errorType: string;
    };

export type AssignmentEntry = {
  collection: string;
  caseId: string;
};

export type Assignment = {
  username: string;
  entries: readonly AssignmentEntry[];
};

/** What the rater-facing layer is allowed to see. */
export type PresentedItem = {
  caseId: string;
  text: string;
  position: number;
  total: number;
};

export type Presentation = {
  item: PresentedItem;
  shownModified: boolean;
};

export type LogAction = "LOGIN_SUCCESS" | "LOGIN_FAIL" | "LOGOUT" | "BACK_TO_PROGRESS" | "SUBMIT_RATING";

type LogEntryBase = {
  id: string;
  ts: string;
  username: string;
};

export type RatingEvent = LogEntryBase & {
  action: "SUBMIT_RATING";
  caseId: string;
  verdict: Verdict;
  comments: string;
  shownModified: boolean;
  errorType: string;
};

export type ActionEvent = LogEntryBase & {
  action: Exclude<LogAction, "SUBMIT_RATING">;
  caseId: string | null;
};

export type LogEntry = RatingEvent | ActionEvent;

export type RatingInput = {
  caseId: string;
  verdict: Verdict;
  comments: string;
  shownModified: boolean;
  errorType: string;
  ts?: string;
};

export type ProgressSnapshot = {
  username: string;
  rated: number;
  total: number;
};

export type SessionState = "LOADING" | "READY" | "AWAITING_SUBMIT" | "ALL_DONE" | "FAILED";
