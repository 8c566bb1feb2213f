export type RatingErrorCode =
  | "USER_NOT_PROVISIONED"
  | "MISSING_CASE"
  | "CATALOG_FORMAT"
  | "ASSIGNMENT_FORMAT"
  | "DUPLICATE_RATING"
  | "STALE_SUBMISSION"
  | "LOG_WRITE_FAILED"
  | "INVALID_VERDICT"
  | "INVALID_USERNAME"
  | "INVALID_STATE"
  | "UNAUTHORIZED"
  | "FORBIDDEN";

export class RatingError extends Error {
  readonly code: RatingErrorCode;
  readonly status: number;
  readonly userMessage: string;

  constructor(code: RatingErrorCode, status: number, message: string, userMessage?: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.userMessage = userMessage || message;
  }
}

export class UnknownUserError extends RatingError {
  readonly username: string;

  constructor(username: string) {
    super(
      "USER_NOT_PROVISIONED",
      404,
      `No report assignment found for user "${username}".`,
      "Your account has not been provisioned with reports yet."
    );
    this.username = username;
  }
}

/** The assignment references a case the catalog does not hold. */
export class MissingCaseError extends RatingError {
  readonly collection: string;
  readonly caseId: string;

  constructor(collection: string, caseId: string) {
    super(
      "MISSING_CASE",
      500,
      `Case "${caseId}" is not present in collection "${collection}".`,
      "The report set for this account is out of sync. Contact an administrator."
    );
    this.collection = collection;
    this.caseId = caseId;
  }
}

export class CatalogFormatError extends RatingError {
  constructor(message: string, cause?: unknown) {
    super("CATALOG_FORMAT", 500, message, "The report collection could not be read.", cause);
  }
}

export class AssignmentFormatError extends RatingError {
  constructor(message: string, cause?: unknown) {
    super("ASSIGNMENT_FORMAT", 500, message, "The report assignments could not be read.", cause);
  }
}

export class DuplicateRatingError extends RatingError {
  readonly username: string;
  readonly caseId: string;

  constructor(username: string, caseId: string) {
    super(
      "DUPLICATE_RATING",
      409,
      `User "${username}" has already rated case "${caseId}".`,
      "This report was already rated. Nothing was changed."
    );
    this.username = username;
    this.caseId = caseId;
  }
}

export class StaleSubmissionError extends RatingError {
  constructor(expected: string | null, received: string) {
    super(
      "STALE_SUBMISSION",
      409,
      `Submission for case "${received}" does not match the current case "${expected ?? "none"}".`,
      "This page is out of date. Reload to continue with the current report."
    );
  }
}

export class LogWriteError extends RatingError {
  constructor(message: string, cause?: unknown) {
    super("LOG_WRITE_FAILED", 503, message, "Your rating was not saved. Submit it again.", cause);
  }
}

export class InvalidVerdictError extends RatingError {
  constructor(value: unknown) {
    super("INVALID_VERDICT", 400, `Unknown verdict: ${JSON.stringify(value ?? null)}.`, "Choose one of the listed ratings.");
  }
}

export class InvalidUsernameError extends RatingError {
  constructor(username: string) {
    super(
      "INVALID_USERNAME",
      400,
      `Username ${JSON.stringify(username)} cannot address an action log.`,
      "This username contains characters that are not allowed."
    );
  }
}

export class InvalidSessionStateError extends RatingError {
  constructor(message: string) {
    super("INVALID_STATE", 409, message);
  }
}

export class UnauthorizedError extends RatingError {
  constructor(message = "Sign in to continue.") {
    super("UNAUTHORIZED", 401, message);
  }
}

export class ForbiddenError extends RatingError {
  constructor(message = "Administrator access is required.") {
    super("FORBIDDEN", 403, message);
  }
}

export function toErrorMessage(cause: unknown) {
  if (!cause) return "";
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
