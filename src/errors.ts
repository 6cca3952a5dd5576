/**
 * Error kinds surfaced to the CLI. Messages are shown to users verbatim.
 */

export type ScopeLedgerErrorCode =
  | "INVALID_SCOPE"
  | "INVALID_AMOUNT"
  | "INCOMPLETE_PROFILE"
  | "INCOMPLETE_ASSESSMENT"
  | "UNKNOWN_ACTIVITY"
  | "ENTRY_FILE"
  | "ADVISORY"
  | "CONFIG";

export class ScopeLedgerError extends Error {
  readonly code: ScopeLedgerErrorCode;

  constructor(code: ScopeLedgerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidScopeError extends ScopeLedgerError {
  readonly value: unknown;
  /** Position of the offending entry, when raised while aggregating */
  readonly index: number | null;

  constructor(value: unknown, index: number | null = null) {
    const where = index === null ? "" : ` at entry ${index}`;
    super("INVALID_SCOPE", `Invalid scope ${JSON.stringify(value) ?? String(value)}${where}: expected 1, 2 or 3`);
    this.value = value;
    this.index = index;
  }
}

export class InvalidAmountError extends ScopeLedgerError {
  readonly value: number;
  readonly index: number;

  constructor(value: number, index: number) {
    super("INVALID_AMOUNT", `Invalid amount ${value} at entry ${index}: expected a finite number >= 0`);
    this.value = value;
    this.index = index;
  }
}

export class IncompleteProfileError extends ScopeLedgerError {
  readonly field: string;
  readonly reason: "missing" | "invalid";

  constructor(field: string, reason: "missing" | "invalid" = "missing") {
    super(
      "INCOMPLETE_PROFILE",
      reason === "missing"
        ? `Organization profile is missing required field "${field}"`
        : `Organization profile field "${field}" has an unrecognized value`,
    );
    this.field = field;
    this.reason = reason;
  }
}

export class IncompleteAssessmentError extends ScopeLedgerError {
  readonly questionId: string;
  readonly reason: "missing" | "invalid";

  constructor(questionId: string, reason: "missing" | "invalid" = "missing") {
    super(
      "INCOMPLETE_ASSESSMENT",
      reason === "missing"
        ? `Readiness assessment has no answer for question "${questionId}"`
        : `Readiness assessment answer for question "${questionId}" is not one of its options`,
    );
    this.questionId = questionId;
    this.reason = reason;
  }
}

export class UnknownActivityError extends ScopeLedgerError {
  readonly activity: string;

  constructor(activity: string) {
    super(
      "UNKNOWN_ACTIVITY",
      `No emission factor known for activity "${activity}"; provide emissionFactor explicitly`,
    );
    this.activity = activity;
  }
}

export class EntryFileError extends ScopeLedgerError {
  readonly source: string;

  constructor(
    source: string,
    detail: string,
    options?: { cause?: unknown; contents?: "entries" | "answers" },
  ) {
    super(
      "ENTRY_FILE",
      `Cannot load ${options?.contents ?? "entries"} from ${source}: ${detail}`,
      options,
    );
    this.source = source;
  }
}

export class AdvisoryError extends ScopeLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("ADVISORY", message, options);
  }
}

export class ConfigError extends ScopeLedgerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG", message, options);
  }
}

export function isScopeLedgerError(err: unknown): err is ScopeLedgerError {
  return err instanceof ScopeLedgerError;
}
