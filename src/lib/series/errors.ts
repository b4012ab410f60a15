import type { Cell } from "../import/types";
import type { FileReference, Timestamp } from "./types";

export type SeriesLoadErrorCode =
  | "MISSING_COLUMN"
  | "INVALID_REFERENCE"
  | "FILE_NOT_FOUND"
  | "PARSE_ERROR"
  | "EMPTY_INPUT"
  | "EMPTY_SERIES"
  | "TIMESTAMP_MISMATCH"
  | "INVALID_OPTIONS";

type ErrorContext = {
  rowIndex?: number;
  reference?: FileReference;
  cause?: unknown;
};

export class SeriesLoadError extends Error {
  readonly code: SeriesLoadErrorCode;
  readonly rowIndex?: number;
  readonly reference?: FileReference;

  constructor(code: SeriesLoadErrorCode, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = "SeriesLoadError";
    this.code = code;
    this.rowIndex = context.rowIndex;
    this.reference = context.reference;
  }
}

const rowLabel = (rowIndex: number | undefined, reference?: FileReference): string => {
  if (rowIndex === undefined) {
    return reference ? `"${reference}"` : "series";
  }
  return reference ? `row ${rowIndex} ("${reference}")` : `row ${rowIndex}`;
};

export class MissingColumnError extends SeriesLoadError {
  readonly column: string | number | null;
  readonly availableColumns: string[];

  constructor(column: string | number | null, availableColumns: string[]) {
    const available = availableColumns.length > 0 ? availableColumns.join(", ") : "none";
    const missing =
      column === null
        ? "No column holding series file references was found"
        : typeof column === "number"
          ? `Column index ${column} is out of range`
          : `Column "${column}" not found`;
    super("MISSING_COLUMN", `${missing}. Available columns: ${available}.`);
    this.name = "MissingColumnError";
    this.column = column;
    this.availableColumns = availableColumns;
  }
}

export class InvalidReferenceError extends SeriesLoadError {
  readonly value: Cell;

  constructor(rowIndex: number, value: Cell, reason: string) {
    super("INVALID_REFERENCE", `Invalid file reference in row ${rowIndex}: ${reason}.`, {
      rowIndex
    });
    this.name = "InvalidReferenceError";
    this.value = value;
  }
}

export class FileNotFoundError extends SeriesLoadError {
  constructor(reference: FileReference, context: Omit<ErrorContext, "reference"> = {}) {
    super(
      "FILE_NOT_FOUND",
      `Series file not found for ${rowLabel(context.rowIndex, reference)}.`,
      { ...context, reference }
    );
    this.name = "FileNotFoundError";
  }
}

export class SeriesParseError extends SeriesLoadError {
  readonly reason: string;

  constructor(
    reference: FileReference,
    reason: string,
    context: Omit<ErrorContext, "reference"> = {}
  ) {
    super(
      "PARSE_ERROR",
      `Could not parse series for ${rowLabel(context.rowIndex, reference)}: ${reason}`,
      { ...context, reference }
    );
    this.name = "SeriesParseError";
    this.reason = reason;
  }
}

export class EmptyInputError extends SeriesLoadError {
  constructor() {
    super("EMPTY_INPUT", "Input table has no rows; at least one series is required.");
    this.name = "EmptyInputError";
  }
}

export class EmptySeriesError extends SeriesLoadError {
  constructor(rowIndex: number, reference: FileReference) {
    super("EMPTY_SERIES", `Series for ${rowLabel(rowIndex, reference)} has no timestamps.`, {
      rowIndex,
      reference
    });
    this.name = "EmptySeriesError";
  }
}

export type SequenceSummary = {
  length: number;
  sample: Timestamp[];
};

export type TimestampMismatch = {
  rowIndex: number;
  reference: FileReference;
  /** First index at which the sequences differ. */
  position: number;
  expected: SequenceSummary;
  actual: SequenceSummary;
};

const formatSample = (summary: SequenceSummary): string =>
  `${summary.length} timestamps [${summary.sample.join(", ")}${
    summary.length > summary.sample.length ? ", ..." : ""
  }]`;

export class TimestampMismatchError extends SeriesLoadError {
  readonly position: number;
  readonly expected: SequenceSummary;
  readonly actual: SequenceSummary;

  constructor(mismatch: TimestampMismatch) {
    super(
      "TIMESTAMP_MISMATCH",
      `Timestamps for ${rowLabel(mismatch.rowIndex, mismatch.reference)} differ from the first series at position ${mismatch.position}: expected ${formatSample(mismatch.expected)}, got ${formatSample(mismatch.actual)}.`,
      { rowIndex: mismatch.rowIndex, reference: mismatch.reference }
    );
    this.name = "TimestampMismatchError";
    this.position = mismatch.position;
    this.expected = mismatch.expected;
    this.actual = mismatch.actual;
  }
}

export class LoaderConfigError extends SeriesLoadError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("INVALID_OPTIONS", `Invalid series loader options: ${issues.join("; ")}`);
    this.name = "LoaderConfigError";
    this.issues = issues;
  }
}

const missingFileCodes = new Set(["ENOENT", "ENOTDIR", "EISDIR"]);

export const isMissingFileError = (error: unknown): boolean => {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  return typeof error.code === "string" && missingFileCodes.has(error.code);
};
