import {
  EmptyInputError,
  EmptySeriesError,
  TimestampMismatchError,
  type SequenceSummary,
  type TimestampMismatch
} from "./errors";
import type { SeriesRecord, Timestamp, ValidatedSeries } from "./types";

export const SAMPLE_SIZE = 5;

const summarize = (timestamps: readonly Timestamp[]): SequenceSummary => ({
  length: timestamps.length,
  sample: timestamps.slice(0, SAMPLE_SIZE)
});

/** Index of the first position where the sequences differ, or -1 when identical. */
export const findFirstDifference = (
  expected: readonly Timestamp[],
  actual: readonly Timestamp[]
): number => {
  const shared = Math.min(expected.length, actual.length);
  for (let index = 0; index < shared; index += 1) {
    if (expected[index] !== actual[index]) {
      return index;
    }
  }
  return expected.length === actual.length ? -1 : shared;
};

export const checkTimestampSequence = (
  expected: readonly Timestamp[],
  record: SeriesRecord
): TimestampMismatch | null => {
  const position = findFirstDifference(expected, record.timestamps);
  if (position === -1) {
    return null;
  }
  return {
    rowIndex: record.rowIndex,
    reference: record.reference,
    position,
    expected: summarize(expected),
    actual: summarize(record.timestamps)
  };
};

export const validateConsistency = (records: readonly SeriesRecord[]): ValidatedSeries => {
  if (records.length === 0) {
    throw new EmptyInputError();
  }

  const [first] = records;
  if (first.timestamps.length === 0) {
    throw new EmptySeriesError(first.rowIndex, first.reference);
  }
  const baseline = first.timestamps;

  for (const record of records.slice(1)) {
    if (record.timestamps.length === 0) {
      throw new EmptySeriesError(record.rowIndex, record.reference);
    }
    const mismatch = checkTimestampSequence(baseline, record);
    if (mismatch) {
      throw new TimestampMismatchError(mismatch);
    }
  }

  return { timestamps: baseline, records: [...records] };
};
