import type { Timestamp } from "./types";

export type TimestampKind = "numeric" | "datetime" | "label";

export type OrderViolation = {
  index: number;
  issue: "invalid" | "mixed" | "duplicate" | "out-of-order";
};

const isoDatePattern = /^\d{4}-\d{2}-\d{2}$/;
const isoLocalDateTimePattern = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)$/;
const numericTextPattern = /^[-+]?\d+(?:\.\d+)?$/;
const dateLikePattern =
  /\d{1,4}[-/.]\d{1,2}[-/.]\d{1,4}|\b(?:jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)[a-z]*\b/i;
const explicitZonePattern =
  /(?:\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}:?\d{2})|\b(?:GMT|UTC)(?:[+-]\d{2}:?\d{2})?)$/i;

const labelCollator = new Intl.Collator("en", { numeric: true });

// Date strings without an offset are read as UTC wall-clock time, whatever the host time zone.
export const toInstant = (value: string): number | null => {
  const trimmed = value.trim();
  if (numericTextPattern.test(trimmed) || !dateLikePattern.test(trimmed)) {
    return null;
  }
  if (isoDatePattern.test(trimmed)) {
    const parsed = Date.parse(`${trimmed}T00:00:00Z`);
    return Number.isNaN(parsed) ? null : parsed;
  }
  const localIso = isoLocalDateTimePattern.exec(trimmed);
  if (localIso) {
    const parsed = Date.parse(`${localIso[1]}T${localIso[2]}Z`);
    return Number.isNaN(parsed) ? null : parsed;
  }
  const parsed = new Date(trimmed);
  if (Number.isNaN(parsed.valueOf())) {
    return null;
  }
  if (explicitZonePattern.test(trimmed)) {
    return parsed.valueOf();
  }
  return Date.UTC(
    parsed.getFullYear(),
    parsed.getMonth(),
    parsed.getDate(),
    parsed.getHours(),
    parsed.getMinutes(),
    parsed.getSeconds(),
    parsed.getMilliseconds()
  );
};

const compareLabels = (left: string, right: string): number => {
  const collated = labelCollator.compare(left, right);
  if (collated !== 0) {
    return collated;
  }
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
};

const kindOf = (value: Timestamp): TimestampKind | null => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? "numeric" : null;
  }
  if (value.trim() === "") {
    return null;
  }
  return toInstant(value) === null ? "label" : "datetime";
};

// Dates that appear among free labels are ordered as labels.
export const detectTimestampKind = (
  timestamps: readonly Timestamp[]
): TimestampKind | "mixed" => {
  let detected: TimestampKind | null = null;
  for (const value of timestamps) {
    const kind = kindOf(value);
    if (kind === null) {
      continue;
    }
    if (detected === null || detected === kind) {
      detected = kind;
      continue;
    }
    if (detected !== "numeric" && kind !== "numeric") {
      detected = "label";
      continue;
    }
    return "mixed";
  }
  return detected ?? "numeric";
};

export const compareTimestamps = (
  left: Timestamp,
  right: Timestamp,
  kind: TimestampKind
): number => {
  if (typeof left === "number" && typeof right === "number") {
    return left - right;
  }
  const leftText = String(left);
  const rightText = String(right);
  if (kind === "datetime") {
    const leftInstant = toInstant(leftText);
    const rightInstant = toInstant(rightText);
    if (leftInstant !== null && rightInstant !== null) {
      return leftInstant - rightInstant;
    }
  }
  return compareLabels(leftText, rightText);
};

export const findOrderViolation = (
  timestamps: readonly Timestamp[]
): OrderViolation | null => {
  const invalidIndex = timestamps.findIndex((value) => kindOf(value) === null);
  if (invalidIndex >= 0) {
    return { index: invalidIndex, issue: "invalid" };
  }

  const kind = detectTimestampKind(timestamps);
  if (kind === "mixed") {
    const firstKind = typeof timestamps[0];
    const index = timestamps.findIndex((value) => typeof value !== firstKind);
    return { index, issue: "mixed" };
  }

  for (let index = 1; index < timestamps.length; index += 1) {
    const previous = timestamps[index - 1];
    const current = timestamps[index];
    if (previous === current) {
      return { index, issue: "duplicate" };
    }
    if (compareTimestamps(previous, current, kind) >= 0) {
      return { index, issue: "out-of-order" };
    }
  }
  return null;
};

export const describeOrderViolation = (
  timestamps: readonly Timestamp[],
  violation: OrderViolation
): string => {
  const value = String(timestamps[violation.index]);
  switch (violation.issue) {
    case "invalid":
      return `timestamp at position ${violation.index} is not a finite number or non-empty label`;
    case "mixed":
      return `timestamp "${value}" at position ${violation.index} mixes numeric and text timestamps`;
    case "duplicate":
      return `duplicate timestamp "${value}" at position ${violation.index}`;
    case "out-of-order":
      return `timestamp "${value}" at position ${violation.index} is not after the previous timestamp`;
  }
};
