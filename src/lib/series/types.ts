import type { Cell } from "../import/types";

export type FileReference = string;

export type Timestamp = number | string;

export type SeriesData = {
  timestamps: Timestamp[];
  values: number[];
};

export type SeriesRecord = SeriesData & {
  rowIndex: number;
  reference: FileReference;
};

export type ValidatedSeries = {
  /** Shared timestamp sequence, taken from the first record. */
  timestamps: Timestamp[];
  records: SeriesRecord[];
};

export type ColumnLabelFormat = "native" | "string";

export type SeriesMatrix = {
  columns: Timestamp[];
  rows: number[][];
  references: FileReference[];
  attributes?: Record<string, Cell>[];
};
