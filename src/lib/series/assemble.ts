import { findColumnIndex, type Cell, type RawTable } from "../import/types";
import { LoaderConfigError, MissingColumnError } from "./errors";
import type {
  ColumnLabelFormat,
  SeriesMatrix,
  SeriesRecord,
  Timestamp,
  ValidatedSeries
} from "./types";

export type AssembleOptions = {
  columnLabels?: ColumnLabelFormat;
  /** Carried input fields, one entry per record in the same order. */
  attributes?: Record<string, Cell>[];
};

const toColumnLabel = (timestamp: Timestamp, format: ColumnLabelFormat): Timestamp =>
  format === "string" ? String(timestamp) : timestamp;

export const assembleMatrix = (
  validated: ValidatedSeries,
  options: AssembleOptions = {}
): SeriesMatrix => {
  const format = options.columnLabels ?? "native";
  const matrix: SeriesMatrix = {
    columns: validated.timestamps.map((timestamp) => toColumnLabel(timestamp, format)),
    rows: validated.records.map((record) => [...record.values]),
    references: validated.records.map((record) => record.reference)
  };

  const { attributes } = options;
  if (attributes) {
    matrix.attributes = validated.records.map((_, position) => ({ ...attributes[position] }));
  }
  return matrix;
};

export type LongTableColumns = {
  seriesId: string;
  timestamp: string;
  value: string;
};

export const defaultLongTableColumns: LongTableColumns = {
  seriesId: "series_id",
  timestamp: "timestamp",
  value: "value"
};

export type LongTableOptions = {
  columns?: LongTableColumns;
  /** Input columns repeated on every point. Defaults to all of them. */
  carry?: readonly string[];
  columnLabels?: ColumnLabelFormat;
};

type LongTableLayout = {
  headers: string[];
  carriedIndices: number[];
};

/**
 * Works out the long table's headers. Throws before any series is read when a
 * carried column is missing or an added column would shadow a carried one.
 */
export const planLongTable = (table: RawTable, options: LongTableOptions = {}): LongTableLayout => {
  const names = options.columns ?? defaultLongTableColumns;
  const carried = options.carry ?? table.headers;
  const carriedIndices = carried.map((column) => {
    const index = findColumnIndex(table, column);
    if (index === -1) {
      throw new MissingColumnError(column, table.headers);
    }
    return index;
  });

  const added = [names.seriesId, names.timestamp, names.value];
  const clash = added.find(
    (name, position) => carried.includes(name) || added.indexOf(name) !== position
  );
  if (clash !== undefined) {
    throw new LoaderConfigError([`longColumns: column "${clash}" is already in use`]);
  }

  return { headers: [...carried, ...added], carriedIndices };
};

/**
 * One row per (input row, series point): the input row's fields, then the
 * series id (the input row index), the timestamp and the value.
 */
export const assembleLongTable = (
  records: readonly SeriesRecord[],
  table: RawTable,
  options: LongTableOptions = {}
): RawTable => {
  const { headers, carriedIndices } = planLongTable(table, options);
  const format = options.columnLabels ?? "native";

  const rows = records.flatMap((record) => {
    const source = table.rows[record.rowIndex] ?? [];
    const fields = carriedIndices.map((index) => source[index] ?? null);
    return record.timestamps.map((timestamp, point): Cell[] => [
      ...fields,
      record.rowIndex,
      toColumnLabel(timestamp, format),
      record.values[point]
    ]);
  });

  return { headers, rows };
};
