import { isAbsolute, resolve } from "path";
import { fileURLToPath } from "url";
import { findColumnIndex, type Cell, type ColumnSelector, type RawTable } from "../import/types";
import { EmptyInputError, InvalidReferenceError, MissingColumnError } from "./errors";
import type { FileReference } from "./types";

const uriSchemePattern = /^[a-z][a-z0-9+.-]*:\/\//i;
const windowsDrivePattern = /^[a-z]:[\\/]/i;

const requireColumn = (table: RawTable, column: ColumnSelector): number => {
  const index = findColumnIndex(table, column);
  if (index === -1) {
    throw new MissingColumnError(column, table.headers);
  }
  return index;
};

const toReference = (value: Cell, rowIndex: number, basePath?: string): FileReference => {
  if (value === null) {
    throw new InvalidReferenceError(rowIndex, value, "value is empty");
  }
  if (typeof value !== "string") {
    throw new InvalidReferenceError(rowIndex, value, `expected a path, got the number ${value}`);
  }
  const trimmed = value.trim();
  if (trimmed === "") {
    throw new InvalidReferenceError(rowIndex, value, "value is empty");
  }
  if (trimmed.includes("\0")) {
    throw new InvalidReferenceError(rowIndex, value, "path contains a NUL character");
  }

  if (trimmed.toLowerCase().startsWith("file://")) {
    try {
      return fileURLToPath(trimmed);
    } catch (error) {
      const reason = error instanceof Error ? error.message : "malformed file URI";
      throw new InvalidReferenceError(rowIndex, value, reason);
    }
  }
  if (uriSchemePattern.test(trimmed)) {
    return trimmed;
  }
  if (basePath === undefined || isAbsolute(trimmed) || windowsDrivePattern.test(trimmed)) {
    return trimmed;
  }
  return resolve(basePath, trimmed);
};

export const resolveReferences = (
  table: RawTable,
  column: ColumnSelector,
  options: { basePath?: string } = {}
): FileReference[] => {
  const columnIndex = requireColumn(table, column);
  return table.rows.map((row, rowIndex) =>
    toReference(row[columnIndex] ?? null, rowIndex, options.basePath)
  );
};

const hasExtension = (value: string, extensions: readonly string[]): boolean => {
  const lower = value.trim().toLowerCase();
  return extensions.some((extension) => lower.endsWith(extension));
};

export const detectReferenceColumn = (
  table: RawTable,
  extensions: readonly string[]
): string => {
  if (table.rows.length === 0) {
    throw new EmptyInputError();
  }

  const columnIndex = table.headers.findIndex((_, index) => {
    let matches = 0;
    for (const row of table.rows) {
      const cell = row[index] ?? null;
      if (cell === null) {
        continue;
      }
      if (typeof cell !== "string" || !hasExtension(cell, extensions)) {
        return false;
      }
      matches += 1;
    }
    return matches > 0;
  });

  if (columnIndex === -1) {
    throw new MissingColumnError(null, table.headers);
  }
  return table.headers[columnIndex];
};

export const pickColumns = (
  table: RawTable,
  columns: readonly string[]
): Record<string, Cell>[] => {
  const indices = columns.map((column) => requireColumn(table, column));
  return table.rows.map((row) =>
    Object.fromEntries(
      columns.map((column, position): [string, Cell] => [column, row[indices[position]] ?? null])
    )
  );
};
