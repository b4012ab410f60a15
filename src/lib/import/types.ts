export type Cell = string | number | null;

export type RawTable = {
  sheetName?: string;
  headers: string[];
  rows: Cell[][];
};

export const headerLabel = (cell: Cell, index: number): string => {
  const text = cell === null ? "" : String(cell).trim();
  return text === "" ? `Column ${index + 1}` : text;
};

/** A column picked by header name or by zero-based position. */
export type ColumnSelector = number | string;

export const findColumnIndex = (table: RawTable, selector: ColumnSelector): number => {
  if (typeof selector === "number") {
    return Number.isInteger(selector) && selector >= 0 && selector < table.headers.length
      ? selector
      : -1;
  }
  return table.headers.indexOf(selector);
};
