import * as XLSX from "xlsx";
import { headerLabel, type Cell, type RawTable } from "./types";

const pad = (value: number, width = 2): string => String(value).padStart(width, "0");

// Date cells come back as local wall-clock time. They are written without an
// offset so the time ordering reads them as UTC on any host.
const formatWallClock = (value: Date): string => {
  const date = new Date(Math.round(value.getTime() / 1000) * 1000);
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  if (date.getHours() === 0 && date.getMinutes() === 0 && date.getSeconds() === 0) {
    return day;
  }
  return `${day}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
};

const toCell = (value: unknown): Cell => {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : formatWallClock(value);
  }
  if (typeof value === "boolean") {
    return value ? "TRUE" : "FALSE";
  }
  if (value === null || value === undefined) {
    return null;
  }
  const text = String(value).trim();
  return text === "" ? null : text;
};

const readWorkbook = (buffer: ArrayBuffer | Uint8Array): XLSX.WorkBook =>
  XLSX.read(buffer, { type: "array", cellDates: true });

const sheetToTable = (sheetName: string, sheet: XLSX.WorkSheet): RawTable => {
  const [headerRow = [], ...body] = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    blankrows: false
  });
  const headers = headerRow.map((header, index) => headerLabel(toCell(header), index));
  return {
    sheetName,
    headers,
    rows: body.map((row) => headers.map((_, index) => toCell(row[index])))
  };
};

const sheetNotFound = (sheetName: string, available: string[]): Error =>
  new Error(`Sheet "${sheetName}" not found. Available sheets: ${available.join(", ")}.`);

// Accepts an ArrayBuffer or a Node Buffer (any Uint8Array) holding a workbook.
export const parseXlsxBuffer = (buffer: ArrayBuffer | Uint8Array): RawTable[] => {
  const workbook = readWorkbook(buffer);
  return workbook.SheetNames.map((sheetName) =>
    sheetToTable(sheetName, workbook.Sheets[sheetName])
  );
};

/** Converts one sheet only: the named one, or the first. */
export const readXlsxSheet = (buffer: ArrayBuffer | Uint8Array, sheetName?: string): RawTable => {
  const workbook = readWorkbook(buffer);
  if (workbook.SheetNames.length === 0) {
    throw new Error("No sheets detected in the XLSX file.");
  }
  const name = sheetName ?? workbook.SheetNames[0];
  if (!workbook.SheetNames.includes(name)) {
    throw sheetNotFound(name, workbook.SheetNames);
  }
  return sheetToTable(name, workbook.Sheets[name]);
};

export const selectSheet = (tables: RawTable[], sheetName?: string): RawTable => {
  if (tables.length === 0) {
    throw new Error("No sheets detected in the XLSX file.");
  }
  if (sheetName === undefined) {
    return tables[0];
  }
  const match = tables.find((table) => table.sheetName === sheetName);
  if (!match) {
    throw sheetNotFound(sheetName, tables.map((table) => table.sheetName ?? "Sheet"));
  }
  return match;
};
