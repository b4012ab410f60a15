import { readFile } from "fs/promises";
import { parseCsvText } from "./parseCsv";
import { parseXlsxBuffer, selectSheet } from "./parseXlsx";
import type { RawTable } from "./types";

export type ReadTableResult = {
  rawTables: RawTable[];
  activeTable: RawTable;
  fileType: "csv" | "xlsx";
  sheetNames: string[];
};

export const fileExtension = (name: string): string => {
  const baseName = name.split(/[\\/]/).pop() ?? "";
  const dotIndex = baseName.lastIndexOf(".");
  return dotIndex > 0 ? baseName.slice(dotIndex + 1).toLowerCase() : "";
};

export const readTableFile = async (
  path: string,
  options: { sheet?: string } = {}
): Promise<ReadTableResult> => {
  const extension = fileExtension(path);
  if (extension === "csv") {
    const text = await readFile(path, "utf8");
    const table = parseCsvText(text);
    return {
      rawTables: [table],
      activeTable: table,
      fileType: "csv",
      sheetNames: []
    };
  }

  if (extension === "xlsx") {
    const buffer = await readFile(path);
    const tables = parseXlsxBuffer(buffer);
    return {
      rawTables: tables,
      activeTable: selectSheet(tables, options.sheet),
      fileType: "xlsx",
      sheetNames: tables.map((table) => table.sheetName ?? "Sheet")
    };
  }

  throw new Error(`Unsupported table file "${path}". Expected a .csv or .xlsx file.`);
};
