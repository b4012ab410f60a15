import { readFile } from "fs/promises";
import { z } from "zod";
import { parseCsvText } from "../import/parseCsv";
import { readXlsxSheet } from "../import/parseXlsx";
import { fileExtension } from "../import/readTable";
import { findColumnIndex, type ColumnSelector, type RawTable } from "../import/types";
import { FileNotFoundError, SeriesLoadError, SeriesParseError, isMissingFileError } from "./errors";
import { describeOrderViolation, findOrderViolation } from "./time";
import type { FileReference, SeriesData, SeriesRecord, Timestamp } from "./types";

export type SeriesParserContext = {
  rowIndex: number;
  signal: AbortSignal;
};

/**
 * Turns one file reference into its ordered timestamps and values.
 *
 * Throws {@link FileNotFoundError} when the reference has no content and
 * {@link SeriesParseError} when the content is not a strictly ordered series.
 */
export type SeriesParser = (
  reference: FileReference,
  context: SeriesParserContext
) => Promise<SeriesData>;

export type ReadSeriesFile = (path: string, signal: AbortSignal) => Promise<Uint8Array>;

export type SeriesFormat = (data: Uint8Array, options: { sheet?: string }) => RawTable;

/** Column index or header name. */
export type FileSeriesParserOptions = {
  read?: ReadSeriesFile;
  formats?: Record<string, SeriesFormat>;
  timeColumn?: ColumnSelector;
  valueColumn?: ColumnSelector;
  sheet?: string;
};

export const defaultSeriesFormats: Record<string, SeriesFormat> = {
  csv: (data) => parseCsvText(Buffer.from(data).toString("utf8")),
  xlsx: (data, { sheet }) => readXlsxSheet(data, sheet)
};

export const seriesExtensions = (formats: Record<string, SeriesFormat>): string[] =>
  Object.keys(formats).map((extension) => `.${extension}`);

const readFromDisk: ReadSeriesFile = (path, signal) => readFile(path, { signal });

const timestampSchema = z.union([z.number().finite(), z.string()]);

export const seriesDataSchema = z
  .object({
    timestamps: z.array(timestampSchema),
    values: z.array(z.number())
  })
  .superRefine((data, ctx) => {
    if (data.timestamps.length !== data.values.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${data.timestamps.length} timestamps but ${data.values.length} values`
      });
      return;
    }
    const violation = findOrderViolation(data.timestamps);
    if (violation) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["timestamps", violation.index],
        message: describeOrderViolation(data.timestamps, violation)
      });
    }
  });

export const tableToSeriesData = (
  table: RawTable,
  reference: FileReference,
  options: { timeColumn: ColumnSelector; valueColumn: ColumnSelector; rowIndex?: number }
): SeriesData => {
  const fail = (reason: string): SeriesParseError =>
    new SeriesParseError(reference, reason, { rowIndex: options.rowIndex });

  const timeIndex = findColumnIndex(table, options.timeColumn);
  if (timeIndex === -1) {
    throw fail(`time column ${JSON.stringify(options.timeColumn)} not found`);
  }
  const valueIndex = findColumnIndex(table, options.valueColumn);
  if (valueIndex === -1) {
    throw fail(`value column ${JSON.stringify(options.valueColumn)} not found`);
  }

  const timestamps: Timestamp[] = [];
  const values: number[] = [];
  table.rows.forEach((row, dataRow) => {
    const time = row[timeIndex] ?? null;
    const value = row[valueIndex] ?? null;
    if (time === null) {
      throw fail(`data row ${dataRow + 1} has no timestamp`);
    }
    if (typeof value !== "number") {
      throw fail(`data row ${dataRow + 1} has a non-numeric value ${JSON.stringify(value)}`);
    }
    timestamps.push(time);
    values.push(value);
  });

  const violation = findOrderViolation(timestamps);
  if (violation) {
    throw fail(describeOrderViolation(timestamps, violation));
  }
  return { timestamps, values };
};

export const createFileSeriesParser = (options: FileSeriesParserOptions = {}): SeriesParser => {
  const read = options.read ?? readFromDisk;
  const formats = options.formats ?? defaultSeriesFormats;
  const timeColumn = options.timeColumn ?? 0;
  const valueColumn = options.valueColumn ?? 1;

  return async (reference, { rowIndex, signal }) => {
    const extension = fileExtension(reference);
    const format = formats[extension];
    if (!format) {
      throw new SeriesParseError(
        reference,
        `unsupported series file type ".${extension}"; expected one of ${seriesExtensions(formats).join(", ")}`,
        { rowIndex }
      );
    }

    let data: Uint8Array;
    try {
      data = await read(reference, signal);
    } catch (error) {
      if (isMissingFileError(error)) {
        throw new FileNotFoundError(reference, { rowIndex, cause: error });
      }
      throw error;
    }

    let table: RawTable;
    try {
      table = format(data, { sheet: options.sheet });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new SeriesParseError(reference, reason, { rowIndex, cause: error });
    }
    return tableToSeriesData(table, reference, { timeColumn, valueColumn, rowIndex });
  };
};

const localizeFailure = (
  error: unknown,
  reference: FileReference,
  rowIndex: number
): SeriesLoadError => {
  if (error instanceof SeriesLoadError && error.rowIndex === rowIndex) {
    return error;
  }
  if (error instanceof FileNotFoundError || isMissingFileError(error)) {
    return new FileNotFoundError(reference, { rowIndex, cause: error });
  }
  if (error instanceof SeriesParseError) {
    return new SeriesParseError(reference, error.reason, { rowIndex, cause: error });
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new SeriesParseError(reference, reason, { rowIndex, cause: error });
};

/**
 * Runs a parser for one row and checks its output, so every failure comes back
 * as a {@link FileNotFoundError} or {@link SeriesParseError} carrying the row index.
 */
export const parseSeriesRecord = async (
  parser: SeriesParser,
  reference: FileReference,
  context: SeriesParserContext
): Promise<SeriesRecord> => {
  let output: unknown;
  try {
    output = await parser(reference, context);
  } catch (error) {
    throw localizeFailure(error, reference, context.rowIndex);
  }

  const parsed = seriesDataSchema.safeParse(output);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
      )
      .join("; ");
    throw new SeriesParseError(reference, `parser returned an invalid series (${reason})`, {
      rowIndex: context.rowIndex
    });
  }
  return {
    rowIndex: context.rowIndex,
    reference,
    timestamps: parsed.data.timestamps,
    values: parsed.data.values
  };
};
