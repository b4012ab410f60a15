import { dirname, resolve } from "path";
import { readTableFile } from "../import/readTable";
import type { ColumnSelector, RawTable } from "../import/types";
import { assembleLongTable, assembleMatrix, planLongTable } from "./assemble";
import { resolveLoaderOptions, type LoaderOptions, type LoaderOptionsInput } from "./config";
import { validateConsistency } from "./consistency";
import { EmptyInputError, SeriesLoadError } from "./errors";
import {
  createFileSeriesParser,
  defaultSeriesFormats,
  parseSeriesRecord,
  seriesExtensions,
  type SeriesParser
} from "./parsers";
import { mapWithConcurrency } from "./pool";
import { detectReferenceColumn, pickColumns, resolveReferences } from "./references";
import type { SeriesMatrix, SeriesRecord } from "./types";

export type SeriesLoaderLogger = Pick<Console, "info" | "error">;

export type LoadSeriesOptions = LoaderOptionsInput & {
  parser?: SeriesParser;
  /** Extensions used to detect the reference column when none is named. */
  referenceExtensions?: string[];
  logger?: SeriesLoaderLogger;
  signal?: AbortSignal;
  env?: Record<string, string | undefined>;
};

const logStart = (
  logger: SeriesLoaderLogger,
  payload: { rows: number; referenceColumn: ColumnSelector; concurrency: number }
) => {
  logger.info("[series-loader] start", payload);
};

const logSuccess = (logger: SeriesLoaderLogger, payload: { rows: number; columns: number }) => {
  logger.info("[series-loader] success", payload);
};

const logFailure = (logger: SeriesLoaderLogger, error: unknown) => {
  const payload =
    error instanceof SeriesLoadError
      ? {
          code: error.code,
          rowIndex: error.rowIndex,
          reference: error.reference,
          message: error.message
        }
      : { message: error instanceof Error ? error.message : String(error) };
  logger.error("[series-loader] fail", payload);
};

type LoadPlan<T> = {
  assemble: (records: SeriesRecord[]) => T;
  size: (result: T) => { rows: number; columns: number };
};

// Resolves options and references, parses every series through the bounded pool
// and hands the records to the plan. The plan is built before any file is read.
const runLoad = async <T>(
  table: RawTable,
  options: LoadSeriesOptions,
  planFor: (settings: LoaderOptions) => LoadPlan<T>
): Promise<T> => {
  const {
    parser = createFileSeriesParser(),
    referenceExtensions = seriesExtensions(defaultSeriesFormats),
    logger = console,
    signal,
    env,
    ...input
  } = options;

  try {
    const settings = resolveLoaderOptions(input, env);
    const referenceColumn =
      settings.referenceColumn ?? detectReferenceColumn(table, referenceExtensions);
    logStart(logger, {
      rows: table.rows.length,
      referenceColumn,
      concurrency: settings.concurrency
    });

    const references = resolveReferences(table, referenceColumn, {
      basePath: settings.basePath
    });
    const plan = planFor(settings);

    const records = await mapWithConcurrency(
      references,
      settings.concurrency,
      (reference, rowIndex, workerSignal) =>
        parseSeriesRecord(parser, reference, { rowIndex, signal: workerSignal }),
      signal
    );

    const result = plan.assemble(records);
    logSuccess(logger, plan.size(result));
    return result;
  } catch (error) {
    logFailure(logger, error);
    throw error;
  }
};

/**
 * Loads every series referenced by `table` and reshapes them into one row per
 * input row and one column per shared timestamp.
 *
 * Fails fast: the first missing file, parse failure or timestamp mismatch
 * rejects the whole load and no partial matrix is returned.
 */
export const loadSeriesMatrix = (
  table: RawTable,
  options: LoadSeriesOptions = {}
): Promise<SeriesMatrix> =>
  runLoad<SeriesMatrix>(table, options, (settings) => {
    const attributes =
      settings.keepColumns.length > 0 ? pickColumns(table, settings.keepColumns) : undefined;
    return {
      assemble: (records) =>
        assembleMatrix(validateConsistency(records), {
          columnLabels: settings.columnLabels,
          attributes
        }),
      size: (matrix) => ({ rows: matrix.rows.length, columns: matrix.columns.length })
    };
  });

/**
 * Loads every series referenced by `table` into a long table with one row per
 * series point. Series may have different timestamps; each file must still be
 * strictly ordered.
 */
export const loadSeriesLongTable = (
  table: RawTable,
  options: LoadSeriesOptions = {}
): Promise<RawTable> =>
  runLoad<RawTable>(table, options, (settings) => {
    const longOptions = {
      columns: settings.longColumns,
      carry: settings.keepColumns.length > 0 ? settings.keepColumns : undefined,
      columnLabels: settings.columnLabels
    };
    planLongTable(table, longOptions);
    return {
      assemble: (records) => {
        if (records.length === 0) {
          throw new EmptyInputError();
        }
        return assembleLongTable(records, table, longOptions);
      },
      size: (longTable) => ({ rows: longTable.rows.length, columns: longTable.headers.length })
    };
  });

const readTableThen = async <T>(
  tablePath: string,
  options: LoadSeriesOptions & { sheet?: string },
  load: (table: RawTable, options: LoadSeriesOptions) => Promise<T>
): Promise<T> => {
  const { sheet, ...loadOptions } = options;
  const { activeTable } = await readTableFile(tablePath, { sheet });
  return load(activeTable, {
    ...loadOptions,
    basePath: loadOptions.basePath ?? dirname(resolve(tablePath))
  });
};

/**
 * Reads the input table from a .csv or .xlsx file, then loads it. Relative
 * references resolve against the table file's directory unless `basePath` is set.
 */
export const loadSeriesMatrixFromFile = (
  tablePath: string,
  options: LoadSeriesOptions & { sheet?: string } = {}
): Promise<SeriesMatrix> => readTableThen(tablePath, options, loadSeriesMatrix);

export const loadSeriesLongTableFromFile = (
  tablePath: string,
  options: LoadSeriesOptions & { sheet?: string } = {}
): Promise<RawTable> => readTableThen(tablePath, options, loadSeriesLongTable);
