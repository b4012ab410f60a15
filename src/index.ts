export type { Cell, ColumnSelector, RawTable } from "./lib/import/types";
export { parseCsvText } from "./lib/import/parseCsv";
export { parseXlsxBuffer, readXlsxSheet, selectSheet } from "./lib/import/parseXlsx";
export { readTableFile, type ReadTableResult } from "./lib/import/readTable";

export type {
  ColumnLabelFormat,
  FileReference,
  SeriesData,
  SeriesMatrix,
  SeriesRecord,
  Timestamp,
  ValidatedSeries
} from "./lib/series/types";
export {
  EmptyInputError,
  EmptySeriesError,
  FileNotFoundError,
  InvalidReferenceError,
  LoaderConfigError,
  MissingColumnError,
  SeriesLoadError,
  SeriesParseError,
  TimestampMismatchError,
  type SeriesLoadErrorCode
} from "./lib/series/errors";
export {
  DEFAULT_CONCURRENCY,
  loaderOptionsSchema,
  resolveLoaderOptions,
  type LoaderOptions,
  type LoaderOptionsInput
} from "./lib/series/config";
export { toInstant } from "./lib/series/time";
export { detectReferenceColumn, pickColumns, resolveReferences } from "./lib/series/references";
export {
  createFileSeriesParser,
  defaultSeriesFormats,
  parseSeriesRecord,
  tableToSeriesData,
  type FileSeriesParserOptions,
  type ReadSeriesFile,
  type SeriesFormat,
  type SeriesParser,
  type SeriesParserContext
} from "./lib/series/parsers";
export { mapWithConcurrency } from "./lib/series/pool";
export { validateConsistency } from "./lib/series/consistency";
export {
  assembleLongTable,
  assembleMatrix,
  defaultLongTableColumns,
  planLongTable,
  type AssembleOptions,
  type LongTableColumns,
  type LongTableOptions
} from "./lib/series/assemble";
export {
  loadSeriesLongTable,
  loadSeriesLongTableFromFile,
  loadSeriesMatrix,
  loadSeriesMatrixFromFile,
  type LoadSeriesOptions,
  type SeriesLoaderLogger
} from "./lib/series/pipeline";
