import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { RawTable } from "../lib/import/types";
import {
  EmptyInputError,
  FileNotFoundError,
  MissingColumnError,
  SeriesParseError,
  TimestampMismatchError
} from "../lib/series/errors";
import { createFileSeriesParser, type SeriesParserContext } from "../lib/series/parsers";
import {
  loadSeriesLongTable,
  loadSeriesLongTableFromFile,
  loadSeriesMatrix,
  loadSeriesMatrixFromFile
} from "../lib/series/pipeline";
import { captureError, createMemoryReader, createSilentLogger, seriesCsv } from "./helpers";

const files = {
  "/data/a.csv": seriesCsv([
    ["t1", 1],
    ["t2", 2],
    ["t3", 3]
  ]),
  "/data/b.csv": seriesCsv([
    ["t1", 4],
    ["t2", 5],
    ["t3", 6]
  ]),
  "/data/c.csv": seriesCsv([
    ["t1", 7],
    ["t2", 8],
    ["t3", 9]
  ]),
  "/data/b-shifted.csv": seriesCsv([
    ["t1", 4],
    ["t2", 5],
    ["t4", 6]
  ])
};

const buildTable = (paths: string[]): RawTable => ({
  headers: ["entity", "series_path"],
  rows: paths.map((path, index) => [`entity-${index}`, path])
});

const baseOptions = () => ({
  referenceColumn: "series_path",
  basePath: "/data",
  parser: createFileSeriesParser({ read: createMemoryReader(files) }),
  logger: createSilentLogger(),
  env: {}
});

describe("loadSeriesMatrix", () => {
  it("assembles one row per input row and one column per timestamp", async () => {
    const matrix = await loadSeriesMatrix(buildTable(["a.csv", "b.csv", "c.csv"]), baseOptions());

    expect(matrix).toEqual({
      columns: ["t1", "t2", "t3"],
      rows: [
        [1, 2, 3],
        [4, 5, 6],
        [7, 8, 9]
      ],
      references: ["/data/a.csv", "/data/b.csv", "/data/c.csv"]
    });
  });

  it("fails with TimestampMismatchError on the deviating row", async () => {
    const error = await captureError(
      loadSeriesMatrix(buildTable(["a.csv", "b-shifted.csv", "c.csv"]), baseOptions())
    );

    expect(error).toBeInstanceOf(TimestampMismatchError);
    expect(error).toMatchObject({ rowIndex: 1, reference: "/data/b-shifted.csv", position: 2 });
  });

  it("permutes output rows with the input rows and keeps columns", async () => {
    const forward = await loadSeriesMatrix(buildTable(["a.csv", "b.csv", "c.csv"]), baseOptions());
    const reversed = await loadSeriesMatrix(buildTable(["c.csv", "b.csv", "a.csv"]), baseOptions());

    expect(reversed.columns).toEqual(forward.columns);
    expect(reversed.rows).toEqual([...forward.rows].reverse());
    expect(reversed.references).toEqual([...forward.references].reverse());
  });

  it("keeps row order when parsers finish out of order", async () => {
    const delays: Record<string, number> = { "/data/a.csv": 30, "/data/b.csv": 0, "/data/c.csv": 10 };
    const inner = createFileSeriesParser({ read: createMemoryReader(files) });
    const parser = async (reference: string, context: SeriesParserContext) => {
      await new Promise((resolve) => setTimeout(resolve, delays[reference]));
      return inner(reference, context);
    };

    const matrix = await loadSeriesMatrix(buildTable(["a.csv", "b.csv", "c.csv"]), {
      ...baseOptions(),
      parser,
      concurrency: 3
    });

    expect(matrix.rows).toEqual([
      [1, 2, 3],
      [4, 5, 6],
      [7, 8, 9]
    ]);
  });

  it("returns identical output for repeated runs", async () => {
    const table = buildTable(["a.csv", "b.csv", "c.csv"]);

    const first = await loadSeriesMatrix(table, baseOptions());
    const second = await loadSeriesMatrix(table, baseOptions());

    expect(second).toEqual(first);
  });

  it("fails with MissingColumnError before touching any file", async () => {
    const parser = vi.fn(async () => ({ timestamps: [1], values: [1] }));

    const error = await captureError(
      loadSeriesMatrix(buildTable(["a.csv"]), {
        ...baseOptions(),
        referenceColumn: "path",
        parser
      })
    );

    expect(error).toBeInstanceOf(MissingColumnError);
    expect(parser).not.toHaveBeenCalled();
  });

  it("fails with EmptyInputError for a table without rows", async () => {
    await expect(loadSeriesMatrix(buildTable([]), baseOptions())).rejects.toBeInstanceOf(
      EmptyInputError
    );
  });

  it("reports a missing series file with its row", async () => {
    const error = await captureError(
      loadSeriesMatrix(buildTable(["a.csv", "gone.csv"]), baseOptions())
    );

    expect(error).toBeInstanceOf(FileNotFoundError);
    expect(error).toMatchObject({ rowIndex: 1, reference: "/data/gone.csv" });
  });

  it("stops at the first parse failure", async () => {
    const parser = vi.fn(async (reference: string, context: SeriesParserContext) => {
      if (context.rowIndex === 0) {
        throw new Error("corrupt header");
      }
      return { timestamps: ["t1"], values: [1] };
    });

    const error = await captureError(
      loadSeriesMatrix(buildTable(["a.csv", "b.csv", "c.csv"]), {
        ...baseOptions(),
        parser,
        concurrency: 1
      })
    );

    expect(error).toBeInstanceOf(SeriesParseError);
    expect(error).toMatchObject({ rowIndex: 0, reason: "corrupt header" });
    expect(parser).toHaveBeenCalledTimes(1);
  });

  it("detects the reference column when none is named", async () => {
    const { referenceColumn, ...options } = baseOptions();

    const matrix = await loadSeriesMatrix(buildTable(["a.csv", "b.csv"]), options);

    expect(referenceColumn).toBe("series_path");
    expect(matrix.references).toEqual(["/data/a.csv", "/data/b.csv"]);
  });

  it("reads references from a column given by position", async () => {
    const logger = createSilentLogger();

    const matrix = await loadSeriesMatrix(buildTable(["a.csv", "b.csv"]), {
      ...baseOptions(),
      referenceColumn: 1,
      logger
    });

    expect(matrix.references).toEqual(["/data/a.csv", "/data/b.csv"]);
    expect(logger.info).toHaveBeenNthCalledWith(1, "[series-loader] start", {
      rows: 2,
      referenceColumn: 1,
      concurrency: 4
    });
  });

  it("carries selected input columns and string labels", async () => {
    const matrix = await loadSeriesMatrix(buildTable(["a.csv", "b.csv"]), {
      ...baseOptions(),
      keepColumns: ["entity"],
      columnLabels: "string"
    });

    expect(matrix.attributes).toEqual([{ entity: "entity-0" }, { entity: "entity-1" }]);
    expect(matrix.columns).toEqual(["t1", "t2", "t3"]);
  });

  it("logs start and success", async () => {
    const logger = createSilentLogger();

    await loadSeriesMatrix(buildTable(["a.csv", "b.csv", "c.csv"]), {
      ...baseOptions(),
      logger,
      concurrency: 2
    });

    expect(logger.info).toHaveBeenNthCalledWith(1, "[series-loader] start", {
      rows: 3,
      referenceColumn: "series_path",
      concurrency: 2
    });
    expect(logger.info).toHaveBeenNthCalledWith(2, "[series-loader] success", {
      rows: 3,
      columns: 3
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it("logs failures with their code and row", async () => {
    const logger = createSilentLogger();

    await captureError(
      loadSeriesMatrix(buildTable(["a.csv", "b-shifted.csv"]), { ...baseOptions(), logger })
    );

    expect(logger.error).toHaveBeenCalledWith(
      "[series-loader] fail",
      expect.objectContaining({
        code: "TIMESTAMP_MISMATCH",
        rowIndex: 1,
        reference: "/data/b-shifted.csv"
      })
    );
  });
});

describe("loadSeriesLongTable", () => {
  it("joins every series point with its input row", async () => {
    const longTable = await loadSeriesLongTable(buildTable(["a.csv", "b-shifted.csv"]), {
      ...baseOptions(),
      keepColumns: ["entity"]
    });

    expect(longTable).toEqual({
      headers: ["entity", "series_id", "timestamp", "value"],
      rows: [
        ["entity-0", 0, "t1", 1],
        ["entity-0", 0, "t2", 2],
        ["entity-0", 0, "t3", 3],
        ["entity-1", 1, "t1", 4],
        ["entity-1", 1, "t2", 5],
        ["entity-1", 1, "t4", 6]
      ]
    });
  });

  it("checks the long table columns before reading any file", async () => {
    const parser = vi.fn(async () => ({ timestamps: [1], values: [1] }));

    const error = await captureError(
      loadSeriesLongTable(buildTable(["a.csv"]), {
        ...baseOptions(),
        parser,
        longColumns: { seriesId: "entity" }
      })
    );

    expect(error).toMatchObject({ code: "INVALID_OPTIONS" });
    expect(parser).not.toHaveBeenCalled();
  });

  it("shares the fail-fast error model with the matrix loader", async () => {
    const error = await captureError(
      loadSeriesLongTable(buildTable(["a.csv", "gone.csv"]), baseOptions())
    );

    expect(error).toBeInstanceOf(FileNotFoundError);
    expect(error).toMatchObject({ rowIndex: 1, reference: "/data/gone.csv" });
    await expect(loadSeriesLongTable(buildTable([]), baseOptions())).rejects.toBeInstanceOf(
      EmptyInputError
    );
  });

  it("logs the long table size on success", async () => {
    const logger = createSilentLogger();

    await loadSeriesLongTable(buildTable(["a.csv"]), { ...baseOptions(), logger });

    expect(logger.info).toHaveBeenNthCalledWith(2, "[series-loader] success", {
      rows: 3,
      columns: 5
    });
  });
});

describe("loadSeriesMatrixFromFile", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "series-matrix-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("resolves references next to the table file", async () => {
    await writeFile(join(directory, "index.csv"), "id,series_path\n1,a.csv\n2,b.csv", "utf8");
    await writeFile(join(directory, "a.csv"), "t,v\n0,1\n1,2", "utf8");
    await writeFile(join(directory, "b.csv"), "t,v\n0,3\n1,4", "utf8");

    const matrix = await loadSeriesMatrixFromFile(join(directory, "index.csv"), {
      referenceColumn: "series_path",
      logger: createSilentLogger(),
      env: {}
    });

    expect(matrix).toEqual({
      columns: [0, 1],
      rows: [
        [1, 2],
        [3, 4]
      ],
      references: [join(directory, "a.csv"), join(directory, "b.csv")]
    });
  });

  it("loads a long table next to the table file", async () => {
    await writeFile(join(directory, "index.csv"), "series_path\na.csv", "utf8");
    await writeFile(join(directory, "a.csv"), "t,v\n0,1\n1,2", "utf8");

    const longTable = await loadSeriesLongTableFromFile(join(directory, "index.csv"), {
      referenceColumn: 0,
      logger: createSilentLogger(),
      env: {}
    });

    expect(longTable).toEqual({
      headers: ["series_path", "series_id", "timestamp", "value"],
      rows: [
        ["a.csv", 0, 0, 1],
        ["a.csv", 0, 1, 2]
      ]
    });
  });
});
