import { vi } from "vitest";
import type { ReadSeriesFile } from "../lib/series/parsers";
import type { SeriesLoaderLogger } from "../lib/series/pipeline";

export const createMemoryReader = (files: Record<string, string | Uint8Array>): ReadSeriesFile =>
  async (path) => {
    const content = files[path];
    if (content === undefined) {
      throw Object.assign(new Error(`ENOENT: no such file or directory, open '${path}'`), {
        code: "ENOENT"
      });
    }
    return typeof content === "string" ? Buffer.from(content, "utf8") : content;
  };

export const createSilentLogger = (): SeriesLoaderLogger => ({
  info: vi.fn(),
  error: vi.fn()
});

export const captureError = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected the promise to reject.");
};

export const seriesCsv = (points: Array<[string | number, number]>): string =>
  ["timestamp,value", ...points.map(([time, value]) => `${time},${value}`)].join("\n");
