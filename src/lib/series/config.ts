import { z } from "zod";
import { LoaderConfigError } from "./errors";

export const DEFAULT_CONCURRENCY = 4;
export const MAX_CONCURRENCY = 64;
export const CONCURRENCY_ENV_VAR = "SERIES_LOADER_CONCURRENCY";

const concurrencySchema = z.number().int().min(1).max(MAX_CONCURRENCY);

const longColumnsSchema = z
  .object({
    seriesId: z.string().min(1).optional().default("series_id"),
    timestamp: z.string().min(1).optional().default("timestamp"),
    value: z.string().min(1).optional().default("value")
  })
  .strict()
  .refine((names) => new Set([names.seriesId, names.timestamp, names.value]).size === 3, {
    message: "seriesId, timestamp and value need distinct names"
  });

export const loaderOptionsSchema = z
  .object({
    referenceColumn: z.union([z.string().min(1), z.number().int().min(0)]).optional(),
    basePath: z.string().min(1).optional(),
    concurrency: concurrencySchema.optional(),
    columnLabels: z.enum(["native", "string"]).optional().default("native"),
    keepColumns: z.array(z.string().min(1)).optional().default([]),
    longColumns: longColumnsSchema.optional().default({})
  })
  .strict();

export type LoaderOptionsInput = z.input<typeof loaderOptionsSchema>;

export type LoaderOptions = Omit<z.output<typeof loaderOptionsSchema>, "concurrency"> & {
  concurrency: number;
};

type Environment = Record<string, string | undefined>;

const formatIssues = (error: z.ZodError, prefix = ""): string[] =>
  error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].filter(Boolean).join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });

const readConcurrencyFromEnv = (env: Environment): number | undefined => {
  const raw = env[CONCURRENCY_ENV_VAR];
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const parsed = z.coerce.number().pipe(concurrencySchema).safeParse(raw.trim());
  if (!parsed.success) {
    throw new LoaderConfigError(formatIssues(parsed.error, CONCURRENCY_ENV_VAR));
  }
  return parsed.data;
};

export const resolveLoaderOptions = (
  input: LoaderOptionsInput = {},
  env: Environment = process.env
): LoaderOptions => {
  const parsed = loaderOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new LoaderConfigError(formatIssues(parsed.error));
  }
  const concurrency =
    parsed.data.concurrency ?? readConcurrencyFromEnv(env) ?? DEFAULT_CONCURRENCY;
  return { ...parsed.data, concurrency };
};
