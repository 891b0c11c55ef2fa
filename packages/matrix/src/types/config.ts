import { z } from "zod";

/** Longest per-task timeout a Node timer can hold (2^31 - 1 ms). */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

// --- Zod Schemas ---

export const DataExtensionSchema = z
  .string()
  .regex(/^\.[A-Za-z0-9]+$/, "Must be a file extension starting with a dot, e.g. .csv");

export const RunnerConfigSchema = z.object({
  condaBin: z.string().min(1).default("conda"),
  interpreter: z.string().min(1).default("python"),
});

export const MatrixConfigSchema = z.object({
  dataDir: z.string().min(1).default("data/ohlcv"),
  dataExtensions: z.array(DataExtensionSchema).min(1).default([".csv"]),
  concurrency: z.number().int().min(1).optional(),
  timeoutSeconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).default(300),
  environment: z.string().min(1).default("tflow"),
  outputDir: z.string().min(1).default("data/multi_asset_results"),
  captureOutput: z.boolean().default(true),
  runner: RunnerConfigSchema.default({}),
});

export const MatrixEnvSchema = z.object({
  MATRIX_CONFIG: z.string().min(1).optional(),
  MATRIX_DATA_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_DIR: z.string().min(1).optional(),
});

// --- Inferred Types ---

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;
export type MatrixConfig = z.infer<typeof MatrixConfigSchema>;
export type MatrixEnv = z.infer<typeof MatrixEnvSchema>;
