import fs from "node:fs";
import path from "node:path";
import { formatZodErrors } from "@asset-matrix/kit";
import { MatrixConfigSchema } from "../types/config.js";
import type { MatrixConfig, MatrixEnv, RunnerConfig } from "../types/config.js";

/**
 * Load and validate a matrix config file. Without a path, every field takes its
 * schema default; an explicit path that does not exist is an error.
 */
export function loadConfig(configPath?: string): MatrixConfig {
  if (!configPath) return MatrixConfigSchema.parse({});

  if (!fs.existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`);
  }
  const json: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  const parsed = MatrixConfigSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid config ${configPath}:\n  ${formatZodErrors(parsed.error).join("\n  ")}`);
  }
  return parsed.data;
}

export interface CliOverrides {
  dataDir?: string;
  workers?: number;
  timeout?: number;
  env?: string;
  output?: string;
}

export interface RunSettings {
  dataDir: string;
  dataExtensions: string[];
  concurrency?: number;
  timeoutSeconds: number;
  environment: string;
  outputDir: string;
  /** Explicit results path; otherwise one is derived under outputDir. */
  outputPath?: string;
  captureOutput: boolean;
  runner: RunnerConfig;
}

/**
 * Merge settings with precedence CLI flag > environment > config file.
 * Relative paths resolve against `cwd`.
 */
export function resolveRunSettings(
  config: MatrixConfig,
  env: Pick<MatrixEnv, "MATRIX_DATA_DIR">,
  cli: CliOverrides,
  cwd: string = process.cwd(),
): RunSettings {
  const dataDir = cli.dataDir ?? env.MATRIX_DATA_DIR ?? config.dataDir;
  return {
    dataDir: path.resolve(cwd, dataDir),
    dataExtensions: config.dataExtensions,
    concurrency: cli.workers ?? config.concurrency,
    timeoutSeconds: cli.timeout ?? config.timeoutSeconds,
    environment: cli.env ?? config.environment,
    outputDir: path.resolve(cwd, config.outputDir),
    outputPath: cli.output ? path.resolve(cwd, cli.output) : undefined,
    captureOutput: config.captureOutput,
    runner: config.runner,
  };
}
