import fs from "node:fs";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";
import { formatZodErrors } from "@asset-matrix/kit";
import { ResultsFileSchema } from "../types/result.js";
import type { ResultsFile, TestResult } from "../types/result.js";

/**
 * Assemble the persisted record of one run. `assetsTested` lists every cataloged
 * symbol, in catalog order.
 */
export function buildResultsFile(opts: {
  strategyName: string;
  assets: readonly string[];
  maxWorkers: number;
  timeoutSeconds: number;
  environment: string;
  results: readonly TestResult[];
  now?: Date;
}): ResultsFile {
  return {
    timestamp: (opts.now ?? new Date()).toISOString(),
    strategy: opts.strategyName,
    totalTests: opts.results.length,
    assetsTested: [...opts.assets],
    maxWorkers: opts.maxWorkers,
    timeoutSeconds: opts.timeoutSeconds,
    environment: opts.environment,
    results: [...opts.results],
  };
}

/**
 * Default output path: `<outputDir>/<strategy>_<YYYYMMDD_HHMMSS>.json` (UTC).
 */
export function defaultResultsPath(outputDir: string, strategyName: string, now: Date = new Date()): string {
  const stamp = now.toISOString().slice(0, 19).replace(/-|:/g, "").replace("T", "_");
  return path.join(outputDir, `${strategyName}_${stamp}.json`);
}

/** Write the results file atomically, creating parent directories. */
export async function saveResults(outputPath: string, file: ResultsFile): Promise<string> {
  await fs.promises.mkdir(path.dirname(outputPath), { recursive: true });
  await writeFileAtomic(outputPath, JSON.stringify(file, null, 2) + "\n", "utf8");
  return outputPath;
}

/**
 * Read and validate a results file.
 * @throws {Error} when the file is missing, not JSON, or does not match the schema
 */
export function loadResults(inputPath: string): ResultsFile {
  if (!fs.existsSync(inputPath)) {
    throw new Error(`Results file not found: ${inputPath}`);
  }
  const json: unknown = JSON.parse(fs.readFileSync(inputPath, "utf8"));
  const parsed = ResultsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`Invalid results file ${inputPath}:\n  ${formatZodErrors(parsed.error).join("\n  ")}`);
  }
  return parsed.data;
}
