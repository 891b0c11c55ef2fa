/**
 * Shared test helpers — reusable across all test files.
 */
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { RunnerOutcome, StrategyRunner } from "./runner/types.js";
import type { MetricsRecord, TestResult, TestStatus } from "./types/result.js";

/** Fresh temp directory; remove with cleanupDir. */
export function makeTempDir(prefix = "matrix-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function cleanupDir(dir: string | undefined): void {
  if (dir && fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/** Creates `<dir>/<SYMBOL>.csv` for each symbol and returns the catalog. */
export function writeDataFiles(dir: string, symbols: string[]): Map<string, string> {
  const catalog = new Map<string, string>();
  for (const symbol of symbols) {
    const file = path.join(dir, `${symbol}.csv`);
    fs.writeFileSync(file, "datetime,open,high,low,close,volume\n");
    catalog.set(symbol, file);
  }
  return catalog;
}

export function successResult(
  asset: string,
  metrics: MetricsRecord,
  timestamp = "2026-01-01T00:00:00.000Z",
): TestResult {
  return {
    strategyName: "Momentum_BT",
    asset,
    dataPath: `/data/${asset}.csv`,
    status: "success",
    metrics,
    executionTimeSeconds: 1.5,
    timestamp,
  };
}

export function failedResult(
  asset: string,
  status: Exclude<TestStatus, "success">,
  error: string,
  timestamp = "2026-01-01T00:00:00.000Z",
): TestResult {
  return {
    strategyName: "Momentum_BT",
    asset,
    dataPath: `/data/${asset}.csv`,
    status,
    error,
    metrics: {},
    executionTimeSeconds: 0.5,
    timestamp,
  };
}

/**
 * In-process runner: looks up the outcome by the variant's asset suffix
 * (`..._<SYMBOL>.py`). Records every call.
 */
export function fakeRunner(
  respond: (symbol: string, variantPath: string, signal: AbortSignal) => Promise<RunnerOutcome>,
): StrategyRunner & { calls: { variantPath: string; environment: string }[] } {
  const calls: { variantPath: string; environment: string }[] = [];
  return {
    calls,
    execute(variantPath, environment, signal) {
      calls.push({ variantPath, environment });
      const stem = path.basename(variantPath, path.extname(variantPath));
      const symbol = stem.slice(stem.lastIndexOf("_") + 1);
      return respond(symbol, variantPath, signal);
    },
  };
}

/** Resolves after `ms`, or rejects early when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new Error("aborted"));
      },
      { once: true },
    );
  });
}
