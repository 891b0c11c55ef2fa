import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { assertPositive, assertPositiveInt } from "@asset-matrix/kit";
import { logger } from "../lib/logger.js";
import { listAssets } from "../lib/asset-catalog.js";
import { MatrixRunError, errorMessage } from "./errors.js";
import { runPool } from "./worker-pool.js";
import { MAX_TIMEOUT_SECONDS } from "../types/config.js";
import { notStartedResult, runTask, strategyNameOf } from "./run-task.js";
import type { RewriteRule } from "../lib/rewrite-rules.js";
import type { StrategyRunner } from "../runner/types.js";
import type { AssetCatalog, TestResult, TestTask } from "../types/result.js";

const log = logger.createChild("orchestrator");

export interface MatrixProgress {
  completed: number;
  total: number;
  /** completed / total, in [0, 1] */
  fraction: number;
  result: TestResult;
}

export interface RunMatrixOptions {
  strategyPath: string;
  catalog: AssetCatalog;
  runner: StrategyRunner;
  timeoutSeconds: number;
  environment: string;
  /** Defaults to os.availableParallelism(). */
  concurrency?: number;
  /** Keep stdout/stderr on results. Defaults to true. */
  captureOutput?: boolean;
  rules?: readonly RewriteRule[];
  signal?: AbortSignal;
  onProgress?: (progress: MatrixProgress) => void;
}

/**
 * Test one strategy against every cataloged asset.
 *
 * Returns exactly one result per asset, in completion order. Task failures are
 * recorded in their results; only setup failures (unreadable strategy, temp
 * directory) reject, with a MatrixRunError. Generated variants live in a
 * per-run temp directory that is removed on every exit path.
 */
export async function runMatrix(opts: RunMatrixOptions): Promise<TestResult[]> {
  const { strategyPath, catalog, runner, environment, signal, onProgress } = opts;
  const timeoutSeconds = assertPositive(opts.timeoutSeconds, "timeoutSeconds");
  if (timeoutSeconds > MAX_TIMEOUT_SECONDS) {
    throw new Error(`timeoutSeconds: expected at most ${MAX_TIMEOUT_SECONDS}, got ${timeoutSeconds}`);
  }
  const concurrency = assertPositiveInt(opts.concurrency ?? os.availableParallelism(), "concurrency");
  const strategyName = strategyNameOf(strategyPath);

  let sourceText: string;
  try {
    sourceText = await fs.readFile(strategyPath, "utf8");
  } catch (err) {
    throw new MatrixRunError(`Cannot read strategy ${strategyPath}: ${errorMessage(err)}`, { cause: err });
  }

  const assets = listAssets(catalog);
  if (assets.length === 0) {
    log.warn({ strategy: strategyName }, "No assets available for testing");
    return [];
  }

  let tempDir: string;
  try {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), `multi_asset_${strategyName}_`));
  } catch (err) {
    throw new MatrixRunError(`Cannot create temp directory: ${errorMessage(err)}`, { cause: err });
  }

  log.info(
    { strategy: strategyName, assets: assets.length, concurrency, timeoutSeconds, environment, tempDir },
    "Multi-asset run starting",
  );

  try {
    const tasks: TestTask[] = assets.map((asset) => ({
      strategyPath,
      asset: asset.symbol,
      dataPath: asset.dataPath,
      tempDir,
    }));
    const total = tasks.length;

    const { results, skipped } = await runPool(
      tasks,
      (task) =>
        runTask(task, {
          sourceText,
          runner,
          environment,
          timeoutSeconds,
          captureOutput: opts.captureOutput ?? true,
          rules: opts.rules,
          signal,
        }),
      {
        concurrency,
        signal,
        recover: (task, err): TestResult => ({
          ...notStartedResult(task, errorMessage(err)),
          status: "error",
        }),
        onSettled: (result, _task, completed) => {
          log.info(
            { strategy: strategyName, asset: result.asset, status: result.status, completed, total },
            `Progress: ${completed}/${total} (${((completed / total) * 100).toFixed(1)}%)`,
          );
          try {
            onProgress?.({ completed, total, fraction: completed / total, result });
          } catch (err) {
            log.warn({ err, asset: result.asset }, "Progress callback failed");
          }
        },
      },
    );

    for (const task of skipped) {
      results.push(notStartedResult(task, "cancelled before start"));
    }

    log.info({ strategy: strategyName, finished: results.length - skipped.length, skipped: skipped.length }, "Multi-asset run complete");
    return results;
  } finally {
    await fs.rm(tempDir, { recursive: true, force: true }).then(
      () => log.debug({ tempDir }, "Cleaned up temp directory"),
      (err: unknown) => log.warn({ tempDir, err }, "Could not clean temp directory"),
    );
  }
}
