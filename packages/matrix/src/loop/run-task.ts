import path from "node:path";
import { performance } from "node:perf_hooks";
import pTimeout, { TimeoutError } from "p-timeout";
import { logger } from "../lib/logger.js";
import { generateVariant } from "../lib/variant-generator.js";
import { extractMetrics } from "../lib/metrics-extractor.js";
import { errorMessage } from "./errors.js";
import type { RewriteRule } from "../lib/rewrite-rules.js";
import type { RunnerOutcome, StrategyRunner } from "../runner/types.js";
import type { TestResult, TestTask, UnsuccessfulTestResult } from "../types/result.js";

export interface TaskContext {
  sourceText: string;
  runner: StrategyRunner;
  environment: string;
  timeoutSeconds: number;
  captureOutput: boolean;
  rules?: readonly RewriteRule[];
  /** Run-level cancellation, forwarded to the runner. */
  signal?: AbortSignal;
}

export function strategyNameOf(strategyPath: string): string {
  return path.basename(strategyPath, path.extname(strategyPath));
}

/** Result for a task that never ran (run cancelled before it was picked up). */
export function notStartedResult(task: TestTask, reason: string): UnsuccessfulTestResult {
  return {
    strategyName: strategyNameOf(task.strategyPath),
    asset: task.asset,
    dataPath: task.dataPath,
    status: "unknown",
    error: reason,
    metrics: {},
    executionTimeSeconds: 0,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Generate, execute and measure one (strategy, asset) pair.
 * Always resolves: every failure is folded into the returned result.
 */
export async function runTask(task: TestTask, ctx: TaskContext): Promise<TestResult> {
  const strategyName = strategyNameOf(task.strategyPath);
  const log = logger.forTask(strategyName, task.asset);
  const started = performance.now();

  const base = { strategyName, asset: task.asset, dataPath: task.dataPath };
  const stamp = (): { executionTimeSeconds: number; timestamp: string } => ({
    executionTimeSeconds: +((performance.now() - started) / 1000).toFixed(3),
    timestamp: new Date().toISOString(),
  });

  log.info("Starting backtest");

  try {
    const variant = await generateVariant({
      sourceText: ctx.sourceText,
      sourcePath: task.strategyPath,
      asset: { symbol: task.asset, dataPath: task.dataPath },
      outputDir: task.tempDir,
      rules: ctx.rules,
    });

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort();
    ctx.signal?.addEventListener("abort", forwardAbort, { once: true });

    const execution = ctx.runner.execute(variant.path, ctx.environment, controller.signal);
    let outcome: RunnerOutcome;
    try {
      outcome = await pTimeout(execution, {
        milliseconds: ctx.timeoutSeconds * 1000,
        message: `timed out after ${ctx.timeoutSeconds}s`,
      });
    } catch (err) {
      if (!(err instanceof TimeoutError)) throw err;
      controller.abort();
      void execution.catch((lateErr: unknown) => {
        log.debug({ err: lateErr }, "Runner rejected after timeout");
      });
      log.warn({ timeoutSeconds: ctx.timeoutSeconds }, "Backtest timed out");
      return { ...base, status: "timeout", error: err.message, metrics: {}, ...stamp() };
    } finally {
      ctx.signal?.removeEventListener("abort", forwardAbort);
    }

    const output = ctx.captureOutput ? { stdout: outcome.stdout, stderr: outcome.stderr } : {};

    if (outcome.success) {
      const metrics = extractMetrics(outcome.stdout);
      const result: TestResult = { ...base, status: "success", metrics, ...output, ...stamp() };
      log.info(
        { seconds: result.executionTimeSeconds, sharpe: metrics.sharpe, return: metrics.return },
        "Backtest succeeded",
      );
      return result;
    }

    const error = outcome.error ?? "Unknown error";
    log.warn({ error }, "Backtest failed");
    return {
      ...base,
      status: "failed",
      error,
      metrics: {},
      ...(ctx.captureOutput ? { stderr: outcome.stderr } : {}),
      ...stamp(),
    };
  } catch (err) {
    const error = errorMessage(err);
    log.error({ err }, "Backtest crashed");
    return { ...base, status: "error", error, metrics: {}, ...stamp() };
  }
}
