#!/usr/bin/env node
/**
 * main.ts — asset-matrix command line
 *
 * Usage:
 *   asset-matrix test <strategy.py> [--data-dir dir] [--workers n] [--timeout s] [--env name] [--output file.json]
 *   asset-matrix analyze <results.json> [--min-sharpe n] [--min-return pct] [--min-trades n] [--excel out.xlsx] [--report out.txt]
 */

import "dotenv/config";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";

import { isMainModule, parseEnv } from "@asset-matrix/kit";
import { MatrixEnvSchema } from "../types/config.js";
import { logger } from "../lib/logger.js";
import { loadConfig, resolveRunSettings } from "../lib/config.js";
import { describeCatalog, discoverAssets } from "../lib/asset-catalog.js";
import { buildResultsFile, defaultResultsPath, loadResults, saveResults } from "../lib/result-store.js";
import { createCondaRunner } from "../runner/conda-runner.js";
import { runMatrix } from "../loop/orchestrator.js";
import { strategyNameOf } from "../loop/run-task.js";
import { errorMessage } from "../loop/errors.js";
import { renderSummary, summarizeResults } from "../report/ranking.js";
import { buildAnalysisReport, exportToWorkbook, filterSuccessful } from "../report/analyze.js";
import { parseArgs } from "./parse-args.js";
import type { AnalyzeOptions, TestOptions } from "./parse-args.js";

const log = logger.createChild("cli");

async function runTest(strategyPath: string, options: TestOptions): Promise<number> {
  const env = parseEnv(MatrixEnvSchema);
  const config = loadConfig(options.config ?? env.MATRIX_CONFIG);
  const settings = resolveRunSettings(config, env, {
    dataDir: options.dataDir,
    workers: options.workers,
    timeout: options.timeout,
    env: options.env,
    output: options.output,
  });

  const resolvedStrategy = path.resolve(strategyPath);
  if (!fs.existsSync(resolvedStrategy)) {
    log.error({ strategyPath: resolvedStrategy }, "Strategy file not found");
    return 1;
  }
  const strategyName = strategyNameOf(resolvedStrategy);

  const catalog = await discoverAssets(settings.dataDir, { extensions: settings.dataExtensions });
  for (const entry of await describeCatalog(catalog)) {
    log.info(entry, "Asset available");
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn("Interrupted, cancelling in-flight backtests and skipping the rest");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const results = await runMatrix({
      strategyPath: resolvedStrategy,
      catalog,
      runner: createCondaRunner(settings.runner),
      concurrency: settings.concurrency,
      timeoutSeconds: settings.timeoutSeconds,
      environment: settings.environment,
      captureOutput: settings.captureOutput,
      signal: controller.signal,
    });

    process.stdout.write(renderSummary(summarizeResults(results)) + "\n");

    const outputPath = settings.outputPath ?? defaultResultsPath(settings.outputDir, strategyName);
    await saveResults(
      outputPath,
      buildResultsFile({
        strategyName,
        assets: [...catalog.keys()],
        maxWorkers: settings.concurrency ?? os.availableParallelism(),
        timeoutSeconds: settings.timeoutSeconds,
        environment: settings.environment,
        results,
      }),
    );
    log.info({ outputPath }, "Results saved");
    return 0;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

async function runAnalyze(resultsPath: string, options: AnalyzeOptions): Promise<number> {
  const file = loadResults(resultsPath);
  const report = buildAnalysisReport(file, { sourceName: path.basename(resultsPath) });
  process.stdout.write(report + "\n");

  const { minSharpe, minReturn, minTrades } = options;
  if (minSharpe !== undefined || minReturn !== undefined || minTrades !== undefined) {
    const matching = filterSuccessful(file.results, { minSharpe, minReturn, minTrades });
    process.stdout.write(`\n${matching.length} result(s) match the filter:\n`);
    for (const r of matching) {
      process.stdout.write(
        `  ${r.asset}  sharpe=${r.metrics.sharpe ?? "N/A"} return=${r.metrics.return ?? "N/A"} trades=${r.metrics.trades ?? "N/A"}\n`,
      );
    }
  }

  if (options.report) {
    await fs.promises.mkdir(path.dirname(path.resolve(options.report)), { recursive: true });
    await writeFileAtomic(options.report, report + "\n", "utf8");
    log.info({ report: options.report }, "Report saved");
  }

  if (options.excel) {
    const sheets = exportToWorkbook(file, options.excel);
    log.info({ excel: options.excel, sheets }, "Workbook exported");
  }
  return 0;
}

/** CLI entry point. Resolves to the process exit code. */
export async function main(argv: string[] = process.argv): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    switch (parsed.command) {
      case "test":
        return await runTest(parsed.strategyPath, parsed.options);
      case "analyze":
        return await runAnalyze(parsed.resultsPath, parsed.options);
      case "help":
        return 0;
    }
  } catch (err) {
    log.error({ err }, errorMessage(err));
    return 1;
  }
}

if (isMainModule(import.meta.url)) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      log.fatal({ err }, "Unexpected failure");
      process.exitCode = 1;
    },
  );
}
