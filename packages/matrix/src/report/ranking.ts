import { classifyFailure } from "../loop/classify-failure.js";
import type { FailureClass } from "../loop/classify-failure.js";
import type { MetricsRecord, TestResult, TestStatus } from "../types/result.js";

export interface RankedEntry {
  rank: number;
  asset: string;
  sharpe: number;
  return?: number;
  trades?: number;
  winRate?: number;
  maxDrawdown?: number;
  executionTimeSeconds: number;
}

export interface FailureEntry {
  asset: string;
  status: Exclude<TestStatus, "success">;
  failureClass: FailureClass;
  error: string;
}

export interface RunSummary {
  strategyName: string | null;
  total: number;
  counts: Record<TestStatus, number>;
  /** Percentage of all results with status success */
  successRate: number;
  /** Successful results that reported a Sharpe ratio, best first */
  ranked: RankedEntry[];
  best?: RankedEntry;
  worst?: RankedEntry;
  meanSharpe?: number;
  meanReturn?: number;
  failures: FailureEntry[];
}

function mean(values: number[]): number | undefined {
  if (values.length === 0) return undefined;
  return values.reduce((s, v) => s + v, 0) / values.length;
}

/**
 * Rank successful results by Sharpe (descending). Ties keep completion order:
 * earlier completion timestamp first, then symbol, whatever the array order.
 */
export function summarizeResults(results: readonly TestResult[]): RunSummary {
  const counts: Record<TestStatus, number> = { success: 0, failed: 0, error: 0, timeout: 0, unknown: 0 };
  const failures: FailureEntry[] = [];
  const rankable: { result: TestResult; sharpe: number; metrics: MetricsRecord }[] = [];

  for (const r of results) {
    counts[r.status]++;
    if (r.status === "success") {
      if (r.metrics.sharpe !== undefined) rankable.push({ result: r, sharpe: r.metrics.sharpe, metrics: r.metrics });
    } else {
      failures.push({ asset: r.asset, status: r.status, failureClass: classifyFailure(r.error), error: r.error });
    }
  }

  rankable.sort(
    (a, b) =>
      b.sharpe - a.sharpe ||
      a.result.timestamp.localeCompare(b.result.timestamp) ||
      a.result.asset.localeCompare(b.result.asset),
  );

  const ranked: RankedEntry[] = rankable.map(({ result, sharpe, metrics }, i) => ({
    rank: i + 1,
    asset: result.asset,
    sharpe,
    return: metrics.return,
    trades: metrics.trades,
    winRate: metrics.winRate,
    maxDrawdown: metrics.maxDrawdown,
    executionTimeSeconds: result.executionTimeSeconds,
  }));

  const returns = ranked.flatMap((e) => (e.return === undefined ? [] : [e.return]));

  return {
    strategyName: results[0]?.strategyName ?? null,
    total: results.length,
    counts,
    successRate: results.length > 0 ? (counts.success / results.length) * 100 : 0,
    ranked,
    best: ranked[0],
    worst: ranked[ranked.length - 1],
    meanSharpe: mean(ranked.map((e) => e.sharpe)),
    meanReturn: mean(returns),
    failures,
  };
}

const RULE = "=".repeat(80);
const THIN = "-".repeat(80);

function fmt(value: number | undefined, digits: number): string {
  return value === undefined ? "N/A" : value.toFixed(digits);
}

function row(cells: [string, number][]): string {
  return cells.map(([text, width]) => text.padEnd(width)).join(" ").trimEnd();
}

/** Plain-text ranked summary for the terminal. */
export function renderSummary(summary: RunSummary): string {
  const { counts } = summary;
  const lines: string[] = [];

  lines.push(RULE);
  lines.push("MULTI-ASSET TEST SUMMARY");
  lines.push(RULE);
  lines.push(`Strategy: ${summary.strategyName ?? "unknown"}`);
  lines.push(`Total tests: ${summary.total}`);
  lines.push(`Successful: ${counts.success} (${summary.successRate.toFixed(1)}%)`);
  lines.push(`Failed: ${counts.failed}`);
  lines.push(`Errors: ${counts.error}`);
  lines.push(`Timeouts: ${counts.timeout}`);
  if (counts.unknown > 0) lines.push(`Not run: ${counts.unknown}`);
  lines.push("");

  if (summary.best && summary.worst) {
    lines.push("ASSET RANKING (by Sharpe Ratio)");
    lines.push(THIN);
    lines.push(row([["Rank", 6], ["Asset", 15], ["Sharpe", 10], ["Return%", 12], ["Trades", 10], ["Win%", 10]]));
    lines.push(THIN);
    for (const e of summary.ranked) {
      lines.push(
        row([
          [String(e.rank), 6],
          [e.asset, 15],
          [fmt(e.sharpe, 2), 10],
          [fmt(e.return, 2), 12],
          [e.trades === undefined ? "N/A" : String(Math.round(e.trades)), 10],
          [fmt(e.winRate, 1), 10],
        ]),
      );
    }
    lines.push("");
    lines.push(`Best asset: ${summary.best.asset} (Sharpe: ${fmt(summary.best.sharpe, 2)}, Return: ${fmt(summary.best.return, 2)}%)`);
    lines.push(`Worst asset: ${summary.worst.asset} (Sharpe: ${fmt(summary.worst.sharpe, 2)}, Return: ${fmt(summary.worst.return, 2)}%)`);
    lines.push("");
    lines.push("Average performance across assets:");
    lines.push(`  Avg Sharpe: ${fmt(summary.meanSharpe, 2)}`);
    lines.push(`  Avg Return: ${fmt(summary.meanReturn, 2)}%`);
  } else {
    lines.push("No successful tests with metrics");
  }

  if (summary.failures.length > 0) {
    lines.push("");
    lines.push("FAILURES");
    lines.push(THIN);
    for (const f of summary.failures) {
      lines.push(row([[f.asset, 15], [f.status, 8], [f.failureClass, 15], [f.error, 0]]));
    }
  }

  lines.push(RULE);
  return lines.join("\n");
}
