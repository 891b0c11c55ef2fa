import { writeWorkbook } from "../lib/workbook.js";
import type { MetricName, ResultsFile, SuccessfulTestResult, TestResult } from "../types/result.js";

export interface ResultFilter {
  minSharpe?: number;
  minReturn?: number;
  minTrades?: number;
}

export interface MetricStats {
  count: number;
  mean: number;
  median: number;
  max: number;
  min: number;
  /** Sample standard deviation; 0 for a single value */
  std: number;
}

function isSuccess(r: TestResult): r is SuccessfulTestResult {
  return r.status === "success";
}

function meets(value: number | undefined, min: number | undefined): boolean {
  return min === undefined || (value !== undefined && value >= min);
}

/** Descending by metric, results without it last; stable otherwise. */
function byMetricDesc(metric: MetricName) {
  return (a: SuccessfulTestResult, b: SuccessfulTestResult): number => {
    const av = a.metrics[metric];
    const bv = b.metrics[metric];
    if (av === undefined) return bv === undefined ? 0 : 1;
    if (bv === undefined) return -1;
    return bv - av;
  };
}

/**
 * Successful results meeting every given threshold, best Sharpe first.
 * A result missing a thresholded metric does not meet that threshold.
 */
export function filterSuccessful(results: readonly TestResult[], filter: ResultFilter = {}): SuccessfulTestResult[] {
  return results
    .filter(isSuccess)
    .filter(
      (r) =>
        meets(r.metrics.sharpe, filter.minSharpe) &&
        meets(r.metrics.return, filter.minReturn) &&
        meets(r.metrics.trades, filter.minTrades),
    )
    .sort(byMetricDesc("sharpe"));
}

/** The `n` successful results with the largest `sortBy` metric. */
export function topResults(
  results: readonly TestResult[],
  n: number,
  sortBy: MetricName = "sharpe",
): SuccessfulTestResult[] {
  return results
    .filter(isSuccess)
    .filter((r) => r.metrics[sortBy] !== undefined)
    .sort(byMetricDesc(sortBy))
    .slice(0, n);
}

export function describeMetric(values: readonly number[]): MetricStats | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const count = sorted.length;
  const mean = sorted.reduce((s, v) => s + v, 0) / count;
  const mid = Math.floor(count / 2);
  const median = count % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
  const variance = count > 1 ? sorted.reduce((s, v) => s + (v - mean) ** 2, 0) / (count - 1) : 0;
  return { count, mean, median, max: sorted[count - 1], min: sorted[0], std: Math.sqrt(variance) };
}

function metricValues(results: readonly SuccessfulTestResult[], metric: MetricName): number[] {
  return results.flatMap((r) => {
    const v = r.metrics[metric];
    return v === undefined ? [] : [v];
  });
}

const RULE = "=".repeat(80);
const THIN = "-".repeat(80);

export const PREMIUM_FILTER: ResultFilter = { minSharpe: 2.0, minReturn: 0 };

/** Text report over a saved results file. */
export function buildAnalysisReport(
  file: ResultsFile,
  opts: { sourceName: string; generatedAt?: Date },
): string {
  const { results } = file;
  const generated = (opts.generatedAt ?? new Date()).toISOString().slice(0, 19).replace("T", " ");
  const successful = results.filter(isSuccess);
  const countOf = (status: TestResult["status"]): number => results.filter((r) => r.status === status).length;
  const pct = results.length > 0 ? ((successful.length / results.length) * 100).toFixed(1) : "0.0";

  const lines: string[] = [
    RULE,
    "BACKTEST RESULTS ANALYSIS REPORT",
    RULE,
    `Generated: ${generated}`,
    `Source file: ${opts.sourceName}`,
    `Strategy: ${file.strategy}`,
    "",
    "OVERALL STATISTICS",
    THIN,
    `Total tests:          ${results.length}`,
    `Successful:           ${successful.length} (${pct}%)`,
    `Failed:               ${countOf("failed")}`,
    `Errors:               ${countOf("error")}`,
    `Timeouts:             ${countOf("timeout")}`,
    "",
  ];

  if (successful.length > 0) {
    lines.push("PERFORMANCE METRICS (successful tests only)", THIN);

    const blocks: [string, MetricName, number, string][] = [
      ["Sharpe Ratio", "sharpe", 2, ""],
      ["Return %", "return", 2, "%"],
      ["Number of Trades", "trades", 0, ""],
    ];
    for (const [label, metric, digits, unit] of blocks) {
      const stats = describeMetric(metricValues(successful, metric));
      if (!stats) continue;
      const f = (v: number): string => `${v.toFixed(digits)}${unit}`;
      lines.push(`${label}:`);
      lines.push(`  Mean:      ${f(stats.mean)}`);
      lines.push(`  Median:    ${f(stats.median)}`);
      lines.push(`  Max:       ${f(stats.max)}`);
      lines.push(`  Min:       ${f(stats.min)}`);
      if (metric !== "trades") lines.push(`  Std Dev:   ${f(stats.std)}`);
      lines.push("");
    }

    const top = topResults(results, 20, "sharpe");
    if (top.length > 0) {
      lines.push("TOP 20 ASSETS (by Sharpe Ratio)", THIN);
      lines.push(
        ["Rank".padEnd(6), "Asset".padEnd(20), "Sharpe".padEnd(10), "Return%".padEnd(12), "Trades"].join(" "),
      );
      lines.push(THIN);
      top.forEach((r, i) => {
        const { sharpe, return: ret, trades } = r.metrics;
        lines.push(
          [
            String(i + 1).padEnd(6),
            r.asset.slice(0, 20).padEnd(20),
            (sharpe === undefined ? "N/A" : sharpe.toFixed(2)).padEnd(10),
            (ret === undefined ? "N/A" : ret.toFixed(2)).padEnd(12),
            trades === undefined ? "N/A" : String(Math.round(trades)),
          ].join(" "),
        );
      });
      lines.push("");
    }

    const premium = filterSuccessful(results, PREMIUM_FILTER);
    if (premium.length > 0) {
      lines.push(`PREMIUM ASSETS (Sharpe >= 2.0, Return >= 0%): ${premium.length}`, THIN);
      premium.slice(0, 10).forEach((r, i) => {
        lines.push(`  ${i + 1}. ${r.asset} - Sharpe: ${(r.metrics.sharpe ?? 0).toFixed(2)}, Return: ${(r.metrics.return ?? 0).toFixed(2)}%`);
      });
      lines.push("");
    }
  }

  lines.push(RULE);
  return lines.join("\n");
}

/**
 * Export a results file to .xlsx: every result, the successful ones, the top 50
 * by Sharpe and the premium set. Returns the sheet names written.
 */
export function exportToWorkbook(file: ResultsFile, outPath: string): string[] {
  return writeWorkbook(outPath, [
    ["All_Results", file.results],
    ["Successful", file.results.filter(isSuccess)],
    ["Top_50_Sharpe", topResults(file.results, 50, "sharpe")],
    ["Premium_Sharpe_2_Plus", filterSuccessful(file.results, PREMIUM_FILTER)],
  ]);
}
