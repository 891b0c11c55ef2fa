import { METRIC_NAMES } from "../types/result.js";
import type { MetricName, MetricsRecord } from "../types/result.js";

const NUM = String.raw`([+-]?\d+\.?\d*)`;

/**
 * Patterns tried in order per metric; the first one that matches and parses wins.
 * Tuned to the statistics table printed by Python backtesting libraries, with
 * looser fallbacks for hand-rolled prints.
 */
export const METRIC_PATTERNS: Readonly<Record<MetricName, readonly RegExp[]>> = {
  return: [
    new RegExp(String.raw`Return\s*\[%\]\s*${NUM}`, "i"),
    new RegExp(String.raw`Total Return.*?${NUM}%`, "i"),
    new RegExp(String.raw`Return.*?${NUM}`, "i"),
  ],
  sharpe: [
    new RegExp(String.raw`Sharpe Ratio\s*${NUM}`, "i"),
    new RegExp(String.raw`Sharpe\s*${NUM}`, "i"),
  ],
  maxDrawdown: [
    new RegExp(String.raw`Max\.?\s*Drawdown\s*\[%\]\s*${NUM}`, "i"),
    new RegExp(String.raw`Max\.?\s*DD.*?${NUM}`, "i"),
  ],
  trades: [
    /# Trades\s*(\d+)/i,
    /Trades\s*(\d+)/i,
    /Number of trades.*?(\d+)/i,
  ],
  winRate: [
    /Win Rate\s*\[%\]\s*(\d+\.?\d*)/i,
    /Win Rate.*?(\d+\.?\d*)%/i,
  ],
};

function firstNumber(text: string, patterns: readonly RegExp[]): number | undefined {
  for (const pattern of patterns) {
    const match = pattern.exec(text);
    if (!match?.[1]) continue;
    const value = Number(match[1]);
    if (Number.isFinite(value)) return value;
  }
  return undefined;
}

/**
 * Pull the known metrics out of free-form backtest output.
 * Metrics that are not found are left out rather than reported as zero.
 */
export function extractMetrics(rawText: string): MetricsRecord {
  const metrics: MetricsRecord = {};
  for (const name of METRIC_NAMES) {
    const value = firstNumber(rawText, METRIC_PATTERNS[name]);
    if (value !== undefined) metrics[name] = value;
  }
  return metrics;
}
