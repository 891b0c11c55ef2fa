import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import { METRIC_NAMES } from "../types/result.js";
import type { TestResult } from "../types/result.js";

export type ResultRow = Record<string, string | number | null>;

/**
 * One spreadsheet row per result, metrics flattened to `metric_<name>` columns.
 * Captured stdout/stderr are left out: they overflow Excel's cell limit.
 */
export function flattenResult(result: TestResult): ResultRow {
  const row: ResultRow = {
    strategy: result.strategyName,
    asset: result.asset,
    status: result.status,
    error: result.error ?? null,
    executionTimeSeconds: result.executionTimeSeconds,
    timestamp: result.timestamp,
    dataPath: result.dataPath,
  };
  for (const name of METRIC_NAMES) {
    row[`metric_${name}`] = result.status === "success" ? (result.metrics[name] ?? null) : null;
  }
  return row;
}

/**
 * Write `sheets` (name -> results) to an .xlsx file. Empty sheets are skipped;
 * returns the names of the sheets written.
 */
export function writeWorkbook(outPath: string, sheets: [string, readonly TestResult[]][]): string[] {
  const wb = XLSX.utils.book_new();
  const written: string[] = [];

  for (const [name, results] of sheets) {
    if (results.length === 0) continue;
    XLSX.utils.book_append_sheet(wb, XLSX.utils.json_to_sheet(results.map(flattenResult)), name);
    written.push(name);
  }
  if (written.length === 0) {
    XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet([["no results"]]), "All_Results");
    written.push("All_Results");
  }

  const buffer: Buffer = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  fs.mkdirSync(path.dirname(outPath), { recursive: true });
  fs.writeFileSync(outPath, buffer);
  return written;
}
