import fs from "node:fs";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { runMatrix } from "./orchestrator.js";
import { MatrixRunError } from "./errors.js";
import { cleanupDir, fakeRunner, makeTempDir, sleep, writeDataFiles } from "../test-helpers.js";
import type { MatrixProgress } from "./orchestrator.js";
import type { TestResult } from "../types/result.js";

const STATS = "Return [%]   12.40\nSharpe Ratio    1.85\n";

function byAsset(results: TestResult[]): Map<string, TestResult> {
  return new Map(results.map((r) => [r.asset, r]));
}

describe("runMatrix", () => {
  let dir: string;
  let strategyPath: string;

  beforeEach(() => {
    dir = makeTempDir();
    strategyPath = path.join(dir, "Momentum_BT.py");
    fs.writeFileSync(strategyPath, 'import pandas as pd\ndata_path = "/old.csv"\n');
  });

  afterEach(() => cleanupDir(dir));

  it("runs one variant per asset with the asset's data path (scenario A)", async () => {
    const catalog = writeDataFiles(dir, ["BTCUSDT", "ETHUSDT"]);
    const contents = new Map<string, string>();
    const runner = fakeRunner(async (symbol, variantPath) => {
      contents.set(symbol, fs.readFileSync(variantPath, "utf8"));
      return { success: true, stdout: STATS, stderr: "" };
    });

    const results = await runMatrix({ strategyPath, catalog, runner, timeoutSeconds: 5, environment: "tflow", concurrency: 2 });

    expect(results).toHaveLength(2);
    expect(contents.get("BTCUSDT")).toBe(`import pandas as pd\ndata_path = "${path.join(dir, "BTCUSDT.csv")}"\n`);
    expect(contents.get("ETHUSDT")).toBe(`import pandas as pd\ndata_path = "${path.join(dir, "ETHUSDT.csv")}"\n`);

    const btc = byAsset(results).get("BTCUSDT");
    expect(btc).toMatchObject({
      strategyName: "Momentum_BT",
      asset: "BTCUSDT",
      dataPath: path.join(dir, "BTCUSDT.csv"),
      status: "success",
      metrics: { return: 12.4, sharpe: 1.85 },
      stdout: STATS,
      stderr: "",
    });
    expect(runner.calls.map((c) => c.environment)).toEqual(["tflow", "tflow"]);
    expect(fs.readFileSync(strategyPath, "utf8")).toBe('import pandas as pd\ndata_path = "/old.csv"\n');
  });

  it("records a failed asset and still finishes the others (scenario C)", async () => {
    const catalog = writeDataFiles(dir, ["BTCUSDT", "ETHUSDT", "SOLUSDT"]);
    const runner = fakeRunner(async (symbol) =>
      symbol === "ETHUSDT"
        ? { success: false, stdout: "", stderr: "ZeroDivisionError: division by zero", error: "division by zero" }
        : { success: true, stdout: STATS, stderr: "" },
    );

    const results = byAsset(
      await runMatrix({ strategyPath, catalog, runner, timeoutSeconds: 5, environment: "tflow", concurrency: 2 }),
    );

    expect(results.size).toBe(3);
    expect(results.get("ETHUSDT")).toMatchObject({
      status: "failed",
      error: "division by zero",
      metrics: {},
      stderr: "ZeroDivisionError: division by zero",
    });
    expect(results.get("BTCUSDT")?.status).toBe("success");
    expect(results.get("SOLUSDT")?.status).toBe("success");
  });

  it("uses a generic message when the runner gives no error text", async () => {
    const catalog = writeDataFiles(dir, ["BTC"]);
    const runner = fakeRunner(async () => ({ success: false, stdout: "", stderr: "" }));

    const [result] = await runMatrix({ strategyPath, catalog, runner, timeoutSeconds: 5, environment: "tflow" });

    expect(result).toMatchObject({ status: "failed", error: "Unknown error" });
  });

  it("times out a slow task, aborts its runner, and keeps the others", async () => {
    const catalog = writeDataFiles(dir, ["FAST", "SLOW"]);
    let slowSignal: AbortSignal | undefined;
    const runner = fakeRunner(async (symbol, _path, signal) => {
      if (symbol === "SLOW") {
        slowSignal = signal;
        await sleep(10_000, signal);
      }
      return { success: true, stdout: STATS, stderr: "" };
    });

    const results = byAsset(
      await runMatrix({ strategyPath, catalog, runner, timeoutSeconds: 0.05, environment: "tflow", concurrency: 2 }),
    );

    expect(results.get("SLOW")).toMatchObject({ status: "timeout", error: "timed out after 0.05s", metrics: {} });
    expect(results.get("FAST")?.status).toBe("success");
    expect(slowSignal?.aborted).toBe(true);
  });

  it("records a crashing runner as an error result", async () => {
    const catalog = writeDataFiles(dir, ["BTC", "ETH"]);
    const runner = fakeRunner(async (symbol) => {
      if (symbol === "BTC") throw new Error("runner exploded");
      return { success: true, stdout: "", stderr: "" };
    });

    const results = byAsset(await runMatrix({ strategyPath, catalog, runner, timeoutSeconds: 5, environment: "tflow" }));

    expect(results.get("BTC")).toMatchObject({ status: "error", error: "runner exploded", metrics: {} });
    expect(results.get("ETH")).toMatchObject({ status: "success", metrics: {} });
  });

  it("omits captured output when disabled", async () => {
    const catalog = writeDataFiles(dir, ["BTC"]);
    const runner = fakeRunner(async () => ({ success: true, stdout: STATS, stderr: "warn" }));

    const [result] = await runMatrix({
      strategyPath,
      catalog,
      runner,
      timeoutSeconds: 5,
      environment: "tflow",
      captureOutput: false,
    });

    expect(result?.status).toBe("success");
    expect(result && "stdout" in result).toBe(false);
    expect(result && "stderr" in result).toBe(false);
  });

  it("removes the generated variants when the run ends", async () => {
    const catalog = writeDataFiles(dir, ["BTC", "ETH"]);
    const runner = fakeRunner(async () => ({ success: true, stdout: "", stderr: "" }));

    await runMatrix({ strategyPath, catalog, runner, timeoutSeconds: 5, environment: "tflow" });

    const tempDirs = new Set(runner.calls.map((c) => path.dirname(c.variantPath)));
    expect(tempDirs.size).toBe(1);
    for (const tempDir of tempDirs) {
      expect(path.basename(tempDir).startsWith("multi_asset_Momentum_BT_")).toBe(true);
      expect(fs.existsSync(tempDir)).toBe(false);
    }
  });

  it("reports progress once per finished task", async () => {
    const catalog = writeDataFiles(dir, ["A", "B", "C", "D"]);
    const runner = fakeRunner(async () => ({ success: true, stdout: "", stderr: "" }));
    const progress: MatrixProgress[] = [];

    await runMatrix({
      strategyPath,
      catalog,
      runner,
      timeoutSeconds: 5,
      environment: "tflow",
      concurrency: 2,
      onProgress: (p) => progress.push(p),
    });

    expect(progress.map((p) => [p.completed, p.total, p.fraction])).toEqual([
      [1, 4, 0.25],
      [2, 4, 0.5],
      [3, 4, 0.75],
      [4, 4, 1],
    ]);
  });

  it("marks every asset as not run when cancelled before start", async () => {
    const catalog = writeDataFiles(dir, ["BTC", "ETH"]);
    const runner = fakeRunner(async () => ({ success: true, stdout: "", stderr: "" }));
    const controller = new AbortController();
    controller.abort();

    const results = await runMatrix({
      strategyPath,
      catalog,
      runner,
      timeoutSeconds: 5,
      environment: "tflow",
      signal: controller.signal,
    });

    expect(runner.calls).toHaveLength(0);
    expect(results.map((r) => [r.asset, r.status, r.error])).toEqual([
      ["BTC", "unknown", "cancelled before start"],
      ["ETH", "unknown", "cancelled before start"],
    ]);
  });

  it("returns no results for an empty catalog", async () => {
    const runner = fakeRunner(async () => ({ success: true, stdout: "", stderr: "" }));

    expect(await runMatrix({ strategyPath, catalog: new Map(), runner, timeoutSeconds: 5, environment: "tflow" })).toEqual([]);
    expect(runner.calls).toHaveLength(0);
  });

  it("rejects with MatrixRunError when the strategy cannot be read", async () => {
    const runner = fakeRunner(async () => ({ success: true, stdout: "", stderr: "" }));
    const missing = path.join(dir, "Missing.py");

    const run = runMatrix({
      strategyPath: missing,
      catalog: writeDataFiles(dir, ["BTC"]),
      runner,
      timeoutSeconds: 5,
      environment: "tflow",
    });

    await expect(run).rejects.toBeInstanceOf(MatrixRunError);
    await expect(run).rejects.toThrow(`Cannot read strategy ${missing}`);
  });

  it("records a variant that cannot be generated as an error and runs the rest", async () => {
    const catalog = writeDataFiles(dir, ["BTC", "ETH"]);
    const runner = fakeRunner(async () => ({ success: true, stdout: STATS, stderr: "" }));
    const rules = [
      {
        name: "strict-data-path",
        pattern: /data_path\s*=\s*".*?"/g,
        render: (literal: string): string => {
          if (literal.endsWith(`ETH.csv"`)) throw new Error("cannot render ETH");
          return `data_path = ${literal}`;
        },
      },
    ];

    const results = byAsset(
      await runMatrix({ strategyPath, catalog, runner, timeoutSeconds: 5, environment: "tflow", rules }),
    );

    expect(results.get("ETH")).toMatchObject({ status: "error", error: "cannot render ETH", metrics: {} });
    expect(results.get("BTC")?.status).toBe("success");
    expect(runner.calls.map((c) => path.basename(c.variantPath))).toEqual(["Momentum_BT_BTC.py"]);
  });

  it("cancels in-flight runs mid-way and marks the rest as not run", async () => {
    const catalog = writeDataFiles(dir, ["A", "B", "C"]);
    const controller = new AbortController();
    let inFlightSignal: AbortSignal | undefined;
    const runner = fakeRunner(async (_symbol, _path, signal) => {
      inFlightSignal = signal;
      setTimeout(() => controller.abort(), 10);
      await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
      return { success: false, stdout: "", stderr: "", error: "cancelled" };
    });

    const results = await runMatrix({
      strategyPath,
      catalog,
      runner,
      timeoutSeconds: 5,
      environment: "tflow",
      concurrency: 1,
      signal: controller.signal,
    });

    expect(inFlightSignal?.aborted).toBe(true);
    expect(runner.calls).toHaveLength(1);
    expect(results.map((r) => [r.asset, r.status, r.error])).toEqual([
      ["A", "failed", "cancelled"],
      ["B", "unknown", "cancelled before start"],
      ["C", "unknown", "cancelled before start"],
    ]);
    expect(fs.existsSync(path.dirname(runner.calls[0]?.variantPath ?? dir))).toBe(false);
  });

  it("keeps every result when the progress callback throws", async () => {
    const catalog = writeDataFiles(dir, ["A", "B", "C"]);
    const runner = fakeRunner(async () => {
      await sleep(5);
      return { success: true, stdout: STATS, stderr: "" };
    });
    let calls = 0;

    const results = await runMatrix({
      strategyPath,
      catalog,
      runner,
      timeoutSeconds: 5,
      environment: "tflow",
      concurrency: 2,
      onProgress: () => {
        calls++;
        throw new Error("progress display failed");
      },
    });

    expect(calls).toBe(3);
    expect(results.map((r) => r.status)).toEqual(["success", "success", "success"]);
    const tempDir = path.dirname(runner.calls[0]?.variantPath ?? dir);
    expect(fs.existsSync(tempDir)).toBe(false);
  });

  it("accepts the longest timeout a timer can hold", async () => {
    const catalog = writeDataFiles(dir, ["BTC"]);
    const runner = fakeRunner(async () => {
      await sleep(30);
      return { success: true, stdout: STATS, stderr: "" };
    });

    const [result] = await runMatrix({ strategyPath, catalog, runner, timeoutSeconds: 2_147_483, environment: "tflow" });

    expect(result?.status).toBe("success");
  });

  it("rejects a timeout a timer cannot hold", async () => {
    const runner = fakeRunner(async () => ({ success: true, stdout: "", stderr: "" }));

    await expect(
      runMatrix({ strategyPath, catalog: new Map(), runner, timeoutSeconds: 3_000_000, environment: "tflow" }),
    ).rejects.toThrow("timeoutSeconds: expected at most 2147483, got 3000000");
  });

  it("rejects a non-positive timeout", async () => {
    const runner = fakeRunner(async () => ({ success: true, stdout: "", stderr: "" }));

    await expect(
      runMatrix({ strategyPath, catalog: new Map(), runner, timeoutSeconds: 0, environment: "tflow" }),
    ).rejects.toThrow("timeoutSeconds: expected positive number, got 0");
  });
});
