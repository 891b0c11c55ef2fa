import { describe, it, expect } from "vitest";
import { runPool } from "./worker-pool.js";
import { sleep } from "../test-helpers.js";

describe("runPool", () => {
  const recover = (_item: number, err: unknown): string => `recovered: ${String(err)}`;

  it("never runs more than `concurrency` tasks at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const { results } = await runPool(
      [1, 2, 3, 4, 5, 6],
      async (n) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await sleep(10);
        inFlight--;
        return String(n);
      },
      { concurrency: 2, recover },
    );

    expect(peak).toBe(2);
    expect([...results].sort()).toEqual(["1", "2", "3", "4", "5", "6"]);
  });

  it("returns results in completion order", async () => {
    const { results } = await runPool(
      [60, 5, 30],
      async (ms) => {
        await sleep(ms);
        return String(ms);
      },
      { concurrency: 3, recover },
    );

    expect(results).toEqual(["5", "30", "60"]);
  });

  it("turns a worker rejection into a result through recover", async () => {
    const { results } = await runPool(
      [1, 2],
      async (n) => {
        if (n === 2) throw new Error("boom");
        return "ok";
      },
      { concurrency: 1, recover },
    );

    expect(results).toEqual(["ok", "recovered: Error: boom"]);
  });

  it("reports each completion with a running count", async () => {
    const seen: [string, number, number][] = [];
    await runPool([1, 2, 3], async (n) => String(n), {
      concurrency: 1,
      recover,
      onSettled: (result, item, count) => seen.push([result, item, count]),
    });

    expect(seen).toEqual([
      ["1", 1, 1],
      ["2", 2, 2],
      ["3", 3, 3],
    ]);
  });

  it("stops pulling new items once the signal aborts", async () => {
    const controller = new AbortController();
    const outcome = await runPool(
      [1, 2, 3],
      async (n) => {
        controller.abort();
        return String(n);
      },
      { concurrency: 1, recover, signal: controller.signal },
    );

    expect(outcome).toEqual({ results: ["1"], skipped: [2, 3] });
  });

  it("handles an empty queue", async () => {
    expect(await runPool([], async () => "x", { concurrency: 4, recover })).toEqual({ results: [], skipped: [] });
  });

  it("lets every lane finish before surfacing an onSettled failure", async () => {
    let slowFinished = false;
    const run = runPool(
      [1, 30],
      async (ms) => {
        await sleep(ms);
        if (ms === 30) slowFinished = true;
        return String(ms);
      },
      {
        concurrency: 2,
        recover,
        onSettled: (result) => {
          if (result === "1") throw new Error("listener failed");
        },
      },
    );

    await expect(run).rejects.toThrow("listener failed");
    expect(slowFinished).toBe(true);
  });

  it("rejects an invalid concurrency", async () => {
    await expect(runPool([1], async () => "x", { concurrency: 0, recover })).rejects.toThrow(
      "concurrency: expected positive integer, got 0",
    );
  });
});
