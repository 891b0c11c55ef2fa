import path from "node:path";
import { execa } from "execa";
import type { RunnerConfig } from "../types/config.js";
import type { RunnerOutcome, StrategyRunner } from "./types.js";

/** Last non-empty line of a stream, typically the exception line of a traceback. */
export function lastLine(text: string): string | undefined {
  const lines = text.split("\n").map((l) => l.trim()).filter((l) => l.length > 0);
  return lines[lines.length - 1];
}

/**
 * Runs variants with `conda run -n <env> <interpreter> <file>`, from the
 * variant's own directory.
 */
export function createCondaRunner(
  config: RunnerConfig = { condaBin: "conda", interpreter: "python" },
): StrategyRunner {
  const { condaBin, interpreter } = config;

  return {
    async execute(variantPath: string, environment: string, signal: AbortSignal): Promise<RunnerOutcome> {
      const result = await execa(
        condaBin,
        ["run", "-n", environment, "--no-capture-output", interpreter, variantPath],
        {
          cwd: path.dirname(variantPath),
          cancelSignal: signal,
          reject: false,
          env: { PYTHONUNBUFFERED: "1" },
        },
      );

      const { stdout, stderr } = result;
      if (!result.failed) {
        return { success: true, stdout, stderr };
      }

      let error: string;
      if (result.isCanceled) {
        error = "cancelled";
      } else if (result.exitCode === undefined) {
        error = lastLine(stderr) ?? `could not start ${condaBin}`;
      } else {
        error = lastLine(stderr) ?? `exited with code ${result.exitCode}`;
      }
      return { success: false, stdout, stderr, error };
    },
  };
}
