import { cac } from "cac";
import { z } from "zod";
import { MAX_TIMEOUT_SECONDS } from "../types/config.js";

const TestOptionsSchema = z.object({
  dataDir: z.string().min(1).optional(),
  workers: z.coerce.number().int().min(1).optional(),
  timeout: z.coerce.number().positive().max(MAX_TIMEOUT_SECONDS).optional(),
  env: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
});

const AnalyzeOptionsSchema = z.object({
  minSharpe: z.coerce.number().optional(),
  minReturn: z.coerce.number().optional(),
  minTrades: z.coerce.number().int().min(0).optional(),
  excel: z.string().min(1).optional(),
  report: z.string().min(1).optional(),
});

export type TestOptions = z.infer<typeof TestOptionsSchema>;
export type AnalyzeOptions = z.infer<typeof AnalyzeOptionsSchema>;

export type ParsedCommand =
  | { command: "test"; strategyPath: string; options: TestOptions }
  | { command: "analyze"; resultsPath: string; options: AnalyzeOptions }
  | { command: "help" };

function buildCli(): ReturnType<typeof cac> {
  const cli = cac("asset-matrix");

  cli
    .command("test <strategy>", "Run a strategy against every asset in the data directory")
    .option("--data-dir <path>", "Directory of <SYMBOL>.csv files (default: data/ohlcv)")
    .option("--workers <n>", "Parallel workers (default: CPU count)")
    .option("--timeout <seconds>", "Timeout per backtest in seconds (default: 300)")
    .option("--env <name>", "Conda environment to run in (default: tflow)")
    .option("--output <file>", "Where to save the results JSON")
    .option("--config <path>", "Path to matrix-config.json");

  cli
    .command("analyze <results>", "Summarize a saved results JSON")
    .option("--min-sharpe <n>", "Only list results with Sharpe >= n")
    .option("--min-return <pct>", "Only list results with return >= pct")
    .option("--min-trades <n>", "Only list results with at least n trades")
    .option("--excel <file>", "Export the results to an .xlsx workbook")
    .option("--report <file>", "Save the text report to a file");

  cli.help();
  return cli;
}

/**
 * Parse argv (node-style: [node, script, ...args]) into a command.
 * Unknown commands print help and resolve to `help`; missing arguments and invalid
 * option values throw.
 */
export function parseArgs(argv: string[] = process.argv): ParsedCommand {
  const cli = buildCli();
  const { args, options } = cli.parse(argv, { run: false });

  if (options.help) return { command: "help" };

  const target = args[0];
  const command = cli.matchedCommandName;
  if ((command === "test" || command === "analyze") && !target) {
    throw new Error(`Missing argument: asset-matrix ${command} <${command === "test" ? "strategy" : "results"}>`);
  }

  switch (command) {
    case "test":
      return { command: "test", strategyPath: String(target), options: TestOptionsSchema.parse(options) };
    case "analyze":
      return { command: "analyze", resultsPath: String(target), options: AnalyzeOptionsSchema.parse(options) };
    default:
      cli.outputHelp();
      return { command: "help" };
  }
}
