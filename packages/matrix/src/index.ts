export * from "./types/index.js";

export { discoverAssets, listAssets, describeCatalog } from "./lib/asset-catalog.js";
export type { DiscoverOptions } from "./lib/asset-catalog.js";
export { DEFAULT_REWRITE_RULES, rewriteSource, injectDataPath, findHeaderEnd, quoteLiteral } from "./lib/rewrite-rules.js";
export type { RewriteRule, RewriteOutcome } from "./lib/rewrite-rules.js";
export { generateVariant, variantFileName } from "./lib/variant-generator.js";
export { extractMetrics, METRIC_PATTERNS } from "./lib/metrics-extractor.js";
export { loadConfig, resolveRunSettings } from "./lib/config.js";
export type { CliOverrides, RunSettings } from "./lib/config.js";
export { buildResultsFile, defaultResultsPath, saveResults, loadResults } from "./lib/result-store.js";

export type { StrategyRunner, RunnerOutcome } from "./runner/types.js";
export { createCondaRunner } from "./runner/conda-runner.js";

export { runMatrix } from "./loop/orchestrator.js";
export type { RunMatrixOptions, MatrixProgress } from "./loop/orchestrator.js";
export { runPool } from "./loop/worker-pool.js";
export type { PoolOptions, PoolOutcome } from "./loop/worker-pool.js";
export { MatrixRunError } from "./loop/errors.js";
export { classifyFailure } from "./loop/classify-failure.js";
export type { FailureClass } from "./loop/classify-failure.js";

export { summarizeResults, renderSummary } from "./report/ranking.js";
export type { RunSummary, RankedEntry, FailureEntry } from "./report/ranking.js";
export {
  filterSuccessful,
  topResults,
  describeMetric,
  buildAnalysisReport,
  exportToWorkbook,
  PREMIUM_FILTER,
} from "./report/analyze.js";
export type { ResultFilter, MetricStats } from "./report/analyze.js";
