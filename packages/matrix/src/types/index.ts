export type { RunnerConfig, MatrixConfig, MatrixEnv } from "./config.js";
export { MAX_TIMEOUT_SECONDS, MatrixConfigSchema, MatrixEnvSchema, RunnerConfigSchema, DataExtensionSchema } from "./config.js";

export type {
  MetricName,
  MetricsRecord,
  TestStatus,
  Asset,
  AssetCatalog,
  StrategySource,
  Variant,
  TestTask,
  SuccessfulTestResult,
  UnsuccessfulTestResult,
  TestResult,
  ResultsFile,
} from "./result.js";
export { METRIC_NAMES, TestResultSchema, ResultsFileSchema } from "./result.js";
