import { z } from "zod";

export const METRIC_NAMES = ["return", "sharpe", "maxDrawdown", "trades", "winRate"] as const;

export type MetricName = (typeof METRIC_NAMES)[number];

/** Absent key = not found in the output. Never defaulted to zero. */
export type MetricsRecord = Partial<Record<MetricName, number>>;

export type TestStatus = "success" | "failed" | "error" | "timeout" | "unknown";

export interface Asset {
  readonly symbol: string;
  readonly dataPath: string;
}

/** symbol -> data file path */
export type AssetCatalog = ReadonlyMap<string, string>;

export interface StrategySource {
  readonly path: string;
  readonly baseName: string;
  readonly text: string;
}

export interface Variant {
  readonly asset: Asset;
  readonly path: string;
}

export interface TestTask {
  readonly strategyPath: string;
  readonly asset: string;
  readonly dataPath: string;
  readonly tempDir: string;
}

interface TestResultBase {
  strategyName: string;
  asset: string;
  dataPath: string;
  executionTimeSeconds: number;
  /** ISO-8601 completion time */
  timestamp: string;
}

export interface SuccessfulTestResult extends TestResultBase {
  status: "success";
  error?: undefined;
  metrics: MetricsRecord;
  stdout?: string;
  stderr?: string;
}

export interface UnsuccessfulTestResult extends TestResultBase {
  status: Exclude<TestStatus, "success">;
  error: string;
  metrics: Record<string, never>;
  stdout?: string;
  stderr?: string;
}

export type TestResult = SuccessfulTestResult | UnsuccessfulTestResult;

export interface ResultsFile {
  timestamp: string;
  strategy: string;
  totalTests: number;
  assetsTested: string[];
  maxWorkers: number;
  timeoutSeconds: number;
  environment: string;
  results: TestResult[];
}

// --- Schemas for reading results back ---

const MetricsRecordSchema = z
  .object({
    return: z.number().optional(),
    sharpe: z.number().optional(),
    maxDrawdown: z.number().optional(),
    trades: z.number().optional(),
    winRate: z.number().optional(),
  })
  .strict();

const ResultBaseSchema = z.object({
  strategyName: z.string(),
  asset: z.string(),
  dataPath: z.string(),
  executionTimeSeconds: z.number().min(0),
  timestamp: z.string(),
  stdout: z.string().optional(),
  stderr: z.string().optional(),
});

export const TestResultSchema: z.ZodType<TestResult, z.ZodTypeDef, unknown> = z.discriminatedUnion("status", [
  ResultBaseSchema.extend({
    status: z.literal("success"),
    metrics: MetricsRecordSchema,
  }),
  ResultBaseSchema.extend({
    status: z.enum(["failed", "error", "timeout", "unknown"]),
    error: z.string(),
    metrics: z.object({}).strict().transform((): Record<string, never> => ({})),
  }),
]);

export const ResultsFileSchema: z.ZodType<ResultsFile, z.ZodTypeDef, unknown> = z.object({
  timestamp: z.string(),
  strategy: z.string(),
  totalTests: z.number().int().min(0),
  assetsTested: z.array(z.string()),
  maxWorkers: z.number().int().min(1),
  timeoutSeconds: z.number().positive(),
  environment: z.string(),
  results: z.array(TestResultSchema),
});
