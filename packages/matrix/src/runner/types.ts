export interface RunnerOutcome {
  success: boolean;
  stdout: string;
  stderr: string;
  error?: string;
}

/**
 * Executes one strategy variant in an isolated environment and returns its raw
 * console output. Implementations report process failures through the outcome and
 * must stop the process when `signal` aborts; the orchestrator owns the timeout.
 */
export interface StrategyRunner {
  execute(variantPath: string, environment: string, signal: AbortSignal): Promise<RunnerOutcome>;
}
