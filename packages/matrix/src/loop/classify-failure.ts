export type FailureClass =
  | "syntax"
  | "missing_module"
  | "data"
  | "environment"
  | "timeout"
  | "runtime"
  | "unknown";

const FAILURE_PATTERNS: [RegExp, FailureClass][] = [
  [/SyntaxError|IndentationError|TabError/, "syntax"],
  [/ModuleNotFoundError|ImportError|No module named/, "missing_module"],
  [/FileNotFoundError|EmptyDataError|ParserError|KeyError/, "data"],
  [/EnvironmentLocationNotFound|Could not find conda environment|spawn .*ENOENT|command not found/i, "environment"],
  [/timed out|timeout/i, "timeout"],
  [/Error|Exception|Traceback/, "runtime"],
];

/**
 * Coarse category for a failed run's error text, used to group failures in reports.
 */
export function classifyFailure(message: string): FailureClass {
  for (const [pattern, failureClass] of FAILURE_PATTERNS) {
    if (pattern.test(message)) return failureClass;
  }
  return "unknown";
}
