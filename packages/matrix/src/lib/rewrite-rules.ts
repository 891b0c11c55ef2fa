/**
 * Ordered textual rewrite rules that point a strategy program at a different
 * dataset. Heuristic: they recognize the common ways generated backtest scripts
 * reference their CSV input, not the language itself.
 */

export interface RewriteRule {
  name: string;
  /** Must carry the `g` flag: every occurrence is rewritten. */
  pattern: RegExp;
  /** Builds the replacement from the already-quoted data path literal. */
  render(literal: string): string;
}

export interface RewriteOutcome {
  text: string;
  appliedRules: string[];
  injected: boolean;
}

export const DEFAULT_REWRITE_RULES: readonly RewriteRule[] = [
  {
    name: "data-path-assignment",
    pattern: /data_path\s*=\s*["'].*?["']/g,
    render: (literal) => `data_path = ${literal}`,
  },
  {
    name: "read-csv-call",
    pattern: /pd\.read_csv\(["'].*?["']\)/g,
    render: (literal) => `pd.read_csv(${literal})`,
  },
  {
    name: "read-csv-assignment",
    pattern: /data\s*=\s*pd\.read_csv\(["'].*?["']\)/g,
    render: (literal) => `data = pd.read_csv(${literal})`,
  },
];

/** Double-quoted literal with backslashes and quotes escaped. */
export function quoteLiteral(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

function isHeaderLine(line: string): boolean {
  return (
    line.trim() === "" ||
    line.startsWith("#") ||
    line.startsWith("import ") ||
    line.startsWith("from ")
  );
}

/** Index of the first line after the leading blank/comment/import block. */
export function findHeaderEnd(lines: readonly string[]): number {
  let end = 0;
  while (end < lines.length && isHeaderLine(lines[end])) end++;
  return end;
}

/** Insert a `data_path` declaration right after the header block. */
export function injectDataPath(text: string, symbol: string, dataPath: string): string {
  const lines = text.split("\n");
  const at = findHeaderEnd(lines);
  lines.splice(
    at,
    0,
    "",
    `# Data path for ${symbol} (injected by multi-asset tester)`,
    `data_path = ${quoteLiteral(dataPath)}`,
    "",
  );
  return lines.join("\n");
}

/**
 * Apply every matching rule in order; fall back to injection when none matched.
 * Pure: the same inputs always give the same text.
 */
export function rewriteSource(opts: {
  sourceText: string;
  symbol: string;
  dataPath: string;
  rules?: readonly RewriteRule[];
}): RewriteOutcome {
  const { sourceText, symbol, dataPath, rules = DEFAULT_REWRITE_RULES } = opts;
  const literal = quoteLiteral(dataPath);

  let text = sourceText;
  const appliedRules: string[] = [];

  for (const rule of rules) {
    let hits = 0;
    // Function replacement so `$` sequences in paths are taken literally
    text = text.replace(rule.pattern, () => {
      hits++;
      return rule.render(literal);
    });
    if (hits > 0) appliedRules.push(rule.name);
  }

  if (appliedRules.length > 0) {
    return { text, appliedRules, injected: false };
  }
  return { text: injectDataPath(sourceText, symbol, dataPath), appliedRules, injected: true };
}
