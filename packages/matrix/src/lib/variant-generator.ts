import fs from "node:fs/promises";
import path from "node:path";
import writeFileAtomic from "write-file-atomic";
import { logger } from "./logger.js";
import { rewriteSource } from "./rewrite-rules.js";
import type { RewriteRule } from "./rewrite-rules.js";
import type { Asset, Variant } from "../types/result.js";

/**
 * Variant file name: `<strategyBaseName>_<SYMBOL><ext>`.
 * Example: variantFileName("/s/Momentum_BT.py", "BTCUSDT") -> "Momentum_BT_BTCUSDT.py"
 */
export function variantFileName(sourcePath: string, symbol: string): string {
  const ext = path.extname(sourcePath);
  return `${path.basename(sourcePath, ext)}_${symbol}${ext}`;
}

/**
 * Write the asset-specific copy of a strategy into `outputDir`.
 * The original source file is never touched.
 */
export async function generateVariant(opts: {
  sourceText: string;
  sourcePath: string;
  asset: Asset;
  outputDir: string;
  rules?: readonly RewriteRule[];
}): Promise<Variant> {
  const { sourceText, sourcePath, asset, outputDir, rules } = opts;
  const log = logger.forTask(path.basename(sourcePath, path.extname(sourcePath)), asset.symbol);

  const outcome = rewriteSource({
    sourceText,
    symbol: asset.symbol,
    dataPath: asset.dataPath,
    rules,
  });

  if (outcome.injected) {
    log.warn("No data path reference found, injected a data_path declaration");
  }

  await fs.mkdir(outputDir, { recursive: true });
  const variantPath = path.join(outputDir, variantFileName(sourcePath, asset.symbol));
  await writeFileAtomic(variantPath, outcome.text, "utf8");

  log.debug({ variantPath, rules: outcome.appliedRules }, "Created strategy variant");
  return { asset, path: variantPath };
}
