import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";
import type { Asset, AssetCatalog } from "../types/result.js";

const log = logger.createChild("asset-catalog");

export interface DiscoverOptions {
  /** Extensions to accept, with the leading dot. Matched case-insensitively. */
  extensions?: readonly string[];
}

function isMissingPath(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}

/** Regular files, and symlinks that resolve to one. */
async function isDataFile(dataDir: string, entry: Dirent): Promise<boolean> {
  if (entry.isFile()) return true;
  if (!entry.isSymbolicLink()) return false;
  const target = await fs.stat(path.join(dataDir, entry.name)).catch(() => null);
  return target?.isFile() ?? false;
}

/**
 * Map every dataset file directly inside `dataDir` to its symbol (file name without
 * extension). Subdirectories are not searched. When one symbol has files with several
 * accepted extensions, the extension listed first wins. A missing directory is not an error:
 * it yields an empty catalog and a warning.
 */
export async function discoverAssets(
  dataDir: string,
  { extensions = [".csv"] }: DiscoverOptions = {},
): Promise<AssetCatalog> {
  const priority = extensions.map((e) => e.toLowerCase());

  let entries: Dirent[];
  try {
    entries = await fs.readdir(dataDir, { withFileTypes: true });
  } catch (err) {
    if (isMissingPath(err)) {
      log.warn({ dataDir }, "Data directory not found, no assets to test");
      return new Map();
    }
    throw err;
  }

  const candidates = await Promise.all(
    entries
      .filter((e) => priority.includes(path.extname(e.name).toLowerCase()))
      .map(async (e) => ((await isDataFile(dataDir, e)) ? e.name : null)),
  );

  const files = candidates
    .filter((file): file is string => file !== null)
    .map((file) => {
      const ext = path.extname(file);
      return { symbol: path.basename(file, ext), file, rank: priority.indexOf(ext.toLowerCase()) };
    })
    .sort((a, b) => a.symbol.localeCompare(b.symbol) || a.rank - b.rank);

  const catalog = new Map<string, string>();
  for (const { symbol, file } of files) {
    const kept = catalog.get(symbol);
    if (kept !== undefined) {
      log.warn({ symbol, kept: path.basename(kept), ignored: file }, "Duplicate asset symbol, keeping the first extension listed");
      continue;
    }
    catalog.set(symbol, path.join(dataDir, file));
  }

  log.info({ dataDir, count: catalog.size }, "Discovered asset data files");
  return catalog;
}

/** Catalog entries as `Asset` values, in catalog order. */
export function listAssets(catalog: AssetCatalog): Asset[] {
  return [...catalog].map(([symbol, dataPath]) => ({ symbol, dataPath }));
}

/**
 * Per-asset file sizes for the run banner. Files that vanished since discovery
 * report `sizeMb: null`.
 */
export async function describeCatalog(
  catalog: AssetCatalog,
): Promise<{ symbol: string; file: string; sizeMb: number | null }[]> {
  return Promise.all(
    listAssets(catalog).map(async ({ symbol, dataPath }) => {
      const stat = await fs.stat(dataPath).catch(() => null);
      return {
        symbol,
        file: path.basename(dataPath),
        sizeMb: stat ? +(stat.size / (1024 * 1024)).toFixed(1) : null,
      };
    }),
  );
}
