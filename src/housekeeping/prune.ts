import fs from "node:fs";
import path from "node:path";
import { errorMessage, type Logger, type MetricsRegistry } from "../observability";
import type { PruneSummary } from "../types";

export interface PruneDeps {
  logger: Logger;
  metrics: MetricsRegistry;
}

export function megabytesToBytes(megabytes: number): number {
  return megabytes * 1024 * 1024;
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  const files: string[] = [];
  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(entryPath)));
    } else if (entry.isFile()) {
      files.push(entryPath);
    }
  }
  return files;
}

/**
 * Deletes PDFs under `dir` strictly larger than `maxBytes`. A missing directory
 * means there is nothing to prune.
 */
export async function pruneOversizedFiles(dir: string, maxBytes: number, deps: PruneDeps): Promise<PruneSummary> {
  const { logger, metrics } = deps;
  const summary: PruneSummary = { scanned: 0, removed: [], freedBytes: 0 };

  if (!fs.existsSync(dir)) {
    logger.info("prune_dir_missing", { dir });
    return summary;
  }

  for (const filePath of await listFiles(dir)) {
    if (!filePath.toLowerCase().endsWith(".pdf")) {
      continue;
    }
    summary.scanned += 1;

    try {
      const { size } = await fs.promises.stat(filePath);
      if (size <= maxBytes) {
        continue;
      }
      await fs.promises.unlink(filePath);
      summary.removed.push(filePath);
      summary.freedBytes += size;
      metrics.incrementCounter("files_pruned");
      logger.info("prune_file_removed", { filePath, bytes: size, maxBytes });
    } catch (error) {
      logger.warn("prune_file_failed", { filePath, error: errorMessage(error) });
    }
  }

  logger.info("prune_complete", { dir, scanned: summary.scanned, removed: summary.removed.length, freedBytes: summary.freedBytes });
  return summary;
}
