import { performance } from "node:perf_hooks";

import type { Logger } from "../lib/logger.js";
import { aggregateResults } from "./aggregator.js";
import type { AssetTable } from "./asset-table.js";
import { startWorkerPool } from "./pool.js";
import { scanDirectory, type ScanOptions } from "./scanner.js";
import { createTranscoder } from "./transcode.js";
import type {
  BuildStats,
  PresentationEntry,
  TranscodeFn,
} from "./types.js";

export interface GallerySnapshot {
  readonly assets: AssetTable;
  readonly presentation: readonly PresentationEntry[];
  readonly stats: Readonly<BuildStats>;
}

export interface BuildGalleryOptions {
  directory: string;
  quality: number;
  concurrency: number;
  logger: Logger;
  transcode?: TranscodeFn;
  listDirectory?: ScanOptions["listDirectory"];
}

/**
 * Scan, transcode and aggregate a gallery directory. Resolves only after
 * every candidate has reported back; the returned snapshot is frozen.
 */
export const buildGallery = async (
  options: BuildGalleryOptions,
): Promise<GallerySnapshot> => {
  const { logger } = options;
  const startedAt = performance.now();

  const scan = await scanDirectory(options.directory, {
    logger,
    listDirectory: options.listDirectory,
  });
  logger.info(
    {
      directory: scan.directory,
      candidates: scan.count,
      concurrency: options.concurrency,
    },
    "building gallery",
  );

  const transcode =
    options.transcode ?? createTranscoder({ quality: options.quality });
  const results = startWorkerPool(scan.images, transcode, {
    concurrency: options.concurrency,
  });
  const outcome = await aggregateResults(results, scan.count, { logger });

  const stats: BuildStats = {
    scanned: scan.count,
    succeeded: outcome.presentation.length,
    failed: outcome.failures.length,
    skippedEntries: scan.skipped.length,
    archiveBytes: outcome.archiveBytes,
    elapsedMs: Math.round(performance.now() - startedAt),
  };
  logger.info(stats, "gallery build finished");

  return Object.freeze({
    assets: outcome.assets,
    presentation: outcome.presentation,
    stats: Object.freeze(stats),
  });
};
