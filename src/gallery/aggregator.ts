import { InvariantError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { ArchiveBuilder } from "./archive.js";
import { type AssetTable, AssetTableBuilder } from "./asset-table.js";
import {
  ARCHIVE_ROUTE_KEY,
  fullRouteKey,
  previewRouteKey,
} from "./route-keys.js";
import type {
  PresentationEntry,
  TranscodeFailure,
  TranscodeResult,
  TranscodeSuccess,
} from "./types.js";

export interface AggregationOutcome {
  assets: AssetTable;
  presentation: readonly PresentationEntry[];
  failures: readonly TranscodeFailure[];
  archiveBytes: number;
}

export interface AggregateOptions {
  logger: Logger;
}

const receiveAll = async (
  results: AsyncIterable<TranscodeResult>,
  expected: number,
): Promise<(TranscodeResult | undefined)[]> => {
  const slots = new Array<TranscodeResult | undefined>(expected).fill(
    undefined,
  );
  let received = 0;

  if (expected === 0) {
    return slots;
  }

  for await (const result of results) {
    if (
      !Number.isInteger(result.ordinal) ||
      result.ordinal < 0 ||
      result.ordinal >= expected
    ) {
      throw new InvariantError(
        `result ordinal ${result.ordinal} outside 0..${expected - 1}`,
      );
    }
    if (slots[result.ordinal] !== undefined) {
      throw new InvariantError(
        `second result for ordinal ${result.ordinal} (${result.fileName})`,
      );
    }

    slots[result.ordinal] = result;
    received += 1;
    if (received === expected) {
      return slots;
    }
  }

  throw new InvariantError(
    `completion channel closed after ${received} of ${expected} results`,
  );
};

/**
 * Drain exactly `expected` results, then build the archive, asset table and
 * presentation list in ordinal order. This is the only writer of all three.
 */
export const aggregateResults = async (
  results: AsyncIterable<TranscodeResult>,
  expected: number,
  options: AggregateOptions,
): Promise<AggregationOutcome> => {
  const { logger } = options;
  const slots = await receiveAll(results, expected);

  const archive = new ArchiveBuilder();
  const table = new AssetTableBuilder();
  const presentation: PresentationEntry[] = [];
  const failures: TranscodeFailure[] = [];
  const seenDisplayNames = new Map<string, string>();

  const exclude = (result: TranscodeFailure): void => {
    logger.warn(
      {
        file: result.fileName,
        ordinal: result.ordinal,
        reason: result.error,
      },
      "excluding image from gallery",
    );
    failures.push(result);
  };

  const include = (result: TranscodeSuccess): void => {
    const fullKey = fullRouteKey(result.fileName);
    const previewKey = previewRouteKey(result.displayName);

    archive.append(result.fileName, result.fullBytes);
    table.insert(fullKey, {
      bytes: result.fullBytes,
      contentType: "image/jpeg",
    });
    table.insert(previewKey, {
      bytes: result.previewBytes,
      contentType: "image/webp",
    });
    presentation.push(
      Object.freeze({
        displayName: result.displayName,
        fileName: result.fileName,
        previewRouteKey: previewKey,
        fullRouteKey: fullKey,
        previewWidth: result.previewSize.width,
        previewHeight: result.previewSize.height,
      }),
    );
  };

  for (const result of slots) {
    if (result === undefined) {
      // receiveAll only returns once every slot is filled.
      throw new InvariantError("aggregation slot left empty");
    }

    if (!result.ok) {
      exclude(result);
      continue;
    }

    const earlier = seenDisplayNames.get(result.displayName);
    if (earlier !== undefined) {
      exclude({
        ok: false,
        ordinal: result.ordinal,
        fileName: result.fileName,
        displayName: result.displayName,
        error: `display name "${result.displayName}" already used by ${earlier}`,
      });
      continue;
    }
    seenDisplayNames.set(result.displayName, result.fileName);
    include(result);
  }

  const archiveBuffer = archive.finalize();
  table.insert(ARCHIVE_ROUTE_KEY, {
    bytes: archiveBuffer,
    contentType: "application/zip",
  });

  return {
    assets: table.freeze(),
    presentation: Object.freeze(presentation),
    failures: Object.freeze(failures),
    archiveBytes: archiveBuffer.length,
  };
};
