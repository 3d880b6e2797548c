import { readdir, stat } from "node:fs/promises";
import path from "node:path";

import { GalleryScanError, errorMessage } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import type { ScanResult, SkippedEntry, SourceImage } from "./types.js";

export const JPEG_EXTENSIONS = new Set([".jpg", ".jpeg"]);

export interface ScanOptions {
  logger: Logger;
  /** Lists entry names in directory-iteration order. */
  listDirectory?: (directory: string) => Promise<string[]>;
  isFile?: (filePath: string) => Promise<boolean>;
}

const listEntries = (directory: string): Promise<string[]> =>
  readdir(directory);

const isRegularFile = async (filePath: string): Promise<boolean> =>
  (await stat(filePath)).isFile();

export const isJpegFileName = (fileName: string): boolean =>
  JPEG_EXTENSIONS.has(path.extname(fileName).toLowerCase());

export const toDisplayName = (fileName: string): string =>
  path.parse(fileName).name;

/** List JPEG candidates in `directory`, keeping the order the directory yields them. */
export const scanDirectory = async (
  directory: string,
  options: ScanOptions,
): Promise<ScanResult> => {
  const listDirectory = options.listDirectory ?? listEntries;
  const isFile = options.isFile ?? isRegularFile;

  let entries: string[];
  try {
    entries = await listDirectory(directory);
  } catch (error) {
    throw new GalleryScanError(directory, { cause: error });
  }

  const images: SourceImage[] = [];
  const skipped: SkippedEntry[] = [];

  for (const fileName of entries) {
    if (!isJpegFileName(fileName)) {
      continue;
    }

    const filePath = path.join(directory, fileName);
    try {
      if (!(await isFile(filePath))) {
        continue;
      }
    } catch (error) {
      const reason = errorMessage(error);
      options.logger.warn(
        { file: filePath, err: error },
        "skipping unreadable directory entry",
      );
      skipped.push({ fileName, reason });
      continue;
    }

    images.push({
      ordinal: images.length,
      path: filePath,
      fileName,
      displayName: toDisplayName(fileName),
    });
  }

  options.logger.debug(
    { directory, candidates: images.length, skipped: skipped.length },
    "gallery directory scanned",
  );

  return { directory, images, count: images.length, skipped };
};
