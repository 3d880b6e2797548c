import { readFile } from "node:fs/promises";

import sharp from "sharp";

import { DEFAULT_PREVIEW_QUALITY } from "../config/env.js";
import { errorMessage } from "../lib/errors.js";
import type {
  SourceImage,
  TranscodeFailure,
  TranscodeFn,
  TranscodeResult,
} from "./types.js";

export const PREVIEW_MAX_WIDTH = 900;
export const PREVIEW_MAX_HEIGHT = 600;
const PREVIEW_WEBP_EFFORT = 4;

export interface TranscodeOptions {
  quality?: number;
  readSource?: (filePath: string) => Promise<Buffer>;
}

const failure = (source: SourceImage, error: string): TranscodeFailure => ({
  ok: false,
  ordinal: source.ordinal,
  fileName: source.fileName,
  displayName: source.displayName,
  error,
});

/**
 * Produce the preview and full representations of one source image.
 *
 * Resolves with a failure marker instead of rejecting, so one bad file never
 * takes down its siblings in the pool.
 */
export const transcodeImage = async (
  source: SourceImage,
  options: TranscodeOptions = {},
): Promise<TranscodeResult> => {
  const readSource =
    options.readSource ?? ((filePath: string) => readFile(filePath));
  const quality = options.quality ?? DEFAULT_PREVIEW_QUALITY;

  let fullBytes: Buffer;
  try {
    fullBytes = await readSource(source.path);
  } catch (error) {
    return failure(source, `read failed: ${errorMessage(error)}`);
  }

  try {
    const image = sharp(fullBytes, { failOn: "error" });
    const metadata = await image.metadata();
    if (metadata.format !== "jpeg") {
      return failure(
        source,
        `not a JPEG image (detected ${metadata.format ?? "unknown"})`,
      );
    }

    // libvips shrinks JPEGs on load when the target is this much smaller, so
    // the full-resolution frame is never decoded.
    const { data, info } = await image
      .resize({
        width: PREVIEW_MAX_WIDTH,
        height: PREVIEW_MAX_HEIGHT,
        fit: "inside",
        withoutEnlargement: true,
      })
      .webp({ quality, effort: PREVIEW_WEBP_EFFORT })
      .toBuffer({ resolveWithObject: true });

    return {
      ok: true,
      ordinal: source.ordinal,
      fileName: source.fileName,
      displayName: source.displayName,
      previewBytes: data,
      previewSize: { width: info.width, height: info.height },
      fullBytes,
    };
  } catch (error) {
    return failure(source, `transcode failed: ${errorMessage(error)}`);
  }
};

export const createTranscoder =
  (options: TranscodeOptions = {}): TranscodeFn =>
  (source) =>
    transcodeImage(source, options);
