import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { pino, type Logger } from "pino";

import type {
  SourceImage,
  TranscodeFn,
  TranscodeResult,
} from "../../src/gallery/types.js";

export const silentLogger = (): Logger => pino({ level: "silent" });

export interface GalleryFixture {
  directory: string;
  cleanup: () => Promise<void>;
}

export const createGalleryDir = async (
  files: Record<string, Buffer | string>,
): Promise<GalleryFixture> => {
  const directory = await mkdtemp(path.join(tmpdir(), "gallery-test-"));
  for (const [name, contents] of Object.entries(files)) {
    await writeFile(path.join(directory, name), contents);
  }
  return {
    directory,
    cleanup: () => rm(directory, { recursive: true, force: true }),
  };
};

export const sourceImage = (
  ordinal: number,
  fileName: string,
  directory = "/gallery",
): SourceImage => ({
  ordinal,
  path: path.join(directory, fileName),
  fileName,
  displayName: path.parse(fileName).name,
});

export const successFor = (source: SourceImage): TranscodeResult => ({
  ok: true,
  ordinal: source.ordinal,
  fileName: source.fileName,
  displayName: source.displayName,
  previewBytes: Buffer.from(`preview:${source.fileName}`),
  previewSize: { width: 90, height: 60 },
  fullBytes: Buffer.from(`full:${source.fileName}`),
});

export const failureFor = (
  source: SourceImage,
  error = "decode failed",
): TranscodeResult => ({
  ok: false,
  ordinal: source.ordinal,
  fileName: source.fileName,
  displayName: source.displayName,
  error,
});

export const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/** Wrap a transcoder so each call finishes after a random delay. */
export const withRandomDelay =
  (transcode: TranscodeFn, maxDelayMs = 15): TranscodeFn =>
  async (source) => {
    const result = await transcode(source);
    await delay(Math.floor(Math.random() * maxDelayMs));
    return result;
  };

export const fromArray = async function* <T>(
  values: readonly T[],
): AsyncGenerator<T> {
  for (const value of values) {
    yield value;
  }
};
