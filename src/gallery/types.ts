export interface SourceImage {
  /** Position in the directory scan; restores order after concurrent work. */
  ordinal: number;
  path: string;
  fileName: string;
  displayName: string;
}

export interface ImageSize {
  width: number;
  height: number;
}

export interface TranscodeSuccess {
  ok: true;
  ordinal: number;
  fileName: string;
  displayName: string;
  previewBytes: Buffer;
  previewSize: ImageSize;
  fullBytes: Buffer;
}

export interface TranscodeFailure {
  ok: false;
  ordinal: number;
  fileName: string;
  displayName: string;
  error: string;
}

export type TranscodeResult = TranscodeSuccess | TranscodeFailure;

export type TranscodeFn = (source: SourceImage) => Promise<TranscodeResult>;

export interface SkippedEntry {
  fileName: string;
  reason: string;
}

export interface ScanResult {
  directory: string;
  images: SourceImage[];
  count: number;
  skipped: SkippedEntry[];
}

export type ContentType = "image/jpeg" | "image/webp" | "application/zip";

export interface Asset {
  readonly bytes: Buffer;
  readonly contentType: ContentType;
}

export interface PresentationEntry {
  readonly displayName: string;
  readonly fileName: string;
  readonly previewRouteKey: string;
  readonly fullRouteKey: string;
  readonly previewWidth: number;
  readonly previewHeight: number;
}

export interface BuildStats {
  scanned: number;
  succeeded: number;
  failed: number;
  skippedEntries: number;
  archiveBytes: number;
  elapsedMs: number;
}
