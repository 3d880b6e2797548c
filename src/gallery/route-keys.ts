export const ARCHIVE_ROUTE_KEY = "/gallery.zip";
export const ARCHIVE_DOWNLOAD_NAME = "gallery.zip";
export const PREVIEW_EXTENSION = ".webp";

export const fullRouteKey = (fileName: string): string => `/${fileName}`;

export const previewRouteKey = (displayName: string): string =>
  `/${displayName}${PREVIEW_EXTENSION}`;
