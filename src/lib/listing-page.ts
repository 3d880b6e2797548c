import type { PresentationEntry } from "../gallery/types.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escapeHtml = (value: string): string =>
  value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);

/** Route keys are raw paths; encode each segment for use in an href. */
export const toHref = (routeKey: string): string =>
  routeKey.split("/").map(encodeURIComponent).join("/");

const renderEntry = (entry: PresentationEntry): string =>
  [
    "<figure>",
    `<a href="${escapeHtml(toHref(entry.fullRouteKey))}">`,
    `<img src="${escapeHtml(toHref(entry.previewRouteKey))}" alt="${escapeHtml(entry.displayName)}" width="${entry.previewWidth}" height="${entry.previewHeight}" loading="lazy">`,
    "</a>",
    `<figcaption>${escapeHtml(entry.displayName)}</figcaption>`,
    "</figure>",
  ].join("");

export interface ListingPageOptions {
  title: string;
  archiveHref: string;
}

export const renderListingPage = (
  presentation: readonly PresentationEntry[],
  options: ListingPageOptions,
): string => `<!doctype html>
<html lang="en">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(options.title)}</title>
<style>
body{margin:0 auto;max-width:1200px;padding:1rem;font-family:system-ui,sans-serif;background:#111;color:#eee}
main{display:flex;flex-wrap:wrap;gap:1rem}
figure{margin:0}
img{display:block;max-width:100%;height:auto}
a{color:#9cf}
</style>
</head>
<body>
<header><h1>${escapeHtml(options.title)}</h1><p>${presentation.length} images · <a href="${escapeHtml(toHref(options.archiveHref))}" download>Download all</a></p></header>
<main>
${presentation.map(renderEntry).join("\n")}
</main>
</body>
</html>
`;
