import type { FastifyPluginAsync } from "fastify";

import type { GallerySnapshot } from "../gallery/build.js";
import {
  ARCHIVE_DOWNLOAD_NAME,
  ARCHIVE_ROUTE_KEY,
} from "../gallery/route-keys.js";
import { renderListingPage } from "../lib/listing-page.js";

const IMMUTABLE_CACHE_CONTROL = "public, max-age=31536000, immutable";

export interface GalleryRouteOptions {
  snapshot: GallerySnapshot;
  title: string;
}

export const galleryRoutes: FastifyPluginAsync<GalleryRouteOptions> = async (
  app,
  { snapshot, title },
) => {
  // The presentation list never changes after the build, so render once.
  const listingPage = renderListingPage(snapshot.presentation, {
    title,
    archiveHref: ARCHIVE_ROUTE_KEY,
  });

  app.get("/", async (_request, reply) =>
    reply.type("text/html; charset=utf-8").send(listingPage),
  );

  app.get<{ Params: { "*": string } }>("/*", async (request, reply) => {
    const routeKey = `/${request.params["*"]}`;
    const asset = snapshot.assets.get(routeKey);
    if (!asset) {
      return reply.status(404).send({ ok: false, error: "not_found" });
    }

    reply.header("cache-control", IMMUTABLE_CACHE_CONTROL);
    if (routeKey === ARCHIVE_ROUTE_KEY) {
      reply.header(
        "content-disposition",
        `attachment; filename="${ARCHIVE_DOWNLOAD_NAME}"`,
      );
    }
    return reply.type(asset.contentType).send(asset.bytes);
  });
};
