import type { FastifyPluginAsync } from "fastify";

import type { GallerySnapshot } from "../gallery/build.js";

export interface HealthRouteOptions {
  snapshot: GallerySnapshot;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (
  app,
  { snapshot },
) => {
  app.get("/healthz", async () => ({
    ok: true,
    service: "gallery",
    images: snapshot.presentation.length,
    timestamp: new Date().toISOString(),
  }));
};
