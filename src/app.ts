import rateLimit from "@fastify/rate-limit";
import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";

import { env } from "./config/env.js";
import type { GallerySnapshot } from "./gallery/build.js";
import { galleryRoutes } from "./routes/gallery.js";
import { healthRoutes } from "./routes/health.js";

export interface CreateAppOptions {
  logger: FastifyBaseLogger;
  title?: string;
  rateLimitMax?: number;
  rateLimitTimeWindow?: string;
}

const clientStatusCode = (error: unknown): number | undefined => {
  if (
    error instanceof Error &&
    "statusCode" in error &&
    typeof error.statusCode === "number" &&
    error.statusCode >= 400 &&
    error.statusCode < 500
  ) {
    return error.statusCode;
  }
  return undefined;
};

/** Serve a finished gallery snapshot. The snapshot is only ever read here. */
export const createApp = async (
  snapshot: GallerySnapshot,
  options: CreateAppOptions,
): Promise<FastifyInstance> => {
  const app = Fastify({
    loggerInstance: options.logger,
    requestIdHeader: "x-request-id",
  });

  await app.register(rateLimit, {
    max: options.rateLimitMax ?? env.RATE_LIMIT_MAX,
    timeWindow: options.rateLimitTimeWindow ?? env.RATE_LIMIT_TIME_WINDOW,
  });

  app.setErrorHandler(async (error, request, reply) => {
    // Let plugin-set status codes (e.g. 429 from @fastify/rate-limit) pass through.
    const statusCode = clientStatusCode(error);
    if (statusCode !== undefined && error instanceof Error) {
      return reply.status(statusCode).send({ ok: false, error: error.message });
    }

    request.log.error({ err: error }, "unhandled request error");
    return reply.status(500).send({
      ok: false,
      error: "internal_error",
    });
  });

  await app.register(healthRoutes, { snapshot });
  await app.register(galleryRoutes, {
    snapshot,
    title: options.title ?? "Gallery",
  });

  return app;
};
