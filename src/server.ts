#!/usr/bin/env node
import path from "node:path";

import { createApp } from "./app.js";
import {
  parseServerCliArgs,
  resolveServerConfig,
  type ServerConfig,
} from "./cli.js";
import { env } from "./config/env.js";
import { buildGallery, type GallerySnapshot } from "./gallery/build.js";
import { createLogger } from "./lib/logger.js";

const logger = createLogger();

const startServer = async (): Promise<void> => {
  let config: ServerConfig;
  try {
    const args = parseServerCliArgs(process.argv.slice(2));
    config = resolveServerConfig(args, env);
  } catch (error) {
    logger.error({ err: error }, "invalid configuration");
    process.exitCode = 1;
    return;
  }

  let snapshot: GallerySnapshot;
  try {
    snapshot = await buildGallery({
      directory: path.resolve(config.directory),
      quality: config.quality,
      concurrency: config.concurrency,
      logger,
    });
  } catch (error) {
    logger.fatal({ err: error }, "gallery build failed");
    process.exitCode = 1;
    return;
  }

  const app = await createApp(snapshot, {
    logger,
    title: path.basename(path.resolve(config.directory)) || "Gallery",
  });

  ["SIGTERM", "SIGINT"].forEach((signal) => {
    process.on(signal, () => {
      void app
        .close()
        .catch((error: unknown) => {
          app.log.error({ err: error }, "graceful shutdown failed");
        })
        .finally(() => {
          process.exit(0);
        });
    });
  });

  try {
    await app.listen({
      host: config.host,
      port: config.port,
    });
  } catch (error) {
    app.log.error({ err: error }, "server startup failed");
    process.exitCode = 1;
  }
};

startServer().catch((error: unknown) => {
  logger.fatal({ err: error }, "server crashed during startup");
  process.exitCode = 1;
});
