import { availableParallelism } from "node:os";

import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

export const DEFAULT_PREVIEW_QUALITY = 50;

const environmentSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  HOST: z.string().min(1).default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  GALLERY_DIR: z.string().min(1).default("."),
  PREVIEW_QUALITY: z.coerce
    .number()
    .int()
    .min(1)
    .max(100)
    .default(DEFAULT_PREVIEW_QUALITY),
  BUILD_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1)
    .default(() => availableParallelism()),
  RATE_LIMIT_MAX: z.coerce.number().int().min(1).default(600),
  RATE_LIMIT_TIME_WINDOW: z.string().min(1).default("1 minute"),
});

export type Environment = z.infer<typeof environmentSchema>;

export const parseEnvironment = (
  rawEnv: NodeJS.ProcessEnv = process.env,
): Environment => environmentSchema.parse(rawEnv);

export const env = parseEnvironment();
