import { pino, type Logger } from "pino";

import { env } from "../config/env.js";

export type { Logger };

export const createLogger = (level: string = env.LOG_LEVEL): Logger =>
  pino({
    level,
    base: { service: "gallery" },
  });
