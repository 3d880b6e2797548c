import type { Environment } from "./config/env.js";
import { ConfigError } from "./lib/errors.js";

export interface ServerCliArgs {
  directory?: string;
  host?: string;
  port?: number;
  quality?: number;
  concurrency?: number;
}

export interface ServerConfig {
  directory: string;
  host: string;
  port: number;
  quality: number;
  concurrency: number;
}

const USAGE =
  "Expected --dir=<path>, --host=<host>, --port=<1-65535>, --quality=<1-100>, --concurrency=<n>";

const parseIntegerFlag = (
  flag: string,
  value: string,
  min: number,
  max: number,
): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new ConfigError(
      `invalid ${flag} value "${value}": expected an integer from ${min} to ${max}`,
    );
  }
  return parsed;
};

export const parseServerCliArgs = (argv: string[]): ServerCliArgs => {
  const args: ServerCliArgs = {};

  for (const entry of argv) {
    const separator = entry.indexOf("=");
    const flag = separator === -1 ? entry : entry.slice(0, separator);
    const value = separator === -1 ? "" : entry.slice(separator + 1).trim();

    if (!value) {
      throw new ConfigError(`missing value for ${flag}. ${USAGE}`);
    }

    if (flag === "--dir") {
      args.directory = value;
      continue;
    }

    if (flag === "--host") {
      args.host = value;
      continue;
    }

    if (flag === "--port") {
      args.port = parseIntegerFlag(flag, value, 1, 65535);
      continue;
    }

    if (flag === "--quality") {
      args.quality = parseIntegerFlag(flag, value, 1, 100);
      continue;
    }

    if (flag === "--concurrency") {
      args.concurrency = parseIntegerFlag(
        flag,
        value,
        1,
        Number.MAX_SAFE_INTEGER,
      );
      continue;
    }

    throw new ConfigError(`unknown argument: ${entry}. ${USAGE}`);
  }

  return args;
};

/** Command line flags win over environment values. */
export const resolveServerConfig = (
  args: ServerCliArgs,
  environment: Environment,
): ServerConfig => ({
  directory: args.directory ?? environment.GALLERY_DIR,
  host: args.host ?? environment.HOST,
  port: args.port ?? environment.PORT,
  quality: args.quality ?? environment.PREVIEW_QUALITY,
  concurrency: args.concurrency ?? environment.BUILD_CONCURRENCY,
});
