export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

/** Raised when the gallery directory itself cannot be listed. Aborts startup. */
export class GalleryScanError extends Error {
  readonly directory: string;

  constructor(directory: string, options?: ErrorOptions) {
    super(`unable to list gallery directory "${directory}"`, options);
    this.name = "GalleryScanError";
    this.directory = directory;
  }
}

/** Invalid command line or environment configuration. */
export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigError";
  }
}

/**
 * A broken build-pipeline invariant: duplicate archive entries, writes after
 * a freeze, a miscounted barrier. Never caused by the contents of the
 * gallery directory.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}
