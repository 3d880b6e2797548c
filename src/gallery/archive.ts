import { Zip, ZipPassThrough } from "fflate";

import { InvariantError } from "../lib/errors.js";

/**
 * Incremental zip writer with a single owner. Entries are stored rather than
 * deflated since gallery originals are already-compressed JPEGs.
 */
export class ArchiveBuilder {
  private readonly zip: Zip;
  private readonly chunks: Uint8Array[] = [];
  private readonly names = new Set<string>();
  private streamError: Error | undefined;
  private streamEnded = false;
  private finalized = false;

  constructor() {
    this.zip = new Zip((error, chunk, final) => {
      if (error) {
        this.streamError = error;
        return;
      }
      this.chunks.push(chunk);
      if (final) {
        this.streamEnded = true;
      }
    });
  }

  get entryCount(): number {
    return this.names.size;
  }

  append(name: string, bytes: Uint8Array): void {
    if (this.finalized) {
      throw new InvariantError(`archive append after finalize: "${name}"`);
    }
    if (this.names.has(name)) {
      throw new InvariantError(`duplicate archive entry: "${name}"`);
    }
    this.names.add(name);

    const entry = new ZipPassThrough(name);
    this.zip.add(entry);
    entry.push(bytes, true);
    this.throwIfStreamFailed();
  }

  finalize(): Buffer {
    if (this.finalized) {
      throw new InvariantError("archive finalized twice");
    }
    this.finalized = true;

    this.zip.end();
    this.throwIfStreamFailed();
    if (!this.streamEnded) {
      throw new InvariantError("archive stream did not end after finalize");
    }

    return Buffer.concat(this.chunks);
  }

  private throwIfStreamFailed(): void {
    if (this.streamError) {
      throw this.streamError;
    }
  }
}
