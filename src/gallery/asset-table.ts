import { InvariantError } from "../lib/errors.js";
import type { Asset } from "./types.js";

/**
 * Read-only route key lookup. Only `AssetTableBuilder.freeze` creates one,
 * and nothing writes to it afterwards, so concurrent readers need no
 * coordination.
 */
export class AssetTable {
  private readonly assets: ReadonlyMap<string, Asset>;

  /** @internal */
  constructor(assets: ReadonlyMap<string, Asset>) {
    this.assets = assets;
    Object.freeze(this);
  }

  get size(): number {
    return this.assets.size;
  }

  get(routeKey: string): Asset | undefined {
    return this.assets.get(routeKey);
  }

  has(routeKey: string): boolean {
    return this.assets.has(routeKey);
  }

  keys(): string[] {
    return [...this.assets.keys()];
  }
}

export class AssetTableBuilder {
  private readonly assets = new Map<string, Asset>();
  private frozen = false;

  insert(routeKey: string, asset: Asset): void {
    if (this.frozen) {
      throw new InvariantError(`asset insert after freeze: "${routeKey}"`);
    }
    if (this.assets.has(routeKey)) {
      throw new InvariantError(`duplicate asset route key: "${routeKey}"`);
    }
    this.assets.set(routeKey, Object.freeze({ ...asset }));
  }

  /** One-way transition into the serving phase. */
  freeze(): AssetTable {
    if (this.frozen) {
      throw new InvariantError("asset table frozen twice");
    }
    this.frozen = true;
    return new AssetTable(new Map(this.assets));
  }
}
