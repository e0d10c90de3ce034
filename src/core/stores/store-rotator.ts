/**
 * Store contexts to fan a query out over (regional pricing)
 */

import type { StoreLocation, StoreMode, StoreRotationConfig } from "../types/config";
import type { Logger } from "../utils/logger";

export interface StoreRotatorStatus {
  mode: StoreMode;
  total: number;
  currentIndex: number;
  current: StoreLocation | null;
}

export class StoreRotator {
  private readonly stores: StoreLocation[];
  private readonly logger: Logger;
  private readonly random: () => number;
  private index = 0;

  constructor(
    private readonly config: StoreRotationConfig,
    options: { logger: Logger; random?: () => number },
  ) {
    this.stores = [...config.stores];
    this.logger = options.logger.child({ component: "store-rotator" });
    this.random = options.random ?? Math.random;
  }

  get size(): number {
    return this.stores.length;
  }

  /** all: every store; sample: random subset (default half); single: the first */
  getStoresForQuery(): StoreLocation[] {
    if (this.stores.length === 0) return [];
    switch (this.config.mode) {
      case "all":
        return [...this.stores];
      case "single":
        return [this.stores[0]];
      case "sample": {
        const size = Math.min(
          this.config.sampleSize ?? Math.max(1, Math.floor(this.stores.length / 2)),
          this.stores.length,
        );
        const picked = this.shuffled().slice(0, size);
        this.logger.debug({ stores: picked.map((s) => s.id) }, "Sampled stores");
        return picked;
      }
    }
  }

  private shuffled(): StoreLocation[] {
    const copy = [...this.stores];
    for (let i = copy.length - 1; i > 0; i--) {
      const j = Math.floor(this.random() * (i + 1));
      [copy[i], copy[j]] = [copy[j], copy[i]];
    }
    return copy;
  }

  getStoresByCity(city: string): StoreLocation[] {
    const c = city.toLowerCase();
    return this.stores.filter((s) => s.city.toLowerCase() === c);
  }

  getStoresByProvince(province: string): StoreLocation[] {
    const p = province.toLowerCase();
    return this.stores.filter((s) => s.province.toLowerCase() === p);
  }

  current(): StoreLocation | null {
    return this.stores[this.index] ?? null;
  }

  /** Cycles to the next store */
  rotate(): StoreLocation | null {
    if (this.stores.length === 0) return null;
    this.index = (this.index + 1) % this.stores.length;
    const store = this.stores[this.index];
    this.logger.info({ storeId: store.id, store: store.name }, "Rotated store");
    return store;
  }

  reset(): void {
    this.index = 0;
  }

  getStatus(): StoreRotatorStatus {
    return {
      mode: this.config.mode,
      total: this.stores.length,
      currentIndex: this.index,
      current: this.current(),
    };
  }
}
