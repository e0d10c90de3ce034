import { describe, expect, it } from "vitest";
import { silentLogger } from "../../__tests__/helpers";
import { DEFAULT_STORES } from "../../config/defaults";
import type { StoreRotationConfig } from "../../types/config";
import { StoreRotator } from "../store-rotator";

const config = (overrides: Partial<StoreRotationConfig> = {}): StoreRotationConfig => ({
  enabled: true,
  mode: "all",
  sampleSize: null,
  stores: DEFAULT_STORES,
  ...overrides,
});

describe("StoreRotator", () => {
  it("returns every store in all mode", () => {
    expect(new StoreRotator(config(), { logger: silentLogger() }).getStoresForQuery()).toHaveLength(8);
  });

  it("returns just the first store in single mode", () => {
    const stores = new StoreRotator(config({ mode: "single" }), { logger: silentLogger() }).getStoresForQuery();
    expect(stores).toEqual([DEFAULT_STORES[0]]);
  });

  it("samples half the list by default, without repeats", () => {
    const rotator = new StoreRotator(config({ mode: "sample" }), { logger: silentLogger(), random: () => 0.3 });
    const picked = rotator.getStoresForQuery();
    expect(picked).toHaveLength(4);
    expect(new Set(picked.map((s) => s.id)).size).toBe(4);
  });

  it("honours an explicit sample size", () => {
    const rotator = new StoreRotator(config({ mode: "sample", sampleSize: 20 }), { logger: silentLogger() });
    expect(rotator.getStoresForQuery()).toHaveLength(8);
  });

  it("filters by city and province", () => {
    const rotator = new StoreRotator(config(), { logger: silentLogger() });
    expect(rotator.getStoresByCity("calgary").map((s) => s.id)).toEqual(["0315", "0348", "0325"]);
    expect(rotator.getStoresByProvince("ab")).toHaveLength(8);
  });

  it("cycles and resets", () => {
    const rotator = new StoreRotator(config(), { logger: silentLogger() });
    expect(rotator.rotate()?.id).toBe("0315");
    expect(rotator.getStatus()).toMatchObject({ mode: "all", total: 8, currentIndex: 1 });
    rotator.reset();
    expect(rotator.current()?.id).toBe("0320");
  });

  it("returns nothing for an empty list", () => {
    expect(new StoreRotator(config({ stores: [] }), { logger: silentLogger() }).getStoresForQuery()).toEqual([]);
  });
});
