/**
 * Stock vocabulary → availability enum, one table per source family
 */

import { AVAILABILITY_VALUES, type Availability } from "../types/product";

export function isAvailability(value: string): value is Availability {
  return AVAILABILITY_VALUES.some((v) => v === value);
}

/** Storefront page-state `inventoryIndicator` values ("OUT_OF_STOCK", "LOW_STOCK", ...) */
export function mapInventoryIndicator(value: string): Availability {
  const v = value.toUpperCase();
  if (v.includes("OUT")) return "out_of_stock";
  if (/IN_?STOCK|AVAILABLE|LOW|LIMITED/.test(v)) return "in_stock";
  return "unknown";
}

/** schema.org ItemAvailability, full IRI or bare name */
export function mapSchemaAvailability(value: unknown): Availability {
  if (typeof value !== "string") return "unknown";
  const v = value.toLowerCase().replace(/^https?:\/\/schema\.org\//, "");
  if (v === "instock" || v === "limitedavailability" || v === "instoreonly" || v === "onlineonly") {
    return "in_stock";
  }
  if (v === "outofstock" || v === "soldout" || v === "discontinued") return "out_of_stock";
  return "unknown";
}

/** Free text from a tile or product page */
export function mapAvailabilityText(value: string | null | undefined): Availability {
  if (!value) return "unknown";
  const v = value.toLowerCase();
  if (/out of stock|sold out|unavailable|not available/.test(v)) return "out_of_stock";
  if (/in stock|available|add to cart/.test(v)) return "in_stock";
  return "unknown";
}

/** Boolean-ish stock flags (`inStock: true`, "false") with a text fallback */
export function mapStockFlag(value: unknown): Availability {
  if (value === true) return "in_stock";
  if (value === false) return "out_of_stock";
  if (typeof value === "string") {
    if (/^(true|yes)$/i.test(value)) return "in_stock";
    if (/^(false|no)$/i.test(value)) return "out_of_stock";
    return mapAvailabilityText(value);
  }
  return "unknown";
}
