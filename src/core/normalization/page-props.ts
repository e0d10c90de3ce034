/**
 * Loosely-shaped products found in generic page props
 */

import { mapStockFlag } from "../product/availability";
import { joinCategoryPath } from "../product/category";
import { parsePrice } from "../product/price";
import type { NormalizedFields, RecordContext } from "../product/record";
import type { Availability, RawProduct } from "../types/product";
import { asNumber, firstString, isRecord } from "../utils/json";
import { resolveLocation } from "../utils/url";

/** Boolean `inStock` wins; then free-text availability; otherwise unknown */
export function parseStockStatus(inStock: unknown, availability: unknown): Availability {
  if (typeof inStock === "boolean") return mapStockFlag(inStock);
  if (typeof availability === "string") {
    const v = availability.toLowerCase();
    if (v.includes("in") && v.includes("stock")) return "in_stock";
    if (v.includes("out")) return "out_of_stock";
  }
  return "unknown";
}

export function normalizePagePropsProduct(raw: RawProduct, ctx: RecordContext): NormalizedFields {
  const price = isRecord(raw.price) ? raw.price.amount ?? raw.price.value : raw.price;
  return {
    externalId: firstString(raw.id, raw.productId, raw.code),
    name: firstString(raw.name, raw.productName, raw.title),
    brand: firstString(raw.brand),
    sizeText: firstString(raw.size, raw.packageSize),
    price: parsePrice(price),
    unitPrice: asNumber(raw.unitPrice),
    unitPriceUom: firstString(raw.unitPriceUom),
    imageUrl: firstString(raw.imageUrl, raw.image),
    categoryPath: firstString(raw.category, raw.categoryPath) ?? joinCategoryPath(raw.breadcrumbs),
    availability: parseStockStatus(raw.inStock, raw.availability),
    sourceUrl: resolveLocation(ctx.baseUrl, firstString(raw.url, raw.link)),
    rawSource: { kind: "embedded-json", data: raw },
  };
}
