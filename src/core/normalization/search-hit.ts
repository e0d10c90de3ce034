/**
 * Hosted search index hits
 */

import { mapStockFlag } from "../product/availability";
import { joinCategoryPath, mostSpecificCategory } from "../product/category";
import { parsePrice } from "../product/price";
import type { NormalizedFields, RecordContext } from "../product/record";
import type { RawProduct } from "../types/product";
import { asNumber, asString, firstString } from "../utils/json";
import { resolveLocation } from "../utils/url";

/** UPC fields can hold a comma-separated list; the first entry is the id */
function hitExternalId(raw: RawProduct): string | null {
  const id = firstString(raw.upc, raw.gtin, raw.articleNumber);
  return id ? id.split(",")[0].trim() || null : null;
}

function hitSize(raw: RawProduct): string | null {
  const size = firstString(raw.weight, raw.size, raw.priceQuantity);
  const uom = asString(raw.uom);
  return size && uom ? `${size} ${uom}` : size;
}

function hitImage(raw: RawProduct): string | null {
  const images = raw.images;
  if (Array.isArray(images)) return asString(images[0]);
  return firstString(images, raw.image);
}

export function normalizeSearchHit(raw: RawProduct, ctx: RecordContext): NormalizedFields {
  const unitPrice = asNumber(raw.unitPrice);
  const slug = asString(raw.pageSlug);
  return {
    externalId: hitExternalId(raw),
    name: firstString(raw.name, raw.title, slug),
    brand: firstString(raw.brand, raw.manufacturer),
    sizeText: hitSize(raw),
    price: parsePrice(raw.price),
    unitPrice,
    unitPriceUom: unitPrice != null ? asString(raw.uom) : null,
    imageUrl: hitImage(raw),
    categoryPath: mostSpecificCategory(raw.hierarchicalCategories) ?? joinCategoryPath(raw.categories),
    // No stock flag on the hit means no signal
    availability: mapStockFlag(raw.inStock),
    sourceUrl: slug ? resolveLocation(ctx.baseUrl, `/product/${slug}`) : ctx.baseUrl,
    rawSource: { kind: "search-api", data: raw },
  };
}
