/**
 * Storefront page-state product tiles. Two generations of field names are
 * in the wild: productId/title/packageSizing and code/name/packageSize.
 */

import { mapInventoryIndicator } from "../product/availability";
import { joinCategoryPath } from "../product/category";
import { parsePrice } from "../product/price";
import type { NormalizedFields, RecordContext } from "../product/record";
import { parseUnitPriceText } from "../product/unit-price";
import type { Availability, RawProduct } from "../types/product";
import { asNumber, asRecordArray, asString, firstString, getPath, isRecord } from "../utils/json";
import { resolveLocation } from "../utils/url";

function tileImage(raw: RawProduct): string | null {
  const [image] = asRecordArray(raw.productImage);
  if (image) return firstString(image.largeUrl, image.mediumUrl, image.imageUrl);
  const assets = raw.imageAssets;
  return isRecord(assets) ? firstString(assets.largeUrl, assets.mediumUrl) : null;
}

/**
 * Tiles without any inventory indicator are treated as in stock: the
 * storefront only renders purchasable tiles in search and category grids.
 */
function tileAvailability(raw: RawProduct): Availability {
  const indicator = firstString(raw.inventoryIndicator, getPath(raw, ["inventory", "indicator"]));
  return indicator ? mapInventoryIndicator(indicator) : "in_stock";
}

/** Explicit `pricing.unitPrice`, else the "$0.43/100ml" tail of `packageSizing` */
function tileUnitPrice(raw: RawProduct): { unitPrice: number | null; uom: string | null } {
  const pricing = isRecord(raw.pricing) ? raw.pricing : {};
  const explicit = asNumber(pricing.unitPrice);
  if (explicit != null) return { unitPrice: explicit, uom: asString(pricing.unit) };
  const parsed = parseUnitPriceText(asString(raw.packageSizing));
  return parsed ? { unitPrice: parsed.unitPrice, uom: parsed.uom } : { unitPrice: null, uom: null };
}

export function normalizePageStateTile(raw: RawProduct, ctx: RecordContext): NormalizedFields {
  const pricing = isRecord(raw.pricing) ? raw.pricing : {};
  const { unitPrice, uom } = tileUnitPrice(raw);
  const sizing = asString(raw.packageSizing);

  return {
    externalId: firstString(raw.productId, raw.code),
    name: firstString(raw.title, raw.name),
    brand: asString(raw.brand),
    // "1 l, $0.43/100ml": the size is the part before the unit price
    sizeText: sizing ? sizing.split(",")[0].trim() || sizing : asString(raw.packageSize),
    price: parsePrice(pricing.price),
    unitPrice,
    unitPriceUom: uom,
    imageUrl: tileImage(raw),
    categoryPath: joinCategoryPath(raw.breadcrumbs),
    availability: tileAvailability(raw),
    sourceUrl: resolveLocation(ctx.baseUrl, asString(raw.link)),
    rawSource: { kind: "embedded-json", data: raw },
  };
}
