/**
 * schema.org Product nodes
 */

import { mapSchemaAvailability } from "../product/availability";
import { parsePrice } from "../product/price";
import type { NormalizedFields, RecordContext } from "../product/record";
import type { RawProduct } from "../types/product";
import { asString, firstString, isRecord } from "../utils/json";
import { resolveLocation } from "../utils/url";

function firstOffer(offers: unknown): Record<string, unknown> {
  if (Array.isArray(offers)) return offers.find(isRecord) ?? {};
  return isRecord(offers) ? offers : {};
}

function imageOf(image: unknown): string | null {
  if (Array.isArray(image)) return imageOf(image[0]);
  if (isRecord(image)) return asString(image.url);
  return asString(image);
}

export function normalizeLinkedDataProduct(raw: RawProduct, ctx: RecordContext): NormalizedFields {
  const offer = firstOffer(raw.offers);
  const brand = raw.brand;
  return {
    externalId: firstString(raw.sku, raw.gtin13, raw.gtin12, raw.productID),
    name: asString(raw.name),
    brand: isRecord(brand) ? asString(brand.name) : asString(brand),
    // Descriptions carry the package size on some storefronts and marketing copy on others
    sizeText: asString(raw.description),
    deriveUnitPrice: false,
    price: parsePrice(offer.price ?? offer.lowPrice),
    currency: asString(offer.priceCurrency),
    imageUrl: imageOf(raw.image),
    categoryPath: asString(raw.category),
    availability: mapSchemaAvailability(offer.availability),
    sourceUrl: resolveLocation(ctx.baseUrl, firstString(raw.url, offer.url)),
    rawSource: { kind: "linked-data", data: raw },
  };
}
