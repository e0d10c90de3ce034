import { mapAvailabilityText } from "../product/availability";
import { parsePriceText } from "../product/price";
import type { NormalizedFields, RecordContext } from "../product/record";
import type { RawProduct } from "../types/product";
import { asString } from "../utils/json";
import { resolveLocation } from "../utils/url";

/** Tiles read by the DOM strategy; availability only when the tile text says so */
export function normalizeDomTile(raw: RawProduct, ctx: RecordContext): NormalizedFields {
  const href = asString(raw.href);
  return {
    externalId: asString(raw.id),
    name: asString(raw.name),
    brand: asString(raw.brand),
    sizeText: asString(raw.sizeText),
    price: parsePriceText(asString(raw.priceText)),
    imageUrl: resolveLocation(ctx.baseUrl, asString(raw.imageUrl)),
    categoryPath: null,
    availability: mapAvailabilityText(asString(raw.text)),
    sourceUrl: resolveLocation(ctx.baseUrl, href),
    rawSource: { kind: "dom", data: { url: href, id: raw.id } },
  };
}
