/**
 * Record construction and dedup keys
 */

import type { Availability, ProductRecord, RawSource } from "../types/product";
import { utcIso } from "../utils/date";
import { normalizeText } from "./text";
import { deriveUnitPrice } from "./unit-price";

/** Per-page context every normalizer receives */
export interface RecordContext {
  store: string;
  siteSlug: string;
  storeId: string | null;
  currency: string;
  queryCategory: string | null;
  pageUrl: string;
  baseUrl: string;
  scrapedAt: Date;
}

/** What a normalizer pulls out of one raw product */
export interface NormalizedFields {
  externalId: string | null;
  name: string | null;
  brand: string | null;
  sizeText: string | null;
  price: number | null;
  currency?: string | null;
  unitPrice?: number | null;
  unitPriceUom?: string | null;
  /** False when `sizeText` is free prose rather than a package size */
  deriveUnitPrice?: boolean;
  imageUrl: string | null;
  categoryPath: string | null;
  availability: Availability;
  sourceUrl?: string | null;
  rawSource: RawSource;
}

/**
 * Builds the canonical record. An explicit upstream unit price wins;
 * otherwise it is derived from price and size, or left null. Size text
 * flagged with `deriveUnitPrice: false` is stored but never parsed.
 */
export function buildRecord(fields: NormalizedFields, ctx: RecordContext): ProductRecord {
  let unitPrice = fields.unitPrice ?? null;
  let unitPriceUom = unitPrice != null ? fields.unitPriceUom ?? null : null;
  if (unitPrice == null && fields.deriveUnitPrice !== false) {
    const derived = deriveUnitPrice(fields.price, fields.sizeText);
    unitPrice = derived?.unitPrice ?? null;
    unitPriceUom = derived?.uom ?? null;
  }

  return {
    store: ctx.store,
    site_slug: ctx.siteSlug,
    store_id: ctx.storeId,
    source_url: fields.sourceUrl ?? ctx.pageUrl,
    scrape_ts: utcIso(ctx.scrapedAt),
    external_id: fields.externalId,
    name: fields.name ?? "",
    brand: fields.brand,
    size_text: fields.sizeText,
    price: fields.price,
    currency: fields.currency ?? ctx.currency,
    unit_price: unitPrice,
    unit_price_uom: unitPriceUom,
    image_url: fields.imageUrl,
    category_path: fields.categoryPath,
    availability: fields.availability,
    query_category: ctx.queryCategory,
    raw_source: fields.rawSource,
  };
}

type KeyFields = Pick<ProductRecord, "site_slug" | "external_id" | "name" | "size_text" | "store" | "store_id">;

/**
 * `{site}:{external_id}` when the id is known, else
 * `{site}:{name}:{size}:{store}` over normalized text. Multi-store runs append
 * `@{store_id}` so regional prices stay distinct.
 */
export function dedupeKey(record: KeyFields): string {
  const scope = record.store_id ? `@${record.store_id}` : "";
  const id = record.external_id?.trim();
  if (id) return `${record.site_slug}:${id}${scope}`;
  return (
    `${record.site_slug}:${normalizeText(record.name)}:${normalizeText(record.size_text)}` +
    `:${record.store}${scope}`
  );
}
