/**
 * Product record types
 */

export const AVAILABILITY_VALUES = ["in_stock", "out_of_stock", "unknown"] as const;

export type Availability = (typeof AVAILABILITY_VALUES)[number];

/** Where a record's raw payload came from */
export type SourceKind = "embedded-json" | "linked-data" | "search-api" | "dom";

export interface RawSource {
  kind: SourceKind;
  data: unknown;
}

/** Opaque per-product dictionary as located by an extractor */
export type RawProduct = Record<string, unknown>;

/**
 * Canonical product row. Field names are the persisted (JSONL/CSV) column
 * names, so they stay snake_case.
 */
export interface ProductRecord {
  store: string;
  site_slug: string;
  store_id: string | null;
  source_url: string;
  scrape_ts: string; // ISO-8601 UTC
  external_id: string | null; // UPC / SKU / product code
  name: string;
  brand: string | null;
  size_text: string | null;
  price: number | null;
  currency: string;
  unit_price: number | null;
  unit_price_uom: string | null;
  image_url: string | null;
  category_path: string | null;
  availability: Availability;
  query_category: string | null;
  raw_source: RawSource | null;
}

/** A record before validation; availability may still be anything upstream sent */
export type RecordCandidate = Omit<ProductRecord, "availability"> & {
  availability: string;
};
