/**
 * Extraction types
 */

import type { RawProduct, SourceKind } from "./product";

export interface PaginationInfo {
  hasMore: boolean | null;
  currentPage: number | null;
  totalPages: number | null;
}

export interface ExtractionResult {
  kind: SourceKind;
  strategy: string;
  products: RawProduct[];
  pagination: PaginationInfo | null;
}

/** One step of an ordered fallback chain; null or an empty list means "try the next one" */
export interface ExtractionStrategy<P> {
  name: string;
  kind: SourceKind;
  extract(payload: P): ExtractionResult | null;
}
