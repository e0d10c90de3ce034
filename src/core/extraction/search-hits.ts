/**
 * Hosted search index responses (`results[0].hits`)
 */

import type { ExtractionResult, ExtractionStrategy, PaginationInfo } from "../types/extraction";
import { asNumber, asRecordArray, getPath } from "../utils/json";

/** The index pages from 0; the rest of the pipeline counts from 1 */
export function searchPagination(response: unknown): PaginationInfo | null {
  const result = getPath(response, ["results", 0]);
  const page = asNumber(getPath(result, ["page"]));
  const nbPages = asNumber(getPath(result, ["nbPages"]));
  if (page == null && nbPages == null) return null;
  const currentPage = page != null ? page + 1 : null;
  return {
    hasMore: currentPage != null && nbPages != null ? currentPage < nbPages : null,
    currentPage,
    totalPages: nbPages,
  };
}

export const searchHitsStrategy: ExtractionStrategy<unknown> = {
  name: "search-hits",
  kind: "search-api",
  extract(response): ExtractionResult | null {
    const hits = asRecordArray(getPath(response, ["results", 0, "hits"]));
    if (hits.length === 0) return null;
    return { kind: "search-api", strategy: "search-hits", products: hits, pagination: searchPagination(response) };
  },
};
