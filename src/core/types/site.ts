/**
 * Site adapter contract
 */

import type { PlatformKind, StoreLocation } from "./config";
import type { PaginationInfo } from "./extraction";
import type { ProductRecord, SourceKind } from "./product";

export type ScrapeMode = "search" | "category" | "product";

export interface PageRequest {
  mode: ScrapeMode;
  /** Search term, category path or product URL */
  target: string;
  /** 1-based */
  page: number;
  store: StoreLocation | null;
}

export interface PageResult {
  url: string;
  records: ProductRecord[];
  /** Products the extractor located, before normalization and validation */
  rawCount: number;
  pagination: PaginationInfo | null;
  source: SourceKind | null;
  strategy: string | null;
}

/** SiteAdapter – one platform strategy instantiated with a site's profile */
export interface SiteAdapter {
  readonly key: string;
  readonly displayName: string;
  readonly platform: PlatformKind;
  fetchPage(request: PageRequest): Promise<PageResult>;
  close(): Promise<void>;
}
