/**
 * Embedded page-state (`__NEXT_DATA__`) extraction. The storefront's internal
 * schema moves; paths are tried newest first.
 */

import type { ExtractionResult, ExtractionStrategy, PaginationInfo } from "../types/extraction";
import type { RawProduct } from "../types/product";
import { asBoolean, asNumber, asRecordArray, getPath, isRecord, type JsonObject } from "../utils/json";
import { readScriptJson, type HtmlDocument } from "./html";

export const NEXT_DATA_SELECTOR = "script#__NEXT_DATA__";

type DataRoot = "initialSearchData" | "initialCategoryData";

export interface PageStatePath {
  name: string;
  root: DataRoot;
  /** "layout": tiles inside layout sections; "legacy": a flat `products` list */
  shape: "layout" | "legacy";
}

export const PAGE_STATE_PATHS: readonly PageStatePath[] = [
  { name: "search-layout", root: "initialSearchData", shape: "layout" },
  { name: "search-legacy", root: "initialSearchData", shape: "legacy" },
  { name: "category-layout", root: "initialCategoryData", shape: "layout" },
  { name: "category-legacy", root: "initialCategoryData", shape: "legacy" },
];

export function readPageProps(doc: HtmlDocument): JsonObject | null {
  const pageProps = getPath(readScriptJson(doc, NEXT_DATA_SELECTOR), ["props", "pageProps"]);
  return isRecord(pageProps) ? pageProps : null;
}

/**
 * `layout.sections` is either keyed by section name or a plain list. In the
 * keyed form the main content collection is the one that carries tiles.
 */
function layoutSections(layout: unknown): JsonObject[] {
  const sections = getPath(layout, ["sections"]);
  if (Array.isArray(sections)) return asRecordArray(sections);
  if (!isRecord(sections)) return [];
  const main = sections.mainContentCollection;
  if (isRecord(main)) return [main];
  return Object.values(sections).filter(isRecord);
}

function layoutComponentData(dataRoot: unknown): JsonObject[] {
  return layoutSections(getPath(dataRoot, ["layout"])).flatMap((section) =>
    asRecordArray(section.components)
      .map((component) => component.data)
      .filter(isRecord),
  );
}

function productsAt(pageProps: JsonObject, path: PageStatePath): RawProduct[] {
  const dataRoot = pageProps[path.root];
  if (!isRecord(dataRoot)) return [];
  if (path.shape === "legacy") return asRecordArray(dataRoot.products);
  return layoutComponentData(dataRoot).flatMap((data) => asRecordArray(data.productTiles));
}

export function toPagination(value: unknown): PaginationInfo | null {
  if (!isRecord(value)) return null;
  const info: PaginationInfo = {
    hasMore: asBoolean(value.hasMore),
    currentPage: asNumber(value.pageNumber) ?? asNumber(value.currentPage),
    totalPages: asNumber(value.totalPages),
  };
  return info.hasMore == null && info.currentPage == null && info.totalPages == null ? null : info;
}

/** Layout component pagination first, then the data root's own `pagination` */
export function pageStatePagination(pageProps: JsonObject): PaginationInfo | null {
  const dataRoot = isRecord(pageProps.initialSearchData)
    ? pageProps.initialSearchData
    : pageProps.initialCategoryData;
  if (!isRecord(dataRoot)) return null;
  for (const data of layoutComponentData(dataRoot)) {
    const info = toPagination(data.pagination);
    if (info) return info;
  }
  return toPagination(dataRoot.pagination);
}

export const pageStateStrategy: ExtractionStrategy<HtmlDocument> = {
  name: "page-state",
  kind: "embedded-json",
  extract(doc): ExtractionResult | null {
    const pageProps = readPageProps(doc);
    if (!pageProps) return null;
    for (const path of PAGE_STATE_PATHS) {
      const products = productsAt(pageProps, path);
      if (products.length > 0) {
        return {
          kind: "embedded-json",
          strategy: `page-state/${path.name}`,
          products,
          pagination: pageStatePagination(pageProps),
        };
      }
    }
    return null;
  },
};

const PAGE_PROPS_KEYS = ["products", "productList", "searchResults", "categoryProducts", "items"] as const;

/** Generic page props: a product list under a handful of known keys, top level first */
export const pagePropsStrategy: ExtractionStrategy<HtmlDocument> = {
  name: "page-props",
  kind: "embedded-json",
  extract(doc): ExtractionResult | null {
    const pageProps = readPageProps(doc);
    if (!pageProps) return null;
    const containers = [pageProps, pageProps.initialData, pageProps.data].filter(isRecord);
    for (const container of containers) {
      for (const key of PAGE_PROPS_KEYS) {
        const products = asRecordArray(container[key]);
        if (products.length > 0) {
          return {
            kind: "embedded-json",
            strategy: `page-props/${key}`,
            products,
            pagination: toPagination(container.pagination),
          };
        }
      }
    }
    return null;
  },
};
