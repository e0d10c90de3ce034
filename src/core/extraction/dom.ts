/**
 * DOM tile scraping, the last resort of every chain
 */

import type { Cheerio } from "cheerio";
import { isText, type Element } from "domhandler";
import type { ExtractionResult, ExtractionStrategy, PaginationInfo } from "../types/extraction";
import type { RawProduct } from "../types/product";
import { cleanText } from "../product/text";
import type { HtmlDocument } from "./html";

/** Tile containers, most specific first; the first selector with any match is used */
export const DEFAULT_TILE_SELECTORS = [
  '[data-testid="product-tile"]',
  '[data-testid="product-card"]',
  '[data-component="product-tile"]',
  ".product-tile",
  '[class*="ProductTile"]',
  '[class*="ProductCard"]',
  'article[class*="product" i]',
  'div[class*="product-item" i]',
  '[data-testid*="product"]',
];

export const FIELD_SELECTORS = {
  name: [
    '[data-testid="product-title"]',
    '[class*="product-title" i]',
    '[class*="ProductTitle" i]',
    '[class*="product-name" i]',
    '[class*="ProductName" i]',
    "h2",
    "h3",
    'span[class*="name" i]',
    'div[class*="title" i]',
  ],
  price: [
    '[data-testid="product-price"]',
    '[class*="price" i]',
    'span[class*="amount" i]',
    'div[class*="cost" i]',
  ],
  brand: ['[data-testid="product-brand"]', '[class*="brand" i]'],
  size: ['[data-testid="product-package-size"]', '[class*="package-size" i]', '[class*="size" i]'],
  image: ["img"],
  link: ['a[href*="product"]', "a[href]"],
} as const;

export const DEFAULT_NEXT_PAGE_SELECTORS = [
  'a[rel="next"]',
  '[data-testid="pagination-next"]',
  'button[aria-label*="next" i]',
  'a[aria-label*="next" i]',
  '[class*="pagination" i] [class*="next" i]',
];

const ID_ATTRIBUTES = ["data-product-id", "data-id", "data-sku"] as const;

/** Text node contents, trimmed, blanks dropped: the tile's visible lines in document order */
export function textLines(el: Cheerio<Element>): string[] {
  const lines: string[] = [];
  el.find("*")
    .addBack()
    .contents()
    .each((_, node) => {
      if (!isText(node)) return;
      const line = cleanText(node.data);
      if (line) lines.push(line);
    });
  return lines;
}

function firstText(tile: Cheerio<Element>, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const text = cleanText(tile.find(selector).first().text());
    if (text) return text;
  }
  return null;
}

function firstAttr(tile: Cheerio<Element>, selectors: readonly string[], attrs: readonly string[]): string | null {
  for (const selector of selectors) {
    const el = tile.find(selector).first();
    if (el.length === 0) continue;
    for (const attr of attrs) {
      const value = el.attr(attr)?.trim();
      if (value) return value;
    }
  }
  return null;
}

/** Explicit data attribute on the tile, else the trailing number of the product link */
function tileId(tile: Cheerio<Element>, href: string | null): string | null {
  for (const attr of ID_ATTRIBUTES) {
    const value = tile.attr(attr)?.trim();
    if (value) return value;
  }
  const m = href ? /(\d+)\/?$/.exec(href.split(/[?#]/)[0]) : null;
  return m ? m[1] : null;
}

export function readTile(tile: Cheerio<Element>): RawProduct {
  const href = firstAttr(tile, FIELD_SELECTORS.link, ["href"]);
  return {
    id: tileId(tile, href),
    name: firstText(tile, FIELD_SELECTORS.name) ?? textLines(tile)[0] ?? null,
    priceText: firstText(tile, FIELD_SELECTORS.price),
    brand: firstText(tile, FIELD_SELECTORS.brand),
    sizeText: firstText(tile, FIELD_SELECTORS.size),
    imageUrl: firstAttr(tile, FIELD_SELECTORS.image, ["src", "data-src"]),
    href,
    text: textLines(tile).join("\n"),
  };
}

export function domPagination(doc: HtmlDocument, selectors: readonly string[]): PaginationInfo {
  for (const selector of selectors) {
    const el = doc.$(selector).first();
    if (el.length === 0) continue;
    const disabled = el.attr("disabled") != null || el.attr("aria-disabled") === "true";
    return { hasMore: !disabled, currentPage: null, totalPages: null };
  }
  return { hasMore: false, currentPage: null, totalPages: null };
}

export interface DomStrategyOptions {
  tileSelectors?: readonly string[];
  nextPageSelectors?: readonly string[];
}

export function createDomStrategy(options: DomStrategyOptions = {}): ExtractionStrategy<HtmlDocument> {
  const tileSelectors = options.tileSelectors ?? DEFAULT_TILE_SELECTORS;
  const nextSelectors = options.nextPageSelectors ?? DEFAULT_NEXT_PAGE_SELECTORS;
  return {
    name: "dom",
    kind: "dom",
    extract(doc): ExtractionResult | null {
      for (const selector of tileSelectors) {
        const tiles = doc.$<Element, string>(selector);
        if (tiles.length === 0) continue;
        const products = tiles.toArray().map((el) => readTile(doc.$(el)));
        return {
          kind: "dom",
          strategy: `dom/${selector}`,
          products,
          pagination: domPagination(doc, nextSelectors),
        };
      }
      return null;
    },
  };
}
