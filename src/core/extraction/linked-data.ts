/**
 * schema.org JSON-LD blocks
 */

import type { ExtractionResult, ExtractionStrategy } from "../types/extraction";
import type { RawProduct } from "../types/product";
import { asRecordArray, isRecord, type JsonObject } from "../utils/json";
import type { HtmlDocument } from "./html";

const LIST_TYPES = new Set(["ProductCollection", "ItemList", "OfferCatalog"]);

function typesOf(node: JsonObject): string[] {
  const t = node["@type"];
  if (typeof t === "string") return [t];
  return Array.isArray(t) ? t.filter((x): x is string => typeof x === "string") : [];
}

/** Every top-level node across all ld+json scripts, with arrays and @graph unwrapped */
export function linkedDataNodes(doc: HtmlDocument): JsonObject[] {
  const nodes: JsonObject[] = [];
  doc.$('script[type="application/ld+json"]').each((_, el) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(doc.$(el).text());
    } catch {
      return;
    }
    for (const node of Array.isArray(parsed) ? parsed : [parsed]) {
      if (!isRecord(node)) continue;
      if (Array.isArray(node["@graph"])) nodes.push(...asRecordArray(node["@graph"]));
      else nodes.push(node);
    }
  });
  return nodes;
}

/** Products listed by a collection node; ListItem wrappers are unwrapped */
function listedProducts(node: JsonObject): RawProduct[] {
  return asRecordArray(node.itemListElement)
    .map((entry) => (isRecord(entry.item) ? entry.item : entry))
    .filter((item) => typesOf(item).includes("Product"));
}

export function linkedDataProducts(doc: HtmlDocument): RawProduct[] {
  const products: RawProduct[] = [];
  for (const node of linkedDataNodes(doc)) {
    const types = typesOf(node);
    if (types.includes("Product")) products.push(node);
    else if (types.some((t) => LIST_TYPES.has(t))) products.push(...listedProducts(node));
  }
  return products;
}

export const linkedDataStrategy: ExtractionStrategy<HtmlDocument> = {
  name: "linked-data",
  kind: "linked-data",
  extract(doc): ExtractionResult | null {
    const products = linkedDataProducts(doc);
    return products.length > 0
      ? { kind: "linked-data", strategy: "linked-data", products, pagination: null }
      : null;
  },
};
