import { buildRecord, type NormalizedFields, type RecordContext } from "../product/record";
import type { ProductRecord, RawProduct } from "../types/product";

export * from "./dom-tile";
export * from "./linked-data";
export * from "./page-props";
export * from "./page-state";
export * from "./search-hit";

export type Normalizer = (raw: RawProduct, ctx: RecordContext) => NormalizedFields;

export function toRecords(
  products: readonly RawProduct[],
  normalize: Normalizer,
  ctx: RecordContext,
): ProductRecord[] {
  return products.map((raw) => buildRecord(normalize(raw, ctx), ctx));
}
