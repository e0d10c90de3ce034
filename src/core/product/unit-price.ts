/**
 * Unit-price derivation from a price and a free-text package size
 */

export type UnitOfMeasure = "L" | "kg" | "EA";

export interface Quantity {
  amount: number; // in `uom`
  uom: UnitOfMeasure;
}

export interface UnitPrice {
  unitPrice: number;
  uom: string;
}

/** Source units per base unit */
const UNITS: Record<string, { uom: UnitOfMeasure; perBase: number }> = {
  ml: { uom: "L", perBase: 1000 },
  cl: { uom: "L", perBase: 100 },
  l: { uom: "L", perBase: 1 },
  lt: { uom: "L", perBase: 1 },
  litre: { uom: "L", perBase: 1 },
  litres: { uom: "L", perBase: 1 },
  liter: { uom: "L", perBase: 1 },
  liters: { uom: "L", perBase: 1 },
  g: { uom: "kg", perBase: 1000 },
  gr: { uom: "kg", perBase: 1000 },
  kg: { uom: "kg", perBase: 1 },
  lb: { uom: "kg", perBase: 1 / 0.45359237 },
  lbs: { uom: "kg", perBase: 1 / 0.45359237 },
  ea: { uom: "EA", perBase: 1 },
  each: { uom: "EA", perBase: 1 },
  ct: { uom: "EA", perBase: 1 },
  count: { uom: "EA", perBase: 1 },
  pk: { uom: "EA", perBase: 1 },
  pack: { uom: "EA", perBase: 1 },
  unit: { uom: "EA", perBase: 1 },
  units: { uom: "EA", perBase: 1 },
};

const NUM = String.raw`(\d+(?:[.,]\d+)?)`;
const MULTIPACK = new RegExp(String.raw`(\d+)\s*[x×*]\s*${NUM}\s*([a-z]+)\b`, "i");
const SINGLE = new RegExp(String.raw`${NUM}\s*([a-z]+)\b`, "gi");
/** Upstream unit-price text, ex: "$0.43/100ml" */
const UNIT_PRICE_TEXT = /\$\s*(\d+(?:\.\d+)?)\s*\/\s*(\d*\s*[a-z]+)/i;

/** "1,5" is a decimal comma; "1,000" groups thousands */
const toNumber = (s: string) => Number(/,\d{3}$/.test(s) ? s.replace(",", "") : s.replace(",", "."));

/** Half-up at cents; the nudge absorbs float error such as 2.495 * 100 = 249.49999999999997 */
export const round2 = (n: number): number => Math.round(n * 100 + 1e-9) / 100;

/** "12 x 355 ml" → 4.26 L; "2 L" → 2 L; null when no known unit is present */
export function parseQuantity(sizeText: string | null | undefined): Quantity | null {
  if (!sizeText) return null;
  const text = sizeText.toLowerCase();

  const multi = MULTIPACK.exec(text);
  if (multi) {
    const unit = UNITS[multi[3]];
    if (unit) {
      const amount = (Number(multi[1]) * toNumber(multi[2])) / unit.perBase;
      return amount > 0 ? { amount, uom: unit.uom } : null;
    }
  }

  for (const m of text.matchAll(SINGLE)) {
    const unit = UNITS[m[2]];
    if (!unit) continue;
    const amount = toNumber(m[1]) / unit.perBase;
    return amount > 0 ? { amount, uom: unit.uom } : null;
  }
  return null;
}

/** price / normalized quantity, rounded to cents; null rather than a guess */
export function deriveUnitPrice(price: number | null, sizeText: string | null): UnitPrice | null {
  if (price == null || !Number.isFinite(price)) return null;
  const qty = parseQuantity(sizeText);
  if (!qty) return null;
  return { unitPrice: round2(price / qty.amount), uom: qty.uom };
}

/** Reads an upstream "$0.43/100ml" style unit price */
export function parseUnitPriceText(text: string | null | undefined): UnitPrice | null {
  if (!text) return null;
  const m = UNIT_PRICE_TEXT.exec(text);
  if (!m) return null;
  const unitPrice = Number(m[1]);
  return Number.isFinite(unitPrice) ? { unitPrice, uom: m[2].replace(/\s+/g, "") } : null;
}
