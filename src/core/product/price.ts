/**
 * Price parsing
 */

/** Money-looking token: "1,299.99", "4,99", "5.00", "2" */
const MONEY = String.raw`\d{1,3}(?:,\d{3})+(?:\.\d{2})?|\d+(?:[.,]\d{2})?`;
const PRICE_AFTER_SYMBOL = new RegExp(String.raw`\$\s*(${MONEY})`);
const PRICE_BEFORE_SYMBOL = new RegExp(String.raw`(${MONEY})\s*\$`);
const BARE_PRICE = new RegExp(`(${MONEY})`);

/**
 * Accepts numbers and currency-formatted strings ("$4.99", "4,99 $", "1,234.50").
 * When both separators appear the last one is the decimal point; a lone comma
 * followed by one or two digits is a decimal comma, otherwise a thousands mark.
 */
export function parsePrice(input: unknown): number | null {
  if (typeof input === "number") return Number.isFinite(input) ? input : null;
  if (typeof input !== "string") return null;

  let s = input.replace(/[^\d.,-]/g, "");
  if (!/\d/.test(s)) return null;

  const lastComma = s.lastIndexOf(",");
  const lastDot = s.lastIndexOf(".");
  if (lastComma >= 0 && lastDot >= 0) {
    s = lastComma > lastDot ? s.replace(/\./g, "").replace(",", ".") : s.replace(/,/g, "");
  } else if (lastComma >= 0) {
    const commas = s.split(",").length - 1;
    s = commas === 1 && /,\d{1,2}$/.test(s) ? s.replace(",", ".") : s.replace(/,/g, "");
  }

  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/**
 * Price from a text blob such as a tile's price element. A number next to a
 * currency symbol wins over a bare one, so "2 for $5.00" reads as 5.
 */
export function parsePriceText(text: string | null | undefined): number | null {
  if (!text) return null;
  const clean = text.replace(/\u00a0/g, " ");
  const m = PRICE_AFTER_SYMBOL.exec(clean) ?? PRICE_BEFORE_SYMBOL.exec(clean) ?? BARE_PRICE.exec(clean);
  return m ? parsePrice(m[1]) : null;
}
