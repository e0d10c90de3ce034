/** Lowercase, trim, collapse internal whitespace */
export function normalizeText(value: string | null | undefined): string {
  return (value ?? "").toLowerCase().trim().replace(/\s+/g, " ");
}

/** Trimmed, single-spaced display text; null when blank */
export function cleanText(value: string | null | undefined): string | null {
  if (value == null) return null;
  const s = value.replace(/\s+/g, " ").trim();
  return s ? s : null;
}
