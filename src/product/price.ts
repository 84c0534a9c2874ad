/** Digits with at most one decimal point, as float parsing accepts them */
const NUMERIC = /^(?:\d+\.?\d*|\.\d+)$/;

/**
 * Parse a price string like "1.234,56" or "€ 2.499,00" into a number.
 * Dots are thousands separators and the comma is the decimal mark.
 * Returns null for empty input or text with no readable number.
 */
export function parsePrice(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const normalized = raw.replace(/\./g, "").replace(/,/g, ".").trim();
  const digits = normalized.replace(/[^\d.]/g, "");
  // "1,2,3" leaves two decimal points behind
  if (!NUMERIC.test(digits)) return null;
  return Number(digits);
}
