/**
 * Parses a positive integer: digits only (surrounding whitespace allowed),
 * no sign, no fraction, greater than zero and within the safe integer range.
 * Returns null otherwise.
 */
export function parsePositiveInt(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const value = Number.parseInt(trimmed, 10);
  return value > 0 && Number.isSafeInteger(value) ? value : null;
}
