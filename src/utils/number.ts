/**
 * Integer written with thousands separators (`1.234`, `1,234`, `1 234`).
 */
export function parseGroupedInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!/^\d{1,3}(?:[.,\s]\d{3})*$/.test(trimmed) && !/^\d+$/.test(trimmed)) {
    return null;
  }
  const value = Number.parseInt(trimmed.replace(/[.,\s]/g, ""), 10);
  return Number.isFinite(value) ? value : null;
}
