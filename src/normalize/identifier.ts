export interface TaxId {
  body: string;
  checkDigit: string | null;
}

/**
 * Splits a displayed tax id (`76.123.456-7`, `RUT: 5.126.663-K`, `76123456`) into its
 * numeric body and check digit.
 */
export function parseTaxId(text: string): TaxId | null {
  const cleaned = text
    .trim()
    .replace(/^R\.?U\.?T\.?\s*:?\s*/i, "")
    .replace(/[.\s]/g, "")
    .toUpperCase();

  const withCheckDigit = cleaned.match(/^(\d+)-([0-9K])$/);
  if (withCheckDigit) {
    return { body: withCheckDigit[1], checkDigit: withCheckDigit[2] };
  }
  if (/^\d+$/.test(cleaned)) {
    return { body: cleaned, checkDigit: null };
  }
  return null;
}

/**
 * Join key shared by raw records and reference rows: string form, float artifacts
 * (`76123456.0`) and leading zeros removed. Compared as strings, never as numbers.
 */
export function canonicalKey(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  let key = String(value).trim().toUpperCase();
  key = key.replace(/\.0+$/, "");
  if (!key) return null;
  key = key.replace(/^0+/, "");
  return key === "" ? "0" : key;
}
