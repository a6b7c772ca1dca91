const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T\s]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;
const DAY_FIRST_PATTERN = /^(\d{1,2})[\/\-](\d{1,2})[\/\-](\d{4})(?:\s+\d{1,2}:\d{2}(?::\d{2})?)?$/;

function toIsoDate(year: string, month: string, day: string): string | null {
  const y = Number.parseInt(year, 10);
  const m = Number.parseInt(month, 10);
  const d = Number.parseInt(day, 10);
  const date = new Date(Date.UTC(y, m - 1, d));
  if (date.getUTCFullYear() !== y || date.getUTCMonth() !== m - 1 || date.getUTCDate() !== d) {
    return null;
  }
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

/**
 * Parses `dd-mm-yyyy` or `dd/mm/yyyy` (optionally followed by a time) into `YYYY-MM-DD`.
 */
export function parseDayFirstDate(dateText: string): string | null {
  const match = dateText.trim().match(DAY_FIRST_PATTERN);
  if (!match) return null;
  return toIsoDate(match[3], match[2], match[1]);
}

/**
 * Accepts ISO dates and timestamps as well as day-first dates.
 */
export function normalizeDateText(dateText: string | null): string | null {
  if (!dateText) return null;
  const trimmed = dateText.trim();
  const isoMatch = trimmed.match(ISO_DATE_PATTERN);
  if (isoMatch) {
    return toIsoDate(isoMatch[1], isoMatch[2], isoMatch[3]);
  }
  return parseDayFirstDate(trimmed);
}

export function formatDayFirst(isoDate: string, separator: "-" | "/"): string {
  const [year, month, day] = isoDate.split("-");
  return [day, month, year].join(separator);
}
