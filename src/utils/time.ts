const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function nowUtcIsoSeconds(now: Date = new Date()): string {
  const iso = now.toISOString();
  return iso.replace(/\.\d{3}Z$/, "Z");
}

export function nowUtcIsoFileSafe(now: Date = new Date()): string {
  return nowUtcIsoSeconds(now).replace(/:/g, "-");
}

/**
 * Calendar date (`YYYY-MM-DD`) of `now` as seen in `timeZone`.
 */
export function calendarDate(now: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).formatToParts(now);
  const pick = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? "";
  return `${pick("year")}-${pick("month")}-${pick("day")}`;
}

function isoDateToUtcMs(isoDate: string): number {
  const [year, month, day] = isoDate.split("-").map((part) => Number.parseInt(part, 10));
  return Date.UTC(year, month - 1, day);
}

export function addDays(isoDate: string, days: number): string {
  return new Date(isoDateToUtcMs(isoDate) + days * MS_PER_DAY).toISOString().slice(0, 10);
}

/** 0 = Monday … 6 = Sunday */
export function weekdayIndex(isoDate: string): number {
  const day = new Date(isoDateToUtcMs(isoDate)).getUTCDay();
  return (day + 6) % 7;
}
