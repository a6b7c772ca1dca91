import { errorMessage } from "../errors";
import { componentLogger, Logger } from "../logging/logger";
import { formatDayFirst } from "../normalize/date";
import { PartitionedStore } from "../storage/partitionedStore";
import { RecordSource } from "../types/record";
import { addDays, weekdayIndex } from "../utils/time";

export const WEEKDAY_NAMES = ["Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday", "Sunday"] as const;

export type SourceCounts = Record<RecordSource, number>;

export interface WeekDay {
  name: (typeof WEEKDAY_NAMES)[number];
  date: string;
  /** null for today and days still to come */
  counts: SourceCounts | null;
}

/** The seven dates of the reported week. On a Monday that is the previous full week. */
export function weekDates(today: string): string[] {
  const offset = weekdayIndex(today);
  const monday = addDays(today, offset === 0 ? -7 : -offset);
  return WEEKDAY_NAMES.map((_, index) => addDays(monday, index));
}

function emptyCounts(): SourceCounts {
  return { registry: 0, gazette: 0 };
}

export async function collectWeeklyStats(store: PartitionedStore, today: string, logger?: Logger): Promise<WeekDay[]> {
  const log = logger ?? componentLogger("weekly-stats");
  const days: WeekDay[] = [];

  for (const [index, date] of weekDates(today).entries()) {
    const name = WEEKDAY_NAMES[index];
    if (date >= today) {
      days.push({ name, date, counts: null });
      continue;
    }

    const counts = emptyCounts();
    try {
      const table = await store.readEnriched("delivery", date);
      for (const row of table.rows) {
        if (row.source === "registry" || row.source === "gazette") {
          counts[row.source] += 1;
        }
      }
    } catch (error) {
      log.warn({ date, err: errorMessage(error) }, "could not read delivery partition, counting zero");
    }
    days.push({ name, date, counts });
  }

  log.info({ week: days[0]?.date }, "weekly stats collected");
  return days;
}

const COLUMN_WIDTHS = [24, 12, 12, 8] as const;

function formatCount(value: number): string {
  return value.toLocaleString("en-US");
}

function line(cells: string[]): string {
  return cells
    .map((cell, index) => cell.padEnd(COLUMN_WIDTHS[index] ?? 0))
    .join("")
    .trimEnd();
}

/** Fixed-width text table of per-day counts with a weekly total row. */
export function formatWeeklySummary(days: WeekDay[]): string {
  if (days.length === 0) {
    return "No data available for the weekly report.";
  }

  const separator = "=".repeat(COLUMN_WIDTHS.reduce((sum, width) => sum + width, 0));
  const totals = emptyCounts();
  const rows = days.map((day) => {
    const label = `${day.name}: ${formatDayFirst(day.date, "-")}`;
    if (!day.counts) {
      return line([label, "-", "-", "-"]);
    }
    totals.gazette += day.counts.gazette;
    totals.registry += day.counts.registry;
    return line([
      label,
      formatCount(day.counts.gazette),
      formatCount(day.counts.registry),
      formatCount(day.counts.gazette + day.counts.registry)
    ]);
  });

  return [
    separator,
    line(["Day", "Gazette", "Registry", "Total"]),
    separator,
    ...rows,
    separator,
    line(["WEEK TOTAL", formatCount(totals.gazette), formatCount(totals.registry), formatCount(totals.gazette + totals.registry)])
  ].join("\n");
}
