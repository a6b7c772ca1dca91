import { describe, expect, it } from "vitest";
import { collectWeeklyStats, formatWeeklySummary, weekDates } from "../src/report/weeklyStats";
import { PartitionedStore } from "../src/storage/partitionedStore";
import { captureLogger } from "./helpers/captureLogger";
import { InMemoryObjectStorage } from "./helpers/memoryStorage";

function createStore(): PartitionedStore {
  return new PartitionedStore({ storage: new InMemoryObjectStorage(), basePath: "harvest", logger: captureLogger().logger });
}

describe("weekDates", () => {
  it("starts the week on Monday", () => {
    expect(weekDates("2025-03-19")).toEqual([
      "2025-03-17",
      "2025-03-18",
      "2025-03-19",
      "2025-03-20",
      "2025-03-21",
      "2025-03-22",
      "2025-03-23"
    ]);
  });

  it("reports the previous full week on a Monday", () => {
    const dates = weekDates("2025-03-17");

    expect(dates[0]).toBe("2025-03-10");
    expect(dates[6]).toBe("2025-03-16");
  });
});

describe("weekly stats", () => {
  it("counts delivered records per source and day, with a dash for today and later", async () => {
    const store = createStore();
    await store.writeEnriched(
      {
        columns: ["source", "ingestion_date"],
        rows: [
          { source: "registry", ingestion_date: "2025-03-17" },
          { source: "registry", ingestion_date: "2025-03-17" },
          { source: "gazette", ingestion_date: "2025-03-17" },
          { source: "gazette", ingestion_date: "2025-03-18" }
        ]
      },
      "delivery"
    );

    const days = await collectWeeklyStats(store, "2025-03-19", captureLogger().logger);

    expect(days.slice(0, 3)).toEqual([
      { name: "Monday", date: "2025-03-17", counts: { registry: 2, gazette: 1 } },
      { name: "Tuesday", date: "2025-03-18", counts: { registry: 0, gazette: 1 } },
      { name: "Wednesday", date: "2025-03-19", counts: null }
    ]);
    expect(formatWeeklySummary(days).split("\n")).toEqual([
      "========================================================",
      "Day                     Gazette     Registry    Total",
      "========================================================",
      "Monday: 17-03-2025      1           2           3",
      "Tuesday: 18-03-2025     1           0           1",
      "Wednesday: 19-03-2025   -           -           -",
      "Thursday: 20-03-2025    -           -           -",
      "Friday: 21-03-2025      -           -           -",
      "Saturday: 22-03-2025    -           -           -",
      "Sunday: 23-03-2025      -           -           -",
      "========================================================",
      "WEEK TOTAL              2           2           4"
    ]);
  });

  it("counts zero for a partition it cannot read", async () => {
    const storage = new InMemoryObjectStorage();
    await storage.put("harvest/delivery/date=2025-03-17/part-00000.parquet", Buffer.from("not parquet"));
    const store = new PartitionedStore({ storage, basePath: "harvest", logger: captureLogger().logger });
    const captured = captureLogger();

    const days = await collectWeeklyStats(store, "2025-03-18", captured.logger);

    expect(days[0].counts).toEqual({ registry: 0, gazette: 0 });
    expect(captured.messages()).toContain("could not read delivery partition, counting zero");
  });

  it("formats thousands and explains an empty report", () => {
    const summary = formatWeeklySummary([
      { name: "Monday", date: "2025-03-10", counts: { registry: 1200, gazette: 35 } }
    ]);

    expect(summary.split("\n")[3]).toBe("Monday: 10-03-2025      35          1,200       1,235");
    expect(formatWeeklySummary([])).toBe("No data available for the weekly report.");
  });
});
