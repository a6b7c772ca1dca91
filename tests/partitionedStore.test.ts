import { describe, expect, it } from "vitest";
import { SchemaDriftError, StorageWriteError } from "../src/errors";
import { PartitionedStore } from "../src/storage/partitionedStore";
import { DataTable } from "../src/types/table";
import { captureLogger } from "./helpers/captureLogger";
import { InMemoryObjectStorage } from "./helpers/memoryStorage";
import { makeRecord } from "./helpers/records";

function createStore(storage = new InMemoryObjectStorage()) {
  let counter = 0;
  const captured = captureLogger();
  const store = new PartitionedStore({
    storage,
    basePath: "harvest",
    logger: captured.logger,
    now: () => new Date("2025-03-18T12:00:00.000Z"),
    fragmentSuffix: () => `f${++counter}`
  });
  return { store, storage, captured };
}

const enrichedTable: DataTable = {
  columns: ["origin_sequence", "identifier", "ingestion_date", "segment"],
  rows: [
    { origin_sequence: 0, identifier: "76123456", ingestion_date: "2025-03-18", segment: null },
    { origin_sequence: 1, identifier: "77654321", ingestion_date: "2025-03-18", segment: "PYME" }
  ]
};

describe("raw tier", () => {
  it("appends each batch as a new fragment and reads them back in order", async () => {
    const { store, storage } = createStore();
    const first = [makeRecord({ verification_code: "A1" })];
    const second = [makeRecord({ verification_code: "B1" }), makeRecord({ verification_code: "B2" })];

    const firstLocation = await store.appendRaw(first, "registry");
    await store.appendRaw(second, "registry");

    expect(firstLocation).toBe("mem://harvest/raw/date=2025-03-18/registry-2025-03-18T12-00-00Z-f1.jsonl");
    expect([...storage.objects.keys()]).toHaveLength(2);
    const records = await store.readRaw("2025-03-18");
    expect(records.map((record) => record.verification_code)).toEqual(["A1", "B1", "B2"]);
    expect(records[0]).toEqual(first[0]);
  });

  it("writes nothing for an empty batch", async () => {
    const { store, storage } = createStore();

    expect(await store.appendRaw([], "gazette")).toBeNull();
    expect(storage.objects.size).toBe(0);
  });

  it("rejects a batch that spans several ingestion dates", async () => {
    const { store } = createStore();
    const batch = [makeRecord(), makeRecord({ ingestion_date: "2025-03-19", verification_code: "X" })];

    await expect(store.appendRaw(batch)).rejects.toBeInstanceOf(StorageWriteError);
  });

  it("refuses records that would not read back, writing nothing", async () => {
    const { store, storage } = createStore();
    const batch = [
      makeRecord({ verification_code: "A1" }),
      makeRecord({ verification_code: "A2", event_date: "2025-03-19", ingestion_date: "2025-03-18" })
    ];

    const attempt = store.appendRaw(batch, "registry");

    await expect(attempt).rejects.toBeInstanceOf(SchemaDriftError);
    await expect(attempt).rejects.toThrow(
      "[registry] schema drift: record 1 (A2) event_date: event_date is after ingestion_date"
    );
    expect(storage.objects.size).toBe(0);
    await expect(store.readRaw("2025-03-18")).resolves.toEqual([]);
  });

  it("wraps storage failures in StorageWriteError", async () => {
    const { store, storage } = createStore();
    storage.failPuts = /raw/;

    await expect(store.appendRaw([makeRecord()], "registry")).rejects.toThrow("disk full");
    await expect(store.appendRaw([makeRecord()], "registry")).rejects.toBeInstanceOf(StorageWriteError);
  });

  it("skips unreadable lines and keeps the rest of the fragment", async () => {
    const { store, storage, captured } = createStore();
    const good = makeRecord({ verification_code: "GOOD" });
    const future = makeRecord({ verification_code: "LATE", event_date: "2025-03-20" });
    const lines = [JSON.stringify(good), "{not json", JSON.stringify(future), ""].join("\n");
    await storage.put("harvest/raw/date=2025-03-18/manual.jsonl", Buffer.from(lines, "utf8"));

    const records = await store.readRaw("2025-03-18");

    expect(records).toEqual([good]);
    expect(captured.messages()).toEqual(
      expect.arrayContaining(["unparseable raw line skipped", "invalid raw record skipped"])
    );
  });

  it("returns no records for a date never harvested", async () => {
    const { store } = createStore();

    expect(await store.readRaw("2024-01-01")).toEqual([]);
  });
});

describe("enriched tiers", () => {
  it("round-trips a table through the partition", async () => {
    const { store } = createStore();

    const locations = await store.writeEnriched(enrichedTable, "processed");

    expect(locations).toEqual(["mem://harvest/processed/date=2025-03-18/part-00000.parquet"]);
    expect(await store.readEnriched("processed", "2025-03-18")).toEqual(enrichedTable);
  });

  it("replaces the partition on every write", async () => {
    const { store, storage } = createStore();
    await storage.put("harvest/delivery/date=2025-03-18/leftover.parquet", Buffer.from("stale"));

    await store.writeEnriched(enrichedTable, "delivery");
    await store.writeEnriched(enrichedTable, "delivery");

    expect(await storage.list("harvest/delivery/date=2025-03-18")).toEqual([
      "harvest/delivery/date=2025-03-18/part-00000.parquet"
    ]);
    expect((await store.readEnriched("delivery", "2025-03-18")).rows).toHaveLength(2);
  });

  it("splits rows across one partition per ingestion date", async () => {
    const { store } = createStore();
    const table: DataTable = {
      columns: ["identifier", "ingestion_date"],
      rows: [
        { identifier: "1", ingestion_date: "2025-03-19" },
        { identifier: "2", ingestion_date: "2025-03-18" }
      ]
    };

    const locations = await store.writeEnriched(table, "processed");

    expect(locations).toEqual([
      "mem://harvest/processed/date=2025-03-18/part-00000.parquet",
      "mem://harvest/processed/date=2025-03-19/part-00000.parquet"
    ]);
    expect((await store.readEnriched("processed", "2025-03-19")).rows).toEqual([
      { identifier: "1", ingestion_date: "2025-03-19" }
    ]);
  });

  it("fails fast when the partition column is missing or invalid", async () => {
    const { store, storage } = createStore();

    await expect(
      store.writeEnriched({ columns: ["identifier"], rows: [{ identifier: "1" }] }, "processed")
    ).rejects.toThrow("table has no ingestion_date column");
    await expect(
      store.writeEnriched(
        { columns: ["identifier", "ingestion_date"], rows: [{ identifier: "1", ingestion_date: null }] },
        "processed"
      )
    ).rejects.toBeInstanceOf(StorageWriteError);
    expect(storage.objects.size).toBe(0);
  });
});
