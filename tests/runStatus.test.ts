import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { toRunRow, toRunSourceRow } from "../src/commands/persist";
import { ReconciliationAlarm, StorageWriteError } from "../src/errors";
import { readRunStatus, toReconciliationStatus, toStatusError, writeRunStatus } from "../src/io/runStatus";
import { RunStatus } from "../src/types/runStatus";

function makeStatus(): RunStatus {
  return {
    schema_version: "1.0",
    run_id: "run-1",
    started_at: "2025-03-18T09:00:00Z",
    ended_at: "2025-03-18T09:05:00Z",
    ingestion_date: "2025-03-18",
    event_date: "2025-03-17",
    sources: [
      {
        source: "registry",
        status: "success",
        url: "https://registro.example.test/?fecha=17-03-2025",
        extracted: 3,
        expected: 3,
        warnings: 0,
        fragment: "mem://harvest/raw/date=2025-03-18/registry.jsonl",
        error: null
      }
    ],
    len_validation: "extracted:3 transformed:3",
    counts_match: true,
    collapsed: 0,
    duplicates_removed: 0,
    alarms: [],
    reference_errors: [],
    storage_errors: [],
    rule_warnings: [],
    written: ["mem://harvest/delivery/date=2025-03-18/part-00000.parquet"],
    notification: { status: "sent", message_id: "msg-1", error: null }
  };
}

describe("run status file", () => {
  let statusDir: string;

  beforeEach(async () => {
    statusDir = await fs.mkdtemp(path.join(os.tmpdir(), "run-status-"));
  });

  afterEach(async () => {
    await fs.rm(statusDir, { recursive: true, force: true });
  });

  it("writes under the run id and reads back the same status", async () => {
    const status = makeStatus();

    const filePath = await writeRunStatus(statusDir, status);

    expect(filePath).toBe(path.join(statusDir, "run_status_run-1.json"));
    await expect(readRunStatus(filePath)).resolves.toEqual(status);
  });

  it("rejects a file that is not a run status", async () => {
    const filePath = path.join(statusDir, "other.json");
    await fs.writeFile(filePath, JSON.stringify({ schema_version: "2.0" }), "utf8");

    await expect(readRunStatus(filePath)).rejects.toThrow();
  });
});

describe("status conversions", () => {
  it("keeps the location of a storage failure", () => {
    const error = new StorageWriteError("mem://harvest/raw", "disk full");

    expect(toStatusError(error)).toEqual({
      name: "StorageWriteError",
      message: "write to mem://harvest/raw failed: disk full",
      location: "mem://harvest/raw"
    });
    expect(toStatusError("boom")).toEqual({ name: "Error", message: "boom", location: null });
  });

  it("copies alarm details", () => {
    const alarm = new ReconciliationAlarm({
      date: "2025-03-18",
      extracted: 3,
      transformed: 4,
      missingSequences: [],
      duplicatedSequences: [1]
    });

    expect(toReconciliationStatus(alarm)).toEqual({
      date: "2025-03-18",
      extracted: 3,
      transformed: 4,
      missing_sequences: [],
      duplicated_sequences: [1]
    });
  });

  it("maps a status onto database rows", () => {
    const status = makeStatus();

    const run = toRunRow(status);
    const source = toRunSourceRow(status.run_id, status.sources[0]);

    expect(run.runId).toBe("run-1");
    expect(run.startedAt).toEqual(new Date("2025-03-18T09:00:00Z"));
    expect(run.notificationStatus).toBe("sent");
    expect(run.written).toEqual(["mem://harvest/delivery/date=2025-03-18/part-00000.parquet"]);
    expect(source).toEqual({
      runId: "run-1",
      source: "registry",
      status: "success",
      url: "https://registro.example.test/?fecha=17-03-2025",
      extracted: 3,
      expected: 3,
      warnings: 0,
      fragment: "mem://harvest/raw/date=2025-03-18/registry.jsonl",
      error: null
    });
  });
});
