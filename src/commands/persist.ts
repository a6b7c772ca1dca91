import path from "path";
import { closePool, getDb } from "../db/client";
import * as schema from "../db/schema";
import { readRunStatus } from "../io/runStatus";
import { componentLogger } from "../logging/logger";
import { RunStatus, SourceRunStatus } from "../types/runStatus";

const log = componentLogger("persist");

interface PersistOptions {
  status: string;
}

type Db = Pick<ReturnType<typeof getDb>, "insert">;

function toDate(value: string): Date {
  const d = new Date(value);
  return Number.isNaN(d.getTime()) ? new Date() : d;
}

export function toRunRow(status: RunStatus): typeof schema.harvestRuns.$inferInsert {
  return {
    runId: status.run_id,
    ingestionDate: status.ingestion_date,
    eventDate: status.event_date,
    startedAt: toDate(status.started_at),
    endedAt: toDate(status.ended_at),
    lenValidation: status.len_validation,
    countsMatch: status.counts_match,
    collapsed: status.collapsed,
    duplicatesRemoved: status.duplicates_removed,
    alarms: status.alarms,
    referenceErrors: status.reference_errors,
    storageErrors: status.storage_errors,
    ruleWarnings: status.rule_warnings,
    written: status.written,
    notificationStatus: status.notification.status,
    notificationError: status.notification.error
  };
}

export function toRunSourceRow(runId: string, source: SourceRunStatus): typeof schema.harvestRunSources.$inferInsert {
  return {
    runId,
    source: source.source,
    status: source.status,
    url: source.url,
    extracted: source.extracted,
    expected: source.expected,
    warnings: source.warnings,
    fragment: source.fragment,
    error: source.error
  };
}

async function insertRun(db: Db, status: RunStatus): Promise<void> {
  await db.insert(schema.harvestRuns).values(toRunRow(status)).onConflictDoNothing();
}

async function insertRunSource(db: Db, runId: string, source: SourceRunStatus): Promise<void> {
  await db
    .insert(schema.harvestRunSources)
    .values(toRunSourceRow(runId, source))
    .onConflictDoNothing({
      target: [schema.harvestRunSources.runId, schema.harvestRunSources.source]
    });
}

export async function persistRunStatus(db: Db, status: RunStatus): Promise<void> {
  await insertRun(db, status);
  for (const source of status.sources) {
    await insertRunSource(db, status.run_id, source);
  }
}

export async function runPersistCommand(opts: PersistOptions): Promise<void> {
  const statusPath = path.resolve(opts.status);
  try {
    const status = await readRunStatus(statusPath);
    await getDb().transaction(async (tx) => persistRunStatus(tx, status));
    log.info({ runId: status.run_id, sources: status.sources.length }, "run status persisted");
  } finally {
    await closePool().catch((error: unknown) => log.warn({ err: error }, "pool close failed"));
  }
}
