import { boolean, index, integer, jsonb, pgTable, serial, text, timestamp, uniqueIndex } from "drizzle-orm/pg-core";

export const harvestRuns = pgTable(
  "harvest_runs",
  {
    runId: text("run_id").primaryKey(),
    ingestionDate: text("ingestion_date").notNull(), // YYYY-MM-DD
    eventDate: text("event_date"),
    startedAt: timestamp("started_at", { withTimezone: true }).notNull(),
    endedAt: timestamp("ended_at", { withTimezone: true }).notNull(),
    lenValidation: text("len_validation"),
    countsMatch: boolean("counts_match"),
    collapsed: integer("collapsed").notNull().default(0),
    duplicatesRemoved: integer("duplicates_removed").notNull(),
    alarms: jsonb("alarms").notNull(),
    referenceErrors: jsonb("reference_errors").notNull(),
    storageErrors: jsonb("storage_errors").notNull(),
    ruleWarnings: jsonb("rule_warnings").notNull(),
    written: jsonb("written").notNull(),
    notificationStatus: text("notification_status").notNull(), // sent | failed | skipped
    notificationError: text("notification_error"),
    createdAt: timestamp("created_at", { withTimezone: true }).defaultNow().notNull()
  },
  (table) => ({
    harvestRunsDateIdx: index("harvest_runs_ingestion_date_idx").on(table.ingestionDate)
  })
);

export const harvestRunSources = pgTable(
  "harvest_run_sources",
  {
    id: serial("id").primaryKey(),
    runId: text("run_id")
      .notNull()
      .references(() => harvestRuns.runId),
    source: text("source").notNull(),
    status: text("status").notNull(), // success | empty | error
    url: text("url"),
    extracted: integer("extracted").notNull(),
    expected: integer("expected"),
    warnings: integer("warnings").notNull(),
    fragment: text("fragment"),
    error: jsonb("error")
  },
  (table) => ({
    runSourceUnique: uniqueIndex("harvest_run_sources_run_source_idx").on(table.runId, table.source)
  })
);
