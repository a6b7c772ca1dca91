import { z } from "zod";

const StatusErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  location: z.string().nullable().default(null)
});

const SourceRunStatusSchema = z.object({
  source: z.enum(["registry", "gazette"]),
  status: z.enum(["success", "empty", "error"]),
  url: z.string().nullable(),
  extracted: z.number().int().nonnegative(),
  expected: z.number().int().nonnegative().nullable(),
  warnings: z.number().int().nonnegative(),
  fragment: z.string().nullable(),
  error: StatusErrorSchema.nullable()
});

const ReconciliationStatusSchema = z.object({
  date: z.string(),
  extracted: z.number().int().nonnegative(),
  transformed: z.number().int().nonnegative(),
  missing_sequences: z.array(z.number().int()),
  duplicated_sequences: z.array(z.number().int())
});

const NotificationStatusSchema = z.object({
  status: z.enum(["sent", "failed", "skipped"]),
  message_id: z.string().nullable(),
  error: z.string().nullable()
});

export const RunStatusSchema = z.object({
  schema_version: z.literal("1.0"),
  run_id: z.string().min(1),
  started_at: z.string(),
  ended_at: z.string(),
  ingestion_date: z.string(),
  event_date: z.string().nullable(),
  sources: z.array(SourceRunStatusSchema),
  len_validation: z.string().nullable(),
  counts_match: z.boolean().nullable(),
  collapsed: z.number().int().nonnegative().default(0),
  duplicates_removed: z.number().int().nonnegative(),
  alarms: z.array(ReconciliationStatusSchema),
  reference_errors: z.array(z.string()),
  storage_errors: z.array(StatusErrorSchema),
  rule_warnings: z.array(
    z.object({
      code: z.literal("RULE_APPLICATION_FAILED"),
      rule: z.string(),
      message: z.string()
    })
  ),
  written: z.array(z.string()),
  notification: NotificationStatusSchema
});

export { StatusErrorSchema, SourceRunStatusSchema, ReconciliationStatusSchema, NotificationStatusSchema };
