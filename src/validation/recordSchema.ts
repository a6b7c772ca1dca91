import { z } from "zod";

export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export const NormalizedRecordSchema = z
  .object({
    source: z.enum(["registry", "gazette"]),
    identifier: z.string().regex(/^\d+$/).nullable(),
    identifier_check_digit: z.string().regex(/^[0-9K]$/).nullable(),
    display_name: z.string(),
    document_url: z.string().nullable(),
    action_type: z.string(),
    attention_number: z.string().nullable(),
    verification_code: z.string().min(1),
    event_date: IsoDateSchema,
    ingestion_date: IsoDateSchema
  })
  .refine((record) => record.event_date <= record.ingestion_date, {
    message: "event_date is after ingestion_date",
    path: ["event_date"]
  });
