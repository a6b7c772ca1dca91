export type RecordSource = "registry" | "gazette";

export type Tier = "raw" | "processed" | "delivery";

export type EnrichedTier = Exclude<Tier, "raw">;

/**
 * One harvested registration event, as written to the raw tier.
 * Dates are calendar dates formatted `YYYY-MM-DD`.
 */
export interface NormalizedRecord {
  source: RecordSource;
  identifier: string | null;
  identifier_check_digit: string | null;
  display_name: string;
  document_url: string | null;
  action_type: string;
  attention_number: string | null;
  verification_code: string;
  event_date: string;
  ingestion_date: string;
}

export interface ReferenceColumns {
  segment: string | null;
  platform: string | null;
  account_owner_code: string | null;
  staff_id: string | null;
  staff_name: string | null;
  staff_role: string | null;
  staff_email: string | null;
  staff_unit: string | null;
}

export interface EnrichedRecord extends NormalizedRecord, ReferenceColumns {
  origin_sequence: number;
}

export const NORMALIZED_COLUMNS: readonly (keyof NormalizedRecord)[] = [
  "source",
  "identifier",
  "identifier_check_digit",
  "display_name",
  "document_url",
  "action_type",
  "attention_number",
  "verification_code",
  "event_date",
  "ingestion_date"
];

export const REFERENCE_COLUMNS: readonly (keyof ReferenceColumns)[] = [
  "segment",
  "platform",
  "account_owner_code",
  "staff_id",
  "staff_name",
  "staff_role",
  "staff_email",
  "staff_unit"
];

export const ENRICHED_COLUMNS: readonly (keyof EnrichedRecord)[] = [
  "origin_sequence",
  ...NORMALIZED_COLUMNS,
  ...REFERENCE_COLUMNS
];
