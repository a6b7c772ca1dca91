import { ReconciliationAlarm } from "../errors";
import { componentLogger, Logger } from "../logging/logger";
import { normalizeDateText } from "../normalize/date";
import { canonicalKey } from "../normalize/identifier";
import { ENRICHED_COLUMNS, EnrichedRecord, NormalizedRecord, ReferenceColumns } from "../types/record";
import { CompanyReferenceRow, StaffReferenceRow } from "../types/reference";
import { DataTable } from "../types/table";

export interface EnrichmentResult {
  records: EnrichedRecord[];
  duplicatesRemoved: number;
  /** Records that found no company row. */
  unmatched: number;
}

const EMPTY_REFERENCE: ReferenceColumns = {
  segment: null,
  platform: null,
  account_owner_code: null,
  staff_id: null,
  staff_name: null,
  staff_role: null,
  staff_email: null,
  staff_unit: null
};

// Reference dates arrive as `YYYY-MM-DD`, timestamps, day-first or compact `YYYYMMDD`.
function recencyKey(value: string | null): string {
  if (!value) return "";
  const compact = value.trim().match(/^(\d{4})(\d{2})(\d{2})$/);
  if (compact) return `${compact[1]}-${compact[2]}-${compact[3]}`;
  return normalizeDateText(value) ?? "";
}

/** Most recent company row per canonical client id. Ties keep the row seen first. */
export function latestCompanyPerClient(companies: CompanyReferenceRow[]): Map<string, CompanyReferenceRow> {
  const latest = new Map<string, CompanyReferenceRow>();
  for (const company of companies) {
    const key = canonicalKey(company.client_id);
    if (!key) continue;
    const current = latest.get(key);
    if (!current || recencyKey(company.process_date) > recencyKey(current.process_date)) {
      latest.set(key, company);
    }
  }
  return latest;
}

function groupStaff(staff: StaffReferenceRow[]): Map<string, StaffReferenceRow[]> {
  const byId = new Map<string, StaffReferenceRow[]>();
  for (const member of staff) {
    const key = canonicalKey(member.staff_id);
    if (!key) continue;
    const group = byId.get(key);
    if (group) {
      group.push(member);
    } else {
      byId.set(key, [member]);
    }
  }
  return byId;
}

function referenceColumns(company: CompanyReferenceRow, member: StaffReferenceRow | null): ReferenceColumns {
  return {
    segment: company.segment,
    platform: company.platform,
    account_owner_code: company.account_owner_code,
    staff_id: member?.staff_id ?? null,
    staff_name: member?.staff_name ?? null,
    staff_role: member?.staff_role ?? null,
    staff_email: member?.staff_email ?? null,
    staff_unit: member?.staff_unit ?? null
  };
}

/**
 * Company rows (latest per client) left-joined with staff on the account owner code,
 * keyed by canonical client id. A staff id repeated in the reference yields several entries.
 */
export function combineReferences(
  companies: CompanyReferenceRow[],
  staff: StaffReferenceRow[]
): Map<string, ReferenceColumns[]> {
  const staffById = groupStaff(staff);
  const combined = new Map<string, ReferenceColumns[]>();
  for (const [clientKey, company] of latestCompanyPerClient(companies)) {
    const ownerKey = canonicalKey(company.account_owner_code);
    const members = ownerKey ? staffById.get(ownerKey) ?? [] : [];
    combined.set(
      clientKey,
      members.length > 0 ? members.map((member) => referenceColumns(company, member)) : [referenceColumns(company, null)]
    );
  }
  return combined;
}

export class EnrichmentEngine {
  private readonly log: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.log = options.logger ?? componentLogger("enrichment");
  }

  enrich(raw: NormalizedRecord[], companies: CompanyReferenceRow[], staff: StaffReferenceRow[]): EnrichmentResult {
    const references = combineReferences(companies, staff);

    let unmatched = 0;
    const joined: EnrichedRecord[] = raw.flatMap((record, originSequence) => {
      const key = canonicalKey(record.identifier);
      const matches = key ? references.get(key) : undefined;
      if (!matches) {
        unmatched += 1;
        return [{ ...record, origin_sequence: originSequence, ...EMPTY_REFERENCE }];
      }
      return matches.map((columns) => ({ ...record, origin_sequence: originSequence, ...columns }));
    });

    const seen = new Set<number>();
    const records = joined.filter((record) => {
      if (seen.has(record.origin_sequence)) return false;
      seen.add(record.origin_sequence);
      return true;
    });

    const duplicatesRemoved = joined.length - records.length;
    if (duplicatesRemoved > 0) {
      this.log.warn({ duplicatesRemoved }, "join fan-out removed by origin sequence");
    }
    this.log.info(
      { input: raw.length, output: records.length, unmatched, companies: companies.length, staff: staff.length },
      "enrichment done"
    );

    return { records, duplicatesRemoved, unmatched };
  }
}

/**
 * Compares enrichment output with its input. Returns an alarm when the counts differ or
 * any origin sequence is missing or repeated; null when they line up.
 */
export function reconcile(
  date: string,
  raw: readonly NormalizedRecord[],
  enriched: readonly EnrichedRecord[]
): ReconciliationAlarm | null {
  const occurrences = new Map<number, number>();
  for (const record of enriched) {
    occurrences.set(record.origin_sequence, (occurrences.get(record.origin_sequence) ?? 0) + 1);
  }

  const missingSequences: number[] = [];
  for (let sequence = 0; sequence < raw.length; sequence++) {
    if (!occurrences.has(sequence)) missingSequences.push(sequence);
  }
  const duplicatedSequences = [...occurrences.entries()]
    .filter(([, count]) => count > 1)
    .map(([sequence]) => sequence)
    .sort((a, b) => a - b);

  if (enriched.length === raw.length && missingSequences.length === 0 && duplicatedSequences.length === 0) {
    return null;
  }
  return new ReconciliationAlarm({
    date,
    extracted: raw.length,
    transformed: enriched.length,
    missingSequences,
    duplicatedSequences
  });
}

export function enrichedToTable(records: readonly EnrichedRecord[]): DataTable {
  return {
    columns: [...ENRICHED_COLUMNS],
    rows: records.map((record) => {
      const row: DataTable["rows"][number] = {};
      for (const column of ENRICHED_COLUMNS) {
        row[column] = record[column];
      }
      return row;
    })
  };
}
