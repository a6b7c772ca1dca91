import { parse } from "csv-parse/sync";
import { z } from "zod";
import { errorMessage } from "../errors";
import { componentLogger, Logger } from "../logging/logger";
import { DEFAULT_POLL_OPTIONS, PollOptions, QueryEngine, runQuery } from "../query/queryEngine";
import { CompanyReferenceRow, StaffReferenceRow } from "../types/reference";
import { CompanyReferenceRowSchema, StaffReferenceRowSchema } from "../validation/referenceSchema";

/** Result of one reference lookup. `error` is set when the lookup failed and `rows` is empty. */
export interface ReferenceFetch<T> {
  rows: T[];
  error: string | null;
}

export interface ReferenceDataSource {
  fetchCompanies(identifiers: string[]): Promise<ReferenceFetch<CompanyReferenceRow>>;
  fetchStaff(staffIds: string[]): Promise<ReferenceFetch<StaffReferenceRow>>;
}

export interface ReferenceTable {
  schema: string;
  table: string;
}

export interface QueryReferenceDataSourceOptions {
  engine: QueryEngine;
  /** Reads the result file the engine left at a location (e.g. an s3:// url). */
  readResult: (location: string) => Promise<Buffer>;
  companies: ReferenceTable;
  staff: ReferenceTable;
  poll?: PollOptions;
  logger?: Logger;
}

/** Keeps only `[0-9A-Z]` so ids can be inlined in SQL literals. Empty results are dropped. */
export function sanitizeIds(ids: string[]): string[] {
  const cleaned = ids.map((id) => id.toUpperCase().replace(/[^0-9A-Z]/g, "")).filter((id) => id !== "");
  return [...new Set(cleaned)].sort();
}

function qualified(ref: ReferenceTable): string {
  return `"${ref.schema.replace(/"/g, "")}"."${ref.table.replace(/"/g, "")}"`;
}

function inList(ids: string[]): string {
  return ids.map((id) => `'${id}'`).join(", ");
}

export function buildCompaniesQuery(ref: ReferenceTable, identifiers: string[]): string {
  return [
    "SELECT client_id, client_check_digit, segment, platform, account_owner_code, process_date",
    `FROM ${qualified(ref)}`,
    `WHERE client_id IN (${inList(identifiers)})`
  ].join("\n");
}

export function buildStaffQuery(ref: ReferenceTable, staffIds: string[]): string {
  return [
    "SELECT staff_id, staff_check_digit, staff_name, staff_role, staff_email, staff_unit, load_date",
    `FROM ${qualified(ref)}`,
    `WHERE staff_id IN (${inList(staffIds)})`
  ].join("\n");
}

export function parseResultCsv<S extends z.ZodTypeAny>(bytes: Buffer, rowSchema: S): z.output<S>[] {
  const rows: unknown = parse(bytes, { columns: true, skip_empty_lines: true, bom: true });
  return z.array(rowSchema).parse(rows);
}

/**
 * Reference lookups backed by the remote query engine. A failed, cancelled or timed-out
 * query is logged and yields an empty result so enrichment can go on with null columns.
 */
export class QueryReferenceDataSource implements ReferenceDataSource {
  private readonly log: Logger;

  constructor(private readonly options: QueryReferenceDataSourceOptions) {
    this.log = options.logger ?? componentLogger("reference-data");
  }

  fetchCompanies(identifiers: string[]): Promise<ReferenceFetch<CompanyReferenceRow>> {
    const ids = sanitizeIds(identifiers);
    return this.lookup("companies", this.options.companies, ids, CompanyReferenceRowSchema, () =>
      buildCompaniesQuery(this.options.companies, ids)
    );
  }

  fetchStaff(staffIds: string[]): Promise<ReferenceFetch<StaffReferenceRow>> {
    const ids = sanitizeIds(staffIds);
    return this.lookup("staff", this.options.staff, ids, StaffReferenceRowSchema, () =>
      buildStaffQuery(this.options.staff, ids)
    );
  }

  private async lookup<S extends z.ZodTypeAny>(
    name: string,
    ref: ReferenceTable,
    ids: string[],
    rowSchema: S,
    buildQuery: () => string
  ): Promise<ReferenceFetch<z.output<S>>> {
    if (ids.length === 0) {
      this.log.info({ lookup: name }, "no ids to look up");
      return { rows: [], error: null };
    }

    try {
      const location = await runQuery(this.options.engine, buildQuery(), ref.schema, this.options.poll ?? DEFAULT_POLL_OPTIONS);
      const rows = parseResultCsv(await this.options.readResult(location), rowSchema);
      this.log.info({ lookup: name, ids: ids.length, rows: rows.length }, "reference lookup done");
      return { rows, error: null };
    } catch (error) {
      const message = errorMessage(error);
      this.log.error({ lookup: name, err: message }, "reference lookup failed, continuing without it");
      return { rows: [], error: `${name}: ${message}` };
    }
  }
}
