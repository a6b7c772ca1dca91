import { describe, expect, it } from "vitest";
import {
  EnrichmentEngine,
  enrichedToTable,
  latestCompanyPerClient,
  reconcile
} from "../src/enrich/enrichmentEngine";
import { ENRICHED_COLUMNS, EnrichedRecord } from "../src/types/record";
import { CompanyReferenceRow, StaffReferenceRow } from "../src/types/reference";
import { captureLogger } from "./helpers/captureLogger";
import { makeRecord } from "./helpers/records";

function company(overrides: Partial<CompanyReferenceRow>): CompanyReferenceRow {
  return {
    client_id: "76123456",
    client_check_digit: "7",
    segment: "PYME",
    platform: "Digital",
    account_owner_code: "42",
    process_date: "2025-01-10",
    ...overrides
  };
}

function staffMember(overrides: Partial<StaffReferenceRow>): StaffReferenceRow {
  return {
    staff_id: "42",
    staff_check_digit: "1",
    staff_name: "Ana Rojas",
    staff_role: "Ejecutiva",
    staff_email: "ana.rojas@example.com",
    staff_unit: "Santiago Centro",
    load_date: "2025-03-01",
    ...overrides
  };
}

const raw = [
  makeRecord({ identifier: "76123456", verification_code: "C1" }),
  makeRecord({ identifier: "77654321", verification_code: "C2" }),
  makeRecord({ identifier: "76123456", verification_code: "C3" })
];

const companies = [
  company({ process_date: "2025-01-10", segment: "PYME", account_owner_code: "0042" }),
  company({ client_id: "076123456.0", process_date: "2025-03-01", segment: "EMPRESAS", account_owner_code: "42.0" })
];

const staff = [staffMember({}), staffMember({ staff_name: "Ana Rojas Duplicada" })];

describe("company ranking", () => {
  it("keeps the most recent row per canonical client id", () => {
    const latest = latestCompanyPerClient(companies);

    expect([...latest.keys()]).toEqual(["76123456"]);
    expect(latest.get("76123456")?.segment).toBe("EMPRESAS");
  });

  it("orders compact and day-first process dates by recency", () => {
    const latest = latestCompanyPerClient([
      company({ process_date: "20250301", segment: "NEW" }),
      company({ process_date: "15-01-2025", segment: "OLD" })
    ]);

    expect(latest.get("76123456")?.segment).toBe("NEW");
  });
});

describe("EnrichmentEngine", () => {
  it("keeps one output record per input record, in input order", () => {
    const captured = captureLogger();
    const result = new EnrichmentEngine({ logger: captured.logger }).enrich(raw, companies, staff);

    expect(result.records.map((record) => record.origin_sequence)).toEqual([0, 1, 2]);
    expect(result.records.map((record) => record.verification_code)).toEqual(["C1", "C2", "C3"]);
    expect(result.duplicatesRemoved).toBe(2);
    expect(result.unmatched).toBe(1);
    expect(captured.messages()).toContain("join fan-out removed by origin sequence");
  });

  it("attaches the latest company and its account owner", () => {
    const [first] = new EnrichmentEngine({ logger: captureLogger().logger }).enrich(raw, companies, staff).records;

    expect(first).toMatchObject({
      origin_sequence: 0,
      segment: "EMPRESAS",
      platform: "Digital",
      account_owner_code: "42.0",
      staff_id: "42",
      staff_name: "Ana Rojas",
      staff_email: "ana.rojas@example.com"
    });
  });

  it("leaves reference columns null for unmatched records", () => {
    const second = new EnrichmentEngine({ logger: captureLogger().logger }).enrich(raw, companies, staff).records[1];

    expect(second).toEqual({
      ...raw[1],
      origin_sequence: 1,
      segment: null,
      platform: null,
      account_owner_code: null,
      staff_id: null,
      staff_name: null,
      staff_role: null,
      staff_email: null,
      staff_unit: null
    });
  });

  it("keeps company columns when the account owner is unknown", () => {
    const result = new EnrichmentEngine({ logger: captureLogger().logger }).enrich(
      [makeRecord()],
      [company({ account_owner_code: "99" })],
      staff
    );

    expect(result.records[0]).toMatchObject({ segment: "PYME", account_owner_code: "99", staff_id: null });
  });

  it("passes records through when no reference data is available", () => {
    const result = new EnrichmentEngine({ logger: captureLogger().logger }).enrich(raw, [], []);

    expect(result.records).toHaveLength(3);
    expect(result.unmatched).toBe(3);
    expect(reconcile("2025-03-18", raw, result.records)).toBeNull();
  });
});

describe("reconcile", () => {
  const enriched: EnrichedRecord[] = new EnrichmentEngine({ logger: captureLogger().logger }).enrich(raw, [], [])
    .records;

  it("returns null when every sequence appears exactly once", () => {
    expect(reconcile("2025-03-18", raw, enriched)).toBeNull();
  });

  it("reports missing sequences", () => {
    const alarm = reconcile("2025-03-18", raw, enriched.slice(0, 2));

    expect(alarm?.missingSequences).toEqual([2]);
    expect(alarm?.message).toBe("reconciliation mismatch for 2025-03-18: extracted:3 transformed:2");
  });

  it("reports duplicated sequences even when counts look right", () => {
    const alarm = reconcile("2025-03-18", raw, [enriched[0], enriched[0], enriched[2]]);

    expect(alarm?.missingSequences).toEqual([1]);
    expect(alarm?.duplicatedSequences).toEqual([0]);
    expect(alarm?.transformed).toBe(3);
  });
});

describe("enrichedToTable", () => {
  it("lays records out in the enriched column order", () => {
    const table = enrichedToTable(new EnrichmentEngine({ logger: captureLogger().logger }).enrich(raw, [], []).records);

    expect(table.columns).toEqual([...ENRICHED_COLUMNS]);
    expect(table.columns[0]).toBe("origin_sequence");
    expect(table.rows[2]).toMatchObject({ origin_sequence: 2, verification_code: "C3", segment: null });
  });
});
