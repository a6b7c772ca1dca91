import { describe, expect, it, vi } from "vitest";
import {
  buildCompaniesQuery,
  parseResultCsv,
  QueryReferenceDataSource,
  sanitizeIds
} from "../src/enrich/referenceData";
import { QueryFailedError, QueryTimeoutError } from "../src/errors";
import { runQuery } from "../src/query/queryEngine";
import { CompanyReferenceRowSchema } from "../src/validation/referenceSchema";
import { captureLogger } from "./helpers/captureLogger";
import { FakeQueryEngine } from "./helpers/fakeQueryEngine";

const noSleep = () => Promise.resolve();

describe("runQuery", () => {
  it("polls until the query succeeds and returns its result location", async () => {
    const engine = new FakeQueryEngine(() => [{ status: "running" }, { status: "running" }, { status: "succeeded" }]);
    const sleep = vi.fn(noSleep);

    const location = await runQuery(engine, "SELECT 1", "reference", { intervalMs: 500, maxAttempts: 5, sleep });

    expect(location).toBe("s3://results/query.csv?job-1");
    expect(engine.pollCount).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it("raises QueryFailedError on a failed or cancelled query", async () => {
    const failed = new FakeQueryEngine(() => [{ status: "failed", reason: "SYNTAX_ERROR" }]);
    const cancelled = new FakeQueryEngine(() => [{ status: "running" }, { status: "cancelled" }]);
    const options = { intervalMs: 1, maxAttempts: 5, sleep: noSleep };

    await expect(runQuery(failed, "SELECT", "reference", options)).rejects.toThrow(
      "query job-1 ended with status failed: SYNTAX_ERROR"
    );
    await expect(runQuery(cancelled, "SELECT", "reference", options)).rejects.toBeInstanceOf(QueryFailedError);
  });

  it("gives up after the configured number of polls", async () => {
    const engine = new FakeQueryEngine(() => [{ status: "running" }]);

    await expect(
      runQuery(engine, "SELECT", "reference", { intervalMs: 1, maxAttempts: 4, sleep: noSleep })
    ).rejects.toBeInstanceOf(QueryTimeoutError);
    expect(engine.pollCount).toBe(4);
  });
});

describe("reference queries", () => {
  it("keeps only safe characters in inlined ids", () => {
    expect(sanitizeIds(["76123456", "77.654.321", "1' OR '1'='1", "", "76123456"])).toEqual([
      "1OR11",
      "76123456",
      "77654321"
    ]);
  });

  it("builds the company lookup against the configured table", () => {
    expect(buildCompaniesQuery({ schema: "reference", table: "company_master" }, ["1", "2"])).toBe(
      [
        "SELECT client_id, client_check_digit, segment, platform, account_owner_code, process_date",
        'FROM "reference"."company_master"',
        "WHERE client_id IN ('1', '2')"
      ].join("\n")
    );
  });

  it("parses result files and turns blank cells into null", () => {
    const csv = [
      '"client_id","client_check_digit","segment","platform","account_owner_code","process_date"',
      '"76123456","7","PYME","","42","2025-03-01"'
    ].join("\n");

    expect(parseResultCsv(Buffer.from(csv), CompanyReferenceRowSchema)).toEqual([
      {
        client_id: "76123456",
        client_check_digit: "7",
        segment: "PYME",
        platform: null,
        account_owner_code: "42",
        process_date: "2025-03-01"
      }
    ]);
  });
});

describe("QueryReferenceDataSource", () => {
  const tables = {
    companies: { schema: "reference", table: "company_master" },
    staff: { schema: "reference", table: "staff_directory" }
  };

  it("returns the parsed rows of a successful lookup", async () => {
    const engine = new FakeQueryEngine(() => [{ status: "succeeded" }]);
    const readResult = vi.fn(async () =>
      Buffer.from("staff_id,staff_check_digit,staff_name,staff_role,staff_email,staff_unit,load_date\n42,1,Ana Rojas,Ejecutiva,ana@example.com,Centro,2025-03-01\n")
    );
    const source = new QueryReferenceDataSource({
      engine,
      readResult,
      ...tables,
      poll: { intervalMs: 1, maxAttempts: 3, sleep: noSleep },
      logger: captureLogger().logger
    });

    const fetched = await source.fetchStaff(["42"]);

    expect(fetched.error).toBeNull();
    expect(fetched.rows).toEqual([
      {
        staff_id: "42",
        staff_check_digit: "1",
        staff_name: "Ana Rojas",
        staff_role: "Ejecutiva",
        staff_email: "ana@example.com",
        staff_unit: "Centro",
        load_date: "2025-03-01"
      }
    ]);
    expect(readResult).toHaveBeenCalledWith("s3://results/query.csv?job-1");
    expect(engine.submitted[0].targetSchema).toBe("reference");
  });

  it("returns an empty result when the query fails", async () => {
    const engine = new FakeQueryEngine(() => [{ status: "failed", reason: "TABLE_NOT_FOUND" }]);
    const readResult = vi.fn(async () => Buffer.from(""));
    const captured = captureLogger();
    const source = new QueryReferenceDataSource({
      engine,
      readResult,
      ...tables,
      poll: { intervalMs: 1, maxAttempts: 3, sleep: noSleep },
      logger: captured.logger
    });

    const fetched = await source.fetchCompanies(["76123456"]);

    expect(fetched.rows).toEqual([]);
    expect(fetched.error).toBe("companies: query job-1 ended with status failed: TABLE_NOT_FOUND");
    expect(readResult).not.toHaveBeenCalled();
    expect(captured.messages()).toContain("reference lookup failed, continuing without it");
  });

  it("does not query when there are no ids", async () => {
    const engine = new FakeQueryEngine(() => [{ status: "succeeded" }]);
    const source = new QueryReferenceDataSource({
      engine,
      readResult: async () => Buffer.from(""),
      ...tables,
      logger: captureLogger().logger
    });

    expect(await source.fetchCompanies([])).toEqual({ rows: [], error: null });
    expect(engine.submitted).toEqual([]);
  });
});
