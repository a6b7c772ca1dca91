import { RecordSource } from "./types/record";

/**
 * The source page no longer has the layout the extractor was written for.
 * Fatal for the whole batch of that source.
 */
export class SchemaDriftError extends Error {
  public readonly source: RecordSource;

  constructor(source: RecordSource, message: string) {
    super(`[${source}] schema drift: ${message}`);
    this.name = "SchemaDriftError";
    this.source = source;
  }
}

/**
 * The extracted batch does not match what the page reports about itself.
 * The batch must not be persisted.
 */
export class ValidationError extends Error {
  public readonly source: RecordSource;
  public readonly expected: number | null;
  public readonly extracted: number;

  constructor(source: RecordSource, expected: number | null, extracted: number, detail?: string) {
    super(
      `[${source}] validation failed: expected ${expected ?? "unknown"}, extracted ${extracted}` +
        (detail ? ` (${detail})` : "")
    );
    this.name = "ValidationError";
    this.source = source;
    this.expected = expected;
    this.extracted = extracted;
  }
}

export class StorageWriteError extends Error {
  public readonly location: string;

  constructor(location: string, message: string, options?: { cause?: unknown }) {
    super(`write to ${location} failed: ${message}`, options);
    this.name = "StorageWriteError";
    this.location = location;
  }
}

/**
 * Enrichment changed the number of records. Blocks the partition write;
 * reported in the run status instead of crashing the run.
 */
export class ReconciliationAlarm extends Error {
  public readonly date: string;
  public readonly extracted: number;
  public readonly transformed: number;
  public readonly missingSequences: number[];
  public readonly duplicatedSequences: number[];

  constructor(params: {
    date: string;
    extracted: number;
    transformed: number;
    missingSequences: number[];
    duplicatedSequences: number[];
  }) {
    super(
      `reconciliation mismatch for ${params.date}: extracted:${params.extracted} transformed:${params.transformed}`
    );
    this.name = "ReconciliationAlarm";
    this.date = params.date;
    this.extracted = params.extracted;
    this.transformed = params.transformed;
    this.missingSequences = params.missingSequences;
    this.duplicatedSequences = params.duplicatedSequences;
  }
}

export type QueryTerminalStatus = "failed" | "cancelled";

export class QueryFailedError extends Error {
  public readonly jobId: string;
  public readonly status: QueryTerminalStatus;

  constructor(jobId: string, status: QueryTerminalStatus, reason?: string) {
    super(`query ${jobId} ended with status ${status}${reason ? `: ${reason}` : ""}`);
    this.name = "QueryFailedError";
    this.jobId = jobId;
    this.status = status;
  }
}

export class QueryTimeoutError extends Error {
  public readonly jobId: string;
  public readonly attempts: number;

  constructor(jobId: string, attempts: number) {
    super(`query ${jobId} still running after ${attempts} polls`);
    this.name = "QueryTimeoutError";
    this.jobId = jobId;
    this.attempts = attempts;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
