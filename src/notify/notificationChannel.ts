import { stringify } from "csv-stringify/sync";
import { enrichedToTable } from "../enrich/enrichmentEngine";
import { EnrichedRecord } from "../types/record";
import { DataTable } from "../types/table";

export interface NotificationAttachment {
  filename: string;
  content: string;
  contentType: string;
}

export interface NotificationMessage {
  subject: string;
  text: string;
  attachments: NotificationAttachment[];
}

export type SendResult = { ok: true; messageId: string } | { ok: false; error: string };

/** Delivery is at-least-once; a failed send is reported, never thrown. */
export interface NotificationChannel {
  send(message: NotificationMessage): Promise<SendResult>;
}

export type ReportInput =
  | { kind: "table"; table: DataTable }
  | { kind: "records"; records: readonly EnrichedRecord[] };

export interface RunReportOptions {
  subjectPrefix: string;
  date: string;
  lenValidation: string;
  countsMatch: boolean;
  /** Raw records superseded by a later same-day harvest. */
  collapsed?: number;
}

export function reportTable(input: ReportInput): DataTable {
  switch (input.kind) {
    case "table":
      return input.table;
    case "records":
      return enrichedToTable(input.records);
  }
}

export function tableToCsv(table: DataTable): string {
  return stringify(
    table.rows.map((row) => table.columns.map((column) => row[column] ?? null)),
    {
      header: true,
      columns: table.columns,
      cast: { boolean: (value) => (value ? "true" : "false") }
    }
  );
}

export function buildRunReport(input: ReportInput, options: RunReportOptions): NotificationMessage {
  const table = reportTable(input);
  const text = [
    `Date: ${options.date}`,
    `Records processed: ${table.rows.length}`,
    `Reconciliation: ${options.lenValidation} (${options.countsMatch ? "counts match" : "COUNTS DIFFER"})`,
    ...(options.collapsed ? [`Superseded by a later harvest: ${options.collapsed}`] : []),
    "",
    "The attached file contains the delivered records."
  ].join("\n");

  return {
    subject: `${options.subjectPrefix} ${options.date}`,
    text,
    attachments: [
      {
        filename: `registrations_${options.date}.csv`,
        content: tableToCsv(table),
        contentType: "text/csv"
      }
    ]
  };
}
