import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { ParquetReader, ParquetSchema, ParquetWriter } from "@dsnp/parquetjs";
import { CellValue, DataTable, TableRow } from "../types/table";

type ParquetColumnType = "UTF8" | "DOUBLE" | "BOOLEAN";

interface ParquetColumnDefinition {
  type: ParquetColumnType;
  optional: boolean;
}

/** Key/value metadata entry holding the table's column order. */
const COLUMNS_METADATA_KEY = "harvest.columns";

function columnType(rows: TableRow[], column: string): ParquetColumnType {
  const values = rows.map((row) => row[column]).filter((value) => value !== null && value !== undefined);
  if (values.length > 0 && values.every((value) => typeof value === "number")) return "DOUBLE";
  if (values.length > 0 && values.every((value) => typeof value === "boolean")) return "BOOLEAN";
  return "UTF8";
}

function encodeCell(value: string | number | boolean, type: ParquetColumnType): string | number | boolean {
  return type === "UTF8" ? String(value) : value;
}

function decodeCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") return value;
  if (typeof value === "bigint") return Number(value);
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return String(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readColumnOrder(metadata: Record<string, unknown>): string[] | null {
  const raw = metadata[COLUMNS_METADATA_KEY];
  if (typeof raw !== "string") return null;
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return null;
  const columns: unknown[] = parsed;
  return columns.every((entry): entry is string => typeof entry === "string") ? columns : null;
}

/**
 * Writes a table as a single Parquet file. Null cells are stored as absent optional values.
 */
export async function encodeTable(table: DataTable): Promise<Buffer> {
  if (table.columns.length === 0) {
    throw new Error("Cannot encode a table without columns");
  }
  const definition: Record<string, ParquetColumnDefinition> = {};
  for (const column of table.columns) {
    definition[column] = { type: columnType(table.rows, column), optional: true };
  }

  const workDir = await fs.mkdtemp(path.join(os.tmpdir(), "harvest-parquet-"));
  const filePath = path.join(workDir, "table.parquet");
  try {
    const writer = await ParquetWriter.openFile(new ParquetSchema(definition), filePath);
    writer.setMetadata(COLUMNS_METADATA_KEY, JSON.stringify(table.columns));
    for (const row of table.rows) {
      const encoded: Record<string, string | number | boolean> = {};
      for (const column of table.columns) {
        const value = row[column];
        if (value !== null && value !== undefined) {
          encoded[column] = encodeCell(value, definition[column].type);
        }
      }
      await writer.appendRow(encoded);
    }
    await writer.close();
    return await fs.readFile(filePath);
  } finally {
    await fs.rm(workDir, { recursive: true, force: true });
  }
}

export async function decodeTable(bytes: Buffer): Promise<DataTable> {
  const reader = await ParquetReader.openBuffer(bytes);
  try {
    const metadata: Record<string, unknown> = reader.getMetadata();
    const rawRows: Record<string, unknown>[] = [];
    const cursor = reader.getCursor();
    let next: unknown = await cursor.next();
    while (next) {
      if (isRecord(next)) rawRows.push(next);
      next = await cursor.next();
    }

    const columns = readColumnOrder(metadata) ?? Array.from(new Set(rawRows.flatMap((row) => Object.keys(row))));
    const rows = rawRows.map((raw) => {
      const row: TableRow = {};
      for (const column of columns) {
        row[column] = decodeCell(raw[column]);
      }
      return row;
    });
    return { columns, rows };
  } finally {
    await reader.close();
  }
}
