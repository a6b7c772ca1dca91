export type CellValue = string | number | boolean | null;

export type TableRow = Record<string, CellValue>;

export interface DataTable {
  columns: string[];
  rows: TableRow[];
}
