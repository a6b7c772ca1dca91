import { errorMessage } from "../errors";
import { componentLogger, Logger } from "../logging/logger";
import { normalizeDateText } from "../normalize/date";
import { CellValue, DataTable, TableRow } from "../types/table";
import { RuleApplicationWarning } from "../types/warnings";

interface RuleFields {
  dateFormat: { columns: string[] };
  cleanNumber: { columns: string[] };
  filter: { description: string; predicate: (row: TableRow) => boolean };
  excludeValues: { column: string; values: string[] };
  notBlank: { columns: string[] };
  columnOrder: { columns: string[] };
  /** Open extension point for one-off table transforms. */
  custom: { name: string; apply: (table: DataTable) => DataTable };
}

export type RuleKind = keyof RuleFields;

export type Rule<K extends RuleKind = RuleKind> = { [P in K]: { kind: P } & RuleFields[P] }[K];

type RuleHandler<K extends RuleKind> = (rule: Rule<K>, table: DataTable, log: Logger) => DataTable;

export interface RuleEngineResult {
  table: DataTable;
  warnings: RuleApplicationWarning[];
}

export function ruleName(rule: Rule): string {
  switch (rule.kind) {
    case "filter":
      return `filter(${rule.description})`;
    case "excludeValues":
      return `excludeValues(${rule.column}: ${rule.values.join(", ")})`;
    case "columnOrder":
      return `columnOrder(${rule.columns.length} columns)`;
    case "custom":
      return rule.name;
    default:
      return `${rule.kind}(${rule.columns.join(", ")})`;
  }
}

function mapColumns(table: DataTable, columns: string[], convert: (value: CellValue) => CellValue): DataTable {
  const present = columns.filter((column) => table.columns.includes(column));
  return {
    columns: [...table.columns],
    rows: table.rows.map((row) => {
      const next = { ...row };
      for (const column of present) {
        next[column] = convert(row[column] ?? null);
      }
      return next;
    })
  };
}

function keepRows(table: DataTable, name: string, log: Logger, keep: (row: TableRow) => boolean): DataTable {
  const rows = table.rows.filter(keep);
  log.info({ rule: name, before: table.rows.length, after: rows.length }, "rows filtered");
  return { columns: [...table.columns], rows };
}

function isBlank(value: CellValue | undefined): boolean {
  return value === null || value === undefined || (typeof value === "string" && value.trim() === "");
}

const dateFormat: RuleHandler<"dateFormat"> = (rule, table) =>
  mapColumns(table, rule.columns, (value) => (typeof value === "string" ? normalizeDateText(value) : null));

const cleanNumber: RuleHandler<"cleanNumber"> = (rule, table) =>
  mapColumns(table, rule.columns, (value) => {
    if (value === null) return null;
    return String(value).trim().replace(/\.0+$/, "");
  });

const filter: RuleHandler<"filter"> = (rule, table, log) => keepRows(table, ruleName(rule), log, rule.predicate);

const excludeValues: RuleHandler<"excludeValues"> = (rule, table, log) => {
  if (!table.columns.includes(rule.column)) {
    log.warn({ rule: ruleName(rule), column: rule.column }, "column not in table");
    return table;
  }
  const excluded = new Set(rule.values);
  return keepRows(table, ruleName(rule), log, (row) => {
    const value = row[rule.column];
    return value === null || value === undefined || !excluded.has(String(value));
  });
};

const notBlank: RuleHandler<"notBlank"> = (rule, table, log) => {
  const present = rule.columns.filter((column) => table.columns.includes(column));
  return keepRows(table, ruleName(rule), log, (row) => present.every((column) => !isBlank(row[column])));
};

const columnOrder: RuleHandler<"columnOrder"> = (rule, table, log) => {
  const existing = rule.columns.filter((column) => table.columns.includes(column));
  const missing = rule.columns.filter((column) => !table.columns.includes(column));
  if (missing.length > 0) {
    log.warn({ rule: ruleName(rule), missing }, "columns missing from table");
  }
  return {
    columns: existing,
    rows: table.rows.map((row) => Object.fromEntries(existing.map((column) => [column, row[column] ?? null])))
  };
};

const custom: RuleHandler<"custom"> = (rule, table) => rule.apply(table);

const RULE_HANDLERS: { [K in RuleKind]: RuleHandler<K> } = {
  dateFormat,
  cleanNumber,
  filter,
  excludeValues,
  notBlank,
  columnOrder,
  custom
};

function applyRule<K extends RuleKind>(rule: Rule<K>, table: DataTable, log: Logger): DataTable {
  const handler: RuleHandler<K> = RULE_HANDLERS[rule.kind];
  return handler(rule, table, log);
}

/**
 * Applies rules in order. A rule that throws is recorded as a warning and the table
 * it received is passed on to the next rule unchanged.
 */
export function applyAll(rules: readonly Rule[], table: DataTable, logger?: Logger): RuleEngineResult {
  const log = logger ?? componentLogger("rules");
  const warnings: RuleApplicationWarning[] = [];
  log.info({ rules: rules.length, rows: table.rows.length }, "applying rules");

  let current = table;
  for (const rule of rules) {
    const name = ruleName(rule);
    try {
      current = applyRule(rule, current, log);
      log.debug({ rule: name }, "rule applied");
    } catch (error) {
      const message = errorMessage(error);
      log.error({ rule: name, err: message }, "rule failed, table passed on unchanged");
      warnings.push({ code: "RULE_APPLICATION_FAILED", rule: name, message });
    }
  }
  return { table: current, warnings };
}
