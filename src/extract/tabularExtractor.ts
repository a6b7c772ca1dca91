import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { PageSource } from "../capture/pageSource";
import { SchemaDriftError, ValidationError } from "../errors";
import { componentLogger, Logger } from "../logging/logger";
import { parseDayFirstDate } from "../normalize/date";
import { parseTaxId } from "../normalize/identifier";
import { NormalizedRecord } from "../types/record";
import { parseGroupedInteger } from "../utils/number";
import { normalizeWhitespace } from "../utils/text";
import { ExtractionResult, HarvestDates, SourceExtractor } from "./extractor";

export const REGISTRY_SELECTORS = {
  table: "#tblSociedades",
  rows: '#tblSociedades tbody tr[role="row"]',
  pageSize: 'select[name="tblSociedades_length"]',
  summary: "#tblSociedades_info"
} as const;

/** Page-size option that shows every row. */
export const SHOW_ALL_ROWS = "-1";

/** event date | action type | tax id | attention number | display name | verification code */
export const REGISTRY_ROW_ARITY = 6;

export interface TabularExtractorOptions {
  controlTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Reads the self-reported total out of a summary such as
 * "Mostrando registros del 1 al 10 en 1.234 registros".
 */
export function parseExpectedCount(summary: string): number | null {
  const match = normalizeWhitespace(summary).match(/\ben\s+(\d[\d.,\s]*?)\s+registros\b/i);
  if (!match) return null;
  return parseGroupedInteger(match[1]);
}

function cellTexts($: cheerio.CheerioAPI, row: cheerio.Cheerio<AnyNode>): string[] {
  return row
    .find("td")
    .toArray()
    .map((cell) => normalizeWhitespace($(cell).text()));
}

/**
 * Registry daily-actions table.
 *
 * Loaded → Expanded: the table opens on a partial page, so the page-size control is set
 * to show every row before anything is read.
 * Expanded → Parsed: every row must have exactly {@link REGISTRY_ROW_ARITY} cells; any other
 * shape means the layout changed and the whole batch is rejected.
 * Parsed → Validated: the number of rows must equal the total the page reports.
 */
export class TabularExtractor implements SourceExtractor {
  readonly source = "registry" as const;
  private readonly controlTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: TabularExtractorOptions = {}) {
    this.controlTimeoutMs = options.controlTimeoutMs ?? 10000;
    this.log = options.logger ?? componentLogger("extract.registry");
  }

  async extract(page: PageSource, dates: HarvestDates): Promise<ExtractionResult> {
    const documentUrl = page.currentUrl();
    const log = this.log.child({ url: documentUrl });

    const controlReady = await page.waitForClickable(REGISTRY_SELECTORS.pageSize, this.controlTimeoutMs);
    if (!controlReady) {
      throw new SchemaDriftError(this.source, "page-size control not found");
    }
    await page.selectOption(REGISTRY_SELECTORS.pageSize, SHOW_ALL_ROWS);
    log.debug({ state: "Expanded" }, "table expanded to all rows");

    const $ = cheerio.load(await page.content());
    if ($(REGISTRY_SELECTORS.table).length === 0) {
      throw new SchemaDriftError(this.source, `table ${REGISTRY_SELECTORS.table} not found`);
    }

    const records = $(REGISTRY_SELECTORS.rows)
      .toArray()
      .map((row, index) => this.parseRow(cellTexts($, $(row)), index, documentUrl, dates));
    log.info({ state: "Parsed", rows: records.length }, "registry rows parsed");

    const summary = normalizeWhitespace($(REGISTRY_SELECTORS.summary).first().text());
    const expectedCount = parseExpectedCount(summary);
    if (expectedCount === null) {
      throw new ValidationError(this.source, null, records.length, `unreadable summary "${summary}"`);
    }

    return { source: this.source, records, warnings: [], expectedCount };
  }

  validate(result: ExtractionResult): boolean {
    const valid = result.expectedCount !== null && result.records.length === result.expectedCount;
    if (!valid) {
      this.log.error(
        { expected: result.expectedCount, extracted: result.records.length },
        "registry row count does not match the page total"
      );
    }
    return valid;
  }

  private parseRow(
    cells: string[],
    index: number,
    documentUrl: string,
    dates: HarvestDates
  ): NormalizedRecord {
    if (cells.length !== REGISTRY_ROW_ARITY) {
      throw new SchemaDriftError(
        this.source,
        `row ${index} has ${cells.length} cells, expected ${REGISTRY_ROW_ARITY}: ${JSON.stringify(cells)}`
      );
    }
    const [dateText, actionType, taxIdText, attentionNumber, displayName, verificationCode] = cells;

    const eventDate = parseDayFirstDate(dateText);
    if (!eventDate) {
      throw new SchemaDriftError(this.source, `row ${index} first cell is not a date: "${dateText}"`);
    }
    if (!verificationCode) {
      throw new SchemaDriftError(this.source, `row ${index} has an empty verification code`);
    }

    const taxId = parseTaxId(taxIdText);
    if (!taxId) {
      this.log.warn({ row: index, taxId: taxIdText }, "unparseable tax id, keeping row without identifier");
    }

    return {
      source: this.source,
      identifier: taxId?.body ?? null,
      identifier_check_digit: taxId?.checkDigit ?? null,
      display_name: displayName,
      document_url: documentUrl,
      action_type: actionType,
      attention_number: attentionNumber || null,
      verification_code: verificationCode,
      event_date: eventDate,
      ingestion_date: dates.ingestionDate
    };
  }
}
