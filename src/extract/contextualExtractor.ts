import * as cheerio from "cheerio";
import type { AnyNode } from "domhandler";
import { PageSource } from "../capture/pageSource";
import { componentLogger, Logger } from "../logging/logger";
import { parseTaxId } from "../normalize/identifier";
import { NormalizedRecord } from "../types/record";
import { RowExtractionWarning } from "../types/warnings";
import { excerpt, normalizeWhitespace } from "../utils/text";
import { ExtractionResult, HarvestDates, SourceExtractor } from "./extractor";

export const GAZETTE_SELECTORS = {
  editionLink: 'a[href*="index.php?date="]',
  sectionLink: 'a[href*="empresas_cooperativas.php"]',
  noResults: "p.nofound",
  rows: "tbody tr",
  heading: "td.title3"
} as const;

const EDITION_SELECTION_MARKER = "select_edition";
const ROW_TEXT_MAX = 200;

export interface ContextualExtractorOptions {
  clickTimeoutMs?: number;
  logger?: Logger;
}

export interface GazetteParseResult {
  records: NormalizedRecord[];
  warnings: RowExtractionWarning[];
  actionCounts: Record<string, number>;
}

type ContentRowParse = { ok: true; record: NormalizedRecord } | { ok: false; reason: string };

/** Pulls the code out of link texts such as "Ver PDF (CVE-2581234)". */
export function extractVerificationCode(linkText: string): string | null {
  const match = linkText.match(/\bCVE[\s:#-]*([0-9A-Z]+)\b/i);
  return match ? match[1].toUpperCase() : null;
}

function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return null;
  }
}

function parseContentRow(
  $: cheerio.CheerioAPI,
  row: cheerio.Cheerio<AnyNode>,
  actionType: string,
  baseUrl: string,
  dates: HarvestDates
): ContentRowParse {
  const cells = row.children("td");
  if (cells.length < 2) {
    return { ok: false, reason: `expected a parties cell and a document cell, found ${cells.length} cells` };
  }

  // Name sits on the left, tax id on the right.
  const parts = $(cells[0]).children();
  if (parts.length < 2) {
    return { ok: false, reason: "name and tax id are not separable" };
  }
  const displayName = normalizeWhitespace(parts.first().text());
  const taxIdText = normalizeWhitespace(parts.last().text());
  if (!displayName) {
    return { ok: false, reason: "empty name" };
  }

  const taxId = parseTaxId(taxIdText);
  if (!taxId || !taxId.checkDigit) {
    return { ok: false, reason: `unparseable tax id "${taxIdText}"` };
  }

  const link = row.find("a[href]").first();
  if (link.length === 0) {
    return { ok: false, reason: "no document link" };
  }
  const verificationCode = extractVerificationCode(normalizeWhitespace(link.text()));
  if (!verificationCode) {
    return { ok: false, reason: `no verification code in "${normalizeWhitespace(link.text())}"` };
  }

  return {
    ok: true,
    record: {
      source: "gazette",
      identifier: taxId.body,
      identifier_check_digit: taxId.checkDigit,
      display_name: displayName,
      document_url: resolveUrl(link.attr("href") ?? "", baseUrl),
      action_type: actionType,
      attention_number: null,
      verification_code: verificationCode,
      event_date: dates.eventDate,
      ingestion_date: dates.ingestionDate
    }
  };
}

/**
 * Walks the gazette section table. Heading rows carry no class and set the action type;
 * rows classed `content` are records attributed to the latest heading.
 */
export function parseGazetteRows(html: string, baseUrl: string, dates: HarvestDates): GazetteParseResult {
  const $ = cheerio.load(html);
  const records: NormalizedRecord[] = [];
  const warnings: RowExtractionWarning[] = [];
  const actionCounts: Record<string, number> = {};
  let currentActionType: string | null = null;

  $(GAZETTE_SELECTORS.rows)
    .toArray()
    .forEach((node, index) => {
      const row = $(node);
      const classAttr = row.attr("class");

      if (classAttr === undefined) {
        const heading = row.find(GAZETTE_SELECTORS.heading).first();
        if (heading.length) {
          currentActionType = normalizeWhitespace(heading.text());
          actionCounts[currentActionType] = actionCounts[currentActionType] ?? 0;
        }
        return;
      }

      if (!classAttr.split(/\s+/).includes("content")) return;

      const skip = (message: string): void => {
        warnings.push({
          code: "ROW_EXTRACTION_SKIPPED",
          source: "gazette",
          row_index: index,
          message,
          row_text: excerpt(normalizeWhitespace(row.text()), ROW_TEXT_MAX)
        });
      };

      if (currentActionType === null) {
        skip("content row before any heading row");
        return;
      }

      const parsed = parseContentRow($, row, currentActionType, baseUrl, dates);
      if (!parsed.ok) {
        skip(parsed.reason);
        return;
      }
      records.push(parsed.record);
      actionCounts[currentActionType] += 1;
    });

  return { records, warnings, actionCounts };
}

/**
 * Official gazette edition. Has no self-reported total, so a batch is never rejected as a
 * whole; rows that cannot be attributed or parsed are skipped one by one.
 */
export class ContextualExtractor implements SourceExtractor {
  readonly source = "gazette" as const;
  private readonly clickTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: ContextualExtractorOptions = {}) {
    this.clickTimeoutMs = options.clickTimeoutMs ?? 10000;
    this.log = options.logger ?? componentLogger("extract.gazette");
  }

  async extract(page: PageSource, dates: HarvestDates): Promise<ExtractionResult> {
    const empty: ExtractionResult = { source: this.source, records: [], warnings: [], expectedCount: null };

    if (page.currentUrl().includes(EDITION_SELECTION_MARKER)) {
      const editionReady = await page.waitForClickable(GAZETTE_SELECTORS.editionLink, this.clickTimeoutMs);
      if (!editionReady) {
        this.log.info({ url: page.currentUrl() }, "no edition offered for the date");
        return empty;
      }
      await page.click(GAZETTE_SELECTORS.editionLink);
    }

    const sectionReady = await page.waitForClickable(GAZETTE_SELECTORS.sectionLink, this.clickTimeoutMs);
    if (!sectionReady) {
      this.log.info({ url: page.currentUrl() }, "edition has no companies section");
      return empty;
    }
    await page.click(GAZETTE_SELECTORS.sectionLink);

    const baseUrl = page.currentUrl();
    const html = await page.content();
    const noResults = normalizeWhitespace(cheerio.load(html)(GAZETTE_SELECTORS.noResults).first().text());
    if (noResults) {
      this.log.info({ url: baseUrl, notice: noResults }, "no publications in this edition");
      return empty;
    }

    const parsed = parseGazetteRows(html, baseUrl, dates);
    for (const warning of parsed.warnings) {
      this.log.warn({ row: warning.row_index, rowText: warning.row_text }, `row skipped: ${warning.message}`);
    }
    for (const [actionType, count] of Object.entries(parsed.actionCounts)) {
      this.log.info({ actionType, count }, "records per action type");
    }
    this.log.info(
      { url: baseUrl, records: parsed.records.length, skipped: parsed.warnings.length },
      "gazette rows parsed"
    );

    return { source: this.source, records: parsed.records, warnings: parsed.warnings, expectedCount: null };
  }

  validate(_result: ExtractionResult): boolean {
    return true;
  }
}
