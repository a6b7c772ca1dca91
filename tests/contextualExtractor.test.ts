import { readFileSync } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import {
  ContextualExtractor,
  extractVerificationCode,
  GAZETTE_SELECTORS,
  parseGazetteRows
} from "../src/extract/contextualExtractor";
import { captureLogger } from "./helpers/captureLogger";
import { FakePage } from "./helpers/fakePage";

const fixturesDir = path.join(process.cwd(), "fixtures");
const sectionHtml = readFileSync(path.join(fixturesDir, "gazette_section.html"), "utf8");
const noFoundHtml = readFileSync(path.join(fixturesDir, "gazette_nofound.html"), "utf8");

const SELECT_URL = "https://diario.example.cl/edicionelectronica/select_edition.php?date=17/03/2025";
const EDITION_URL = "https://diario.example.cl/edicionelectronica/index.php?date=17-03-2025&edition=44100";
const SECTION_URL = "https://diario.example.cl/edicionelectronica/empresas_cooperativas.php?date=17-03-2025&edition=44100";
const dates = { ingestionDate: "2025-03-18", eventDate: "2025-03-17" };

function gazettePage(sectionScreenHtml: string): FakePage {
  return new FakePage({
    [SELECT_URL]: { html: "<a href='index.php?date=17-03-2025'>Edición</a>", clickable: { [GAZETTE_SELECTORS.editionLink]: EDITION_URL } },
    [EDITION_URL]: { html: "<a href='empresas_cooperativas.php'>Empresas</a>", clickable: { [GAZETTE_SELECTORS.sectionLink]: SECTION_URL } },
    [SECTION_URL]: { html: sectionScreenHtml }
  });
}

describe("verification code", () => {
  it("accepts dashed and spaced forms", () => {
    expect(extractVerificationCode("Ver PDF (CVE-2581234)")).toBe("2581234");
    expect(extractVerificationCode("CVE 2581235")).toBe("2581235");
    expect(extractVerificationCode("Ver PDF")).toBeNull();
  });
});

describe("gazette rows", () => {
  it("attributes content rows to the latest heading and skips rows it cannot use", () => {
    const parsed = parseGazetteRows(sectionHtml, SECTION_URL, dates);

    expect(parsed.records.map((record) => [record.action_type, record.identifier, record.verification_code])).toEqual([
      ["CONSTITUCIÓN", "76543210", "2581234"],
      ["CONSTITUCIÓN", "5126663", "2581235"],
      ["MODIFICACIÓN", "77777777", "2581237"]
    ]);
    expect(parsed.warnings.map((warning) => [warning.row_index, warning.message])).toEqual([
      [0, "content row before any heading row"],
      [5, 'unparseable tax id "sin rut"']
    ]);
    expect(parsed.actionCounts).toEqual({ "CONSTITUCIÓN": 2, "MODIFICACIÓN": 1 });
  });

  it("builds complete records from a content row", () => {
    const [first] = parseGazetteRows(sectionHtml, SECTION_URL, dates).records;

    expect(first).toEqual({
      source: "gazette",
      identifier: "76543210",
      identifier_check_digit: "3",
      display_name: "Delta Logística SpA",
      document_url: "https://diario.example.cl/publicaciones/2025/03/17/delta.pdf",
      action_type: "CONSTITUCIÓN",
      attention_number: null,
      verification_code: "2581234",
      event_date: "2025-03-17",
      ingestion_date: "2025-03-18"
    });
  });
});

describe("ContextualExtractor", () => {
  it("clicks through the edition selection and the section link", async () => {
    const page = gazettePage(sectionHtml);
    await page.goto(SELECT_URL, 1000);
    const extractor = new ContextualExtractor({ logger: captureLogger().logger });

    const result = await extractor.extract(page, dates);

    expect(page.clicks).toEqual([GAZETTE_SELECTORS.editionLink, GAZETTE_SELECTORS.sectionLink]);
    expect(result.records).toHaveLength(3);
    expect(result.warnings).toHaveLength(2);
    expect(result.expectedCount).toBeNull();
    expect(extractor.validate(result)).toBe(true);
  });

  it("returns an empty result when the edition has no publications", async () => {
    const page = gazettePage(noFoundHtml);
    await page.goto(SELECT_URL, 1000);
    const captured = captureLogger();

    const result = await new ContextualExtractor({ logger: captured.logger }).extract(page, dates);

    expect(result.records).toEqual([]);
    expect(captured.messages()).toContain("no publications in this edition");
  });

  it("returns an empty result when the section link never becomes clickable", async () => {
    const page = new FakePage({ [EDITION_URL]: { html: "<p>Edición sin secciones</p>" } });
    await page.goto(EDITION_URL, 1000);

    const result = await new ContextualExtractor({ logger: captureLogger().logger }).extract(page, dates);

    expect(result.records).toEqual([]);
    expect(page.clicks).toEqual([]);
  });
});
