import { PageSource } from "../capture/pageSource";
import { NormalizedRecord, RecordSource } from "../types/record";
import { RowExtractionWarning } from "../types/warnings";

export interface HarvestDates {
  /** Date the harvest runs; partition key of everything it writes. */
  ingestionDate: string;
  /** Date the harvested actions happened (the day before the harvest). */
  eventDate: string;
}

export interface ExtractionResult {
  source: RecordSource;
  records: NormalizedRecord[];
  warnings: RowExtractionWarning[];
  /** Total the page reports about itself, when it reports one. */
  expectedCount: number | null;
}

export interface SourceExtractor {
  readonly source: RecordSource;
  extract(page: PageSource, dates: HarvestDates): Promise<ExtractionResult>;
  validate(result: ExtractionResult): boolean;
}
