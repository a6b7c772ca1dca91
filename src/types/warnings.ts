import { RecordSource } from "./record";

export interface RowExtractionWarning {
  code: "ROW_EXTRACTION_SKIPPED";
  source: RecordSource;
  row_index: number;
  message: string;
  row_text: string;
}

export interface RuleApplicationWarning {
  code: "RULE_APPLICATION_FAILED";
  rule: string;
  message: string;
}
