import { ENRICHED_COLUMNS, EnrichedTier } from "../types/record";
import { Rule } from "./ruleEngine";

export interface DeliveryBlocklists {
  excludedActionTypes: string[];
  excludedSegments: string[];
}

export const DELIVERY_COLUMNS: readonly string[] = [
  "ingestion_date",
  "event_date",
  "source",
  "identifier",
  "identifier_check_digit",
  "display_name",
  "action_type",
  "attention_number",
  "verification_code",
  "document_url",
  "segment",
  "platform",
  "account_owner_code",
  "staff_name",
  "staff_role",
  "staff_email",
  "staff_unit"
];

export function processedRules(): Rule[] {
  return [
    { kind: "dateFormat", columns: ["event_date", "ingestion_date"] },
    { kind: "cleanNumber", columns: ["identifier", "attention_number", "account_owner_code", "staff_id"] },
    { kind: "columnOrder", columns: [...ENRICHED_COLUMNS] }
  ];
}

export function deliveryRules(blocklists: DeliveryBlocklists): Rule[] {
  const rules: Rule[] = [...processedRules(), { kind: "notBlank", columns: ["identifier", "display_name"] }];
  if (blocklists.excludedActionTypes.length > 0) {
    rules.push({ kind: "excludeValues", column: "action_type", values: blocklists.excludedActionTypes });
  }
  if (blocklists.excludedSegments.length > 0) {
    rules.push({ kind: "excludeValues", column: "segment", values: blocklists.excludedSegments });
  }
  rules.push({ kind: "columnOrder", columns: [...DELIVERY_COLUMNS] });
  return rules;
}

export function tierRules(tier: EnrichedTier, blocklists: DeliveryBlocklists): Rule[] {
  return tier === "processed" ? processedRules() : deliveryRules(blocklists);
}
