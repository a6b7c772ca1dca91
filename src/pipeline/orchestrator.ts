import { randomUUID } from "crypto";
import { PageSession, PageSource } from "../capture/pageSource";
import { HarvestConfig, SourceConfig } from "../config/harvestConfig";
import { buildSourceUrl } from "../config/loadConfig";
import { EnrichmentEngine, enrichedToTable, reconcile } from "../enrich/enrichmentEngine";
import { ReferenceDataSource, ReferenceFetch } from "../enrich/referenceData";
import { errorMessage, StorageWriteError, ValidationError } from "../errors";
import { HarvestDates, SourceExtractor } from "../extract/extractor";
import { toReconciliationStatus, toStatusError } from "../io/runStatus";
import { componentLogger, Logger } from "../logging/logger";
import { buildRunReport, NotificationChannel } from "../notify/notificationChannel";
import { applyAll } from "../rules/ruleEngine";
import { tierRules } from "../rules/tierRules";
import { PartitionedStore, RawFragment } from "../storage/partitionedStore";
import { EnrichedTier, NormalizedRecord, RecordSource } from "../types/record";
import { CompanyReferenceRow, StaffReferenceRow } from "../types/reference";
import { NotificationStatus, RunStatus, SourceRunStatus, StatusError } from "../types/runStatus";
import { DataTable } from "../types/table";
import { RuleApplicationWarning } from "../types/warnings";
import { addDays, calendarDate, nowUtcIsoSeconds } from "../utils/time";

const ENRICHED_TIERS: readonly EnrichedTier[] = ["processed", "delivery"];

export interface OrchestratorDeps {
  config: HarvestConfig;
  store: PartitionedStore;
  session: PageSession;
  extractors: Record<RecordSource, SourceExtractor>;
  /** null runs enrichment without reference lookups (all reference columns null) */
  references: ReferenceDataSource | null;
  /** null skips the run report */
  channel: NotificationChannel | null;
  enrichment?: EnrichmentEngine;
  logger?: Logger;
  now?: () => Date;
  runId?: () => string;
}

export interface HarvestOutcome {
  sources: SourceRunStatus[];
  storageErrors: StatusError[];
}

export interface TransformOutcome {
  lenValidation: string;
  countsMatch: boolean;
  collapsed: number;
  duplicatesRemoved: number;
  alarms: RunStatus["alarms"];
  referenceErrors: string[];
  storageErrors: StatusError[];
  ruleWarnings: RuleApplicationWarning[];
  written: string[];
  notification: NotificationStatus;
}

interface ReferenceSnapshot {
  companies: ReferenceFetch<CompanyReferenceRow>;
  staff: ReferenceFetch<StaffReferenceRow>;
}

const SKIPPED_NOTIFICATION: NotificationStatus = { status: "skipped", message_id: null, error: null };

export interface CollapsedHarvests {
  records: NormalizedRecord[];
  /** Records dropped because a later harvest of the same source superseded their fragment. */
  collapsed: number;
}

/**
 * Same-day re-harvests append fragments side by side. Each source keeps the records of
 * its newest fragment; records that share a fragment are never merged.
 */
export function collapseHarvests(fragments: readonly RawFragment[]): CollapsedHarvests {
  const ordered = [...fragments].sort(
    (a, b) => a.writtenAt.localeCompare(b.writtenAt) || a.key.localeCompare(b.key)
  );
  const newest = new Map<RecordSource, string>();
  for (const fragment of ordered) {
    for (const record of fragment.records) newest.set(record.source, fragment.key);
  }

  let total = 0;
  const records: NormalizedRecord[] = [];
  for (const fragment of ordered) {
    total += fragment.records.length;
    records.push(...fragment.records.filter((record) => newest.get(record.source) === fragment.key));
  }
  return { records, collapsed: total - records.length };
}

function uniqueNonNull(values: (string | null)[]): string[] {
  return [...new Set(values.filter((value): value is string => value !== null && value !== ""))];
}

export class PipelineOrchestrator {
  private readonly log: Logger;
  private readonly enrichment: EnrichmentEngine;
  private readonly now: () => Date;
  private readonly runId: () => string;

  constructor(private readonly deps: OrchestratorDeps) {
    this.log = deps.logger ?? componentLogger("pipeline");
    this.enrichment = deps.enrichment ?? new EnrichmentEngine({ logger: this.log.child({ component: "enrichment" }) });
    this.now = deps.now ?? (() => new Date());
    this.runId = deps.runId ?? (() => randomUUID());
  }

  /** Run date in the configured timezone and the event date it harvests (the day before). */
  harvestDates(): HarvestDates {
    const ingestionDate = calendarDate(this.now(), this.deps.config.timezone);
    return { ingestionDate, eventDate: addDays(ingestionDate, -1) };
  }

  async harvest(dates: HarvestDates = this.harvestDates()): Promise<HarvestOutcome> {
    const sources = this.deps.config.sources.filter((source) => source.enabled);
    const storageErrors: StatusError[] = [];

    try {
      const statuses = await this.deps.session(async (page) => {
        const collected: SourceRunStatus[] = [];
        for (const source of sources) {
          collected.push(await this.harvestSource(page, source, dates, storageErrors));
        }
        return collected;
      });
      return { sources: statuses, storageErrors };
    } catch (error) {
      // Browser launch or teardown failed: no per-source outcome survives.
      this.log.error({ err: errorMessage(error) }, "browser session failed");
      return {
        sources: sources.map((source) => ({
          source: source.id,
          status: "error",
          url: buildSourceUrl(source, dates.eventDate),
          extracted: 0,
          expected: null,
          warnings: 0,
          fragment: null,
          error: toStatusError(error)
        })),
        storageErrors
      };
    }
  }

  private async harvestSource(
    page: PageSource,
    source: SourceConfig,
    dates: HarvestDates,
    storageErrors: StatusError[]
  ): Promise<SourceRunStatus> {
    const url = buildSourceUrl(source, dates.eventDate);
    const extractor = this.deps.extractors[source.id];
    const log = this.log.child({ source: source.id });
    const status: SourceRunStatus = {
      source: source.id,
      status: "error",
      url,
      extracted: 0,
      expected: null,
      warnings: 0,
      fragment: null,
      error: null
    };

    try {
      log.info({ url }, "loading source");
      await page.goto(url, this.deps.config.browser.page_timeout_ms);
      const result = await extractor.extract(page, dates);
      status.extracted = result.records.length;
      status.expected = result.expectedCount;
      status.warnings = result.warnings.length;

      if (!extractor.validate(result)) {
        throw new ValidationError(source.id, result.expectedCount, result.records.length);
      }

      try {
        status.fragment = await this.deps.store.appendRaw(result.records, source.id);
      } catch (error) {
        if (!(error instanceof StorageWriteError)) throw error;
        log.error({ err: error.message }, "raw write failed");
        storageErrors.push(toStatusError(error));
        status.error = toStatusError(error);
        return status;
      }

      status.status = result.records.length > 0 ? "success" : "empty";
      log.info({ extracted: status.extracted, fragment: status.fragment }, "source harvested");
      return status;
    } catch (error) {
      log.error({ err: errorMessage(error), name: error instanceof Error ? error.name : undefined }, "source failed");
      status.error = toStatusError(error);
      return status;
    }
  }

  async transform(date: string): Promise<TransformOutcome> {
    const log = this.log.child({ date });
    const fragments = await this.deps.store.readRawFragments(date);
    const extracted = fragments.reduce((sum, fragment) => sum + fragment.records.length, 0);
    const { records: raw, collapsed } = collapseHarvests(fragments);
    log.info({ extracted, kept: raw.length }, "raw partition loaded");
    if (collapsed > 0) {
      log.warn({ collapsed, kept: raw.length }, "records superseded by a later harvest of the same source");
    }

    const references = await this.fetchReferences(raw);
    const result = this.enrichment.enrich(raw, references.companies.rows, references.staff.rows);
    const lenValidation = `extracted:${extracted} transformed:${result.records.length}`;
    const alarm = reconcile(date, raw, result.records);

    const outcome: TransformOutcome = {
      lenValidation,
      countsMatch: alarm === null,
      collapsed,
      duplicatesRemoved: result.duplicatesRemoved,
      alarms: [],
      referenceErrors: uniqueNonNull([references.companies.error, references.staff.error]),
      storageErrors: [],
      ruleWarnings: [],
      written: [],
      notification: SKIPPED_NOTIFICATION
    };

    if (alarm) {
      log.error(
        { missing: alarm.missingSequences, duplicated: alarm.duplicatedSequences, lenValidation },
        "reconciliation alarm, partitions not written"
      );
      outcome.alarms.push(toReconciliationStatus(alarm));
      return outcome;
    }

    const enriched = enrichedToTable(result.records);
    let delivery: DataTable | null = null;
    for (const tier of ENRICHED_TIERS) {
      const applied = applyAll(
        tierRules(tier, {
          excludedActionTypes: this.deps.config.delivery.excluded_action_types,
          excludedSegments: this.deps.config.delivery.excluded_segments
        }),
        enriched,
        log.child({ tier })
      );
      outcome.ruleWarnings.push(...applied.warnings);
      if (tier === "delivery") delivery = applied.table;

      try {
        outcome.written.push(...(await this.deps.store.writeEnriched(applied.table, tier)));
      } catch (error) {
        if (!(error instanceof StorageWriteError)) throw error;
        log.error({ tier, err: error.message }, "enriched write failed");
        outcome.storageErrors.push(toStatusError(error));
      }
    }

    if (delivery) {
      outcome.notification = await this.notify(delivery, date, lenValidation, collapsed);
    }
    log.info({ lenValidation, written: outcome.written.length }, "transform done");
    return outcome;
  }

  private async fetchReferences(raw: NormalizedRecord[]): Promise<ReferenceSnapshot> {
    const none = { rows: [], error: null };
    const source = this.deps.references;
    if (!source) {
      this.log.warn("no reference source configured, reference columns stay null");
      return { companies: none, staff: none };
    }
    const companies = await source.fetchCompanies(uniqueNonNull(raw.map((record) => record.identifier)));
    const staff = await source.fetchStaff(uniqueNonNull(companies.rows.map((row) => row.account_owner_code)));
    return { companies, staff };
  }

  private async notify(
    table: DataTable,
    date: string,
    lenValidation: string,
    collapsed: number
  ): Promise<NotificationStatus> {
    const notification = this.deps.config.notification;
    if (!this.deps.channel || !notification) {
      return SKIPPED_NOTIFICATION;
    }
    const sent = await this.deps.channel.send(
      buildRunReport(
        { kind: "table", table },
        { subjectPrefix: notification.subject_prefix, date, lenValidation, countsMatch: true, collapsed }
      )
    );
    return sent.ok
      ? { status: "sent", message_id: sent.messageId, error: null }
      : { status: "failed", message_id: null, error: sent.error };
  }

  /** Harvest followed by the transform of the same ingestion date. */
  async run(): Promise<RunStatus> {
    const startedAt = nowUtcIsoSeconds(this.now());
    const dates = this.harvestDates();
    const harvested = await this.harvest(dates);
    const transformed = await this.transform(dates.ingestionDate);
    return this.buildStatus(startedAt, dates.ingestionDate, dates.eventDate, harvested, transformed);
  }

  /** Transform on its own, for re-processing a past date. */
  async transformOnly(date: string): Promise<RunStatus> {
    const startedAt = nowUtcIsoSeconds(this.now());
    const transformed = await this.transform(date);
    return this.buildStatus(startedAt, date, null, { sources: [], storageErrors: [] }, transformed);
  }

  /** Harvest on its own; the transform fields stay empty. */
  async harvestOnly(): Promise<RunStatus> {
    const startedAt = nowUtcIsoSeconds(this.now());
    const dates = this.harvestDates();
    const harvested = await this.harvest(dates);
    return this.buildStatus(startedAt, dates.ingestionDate, dates.eventDate, harvested, null);
  }

  private buildStatus(
    startedAt: string,
    ingestionDate: string,
    eventDate: string | null,
    harvested: HarvestOutcome,
    transformed: TransformOutcome | null
  ): RunStatus {
    return {
      schema_version: "1.0",
      run_id: this.runId(),
      started_at: startedAt,
      ended_at: nowUtcIsoSeconds(this.now()),
      ingestion_date: ingestionDate,
      event_date: eventDate,
      sources: harvested.sources,
      len_validation: transformed?.lenValidation ?? null,
      counts_match: transformed?.countsMatch ?? null,
      collapsed: transformed?.collapsed ?? 0,
      duplicates_removed: transformed?.duplicatesRemoved ?? 0,
      alarms: transformed?.alarms ?? [],
      reference_errors: transformed?.referenceErrors ?? [],
      storage_errors: [...harvested.storageErrors, ...(transformed?.storageErrors ?? [])],
      rule_warnings: transformed?.ruleWarnings ?? [],
      written: transformed?.written ?? [],
      notification: transformed?.notification ?? SKIPPED_NOTIFICATION
    };
  }
}
