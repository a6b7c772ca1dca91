import { randomUUID } from "crypto";
import { errorMessage, SchemaDriftError, StorageWriteError } from "../errors";
import {
  ENRICHED_FRAGMENT_EXTENSION,
  ENRICHED_FRAGMENT_NAME,
  fragmentKey,
  partitionPrefix,
  RAW_FRAGMENT_EXTENSION,
  rawFragmentName,
  rawFragmentTime
} from "../io/paths";
import { componentLogger, Logger } from "../logging/logger";
import { EnrichedTier, NormalizedRecord } from "../types/record";
import { DataTable, TableRow } from "../types/table";
import { IsoDateSchema, NormalizedRecordSchema } from "../validation/recordSchema";
import { toJsonLines } from "../utils/fs";
import { ObjectStorage } from "./objectStorage";
import { decodeTable, encodeTable } from "./parquetCodec";

export const PARTITION_COLUMN = "ingestion_date";

/** One append to the raw tier, as read back. */
export interface RawFragment {
  key: string;
  /** UTC write time from the fragment name. */
  writtenAt: string;
  records: NormalizedRecord[];
}

export interface PartitionedStoreOptions {
  storage: ObjectStorage;
  basePath: string;
  logger?: Logger;
  now?: () => Date;
  fragmentSuffix?: () => string;
}

/**
 * Date-partitioned tiers over an object store.
 *
 * The raw tier is append-only: every write lands in a new fragment, so repeated harvests on
 * the same day never overwrite each other. The processed and delivery tiers hold one
 * canonical fragment per partition that each write replaces.
 */
export class PartitionedStore {
  private readonly storage: ObjectStorage;
  private readonly basePath: string;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly fragmentSuffix: () => string;

  constructor(options: PartitionedStoreOptions) {
    this.storage = options.storage;
    this.basePath = options.basePath;
    this.log = options.logger ?? componentLogger("store");
    this.now = options.now ?? (() => new Date());
    this.fragmentSuffix = options.fragmentSuffix ?? (() => randomUUID().slice(0, 8));
  }

  /**
   * Writes `records` as a new JSON-lines fragment of their ingestion date's raw partition.
   * Returns the fragment location, or null for an empty batch. A record that would not read
   * back raises SchemaDriftError and nothing is written.
   */
  async appendRaw(records: NormalizedRecord[], label = "harvest"): Promise<string | null> {
    if (records.length === 0) {
      this.log.info({ label }, "empty batch, no raw fragment written");
      return null;
    }

    records.forEach((record, index) => {
      const parsed = NormalizedRecordSchema.safeParse(record);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new SchemaDriftError(
          record.source,
          `record ${index} (${record.verification_code}) ${issue.path.join(".")}: ${issue.message}`
        );
      }
    });

    const dates = Array.from(new Set(records.map((record) => record.ingestion_date)));
    if (dates.length !== 1) {
      throw new StorageWriteError(
        this.storage.locate(this.basePath),
        `raw batch spans several ingestion dates: ${dates.join(", ")}`
      );
    }

    const key = fragmentKey(this.basePath, "raw", dates[0], rawFragmentName(label, this.now(), this.fragmentSuffix()));
    const location = this.storage.locate(key);
    try {
      await this.storage.put(key, Buffer.from(toJsonLines(records), "utf8"));
    } catch (error) {
      throw new StorageWriteError(location, errorMessage(error), { cause: error });
    }
    this.log.info({ location, records: records.length }, "raw fragment written");
    return location;
  }

  async readRaw(date: string): Promise<NormalizedRecord[]> {
    return (await this.readRawFragments(date)).flatMap((fragment) => fragment.records);
  }

  /** Raw fragments of a partition in key order, each with the records that parse. */
  async readRawFragments(date: string): Promise<RawFragment[]> {
    const prefix = partitionPrefix(this.basePath, "raw", date);
    const keys = (await this.storage.list(prefix)).filter((key) => key.endsWith(RAW_FRAGMENT_EXTENSION));
    const fragments: RawFragment[] = [];

    for (const key of keys) {
      const records: NormalizedRecord[] = [];
      const lines = (await this.storage.get(key)).toString("utf8").split(/\r?\n/);
      lines.forEach((line, index) => {
        if (!line.trim()) return;
        let data: unknown;
        try {
          data = JSON.parse(line);
        } catch (error) {
          this.log.warn({ key, line: index + 1, reason: errorMessage(error) }, "unparseable raw line skipped");
          return;
        }
        const parsed = NormalizedRecordSchema.safeParse(data);
        if (!parsed.success) {
          this.log.warn({ key, line: index + 1, reason: parsed.error.message }, "invalid raw record skipped");
          return;
        }
        records.push(parsed.data);
      });
      fragments.push({ key, writtenAt: rawFragmentTime(key), records });
    }

    const total = fragments.reduce((sum, fragment) => sum + fragment.records.length, 0);
    this.log.info({ date, fragments: keys.length, records: total }, "raw partition read");
    return fragments;
  }

  /**
   * Splits `table` by ingestion date and replaces each affected partition with one fragment.
   * Returns the written locations.
   */
  async writeEnriched(table: DataTable, tier: EnrichedTier): Promise<string[]> {
    if (!table.columns.includes(PARTITION_COLUMN)) {
      throw new StorageWriteError(
        this.storage.locate(`${this.basePath}/${tier}`),
        `table has no ${PARTITION_COLUMN} column`
      );
    }

    const partitions = new Map<string, TableRow[]>();
    table.rows.forEach((row, index) => {
      const date = IsoDateSchema.safeParse(row[PARTITION_COLUMN]);
      if (!date.success) {
        throw new StorageWriteError(
          this.storage.locate(`${this.basePath}/${tier}`),
          `row ${index} has invalid ${PARTITION_COLUMN}: ${JSON.stringify(row[PARTITION_COLUMN])}`
        );
      }
      const rows = partitions.get(date.data) ?? [];
      rows.push(row);
      partitions.set(date.data, rows);
    });

    const locations: string[] = [];
    for (const date of Array.from(partitions.keys()).sort()) {
      const rows = partitions.get(date) ?? [];
      const prefix = partitionPrefix(this.basePath, tier, date);
      const key = fragmentKey(this.basePath, tier, date, ENRICHED_FRAGMENT_NAME);
      const location = this.storage.locate(key);
      try {
        await this.storage.put(key, await encodeTable({ columns: table.columns, rows }));
        const stale = (await this.storage.list(prefix)).filter((existing) => existing !== key);
        for (const staleKey of stale) {
          await this.storage.remove(staleKey);
        }
        this.log.info({ tier, date, location, rows: rows.length, replaced: stale.length }, "partition written");
      } catch (error) {
        throw new StorageWriteError(location, errorMessage(error), { cause: error });
      }
      locations.push(location);
    }
    return locations;
  }

  async readEnriched(tier: EnrichedTier, date: string): Promise<DataTable> {
    const prefix = partitionPrefix(this.basePath, tier, date);
    const keys = (await this.storage.list(prefix)).filter((key) => key.endsWith(ENRICHED_FRAGMENT_EXTENSION));
    const columns: string[] = [];
    const rows: TableRow[] = [];

    for (const key of keys) {
      const fragment = await decodeTable(await this.storage.get(key));
      for (const column of fragment.columns) {
        if (!columns.includes(column)) columns.push(column);
      }
      rows.push(...fragment.rows);
    }

    return {
      columns,
      rows: rows.map((row) => {
        const aligned: TableRow = {};
        for (const column of columns) aligned[column] = row[column] ?? null;
        return aligned;
      })
    };
  }
}
