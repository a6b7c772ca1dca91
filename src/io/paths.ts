import path from "path";
import { Tier } from "../types/record";
import { nowUtcIsoFileSafe } from "../utils/time";

export const ENRICHED_FRAGMENT_NAME = "part-00000.parquet";
export const RAW_FRAGMENT_EXTENSION = ".jsonl";
export const ENRICHED_FRAGMENT_EXTENSION = ".parquet";

export function joinKey(...parts: string[]): string {
  return parts
    .map((part) => part.replace(/^\/+|\/+$/g, ""))
    .filter((part) => part.length > 0)
    .join("/");
}

/** `<base>/<tier>/date=<YYYY-MM-DD>` */
export function partitionPrefix(base: string, tier: Tier, date: string): string {
  return joinKey(base, tier, `date=${date}`);
}

export function fragmentKey(base: string, tier: Tier, date: string, fragmentName: string): string {
  return joinKey(partitionPrefix(base, tier, date), fragmentName);
}

export function rawFragmentName(label: string, now: Date, suffix: string): string {
  return `${label}-${nowUtcIsoFileSafe(now)}-${suffix}${RAW_FRAGMENT_EXTENSION}`;
}

const RAW_FRAGMENT_TIME = /-(\d{4}-\d{2}-\d{2}T\d{2}-\d{2}-\d{2}Z)-[^/]*\.jsonl$/;

/** UTC write time embedded in a raw fragment name, or "" when the name carries none. */
export function rawFragmentTime(key: string): string {
  return key.match(RAW_FRAGMENT_TIME)?.[1] ?? "";
}

export function runStatusPath(statusDir: string, runId: string): string {
  return path.join(statusDir, `run_status_${runId}.json`);
}
