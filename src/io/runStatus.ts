import { ReconciliationAlarm, StorageWriteError } from "../errors";
import { ReconciliationStatus, RunStatus, StatusError } from "../types/runStatus";
import { readJson, writeJson } from "../utils/fs";
import { RunStatusSchema } from "../validation/runStatusSchema";
import { runStatusPath } from "./paths";

export function toStatusError(error: unknown): StatusError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      location: error instanceof StorageWriteError ? error.location : null
    };
  }
  return { name: "Error", message: String(error), location: null };
}

export function toReconciliationStatus(alarm: ReconciliationAlarm): ReconciliationStatus {
  return {
    date: alarm.date,
    extracted: alarm.extracted,
    transformed: alarm.transformed,
    missing_sequences: alarm.missingSequences,
    duplicated_sequences: alarm.duplicatedSequences
  };
}

export async function writeRunStatus(statusDir: string, status: RunStatus): Promise<string> {
  const filePath = runStatusPath(statusDir, status.run_id);
  await writeJson(filePath, status);
  return filePath;
}

export async function readRunStatus(filePath: string): Promise<RunStatus> {
  return RunStatusSchema.parse(await readJson(filePath));
}
