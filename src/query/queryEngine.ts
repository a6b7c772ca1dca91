import { setTimeout as delay } from "timers/promises";
import { QueryFailedError, QueryTimeoutError } from "../errors";

export type QueryStatus = "running" | "succeeded" | "failed" | "cancelled";

export interface QueryPoll {
  status: QueryStatus;
  reason?: string;
}

/**
 * Remote analytic query engine: queries run asynchronously and leave their result
 * as an object in storage.
 */
export interface QueryEngine {
  submit(queryText: string, targetSchema: string): Promise<string>;
  poll(jobId: string): Promise<QueryPoll>;
  fetchResultLocation(jobId: string): Promise<string>;
}

export interface PollOptions {
  intervalMs: number;
  maxAttempts: number;
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_POLL_OPTIONS: PollOptions = { intervalMs: 2000, maxAttempts: 150 };

/**
 * Submits a query and polls until it reaches a terminal status. Returns the result location.
 * Throws QueryFailedError on failed/cancelled and QueryTimeoutError once attempts run out.
 */
export async function runQuery(
  engine: QueryEngine,
  queryText: string,
  targetSchema: string,
  options: PollOptions = DEFAULT_POLL_OPTIONS
): Promise<string> {
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  const jobId = await engine.submit(queryText, targetSchema);

  for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
    const { status, reason } = await engine.poll(jobId);
    if (status === "succeeded") {
      return engine.fetchResultLocation(jobId);
    }
    if (status === "failed" || status === "cancelled") {
      throw new QueryFailedError(jobId, status, reason);
    }
    if (attempt < options.maxAttempts) {
      await sleep(options.intervalMs);
    }
  }
  throw new QueryTimeoutError(jobId, options.maxAttempts);
}
