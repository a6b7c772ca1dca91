import { AthenaClient, GetQueryExecutionCommand, StartQueryExecutionCommand } from "@aws-sdk/client-athena";
import { QueryEngine, QueryPoll } from "./queryEngine";

export interface AthenaQueryEngineOptions {
  client: AthenaClient;
  /** s3:// prefix where result files are written. */
  outputLocation: string;
  workGroup?: string;
}

export class AthenaQueryEngine implements QueryEngine {
  constructor(private readonly options: AthenaQueryEngineOptions) {}

  async submit(queryText: string, targetSchema: string): Promise<string> {
    const response = await this.options.client.send(
      new StartQueryExecutionCommand({
        QueryString: queryText,
        QueryExecutionContext: { Database: targetSchema },
        ResultConfiguration: { OutputLocation: this.options.outputLocation },
        WorkGroup: this.options.workGroup
      })
    );
    if (!response.QueryExecutionId) {
      throw new Error("Athena did not return a query execution id");
    }
    return response.QueryExecutionId;
  }

  async poll(jobId: string): Promise<QueryPoll> {
    const execution = await this.describe(jobId);
    const state = execution.Status?.State;
    const reason = execution.Status?.StateChangeReason;
    switch (state) {
      case "SUCCEEDED":
        return { status: "succeeded" };
      case "FAILED":
        return { status: "failed", reason };
      case "CANCELLED":
        return { status: "cancelled", reason };
      default:
        return { status: "running" };
    }
  }

  async fetchResultLocation(jobId: string): Promise<string> {
    const execution = await this.describe(jobId);
    const location = execution.ResultConfiguration?.OutputLocation;
    if (!location) {
      throw new Error(`Athena query ${jobId} has no output location`);
    }
    return location;
  }

  private async describe(jobId: string) {
    const response = await this.options.client.send(new GetQueryExecutionCommand({ QueryExecutionId: jobId }));
    if (!response.QueryExecution) {
      throw new Error(`Athena query ${jobId} not found`);
    }
    return response.QueryExecution;
  }
}
