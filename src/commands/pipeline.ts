import { writeRunStatus } from "../io/runStatus";
import { componentLogger } from "../logging/logger";
import { RunStatus } from "../types/runStatus";
import { createPipelineContext, PipelineContext } from "./context";

const log = componentLogger("cli");

export interface PipelineCommandOptions {
  configPath: string;
}

export interface TransformCommandOptions extends PipelineCommandOptions {
  date?: string;
}

async function finish(context: PipelineContext, status: RunStatus): Promise<RunStatus> {
  const statusPath = await writeRunStatus(context.config.status_dir, status);
  const failedSources = status.sources.filter((source) => source.status === "error").map((source) => source.source);
  log.info(
    {
      runId: status.run_id,
      statusPath,
      lenValidation: status.len_validation,
      countsMatch: status.counts_match,
      failedSources,
      alarms: status.alarms.length,
      storageErrors: status.storage_errors.length
    },
    "run status written"
  );
  return status;
}

export async function runHarvestCommand(opts: PipelineCommandOptions): Promise<RunStatus> {
  const context = await createPipelineContext(opts.configPath);
  return finish(context, await context.orchestrator.harvestOnly());
}

export async function runTransformCommand(opts: TransformCommandOptions): Promise<RunStatus> {
  const context = await createPipelineContext(opts.configPath);
  const date = opts.date ?? context.orchestrator.harvestDates().ingestionDate;
  return finish(context, await context.orchestrator.transformOnly(date));
}

export async function runPipelineCommand(opts: PipelineCommandOptions): Promise<RunStatus> {
  const context = await createPipelineContext(opts.configPath);
  return finish(context, await context.orchestrator.run());
}
