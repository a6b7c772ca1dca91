import { ZodError } from "zod";
import { ConfigError, errorMessage } from "../errors";
import { formatDayFirst } from "../normalize/date";
import { RecordSource } from "../types/record";
import { readJson } from "../utils/fs";
import { HarvestConfig, HarvestConfigSchema, HarvestEnv, HarvestEnvSchema, SourceConfig } from "./harvestConfig";

function describeIssues(error: ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function parseHarvestConfig(data: unknown, origin = "config"): HarvestConfig {
  const parsed = HarvestConfigSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`invalid ${origin}: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadHarvestConfig(configPath: string): Promise<HarvestConfig> {
  let data: unknown;
  try {
    data = await readJson(configPath);
  } catch (error) {
    throw new ConfigError(`cannot read ${configPath}: ${errorMessage(error)}`);
  }
  return parseHarvestConfig(data, configPath);
}

export function parseHarvestEnv(env: NodeJS.ProcessEnv = process.env): HarvestEnv {
  const parsed = HarvestEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`invalid environment: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function getSourceById(config: HarvestConfig, sourceId: RecordSource): SourceConfig | undefined {
  return config.sources.find((source) => source.id === sourceId);
}

/** Source URL for an event date, e.g. `...?fecha=17-03-2025` or `...?date=17/03/2025`. */
export function buildSourceUrl(source: SourceConfig, eventDate: string): string {
  const separator = source.date_format === "dd-mm-yyyy" ? "-" : "/";
  return source.url_template.split("{date}").join(formatDayFirst(eventDate, separator));
}
