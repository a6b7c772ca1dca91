#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runHarvestCommand, runPipelineCommand, runTransformCommand } from "../commands/pipeline";
import { runPersistCommand } from "../commands/persist";
import { runWeeklyStatsCommand } from "../commands/weeklyStats";
import { errorMessage } from "../errors";
import { logger } from "../logging/logger";
import { IsoDateSchema } from "../validation/recordSchema";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.HARVEST_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parseIsoDate(value: string): string {
  const parsed = IsoDateSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Expected a YYYY-MM-DD date, got "${value}"`);
  }
  return parsed.data;
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("registry-harvester")
  .description("Daily company-registration harvest: scrape, enrich, reconcile, deliver")
  .version(pkg.version);

program.option("--env-file <path>", "Path to .env file (overrides HARVEST_ENV_FILE/DOTENV_CONFIG_PATH)", envPath);

const DEFAULT_CONFIG_PATH = "config/harvest.json";

program
  .command("harvest")
  .description("Scrape every enabled source into the raw tier")
  .option("--config <path>", "Path to harvest config JSON", DEFAULT_CONFIG_PATH)
  .action(async (opts: { config: string }) => {
    await runHarvestCommand({ configPath: opts.config });
  });

program
  .command("transform")
  .description("Enrich, reconcile and write the processed and delivery tiers for one date")
  .option("--config <path>", "Path to harvest config JSON", DEFAULT_CONFIG_PATH)
  .option("--date <date>", "Ingestion date (YYYY-MM-DD), defaults to today", parseIsoDate)
  .action(async (opts: { config: string; date?: string }) => {
    await runTransformCommand({ configPath: opts.config, date: opts.date });
  });

program
  .command("run")
  .description("Harvest then transform today's partition")
  .option("--config <path>", "Path to harvest config JSON", DEFAULT_CONFIG_PATH)
  .action(async (opts: { config: string }) => {
    await runPipelineCommand({ configPath: opts.config });
  });

program
  .command("weekly-stats")
  .description("Per-day delivery counts for the current week")
  .option("--config <path>", "Path to harvest config JSON", DEFAULT_CONFIG_PATH)
  .option("--today <date>", "Reference date (YYYY-MM-DD)", parseIsoDate)
  .option("--send", "Send the summary through the notification channel", false)
  .action(async (opts: { config: string; today?: string; send: boolean }) => {
    await runWeeklyStatsCommand({ configPath: opts.config, today: opts.today, send: opts.send });
  });

program
  .command("persist")
  .requiredOption("--status <path>", "Run status JSON to persist to the database")
  .action(async (opts: { status: string }) => {
    await runPersistCommand({ status: opts.status });
  });

program.parseAsync().catch((error: unknown) => {
  logger.error({ err: errorMessage(error), name: error instanceof Error ? error.name : undefined }, "command failed");
  process.exitCode = 1;
});
