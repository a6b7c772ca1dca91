import { AthenaClient } from "@aws-sdk/client-athena";
import { S3Client } from "@aws-sdk/client-s3";
import { playwrightSession } from "../capture/playwright";
import { HarvestConfig, HarvestEnv } from "../config/harvestConfig";
import { loadHarvestConfig, parseHarvestEnv } from "../config/loadConfig";
import { QueryReferenceDataSource, ReferenceDataSource } from "../enrich/referenceData";
import { ContextualExtractor } from "../extract/contextualExtractor";
import { TabularExtractor } from "../extract/tabularExtractor";
import { componentLogger } from "../logging/logger";
import { NotificationChannel } from "../notify/notificationChannel";
import { createSmtpChannel } from "../notify/smtpChannel";
import { PipelineOrchestrator } from "../pipeline/orchestrator";
import { AthenaQueryEngine } from "../query/athenaQueryEngine";
import { LocalObjectStorage, ObjectStorage } from "../storage/objectStorage";
import { PartitionedStore } from "../storage/partitionedStore";
import { parseS3Url, readS3Object, S3ObjectStorage } from "../storage/s3ObjectStorage";

const log = componentLogger("cli");

export interface PipelineContext {
  config: HarvestConfig;
  env: HarvestEnv;
  store: PartitionedStore;
  channel: NotificationChannel | null;
  orchestrator: PipelineOrchestrator;
}

function createObjectStorage(config: HarvestConfig): ObjectStorage {
  const storage = config.storage;
  if (storage.kind === "local") {
    return new LocalObjectStorage(storage.root_dir);
  }
  return new S3ObjectStorage(new S3Client({ region: storage.region }), storage.bucket);
}

function createReferenceSource(config: HarvestConfig): ReferenceDataSource | null {
  const reference = config.reference;
  if (!reference) return null;
  const s3 = new S3Client({ region: reference.region });
  return new QueryReferenceDataSource({
    engine: new AthenaQueryEngine({
      client: new AthenaClient({ region: reference.region }),
      outputLocation: reference.output_location,
      workGroup: reference.work_group
    }),
    readResult: (location) => readS3Object(s3, parseS3Url(location)),
    companies: reference.companies,
    staff: reference.staff,
    poll: { intervalMs: reference.poll.interval_ms, maxAttempts: reference.poll.max_attempts }
  });
}

function createChannel(config: HarvestConfig, env: HarvestEnv): NotificationChannel | null {
  if (!config.notification) return null;
  if (!env.SMTP_HOST) {
    log.warn("notification configured but SMTP_HOST is not set, reports will not be sent");
    return null;
  }
  return createSmtpChannel(env, config.notification);
}

export async function createPipelineContext(configPath: string): Promise<PipelineContext> {
  const config = await loadHarvestConfig(configPath);
  const env = parseHarvestEnv();
  const store = new PartitionedStore({ storage: createObjectStorage(config), basePath: config.storage.base_path });
  const channel = createChannel(config, env);
  const controlTimeoutMs = config.browser.control_timeout_ms;

  const orchestrator = new PipelineOrchestrator({
    config,
    store,
    session: playwrightSession({ headless: config.browser.headless, userAgent: config.browser.user_agent }),
    extractors: {
      registry: new TabularExtractor({ controlTimeoutMs }),
      gazette: new ContextualExtractor({ clickTimeoutMs: controlTimeoutMs })
    },
    references: createReferenceSource(config),
    channel
  });

  return { config, env, store, channel, orchestrator };
}
