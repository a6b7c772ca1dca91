import { z } from "zod";

const SourceSchema = z.object({
  id: z.enum(["registry", "gazette"]),
  url_template: z.string().includes("{date}"),
  date_format: z.enum(["dd-mm-yyyy", "dd/mm/yyyy"]),
  enabled: z.boolean().default(true)
});

const StorageSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("local"),
    root_dir: z.string().min(1),
    base_path: z.string().default("harvest")
  }),
  z.object({
    kind: z.literal("s3"),
    bucket: z.string().min(1),
    region: z.string().min(1),
    base_path: z.string().default("harvest")
  })
]);

const ReferenceTableSchema = z.object({
  schema: z.string().min(1),
  table: z.string().min(1)
});

const ReferenceSchema = z.object({
  region: z.string().min(1),
  output_location: z.string().startsWith("s3://"),
  work_group: z.string().optional(),
  companies: ReferenceTableSchema,
  staff: ReferenceTableSchema,
  poll: z
    .object({
      interval_ms: z.number().int().positive().default(2000),
      max_attempts: z.number().int().positive().default(150)
    })
    .default({})
});

const NotificationSchema = z.object({
  from: z.string().email(),
  to: z.array(z.string().email()).min(1),
  subject_prefix: z.string().default("Company registrations")
});

export const HarvestConfigSchema = z.object({
  version: z.string(),
  timezone: z.string().default("America/Santiago"),
  sources: z.array(SourceSchema).min(1),
  storage: StorageSchema,
  reference: ReferenceSchema.optional(),
  delivery: z
    .object({
      excluded_action_types: z.array(z.string()).default([]),
      excluded_segments: z.array(z.string()).default([])
    })
    .default({}),
  browser: z
    .object({
      headless: z.boolean().default(true),
      user_agent: z.string().optional(),
      page_timeout_ms: z.number().int().positive().default(30000),
      control_timeout_ms: z.number().int().positive().default(10000)
    })
    .default({}),
  notification: NotificationSchema.optional(),
  status_dir: z.string().default("data/status")
});

/** SMTP and database settings come from the environment, never from the config file. */
export const HarvestEnvSchema = z.object({
  SMTP_HOST: z.string().optional(),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USER: z.string().optional(),
  SMTP_PASS: z.string().optional(),
  SMTP_SECURE: z
    .enum(["true", "false"])
    .default("false")
    .transform((value) => value === "true"),
  DATABASE_URL: z.string().optional()
});

export type HarvestConfig = z.infer<typeof HarvestConfigSchema>;
export type SourceConfig = z.infer<typeof SourceSchema>;
export type NotificationConfig = z.infer<typeof NotificationSchema>;
export type HarvestEnv = z.infer<typeof HarvestEnvSchema>;
