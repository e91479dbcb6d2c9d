/**
 * Configuration validation and backend factory.
 */
import { z } from "zod";
import { ConfigurationError } from "./core/exceptions.js";
import { createLogger, LOG_LEVELS, type Logger } from "./core/logger.js";
import type { DetectionModel, HistorySource } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { HttpDetectionModel } from "./providers/detection/http.js";
import { TelegramHistorySource } from "./providers/telegram/history.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const StorageConfigSchema = z.object({
  provider: z.literal("disk").default("disk"),
  config: z
    .object({ basePath: z.string().min(1).default("./data/raw/telegram_messages") })
    .default({}),
});

const DbConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("sqlite"),
    config: z.object({ path: z.string().min(1).default("./channel-harvest.db") }).default({}),
  }),
  z.object({
    provider: z.literal("postgres"),
    config: z.object({
      connectionString: z.string().min(1),
      schema: z.string().regex(/^[a-z_][a-z0-9_]*$/).default("raw"),
    }),
  }),
]);

const TelegramConfigSchema = z.object({
  apiId: z.coerce.number().int().positive(),
  apiHash: z.string().min(1),
  session: z.string().min(1),
});

const ChannelHandleSchema = z
  .string()
  .regex(/^@?[A-Za-z0-9_]+$/, "channel handles are letters, digits and underscores")
  .transform((handle) => handle.replace(/^@/, ""));

const CrawlConfigSchema = z.object({
  channels: z.array(ChannelHandleSchema).default([]),
  pageSize: z.number().int().min(1).max(1000).default(100),
  lookbackDays: z.number().positive().default(30),
});

const DetectorConfigSchema = z.discriminatedUnion("provider", [
  z.object({
    provider: z.literal("http"),
    config: z.object({
      url: z.string().url(),
      timeoutMs: z.number().int().positive().default(60_000),
      name: z.string().min(1).optional(),
    }),
  }),
]);

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({}),
  db: DbConfigSchema.default({ provider: "sqlite" }),
  telegram: TelegramConfigSchema.optional(),
  crawl: CrawlConfigSchema.default({}),
  detector: DetectorConfigSchema.optional(),
  log: z.object({ level: z.enum(LOG_LEVELS).default("info") }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/** Crawl settings handed to the crawler and writer. */
export interface CrawlSettings {
  channels: string[];
  pageSize: number;
  lookbackMs: number;
}

export interface HarvestComponents {
  storage: StorageBackend;
  db: DatabaseBackend;
  history: HistorySource | null;
  detector: DetectionModel | null;
  crawl: CrawlSettings;
  logger: Logger;
}

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

function buildStorage(config: Config["storage"]): StorageBackend {
  return new DiskStorage(config.config.basePath);
}

function buildDb(config: Config["db"]): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.config.path);
    case "postgres":
      return new PostgresBackend(config.config.connectionString, config.config.schema);
  }
}

function buildDetector(config: Config["detector"]): DetectionModel | null {
  if (!config) return null;
  return new HttpDetectionModel(config.config);
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function validateConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}

export function parseConfig(raw: unknown): HarvestComponents {
  const config = validateConfig(raw);
  const logger = createLogger(config.log.level);
  return {
    storage: buildStorage(config.storage),
    db: buildDb(config.db),
    history: config.telegram ? new TelegramHistorySource(config.telegram, logger) : null,
    detector: buildDetector(config.detector),
    crawl: {
      channels: config.crawl.channels,
      pageSize: config.crawl.pageSize,
      lookbackMs: config.crawl.lookbackDays * DAY_MS,
    },
    logger,
  };
}
