#!/usr/bin/env node
/**
 * CLI entrypoint for channel-harvest.
 *
 * Usage:
 *   channel-harvest crawl --channel lobelia4cosmetics --channel tikvahpharma
 *   channel-harvest load --date 2026-10-19
 *   channel-harvest enrich --detector-url http://localhost:8000/detect
 *   channel-harvest run
 */
import { config as loadEnv } from "dotenv";
import { parseArgs } from "node:util";
import { ChannelHarvest } from "./index.js";
import { ConfigurationError, errorMessage } from "./core/exceptions.js";

const USAGE = `
channel-harvest: Telegram channel ingestion

Usage:
  channel-harvest <crawl|load|enrich|run> [options]

Commands:
  crawl                  Crawl channels and write one batch per channel
  load                   Load batch units into the raw message table
  enrich                 Run object detection over stored photos
  run                    crawl, then load, then enrich

Options:
  --channel <handle>     Channel to crawl (repeatable; default: $TELEGRAM_CHANNELS)
  --lookback-days <n>    Crawl window in days      (default: 30)
  --page-size <n>        Messages per history page (default: 100)
  --date <YYYY-MM-DD>    Load only this run date
  --storage-path <dir>   Data lake directory       (default: ./data/raw/telegram_messages)
  --db-path <file>       SQLite database           (default: ./channel-harvest.db)
  --database-url <url>   PostgreSQL connection     (default: $DATABASE_URL)
  --detector-url <url>   Detection endpoint        (default: $DETECTOR_URL)
  --log-level <level>    fatal|error|warn|info|debug|trace|silent
  --help                 Show this help

Environment:
  TELEGRAM_API_ID, TELEGRAM_API_HASH, TELEGRAM_SESSION, TELEGRAM_CHANNELS,
  DATABASE_URL, DETECTOR_URL, LOG_LEVEL (read from .env when present)
`.trim();

const COMMANDS = ["crawl", "load", "enrich", "run"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

loadEnv();
const env = process.env;

const { values, positionals } = parseArgs({
  args: process.argv.slice(2),
  options: {
    channel: { type: "string", multiple: true },
    "lookback-days": { type: "string" },
    "page-size": { type: "string" },
    date: { type: "string" },
    "storage-path": { type: "string" },
    "db-path": { type: "string" },
    "database-url": { type: "string" },
    "detector-url": { type: "string" },
    "log-level": { type: "string" },
    help: { type: "boolean", short: "h", default: false },
  },
  allowPositionals: true,
  strict: true,
});

const command = positionals[0];
if (values.help) {
  console.log(USAGE);
  process.exit(0);
}
if (!isCommand(command)) {
  console.error(USAGE);
  process.exit(1);
}

const databaseUrl = values["database-url"] ?? env.DATABASE_URL;
const detectorUrl = values["detector-url"] ?? env.DETECTOR_URL;
const channels =
  values.channel ??
  (env.TELEGRAM_CHANNELS ?? "").split(",").map((c) => c.trim()).filter((c) => c.length > 0);
const hasTelegram = Boolean(env.TELEGRAM_API_ID && env.TELEGRAM_API_HASH && env.TELEGRAM_SESSION);

const rawConfig = {
  storage: {
    provider: "disk",
    config: values["storage-path"] ? { basePath: values["storage-path"] } : {},
  },
  db: databaseUrl
    ? { provider: "postgres", config: { connectionString: databaseUrl } }
    : { provider: "sqlite", config: values["db-path"] ? { path: values["db-path"] } : {} },
  telegram: hasTelegram
    ? { apiId: env.TELEGRAM_API_ID, apiHash: env.TELEGRAM_API_HASH, session: env.TELEGRAM_SESSION }
    : undefined,
  crawl: {
    channels,
    pageSize: optionalNumber(values["page-size"]),
    lookbackDays: optionalNumber(values["lookback-days"]),
  },
  detector: detectorUrl ? { provider: "http", config: { url: detectorUrl } } : undefined,
  log: { level: values["log-level"] ?? env.LOG_LEVEL },
};

let harvest: ChannelHarvest;
try {
  harvest = ChannelHarvest.fromConfig(rawConfig);
} catch (err) {
  console.error(errorMessage(err));
  process.exit(err instanceof ConfigurationError ? 2 : 1);
}

try {
  switch (command) {
    case "crawl":
      console.log(JSON.stringify(await harvest.crawl(), null, 2));
      break;
    case "load":
      console.log(JSON.stringify(await harvest.load({ runDate: values.date }), null, 2));
      break;
    case "enrich":
      console.log(JSON.stringify(await harvest.enrich(), null, 2));
      break;
    case "run":
      console.log(JSON.stringify(await harvest.run(), null, 2));
      break;
  }
} catch (err) {
  console.error(`Fatal: ${errorMessage(err)}`);
  process.exitCode = 1;
} finally {
  await harvest.close();
}
