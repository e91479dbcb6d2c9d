/**
 * DDL for the raw tables.
 *
 * Downstream models read `raw_telegram_messages` and `raw_yolo_detections`
 * directly; their columns and unique keys are part of the pipeline's
 * contract.
 */
import type { SqlDialect } from "./backend.js";

export interface TableNames {
  messages: string;
  detections: string;
  enrichedAssets: string;
  runs: string;
}

const SCHEMA_NAME_RE = /^[a-z_][a-z0-9_]*$/;

export function tableNames(dialect: SqlDialect, schema = "raw"): TableNames {
  const prefix = dialect === "postgres" ? `${schema}.` : "";
  return {
    messages: `${prefix}raw_telegram_messages`,
    detections: `${prefix}raw_yolo_detections`,
    enrichedAssets: `${prefix}raw_enriched_assets`,
    runs: `${prefix}etl_runs`,
  };
}

export function assertSchemaName(schema: string): string {
  if (!SCHEMA_NAME_RE.test(schema)) {
    throw new Error(`Invalid schema name: ${schema}`);
  }
  return schema;
}

/** Placeholder for a JSON text parameter. */
export function jsonParam(dialect: SqlDialect): string {
  return dialect === "postgres" ? "?::text::jsonb" : "?";
}

export const SQLITE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS raw_telegram_messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  message_id INTEGER NOT NULL,
  channel_username TEXT NOT NULL,
  message_data TEXT NOT NULL,
  scraped_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  UNIQUE (message_id, channel_username)
);

CREATE TABLE IF NOT EXISTS raw_yolo_detections (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  message_id INTEGER NOT NULL,
  image_filename TEXT NOT NULL,
  detected_object_class TEXT NOT NULL,
  confidence REAL NOT NULL,
  bounding_box TEXT,
  detection_timestamp TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
  UNIQUE (message_id, image_filename, detected_object_class, confidence)
);

CREATE INDEX IF NOT EXISTS idx_raw_yolo_detections_asset
  ON raw_yolo_detections (message_id, image_filename);

CREATE TABLE IF NOT EXISTS raw_enriched_assets (
  image_filename TEXT PRIMARY KEY,
  message_id INTEGER NOT NULL,
  detection_count INTEGER NOT NULL,
  model TEXT NOT NULL,
  processed_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS etl_runs (
  id TEXT PRIMARY KEY,
  stage TEXT NOT NULL,
  status TEXT NOT NULL,
  summary TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

export function postgresSchemaSql(schema: string): string {
  const s = assertSchemaName(schema);
  return `
CREATE SCHEMA IF NOT EXISTS ${s};

CREATE TABLE IF NOT EXISTS ${s}.raw_telegram_messages (
  id SERIAL PRIMARY KEY,
  message_id BIGINT NOT NULL,
  channel_username VARCHAR(255) NOT NULL,
  message_data JSONB NOT NULL,
  scraped_at TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (message_id, channel_username)
);

CREATE TABLE IF NOT EXISTS ${s}.raw_yolo_detections (
  id SERIAL PRIMARY KEY,
  message_id BIGINT NOT NULL,
  image_filename VARCHAR(512) NOT NULL,
  detected_object_class VARCHAR(255) NOT NULL,
  confidence REAL NOT NULL,
  bounding_box JSONB,
  detection_timestamp TIMESTAMP WITH TIME ZONE DEFAULT CURRENT_TIMESTAMP,
  UNIQUE (message_id, image_filename, detected_object_class, confidence)
);

CREATE INDEX IF NOT EXISTS idx_raw_yolo_detections_asset
  ON ${s}.raw_yolo_detections (message_id, image_filename);

CREATE TABLE IF NOT EXISTS ${s}.raw_enriched_assets (
  image_filename VARCHAR(512) PRIMARY KEY,
  message_id BIGINT NOT NULL,
  detection_count INTEGER NOT NULL,
  model VARCHAR(255) NOT NULL,
  processed_at TIMESTAMP WITH TIME ZONE NOT NULL
);

CREATE TABLE IF NOT EXISTS ${s}.etl_runs (
  id UUID PRIMARY KEY,
  stage VARCHAR(32) NOT NULL,
  status VARCHAR(32) NOT NULL,
  summary JSONB,
  created_at TIMESTAMP WITH TIME ZONE NOT NULL,
  updated_at TIMESTAMP WITH TIME ZONE NOT NULL
);
`;
}
