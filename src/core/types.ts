/**
 * Pipeline types shared by the crawl, load and enrich stages.
 */
import type { JsonObject, MapNode } from "./normalize.js";

// ---------------------------------------------------------------------------
// History source
// ---------------------------------------------------------------------------

export interface PhotoMedia {
  kind: "photo";
  mediaId: string;
  download(): Promise<Uint8Array>;
}

export interface OtherMedia {
  kind: "other";
}

export type MediaReference = PhotoMedia | OtherMedia;

/** One message as returned by a history page. */
export interface HistoryItem {
  id: number;
  date: Date;
  payload: MapNode;
  media: MediaReference | null;
}

export interface PageRequest {
  /** Only items older than this id; 0 means start at the newest. */
  offsetId: number;
  limit: number;
}

export interface HistorySource {
  connect(): Promise<void>;
  /** Items newest-first. */
  fetchPage(channel: string, page: PageRequest): Promise<HistoryItem[]>;
  disconnect(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Records and batches
// ---------------------------------------------------------------------------

/** A captured message as written to a batch unit. */
export type CapturedRecord = JsonObject;

export interface RawRecord {
  messageId: number;
  channel: string;
  capturedAt: Date;
  payload: JsonObject;
}

export const BATCH_FORMAT_VERSION = 1;

export interface BatchUnit {
  formatVersion: number;
  channel: string;
  runDate: string;
  writtenAt: string;
  records: CapturedRecord[];
}

// ---------------------------------------------------------------------------
// Detections
// ---------------------------------------------------------------------------

export type BoundingBox = [number, number, number, number];

export interface Finding {
  label: string;
  confidence: number;
  box: BoundingBox;
}

export interface DetectionModel {
  readonly name: string;
  detect(image: Uint8Array, filename: string): Promise<Finding[]>;
}

export interface Detection extends Finding {
  messageId: number;
  imageFilename: string;
  detectedAt: Date;
}

// ---------------------------------------------------------------------------
// Run summaries
// ---------------------------------------------------------------------------

export interface CrawlResult {
  channel: string;
  records: CapturedRecord[];
  pages: number;
  mediaStored: number;
  mediaExisting: number;
  mediaFailed: number;
}

export type ChannelCrawlStatus = "written" | "empty" | "failed";

export interface ChannelCrawlReport {
  channel: string;
  status: ChannelCrawlStatus;
  records: number;
  batchKey: string | null;
  mediaStored: number;
  mediaExisting: number;
  mediaFailed: number;
  error?: string;
}

export interface CrawlSummary {
  runDate: string;
  channels: ChannelCrawlReport[];
  recordsWritten: number;
  channelsFailed: number;
}

export interface BatchLoadReport {
  key: string;
  channel: string;
  runDate: string;
  status: "loaded" | "failed";
  seen: number;
  inserted: number;
  duplicates: number;
  malformed: number;
  error?: string;
}

export interface LoadSummary {
  runId: string;
  batches: BatchLoadReport[];
  filesProcessed: number;
  filesFailed: number;
  recordsSeen: number;
  recordsInserted: number;
  recordsDuplicate: number;
  recordsMalformed: number;
}

export interface EnrichSummary {
  runId: string;
  model: string;
  assetsSeen: number;
  assetsProcessed: number;
  assetsSkipped: number;
  assetsUnmatched: number;
  assetsFailed: number;
  detectionsInserted: number;
  errors: string[];
}
