/**
 * Shared test fixtures: fake history source, fake detection model,
 * temp dirs, captured logs, pre-configured harvest.
 */
import { mkdtempSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { ChannelHarvest } from "../src/index.js";
import { createLogger, type Logger } from "../src/core/logger.js";
import {
  bytesNode,
  mapNode,
  scalarNode,
  type PayloadNode,
} from "../src/core/normalize.js";
import type {
  DetectionModel,
  Finding,
  HistoryItem,
  HistorySource,
  PageRequest,
} from "../src/core/types.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { DiskStorage } from "../src/storage/disk.js";

export const NOW = new Date("2026-10-19T12:00:00.000Z");
export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export const fixedNow = (): Date => NOW;

// ---------------------------------------------------------------------------
// Temp dir + backends
// ---------------------------------------------------------------------------

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "channel-harvest-test-"));
}

export async function makeDb(): Promise<SQLiteBackend> {
  const db = new SQLiteBackend(":memory:");
  await db.initialize();
  return db;
}

export function makeStorage(dir: string = makeTmpDir()): DiskStorage {
  return new DiskStorage(join(dir, "lake"));
}

// ---------------------------------------------------------------------------
// Captured logs
// ---------------------------------------------------------------------------

export interface LogEntry {
  level: number;
  msg: string;
  [key: string]: unknown;
}

export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger("debug", {
    write(line: string) {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

export const WARN = 40;
export const ERROR = 50;

// ---------------------------------------------------------------------------
// History items
// ---------------------------------------------------------------------------

export interface ItemOptions {
  text?: string;
  photo?: { mediaId: string; bytes?: Uint8Array; fail?: boolean };
  document?: boolean;
}

export const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 1, 2, 3, 4]);

export function makeItem(id: number, date: Date, opts: ItemOptions = {}): HistoryItem {
  const entries: [string, PayloadNode][] = [
    ["_", scalarNode("Message")],
    ["id", scalarNode(id)],
    ["date", scalarNode(date.toISOString())],
    ["message", scalarNode(opts.text ?? `message ${id}`)],
    ["fileReference", bytesNode(new Uint8Array([9, 9, 9]))],
  ];

  let media: HistoryItem["media"] = null;
  if (opts.photo) {
    const photo = opts.photo;
    media = {
      kind: "photo",
      mediaId: photo.mediaId,
      download: async () => {
        if (photo.fail) throw new Error("connection reset");
        return photo.bytes ?? JPEG_BYTES;
      },
    };
  } else if (opts.document) {
    media = { kind: "other" };
  }
  return { id, date, payload: mapNode(entries), media };
}

/** Items `ids` (newest-first), one hour apart, starting one hour before NOW. */
export function makeHistory(ids: number[], opts: ItemOptions = {}): HistoryItem[] {
  return ids.map((id, i) => makeItem(id, new Date(NOW.getTime() - (i + 1) * HOUR_MS), opts));
}

// ---------------------------------------------------------------------------
// Fake history source
// ---------------------------------------------------------------------------

export class FakeHistorySource implements HistorySource {
  calls: { channel: string; offsetId: number; limit: number }[] = [];
  connected = false;
  connectCount = 0;
  failing = new Set<string>();

  constructor(private channels: Record<string, HistoryItem[]>) {}

  async connect(): Promise<void> {
    this.connected = true;
    this.connectCount++;
  }

  async fetchPage(channel: string, page: PageRequest): Promise<HistoryItem[]> {
    this.calls.push({ channel, ...page });
    if (this.failing.has(channel)) throw new Error(`network down for ${channel}`);
    const items = this.channels[channel] ?? [];
    const older = page.offsetId === 0 ? items : items.filter((i) => i.id < page.offsetId);
    return older.slice(0, page.limit);
  }

  async disconnect(): Promise<void> {
    this.connected = false;
  }
}

// ---------------------------------------------------------------------------
// Fake detection model
// ---------------------------------------------------------------------------

export class FakeDetectionModel implements DetectionModel {
  readonly name = "fake-yolo";
  calls: string[] = [];

  constructor(private results: Record<string, Finding[] | Error> = {}) {}

  set(filename: string, result: Finding[] | Error): void {
    this.results[filename] = result;
  }

  async detect(_image: Uint8Array, filename: string): Promise<Finding[]> {
    this.calls.push(filename);
    const result = this.results[filename] ?? [];
    if (result instanceof Error) throw result;
    return result;
  }
}

export const BOTTLE: Finding = { label: "bottle", confidence: 0.91, box: [10, 20, 110, 220] };
export const PERSON: Finding = { label: "person", confidence: 0.75, box: [0, 0, 50, 100] };

// ---------------------------------------------------------------------------
// Pre-configured harvest
// ---------------------------------------------------------------------------

export async function makeHarvest(opts: {
  history?: HistorySource;
  detector?: DetectionModel;
  channels?: string[];
  pageSize?: number;
  lookbackMs?: number;
  logger?: Logger;
} = {}): Promise<{ harvest: ChannelHarvest; db: SQLiteBackend; storage: DiskStorage }> {
  const db = await makeDb();
  const storage = makeStorage();
  const harvest = new ChannelHarvest({
    storage,
    db,
    history: opts.history,
    detector: opts.detector,
    crawl: {
      channels: opts.channels ?? [],
      pageSize: opts.pageSize ?? 3,
      lookbackMs: opts.lookbackMs ?? 7 * DAY_MS,
    },
    logger: opts.logger ?? createLogger("silent"),
    now: fixedNow,
  });
  return { harvest, db, storage };
}
