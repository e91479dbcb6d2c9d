/**
 * Channel-partitioned batch writer.
 *
 * One batch unit per (run date, channel), at `<runDate>/<channel>/<channel>.json`.
 */
import { rootLogger, type Logger } from "./logger.js";
import type { StorageBackend } from "../storage/backend.js";
import {
  BATCH_FORMAT_VERSION,
  type BatchUnit,
  type CapturedRecord,
} from "./types.js";

const RUN_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const BATCH_KEY_RE = /^(\d{4}-\d{2}-\d{2})\/([^/]+)\/([^/]+)\.json$/;

export interface BatchAddress {
  runDate: string;
  channel: string;
}

/** UTC calendar date of `date` as `YYYY-MM-DD`. */
export function toRunDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function batchKey(runDate: string, channel: string): string {
  if (!RUN_DATE_RE.test(runDate)) {
    throw new RangeError(`Run date must be YYYY-MM-DD: ${runDate}`);
  }
  if (channel.length === 0 || channel.includes("/")) {
    throw new RangeError(`Invalid channel handle: ${JSON.stringify(channel)}`);
  }
  return `${runDate}/${channel}/${channel}.json`;
}

/** Parse a storage key as a batch address, or null for any other key. */
export function parseBatchKey(key: string): BatchAddress | null {
  const match = BATCH_KEY_RE.exec(key);
  if (!match) return null;
  const [, runDate, channel, stem] = match;
  if (stem !== channel) return null;
  return { runDate, channel };
}

export interface WriteOutcome {
  key: string | null;
  records: number;
}

export class BatchWriter {
  private storage: StorageBackend;
  private now: () => Date;
  private log: Logger;

  constructor(
    storage: StorageBackend,
    opts: { now?: () => Date; logger?: Logger } = {},
  ) {
    this.storage = storage;
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: "writer" });
  }

  /** Write a channel's records. Zero records writes nothing. */
  async write(
    channel: string,
    records: CapturedRecord[],
    runDate: string = toRunDate(this.now()),
  ): Promise<WriteOutcome> {
    if (records.length === 0) {
      this.log.warn({ channel, runDate }, "no records captured; nothing written");
      return { key: null, records: 0 };
    }

    const key = batchKey(runDate, channel);
    const unit: BatchUnit = {
      formatVersion: BATCH_FORMAT_VERSION,
      channel,
      runDate,
      writtenAt: this.now().toISOString(),
      records,
    };
    await this.storage.write(key, JSON.stringify(unit, null, 2));
    this.log.info({ channel, runDate, key, records: records.length }, "batch written");
    return { key, records: records.length };
  }
}
