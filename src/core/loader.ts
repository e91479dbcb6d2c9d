/**
 * Idempotent loader: batch units → `raw_telegram_messages`.
 *
 * Each batch is applied in its own transaction. Rows are inserted on the
 * natural key (message_id, channel_username) with conflicts skipped, so a
 * batch can be re-applied any number of times.
 */
import { z } from "zod";
import type { DatabaseBackend, DatabaseSession } from "../db/backend.js";
import { jsonParam } from "../db/schema.js";
import type { StorageBackend } from "../storage/backend.js";
import {
  BatchFormatError,
  BatchLoadFailedException,
  StorageUnavailableError,
  errorMessage,
} from "./exceptions.js";
import { rootLogger, type Logger } from "./logger.js";
import { isJsonObject, type JsonObject } from "./normalize.js";
import { finishRun, startRun } from "./runs.js";
import type { BatchLoadReport, LoadSummary, RawRecord } from "./types.js";
import { BATCH_FORMAT_VERSION } from "./types.js";
import { parseBatchKey } from "./writer.js";

// ---------------------------------------------------------------------------
// Batch file schemas
// ---------------------------------------------------------------------------

const BatchEnvelopeSchema = z.object({
  formatVersion: z.literal(BATCH_FORMAT_VERSION),
  channel: z.string().min(1),
  runDate: z.string(),
  writtenAt: z.string().datetime({ offset: true }),
  records: z.array(z.unknown()),
});

const RecordKeySchema = z.object({
  id: z.number().int().positive().safe(),
  channel_username: z.string().trim().min(1),
  captured_at: z.string().datetime({ offset: true }).optional(),
});

interface ParsedBatch {
  records: unknown[];
  writtenAt: Date | null;
}

export function parseBatch(key: string, text: string): ParsedBatch {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new BatchFormatError(key, errorMessage(err));
  }

  // Legacy batches are a bare array of records.
  if (Array.isArray(json)) return { records: json, writtenAt: null };

  const envelope = BatchEnvelopeSchema.safeParse(json);
  if (!envelope.success) {
    throw new BatchFormatError(key, envelope.error.issues[0]?.message ?? "invalid envelope");
  }
  return {
    records: envelope.data.records,
    writtenAt: new Date(envelope.data.writtenAt),
  };
}

/** Validate one record and derive its natural key, or null if malformed. */
export function toRawRecord(value: unknown, fallbackCapturedAt: Date): RawRecord | null {
  if (!isJsonObject(value)) return null;
  const parsed = RecordKeySchema.safeParse(value);
  if (!parsed.success) return null;
  const payload: JsonObject = value;
  return {
    messageId: parsed.data.id,
    channel: parsed.data.channel_username,
    capturedAt: parsed.data.captured_at
      ? new Date(parsed.data.captured_at)
      : fallbackCapturedAt,
    payload,
  };
}

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

export interface LoaderOptions {
  now?: () => Date;
  logger?: Logger;
}

export class IdempotentLoader {
  private db: DatabaseBackend;
  private storage: StorageBackend;
  private now: () => Date;
  private log: Logger;

  constructor(db: DatabaseBackend, storage: StorageBackend, opts: LoaderOptions = {}) {
    this.db = db;
    this.storage = storage;
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: "loader" });
  }

  /** Batch keys in storage, optionally for a single run date. */
  async discover(runDate?: string): Promise<string[]> {
    const keys = await this.storage.list(runDate ?? "");
    return keys.filter((key) => parseBatchKey(key) !== null);
  }

  /** Load every discovered batch. Only setup failures reject. */
  async run(opts: { runDate?: string } = {}): Promise<LoadSummary> {
    try {
      await this.db.initialize();
    } catch (err) {
      throw new StorageUnavailableError(errorMessage(err));
    }

    const runId = await startRun(this.db, "load", this.now());
    const summary: LoadSummary = {
      runId,
      batches: [],
      filesProcessed: 0,
      filesFailed: 0,
      recordsSeen: 0,
      recordsInserted: 0,
      recordsDuplicate: 0,
      recordsMalformed: 0,
    };

    try {
      const keys = await this.discover(opts.runDate);
      if (keys.length === 0) {
        this.log.warn({ runDate: opts.runDate ?? null }, "no batch units found");
      }

      for (const key of keys) {
        const report = await this.loadBatch(key);
        summary.batches.push(report);
        summary.filesProcessed++;
        if (report.status === "failed") {
          summary.filesFailed++;
          continue;
        }
        summary.recordsSeen += report.seen;
        summary.recordsInserted += report.inserted;
        summary.recordsDuplicate += report.duplicates;
        summary.recordsMalformed += report.malformed;
      }
    } catch (err) {
      await finishRun(this.db, runId, "failed", { ...summary, error: errorMessage(err) }, this.now());
      throw err;
    }

    await finishRun(
      this.db,
      runId,
      summary.filesFailed === 0 ? "completed" : "failed",
      summary,
      this.now(),
    );
    this.log.info(
      {
        runId,
        filesProcessed: summary.filesProcessed,
        filesFailed: summary.filesFailed,
        recordsInserted: summary.recordsInserted,
        recordsDuplicate: summary.recordsDuplicate,
        recordsMalformed: summary.recordsMalformed,
      },
      "load finished",
    );
    return summary;
  }

  /**
   * Apply one batch atomically. Malformed records and duplicate keys are
   * counted, not failures; anything else rolls the whole batch back.
   */
  async loadBatch(key: string): Promise<BatchLoadReport> {
    const address = parseBatchKey(key);
    const report: BatchLoadReport = {
      key,
      channel: address?.channel ?? "",
      runDate: address?.runDate ?? "",
      status: "loaded",
      seen: 0,
      inserted: 0,
      duplicates: 0,
      malformed: 0,
    };

    try {
      const text = new TextDecoder().decode(await this.storage.read(key));
      const batch = parseBatch(key, text);
      const fallback = batch.writtenAt ?? this.now();

      const counts = await this.db.transaction(async (tx) => {
        const c = { seen: 0, inserted: 0, duplicates: 0, malformed: 0 };
        for (const [index, value] of batch.records.entries()) {
          c.seen++;
          const record = toRawRecord(value, fallback);
          if (!record) {
            c.malformed++;
            this.log.warn({ key, index }, "skipping record without valid id or channel_username");
            continue;
          }
          if (await this.insert(tx, record)) c.inserted++;
          else c.duplicates++;
        }
        return c;
      });

      Object.assign(report, counts);
      this.log.info({ ...report }, "batch loaded");
    } catch (err) {
      const failure =
        err instanceof BatchFormatError ? err : new BatchLoadFailedException(key, errorMessage(err));
      report.status = "failed";
      report.error = failure.message;
      this.log.error({ key, err: report.error }, "batch load failed; rolled back");
    }
    return report;
  }

  private async insert(tx: DatabaseSession, record: RawRecord): Promise<boolean> {
    const changes = await tx.execute(
      `INSERT INTO ${this.db.tables.messages} (message_id, channel_username, message_data, scraped_at)
       VALUES (?, ?, ${jsonParam(this.db.dialect)}, ?)
       ON CONFLICT (message_id, channel_username) DO NOTHING`,
      [
        record.messageId,
        record.channel,
        JSON.stringify(record.payload),
        record.capturedAt.toISOString(),
      ],
    );
    return changes > 0;
  }
}
