/**
 * channel-harvest – incremental Telegram channel ingestion with idempotent
 * loading and object-detection enrichment.
 */
import { parseConfig, type CrawlSettings } from "./config.js";
import { HistoryCrawler } from "./core/crawler.js";
import { AssetEnricher } from "./core/enricher.js";
import { ConfigurationError, errorMessage } from "./core/exceptions.js";
import { IdempotentLoader } from "./core/loader.js";
import { rootLogger, type Logger } from "./core/logger.js";
import type {
  ChannelCrawlReport,
  CrawlSummary,
  DetectionModel,
  EnrichSummary,
  HistorySource,
  LoadSummary,
} from "./core/types.js";
import { BatchWriter, toRunDate } from "./core/writer.js";
import type { DatabaseBackend } from "./db/backend.js";
import type { StorageBackend } from "./storage/backend.js";

export { parseConfig, validateConfig, ConfigSchema } from "./config.js";
export type { Config, CrawlSettings } from "./config.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export {
  decodeAssetFilename,
  encodeAssetFilename,
  ASSET_FILENAME_VERSION,
} from "./core/asset-filename.js";
export { normalizePayload, liftPayload } from "./core/normalize.js";
export { HistoryCrawler } from "./core/crawler.js";
export { BatchWriter, batchKey, parseBatchKey } from "./core/writer.js";
export { IdempotentLoader } from "./core/loader.js";
export { AssetEnricher } from "./core/enricher.js";
export { SQLiteBackend } from "./db/sqlite.js";
export { PostgresBackend } from "./db/postgres.js";
export { DiskStorage } from "./storage/disk.js";
export { HttpDetectionModel } from "./providers/detection/http.js";
export { TelegramHistorySource } from "./providers/telegram/history.js";

export interface ChannelHarvestOptions {
  storage: StorageBackend;
  db: DatabaseBackend;
  history?: HistorySource | null;
  detector?: DetectionModel | null;
  crawl?: Partial<CrawlSettings>;
  logger?: Logger;
  now?: () => Date;
}

const DEFAULT_CRAWL: CrawlSettings = {
  channels: [],
  pageSize: 100,
  lookbackMs: 30 * 24 * 60 * 60 * 1000,
};

export interface RunSummary {
  crawl: CrawlSummary | null;
  load: LoadSummary;
  enrich: EnrichSummary | null;
}

export class ChannelHarvest {
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private history: HistorySource | null;
  private detector: DetectionModel | null;
  private crawlSettings: CrawlSettings;
  private logger: Logger;
  private now: () => Date;

  constructor(opts: ChannelHarvestOptions) {
    this.storage = opts.storage;
    this.db = opts.db;
    this.history = opts.history ?? null;
    this.detector = opts.detector ?? null;
    this.crawlSettings = { ...DEFAULT_CRAWL, ...opts.crawl };
    this.logger = opts.logger ?? rootLogger;
    this.now = opts.now ?? (() => new Date());
  }

  /** Construct from a configuration object (validated with Zod). */
  static fromConfig(config: unknown): ChannelHarvest {
    const components = parseConfig(config);
    return new ChannelHarvest({
      storage: components.storage,
      db: components.db,
      history: components.history,
      detector: components.detector,
      crawl: components.crawl,
      logger: components.logger,
    });
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Crawl every channel and write one batch unit per channel. A channel
   * whose crawl fails is reported and the others continue; failing to
   * connect to the history source aborts the run.
   */
  async crawl(opts: { channels?: string[]; runDate?: string } = {}): Promise<CrawlSummary> {
    const history = this.history;
    if (!history) {
      throw new ConfigurationError("Crawling needs Telegram credentials (telegram.*)");
    }
    const channels = opts.channels ?? this.crawlSettings.channels;
    if (channels.length === 0) {
      throw new ConfigurationError("No channels configured (crawl.channels)");
    }

    const runDate = opts.runDate ?? toRunDate(this.now());
    const crawler = new HistoryCrawler(history, this.storage, {
      pageSize: this.crawlSettings.pageSize,
      lookbackMs: this.crawlSettings.lookbackMs,
      now: this.now,
      logger: this.logger,
    });
    const writer = new BatchWriter(this.storage, { now: this.now, logger: this.logger });
    const log = this.logger.child({ component: "harvest" });

    const summary: CrawlSummary = {
      runDate,
      channels: [],
      recordsWritten: 0,
      channelsFailed: 0,
    };

    await history.connect();
    try {
      for (const channel of channels) {
        const report: ChannelCrawlReport = {
          channel,
          status: "empty",
          records: 0,
          batchKey: null,
          mediaStored: 0,
          mediaExisting: 0,
          mediaFailed: 0,
        };
        try {
          const result = await crawler.crawl(channel);
          report.mediaStored = result.mediaStored;
          report.mediaExisting = result.mediaExisting;
          report.mediaFailed = result.mediaFailed;
          const written = await writer.write(channel, result.records, runDate);
          report.records = written.records;
          report.batchKey = written.key;
          report.status = written.key ? "written" : "empty";
          summary.recordsWritten += written.records;
        } catch (err) {
          report.status = "failed";
          report.error = errorMessage(err);
          summary.channelsFailed++;
          log.error({ channel, err: report.error }, "channel crawl failed");
        }
        summary.channels.push(report);
      }
    } finally {
      await history.disconnect();
    }
    return summary;
  }

  /** Load batch units into the raw message table. */
  async load(opts: { runDate?: string } = {}): Promise<LoadSummary> {
    const loader = new IdempotentLoader(this.db, this.storage, {
      now: this.now,
      logger: this.logger,
    });
    return loader.run(opts);
  }

  /** Run the detection model over stored assets not yet enriched. */
  async enrich(): Promise<EnrichSummary> {
    if (!this.detector) {
      throw new ConfigurationError("Enrichment needs a detection model (detector.*)");
    }
    const enricher = new AssetEnricher(this.db, this.storage, this.detector, {
      now: this.now,
      logger: this.logger,
    });
    return enricher.run();
  }

  /** crawl → load → enrich; stages without configuration are skipped. */
  async run(): Promise<RunSummary> {
    const crawl = this.history ? await this.crawl() : null;
    const load = await this.load();
    const enrich = this.detector ? await this.enrich() : null;
    return { crawl, load, enrich };
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
