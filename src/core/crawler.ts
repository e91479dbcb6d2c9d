/**
 * Bounded history crawler.
 *
 * Walks a channel's history backward one page at a time, using the oldest
 * id of each page as the cursor for the next, until the lookback window,
 * a short page, or the end of history is reached.
 */
import { rootLogger, type Logger } from "./logger.js";
import type { StorageBackend } from "../storage/backend.js";
import { encodeAssetFilename } from "./asset-filename.js";
import { CrawlFailedException, errorMessage, MediaDownloadError } from "./exceptions.js";
import { mapToJson, normalizeMap } from "./normalize.js";
import type {
  CapturedRecord,
  CrawlResult,
  HistoryItem,
  HistorySource,
  PhotoMedia,
} from "./types.js";

export const IMAGE_PREFIX = "images";

export interface CrawlerOptions {
  pageSize: number;
  lookbackMs: number;
  now?: () => Date;
  logger?: Logger;
}

type MediaOutcome = "stored" | "existing" | "failed";

export class HistoryCrawler {
  private source: HistorySource;
  private storage: StorageBackend;
  private pageSize: number;
  private lookbackMs: number;
  private now: () => Date;
  private log: Logger;

  constructor(
    source: HistorySource,
    storage: StorageBackend,
    opts: CrawlerOptions,
  ) {
    if (!Number.isInteger(opts.pageSize) || opts.pageSize <= 0) {
      throw new RangeError(`pageSize must be a positive integer: ${opts.pageSize}`);
    }
    if (!(opts.lookbackMs > 0)) {
      throw new RangeError(`lookbackMs must be positive: ${opts.lookbackMs}`);
    }
    this.source = source;
    this.storage = storage;
    this.pageSize = opts.pageSize;
    this.lookbackMs = opts.lookbackMs;
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: "crawler" });
  }

  /**
   * Crawl one channel. A failed page fetch rejects with
   * `CrawlFailedException`; media failures are counted and logged only.
   */
  async crawl(channel: string): Promise<CrawlResult> {
    const capturedAt = this.now();
    const cutoff = capturedAt.getTime() - this.lookbackMs;
    const result: CrawlResult = {
      channel,
      records: [],
      pages: 0,
      mediaStored: 0,
      mediaExisting: 0,
      mediaFailed: 0,
    };

    this.log.info({ channel, cutoff: new Date(cutoff).toISOString() }, "crawl started");

    let offsetId = 0;
    let oldestId = Infinity;
    for (;;) {
      let items: HistoryItem[];
      try {
        items = await this.source.fetchPage(channel, { offsetId, limit: this.pageSize });
      } catch (err) {
        throw new CrawlFailedException(channel, errorMessage(err));
      }
      result.pages++;
      if (items.length === 0) break;

      let reachedBoundary = false;
      let notOlder = 0;
      for (const item of items) {
        // pages hold strictly older items, newest first
        if (item.id >= oldestId || (offsetId !== 0 && item.id >= offsetId)) {
          notOlder++;
          continue;
        }
        if (item.date.getTime() < cutoff) {
          reachedBoundary = true;
          break;
        }
        result.records.push(await this.capture(channel, item, capturedAt, result));
        oldestId = item.id;
      }
      if (notOlder > 0) {
        this.log.warn(
          { channel, offsetId, skipped: notOlder },
          "skipping items not older than the cursor",
        );
      }
      if (reachedBoundary || items.length < this.pageSize) break;

      const nextOffset = items[items.length - 1].id;
      if (offsetId !== 0 && nextOffset >= offsetId) {
        this.log.warn(
          { channel, offsetId, nextOffset },
          "history cursor did not move backward; stopping",
        );
        break;
      }
      offsetId = nextOffset;
    }

    this.log.info(
      {
        channel,
        records: result.records.length,
        pages: result.pages,
        mediaStored: result.mediaStored,
        mediaExisting: result.mediaExisting,
        mediaFailed: result.mediaFailed,
      },
      "crawl finished",
    );
    return result;
  }

  private async capture(
    channel: string,
    item: HistoryItem,
    capturedAt: Date,
    result: CrawlResult,
  ): Promise<CapturedRecord> {
    const record: CapturedRecord = {
      ...mapToJson(normalizeMap(item.payload)),
      id: item.id,
      channel_username: channel,
      captured_at: capturedAt.toISOString(),
    };

    if (item.media?.kind === "photo") {
      const { outcome, key } = await this.storeMedia(channel, item.id, item.media);
      if (outcome === "stored") result.mediaStored++;
      else if (outcome === "existing") result.mediaExisting++;
      else result.mediaFailed++;
      if (key !== null) record.image_download_path = key;
    }
    return record;
  }

  /** Store a photo under its deterministic key unless it is already there. */
  private async storeMedia(
    channel: string,
    messageId: number,
    media: PhotoMedia,
  ): Promise<{ outcome: MediaOutcome; key: string | null }> {
    try {
      const key = assetKey(channel, messageId, media);
      if (await this.storage.exists(key)) {
        this.log.debug({ key }, "media already stored");
        return { outcome: "existing", key };
      }
      const data = await media.download();
      if (data.length === 0) throw new MediaDownloadError("empty download");
      await this.storage.write(key, data);
      this.log.debug({ key, bytes: data.length }, "media stored");
      return { outcome: "stored", key };
    } catch (err) {
      this.log.warn(
        { channel, messageId, mediaId: media.mediaId, err: errorMessage(err) },
        "media download failed",
      );
      return { outcome: "failed", key: null };
    }
  }
}

/** Storage key of a photo asset. */
export function assetKey(
  channel: string,
  messageId: number,
  media: PhotoMedia,
): string {
  return `${IMAGE_PREFIX}/${encodeAssetFilename({ channel, messageId, mediaId: media.mediaId })}`;
}
