/**
 * Custom exceptions for the crawl / load / enrich stages.
 *
 * Fatal-setup errors (`ConfigurationError`, `StorageUnavailableError`,
 * `HistorySourceError` raised while connecting) abort a run. The others
 * are caught by the stage that owns the failing item, batch or asset.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class StorageUnavailableError extends Error {
  constructor(message?: string) {
    super(message ? `Storage unavailable: ${message}` : "Storage unavailable");
    this.name = "StorageUnavailableError";
  }
}

export class HistorySourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HistorySourceError";
  }
}

export class CrawlFailedException extends Error {
  channel: string;

  constructor(channel: string, message?: string) {
    super(
      message
        ? `Crawl of @${channel} failed: ${message}`
        : `Crawl of @${channel} failed`,
    );
    this.name = "CrawlFailedException";
    this.channel = channel;
  }
}

export class MediaDownloadError extends Error {
  constructor(message?: string) {
    super(message ? `Media download failed: ${message}` : "Media download failed");
    this.name = "MediaDownloadError";
  }
}

export class BatchFormatError extends Error {
  key: string;

  constructor(key: string, message: string) {
    super(`Invalid batch ${key}: ${message}`);
    this.name = "BatchFormatError";
    this.key = key;
  }
}

export class BatchLoadFailedException extends Error {
  key: string;

  constructor(key: string, message?: string) {
    super(
      message ? `Load of ${key} failed: ${message}` : `Load of ${key} failed`,
    );
    this.name = "BatchLoadFailedException";
    this.key = key;
  }
}

export class AssetFilenameError extends Error {
  filename: string;

  constructor(filename: string, message?: string) {
    super(message ?? `Unrecognised asset filename: ${filename}`);
    this.name = "AssetFilenameError";
    this.filename = filename;
  }
}

export class DetectionFailedException extends Error {
  constructor(message?: string) {
    super(message ? `Detection failed: ${message}` : "Detection failed");
    this.name = "DetectionFailedException";
  }
}

/** Render any thrown value as a log-friendly message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
