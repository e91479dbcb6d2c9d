/**
 * Asset correlation enricher: stored photos → `raw_yolo_detections`.
 *
 * The owning message of each asset is recovered from its filename. Each
 * asset is committed on its own, together with a row in
 * `raw_enriched_assets`, so assets with no findings are not re-run and a
 * crash leaves every earlier asset durably enriched.
 */
import type { DatabaseBackend, DatabaseSession } from "../db/backend.js";
import { jsonParam } from "../db/schema.js";
import type { StorageBackend } from "../storage/backend.js";
import {
  decodeAssetFilename,
  hasAssetExtension,
  type DecodedAssetFilename,
} from "./asset-filename.js";
import { IMAGE_PREFIX } from "./crawler.js";
import {
  DetectionFailedException,
  StorageUnavailableError,
  errorMessage,
} from "./exceptions.js";
import { rootLogger, type Logger } from "./logger.js";
import { finishRun, startRun } from "./runs.js";
import type { Detection, DetectionModel, EnrichSummary, Finding } from "./types.js";

export interface EnricherOptions {
  now?: () => Date;
  logger?: Logger;
}

type AssetOutcome =
  | { status: "processed"; inserted: number; findings: number }
  | { status: "skipped" }
  | { status: "unmatched"; error: string }
  | { status: "failed"; error: string };

export function isValidFinding(finding: Finding): boolean {
  return (
    finding.label.length > 0 &&
    Number.isFinite(finding.confidence) &&
    finding.confidence >= 0 &&
    finding.confidence <= 1 &&
    finding.box.length === 4 &&
    finding.box.every((v) => Number.isFinite(v))
  );
}

export class AssetEnricher {
  private db: DatabaseBackend;
  private storage: StorageBackend;
  private model: DetectionModel;
  private now: () => Date;
  private log: Logger;

  constructor(
    db: DatabaseBackend,
    storage: StorageBackend,
    model: DetectionModel,
    opts: EnricherOptions = {},
  ) {
    this.db = db;
    this.storage = storage;
    this.model = model;
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: "enricher" });
  }

  /** Asset keys under the image prefix with a supported extension. */
  async discover(): Promise<string[]> {
    const keys = await this.storage.list(IMAGE_PREFIX);
    return keys.filter((key) => hasAssetExtension(basename(key)));
  }

  async run(): Promise<EnrichSummary> {
    try {
      await this.db.initialize();
    } catch (err) {
      throw new StorageUnavailableError(errorMessage(err));
    }

    const runId = await startRun(this.db, "enrich", this.now());
    const summary: EnrichSummary = {
      runId,
      model: this.model.name,
      assetsSeen: 0,
      assetsProcessed: 0,
      assetsSkipped: 0,
      assetsUnmatched: 0,
      assetsFailed: 0,
      detectionsInserted: 0,
      errors: [],
    };

    try {
      const keys = await this.discover();
      if (keys.length === 0) this.log.warn("no assets found to enrich");

      for (const key of keys) {
        summary.assetsSeen++;
        const outcome = await this.enrichAsset(key);
        switch (outcome.status) {
          case "processed":
            summary.assetsProcessed++;
            summary.detectionsInserted += outcome.inserted;
            break;
          case "skipped":
            summary.assetsSkipped++;
            break;
          case "unmatched":
            summary.assetsUnmatched++;
            summary.errors.push(outcome.error);
            break;
          case "failed":
            summary.assetsFailed++;
            summary.errors.push(outcome.error);
            break;
        }
      }
    } catch (err) {
      await finishRun(this.db, runId, "failed", { ...summary, error: errorMessage(err) }, this.now());
      throw err;
    }

    await finishRun(
      this.db,
      runId,
      summary.assetsFailed === 0 ? "completed" : "failed",
      summary,
      this.now(),
    );
    this.log.info(
      {
        runId,
        assetsSeen: summary.assetsSeen,
        assetsProcessed: summary.assetsProcessed,
        assetsSkipped: summary.assetsSkipped,
        assetsUnmatched: summary.assetsUnmatched,
        assetsFailed: summary.assetsFailed,
        detectionsInserted: summary.detectionsInserted,
      },
      "enrichment finished",
    );
    return summary;
  }

  private async enrichAsset(key: string): Promise<AssetOutcome> {
    const filename = basename(key);

    let asset: DecodedAssetFilename;
    try {
      asset = decodeAssetFilename(filename);
    } catch (err) {
      const error = errorMessage(err);
      this.log.warn({ key, err: error }, "skipping asset with unrecognised filename");
      return { status: "unmatched", error };
    }

    if (await this.isProcessed(asset.messageId, filename)) {
      this.log.debug({ key }, "asset already enriched");
      return { status: "skipped" };
    }

    try {
      const result = await this.db.transaction(async (tx) => {
        const image = await this.storage.read(key);
        const findings = await this.detect(image, filename);
        const detectedAt = this.now();
        let inserted = 0;
        for (const finding of findings) {
          const detection: Detection = {
            ...finding,
            messageId: asset.messageId,
            imageFilename: filename,
            detectedAt,
          };
          if (await this.insertDetection(tx, detection)) inserted++;
        }
        await this.markProcessed(tx, asset.messageId, filename, findings.length, detectedAt);
        return { inserted, findings: findings.length };
      });

      this.log.info(
        { key, messageId: asset.messageId, findings: result.findings, inserted: result.inserted },
        result.findings === 0 ? "no objects detected" : "asset enriched",
      );
      return { status: "processed", ...result };
    } catch (err) {
      const error = `${filename}: ${errorMessage(err)}`;
      this.log.error({ key, err: errorMessage(err) }, "asset enrichment failed; rolled back");
      return { status: "failed", error };
    }
  }

  private async detect(image: Uint8Array, filename: string): Promise<Finding[]> {
    let findings: Finding[];
    try {
      findings = await this.model.detect(image, filename);
    } catch (err) {
      if (err instanceof DetectionFailedException) throw err;
      throw new DetectionFailedException(errorMessage(err));
    }
    const invalid = findings.find((f) => !isValidFinding(f));
    if (invalid) {
      throw new DetectionFailedException(
        `model returned an invalid finding: ${JSON.stringify(invalid)}`,
      );
    }
    return findings;
  }

  /** An asset counts as done once it has a marker row or any detection. */
  private async isProcessed(messageId: number, filename: string): Promise<boolean> {
    const t = this.db.tables;
    const marker = await this.db.queryOne(
      `SELECT 1 AS hit FROM ${t.enrichedAssets} WHERE image_filename = ?`,
      [filename],
    );
    if (marker) return true;
    const detection = await this.db.queryOne(
      `SELECT 1 AS hit FROM ${t.detections} WHERE message_id = ? AND image_filename = ? LIMIT 1`,
      [messageId, filename],
    );
    return detection !== null;
  }

  private async insertDetection(tx: DatabaseSession, d: Detection): Promise<boolean> {
    const changes = await tx.execute(
      `INSERT INTO ${this.db.tables.detections}
         (message_id, image_filename, detected_object_class, confidence, bounding_box, detection_timestamp)
       VALUES (?, ?, ?, ?, ${jsonParam(this.db.dialect)}, ?)
       ON CONFLICT (message_id, image_filename, detected_object_class, confidence) DO NOTHING`,
      [
        d.messageId,
        d.imageFilename,
        d.label,
        d.confidence,
        JSON.stringify(d.box),
        d.detectedAt.toISOString(),
      ],
    );
    return changes > 0;
  }

  private async markProcessed(
    tx: DatabaseSession,
    messageId: number,
    filename: string,
    detectionCount: number,
    processedAt: Date,
  ): Promise<void> {
    await tx.execute(
      `INSERT INTO ${this.db.tables.enrichedAssets} (image_filename, message_id, detection_count, model, processed_at)
       VALUES (?, ?, ?, ?, ?)
       ON CONFLICT (image_filename) DO NOTHING`,
      [filename, messageId, detectionCount, this.model.name, processedAt.toISOString()],
    );
  }
}

function basename(key: string): string {
  const slash = key.lastIndexOf("/");
  return slash < 0 ? key : key.slice(slash + 1);
}
