/**
 * Asset filename codec.
 *
 * A stored photo is named after the message that owns it, so the name
 * alone is enough to bind a detection back to its message:
 *
 *   v1: `<channel>_<messageId>_<mediaId>.<ext>`
 *
 * Channel handles may contain underscores, so decoding anchors on the two
 * numeric fields at the end of the stem. This format is read by every
 * enricher run against assets written by older crawls; changes must keep
 * v1 names decodable.
 */
import { AssetFilenameError } from "./exceptions.js";

export const ASSET_FILENAME_VERSION = 1;

export const ASSET_EXTENSIONS = ["jpg", "jpeg", "png"] as const;

export type AssetExtension = (typeof ASSET_EXTENSIONS)[number];

export interface AssetIdentity {
  channel: string;
  messageId: number;
  mediaId: string;
}

export interface DecodedAssetFilename extends AssetIdentity {
  version: number;
  extension: AssetExtension;
}

const CHANNEL_RE = /^[A-Za-z0-9_]+$/;
const MEDIA_ID_RE = /^-?\d+$/;
const V1_RE = /^([A-Za-z0-9_]+)_(\d+)_(-?\d+)\.([A-Za-z]+)$/;

function isAssetExtension(ext: string): ext is AssetExtension {
  return ASSET_EXTENSIONS.some((known) => known === ext);
}

export function encodeAssetFilename(
  asset: AssetIdentity,
  extension: AssetExtension = "jpg",
): string {
  if (!CHANNEL_RE.test(asset.channel)) {
    throw new AssetFilenameError(
      asset.channel,
      `Channel handle cannot be encoded: ${JSON.stringify(asset.channel)}`,
    );
  }
  if (!Number.isSafeInteger(asset.messageId) || asset.messageId <= 0) {
    throw new AssetFilenameError(
      String(asset.messageId),
      `Message id must be a positive integer: ${asset.messageId}`,
    );
  }
  if (!MEDIA_ID_RE.test(asset.mediaId)) {
    throw new AssetFilenameError(
      asset.mediaId,
      `Media id must be an integer: ${JSON.stringify(asset.mediaId)}`,
    );
  }
  return `${asset.channel}_${asset.messageId}_${asset.mediaId}.${extension}`;
}

export function decodeAssetFilename(filename: string): DecodedAssetFilename {
  const match = V1_RE.exec(filename);
  if (!match) throw new AssetFilenameError(filename);

  const [, channel, messageIdText, mediaId, rawExt] = match;
  const extension = rawExt.toLowerCase();
  if (!isAssetExtension(extension)) {
    throw new AssetFilenameError(
      filename,
      `Unsupported asset extension in ${filename}`,
    );
  }

  const messageId = Number(messageIdText);
  if (!Number.isSafeInteger(messageId) || messageId <= 0) {
    throw new AssetFilenameError(
      filename,
      `Message id out of range in ${filename}`,
    );
  }

  return {
    version: ASSET_FILENAME_VERSION,
    channel,
    messageId,
    mediaId,
    extension,
  };
}

export function hasAssetExtension(filename: string): boolean {
  const dot = filename.lastIndexOf(".");
  if (dot < 0) return false;
  return isAssetExtension(filename.slice(dot + 1).toLowerCase());
}
