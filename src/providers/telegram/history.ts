/**
 * Telegram channel history over MTProto (GramJS), authenticated with a
 * string session.
 */
import { Api, TelegramClient } from "telegram";
import { StringSession } from "telegram/sessions/index.js";
import { HistorySourceError, MediaDownloadError, errorMessage } from "../../core/exceptions.js";
import { rootLogger, type Logger } from "../../core/logger.js";
import type {
  HistoryItem,
  HistorySource,
  MediaReference,
  PageRequest,
} from "../../core/types.js";
import { tlToPayload } from "./serialize.js";

export interface TelegramSettings {
  apiId: number;
  apiHash: string;
  session: string;
  connectionRetries?: number;
}

export class TelegramHistorySource implements HistorySource {
  private settings: TelegramSettings;
  private client: TelegramClient | null = null;
  private log: Logger;

  constructor(settings: TelegramSettings, logger?: Logger) {
    this.settings = settings;
    this.log = (logger ?? rootLogger).child({ component: "telegram" });
  }

  async connect(): Promise<void> {
    if (this.client) return;
    const client = new TelegramClient(
      new StringSession(this.settings.session),
      this.settings.apiId,
      this.settings.apiHash,
      { connectionRetries: this.settings.connectionRetries ?? 5 },
    );
    try {
      await client.connect();
    } catch (err) {
      await this.release(client);
      throw new HistorySourceError(`Could not connect to Telegram: ${errorMessage(err)}`);
    }
    if (!(await client.checkAuthorization())) {
      await this.release(client);
      throw new HistorySourceError(
        "Telegram session is not authorized; generate a new session string",
      );
    }
    this.client = client;
    this.log.info("connected to Telegram");
  }

  async fetchPage(channel: string, page: PageRequest): Promise<HistoryItem[]> {
    const client = this.client;
    if (!client) throw new HistorySourceError("Telegram client is not connected");

    const messages = await client.getMessages(channel, {
      limit: page.limit,
      offsetId: page.offsetId,
    });

    const items: HistoryItem[] = [];
    for (const message of messages) {
      items.push({
        id: message.id,
        date: new Date(message.date * 1000),
        payload: tlToPayload(message),
        media: mediaReference(client, message),
      });
    }
    return items;
  }

  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    this.client = null;
    await client.destroy();
    this.log.info("disconnected from Telegram");
  }

  /**
   * `disconnect()` leaves GramJS's update loop running and the process
   * alive; `destroy()` stops it too.
   */
  private async release(client: TelegramClient): Promise<void> {
    try {
      await client.destroy();
    } catch (err) {
      this.log.warn({ err: errorMessage(err) }, "Telegram client did not shut down cleanly");
    }
  }
}

function mediaReference(
  client: TelegramClient,
  message: Api.Message,
): MediaReference | null {
  const media = message.media;
  if (!media) return null;
  if (!(media instanceof Api.MessageMediaPhoto) || !(media.photo instanceof Api.Photo)) {
    return { kind: "other" };
  }
  return {
    kind: "photo",
    mediaId: media.photo.id.toString(),
    download: async () => {
      const data = await client.downloadMedia(message, {});
      if (data === undefined || typeof data === "string") {
        throw new MediaDownloadError(`no bytes returned for message ${message.id}`);
      }
      return new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    },
  };
}
