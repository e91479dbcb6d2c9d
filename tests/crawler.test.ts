/**
 * Tests for the bounded history crawler.
 */
import { describe, test, expect } from "vitest";
import { HistoryCrawler, assetKey } from "../src/core/crawler.js";
import { CrawlFailedException } from "../src/core/exceptions.js";
import type { HistoryItem, HistorySource, PageRequest } from "../src/core/types.js";
import {
  DAY_MS,
  FakeHistorySource,
  HOUR_MS,
  JPEG_BYTES,
  NOW,
  WARN,
  captureLogger,
  fixedNow,
  makeHistory,
  makeItem,
  makeStorage,
} from "./fixtures.js";

function makeCrawler(
  source: HistorySource,
  opts: { pageSize?: number; lookbackMs?: number } = {},
) {
  const storage = makeStorage();
  const { logger, entries } = captureLogger();
  const crawler = new HistoryCrawler(source, storage, {
    pageSize: opts.pageSize ?? 3,
    lookbackMs: opts.lookbackMs ?? 7 * DAY_MS,
    now: fixedNow,
    logger,
  });
  return { crawler, storage, entries };
}

describe("HistoryCrawler: window and pagination", () => {
  test("stops at the first item older than the lookback window", async () => {
    const source = new FakeHistorySource({ chan: makeHistory([10, 9, 8, 7, 6, 5, 4, 3, 2, 1]) });
    const { crawler } = makeCrawler(source, { lookbackMs: 4.5 * HOUR_MS });

    const result = await crawler.crawl("chan");

    expect(result.records.map((r) => r.id)).toEqual([10, 9, 8, 7]);
    expect(result.pages).toBe(2);
    expect(source.calls).toEqual([
      { channel: "chan", offsetId: 0, limit: 3 },
      { channel: "chan", offsetId: 8, limit: 3 },
    ]);
  });

  test("an item exactly at the cutoff is inside the window", async () => {
    const source = new FakeHistorySource({
      chan: [
        makeItem(2, new Date(NOW.getTime() - HOUR_MS)),
        makeItem(1, new Date(NOW.getTime() - 2 * HOUR_MS)),
      ],
    });
    const { crawler } = makeCrawler(source, { lookbackMs: 2 * HOUR_MS });

    const result = await crawler.crawl("chan");
    expect(result.records.map((r) => r.id)).toEqual([2, 1]);
  });

  test("a short page ends the crawl", async () => {
    const source = new FakeHistorySource({ chan: makeHistory([5, 4, 3, 2, 1]) });
    const { crawler } = makeCrawler(source);

    const result = await crawler.crawl("chan");

    expect(result.records.map((r) => r.id)).toEqual([5, 4, 3, 2, 1]);
    expect(result.pages).toBe(2);
    expect(source.calls.map((c) => c.offsetId)).toEqual([0, 3]);
  });

  test("an empty page after full pages ends the crawl", async () => {
    const source = new FakeHistorySource({ chan: makeHistory([6, 5, 4, 3, 2, 1]) });
    const { crawler } = makeCrawler(source);

    const result = await crawler.crawl("chan");

    expect(result.records).toHaveLength(6);
    expect(result.pages).toBe(3);
    expect(source.calls.map((c) => c.offsetId)).toEqual([0, 4, 1]);
  });

  test("a channel with no history yields no records", async () => {
    const source = new FakeHistorySource({ quiet: [] });
    const { crawler } = makeCrawler(source);

    const result = await crawler.crawl("quiet");
    expect(result.records).toEqual([]);
    expect(result.pages).toBe(1);
  });

  test("stops when the cursor does not move backward", async () => {
    const page = makeHistory([3, 2, 1]);
    const stuck: HistorySource = {
      connect: async () => undefined,
      disconnect: async () => undefined,
      fetchPage: async (_channel: string, _page: PageRequest): Promise<HistoryItem[]> => page,
    };
    const { crawler, entries } = makeCrawler(stuck);

    const result = await crawler.crawl("chan");

    expect(result.pages).toBe(2);
    expect(result.records.map((r) => r.id)).toEqual([3, 2, 1]);
    const skipped = entries.find((e) => e.msg === "skipping items not older than the cursor");
    expect(skipped?.level).toBe(WARN);
    expect(skipped?.skipped).toBe(3);
    const warning = entries.find((e) => e.msg === "history cursor did not move backward; stopping");
    expect(warning?.level).toBe(WARN);
    expect(warning?.offsetId).toBe(1);
  });

  test("an inclusive cursor does not capture the boundary item twice", async () => {
    const history = makeHistory([6, 5, 4, 3, 2, 1]);
    const offsets: number[] = [];
    const inclusive: HistorySource = {
      connect: async () => undefined,
      disconnect: async () => undefined,
      fetchPage: async (_channel: string, page: PageRequest): Promise<HistoryItem[]> => {
        offsets.push(page.offsetId);
        const from = page.offsetId === 0 ? history : history.filter((i) => i.id <= page.offsetId);
        return from.slice(0, page.limit);
      },
    };
    const { crawler, entries } = makeCrawler(inclusive);

    const result = await crawler.crawl("chan");

    expect(result.records.map((r) => r.id)).toEqual([6, 5, 4, 3, 2, 1]);
    expect(result.pages).toBe(3);
    expect(offsets).toEqual([0, 4, 2]);
    const skips = entries.filter((e) => e.msg === "skipping items not older than the cursor");
    expect(skips.map((e) => e.offsetId)).toEqual([4, 2]);
  });

  test("items out of newest-first order within a page are skipped", async () => {
    const source = new FakeHistorySource({ chan: makeHistory([5, 3, 4, 2]) });
    const { crawler } = makeCrawler(source, { pageSize: 10 });

    const result = await crawler.crawl("chan");

    expect(result.records.map((r) => r.id)).toEqual([5, 3, 2]);
  });

  test("a failed page fetch rejects with CrawlFailedException", async () => {
    const source = new FakeHistorySource({ chan: makeHistory([1]) });
    source.failing.add("chan");
    const { crawler } = makeCrawler(source);

    const err = await crawler.crawl("chan").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(CrawlFailedException);
    expect(err).toHaveProperty("message", "Crawl of @chan failed: network down for chan");
    expect(err).toHaveProperty("channel", "chan");
  });

  test("rejects a non-positive page size", () => {
    const source = new FakeHistorySource({});
    expect(
      () => new HistoryCrawler(source, makeStorage(), { pageSize: 0, lookbackMs: DAY_MS }),
    ).toThrow(RangeError);
  });
});

describe("HistoryCrawler: records", () => {
  test("records are normalized and tagged with channel and capture time", async () => {
    const date = new Date(NOW.getTime() - HOUR_MS);
    const source = new FakeHistorySource({ chan: [makeItem(42, date, { text: "hello" })] });
    const { crawler } = makeCrawler(source);

    const result = await crawler.crawl("chan");

    expect(result.records).toEqual([
      {
        _: "Message",
        id: 42,
        date: date.toISOString(),
        message: "hello",
        channel_username: "chan",
        captured_at: NOW.toISOString(),
      },
    ]);
    expect(JSON.parse(JSON.stringify(result.records))).toEqual(result.records);
  });

  test("non-photo media adds no asset path", async () => {
    const source = new FakeHistorySource({ chan: makeHistory([1], { document: true }) });
    const { crawler, storage } = makeCrawler(source);

    const result = await crawler.crawl("chan");

    expect(result.records[0]).not.toHaveProperty("image_download_path");
    expect(await storage.list("images")).toEqual([]);
  });
});

describe("HistoryCrawler: media", () => {
  test("stores photos under a deterministic key", async () => {
    const source = new FakeHistorySource({
      chan: makeHistory([7], { photo: { mediaId: "5551234" } }),
    });
    const { crawler, storage } = makeCrawler(source);

    const result = await crawler.crawl("chan");

    expect(result.mediaStored).toBe(1);
    expect(result.records[0].image_download_path).toBe("images/chan_7_5551234.jpg");
    expect(await storage.read("images/chan_7_5551234.jpg")).toEqual(JPEG_BYTES);
  });

  test("an already stored photo is not downloaded again", async () => {
    const source = new FakeHistorySource({
      chan: makeHistory([7], { photo: { mediaId: "1" } }),
    });
    const { crawler, storage } = makeCrawler(source);
    await storage.write("images/chan_7_1.jpg", new Uint8Array([1]));

    const result = await crawler.crawl("chan");

    expect(result.mediaStored).toBe(0);
    expect(result.mediaExisting).toBe(1);
    expect(result.records[0].image_download_path).toBe("images/chan_7_1.jpg");
    expect(await storage.read("images/chan_7_1.jpg")).toEqual(new Uint8Array([1]));
  });

  test("a failed download keeps the record and the rest of the crawl", async () => {
    const source = new FakeHistorySource({
      chan: [
        makeItem(3, new Date(NOW.getTime() - HOUR_MS), { photo: { mediaId: "30" } }),
        makeItem(2, new Date(NOW.getTime() - 2 * HOUR_MS), {
          photo: { mediaId: "20", fail: true },
        }),
        makeItem(1, new Date(NOW.getTime() - 3 * HOUR_MS), {
          photo: { mediaId: "10", bytes: new Uint8Array() },
        }),
      ],
    });
    const { crawler, storage, entries } = makeCrawler(source, { pageSize: 5 });

    const result = await crawler.crawl("chan");

    expect(result.records.map((r) => r.id)).toEqual([3, 2, 1]);
    expect(result.mediaStored).toBe(1);
    expect(result.mediaFailed).toBe(2);
    expect(result.records[1]).not.toHaveProperty("image_download_path");
    expect(result.records[2]).not.toHaveProperty("image_download_path");
    expect(await storage.list("images")).toEqual(["images/chan_3_30.jpg"]);

    const failures = entries.filter((e) => e.msg === "media download failed");
    expect(failures.map((e) => e.messageId)).toEqual([2, 1]);
    expect(failures[0].err).toBe("connection reset");
    expect(failures[1].err).toBe("Media download failed: empty download");
    expect(failures.every((e) => e.level === WARN)).toBe(true);
  });

  test("assetKey places assets under the image prefix", () => {
    expect(
      assetKey("chan", 9, { kind: "photo", mediaId: "77", download: async () => JPEG_BYTES }),
    ).toBe("images/chan_9_77.jpg");
  });
});
