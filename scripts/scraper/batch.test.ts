import { beforeEach, describe, expect, it, vi } from "vitest";

import { MemoryStore } from "../store/__fixtures__/memory-store";
import { saveRecords, scrapeBatch } from "./batch";
import type { FieldExtractor, ScrapedRecord } from "./types";

function fakeExtractor(delays: Record<string, number>, failing: string[] = []): FieldExtractor {
  let calls = 0;
  return {
    kind: "github",
    async extract(url: string): Promise<ScrapedRecord> {
      calls += 1;
      const call = calls;
      await new Promise((resolve) => setTimeout(resolve, delays[url] ?? 0));
      if (failing.includes(url)) {
        throw new Error(`HTTP 404 for ${url}`);
      }
      return { repository_url: url, repository_name: url.split("github.com/")[1] ?? "", stars: call };
    },
  };
}

describe("scrapeBatch", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("returns results in submission order whatever the completion order", async () => {
    const urls = ["https://github.com/acme/slow", "https://github.com/acme/fast"];
    const batch = await scrapeBatch(urls, "github", {
      extractor: fakeExtractor({ "https://github.com/acme/slow": 20 }),
      maxThreads: 2,
    });

    expect(batch.results.map((record) => record.repository_url)).toEqual(urls);
    expect(batch.succeeded).toBe(2);
  });

  it("reports failures per URL without failing the batch", async () => {
    const batch = await scrapeBatch(
      ["https://github.com/acme/widgets", "https://github.com/acme/gone"],
      "github",
      { extractor: fakeExtractor({}, ["https://github.com/acme/gone"]), maxThreads: 2 }
    );

    expect(batch.results).toHaveLength(1);
    expect(batch.errors).toEqual([
      { index: 1, url: "https://github.com/acme/gone", message: "HTTP 404 for https://github.com/acme/gone" },
    ]);
    expect(batch.failed).toBe(1);
  });

  it("refuses an extractor of the wrong kind", async () => {
    await expect(
      scrapeBatch(["https://example.com"], "website", { extractor: fakeExtractor({}), maxThreads: 1 })
    ).rejects.toThrow("Extractor for github cannot scrape website URLs");
  });

  it("stores one row when the same URL is submitted twice", async () => {
    const url = "https://github.com/acme/widgets";
    const store = new MemoryStore();
    const batch = await scrapeBatch([url, url], "github", { extractor: fakeExtractor({}), maxThreads: 2 });

    const [outcome] = await saveRecords(batch.results, "github", [store]);

    expect(batch.results).toHaveLength(2);
    expect(outcome.result).toMatchObject({ success: true, inserted: 1, updated: 0, skipped: 1 });
    expect(store.dataset?.rows).toEqual([{ repository_url: url, repository_name: "acme/widgets", stars: 1 }]);
  });

  it("updates an existing row instead of appending", async () => {
    const url = "https://github.com/acme/widgets";
    const store = new MemoryStore({
      dataset: {
        header: ["repository_url", "repository_name", "stars", "notes"],
        rows: [{ repository_url: url, repository_name: "acme/widgets", stars: 10, notes: "keep me" }],
      },
    });
    const batch = await scrapeBatch([url], "github", { extractor: fakeExtractor({}), maxThreads: 1 });

    const [outcome] = await saveRecords(batch.results, "github", [store]);

    expect(outcome.result).toMatchObject({ success: true, updated: 1, inserted: 0 });
    expect(store.dataset?.rows).toEqual([
      { repository_url: url, repository_name: "acme/widgets", stars: 1, notes: "keep me" },
    ]);
  });
});
