import { beforeEach, describe, expect, it, vi } from "vitest";

import { ResilientFetcher } from "../scraper/fetch";
import { FakeSheetService } from "./__fixtures__/sheet-service";
import { createRemoteStores, RemoteSheetStore } from "./remote-store";
import { TenantTokenProvider } from "./sheet-auth";
import { SheetClient } from "./sheet-client";
import { TRUNCATION_SUFFIX } from "./truncate";
import { upsert } from "./upsert";

const BASE_URL = "http://sheets.test";
const TARGET = { spreadsheetToken: "sheet-token", sheetId: "tab1" };
const A = "https://example.com";
const B = "https://b.example";
const C = "https://c.example";
const RICH_A = [{ type: "url", text: "Example", link: A }];

function createFetcher(service: FakeSheetService) {
  return new ResilientFetcher({
    policy: { maxRetries: 0, retryDelayMs: 0, requestDelayMs: 0, timeoutMs: 1000, retryClientErrors: false },
    maxConcurrent: 1,
    transport: service.transport,
    sleep: async () => {},
  });
}

function createStore(service: FakeSheetService, chunkRows?: number) {
  const fetcher = createFetcher(service);
  const tokens = new TenantTokenProvider({
    baseUrl: BASE_URL,
    appId: "test-app",
    appSecret: "test-secret",
    fetcher,
    sleep: async () => {},
  });
  const client = new SheetClient({ baseUrl: BASE_URL, tokens, fetcher });
  return new RemoteSheetStore({ client, target: TARGET, name: "remote:website", chunkRows });
}

function putRanges(service: FakeSheetService) {
  return service.calls.filter((call) => call.method === "PUT").map((call) => call.range);
}

describe("RemoteSheetStore", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("writes the header and rows and reads them back", async () => {
    const service = new FakeSheetService();
    const store = createStore(service);
    const dataset = {
      header: ["website_url", "title", "stars"],
      rows: [
        { website_url: A, title: "One", stars: 1 },
        { website_url: B, title: null, stars: 2 },
      ],
    };

    expect(await store.writeAll(dataset)).toBe(true);

    expect(await store.readAll()).toEqual({ ok: true, dataset });
    expect(service.calls).toEqual([
      { method: "PUT", operation: "values", range: "tab1!A1:C3" },
      { method: "GET", operation: "values" },
    ]);
  });

  it("reads an empty sheet as no data", async () => {
    const store = createStore(new FakeSheetService());
    expect(await store.readAll()).toEqual({ ok: true, dataset: null });
  });

  it("blanks cells left over from a larger previous dataset", async () => {
    const service = new FakeSheetService([
      ["website_url", "title", "notes", "extra"],
      [A, "One", "n", 1],
      [B, "Two", "n", 2],
      [C, "Three", "n", 3],
    ]);
    const store = createStore(service);
    await store.readAll();

    await store.writeAll({ header: ["website_url", "title"], rows: [{ website_url: A, title: "Uno" }] });

    expect(putRanges(service)).toEqual(["tab1!A1:D4"]);
    expect(await store.readAll()).toEqual({
      ok: true,
      dataset: { header: ["website_url", "title"], rows: [{ website_url: A, title: "Uno" }] },
    });
  });

  it("falls back to batch update and then to chunked writes", async () => {
    const service = new FakeSheetService();
    service.failPut = (range) => range === "tab1!A1:C6";
    service.failBatch = true;
    const store = createStore(service, 2);
    const rows = Array.from({ length: 5 }, (_, index) => ({
      website_url: `https://site-${index}.example`,
      title: `Site ${index}`,
      readme: index === 0 ? "r".repeat(25_000) : "short",
    }));

    expect(await store.writeAll({ header: ["website_url", "title", "readme"], rows })).toBe(true);

    expect(putRanges(service)).toEqual(["tab1!A1:C6", "tab1!A1:C1", "tab1!A2:C3", "tab1!A4:C5", "tab1!A6:C6"]);
    expect(service.calls.filter((call) => call.method === "POST")).toEqual([
      { method: "POST", operation: "values_batch_update", range: "tab1!A1:C6" },
    ]);
    const read = await store.readAll();
    const stored = read.ok ? read.dataset?.rows ?? [] : [];
    expect(stored.map((row) => row.website_url)).toEqual(rows.map((row) => row.website_url));
    expect(stored[0].readme).toBe(`${"r".repeat(16_250)}${TRUNCATION_SUFFIX}`);
  });

  it("reports failure when every write strategy fails", async () => {
    const service = new FakeSheetService();
    service.failPut = () => true;
    service.failBatch = true;
    const store = createStore(service);

    expect(await store.writeAll({ header: ["website_url"], rows: [{ website_url: A }] })).toBe(false);
    expect(putRanges(service)).toEqual(["tab1!A1:A2", "tab1!A1:A1"]);
    expect(console.error).toHaveBeenCalledWith("❌ [remote:website] all write strategies failed");
  });

  it("refreshes a rejected access token once and retries", async () => {
    const service = new FakeSheetService([["website_url"], [A]]);
    service.revoked.add("tenant-1");
    const store = createStore(service);

    expect(await store.readAll()).toEqual({
      ok: true,
      dataset: { header: ["website_url"], rows: [{ website_url: A }] },
    });
    expect(service.tokensIssued).toBe(2);
    expect(console.warn).toHaveBeenCalledWith(
      "⚠️  [sheet] access token rejected on GET /sheet-token/values/tab1, refreshing"
    );
  });

  it("deletes matching rows from the bottom up", async () => {
    const service = new FakeSheetService([["website_url", "title"], [A, "a1"], [], [RICH_A, "a2"], [B, "b"]]);
    const store = createStore(service);

    expect(await store.exists("website_url", ` ${A} `)).toBe(true);
    expect(await store.deleteWhere("website_url", A)).toEqual({ success: true, removed: 2 });

    expect(service.calls.filter((call) => call.method === "DELETE").map((call) => call.startIndex)).toEqual([4, 2]);
    expect(await store.readAll()).toEqual({
      ok: true,
      dataset: { header: ["website_url", "title"], rows: [{ website_url: B, title: "b" }] },
    });
    expect(await store.exists("website_url", A)).toBe(false);
  });

  it("collapses duplicate rows to the first occurrence", async () => {
    const service = new FakeSheetService([
      ["website_url", "title"],
      [A, "first"],
      [B, "b"],
      [RICH_A, "second"],
      [C, "c"],
    ]);
    const store = createStore(service);

    expect(await store.dedupe("website_url")).toEqual({ success: true, removed: 1 });

    expect(putRanges(service)).toEqual(["tab1!A1:B5"]);
    expect(await store.readAll()).toEqual({
      ok: true,
      dataset: {
        header: ["website_url", "title"],
        rows: [
          { website_url: A, title: "first" },
          { website_url: B, title: "b" },
          { website_url: C, title: "c" },
        ],
      },
    });
  });

  it("leaves the sheet untouched when the deduplicated write fails", async () => {
    const rows = [["website_url", "title"], [A, "first"], [B, "b"], [A, "second"]];
    const service = new FakeSheetService(rows);
    service.failPut = () => true;
    service.failBatch = true;
    const store = createStore(service);

    expect(await store.dedupe("website_url")).toEqual({ success: false, removed: 0 });
    expect(service.snapshot()).toEqual(rows);
  });

  it("appends only URLs the sheet does not hold yet", async () => {
    const service = new FakeSheetService([["website_url", "title"], [A, "old"]]);
    const store = createStore(service);

    expect(
      await store.appendRows([
        { website_url: A, title: "new" },
        { website_url: B, title: "b" },
        { website_url: B, title: "b again" },
      ])
    ).toBe(true);

    expect(service.snapshot()).toEqual([
      ["website_url", "title"],
      [A, "old"],
      [B, "b"],
    ]);
  });

  it("does not write when nothing new is appended", async () => {
    const service = new FakeSheetService([["website_url", "title"], [RICH_A, "old"]]);
    const store = createStore(service);

    expect(await store.appendRows([{ website_url: A, title: "new" }])).toBe(true);
    expect(putRanges(service)).toEqual([]);
  });

  it("refuses to overwrite a sheet without the identity column", async () => {
    const rows = [["name", "notes"], ["keep me", "important"], ["also", "data"]];
    const service = new FakeSheetService(rows);
    const store = createStore(service);

    const result = await upsert(store, [{ website_url: B, title: "b" }], "website_url");

    expect(result).toEqual({
      success: false,
      updated: 0,
      inserted: 0,
      skipped: 0,
      error: "Existing data has no website_url column",
    });
    expect(putRanges(service)).toEqual([]);
    expect(service.snapshot()).toEqual(rows);
  });

  it("writes into a sheet that holds only an unrelated header", async () => {
    const service = new FakeSheetService([["name", "notes"]]);
    const store = createStore(service);

    const result = await upsert(store, [{ website_url: B, title: "b" }], "website_url");

    expect(result).toEqual({ success: true, updated: 0, inserted: 1, skipped: 0 });
    expect(service.snapshot()).toEqual([
      ["website_url", "title"],
      [B, "b"],
    ]);
  });

  it("does not write when the existing data cannot be read", async () => {
    const service = new FakeSheetService([["website_url"], [A]]);
    service.failRead = true;
    const store = createStore(service);

    expect(await store.readAll()).toEqual({ ok: false, error: "HTTP 500, code 1, internal error" });
    const result = await upsert(store, [{ website_url: B }], "website_url");

    expect(result.success).toBe(false);
    expect(putRanges(service)).toEqual([]);
  });

  it("upserts rich-link rows without duplicating them", async () => {
    const service = new FakeSheetService([["website_url", "title"], [RICH_A, "Old"]]);
    const store = createStore(service);

    const result = await upsert(store, [{ website_url: A, title: "New" }, { website_url: B, title: "Bee" }], "website_url");

    expect(result).toEqual({ success: true, updated: 1, inserted: 1, skipped: 0 });
    expect(service.snapshot()).toEqual([
      ["website_url", "title"],
      [A, "New"],
      [B, "Bee"],
    ]);
  });
});

describe("createRemoteStores", () => {
  it("creates a store per configured sheet", () => {
    const fetcher = createFetcher(new FakeSheetService());
    expect(createRemoteStores(null, fetcher)).toEqual({ github: null, website: null });

    const stores = createRemoteStores(
      { baseUrl: BASE_URL, appId: "test-app", appSecret: "test-secret", github: TARGET, website: null },
      fetcher
    );
    expect(stores.github?.name).toBe("remote:github");
    expect(stores.website).toBeNull();
  });
});
