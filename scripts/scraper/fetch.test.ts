import { describe, expect, it, vi } from "vitest";

import { asFetch, backoffDelay, parseRetryAfter, ResilientFetcher } from "./fetch";
import { ProxyPool } from "./proxy-pool";
import type { TransportRequest, TransportResponse } from "./transport";
import type { RetryPolicy } from "./types";

const policy: RetryPolicy = {
  maxRetries: 2,
  retryDelayMs: 1000,
  requestDelayMs: 0,
  timeoutMs: 5000,
  retryClientErrors: false,
};

function respond(status: number, body = "", headers: Record<string, string> = {}): TransportResponse {
  return { url: "https://example.com/", status, headers, body };
}

function createFetcher(
  transport: (request: TransportRequest) => Promise<TransportResponse>,
  overrides: Partial<RetryPolicy> = {}
) {
  const sleep = vi.fn(async (_ms: number) => {});
  const fetcher = new ResilientFetcher({
    policy: { ...policy, ...overrides },
    maxConcurrent: 5,
    transport,
    sleep,
    random: () => 0,
  });
  return { fetcher, sleep };
}

describe("backoffDelay", () => {
  it("uses the request delay first and doubles the retry delay afterwards", () => {
    const withDelay = { ...policy, requestDelayMs: 250 };
    expect([0, 1, 2, 3].map((attempt) => backoffDelay(attempt, withDelay))).toEqual([250, 1000, 2000, 4000]);
  });
});

describe("parseRetryAfter", () => {
  it("reads seconds and HTTP dates", () => {
    expect(parseRetryAfter("7")).toBe(7000);
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:00:10 GMT", Date.parse("2026-01-01T00:00:00Z"))).toBe(10_000);
    expect(parseRetryAfter(undefined)).toBeNull();
    expect(parseRetryAfter("soon")).toBeNull();
  });
});

describe("ResilientFetcher", () => {
  it("makes maxRetries + 1 attempts against a failing server", async () => {
    const transport = vi.fn(async () => respond(500, "boom"));
    const { fetcher, sleep } = createFetcher(transport);

    const result = await fetcher.fetch({ url: "https://example.com/" });

    expect(transport).toHaveBeenCalledTimes(3);
    expect(result.status).toBe("failed");
    expect(result.attempts).toBe(3);
    expect(result.httpStatus).toBe(500);
    expect(result.error).toBe("HTTP 500");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it("returns the first successful response", async () => {
    const transport = vi
      .fn<(request: TransportRequest) => Promise<TransportResponse>>()
      .mockResolvedValueOnce(respond(503))
      .mockResolvedValueOnce({ ...respond(200, "<html></html>"), url: "https://example.com/home" });
    const { fetcher } = createFetcher(transport);

    const result = await fetcher.fetch({ url: "https://example.com/" });

    expect(result).toMatchObject({
      status: "ok",
      attempts: 2,
      httpStatus: 200,
      payload: "<html></html>",
      finalUrl: "https://example.com/home",
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("waits for the longer of the retry delay and Retry-After on 429", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const transport = vi
      .fn<(request: TransportRequest) => Promise<TransportResponse>>()
      .mockResolvedValueOnce(respond(429, "", { "retry-after": "3" }))
      .mockResolvedValueOnce(respond(200, "ok"));
    const { fetcher, sleep } = createFetcher(transport);

    const result = await fetcher.fetch({ url: "https://example.com/" });

    expect(result.status).toBe("ok");
    expect(result.attempts).toBe(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([3000, 1000]);
  });

  it("reports 429 when the rate limit outlasts the retries", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const transport = vi.fn(async () => respond(429));
    const { fetcher } = createFetcher(transport);

    const result = await fetcher.fetch({ url: "https://example.com/" });

    expect(result.status).toBe("failed");
    expect(result.httpStatus).toBe(429);
    expect(result.attempts).toBe(3);
  });

  it("does not retry client errors unless asked to", async () => {
    const transport = vi.fn(async () => respond(404, "missing"));
    const strict = createFetcher(transport);

    const result = await strict.fetcher.fetch({ url: "https://example.com/missing" });
    expect(result).toMatchObject({ status: "failed", httpStatus: 404, attempts: 1, payload: "missing" });
    expect(transport).toHaveBeenCalledTimes(1);

    const lenient = createFetcher(transport, { retryClientErrors: true });
    await lenient.fetcher.fetch({ url: "https://example.com/missing" });
    expect(transport).toHaveBeenCalledTimes(4);
  });

  it("rejects malformed URLs without touching the network", async () => {
    const transport = vi.fn(async () => respond(200));
    const { fetcher } = createFetcher(transport);

    const malformed = await fetcher.fetch({ url: "not a url" });
    const unsupported = await fetcher.fetch({ url: "ftp://example.com/file" });

    expect(malformed).toMatchObject({ status: "failed", attempts: 0, httpStatus: null });
    expect(malformed.error).toBe("Invalid URL: not a url");
    expect(unsupported.attempts).toBe(0);
    expect(transport).not.toHaveBeenCalled();
  });

  it("turns transport errors into a failed result", async () => {
    const transport = vi.fn(async (): Promise<TransportResponse> => {
      throw new Error("Request timed out after 5000ms");
    });
    const { fetcher } = createFetcher(transport);

    const result = await fetcher.fetch({ url: "https://example.com/" });

    expect(result).toMatchObject({
      status: "failed",
      attempts: 3,
      httpStatus: null,
      error: "Request timed out after 5000ms",
    });
  });

  it("switches to a different proxy after a proxy failure", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const pool = new ProxyPool({ probe: async () => ({ ok: true }) });
    await pool.add("http://p1:8080");
    await pool.add("http://p2:8080");

    const proxiesUsed: Array<string | undefined> = [];
    const transport = vi.fn(async (request: TransportRequest) => {
      proxiesUsed.push(request.proxyUrl);
      if (request.proxyUrl === "http://p1:8080") {
        throw new Error("connect ECONNREFUSED");
      }
      return respond(200, "via proxy");
    });
    const fetcher = new ResilientFetcher({
      policy,
      maxConcurrent: 1,
      transport,
      proxies: pool,
      sleep: async () => {},
      random: () => 0,
    });

    const result = await fetcher.fetch({ url: "https://example.com/" });

    expect(result.status).toBe("ok");
    expect(result.attempts).toBe(2);
    expect(proxiesUsed).toEqual(["http://p1:8080", "http://p2:8080"]);
    expect(pool.stats()).toEqual({ total: 2, working: 1 });
  });

  it("never runs more requests at once than its permits", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const activeCounts: number[] = [];
    const transport = vi.fn(async () => {
      inFlight += 1;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      activeCounts.push(fetcher.activeCount);
      inFlight -= 1;
      return respond(200);
    });
    const fetcher = new ResilientFetcher({ policy, maxConcurrent: 2, transport, sleep: async () => {} });

    await Promise.all(Array.from({ length: 6 }, (_, index) => fetcher.fetch({ url: `https://example.com/${index}` })));

    expect(transport).toHaveBeenCalledTimes(6);
    expect(maxInFlight).toBe(2);
    expect(Math.max(...activeCounts)).toBe(2);
    expect(fetcher.activeCount).toBe(0);
  });
});

describe("asFetch", () => {
  it("maps fetcher results onto fetch responses", async () => {
    const transport = vi.fn(async (request: TransportRequest) => {
      if (request.url.endsWith("/missing")) {
        return respond(404, JSON.stringify({ message: "Not Found" }), { "content-type": "application/json" });
      }
      return respond(200, JSON.stringify({ name: "widgets" }), { "content-type": "application/json" });
    });
    const { fetcher } = createFetcher(transport);
    const fetchFn = asFetch(fetcher);

    const ok = await fetchFn("https://api.github.com/repos/acme/widgets", {
      method: "GET",
      headers: { Accept: "application/vnd.github+json" },
    });
    expect(ok.status).toBe(200);
    expect(await ok.json()).toEqual({ name: "widgets" });
    expect(transport.mock.calls[0][0].headers.accept).toBe("application/vnd.github+json");

    const missing = await fetchFn(new URL("https://api.github.com/repos/acme/missing"));
    expect(missing.status).toBe(404);
    expect(missing.headers.get("content-type")).toBe("application/json");
  });

  it("throws when no response was received", async () => {
    const transport = vi.fn(async (): Promise<TransportResponse> => {
      throw new Error("socket hang up");
    });
    const { fetcher } = createFetcher(transport, { maxRetries: 0 });

    await expect(asFetch(fetcher)("https://api.github.com/rate_limit")).rejects.toThrow("socket hang up");
  });
});
