import pLimit, { type LimitFunction } from "p-limit";
import { Headers, Response, type RequestInit } from "undici";
import {
  proxyUrlFor,
  safeUrlForLog,
  undiciTransport,
  type HttpTransport,
  type TransportResponse,
} from "./transport";
import type { FetchRequest, FetchResult, HttpMethod, ProxyEndpoint, RetryPolicy } from "./types";

export const MAX_JITTER_MS = 500;

const DEFAULT_HEADERS: Record<string, string> = {
  "user-agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36",
  accept: "text/html,application/xhtml+xml,application/json;q=0.9,*/*;q=0.8",
  "accept-language": "en-US,en;q=0.9",
};

const HTTP_METHODS: readonly HttpMethod[] = ["GET", "POST", "PUT", "DELETE", "PATCH", "HEAD"];

/** Where the fetcher borrows proxies from. `replace` must not hand back `failed`. */
export interface ProxySource {
  next(): Promise<ProxyEndpoint | null>;
  replace(failed: ProxyEndpoint): Promise<ProxyEndpoint | null>;
}

export interface FetcherOptions {
  policy: RetryPolicy;
  maxConcurrent: number;
  transport?: HttpTransport;
  proxies?: ProxySource | null;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  debug?: boolean;
}

/** Delay before `attempt` (0-based), jitter excluded. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  if (attempt === 0) {
    return policy.requestDelayMs;
  }
  return policy.retryDelayMs * 2 ** (attempt - 1);
}

export function parseRetryAfter(value: string | undefined, now = Date.now()): number | null {
  if (!value) {
    return null;
  }
  const seconds = Number.parseInt(value, 10);
  if (Number.isFinite(seconds) && String(seconds) === value.trim()) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  return Number.isNaN(date) ? null : Math.max(0, date - now);
}

function isRetryableStatus(status: number, policy: RetryPolicy): boolean {
  if (status >= 500 || status === 408 || status === 429) {
    return true;
  }
  return status >= 400 && policy.retryClientErrors;
}

function isHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

const frozen = (result: FetchResult): FetchResult => Object.freeze(result);

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * HTTP client with timeout, exponential backoff, 429 handling and proxy
 * failover. Concurrency is bounded by one shared permit pool; a request keeps
 * its permit for the whole retry loop, backoff sleeps included.
 */
export class ResilientFetcher {
  private readonly policy: RetryPolicy;
  private readonly limit: LimitFunction;
  private readonly transport: HttpTransport;
  private readonly proxies: ProxySource | null;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly debug: boolean;

  constructor(options: FetcherOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new Error(`maxConcurrent must be a positive integer (got ${options.maxConcurrent})`);
    }
    this.policy = options.policy;
    this.limit = pLimit(options.maxConcurrent);
    this.transport = options.transport ?? undiciTransport;
    this.proxies = options.proxies ?? null;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.debug = options.debug ?? false;
  }

  get activeCount(): number {
    return this.limit.activeCount;
  }

  async fetch(request: FetchRequest): Promise<FetchResult> {
    if (!isHttpUrl(request.url)) {
      return frozen({
        url: request.url,
        finalUrl: request.url,
        status: "failed",
        payload: "",
        httpStatus: null,
        headers: {},
        attempts: 0,
        error: `Invalid URL: ${request.url}`,
      });
    }
    return this.limit(() => this.run(request));
  }

  private async run(request: FetchRequest): Promise<FetchResult> {
    const { policy } = this;
    const method = request.method ?? "GET";
    const headers = { ...DEFAULT_HEADERS, ...lowerCaseKeys(request.headers ?? {}) };
    const timeoutMs = request.timeoutMs ?? policy.timeoutMs;

    let proxy = this.proxies ? await this.proxies.next() : null;
    if (this.proxies && !proxy) {
      this.log(`No working proxy available, requesting ${request.url} directly`);
    }

    let attempts = 0;
    let lastStatus: number | null = null;
    let lastHeaders: Record<string, string> = {};
    let lastBody = "";
    let lastError = "";

    for (let attempt = 0; attempt <= policy.maxRetries; attempt += 1) {
      const isLast = attempt === policy.maxRetries;
      if (attempt > 0 || policy.requestDelayMs > 0) {
        await this.sleep(backoffDelay(attempt, policy) + this.random() * MAX_JITTER_MS);
      }
      attempts = attempt + 1;

      let response: TransportResponse;
      try {
        response = await this.transport({
          url: request.url,
          method,
          headers,
          body: request.body,
          proxyUrl: proxy ? proxyUrlFor(proxy, request.url) : undefined,
          timeoutMs,
        });
      } catch (error) {
        lastStatus = null;
        lastHeaders = {};
        lastBody = "";
        lastError = error instanceof Error ? error.message : String(error);
        this.log(`Attempt ${attempts} for ${request.url} failed: ${lastError}`);
        if (isLast) {
          break;
        }
        proxy = await this.failover(proxy, request.url);
        continue;
      }

      if (response.status >= 200 && response.status < 300) {
        return frozen({
          url: request.url,
          finalUrl: response.url || request.url,
          status: "ok",
          payload: response.body,
          httpStatus: response.status,
          headers: response.headers,
          attempts,
        });
      }

      lastStatus = response.status;
      lastHeaders = response.headers;
      lastBody = response.body;
      lastError = `HTTP ${response.status}`;

      if (response.status === 429) {
        if (isLast) {
          break;
        }
        const retryAfter = parseRetryAfter(response.headers["retry-after"]) ?? 0;
        const waitMs = Math.max(policy.retryDelayMs, retryAfter);
        console.warn(`⚠️  [fetch] Rate limited by ${new URL(request.url).host}, waiting ${Math.ceil(waitMs / 1000)}s`);
        await this.sleep(waitMs);
        continue;
      }

      if (!isRetryableStatus(response.status, policy)) {
        this.log(`Attempt ${attempts} for ${request.url} returned ${response.status}, not retrying`);
        break;
      }
      this.log(`Attempt ${attempts} for ${request.url} returned ${response.status}`);
      if (isLast) {
        break;
      }
      proxy = await this.failover(proxy, request.url);
    }

    return frozen({
      url: request.url,
      finalUrl: request.url,
      status: "failed",
      payload: lastBody,
      httpStatus: lastStatus,
      headers: lastHeaders,
      attempts,
      error: lastError,
    });
  }

  private async failover(proxy: ProxyEndpoint | null, url: string): Promise<ProxyEndpoint | null> {
    if (!proxy || !this.proxies) {
      return proxy;
    }
    const replacement = await this.proxies.replace(proxy);
    console.warn(
      `⚠️  [fetch] Proxy ${safeUrlForLog(proxyUrlFor(proxy, url))} failed, ${
        replacement ? `switching to ${safeUrlForLog(proxyUrlFor(replacement, url))}` : "continuing without proxy"
      }`
    );
    return replacement;
  }

  private log(message: string) {
    if (this.debug) {
      console.log(`ℹ️  [fetch] ${message}`);
    }
  }
}

function lowerCaseKeys(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    result[key.toLowerCase()] = value;
  }
  return result;
}

function toHttpMethod(value: string | undefined): HttpMethod {
  const upper = (value ?? "GET").toUpperCase();
  const method = HTTP_METHODS.find((candidate) => candidate === upper);
  if (!method) {
    throw new Error(`Unsupported HTTP method: ${value}`);
  }
  return method;
}

const NULL_BODY_STATUSES = new Set([101, 204, 205, 304]);

/**
 * Exposes a fetcher through the WHATWG `fetch` signature so clients that take
 * a custom fetch (Octokit) share its retry, proxy and concurrency policy.
 * Non-2xx responses come back as responses; only transport failures throw.
 */
export function asFetch(fetcher: ResilientFetcher) {
  return async (input: string | URL, init: RequestInit = {}): Promise<Response> => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    if (init.body !== undefined && init.body !== null && typeof init.body !== "string") {
      throw new Error("Only string request bodies are supported");
    }
    const result = await fetcher.fetch({
      url: input.toString(),
      method: toHttpMethod(init.method),
      headers,
      body: init.body ?? undefined,
    });
    if (result.httpStatus === null) {
      throw new Error(result.error ?? `Request to ${result.url} failed`);
    }
    return new Response(NULL_BODY_STATUSES.has(result.httpStatus) ? null : result.payload, {
      status: result.httpStatus,
      headers: result.headers,
    });
  };
}
