import fs from "fs-extra";
import pLimit, { type LimitFunction } from "p-limit";
import type { ProxySource } from "./fetch";
import { proxyUrlFor, safeUrlForLog, undiciTransport, type HttpTransport } from "./transport";
import type { ProxyEndpoint } from "./types";

export const DEFAULT_PROBE_URL = "https://httpbin.org/ip";
export const PROBE_TIMEOUT_MS = 10_000;
export const REFRESH_INTERVAL_MS = 30 * 60 * 1000;

export interface ProbeResult {
  ok: boolean;
  ms?: number;
  error?: string;
}

export type ProxyProbe = (endpoint: ProxyEndpoint) => Promise<ProbeResult>;

export interface ProxyPoolOptions {
  probe?: ProxyProbe;
  refreshIntervalMs?: number;
  now?: () => number;
  debug?: boolean;
}

export interface ProxyPoolStats {
  total: number;
  working: number;
}

/** A bare `host:port` or proxy URL serves both schemes. */
export function parseProxyEndpoint(input: string | ProxyEndpoint): ProxyEndpoint {
  if (typeof input !== "string") {
    return { httpUrl: input.httpUrl.trim(), httpsUrl: input.httpsUrl.trim() };
  }
  const value = input.trim();
  if (!value) {
    throw new Error("Proxy endpoint must not be empty");
  }
  const url = value.includes("://") ? value : `http://${value}`;
  return { httpUrl: url, httpsUrl: url };
}

export function endpointLabel(endpoint: ProxyEndpoint): string {
  const http = safeUrlForLog(endpoint.httpUrl);
  const https = safeUrlForLog(endpoint.httpsUrl);
  return http === https ? http : `${http} / ${https}`;
}

function keyOf(endpoint: ProxyEndpoint): string {
  return `${endpoint.httpUrl}|${endpoint.httpsUrl}`;
}

export function createTransportProbe(
  transport: HttpTransport = undiciTransport,
  probeUrl = DEFAULT_PROBE_URL,
  timeoutMs = PROBE_TIMEOUT_MS
): ProxyProbe {
  return async (endpoint) => {
    const start = Date.now();
    try {
      const response = await transport({
        url: probeUrl,
        method: "GET",
        headers: { accept: "application/json,*/*" },
        proxyUrl: proxyUrlFor(endpoint, probeUrl),
        timeoutMs,
      });
      const ms = Date.now() - start;
      return response.status === 200 ? { ok: true, ms } : { ok: false, ms, error: `status=${response.status}` };
    } catch (error) {
      return { ok: false, ms: Date.now() - start, error: error instanceof Error ? error.message : String(error) };
    }
  };
}

/**
 * Validated proxy endpoints handed out round-robin. List and cursor changes
 * go through a single-slot queue; probing happens outside it.
 */
export class ProxyPool implements ProxySource {
  private all: ProxyEndpoint[] = [];
  private working: ProxyEndpoint[] = [];
  private cursor = 0;
  private lastRefreshAt: number;
  private pendingRefresh: Promise<void> | null = null;
  private readonly mutex: LimitFunction = pLimit(1);
  private readonly probe: ProxyProbe;
  private readonly refreshIntervalMs: number;
  private readonly now: () => number;
  private readonly debug: boolean;

  constructor(options: ProxyPoolOptions = {}) {
    this.probe = options.probe ?? createTransportProbe();
    this.refreshIntervalMs = options.refreshIntervalMs ?? REFRESH_INTERVAL_MS;
    this.now = options.now ?? Date.now;
    this.debug = options.debug ?? false;
    this.lastRefreshAt = this.now();
  }

  async add(input: string | ProxyEndpoint): Promise<boolean> {
    const endpoint = parseProxyEndpoint(input);
    const label = endpointLabel(endpoint);
    const known = await this.mutex(() => this.all.some((item) => keyOf(item) === keyOf(endpoint)));
    if (known) {
      console.warn(`⚠️  [proxy] ${label} is already in the pool`);
      return false;
    }

    const result = await this.probe(endpoint);
    if (!result.ok) {
      console.warn(`⚠️  [proxy] ${label} failed validation${result.error ? `: ${result.error}` : ""}`);
      return false;
    }

    const added = await this.mutex(() => {
      if (this.all.some((item) => keyOf(item) === keyOf(endpoint))) {
        return false;
      }
      this.all.push(endpoint);
      this.working.push(endpoint);
      return true;
    });
    if (added) {
      console.log(`✓ [proxy] Added ${label}${result.ms !== undefined ? ` (${result.ms}ms)` : ""}`);
    }
    return added;
  }

  async addMany(inputs: Array<string | ProxyEndpoint>): Promise<number> {
    const outcomes = await Promise.all(inputs.map((input) => this.add(input)));
    return outcomes.filter(Boolean).length;
  }

  /** One endpoint per line; blank lines and `#` comments are skipped. */
  async loadFromFile(filePath: string): Promise<number> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (error) {
      console.error(`❌ [proxy] Could not read proxy file ${filePath}:`, error instanceof Error ? error.message : error);
      return 0;
    }
    const lines = raw
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0 && !line.startsWith("#"));
    const added = await this.addMany(lines);
    console.log(`ℹ️  [proxy] Loaded ${added}/${lines.length} proxies from ${filePath}`);
    return added;
  }

  async next(): Promise<ProxyEndpoint | null> {
    await this.refresh();
    return this.mutex(() => this.pick(null));
  }

  /** Drops `failed` from the working set and returns a different endpoint, if any. */
  async replace(failed: ProxyEndpoint): Promise<ProxyEndpoint | null> {
    return this.mutex(() => {
      this.dropWorking(failed);
      return this.pick(failed);
    });
  }

  async markFailed(endpoint: ProxyEndpoint): Promise<void> {
    await this.mutex(() => this.dropWorking(endpoint));
  }

  async remove(endpoint: ProxyEndpoint): Promise<void> {
    await this.mutex(() => {
      this.all = this.all.filter((item) => keyOf(item) !== keyOf(endpoint));
      this.dropWorking(endpoint);
    });
  }

  /** Re-probes every known endpoint. Concurrent callers share the same pass. */
  refresh(force = false): Promise<void> {
    if (this.pendingRefresh) {
      return this.pendingRefresh;
    }
    if (!force && this.now() - this.lastRefreshAt < this.refreshIntervalMs) {
      return Promise.resolve();
    }
    this.pendingRefresh = this.runRefresh().finally(() => {
      this.pendingRefresh = null;
    });
    return this.pendingRefresh;
  }

  stats(): ProxyPoolStats {
    return { total: this.all.length, working: this.working.length };
  }

  private async runRefresh(): Promise<void> {
    const snapshot = await this.mutex(() => [...this.all]);
    const results = await Promise.all(
      snapshot.map(async (endpoint) => ({ endpoint, result: await this.probe(endpoint) }))
    );
    const healthy = new Set(results.filter((item) => item.result.ok).map((item) => keyOf(item.endpoint)));

    await this.mutex(() => {
      const before = this.working.length;
      const probed = new Set(snapshot.map(keyOf));
      const stillWorking = new Set(this.working.map(keyOf));
      // endpoints added during the probe pass were validated by add()
      this.working = this.all.filter((endpoint) => {
        const key = keyOf(endpoint);
        return probed.has(key) ? healthy.has(key) : stillWorking.has(key);
      });
      if (this.cursor >= this.working.length) {
        this.cursor = 0;
      }
      this.lastRefreshAt = this.now();
      console.log(
        `ℹ️  [proxy] Refreshed pool: ${before} → ${this.working.length} working of ${this.all.length}`
      );
      if (this.debug) {
        for (const { endpoint, result } of results.filter((item) => !item.result.ok)) {
          console.log(`ℹ️  [proxy] ${endpointLabel(endpoint)} unavailable: ${result.error ?? "unknown error"}`);
        }
      }
    });
  }

  private pick(exclude: ProxyEndpoint | null): ProxyEndpoint | null {
    for (let tried = 0; tried < this.working.length; tried += 1) {
      if (this.cursor >= this.working.length) {
        this.cursor = 0;
      }
      const candidate = this.working[this.cursor];
      this.cursor = (this.cursor + 1) % this.working.length;
      if (!exclude || keyOf(candidate) !== keyOf(exclude)) {
        return candidate;
      }
    }
    return null;
  }

  private dropWorking(endpoint: ProxyEndpoint) {
    const index = this.working.findIndex((item) => keyOf(item) === keyOf(endpoint));
    if (index < 0) {
      return;
    }
    this.working.splice(index, 1);
    if (index < this.cursor) {
      this.cursor -= 1;
    }
    if (this.cursor >= this.working.length) {
      this.cursor = 0;
    }
  }
}
