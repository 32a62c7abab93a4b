import { LocalSheetStore } from "../store/local-store";
import type { StoreSet } from "../store/delete";
import { createRemoteStores, type RemoteStores } from "../store/remote-store";
import type { TabularStore } from "../store/types";
import { DEFAULT_DATA_DIR, localStorePath } from "./config";
import { createGitHubClient, GitHubExtractor } from "./extractors/github";
import { WebsiteExtractor } from "./extractors/website";
import { ResilientFetcher } from "./fetch";
import { ProxyPool } from "./proxy-pool";
import { RateLimiter } from "./rate-limiter";
import type { FieldExtractor, ScrapeKind, ScraperConfig } from "./types";

/** Builds the proxy pool when proxying is enabled; `null` means direct requests. */
export async function createProxyPool(config: ScraperConfig, proxyFile?: string): Promise<ProxyPool | null> {
  if (!config.useProxy && !proxyFile) {
    return null;
  }
  const pool = new ProxyPool({ debug: config.debug });
  if (config.proxies.length > 0) {
    await pool.addMany(config.proxies);
  }
  const file = proxyFile ?? config.proxyFile;
  if (file) {
    await pool.loadFromFile(file);
  }
  const { total, working } = pool.stats();
  if (working === 0) {
    console.warn("⚠️  [proxy] No working proxies; requests will go out directly");
  } else {
    console.log(`ℹ️  [proxy] ${working}/${total} proxies ready`);
  }
  return pool;
}

export function createFetcher(config: ScraperConfig, pool: ProxyPool | null = null): ResilientFetcher {
  return new ResilientFetcher({
    policy: config.retry,
    maxConcurrent: config.maxThreads,
    proxies: pool,
    debug: config.debug,
  });
}

export function createExtractor(kind: ScrapeKind, fetcher: ResilientFetcher, config: ScraperConfig): FieldExtractor {
  if (kind === "github") {
    const octokit = createGitHubClient(fetcher, { token: config.githubToken, rateLimiter: new RateLimiter() });
    return new GitHubExtractor({ octokit, debug: config.debug });
  }
  return new WebsiteExtractor({ fetcher, debug: config.debug });
}

/** Sheet API traffic never goes through the scraping proxies. */
export function createRemote(config: ScraperConfig): RemoteStores {
  return createRemoteStores(config.sheet, createFetcher(config));
}

export interface StoreSelection {
  dataDir?: string;
  local?: boolean;
  remote?: boolean;
}

export function createStores(config: ScraperConfig, selection: StoreSelection = {}): StoreSet {
  const dataDir = selection.dataDir ?? DEFAULT_DATA_DIR;
  const remote: RemoteStores = selection.remote ? createRemote(config) : { github: null, website: null };
  const storesFor = (kind: ScrapeKind) => {
    const stores: TabularStore[] = [];
    if (selection.local ?? true) {
      stores.push(new LocalSheetStore(localStorePath(dataDir, kind)));
    }
    const remoteStore = remote[kind];
    if (remoteStore) {
      stores.push(remoteStore);
    } else if (selection.remote) {
      console.warn(`⚠️  Remote sheet for ${kind} is not configured; skipping it`);
    }
    return stores;
  };
  return { github: storesFor("github"), website: storesFor("website") };
}
