import fs from "fs-extra";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ScrapeKind, ScrapeTask, ScraperConfig, SheetConfig, SheetTarget } from "./types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const PROJECT_ROOT = path.resolve(__dirname, "..", "..");
export const DEFAULT_DATA_DIR = path.join(PROJECT_ROOT, "data");
export const DEFAULT_SHEET_BASE_URL = "https://open.feishu.cn";

const LOCAL_FILE_NAMES: Record<ScrapeKind, string> = {
  github: "github.xlsx",
  website: "website.xlsx",
};

export type Env = Record<string, string | undefined>;

export type RawUrlEntry =
  | string
  | {
      url?: string;
      kind?: ScrapeKind;
    };

export function parseBool(value: string | undefined, fallback = false): boolean {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  return ["true", "yes", "1", "t", "y"].includes(value.trim().toLowerCase());
}

function parseNumber(
  name: string,
  value: string | undefined,
  fallback: number,
  { integer, min }: { integer: boolean; min: number }
): number {
  if (value === undefined || value.trim() === "") {
    return fallback;
  }
  const parsed = integer ? Number.parseInt(value, 10) : Number.parseFloat(value);
  if (!Number.isFinite(parsed) || parsed < min || (integer && String(parsed) !== value.trim())) {
    throw new Error(`${name} must be ${integer ? "an integer" : "a number"} >= ${min} (got '${value}')`);
  }
  return parsed;
}

function readTarget(env: Env, prefix: string): SheetTarget | null {
  const spreadsheetToken = env[`${prefix}_SPREADSHEET_TOKEN`]?.trim();
  const sheetId = env[`${prefix}_SHEET_ID`]?.trim();
  if (!spreadsheetToken || !sheetId) {
    return null;
  }
  return { spreadsheetToken, sheetId };
}

function readSheetConfig(env: Env): SheetConfig | null {
  const appId = env.SHEET_APP_ID?.trim();
  const appSecret = env.SHEET_APP_SECRET?.trim();
  if (!appId || !appSecret) {
    return null;
  }
  return {
    baseUrl: (env.SHEET_BASE_URL?.trim() || DEFAULT_SHEET_BASE_URL).replace(/\/+$/, ""),
    appId,
    appSecret,
    github: readTarget(env, "SHEET_GITHUB"),
    website: readTarget(env, "SHEET_WEBSITE"),
  };
}

/**
 * Builds the process-wide configuration once. Nothing downstream reads
 * `process.env`; the returned value is passed to constructors instead.
 */
export function loadScraperConfig(env: Env = process.env): ScraperConfig {
  const proxies = [env.HTTP_PROXY, env.HTTPS_PROXY]
    .map((value) => value?.trim() ?? "")
    .filter((value, index, all) => value.length > 0 && all.indexOf(value) === index);

  const config: ScraperConfig = {
    maxThreads: parseNumber("MAX_THREADS", env.MAX_THREADS, 5, { integer: true, min: 1 }),
    retry: {
      maxRetries: parseNumber("MAX_RETRIES", env.MAX_RETRIES, 3, { integer: true, min: 0 }),
      retryDelayMs: Math.round(parseNumber("RETRY_DELAY", env.RETRY_DELAY, 5, { integer: false, min: 0 }) * 1000),
      requestDelayMs: Math.round(
        parseNumber("REQUEST_DELAY", env.REQUEST_DELAY, 1, { integer: false, min: 0 }) * 1000
      ),
      timeoutMs: Math.round(parseNumber("REQUEST_TIMEOUT", env.REQUEST_TIMEOUT, 30, { integer: false, min: 1 }) * 1000),
      retryClientErrors: parseBool(env.RETRY_CLIENT_ERRORS),
    },
    useProxy: parseBool(env.USE_PROXY),
    proxies,
    proxyFile: env.PROXY_FILE?.trim() || null,
    githubToken: env.GITHUB_TOKEN?.trim() || null,
    autoSaveToRemote: parseBool(env.AUTO_SAVE_TO_REMOTE),
    sheet: readSheetConfig(env),
    debug: parseBool(env.SCRAPER_DEBUG),
  };

  if (config.useProxy && config.proxies.length === 0 && !config.proxyFile) {
    console.warn("⚠️  USE_PROXY is enabled but neither HTTP_PROXY, HTTPS_PROXY nor PROXY_FILE is set");
  }

  return Object.freeze(config);
}

export function localStorePath(dataDir: string, kind: ScrapeKind): string {
  return path.join(dataDir, LOCAL_FILE_NAMES[kind]);
}

export function isGitHubRepoUrl(url: string): boolean {
  let normalized = url.trim().toLowerCase();
  normalized = normalized.replace(/^https?:\/\//, "").replace(/^www\./, "");
  if (!normalized.startsWith("github.com/")) {
    return false;
  }
  const [owner, repo] = normalized.slice("github.com/".length).split("/");
  return Boolean(owner && repo);
}

function isScrapeKind(value: unknown): value is ScrapeKind {
  return value === "github" || value === "website";
}

export function detectKind(url: string): ScrapeKind {
  return isGitHubRepoUrl(url) ? "github" : "website";
}

/** Reads URL entries from a JSON array or a plain text list (one URL per line, `#` comments). */
export async function readUrlEntries(filePath: string): Promise<RawUrlEntry[]> {
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new Error(`URL list file not found: ${resolved}`);
  }
  const raw = await fs.readFile(resolved, "utf8");
  if (resolved.toLowerCase().endsWith(".json")) {
    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error("URL list file must contain a JSON array");
    }
    return parsed.map((entry: unknown, index): RawUrlEntry => {
      if (typeof entry === "string") {
        return entry;
      }
      if (typeof entry === "object" && entry !== null && "url" in entry && typeof entry.url === "string") {
        const kind = "kind" in entry ? entry.kind : undefined;
        if (kind === undefined) {
          return { url: entry.url };
        }
        if (!isScrapeKind(kind)) {
          throw new Error(`Entry ${index} has unsupported kind '${String(kind)}'`);
        }
        return { url: entry.url, kind };
      }
      throw new Error(`Entry ${index} must be a URL string or an object with a 'url' field`);
    });
  }
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Turns raw entries into tasks. Duplicates are kept: the reconciler, not the
 * scheduler, owns URL uniqueness.
 */
export function toScrapeTasks(entries: RawUrlEntry[], forcedKind?: ScrapeKind): ScrapeTask[] {
  return entries.map((entry, index) => {
    const url = (typeof entry === "string" ? entry : entry.url ?? "").trim();
    if (!url) {
      throw new Error(`URL entry ${index} is empty`);
    }
    const declared = typeof entry === "string" ? undefined : entry.kind;
    return { url, kind: forcedKind ?? declared ?? detectKind(url), index };
  });
}
