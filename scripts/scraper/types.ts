import type { IdentityField, Row } from "../store/types";

export type ScrapeKind = "github" | "website";

export const IDENTITY_FIELDS: Record<ScrapeKind, IdentityField> = {
  github: "repository_url",
  website: "website_url",
};

export interface ScrapeTask {
  url: string;
  kind: ScrapeKind;
  index: number;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE" | "PATCH" | "HEAD";

export interface FetchRequest {
  url: string;
  method?: HttpMethod;
  headers?: Record<string, string>;
  body?: string;
  timeoutMs?: number;
}

export interface FetchResult {
  url: string;
  finalUrl: string;
  status: "ok" | "failed";
  payload: string;
  httpStatus: number | null;
  headers: Record<string, string>;
  attempts: number;
  error?: string;
}

export interface ProxyEndpoint {
  httpUrl: string;
  httpsUrl: string;
}

export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
  requestDelayMs: number;
  timeoutMs: number;
  retryClientErrors: boolean;
}

export interface SheetTarget {
  spreadsheetToken: string;
  sheetId: string;
}

export interface SheetConfig {
  baseUrl: string;
  appId: string;
  appSecret: string;
  github: SheetTarget | null;
  website: SheetTarget | null;
}

export interface ScraperConfig {
  maxThreads: number;
  retry: RetryPolicy;
  useProxy: boolean;
  proxies: string[];
  proxyFile: string | null;
  githubToken: string | null;
  autoSaveToRemote: boolean;
  sheet: SheetConfig | null;
  debug: boolean;
}

export type ScrapedRecord = Row;

export interface FieldExtractor {
  readonly kind: ScrapeKind;
  extract(url: string): Promise<ScrapedRecord>;
}
