import type { ResilientFetcher } from "../scraper/fetch";
import { parseJsonObject } from "./sheet-client";

export const TENANT_TOKEN_PATH = "/open-apis/auth/v3/tenant_access_token/internal/";
const EXPIRY_MARGIN_MS = 60_000;
const DEFAULT_TOKEN_TTL_SECONDS = 7200;

export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
  /** Discards the cached token and fetches a new one. */
  refresh(): Promise<string>;
}

export interface TenantTokenProviderOptions {
  baseUrl: string;
  appId: string;
  appSecret: string;
  fetcher: ResilientFetcher;
  maxAttempts?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class TenantTokenProvider implements AccessTokenProvider {
  private token: string | null = null;
  private expiresAt = 0;
  private pending: Promise<string> | null = null;
  private readonly options: TenantTokenProviderOptions;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: TenantTokenProviderOptions) {
    this.options = options;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  }

  async getAccessToken(): Promise<string> {
    if (this.token && this.now() < this.expiresAt) {
      return this.token;
    }
    return this.refresh();
  }

  refresh(): Promise<string> {
    if (!this.pending) {
      this.token = null;
      this.pending = this.requestToken().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async requestToken(): Promise<string> {
    const maxAttempts = this.options.maxAttempts ?? 3;
    let lastError = "";
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const result = await this.options.fetcher.fetch({
        url: `${this.options.baseUrl}${TENANT_TOKEN_PATH}`,
        method: "POST",
        headers: { "content-type": "application/json; charset=utf-8" },
        body: JSON.stringify({ app_id: this.options.appId, app_secret: this.options.appSecret }),
      });
      const body: Record<string, unknown> = parseJsonObject(result.payload) ?? {};
      const { code, msg, expire, tenant_access_token: token } = body;
      if (result.status === "ok" && code === 0 && typeof token === "string" && token) {
        const ttl = typeof expire === "number" ? expire : DEFAULT_TOKEN_TTL_SECONDS;
        this.token = token;
        this.expiresAt = this.now() + ttl * 1000 - EXPIRY_MARGIN_MS;
        return token;
      }
      lastError = typeof msg === "string" ? `code ${String(code)}: ${msg}` : result.error ?? "unexpected response";
      console.warn(`⚠️  [sheet] access token request ${attempt}/${maxAttempts} failed: ${lastError}`);
      if (attempt < maxAttempts) {
        await this.sleep(1000 * attempt);
      }
    }
    throw new Error(`Could not obtain sheet access token: ${lastError}`);
  }
}
