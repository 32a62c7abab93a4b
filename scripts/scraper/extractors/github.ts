import { Octokit } from "@octokit/rest";

import { asFetch, type ResilientFetcher } from "../fetch";
import { RateLimiter } from "../rate-limiter";
import type { FieldExtractor, ScrapedRecord } from "../types";

export const README_MAX_CHARS = 5000;

export const GITHUB_COLUMNS = [
  "repository_url",
  "repository_name",
  "description",
  "stars",
  "forks",
  "last_updated",
  "language",
  "license",
  "contributors",
  "issues",
  "readme",
] as const;

export interface RepoSlug {
  owner: string;
  repo: string;
}

export function parseGitHubRepoUrl(url: string): RepoSlug | null {
  const match = /github\.com\/([^/?#\s]+)\/([^/?#\s]+)/i.exec(url);
  if (!match) {
    return null;
  }
  const owner = match[1];
  const repo = match[2].replace(/\.git$/i, "");
  if (!owner || !repo) {
    return null;
  }
  return { owner, repo };
}

/** `2024-03-01T10:20:30Z` → `2024-03-01 10:20:30` */
export function formatTimestamp(iso: string | null | undefined): string {
  if (!iso) {
    return "";
  }
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  return date.toISOString().slice(0, 19).replace("T", " ");
}

/** Reads the page count of a `per_page=1` listing from its Link header. */
export function lastPageFromLink(link: string | undefined): number | null {
  if (!link) {
    return null;
  }
  for (const part of link.split(",")) {
    if (/rel="last"/.test(part)) {
      const page = /[?&]page=(\d+)/.exec(part);
      if (page) {
        return Number.parseInt(page[1], 10);
      }
    }
  }
  return null;
}

function hasStatus(error: unknown, status: number): boolean {
  return typeof error === "object" && error !== null && "status" in error && error.status === status;
}

export interface GitHubClientOptions {
  token: string | null;
  rateLimiter?: RateLimiter;
}

/** Octokit running over the resilient fetcher, throttled by the rate limiter hooks. */
export function createGitHubClient(fetcher: ResilientFetcher, options: GitHubClientOptions): Octokit {
  const rateLimiter = options.rateLimiter ?? new RateLimiter();
  if (!options.token) {
    console.warn("⚠️  GITHUB_TOKEN is not set; GitHub API requests are limited to 60 per hour");
  }
  const octokit = new Octokit({
    ...(options.token ? { auth: options.token } : {}),
    userAgent: "repo-harvest",
    request: { fetch: asFetch(fetcher) },
  });
  octokit.hook.before("request", async () => {
    await rateLimiter.checkAndWait();
  });
  octokit.hook.after("request", (response) => {
    rateLimiter.updateFromHeaders(response.headers);
  });
  return octokit;
}

export interface GitHubExtractorOptions {
  octokit: Octokit;
  debug?: boolean;
}

export class GitHubExtractor implements FieldExtractor {
  readonly kind = "github" as const;
  private readonly octokit: Octokit;
  private readonly debug: boolean;

  constructor(options: GitHubExtractorOptions) {
    this.octokit = options.octokit;
    this.debug = options.debug ?? false;
  }

  async extract(url: string): Promise<ScrapedRecord> {
    const slug = parseGitHubRepoUrl(url);
    if (!slug) {
      throw new Error(`Not a GitHub repository URL: ${url}`);
    }
    const { owner, repo } = slug;
    const tag = `[${owner}/${repo}]`;
    if (this.debug) {
      console.log(`${tag} fetching repository metadata`);
    }

    const { data } = await this.octokit.repos.get({ owner, repo });
    const [contributors, readme] = await Promise.all([
      this.countContributors(slug, tag),
      this.readReadme(slug, tag),
    ]);

    return {
      repository_url: url,
      repository_name: `${owner}/${repo}`,
      description: data.description ?? "",
      stars: data.stargazers_count,
      forks: data.forks_count,
      last_updated: formatTimestamp(data.updated_at),
      language: data.language ?? "",
      license: data.license?.name ?? "",
      contributors,
      issues: data.open_issues_count,
      readme,
    };
  }

  private async countContributors({ owner, repo }: { owner: string; repo: string }, tag: string): Promise<number> {
    try {
      const response = await this.octokit.repos.listContributors({ owner, repo, per_page: 1, anon: "true" });
      const lastPage = lastPageFromLink(response.headers.link);
      if (lastPage !== null) {
        return lastPage;
      }
      const data: unknown = response.data;
      return Array.isArray(data) ? data.length : 0;
    } catch (error) {
      console.warn(`⚠️  ${tag} could not read contributors: ${error instanceof Error ? error.message : error}`);
      return 0;
    }
  }

  private async readReadme({ owner, repo }: { owner: string; repo: string }, tag: string): Promise<string> {
    try {
      const response = await this.octokit.repos.getReadme({ owner, repo, mediaType: { format: "raw" } });
      const data: unknown = response.data;
      const text = typeof data === "string" ? data : "";
      return text.length > README_MAX_CHARS ? text.slice(0, README_MAX_CHARS) : text;
    } catch (error) {
      if (hasStatus(error, 404)) {
        if (this.debug) {
          console.log(`${tag} no README`);
        }
      } else {
        console.warn(`⚠️  ${tag} could not read README: ${error instanceof Error ? error.message : error}`);
      }
      return "";
    }
  }
}
