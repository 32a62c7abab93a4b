import * as cheerio from "cheerio";

import type { ResilientFetcher } from "../fetch";
import type { FieldExtractor, ScrapedRecord } from "../types";

export const MAX_LINK_SCAN = 30;
export const MAX_MAIN_LINKS = 20;
export const MAX_CONTACT_PAGES = 2;
export const CONTACT_PAGE_TIMEOUT_MS = 10_000;
export const FAVICON_TIMEOUT_MS = 5_000;

const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;
const PHONE_PATTERN = /(\+\d{1,3})?[\s\-.]?\(?\d{3}\)?[\s\-.]?\d{3}[\s\-.]?\d{4}/g;
const SKIPPED_HREF_PREFIXES = ["#", "javascript:", "mailto:", "tel:"];

export interface ParsedPage {
  title: string;
  description: string;
  keywords: string;
  /** Declared icon link, resolved against the page URL; empty when the page declares none. */
  favicon: string;
  links: string[];
  contacts: string[];
  contactPages: string[];
}

/** Adds `https://` when missing and serializes like a fetched final URL (`https://example.com/`). */
export function normalizeWebsiteUrl(url: string): string {
  const trimmed = url.trim();
  const absolute = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    return new URL(absolute).toString();
  } catch {
    return absolute;
  }
}

function resolve(href: string, base: string): URL | null {
  try {
    return new URL(href, base);
  } catch {
    return null;
  }
}

function metaContent($: cheerio.CheerioAPI, name: string): string {
  const byName = $(`meta[name="${name}"]`).first();
  const tag = byName.length > 0 ? byName : $(`meta[property="og:${name}"]`).first();
  return (tag.attr("content") ?? "").trim();
}

/** `Email: …` / `Phone: …` entries found in a block of text, in order of appearance. */
export function findContacts(text: string): string[] {
  const contacts: string[] = [];
  for (const match of text.matchAll(EMAIL_PATTERN)) {
    contacts.push(`Email: ${match[0]}`);
  }
  for (const match of text.matchAll(PHONE_PATTERN)) {
    contacts.push(`Phone: ${match[0].trim()}`);
  }
  return [...new Set(contacts)];
}

function pageText($: cheerio.CheerioAPI): string {
  $("script, style, noscript").remove();
  return $.root().text();
}

export function parseWebsite(html: string, pageUrl: string): ParsedPage {
  const $ = cheerio.load(html);
  const base = new URL(pageUrl);

  const title = $("title").first().text().trim();

  let favicon = "";
  $("link[rel][href]").each((_, element) => {
    if (favicon) {
      return;
    }
    const rel = ($(element).attr("rel") ?? "").toLowerCase();
    const href = $(element).attr("href");
    if (href && (rel.includes("icon") || rel.includes("shortcut"))) {
      favicon = resolve(href, pageUrl)?.toString() ?? "";
    }
  });

  const links = new Set<string>();
  const contactPages: string[] = [];
  $("a[href]").each((_, element) => {
    const href = ($(element).attr("href") ?? "").trim();
    const text = $(element).text().toLowerCase();
    if (href && (text.includes("contact") || text.includes("about"))) {
      const target = resolve(href, pageUrl);
      if (target && (target.protocol === "http:" || target.protocol === "https:")) {
        contactPages.push(target.toString());
      }
    }
    if (links.size >= MAX_LINK_SCAN) {
      return;
    }
    if (!href || SKIPPED_HREF_PREFIXES.some((prefix) => href.toLowerCase().startsWith(prefix))) {
      return;
    }
    const absolute = resolve(href, pageUrl);
    if (!absolute || absolute.host !== base.host) {
      return;
    }
    const normalized = `${absolute.protocol}//${absolute.host}${absolute.pathname}`;
    if (normalized.length < 255) {
      links.add(normalized);
    }
  });

  return {
    title,
    description: metaContent($, "description"),
    keywords: metaContent($, "keywords"),
    favicon,
    links: [...links],
    contacts: findContacts(pageText($)),
    contactPages: [...new Set(contactPages)],
  };
}

export interface WebsiteExtractorOptions {
  fetcher: ResilientFetcher;
  debug?: boolean;
}

export class WebsiteExtractor implements FieldExtractor {
  readonly kind = "website" as const;
  private readonly fetcher: ResilientFetcher;
  private readonly debug: boolean;

  constructor(options: WebsiteExtractorOptions) {
    this.fetcher = options.fetcher;
    this.debug = options.debug ?? false;
  }

  async extract(url: string): Promise<ScrapedRecord> {
    const requested = normalizeWebsiteUrl(url);
    const result = await this.fetcher.fetch({ url: requested });
    if (result.status !== "ok") {
      throw new Error(`Failed to fetch ${requested}: ${result.error ?? "unknown error"}`);
    }
    const finalUrl = result.finalUrl;
    if (finalUrl !== requested) {
      console.log(`ℹ️  [website] ${requested} redirected to ${finalUrl}`);
    }

    const page = parseWebsite(result.payload, finalUrl);
    const contacts = new Set(page.contacts);
    for (const link of page.contactPages.slice(0, MAX_CONTACT_PAGES)) {
      const contactPage = await this.fetcher.fetch({ url: link, timeoutMs: CONTACT_PAGE_TIMEOUT_MS });
      if (contactPage.status !== "ok") {
        if (this.debug) {
          console.log(`ℹ️  [website] contact page ${link} unavailable: ${contactPage.error ?? "unknown error"}`);
        }
        continue;
      }
      for (const contact of findContacts(pageText(cheerio.load(contactPage.payload)))) {
        contacts.add(contact);
      }
    }

    return {
      website_url: finalUrl,
      title: page.title,
      description: page.description,
      keywords: page.keywords,
      favicon: page.favicon || (await this.defaultFavicon(finalUrl)),
      main_links: page.links.slice(0, MAX_MAIN_LINKS).join("\n"),
      contacts: [...contacts].join("\n"),
    };
  }

  private async defaultFavicon(pageUrl: string): Promise<string> {
    const { protocol, host } = new URL(pageUrl);
    const candidate = `${protocol}//${host}/favicon.ico`;
    const result = await this.fetcher.fetch({ url: candidate, method: "HEAD", timeoutMs: FAVICON_TIMEOUT_MS });
    return result.status === "ok" && result.httpStatus === 200 ? candidate : "";
  }
}
