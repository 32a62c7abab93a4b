#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";
import path from "node:path";
import { pathToFileURL } from "node:url";

import { IDENTITY_FIELDS, type ScrapeKind, type ScrapeTask, type ScraperConfig } from "./types";
import { DEFAULT_DATA_DIR, loadScraperConfig, readUrlEntries, toScrapeTasks, type RawUrlEntry } from "./config";
import { normalizeWebsiteUrl } from "./extractors/website";
import { saveRecords, scrapeBatch } from "./batch";
import { createExtractor, createFetcher, createProxyPool, createStores } from "./runtime";
import type { StoreSet } from "../store/delete";

interface ScrapeCliOptions {
  url?: string[];
  input?: string;
  github?: boolean;
  website?: boolean;
  threads?: number;
  proxyFile?: string;
  output: string;
  remote?: boolean;
  local: boolean;
  skipExisting?: boolean;
  debug?: boolean;
}

function parsePositiveInt(flag: string) {
  return (value: string) => {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
      throw new Error(`${flag} must be a positive integer`);
    }
    return parsed;
  };
}

function buildProgram(): Command {
  return new Command()
    .name("scrape")
    .description("Scrape GitHub repository and website metadata into spreadsheets")
    .option(
      "-u, --url <url>",
      "URL to scrape (can be repeated)",
      (value: string, previous: string[] = []) => {
        previous.push(value);
        return previous;
      }
    )
    .option("-i, --input <path>", "JSON array or text file (one URL per line) with URLs to scrape")
    .option("--github", "Treat every URL as a GitHub repository")
    .option("--website", "Treat every URL as a website")
    .option("-t, --threads <number>", "Number of concurrent workers (default: MAX_THREADS)", parsePositiveInt("--threads"))
    .option("--proxy-file <path>", "File with one proxy per line; enables proxying")
    .option("-o, --output <dir>", "Directory holding the local spreadsheets", DEFAULT_DATA_DIR)
    .option("--remote", "Also save to the remote sheets (default: AUTO_SAVE_TO_REMOTE)")
    .option("--no-local", "Do not write the local spreadsheets")
    .option("--skip-existing", "Skip URLs that already have a row in the stores")
    .option("--debug", "Enable verbose logging");
}

async function readUrlArguments(inputPath: string | undefined, inlineUrls: string[] | undefined): Promise<RawUrlEntry[]> {
  const entries: RawUrlEntry[] = [];
  if (inlineUrls) {
    entries.push(...inlineUrls);
  }
  if (inputPath) {
    entries.push(...(await readUrlEntries(inputPath)));
  }
  if (entries.length === 0) {
    throw new Error("No URLs specified. Use --url or --input.");
  }
  return entries;
}

async function hasExistingRow(task: ScrapeTask, stores: StoreSet): Promise<boolean> {
  const value = task.kind === "website" ? normalizeWebsiteUrl(task.url) : task.url;
  for (const store of stores[task.kind]) {
    if (await store.exists(IDENTITY_FIELDS[task.kind], value)) {
      return true;
    }
  }
  return false;
}

export async function runScrape(options: ScrapeCliOptions, baseConfig: ScraperConfig = loadScraperConfig()) {
  if (options.github && options.website) {
    throw new Error("Use either --github or --website, not both.");
  }
  const config: ScraperConfig = {
    ...baseConfig,
    maxThreads: options.threads ?? baseConfig.maxThreads,
    debug: Boolean(options.debug) || baseConfig.debug,
  };
  const forcedKind: ScrapeKind | undefined = options.github ? "github" : options.website ? "website" : undefined;
  const tasks = toScrapeTasks(await readUrlArguments(options.input, options.url), forcedKind);
  const remote = options.remote ?? config.autoSaveToRemote;
  const stores = createStores(config, { dataDir: path.resolve(options.output), local: options.local, remote });

  let pending = tasks;
  if (options.skipExisting) {
    const keep: ScrapeTask[] = [];
    for (const task of tasks) {
      if (await hasExistingRow(task, stores)) {
        console.log(`ℹ️  Skipping ${task.url}: already stored`);
      } else {
        keep.push(task);
      }
    }
    pending = keep;
  }

  const pool = await createProxyPool(config, options.proxyFile);
  const fetcher = createFetcher(config, pool);
  let saveFailures = 0;
  let scrapeFailures = 0;

  for (const kind of ["github", "website"] as const) {
    const urls = pending.filter((task) => task.kind === kind).map((task) => task.url);
    if (urls.length === 0) {
      continue;
    }
    console.log(`\n⏳ Scraping ${urls.length} ${kind} URL(s) with ${Math.min(config.maxThreads, urls.length)} worker(s)…`);
    const batch = await scrapeBatch(urls, kind, {
      extractor: createExtractor(kind, fetcher, config),
      maxThreads: config.maxThreads,
      showProgress: true,
      debug: config.debug,
    });
    scrapeFailures += batch.failed;
    for (const error of batch.errors) {
      console.error(`  • ${error.url}: ${error.message}`);
    }
    if (batch.results.length === 0) {
      continue;
    }
    if (stores[kind].length === 0) {
      console.warn(`⚠️  No store selected; ${batch.results.length} ${kind} record(s) were not saved`);
      continue;
    }
    const outcomes = await saveRecords(batch.results, kind, stores[kind]);
    for (const { store, result } of outcomes) {
      if (!result.success) {
        saveFailures += 1;
        console.error(
          `❌ [${store}] save failed${result.backupPath ? `; data kept in ${result.backupPath}` : ""}${
            result.error ? `: ${result.error}` : ""
          }`
        );
      }
    }
  }

  console.log(
    `\n✅ Scrape finished: ${pending.length} URL(s), ${scrapeFailures} failed to scrape, ${saveFailures} failed save(s)`
  );
  return { scrapeFailures, saveFailures };
}

async function main() {
  const program = buildProgram().parse(process.argv);
  const { saveFailures } = await runScrape(program.opts<ScrapeCliOptions>());
  if (saveFailures > 0) {
    process.exitCode = 1;
  }
}

const directInvocation = (() => {
  try {
    return pathToFileURL(process.argv[1] ?? "").href === import.meta.url;
  } catch {
    return false;
  }
})();

if (directInvocation) {
  main().catch((error) => {
    console.error("\n❌ Scrape failed:", error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
