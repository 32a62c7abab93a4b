import type { TabularStore } from "../store/types";
import { upsert, type UpsertResult } from "../store/upsert";
import { scrapeAll, type TaskError } from "./scheduler";
import { IDENTITY_FIELDS, type FieldExtractor, type ScrapeKind, type ScrapedRecord } from "./types";

export interface ScrapeBatchDeps {
  extractor: FieldExtractor;
  maxThreads: number;
  showProgress?: boolean;
  debug?: boolean;
}

export interface ScrapeBatchResult {
  /** Submission order, so that the first occurrence of a URL wins downstream. */
  results: ScrapedRecord[];
  errors: TaskError[];
  succeeded: number;
  failed: number;
}

export async function scrapeBatch(urls: string[], kind: ScrapeKind, deps: ScrapeBatchDeps): Promise<ScrapeBatchResult> {
  if (deps.extractor.kind !== kind) {
    throw new Error(`Extractor for ${deps.extractor.kind} cannot scrape ${kind} URLs`);
  }
  const outcome = await scrapeAll(urls, (url) => deps.extractor.extract(url), {
    maxThreads: deps.maxThreads,
    label: kind === "github" ? "Scraping repository" : "Scraping website",
    showProgress: deps.showProgress,
    debug: deps.debug,
  });
  const ordered = [...outcome.results].sort((a, b) => a.index - b.index);
  return {
    results: ordered.map((item) => item.value),
    errors: [...outcome.errors].sort((a, b) => a.index - b.index),
    succeeded: outcome.succeeded,
    failed: outcome.failed,
  };
}

export interface SaveOutcome {
  store: string;
  result: UpsertResult;
}

/** Upserts the batch into each store in turn; one store failing does not stop the others. */
export async function saveRecords(
  records: ScrapedRecord[],
  kind: ScrapeKind,
  stores: TabularStore[]
): Promise<SaveOutcome[]> {
  const outcomes: SaveOutcome[] = [];
  for (const store of stores) {
    outcomes.push({ store: store.name, result: await upsert(store, records, IDENTITY_FIELDS[kind]) });
  }
  return outcomes;
}
