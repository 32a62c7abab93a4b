export interface IndexedResult<T> {
  index: number;
  url: string;
  value: T;
}

export interface TaskError {
  index: number;
  url: string;
  message: string;
}

export interface ScrapeAllOutcome<T> {
  /** Completion order; use `index` to map back to the input. */
  results: IndexedResult<T>[];
  errors: TaskError[];
  succeeded: number;
  failed: number;
}

export interface ScrapeAllOptions {
  maxThreads: number;
  label?: string;
  showProgress?: boolean;
  debug?: boolean;
}

function isEmptyResult(value: unknown): boolean {
  if (value === null || value === undefined) {
    return true;
  }
  if (typeof value === "object" && !Array.isArray(value)) {
    return Object.keys(value).length === 0;
  }
  return false;
}

/**
 * Runs `perUrl` for every URL on a fixed set of workers pulling from a shared
 * cursor. A throwing task is recorded in `errors` and does not stop the rest.
 */
export async function scrapeAll<T>(
  urls: string[],
  perUrl: (url: string, index: number) => Promise<T | null | undefined>,
  options: ScrapeAllOptions
): Promise<ScrapeAllOutcome<T>> {
  if (!Number.isInteger(options.maxThreads) || options.maxThreads < 1) {
    throw new Error(`maxThreads must be a positive integer (got ${options.maxThreads})`);
  }
  const label = options.label ?? "Scraping";
  const results: IndexedResult<T>[] = [];
  const errors: TaskError[] = [];
  let cursor = 0;

  const worker = async () => {
    while (true) {
      const index = cursor++;
      if (index >= urls.length) {
        break;
      }
      const url = urls[index];
      if (options.showProgress) {
        console.log(`⏳ [${index + 1}/${urls.length}] ${label} ${url}…`);
      }
      try {
        const value = await perUrl(url, index);
        if (value === null || value === undefined || isEmptyResult(value)) {
          errors.push({ index, url, message: "No data returned" });
          console.warn(`⚠️  No data returned for ${url}`);
          continue;
        }
        results.push({ index, url, value });
        if (options.showProgress) {
          console.log(`✓ [${index + 1}/${urls.length}] ${url}`);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        errors.push({ index, url, message });
        console.error(`❌ Failed to scrape ${url}: ${message}`);
        if (options.debug && error instanceof Error && error.stack) {
          console.error(error.stack);
        }
      }
    }
  };

  const workerCount = Math.min(options.maxThreads, urls.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const failed = errors.length;
  console.log(`ℹ️  Scrape complete: ${results.length} succeeded, ${failed} failed`);
  return { results, errors, succeeded: results.length, failed };
}
