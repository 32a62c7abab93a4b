import { detectKind } from "../scraper/config";
import { normalizeWebsiteUrl } from "../scraper/extractors/website";
import { IDENTITY_FIELDS, type ScrapeKind } from "../scraper/types";
import type { TabularStore } from "./types";

export type StoreSet = Record<ScrapeKind, TabularStore[]>;

export interface DeleteByUrlResult {
  success: boolean;
  removed: number;
  message: string;
}

/**
 * Removes every row for `url` from the stores of its kind (GitHub repository
 * or website, decided from the URL). A URL with no rows is a success.
 */
export async function deleteByUrl(url: string, targets: StoreSet): Promise<DeleteByUrlResult> {
  const trimmed = url.trim();
  if (!trimmed) {
    return { success: false, removed: 0, message: "URL must not be empty" };
  }
  const kind = detectKind(trimmed);
  const field = IDENTITY_FIELDS[kind];
  const value = kind === "website" ? normalizeWebsiteUrl(trimmed) : trimmed;
  const stores = targets[kind];
  if (stores.length === 0) {
    return { success: false, removed: 0, message: `No ${kind} store configured` };
  }

  let removed = 0;
  const failures: string[] = [];
  for (const store of stores) {
    const result = await store.deleteWhere(field, value);
    removed += result.removed;
    if (!result.success) {
      failures.push(store.name);
    }
  }

  if (failures.length > 0) {
    return {
      success: false,
      removed,
      message: `Deleting ${value} failed in ${failures.join(", ")} (${removed} row(s) removed elsewhere)`,
    };
  }
  if (removed === 0) {
    return { success: true, removed: 0, message: `No ${kind} record found for ${value}` };
  }
  return { success: true, removed, message: `Deleted ${removed} row(s) for ${value}` };
}
