import { reconcile } from "./reconcile";
import { truncateDataset } from "./truncate";
import type { Dataset, Row, TabularStore } from "./types";

export interface UpsertResult {
  success: boolean;
  updated: number;
  inserted: number;
  skipped: number;
  /** Set when a failed local write was salvaged to a side file. */
  backupPath?: string;
  error?: string;
}

/**
 * Reads the store, reconciles `records` into it, truncates oversized cells for
 * the store's ceiling and rewrites the whole dataset.
 */
export async function upsert(store: TabularStore, records: Row[], identityField: string): Promise<UpsertResult> {
  const tag = `[${store.name}]`;
  if (records.length === 0) {
    console.log(`ℹ️  ${tag} nothing to save`);
    return { success: true, updated: 0, inserted: 0, skipped: 0 };
  }

  const read = await store.readAll();
  let existing: Dataset | null = null;
  if (read.ok) {
    existing = read.dataset;
    if (
      store.kind === "remote" &&
      existing &&
      existing.rows.length > 0 &&
      !existing.header.includes(identityField)
    ) {
      const error = `Existing data has no ${identityField} column`;
      console.error(`❌ ${tag} ${error}; refusing to overwrite it`);
      return { success: false, updated: 0, inserted: 0, skipped: 0, error };
    }
  } else if (store.kind === "remote") {
    console.error(`❌ ${tag} could not read existing data: ${read.error}`);
    return { success: false, updated: 0, inserted: 0, skipped: 0, error: read.error };
  } else {
    console.warn(`⚠️  ${tag} could not read existing data (${read.error}); writing the incoming batch only`);
  }

  const originalCount = existing?.rows.length ?? 0;
  const merged = reconcile(existing, records, identityField);
  const { dataset, truncated } = truncateDataset(merged.dataset, store.truncation);
  for (const field of truncated) {
    console.log(
      `ℹ️  ${tag} truncated ${field.column} in row ${field.row + 1} (was ${field.originalSize} ${store.truncation.unit})`
    );
  }

  const counts = { updated: merged.updated, inserted: merged.inserted, skipped: merged.skipped };
  const written = await store.writeAll(dataset);
  if (written) {
    console.log(
      `✅ ${tag} original ${originalCount} rows, updated ${merged.updated}, added ${merged.inserted}; now ${dataset.rows.length} rows`
    );
    return { success: true, ...counts };
  }

  console.error(`❌ ${tag} failed to write ${dataset.rows.length} rows`);
  if (store.salvage) {
    const backupPath = await store.salvage(dataset);
    if (backupPath) {
      console.warn(`⚠️  ${tag} merged data saved to ${backupPath}`);
      return { success: false, ...counts, backupPath };
    }
  }
  return { success: false, ...counts, error: `Failed to write ${store.name}` };
}
