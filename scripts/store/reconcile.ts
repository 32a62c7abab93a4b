import { extractCanonicalUrl } from "./identity";
import { headerOf, type Dataset, type Row } from "./types";

export interface ReconcileResult {
  dataset: Dataset;
  updated: number;
  inserted: number;
  /** Incoming records dropped for a missing identity or as an in-batch duplicate. */
  skipped: number;
}

/**
 * Merges `incoming` into `existing` keyed on `identityField`. The first
 * occurrence of an identity wins on both sides; matched rows keep the fields
 * the incoming record does not carry.
 */
export function reconcile(existing: Dataset | null, incoming: Row[], identityField: string): ReconcileResult {
  const accepted: Row[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  for (const record of incoming) {
    const id = extractCanonicalUrl(record[identityField]);
    if (!id) {
      console.warn(`⚠️  Skipping record without ${identityField}`);
      skipped += 1;
      continue;
    }
    if (seen.has(id)) {
      console.warn(`⚠️  Skipping duplicate ${identityField} in batch: ${id}`);
      skipped += 1;
      continue;
    }
    seen.add(id);
    accepted.push({ ...record, [identityField]: id });
  }

  if (!existing || !existing.header.includes(identityField)) {
    if (existing && existing.rows.length > 0) {
      console.warn(`⚠️  Existing data has no ${identityField} column; replacing it with the incoming batch`);
    }
    return {
      dataset: { header: headerOf(accepted), rows: accepted },
      updated: 0,
      inserted: accepted.length,
      skipped,
    };
  }

  const rows: Row[] = [];
  const positions = new Map<string, number>();
  for (const row of existing.rows) {
    const id = extractCanonicalUrl(row[identityField]);
    if (!id) {
      rows.push({ ...row });
      continue;
    }
    if (positions.has(id)) {
      console.warn(`⚠️  Collapsing duplicate existing row for ${id}`);
      continue;
    }
    positions.set(id, rows.length);
    rows.push({ ...row, [identityField]: id });
  }

  let updated = 0;
  let inserted = 0;
  for (const record of accepted) {
    const id = extractCanonicalUrl(record[identityField]);
    const position = positions.get(id);
    if (position === undefined) {
      positions.set(id, rows.length);
      rows.push(record);
      inserted += 1;
    } else {
      rows[position] = { ...rows[position], ...record };
      updated += 1;
    }
  }

  return {
    dataset: { header: headerOf(accepted, existing.header), rows },
    updated,
    inserted,
    skipped,
  };
}
