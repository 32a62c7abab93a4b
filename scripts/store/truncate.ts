import type { CellValue, Dataset, Row, TruncationPolicy } from "./types";

export const TRUNCATION_SUFFIX = "...content truncated";

export const REMOTE_TRUNCATION: TruncationPolicy = { limit: 30_000, unit: "bytes", cutFactor: 0.8 };
export const LOCAL_TRUNCATION: TruncationPolicy = { limit: 30_000, unit: "chars", cutFactor: 0.8 };
/** Last-resort chunked remote writes cut harder and to a lower ceiling. */
export const CHUNK_TRUNCATION: TruncationPolicy = { limit: 20_000, unit: "bytes", cutFactor: 0.65 };

export function measure(text: string, unit: TruncationPolicy["unit"]): number {
  return unit === "bytes" ? Buffer.byteLength(text, "utf8") : text.length;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

/** Idempotent: text already within the limit is returned as is. */
export function truncateText(text: string, policy: TruncationPolicy): string {
  if (measure(text, policy.unit) <= policy.limit) {
    return text;
  }
  const budget = Math.max(0, policy.limit - measure(TRUNCATION_SUFFIX, policy.unit));
  let cut = text;
  while (cut.length > 0 && measure(cut, policy.unit) > budget) {
    let nextLength = Math.floor(cut.length * policy.cutFactor);
    if (nextLength >= cut.length) {
      nextLength = cut.length - 1;
    }
    if (nextLength > 0 && isHighSurrogate(cut.charCodeAt(nextLength - 1))) {
      nextLength -= 1;
    }
    cut = cut.slice(0, nextLength);
  }
  return cut + TRUNCATION_SUFFIX;
}

export function truncateValue(value: CellValue, policy: TruncationPolicy): CellValue {
  return typeof value === "string" ? truncateText(value, policy) : value;
}

export interface TruncatedField {
  row: number;
  column: string;
  originalSize: number;
}

export function truncateRow(row: Row, policy: TruncationPolicy): { row: Row; truncated: string[] } {
  const result: Row = {};
  const truncated: string[] = [];
  for (const [column, value] of Object.entries(row)) {
    const next = truncateValue(value, policy);
    if (next !== value) {
      truncated.push(column);
    }
    result[column] = next;
  }
  return { row: result, truncated };
}

export function truncateDataset(
  dataset: Dataset,
  policy: TruncationPolicy
): { dataset: Dataset; truncated: TruncatedField[] } {
  const truncated: TruncatedField[] = [];
  const rows = dataset.rows.map((row, index) => {
    const outcome = truncateRow(row, policy);
    for (const column of outcome.truncated) {
      const original = row[column];
      truncated.push({
        row: index,
        column,
        originalSize: typeof original === "string" ? measure(original, policy.unit) : 0,
      });
    }
    return outcome.row;
  });
  return { dataset: { header: [...dataset.header], rows }, truncated };
}
