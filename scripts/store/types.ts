export type CellValue = string | number | boolean | null;

export type Row = Record<string, CellValue>;

export type IdentityField = "repository_url" | "website_url";

export interface Dataset {
  header: string[];
  rows: Row[];
}

export interface TruncationPolicy {
  limit: number;
  unit: "bytes" | "chars";
  cutFactor: number;
}

export type ReadResult =
  | { ok: true; dataset: Dataset | null }
  | { ok: false; error: string };

export interface DeleteResult {
  success: boolean;
  removed: number;
}

export interface TabularStore {
  readonly name: string;
  readonly kind: "local" | "remote";
  readonly truncation: TruncationPolicy;
  readAll(): Promise<ReadResult>;
  writeAll(dataset: Dataset): Promise<boolean>;
  appendRows(rows: Row[]): Promise<boolean>;
  deleteWhere(field: string, value: string): Promise<DeleteResult>;
  exists(field: string, value: string): Promise<boolean>;
  /** Writes the dataset somewhere safe after `writeAll` failed; resolves to the path written. */
  salvage?(dataset: Dataset): Promise<string | null>;
}

export function toCellValue(raw: unknown): CellValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
    return raw;
  }
  if (raw instanceof Date) {
    return raw.toISOString();
  }
  return JSON.stringify(raw);
}

export function headerOf(rows: Row[], initial: string[] = []): string[] {
  const header = [...initial];
  const seen = new Set(header);
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        header.push(key);
      }
    }
  }
  return header;
}

export function toValueMatrix(dataset: Dataset): CellValue[][] {
  return [
    [...dataset.header],
    ...dataset.rows.map((row) => dataset.header.map((column) => row[column] ?? null)),
  ];
}
